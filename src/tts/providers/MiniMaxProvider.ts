import { z } from 'zod';
import { createChildLogger } from '../../util/logger.js';
import { withTimeout } from '../../util/timeout.js';
import { BusyGuard } from '../busyGuard.js';
import { ConfigurationError, RemoteError, TransportError, errorMessage } from '../errors.js';
import {
  clampMultiplier,
  requireText,
  type AudioFormat,
  type MiniMaxConfig,
  type SynthesisOptions,
  type SynthesisResult,
  type TtsProvider,
} from './TtsProvider.js';

const logger = createChildLogger('MiniMaxProvider');

const responseSchema = z
  .object({
    audio_url: z.string().optional(),
    audio: z.string().optional(),
    data: z
      .object({ audio: z.string().optional() })
      .passthrough()
      .nullable()
      .optional(),
    base_resp: z
      .object({ status_code: z.number(), status_msg: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * MiniMax speech over plain request/response HTTP.
 *
 * The response either points at an audio URL to download or carries the audio
 * inline (base64 in `audio`, hex in `data.audio`).
 */
export class MiniMaxProvider implements TtsProvider {
  readonly name = 'minimax';
  readonly format: AudioFormat = 'mp3';
  private readonly guard = new BusyGuard('minimax');
  private readonly baseUrl: string;

  constructor(
    private readonly config: MiniMaxConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    logger.info({ model: config.model, baseUrl: this.baseUrl }, 'MiniMax TTS provider created');
  }

  get isBusy(): boolean {
    return this.guard.isBusy;
  }

  isConfigured(): boolean {
    return this.config.apiKey.trim().length > 0;
  }

  async synthesize(text: string, options: SynthesisOptions = {}): Promise<SynthesisResult> {
    const input = requireText(text);
    if (!this.isConfigured()) {
      throw new ConfigurationError('MiniMax API key is not configured');
    }
    const voiceId = options.voice || this.config.voiceId;
    if (!voiceId) {
      throw new ConfigurationError('MiniMax voice id is not configured');
    }

    return this.guard.run(async () => {
      const controller = new AbortController();
      const audio = await withTimeout(
        this.request(input, voiceId, options, controller.signal),
        this.config.timeoutMs,
        'MiniMax synthesis',
        () => {
          logger.warn({ timeoutMs: this.config.timeoutMs }, 'MiniMax synthesis timed out, aborting request');
          controller.abort();
        }
      );
      return { audio, format: this.format };
    });
  }

  async close(): Promise<void> {
    // Stateless: every synthesis is its own HTTP request.
  }

  private async request(
    text: string,
    voiceId: string,
    options: SynthesisOptions,
    signal: AbortSignal
  ): Promise<Buffer> {
    logger.debug({ text, voiceId }, 'Synthesizing with MiniMax');

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/v1/t2a_v2`, {
        method: 'POST',
        signal,
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.config.model,
          text,
          voice_id: voiceId,
          speed: clampMultiplier(options.speechRate),
          emotion: 'happy',
        }),
      });
    } catch (err) {
      throw new TransportError(`MiniMax request failed: ${errorMessage(err)}`, err);
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new RemoteError(res.status, `MiniMax HTTP ${res.status}: ${body.slice(0, 200)}`);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new RemoteError('invalid-response', `MiniMax response is not JSON: ${errorMessage(err)}`);
    }

    const parsed = responseSchema.safeParse(json);
    if (!parsed.success) {
      throw new RemoteError('invalid-response', 'MiniMax response has an unexpected shape');
    }
    const body = parsed.data;

    if (body.base_resp && body.base_resp.status_code !== 0) {
      throw new RemoteError(body.base_resp.status_code, body.base_resp.status_msg || 'MiniMax synthesis failed');
    }

    let audio: Buffer;
    if (body.audio_url) {
      audio = await this.download(body.audio_url, signal);
    } else if (body.audio) {
      audio = Buffer.from(body.audio, 'base64');
    } else if (body.data?.audio) {
      audio = Buffer.from(body.data.audio, 'hex');
    } else {
      throw new RemoteError('empty-audio', 'MiniMax response carries no audio');
    }

    if (audio.length === 0) {
      throw new RemoteError('empty-audio', 'MiniMax returned no audio');
    }
    logger.debug({ size: audio.length }, 'MiniMax synthesis complete');
    return audio;
  }

  private async download(url: string, signal: AbortSignal): Promise<Buffer> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, { signal });
    } catch (err) {
      throw new TransportError(`MiniMax audio download failed: ${errorMessage(err)}`, err);
    }
    if (!res.ok) {
      throw new RemoteError(res.status, `MiniMax audio download failed: HTTP ${res.status}`);
    }
    return Buffer.from(await res.arrayBuffer());
  }
}
