import type { Duplex } from 'node:stream';
import { TextToSpeechClient } from '@google-cloud/text-to-speech';
import { createChildLogger } from '../../util/logger.js';
import { withTimeout } from '../../util/timeout.js';
import { BusyGuard } from '../busyGuard.js';
import { ConfigurationError, RemoteError, TransportError, errorMessage } from '../errors.js';
import {
  clampMultiplier,
  requireText,
  type AudioFormat,
  type GoogleCloudConfig,
  type SynthesisOptions,
  type SynthesisResult,
  type TtsProvider,
} from './TtsProvider.js';

const logger = createChildLogger('GoogleCloudProvider');

/** Bidirectional gRPC call returned by `streamingSynthesize()` */
export type StreamingSynthesisCall = Duplex & { cancel(): void };

/** The part of the SDK client this provider talks to */
export interface StreamingSpeechClient {
  streamingSynthesize(): StreamingSynthesisCall;
  close(): Promise<void>;
}

export type SpeechClientFactory = (config: GoogleCloudConfig) => StreamingSpeechClient;

// gRPC status codes that mean the channel, not the service, failed.
const TRANSPORT_STATUS_CODES = new Set([4, 14]);

function createSdkClient(config: GoogleCloudConfig): StreamingSpeechClient {
  const client = new TextToSpeechClient({
    keyFilename: config.credentialsPath,
    projectId: config.projectId,
  });
  return {
    streamingSynthesize: () => client.streamingSynthesize(),
    close: () => client.close(),
  };
}

function audioContentOf(response: unknown): Buffer | null {
  if (typeof response !== 'object' || response === null || !('audioContent' in response)) {
    return null;
  }
  const content = response.audioContent;
  if (content instanceof Uint8Array) return Buffer.from(content);
  if (typeof content === 'string' && content.length > 0) return Buffer.from(content, 'base64');
  return null;
}

function grpcStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

/**
 * Google Cloud TTS through the SDK's streaming synthesis call.
 *
 * The first request carries the voice and audio config, the second the text;
 * responses stream back `audioContent` chunks until the server ends the call.
 */
export class GoogleCloudProvider implements TtsProvider {
  readonly name = 'google';
  readonly format: AudioFormat = 'ogg';
  private readonly guard = new BusyGuard('google');
  private client: StreamingSpeechClient | null = null;

  constructor(
    private readonly config: GoogleCloudConfig,
    private readonly createClient: SpeechClientFactory = createSdkClient
  ) {
    logger.info(
      { voiceName: config.voiceName, languageCode: config.languageCode },
      'Google Cloud TTS provider created (not yet initialized)'
    );
  }

  get isBusy(): boolean {
    return this.guard.isBusy;
  }

  isConfigured(): boolean {
    return Boolean(this.config.credentialsPath || this.config.projectId);
  }

  initialize(): StreamingSpeechClient {
    if (this.client) {
      return this.client;
    }

    try {
      this.client = this.createClient(this.config);
      logger.info('Google Cloud TTS client initialized');
      return this.client;
    } catch (err) {
      logger.error({ err }, 'Failed to initialize Google Cloud TTS client');
      throw new ConfigurationError(`Google Cloud TTS client unavailable: ${errorMessage(err)}`);
    }
  }

  async synthesize(text: string, options: SynthesisOptions = {}): Promise<SynthesisResult> {
    const input = requireText(text);
    if (!this.isConfigured()) {
      throw new ConfigurationError('Google Cloud credentials not configured');
    }

    return this.guard.run(async () => {
      const client = this.initialize();
      const audio = await this.stream(client, input, options);
      return { audio, format: this.format };
    });
  }

  async close(): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = null;
    await client.close();
  }

  private stream(client: StreamingSpeechClient, text: string, options: SynthesisOptions): Promise<Buffer> {
    const voiceName = options.voice || this.config.voiceName;
    const chunks: Buffer[] = [];

    logger.debug({ text, voice: voiceName }, 'Synthesizing with Google Cloud streaming TTS');

    let call: StreamingSynthesisCall;
    try {
      call = client.streamingSynthesize();
    } catch (err) {
      return Promise.reject(new TransportError(`Google Cloud stream failed to open: ${errorMessage(err)}`, err));
    }

    const done = new Promise<void>((resolve, reject) => {
      call.on('data', (response: unknown) => {
        const audio = audioContentOf(response);
        if (audio) chunks.push(audio);
      });
      call.on('end', () => resolve());
      call.on('error', (err: Error) => {
        const status = grpcStatusOf(err);
        if (status === undefined || TRANSPORT_STATUS_CODES.has(status)) {
          reject(new TransportError(`Google Cloud stream error: ${err.message}`, err));
        } else {
          reject(new RemoteError(status, err.message));
        }
      });
    });

    call.write({
      streamingConfig: {
        voice: { name: voiceName, languageCode: this.config.languageCode },
        streamingAudioConfig: {
          audioEncoding: 'OGG_OPUS',
          sampleRateHertz: this.config.sampleRate,
          speakingRate: clampMultiplier(options.speechRate),
        },
      },
    });
    call.write({ input: { text } });
    call.end();

    return withTimeout(done, this.config.timeoutMs, 'Google Cloud synthesis', () => {
      logger.warn({ timeoutMs: this.config.timeoutMs }, 'Google Cloud synthesis timed out, cancelling stream');
      call.cancel();
    }).then(() => {
      const audio = Buffer.concat(chunks);
      if (audio.length === 0) {
        throw new RemoteError('empty-audio', 'Google Cloud returned no audio');
      }
      logger.debug({ chunks: chunks.length, size: audio.length }, 'Google Cloud synthesis complete');
      return audio;
    });
  }
}
