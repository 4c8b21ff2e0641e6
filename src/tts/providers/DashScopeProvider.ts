import { randomUUID } from 'node:crypto';
import WebSocket from 'ws';
import { z } from 'zod';
import { createChildLogger } from '../../util/logger.js';
import { withTimeout } from '../../util/timeout.js';
import { BusyGuard } from '../busyGuard.js';
import { ConfigurationError, RemoteError, TransportError } from '../errors.js';
import {
  clampMultiplier,
  requireText,
  type AudioFormat,
  type DashScopeConfig,
  type SynthesisOptions,
  type SynthesisResult,
  type TtsProvider,
} from './TtsProvider.js';

const logger = createChildLogger('DashScopeProvider');

const serverEventSchema = z.object({
  header: z
    .object({
      task_id: z.string().optional(),
      event: z.string().optional(),
      error_code: z.union([z.string(), z.number()]).optional(),
      error_message: z.string().optional(),
    })
    .passthrough(),
  payload: z
    .object({
      audio: z.string().optional(),
      output: z
        .object({
          audio: z.object({ data: z.string().optional() }).passthrough().optional(),
        })
        .passthrough()
        .optional(),
    })
    .passthrough()
    .optional(),
});

type ServerEvent = z.infer<typeof serverEventSchema>;

function rawToBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function inlineAudio(event: ServerEvent): string | undefined {
  return event.payload?.audio || event.payload?.output?.audio?.data || undefined;
}

/**
 * CosyVoice over the DashScope duplex WebSocket protocol.
 *
 * run-task carries the text in `payload.text`, so a server that skips the
 * handshake can start right away. A server that answers with task-started
 * gets continue-task (echoing its task id) and finish-task. Audio arrives as
 * binary frames or base64 inside JSON frames until task-finished; every chunk
 * is kept and concatenated in arrival order.
 */
export class DashScopeProvider implements TtsProvider {
  readonly name = 'dashscope';
  readonly format: AudioFormat = 'mp3';
  private readonly guard = new BusyGuard('dashscope');
  private config: DashScopeConfig;

  constructor(config: DashScopeConfig) {
    this.config = config;
    logger.info(
      { model: config.model, voice: config.voice, url: config.url, timeoutMs: config.timeoutMs },
      'DashScope TTS provider created'
    );
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
      throw new ConfigurationError('DashScope API key is not configured');
    }

    return this.guard.run(async () => {
      const audio = await this.runTask(input, options);
      return { audio, format: this.format };
    });
  }

  async close(): Promise<void> {
    // Sockets live only for the duration of one synthesis.
  }

  private runTask(text: string, options: SynthesisOptions): Promise<Buffer> {
    const { apiKey, url, model, sampleRate, volume, timeoutMs } = this.config;
    const voice = options.voice || this.config.voice;
    const taskId = randomUUID().replace(/-/g, '');
    const chunks: Buffer[] = [];
    let finished = false;

    logger.debug({ taskId, voice, text }, 'Opening DashScope session');

    const socket = new WebSocket(url, {
      headers: { Authorization: `bearer ${apiKey}` },
    });

    const send = (message: object) => {
      socket.send(JSON.stringify(message));
    };

    const session = new Promise<void>((resolve, reject) => {
      socket.on('open', () => {
        send({
          header: { action: 'run-task', task_id: taskId, streaming: 'duplex' },
          payload: {
            task_group: 'audio',
            task: 'tts',
            function: 'SpeechSynthesizer',
            model,
            parameters: {
              text_type: 'PlainText',
              voice,
              format: this.format,
              sample_rate: sampleRate,
              volume,
              rate: clampMultiplier(options.speechRate),
              pitch: clampMultiplier(options.pitch),
            },
            text,
            input: { text },
          },
        });
      });

      socket.on('message', (data, isBinary) => {
        if (isBinary) {
          chunks.push(rawToBuffer(data));
          return;
        }

        let event: ServerEvent;
        try {
          const parsed = serverEventSchema.safeParse(JSON.parse(rawToBuffer(data).toString('utf8')));
          if (!parsed.success) {
            logger.warn({ taskId, issues: parsed.error.issues }, 'Ignoring malformed DashScope frame');
            return;
          }
          event = parsed.data;
        } catch (err) {
          logger.warn({ err, taskId }, 'Ignoring non-JSON DashScope frame');
          return;
        }

        const audio = inlineAudio(event);
        if (audio) {
          chunks.push(Buffer.from(audio, 'base64'));
        }

        switch (event.header.event) {
          case 'task-started': {
            // Echo the task id the server issued before sending the payload.
            const serverTaskId = event.header.task_id || taskId;
            send({
              header: { action: 'continue-task', task_id: serverTaskId, streaming: 'duplex' },
              payload: { input: { text } },
            });
            send({
              header: { action: 'finish-task', task_id: serverTaskId, streaming: 'duplex' },
              payload: { input: {} },
            });
            break;
          }
          case 'task-finished':
            finished = true;
            resolve();
            socket.close(1000, 'Done');
            break;
          case 'task-failed':
            finished = true;
            reject(
              new RemoteError(
                event.header.error_code ?? 'task-failed',
                event.header.error_message || 'DashScope synthesis task failed'
              )
            );
            socket.close(1000, 'Failed');
            break;
          default:
            break;
        }
      });

      socket.on('error', (err) => {
        reject(new TransportError(`DashScope socket error: ${err.message}`, err));
      });

      socket.on('close', (code) => {
        if (!finished) {
          reject(new TransportError(`DashScope socket closed before the task finished (code ${code})`));
        }
      });
    });

    return withTimeout(session, timeoutMs, 'DashScope synthesis', () => {
      logger.warn({ taskId, timeoutMs }, 'DashScope synthesis timed out, cancelling task');
      finished = true;
      socket.terminate();
    })
      .then(() => {
        const audio = Buffer.concat(chunks);
        if (audio.length === 0) {
          throw new RemoteError('empty-audio', 'DashScope returned no audio');
        }
        logger.debug({ taskId, chunks: chunks.length, size: audio.length }, 'DashScope synthesis complete');
        return audio;
      })
      .finally(() => {
        if (socket.readyState === WebSocket.CONNECTING || socket.readyState === WebSocket.OPEN) {
          socket.terminate();
        }
      });
  }
}
