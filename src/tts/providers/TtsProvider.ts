import process from 'node:process';
import { z } from 'zod';
import { EmptyTextError } from '../errors.js';

export type ProviderKind = 'dashscope' | 'google' | 'minimax';

/** Container/codec of the bytes a provider returns. */
export type AudioFormat = 'mp3' | 'ogg' | 'wav';

export interface SynthesisOptions {
  /** Backend voice id; the provider's configured default when absent */
  voice?: string;
  /** Multiplier, clamped to [0.5, 2.0] */
  speechRate?: number;
  /** Multiplier, clamped to [0.5, 2.0] */
  pitch?: number;
}

export interface SynthesisResult {
  audio: Buffer;
  format: AudioFormat;
}

/**
 * Base interface for TTS providers
 */
export interface TtsProvider {
  /**
   * Provider name for logging
   */
  readonly name: ProviderKind;

  /**
   * Format of every result this instance produces
   */
  readonly format: AudioFormat;

  /**
   * True while a synthesis is in flight on this instance
   */
  readonly isBusy: boolean;

  /**
   * Whether credentials are present. Checked before any network call.
   */
  isConfigured(): boolean;

  /**
   * Synthesize text to speech audio.
   * Fails immediately with BackendBusyError if a synthesis is already running.
   */
  synthesize(text: string, options?: SynthesisOptions): Promise<SynthesisResult>;

  /**
   * Release clients and sockets held by the provider
   */
  close(): Promise<void>;
}

export interface DashScopeConfig {
  apiKey: string;
  url: string;
  model: string;
  voice: string;
  sampleRate: number;
  volume: number;
  timeoutMs: number;
}

export interface GoogleCloudConfig {
  credentialsPath?: string;
  projectId?: string;
  voiceName: string;
  languageCode: string;
  sampleRate: number;
  timeoutMs: number;
}

export interface MiniMaxConfig {
  apiKey: string;
  voiceId: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
}

/**
 * TTS configuration. Passed explicitly to the provider factory; there is no
 * process-wide credential state.
 */
export interface TtsConfig {
  provider: ProviderKind;
  fallbackProvider?: ProviderKind;
  timeoutMs: number;
  dashscope: DashScopeConfig;
  google: GoogleCloudConfig;
  minimax: MiniMaxConfig;
}

export const MIN_SPEECH_MULTIPLIER = 0.5;
export const MAX_SPEECH_MULTIPLIER = 2.0;

export function clampMultiplier(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 1.0;
  return Math.min(MAX_SPEECH_MULTIPLIER, Math.max(MIN_SPEECH_MULTIPLIER, value));
}

/**
 * Trim and reject empty text before anything is sent over the network.
 */
export function requireText(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new EmptyTextError();
  }
  return trimmed;
}

const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const providerKind = z.enum(['dashscope', 'google', 'minimax']);

const envSchema = z.object({
  TTS_PROVIDER: z.preprocess(blankAsUndefined, providerKind.default('dashscope')),
  TTS_FALLBACK_PROVIDER: z.preprocess(blankAsUndefined, providerKind.optional()),
  TTS_TIMEOUT_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(30_000)),
  TTS_SAMPLE_RATE: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(22_050)),
  TTS_VOLUME: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).max(100).default(50)),

  DASHSCOPE_API_KEY: z.string().default(''),
  DASHSCOPE_WS_URL: z.preprocess(
    blankAsUndefined,
    z.string().url().default('wss://dashscope.aliyuncs.com/api-ws/v1/inference')
  ),
  DASHSCOPE_MODEL: z.preprocess(blankAsUndefined, z.string().default('cosyvoice-v3-flash')),
  DASHSCOPE_VOICE: z.preprocess(blankAsUndefined, z.string().default('longanyang')),

  MINIMAX_API_KEY: z.string().default(''),
  MINIMAX_VOICE_ID: z.string().default(''),
  MINIMAX_MODEL: z.preprocess(blankAsUndefined, z.string().default('speech-2.6-turbo')),
  MINIMAX_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().default('https://api.minimax.io')),

  GOOGLE_APPLICATION_CREDENTIALS: z.preprocess(blankAsUndefined, z.string().optional()),
  GOOGLE_CLOUD_PROJECT_ID: z.preprocess(blankAsUndefined, z.string().optional()),
  GOOGLE_TTS_VOICE: z.preprocess(blankAsUndefined, z.string().default('cmn-CN-Chirp3-HD-Aoede')),
  GOOGLE_TTS_LANGUAGE: z.preprocess(blankAsUndefined, z.string().default('cmn-CN')),
});

/**
 * Get TTS configuration from environment
 */
export function getTtsConfig(env: NodeJS.ProcessEnv = process.env): TtsConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid TTS configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    provider: e.TTS_PROVIDER,
    fallbackProvider: e.TTS_FALLBACK_PROVIDER,
    timeoutMs: e.TTS_TIMEOUT_MS,
    dashscope: {
      apiKey: e.DASHSCOPE_API_KEY.trim(),
      url: e.DASHSCOPE_WS_URL,
      model: e.DASHSCOPE_MODEL,
      voice: e.DASHSCOPE_VOICE,
      sampleRate: e.TTS_SAMPLE_RATE,
      volume: e.TTS_VOLUME,
      timeoutMs: e.TTS_TIMEOUT_MS,
    },
    google: {
      credentialsPath: e.GOOGLE_APPLICATION_CREDENTIALS,
      projectId: e.GOOGLE_CLOUD_PROJECT_ID,
      voiceName: e.GOOGLE_TTS_VOICE,
      languageCode: e.GOOGLE_TTS_LANGUAGE,
      sampleRate: e.TTS_SAMPLE_RATE,
      timeoutMs: e.TTS_TIMEOUT_MS,
    },
    minimax: {
      apiKey: e.MINIMAX_API_KEY.trim(),
      voiceId: e.MINIMAX_VOICE_ID.trim(),
      model: e.MINIMAX_MODEL,
      baseUrl: e.MINIMAX_BASE_URL,
      timeoutMs: e.TTS_TIMEOUT_MS,
    },
  };
}
