/**
 * Error taxonomy for synthesis, storage and playback.
 *
 * Providers and the audio cache throw these; CardSpeaker catches every one of
 * them and turns it into a SpeakResult.
 */

export type SpeechErrorKind =
  | 'configuration'
  | 'empty-text'
  | 'busy'
  | 'transport'
  | 'remote'
  | 'timeout'
  | 'storage'
  | 'playback';

export class SpeechError extends Error {
  readonly kind: SpeechErrorKind;

  constructor(kind: SpeechErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpeechError';
    this.kind = kind;
  }
}

/** No credentials or backend configured. Raised before any network call. */
export class ConfigurationError extends SpeechError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}

export class EmptyTextError extends SpeechError {
  constructor() {
    super('empty-text', 'Text is empty after trimming');
    this.name = 'EmptyTextError';
  }
}

/** A provider instance already has a synthesis in flight. */
export class BackendBusyError extends SpeechError {
  constructor(provider: string) {
    super('busy', `[${provider}] a synthesis is already in flight`);
    this.name = 'BackendBusyError';
  }
}

export class TransportError extends SpeechError {
  constructor(message: string, cause?: unknown) {
    super('transport', message, { cause });
    this.name = 'TransportError';
  }
}

export class RemoteError extends SpeechError {
  readonly code: string;

  constructor(code: string | number, message: string) {
    super('remote', `${message} (code ${code})`);
    this.name = 'RemoteError';
    this.code = String(code);
  }
}

export class TimeoutError extends SpeechError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('timeout', `${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class StorageError extends SpeechError {
  constructor(message: string, cause?: unknown) {
    super('storage', message, { cause });
    this.name = 'StorageError';
  }
}

export class PlaybackError extends SpeechError {
  constructor(message: string, cause?: unknown) {
    super('playback', message, { cause });
    this.name = 'PlaybackError';
  }
}

export function isSpeechError(err: unknown): err is SpeechError {
  return err instanceof SpeechError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
