import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { createChildLogger } from '../util/logger.js';
import { PlaybackError, errorMessage } from '../tts/errors.js';
import type { AudioFormat } from '../tts/providers/TtsProvider.js';

const logger = createChildLogger('AudioPlayer');

export type AudioSource =
  | { kind: 'file'; path: string }
  | { kind: 'buffer'; audio: Buffer; format: AudioFormat };

export type PlaybackOutcome = 'completed' | 'stopped' | 'failed';

export type PlaybackCallback = (outcome: PlaybackOutcome, error?: PlaybackError) => void;

/** The part of a child process the player needs */
export interface PlayerProcess {
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
}

export type SpawnPlayer = (command: string, args: string[]) => PlayerProcess;

export interface AudioPlayerOptions {
  /** argv prefix; the audio file path is appended */
  command?: string[];
  spawnPlayer?: SpawnPlayer;
  /** Where buffers are written before being handed to the player */
  tempDir?: string;
}

interface Session {
  id: number;
  child: PlayerProcess | null;
  tempFile: string | null;
  onComplete: PlaybackCallback;
  settled: boolean;
}

export function defaultPlayerCommand(platform: NodeJS.Platform = process.platform): string[] {
  if (platform === 'darwin') return ['afplay'];
  return ['ffplay', '-nodisp', '-autoexit', '-loglevel', 'quiet'];
}

const spawnDetachedFromStdio: SpawnPlayer = (command, args) => spawn(command, args, { stdio: 'ignore' });

/**
 * Plays one audio source at a time through an external player process.
 *
 * A new play() stops the current session first. Every play() call gets
 * exactly one callback: completed, stopped or failed. Temp files written for
 * buffers are removed before that callback fires.
 */
export class AudioPlayer {
  private readonly command: string[];
  private readonly spawnPlayer: SpawnPlayer;
  private readonly tempDir: string;
  private current: Session | null = null;
  private nextId = 1;

  constructor(options: AudioPlayerOptions = {}) {
    this.command = options.command && options.command.length > 0 ? options.command : defaultPlayerCommand();
    this.spawnPlayer = options.spawnPlayer ?? spawnDetachedFromStdio;
    this.tempDir = options.tempDir ?? os.tmpdir();
    logger.info({ command: this.command[0] }, 'Audio player initialized');
  }

  get isPlaying(): boolean {
    return this.current !== null;
  }

  play(source: AudioSource, onComplete: PlaybackCallback): void {
    if (this.current) {
      logger.debug({ sessionId: this.current.id }, 'Preempting current playback');
      this.finish(this.current, 'stopped');
    }

    const session: Session = {
      id: this.nextId++,
      child: null,
      tempFile: null,
      onComplete,
      settled: false,
    };
    this.current = session;

    this.start(session, source).catch((err: unknown) => {
      this.finish(session, 'failed', new PlaybackError(`Playback failed: ${errorMessage(err)}`, err));
    });
  }

  playAndWait(source: AudioSource): Promise<PlaybackOutcome> {
    return new Promise((resolve) => {
      this.play(source, (outcome) => resolve(outcome));
    });
  }

  stop(): void {
    if (this.current) {
      logger.info({ sessionId: this.current.id }, 'Stopping playback');
      this.finish(this.current, 'stopped');
    }
  }

  private async start(session: Session, source: AudioSource): Promise<void> {
    let file: string;
    if (source.kind === 'buffer') {
      file = path.join(this.tempDir, `card-speech-${randomUUID()}.${source.format}`);
      session.tempFile = file;
      await fs.writeFile(file, source.audio);
    } else {
      file = source.path;
      const stat = await fs.stat(file);
      if (!stat.isFile() || stat.size === 0) {
        throw new Error(`Not a playable file: ${file}`);
      }
    }

    // Stopped or preempted while the file was being prepared.
    if (session.settled) {
      if (session.tempFile) await fs.rm(session.tempFile, { force: true });
      return;
    }

    const [command, ...args] = this.command;
    const child = this.spawnPlayer(command, [...args, file]);
    session.child = child;

    child.once('error', (err) => {
      this.finish(session, 'failed', new PlaybackError(`Audio player failed to start: ${err.message}`, err));
    });
    child.once('exit', (code, signal) => {
      if (code === 0) {
        this.finish(session, 'completed');
      } else {
        this.finish(
          session,
          'failed',
          new PlaybackError(`Audio player exited with ${signal ? `signal ${signal}` : `code ${code}`}`)
        );
      }
    });

    logger.debug({ sessionId: session.id, file, source: source.kind }, 'Playback started');
  }

  private finish(session: Session, outcome: PlaybackOutcome, error?: PlaybackError): void {
    if (session.settled) return;
    session.settled = true;

    if (this.current === session) {
      this.current = null;
    }

    if (outcome === 'stopped' && session.child) {
      session.child.kill('SIGTERM');
    }

    if (error) {
      logger.warn({ err: error, sessionId: session.id }, 'Playback failed');
    } else {
      logger.debug({ sessionId: session.id, outcome }, 'Playback finished');
    }

    void this.removeTempFile(session).then(() => {
      try {
        session.onComplete(outcome, error);
      } catch (err) {
        logger.error({ err, sessionId: session.id }, 'Playback callback threw');
      }
    });
  }

  private async removeTempFile(session: Session): Promise<void> {
    if (!session.tempFile) return;
    try {
      await fs.rm(session.tempFile, { force: true });
    } catch (err) {
      logger.warn({ err, path: session.tempFile }, 'Failed to delete playback temp file');
    }
  }
}
