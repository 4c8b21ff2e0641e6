import { readFileSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { z } from 'zod';

export type AppSettings = {
  dataDir: string;
  audioCacheDir: string;
  cardsPath: string;
  /** argv prefix of the audio player; the file path is appended */
  playerCommand?: string[];
};

export function getAppSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const dataDir = path.resolve(env.DATA_DIR || './data');
  const playerCommand = env.PLAYER_COMMAND?.trim().split(/\s+/).filter(Boolean);

  return {
    dataDir,
    audioCacheDir: path.resolve(env.AUDIO_CACHE_DIR || path.join(dataDir, 'card_audio')),
    cardsPath: path.resolve(env.CARDS_PATH || path.join(dataDir, 'cards.json')),
    playerCommand: playerCommand && playerCommand.length > 0 ? playerCommand : undefined,
  };
}

const packageSchema = z.object({ version: z.string() });

/** Version from the package manifest, which sits two levels up from both src/util and dist/util. */
export function packageVersion(): string {
  const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
  return packageSchema.parse(JSON.parse(raw)).version;
}

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

/** Conventional 128 + signal number exit status for a signal-driven shutdown. */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  return SIGNAL_EXIT_CODES[signal] ?? 1;
}

export function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read and validate a JSON file. Returns null when the file does not exist;
 * unreadable or invalid content throws.
 */
export async function readJsonFile<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
  return schema.parse(JSON.parse(raw));
}

/**
 * Write JSON through a temp file and rename, so readers never see a partial file.
 */
export async function writeJsonFile(file: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  await fs.writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
  await fs.rename(tmp, file);
}
