import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { createChildLogger } from '../util/logger.js';
import { isNotFound, readJsonFile, writeJsonFile } from '../util/settings.js';
import { StorageError, errorMessage } from '../tts/errors.js';
import type { AudioFormat } from '../tts/providers/TtsProvider.js';

const logger = createChildLogger('AudioCache');

const MANIFEST_FILE = 'index.json';

const entrySchema = z.object({
  cardId: z.number().int(),
  path: z.string().min(1),
  format: z.enum(['mp3', 'ogg', 'wav']),
  fingerprint: z.string().optional(),
  size: z.number().int().nonnegative(),
  createdAt: z.string(),
});

const manifestSchema = z.object({
  version: z.literal(1),
  entries: z.array(entrySchema),
});

export type CacheEntry = z.infer<typeof entrySchema>;

export interface PersistOptions {
  format: AudioFormat;
  /** Identifies the text and voice parameters the audio was generated from */
  fingerprint?: string;
}

/**
 * On-disk audio cache, one entry per card id.
 *
 * The manifest is the only authority on which file belongs to which card:
 * deletion always goes through it, never through a file name pattern. New
 * audio gets a unique file name, so a file being played is never overwritten.
 */
export class AudioCache {
  private readonly manifestPath: string;
  private entries = new Map<number, CacheEntry>();
  private loading: Promise<void> | null = null;
  private manifestWrites: Promise<void> = Promise.resolve();

  constructor(readonly dir: string) {
    this.manifestPath = path.join(dir, MANIFEST_FILE);
  }

  /**
   * Path of the cached audio for a card, or null on a miss. Only returns a path
   * whose file exists and is non-empty; a fingerprint mismatch is also a miss.
   */
  async lookup(cardId: number, fingerprint?: string): Promise<string | null> {
    try {
      await this.load();
    } catch (err) {
      logger.warn({ err, cardId }, 'Cache unavailable, treating lookup as miss');
      return null;
    }

    const entry = this.entries.get(cardId);
    if (!entry) return null;

    if (fingerprint && entry.fingerprint && entry.fingerprint !== fingerprint) {
      logger.debug({ cardId }, 'Cached audio was generated from different text or voice');
      return null;
    }

    let size: number;
    try {
      const stat = await fs.stat(entry.path);
      size = stat.isFile() ? stat.size : 0;
    } catch (err) {
      if (!isNotFound(err)) {
        logger.warn({ err, cardId, path: entry.path }, 'Cannot stat cached audio, treating as miss');
        return null;
      }
      size = -1;
    }

    if (size <= 0) {
      logger.warn({ cardId, path: entry.path, size }, 'Cached audio missing or empty, dropping entry');
      await this.forget(cardId, entry, size === 0);
      return null;
    }

    return entry.path;
  }

  /**
   * Write audio to a private temp file, flush, rename it into place and only
   * then register it. Returns the new path. The card's previous file is
   * deleted once the new one is registered.
   */
  async persist(cardId: number, audio: Buffer, options: PersistOptions): Promise<string> {
    if (audio.length === 0) {
      throw new StorageError(`Refusing to cache empty audio for card ${cardId}`);
    }
    try {
      await this.load();
    } catch (err) {
      throw new StorageError(`Audio cache directory unavailable: ${errorMessage(err)}`, err);
    }

    const fileName = `card_${cardId}_${randomUUID()}.${options.format}`;
    const finalPath = path.join(this.dir, fileName);
    const tmpPath = path.join(this.dir, `.${fileName}.tmp`);

    try {
      const handle = await fs.open(tmpPath, 'wx');
      try {
        await handle.writeFile(audio);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, finalPath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw new StorageError(`Failed to write cached audio for card ${cardId}: ${errorMessage(err)}`, err);
    }

    const previous = this.entries.get(cardId);
    this.entries.set(cardId, {
      cardId,
      path: finalPath,
      format: options.format,
      fingerprint: options.fingerprint,
      size: audio.length,
      createdAt: new Date().toISOString(),
    });

    try {
      await this.saveManifest();
    } catch (err) {
      if (previous) {
        this.entries.set(cardId, previous);
      } else {
        this.entries.delete(cardId);
      }
      await fs.rm(finalPath, { force: true });
      throw new StorageError(`Failed to register cached audio for card ${cardId}: ${errorMessage(err)}`, err);
    }

    if (previous && previous.path !== finalPath) {
      await this.removeQuietly(previous.path);
    }

    logger.debug({ cardId, path: finalPath, size: audio.length }, 'Audio cached');
    return finalPath;
  }

  /**
   * Delete the card's file, then drop its entry. `knownPath` (the card's
   * stored reference) is deleted too when it lies inside the cache directory.
   * A file that is already gone counts as success. The entry stays registered
   * until the manifest without it is saved, so a failed call can be retried.
   */
  async invalidate(cardId: number, knownPath?: string | null): Promise<void> {
    let entry: CacheEntry | undefined;
    try {
      await this.load();
      entry = this.entries.get(cardId);
    } catch (err) {
      throw new StorageError(`Failed to invalidate cached audio for card ${cardId}: ${errorMessage(err)}`, err);
    }

    const paths = new Set<string>();
    if (entry) {
      paths.add(entry.path);
    }
    if (knownPath && this.contains(knownPath)) {
      paths.add(path.resolve(knownPath));
    }

    for (const file of paths) {
      await this.removeFile(file);
    }

    if (entry && this.entries.get(cardId) === entry) {
      this.entries.delete(cardId);
      try {
        await this.saveManifest();
      } catch (err) {
        if (!this.entries.has(cardId)) {
          this.entries.set(cardId, entry);
        }
        throw new StorageError(`Failed to invalidate cached audio for card ${cardId}: ${errorMessage(err)}`, err);
      }
    }

    if (paths.size > 0) {
      logger.info({ cardId, files: paths.size }, 'Cached audio invalidated');
    }
  }

  /**
   * Delete every file in the cache directory. Safe on an empty, missing or
   * half-deleted directory.
   */
  async clear(): Promise<void> {
    this.entries.clear();

    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return;
      logger.warn({ err, dir: this.dir }, 'Cannot list audio cache directory');
      return;
    }

    let removed = 0;
    for (const name of names) {
      try {
        await fs.rm(path.join(this.dir, name), { force: true, recursive: true });
        removed++;
      } catch (err) {
        logger.warn({ err, name }, 'Failed to delete cache file');
      }
    }
    logger.info({ removed }, 'Cleared audio cache');
  }

  /**
   * Total size in bytes of the cached audio files. Unreadable entries are
   * skipped.
   */
  async size(): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (!isNotFound(err)) {
        logger.warn({ err, dir: this.dir }, 'Cannot list audio cache directory');
      }
      return 0;
    }

    let total = 0;
    for (const name of names) {
      if (name === MANIFEST_FILE) continue;
      try {
        const stat = await fs.stat(path.join(this.dir, name));
        if (stat.isFile()) total += stat.size;
      } catch (err) {
        logger.debug({ err, name }, 'Skipping unreadable cache file');
      }
    }
    return total;
  }

  private contains(filePath: string): boolean {
    const relative = path.relative(this.dir, path.resolve(filePath));
    return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative);
  }

  private load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.readManifest().catch((err: unknown) => {
        this.loading = null;
        throw err;
      });
    }
    return this.loading;
  }

  private async readManifest(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    try {
      const manifest = await readJsonFile(this.manifestPath, manifestSchema);
      this.entries = new Map((manifest?.entries ?? []).map((e) => [e.cardId, e]));
    } catch (err) {
      // Entries are only an index over files; start over rather than fail every lookup.
      logger.warn({ err, path: this.manifestPath }, 'Unreadable cache manifest, starting empty');
      this.entries = new Map();
    }
    logger.debug({ dir: this.dir, entries: this.entries.size }, 'Audio cache loaded');
  }

  private saveManifest(): Promise<void> {
    const write = this.manifestWrites.then(() =>
      writeJsonFile(this.manifestPath, { version: 1, entries: [...this.entries.values()] })
    );
    // Keep the chain alive after a failed write; the caller still sees the error.
    this.manifestWrites = write.catch(() => undefined);
    return write;
  }

  private async forget(cardId: number, entry: CacheEntry, deleteFile: boolean): Promise<void> {
    if (this.entries.get(cardId) === entry) {
      this.entries.delete(cardId);
      try {
        await this.saveManifest();
      } catch (err) {
        logger.warn({ err, cardId }, 'Failed to save cache manifest');
      }
    }
    if (deleteFile) {
      await this.removeQuietly(entry.path);
    }
  }

  private async removeFile(file: string): Promise<void> {
    try {
      await fs.unlink(file);
    } catch (err) {
      if (isNotFound(err)) return;
      throw new StorageError(`Failed to delete ${file}: ${errorMessage(err)}`, err);
    }
  }

  private async removeQuietly(file: string): Promise<void> {
    try {
      await this.removeFile(file);
    } catch (err) {
      logger.warn({ err, path: file }, 'Failed to delete stale audio file');
    }
  }
}
