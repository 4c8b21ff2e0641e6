import { EventEmitter } from 'node:events';
import { existsSync, readFileSync } from 'node:fs';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AudioCache } from '../audio/audioCache.js';
import { AudioPlayer } from '../audio/audioPlayer.js';
import { JsonCardRepository, type Card } from '../cards/cardRepository.js';
import { CardSpeaker, audioFingerprint, type SpeakResult } from '../tts/cardSpeaker.js';
import { StorageError, TransportError } from '../tts/errors.js';
import type { AudioFormat, ProviderKind, TtsProvider } from '../tts/providers/TtsProvider.js';
import { ttsConfig } from './helpers.js';

class FakeProvider implements TtsProvider {
  readonly format: AudioFormat = 'mp3';
  readonly isBusy = false;
  configured = true;
  readonly synthesize = vi.fn<TtsProvider['synthesize']>(async (text) => ({
    audio: Buffer.from(`${this.name}:${text.trim()}`),
    format: 'mp3',
  }));
  readonly close = vi.fn<TtsProvider['close']>(async () => undefined);

  constructor(readonly name: ProviderKind) {}

  isConfigured(): boolean {
    return this.configured;
  }
}

class FakeProcess extends EventEmitter {
  readonly kill = vi.fn((_signal?: NodeJS.Signals) => true);
}

function seedCard(overrides: Partial<Card> = {}): Card {
  return { id: 7, label: '吃', speechText: '吃面包', audioPath: null, ...overrides };
}

describe('CardSpeaker', () => {
  let root: string;
  let cardsPath: string;
  let cards: JsonCardRepository;
  let cache: AudioCache;
  let player: AudioPlayer;
  let primary: FakeProvider;
  let played: string[];
  let exitCode: number;

  const makeSpeaker = (fallback: FakeProvider | null = null) =>
    new CardSpeaker({ cards, cache, player, providers: { primary, fallback } });

  const storedCard = async (id = 7): Promise<Card> => {
    const card = await cards.getCard(id);
    if (!card) throw new Error(`card ${id} missing`);
    return card;
  };

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'card-speaker-'));
    cardsPath = path.join(root, 'cards.json');
    await fs.writeFile(cardsPath, JSON.stringify({ cards: [seedCard()] }));

    cards = new JsonCardRepository(cardsPath);
    cache = new AudioCache(path.join(root, 'card_audio'));
    primary = new FakeProvider('dashscope');
    played = [];
    exitCode = 0;
    player = new AudioPlayer({
      command: ['fake-player'],
      tempDir: root,
      spawnPlayer: (_command, args) => {
        const child = new FakeProcess();
        played.push(readFileSync(args[args.length - 1], 'utf8'));
        setImmediate(() => child.emit('exit', exitCode, null));
        return child;
      },
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('playCard', () => {
    it('generates, caches and plays on a miss, then plays from cache', async () => {
      const speaker = makeSpeaker();

      const first = await speaker.playCard(7);
      const second = await speaker.playCard(7);

      expect(first).toEqual({ outcome: 'played', source: 'generated', playback: 'completed' });
      expect(second).toEqual({ outcome: 'played', source: 'cache', playback: 'completed' });
      expect(played).toEqual(['dashscope:吃面包', 'dashscope:吃面包']);
      expect(primary.synthesize).toHaveBeenCalledTimes(1);

      const card = await storedCard();
      expect(card.audioPath).not.toBeNull();
      expect(await cache.lookup(7)).toBe(card.audioPath);
    });

    it('passes voice, rate and pitch to the provider', async () => {
      const speaker = makeSpeaker();

      await speaker.playCard(seedCard({ voiceId: 'longxiaochun', speechRate: 1.5, speechPitch: 9 }));

      expect(primary.synthesize).toHaveBeenCalledWith('吃面包', { voice: 'longxiaochun', speechRate: 1.5, pitch: 2 });
    });

    it('calls onComplete exactly once with the result', async () => {
      const onComplete = vi.fn<(result: SpeakResult) => void>();

      const result = await makeSpeaker().playCard(7, onComplete);

      expect(onComplete).toHaveBeenCalledTimes(1);
      expect(onComplete).toHaveBeenCalledWith(result);
    });

    it('completes silently when the provider is not configured', async () => {
      primary.configured = false;
      const onComplete = vi.fn<(result: SpeakResult) => void>();

      const result = await makeSpeaker().playCard(7, onComplete);

      expect(result).toEqual({ outcome: 'no-audio', reason: 'not-configured' });
      expect(onComplete).toHaveBeenCalledTimes(1);
      expect(primary.synthesize).not.toHaveBeenCalled();
      expect(played).toEqual([]);
    });

    it('completes silently for unknown cards and empty text', async () => {
      const speaker = makeSpeaker();

      expect(await speaker.playCard(99)).toEqual({ outcome: 'no-audio', reason: 'card-not-found' });
      expect(await speaker.playCard(seedCard({ speechText: '   ' }))).toEqual({
        outcome: 'no-audio',
        reason: 'empty-text',
      });
      expect(primary.synthesize).not.toHaveBeenCalled();
    });

    it('plays from memory when the audio cannot be cached', async () => {
      vi.spyOn(cache, 'persist').mockRejectedValue(new StorageError('disk full'));

      const result = await makeSpeaker().playCard(7);

      expect(result).toEqual({ outcome: 'played', source: 'memory', playback: 'completed' });
      expect(played).toEqual(['dashscope:吃面包']);
      expect((await storedCard()).audioPath).toBeNull();
    });

    it('falls back to the fallback provider without caching', async () => {
      primary.synthesize.mockRejectedValue(new TransportError('connection refused'));
      const fallback = new FakeProvider('minimax');

      const result = await makeSpeaker(fallback).playCard(7);

      expect(result).toEqual({ outcome: 'played', source: 'fallback', playback: 'completed' });
      expect(played).toEqual(['minimax:吃面包']);
      expect(await cache.lookup(7)).toBeNull();
      expect((await storedCard()).audioPath).toBeNull();
    });

    it('retries the primary directly when no fallback is configured', async () => {
      primary.synthesize
        .mockRejectedValueOnce(new TransportError('connection reset'))
        .mockResolvedValueOnce({ audio: Buffer.from('retry'), format: 'mp3' });

      const result = await makeSpeaker().playCard(7);

      expect(result).toEqual({ outcome: 'played', source: 'fallback', playback: 'completed' });
      expect(primary.synthesize).toHaveBeenCalledTimes(2);
      expect(played).toEqual(['retry']);
    });

    it('completes silently when every synthesis attempt fails', async () => {
      primary.synthesize.mockRejectedValue(new TransportError('offline'));
      const fallback = new FakeProvider('minimax');
      fallback.synthesize.mockRejectedValue(new TransportError('offline'));

      const result = await makeSpeaker(fallback).playCard(7);

      expect(result).toEqual({ outcome: 'no-audio', reason: 'synthesis-failed' });
      expect(played).toEqual([]);
    });

    it('reports a player failure as no audio', async () => {
      exitCode = 1;

      const result = await makeSpeaker().playCard(7);

      expect(result).toEqual({ outcome: 'no-audio', reason: 'playback-failed' });
    });

    it('clears a stale audio reference that no longer resolves', async () => {
      await cards.updateAudioReference(7, path.join(root, 'card_audio', 'card_7_gone.mp3'));
      primary.synthesize.mockRejectedValue(new TransportError('offline'));

      await makeSpeaker().playCard(7);

      expect((await storedCard()).audioPath).toBeNull();
    });

    it('regenerates when the stored audio was made from different text', async () => {
      const speaker = makeSpeaker();
      await speaker.playCard(7);

      await cards.updateCard(7, { speechText: '喝水' });
      const result = await speaker.playCard(7);

      expect(result).toEqual({ outcome: 'played', source: 'generated', playback: 'completed' });
      expect(played).toEqual(['dashscope:吃面包', 'dashscope:喝水']);
    });

    it('never lets a throwing callback escape', async () => {
      const result = await makeSpeaker().playCard(7, () => {
        throw new Error('listener bug');
      });

      expect(result.outcome).toBe('played');
    });
  });

  describe('onTextChanged', () => {
    it('invalidates the old audio before synthesizing the new text', async () => {
      const speaker = makeSpeaker();
      const invalidate = vi.spyOn(cache, 'invalidate');

      await speaker.playCard(7);
      const oldPath = (await storedCard()).audioPath;
      expect(oldPath).not.toBeNull();

      const updated = await cards.updateCard(7, { speechText: '吃苹果' });
      if (!updated) throw new Error('card 7 missing');
      const change = await speaker.onTextChanged(updated);
      const newPath = change.invalidated ? change.audioPath : null;

      expect(invalidate).toHaveBeenCalledWith(7, oldPath);
      expect(invalidate.mock.invocationCallOrder[0]).toBeLessThan(primary.synthesize.mock.invocationCallOrder[1]);
      expect(primary.synthesize).toHaveBeenLastCalledWith('吃苹果', { voice: undefined, speechRate: 1, pitch: 1 });
      expect(change.invalidated).toBe(true);
      expect(newPath).not.toBeNull();
      expect(newPath).not.toBe(oldPath);
      expect(existsSync(oldPath ?? '')).toBe(false);
      expect((await storedCard()).audioPath).toBe(newPath);

      const result = await speaker.playCard(7);
      expect(result).toEqual({ outcome: 'played', source: 'cache', playback: 'completed' });
      expect(played).toEqual(['dashscope:吃面包', 'dashscope:吃苹果']);
    });

    it('leaves the card without audio when regeneration fails', async () => {
      const speaker = makeSpeaker();
      await speaker.playCard(7);
      primary.synthesize.mockRejectedValue(new TransportError('offline'));

      const updated = await cards.updateCard(7, { speechText: '吃苹果' });
      if (!updated) throw new Error('card 7 missing');

      expect(await speaker.onTextChanged(updated)).toEqual({ invalidated: true, audioPath: null });
      expect((await storedCard()).audioPath).toBeNull();
      expect(await cache.lookup(7)).toBeNull();
    });

    it('skips regeneration when asked to', async () => {
      const speaker = makeSpeaker();
      await speaker.playCard(7);

      expect(await speaker.onTextChanged(await storedCard(), { regenerate: false })).toEqual({
        invalidated: true,
        audioPath: null,
      });
      expect(primary.synthesize).toHaveBeenCalledTimes(1);
      expect(await cache.lookup(7)).toBeNull();
    });

    it('does not regenerate when invalidation keeps failing', async () => {
      const speaker = makeSpeaker();
      vi.spyOn(cache, 'invalidate').mockRejectedValue(new StorageError('read-only'));

      expect(await speaker.onTextChanged(seedCard({ speechText: '吃苹果' }))).toEqual({ invalidated: false });
      expect(cache.invalidate).toHaveBeenCalledTimes(2);
      expect(primary.synthesize).not.toHaveBeenCalled();
    });
  });

  describe('onCardDeleted', () => {
    it('removes the cached file', async () => {
      const speaker = makeSpeaker();
      await speaker.playCard(7);
      const card = await storedCard();

      expect(await speaker.onCardDeleted(card)).toBe(true);
      expect(existsSync(card.audioPath ?? '')).toBe(false);
      expect(await cache.lookup(7)).toBeNull();
    });
  });

  describe('warmCache', () => {
    it('generates only what is missing', async () => {
      const speaker = makeSpeaker();
      await speaker.playCard(7);

      const summary = await speaker.warmCache([
        await storedCard(),
        seedCard({ id: 8, speechText: '喝水' }),
        seedCard({ id: 9, speechText: '' }),
      ]);

      expect(summary).toEqual({ generated: 1, skipped: 1, failed: 1 });
      expect(await cache.lookup(8)).not.toBeNull();
    });
  });

  describe('speakText', () => {
    it('plays without caching', async () => {
      const result = await makeSpeaker().speakText('试听', { voice: 'longxiaochun' });

      expect(result).toEqual({ outcome: 'played', source: 'memory', playback: 'completed' });
      expect(played).toEqual(['dashscope:试听']);
      expect(await cache.size()).toBe(0);
    });
  });

  describe('reload', () => {
    it('closes the old providers and uses the new ones', async () => {
      const replacement = new FakeProvider('google');
      const speaker = new CardSpeaker({
        cards,
        cache,
        player,
        providers: { primary, fallback: null },
        createProviders: () => ({ primary: replacement, fallback: null }),
      });

      await speaker.reload(ttsConfig({ provider: 'google' }));
      await speaker.playCard(7);

      expect(primary.close).toHaveBeenCalledTimes(1);
      expect(speaker.provider).toBe(replacement);
      expect(played).toEqual(['google:吃面包']);
    });
  });

  describe('audioFingerprint', () => {
    it('ignores surrounding whitespace and defaults', () => {
      expect(audioFingerprint('dashscope', seedCard({ speechText: ' 吃面包 ' }))).toBe(
        audioFingerprint('dashscope', seedCard({ speechRate: 1 }))
      );
    });

    it('changes with provider, text and voice', () => {
      const base = audioFingerprint('dashscope', seedCard());

      expect(audioFingerprint('minimax', seedCard())).not.toBe(base);
      expect(audioFingerprint('dashscope', seedCard({ speechText: '吃苹果' }))).not.toBe(base);
      expect(audioFingerprint('dashscope', seedCard({ voiceId: 'longxiaochun' }))).not.toBe(base);
    });
  });
});
