import { createHash } from 'node:crypto';
import type { AudioCache } from '../audio/audioCache.js';
import type { AudioPlayer, AudioSource } from '../audio/audioPlayer.js';
import type { Card, CardRepository } from '../cards/cardRepository.js';
import { createChildLogger } from '../util/logger.js';
import { StorageError, isSpeechError } from './errors.js';
import { createProviders, type ProviderSet } from './providers/factory.js';
import {
  clampMultiplier,
  type SynthesisOptions,
  type SynthesisResult,
  type TtsConfig,
  type TtsProvider,
} from './providers/TtsProvider.js';

const logger = createChildLogger('CardSpeaker');

export type SpeakSource = 'cache' | 'generated' | 'memory' | 'fallback';

export type NoAudioReason =
  | 'card-not-found'
  | 'empty-text'
  | 'not-configured'
  | 'synthesis-failed'
  | 'playback-failed';

export type SpeakResult =
  | { outcome: 'played'; source: SpeakSource; playback: 'completed' | 'stopped' }
  | { outcome: 'no-audio'; reason: NoAudioReason };

export type SpeakCallback = (result: SpeakResult) => void;

export interface WarmCacheSummary {
  generated: number;
  skipped: number;
  failed: number;
}

/** Outcome of a text change; `audioPath` is the regenerated audio, if any. */
export type TextChangeResult = { invalidated: false } | { invalidated: true; audioPath: string | null };

type SpeakableCard = Pick<Card, 'id' | 'speechText' | 'audioPath' | 'voiceId' | 'speechRate' | 'speechPitch'>;

export interface CardSpeakerDeps {
  cards: Pick<CardRepository, 'getCard' | 'updateAudioReference'>;
  cache: AudioCache;
  player: AudioPlayer;
  providers: ProviderSet;
  /** Rebuilds providers on reload() */
  createProviders?: (config: TtsConfig) => ProviderSet;
}

export function synthesisOptionsFor(card: SpeakableCard): SynthesisOptions {
  return {
    voice: card.voiceId || undefined,
    speechRate: clampMultiplier(card.speechRate),
    pitch: clampMultiplier(card.speechPitch),
  };
}

/**
 * Hash of everything that shapes the generated audio. A cache entry written
 * under a different fingerprint is treated as a miss.
 */
export function audioFingerprint(provider: string, card: SpeakableCard): string {
  const options = synthesisOptionsFor(card);
  return createHash('sha256')
    .update(JSON.stringify([provider, card.speechText.trim(), options.voice ?? '', options.speechRate, options.pitch]))
    .digest('hex');
}

const noAudio = (reason: NoAudioReason): SpeakResult => ({ outcome: 'no-audio', reason });

/**
 * Speaks cards: cache first, then synthesize-and-cache, then a direct
 * uncached attempt. Every request ends in exactly one SpeakResult; nothing
 * thrown below this layer reaches the caller.
 */
export class CardSpeaker {
  private readonly cards: CardSpeakerDeps['cards'];
  private readonly cache: AudioCache;
  private readonly player: AudioPlayer;
  private readonly buildProviders: (config: TtsConfig) => ProviderSet;
  private providers: ProviderSet;

  constructor(deps: CardSpeakerDeps) {
    this.cards = deps.cards;
    this.cache = deps.cache;
    this.player = deps.player;
    this.providers = deps.providers;
    this.buildProviders = deps.createProviders ?? createProviders;
  }

  get provider(): TtsProvider {
    return this.providers.primary;
  }

  isConfigured(): boolean {
    return this.providers.primary.isConfigured();
  }

  /**
   * Play a card's audio. Resolves (and calls onComplete) exactly once.
   */
  async playCard(cardOrId: SpeakableCard | number, onComplete?: SpeakCallback): Promise<SpeakResult> {
    let result: SpeakResult;
    try {
      result = await this.speakCard(cardOrId);
    } catch (err) {
      logger.error({ err }, 'Unexpected failure while speaking card');
      result = noAudio('synthesis-failed');
    }

    if (onComplete) {
      try {
        onComplete(result);
      } catch (err) {
        logger.error({ err }, 'Speak callback threw');
      }
    }
    return result;
  }

  /**
   * Synthesize and play arbitrary text without caching (voice preview).
   */
  async speakText(text: string, options: SynthesisOptions = {}): Promise<SpeakResult> {
    if (!text.trim()) return noAudio('empty-text');
    if (!this.isConfigured()) return noAudio('not-configured');

    try {
      const synthesized = await this.providers.primary.synthesize(text, options);
      return await this.play({ kind: 'buffer', audio: synthesized.audio, format: synthesized.format }, 'memory');
    } catch (err) {
      this.logSynthesisFailure(err, { text });
      if (!this.providers.fallback) return noAudio('synthesis-failed');
      return this.speakDirect(text, options);
    }
  }

  /**
   * Synthesize and cache audio for a card without playing it. Returns the new
   * path, or null if the card could not be generated.
   */
  async generateForCard(card: SpeakableCard): Promise<string | null> {
    if (!card.speechText.trim()) {
      logger.warn({ cardId: card.id }, 'No speech text for card');
      return null;
    }
    if (!this.isConfigured()) {
      logger.warn({ cardId: card.id }, 'TTS not configured, skipping generation');
      return null;
    }

    let synthesized: SynthesisResult;
    try {
      synthesized = await this.providers.primary.synthesize(card.speechText, synthesisOptionsFor(card));
    } catch (err) {
      this.logSynthesisFailure(err, { cardId: card.id });
      return null;
    }

    return this.store(card, synthesized);
  }

  /**
   * Generate audio for every card that has no valid cache entry, one at a time.
   */
  async warmCache(cards: SpeakableCard[]): Promise<WarmCacheSummary> {
    const summary: WarmCacheSummary = { generated: 0, skipped: 0, failed: 0 };
    const provider = this.providers.primary.name;

    for (const card of cards) {
      if (await this.cache.lookup(card.id, audioFingerprint(provider, card))) {
        summary.skipped++;
        continue;
      }
      if (await this.generateForCard(card)) {
        summary.generated++;
      } else {
        summary.failed++;
      }
    }

    logger.info(summary, 'Cache warm-up finished');
    return summary;
  }

  /**
   * The card's text or voice changed. The old audio is invalidated before any
   * new synthesis; regeneration failing leaves the card with no audio, never
   * stale audio. `card` carries the new values.
   */
  async onTextChanged(card: SpeakableCard, options: { regenerate?: boolean } = {}): Promise<TextChangeResult> {
    const invalidated = await this.invalidateCard(card);
    if (!invalidated) {
      logger.error({ cardId: card.id }, 'Could not invalidate cached audio, skipping regeneration');
      return { invalidated: false };
    }
    if (options.regenerate === false) return { invalidated: true, audioPath: null };
    return { invalidated: true, audioPath: await this.generateForCard({ ...card, audioPath: null }) };
  }

  /**
   * The card is being deleted. Its cache file must not outlive it.
   */
  async onCardDeleted(card: Pick<Card, 'id' | 'audioPath'>): Promise<boolean> {
    return this.invalidateCard(card);
  }

  stop(): void {
    this.player.stop();
  }

  /**
   * Swap in providers built from a new configuration. A synthesis already
   * running on an old provider finishes there.
   */
  async reload(config: TtsConfig): Promise<void> {
    const previous = this.providers;
    this.providers = this.buildProviders(config);
    logger.info(
      { provider: this.providers.primary.name, fallback: this.providers.fallback?.name ?? null },
      'TTS providers reloaded'
    );
    await this.closeProviders(previous);
  }

  async close(): Promise<void> {
    this.player.stop();
    await this.closeProviders(this.providers);
  }

  private async speakCard(cardOrId: SpeakableCard | number): Promise<SpeakResult> {
    const card = typeof cardOrId === 'number' ? await this.cards.getCard(cardOrId) : cardOrId;
    if (!card) {
      logger.warn({ cardId: cardOrId }, 'Card not found');
      return noAudio('card-not-found');
    }
    if (!card.speechText.trim()) {
      return noAudio('empty-text');
    }
    if (!this.isConfigured()) {
      logger.warn({ cardId: card.id, provider: this.providers.primary.name }, 'TTS not configured');
      return noAudio('not-configured');
    }

    const provider = this.providers.primary;
    const cached = await this.cache.lookup(card.id, audioFingerprint(provider.name, card));
    if (cached) {
      logger.debug({ cardId: card.id, path: cached }, 'Playing from cache');
      return this.play({ kind: 'file', path: cached }, 'cache');
    }

    if (card.audioPath) {
      // The stored reference no longer points at valid audio.
      await this.clearReference(card.id);
    }

    logger.debug({ cardId: card.id, provider: provider.name }, 'No cache, generating');
    let synthesized: SynthesisResult;
    try {
      synthesized = await provider.synthesize(card.speechText, synthesisOptionsFor(card));
    } catch (err) {
      this.logSynthesisFailure(err, { cardId: card.id });
      return this.speakDirect(card.speechText, synthesisOptionsFor(card));
    }

    const stored = await this.store(card, synthesized);
    if (stored) {
      return this.play({ kind: 'file', path: stored }, 'generated');
    }
    return this.play({ kind: 'buffer', audio: synthesized.audio, format: synthesized.format }, 'memory');
  }

  /**
   * Uncached speak-now attempt through the fallback provider (or the primary
   * when none is configured). Failure ends silently.
   */
  private async speakDirect(text: string, options: SynthesisOptions): Promise<SpeakResult> {
    const provider = this.providers.fallback ?? this.providers.primary;
    if (!provider.isConfigured()) {
      return noAudio('synthesis-failed');
    }

    logger.info({ provider: provider.name }, 'Falling back to direct synthesis');
    try {
      const synthesized = await provider.synthesize(text, options);
      return await this.play({ kind: 'buffer', audio: synthesized.audio, format: synthesized.format }, 'fallback');
    } catch (err) {
      this.logSynthesisFailure(err, { provider: provider.name, fallback: true });
      return noAudio('synthesis-failed');
    }
  }

  private async store(card: SpeakableCard, synthesized: SynthesisResult): Promise<string | null> {
    let stored: string;
    try {
      stored = await this.cache.persist(card.id, synthesized.audio, {
        format: synthesized.format,
        fingerprint: audioFingerprint(this.providers.primary.name, card),
      });
    } catch (err) {
      const level = err instanceof StorageError ? 'warn' : 'error';
      logger[level]({ err, cardId: card.id }, 'Could not cache audio, playing from memory');
      return null;
    }

    try {
      await this.cards.updateAudioReference(card.id, stored);
    } catch (err) {
      // The cache entry is authoritative; the card reference catches up on the next play.
      logger.warn({ err, cardId: card.id }, 'Failed to record audio path on card');
    }
    return stored;
  }

  private async play(source: AudioSource, origin: SpeakSource): Promise<SpeakResult> {
    const playback = await this.player.playAndWait(source);
    if (playback === 'failed') {
      return noAudio('playback-failed');
    }
    return { outcome: 'played', source: origin, playback };
  }

  /**
   * Cache invalidation and clearing the card's reference happen together; if
   * either fails both are retried once.
   */
  private async invalidateCard(card: Pick<Card, 'id' | 'audioPath'>): Promise<boolean> {
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        await this.cache.invalidate(card.id, card.audioPath);
        await this.cards.updateAudioReference(card.id, null);
        return true;
      } catch (err) {
        logger.warn({ err, cardId: card.id, attempt }, 'Failed to invalidate cached audio');
      }
    }
    return false;
  }

  private async clearReference(cardId: number): Promise<void> {
    try {
      await this.cards.updateAudioReference(cardId, null);
    } catch (err) {
      logger.warn({ err, cardId }, 'Failed to clear stale audio path');
    }
  }

  private logSynthesisFailure(err: unknown, context: Record<string, unknown>): void {
    if (isSpeechError(err)) {
      logger.warn({ ...context, kind: err.kind, err }, 'Synthesis failed');
    } else {
      logger.error({ ...context, err }, 'Synthesis failed unexpectedly');
    }
  }

  private async closeProviders(set: ProviderSet): Promise<void> {
    for (const provider of [set.primary, set.fallback]) {
      if (!provider) continue;
      try {
        await provider.close();
      } catch (err) {
        logger.warn({ err, provider: provider.name }, 'Failed to close TTS provider');
      }
    }
  }
}
