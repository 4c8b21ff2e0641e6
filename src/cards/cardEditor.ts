import type { CardSpeaker } from '../tts/cardSpeaker.js';
import { createChildLogger } from '../util/logger.js';
import type { Card, CardPatch, CardRepository, NewCard } from './cardRepository.js';

const logger = createChildLogger('CardEditor');

export type AudioState = 'cached' | 'none';

export interface CardEditResult {
  card: Card;
  audio: AudioState;
}

const SPEECH_FIELDS = ['speechText', 'voiceId', 'speechRate', 'speechPitch'] as const;

function changesSpeech(card: Card, patch: CardPatch): boolean {
  return SPEECH_FIELDS.some((field) => field in patch && patch[field] !== card[field]);
}

/**
 * Card save/update/delete flows that keep cached audio in step with the card.
 * A save succeeds or fails on its own; audio generation is reported separately.
 */
export class CardEditor {
  constructor(
    private readonly cards: CardRepository,
    private readonly speaker: CardSpeaker
  ) {}

  async addCard(input: NewCard): Promise<CardEditResult> {
    const card = await this.cards.saveCard(input);
    const audioPath = await this.speaker.generateForCard(card);
    return this.result(card, audioPath);
  }

  /**
   * Returns null when the card does not exist.
   */
  async updateCard(id: number, patch: CardPatch): Promise<CardEditResult | null> {
    const existing = await this.cards.getCard(id);
    if (!existing) return null;

    if (!changesSpeech(existing, patch)) {
      const card = await this.cards.updateCard(id, patch);
      if (!card) return null;
      return { card, audio: card.audioPath ? 'cached' : 'none' };
    }

    // Old audio goes before the new text is saved, so nothing can replay it.
    const change = await this.speaker.onTextChanged(existing, { regenerate: false });

    const card = await this.cards.updateCard(id, patch);
    if (!card) return null;

    if (!change.invalidated) {
      logger.warn({ cardId: id }, 'Old audio could not be removed, not regenerating');
      return { card, audio: 'none' };
    }

    logger.info({ cardId: id }, 'Card speech changed, regenerating audio');
    const audioPath = await this.speaker.generateForCard(card);
    return this.result(card, audioPath);
  }

  async deleteCard(id: number): Promise<boolean> {
    const existing = await this.cards.getCard(id);
    if (!existing) return false;

    const invalidated = await this.speaker.onCardDeleted(existing);
    if (!invalidated) {
      logger.warn({ cardId: id }, 'Deleting card with audio still on disk');
    }
    return this.cards.deleteCard(id);
  }

  private result(card: Card, audioPath: string | null): CardEditResult {
    if (!audioPath) {
      return { card, audio: 'none' };
    }
    return { card: { ...card, audioPath }, audio: 'cached' };
  }
}
