import { z } from 'zod';
import { createChildLogger } from '../util/logger.js';
import { readJsonFile, writeJsonFile } from '../util/settings.js';

const logger = createChildLogger('CardRepository');

const cardSchema = z.object({
  id: z.number().int().positive(),
  label: z.string(),
  speechText: z.string(),
  audioPath: z.string().nullable().default(null),
  voiceId: z.string().optional(),
  speechRate: z.number().optional(),
  speechPitch: z.number().optional(),
});

const cardsFileSchema = z.object({
  cards: z.array(cardSchema),
});

export type Card = z.infer<typeof cardSchema>;

export type NewCard = Omit<Card, 'id' | 'audioPath'>;

export type CardPatch = Partial<Omit<Card, 'id' | 'audioPath'>>;

/**
 * Card store as seen by the speech layer.
 */
export interface CardRepository {
  getCard(id: number): Promise<Card | null>;
  listCards(): Promise<Card[]>;
  saveCard(card: NewCard): Promise<Card>;
  updateCard(id: number, patch: CardPatch): Promise<Card | null>;
  deleteCard(id: number): Promise<boolean>;
  /** Point the card at its cached audio, or clear the reference with null */
  updateAudioReference(id: number, audioPath: string | null): Promise<void>;
}

/**
 * Cards kept in a single JSON file. Mutations are serialized and each one
 * rewrites the file through a temp file.
 */
export class JsonCardRepository implements CardRepository {
  private cards: Map<number, Card> | null = null;
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async getCard(id: number): Promise<Card | null> {
    const cards = await this.load();
    const card = cards.get(id);
    return card ? { ...card } : null;
  }

  async listCards(): Promise<Card[]> {
    const cards = await this.load();
    return [...cards.values()].map((card) => ({ ...card }));
  }

  saveCard(input: NewCard): Promise<Card> {
    return this.mutate((cards) => {
      const id = Math.max(0, ...cards.keys()) + 1;
      const card: Card = { ...input, id, audioPath: null };
      cards.set(id, card);
      logger.info({ cardId: id, label: card.label }, 'Card saved');
      return { ...card };
    });
  }

  updateCard(id: number, patch: CardPatch): Promise<Card | null> {
    return this.mutate((cards) => {
      const existing = cards.get(id);
      if (!existing) return null;
      const next: Card = { ...existing, ...patch, id };
      cards.set(id, next);
      return { ...next };
    });
  }

  deleteCard(id: number): Promise<boolean> {
    return this.mutate((cards) => {
      const existed = cards.delete(id);
      if (existed) logger.info({ cardId: id }, 'Card deleted');
      return existed;
    });
  }

  async updateAudioReference(id: number, audioPath: string | null): Promise<void> {
    await this.mutate((cards) => {
      const existing = cards.get(id);
      if (existing) {
        cards.set(id, { ...existing, audioPath });
      }
    });
  }

  private async load(): Promise<Map<number, Card>> {
    if (!this.cards) {
      const file = await readJsonFile(this.filePath, cardsFileSchema);
      this.cards = new Map((file?.cards ?? []).map((card) => [card.id, card]));
      logger.debug({ path: this.filePath, count: this.cards.size }, 'Cards loaded');
    }
    return this.cards;
  }

  /**
   * Apply `change` to a copy and swap it in once the file is written. Cards are
   * replaced, never edited in place, so a shallow copy is enough.
   */
  private mutate<T>(change: (cards: Map<number, Card>) => T): Promise<T> {
    const run = this.lock.then(async () => {
      const draft = new Map(await this.load());
      const result = change(draft);
      await writeJsonFile(this.filePath, { cards: [...draft.values()] });
      this.cards = draft;
      return result;
    });
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
