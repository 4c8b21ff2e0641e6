import process from 'node:process';
import type { CardSpeechApp } from '../app.js';
import type { Card } from '../cards/cardRepository.js';
import { createChildLogger } from '../util/logger.js';
import { parseCardId } from './play.js';

const logger = createChildLogger('GenerateCommand');

/**
 * Pre-generate audio for the given cards, or for every card when none are named.
 */
export async function generateCommand(app: CardSpeechApp, rawIds: string[]): Promise<void> {
  let cards: Card[];

  if (rawIds.length === 0) {
    cards = await app.cards.listCards();
  } else {
    cards = [];
    for (const raw of rawIds) {
      const id = parseCardId(raw);
      const card = id === null ? null : await app.cards.getCard(id);
      if (!card) {
        console.error(`❌ Unknown card: ${raw}`);
        process.exitCode = 1;
        continue;
      }
      cards.push(card);
    }
  }

  logger.info({ count: cards.length }, 'Processing generate command');

  const summary = await app.speaker.warmCache(cards);
  console.log(`✓ Generated ${summary.generated}, already cached ${summary.skipped}, failed ${summary.failed}`);
  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}
