import type { CardSpeechApp } from '../app.js';
import { createChildLogger } from '../util/logger.js';

const logger = createChildLogger('CacheCommand');

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export async function cacheSizeCommand(app: CardSpeechApp): Promise<void> {
  const bytes = await app.cache.size();
  console.log(`Audio cache: ${formatBytes(bytes)} in ${app.cache.dir}`);
}

/**
 * Empty the cache and clear every card's audio reference.
 */
export async function cacheClearCommand(app: CardSpeechApp): Promise<void> {
  logger.info('Processing cache:clear command');
  await app.cache.clear();

  const cards = await app.cards.listCards();
  for (const card of cards) {
    if (card.audioPath) {
      await app.cards.updateAudioReference(card.id, null);
    }
  }
  console.log('🗑️ Audio cache cleared');
}
