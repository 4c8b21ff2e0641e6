import process from 'node:process';
import type { CardSpeechApp } from '../app.js';
import type { SpeakResult } from '../tts/cardSpeaker.js';
import { createChildLogger } from '../util/logger.js';

const logger = createChildLogger('PlayCommand');

const SOURCE_LABELS = {
  cache: 'from cache',
  generated: 'freshly generated',
  memory: 'uncached',
  fallback: 'via fallback',
} as const;

export function describeResult(result: SpeakResult): string {
  if (result.outcome === 'no-audio') {
    return `🔇 No audio (${result.reason})`;
  }
  const stopped = result.playback === 'stopped' ? ', stopped' : '';
  return `🔊 Played ${SOURCE_LABELS[result.source]}${stopped}`;
}

export function parseCardId(raw: string): number | null {
  const id = Number(raw);
  return Number.isInteger(id) && id > 0 ? id : null;
}

export async function playCommand(app: CardSpeechApp, rawId: string): Promise<void> {
  const id = parseCardId(rawId);
  if (id === null) {
    console.error(`❌ Invalid card id: ${rawId}`);
    process.exitCode = 1;
    return;
  }

  logger.info({ cardId: id }, 'Processing play command');

  const result = await app.speaker.playCard(id);
  console.log(describeResult(result));
  if (result.outcome === 'no-audio') {
    process.exitCode = 1;
  }
}
