import process from 'node:process';
import type { CardSpeechApp } from '../app.js';
import type { CardEditResult } from '../cards/cardEditor.js';
import { createChildLogger } from '../util/logger.js';
import { parseCardId } from './play.js';

const logger = createChildLogger('CardCommand');

function describeEdit({ card, audio }: CardEditResult): string {
  const audioNote = audio === 'cached' ? 'audio cached' : 'no audio yet';
  return `✓ Card ${card.id} "${card.label}" saved (${audioNote})`;
}

function requireCardId(raw: string): number | null {
  const id = parseCardId(raw);
  if (id === null) {
    console.error(`❌ Invalid card id: ${raw}`);
    process.exitCode = 1;
  }
  return id;
}

export async function cardListCommand(app: CardSpeechApp): Promise<void> {
  const cards = await app.cards.listCards();
  if (cards.length === 0) {
    console.log('No cards');
    return;
  }
  for (const card of cards) {
    const marker = card.audioPath ? '♪' : ' ';
    console.log(`${marker} ${card.id}\t${card.label}\t${card.speechText}`);
  }
}

export async function cardAddCommand(
  app: CardSpeechApp,
  label: string,
  text: string | undefined,
  options: { voice?: string } = {}
): Promise<void> {
  logger.info({ label }, 'Processing card:add command');
  const result = await app.editor.addCard({
    label,
    speechText: text ?? label,
    voiceId: options.voice,
  });
  console.log(describeEdit(result));
}

export async function cardSetTextCommand(app: CardSpeechApp, rawId: string, text: string): Promise<void> {
  const id = requireCardId(rawId);
  if (id === null) return;

  logger.info({ cardId: id }, 'Processing card:set-text command');
  const result = await app.editor.updateCard(id, { speechText: text });
  if (!result) {
    console.error(`❌ Unknown card: ${rawId}`);
    process.exitCode = 1;
    return;
  }
  console.log(describeEdit(result));
}

export async function cardDeleteCommand(app: CardSpeechApp, rawId: string): Promise<void> {
  const id = requireCardId(rawId);
  if (id === null) return;

  logger.info({ cardId: id }, 'Processing card:delete command');
  if (await app.editor.deleteCard(id)) {
    console.log(`✓ Card ${id} deleted`);
  } else {
    console.error(`❌ Unknown card: ${rawId}`);
    process.exitCode = 1;
  }
}
