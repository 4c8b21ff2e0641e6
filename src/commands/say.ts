import process from 'node:process';
import type { CardSpeechApp } from '../app.js';
import { createChildLogger } from '../util/logger.js';
import { describeResult } from './play.js';

const logger = createChildLogger('SayCommand');

export interface SayOptions {
  voice?: string;
  rate?: string;
  pitch?: string;
}

function parseMultiplier(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Speak free text without touching the cache (voice preview).
 */
export async function sayCommand(app: CardSpeechApp, text: string, options: SayOptions = {}): Promise<void> {
  logger.info({ chars: text.length, voice: options.voice }, 'Processing say command');

  const result = await app.speaker.speakText(text, {
    voice: options.voice,
    speechRate: parseMultiplier(options.rate),
    pitch: parseMultiplier(options.pitch),
  });

  console.log(describeResult(result));
  if (result.outcome === 'no-audio') {
    process.exitCode = 1;
  }
}
