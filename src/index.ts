#!/usr/bin/env node

import 'dotenv/config';
import process from 'node:process';
import { Command } from 'commander';
import { CardSpeechApp } from './app.js';
import { cacheClearCommand, cacheSizeCommand } from './commands/cache.js';
import { cardAddCommand, cardDeleteCommand, cardListCommand, cardSetTextCommand } from './commands/card.js';
import { generateCommand } from './commands/generate.js';
import { playCommand } from './commands/play.js';
import { sayCommand } from './commands/say.js';
import { logger } from './util/logger.js';
import { exitCodeForSignal, packageVersion } from './util/settings.js';

let app: CardSpeechApp | null = null;

function getApp(): CardSpeechApp {
  if (!app) {
    app = CardSpeechApp.fromEnv();
  }
  return app;
}

/**
 * Setup global error handlers
 */
function setupErrorHandlers(): void {
  process.on('unhandledRejection', (reason, promise) => {
    logger.error({ reason, promise }, 'Unhandled Promise Rejection');
  });

  process.on('uncaughtException', (error, origin) => {
    logger.fatal({ error, origin }, 'Uncaught Exception');

    if (app) {
      app
        .shutdown()
        .catch((err: unknown) => logger.error({ err }, 'Error during emergency shutdown'))
        .finally(() => process.exit(1));
    } else {
      process.exit(1);
    }
  });

  // Ctrl+C during playback stops the player process too
  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal');

    if (app) {
      try {
        await app.shutdown();
        process.exit(exitCodeForSignal(signal));
      } catch (err) {
        logger.error({ err }, 'Error during graceful shutdown');
        process.exit(1);
      }
    } else {
      process.exit(exitCodeForSignal(signal));
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

function buildProgram(): Command {
  const program = new Command()
    .name('card-speech')
    .description('Speak communication cards aloud, caching synthesized audio on disk')
    .version(packageVersion());

  program
    .command('play')
    .description('Speak a card (cached audio when available)')
    .argument('<cardId>', 'card id')
    .action(async (cardId: string) => {
      await playCommand(getApp(), cardId);
    });

  program
    .command('say')
    .description('Speak text without caching it (voice preview)')
    .argument('<text>', 'text to speak')
    .option('-v, --voice <voice>', 'voice id')
    .option('-r, --rate <rate>', 'speech rate multiplier (0.5-2.0)')
    .option('-p, --pitch <pitch>', 'pitch multiplier (0.5-2.0)')
    .action(async (text: string, opts: { voice?: string; rate?: string; pitch?: string }) => {
      await sayCommand(getApp(), text, opts);
    });

  program
    .command('generate')
    .description('Pre-generate audio for cards missing it (all cards when none given)')
    .argument('[cardIds...]', 'card ids')
    .action(async (cardIds: string[]) => {
      await generateCommand(getApp(), cardIds);
    });

  program
    .command('card:list')
    .description('List cards')
    .action(async () => {
      await cardListCommand(getApp());
    });

  program
    .command('card:add')
    .description('Create a card and pre-generate its audio')
    .argument('<label>', 'label shown on the card')
    .argument('[text]', 'text to speak (defaults to the label)')
    .option('-v, --voice <voice>', 'voice id')
    .action(async (label: string, text: string | undefined, opts: { voice?: string }) => {
      await cardAddCommand(getApp(), label, text, opts);
    });

  program
    .command('card:set-text')
    .description("Change a card's speech text and regenerate its audio")
    .argument('<cardId>', 'card id')
    .argument('<text>', 'new text to speak')
    .action(async (cardId: string, text: string) => {
      await cardSetTextCommand(getApp(), cardId, text);
    });

  program
    .command('card:delete')
    .description('Delete a card and its cached audio')
    .argument('<cardId>', 'card id')
    .action(async (cardId: string) => {
      await cardDeleteCommand(getApp(), cardId);
    });

  program
    .command('cache:size')
    .description('Show the size of the audio cache')
    .action(async () => {
      await cacheSizeCommand(getApp());
    });

  program
    .command('cache:clear')
    .description('Delete all cached audio')
    .action(async () => {
      await cacheClearCommand(getApp());
    });

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  setupErrorHandlers();
  logger.debug({ node: process.version, platform: process.platform }, 'Starting');

  try {
    await buildProgram().parseAsync(process.argv);
  } finally {
    await app?.shutdown();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Fatal error in main()');
  process.exit(1);
});
