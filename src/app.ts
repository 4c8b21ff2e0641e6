import process from 'node:process';
import { AudioCache } from './audio/audioCache.js';
import { AudioPlayer } from './audio/audioPlayer.js';
import { CardEditor } from './cards/cardEditor.js';
import { JsonCardRepository, type CardRepository } from './cards/cardRepository.js';
import { CardSpeaker } from './tts/cardSpeaker.js';
import { createProviders } from './tts/providers/factory.js';
import { getTtsConfig, type TtsConfig } from './tts/providers/TtsProvider.js';
import { createChildLogger } from './util/logger.js';
import { getAppSettings, type AppSettings } from './util/settings.js';

const logger = createChildLogger('App');

/**
 * Wires the card store, audio cache, player and speaker together.
 */
export class CardSpeechApp {
  readonly cards: CardRepository;
  readonly cache: AudioCache;
  readonly player: AudioPlayer;
  readonly speaker: CardSpeaker;
  readonly editor: CardEditor;
  private closed = false;

  constructor(
    readonly settings: AppSettings,
    readonly ttsConfig: TtsConfig
  ) {
    this.cards = new JsonCardRepository(settings.cardsPath);
    this.cache = new AudioCache(settings.audioCacheDir);
    this.player = new AudioPlayer({ command: settings.playerCommand });
    this.speaker = new CardSpeaker({
      cards: this.cards,
      cache: this.cache,
      player: this.player,
      providers: createProviders(ttsConfig),
    });
    this.editor = new CardEditor(this.cards, this.speaker);

    logger.info(
      {
        provider: ttsConfig.provider,
        fallback: ttsConfig.fallbackProvider ?? null,
        configured: this.speaker.isConfigured(),
        cacheDir: settings.audioCacheDir,
        cardsPath: settings.cardsPath,
      },
      'Card speech initialized'
    );
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): CardSpeechApp {
    return new CardSpeechApp(getAppSettings(env), getTtsConfig(env));
  }

  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    logger.info('Shutting down');
    await this.speaker.close();
  }
}
