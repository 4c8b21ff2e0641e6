import type { DashScopeConfig, GoogleCloudConfig, MiniMaxConfig, TtsConfig } from '../tts/providers/TtsProvider.js';

export function dashscopeConfig(overrides: Partial<DashScopeConfig> = {}): DashScopeConfig {
  return {
    apiKey: 'test-key',
    url: 'ws://127.0.0.1:1',
    model: 'cosyvoice-v3-flash',
    voice: 'longanyang',
    sampleRate: 22050,
    volume: 50,
    timeoutMs: 2000,
    ...overrides,
  };
}

export function googleConfig(overrides: Partial<GoogleCloudConfig> = {}): GoogleCloudConfig {
  return {
    projectId: 'test-project',
    voiceName: 'cmn-CN-Chirp3-HD-Aoede',
    languageCode: 'cmn-CN',
    sampleRate: 22050,
    timeoutMs: 2000,
    ...overrides,
  };
}

export function minimaxConfig(overrides: Partial<MiniMaxConfig> = {}): MiniMaxConfig {
  return {
    apiKey: 'test-key',
    voiceId: 'test-voice',
    model: 'speech-2.6-turbo',
    baseUrl: 'https://tts.test',
    timeoutMs: 2000,
    ...overrides,
  };
}

export function ttsConfig(overrides: Partial<TtsConfig> = {}): TtsConfig {
  return {
    provider: 'dashscope',
    timeoutMs: 2000,
    dashscope: dashscopeConfig(),
    google: googleConfig(),
    minimax: minimaxConfig(),
    ...overrides,
  };
}
