import { DashScopeProvider } from './DashScopeProvider.js';
import { GoogleCloudProvider } from './GoogleCloudProvider.js';
import { MiniMaxProvider } from './MiniMaxProvider.js';
import type { ProviderKind, TtsConfig, TtsProvider } from './TtsProvider.js';

/**
 * Build the provider for one backend tag. Callers only see TtsProvider.
 */
export function createProvider(kind: ProviderKind, config: TtsConfig): TtsProvider {
  switch (kind) {
    case 'dashscope':
      return new DashScopeProvider(config.dashscope);
    case 'google':
      return new GoogleCloudProvider(config.google);
    case 'minimax':
      return new MiniMaxProvider(config.minimax);
  }
}

export interface ProviderSet {
  primary: TtsProvider;
  /** Used for the direct speak-now fallback; the primary is reused when absent */
  fallback: TtsProvider | null;
}

export function createProviders(config: TtsConfig): ProviderSet {
  const primary = createProvider(config.provider, config);
  const fallback =
    config.fallbackProvider && config.fallbackProvider !== config.provider
      ? createProvider(config.fallbackProvider, config)
      : null;
  return { primary, fallback };
}
