/**
 * Provider Registry
 *
 * Central registry for the TTS providers.
 * Allows runtime selection of a provider by name.
 */

import type { ITTSProvider } from './tts/ITTSProvider';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ProviderRegistry' });

export class ProviderNotFoundError extends Error {
  constructor(name: string, available: string[]) {
    super(
      `TTS provider '${name}' not found. Available providers: ${available.length > 0 ? available.join(', ') : 'none'}`
    );
    this.name = 'ProviderNotFoundError';
  }
}

export class ProviderRegistry {
  private ttsProviders = new Map<string, ITTSProvider>();

  /**
   * Register a TTS provider
   */
  registerTTS(name: string, provider: ITTSProvider): void {
    this.ttsProviders.set(name, provider);
    logger.debug({ provider: name }, 'Registered TTS provider');
  }

  /**
   * Get a TTS provider by name
   * @throws ProviderNotFoundError if provider not registered
   */
  getTTS(name: string): ITTSProvider {
    const provider = this.ttsProviders.get(name);
    if (!provider) {
      throw new ProviderNotFoundError(name, this.getAvailableTTSProviders());
    }
    return provider;
  }

  hasTTS(name: string): boolean {
    return this.ttsProviders.has(name);
  }

  getAvailableTTSProviders(): string[] {
    return Array.from(this.ttsProviders.keys());
  }
}
