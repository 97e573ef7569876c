/**
 * Provider Factory
 *
 * Creates the TTS provider instances enabled by environment configuration.
 */

import type { Env } from '../config/env';
import { createLogger } from '../utils/logger';
import { ProviderNotFoundError, ProviderRegistry } from './ProviderRegistry';
import { CoquiTTSProvider } from './tts/CoquiTTSProvider';
import { GoogleTTSProvider } from './tts/GoogleTTSProvider';
import { OpenAITTSProvider } from './tts/OpenAITTSProvider';

const logger = createLogger({ service: 'ProviderFactory' });

export type ProviderConfig = Pick<
  Env,
  | 'TTS_PROVIDER'
  | 'TTS_TIMEOUT_MS'
  | 'TTS_VOICE'
  | 'OPENAI_API_KEY'
  | 'OPENAI_TTS_MODEL'
  | 'TTS_COQUI_ENABLED'
  | 'TTS_COQUI_URL'
  | 'TTS_COQUI_VOICE'
>;

/**
 * Create Provider Registry with all enabled providers
 * @throws ProviderNotFoundError if the configured default provider is not enabled
 */
export function createProviderRegistry(config: ProviderConfig): ProviderRegistry {
  const registry = new ProviderRegistry();

  registry.registerTTS('google', new GoogleTTSProvider({ timeoutMs: config.TTS_TIMEOUT_MS }));

  if (config.OPENAI_API_KEY) {
    registry.registerTTS(
      'openai',
      new OpenAITTSProvider({
        apiKey: config.OPENAI_API_KEY,
        model: config.OPENAI_TTS_MODEL,
        defaultVoice: config.TTS_VOICE,
        timeoutMs: config.TTS_TIMEOUT_MS
      })
    );
  }

  if (config.TTS_COQUI_ENABLED) {
    registry.registerTTS(
      'coqui',
      new CoquiTTSProvider(config.TTS_COQUI_URL, config.TTS_COQUI_VOICE, config.TTS_TIMEOUT_MS)
    );
  }

  const available = registry.getAvailableTTSProviders();
  if (!registry.hasTTS(config.TTS_PROVIDER)) {
    throw new ProviderNotFoundError(config.TTS_PROVIDER, available);
  }

  logger.info({ providers: available, default: config.TTS_PROVIDER }, 'TTS providers registered');
  return registry;
}
