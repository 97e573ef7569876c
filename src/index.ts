/**
 * Speech Admin Server
 *
 * Main entry point: wires configuration, storage, TTS providers and the
 * admin API together and starts listening.
 */

import path from 'path';
import { createApp } from './app';
import { CONVERSIONS_CSV_FILE } from './config/constants';
import { env, publicBaseUrl } from './config/env';
import { createProviderRegistry } from './providers/ProviderFactory';
import { CsvConversionRepository } from './repositories/CsvConversionRepository';
import { ConversionService } from './services/ConversionService';
import { SynthesisService } from './services/SynthesisService';
import { logger } from './utils/logger';

const providerRegistry = createProviderRegistry(env);

const repository = new CsvConversionRepository({
  filePath: path.join(env.DATA_DIR, CONVERSIONS_CSV_FILE),
  lockTimeoutMs: env.CSV_LOCK_TIMEOUT
});

const synthesis = new SynthesisService({
  registry: providerRegistry,
  providerName: env.TTS_PROVIDER,
  mediaRoot: env.MEDIA_ROOT,
  voiceDir: env.VOICE_DIR,
  speed: env.TTS_SPEED
});

const conversionService = new ConversionService({
  repository,
  synthesis,
  defaultLanguage: env.DEFAULT_LANGUAGE,
  textMaxLength: env.TEXT_MAX_LENGTH
});

const app = createApp(
  { conversionService, providerRegistry, defaultProvider: env.TTS_PROVIDER },
  {
    mediaRoot: env.MEDIA_ROOT,
    publicBaseUrl,
    adminApiKey: env.ADMIN_API_KEY,
    enableCors: env.ENABLE_CORS
  }
);

const server = app.listen(env.PORT, () => {
  logger.info(
    {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      provider: env.TTS_PROVIDER,
      mediaRoot: path.resolve(env.MEDIA_ROOT),
      dataDir: path.resolve(env.DATA_DIR),
      auth: env.ADMIN_API_KEY ? 'api-key' : 'none'
    },
    'Speech admin server listening'
  );
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  server.close((error) => {
    if (error) {
      logger.error({ err: error }, 'Error while closing server');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
