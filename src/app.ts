import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { MEDIA_URL_PREFIX } from './config/constants';
import { createConversionRouter } from './api/conversions.routes';
import { errorHandler } from './middleware/errorHandler';
import { requireApiKey } from './middleware/requireApiKey';
import type { ProviderRegistry } from './providers/ProviderRegistry';
import type { ConversionService } from './services/ConversionService';
import { logger } from './utils/logger';

export interface AppDependencies {
  conversionService: ConversionService;
  providerRegistry: ProviderRegistry;
  defaultProvider: string;
}

export interface AppOptions {
  mediaRoot: string;
  publicBaseUrl: string;
  adminApiKey?: string;
  enableCors?: boolean;
}

export function createApp(deps: AppDependencies, options: AppOptions): express.Express {
  const app = express();

  // Middleware
  app.disable('x-powered-by');
  app.use(helmet());
  if (options.enableCors ?? true) {
    app.use(cors());
  }
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(pinoHttp({
    logger,
    autoLogging: {
      ignore: (req) => req.url === '/health'
    }
  }));

  // Routes
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      providers: {
        tts: deps.providerRegistry.getAvailableTTSProviders(),
        default: deps.defaultProvider
      }
    });
  });

  // Stored audio, linked from each record's audio_url; same key as /api
  app.use(
    MEDIA_URL_PREFIX,
    requireApiKey(options.adminApiKey),
    express.static(options.mediaRoot, { fallthrough: true, index: false })
  );

  app.use(
    '/api',
    requireApiKey(options.adminApiKey),
    createConversionRouter(deps.conversionService, options.publicBaseUrl)
  );

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}
