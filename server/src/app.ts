import path from 'path';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import pinoHttp from 'pino-http';
import type { Logger } from 'pino';
import type { Config } from './config';
import healthRoutes from './api/health/health.routes';
import { createTtsController } from './api/tts/tts.controller';
import { createTtsRoutes } from './api/tts/tts.routes';
import type { TtsService } from './api/tts/tts.service';
import { createErrorHandler } from './utils/errorHandler';

export type AppDeps = {
  config: Config;
  ttsService: TtsService;
  logger: Logger;
};

export const createApp = ({ config, ttsService, logger }: AppDeps) => {
  const app = express();

  app.set('trust proxy', config.trustProxy);

  app.use(
    helmet({
      contentSecurityPolicy: false,
      // Generated audio is played from other origins.
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    })
  );

  app.use(pinoHttp({ logger }));

  const corsOrigin: cors.CorsOptions['origin'] = (origin, cb) => {
    // Non-browser clients (curl, internal services) may omit Origin.
    if (!origin) return cb(null, true);

    if (config.cors.allowAnyOrigin) return cb(null, true);
    if (config.cors.allowedOrigins.includes(origin)) return cb(null, true);

    // Disallow cross-origin by omitting CORS headers.
    return cb(null, false);
  };

  app.use(
    cors({
      origin: corsOrigin,
      methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
      exposedHeaders: ['Content-Length'],
      maxAge: 86400,
    })
  );
  app.use(express.json({ limit: '1mb' }));

  if (config.audioStorage.disk === 'public') {
    app.use(
      '/storage',
      express.static(path.resolve(config.audioStorage.root), {
        index: false,
      })
    );
  }

  const ttsController = createTtsController({ ttsService, logger });

  app.use('/api/health', healthRoutes);
  app.use('/api', createTtsRoutes(ttsController, config.rateLimit));

  app.get('/', (_req, res) => {
    res.send('API is running...');
  });

  app.use((_req, res) => {
    res.status(404).json({ success: false, message: 'not found' });
  });

  app.use(createErrorHandler(logger));

  return app;
};
