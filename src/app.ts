import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { AppConfig } from './config';
import { createShoeRoutes } from './routes/shoes';
import { createVariationRoutes } from './routes/variations';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';
import { requireApiKey } from './middleware/requireApiKey';
import type { ShoeService } from './services/shoe';
import type { Logger } from './types/logger';

export interface AppDependencies {
  config: AppConfig;
  shoeService: ShoeService;
  logger?: Logger;
}

export function createApp({ config, shoeService, logger = console }: AppDependencies) {
  const app = express();
  const requireAuth = requireApiKey(config.apiKey);

  // Middleware
  app.use(helmet());
  app.use(cors());
  if (config.nodeEnv !== 'test') {
    app.use(morgan('combined'));
  }
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Routes
  app.use('/api/shoes', createShoeRoutes(shoeService, requireAuth));
  app.use('/api/variations', createVariationRoutes(shoeService, requireAuth));

  // Health check
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      services: {
        storage: config.storage.backend,
        auth: config.apiKey ? 'configured' : 'not configured',
      }
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}
