import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { AppConfig } from './config.js';
import routes from './routes/index.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';

export function createApp(appConfig: AppConfig): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: appConfig.frontendOrigin }));

  // Search areas are a few hundred vertices at most
  app.use(express.json({ limit: '1mb' }));

  app.use(routes);
  app.use(notFoundHandler);

  // Error handling (must be last)
  app.use(errorHandler);

  return app;
}
