import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import { config } from './config';
import { errorHandler, requestLogger } from './middleware/index';
import { apiRouter } from './routes/index';
import type { PlannerContext } from './context';

export interface AppOptions {
  logRequests?: boolean;
}

export function createApp(ctx: PlannerContext, options: AppOptions = {}): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.use(API_PREFIX, apiRouter(ctx));

  app.use(errorHandler);

  return app;
}
