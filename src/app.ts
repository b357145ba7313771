import express, { Express } from 'express';

import { AppConfig } from '@config';
import { httpLogger } from '@infra/logging/logger';
import { apiRateLimiter } from '@middlewares/rateLimiter';
import { correlationIdMiddleware } from '@middlewares/correlationId';
import { errorHandler } from '@middlewares/errorHandler';
import { notFoundHandler } from '@middlewares/notFound';
import { createApiRouter } from '@routes/apiRouter';
import { createLedgerCallbackRouter } from '@routes/ledgerCallbackRouter';
import type { TransactionService } from '@services/transactionService';

export interface AppDependencies {
  transactionService: TransactionService;
}

export const createApp = ({ transactionService }: AppDependencies): Express => {
  const app = express();

  app.disable('x-powered-by');
  app.use(correlationIdMiddleware);
  app.use(httpLogger);
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.use(apiRateLimiter(AppConfig.rateLimit));

  app.use(createLedgerCallbackRouter(transactionService));
  app.use('/api/v1', createApiRouter(transactionService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
