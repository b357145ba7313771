import { Router } from 'express';

import { healthRouter } from '@routes/healthRouter';
import { createTransactionRouter } from '@routes/transactionRouter';
import type { TransactionService } from '@services/transactionService';

export const createApiRouter = (transactionService: TransactionService): Router => {
  const apiRouter = Router();

  apiRouter.use(healthRouter);
  apiRouter.use('/transactions', createTransactionRouter(transactionService));

  return apiRouter;
};
