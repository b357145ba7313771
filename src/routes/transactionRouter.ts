import { Router } from 'express';

import { createTransactionController } from '@controllers/transactionController';
import { asyncHandler } from '@lib/asyncHandler';
import { adminAuthMiddleware } from '@middlewares/adminAuth';
import type { TransactionService } from '@services/transactionService';

export const createTransactionRouter = (transactionService: TransactionService): Router => {
  const controller = createTransactionController(transactionService);
  const router = Router();

  router.use(adminAuthMiddleware('admin'));

  // Register a transaction ahead of ledger submission
  router.post('/', asyncHandler(controller.createTransaction));

  // Record the ledger's response to a submission
  router.post('/:id/ledger-response', asyncHandler(controller.recordLedgerResponse));

  // Get transaction by ID
  router.get('/:id', asyncHandler(controller.getTransaction));

  return router;
};
