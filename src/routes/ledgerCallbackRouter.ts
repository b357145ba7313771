import { Router } from 'express';

import { createLedgerCallbackController } from '@controllers/ledgerCallbackController';
import { asyncHandler } from '@lib/asyncHandler';
import { TRANSACTION_CALLBACK_PATH } from '@services/callbackUris';
import type { TransactionService } from '@services/transactionService';

/**
 * Phase callbacks from the remote ledger.
 *
 * No admin authentication: the ledger only knows the URIs handed to it at
 * submission time. GET is accepted for ledgers that call back with it.
 */
export const createLedgerCallbackRouter = (transactionService: TransactionService): Router => {
  const controller = createLedgerCallbackController(transactionService);
  const router = Router();

  router.post(TRANSACTION_CALLBACK_PATH, asyncHandler(controller.handlePhaseCallback));
  router.get(TRANSACTION_CALLBACK_PATH, asyncHandler(controller.handlePhaseCallback));

  return router;
};
