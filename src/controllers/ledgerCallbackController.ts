import { Request, Response } from 'express';
import { z } from 'zod';

import type { PhaseResult } from '@app-types/transaction';
import type { TransactionService } from '@services/transactionService';

/**
 * Ledger Callback Controller
 *
 * The remote ledger drives every transaction through
 * `POST /ledger/transaction?id=<transactionId>&state=<enact|consume|cancel>`.
 * Handled outcomes, failures included, answer 200; the ledger reads `reason`
 * verbatim and retries only when `status` is `pending`.
 */

export const ledgerCallbackQuerySchema = z.object({
  id: z.string().trim().min(1),
  state: z.string().trim().min(1)
});

export type LedgerCallbackStatus = 'success' | 'pending' | 'failed';

export const callbackStatusOf = (result: PhaseResult): LedgerCallbackStatus => {
  if (result.success) {
    return 'success';
  }

  return result.retryable ? 'pending' : 'failed';
};

export const createLedgerCallbackController = (transactionService: TransactionService) => ({
  handlePhaseCallback: async (req: Request, res: Response) => {
    const { id, state } = ledgerCallbackQuerySchema.parse(req.query);
    const result = await transactionService.handlePhaseCallback(id, state);

    res.status(200).json({
      success: result.success,
      reason: result.message,
      status: callbackStatusOf(result)
    });
  }
});
