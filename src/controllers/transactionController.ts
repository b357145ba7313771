import { Request, Response } from 'express';
import { z } from 'zod';

import type { TransactionService } from '@services/transactionService';

/**
 * Transaction Controller - admin endpoints
 *
 * Endpoints:
 * 1. POST /transactions - Register a transaction before submitting it to the ledger
 * 2. GET /transactions/:id - Inspect a transaction
 * 3. POST /transactions/:id/ledger-response - Record the ledger's answer to a submission
 */

export const createTransactionSchema = z
  .object({
    transactionId: z.string().trim().min(1).max(128),
    payerId: z.string().min(1),
    payerName: z.string().max(255),
    payeeId: z.string().min(1),
    payeeName: z.string().max(255),
    amount: z.number().int().positive(),
    transactionType: z.number().int(),
    transactionTypeLabel: z.string(),
    isSubscriptionDebit: z.boolean().default(false),
    subscriptionId: z.string().min(1).nullable().default(null),
    assetId: z.string().min(1),
    assetName: z.string(),
    assetDescription: z.string().default(''),
    categoryId: z.string(),
    localId: z.number().int().nonnegative().nullable().default(null),
    saleType: z.number().int()
  })
  .superRefine((value, ctx) => {
    if (value.isSubscriptionDebit && !value.subscriptionId) {
      ctx.addIssue({
        code: 'custom',
        path: ['subscriptionId'],
        message: 'subscriptionId is required for subscription debits'
      });
    }
  });

export const transactionParamsSchema = z.object({
  id: z.string().trim().min(1)
});

export const ledgerResponseSchema = z.object({
  submitted: z.boolean(),
  responseReceived: z.boolean(),
  responseSuccess: z.boolean(),
  responseStatus: z.string().default(''),
  responseReason: z.string().default(''),
  payerEndingBalance: z.number().int().optional()
});

export const createTransactionController = (transactionService: TransactionService) => ({
  /**
   * POST /api/v1/transactions
   *
   * Responds 201 with the stored transaction and the three callback URIs to
   * hand to the ledger, or 409 when the id is already taken.
   */
  createTransaction: async (req: Request, res: Response) => {
    const input = createTransactionSchema.parse(req.body);
    const created = await transactionService.createTransaction(input);

    res.status(201).json(created);
  },

  getTransaction: async (req: Request, res: Response) => {
    const { id } = transactionParamsSchema.parse(req.params);
    const transaction = await transactionService.getTransaction(id);

    res.json({
      transaction,
      callbacks: transactionService.callbackUrisFor(transaction.transactionId)
    });
  },

  recordLedgerResponse: async (req: Request, res: Response) => {
    const { id } = transactionParamsSchema.parse(req.params);
    const update = ledgerResponseSchema.parse(req.body);
    const transaction = await transactionService.recordLedgerResponse(id, update);

    res.json({ transaction });
  }
});
