import { logger as rootLogger, type Logger } from '@infra/logging/logger';
import { ApplicationError } from '@lib/errors';
import type {
  AssetCallback,
  CreateLedgerTransactionInput,
  LedgerResponseUpdate,
  LedgerTransaction,
  PhaseResult,
  TransactionCallbackUris
} from '@app-types/transaction';
import { buildCallbackUris } from '@services/callbackUris';
import type { TransactionProcessor } from '@services/transactionProcessor';
import type { TransactionRegistry } from '@services/transactionRegistry';
import { isTerminalState } from '@services/transactionState';

export interface TransactionServiceDependencies {
  registry: TransactionRegistry;
  processor: TransactionProcessor;
  assetCallback: AssetCallback;
  callbackBaseUrl: string;
  logger?: Logger;
}

export interface CreatedTransaction {
  transaction: LedgerTransaction;
  callbacks: TransactionCallbackUris;
}

/**
 * Entry point for the HTTP layer: creates transactions, hands ledger callbacks
 * to the processor with the configured asset callback, and records ledger
 * submission responses.
 */
export class TransactionService {
  private readonly registry: TransactionRegistry;
  private readonly processor: TransactionProcessor;
  private readonly assetCallback: AssetCallback;
  private readonly callbackBaseUrl: string;
  private readonly logger: Logger;

  constructor(deps: TransactionServiceDependencies) {
    this.registry = deps.registry;
    this.processor = deps.processor;
    this.assetCallback = deps.assetCallback;
    this.callbackBaseUrl = deps.callbackBaseUrl;
    this.logger = deps.logger ?? rootLogger;
  }

  async createTransaction(input: CreateLedgerTransactionInput): Promise<CreatedTransaction> {
    const transaction = await this.registry.create(input);

    if (!transaction) {
      throw new ApplicationError('Transaction already exists', {
        statusCode: 409,
        code: 'transaction_exists',
        details: { transactionId: input.transactionId }
      });
    }

    return {
      transaction,
      callbacks: this.callbackUrisFor(transaction.transactionId)
    };
  }

  async getTransaction(transactionId: string): Promise<LedgerTransaction> {
    const transaction = await this.registry.get(transactionId);

    if (!transaction) {
      throw new ApplicationError('Transaction not found', {
        statusCode: 404,
        code: 'transaction_not_found',
        details: { transactionId }
      });
    }

    return transaction;
  }

  callbackUrisFor(transactionId: string): TransactionCallbackUris {
    return buildCallbackUris(this.callbackBaseUrl, transactionId);
  }

  handlePhaseCallback(transactionId: string, phase: string): Promise<PhaseResult> {
    return this.processor.processPhaseRequest(transactionId, phase, this.assetCallback);
  }

  async recordLedgerResponse(
    transactionId: string,
    update: LedgerResponseUpdate
  ): Promise<LedgerTransaction> {
    const transaction = await this.getTransaction(transactionId);

    transaction.submitted = update.submitted;
    transaction.responseReceived = update.responseReceived;
    transaction.responseSuccess = update.responseSuccess;
    transaction.responseStatus = update.responseStatus;
    transaction.responseReason = update.responseReason;
    if (update.payerEndingBalance !== undefined) {
      transaction.payerEndingBalance = update.payerEndingBalance;
    }

    await this.registry.persist(transaction);

    // Terminal records were loaded back from the store for this update only.
    if (isTerminalState(transaction.state) && !this.registry.isPending(transactionId)) {
      this.registry.evict(transactionId);
    }

    this.logger.info(
      {
        transactionId,
        responseSuccess: transaction.responseSuccess,
        responseStatus: transaction.responseStatus
      },
      'Recorded ledger response'
    );

    return transaction;
  }
}
