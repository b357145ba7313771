import { logger as rootLogger, type Logger } from '@infra/logging/logger';
import { describeError } from '@lib/errors';
import type {
  AssetCallback,
  AssetCallbackResult,
  LedgerTransaction,
  PhaseResult,
  TransactionPhase
} from '@app-types/transaction';
import type { TransactionRegistry } from '@services/transactionRegistry';
import { applyTransition, decidePhase, isTransactionPhase } from '@services/transactionState';

// DO NOT CHANGE: the remote ledger matches on this text to know it should retry.
export const PENDING_MESSAGE = 'pending';
export const NOT_FOUND_MESSAGE = 'no matching transaction found';
export const UNRECOGNIZED_PHASE_MESSAGE = 'Unrecognized state request';

const outcome = (success: boolean, message: string, retryable = false): PhaseResult => ({
  success,
  message,
  retryable
});

const runAssetCallback = (
  callback: AssetCallback,
  phase: TransactionPhase,
  transaction: LedgerTransaction
): Promise<AssetCallbackResult> => {
  switch (phase) {
    case 'enact':
      return callback.enactHold(transaction);
    case 'consume':
      return callback.consumeHold(transaction);
    case 'cancel':
      return callback.cancelHold(transaction);
  }
};

/**
 * Applies ledger phase callbacks (enact, consume, cancel) to transactions held
 * in a registry. Outcomes are returned, never thrown; the one exception is a
 * corrupt store holding several rows for an id.
 */
export class TransactionProcessor {
  constructor(
    private readonly registry: TransactionRegistry,
    private readonly logger: Logger = rootLogger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async processPhaseRequest(
    transactionId: string,
    phaseName: string,
    assetCallback: AssetCallback
  ): Promise<PhaseResult> {
    const transaction = await this.registry.get(transactionId);
    if (!transaction) {
      this.logger.info({ transactionId, phase: phaseName }, 'Phase request for unknown transaction');
      return outcome(false, NOT_FOUND_MESSAGE);
    }

    if (!this.registry.claim(transaction)) {
      this.logger.info(
        { transactionId, phase: phaseName },
        'Phase request already in flight for transaction'
      );
      return outcome(false, PENDING_MESSAGE, true);
    }

    try {
      if (!isTransactionPhase(phaseName)) {
        this.logger.warn({ transactionId, phase: phaseName }, 'Unrecognized phase request');
        return outcome(false, UNRECOGNIZED_PHASE_MESSAGE);
      }

      const result = await this.runPhase(transaction, phaseName, assetCallback);

      if (result.success && (phaseName === 'consume' || phaseName === 'cancel')) {
        this.registry.evict(transactionId);
      }

      return result;
    } finally {
      this.registry.release(transactionId);
    }
  }

  private async runPhase(
    transaction: LedgerTransaction,
    phase: TransactionPhase,
    assetCallback: AssetCallback
  ): Promise<PhaseResult> {
    const { transactionId } = transaction;
    const decision = decidePhase(transaction.state, phase);

    if (decision.kind === 'settled') {
      this.logger.info(
        { transactionId, phase, state: transaction.state, success: decision.success },
        decision.message
      );
      return outcome(decision.success, decision.message);
    }

    let callbackResult: AssetCallbackResult;
    try {
      callbackResult = await runAssetCallback(assetCallback, phase, transaction);
    } catch (error) {
      this.logger.error(
        { transactionId, phase, error: describeError(error) },
        'Asset callback threw during phase request'
      );
      return outcome(false, `asset callback error: ${describeError(error)}`);
    }

    if (!callbackResult.success) {
      this.logger.warn(
        { transactionId, phase, message: callbackResult.message },
        'Asset callback declined phase'
      );
      return outcome(false, callbackResult.message);
    }

    applyTransition(transaction, decision.next, this.clock());
    await this.registry.persist(transaction);

    this.logger.info(
      {
        transactionId,
        phase,
        state: transaction.state,
        payerId: transaction.payerId,
        payeeId: transaction.payeeId,
        amount: transaction.amount
      },
      'Transaction phase applied'
    );

    return outcome(true, callbackResult.message);
  }
}
