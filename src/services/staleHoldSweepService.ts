import { logger as rootLogger, type Logger } from '@infra/logging/logger';
import type { TransactionState, TransactionStore } from '@app-types/transaction';
import type { TransactionRegistry } from '@services/transactionRegistry';

export interface StaleHold {
  transactionId: string;
  state: TransactionState;
  createdAt: Date;
  enactedAt: Date | null;
  ageMs: number;
}

export interface StaleHoldSweepResult {
  resynced: number;
  stillUnsynced: number;
  staleHolds: StaleHold[];
}

/**
 * Stale Hold Sweep
 *
 * Retries persistence writes that failed after an asset callback succeeded,
 * then reports holds the ledger has not called back about for longer than
 * the configured age. Stale holds are only reported; settling them is left to
 * reconciliation against the remote ledger.
 */
export class StaleHoldSweepService {
  constructor(
    private readonly registry: TransactionRegistry,
    private readonly store: TransactionStore,
    private readonly staleAfterMs: number,
    private readonly logger: Logger = rootLogger
  ) {}

  async performSweep(now: Date = new Date()): Promise<StaleHoldSweepResult> {
    const resynced = await this.registry.flushUnsynced();
    const cutoff = new Date(now.getTime() - this.staleAfterMs);
    const unfinished = await this.store.listUnfinished(cutoff);

    const staleHolds = unfinished.map<StaleHold>((transaction) => ({
      transactionId: transaction.transactionId,
      state: transaction.state,
      createdAt: transaction.createdAt,
      enactedAt: transaction.enactedAt,
      ageMs: now.getTime() - transaction.createdAt.getTime()
    }));

    if (staleHolds.length > 0) {
      this.logger.warn(
        { count: staleHolds.length, cutoff: cutoff.toISOString(), staleHolds },
        'Stale holds awaiting ledger callback'
      );
    }

    const result: StaleHoldSweepResult = {
      resynced,
      stillUnsynced: this.registry.unsyncedCount,
      staleHolds
    };

    this.logger.info(
      {
        resynced: result.resynced,
        stillUnsynced: result.stillUnsynced,
        staleHolds: staleHolds.length
      },
      'Stale hold sweep completed'
    );

    return result;
  }
}
