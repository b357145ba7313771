import { logger as rootLogger, type Logger } from '@infra/logging/logger';
import { DuplicateTransactionError, describeError } from '@lib/errors';
import type {
  CreateLedgerTransactionInput,
  LedgerTransaction,
  TransactionStore
} from '@app-types/transaction';
import { createLedgerTransaction, isTerminalState } from '@services/transactionState';

/**
 * Owns the in-memory view of transactions.
 *
 * - `known` caches records by id (write-through to the store) until they reach
 *   a terminal state.
 * - `pending` fences ids with a phase request in flight.
 * - `loading` shares an in-flight store read between concurrent lookups.
 * - `unsynced` tracks records whose last write to the store failed; they stay
 *   in `known` until a later write succeeds.
 *
 * Every check-then-mutate on these maps runs without an `await` in between, so
 * each one is exclusive on the event loop. Store and callback calls always
 * happen outside those sections.
 */
export class TransactionRegistry {
  private readonly known = new Map<string, LedgerTransaction>();
  private readonly pending = new Map<string, LedgerTransaction>();
  private readonly unsynced = new Set<string>();
  private readonly loading = new Map<string, Promise<LedgerTransaction | null>>();

  constructor(
    private readonly store: TransactionStore,
    private readonly logger: Logger = rootLogger
  ) {}

  async get(transactionId: string): Promise<LedgerTransaction | null> {
    const cached = this.known.get(transactionId);
    if (cached) {
      return cached;
    }

    // Concurrent lookups share one store read, so none of them can cache a
    // row that another request has already advanced and evicted.
    const inFlight = this.loading.get(transactionId);
    if (inFlight) {
      return inFlight;
    }

    const load = this.load(transactionId);
    this.loading.set(transactionId, load);

    try {
      return await load;
    } finally {
      this.loading.delete(transactionId);
    }
  }

  private async load(transactionId: string): Promise<LedgerTransaction | null> {
    this.logger.debug({ transactionId }, 'Looking up transaction in store');
    const rows = await this.store.findByField('transactionId', transactionId);

    if (rows.length > 1) {
      throw new DuplicateTransactionError(transactionId, rows.length);
    }

    const [row] = rows;
    if (!row) {
      this.logger.debug({ transactionId }, 'No stored transaction matches id');
      return null;
    }

    // A create may have cached this id while the store was being queried.
    const raced = this.known.get(transactionId);
    if (raced) {
      return raced;
    }

    this.known.set(transactionId, row);
    return row;
  }

  /**
   * Builds, caches and inserts a new transaction. Returns `null` when the id is
   * already taken, here or in the store, in which case nothing is written.
   */
  async create(
    input: CreateLedgerTransactionInput,
    now: Date = new Date()
  ): Promise<LedgerTransaction | null> {
    const { transactionId } = input;

    if (await this.get(transactionId)) {
      this.logger.warn({ transactionId }, 'Refusing to create duplicate transaction');
      return null;
    }

    if (this.known.has(transactionId)) {
      this.logger.warn({ transactionId }, 'Transaction created concurrently, refusing duplicate');
      return null;
    }

    const record = createLedgerTransaction(input, now);
    this.known.set(transactionId, record);

    let inserted: boolean;
    try {
      inserted = await this.store.insert(record);
    } catch (error) {
      this.known.delete(transactionId);
      throw error;
    }

    if (!inserted) {
      this.known.delete(transactionId);
      this.logger.warn({ transactionId }, 'Transaction already stored by another writer');
      return null;
    }

    this.logger.info(
      { transactionId, payerId: record.payerId, payeeId: record.payeeId, amount: record.amount },
      'Transaction created'
    );
    return record;
  }

  /** Claims the processing fence for a record; false when already claimed. */
  claim(record: LedgerTransaction): boolean {
    if (this.pending.has(record.transactionId)) {
      return false;
    }

    this.pending.set(record.transactionId, record);
    return true;
  }

  release(transactionId: string): void {
    this.pending.delete(transactionId);
  }

  /**
   * Drops a record from the in-memory cache. The store keeps it. Records with
   * an outstanding failed write are kept so later requests see their true
   * state rather than the stale stored row.
   */
  evict(transactionId: string): boolean {
    if (this.unsynced.has(transactionId)) {
      this.logger.warn({ transactionId }, 'Keeping unsynced transaction resident');
      return false;
    }

    return this.known.delete(transactionId);
  }

  /**
   * Writes the record through to the store. A failure is logged and the record
   * marked unsynced rather than thrown: the asset callback has already acted
   * and cannot be rolled back from here.
   */
  async persist(record: LedgerTransaction): Promise<boolean> {
    try {
      await this.store.store(record);
      this.unsynced.delete(record.transactionId);
      return true;
    } catch (error) {
      this.unsynced.add(record.transactionId);
      this.logger.error(
        { transactionId: record.transactionId, state: record.state, error: describeError(error) },
        'Failed to persist transaction; keeping in-memory state'
      );
      return false;
    }
  }

  /** Retries every failed write. Returns how many records are now persisted. */
  async flushUnsynced(): Promise<number> {
    let flushed = 0;

    for (const transactionId of [...this.unsynced]) {
      const record = this.known.get(transactionId);
      if (!record) {
        this.unsynced.delete(transactionId);
        continue;
      }

      if (await this.persist(record)) {
        flushed += 1;
        if (isTerminalState(record.state) && !this.pending.has(transactionId)) {
          this.evict(transactionId);
        }
      }
    }

    return flushed;
  }

  isResident(transactionId: string): boolean {
    return this.known.has(transactionId);
  }

  isPending(transactionId: string): boolean {
    return this.pending.has(transactionId);
  }

  isUnsynced(transactionId: string): boolean {
    return this.unsynced.has(transactionId);
  }

  get unsyncedCount(): number {
    return this.unsynced.size;
  }
}
