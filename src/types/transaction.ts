export type TransactionState = 'created' | 'enacted' | 'consumed' | 'canceled';

export type TransactionPhase = 'enact' | 'consume' | 'cancel';

export const TRANSACTION_PHASES: readonly TransactionPhase[] = ['enact', 'consume', 'cancel'];

export interface LedgerTransaction {
  readonly transactionId: string;

  readonly payerId: string;
  readonly payerName: string;
  readonly payeeId: string;
  readonly payeeName: string;
  readonly amount: number;

  readonly transactionType: number;
  readonly transactionTypeLabel: string;

  readonly isSubscriptionDebit: boolean;
  readonly subscriptionId: string | null;

  // Asset context handed to the asset callback
  readonly assetId: string;
  readonly assetName: string;
  readonly assetDescription: string;
  readonly categoryId: string;
  readonly localId: number | null;
  readonly saleType: number;

  state: TransactionState;

  // Ledger submission bookkeeping
  submitted: boolean;
  responseReceived: boolean;
  responseSuccess: boolean;
  responseStatus: string;
  responseReason: string;
  payerEndingBalance: number;

  readonly createdAt: Date;
  enactedAt: Date | null;
  finishedAt: Date | null;
}

export interface CreateLedgerTransactionInput {
  transactionId: string;
  payerId: string;
  payerName: string;
  payeeId: string;
  payeeName: string;
  amount: number;
  transactionType: number;
  transactionTypeLabel: string;
  isSubscriptionDebit: boolean;
  subscriptionId: string | null;
  assetId: string;
  assetName: string;
  assetDescription: string;
  categoryId: string;
  localId: number | null;
  saleType: number;
}

export interface LedgerResponseUpdate {
  submitted: boolean;
  responseReceived: boolean;
  responseSuccess: boolean;
  responseStatus: string;
  responseReason: string;
  payerEndingBalance?: number;
}

export type TransactionLookupField = 'transactionId' | 'payerId' | 'payeeId' | 'subscriptionId';

/**
 * Durable record of every transaction. Rows are upserted by transaction id and
 * never deleted.
 */
export interface TransactionStore {
  /** Writes a new record; false when the id is already stored. */
  insert(record: LedgerTransaction): Promise<boolean>;
  store(record: LedgerTransaction): Promise<void>;
  findByField(field: TransactionLookupField, value: string): Promise<LedgerTransaction[]>;
  /** Records still in `created` or `enacted` that were created before the cutoff. */
  listUnfinished(createdBefore: Date): Promise<LedgerTransaction[]>;
}

export interface AssetCallbackResult {
  success: boolean;
  message: string;
}

/**
 * Whatever actually holds, delivers or returns the asset. Each operation runs at
 * most once per record and phase when it succeeds; its result is taken as the
 * outcome of the phase.
 */
export interface AssetCallback {
  enactHold(transaction: Readonly<LedgerTransaction>): Promise<AssetCallbackResult>;
  consumeHold(transaction: Readonly<LedgerTransaction>): Promise<AssetCallbackResult>;
  cancelHold(transaction: Readonly<LedgerTransaction>): Promise<AssetCallbackResult>;
}

export interface PhaseResult {
  success: boolean;
  message: string;
  /** True only when another phase for the same transaction was in flight. */
  retryable: boolean;
}

export interface TransactionCallbackUris {
  enact: string;
  consume: string;
  cancel: string;
}
