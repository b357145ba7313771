import { getDatabasePool } from '@infra/database';
import type {
  LedgerTransaction,
  TransactionLookupField,
  TransactionState,
  TransactionStore
} from '@app-types/transaction';

interface LedgerTransactionRow {
  transaction_id: string;
  payer_id: string;
  payer_name: string;
  payee_id: string;
  payee_name: string;
  amount: number;
  transaction_type: number;
  transaction_type_label: string;
  is_subscription_debit: boolean;
  subscription_id: string | null;
  asset_id: string;
  asset_name: string;
  asset_description: string;
  category_id: string;
  // BIGINT comes back from pg as a string
  local_id: string | null;
  sale_type: number;
  state: string;
  submitted: boolean;
  response_received: boolean;
  response_success: boolean;
  response_status: string;
  response_reason: string;
  payer_ending_balance: number;
  created_at: Date;
  enacted_at: Date | null;
  finished_at: Date | null;
}

const lookupColumns: Record<TransactionLookupField, string> = {
  transactionId: 'transaction_id',
  payerId: 'payer_id',
  payeeId: 'payee_id',
  subscriptionId: 'subscription_id'
};

const parseState = (value: string): TransactionState => {
  switch (value) {
    case 'created':
    case 'enacted':
    case 'consumed':
    case 'canceled':
      return value;
    default:
      throw new Error(`Unknown transaction state in store: ${value}`);
  }
};

const mapRowToTransaction = (row: LedgerTransactionRow): LedgerTransaction => ({
  transactionId: row.transaction_id,
  payerId: row.payer_id,
  payerName: row.payer_name,
  payeeId: row.payee_id,
  payeeName: row.payee_name,
  amount: row.amount,
  transactionType: row.transaction_type,
  transactionTypeLabel: row.transaction_type_label,
  isSubscriptionDebit: row.is_subscription_debit,
  subscriptionId: row.subscription_id,
  assetId: row.asset_id,
  assetName: row.asset_name,
  assetDescription: row.asset_description,
  categoryId: row.category_id,
  localId: row.local_id === null ? null : Number(row.local_id),
  saleType: row.sale_type,
  state: parseState(row.state),
  submitted: row.submitted,
  responseReceived: row.response_received,
  responseSuccess: row.response_success,
  responseStatus: row.response_status,
  responseReason: row.response_reason,
  payerEndingBalance: row.payer_ending_balance,
  createdAt: row.created_at,
  enactedAt: row.enacted_at,
  finishedAt: row.finished_at
});

const INSERT_COLUMNS = `
  INSERT INTO ledger_transactions (
    transaction_id, payer_id, payer_name, payee_id, payee_name, amount,
    transaction_type, transaction_type_label, is_subscription_debit, subscription_id,
    asset_id, asset_name, asset_description, category_id, local_id, sale_type,
    state, submitted, response_received, response_success, response_status,
    response_reason, payer_ending_balance, created_at, enacted_at, finished_at
  )
  VALUES (
    $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13,
    $14, $15, $16, $17, $18, $19, $20, $21, $22, $23, $24, $25, $26
  )
`;

const toRowValues = (record: LedgerTransaction) => [
  record.transactionId,
  record.payerId,
  record.payerName,
  record.payeeId,
  record.payeeName,
  record.amount,
  record.transactionType,
  record.transactionTypeLabel,
  record.isSubscriptionDebit,
  record.subscriptionId,
  record.assetId,
  record.assetName,
  record.assetDescription,
  record.categoryId,
  record.localId,
  record.saleType,
  record.state,
  record.submitted,
  record.responseReceived,
  record.responseSuccess,
  record.responseStatus,
  record.responseReason,
  record.payerEndingBalance,
  record.createdAt,
  record.enactedAt,
  record.finishedAt
];

/** Inserts a new transaction. Resolves false when the id is already stored. */
export const insertTransaction = async (record: LedgerTransaction): Promise<boolean> => {
  const pool = getDatabasePool();

  const result = await pool.query(
    `${INSERT_COLUMNS} ON CONFLICT (transaction_id) DO NOTHING`,
    toRowValues(record)
  );

  return (result.rowCount ?? 0) === 1;
};

/**
 * Inserts the transaction or overwrites its mutable columns. Identity and
 * economic columns are written once on insert.
 */
export const upsertTransaction = async (record: LedgerTransaction): Promise<void> => {
  const pool = getDatabasePool();

  await pool.query(
    `${INSERT_COLUMNS}
    ON CONFLICT (transaction_id) DO UPDATE
      SET state = EXCLUDED.state,
          submitted = EXCLUDED.submitted,
          response_received = EXCLUDED.response_received,
          response_success = EXCLUDED.response_success,
          response_status = EXCLUDED.response_status,
          response_reason = EXCLUDED.response_reason,
          payer_ending_balance = EXCLUDED.payer_ending_balance,
          enacted_at = EXCLUDED.enacted_at,
          finished_at = EXCLUDED.finished_at,
          updated_at = NOW()
    `,
    toRowValues(record)
  );
};

export const findTransactionsByField = async (
  field: TransactionLookupField,
  value: string
): Promise<LedgerTransaction[]> => {
  const pool = getDatabasePool();
  const column = lookupColumns[field];

  const result = await pool.query<LedgerTransactionRow>(
    `SELECT * FROM ledger_transactions WHERE ${column} = $1 ORDER BY created_at DESC`,
    [value]
  );

  return result.rows.map(mapRowToTransaction);
};

export const listUnfinishedTransactions = async (
  createdBefore: Date
): Promise<LedgerTransaction[]> => {
  const pool = getDatabasePool();

  const result = await pool.query<LedgerTransactionRow>(
    `
    SELECT * FROM ledger_transactions
    WHERE state IN ('created', 'enacted')
      AND created_at < $1
    ORDER BY created_at ASC
    `,
    [createdBefore]
  );

  return result.rows.map(mapRowToTransaction);
};

export const pgTransactionStore: TransactionStore = {
  insert: insertTransaction,
  store: upsertTransaction,
  findByField: findTransactionsByField,
  listUnfinished: listUnfinishedTransactions
};
