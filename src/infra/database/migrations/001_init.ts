import type { PoolClient } from 'pg';

export const migrationId = '001_init';

export const up = async (client: PoolClient): Promise<void> => {
  await client.query(`
    CREATE TABLE IF NOT EXISTS ledger_transactions (
      transaction_id TEXT PRIMARY KEY,
      payer_id TEXT NOT NULL,
      payer_name VARCHAR(255) NOT NULL,
      payee_id TEXT NOT NULL,
      payee_name VARCHAR(255) NOT NULL,
      amount INTEGER NOT NULL,
      transaction_type INTEGER NOT NULL,
      transaction_type_label TEXT NOT NULL,
      is_subscription_debit BOOLEAN NOT NULL DEFAULT FALSE,
      subscription_id TEXT,
      asset_id TEXT NOT NULL,
      asset_name TEXT NOT NULL,
      asset_description TEXT NOT NULL DEFAULT '',
      category_id TEXT NOT NULL,
      local_id BIGINT,
      sale_type INTEGER NOT NULL,
      state TEXT NOT NULL DEFAULT 'created',
      submitted BOOLEAN NOT NULL DEFAULT FALSE,
      response_received BOOLEAN NOT NULL DEFAULT FALSE,
      response_success BOOLEAN NOT NULL DEFAULT FALSE,
      response_status TEXT NOT NULL DEFAULT '',
      response_reason TEXT NOT NULL DEFAULT '',
      payer_ending_balance INTEGER NOT NULL DEFAULT -1,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      enacted_at TIMESTAMPTZ,
      finished_at TIMESTAMPTZ,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),

      CONSTRAINT ledger_transactions_state_check
        CHECK (state IN ('created', 'enacted', 'consumed', 'canceled'))
    );

    CREATE INDEX IF NOT EXISTS idx_ledger_transactions_payer
      ON ledger_transactions (payer_id, created_at DESC);

    CREATE INDEX IF NOT EXISTS idx_ledger_transactions_payee
      ON ledger_transactions (payee_id, created_at DESC);

    CREATE INDEX IF NOT EXISTS idx_ledger_transactions_subscription
      ON ledger_transactions (subscription_id)
      WHERE subscription_id IS NOT NULL;

    CREATE INDEX IF NOT EXISTS idx_ledger_transactions_unfinished
      ON ledger_transactions (created_at)
      WHERE state IN ('created', 'enacted');
  `);
};

export const down = async (client: PoolClient): Promise<void> => {
  await client.query(`
    DROP TABLE IF EXISTS ledger_transactions;
  `);
};
