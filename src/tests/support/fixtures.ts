import { vi } from 'vitest';

import type {
  AssetCallbackResult,
  CreateLedgerTransactionInput,
  LedgerTransaction
} from '@app-types/transaction';

export const buildTransactionInput = (
  overrides: Partial<CreateLedgerTransactionInput> = {}
): CreateLedgerTransactionInput => ({
  transactionId: 'b3c1f2d4-0000-4000-8000-000000000001',
  payerId: 'payer-1',
  payerName: 'Ada Payer',
  payeeId: 'payee-1',
  payeeName: 'Bea Payee',
  amount: 250,
  transactionType: 5008,
  transactionTypeLabel: 'Object Sale',
  isSubscriptionDebit: false,
  subscriptionId: null,
  assetId: 'asset-1',
  assetName: 'Lantern',
  assetDescription: 'A brass lantern',
  categoryId: 'category-1',
  localId: 42,
  saleType: 2,
  ...overrides
});

const ok = (message: string): AssetCallbackResult => ({ success: true, message });

export const createAssetCallbackStub = () => ({
  enactHold: vi.fn(async (_transaction: Readonly<LedgerTransaction>) => ok('hold placed')),
  consumeHold: vi.fn(async (_transaction: Readonly<LedgerTransaction>) => ok('asset delivered')),
  cancelHold: vi.fn(async (_transaction: Readonly<LedgerTransaction>) => ok('hold released'))
});

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((innerResolve) => {
    resolve = innerResolve;
  });
  return { promise, resolve };
};

/** Clock returning the given instants in order, then repeating the last one. */
export const sequenceClock = (...instants: string[]) => {
  let index = 0;
  return (): Date => {
    const instant = instants[Math.min(index, instants.length - 1)] ?? '1970-01-01T00:00:00.000Z';
    index += 1;
    return new Date(instant);
  };
};
