import { beforeEach, describe, expect, it, vi } from 'vitest';

import { DuplicateTransactionError } from '@lib/errors';
import { TransactionRegistry } from '@services/transactionRegistry';
import { applyTransition, createLedgerTransaction } from '@services/transactionState';
import { buildTransactionInput } from '../support/fixtures';
import { InMemoryTransactionStore } from '../support/inMemoryTransactionStore';

const TRANSACTION_ID = 'b3c1f2d4-0000-4000-8000-000000000001';

describe('TransactionRegistry', () => {
  let store: InMemoryTransactionStore;
  let registry: TransactionRegistry;

  beforeEach(() => {
    store = new InMemoryTransactionStore();
    registry = new TransactionRegistry(store);
  });

  describe('create', () => {
    it('creates once and refuses the same id afterwards', async () => {
      const first = await registry.create(buildTransactionInput());
      const second = await registry.create(buildTransactionInput({ amount: 999 }));

      expect(first?.transactionId).toBe(TRANSACTION_ID);
      expect(second).toBeNull();
      expect(store.rowsFor(TRANSACTION_ID)).toHaveLength(1);
      expect(store.rowsFor(TRANSACTION_ID)[0]?.amount).toBe(250);
    });

    it('refuses an id that only exists in the store', async () => {
      store.insertRaw(createLedgerTransaction(buildTransactionInput()));

      const created = await registry.create(buildTransactionInput());

      expect(created).toBeNull();
      expect(store.storeCalls).toBe(0);
      expect(store.size).toBe(1);
    });

    it('lets exactly one of two concurrent creates win', async () => {
      const results = await Promise.all([
        registry.create(buildTransactionInput()),
        registry.create(buildTransactionInput())
      ]);

      expect(results.filter((result) => result !== null)).toHaveLength(1);
      expect(store.storeCalls).toBe(1);
      expect(store.size).toBe(1);
    });

    it('caches the new record write-through', async () => {
      const created = await registry.create(buildTransactionInput());

      expect(registry.isResident(TRANSACTION_ID)).toBe(true);
      expect(await registry.get(TRANSACTION_ID)).toBe(created);
      expect(store.findCalls).toBe(1);
    });

    it('refuses an id another writer stored after the lookup', async () => {
      store.insertRaw(createLedgerTransaction(buildTransactionInput()));
      vi.spyOn(store, 'findByField').mockResolvedValueOnce([]);

      const created = await registry.create(buildTransactionInput({ amount: 999 }));

      expect(created).toBeNull();
      expect(registry.isResident(TRANSACTION_ID)).toBe(false);
      expect(store.rowsFor(TRANSACTION_ID)).toHaveLength(1);
      expect(store.rowsFor(TRANSACTION_ID)[0]?.amount).toBe(250);
    });

    it('drops the cache entry and rethrows when the first write fails', async () => {
      store.failNextStores(new Error('connection reset'));

      await expect(registry.create(buildTransactionInput())).rejects.toThrow('connection reset');

      expect(registry.isResident(TRANSACTION_ID)).toBe(false);
      expect(await registry.create(buildTransactionInput())).not.toBeNull();
    });
  });

  describe('get', () => {
    it('returns null for an unknown id', async () => {
      expect(await registry.get('nonexistent')).toBeNull();
      expect(registry.isResident('nonexistent')).toBe(false);
    });

    it('loads a stored record once and caches it', async () => {
      store.insertRaw(createLedgerTransaction(buildTransactionInput()));

      const loaded = await registry.get(TRANSACTION_ID);
      const again = await registry.get(TRANSACTION_ID);

      expect(loaded?.payerName).toBe('Ada Payer');
      expect(again).toBe(loaded);
      expect(store.findCalls).toBe(1);
    });

    it('hands concurrent loads the same instance', async () => {
      store.insertRaw(createLedgerTransaction(buildTransactionInput()));

      const [first, second] = await Promise.all([
        registry.get(TRANSACTION_ID),
        registry.get(TRANSACTION_ID)
      ]);

      expect(first).not.toBeNull();
      expect(second).toBe(first);
    });

    it('shares one store read between concurrent lookups', async () => {
      store.insertRaw(createLedgerTransaction(buildTransactionInput()));
      const releaseLookups = store.holdLookups();

      const first = registry.get(TRANSACTION_ID);
      const second = registry.get(TRANSACTION_ID);
      releaseLookups();

      expect(await second).toBe(await first);
      expect(store.findCalls).toBe(1);
    });

    it('hands a slower lookup the instance an earlier request advanced and evicted', async () => {
      store.insertRaw(createLedgerTransaction(buildTransactionInput()));
      const releaseLookups = store.holdLookups();

      const first = registry.get(TRANSACTION_ID);
      const second = registry.get(TRANSACTION_ID);
      releaseLookups();

      const record = await first;
      if (!record) {
        throw new Error('expected a stored record');
      }
      applyTransition(record, 'canceled');
      await registry.persist(record);
      registry.evict(TRANSACTION_ID);

      const late = await second;
      expect(late).toBe(record);
      expect(late?.state).toBe('canceled');
      expect(registry.isResident(TRANSACTION_ID)).toBe(false);
    });

    it('throws when the store holds more than one row for the id', async () => {
      store.insertRaw(createLedgerTransaction(buildTransactionInput()));
      store.insertRaw(createLedgerTransaction(buildTransactionInput()));

      const error = await registry.get(TRANSACTION_ID).catch((caught: unknown) => caught);

      if (!(error instanceof DuplicateTransactionError)) {
        throw new Error('expected a DuplicateTransactionError');
      }
      expect(error.code).toBe('duplicate_transaction_rows');
      expect(error.statusCode).toBe(500);
      expect(error.details).toEqual({ transactionId: TRANSACTION_ID, rowCount: 2 });
      expect(registry.isResident(TRANSACTION_ID)).toBe(false);
    });
  });

  describe('fence', () => {
    it('admits one claim per id until released', async () => {
      const record = await registry.create(buildTransactionInput());
      if (!record) {
        throw new Error('expected a created record');
      }

      expect(registry.claim(record)).toBe(true);
      expect(registry.claim(record)).toBe(false);
      expect(registry.isPending(TRANSACTION_ID)).toBe(true);

      registry.release(TRANSACTION_ID);

      expect(registry.isPending(TRANSACTION_ID)).toBe(false);
      expect(registry.claim(record)).toBe(true);
    });
  });

  describe('persistence failures', () => {
    it('keeps an unsynced record resident until a flush succeeds', async () => {
      const record = await registry.create(buildTransactionInput());
      if (!record) {
        throw new Error('expected a created record');
      }
      applyTransition(record, 'enacted');
      applyTransition(record, 'consumed');

      store.failNextStores(new Error('disk full'));
      expect(await registry.persist(record)).toBe(false);
      expect(registry.isUnsynced(TRANSACTION_ID)).toBe(true);

      expect(registry.evict(TRANSACTION_ID)).toBe(false);
      expect(registry.isResident(TRANSACTION_ID)).toBe(true);
      expect(store.rowsFor(TRANSACTION_ID)[0]?.state).toBe('created');

      expect(await registry.flushUnsynced()).toBe(1);

      expect(registry.unsyncedCount).toBe(0);
      expect(registry.isResident(TRANSACTION_ID)).toBe(false);
      expect(store.rowsFor(TRANSACTION_ID)[0]?.state).toBe('consumed');
    });

    it('leaves a record unsynced when the retry fails too', async () => {
      const record = await registry.create(buildTransactionInput());
      if (!record) {
        throw new Error('expected a created record');
      }

      store.failNextStores(new Error('disk full'), new Error('still full'));
      await registry.persist(record);

      expect(await registry.flushUnsynced()).toBe(0);
      expect(registry.isUnsynced(TRANSACTION_ID)).toBe(true);
    });
  });
});
