import { beforeEach, describe, expect, it } from 'vitest';

import { StaleHoldSweepService } from '@services/staleHoldSweepService';
import { TransactionRegistry } from '@services/transactionRegistry';
import { applyTransition, createLedgerTransaction } from '@services/transactionState';
import { buildTransactionInput } from '../support/fixtures';
import { InMemoryTransactionStore } from '../support/inMemoryTransactionStore';

const HOUR_MS = 60 * 60 * 1000;
const NOW = new Date('2024-03-02T12:00:00.000Z');

describe('StaleHoldSweepService', () => {
  let store: InMemoryTransactionStore;
  let registry: TransactionRegistry;
  let sweep: StaleHoldSweepService;

  beforeEach(() => {
    store = new InMemoryTransactionStore();
    registry = new TransactionRegistry(store);
    sweep = new StaleHoldSweepService(registry, store, HOUR_MS);
  });

  it('reports unfinished holds older than the cutoff', async () => {
    const oldEnacted = createLedgerTransaction(
      buildTransactionInput({ transactionId: 'old-enacted' }),
      new Date('2024-03-02T09:00:00.000Z')
    );
    applyTransition(oldEnacted, 'enacted', new Date('2024-03-02T09:00:02.000Z'));
    store.insertRaw(oldEnacted);
    store.insertRaw(
      createLedgerTransaction(
        buildTransactionInput({ transactionId: 'old-created' }),
        new Date('2024-03-02T10:30:00.000Z')
      )
    );
    store.insertRaw(
      createLedgerTransaction(
        buildTransactionInput({ transactionId: 'fresh' }),
        new Date('2024-03-02T11:30:00.000Z')
      )
    );
    const oldConsumed = createLedgerTransaction(
      buildTransactionInput({ transactionId: 'old-consumed' }),
      new Date('2024-03-02T08:00:00.000Z')
    );
    applyTransition(oldConsumed, 'enacted');
    applyTransition(oldConsumed, 'consumed');
    store.insertRaw(oldConsumed);

    const result = await sweep.performSweep(NOW);

    expect(result.resynced).toBe(0);
    expect(result.stillUnsynced).toBe(0);
    expect(result.staleHolds).toEqual([
      {
        transactionId: 'old-enacted',
        state: 'enacted',
        createdAt: new Date('2024-03-02T09:00:00.000Z'),
        enactedAt: new Date('2024-03-02T09:00:02.000Z'),
        ageMs: 3 * HOUR_MS
      },
      {
        transactionId: 'old-created',
        state: 'created',
        createdAt: new Date('2024-03-02T10:30:00.000Z'),
        enactedAt: null,
        ageMs: 1.5 * HOUR_MS
      }
    ]);
  });

  it('leaves the stale records untouched', async () => {
    store.insertRaw(
      createLedgerTransaction(buildTransactionInput(), new Date('2024-03-01T00:00:00.000Z'))
    );

    await sweep.performSweep(NOW);

    expect(store.rowsFor('b3c1f2d4-0000-4000-8000-000000000001')[0]?.state).toBe('created');
    expect(store.storeCalls).toBe(0);
  });

  it('retries failed writes before listing holds', async () => {
    const record = await registry.create(
      buildTransactionInput(),
      new Date('2024-03-02T11:59:00.000Z')
    );
    if (!record) {
      throw new Error('expected a created record');
    }
    applyTransition(record, 'enacted', new Date('2024-03-02T11:59:10.000Z'));
    store.failNextStores(new Error('connection reset'));
    await registry.persist(record);

    const result = await sweep.performSweep(NOW);

    expect(result).toEqual({ resynced: 1, stillUnsynced: 0, staleHolds: [] });
    expect(store.rowsFor(record.transactionId)[0]?.state).toBe('enacted');
    expect(registry.isResident(record.transactionId)).toBe(true);
  });

  it('counts writes that keep failing', async () => {
    const record = await registry.create(buildTransactionInput(), NOW);
    if (!record) {
      throw new Error('expected a created record');
    }
    store.failNextStores(new Error('disk full'), new Error('disk full'));
    await registry.persist(record);

    const result = await sweep.performSweep(NOW);

    expect(result.resynced).toBe(0);
    expect(result.stillUnsynced).toBe(1);
  });
});
