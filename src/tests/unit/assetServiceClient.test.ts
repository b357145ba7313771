import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type Dispatcher, MockAgent, getGlobalDispatcher, setGlobalDispatcher } from 'undici';

import { AssetServiceClient } from '@clients/assetServiceClient';
import { createLedgerTransaction } from '@services/transactionState';
import { buildTransactionInput } from '../support/fixtures';

const ASSET_ORIGIN = 'http://assets.test';

describe('AssetServiceClient', () => {
  let previousDispatcher: Dispatcher;
  let agent: MockAgent;
  let client: AssetServiceClient;
  const transaction = createLedgerTransaction(buildTransactionInput({ transactionId: 'txn/1' }));

  beforeEach(() => {
    previousDispatcher = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
    client = new AssetServiceClient({
      baseUrl: ASSET_ORIGIN,
      apiKey: 'test-asset-key',
      timeoutMs: 1000
    });
  });

  afterEach(async () => {
    setGlobalDispatcher(previousDispatcher);
    await agent.close();
  });

  it('posts each phase to its hold endpoint with the api key', async () => {
    const pool = agent.get(ASSET_ORIGIN);
    for (const phase of ['enact', 'consume', 'cancel']) {
      pool
        .intercept({
          path: `/holds/txn%2F1/${phase}`,
          method: 'POST',
          headers: { 'x-api-key': 'test-asset-key' }
        })
        .reply(200, { success: true, message: `${phase} ok` });
    }

    expect(await client.enactHold(transaction)).toEqual({ success: true, message: 'enact ok' });
    expect(await client.consumeHold(transaction)).toEqual({
      success: true,
      message: 'consume ok'
    });
    expect(await client.cancelHold(transaction)).toEqual({ success: true, message: 'cancel ok' });
    agent.assertNoPendingInterceptors();
  });

  it('passes a declined hold through', async () => {
    agent
      .get(ASSET_ORIGIN)
      .intercept({ path: '/holds/txn%2F1/enact', method: 'POST' })
      .reply(200, { success: false, message: 'insufficient stock' });

    expect(await client.enactHold(transaction)).toEqual({
      success: false,
      message: 'insufficient stock'
    });
  });

  it('defaults a missing message to empty', async () => {
    agent
      .get(ASSET_ORIGIN)
      .intercept({ path: '/holds/txn%2F1/consume', method: 'POST' })
      .reply(200, { success: true });

    expect(await client.consumeHold(transaction)).toEqual({ success: true, message: '' });
  });

  it('turns an error status into a failed result', async () => {
    agent
      .get(ASSET_ORIGIN)
      .intercept({ path: '/holds/txn%2F1/cancel', method: 'POST' })
      .reply(503, { error: 'unavailable' });

    expect(await client.cancelHold(transaction)).toEqual({
      success: false,
      message: 'asset service responded 503'
    });
  });

  it('rejects a malformed hold response', async () => {
    agent
      .get(ASSET_ORIGIN)
      .intercept({ path: '/holds/txn%2F1/enact', method: 'POST' })
      .reply(200, { ok: 'yes' });

    expect(await client.enactHold(transaction)).toEqual({
      success: false,
      message: 'asset service returned an invalid hold response'
    });
  });

  it('throws when the asset service cannot be reached', async () => {
    agent
      .get(ASSET_ORIGIN)
      .intercept({ path: '/holds/txn%2F1/enact', method: 'POST' })
      .replyWithError(new Error('socket hang up'));

    await expect(client.enactHold(transaction)).rejects.toThrow();
  });
});
