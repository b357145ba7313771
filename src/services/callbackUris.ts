import type { TransactionCallbackUris, TransactionPhase } from '@app-types/transaction';

export const TRANSACTION_CALLBACK_PATH = '/ledger/transaction';

/**
 * URI the remote ledger calls to drive one phase of a transaction. The base
 * URI's path, query and fragment are replaced.
 */
export const buildCallbackUri = (
  baseUri: string | URL,
  transactionId: string,
  phase: TransactionPhase
): URL => {
  const uri = new URL(baseUri);
  uri.pathname = TRANSACTION_CALLBACK_PATH;
  uri.search = new URLSearchParams({ id: transactionId, state: phase }).toString();
  uri.hash = '';
  return uri;
};

export const buildEnactUri = (baseUri: string | URL, transactionId: string): URL =>
  buildCallbackUri(baseUri, transactionId, 'enact');

export const buildConsumeUri = (baseUri: string | URL, transactionId: string): URL =>
  buildCallbackUri(baseUri, transactionId, 'consume');

export const buildCancelUri = (baseUri: string | URL, transactionId: string): URL =>
  buildCallbackUri(baseUri, transactionId, 'cancel');

export const buildCallbackUris = (
  baseUri: string | URL,
  transactionId: string
): TransactionCallbackUris => ({
  enact: buildEnactUri(baseUri, transactionId).toString(),
  consume: buildConsumeUri(baseUri, transactionId).toString(),
  cancel: buildCancelUri(baseUri, transactionId).toString()
});
