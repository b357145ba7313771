import type {
  CreateLedgerTransactionInput,
  LedgerTransaction,
  TransactionPhase,
  TransactionState
} from '@app-types/transaction';
import { TRANSACTION_PHASES } from '@app-types/transaction';

export const ALREADY_ENACTED_MESSAGE = 'already enacted';
export const ALREADY_CONSUMED_MESSAGE = 'already consumed';
export const ALREADY_CANCELED_MESSAGE = 'already canceled';
export const NOT_YET_ENACTED_MESSAGE = 'not yet enacted';

/**
 * What a phase request does against a record in a given state: either run the
 * asset callback and move to `next` on success, or settle immediately without
 * touching the asset.
 */
export type PhaseDecision =
  | { kind: 'invoke'; next: TransactionState }
  | { kind: 'settled'; success: boolean; message: string };

const invoke = (next: TransactionState): PhaseDecision => ({ kind: 'invoke', next });

const settled = (success: boolean, message: string): PhaseDecision => ({
  kind: 'settled',
  success,
  message
});

const assertNever = (value: never): never => {
  throw new Error(`Unhandled transaction state or phase: ${String(value)}`);
};

const decideEnact = (state: TransactionState): PhaseDecision => {
  switch (state) {
    case 'created':
      return invoke('enacted');
    case 'enacted':
      return settled(true, ALREADY_ENACTED_MESSAGE);
    // A late enact after the hold moved on must still report success or the
    // ledger keeps retrying it.
    case 'consumed':
      return settled(true, ALREADY_CONSUMED_MESSAGE);
    // A late enact must never resurrect a canceled hold.
    case 'canceled':
      return settled(false, ALREADY_CANCELED_MESSAGE);
    default:
      return assertNever(state);
  }
};

const decideConsume = (state: TransactionState): PhaseDecision => {
  switch (state) {
    case 'created':
      return settled(false, NOT_YET_ENACTED_MESSAGE);
    case 'enacted':
      return invoke('consumed');
    case 'consumed':
      return settled(true, ALREADY_CONSUMED_MESSAGE);
    case 'canceled':
      return settled(false, ALREADY_CANCELED_MESSAGE);
    default:
      return assertNever(state);
  }
};

const decideCancel = (state: TransactionState): PhaseDecision => {
  switch (state) {
    // Unenacted holds still reach the callback; only it knows whether any
    // partial work needs undoing.
    case 'created':
    case 'enacted':
      return invoke('canceled');
    case 'consumed':
      return settled(false, ALREADY_CONSUMED_MESSAGE);
    case 'canceled':
      return settled(true, ALREADY_CANCELED_MESSAGE);
    default:
      return assertNever(state);
  }
};

export const decidePhase = (state: TransactionState, phase: TransactionPhase): PhaseDecision => {
  switch (phase) {
    case 'enact':
      return decideEnact(state);
    case 'consume':
      return decideConsume(state);
    case 'cancel':
      return decideCancel(state);
    default:
      return assertNever(phase);
  }
};

export const isTransactionPhase = (value: string): value is TransactionPhase =>
  TRANSACTION_PHASES.some((phase) => phase === value);

export const isTerminalState = (state: TransactionState): boolean =>
  state === 'consumed' || state === 'canceled';

/**
 * Moves the record to `next` and stamps the matching timestamp. Timestamps are
 * written once; a record never leaves a terminal state.
 */
export const applyTransition = (
  record: LedgerTransaction,
  next: TransactionState,
  now: Date = new Date()
): void => {
  if (isTerminalState(record.state)) {
    throw new Error(
      `Transaction ${record.transactionId} is already ${record.state} and cannot become ${next}`
    );
  }

  record.state = next;

  if (next === 'enacted' && record.enactedAt === null) {
    record.enactedAt = now;
  }

  if (isTerminalState(next) && record.finishedAt === null) {
    record.finishedAt = now;
  }
};

export const createLedgerTransaction = (
  input: CreateLedgerTransactionInput,
  now: Date = new Date()
): LedgerTransaction => ({
  ...input,
  state: 'created',
  submitted: false,
  responseReceived: false,
  responseSuccess: false,
  responseStatus: '',
  responseReason: '',
  payerEndingBalance: -1,
  createdAt: now,
  enactedAt: null,
  finishedAt: null
});

export const isEnacted = (record: LedgerTransaction): boolean =>
  record.state === 'enacted' || record.state === 'consumed' || record.enactedAt !== null;

export const isConsumed = (record: LedgerTransaction): boolean => record.state === 'consumed';

export const isCanceled = (record: LedgerTransaction): boolean => record.state === 'canceled';
