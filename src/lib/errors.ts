export class ApplicationError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      statusCode?: number;
      code?: string;
      details?: Record<string, unknown>;
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? 'internal_error';
    this.details = options.details;
  }
}

/**
 * More than one stored row for a single transaction id. Creation checks make
 * this impossible, so seeing it means the store itself is corrupt.
 */
export class DuplicateTransactionError extends ApplicationError {
  constructor(transactionId: string, rowCount: number) {
    super(`Failed to find exactly one transaction for ${transactionId}`, {
      statusCode: 500,
      code: 'duplicate_transaction_rows',
      details: { transactionId, rowCount }
    });
    this.name = 'DuplicateTransactionError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
