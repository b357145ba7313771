import { fetch } from 'undici';
import { z } from 'zod';

import { AppConfig } from '@config';
import type {
  AssetCallback,
  AssetCallbackResult,
  LedgerTransaction,
  TransactionPhase
} from '@app-types/transaction';

const holdResponseSchema = z.object({
  success: z.boolean(),
  message: z.string().default('')
});

export interface AssetServiceClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

/**
 * Asset callback backed by the asset service over HTTP. Each phase is a POST
 * of the full transaction to `/holds/:transactionId/:phase`.
 */
export class AssetServiceClient implements AssetCallback {
  constructor(
    private readonly options: AssetServiceClientOptions = {
      baseUrl: AppConfig.assetService.baseUrl,
      apiKey: AppConfig.assetService.apiKey,
      timeoutMs: AppConfig.assetService.timeoutMs
    }
  ) {}

  enactHold(transaction: Readonly<LedgerTransaction>): Promise<AssetCallbackResult> {
    return this.postHold(transaction, 'enact');
  }

  consumeHold(transaction: Readonly<LedgerTransaction>): Promise<AssetCallbackResult> {
    return this.postHold(transaction, 'consume');
  }

  cancelHold(transaction: Readonly<LedgerTransaction>): Promise<AssetCallbackResult> {
    return this.postHold(transaction, 'cancel');
  }

  private async postHold(
    transaction: Readonly<LedgerTransaction>,
    phase: TransactionPhase
  ): Promise<AssetCallbackResult> {
    const url = `${this.options.baseUrl}/holds/${encodeURIComponent(transaction.transactionId)}/${phase}`;

    const response = await fetch(url, {
      method: 'POST',
      headers: this.buildHeaders(),
      body: JSON.stringify(transaction),
      signal: AbortSignal.timeout(this.options.timeoutMs)
    });

    if (!response.ok) {
      return {
        success: false,
        message: `asset service responded ${response.status}`
      };
    }

    const parsed = holdResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      return {
        success: false,
        message: 'asset service returned an invalid hold response'
      };
    }

    return parsed.data;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json'
    };

    if (this.options.apiKey) {
      headers['x-api-key'] = this.options.apiKey;
    }

    return headers;
  }
}
