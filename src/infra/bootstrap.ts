import { AppConfig } from '@config';
import { AssetServiceClient } from '@clients/assetServiceClient';
import { initializeDatabase, shutdownDatabase } from '@infra/database';
import { pgTransactionStore } from '@infra/database/repositories/transactionRepository';
import { logger } from '@infra/logging/logger';
import { initializeQueues, shutdownQueues } from '@infra/queue';
import {
  initializeStaleHoldSweepWorker,
  scheduleStaleHoldSweep
} from '@infra/queue/staleHoldSweepWorkerHandler';
import { initializeRedis, shutdownRedis } from '@infra/redis';
import { StaleHoldSweepService } from '@services/staleHoldSweepService';
import { TransactionProcessor } from '@services/transactionProcessor';
import { TransactionRegistry } from '@services/transactionRegistry';
import { TransactionService } from '@services/transactionService';

export interface AppServices {
  transactionService: TransactionService;
  staleHoldSweepService: StaleHoldSweepService;
}

export const bootstrapInfrastructure = async (): Promise<AppServices> => {
  logger.info('Bootstrapping infrastructure components');
  await initializeDatabase();

  const registry = new TransactionRegistry(pgTransactionStore);
  const transactionService = new TransactionService({
    registry,
    processor: new TransactionProcessor(registry),
    assetCallback: new AssetServiceClient(),
    callbackBaseUrl: AppConfig.ledger.callbackBaseUrl
  });
  const staleHoldSweepService = new StaleHoldSweepService(
    registry,
    pgTransactionStore,
    AppConfig.staleHoldSweep.staleAfterMs
  );

  if (AppConfig.staleHoldSweep.enabled) {
    await initializeRedis();
    await initializeQueues();
    initializeStaleHoldSweepWorker(staleHoldSweepService);
    await scheduleStaleHoldSweep();
  }

  return { transactionService, staleHoldSweepService };
};

export const shutdownInfrastructure = async (): Promise<void> => {
  logger.info('Shutting down infrastructure components');
  await shutdownQueues();
  await shutdownRedis();
  await shutdownDatabase();
};
