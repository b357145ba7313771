import { Job, Worker } from 'bullmq';

import { AppConfig } from '@config';
import { logger } from '@infra/logging/logger';
import { createQueueConnection, getStaleHoldSweepQueue, registerWorker } from '@infra/queue';
import type { StaleHoldSweepService } from '@services/staleHoldSweepService';

/**
 * Stale hold sweep worker
 * Retries failed transaction writes and reports holds stuck awaiting the ledger
 */
export const initializeStaleHoldSweepWorker = (sweepService: StaleHoldSweepService): void => {
  const handleSweepJob = async (job: Job): Promise<void> => {
    logger.info({ jobId: job.id }, 'Starting stale hold sweep job');

    const result = await sweepService.performSweep();

    logger.info(
      {
        jobId: job.id,
        resynced: result.resynced,
        stillUnsynced: result.stillUnsynced,
        staleHolds: result.staleHolds.length
      },
      'Stale hold sweep job completed'
    );
  };

  const worker = new Worker(AppConfig.staleHoldSweep.queueName, handleSweepJob, {
    connection: createQueueConnection(),
    concurrency: 1 // Only one sweep at a time
  });

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, error: err }, 'Stale hold sweep job failed');
  });

  registerWorker(worker);

  logger.info('Stale hold sweep worker initialized');
};

export const scheduleStaleHoldSweep = async (): Promise<void> => {
  const queue = getStaleHoldSweepQueue();

  await queue.add(
    'periodic-stale-hold-sweep',
    {},
    {
      repeat: {
        pattern: AppConfig.staleHoldSweep.cron
      },
      jobId: 'recurring-stale-hold-sweep'
    }
  );

  logger.info({ cron: AppConfig.staleHoldSweep.cron }, 'Periodic stale hold sweep scheduled');
};
