import { Queue, Worker } from 'bullmq';
import Redis from 'ioredis';

import { AppConfig } from '@config';
import { logger } from '@infra/logging/logger';
import { getRedisClient } from '@infra/redis';

let staleHoldSweepQueue: Queue | null = null;

const workers: Worker[] = [];

export const createQueueConnection = (): Redis => {
  const baseClient = getRedisClient();
  return new Redis(baseClient.options);
};

export const initializeQueues = async (): Promise<void> => {
  if (staleHoldSweepQueue) {
    return;
  }

  staleHoldSweepQueue = new Queue(AppConfig.staleHoldSweep.queueName, {
    connection: createQueueConnection(),
    defaultJobOptions: {
      removeOnComplete: true,
      removeOnFail: 100,
      attempts: 1
    }
  });

  logger.info({ queue: AppConfig.staleHoldSweep.queueName }, 'Queues initialised');
};

export const registerWorker = (worker: Worker): void => {
  workers.push(worker);
};

export const getStaleHoldSweepQueue = (): Queue => {
  if (!staleHoldSweepQueue) {
    throw new Error('Stale hold sweep queue not initialised.');
  }
  return staleHoldSweepQueue;
};

export const shutdownQueues = async (): Promise<void> => {
  await Promise.all([
    ...workers.map((worker) =>
      worker.close().catch((error: unknown) => {
        logger.error(error, 'Error closing worker');
      })
    ),
    staleHoldSweepQueue?.close().catch((error: unknown) => {
      logger.error(error, 'Error closing queue');
    })
  ]);

  staleHoldSweepQueue = null;
  workers.length = 0;
};
