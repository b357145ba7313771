import { Request, Response } from 'express';

import { AppConfig } from '@config';
import { pingDatabase } from '@infra/database';
import { pingRedis } from '@infra/redis';

export const healthCheck = (_req: Request, res: Response) => {
  res.json({
    status: 'ok',
    env: AppConfig.nodeEnv,
    version: '0.1.0'
  });
};

export const readinessCheck = async (_req: Request, res: Response) => {
  const database = await pingDatabase();
  const redis = AppConfig.staleHoldSweep.enabled ? await pingRedis() : null;
  const ready = database && redis !== false;

  res.status(ready ? 200 : 503).json({
    status: ready ? 'ready' : 'degraded',
    checks: { database, redis }
  });
};
