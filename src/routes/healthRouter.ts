import { Router } from 'express';

import { healthCheck, readinessCheck } from '@controllers/healthController';
import { asyncHandler } from '@lib/asyncHandler';

export const healthRouter = Router();

healthRouter.get('/health', healthCheck);
healthRouter.get('/health/ready', asyncHandler(readinessCheck));
