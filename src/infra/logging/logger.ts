import type { IncomingMessage } from 'http';
import pino from 'pino';
import pinoHttp from 'pino-http';

import { AppConfig } from '@config';

export const logger = pino({
  level: AppConfig.logging.level,
  base: undefined,
  transport:
    AppConfig.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'SYS:standard',
            colorize: true,
            ignore: 'pid,hostname'
          }
        }
      : undefined
});

// Query strings carry transaction ids; only the path is logged as the route.
export const requestLogProps = (req: IncomingMessage) => ({
  correlationId: req.headers['x-request-id'],
  route: req.url?.split('?')[0]
});

export const httpLogger = pinoHttp({
  logger,
  autoLogging: true,
  customProps: requestLogProps
});

export type Logger = typeof logger;
