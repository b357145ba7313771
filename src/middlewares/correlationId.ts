import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';

const headerKey = 'x-request-id';

export const correlationIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const incoming = req.headers[headerKey];
  const correlationId =
    typeof incoming === 'string' && incoming.length > 0 ? incoming : randomUUID();

  req.headers[headerKey] = correlationId;
  res.setHeader(headerKey, correlationId);
  res.locals.correlationId = correlationId;

  next();
};
