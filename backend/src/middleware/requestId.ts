import { v4 as uuid } from 'uuid';
import type { Request, Response, NextFunction } from 'express';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function requestId(req: Request, res: Response, next: NextFunction) {
  const incoming = req.header('x-request-id');
  const id = incoming && incoming.length <= 128 ? incoming : uuid();
  req.requestId = id;
  res.setHeader('x-request-id', id);
  next();
}
