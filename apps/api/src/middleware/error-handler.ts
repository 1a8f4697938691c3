import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { TourDomainError } from '@nn-tour/domain';
import { CitySourceError, CitySourceMalformedError } from '@nn-tour/adapters';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof TourDomainError) {
    res.status(422).json({ error: err.code, message: err.message });
    return;
  }
  if (err instanceof CitySourceMalformedError) {
    res.status(422).json({ error: err.code, message: err.message, line: err.line });
    return;
  }
  if (err instanceof CitySourceError) {
    console.error('[api] city source failure', err);
    res.status(502).json({ error: err.code, message: err.message });
    return;
  }
  if (err instanceof Error) {
    // body-parser errors carry their own 4xx status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) console.error('[api] unhandled error', err);
    res.status(status).json({ error: err.message });
    return;
  }
  console.error('[api] unhandled non-error value', err);
  res.status(500).json({ error: 'Internal server error' });
}
