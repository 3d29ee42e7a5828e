/**
 * Express middleware shared by the REST routes.
 */

import type { NextFunction, Request, Response } from 'express';
import { isValidAddress } from './address.js';
import { createLogger, errorData } from './core/logger.js';
import { ValidationError } from './errors.js';

const log = createLogger('http');

/**
 * Reject requests whose :address param is not a 0x + 40-hex address.
 */
export function requireAddressParam(req: Request, _res: Response, next: NextFunction): void {
  if (!isValidAddress(req.params.address)) {
    next(ValidationError.invalidAddress());
    return;
  }
  next();
}

/**
 * The parsed JSON body as a plain record (empty when absent or not an object).
 */
export function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (!body || typeof body !== 'object' || Array.isArray(body)) return {};
  return Object.fromEntries(Object.entries(body));
}

export function requestLogger(req: Request, _res: Response, next: NextFunction): void {
  log.debug(`${req.method} ${req.path}`, { ip: req.ip, userAgent: req.get('user-agent') });
  next();
}

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}

function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Final error handler. Client errors (RelayError, body-parser failures) keep
 * their status; everything else is logged and reported as a generic 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    let message = 'Bad request';
    if (err instanceof SyntaxError) message = 'Malformed JSON body';
    else if (err instanceof Error) message = err.message;
    res.status(status).json({ error: message });
    return;
  }

  log.error('API error', { method: req.method, path: req.path, ...errorData(err) });
  res.status(500).json({ error: 'Internal server error' });
}
