import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import {
  AlreadyExistsError,
  ConfigurationError,
  ConflictError,
  NotFoundError,
} from '../types/errors.js';

// ── Response Helpers ────────────────────────────────────────────────────────

export function sendOk<T>(res: Response, data: T, status = 200): void {
  const correlationId = res.locals.correlationId as string | undefined;
  const body: ApiEnvelope<T> = {
    ok: true,
    data,
    correlationId,
    timestamp: new Date().toISOString(),
  };
  res.status(status).json(body);
}

/** The message is scrubbed of registered secrets before it leaves the process. */
export function sendError(res: Response, message: string, status = 400): void {
  const correlationId = res.locals.correlationId as string | undefined;
  const body: ApiEnvelope = {
    ok: false,
    error: scrubSensitiveText(message),
    correlationId,
    timestamp: new Date().toISOString(),
  };
  res.status(status).json(body);
}

// ── Error Mapping ───────────────────────────────────────────────────────────

export function mapError(err: unknown): { status: number; message: string } {
  const message = scrubSensitiveText(err instanceof Error ? err.message : String(err));
  if (err instanceof NotFoundError) {
    return { status: 404, message };
  }
  if (err instanceof AlreadyExistsError || err instanceof ConflictError) {
    return { status: 409, message };
  }
  if (err instanceof ConfigurationError) {
    return { status: 400, message };
  }
  return { status: 500, message };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const correlationId = randomUUID();
  res.locals.correlationId = correlationId;
  void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
  next();
}
