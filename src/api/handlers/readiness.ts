import type { Request, Response } from 'express';
import type { ApiEnvelope, ReadinessData } from '../../types/api.js';
import type { ControllerSnapshot } from '../../types/controller.js';
import { sendOk } from '../shared.js';

export interface ReadinessDeps {
  manager: { readonly isRunning: boolean; snapshot(): ControllerSnapshot[] };
}

/**
 * GET /readyz
 *
 * 200 once the controller manager is running, 503 before start and after stop.
 * The body carries the per-controller queue snapshot either way.
 */
export function handleReadiness(deps: ReadinessDeps) {
  return (_req: Request, res: Response): void => {
    const data: ReadinessData = {
      ready: deps.manager.isRunning,
      controllers: deps.manager.snapshot(),
    };

    if (data.ready) {
      sendOk(res, data);
      return;
    }

    const body: ApiEnvelope<ReadinessData> = {
      ok: false,
      data,
      error: 'Controller manager is not running.',
      correlationId: res.locals.correlationId as string | undefined,
      timestamp: new Date().toISOString(),
    };
    res.status(503).json(body);
  };
}
