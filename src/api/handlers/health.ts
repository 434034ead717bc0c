import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { ControllerSnapshot } from '../../types/controller.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
  manager: { snapshot(): ControllerSnapshot[] };
}

/** GET /healthz: liveness. Always 200 while the process can answer. */
export function handleHealth(deps: HealthDeps) {
  return (_req: Request, res: Response): void => {
    const failing = deps.manager.snapshot().some((controller) => controller.failing > 0);
    const data: HealthData = {
      status: failing ? 'degraded' : 'ok',
      uptimeSec: Math.floor((Date.now() - startTime) / 1000),
      memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
    };
    sendOk(res, data);
  };
}
