import { createServer, type Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { handleHealth } from './handlers/health.js';
import { handleReadiness } from './handlers/readiness.js';
import { handleClusterDeploymentApply, handleClusterDeploymentDelete } from './handlers/cluster-deployments.js';
import { handleHecTokenList } from './handlers/hec-tokens.js';
import { mapError, requestLogger, sendError } from './shared.js';
import type { ResourceStore } from '../services/resource-store.js';
import type { ControllerManager } from '../services/controller-manager.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
  store: ResourceStore;
  manager: Pick<ControllerManager, 'isRunning' | 'snapshot'>;
}

/**
 * Build the operator's HTTP API.
 *
 * Endpoints:
 *   GET    /healthz                              Liveness and uptime
 *   GET    /readyz                               503 until the controller manager runs
 *   PUT    /clusterdeployments/:namespace/:name  Register a cluster or replace its labels
 *   DELETE /clusterdeployments/:namespace/:name  Remove a cluster (revokes its token)
 *   GET    /hectokens                            Token inventory, without secret values
 */
export function createApiApp(deps: ApiServerDeps): Express {
  const app = express();

  app.use(express.json());
  app.use(requestLogger);

  app.get('/healthz', handleHealth({ manager: deps.manager }));
  app.get('/readyz', handleReadiness({ manager: deps.manager }));
  app.put('/clusterdeployments/:namespace/:name', handleClusterDeploymentApply({ store: deps.store }));
  app.delete('/clusterdeployments/:namespace/:name', handleClusterDeploymentDelete({ store: deps.store }));
  app.get('/hectokens', handleHecTokenList({ store: deps.store }));

  app.use((_req: Request, res: Response) => {
    sendError(res, 'Not found.', 404);
  });

  // express.json() reports malformed bodies here.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      sendError(res, `Malformed JSON body: ${err.message}`, 400);
      return;
    }
    const { status, message } = mapError(err);
    sendError(res, message, status);
  });

  return app;
}

/** Start listening; resolves with the bound server once the port is open. */
export function startApiServer(deps: ApiServerDeps, port: number): Promise<Server> {
  const server = createServer(createApiApp(deps));
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      void logThought(`[API] Control plane listening on port ${port}.`);
      resolve(server);
    });
  });
}
