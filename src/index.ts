import 'dotenv/config';
import type { Server } from 'node:http';
import { readConfig, parseDuration } from './config/operator-config.js';
import { SplunkClient } from './splunk/client.js';
import { SqliteResourceStore } from './services/resource-store.js';
import { JobScheduler } from './services/job-scheduler.js';
import { ControllerManager } from './services/controller-manager.js';
import { HecTokenReconciler } from './controllers/hec-token-controller.js';
import { ClusterDeploymentReconciler } from './controllers/cluster-deployment-controller.js';
import { startApiServer } from './api/router.js';
import { logThought, registerSensitiveValue } from './utils/logger.js';

async function main(): Promise<void> {
  const config = await readConfig();
  registerSensitiveValue(config.splunk.authToken);

  const splunk = new SplunkClient({
    instance: config.splunk.instance,
    authToken: config.splunk.authToken,
    acsHostname: config.splunk.acsHostname,
  });
  const store = new SqliteResourceStore({ path: config.runtime.databasePath });
  const scheduler = new JobScheduler();
  const manager = new ControllerManager(store, scheduler, {
    resyncCron: config.runtime.resyncCron,
    reconcileTimeoutMs: config.runtime.reconcileTimeoutMs,
  });

  manager.register({
    name: 'hectoken',
    forKind: 'HecToken',
    owns: ['Secret'],
    maxConcurrentReconciles: config.runtime.maxConcurrentReconciles,
    reconciler: new HecTokenReconciler({
      store,
      tokenManager: splunk,
      tokenMaxAgeMs: parseDuration(config.splunk.tokenMaxAge),
      instance: config.splunk.instance,
      collectorDomain: config.splunk.collectorDomain,
    }),
  });
  manager.register({
    name: 'clusterdeployment',
    forKind: 'ClusterDeployment',
    owns: ['HecToken', 'SyncSet'],
    maxConcurrentReconciles: config.runtime.maxConcurrentReconciles,
    reconciler: new ClusterDeploymentReconciler({
      store,
      indexes: config.indexes,
      syncTargetNamespace: config.sync.targetNamespace,
    }),
  });

  const server: Server = await startApiServer({ store, manager }, config.runtime.apiPort);
  await manager.start();
  await logThought(`HEC token operator started for Splunk instance '${config.splunk.instance}'.`);

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;

    void (async () => {
      await manager.stop();
      scheduler.stopAll();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      store.close();
      await logThought(`HEC token operator received ${signal}; services stopped.`);
      process.exit(0);
    })();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(async (err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  await logThought(`[Startup] Operator failed to start: ${message}`);
  process.exit(1);
});
