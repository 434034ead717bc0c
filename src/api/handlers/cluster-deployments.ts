import type { Request, Response } from 'express';
import { z } from 'zod';
import type { ResourceStore } from '../../services/resource-store.js';
import type { ClusterDeployment, NamespacedName } from '../../types/resources.js';
import { isNotFound } from '../../types/errors.js';
import { logThought } from '../../utils/logger.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface ClusterDeploymentDeps {
  store: ResourceStore;
}

const ApplyClusterDeploymentBodySchema = z.object({
  labels: z.record(z.string()).default({}),
});

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

function readKey(req: Request): NamespacedName | string {
  const { namespace, name } = req.params;
  if (!namespace || !DNS_LABEL.test(namespace)) {
    return `Invalid namespace '${namespace ?? ''}'.`;
  }
  if (!name || !DNS_LABEL.test(name)) {
    return `Invalid name '${name ?? ''}'.`;
  }
  return { namespace, name };
}

/**
 * PUT /clusterdeployments/:namespace/:name
 *
 * Registers a cluster or replaces its labels. Answers 201 on create, 200 on update.
 */
export function handleClusterDeploymentApply(deps: ClusterDeploymentDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    const key = readKey(req);
    if (typeof key === 'string') {
      sendError(res, key, 400);
      return;
    }

    const parsed = ApplyClusterDeploymentBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      sendError(res, `Invalid request body: ${issues}`, 400);
      return;
    }
    const { labels } = parsed.data;

    try {
      let existing: ClusterDeployment | undefined;
      try {
        existing = await deps.store.get('ClusterDeployment', key);
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }

      if (existing) {
        const updated = await deps.store.update({ ...existing, metadata: { ...existing.metadata, labels } });
        void logThought(`[API] Updated labels on ClusterDeployment ${key.namespace}/${key.name}.`);
        sendOk(res, updated);
        return;
      }

      const created = await deps.store.create<ClusterDeployment>({
        apiVersion: 'hive.openshift.io/v1',
        kind: 'ClusterDeployment',
        metadata: { ...key, labels },
      });
      void logThought(`[API] Registered ClusterDeployment ${key.namespace}/${key.name}.`);
      sendOk(res, created, 201);
    } catch (err) {
      const { status, message } = mapError(err);
      sendError(res, message, status);
    }
  };
}

/** DELETE /clusterdeployments/:namespace/:name */
export function handleClusterDeploymentDelete(deps: ClusterDeploymentDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    const key = readKey(req);
    if (typeof key === 'string') {
      sendError(res, key, 400);
      return;
    }

    try {
      await deps.store.delete('ClusterDeployment', key);
      void logThought(`[API] Deleted ClusterDeployment ${key.namespace}/${key.name}.`);
      sendOk(res, { deleted: true, ...key });
    } catch (err) {
      const { status, message } = mapError(err);
      sendError(res, message, status);
    }
  };
}
