import { logThought } from '../utils/logger.js';
import {
  CLUSTER_ID_LABEL,
  CLUSTER_TYPE_LABEL,
  HEC_TOKEN_API_VERSION,
  HEC_TOKEN_OBJECT_NAME,
  MANAGEMENT_CLUSTER_TYPE,
  SYNCSET_NAME,
  TOKEN_SECRET_NAME,
  objectKey,
  type ClusterDeployment,
  type HecToken,
  type HecTokenSpec,
  type SyncSet,
} from '../types/resources.js';
import { LabelMissingError, isNotFound } from '../types/errors.js';
import type { ReconcileRequest, ReconcileResult, Reconciler } from '../types/controller.js';
import type { SplunkIndexes } from '../config/operator-config.js';
import type { ResourceStore } from '../services/resource-store.js';
import { setOwnerReference } from './object-meta.js';

export type ClusterType = 'classic' | 'hcp';

export interface ClusterDeploymentReconcilerOptions {
  store: ResourceStore;
  indexes: Record<ClusterType, SplunkIndexes>;
  /** Namespace on the managed cluster that receives the token secret. */
  syncTargetNamespace: string;
}

export function clusterTypeOf(cluster: ClusterDeployment): ClusterType {
  return cluster.metadata.labels?.[CLUSTER_TYPE_LABEL] === MANAGEMENT_CLUSTER_TYPE ? 'hcp' : 'classic';
}

function sameIndexes(current: HecTokenSpec, desired: SplunkIndexes): boolean {
  const allowed = current.allowedIndexes ?? [];
  return (
    (current.defaultIndex ?? '') === desired.defaultIndex &&
    allowed.length === desired.allowedIndexes.length &&
    allowed.every((index, position) => index === desired.allowedIndexes[position])
  );
}

async function getOptional<T>(lookup: Promise<T>): Promise<T | undefined> {
  try {
    return await lookup;
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
}

/**
 * Derives the HecToken for a cluster from its labels and keeps it in step with
 * the index tables. Also makes sure the SyncSet that ships the token secret to
 * the managed cluster exists.
 */
export class ClusterDeploymentReconciler implements Reconciler {
  readonly #store: ResourceStore;
  readonly #indexes: Record<ClusterType, SplunkIndexes>;
  readonly #syncTargetNamespace: string;

  constructor(options: ClusterDeploymentReconcilerOptions) {
    this.#store = options.store;
    this.#indexes = options.indexes;
    this.#syncTargetNamespace = options.syncTargetNamespace;
  }

  async reconcile(request: ReconcileRequest, signal: AbortSignal): Promise<ReconcileResult> {
    const cluster = await getOptional(this.#store.get('ClusterDeployment', request, signal));
    if (!cluster) {
      void logThought(`[ClusterDeployment] ${objectKey(request)}: record is gone, nothing to do.`);
      return {};
    }

    const tokenName = cluster.metadata.labels?.[CLUSTER_ID_LABEL];
    if (!tokenName) {
      throw new LabelMissingError(CLUSTER_ID_LABEL, 'ClusterDeployment');
    }

    const clusterType = clusterTypeOf(cluster);
    const indexes = this.#indexes[clusterType];
    void logThought(
      `[ClusterDeployment] ${objectKey(request)}: using ${clusterType === 'hcp' ? 'management' : 'classic'} cluster indexes.`,
    );

    await this.#ensureToken(cluster, tokenName, indexes, signal);
    await this.#ensureSyncSet(cluster, signal);
    return {};
  }

  async #ensureToken(
    cluster: ClusterDeployment,
    tokenName: string,
    indexes: SplunkIndexes,
    signal: AbortSignal,
  ): Promise<void> {
    const key = { namespace: cluster.metadata.namespace, name: HEC_TOKEN_OBJECT_NAME };
    const spec: HecTokenSpec = {
      name: tokenName,
      defaultIndex: indexes.defaultIndex,
      allowedIndexes: [...indexes.allowedIndexes],
    };

    const existing = await getOptional(this.#store.get('HecToken', key, signal));
    if (!existing) {
      const token: HecToken = {
        apiVersion: HEC_TOKEN_API_VERSION,
        kind: 'HecToken',
        metadata: setOwnerReference(cluster, { ...key }),
        spec,
      };
      await this.#store.create(token, signal);
      void logThought(`[ClusterDeployment] ${objectKey(key)}: created HecToken for '${tokenName}'.`);
      return;
    }

    if (sameIndexes(existing.spec, indexes)) {
      return;
    }

    await this.#store.update(
      { ...existing, metadata: setOwnerReference(cluster, existing.metadata), spec },
      signal,
    );
    void logThought(`[ClusterDeployment] ${objectKey(key)}: updated HecToken indexes for '${tokenName}'.`);
  }

  async #ensureSyncSet(cluster: ClusterDeployment, signal: AbortSignal): Promise<void> {
    const { namespace, name } = cluster.metadata;
    const key = { namespace, name: SYNCSET_NAME };
    if (await getOptional(this.#store.get('SyncSet', key, signal))) {
      return;
    }

    const syncSet: SyncSet = {
      apiVersion: 'hive.openshift.io/v1',
      kind: 'SyncSet',
      metadata: setOwnerReference(cluster, { ...key }),
      spec: {
        clusterDeploymentRefs: [{ name }],
        resourceApplyMode: 'Sync',
        secretMappings: [
          {
            sourceRef: { name: TOKEN_SECRET_NAME, namespace },
            targetRef: { name: TOKEN_SECRET_NAME, namespace: this.#syncTargetNamespace },
          },
        ],
      },
    };
    await this.#store.create(syncSet, signal);
    void logThought(`[ClusterDeployment] ${objectKey(key)}: created SyncSet for cluster ${name}.`);
  }
}
