import BetterSqlite3 from 'better-sqlite3';
import { SqliteResourceStore } from '../../src/services/resource-store.js';
import {
  CLUSTER_ID_LABEL,
  HEC_TOKEN_API_VERSION,
  HEC_TOKEN_OBJECT_NAME,
  type ClusterDeployment,
  type HecToken,
  type HecTokenSpec,
  type ObjectMeta,
} from '../../src/types/resources.js';

export const TEST_NAMESPACE = 'uhc-production-test';

export function memoryStore(now?: () => Date): SqliteResourceStore {
  return new SqliteResourceStore({ database: new BetterSqlite3(':memory:'), now });
}

export function clusterDeployment(labels: Record<string, string> = { [CLUSTER_ID_LABEL]: 'test-cluster-id' }): ClusterDeployment {
  return {
    apiVersion: 'hive.openshift.io/v1',
    kind: 'ClusterDeployment',
    metadata: { name: 'test-cluster', namespace: TEST_NAMESPACE, labels },
  };
}

export function hecToken(spec: HecTokenSpec = { name: 'test-cluster-id' }, metadata: Partial<ObjectMeta> = {}): HecToken {
  return {
    apiVersion: HEC_TOKEN_API_VERSION,
    kind: 'HecToken',
    metadata: { name: HEC_TOKEN_OBJECT_NAME, namespace: TEST_NAMESPACE, ...metadata },
    spec,
  };
}

/** A clock the test moves by hand. */
export function manualClock(start: string): { now: () => Date; advance: (ms: number) => void } {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}
