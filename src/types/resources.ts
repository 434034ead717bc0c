import { z } from 'zod';

/**
 * Resource records the operator reads and writes.
 *
 * Every kind shares `ObjectMeta`. The schemas are the source of truth for the
 * TypeScript types and are applied whenever a record is decoded from the store.
 */

export const OwnerReferenceSchema = z.object({
  apiVersion: z.string(),
  kind: z.string(),
  name: z.string(),
  uid: z.string(),
  controller: z.boolean().optional(),
  blockOwnerDeletion: z.boolean().optional(),
});

export type OwnerReference = z.infer<typeof OwnerReferenceSchema>;

export const ObjectMetaSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().min(1),
  uid: z.string().optional(),
  resourceVersion: z.string().optional(),
  /** ISO-8601, assigned by the store on create. */
  creationTimestamp: z.string().optional(),
  /** ISO-8601, set by the store when deletion is requested while finalizers remain. */
  deletionTimestamp: z.string().optional(),
  labels: z.record(z.string()).optional(),
  finalizers: z.array(z.string()).optional(),
  ownerReferences: z.array(OwnerReferenceSchema).optional(),
});

export type ObjectMeta = z.infer<typeof ObjectMetaSchema>;

export interface NamespacedName {
  namespace: string;
  name: string;
}

// ── ClusterDeployment ───────────────────────────────────────────────────────

export const CLUSTER_ID_LABEL = 'api.openshift.com/id';
export const CLUSTER_TYPE_LABEL = 'ext-hypershift.openshift.io/cluster-type';
export const MANAGEMENT_CLUSTER_TYPE = 'management-cluster';

export const ClusterDeploymentSchema = z.object({
  apiVersion: z.literal('hive.openshift.io/v1'),
  kind: z.literal('ClusterDeployment'),
  metadata: ObjectMetaSchema,
  spec: z.record(z.unknown()).optional(),
});

export type ClusterDeployment = z.infer<typeof ClusterDeploymentSchema>;

// ── HecToken ────────────────────────────────────────────────────────────────

export const HEC_TOKEN_API_VERSION = 'hectoken.managed.io/v1alpha1';
export const HEC_TOKEN_FINALIZER = 'hectoken.managed.io/finalizer';
/** Each cluster namespace holds exactly one HecToken under this name. */
export const HEC_TOKEN_OBJECT_NAME = 'cluster';

export const HecTokenSpecSchema = z.object({
  /** Token name on the Splunk side, derived from the cluster identity. */
  name: z.string().min(1),
  defaultIndex: z.string().optional(),
  allowedIndexes: z.array(z.string()).optional(),
});

export type HecTokenSpec = z.infer<typeof HecTokenSpecSchema>;

export const HecTokenSchema = z.object({
  apiVersion: z.literal(HEC_TOKEN_API_VERSION),
  kind: z.literal('HecToken'),
  metadata: ObjectMetaSchema,
  spec: HecTokenSpecSchema,
});

export type HecToken = z.infer<typeof HecTokenSchema>;

// ── Secret ──────────────────────────────────────────────────────────────────

export const TOKEN_SECRET_NAME = 'splunk-hec-token';
export const TOKEN_SECRET_DATA_KEY = 'outputs.conf';

export const SecretSchema = z.object({
  apiVersion: z.literal('v1'),
  kind: z.literal('Secret'),
  metadata: ObjectMetaSchema,
  /** Values are base64-encoded. */
  data: z.record(z.string()),
  immutable: z.boolean().optional(),
});

export type Secret = z.infer<typeof SecretSchema>;

// ── SyncSet ─────────────────────────────────────────────────────────────────

export const SYNCSET_NAME = 'splunk-hec-token';

export const SyncSetSchema = z.object({
  apiVersion: z.literal('hive.openshift.io/v1'),
  kind: z.literal('SyncSet'),
  metadata: ObjectMetaSchema,
  spec: z.object({
    clusterDeploymentRefs: z.array(z.object({ name: z.string() })),
    resourceApplyMode: z.enum(['Upsert', 'Sync']),
    secretMappings: z.array(
      z.object({
        sourceRef: z.object({ name: z.string(), namespace: z.string() }),
        targetRef: z.object({ name: z.string(), namespace: z.string() }),
      }),
    ),
  }),
});

export type SyncSet = z.infer<typeof SyncSetSchema>;

// ── Kind registry ───────────────────────────────────────────────────────────

export interface ResourceMap {
  ClusterDeployment: ClusterDeployment;
  HecToken: HecToken;
  Secret: Secret;
  SyncSet: SyncSet;
}

export type ResourceKind = keyof ResourceMap;

export type AnyResource = ResourceMap[ResourceKind];

export const RESOURCE_SCHEMAS: { [K in ResourceKind]: z.ZodType<ResourceMap[K], z.ZodTypeDef, unknown> } = {
  ClusterDeployment: ClusterDeploymentSchema,
  HecToken: HecTokenSchema,
  Secret: SecretSchema,
  SyncSet: SyncSetSchema,
};

export const RESOURCE_KINDS: readonly ResourceKind[] = ['ClusterDeployment', 'HecToken', 'Secret', 'SyncSet'];

export function objectKey(meta: NamespacedName): string {
  return `${meta.namespace}/${meta.name}`;
}
