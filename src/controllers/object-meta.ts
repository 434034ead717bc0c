import type { AnyResource, ObjectMeta, OwnerReference } from '../types/resources.js';

export function hasFinalizer(meta: ObjectMeta, finalizer: string): boolean {
  return meta.finalizers?.includes(finalizer) ?? false;
}

/** Returns `changed: false` when the finalizer was already present. */
export function addFinalizer(meta: ObjectMeta, finalizer: string): { meta: ObjectMeta; changed: boolean } {
  if (hasFinalizer(meta, finalizer)) {
    return { meta, changed: false };
  }
  return { meta: { ...meta, finalizers: [...(meta.finalizers ?? []), finalizer] }, changed: true };
}

export function removeFinalizer(meta: ObjectMeta, finalizer: string): ObjectMeta {
  return { ...meta, finalizers: (meta.finalizers ?? []).filter((entry) => entry !== finalizer) };
}

function ownerReferenceFor(owner: AnyResource): OwnerReference {
  if (!owner.metadata.uid) {
    throw new Error(`cannot reference ${owner.kind} ${owner.metadata.name}: owner has no uid (not yet persisted)`);
  }
  return {
    apiVersion: owner.apiVersion,
    kind: owner.kind,
    name: owner.metadata.name,
    uid: owner.metadata.uid,
  };
}

function upsertReference(meta: ObjectMeta, reference: OwnerReference): ObjectMeta {
  const others = (meta.ownerReferences ?? []).filter(
    (existing) =>
      existing.uid !== reference.uid && !(existing.kind === reference.kind && existing.name === reference.name),
  );
  return { ...meta, ownerReferences: [...others, reference] };
}

/**
 * Add (or refresh) a plain owner reference. The store deletes the child once
 * the owner is removed.
 */
export function setOwnerReference(owner: AnyResource, meta: ObjectMeta): ObjectMeta {
  if (owner.metadata.namespace !== meta.namespace) {
    throw new Error(`cross-namespace owner references are not allowed (${owner.metadata.namespace} → ${meta.namespace})`);
  }
  return upsertReference(meta, ownerReferenceFor(owner));
}

/**
 * Mark `owner` as the managing controller of the object. An object may have
 * only one controller reference.
 */
export function setControllerReference(owner: AnyResource, meta: ObjectMeta): ObjectMeta {
  const reference: OwnerReference = { ...ownerReferenceFor(owner), controller: true, blockOwnerDeletion: true };
  const existing = meta.ownerReferences?.find((ref) => ref.controller === true);
  if (existing && existing.uid !== reference.uid) {
    throw new Error(
      `${meta.namespace}/${meta.name} is already controlled by ${existing.kind} ${existing.name}`,
    );
  }
  if (owner.metadata.namespace !== meta.namespace) {
    throw new Error(`cross-namespace owner references are not allowed (${owner.metadata.namespace} → ${meta.namespace})`);
  }
  return upsertReference(meta, reference);
}
