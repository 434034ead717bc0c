import type { NamespacedName, ResourceKind } from './resources.js';

export type ReconcileRequest = NamespacedName;

export interface ReconcileResult {
  /** Ask the manager to run this key again after the given delay, even without a change. */
  requeueAfterMs?: number;
}

export interface Reconciler {
  reconcile(request: ReconcileRequest, signal: AbortSignal): Promise<ReconcileResult>;
}

/** Registration handed to the controller manager. */
export interface ControllerRegistration {
  /** Unique name, used in logs and job IDs. */
  name: string;
  /** Kind whose keys this controller reconciles. */
  forKind: ResourceKind;
  /** Kinds whose changes enqueue the owning `forKind` object. */
  owns: ResourceKind[];
  reconciler: Reconciler;
  /** @default 1 */
  maxConcurrentReconciles?: number;
}

export interface ControllerSnapshot {
  name: string;
  forKind: ResourceKind;
  queued: number;
  inFlight: number;
  failing: number;
  lastError: string | null;
}
