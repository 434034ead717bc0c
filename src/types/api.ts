import type { ControllerSnapshot } from './controller.js';

/** Standard JSON envelope for every HTTP API response. */
export interface ApiEnvelope<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  correlationId?: string;
  timestamp: string;
}

// ── Probes ──────────────────────────────────────────────────────────────────

export interface HealthData {
  /** `degraded` while any controller has keys in backoff. */
  status: 'ok' | 'degraded';
  uptimeSec: number;
  memoryUsageMb: number;
}

export interface ReadinessData {
  ready: boolean;
  controllers: ControllerSnapshot[];
}

// ── Inventory ───────────────────────────────────────────────────────────────

/** Token record as listed over HTTP. Never carries the token value. */
export interface HecTokenSummary {
  namespace: string;
  name: string;
  tokenName: string;
  defaultIndex: string;
  allowedIndexes: string[];
  createdAt: string | null;
  deleting: boolean;
  hasSecret: boolean;
}
