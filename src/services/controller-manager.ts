import { logThought } from '../utils/logger.js';
import { objectKey, type NamespacedName } from '../types/resources.js';
import type { ControllerRegistration, ControllerSnapshot } from '../types/controller.js';
import type { ResourceStore, WatchEvent } from './resource-store.js';
import type { JobScheduler } from './job-scheduler.js';

export interface ControllerManagerOptions {
  /** node-cron expression for the periodic full resync. */
  resyncCron?: string;
  reconcileTimeoutMs?: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
}

const DEFAULTS = {
  resyncCron: '*/10 * * * *',
  reconcileTimeoutMs: 30_000,
  baseDelayMs: 5,
  backoffFactor: 2,
  maxDelayMs: 5 * 60 * 1000,
};

// setTimeout fires immediately for anything above a signed 32-bit delay.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

interface ControllerState {
  registration: ControllerRegistration;
  maxConcurrent: number;
  queue: string[];
  queued: Set<string>;
  processing: Set<string>;
  /** Keys that changed while being reconciled; re-run once the current pass ends. */
  dirty: Set<string>;
  failures: Map<string, number>;
  timers: Map<string, NodeJS.Timeout>;
  lastError: string | null;
}

function toRequest(key: string): NamespacedName {
  const separator = key.indexOf('/');
  return { namespace: key.slice(0, separator), name: key.slice(separator + 1) };
}

function resyncJobId(name: string): string {
  return `resync:${name}`;
}

/**
 * Drives reconcilers from store watch events.
 *
 * Each registered controller gets its own work queue. A key is never reconciled
 * twice at the same time; failures are retried per key with exponential backoff
 * and a `requeueAfterMs` result schedules the next pass.
 */
export class ControllerManager {
  readonly #store: ResourceStore;
  readonly #scheduler: JobScheduler;
  readonly #resyncCron: string;
  readonly #reconcileTimeoutMs: number;
  readonly #baseDelayMs: number;
  readonly #backoffFactor: number;
  readonly #maxDelayMs: number;
  readonly #controllers: Map<string, ControllerState> = new Map();
  readonly #inFlight: Set<Promise<void>> = new Set();
  #abort: AbortController = new AbortController();
  #unsubscribe: (() => void) | null = null;
  #running = false;

  constructor(store: ResourceStore, scheduler: JobScheduler, options: ControllerManagerOptions = {}) {
    this.#store = store;
    this.#scheduler = scheduler;
    this.#resyncCron = options.resyncCron ?? DEFAULTS.resyncCron;
    this.#reconcileTimeoutMs = options.reconcileTimeoutMs ?? DEFAULTS.reconcileTimeoutMs;
    this.#baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    this.#backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    this.#maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
  }

  get isRunning(): boolean {
    return this.#running;
  }

  register(registration: ControllerRegistration): void {
    if (this.#controllers.has(registration.name)) {
      throw new Error(`[ControllerManager] Controller '${registration.name}' is already registered.`);
    }
    const state: ControllerState = {
      registration,
      maxConcurrent: Math.max(1, registration.maxConcurrentReconciles ?? 1),
      queue: [],
      queued: new Set(),
      processing: new Set(),
      dirty: new Set(),
      failures: new Map(),
      timers: new Map(),
      lastError: null,
    };
    this.#controllers.set(registration.name, state);

    if (this.#running) {
      this.#registerResyncJob(state);
      this.#resyncController(state).catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        void logThought(`[ControllerManager] ${registration.name} failed to resync: ${message}`);
      });
    }
  }

  /** Subscribe to the store, schedule resyncs and enqueue every existing object. */
  async start(): Promise<void> {
    if (this.#running) return;

    this.#running = true;
    this.#abort = new AbortController();
    this.#unsubscribe = this.#store.watch((event) => this.#onEvent(event));
    for (const state of this.#controllers.values()) {
      this.#registerResyncJob(state);
    }
    await logThought(`[ControllerManager] Started ${this.#controllers.size} controller(s).`);
    await this.resync();
  }

  /** Abort in-flight reconciles, drop pending work and wait for the active passes to settle. */
  async stop(): Promise<void> {
    if (!this.#running) return;

    this.#running = false;
    this.#abort.abort(new Error('controller manager stopped'));
    this.#unsubscribe?.();
    this.#unsubscribe = null;

    for (const state of this.#controllers.values()) {
      this.#scheduler.unregister(resyncJobId(state.registration.name));
      for (const timer of state.timers.values()) {
        clearTimeout(timer);
      }
      state.timers.clear();
      state.queue = [];
      state.queued.clear();
      state.dirty.clear();
    }

    await Promise.allSettled([...this.#inFlight]);
    await logThought('[ControllerManager] Stopped.');
  }

  /** Enqueue every object of the watched kind, for one controller or all of them. */
  async resync(controllerName?: string): Promise<void> {
    const targets = controllerName === undefined
      ? [...this.#controllers.values()]
      : [this.#controllers.get(controllerName)].filter((state): state is ControllerState => state !== undefined);
    await Promise.all(targets.map((state) => this.#resyncController(state)));
  }

  /**
   * Resolve once no key is queued or being reconciled. Delayed requeues
   * (backoff or `requeueAfterMs`) that have not fired yet are not waited for.
   */
  async waitForIdle(): Promise<void> {
    while (this.#inFlight.size > 0) {
      await Promise.allSettled([...this.#inFlight]);
    }
  }

  snapshot(): ControllerSnapshot[] {
    return [...this.#controllers.values()].map((state) => ({
      name: state.registration.name,
      forKind: state.registration.forKind,
      queued: state.queue.length,
      inFlight: state.processing.size,
      failing: state.failures.size,
      lastError: state.lastError,
    }));
  }

  // ── Private Helpers ────────────────────────────────────────────────────────

  #registerResyncJob(state: ControllerState): void {
    const { name, forKind } = state.registration;
    this.#scheduler.register({
      id: resyncJobId(name),
      cronExpression: this.#resyncCron,
      handler: () => this.#resyncController(state),
    });
  }

  async #resyncController(state: ControllerState): Promise<void> {
    const objects = await this.#store.list(state.registration.forKind);
    for (const obj of objects) {
      this.#enqueue(state, objectKey(obj.metadata));
    }
  }

  #onEvent(event: WatchEvent): void {
    const { metadata } = event.object;
    for (const state of this.#controllers.values()) {
      const { forKind, owns } = state.registration;
      if (event.kind === forKind) {
        this.#enqueue(state, objectKey(metadata));
      }
      if (owns.includes(event.kind)) {
        for (const owner of metadata.ownerReferences ?? []) {
          if (owner.kind === forKind) {
            this.#enqueue(state, objectKey({ namespace: metadata.namespace, name: owner.name }));
          }
        }
      }
    }
  }

  #enqueue(state: ControllerState, key: string): void {
    if (!this.#running) return;

    if (state.processing.has(key)) {
      state.dirty.add(key);
      return;
    }
    if (state.queued.has(key)) return;

    state.queued.add(key);
    state.queue.push(key);
    this.#pump(state);
  }

  #enqueueAfter(state: ControllerState, key: string, delayMs: number): void {
    if (!this.#running) return;

    const existing = state.timers.get(key);
    if (existing) {
      clearTimeout(existing);
    }
    const timer = setTimeout(() => {
      state.timers.delete(key);
      this.#enqueue(state, key);
    }, Math.min(Math.max(0, delayMs), MAX_TIMER_DELAY_MS));
    timer.unref();
    state.timers.set(key, timer);
  }

  #pump(state: ControllerState): void {
    while (this.#running && state.processing.size < state.maxConcurrent && state.queue.length > 0) {
      const key = state.queue.shift();
      if (key === undefined) break;
      state.queued.delete(key);
      state.processing.add(key);

      const run = this.#process(state, key);
      this.#inFlight.add(run);
      void run.finally(() => {
        this.#inFlight.delete(run);
      });
    }
  }

  async #process(state: ControllerState, key: string): Promise<void> {
    const { name, reconciler } = state.registration;
    const signal = AbortSignal.any([this.#abort.signal, AbortSignal.timeout(this.#reconcileTimeoutMs)]);

    try {
      const result = await reconciler.reconcile(toRequest(key), signal);
      state.failures.delete(key);
      if (result.requeueAfterMs !== undefined) {
        this.#enqueueAfter(state, key, result.requeueAfterMs);
      }
    } catch (err) {
      if (this.#abort.signal.aborted) return;

      const message = err instanceof Error ? err.message : String(err);
      const attempts = (state.failures.get(key) ?? 0) + 1;
      const delayMs = Math.min(this.#baseDelayMs * this.#backoffFactor ** (attempts - 1), this.#maxDelayMs);
      state.failures.set(key, attempts);
      state.lastError = message;
      await logThought(
        `[ControllerManager] ${name} failed to reconcile ${key} (attempt ${attempts}); retrying in ${delayMs}ms: ${message}`,
      );
      this.#enqueueAfter(state, key, delayMs);
    } finally {
      state.processing.delete(key);
      if (state.dirty.delete(key)) {
        this.#enqueue(state, key);
      }
      this.#pump(state);
    }
  }
}
