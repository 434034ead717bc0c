import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ControllerManager } from '../../src/services/controller-manager.js';
import { JobScheduler } from '../../src/services/job-scheduler.js';
import type { SqliteResourceStore } from '../../src/services/resource-store.js';
import { setOwnerReference } from '../../src/controllers/object-meta.js';
import type { ReconcileRequest, ReconcileResult, Reconciler } from '../../src/types/controller.js';
import { logThought } from '../../src/utils/logger.js';
import { TEST_NAMESPACE, clusterDeployment, hecToken, memoryStore } from '../fixtures/resources.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

const CLUSTER_KEY = { namespace: TEST_NAMESPACE, name: 'test-cluster' };

type ReconcileImpl = (request: ReconcileRequest, signal: AbortSignal, call: number) => Promise<ReconcileResult>;

class RecordingReconciler implements Reconciler {
  readonly calls: ReconcileRequest[] = [];
  readonly signals: AbortSignal[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly impl: ReconcileImpl = async () => ({})) {}

  async reconcile(request: ReconcileRequest, signal: AbortSignal): Promise<ReconcileResult> {
    this.calls.push(request);
    this.signals.push(signal);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      return await this.impl(request, signal, this.calls.length);
    } finally {
      this.active -= 1;
    }
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('ControllerManager', () => {
  let store: SqliteResourceStore;
  let scheduler: JobScheduler;
  let manager: ControllerManager;

  beforeEach(() => {
    store = memoryStore();
    scheduler = new JobScheduler();
  });

  afterEach(async () => {
    await manager.stop();
    scheduler.stopAll();
    store.close();
    vi.restoreAllMocks();
  });

  function startWith(reconciler: Reconciler, options: ConstructorParameters<typeof ControllerManager>[2] = {}) {
    manager = new ControllerManager(store, scheduler, options);
    manager.register({ name: 'test', forKind: 'ClusterDeployment', owns: ['HecToken'], reconciler });
    return manager.start();
  }

  it('reconciles every existing object on start', async () => {
    await store.create(clusterDeployment());
    const reconciler = new RecordingReconciler();

    await startWith(reconciler);
    await manager.waitForIdle();

    expect(reconciler.calls).toEqual([CLUSTER_KEY]);
    expect(manager.isRunning).toBe(true);
  });

  it('enqueues the owner when an owned object changes', async () => {
    const reconciler = new RecordingReconciler();
    await startWith(reconciler);

    const cluster = await store.create(clusterDeployment());
    await manager.waitForIdle();
    await store.create(
      hecToken(undefined, { ownerReferences: setOwnerReference(cluster, { name: 'cluster', namespace: TEST_NAMESPACE }).ownerReferences }),
    );
    await manager.waitForIdle();

    expect(reconciler.calls).toEqual([CLUSTER_KEY, CLUSTER_KEY]);
  });

  it('ignores owned objects that reference a different kind', async () => {
    const reconciler = new RecordingReconciler();
    await startWith(reconciler);

    await store.create(hecToken());
    await manager.waitForIdle();

    expect(reconciler.calls).toEqual([]);
  });

  it('never reconciles one key concurrently and re-runs it when it changed mid-flight', async () => {
    const gate = deferred();
    const reconciler = new RecordingReconciler(async (_request, _signal, call) => {
      if (call === 1) await gate.promise;
      return {};
    });
    const cluster = await store.create(clusterDeployment());
    await startWith(reconciler);

    await store.update({ ...cluster, metadata: { ...cluster.metadata, labels: { 'api.openshift.com/id': 'changed-id' } } });
    await store.update({ ...(await store.get('ClusterDeployment', CLUSTER_KEY)), spec: { note: 'again' } });
    expect(reconciler.calls).toHaveLength(1);

    gate.resolve();
    await manager.waitForIdle();

    expect(reconciler.calls).toHaveLength(2);
    expect(reconciler.maxActive).toBe(1);
  });

  it('retries a failing key with backoff until it succeeds', async () => {
    const reconciler = new RecordingReconciler(async (_request, _signal, call) => {
      if (call < 3) throw new Error(`transient failure ${call}`);
      return {};
    });
    await store.create(clusterDeployment());

    await startWith(reconciler, { baseDelayMs: 1 });
    await vi.waitFor(() => expect(reconciler.calls).toHaveLength(3));
    await manager.waitForIdle();

    const [snapshot] = manager.snapshot();
    expect(snapshot?.failing).toBe(0);
    expect(snapshot?.lastError).toBe('transient failure 2');
  });

  it('reports keys waiting in backoff', async () => {
    const reconciler = new RecordingReconciler(async () => {
      throw new Error('ACS unavailable');
    });
    await store.create(clusterDeployment());

    await startWith(reconciler, { baseDelayMs: 60_000 });
    await manager.waitForIdle();

    expect(manager.snapshot()).toEqual([
      { name: 'test', forKind: 'ClusterDeployment', queued: 0, inFlight: 0, failing: 1, lastError: 'ACS unavailable' },
    ]);
  });

  it('honours requeueAfterMs', async () => {
    const reconciler = new RecordingReconciler(async (_request, _signal, call) => (call === 1 ? { requeueAfterMs: 5 } : {}));
    await store.create(clusterDeployment());

    await startWith(reconciler);
    await vi.waitFor(() => expect(reconciler.calls).toHaveLength(2));
  });

  it('re-enqueues everything on resync', async () => {
    const reconciler = new RecordingReconciler();
    await store.create(clusterDeployment());
    await startWith(reconciler);
    await manager.waitForIdle();

    await manager.resync('test');
    await manager.waitForIdle();

    expect(reconciler.calls).toEqual([CLUSTER_KEY, CLUSTER_KEY]);
  });

  it('schedules a resync job per controller and removes it on stop', async () => {
    const register = vi.spyOn(scheduler, 'register');
    const unregister = vi.spyOn(scheduler, 'unregister');
    await startWith(new RecordingReconciler(), { resyncCron: '*/5 * * * *' });

    expect(register).toHaveBeenCalledWith(
      expect.objectContaining({ id: 'resync:test', cronExpression: '*/5 * * * *' }),
    );

    await manager.stop();
    expect(unregister).toHaveBeenCalledWith('resync:test');
    expect(unregister).toHaveReturnedWith(true);
    expect(scheduler.unregister('resync:test')).toBe(false);
    expect(manager.isRunning).toBe(false);
  });

  it('logs a failed initial resync for a controller registered while running', async () => {
    await startWith(new RecordingReconciler());
    vi.spyOn(store, 'list').mockRejectedValueOnce(new Error('The database connection is not open'));

    manager.register({ name: 'late', forKind: 'HecToken', owns: [], reconciler: new RecordingReconciler() });

    await vi.waitFor(() => {
      expect(logThought).toHaveBeenCalledWith(
        '[ControllerManager] late failed to resync: The database connection is not open',
      );
    });
  });

  it('aborts in-flight reconciles on stop', async () => {
    const reconciler = new RecordingReconciler(
      (_request, signal) =>
        new Promise<ReconcileResult>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(signal.reason));
        }),
    );
    await store.create(clusterDeployment());
    await startWith(reconciler);
    expect(reconciler.calls).toHaveLength(1);

    await manager.stop();

    expect(reconciler.signals[0]?.aborted).toBe(true);
    expect(manager.snapshot()[0]?.failing).toBe(0);
  });
});
