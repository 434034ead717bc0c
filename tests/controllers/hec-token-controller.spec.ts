import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HecTokenReconciler, collectorUri, renderOutputsConf, tokenValueFromSecret } from '../../src/controllers/hec-token-controller.js';
import type { SqliteResourceStore, WatchEvent } from '../../src/services/resource-store.js';
import { RemoteServiceError } from '../../src/types/errors.js';
import type { HecTokenSpec, Secret } from '../../src/types/resources.js';
import type { HECToken } from '../../src/types/splunk.js';
import { registerSensitiveValue, unregisterSensitiveValue } from '../../src/utils/logger.js';
import { TEST_NAMESPACE, hecToken, manualClock, memoryStore } from '../fixtures/resources.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  registerSensitiveValue: vi.fn(),
  unregisterSensitiveValue: vi.fn(),
}));

const HOUR_MS = 60 * 60 * 1000;
const TOKEN_KEY = { namespace: TEST_NAMESPACE, name: 'cluster' };
const SECRET_KEY = { namespace: TEST_NAMESPACE, name: 'splunk-hec-token' };
const FINALIZER = 'hectoken.managed.io/finalizer';

function fakeTokenManager() {
  return {
    createToken: vi.fn(async (spec: HecTokenSpec): Promise<HECToken> => ({
      name: spec.name,
      value: '<guid-value>',
      defaultIndex: spec.defaultIndex ?? '',
      allowedIndexes: spec.allowedIndexes ?? [],
    })),
    readToken: vi.fn(async (name: string): Promise<HECToken> => {
      throw new Error(`unexpected read of ${name}`);
    }),
    deleteToken: vi.fn(async (_name: string): Promise<void> => undefined),
  };
}

describe('HecTokenReconciler', () => {
  let clock: ReturnType<typeof manualClock>;
  let store: SqliteResourceStore;
  let tokens: ReturnType<typeof fakeTokenManager>;
  let reconciler: HecTokenReconciler;
  let events: WatchEvent[];
  const signal = new AbortController().signal;

  beforeEach(() => {
    clock = manualClock('2026-03-01T12:00:00.000Z');
    store = memoryStore(clock.now);
    tokens = fakeTokenManager();
    reconciler = new HecTokenReconciler({
      store,
      tokenManager: tokens,
      tokenMaxAgeMs: HOUR_MS,
      instance: '<splunk-collector-uri>',
      now: clock.now,
    });
    events = [];
    store.watch((event) => events.push(event));
  });

  afterEach(() => {
    store.close();
    vi.clearAllMocks();
  });

  it('does nothing for a token record that no longer exists', async () => {
    await expect(reconciler.reconcile(TOKEN_KEY, signal)).resolves.toEqual({});
    expect(tokens.createToken).not.toHaveBeenCalled();
    expect(tokens.deleteToken).not.toHaveBeenCalled();
  });

  it('issues a token and stores it in an immutable secret on first sight', async () => {
    const created = await store.create(hecToken({ name: 'test-cluster-id', defaultIndex: 'main' }));

    const result = await reconciler.reconcile(TOKEN_KEY, signal);

    expect(result).toEqual({ requeueAfterMs: HOUR_MS });
    expect(tokens.createToken).toHaveBeenCalledOnce();
    expect(tokens.createToken).toHaveBeenCalledWith({ name: 'test-cluster-id', defaultIndex: 'main' }, signal);

    const token = await store.get('HecToken', TOKEN_KEY);
    expect(token.metadata.finalizers).toEqual([FINALIZER]);

    const secret = await store.get('Secret', SECRET_KEY);
    const expectedPayload = [
      '[httpout]',
      'httpEventCollectorToken = <guid-value>',
      'uri = https://http-inputs-<splunk-collector-uri>.splunkcloud.com:443',
    ].join('\n');
    expect(secret.data).toEqual({ 'outputs.conf': Buffer.from(expectedPayload).toString('base64') });
    expect(secret.immutable).toBe(true);
    expect(secret.metadata.ownerReferences).toEqual([
      {
        apiVersion: 'hectoken.managed.io/v1alpha1',
        kind: 'HecToken',
        name: 'cluster',
        uid: created.metadata.uid,
        controller: true,
        blockOwnerDeletion: true,
      },
    ]);
    expect(registerSensitiveValue).toHaveBeenCalledWith('<guid-value>');
  });

  it('persists the finalizer before calling Splunk', async () => {
    await store.create(hecToken());
    tokens.createToken.mockRejectedValueOnce(new RemoteServiceError('500-x', 'unavailable', 500));

    await expect(reconciler.reconcile(TOKEN_KEY, signal)).rejects.toThrow('received error response 500-x: unavailable');

    const token = await store.get('HecToken', TOKEN_KEY);
    expect(token.metadata.finalizers).toEqual([FINALIZER]);
    expect(await store.list('Secret')).toEqual([]);
  });

  it('makes no writes once the secret exists', async () => {
    await store.create(hecToken());
    await reconciler.reconcile(TOKEN_KEY, signal);
    clock.advance(10 * 60 * 1000);
    events.length = 0;

    const result = await reconciler.reconcile(TOKEN_KEY, signal);

    expect(result).toEqual({ requeueAfterMs: 50 * 60 * 1000 });
    expect(events).toEqual([]);
    expect(tokens.createToken).toHaveBeenCalledOnce();
  });

  it('requests deletion of a stale token record without calling Splunk', async () => {
    await store.create(hecToken(undefined, { finalizers: [FINALIZER] }));
    clock.advance(3 * HOUR_MS);

    const result = await reconciler.reconcile(TOKEN_KEY, signal);

    expect(result).toEqual({});
    expect(tokens.createToken).not.toHaveBeenCalled();
    expect(tokens.deleteToken).not.toHaveBeenCalled();
    const token = await store.get('HecToken', TOKEN_KEY);
    expect(token.metadata.deletionTimestamp).toBe('2026-03-01T15:00:00.000Z');
  });

  it('revokes the remote token once, then clears the finalizer so the record and secret go away', async () => {
    await store.create(hecToken());
    await reconciler.reconcile(TOKEN_KEY, signal);
    await store.delete('HecToken', TOKEN_KEY);

    await expect(reconciler.reconcile(TOKEN_KEY, signal)).resolves.toEqual({});

    expect(tokens.deleteToken).toHaveBeenCalledOnce();
    expect(tokens.deleteToken).toHaveBeenCalledWith('test-cluster-id', signal);
    await expect(store.get('HecToken', TOKEN_KEY)).rejects.toMatchObject({ name: 'NotFoundError' });
    await expect(store.get('Secret', SECRET_KEY)).rejects.toMatchObject({ name: 'NotFoundError' });
    expect(unregisterSensitiveValue).toHaveBeenCalledWith('<guid-value>');
  });

  it('stops redacting each value once it has been revoked', async () => {
    tokens.createToken
      .mockResolvedValueOnce({ name: 'test-cluster-id', value: 'revoked-value-1', defaultIndex: '', allowedIndexes: [] })
      .mockResolvedValueOnce({ name: 'test-cluster-id', value: 'revoked-value-2', defaultIndex: '', allowedIndexes: [] });

    for (let cycle = 0; cycle < 2; cycle += 1) {
      await store.create(hecToken());
      await reconciler.reconcile(TOKEN_KEY, signal);
      await store.delete('HecToken', TOKEN_KEY);
      await reconciler.reconcile(TOKEN_KEY, signal);
    }

    expect(vi.mocked(registerSensitiveValue).mock.calls).toEqual([['revoked-value-1'], ['revoked-value-2']]);
    expect(vi.mocked(unregisterSensitiveValue).mock.calls).toEqual([['revoked-value-1'], ['revoked-value-2']]);
  });

  it('keeps the finalizer when the remote delete fails', async () => {
    await store.create(hecToken(undefined, { finalizers: [FINALIZER] }));
    await store.delete('HecToken', TOKEN_KEY);
    tokens.deleteToken.mockRejectedValueOnce(new RemoteServiceError('503-x', 'try later', 503));

    await expect(reconciler.reconcile(TOKEN_KEY, signal)).rejects.toThrow('received error response 503-x: try later');

    const token = await store.get('HecToken', TOKEN_KEY);
    expect(token.metadata.finalizers).toEqual([FINALIZER]);
    expect(unregisterSensitiveValue).not.toHaveBeenCalled();
  });
});

describe('tokenValueFromSecret', () => {
  function secretWith(data: Record<string, string>): Secret {
    return {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: { name: 'splunk-hec-token', namespace: TEST_NAMESPACE },
      data,
      immutable: true,
    };
  }

  it('reads the token line back out of the payload', () => {
    const payload = renderOutputsConf('test-value', collectorUri('test-stack'));

    expect(tokenValueFromSecret(secretWith({ 'outputs.conf': Buffer.from(payload).toString('base64') }))).toBe('test-value');
  });

  it('returns undefined when the payload is absent', () => {
    expect(tokenValueFromSecret(secretWith({}))).toBeUndefined();
  });
});

describe('renderOutputsConf', () => {
  it('renders the forwarder stanza for a custom collector domain', () => {
    expect(renderOutputsConf('test-value', collectorUri('test-stack', 'splunkcloud.example'))).toBe(
      '[httpout]\nhttpEventCollectorToken = test-value\nuri = https://http-inputs-test-stack.splunkcloud.example:443',
    );
  });
});
