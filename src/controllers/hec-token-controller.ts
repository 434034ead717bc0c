import { logThought, registerSensitiveValue, unregisterSensitiveValue } from '../utils/logger.js';
import {
  HEC_TOKEN_FINALIZER,
  TOKEN_SECRET_DATA_KEY,
  TOKEN_SECRET_NAME,
  objectKey,
  type HecToken,
  type Secret,
} from '../types/resources.js';
import { isNotFound } from '../types/errors.js';
import type { ReconcileRequest, ReconcileResult, Reconciler } from '../types/controller.js';
import type { TokenManager } from '../types/splunk.js';
import type { ResourceStore } from '../services/resource-store.js';
import { addFinalizer, hasFinalizer, removeFinalizer, setControllerReference } from './object-meta.js';

export const DEFAULT_COLLECTOR_DOMAIN = 'splunkcloud.com';

export interface HecTokenReconcilerOptions {
  store: ResourceStore;
  tokenManager: TokenManager;
  /** Age after which a token is revoked and replaced. */
  tokenMaxAgeMs: number;
  /** Splunk Cloud stack name, used in the collector URI. */
  instance: string;
  collectorDomain?: string;
  now?: () => Date;
}

export function collectorUri(instance: string, collectorDomain: string = DEFAULT_COLLECTOR_DOMAIN): string {
  return `https://http-inputs-${instance}.${collectorDomain}:443`;
}

/** The forwarder `outputs.conf` stanza that carries the token to the cluster. */
export function renderOutputsConf(tokenValue: string, uri: string): string {
  return `[httpout]
httpEventCollectorToken = ${tokenValue}
uri = ${uri}`;
}

/** The token value carried by a `splunk-hec-token` Secret, if it holds one. */
export function tokenValueFromSecret(secret: Secret): string | undefined {
  const encoded = secret.data[TOKEN_SECRET_DATA_KEY];
  if (!encoded) return undefined;
  const match = /^httpEventCollectorToken = (.+)$/m.exec(Buffer.from(encoded, 'base64').toString('utf8'));
  return match?.[1];
}

/**
 * Owns the lifecycle of one HEC token per HecToken record: issue it, store it
 * in the `splunk-hec-token` Secret, revoke it on deletion, and rotate it by
 * deleting the record once it outlives `tokenMaxAgeMs`.
 */
export class HecTokenReconciler implements Reconciler {
  readonly #store: ResourceStore;
  readonly #tokenManager: TokenManager;
  readonly #tokenMaxAgeMs: number;
  readonly #collectorUri: string;
  readonly #now: () => Date;

  constructor(options: HecTokenReconcilerOptions) {
    this.#store = options.store;
    this.#tokenManager = options.tokenManager;
    this.#tokenMaxAgeMs = options.tokenMaxAgeMs;
    this.#collectorUri = collectorUri(options.instance, options.collectorDomain);
    this.#now = options.now ?? (() => new Date());
  }

  async reconcile(request: ReconcileRequest, signal: AbortSignal): Promise<ReconcileResult> {
    const key = objectKey(request);

    let token: HecToken;
    try {
      token = await this.#store.get('HecToken', request, signal);
    } catch (err) {
      if (isNotFound(err)) {
        void logThought(`[HecToken] ${key}: record not found, nothing to do.`);
        return {};
      }
      throw err;
    }

    if (token.metadata.deletionTimestamp) {
      return this.#finalize(token, signal);
    }

    const deadline = Date.parse(token.metadata.creationTimestamp ?? '') + this.#tokenMaxAgeMs;
    const now = this.#now().getTime();
    if (now > deadline) {
      void logThought(`[HecToken] ${key}: token '${token.spec.name}' is past its maximum age, rotating.`);
      await this.#store.delete('HecToken', request, signal);
      return {};
    }

    try {
      await this.#store.get('Secret', { namespace: request.namespace, name: TOKEN_SECRET_NAME }, signal);
      return { requeueAfterMs: deadline - now };
    } catch (err) {
      if (!isNotFound(err)) {
        throw err;
      }
    }

    await this.#issue(token, signal);
    return { requeueAfterMs: deadline - now };
  }

  async #finalize(token: HecToken, signal: AbortSignal): Promise<ReconcileResult> {
    if (!hasFinalizer(token.metadata, HEC_TOKEN_FINALIZER)) {
      return {};
    }
    void logThought(`[HecToken] ${objectKey(token.metadata)}: deleting token '${token.spec.name}' from Splunk.`);
    await this.#tokenManager.deleteToken(token.spec.name, signal);
    await this.#forgetRevokedValue(token, signal);
    await this.#store.update(
      { ...token, metadata: removeFinalizer(token.metadata, HEC_TOKEN_FINALIZER) },
      signal,
    );
    return {};
  }

  async #forgetRevokedValue(token: HecToken, signal: AbortSignal): Promise<void> {
    let secret: Secret;
    try {
      secret = await this.#store.get('Secret', { namespace: token.metadata.namespace, name: TOKEN_SECRET_NAME }, signal);
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }

    const ownedByToken = (secret.metadata.ownerReferences ?? []).some((ref) => ref.uid === token.metadata.uid);
    const value = ownedByToken ? tokenValueFromSecret(secret) : undefined;
    if (value !== undefined) {
      unregisterSensitiveValue(value);
    }
  }

  async #issue(token: HecToken, signal: AbortSignal): Promise<void> {
    const key = objectKey(token.metadata);
    void logThought(`[HecToken] ${key}: secret not found, requesting token '${token.spec.name}' from Splunk.`);

    // The finalizer must be persisted before the remote token exists, or a
    // deletion in between would leak it.
    let owner = token;
    const finalized = addFinalizer(token.metadata, HEC_TOKEN_FINALIZER);
    if (finalized.changed) {
      owner = await this.#store.update({ ...token, metadata: finalized.meta }, signal);
    }

    const issued = await this.#tokenManager.createToken(owner.spec, signal);
    registerSensitiveValue(issued.value);

    const secret: Secret = {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: setControllerReference(owner, { name: TOKEN_SECRET_NAME, namespace: owner.metadata.namespace }),
      data: {
        [TOKEN_SECRET_DATA_KEY]: Buffer.from(renderOutputsConf(issued.value, this.#collectorUri)).toString('base64'),
      },
      immutable: true,
    };
    await this.#store.create(secret, signal);
    void logThought(`[HecToken] ${key}: stored token '${issued.name}' in secret ${TOKEN_SECRET_NAME}.`);
  }
}
