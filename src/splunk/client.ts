import { z } from 'zod';
import type { HecTokenSpec } from '../types/resources.js';
import type { HECToken, SplunkClientOptions, TokenManager } from '../types/splunk.js';
import {
  ConfigurationError,
  DecodeError,
  RemoteServiceError,
  TransportError,
} from '../types/errors.js';

export const DEFAULT_ACS_HOSTNAME = 'https://admin.splunk.com';
export const TOKEN_MANAGEMENT_PATH = 'adminconfig/v2/inputs/http-event-collectors';

export const MISSING_INSTANCE_ERROR = 'missing Splunk instance name';
export const MISSING_AUTH_TOKEN_ERROR = 'missing Splunk authentication token';

const HTTP_CONFLICT = 409;
const HTTP_NOT_FOUND = 404;

const ErrorResponseSchema = z.object({
  code: z.string(),
  message: z.string(),
});

const TokenResponseSchema = z.object({
  'http-event-collector': z.object({
    spec: z.object({
      name: z.string().optional(),
      defaultIndex: z.string().optional(),
      allowedIndexes: z.array(z.string()).nullable().optional(),
    }),
    token: z.string().optional(),
  }),
});

/**
 * Apply the index invariant: a non-empty default index must also be allowed.
 * It is appended once when absent; the caller's spec is left untouched.
 */
export function normalizeTokenSpec(spec: HecTokenSpec): HecTokenSpec {
  const allowedIndexes = [...(spec.allowedIndexes ?? [])];
  if (spec.defaultIndex && !allowedIndexes.includes(spec.defaultIndex)) {
    allowedIndexes.push(spec.defaultIndex);
  }

  const normalized: HecTokenSpec = { name: spec.name };
  if (spec.defaultIndex) {
    normalized.defaultIndex = spec.defaultIndex;
  }
  if (allowedIndexes.length > 0) {
    normalized.allowedIndexes = allowedIndexes;
  }
  return normalized;
}

/**
 * Client for HEC token management through Splunk's Admin Config Service.
 *
 * Holds only the collection URL and the ACS JWT, so one instance can be shared
 * by every reconciler. Each call is bound to the caller's `AbortSignal`.
 */
export class SplunkClient implements TokenManager {
  readonly #authToken: string;
  readonly #collectionUrl: string;

  constructor(options: SplunkClientOptions) {
    if (!options.instance) {
      throw new ConfigurationError(MISSING_INSTANCE_ERROR);
    }
    if (!options.authToken) {
      throw new ConfigurationError(MISSING_AUTH_TOKEN_ERROR);
    }

    const hostname = (options.acsHostname ?? DEFAULT_ACS_HOSTNAME).replace(/\/+$/, '');
    this.#authToken = options.authToken;
    this.#collectionUrl = `${hostname}/${encodeURIComponent(options.instance)}/${TOKEN_MANAGEMENT_PATH}`;
  }

  get collectionUrl(): string {
    return this.#collectionUrl;
  }

  /**
   * Create the token and return it with its secret value.
   *
   * The create response never carries the value, so the token is always read
   * back afterwards. A 409 means a previous attempt already created it; that
   * token is read back the same way.
   */
  async createToken(spec: HecTokenSpec, signal?: AbortSignal): Promise<HECToken> {
    const payload = JSON.stringify(normalizeTokenSpec(spec));
    const response = await this.#send(this.#collectionUrl, {
      method: 'POST',
      headers: this.#headers(true),
      body: payload,
      signal,
    });

    if (response.status >= 400 && response.status !== HTTP_CONFLICT) {
      throw await decodeErrorResponse(response);
    }
    await discardBody(response);

    return this.readToken(spec.name, signal);
  }

  async readToken(name: string, signal?: AbortSignal): Promise<HECToken> {
    const response = await this.#send(this.#tokenUrl(name), {
      method: 'GET',
      headers: this.#headers(true),
      signal,
    });

    if (response.status >= 400) {
      throw await decodeErrorResponse(response);
    }

    const body = await readJson(response);
    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DecodeError(`unexpected HEC token response for '${name}': ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }

    const { spec, token } = parsed.data['http-event-collector'];
    return {
      name: spec.name ?? '',
      value: token ?? '',
      defaultIndex: spec.defaultIndex ?? '',
      allowedIndexes: spec.allowedIndexes ?? [],
    };
  }

  /** Delete the named token. A token that is already gone counts as deleted. */
  async deleteToken(name: string, signal?: AbortSignal): Promise<void> {
    const response = await this.#send(this.#tokenUrl(name), {
      method: 'DELETE',
      headers: this.#headers(false),
      signal,
    });

    if (response.status === HTTP_NOT_FOUND || response.ok) {
      await discardBody(response);
      return;
    }
    throw await decodeErrorResponse(response);
  }

  #tokenUrl(name: string): string {
    return `${this.#collectionUrl}/${encodeURIComponent(name)}`;
  }

  #headers(withContentType: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.#authToken}`,
    };
    if (withContentType) {
      headers['Content-Type'] = 'application/json';
    }
    return headers;
  }

  async #send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, init);
    } catch (err) {
      if (init.signal?.aborted) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${init.method ?? 'GET'} ${url} failed: ${message}`, { cause: err });
    }
  }
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`invalid JSON in response (status ${response.status})`, { cause: err });
  }
}

async function decodeErrorResponse(response: Response): Promise<RemoteServiceError> {
  const body = await readJson(response);
  const parsed = ErrorResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new DecodeError(`unexpected error response shape (status ${response.status})`);
  }
  return new RemoteServiceError(parsed.data.code, parsed.data.message, response.status);
}

async function discardBody(response: Response): Promise<void> {
  await response.arrayBuffer();
}
