import type { HecTokenSpec } from './resources.js';

/** A HEC token as reported by Splunk ACS. Absent fields decode as empty values. */
export interface HECToken {
  name: string;
  /** The secret token value. */
  value: string;
  defaultIndex: string;
  allowedIndexes: string[];
}

/**
 * The operations the reconcilers need from Splunk. `SplunkClient` is the real
 * implementation; tests substitute their own.
 */
export interface TokenManager {
  createToken(spec: HecTokenSpec, signal?: AbortSignal): Promise<HECToken>;
  readToken(name: string, signal?: AbortSignal): Promise<HECToken>;
  deleteToken(name: string, signal?: AbortSignal): Promise<void>;
}

export interface SplunkClientOptions {
  /** Splunk Cloud stack name. */
  instance: string;
  /** ACS JWT. */
  authToken: string;
  /** @default 'https://admin.splunk.com' */
  acsHostname?: string;
}
