import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';

const DURATION_UNITS_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Parse a Go-style duration such as `720h`, `1h30m` or `90s` into milliseconds.
 */
export function parseDuration(value: string): number {
  const trimmed = value.trim();
  if (!/^(\d+(\.\d+)?(ms|s|m|h))+$/.test(trimmed)) {
    throw new ConfigurationError(`Invalid duration '${value}'. Expected a value like '720h' or '1h30m'.`);
  }

  let total = 0;
  for (const match of trimmed.matchAll(/(\d+(?:\.\d+)?)(ms|s|m|h)/g)) {
    const [, amount, unit] = match;
    total += Number(amount) * DURATION_UNITS_MS[unit];
  }
  return Math.round(total);
}

const DurationSchema = z.string().refine(
  (value) => {
    try {
      return parseDuration(value) > 0;
    } catch {
      return false;
    }
  },
  { message: "must be a positive duration such as '720h'" },
);

export const SplunkIndexesSchema = z.object({
  defaultIndex: z.string(),
  allowedIndexes: z.array(z.string()),
});

export type SplunkIndexes = z.infer<typeof SplunkIndexesSchema>;

export const OperatorConfigSchema = z.object({
  splunk: z.object({
    instance: z.string().min(1, 'splunk.instance is required (or set SPLUNK_INSTANCE)'),
    authToken: z.string().min(1, 'splunk.authToken is required (set SPLUNK_AUTH_TOKEN)'),
    tokenMaxAge: DurationSchema,
    acsHostname: z.string().url(),
    collectorDomain: z.string().min(1),
  }),
  indexes: z.object({
    classic: SplunkIndexesSchema,
    hcp: SplunkIndexesSchema,
  }),
  sync: z.object({
    targetNamespace: z.string().min(1),
  }),
  runtime: z.object({
    apiPort: z.number().int().min(0).max(65535),
    databasePath: z.string().min(1),
    resyncCron: z.string().min(1),
    reconcileTimeoutMs: z.number().int().positive(),
    maxConcurrentReconciles: z.number().int().positive(),
  }),
});

export type OperatorConfig = z.infer<typeof OperatorConfigSchema>;

export const DEFAULT_CONFIG: OperatorConfig = {
  splunk: {
    instance: '',
    authToken: '',
    tokenMaxAge: '720h',
    acsHostname: 'https://admin.splunk.com',
    collectorDomain: 'splunkcloud.com',
  },
  indexes: {
    classic: { defaultIndex: '', allowedIndexes: [] },
    hcp: { defaultIndex: '', allowedIndexes: [] },
  },
  sync: {
    targetNamespace: 'openshift-security',
  },
  runtime: {
    apiPort: 8080,
    databasePath: 'data/hec-operator.db',
    resyncCron: '*/10 * * * *',
    reconcileTimeoutMs: 30_000,
    maxConcurrentReconciles: 1,
  },
};

export function getConfigPath(overridePath?: string): string {
  if (overridePath) return path.resolve(overridePath);
  if (process.env.HEC_OPERATOR_CONFIG_PATH) {
    return path.resolve(process.env.HEC_OPERATOR_CONFIG_PATH);
  }
  return path.resolve('config', 'operator.json');
}

/**
 * Load the operator configuration: defaults, then the JSON file (if any), then
 * environment overrides. The result is validated before it is returned.
 */
export async function readConfig(
  overridePath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<OperatorConfig> {
  const targetPath = getConfigPath(overridePath);
  let loaded: unknown = {};
  try {
    const rawData = await fs.readFile(targetPath, 'utf-8');
    loaded = JSON.parse(rawData);
  } catch (error) {
    const fsError = error as NodeJS.ErrnoException;
    if (fsError.code !== 'ENOENT') {
      throw new ConfigurationError(`Failed to parse config file at ${targetPath}: ${fsError.message}`);
    }
  }

  const merged = applyEnvOverrides(mergeWithDefaults(loaded), env);
  const result = OperatorConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid operator configuration: ${issues}`);
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep-merge plain objects; arrays and scalars from `loaded` replace the defaults. */
function deepMerge(base: unknown, loaded: unknown): unknown {
  if (!isRecord(base) || !isRecord(loaded)) {
    return loaded === undefined ? base : loaded;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(loaded)) {
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
}

function mergeWithDefaults(loaded: unknown): unknown {
  return deepMerge(structuredClone(DEFAULT_CONFIG), isRecord(loaded) ? loaded : {});
}

function applyEnvOverrides(config: unknown, env: NodeJS.ProcessEnv): unknown {
  const overrides = {
    splunk: {
      instance: nonEmpty(env.SPLUNK_INSTANCE),
      authToken: nonEmpty(env.SPLUNK_AUTH_TOKEN),
      tokenMaxAge: nonEmpty(env.TOKEN_MAX_AGE),
    },
    runtime: {
      apiPort: env.API_PORT ? Number(env.API_PORT) : undefined,
      databasePath: nonEmpty(env.DATABASE_PATH),
      resyncCron: nonEmpty(env.RESYNC_CRON),
    },
  };
  return deepMerge(config, overrides);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}
