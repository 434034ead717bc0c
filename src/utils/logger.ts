import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';
const MIN_REDACTION_VALUE_LENGTH = 6;

const sensitiveValues = new Set<string>();

const SENSITIVE_PATTERNS: readonly RegExp[] = [
  /(Bearer\s+)[A-Za-z0-9._~+/=-]+/g,
  /(httpEventCollectorToken\s*=\s*)\S+/g,
  /("token"\s*:\s*")[^"]+/g,
];

/**
 * Register a raw value (auth token, HEC token) that must never reach a log line
 * or an API response. Short values are ignored to avoid shredding ordinary text.
 */
export function registerSensitiveValue(value: string): void {
  if (value.length >= MIN_REDACTION_VALUE_LENGTH) {
    sensitiveValues.add(value);
  }
}

/** Stop redacting a value once it has been revoked. */
export function unregisterSensitiveValue(value: string): void {
  sensitiveValues.delete(value);
}

export function clearSensitiveValuesForTests(): void {
  sensitiveValues.clear();
}

export function scrubSensitiveText(text: string): string {
  let scrubbed = text;
  for (const value of sensitiveValues) {
    scrubbed = scrubbed.split(value).join(REDACTED);
  }
  for (const pattern of SENSITIVE_PATTERNS) {
    scrubbed = scrubbed.replace(pattern, `$1${REDACTED}`);
  }
  return scrubbed;
}

function currentDateIso(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Write an operator log line to stdout and, when `HEC_OPERATOR_LOG_DIR` is set,
 * append it to that directory's daily log file.
 */
export async function logThought(message: string): Promise<void> {
  const line = `${new Date().toISOString()} ${scrubSensitiveText(message)}`;
  console.log(line);

  const logDir = process.env.HEC_OPERATOR_LOG_DIR;
  if (!logDir) {
    return;
  }

  try {
    await mkdir(logDir, { recursive: true });
    await appendFile(path.join(logDir, `${currentDateIso()}.log`), `${line}\n`, 'utf8');
  } catch (err) {
    console.error(`[Logger] Failed to append to ${logDir}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
