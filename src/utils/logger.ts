import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';

/** Environment keys whose raw values must never reach a log line. */
const SENSITIVE_ENV_KEYS = [
  'BACKEND_API_KEY',
  'API_SECRET',
  'OPENAI_API_KEY',
  'AZURE_OPENAI_API_KEY',
] as const;

const MIN_SECRET_LENGTH = 8;

const SECRET_PATTERNS: readonly RegExp[] = [
  /\b(api[-_]?key|authorization|token|secret|password)(\s*[:=]\s*)(bearer\s+)?[^\s,;"'}]+/gi,
  /\bBearer\s+[A-Za-z0-9._~+/-]{8,}=*/g,
  /\bsk-[A-Za-z0-9_-]{16,}\b/g,
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Redact credentials from free text before it is logged or returned to a caller.
 *
 * Covers raw values of the known secret env keys, `key=value` / `key: value`
 * fragments whose key looks secret, bearer tokens and `sk-` style keys.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text;

  for (const envKey of SENSITIVE_ENV_KEYS) {
    const value = process.env[envKey];
    if (value && value.length >= MIN_SECRET_LENGTH) {
      scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), REDACTED);
    }
  }

  for (const pattern of SECRET_PATTERNS) {
    scrubbed = scrubbed.replace(pattern, (match, key?: string, separator?: string) => {
      if (typeof key === 'string' && typeof separator === 'string') {
        return `${key}${separator}${REDACTED}`;
      }
      return REDACTED;
    });
  }

  return scrubbed;
}

function resolveLogDir(): string {
  return path.resolve(process.env.LOG_DIR ?? 'memory');
}

/**
 * Append a thought block to today's journal (`<LOG_DIR>/<YYYY-MM-DD>.md`).
 * Journal failures are reported on stderr and never reach the caller.
 */
export async function logThought(message: string): Promise<void> {
  const now = new Date();
  const logDir = resolveLogDir();
  const filePath = path.join(logDir, `${now.toISOString().slice(0, 10)}.md`);
  const entry = `## Thought @ ${now.toISOString()}\n${scrubSensitiveText(message)}\n\n`;

  try {
    await mkdir(logDir, { recursive: true });
    await appendFile(filePath, entry, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[Logger] Failed to append journal entry to ${filePath}: ${scrubSensitiveText(reason)}`);
  }
}
