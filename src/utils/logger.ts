import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';
const SENSITIVE_ENV_NAME_PATTERN = /(secret|token|password|api[_-]?key)/i;
const MIN_REDACTION_VALUE_LENGTH = 6;

const KEY_VALUE_PATTERN = /\b(token|secret|password|authorization|api[_-]?key)(["']?\s*[:=]\s*["']?)([^\s"'&,;]+)/gi;
const BEARER_PATTERN = /\b(Bearer\s+)[A-Za-z0-9._~+/-]+=*/g;
const JWT_PATTERN = /\beyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;

function currentDateIso(): string {
    return new Date().toISOString().slice(0, 10);
}

function resolveLogDir(): string {
    return path.resolve(process.env.CHAT_RELAY_LOG_DIR ?? 'logs');
}

function sensitiveEnvValues(): string[] {
    const values: string[] = [];
    for (const [name, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_REDACTION_VALUE_LENGTH) continue;
        if (SENSITIVE_ENV_NAME_PATTERN.test(name)) {
            values.push(value);
        }
    }
    // Longest first so a value containing another is redacted whole.
    return values.sort((left, right) => right.length - left.length);
}

/**
 * Redact credentials before text reaches a log file or an API response.
 * Covers `key=value` pairs, bearer headers, JWT-shaped strings and the raw
 * values of sensitive environment variables.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text
        .replace(BEARER_PATTERN, (_match, prefix: string) => `${prefix}${REDACTED}`)
        .replace(JWT_PATTERN, REDACTED)
        .replace(KEY_VALUE_PATTERN, (_match, key: string, separator: string) => `${key}${separator}${REDACTED}`);

    for (const value of sensitiveEnvValues()) {
        scrubbed = scrubbed.split(value).join(REDACTED);
    }

    return scrubbed;
}

/**
 * Append a line to the daily log (`<logDir>/<YYYY-MM-DD>.md`) and mirror it to
 * the console. Never rejects: a failed file write is reported on stderr.
 */
export async function logThought(message: string): Promise<void> {
    const timestamp = new Date().toISOString();
    const line = `- ${timestamp} ${scrubSensitiveText(message)}`;

    if (process.env.CHAT_RELAY_LOG_CONSOLE !== 'false') {
        console.log(line);
    }

    try {
        const dir = resolveLogDir();
        await mkdir(dir, { recursive: true });
        await appendFile(path.join(dir, `${currentDateIso()}.md`), `${line}\n`, 'utf8');
    } catch (err) {
        console.error(`[Logger] Failed to write log entry: ${err instanceof Error ? err.message : String(err)}`);
    }
}
