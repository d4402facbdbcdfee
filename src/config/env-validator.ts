/**
 * Startup configuration validator.
 *
 * Produces redaction-safe diagnostics for missing required keys and format
 * violations. No configured value of a `secret` key ever appears in the
 * output.
 */

import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigKeySpec } from './env-schema.js';
import { getConfigValue } from './json-config.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  /** Actionable hint (no secret values). */
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when the runtime is configured well enough to start. */
  ok: boolean;
  presentKeys: string[];
  issues: ConfigIssue[];
  /** Feature gates switched on by present conditional keys. */
  activeFeatures: string[];
  /** Subset of issues that prevent startup. */
  fatalIssues: ConfigIssue[];
  validatedAt: string;
}

// ── Internal helpers ─────────────────────────────────────────────────────────

/** Echo a value into a message unless the key is a secret. */
function shown(spec: ConfigKeySpec, raw: string): string {
  return spec.type === 'secret' ? 'a value of the wrong shape' : `'${raw}'`;
}

/** Returns a message when `raw` does not fit the key's format. */
export function formatError(spec: ConfigKeySpec, raw: string): string | null {
  const value = raw.trim();

  switch (spec.format) {
    case 'port': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
        return `${spec.key} must be an integer in range 1-65535, got ${shown(spec, value)}.`;
      }
      return null;
    }
    case 'positive_integer': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        return `${spec.key} must be a positive integer, got ${shown(spec, value)}.`;
      }
      return null;
    }
    case 'url': {
      if (!/^rediss?:\/\/\S+$/i.test(value)) {
        return `${spec.key} must be a redis:// or rediss:// URL, got ${shown(spec, value)}.`;
      }
      return null;
    }
    case 'text':
      return null;
  }
}

// ── Public API ───────────────────────────────────────────────────────────────

/** Validate configured values (env overrides and `chat-relay.json`) against the schema. */
export function validateRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];
  const activeFeatures = new Set<string>();

  for (const spec of CONFIG_SCHEMA) {
    const raw = getConfigValue(spec.key);

    if (raw === undefined) {
      if (spec.class === 'required') {
        issues.push({
          key: spec.key,
          class: 'missing_required',
          message: `Required config key '${spec.key}' is missing. ${spec.description}`,
          remediation: spec.remediation,
        });
      }
      continue;
    }

    presentKeys.push(spec.key);

    const formatErr = formatError(spec, raw);
    if (formatErr) {
      issues.push({
        key: spec.key,
        class: 'format_error',
        message: formatErr,
        remediation: spec.remediation,
      });
      continue;
    }

    if (spec.class === 'conditional' && spec.condition) {
      activeFeatures.add(spec.condition);
    }
  }

  const fatalIssues = issues.filter((i) => i.class === 'missing_required');

  return {
    ok: issues.length === 0,
    presentKeys: presentKeys.sort(),
    issues,
    activeFeatures: [...activeFeatures].sort(),
    fatalIssues,
    validatedAt: now().toISOString(),
  };
}

/**
 * Run validation and throw when the runtime cannot start.
 * Format errors are fatal here too: a malformed port or URL would fail later anyway.
 */
export function assertRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const result = validateRuntimeConfig(now);

  if (!result.ok) {
    const reasons = result.issues.map((i) => i.message).join(' | ');
    throw new Error(`Runtime config validation failed: ${reasons}`);
  }

  return result;
}
