import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as path from 'path';
import * as os from 'os';
import { assertRuntimeConfig, formatError, validateRuntimeConfig } from '../../src/config/env-validator.js';
import { CONFIG_SCHEMA, CONFIG_SCHEMA_MAP } from '../../src/config/env-schema.js';
import type { ConfigKeySpec } from '../../src/config/env-schema.js';
import { clearConfigCacheForTests } from '../../src/config/json-config.js';

const FIXED_NOW = () => new Date('2026-03-01T12:00:00.000Z');

function specFor(key: string): ConfigKeySpec {
  const spec = CONFIG_SCHEMA_MAP.get(key);
  if (!spec) throw new Error(`unknown key ${key}`);
  return spec;
}

describe('CONFIG_SCHEMA', () => {
  it('contains unique key entries', () => {
    const keys = CONFIG_SCHEMA.map((s) => s.key);
    expect(keys.length).toBe(new Set(keys).size);
  });

  it('gives every conditional entry a condition', () => {
    const missing = CONFIG_SCHEMA.filter((s) => s.class === 'conditional' && !s.condition);
    expect(missing).toHaveLength(0);
  });

  it('all entries have non-empty description and remediation', () => {
    for (const spec of CONFIG_SCHEMA) {
      expect(spec.description.trim(), `description for ${spec.key}`).not.toBe('');
      expect(spec.remediation.trim(), `remediation for ${spec.key}`).not.toBe('');
    }
  });
});

describe('formatError', () => {
  it('checks port ranges', () => {
    expect(formatError(specFor('API_PORT'), '8080')).toBeNull();
    expect(formatError(specFor('API_PORT'), '70000')).toBe("API_PORT must be an integer in range 1-65535, got '70000'.");
  });

  it('checks positive integers', () => {
    expect(formatError(specFor('PONG_WAIT_MS'), '60000')).toBeNull();
    expect(formatError(specFor('PONG_WAIT_MS'), '0')).toBe("PONG_WAIT_MS must be a positive integer, got '0'.");
  });

  it('never echoes a secret value', () => {
    expect(formatError(specFor('REDIS_URL'), 'redis://cache:6379')).toBeNull();
    expect(formatError(specFor('REDIS_URL'), 'http://cache:6379')).toBe(
      'REDIS_URL must be a redis:// or rediss:// URL, got a value of the wrong shape.',
    );
  });
});

describe('validateRuntimeConfig', () => {
  beforeEach(() => {
    vi.stubEnv('CHAT_RELAY_CONFIG_PATH', path.join(os.tmpdir(), 'chat-relay-validator-missing', 'chat-relay.json'));
    for (const spec of CONFIG_SCHEMA) {
      vi.stubEnv(spec.key, '');
    }
    clearConfigCacheForTests();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    clearConfigCacheForTests();
  });

  it('reports a missing JWT_SECRET as fatal', () => {
    const result = validateRuntimeConfig(FIXED_NOW);

    expect(result.ok).toBe(false);
    expect(result.fatalIssues.map((i) => i.key)).toEqual(['JWT_SECRET']);
    expect(result.fatalIssues[0]?.message).toBe(
      "Required config key 'JWT_SECRET' is missing. HMAC secret used to verify WebSocket access tokens.",
    );
    expect(result.validatedAt).toBe('2026-03-01T12:00:00.000Z');
  });

  it('passes with defaults once the secret is set', () => {
    vi.stubEnv('JWT_SECRET', 'test-secret');

    const result = validateRuntimeConfig(FIXED_NOW);

    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.activeFeatures).toEqual([]);
    expect(result.presentKeys).toContain('JWT_SECRET');
    expect(result.presentKeys).not.toContain('REDIS_URL');
  });

  it('switches on the redis feature when REDIS_URL is valid', () => {
    vi.stubEnv('JWT_SECRET', 'test-secret');
    vi.stubEnv('REDIS_URL', 'redis://127.0.0.1:6379');

    expect(validateRuntimeConfig(FIXED_NOW).activeFeatures).toEqual(['presence:redis']);
  });

  it('collects format errors without marking them fatal', () => {
    vi.stubEnv('JWT_SECRET', 'test-secret');
    vi.stubEnv('API_PORT', 'abc');

    const result = validateRuntimeConfig(FIXED_NOW);

    expect(result.ok).toBe(false);
    expect(result.fatalIssues).toEqual([]);
    expect(result.issues).toEqual([
      {
        key: 'API_PORT',
        class: 'format_error',
        message: "API_PORT must be an integer in range 1-65535, got 'abc'.",
        remediation: specFor('API_PORT').remediation,
      },
    ]);
  });

  it('assertRuntimeConfig throws with every reason', () => {
    vi.stubEnv('API_PORT', '0');

    expect(() => assertRuntimeConfig(FIXED_NOW)).toThrow(
      "Runtime config validation failed: Required config key 'JWT_SECRET' is missing. HMAC secret used to verify WebSocket access tokens. | API_PORT must be an integer in range 1-65535, got '0'.",
    );
  });
});
