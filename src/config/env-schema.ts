/**
 * Centralized registry of every configuration key the relay reads.
 *
 * Each entry declares:
 *   - `key`         The flat key name (also the environment variable name).
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'required' | 'optional' | 'conditional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `format`      Shape check applied when a value is present.
 *   - `condition`   Feature gate the key switches on, for conditional keys.
 */

export type ConfigKeyClass = 'required' | 'optional' | 'conditional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'runtime' | 'storage' | 'realtime';

export type ConfigKeyFormat = 'port' | 'positive_integer' | 'url' | 'text';

/** Format: `<subsystem>:<feature>`. */
export type ConfigCondition = 'presence:redis';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  format: ConfigKeyFormat;
  condition?: ConfigCondition;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Runtime Core ────────────────────────────────────────────────────────────
  {
    key: 'JWT_SECRET',
    type: 'secret',
    class: 'required',
    scope: 'runtime',
    format: 'text',
    description: 'HMAC secret used to verify WebSocket access tokens.',
    remediation: 'Set JWT_SECRET in your .env file or in runtime.jwtSecret of chat-relay.json.',
  },
  {
    key: 'API_PORT',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'port',
    description: 'Listening port for HTTP and WebSocket traffic (default: 8080).',
    remediation: 'Set API_PORT to an integer between 1 and 65535, e.g. API_PORT=8080.',
  },

  // ── Storage ─────────────────────────────────────────────────────────────────
  {
    key: 'DATABASE_PATH',
    type: 'env',
    class: 'optional',
    scope: 'storage',
    format: 'text',
    description: 'SQLite file holding users, groups and messages (default: memory/chat.db).',
    remediation: 'Set DATABASE_PATH to a writable file path.',
  },
  {
    key: 'REDIS_URL',
    type: 'secret',
    class: 'conditional',
    condition: 'presence:redis',
    scope: 'storage',
    format: 'url',
    description: 'Redis connection URL for shared presence and cross-instance relay. Unset runs a single instance in memory.',
    remediation: 'Set REDIS_URL to a redis:// or rediss:// URL, e.g. REDIS_URL=redis://localhost:6379.',
  },

  // ── Realtime Tuning ─────────────────────────────────────────────────────────
  {
    key: 'SEND_QUEUE_CAPACITY',
    type: 'env',
    class: 'optional',
    scope: 'realtime',
    format: 'positive_integer',
    description: 'Outbound frames buffered per connection before new ones are dropped (default: 256).',
    remediation: 'Set SEND_QUEUE_CAPACITY to a positive integer.',
  },
  {
    key: 'INBOUND_QUEUE_CAPACITY',
    type: 'env',
    class: 'optional',
    scope: 'realtime',
    format: 'positive_integer',
    description: 'Router mailbox size; readers wait when it is full (default: 256).',
    remediation: 'Set INBOUND_QUEUE_CAPACITY to a positive integer.',
  },
  {
    key: 'WRITE_WAIT_MS',
    type: 'env',
    class: 'optional',
    scope: 'realtime',
    format: 'positive_integer',
    description: 'Deadline for a single socket write (default: 10000).',
    remediation: 'Set WRITE_WAIT_MS to a positive integer number of milliseconds.',
  },
  {
    key: 'PONG_WAIT_MS',
    type: 'env',
    class: 'optional',
    scope: 'realtime',
    format: 'positive_integer',
    description: 'Read deadline; pings go out at 9/10 of it (default: 60000).',
    remediation: 'Set PONG_WAIT_MS to a positive integer number of milliseconds.',
  },
  {
    key: 'MAX_MESSAGE_BYTES',
    type: 'env',
    class: 'optional',
    scope: 'realtime',
    format: 'positive_integer',
    description: 'Largest inbound frame accepted (default: 524288).',
    remediation: 'Set MAX_MESSAGE_BYTES to a positive integer.',
  },
  {
    key: 'RELAY_ENQUEUE_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    scope: 'realtime',
    format: 'positive_integer',
    description: 'How long a relayed message waits for queue space before it is dropped (default: 1000).',
    remediation: 'Set RELAY_ENQUEUE_TIMEOUT_MS to a positive integer number of milliseconds.',
  },
  {
    key: 'MAX_INFLIGHT_DISPATCHES',
    type: 'env',
    class: 'optional',
    scope: 'realtime',
    format: 'positive_integer',
    description: 'Inbound events one socket may have waiting on the Router before it stops reading (default: 8).',
    remediation: 'Set MAX_INFLIGHT_DISPATCHES to a positive integer.',
  },
  {
    key: 'TYPING_TTL_SECONDS',
    type: 'env',
    class: 'optional',
    scope: 'realtime',
    format: 'positive_integer',
    description: 'Lifetime of a typing marker (default: 10).',
    remediation: 'Set TYPING_TTL_SECONDS to a positive integer.',
  },
  {
    key: 'TYPING_SWEEP_INTERVAL_MS',
    type: 'env',
    class: 'optional',
    scope: 'realtime',
    format: 'positive_integer',
    description: 'Interval of the stale typing marker sweep (default: 30000).',
    remediation: 'Set TYPING_SWEEP_INTERVAL_MS to a positive integer number of milliseconds.',
  },
] as const;

/** Quick lookup map by key name. */
export const CONFIG_SCHEMA_MAP: ReadonlyMap<string, ConfigKeySpec> = new Map(
  CONFIG_SCHEMA.map((spec) => [spec.key, spec]),
);
