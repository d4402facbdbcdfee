import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';

export interface RealtimeTuningConfig {
    sendQueueCapacity: number;
    inboundQueueCapacity: number;
    writeWaitMs: number;
    pongWaitMs: number;
    maxMessageBytes: number;
    relayEnqueueTimeoutMs: number;
    maxInflightDispatches: number;
    typingTtlSeconds: number;
    typingSweepIntervalMs: number;
}

export interface ChatRelayConfig {
    runtime: {
        apiPort: number;
        jwtSecret: string;
    };
    storage: {
        databasePath: string;
        /** Empty selects the in-process presence store (single instance only). */
        redisUrl: string;
    };
    realtime: RealtimeTuningConfig;
}

export const DEFAULT_CONFIG: ChatRelayConfig = {
    runtime: {
        apiPort: 8080,
        jwtSecret: '',
    },
    storage: {
        databasePath: 'memory/chat.db',
        redisUrl: '',
    },
    realtime: {
        sendQueueCapacity: 256,
        inboundQueueCapacity: 256,
        writeWaitMs: 10_000,
        pongWaitMs: 60_000,
        maxMessageBytes: 512 * 1024,
        relayEnqueueTimeoutMs: 1_000,
        maxInflightDispatches: 8,
        typingTtlSeconds: 10,
        typingSweepIntervalMs: 30_000,
    },
};

const CONFIG_FILE_NAME = 'chat-relay.json';

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.CHAT_RELAY_CONFIG_PATH) {
        return path.resolve(process.env.CHAT_RELAY_CONFIG_PATH);
    }
    return path.resolve(CONFIG_FILE_NAME);
}

export async function readConfig(overridePath?: string): Promise<ChatRelayConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${describe(error)}`);
    }

    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${describe(error)}`);
    }
}

// ── Merge ───────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
    return value instanceof Error && 'code' in value;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function section(record: Record<string, unknown>, name: string): Record<string, unknown> {
    const value = record[name];
    return isRecord(value) ? value : {};
}

function pickString(record: Record<string, unknown>, key: string, fallback: string): string {
    const value = record[key];
    return typeof value === 'string' ? value : fallback;
}

function pickNumber(record: Record<string, unknown>, key: string, fallback: number): number {
    const value = record[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/** Overlay a parsed config file on the defaults; fields of the wrong type are ignored. */
export function mergeWithDefaults(loaded: unknown): ChatRelayConfig {
    const root = isRecord(loaded) ? loaded : {};
    const runtime = section(root, 'runtime');
    const storage = section(root, 'storage');
    const realtime = section(root, 'realtime');
    const defaults = DEFAULT_CONFIG;

    return {
        runtime: {
            apiPort: pickNumber(runtime, 'apiPort', defaults.runtime.apiPort),
            jwtSecret: pickString(runtime, 'jwtSecret', defaults.runtime.jwtSecret),
        },
        storage: {
            databasePath: pickString(storage, 'databasePath', defaults.storage.databasePath),
            redisUrl: pickString(storage, 'redisUrl', defaults.storage.redisUrl),
        },
        realtime: {
            sendQueueCapacity: pickNumber(realtime, 'sendQueueCapacity', defaults.realtime.sendQueueCapacity),
            inboundQueueCapacity: pickNumber(realtime, 'inboundQueueCapacity', defaults.realtime.inboundQueueCapacity),
            writeWaitMs: pickNumber(realtime, 'writeWaitMs', defaults.realtime.writeWaitMs),
            pongWaitMs: pickNumber(realtime, 'pongWaitMs', defaults.realtime.pongWaitMs),
            maxMessageBytes: pickNumber(realtime, 'maxMessageBytes', defaults.realtime.maxMessageBytes),
            relayEnqueueTimeoutMs: pickNumber(realtime, 'relayEnqueueTimeoutMs', defaults.realtime.relayEnqueueTimeoutMs),
            maxInflightDispatches: pickNumber(realtime, 'maxInflightDispatches', defaults.realtime.maxInflightDispatches),
            typingTtlSeconds: pickNumber(realtime, 'typingTtlSeconds', defaults.realtime.typingTtlSeconds),
            typingSweepIntervalMs: pickNumber(realtime, 'typingSweepIntervalMs', defaults.realtime.typingSweepIntervalMs),
        },
    };
}

// ── Flat KV Adapter ─────────────────────────────────────────────────────────

let cachedConfig: ChatRelayConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): ChatRelayConfig {
    const configPath = getConfigPath();
    let config = mergeWithDefaults({});
    try {
        if (existsSync(configPath)) {
            config = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
        }
    } catch (error) {
        console.error(`[Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = config;
    return config;
}

const CONFIG_KEY_READERS: Record<string, (config: ChatRelayConfig) => string | number> = {
    API_PORT: (config) => config.runtime.apiPort,
    JWT_SECRET: (config) => config.runtime.jwtSecret,
    DATABASE_PATH: (config) => config.storage.databasePath,
    REDIS_URL: (config) => config.storage.redisUrl,
    SEND_QUEUE_CAPACITY: (config) => config.realtime.sendQueueCapacity,
    INBOUND_QUEUE_CAPACITY: (config) => config.realtime.inboundQueueCapacity,
    WRITE_WAIT_MS: (config) => config.realtime.writeWaitMs,
    PONG_WAIT_MS: (config) => config.realtime.pongWaitMs,
    MAX_MESSAGE_BYTES: (config) => config.realtime.maxMessageBytes,
    RELAY_ENQUEUE_TIMEOUT_MS: (config) => config.realtime.relayEnqueueTimeoutMs,
    MAX_INFLIGHT_DISPATCHES: (config) => config.realtime.maxInflightDispatches,
    TYPING_TTL_SECONDS: (config) => config.realtime.typingTtlSeconds,
    TYPING_SWEEP_INTERVAL_MS: (config) => config.realtime.typingSweepIntervalMs,
};

/**
 * Gets a configured value: a non-blank environment variable wins, then the
 * value mapped from `chat-relay.json` (merged over defaults).
 */
export function getConfigValue(key: string): string | undefined {
    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    const reader = CONFIG_KEY_READERS[key];
    if (!reader) return undefined;

    const config = cachedConfig ?? reloadConfigSync();
    const jsonValue = String(reader(config));
    return jsonValue.trim() !== '' ? jsonValue : undefined;
}

/** Numeric view of `getConfigValue`; non-positive or malformed values fall back. */
export function getNumericConfigValue(key: string, fallback: number): number {
    const raw = getConfigValue(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Resolved settings for one process, after env overrides. */
export interface RuntimeSettings {
    apiPort: number;
    jwtSecret: string;
    databasePath: string;
    redisUrl: string | null;
    realtime: RealtimeTuningConfig;
}

export function loadRuntimeSettings(): RuntimeSettings {
    const defaults = DEFAULT_CONFIG.realtime;
    return {
        apiPort: getNumericConfigValue('API_PORT', DEFAULT_CONFIG.runtime.apiPort),
        jwtSecret: getConfigValue('JWT_SECRET') ?? '',
        databasePath: getConfigValue('DATABASE_PATH') ?? DEFAULT_CONFIG.storage.databasePath,
        redisUrl: getConfigValue('REDIS_URL') ?? null,
        realtime: {
            sendQueueCapacity: getNumericConfigValue('SEND_QUEUE_CAPACITY', defaults.sendQueueCapacity),
            inboundQueueCapacity: getNumericConfigValue('INBOUND_QUEUE_CAPACITY', defaults.inboundQueueCapacity),
            writeWaitMs: getNumericConfigValue('WRITE_WAIT_MS', defaults.writeWaitMs),
            pongWaitMs: getNumericConfigValue('PONG_WAIT_MS', defaults.pongWaitMs),
            maxMessageBytes: getNumericConfigValue('MAX_MESSAGE_BYTES', defaults.maxMessageBytes),
            relayEnqueueTimeoutMs: getNumericConfigValue('RELAY_ENQUEUE_TIMEOUT_MS', defaults.relayEnqueueTimeoutMs),
            maxInflightDispatches: getNumericConfigValue('MAX_INFLIGHT_DISPATCHES', defaults.maxInflightDispatches),
            typingTtlSeconds: getNumericConfigValue('TYPING_TTL_SECONDS', defaults.typingTtlSeconds),
            typingSweepIntervalMs: getNumericConfigValue('TYPING_SWEEP_INTERVAL_MS', defaults.typingSweepIntervalMs),
        },
    };
}
