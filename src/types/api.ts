import type { RouterStats } from './realtime.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    presence: {
        backend: 'redis' | 'memory';
        reachable: boolean;
    };
    realtime: RouterStats;
}

// ── Realtime ────────────────────────────────────────────────────────────────

export interface OnlineUsersData {
    status: 'ok' | 'degraded';
    /** `presence` is cluster-wide; `local` covers this instance only. */
    source: 'presence' | 'local';
    users: number[];
}
