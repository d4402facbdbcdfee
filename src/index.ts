import 'dotenv/config';
import { assertRuntimeConfig } from './config/env-validator.js';
import { loadRuntimeSettings } from './config/json-config.js';
import { startApiServer } from './api/router.js';
import type { ApiServerHandle } from './api/router.js';
import { Router } from './realtime/router.js';
import { ChatStore } from './services/chat-store.js';
import { InMemoryPresenceStore } from './services/presence-store.js';
import type { PresenceStore } from './services/presence-store.js';
import { RedisPresenceStore } from './services/redis-presence-store.js';
import { logThought } from './utils/logger.js';

// ── Preflight ────────────────────────────────────────────────────────────────

try {
    const preflight = assertRuntimeConfig();
    if (preflight.activeFeatures.length > 0) {
        void logThought(`[ChatRelay] Active features: ${preflight.activeFeatures.join(', ')}`);
    }
} catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ChatRelay] Startup blocked by config preflight: ${message}`);
    process.exit(1);
}

const settings = loadRuntimeSettings();

// ── Storage & Presence ───────────────────────────────────────────────────────

const chatStore = new ChatStore({ databasePath: settings.databasePath });

async function createPresenceStore(): Promise<PresenceStore> {
    if (!settings.redisUrl) {
        void logThought('[ChatRelay] REDIS_URL not set; presence and relay stay in-process.');
        return new InMemoryPresenceStore({ typingTtlSeconds: settings.realtime.typingTtlSeconds });
    }

    const store = new RedisPresenceStore({
        url: settings.redisUrl,
        typingTtlSeconds: settings.realtime.typingTtlSeconds,
    });
    await store.ping();
    void logThought('[ChatRelay] Connected to Redis.');
    return store;
}

// ── Start ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    const presence = await createPresenceStore();
    const router = new Router(
        { repository: chatStore, presence },
        {
            inboundQueueCapacity: settings.realtime.inboundQueueCapacity,
            typingSweepIntervalMs: settings.realtime.typingSweepIntervalMs,
        },
    );
    await router.start();

    const api: ApiServerHandle = await startApiServer({
        router,
        presence,
        presenceBackend: settings.redisUrl ? 'redis' : 'memory',
        jwtSecret: settings.jwtSecret,
        port: settings.apiPort,
        gateway: {
            maxMessageBytes: settings.realtime.maxMessageBytes,
            connection: {
                sendQueueCapacity: settings.realtime.sendQueueCapacity,
                writeWaitMs: settings.realtime.writeWaitMs,
                pongWaitMs: settings.realtime.pongWaitMs,
                pingPeriodMs: (settings.realtime.pongWaitMs * 9) / 10,
                relayEnqueueTimeoutMs: settings.realtime.relayEnqueueTimeoutMs,
                maxInflightDispatches: settings.realtime.maxInflightDispatches,
            },
        },
    });
    console.log(`[ChatRelay] Listening on http://localhost:${api.port} (WebSocket: /ws)`);

    // ── Graceful Shutdown ───────────────────────────────────────────────────
    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        await logThought(`[ChatRelay] Received ${signal}; shutting down.`);

        // New sockets stop first; the Router then evicts the live ones, which
        // lets the gateway's wait for closed connections finish.
        api.gateway.detach();
        await router.stop();
        await api.close();
        await presence.close();
        chatStore.close();
        process.exit(0);
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.on(signal, () => {
            shutdown(signal).catch((err: unknown) => {
                console.error('[ChatRelay] Shutdown failed:', err);
                process.exit(1);
            });
        });
    }
}

main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[ChatRelay] Failed to start: ${message}`);
    process.exit(1);
});
