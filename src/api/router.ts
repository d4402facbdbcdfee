import { createServer } from 'node:http';
import type { Server } from 'node:http';
import express from 'express';
import type { Express } from 'express';
import { handleHealth, handleLiveness } from './handlers/health.js';
import { handleOnlineUsers } from './handlers/online.js';
import { errorHandler, requestLogger, sendError, sendOk } from './shared.js';
import { WsGateway } from './websocket-gateway.js';
import type { WsGatewayConfig } from './websocket-gateway.js';
import type { Router } from '../realtime/router.js';
import type { PresenceStore } from '../services/presence-store.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    router: Router;
    presence: PresenceStore;
    presenceBackend: 'redis' | 'memory';
    jwtSecret: string;
    /** 0 picks a free port. */
    port: number;
    host?: string;
    gateway?: WsGatewayConfig;
}

export interface ApiServerHandle {
    app: Express;
    server: Server;
    gateway: WsGateway;
    port: number;
    /** Stop accepting sockets and close the HTTP listener. */
    close(): Promise<void>;
}

/**
 * Build the express app.
 *
 * Endpoints:
 *   GET  /health            — Router diagnostics and presence reachability
 *   GET  /health/live       — Liveness probe
 *   GET  /realtime/online   — Online user ids (presence store, local fallback)
 */
export function createApiApp(deps: Pick<ApiServerDeps, 'router' | 'presence' | 'presenceBackend'>): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json());
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(deps));
    app.get('/health/live', handleLiveness());
    app.get('/realtime/online', handleOnlineUsers(deps));
    app.get('/realtime/stats', (_req, res) => {
        sendOk(res, deps.router.getStats());
    });

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });
    app.use(errorHandler);

    return app;
}

/** Create the HTTP server, attach the chat WebSocket gateway, and listen. */
export async function startApiServer(deps: ApiServerDeps): Promise<ApiServerHandle> {
    const app = createApiApp(deps);
    const server = createServer(app);
    const gateway = new WsGateway(
        { router: deps.router, presence: deps.presence, jwtSecret: deps.jwtSecret },
        deps.gateway,
    );
    gateway.attach(server);

    await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(deps.port, deps.host, () => {
            server.off('error', reject);
            resolve();
        });
    });

    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : deps.port;
    void logThought(`[API] HTTP server started on port ${port}.`);

    return {
        app,
        server,
        gateway,
        port,
        close: async () => {
            await gateway.stop();
            await new Promise<void>((resolve, reject) => {
                server.close((err) => (err ? reject(err) : resolve()));
            });
            void logThought('[API] HTTP server closed.');
        },
    };
}
