import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, WebSocket } from 'ws';
import { logThought } from '../utils/logger.js';
import { AccessTokenError, verifyAccessToken } from '../auth/access-token.js';
import { Connection, DEFAULT_MAX_MESSAGE_BYTES } from '../realtime/connection.js';
import type { ConnectionConfig } from '../realtime/connection.js';
import type { Router } from '../realtime/router.js';
import type { PresenceStore } from '../services/presence-store.js';
import type { UserIdentity } from '../types/realtime.js';
import { ChatCloseCode } from '../types/realtime.js';

// ── Config ─────────────────────────────────────────────────────────────────────

export interface WsGatewayConfig {
    path?: string;
    /** Largest inbound frame; larger frames close the socket with 1009. */
    maxMessageBytes?: number;
    connection?: ConnectionConfig;
}

export interface WsGatewayDeps {
    router: Router;
    presence: PresenceStore;
    jwtSecret: string;
}

// ── WsGateway ──────────────────────────────────────────────────────────────────

/**
 * Accepts chat sockets on `/ws?token=<jwt>`.
 *
 * The token is checked during the HTTP upgrade, so an unauthenticated client
 * gets a 401 response and never becomes a WebSocket. Accepted sockets are
 * wrapped in a `Connection`, registered with the Router, then started.
 */
export class WsGateway {
    readonly #deps: WsGatewayDeps;
    readonly #path: string;
    readonly #maxMessageBytes: number;
    readonly #connectionConfig: ConnectionConfig;
    readonly #connections: Set<Connection> = new Set();
    #wss: WebSocketServer | null = null;
    #server: Server | null = null;

    readonly #onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
        this.#handleUpgrade(req, socket, head);
    };

    constructor(deps: WsGatewayDeps, config: WsGatewayConfig = {}) {
        this.#deps = deps;
        this.#path = config.path ?? '/ws';
        this.#maxMessageBytes = config.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
        this.#connectionConfig = config.connection ?? {};
    }

    get connectionCount(): number {
        return this.#connections.size;
    }

    // ── Lifecycle ──────────────────────────────────────────────────────────────

    /** Must be called before the HTTP server starts accepting connections. */
    attach(server: Server): void {
        this.#wss = new WebSocketServer({ noServer: true, maxPayload: this.#maxMessageBytes });
        this.#server = server;
        server.on('upgrade', this.#onUpgrade);
        void logThought(`[WsGateway] Chat sockets attached on ${this.#path}.`);
    }

    /**
     * Stop taking new upgrades without waiting for live sockets. Upgrades
     * already in progress still reach the Router, which refuses them once it
     * is stopping.
     */
    detach(): void {
        this.#server?.off('upgrade', this.#onUpgrade);
        this.#server = null;
    }

    /** Stop accepting sockets. Live connections are ended by `Router.stop()`. */
    async stop(): Promise<void> {
        this.detach();

        const wss = this.#wss;
        this.#wss = null;
        if (wss) {
            await new Promise<void>((resolve) => {
                wss.close(() => resolve());
            });
        }

        await Promise.all([...this.#connections].map((connection) => connection.whenClosed()));
        void logThought('[WsGateway] Stopped.');
    }

    // ── Upgrade ────────────────────────────────────────────────────────────────

    #handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
        const wss = this.#wss;
        const url = new URL(req.url ?? '/', 'http://localhost');

        if (!wss || url.pathname !== this.#path) {
            rejectUpgrade(socket, 404, 'Not Found', 'not found');
            return;
        }

        const identity = this.#authenticate(req, url);
        if (!identity) {
            rejectUpgrade(socket, 401, 'Unauthorized', 'unauthorized');
            return;
        }

        wss.handleUpgrade(req, socket, head, (ws: WebSocket) => {
            void this.#accept(ws, identity);
        });
    }

    #authenticate(req: IncomingMessage, url: URL): UserIdentity | null {
        const header = req.headers.authorization;
        const bearer = typeof header === 'string' && header.startsWith('Bearer ')
            ? header.slice('Bearer '.length)
            : null;
        const token = url.searchParams.get('token') ?? bearer;

        if (!token) {
            void logThought('[WsGateway] Upgrade rejected: no token.');
            return null;
        }

        try {
            const claims = verifyAccessToken(token, this.#deps.jwtSecret);
            return { userId: claims.userId, username: claims.username };
        } catch (err) {
            const reason = err instanceof AccessTokenError ? err.code : 'verification_failed';
            void logThought(`[WsGateway] Upgrade rejected: ${reason}.`);
            return null;
        }
    }

    async #accept(ws: WebSocket, identity: UserIdentity): Promise<void> {
        const connection = new Connection(
            ws,
            identity,
            { router: this.#deps.router, presence: this.#deps.presence },
            this.#connectionConfig,
        );
        this.#connections.add(connection);
        void connection.whenClosed().then(() => {
            this.#connections.delete(connection);
        });

        try {
            const registered = await this.#deps.router.register(connection);
            if (!registered) {
                void logThought(`[WsGateway] Router is stopping; closing new socket for user ${identity.userId}.`);
                this.#connections.delete(connection);
                ws.close(ChatCloseCode.ServerShutdown, 'Server shutting down.');
                return;
            }
            await connection.start();
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[WsGateway] Failed to start connection for user ${identity.userId}: ${message}`);
            this.#connections.delete(connection);
            ws.terminate();
        }
    }
}

function rejectUpgrade(socket: Duplex, status: number, statusText: string, error: string): void {
    const body = JSON.stringify({ ok: false, error, timestamp: new Date().toISOString() });
    socket.end(
        `HTTP/1.1 ${status} ${statusText}\r\n` +
        'Connection: close\r\n' +
        'Content-Type: application/json\r\n' +
        `Content-Length: ${Buffer.byteLength(body)}\r\n` +
        '\r\n' +
        body,
    );
}
