import { randomUUID } from 'node:crypto';
import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { logThought } from '../utils/logger.js';
import { BoundedQueue } from './bounded-queue.js';
import { decodeEnvelope, encodeEnvelope } from './envelope.js';
import { userTopic } from '../services/presence-store.js';
import type { PresenceStore, Subscription } from '../services/presence-store.js';
import type { EvictionReason, RoutedConnection } from './router.js';
import type { Envelope, UserIdentity } from '../types/realtime.js';
import { ChatCloseCode } from '../types/realtime.js';

// ── Constants ──────────────────────────────────────────────────────────────────

export const DEFAULT_SEND_QUEUE_CAPACITY = 256;
export const DEFAULT_WRITE_WAIT_MS = 10_000;
export const DEFAULT_PONG_WAIT_MS = 60_000;
/** Must stay below the pong wait so a healthy peer never hits the read deadline. */
export const DEFAULT_PING_PERIOD_MS = (DEFAULT_PONG_WAIT_MS * 9) / 10;
export const DEFAULT_MAX_MESSAGE_BYTES = 512 * 1024;
export const DEFAULT_RELAY_ENQUEUE_TIMEOUT_MS = 1_000;
export const DEFAULT_MAX_INFLIGHT_DISPATCHES = 8;

// ── Config ─────────────────────────────────────────────────────────────────────

export interface ConnectionConfig {
    sendQueueCapacity?: number;
    writeWaitMs?: number;
    pongWaitMs?: number;
    pingPeriodMs?: number;
    relayEnqueueTimeoutMs?: number;
    /** Dispatches awaiting the Router before the socket stops reading. */
    maxInflightDispatches?: number;
}

/** The slice of the Router a socket drives. */
export interface ConnectionRouter {
    dispatch(envelope: Envelope, sender: UserIdentity): Promise<void>;
    unregister(connection: RoutedConnection): Promise<void>;
}

export type ConnectionState = 'connecting' | 'registered' | 'unregistering' | 'closed';

// ── Connection ─────────────────────────────────────────────────────────────────

/**
 * One authenticated WebSocket and its outbound queue.
 *
 * The reader forwards decoded envelopes to the Router in arrival order. The
 * writer is the only code that writes data frames; it coalesces whatever is
 * queued into one newline-joined frame. A per-user relay subscription feeds
 * messages published by other instances into the same queue.
 */
export class Connection implements RoutedConnection {
    readonly id: string = randomUUID();
    readonly identity: UserIdentity;

    readonly #ws: WebSocket;
    readonly #router: ConnectionRouter;
    readonly #presence: PresenceStore;
    readonly #config: Required<ConnectionConfig>;
    readonly #outbound: BoundedQueue<string>;
    readonly #subscriberStop = new AbortController();
    #subscription: Subscription | null = null;
    #state: ConnectionState = 'connecting';
    #started = false;
    /** Frames that arrived before `start()`. */
    readonly #early: RawData[] = [];
    /** Decoded envelopes waiting for a dispatch slot. */
    readonly #backlog: Envelope[] = [];
    #inflight = 0;
    #paused = false;

    #readDeadline: ReturnType<typeof setTimeout> | null = null;
    #pingTimer: ReturnType<typeof setInterval> | null = null;
    #wroteSinceTick = false;
    #heardSinceTick = false;

    #closeCode: number = ChatCloseCode.Normal;
    #closeReason = '';

    readonly #closed: Promise<void>;
    #resolveClosed: () => void = () => undefined;

    constructor(
        ws: WebSocket,
        identity: UserIdentity,
        deps: { router: ConnectionRouter; presence: PresenceStore },
        config: ConnectionConfig = {},
    ) {
        this.#ws = ws;
        this.identity = identity;
        this.#router = deps.router;
        this.#presence = deps.presence;
        this.#config = {
            sendQueueCapacity: config.sendQueueCapacity ?? DEFAULT_SEND_QUEUE_CAPACITY,
            writeWaitMs: config.writeWaitMs ?? DEFAULT_WRITE_WAIT_MS,
            pongWaitMs: config.pongWaitMs ?? DEFAULT_PONG_WAIT_MS,
            pingPeriodMs: config.pingPeriodMs ?? DEFAULT_PING_PERIOD_MS,
            relayEnqueueTimeoutMs: config.relayEnqueueTimeoutMs ?? DEFAULT_RELAY_ENQUEUE_TIMEOUT_MS,
            maxInflightDispatches: Math.max(1, config.maxInflightDispatches ?? DEFAULT_MAX_INFLIGHT_DISPATCHES),
        };
        this.#outbound = new BoundedQueue<string>(this.#config.sendQueueCapacity);
        this.#closed = new Promise<void>((resolve) => {
            this.#resolveClosed = resolve;
        });

        // The socket reads as soon as the upgrade completes, before registration.
        this.#ws.on('message', (data: RawData) => {
            if (this.#started) {
                this.#onFrame(data);
            } else {
                this.#early.push(data);
            }
        });
        this.#ws.on('error', (err: Error) => {
            void logThought(`[Connection] Socket error for user ${this.identity.userId}: ${err.message}`);
        });
    }

    get state(): ConnectionState {
        return this.#state;
    }

    /** Settles once the socket is gone and every loop has exited. */
    whenClosed(): Promise<void> {
        return this.#closed;
    }

    // ── Lifecycle ──────────────────────────────────────────────────────────────

    /**
     * Start the reader, the writer, the keepalive timer and the relay
     * subscription. Call after the Router has registered this connection.
     */
    async start(): Promise<void> {
        if (this.#started) return;
        this.#started = true;

        this.#ws.on('pong', () => this.#onInbound());
        this.#ws.on('close', () => {
            void this.#teardown();
        });

        this.#armReadDeadline();
        for (const raw of this.#early.splice(0)) {
            this.#onFrame(raw);
        }
        this.#pingTimer = setInterval(() => this.#keepalive(), this.#config.pingPeriodMs);

        const writer = this.#writeLoop();
        void writer.then(() => this.stopSubscription());

        await this.#startSubscriber();

        if (this.#ws.readyState !== WebSocket.OPEN) {
            await this.#teardown();
        }
    }

    markRegistered(): void {
        if (this.#state === 'connecting') {
            this.#state = 'registered';
        }
    }

    enqueue(frame: string): boolean {
        return this.#outbound.offer(frame);
    }

    closeOutbound(): void {
        this.#outbound.close();
    }

    evict(reason: EvictionReason): void {
        if (reason === 'replaced') {
            this.#closeCode = ChatCloseCode.Replaced;
            this.#closeReason = 'Replaced by a newer connection.';
        } else {
            this.#closeCode = ChatCloseCode.ServerShutdown;
            this.#closeReason = 'Server shutting down.';
        }
        this.#outbound.close();
        void this.stopSubscription();
    }

    /** Idempotent; separate from closing the outbound queue. */
    async stopSubscription(): Promise<void> {
        if (!this.#subscriberStop.signal.aborted) {
            this.#subscriberStop.abort();
        }

        const subscription = this.#subscription;
        this.#subscription = null;
        if (!subscription) return;

        try {
            await subscription.stop();
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Connection] Failed to stop relay for user ${this.identity.userId}: ${message}`);
        }
    }

    // ── Reader ─────────────────────────────────────────────────────────────────

    #onFrame(raw: RawData): void {
        this.#onInbound();

        let envelope: Envelope;
        try {
            envelope = decodeEnvelope(rawDataToString(raw));
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Connection] Undecodable frame from user ${this.identity.userId}: ${message}`);
            return;
        }

        const stamped: Envelope = {
            event: envelope.event,
            data: {
                ...envelope.data,
                sender_id: this.identity.userId,
                sender_username: this.identity.username,
            },
        };

        this.#backlog.push(stamped);
        this.#pump();
    }

    /**
     * Hand backlog envelopes to the Router, at most `maxInflightDispatches` at
     * a time. The socket is paused while the backlog is non-empty.
     */
    #pump(): void {
        while (this.#inflight < this.#config.maxInflightDispatches && this.#backlog.length > 0) {
            const envelope = this.#backlog.shift();
            if (!envelope) break;
            this.#inflight++;
            void this.#router
                .dispatch(envelope, this.identity)
                .catch((err: unknown) => {
                    const message = err instanceof Error ? err.message : String(err);
                    void logThought(`[Connection] Dispatch failed for user ${this.identity.userId}: ${message}`);
                })
                .finally(() => {
                    this.#inflight--;
                    if (this.#state === 'connecting' || this.#state === 'registered') {
                        this.#pump();
                    }
                });
        }

        if (this.#backlog.length > 0 && !this.#paused) {
            this.#paused = true;
            this.#ws.pause();
        } else if (this.#backlog.length === 0 && this.#paused) {
            this.#paused = false;
            this.#ws.resume();
        }
    }

    #onInbound(): void {
        this.#heardSinceTick = true;
        this.#armReadDeadline();
    }

    #armReadDeadline(): void {
        if (this.#readDeadline) clearTimeout(this.#readDeadline);
        this.#readDeadline = setTimeout(() => {
            void logThought(`[Connection] User ${this.identity.userId} missed the read deadline; terminating.`);
            this.#ws.terminate();
        }, this.#config.pongWaitMs);
    }

    /** Reader exit path: runs once, whatever ended the socket. */
    async #teardown(): Promise<void> {
        if (this.#state === 'unregistering' || this.#state === 'closed') return;
        this.#state = 'unregistering';
        this.#clearTimers();
        this.#backlog.length = 0;

        await this.#router.unregister(this);
        this.#outbound.close();
        await this.stopSubscription();

        if (this.#ws.readyState !== WebSocket.CLOSED) {
            this.#ws.terminate();
        }

        this.#state = 'closed';
        this.#resolveClosed();
    }

    #clearTimers(): void {
        if (this.#readDeadline) {
            clearTimeout(this.#readDeadline);
            this.#readDeadline = null;
        }
        if (this.#pingTimer) {
            clearInterval(this.#pingTimer);
            this.#pingTimer = null;
        }
    }

    // ── Writer ─────────────────────────────────────────────────────────────────

    async #writeLoop(): Promise<void> {
        for (;;) {
            const first = await this.#outbound.take();
            if (first === undefined) {
                if (this.#ws.readyState === WebSocket.OPEN) {
                    this.#ws.close(this.#closeCode, this.#closeReason);
                }
                return;
            }

            const frame = [first, ...this.#outbound.drain()].join('\n');
            try {
                await this.#write(frame);
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                void logThought(`[Connection] Write failed for user ${this.identity.userId}: ${message}`);
                this.#outbound.close();
                this.#ws.terminate();
                return;
            }
        }
    }

    #write(frame: string): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (this.#ws.readyState !== WebSocket.OPEN) {
                reject(new Error('socket is not open'));
                return;
            }

            const timer = setTimeout(() => {
                reject(new Error(`write exceeded ${this.#config.writeWaitMs}ms`));
            }, this.#config.writeWaitMs);

            this.#ws.send(frame, (err) => {
                clearTimeout(timer);
                if (err) {
                    reject(err);
                    return;
                }
                this.#wroteSinceTick = true;
                resolve();
            });
        });
    }

    // ── Keepalive ──────────────────────────────────────────────────────────────

    #keepalive(): void {
        const busy = this.#wroteSinceTick && this.#heardSinceTick;
        this.#wroteSinceTick = false;
        this.#heardSinceTick = false;
        if (busy || this.#ws.readyState !== WebSocket.OPEN) return;

        this.#ws.ping(undefined, undefined, (err) => {
            if (!err) return;
            void logThought(`[Connection] Ping failed for user ${this.identity.userId}: ${err.message}`);
            this.#outbound.close();
            this.#ws.terminate();
        });
    }

    // ── Relay Subscription ─────────────────────────────────────────────────────

    async #startSubscriber(): Promise<void> {
        if (this.#subscriberStop.signal.aborted) return;

        let subscription: Subscription;
        try {
            subscription = await this.#presence.subscribe(userTopic(this.identity.userId), {
                onMessage: (envelope) => {
                    void this.#relay(envelope);
                },
                onError: (error) => {
                    void logThought(`[Connection] Relay for user ${this.identity.userId} ended: ${error.message}`);
                },
            });
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Connection] Relay subscribe failed for user ${this.identity.userId}: ${message}`);
            return;
        }

        if (this.#subscriberStop.signal.aborted) {
            await subscription.stop();
            return;
        }
        this.#subscription = subscription;
    }

    async #relay(envelope: Envelope): Promise<void> {
        if (this.#subscriberStop.signal.aborted) return;

        const accepted = await this.#outbound.put(
            encodeEnvelope(envelope.event, envelope.data),
            this.#config.relayEnqueueTimeoutMs,
        );
        if (!accepted && !this.#outbound.closed) {
            void logThought(`[Connection] Outbound queue full for user ${this.identity.userId}; relayed ${envelope.event} dropped.`);
        }
    }
}

function rawDataToString(raw: RawData): string {
    if (Buffer.isBuffer(raw)) return raw.toString('utf8');
    if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
    return Buffer.from(raw).toString('utf8');
}
