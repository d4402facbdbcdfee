import { EventEmitter } from 'node:events';
import type { Envelope, RelayEnvelope } from '../types/realtime.js';
import { toEnvelope } from '../realtime/envelope.js';

export const DEFAULT_TYPING_TTL_SECONDS = 10;

/** Per-user relay topic. */
export function userTopic(userId: number): string {
    return `ws:user:${userId}`;
}

/** Presence-changed notifications, consumed by every instance. */
export const PRESENCE_TOPIC = 'ws:presence';

export interface SubscriptionHandlers {
    onMessage: (envelope: Envelope) => void;
    /** Called at most once; the subscription is already over when it runs. */
    onError?: (error: Error) => void;
}

export interface Subscription {
    readonly topic: string;
    readonly active: boolean;
    /** Idempotent. */
    stop(): Promise<void>;
}

/**
 * Shared presence, typing and relay backend.
 *
 * Presence markers have no expiry and must be cleared explicitly; typing
 * markers expire on their own. Pub/sub is at-most-once with no replay.
 */
export interface PresenceStore {
    setPresent(userId: number): Promise<void>;
    clearPresent(userId: number): Promise<void>;
    isPresent(userId: number): Promise<boolean>;
    listPresent(): Promise<number[]>;

    setTyping(userId: number, conversationKey: string): Promise<void>;
    isTyping(conversationKey: string, userId: number): Promise<boolean>;
    listTyping(conversationKey: string): Promise<number[]>;
    /** Remove expired or TTL-less typing markers. Returns how many went. */
    sweepExpiredTyping(): Promise<number>;

    publish(topic: string, envelope: Envelope): Promise<void>;
    subscribe(topic: string, handlers: SubscriptionHandlers): Promise<Subscription>;

    close(): Promise<void>;
}

/** Build the pub/sub wire payload. */
export function toRelayEnvelope(envelope: Envelope, now: () => number = Date.now): RelayEnvelope {
    return {
        event: envelope.event,
        data: envelope.data,
        timestamp: Math.floor(now() / 1000),
    };
}

/** Decode a pub/sub payload; null for anything that is not a valid envelope. */
export function decodeRelayPayload(payload: string): Envelope | null {
    try {
        return toEnvelope(JSON.parse(payload));
    } catch {
        return null;
    }
}

// ── In-memory implementation ───────────────────────────────────────────────────

export interface InMemoryPresenceStoreOptions {
    typingTtlSeconds?: number;
    now?: () => number;
}

class InMemorySubscription implements Subscription {
    readonly topic: string;
    #active = true;
    readonly #detach: () => void;

    constructor(topic: string, detach: () => void) {
        this.topic = topic;
        this.#detach = detach;
    }

    get active(): boolean {
        return this.#active;
    }

    async stop(): Promise<void> {
        if (!this.#active) return;
        this.#active = false;
        this.#detach();
    }

    /** Simulate a broker-side failure. */
    fail(error: Error, onError?: (error: Error) => void): void {
        if (!this.#active) return;
        this.#active = false;
        this.#detach();
        onError?.(error);
    }
}

/**
 * Process-local presence store. Several Routers sharing one instance behave
 * like several server instances sharing one broker.
 */
export class InMemoryPresenceStore implements PresenceStore {
    readonly #present = new Set<number>();
    /** `typing:<conversationKey>:<userId>` → expiry (ms epoch). */
    readonly #typing = new Map<string, number>();
    readonly #bus = new EventEmitter();
    readonly #subscriptions = new Set<{ sub: InMemorySubscription; handlers: SubscriptionHandlers }>();
    readonly #typingTtlMs: number;
    readonly #now: () => number;
    #closed = false;

    constructor(options: InMemoryPresenceStoreOptions = {}) {
        this.#typingTtlMs = (options.typingTtlSeconds ?? DEFAULT_TYPING_TTL_SECONDS) * 1000;
        this.#now = options.now ?? (() => Date.now());
        this.#bus.setMaxListeners(0);
    }

    async setPresent(userId: number): Promise<void> {
        this.#assertOpen();
        this.#present.add(userId);
    }

    async clearPresent(userId: number): Promise<void> {
        this.#assertOpen();
        this.#present.delete(userId);
    }

    async isPresent(userId: number): Promise<boolean> {
        this.#assertOpen();
        return this.#present.has(userId);
    }

    async listPresent(): Promise<number[]> {
        this.#assertOpen();
        return [...this.#present].sort((a, b) => a - b);
    }

    async setTyping(userId: number, conversationKey: string): Promise<void> {
        this.#assertOpen();
        this.#typing.set(typingKey(conversationKey, userId), this.#now() + this.#typingTtlMs);
    }

    async isTyping(conversationKey: string, userId: number): Promise<boolean> {
        this.#assertOpen();
        const expiresAt = this.#typing.get(typingKey(conversationKey, userId));
        return expiresAt !== undefined && expiresAt > this.#now();
    }

    async listTyping(conversationKey: string): Promise<number[]> {
        this.#assertOpen();
        const prefix = `typing:${conversationKey}:`;
        const now = this.#now();
        const users: number[] = [];
        for (const [key, expiresAt] of this.#typing) {
            if (!key.startsWith(prefix) || expiresAt <= now) continue;
            const userId = Number(key.slice(prefix.length));
            if (Number.isInteger(userId)) users.push(userId);
        }
        return users.sort((a, b) => a - b);
    }

    async sweepExpiredTyping(): Promise<number> {
        this.#assertOpen();
        const now = this.#now();
        let removed = 0;
        for (const [key, expiresAt] of this.#typing) {
            if (expiresAt <= now) {
                this.#typing.delete(key);
                removed++;
            }
        }
        return removed;
    }

    async publish(topic: string, envelope: Envelope): Promise<void> {
        this.#assertOpen();
        // Serialize like a real broker so subscribers never share object references.
        const payload = JSON.stringify(toRelayEnvelope(envelope, this.#now));
        this.#bus.emit(topic, payload);
    }

    async subscribe(topic: string, handlers: SubscriptionHandlers): Promise<Subscription> {
        this.#assertOpen();

        const listener = (payload: string): void => {
            const decoded = decodeRelayPayload(payload);
            if (decoded) handlers.onMessage(decoded);
        };

        const entry = {
            sub: new InMemorySubscription(topic, () => {
                this.#bus.off(topic, listener);
                this.#subscriptions.delete(entry);
            }),
            handlers,
        };

        this.#bus.on(topic, listener);
        this.#subscriptions.add(entry);
        return entry.sub;
    }

    /** Number of live subscriptions on a topic. */
    subscriberCount(topic: string): number {
        return this.#bus.listenerCount(topic);
    }

    /** Terminate every live subscription as if the broker connection dropped. */
    simulateDisconnect(error: Error = new Error('Connection lost.')): void {
        for (const { sub, handlers } of [...this.#subscriptions]) {
            sub.fail(error, handlers.onError);
        }
    }

    async close(): Promise<void> {
        if (this.#closed) return;
        for (const { sub } of [...this.#subscriptions]) {
            await sub.stop();
        }
        this.#closed = true;
    }

    #assertOpen(): void {
        if (this.#closed) {
            throw new Error('Presence store is closed.');
        }
    }
}

function typingKey(conversationKey: string, userId: number): string {
    return `typing:${conversationKey}:${userId}`;
}
