import { Redis } from 'ioredis';
import type { Envelope } from '../types/realtime.js';
import { logThought } from '../utils/logger.js';
import {
    DEFAULT_TYPING_TTL_SECONDS,
    decodeRelayPayload,
    toRelayEnvelope,
    type PresenceStore,
    type Subscription,
    type SubscriptionHandlers,
} from './presence-store.js';

const ONLINE_PREFIX = 'user:online:';
const TYPING_PREFIX = 'typing:';
const SCAN_COUNT = 100;

export interface RedisPresenceStoreOptions {
    url: string;
    typingTtlSeconds?: number;
}

class RedisSubscription implements Subscription {
    readonly topic: string;
    readonly #connection: Redis;
    #active = true;

    constructor(topic: string, connection: Redis) {
        this.topic = topic;
        this.#connection = connection;
    }

    get active(): boolean {
        return this.#active;
    }

    async stop(): Promise<void> {
        if (!this.#active) return;
        this.#active = false;
        try {
            await this.#connection.unsubscribe(this.topic);
            await this.#connection.quit();
        } catch {
            // connection already gone; make sure no reconnect is pending
            this.#connection.disconnect();
        }
    }

    /** Drop a subscription that never became live; no error is reported. */
    abandon(): void {
        this.#active = false;
        this.#connection.disconnect();
    }

    /** End the subscription after a broker error, exactly once. */
    fail(error: Error, handlers: SubscriptionHandlers): void {
        if (!this.#active) return;
        this.#active = false;
        this.#connection.disconnect();
        handlers.onError?.(error);
    }
}

/**
 * Presence store backed by Redis.
 *
 * Keys: `user:online:<id>` (no TTL) and `typing:<conversation>:<id>` (TTL).
 * Every subscription owns a duplicated connection, because a Redis
 * connection in subscriber mode cannot issue other commands.
 */
export class RedisPresenceStore implements PresenceStore {
    readonly #redis: Redis;
    readonly #typingTtlSeconds: number;
    readonly #subscriptions = new Set<RedisSubscription>();

    constructor(options: RedisPresenceStoreOptions) {
        this.#redis = new Redis(options.url, { maxRetriesPerRequest: 3 });
        this.#typingTtlSeconds = options.typingTtlSeconds ?? DEFAULT_TYPING_TTL_SECONDS;

        this.#redis.on('error', (err: Error) => {
            void logThought(`[RedisPresence] Connection error: ${err.message}`);
        });
    }

    /** Verify connectivity; throws when the server cannot be reached. */
    async ping(): Promise<void> {
        try {
            await this.#redis.ping();
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new Error(`Failed to connect to Redis: ${message}`);
        }
    }

    async setPresent(userId: number): Promise<void> {
        await this.#redis.set(`${ONLINE_PREFIX}${userId}`, '1');
    }

    async clearPresent(userId: number): Promise<void> {
        await this.#redis.del(`${ONLINE_PREFIX}${userId}`);
    }

    async isPresent(userId: number): Promise<boolean> {
        return (await this.#redis.exists(`${ONLINE_PREFIX}${userId}`)) > 0;
    }

    async listPresent(): Promise<number[]> {
        const keys = await this.#scan(`${ONLINE_PREFIX}*`);
        return parseUserIds(keys, ONLINE_PREFIX);
    }

    async setTyping(userId: number, conversationKey: string): Promise<void> {
        await this.#redis.set(typingKey(conversationKey, userId), '1', 'EX', this.#typingTtlSeconds);
    }

    async isTyping(conversationKey: string, userId: number): Promise<boolean> {
        return (await this.#redis.exists(typingKey(conversationKey, userId))) > 0;
    }

    async listTyping(conversationKey: string): Promise<number[]> {
        const prefix = `${TYPING_PREFIX}${conversationKey}:`;
        const keys = await this.#scan(`${prefix}*`);
        return parseUserIds(keys, prefix);
    }

    /**
     * Redis expires typing markers itself; this only removes markers that
     * lost their TTL (written by an older client, or PERSISTed by hand).
     */
    async sweepExpiredTyping(): Promise<number> {
        const keys = await this.#scan(`${TYPING_PREFIX}*`);
        const stale: string[] = [];
        for (const key of keys) {
            if ((await this.#redis.ttl(key)) === -1) {
                stale.push(key);
            }
        }
        if (stale.length === 0) return 0;
        return this.#redis.del(...stale);
    }

    async publish(topic: string, envelope: Envelope): Promise<void> {
        await this.#redis.publish(topic, JSON.stringify(toRelayEnvelope(envelope)));
    }

    async subscribe(topic: string, handlers: SubscriptionHandlers): Promise<Subscription> {
        // No reconnect: a dropped subscriber ends, and the next socket upgrade subscribes afresh.
        const connection = this.#redis.duplicate({ retryStrategy: () => null });
        const subscription = new RedisSubscription(topic, connection);

        connection.on('message', (channel: string, payload: string) => {
            if (channel !== topic || !subscription.active) return;
            const envelope = decodeRelayPayload(payload);
            if (!envelope) {
                void logThought(`[RedisPresence] Dropped undecodable payload on ${topic}.`);
                return;
            }
            handlers.onMessage(envelope);
        });
        connection.on('error', (err: Error) => {
            this.#subscriptions.delete(subscription);
            subscription.fail(err, handlers);
        });
        connection.on('end', () => {
            this.#subscriptions.delete(subscription);
            subscription.fail(new Error(`Subscriber connection for ${topic} ended.`), handlers);
        });

        try {
            await connection.subscribe(topic);
        } catch (err) {
            subscription.abandon();
            throw err;
        }

        this.#subscriptions.add(subscription);
        return {
            topic,
            get active() {
                return subscription.active;
            },
            stop: async () => {
                this.#subscriptions.delete(subscription);
                await subscription.stop();
            },
        };
    }

    async close(): Promise<void> {
        for (const subscription of [...this.#subscriptions]) {
            await subscription.stop();
        }
        this.#subscriptions.clear();
        await this.#redis.quit();
    }

    async #scan(pattern: string): Promise<string[]> {
        const found: string[] = [];
        let cursor = '0';
        do {
            const [next, keys] = await this.#redis.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
            found.push(...keys);
            cursor = next;
        } while (cursor !== '0');
        return found;
    }
}

function typingKey(conversationKey: string, userId: number): string {
    return `${TYPING_PREFIX}${conversationKey}:${userId}`;
}

function parseUserIds(keys: string[], prefix: string): number[] {
    const ids = new Set<number>();
    for (const key of keys) {
        const id = Number(key.slice(prefix.length));
        if (Number.isInteger(id) && id > 0) ids.add(id);
    }
    return [...ids].sort((a, b) => a - b);
}
