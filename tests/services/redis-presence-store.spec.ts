import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Envelope } from '../../src/types/realtime.js';

// ── Mocks ──────────────────────────────────────────────────────────────────────

const fake = vi.hoisted(() => {
    type Listener = (...args: unknown[]) => void;

    interface StoredKey {
        value: string;
        ttlSeconds: number | null;
    }

    const keys = new Map<string, StoredKey>();
    const instances: FakeRedis[] = [];
    const published: Array<{ channel: string; payload: string }> = [];
    const control: { pingError: Error | null; subscribeError: Error | null } = { pingError: null, subscribeError: null };

    function globToRegExp(pattern: string): RegExp {
        const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
        return new RegExp(`^${escaped}$`);
    }

    /** Single-process stand-in for an ioredis client; every instance shares one keyspace. */
    class FakeRedis {
        readonly url: string;
        readonly options: Record<string, unknown>;
        readonly channels = new Set<string>();
        readonly #listeners = new Map<string, Listener[]>();
        quitCalls = 0;
        disconnected = false;

        constructor(url: string, options: Record<string, unknown> = {}) {
            this.url = url;
            this.options = options;
            instances.push(this);
        }

        on(event: string, listener: Listener): this {
            const list = this.#listeners.get(event) ?? [];
            list.push(listener);
            this.#listeners.set(event, list);
            return this;
        }

        emit(event: string, ...args: unknown[]): void {
            for (const listener of this.#listeners.get(event) ?? []) {
                listener(...args);
            }
        }

        async ping(): Promise<string> {
            if (control.pingError) throw control.pingError;
            return 'PONG';
        }

        async set(key: string, value: string, mode?: string, ttl?: number): Promise<'OK'> {
            keys.set(key, { value, ttlSeconds: mode === 'EX' && ttl !== undefined ? ttl : null });
            return 'OK';
        }

        async del(...names: string[]): Promise<number> {
            let removed = 0;
            for (const name of names) {
                if (keys.delete(name)) removed++;
            }
            return removed;
        }

        async exists(key: string): Promise<number> {
            return keys.has(key) ? 1 : 0;
        }

        async ttl(key: string): Promise<number> {
            const entry = keys.get(key);
            if (!entry) return -2;
            return entry.ttlSeconds ?? -1;
        }

        /** Always answers in two pages so callers must follow the cursor. */
        async scan(cursor: string, _match: string, pattern: string): Promise<[string, string[]]> {
            const matcher = globToRegExp(pattern);
            const matching = [...keys.keys()].filter((key) => matcher.test(key)).sort();
            const half = Math.ceil(matching.length / 2);
            return cursor === '0' ? ['1', matching.slice(0, half)] : ['0', matching.slice(half)];
        }

        async publish(channel: string, payload: string): Promise<number> {
            published.push({ channel, payload });
            let receivers = 0;
            for (const instance of instances) {
                if (!instance.channels.has(channel)) continue;
                receivers++;
                instance.emit('message', channel, payload);
            }
            return receivers;
        }

        duplicate(options: Record<string, unknown> = {}): FakeRedis {
            return new FakeRedis(this.url, { ...this.options, ...options });
        }

        async subscribe(channel: string): Promise<number> {
            if (control.subscribeError) throw control.subscribeError;
            this.channels.add(channel);
            return this.channels.size;
        }

        async unsubscribe(channel: string): Promise<number> {
            this.channels.delete(channel);
            return this.channels.size;
        }

        async quit(): Promise<'OK'> {
            this.quitCalls++;
            this.channels.clear();
            return 'OK';
        }

        /** Like ioredis, a manual disconnect still ends with an 'end' event. */
        disconnect(): void {
            this.disconnected = true;
            this.channels.clear();
            this.emit('end');
        }
    }

    function reset(): void {
        keys.clear();
        instances.length = 0;
        published.length = 0;
        control.pingError = null;
        control.subscribeError = null;
    }

    return { FakeRedis, keys, instances, published, control, reset };
});

vi.mock('ioredis', () => ({ Redis: fake.FakeRedis }));

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn(),
}));

import { RedisPresenceStore } from '../../src/services/redis-presence-store.js';

// ── Tests ──────────────────────────────────────────────────────────────────────

describe('RedisPresenceStore', () => {
    let store: RedisPresenceStore;

    beforeEach(() => {
        fake.reset();
        store = new RedisPresenceStore({ url: 'redis://localhost:6379', typingTtlSeconds: 10 });
    });

    it('connects with bounded per-request retries', () => {
        expect(fake.instances).toHaveLength(1);
        expect(fake.instances[0]?.url).toBe('redis://localhost:6379');
        expect(fake.instances[0]?.options).toEqual({ maxRetriesPerRequest: 3 });
    });

    it('wraps ping failures', async () => {
        fake.control.pingError = new Error('ECONNREFUSED');
        await expect(store.ping()).rejects.toThrow('Failed to connect to Redis: ECONNREFUSED');
    });

    it('stores presence without a TTL and lists it across scan pages', async () => {
        await store.setPresent(5);
        await store.setPresent(2);
        await store.setPresent(11);

        expect(fake.keys.get('user:online:5')).toEqual({ value: '1', ttlSeconds: null });
        expect(await store.isPresent(5)).toBe(true);
        expect(await store.listPresent()).toEqual([2, 5, 11]);

        await store.clearPresent(5);
        expect(await store.isPresent(5)).toBe(false);
        expect(await store.listPresent()).toEqual([2, 11]);
    });

    it('writes typing markers with the configured expiry', async () => {
        await store.setTyping(7, 'private:3');

        expect(fake.keys.get('typing:private:3:7')).toEqual({ value: '1', ttlSeconds: 10 });
        expect(await store.isTyping('private:3', 7)).toBe(true);
        expect(await store.listTyping('private:3')).toEqual([7]);
        expect(await store.listTyping('private:30')).toEqual([]);
    });

    it('sweeps only typing markers that lost their TTL', async () => {
        await store.setTyping(7, 'group:1');
        fake.keys.set('typing:group:1:4', { value: '1', ttlSeconds: null });

        expect(await store.sweepExpiredTyping()).toBe(1);
        expect(fake.keys.has('typing:group:1:4')).toBe(false);
        expect(fake.keys.has('typing:group:1:7')).toBe(true);
    });

    it('publishes the relay envelope as JSON', async () => {
        await store.publish('ws:user:9', { event: 'private_message', data: { content: 'hi' } });

        expect(fake.published).toHaveLength(1);
        expect(fake.published[0]?.channel).toBe('ws:user:9');
        const payload: unknown = JSON.parse(fake.published[0]?.payload ?? 'null');
        expect(payload).toEqual({
            event: 'private_message',
            data: { content: 'hi' },
            timestamp: expect.any(Number),
        });
    });

    it('subscribes on a dedicated connection that never reconnects', async () => {
        const received: Envelope[] = [];
        await store.subscribe('ws:user:9', { onMessage: (envelope) => received.push(envelope) });

        const subscriber = fake.instances[1];
        expect(subscriber?.channels.has('ws:user:9')).toBe(true);
        expect(subscriber?.options.retryStrategy).toBeTypeOf('function');

        await store.publish('ws:user:9', { event: 'typing', data: { user_id: 1 } });
        await store.publish('ws:user:8', { event: 'typing', data: { user_id: 2 } });

        expect(received).toEqual([{ event: 'typing', data: { user_id: 1 } }]);
    });

    it('skips payloads that are not envelopes', async () => {
        const onMessage = vi.fn<(envelope: Envelope) => void>();
        await store.subscribe('ws:user:9', { onMessage });

        fake.instances[1]?.emit('message', 'ws:user:9', 'garbage');
        expect(onMessage).not.toHaveBeenCalled();
    });

    it('ends the subscription once on a connection error', async () => {
        const onError = vi.fn<(error: Error) => void>();
        const subscription = await store.subscribe('ws:user:9', { onMessage: vi.fn(), onError });
        const subscriber = fake.instances[1];

        subscriber?.emit('error', new Error('socket reset'));
        subscriber?.emit('end');

        expect(onError).toHaveBeenCalledTimes(1);
        expect(onError.mock.calls[0]?.[0].message).toBe('socket reset');
        expect(subscription.active).toBe(false);
        expect(subscriber?.disconnected).toBe(true);
    });

    it('rejects a failed subscribe without reporting it as a stream error', async () => {
        fake.control.subscribeError = new Error('NOPERM this user has no permissions');
        const onError = vi.fn<(error: Error) => void>();

        await expect(store.subscribe('ws:user:9', { onMessage: vi.fn(), onError })).rejects.toThrow('NOPERM');

        expect(onError).not.toHaveBeenCalled();
        expect(fake.instances[1]?.disconnected).toBe(true);
    });

    it('stops idempotently', async () => {
        const onError = vi.fn<(error: Error) => void>();
        const subscription = await store.subscribe('ws:user:9', { onMessage: vi.fn(), onError });
        const subscriber = fake.instances[1];

        await subscription.stop();
        await subscription.stop();
        subscriber?.emit('end');

        expect(subscription.active).toBe(false);
        expect(subscriber?.quitCalls).toBe(1);
        expect(subscriber?.channels.size).toBe(0);
        expect(onError).not.toHaveBeenCalled();
    });

    it('close stops every subscription and quits the command connection', async () => {
        const first = await store.subscribe('ws:user:1', { onMessage: vi.fn() });
        const second = await store.subscribe('ws:presence', { onMessage: vi.fn() });

        await store.close();

        expect(first.active).toBe(false);
        expect(second.active).toBe(false);
        expect(fake.instances.map((instance) => instance.quitCalls)).toEqual([1, 1, 1]);
    });
});
