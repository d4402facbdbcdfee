import { logThought } from '../utils/logger.js';
import { BoundedQueue } from './bounded-queue.js';
import { encodeEnvelope, parseConversationKey, parseInboundEvent } from './envelope.js';
import { PRESENCE_TOPIC, userTopic } from '../services/presence-store.js';
import type { PresenceStore, Subscription } from '../services/presence-store.js';
import type { ChatRepository, SavedMessage } from '../services/chat-store.js';
import type {
    Envelope,
    GroupMessageEvent,
    OutboundEventName,
    PrivateMessageEvent,
    RouterStats,
    SendResult,
    TypingEvent,
    UserIdentity,
} from '../types/realtime.js';

// ── Constants ──────────────────────────────────────────────────────────────────

const DEFAULT_INBOUND_QUEUE_CAPACITY = 256;
const DEFAULT_TYPING_SWEEP_INTERVAL_MS = 30_000;

// ── Connection Port ────────────────────────────────────────────────────────────

export type EvictionReason = 'replaced' | 'shutdown';

/** What the Router needs from a live socket. */
export interface RoutedConnection {
    readonly id: string;
    readonly identity: UserIdentity;
    /** Non-blocking; false when the outbound queue is full or closed. */
    enqueue(frame: string): boolean;
    /** Close the outbound queue; the writer ends the socket. */
    closeOutbound(): void;
    evict(reason: EvictionReason): void;
    markRegistered(): void;
}

// ── Config ─────────────────────────────────────────────────────────────────────

export interface RouterConfig {
    inboundQueueCapacity?: number;
    typingSweepIntervalMs?: number;
}

export interface RouterDeps {
    repository: ChatRepository;
    presence: PresenceStore;
}

type RouterCommand =
    | { kind: 'register'; connection: RoutedConnection; done: () => void }
    | { kind: 'unregister'; connection: RoutedConnection; done: () => void }
    | { kind: 'dispatch'; envelope: Envelope; sender: UserIdentity; done: () => void };

// ── Router ─────────────────────────────────────────────────────────────────────

/**
 * Per-instance registry of live connections and the routing of inbound
 * events.
 *
 * Registration changes and dispatched events go through one mailbox and are
 * applied by a single loop, so registry updates and per-connection event
 * order never interleave. Recipients without a local connection are reached
 * through the presence store's per-user topic.
 */
export class Router {
    readonly #config: Required<RouterConfig>;
    readonly #repository: ChatRepository;
    readonly #presence: PresenceStore;
    readonly #registry: Map<number, RoutedConnection> = new Map();
    readonly #mailbox: BoundedQueue<RouterCommand>;
    #loop: Promise<void> | null = null;
    #presenceSubscription: Subscription | null = null;
    #sweepTimer: ReturnType<typeof setInterval> | null = null;

    #metrics = {
        processedEvents: 0,
        rejectedEvents: 0,
        failedEvents: 0,
        droppedEvents: 0,
    };

    constructor(deps: RouterDeps, config: RouterConfig = {}) {
        this.#repository = deps.repository;
        this.#presence = deps.presence;
        this.#config = {
            inboundQueueCapacity: config.inboundQueueCapacity ?? DEFAULT_INBOUND_QUEUE_CAPACITY,
            typingSweepIntervalMs: config.typingSweepIntervalMs ?? DEFAULT_TYPING_SWEEP_INTERVAL_MS,
        };
        this.#mailbox = new BoundedQueue<RouterCommand>(this.#config.inboundQueueCapacity);
    }

    // ── Lifecycle ──────────────────────────────────────────────────────────────

    /** Start the mailbox loop, the presence relay and the typing sweep. */
    async start(): Promise<void> {
        if (this.#loop) return;
        this.#loop = this.#run();

        try {
            this.#presenceSubscription = await this.#presence.subscribe(PRESENCE_TOPIC, {
                onMessage: (envelope) => this.#relayPresence(envelope),
                onError: (error) => {
                    void logThought(`[Router] Presence relay stopped: ${error.message}`);
                },
            });
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Router] Presence relay unavailable: ${message}`);
        }

        this.#sweepTimer = setInterval(() => {
            void this.#sweepTyping();
        }, this.#config.typingSweepIntervalMs);
        this.#sweepTimer.unref();

        void logThought('[Router] Started.');
    }

    /** Evict every connection, clear their presence and end the loop. */
    async stop(): Promise<void> {
        if (this.#sweepTimer) {
            clearInterval(this.#sweepTimer);
            this.#sweepTimer = null;
        }

        this.#mailbox.close();
        if (this.#loop) {
            await this.#loop;
        }

        const connections = [...this.#registry.values()];
        this.#registry.clear();
        for (const connection of connections) {
            connection.evict('shutdown');
            await this.#announceOffline(connection.identity.userId);
        }

        const subscription = this.#presenceSubscription;
        this.#presenceSubscription = null;
        if (subscription) {
            await subscription.stop();
        }

        void logThought(`[Router] Stopped (${connections.length} connection(s) evicted).`);
    }

    // ── Mailbox ────────────────────────────────────────────────────────────────

    /**
     * Resolves `true` once the connection is the registered entry for its
     * user, or `false` when the Router is stopping and refused it.
     */
    register(connection: RoutedConnection): Promise<boolean> {
        return this.#submit((done) => ({ kind: 'register', connection, done }));
    }

    /** No-op unless `connection` is the currently registered instance. */
    async unregister(connection: RoutedConnection): Promise<void> {
        await this.#submit((done) => ({ kind: 'unregister', connection, done }));
    }

    /**
     * Queue an inbound envelope. Waits while the mailbox is full and resolves
     * after the event has been handled; never rejects.
     */
    async dispatch(envelope: Envelope, sender: UserIdentity): Promise<void> {
        await this.#submit((done) => ({ kind: 'dispatch', envelope, sender, done }));
    }

    async #submit(build: (done: () => void) => RouterCommand): Promise<boolean> {
        let resolveDone: () => void = () => undefined;
        const handled = new Promise<void>((resolve) => {
            resolveDone = resolve;
        });

        const accepted = await this.#mailbox.put(build(resolveDone));
        if (!accepted) return false;
        await handled;
        return true;
    }

    async #run(): Promise<void> {
        for (;;) {
            const command = await this.#mailbox.take();
            if (command === undefined) return;

            try {
                await this.#execute(command);
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                void logThought(`[Router] ${command.kind} command failed: ${message}`);
            } finally {
                command.done();
            }
        }
    }

    async #execute(command: RouterCommand): Promise<void> {
        switch (command.kind) {
            case 'register':
                return this.#register(command.connection);
            case 'unregister':
                return this.#unregister(command.connection);
            case 'dispatch':
                return this.#dispatch(command.envelope, command.sender);
        }
    }

    // ── Registry ───────────────────────────────────────────────────────────────

    async #register(connection: RoutedConnection): Promise<void> {
        const { userId, username } = connection.identity;
        const existing = this.#registry.get(userId);

        this.#registry.set(userId, connection);
        connection.markRegistered();

        if (existing && existing !== connection) {
            existing.evict('replaced');
            void logThought(`[Router] User ${userId} reconnected; previous connection ${existing.id} replaced.`);
        }

        try {
            await this.#presence.setPresent(userId);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Router] Failed to set user ${userId} online: ${message}`);
        }

        await this.#publish(PRESENCE_TOPIC, {
            event: 'user_online_status',
            data: { user_id: userId, is_online: true },
        });

        void logThought(`[Router] User ${userId} (${username}) connected. Total clients: ${this.#registry.size}`);
    }

    async #unregister(connection: RoutedConnection): Promise<void> {
        const { userId, username } = connection.identity;
        if (this.#registry.get(userId) !== connection) return;

        this.#registry.delete(userId);
        connection.closeOutbound();
        await this.#announceOffline(userId);

        void logThought(`[Router] User ${userId} (${username}) disconnected. Total clients: ${this.#registry.size}`);
    }

    async #announceOffline(userId: number): Promise<void> {
        try {
            await this.#presence.clearPresent(userId);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Router] Failed to set user ${userId} offline: ${message}`);
        }

        await this.#publish(PRESENCE_TOPIC, {
            event: 'user_online_status',
            data: { user_id: userId, is_online: false, last_seen: new Date().toISOString() },
        });
    }

    // ── Delivery ───────────────────────────────────────────────────────────────

    /** Enqueue on the user's local connection only. */
    sendToUser(userId: number, event: OutboundEventName, data: Record<string, unknown>): SendResult {
        const connection = this.#registry.get(userId);
        if (!connection) return 'offline';

        if (connection.enqueue(encodeEnvelope(event, data))) {
            return 'delivered';
        }

        this.#metrics.droppedEvents++;
        void logThought(`[Router] Outbound queue full for user ${userId}; dropped ${event}.`);
        return 'dropped';
    }

    /** Local connection first, otherwise the user's relay topic. */
    async #deliver(userId: number, event: OutboundEventName, data: Record<string, unknown>): Promise<SendResult> {
        const result = this.sendToUser(userId, event, data);
        if (result !== 'offline') return result;

        await this.#publish(userTopic(userId), { event, data });
        return 'offline';
    }

    async #publish(topic: string, envelope: Envelope): Promise<void> {
        try {
            await this.#presence.publish(topic, envelope);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Router] Failed to publish ${envelope.event} to ${topic}: ${message}`);
        }
    }

    #relayPresence(envelope: Envelope): void {
        if (envelope.event !== 'user_online_status') return;

        const subject = envelope.data.user_id;
        if (typeof subject !== 'number') return;

        for (const connection of this.#registry.values()) {
            if (connection.identity.userId === subject) continue;
            this.sendToUser(connection.identity.userId, 'user_online_status', envelope.data);
        }
    }

    async #sweepTyping(): Promise<void> {
        try {
            const removed = await this.#presence.sweepExpiredTyping();
            if (removed > 0) {
                void logThought(`[Router] Swept ${removed} stale typing marker(s).`);
            }
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Router] Typing sweep failed: ${message}`);
        }
    }

    // ── Event Handling ─────────────────────────────────────────────────────────

    async #dispatch(envelope: Envelope, sender: UserIdentity): Promise<void> {
        const parsed = parseInboundEvent(envelope);

        if (parsed.kind === 'unknown') {
            this.#metrics.rejectedEvents++;
            void logThought(`[Router] Unknown event "${parsed.event}" from user ${sender.userId}.`);
            return;
        }
        if (parsed.kind === 'invalid') {
            this.#metrics.rejectedEvents++;
            void logThought(`[Router] Invalid ${parsed.event} from user ${sender.userId}: ${parsed.reason}`);
            return;
        }

        this.#metrics.processedEvents++;
        const event = parsed.event;

        switch (event.event) {
            case 'send_private_message':
                return this.#handlePrivateMessage(event, sender);
            case 'send_group_message':
                return this.#handleGroupMessage(event, sender);
            case 'user_typing':
                return this.#handleTyping(event, sender);
            case 'message_read':
                void logThought(`[Router] Message ${event.messageId} read by user ${sender.userId}.`);
                return;
            case 'ping':
                this.sendToUser(sender.userId, 'pong', { timestamp: new Date().toISOString() });
                return;
            case 'pong':
                return;
        }
    }

    async #handlePrivateMessage(event: PrivateMessageEvent, sender: UserIdentity): Promise<void> {
        let saved: SavedMessage;
        try {
            saved = await this.#repository.savePrivateMessage({
                senderId: sender.userId,
                receiverId: event.receiverId,
                content: event.content,
                messageType: event.messageType,
                fileId: event.fileId,
            });
        } catch (err) {
            this.#metrics.failedEvents++;
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Router] Failed to save private message from user ${sender.userId}: ${message}`);
            return;
        }

        const payload = withSavedMessage(event.data, sender, saved);
        await this.#deliver(event.receiverId, 'private_message', payload);
        this.sendToUser(sender.userId, 'message_sent', payload);
    }

    async #handleGroupMessage(event: GroupMessageEvent, sender: UserIdentity): Promise<void> {
        let saved: SavedMessage;
        let members: number[];
        try {
            saved = await this.#repository.saveGroupMessage({
                senderId: sender.userId,
                groupId: event.groupId,
                content: event.content,
                messageType: event.messageType,
                fileId: event.fileId,
            });
            members = await this.#repository.getGroupMembers(event.groupId);
        } catch (err) {
            this.#metrics.failedEvents++;
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Router] Failed to handle group message from user ${sender.userId}: ${message}`);
            return;
        }

        const payload = withSavedMessage(event.data, sender, saved);
        for (const memberId of members) {
            await this.#deliver(memberId, 'group_message', payload);
        }
    }

    /**
     * Typing in a group is relayed only from members. A non-member's notice is
     * dropped and counted as rejected, the same as a group message would be.
     */
    async #handleTyping(event: TypingEvent, sender: UserIdentity): Promise<void> {
        const key = parseConversationKey(event.conversationId);
        if (!key) {
            this.#metrics.rejectedEvents++;
            void logThought(`[Router] Invalid conversation_id "${event.conversationId}" from user ${sender.userId}.`);
            return;
        }

        void this.#presence.setTyping(sender.userId, event.conversationId).catch((err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Router] Failed to set typing for user ${sender.userId}: ${message}`);
        });

        const payload = {
            user_id: sender.userId,
            username: sender.username,
            is_typing: event.isTyping,
            chat_type: key.scope,
            chat_id: key.scope === 'private' ? sender.userId : key.targetId,
        };

        if (key.scope === 'private') {
            await this.#deliver(key.targetId, 'typing', payload);
            return;
        }

        let members: number[];
        try {
            members = await this.#repository.getGroupMembers(key.targetId);
        } catch (err) {
            this.#metrics.failedEvents++;
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Router] Failed to load members of group ${key.targetId}: ${message}`);
            return;
        }

        if (!members.includes(sender.userId)) {
            this.#metrics.rejectedEvents++;
            void logThought(`[Router] User ${sender.userId} is not a member of group ${key.targetId}; typing dropped.`);
            return;
        }

        for (const memberId of members) {
            if (memberId === sender.userId) continue;
            await this.#deliver(memberId, 'typing', payload);
        }
    }

    // ── Diagnostics ────────────────────────────────────────────────────────────

    isRegistered(connection: RoutedConnection): boolean {
        return this.#registry.get(connection.identity.userId) === connection;
    }

    /** Users with a live connection on this instance, ascending. */
    getOnlineUsers(): number[] {
        return [...this.#registry.keys()].sort((a, b) => a - b);
    }

    getStats(): RouterStats {
        const clients = [...this.#registry.values()]
            .map((connection) => ({
                user_id: connection.identity.userId,
                username: connection.identity.username,
            }))
            .sort((a, b) => a.user_id - b.user_id);

        return {
            totalConnections: this.#registry.size,
            clients,
            ...this.#metrics,
        };
    }
}

function withSavedMessage(
    data: Record<string, unknown>,
    sender: UserIdentity,
    saved: SavedMessage,
): Record<string, unknown> {
    return {
        ...data,
        sender_id: sender.userId,
        sender_username: sender.username,
        message_id: saved.id,
        created_at: saved.createdAt,
        updated_at: saved.updatedAt,
    };
}
