// ── Close Codes ────────────────────────────────────────────────────────────────

/** Close codes sent by the server when it ends a chat socket. */
export const ChatCloseCode = {
    Normal: 1000,
    /** A newer connection for the same user replaced this one. */
    Replaced: 4000,
    /** Server is shutting down gracefully. */
    ServerShutdown: 4005,
} as const;

export type ChatCloseCode = (typeof ChatCloseCode)[keyof typeof ChatCloseCode];

// ── Identity ───────────────────────────────────────────────────────────────────

/** Pre-validated identity attached to a socket before the Router sees it. */
export interface UserIdentity {
    userId: number;
    username: string;
}

// ── Envelope ───────────────────────────────────────────────────────────────────

/** Untyped wire unit: `{ "event": "...", "data": { ... } }`. */
export interface Envelope {
    event: string;
    data: Record<string, unknown>;
}

/** Pub/sub payload. `timestamp` is unix seconds at publish time. */
export interface RelayEnvelope extends Envelope {
    timestamp: number;
}

export const INBOUND_EVENTS = [
    'send_private_message',
    'send_group_message',
    'user_typing',
    'message_read',
    'ping',
    'pong',
] as const;

export type InboundEventName = (typeof INBOUND_EVENTS)[number];

export type OutboundEventName =
    | 'private_message'
    | 'group_message'
    | 'message_sent'
    | 'typing'
    | 'user_online_status'
    | 'pong';

export type MessageType = 'text' | 'file';

// ── Inbound Events (validated) ─────────────────────────────────────────────────

interface InboundBase {
    /** Original payload, already stamped with `sender_id` / `sender_username`. */
    data: Record<string, unknown>;
}

export interface PrivateMessageEvent extends InboundBase {
    event: 'send_private_message';
    receiverId: number;
    content: string;
    messageType: MessageType;
    fileId: number | null;
}

export interface GroupMessageEvent extends InboundBase {
    event: 'send_group_message';
    groupId: number;
    content: string;
    messageType: MessageType;
    fileId: number | null;
}

export interface TypingEvent extends InboundBase {
    event: 'user_typing';
    conversationId: string;
    isTyping: boolean;
}

export interface MessageReadEvent extends InboundBase {
    event: 'message_read';
    messageId: number;
}

export interface PingEvent extends InboundBase {
    event: 'ping';
}

export interface PongEvent extends InboundBase {
    event: 'pong';
}

export type InboundEvent =
    | PrivateMessageEvent
    | GroupMessageEvent
    | TypingEvent
    | MessageReadEvent
    | PingEvent
    | PongEvent;

export type InboundParseResult =
    | { kind: 'ok'; event: InboundEvent }
    | { kind: 'invalid'; event: string; reason: string }
    | { kind: 'unknown'; event: string };

// ── Conversations ──────────────────────────────────────────────────────────────

export type ConversationScope = 'private' | 'group';

/** Decoded `private:<id>` / `group:<id>` key. */
export interface ConversationKey {
    scope: ConversationScope;
    targetId: number;
}

// ── Router Diagnostics ─────────────────────────────────────────────────────────

/** Outcome of a local send attempt. */
export type SendResult = 'delivered' | 'dropped' | 'offline';

export interface RouterStats {
    totalConnections: number;
    clients: Array<{ user_id: number; username: string }>;
    /** Valid inbound events handled. */
    processedEvents: number;
    /** Inbound events dropped for a contract violation or unknown name. */
    rejectedEvents: number;
    /** Events abandoned because persistence or membership lookup failed. */
    failedEvents: number;
    /** Outbound frames dropped on a full connection queue. */
    droppedEvents: number;
}
