import type {
    ConversationKey,
    Envelope,
    InboundEvent,
    InboundEventName,
    InboundParseResult,
    MessageType,
} from '../types/realtime.js';
import { INBOUND_EVENTS } from '../types/realtime.js';

const KNOWN_EVENTS = new Set<string>(INBOUND_EVENTS);
const CONVERSATION_KEY_PATTERN = /^(private|group):([1-9]\d*)$/;

export class EnvelopeDecodeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'EnvelopeDecodeError';
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isKnownEvent(name: string): name is InboundEventName {
    return KNOWN_EVENTS.has(name);
}

/**
 * Decode one text frame into an envelope.
 * A missing or null `data` becomes `{}` so payload-less events such as `ping`
 * are accepted.
 */
export function decodeEnvelope(text: string): Envelope {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        throw new EnvelopeDecodeError('Invalid JSON.');
    }

    return toEnvelope(parsed);
}

/** Shape-check an already parsed value (used for pub/sub payloads too). */
export function toEnvelope(value: unknown): Envelope {
    if (!isRecord(value)) {
        throw new EnvelopeDecodeError('Envelope must be a JSON object.');
    }
    if (typeof value.event !== 'string' || value.event.length === 0) {
        throw new EnvelopeDecodeError('Envelope event must be a non-empty string.');
    }

    const data = value.data ?? {};
    if (!isRecord(data)) {
        throw new EnvelopeDecodeError('Envelope data must be an object.');
    }

    return { event: value.event, data };
}

export function encodeEnvelope(event: string, data: Record<string, unknown>): string {
    return JSON.stringify({ event, data });
}

function readMessageType(data: Record<string, unknown>): MessageType {
    return data.type === 'file' ? 'file' : 'text';
}

function readFileId(data: Record<string, unknown>): number | null {
    return isPositiveInteger(data.file_id) ? data.file_id : null;
}

/**
 * Validate the per-event payload contract and narrow the envelope into a
 * typed inbound event. Runs once, at dispatch.
 */
export function parseInboundEvent(envelope: Envelope): InboundParseResult {
    const { event: name, data } = envelope;

    if (!isKnownEvent(name)) {
        return { kind: 'unknown', event: name };
    }

    const invalid = (reason: string): InboundParseResult => ({ kind: 'invalid', event: name, reason });
    const ok = (event: InboundEvent): InboundParseResult => ({ kind: 'ok', event });

    switch (name) {
        case 'send_private_message': {
            if (!isPositiveInteger(data.receiver_id)) return invalid('private message must have valid receiver_id');
            if (typeof data.content !== 'string') return invalid('private message must have string content');
            return ok({
                event: name,
                data,
                receiverId: data.receiver_id,
                content: data.content,
                messageType: readMessageType(data),
                fileId: readFileId(data),
            });
        }
        case 'send_group_message': {
            if (!isPositiveInteger(data.group_id)) return invalid('group message must have valid group_id');
            if (typeof data.content !== 'string') return invalid('group message must have string content');
            return ok({
                event: name,
                data,
                groupId: data.group_id,
                content: data.content,
                messageType: readMessageType(data),
                fileId: readFileId(data),
            });
        }
        case 'user_typing': {
            if (typeof data.conversation_id !== 'string') return invalid('typing message must have conversation_id');
            return ok({
                event: name,
                data,
                conversationId: data.conversation_id,
                isTyping: typeof data.is_typing === 'boolean' ? data.is_typing : true,
            });
        }
        case 'message_read': {
            if (!isPositiveInteger(data.message_id)) return invalid('message_read must have valid message_id');
            return ok({ event: name, data, messageId: data.message_id });
        }
        case 'ping':
            return ok({ event: name, data });
        case 'pong':
            return ok({ event: name, data });
    }
}

/** Parse `private:<id>` or `group:<id>`; anything else yields null. */
export function parseConversationKey(conversationId: string): ConversationKey | null {
    const match = CONVERSATION_KEY_PATTERN.exec(conversationId);
    if (!match) return null;

    const targetId = Number(match[2]);
    if (!Number.isSafeInteger(targetId)) return null;

    return { scope: match[1] === 'private' ? 'private' : 'group', targetId };
}
