import { describe, expect, it } from 'vitest';
import {
    EnvelopeDecodeError,
    decodeEnvelope,
    encodeEnvelope,
    parseConversationKey,
    parseInboundEvent,
    toEnvelope,
} from '../../src/realtime/envelope.js';

describe('decodeEnvelope', () => {
    it('decodes event and data', () => {
        expect(decodeEnvelope('{"event":"ping","data":{"a":1}}')).toEqual({ event: 'ping', data: { a: 1 } });
    });

    it('defaults missing or null data to an empty object', () => {
        expect(decodeEnvelope('{"event":"ping"}')).toEqual({ event: 'ping', data: {} });
        expect(decodeEnvelope('{"event":"ping","data":null}')).toEqual({ event: 'ping', data: {} });
    });

    it('rejects malformed JSON', () => {
        expect(() => decodeEnvelope('{not json')).toThrow(EnvelopeDecodeError);
        expect(() => decodeEnvelope('{not json')).toThrow('Invalid JSON.');
    });

    it('rejects envelopes without a string event', () => {
        expect(() => decodeEnvelope('{"data":{}}')).toThrow('Envelope event must be a non-empty string.');
        expect(() => decodeEnvelope('{"event":""}')).toThrow('Envelope event must be a non-empty string.');
        expect(() => decodeEnvelope('{"event":42}')).toThrow('Envelope event must be a non-empty string.');
    });

    it('rejects non-object roots and data', () => {
        expect(() => decodeEnvelope('[1,2]')).toThrow('Envelope must be a JSON object.');
        expect(() => decodeEnvelope('"ping"')).toThrow('Envelope must be a JSON object.');
        expect(() => decodeEnvelope('{"event":"ping","data":[1]}')).toThrow('Envelope data must be an object.');
        expect(() => toEnvelope({ event: 'ping', data: 'x' })).toThrow('Envelope data must be an object.');
    });
});

describe('encodeEnvelope', () => {
    it('writes the wire shape', () => {
        expect(encodeEnvelope('pong', { timestamp: 'now' })).toBe('{"event":"pong","data":{"timestamp":"now"}}');
    });
});

describe('parseInboundEvent', () => {
    it('narrows a private message with defaults', () => {
        const result = parseInboundEvent({
            event: 'send_private_message',
            data: { receiver_id: 2, content: 'hi' },
        });

        expect(result).toEqual({
            kind: 'ok',
            event: {
                event: 'send_private_message',
                data: { receiver_id: 2, content: 'hi' },
                receiverId: 2,
                content: 'hi',
                messageType: 'text',
                fileId: null,
            },
        });
    });

    it('keeps file type and file id', () => {
        const result = parseInboundEvent({
            event: 'send_group_message',
            data: { group_id: 9, content: '', type: 'file', file_id: 4 },
        });

        expect(result.kind).toBe('ok');
        if (result.kind !== 'ok' || result.event.event !== 'send_group_message') return;
        expect(result.event.groupId).toBe(9);
        expect(result.event.messageType).toBe('file');
        expect(result.event.fileId).toBe(4);
    });

    it('treats unknown message types as text and drops bad file ids', () => {
        const result = parseInboundEvent({
            event: 'send_private_message',
            data: { receiver_id: 3, content: 'x', type: 'video', file_id: -1 },
        });

        expect(result.kind).toBe('ok');
        if (result.kind !== 'ok' || result.event.event !== 'send_private_message') return;
        expect(result.event.messageType).toBe('text');
        expect(result.event.fileId).toBeNull();
    });

    const invalidCases: Array<[string, Record<string, unknown>, string]> = [
        ['send_private_message', { content: 'hi' }, 'private message must have valid receiver_id'],
        ['send_private_message', { receiver_id: '2', content: 'hi' }, 'private message must have valid receiver_id'],
        ['send_private_message', { receiver_id: 0, content: 'hi' }, 'private message must have valid receiver_id'],
        ['send_private_message', { receiver_id: 1.5, content: 'hi' }, 'private message must have valid receiver_id'],
        ['send_private_message', { receiver_id: 2 }, 'private message must have string content'],
        ['send_group_message', { content: 'hi' }, 'group message must have valid group_id'],
        ['send_group_message', { group_id: 1, content: 5 }, 'group message must have string content'],
        ['user_typing', { is_typing: true }, 'typing message must have conversation_id'],
        ['message_read', { message_id: 'x' }, 'message_read must have valid message_id'],
    ];

    it.each(invalidCases)('rejects %s with %j', (event, data, reason) => {
        expect(parseInboundEvent({ event, data })).toEqual({ kind: 'invalid', event, reason });
    });

    it('defaults is_typing to true when it is not a boolean', () => {
        const result = parseInboundEvent({ event: 'user_typing', data: { conversation_id: 'private:2', is_typing: 'no' } });
        expect(result.kind === 'ok' && result.event.event === 'user_typing' && result.event.isTyping).toBe(true);

        const stopped = parseInboundEvent({ event: 'user_typing', data: { conversation_id: 'private:2', is_typing: false } });
        expect(stopped.kind === 'ok' && stopped.event.event === 'user_typing' && stopped.event.isTyping).toBe(false);
    });

    it('accepts payload-less ping and pong', () => {
        expect(parseInboundEvent({ event: 'ping', data: {} })).toEqual({ kind: 'ok', event: { event: 'ping', data: {} } });
        expect(parseInboundEvent({ event: 'pong', data: {} })).toEqual({ kind: 'ok', event: { event: 'pong', data: {} } });
    });

    it('reports unknown event names', () => {
        expect(parseInboundEvent({ event: 'delete_everything', data: {} })).toEqual({
            kind: 'unknown',
            event: 'delete_everything',
        });
    });
});

describe('parseConversationKey', () => {
    it('parses private and group keys', () => {
        expect(parseConversationKey('private:12')).toEqual({ scope: 'private', targetId: 12 });
        expect(parseConversationKey('group:3')).toEqual({ scope: 'group', targetId: 3 });
    });

    it.each(['private:', 'group:0', 'group:abc', 'channel:1', 'private:1:2', 'private:01', 'group:99999999999999999999'])(
        'rejects %s',
        (key) => {
            expect(parseConversationKey(key)).toBeNull();
        },
    );
});
