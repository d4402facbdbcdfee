import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ChatStore, ChatStoreError } from '../../src/services/chat-store.js';

const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

describe('ChatStore', () => {
  let store: ChatStore;
  let alice: number;
  let bob: number;
  let carol: number;

  beforeEach(() => {
    store = new ChatStore({ databasePath: ':memory:', now: () => FIXED_NOW });
    alice = store.createUser('alice', 'alice@example.test', 'Alice');
    bob = store.createUser('bob', 'bob@example.test');
    carol = store.createUser('carol', 'carol@example.test');
  });

  afterEach(() => {
    store.close();
  });

  describe('users and groups', () => {
    it('assigns sequential ids and reports existence', () => {
      expect([alice, bob, carol]).toEqual([1, 2, 3]);
      expect(store.userExists(bob)).toBe(true);
      expect(store.userExists(99)).toBe(false);
    });

    it('adds the owner as admin member of a new group', async () => {
      const groupId = store.createGroup(alice, 'team');

      expect(store.isGroupMember(groupId, alice)).toBe(true);
      const role = store.db
        .prepare('SELECT role FROM group_members WHERE group_id = ? AND user_id = ?')
        .get(groupId, alice);
      expect(role).toEqual({ role: 'admin' });
      expect(await store.getGroupMembers(groupId)).toEqual([alice]);
    });

    it('ignores duplicate memberships and lists members ascending', async () => {
      const groupId = store.createGroup(carol, 'team');
      store.addGroupMember(groupId, alice);
      store.addGroupMember(groupId, alice);

      expect(await store.getGroupMembers(groupId)).toEqual([alice, carol]);
      expect(await store.getGroupMembers(999)).toEqual([]);
    });
  });

  describe('private messages', () => {
    it('persists and returns id plus timestamps', async () => {
      const saved = await store.savePrivateMessage({
        senderId: alice,
        receiverId: bob,
        content: 'hi',
        messageType: 'text',
        fileId: null,
      });

      expect(saved).toEqual({
        id: 1,
        createdAt: '2026-03-01T12:00:00.000Z',
        updatedAt: '2026-03-01T12:00:00.000Z',
      });
      expect(store.getPrivateMessage(1)).toMatchObject({
        sender_id: alice,
        receiver_id: bob,
        content: 'hi',
        type: 'text',
        file_id: null,
        is_read: 0,
        read_at: null,
      });
    });

    it('rejects an unknown receiver', async () => {
      const attempt = store.savePrivateMessage({
        senderId: alice,
        receiverId: 404,
        content: 'hi',
        messageType: 'text',
        fileId: null,
      });

      await expect(attempt).rejects.toBeInstanceOf(ChatStoreError);
      await expect(attempt).rejects.toMatchObject({ code: 'receiver_not_found', message: 'receiver not found' });
    });

    it('lists a conversation in both directions, newest first', async () => {
      const base = { messageType: 'text' as const, fileId: null };
      await store.savePrivateMessage({ ...base, senderId: alice, receiverId: bob, content: 'one' });
      await store.savePrivateMessage({ ...base, senderId: bob, receiverId: alice, content: 'two' });
      await store.savePrivateMessage({ ...base, senderId: alice, receiverId: carol, content: 'other' });

      const rows = store.listPrivateMessages(alice, bob);
      expect(rows.map((row) => row.content)).toEqual(['two', 'one']);
    });
  });

  describe('group messages', () => {
    it('persists messages from members', async () => {
      const groupId = store.createGroup(alice, 'team');
      const saved = await store.saveGroupMessage({
        senderId: alice,
        groupId,
        content: 'report.pdf',
        messageType: 'file',
        fileId: 12,
      });

      expect(saved.id).toBe(1);
      expect(store.listGroupMessages(groupId)).toEqual([
        {
          id: 1,
          group_id: groupId,
          sender_id: alice,
          content: 'report.pdf',
          type: 'file',
          file_id: 12,
          created_at: '2026-03-01T12:00:00.000Z',
          updated_at: '2026-03-01T12:00:00.000Z',
        },
      ]);
    });

    it('rejects non-members', async () => {
      const groupId = store.createGroup(alice, 'team');

      await expect(
        store.saveGroupMessage({ senderId: bob, groupId, content: 'hi', messageType: 'text', fileId: null }),
      ).rejects.toMatchObject({ code: 'not_group_member', message: 'you are not a member of this group' });
      expect(store.listGroupMessages(groupId)).toEqual([]);
    });
  });

  describe('markMessageRead', () => {
    it('lets the receiver mark a message read', async () => {
      const { id } = await store.savePrivateMessage({
        senderId: alice,
        receiverId: bob,
        content: 'hi',
        messageType: 'text',
        fileId: null,
      });

      store.markMessageRead(id, bob);

      expect(store.getPrivateMessage(id)).toMatchObject({ is_read: 1, read_at: '2026-03-01T12:00:00.000Z' });
    });

    it('refuses anyone but the receiver', async () => {
      const { id } = await store.savePrivateMessage({
        senderId: alice,
        receiverId: bob,
        content: 'hi',
        messageType: 'text',
        fileId: null,
      });

      expect(() => store.markMessageRead(id, alice)).toThrow('unauthorized to mark this message as read');
      expect(() => store.markMessageRead(999, bob)).toThrow('message 999 not found');
    });
  });
});
