import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import type { MessageType } from '../types/realtime.js';

export type ChatStoreErrorCode = 'receiver_not_found' | 'not_group_member' | 'message_not_found' | 'forbidden';

export class ChatStoreError extends Error {
  readonly code: ChatStoreErrorCode;

  constructor(code: ChatStoreErrorCode, message: string) {
    super(message);
    this.name = 'ChatStoreError';
    this.code = code;
  }
}

export interface SaveMessageInput {
  senderId: number;
  content: string;
  messageType: MessageType;
  fileId: number | null;
}

export interface SavePrivateMessageInput extends SaveMessageInput {
  receiverId: number;
}

export interface SaveGroupMessageInput extends SaveMessageInput {
  groupId: number;
}

/** Identifier and timestamps the router echoes to every recipient. */
export interface SavedMessage {
  id: number;
  createdAt: string;
  updatedAt: string;
}

/** Persistence the router depends on. */
export interface ChatRepository {
  savePrivateMessage(input: SavePrivateMessageInput): Promise<SavedMessage>;
  saveGroupMessage(input: SaveGroupMessageInput): Promise<SavedMessage>;
  getGroupMembers(groupId: number): Promise<number[]>;
}

export interface PrivateMessageRow {
  id: number;
  sender_id: number;
  receiver_id: number;
  content: string;
  type: MessageType;
  file_id: number | null;
  is_read: number;
  read_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface GroupMessageRow {
  id: number;
  group_id: number;
  sender_id: number;
  content: string;
  type: MessageType;
  file_id: number | null;
  created_at: string;
  updated_at: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    email TEXT NOT NULL UNIQUE,
    full_name TEXT,
    is_online INTEGER NOT NULL DEFAULT 0,
    last_seen DATETIME,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL
  );

  CREATE TABLE IF NOT EXISTS chat_groups (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    description TEXT,
    owner_id INTEGER NOT NULL,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL,
    FOREIGN KEY(owner_id) REFERENCES users(id)
  );

  CREATE TABLE IF NOT EXISTS group_members (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    group_id INTEGER NOT NULL,
    user_id INTEGER NOT NULL,
    role TEXT NOT NULL DEFAULT 'member',
    joined_at DATETIME NOT NULL,
    FOREIGN KEY(group_id) REFERENCES chat_groups(id),
    FOREIGN KEY(user_id) REFERENCES users(id),
    UNIQUE(group_id, user_id)
  );

  CREATE INDEX IF NOT EXISTS idx_group_members_user
    ON group_members(user_id);

  CREATE TABLE IF NOT EXISTS private_messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    sender_id INTEGER NOT NULL,
    receiver_id INTEGER NOT NULL,
    content TEXT NOT NULL,
    type TEXT NOT NULL DEFAULT 'text',
    file_id INTEGER,
    is_read INTEGER NOT NULL DEFAULT 0,
    read_at DATETIME,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL,
    FOREIGN KEY(sender_id) REFERENCES users(id),
    FOREIGN KEY(receiver_id) REFERENCES users(id)
  );

  CREATE INDEX IF NOT EXISTS idx_private_messages_pair
    ON private_messages(sender_id, receiver_id);

  CREATE TABLE IF NOT EXISTS group_messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    group_id INTEGER NOT NULL,
    sender_id INTEGER NOT NULL,
    content TEXT NOT NULL,
    type TEXT NOT NULL DEFAULT 'text',
    file_id INTEGER,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL,
    FOREIGN KEY(group_id) REFERENCES chat_groups(id),
    FOREIGN KEY(sender_id) REFERENCES users(id)
  );

  CREATE INDEX IF NOT EXISTS idx_group_messages_group
    ON group_messages(group_id, created_at DESC);
`;

export interface ChatStoreOptions {
  /** File path, or `:memory:`. */
  databasePath: string;
  now?: () => Date;
}

/**
 * SQLite-backed chat persistence: message rows plus the user and group
 * membership rows they reference.
 */
export class ChatStore implements ChatRepository {
  readonly db: Database.Database;
  readonly #now: () => Date;

  constructor(options: ChatStoreOptions) {
    const { databasePath } = options;
    if (databasePath !== ':memory:') {
      const dir = path.dirname(path.resolve(databasePath));
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(databasePath);
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
    this.#now = options.now ?? (() => new Date());
  }

  close(): void {
    this.db.close();
  }

  // ── Users & groups ──────────────────────────────────────────────────────────

  createUser(username: string, email: string, fullName: string | null = null): number {
    const ts = this.#timestamp();
    const result = this.db
      .prepare('INSERT INTO users (username, email, full_name, created_at, updated_at) VALUES (?, ?, ?, ?, ?)')
      .run(username, email, fullName, ts, ts);
    return Number(result.lastInsertRowid);
  }

  userExists(userId: number): boolean {
    return this.db.prepare('SELECT 1 FROM users WHERE id = ?').get(userId) !== undefined;
  }

  /** Create a group; the owner joins as `admin`. */
  createGroup(ownerId: number, name: string, description: string | null = null): number {
    const ts = this.#timestamp();
    const create = this.db.transaction(() => {
      const result = this.db
        .prepare('INSERT INTO chat_groups (name, description, owner_id, created_at, updated_at) VALUES (?, ?, ?, ?, ?)')
        .run(name, description, ownerId, ts, ts);
      const groupId = Number(result.lastInsertRowid);
      this.db
        .prepare('INSERT INTO group_members (group_id, user_id, role, joined_at) VALUES (?, ?, ?, ?)')
        .run(groupId, ownerId, 'admin', ts);
      return groupId;
    });
    return create();
  }

  addGroupMember(groupId: number, userId: number, role: 'admin' | 'member' = 'member'): void {
    this.db
      .prepare('INSERT OR IGNORE INTO group_members (group_id, user_id, role, joined_at) VALUES (?, ?, ?, ?)')
      .run(groupId, userId, role, this.#timestamp());
  }

  isGroupMember(groupId: number, userId: number): boolean {
    return this.db
      .prepare('SELECT 1 FROM group_members WHERE group_id = ? AND user_id = ?')
      .get(groupId, userId) !== undefined;
  }

  async getGroupMembers(groupId: number): Promise<number[]> {
    const rows = this.db
      .prepare('SELECT user_id FROM group_members WHERE group_id = ? ORDER BY user_id ASC')
      .all(groupId) as Array<{ user_id: number }>;
    return rows.map((row) => row.user_id);
  }

  // ── Messages ────────────────────────────────────────────────────────────────

  async savePrivateMessage(input: SavePrivateMessageInput): Promise<SavedMessage> {
    if (!this.userExists(input.receiverId)) {
      throw new ChatStoreError('receiver_not_found', 'receiver not found');
    }

    const ts = this.#timestamp();
    const result = this.db
      .prepare(
        `INSERT INTO private_messages (sender_id, receiver_id, content, type, file_id, is_read, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, 0, ?, ?)`,
      )
      .run(input.senderId, input.receiverId, input.content, input.messageType, input.fileId, ts, ts);

    return { id: Number(result.lastInsertRowid), createdAt: ts, updatedAt: ts };
  }

  async saveGroupMessage(input: SaveGroupMessageInput): Promise<SavedMessage> {
    if (!this.isGroupMember(input.groupId, input.senderId)) {
      throw new ChatStoreError('not_group_member', 'you are not a member of this group');
    }

    const ts = this.#timestamp();
    const result = this.db
      .prepare(
        `INSERT INTO group_messages (group_id, sender_id, content, type, file_id, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(input.groupId, input.senderId, input.content, input.messageType, input.fileId, ts, ts);

    return { id: Number(result.lastInsertRowid), createdAt: ts, updatedAt: ts };
  }

  getPrivateMessage(messageId: number): PrivateMessageRow | undefined {
    return this.db.prepare('SELECT * FROM private_messages WHERE id = ?').get(messageId) as PrivateMessageRow | undefined;
  }

  listPrivateMessages(userId: number, otherUserId: number, limit = 50): PrivateMessageRow[] {
    return this.db
      .prepare(
        `SELECT * FROM private_messages
         WHERE (sender_id = ? AND receiver_id = ?) OR (sender_id = ? AND receiver_id = ?)
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(userId, otherUserId, otherUserId, userId, limit) as PrivateMessageRow[];
  }

  listGroupMessages(groupId: number, limit = 50): GroupMessageRow[] {
    return this.db
      .prepare('SELECT * FROM group_messages WHERE group_id = ? ORDER BY id DESC LIMIT ?')
      .all(groupId, limit) as GroupMessageRow[];
  }

  /** Only the receiver may mark a private message read. */
  markMessageRead(messageId: number, userId: number): void {
    const message = this.getPrivateMessage(messageId);
    if (!message) {
      throw new ChatStoreError('message_not_found', `message ${messageId} not found`);
    }
    if (message.receiver_id !== userId) {
      throw new ChatStoreError('forbidden', 'unauthorized to mark this message as read');
    }

    const ts = this.#timestamp();
    this.db
      .prepare('UPDATE private_messages SET is_read = 1, read_at = ?, updated_at = ? WHERE id = ?')
      .run(ts, ts, messageId);
  }

  #timestamp(): string {
    return this.#now().toISOString();
  }
}
