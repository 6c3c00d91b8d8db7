/**
 * Durable client registry and per-recipient mailboxes.
 *
 * Every operation runs inside a SQLite transaction, so a failure part-way
 * leaves no partial row. Operations called from inside {@link Store.atomically}
 * become savepoints of the enclosing transaction.
 *
 * @module store/store
 */
import Database from "better-sqlite3";
import { v4 as uuid, parse as parseUuid } from "uuid";
import { MAX_U32, PENDING_RECORD_PREFIX_SIZE } from "@postbox/protocol";
import {
  MessageIdExhaustedError,
  MessageTooLargeError,
  NameTakenError,
  StoreError,
  StoreFailureError,
  UnknownClientError,
} from "./errors.js";

export interface Client {
  id: Buffer;
  name: string;
  publicKey: Buffer;
  lastSeen: number;
  createdAt: number;
}

export interface ClientSummary {
  id: Buffer;
  name: string;
}

export interface NewMessage {
  recipientId: Buffer;
  senderId: Buffer;
  type: number;
  content: Buffer;
}

export interface StoredMessage extends NewMessage {
  id: number;
  createdAt: number;
}

export interface StoreOptions {
  /** Clock used for last_seen and created_at; defaults to Date.now */
  now?: () => number;
}

interface ClientRow {
  id: Buffer;
  name: string;
  public_key: Buffer;
  last_seen: number;
  created_at: number;
}

interface MessageRow {
  id: number;
  recipient_id: Buffer;
  sender_id: Buffer;
  type: number;
  content: Buffer;
  created_at: number;
}

function newClientId(): Buffer {
  return Buffer.from(parseUuid(uuid()));
}

export class Store {
  private readonly now: () => number;

  constructor(
    private readonly db: Database.Database,
    options: StoreOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Register a client under a fresh id. Fails with NameTakenError if the name exists. */
  createClient(name: string, publicKey: Buffer): Buffer {
    return this.guard("createClient", () =>
      this.db.transaction(() => {
        const taken = this.db
          .prepare<[string], { id: Buffer }>("SELECT id FROM clients WHERE name = ?")
          .get(name);
        if (taken) throw new NameTakenError(name);

        let id = newClientId();
        while (this.findClient(id)) {
          id = newClientId();
        }

        const now = this.now();
        try {
          this.db
            .prepare<[Buffer, string, Buffer, number, number]>(
              "INSERT INTO clients (id, name, public_key, last_seen, created_at) VALUES (?, ?, ?, ?, ?)"
            )
            .run(id, name, publicKey, now, now);
        } catch (err) {
          // Another process may have inserted the name since the check above
          if (err instanceof Database.SqliteError && err.code === "SQLITE_CONSTRAINT_UNIQUE") {
            throw new NameTakenError(name);
          }
          throw err;
        }
        return id;
      })()
    );
  }

  getClient(id: Buffer): Client {
    return this.guard("getClient", () => {
      const row = this.findClient(id);
      if (!row) throw new UnknownClientError(id);
      return rowToClient(row);
    });
  }

  /** All clients except `excluding`, in registration order, read in one statement */
  listClients(excluding: Buffer): ClientSummary[] {
    return this.guard("listClients", () =>
      this.db
        .prepare<[Buffer], { id: Buffer; name: string }>(
          "SELECT id, name FROM clients WHERE id != ? ORDER BY rowid ASC"
        )
        .all(excluding)
    );
  }

  /** Record activity for a client */
  touch(id: Buffer): void {
    this.guard("touch", () => {
      const result = this.db
        .prepare<[number, Buffer]>("UPDATE clients SET last_seen = ? WHERE id = ?")
        .run(this.now(), id);
      if (result.changes === 0) throw new UnknownClientError(id);
    });
  }

  /** Append a message to the recipient's mailbox and return its id */
  enqueueMessage(message: NewMessage): number {
    return this.guard("enqueueMessage", () =>
      this.db.transaction(() => {
        if (!this.findClient(message.recipientId)) throw new UnknownClientError(message.recipientId);
        if (!this.findClient(message.senderId)) throw new UnknownClientError(message.senderId);

        const result = this.db
          .prepare<[Buffer, Buffer, number, Buffer, number]>(
            "INSERT INTO messages (recipient_id, sender_id, type, content, created_at) VALUES (?, ?, ?, ?, ?)"
          )
          .run(message.recipientId, message.senderId, message.type, message.content, this.now());
        const id = Number(result.lastInsertRowid);
        if (id > MAX_U32) throw new MessageIdExhaustedError(id);
        return id;
      })()
    );
  }

  /**
   * Read and remove the messages addressed to `recipientId`, oldest first.
   * Takes the write lock before reading, so the rows returned are exactly the rows deleted.
   *
   * `maxBytes` bounds the encoded batch (record prefix plus content per message).
   * Messages past the bound stay queued for the next drain.
   */
  drainMessages(recipientId: Buffer, maxBytes: number = Number.POSITIVE_INFINITY): StoredMessage[] {
    return this.guard("drainMessages", () =>
      this.db
        .transaction(() => {
          const queued = this.db
            .prepare<[Buffer], MessageRow>(
              "SELECT * FROM messages WHERE recipient_id = ? ORDER BY id ASC"
            )
            .all(recipientId);

          const rows: MessageRow[] = [];
          let size = 0;
          for (const row of queued) {
            const recordSize = PENDING_RECORD_PREFIX_SIZE + row.content.length;
            if (size + recordSize > maxBytes) {
              if (rows.length === 0) throw new MessageTooLargeError(row.id, recordSize, maxBytes);
              break;
            }
            rows.push(row);
            size += recordSize;
          }
          if (rows.length === 0) return [];

          const lastId = rows[rows.length - 1].id;
          this.db
            .prepare<[Buffer, number]>("DELETE FROM messages WHERE recipient_id = ? AND id <= ?")
            .run(recipientId, lastId);
          return rows.map(rowToMessage);
        })
        .immediate()
    );
  }

  /** Run several operations as one transaction; any throw rolls all of them back */
  atomically<T>(fn: () => T): T {
    return this.guard("transaction", () => this.db.transaction(fn).immediate());
  }

  /** Delete undelivered messages created before `cutoff` (ms since epoch) */
  pruneMessagesOlderThan(cutoff: number): number {
    return this.guard("pruneMessages", () =>
      this.db.prepare<[number]>("DELETE FROM messages WHERE created_at < ?").run(cutoff).changes
    );
  }

  countClients(): number {
    return this.guard("countClients", () =>
      this.db.prepare<[], { c: number }>("SELECT COUNT(*) AS c FROM clients").get()?.c ?? 0
    );
  }

  countPendingMessages(): number {
    return this.guard("countPendingMessages", () =>
      this.db.prepare<[], { c: number }>("SELECT COUNT(*) AS c FROM messages").get()?.c ?? 0
    );
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private findClient(id: Buffer): ClientRow | undefined {
    return this.db.prepare<[Buffer], ClientRow>("SELECT * FROM clients WHERE id = ?").get(id);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw new StoreFailureError(operation, err);
    }
  }
}

function rowToClient(row: ClientRow): Client {
  return {
    id: row.id,
    name: row.name,
    publicKey: row.public_key,
    lastSeen: row.last_seen,
    createdAt: row.created_at,
  };
}

function rowToMessage(row: MessageRow): StoredMessage {
  return {
    id: row.id,
    recipientId: row.recipient_id,
    senderId: row.sender_id,
    type: row.type,
    content: row.content,
    createdAt: row.created_at,
  };
}
