import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { IN_MEMORY, openDatabase } from "../db/database.js";
import { Store } from "../store/store.js";
import {
  MessageIdExhaustedError,
  MessageTooLargeError,
  NameTakenError,
  StoreFailureError,
  UnknownClientError,
} from "../store/errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let clock = 1_000;
let db: Database.Database;
let store: Store;

function key(fill: number): Buffer {
  return Buffer.alloc(160, fill);
}

beforeEach(() => {
  clock = 1_000;
  db = openDatabase(IN_MEMORY);
  store = new Store(db, { now: () => clock });
});

afterEach(() => {
  store.close();
});

// ---------------------------------------------------------------------------
// Clients
// ---------------------------------------------------------------------------

describe("createClient", () => {
  it("assigns distinct 16-byte ids and keeps the submitted key", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));

    expect(alice.length).toBe(16);
    expect(alice.equals(bob)).toBe(false);
    expect(store.getClient(alice).publicKey.equals(key(1))).toBe(true);
    expect(store.getClient(bob).publicKey.equals(key(2))).toBe(true);
  });

  it("rejects a taken name without adding a row", () => {
    store.createClient("alice", key(1));

    expect(() => store.createClient("alice", key(9))).toThrow(NameTakenError);
    expect(store.countClients()).toBe(1);
  });

  it("treats names case-sensitively", () => {
    store.createClient("alice", key(1));
    expect(() => store.createClient("Alice", key(2))).not.toThrow();
    expect(store.countClients()).toBe(2);
  });

  it("stamps last_seen and created_at at registration", () => {
    clock = 5_000;
    const id = store.createClient("alice", key(1));
    expect(store.getClient(id)).toMatchObject({ name: "alice", lastSeen: 5_000, createdAt: 5_000 });
  });
});

describe("getClient / touch", () => {
  it("fails for an unknown id", () => {
    expect(() => store.getClient(Buffer.alloc(16, 0xee))).toThrow(UnknownClientError);
    expect(() => store.touch(Buffer.alloc(16, 0xee))).toThrow(UnknownClientError);
  });

  it("touch updates last_seen only", () => {
    const id = store.createClient("alice", key(1));
    clock = 9_000;
    store.touch(id);

    expect(store.getClient(id)).toMatchObject({ lastSeen: 9_000, createdAt: 1_000 });
  });
});

describe("listClients", () => {
  it("returns everyone but the caller, in registration order", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));
    const carol = store.createClient("carol", key(3));

    const list = store.listClients(alice);

    expect(list.map((c) => c.name)).toEqual(["bob", "carol"]);
    expect(list[0].id.equals(bob)).toBe(true);
    expect(list[1].id.equals(carol)).toBe(true);
  });

  it("is empty when the caller is the only client", () => {
    const alice = store.createClient("alice", key(1));
    expect(store.listClients(alice)).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Mailboxes
// ---------------------------------------------------------------------------

describe("enqueueMessage", () => {
  it("returns increasing ids", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));

    const first = store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from("a") });
    const second = store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from("b") });

    expect(second).toBeGreaterThan(first);
  });

  it("rejects an unknown recipient and stores nothing", () => {
    const alice = store.createClient("alice", key(1));

    expect(() =>
      store.enqueueMessage({ recipientId: Buffer.alloc(16, 7), senderId: alice, type: 3, content: Buffer.from("x") })
    ).toThrow(UnknownClientError);
    expect(store.countPendingMessages()).toBe(0);
  });

  it("rejects an unknown sender", () => {
    const bob = store.createClient("bob", key(2));

    expect(() =>
      store.enqueueMessage({ recipientId: bob, senderId: Buffer.alloc(16, 7), type: 3, content: Buffer.from("x") })
    ).toThrow(UnknownClientError);
  });
});

describe("drainMessages", () => {
  it("returns messages oldest first, then nothing", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));
    for (const text of ["m1", "m2", "m3"]) {
      store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from(text) });
    }

    const drained = store.drainMessages(bob);

    expect(drained.map((m) => m.content.toString())).toEqual(["m1", "m2", "m3"]);
    expect(drained.every((m) => m.senderId.equals(alice) && m.type === 3)).toBe(true);
    expect(store.drainMessages(bob)).toEqual([]);
  });

  it("leaves other mailboxes alone", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));
    store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from("for bob") });
    store.enqueueMessage({ recipientId: alice, senderId: bob, type: 3, content: Buffer.from("for alice") });

    store.drainMessages(bob);

    expect(store.countPendingMessages()).toBe(1);
    expect(store.drainMessages(alice).map((m) => m.content.toString())).toEqual(["for alice"]);
  });

  it("keeps empty content intact", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));
    store.enqueueMessage({ recipientId: bob, senderId: alice, type: 1, content: Buffer.alloc(0) });

    const [msg] = store.drainMessages(bob);
    expect(msg.type).toBe(1);
    expect(msg.content.length).toBe(0);
  });

  it("delivers each message exactly once across interleaved sends and drains", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));
    const sent: number[] = [];
    const delivered: number[] = [];

    for (let i = 0; i < 50; i++) {
      sent.push(store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from(`m${i}`) }));
      if (i % 7 === 0) delivered.push(...store.drainMessages(bob).map((m) => m.id));
    }
    delivered.push(...store.drainMessages(bob).map((m) => m.id));

    expect(delivered).toEqual(sent);
  });
});

describe("wire limits", () => {
  it("refuses a message id past the 32-bit range and keeps earlier mail", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));
    const first = store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from("m1") });
    db.prepare("UPDATE sqlite_sequence SET seq = ? WHERE name = 'messages'").run(2 ** 32);

    expect(() =>
      store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from("m2") })
    ).toThrow(MessageIdExhaustedError);
    expect(store.countPendingMessages()).toBe(1);
    expect(store.drainMessages(bob).map((m) => m.id)).toEqual([first]);
  });

  it("accepts the largest 32-bit id", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));
    store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from("m1") });
    db.prepare("UPDATE sqlite_sequence SET seq = ? WHERE name = 'messages'").run(2 ** 32 - 2);

    expect(store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from("m2") })).toBe(
      2 ** 32 - 1
    );
  });

  it("drains only what fits the byte budget and keeps the rest in order", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));
    for (const text of ["aaaaaaaaaa", "bbbbbbbbbb", "cccccccccc"]) {
      store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from(text) });
    }

    // each record is 25 prefix bytes + 10 content bytes
    expect(store.drainMessages(bob, 80).map((m) => m.content.toString())).toEqual(["aaaaaaaaaa", "bbbbbbbbbb"]);
    expect(store.countPendingMessages()).toBe(1);
    expect(store.drainMessages(bob, 80).map((m) => m.content.toString())).toEqual(["cccccccccc"]);
  });

  it("leaves a message larger than the budget queued", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));
    store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.alloc(100) });

    expect(() => store.drainMessages(bob, 50)).toThrow(MessageTooLargeError);
    expect(store.countPendingMessages()).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Transactions and maintenance
// ---------------------------------------------------------------------------

describe("atomically", () => {
  it("rolls back earlier operations when a later one fails", () => {
    const alice = store.createClient("alice", key(1));

    expect(() =>
      store.atomically(() => {
        clock = 2_000;
        store.touch(alice);
        store.enqueueMessage({ recipientId: Buffer.alloc(16, 5), senderId: alice, type: 3, content: Buffer.from("x") });
      })
    ).toThrow(UnknownClientError);

    expect(store.getClient(alice).lastSeen).toBe(1_000);
  });

  it("returns the callback's value on success", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));

    const id = store.atomically(() => {
      store.touch(alice);
      return store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from("x") });
    });

    expect(store.drainMessages(bob).map((m) => m.id)).toEqual([id]);
  });
});

describe("pruneMessagesOlderThan", () => {
  it("removes only messages created before the cutoff", () => {
    const alice = store.createClient("alice", key(1));
    const bob = store.createClient("bob", key(2));
    clock = 100;
    store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from("old") });
    clock = 300;
    store.enqueueMessage({ recipientId: bob, senderId: alice, type: 3, content: Buffer.from("new") });

    expect(store.pruneMessagesOlderThan(200)).toBe(1);
    expect(store.drainMessages(bob).map((m) => m.content.toString())).toEqual(["new"]);
  });
});

describe("failures", () => {
  it("reports storage errors as StoreFailureError", () => {
    store.close();
    expect(() => store.countClients()).toThrow(StoreFailureError);
  });
});
