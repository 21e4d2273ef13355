/**
 * graphform — State Storage Tests
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import Database from "better-sqlite3";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { StateCorruptionError } from "../errors.js";
import { InMemoryStateStore, SQLiteStateStore, createStateStore } from "./storage.js";
import type { ResourceState, StateLock, StateStore } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function resource(address: string, id: string, overrides: Partial<ResourceState> = {}): ResourceState {
  const [type, name] = address.split(".");
  return {
    address,
    type,
    name,
    kind: "network",
    id,
    declared: { cidr_block: "10.0.0.0/16" },
    attributes: { cidr_block: "10.0.0.0/16" },
    outputs: { id, cidr_block: "10.0.0.0/16" },
    dependencies: [],
    deposed: [],
    updatedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

function lock(id: string): StateLock {
  return { id, operation: "apply", lockedBy: "tester:1", lockedAt: "2026-01-01T00:00:00.000Z" };
}

// ---------------------------------------------------------------------------
// Shared behaviour
// ---------------------------------------------------------------------------

const backends: Array<[string, (dir: string) => StateStore]> = [
  ["InMemoryStateStore", () => new InMemoryStateStore()],
  ["SQLiteStateStore", (dir) => new SQLiteStateStore(path.join(dir, "nested", "state.db"))],
];

describe.each(backends)("%s", (_name, create) => {
  let dir: string;
  let store: StateStore;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "graphform-state-"));
    store = create(dir);
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty", async () => {
    expect((await store.load()).size).toBe(0);
  });

  it("commits and loads resources by address", async () => {
    await store.commit("network.main", resource("network.main", "net-000001"));
    await store.commit("network.edge", resource("network.edge", "net-000002", { dependencies: ["network.main"] }));

    const snapshot = await store.load();
    expect(snapshot.get("network.main")).toEqual(resource("network.main", "net-000001"));
    expect(snapshot.get("network.edge")?.dependencies).toEqual(["network.main"]);
  });

  it("replaces an entry on re-commit", async () => {
    await store.commit("network.main", resource("network.main", "net-000001"));
    await store.commit("network.main", resource("network.main", "net-000009"));

    const snapshot = await store.load();
    expect(snapshot.size).toBe(1);
    expect(snapshot.get("network.main")?.id).toBe("net-000009");
  });

  it("round-trips deposed instances", async () => {
    const deposed = [{ id: "net-000000", kind: "network" as const, outputs: { id: "net-000000" }, dependencies: [], deposedAt: "2026-01-02T00:00:00.000Z" }];
    await store.commit("network.main", resource("network.main", "net-000001", { deposed }));

    expect((await store.load()).get("network.main")?.deposed).toEqual(deposed);
  });

  it("removes entries", async () => {
    await store.commit("network.main", resource("network.main", "net-000001"));
    await store.remove("network.main");
    await store.remove("network.unknown");

    expect((await store.load()).size).toBe(0);
  });

  it("returns snapshots that do not alias stored state", async () => {
    await store.commit("network.main", resource("network.main", "net-000001"));
    const first = await store.load();
    const entry = first.get("network.main");
    if (entry) entry.attributes.cidr_block = "mutated";

    expect((await store.load()).get("network.main")?.attributes.cidr_block).toBe("10.0.0.0/16");
  });

  it("grants the lock to one holder at a time", async () => {
    expect(await store.acquireLock(lock("lock-a"))).toBe(true);
    expect(await store.acquireLock(lock("lock-b"))).toBe(false);
    expect(await store.getLock()).toEqual(lock("lock-a"));

    expect(await store.releaseLock("lock-b")).toBe(false);
    expect(await store.releaseLock("lock-a")).toBe(true);
    expect(await store.getLock()).toBeNull();
    expect(await store.acquireLock(lock("lock-b"))).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// SQLite specifics
// ---------------------------------------------------------------------------

describe("SQLiteStateStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "graphform-sqlite-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("persists across store instances", async () => {
    const file = path.join(dir, "state.db");
    const first = new SQLiteStateStore(file);
    await first.initialize();
    await first.commit("network.main", resource("network.main", "net-000001"));
    await first.close();

    const second = new SQLiteStateStore(file);
    await second.initialize();
    expect((await second.load()).get("network.main")?.id).toBe("net-000001");
    await second.close();
  });

  it("raises StateCorruptionError for an unreadable row", async () => {
    const file = path.join(dir, "state.db");
    const store = new SQLiteStateStore(file);
    await store.initialize();
    await store.commit("network.main", resource("network.main", "net-000001"));

    const raw = new Database(file);
    raw.prepare("UPDATE resources SET state_json = ? WHERE address = ?").run("{ broken", "network.main");
    raw.close();

    await expect(store.load()).rejects.toBeInstanceOf(StateCorruptionError);
    await expect(store.load()).rejects.toThrow("State corruption (network.main): state entry is not valid JSON");
    await store.close();
  });

  it("raises StateCorruptionError for an entry filed under another address", async () => {
    const file = path.join(dir, "state.db");
    const store = new SQLiteStateStore(file);
    await store.initialize();
    await store.commit("network.main", resource("network.other", "net-000001"));

    await expect(store.load()).rejects.toThrow(/keyed under "network.main" but describes "network.other"/);
    await store.close();
  });

  it("refuses use before initialize", async () => {
    await expect(new SQLiteStateStore(path.join(dir, "x.db")).load()).rejects.toThrow(/before initialize/);
  });
});

describe("createStateStore", () => {
  it("picks the backend from config", () => {
    expect(createStateStore({ backend: "memory", path: "unused" })).toBeInstanceOf(InMemoryStateStore);
    expect(createStateStore({ backend: "sqlite", path: "state.db" })).toBeInstanceOf(SQLiteStateStore);
  });
});
