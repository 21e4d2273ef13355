/**
 * graphform — State Storage (InMemory + SQLite)
 */

import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import type { StateConfig } from "../config/schema.js";

import { attributesSchema, attributeValueSchema, resourceKindSchema } from "../declarations/schema.js";
import { StateCorruptionError } from "../errors.js";
import type { ResourceAddress } from "../graph/types.js";
import type { ResourceState, StateLock, StateSnapshot, StateStore } from "./types.js";

// ── InMemory ────────────────────────────────────────────────────

export class InMemoryStateStore implements StateStore {
  private resources = new Map<ResourceAddress, ResourceState>();
  private lock: StateLock | null = null;

  async initialize(): Promise<void> {}

  async load(): Promise<StateSnapshot> {
    return new Map([...this.resources].map(([k, v]) => [k, structuredClone(v)]));
  }
  async commit(address: ResourceAddress, state: ResourceState): Promise<void> {
    this.resources.set(address, structuredClone(state));
  }
  async remove(address: ResourceAddress): Promise<void> {
    this.resources.delete(address);
  }

  async acquireLock(lock: StateLock): Promise<boolean> {
    if (this.lock) return false;
    this.lock = structuredClone(lock);
    return true;
  }
  async releaseLock(lockId: string): Promise<boolean> {
    if (!this.lock || this.lock.id !== lockId) return false;
    this.lock = null;
    return true;
  }
  async getLock(): Promise<StateLock | null> {
    return this.lock ? structuredClone(this.lock) : null;
  }

  async close(): Promise<void> {
    this.resources.clear();
    this.lock = null;
  }
}

// ── SQLite ──────────────────────────────────────────────────────

const LOCK_KEY = "default";

export class SQLiteStateStore implements StateStore {
  private db: import("better-sqlite3").Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    const Database = (await import("better-sqlite3")).default;
    if (this.dbPath !== ":memory:") fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    this.db = new Database(this.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS resources (
        address TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        provider_id TEXT NOT NULL,
        state_json TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS state_lock (
        lock_key TEXT PRIMARY KEY,
        lock_id TEXT NOT NULL,
        operation TEXT NOT NULL,
        locked_by TEXT NOT NULL,
        locked_at TEXT NOT NULL,
        info TEXT
      );
    `);
  }

  async load(): Promise<StateSnapshot> {
    const rows = z.array(resourceRowSchema).parse(this.requireDb().prepare("SELECT address, state_json FROM resources ORDER BY address").all());
    const snapshot = new Map<ResourceAddress, ResourceState>();
    for (const row of rows) snapshot.set(row.address, rowToState(row.address, row.state_json));
    return snapshot;
  }

  async commit(address: ResourceAddress, state: ResourceState): Promise<void> {
    this.requireDb()
      .prepare(`INSERT OR REPLACE INTO resources (address, kind, provider_id, state_json, updated_at) VALUES (?, ?, ?, ?, ?)`)
      .run(address, state.kind, state.id, JSON.stringify(state), state.updatedAt);
  }

  async remove(address: ResourceAddress): Promise<void> {
    this.requireDb().prepare("DELETE FROM resources WHERE address = ?").run(address);
  }

  async acquireLock(lock: StateLock): Promise<boolean> {
    const result = this.requireDb()
      .prepare(`INSERT OR IGNORE INTO state_lock (lock_key, lock_id, operation, locked_by, locked_at, info) VALUES (?, ?, ?, ?, ?, ?)`)
      .run(LOCK_KEY, lock.id, lock.operation, lock.lockedBy, lock.lockedAt, lock.info ?? null);
    return result.changes > 0;
  }

  async releaseLock(lockId: string): Promise<boolean> {
    return this.requireDb().prepare("DELETE FROM state_lock WHERE lock_key = ? AND lock_id = ?").run(LOCK_KEY, lockId).changes > 0;
  }

  async getLock(): Promise<StateLock | null> {
    const row = lockRowSchema.optional().parse(this.requireDb().prepare("SELECT * FROM state_lock WHERE lock_key = ?").get(LOCK_KEY));
    if (!row) return null;
    return { id: row.lock_id, operation: row.operation, lockedBy: row.locked_by, lockedAt: row.locked_at, info: row.info ?? undefined };
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  private requireDb(): import("better-sqlite3").Database {
    if (!this.db) throw new Error("SQLiteStateStore used before initialize()");
    return this.db;
  }
}

// ── Factory ─────────────────────────────────────────────────────

export function createStateStore(config: StateConfig): StateStore {
  return config.backend === "memory" ? new InMemoryStateStore() : new SQLiteStateStore(config.path);
}

// ── Helpers ─────────────────────────────────────────────────────

const resourceRowSchema = z.object({ address: z.string(), state_json: z.string() });

const lockRowSchema = z.object({
  lock_id: z.string(),
  operation: z.string(),
  locked_by: z.string(),
  locked_at: z.string(),
  info: z.string().nullable(),
});

const outputsSchema = z.record(z.string(), attributeValueSchema);

export const resourceStateSchema = z.object({
  address: z.string(),
  type: z.string(),
  name: z.string(),
  kind: resourceKindSchema,
  id: z.string(),
  declared: attributesSchema,
  attributes: attributesSchema,
  outputs: outputsSchema,
  dependencies: z.array(z.string()),
  deposed: z.array(
    z.object({
      id: z.string(),
      kind: resourceKindSchema,
      outputs: outputsSchema,
      dependencies: z.array(z.string()),
      deposedAt: z.string(),
    }),
  ),
  updatedAt: z.string(),
});

function rowToState(address: ResourceAddress, json: string): ResourceState {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new StateCorruptionError([address], "state entry is not valid JSON");
  }
  const parsed = resourceStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StateCorruptionError([address], `state entry is malformed (${parsed.error.issues[0]?.message ?? "unknown"})`);
  }
  if (parsed.data.address !== address) {
    throw new StateCorruptionError([address], `state entry is keyed under "${address}" but describes "${parsed.data.address}"`);
  }
  return parsed.data;
}
