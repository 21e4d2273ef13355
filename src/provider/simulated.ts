/**
 * graphform — Simulated Provider
 *
 * An in-process stand-in for a cloud API. Generates per-kind identifiers and
 * outputs, optionally persists its inventory to a JSON file so separate CLI
 * runs see the same "cloud", and supports failure injection for tests.
 */

import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { attributesSchema, attributeValueSchema, resourceKindSchema } from "../declarations/schema.js";
import type { Attributes, ResourceKind } from "../graph/types.js";
import type { ResourceOutputs } from "../state/types.js";
import type { ProviderCallContext, ResourceProvider } from "./types.js";

export type SimulatedOperation = "create" | "update" | "destroy" | "describe";

export type SimulatedCall = {
  operation: SimulatedOperation;
  kind?: ResourceKind;
  id?: string;
  address?: string;
  attributes?: Attributes;
};

export type SimulatedProviderOptions = {
  /** JSON file holding the simulated inventory between runs. */
  persistPath?: string;
  /** Artificial latency per call (ms). */
  latencyMs?: number;
  /** Return an error message to make a call fail. */
  shouldFail?: (call: SimulatedCall) => string | false | undefined;
};

type SimulatedRecord = {
  kind: ResourceKind;
  attributes: Attributes;
  outputs: ResourceOutputs;
};

const ID_PREFIX: Record<ResourceKind, string> = {
  "network": "net",
  "security-policy": "sg",
  "identity-role": "role",
  "registry": "repo",
  "compute-service": "svc",
};

const inventorySchema = z.object({
  sequence: z.number().int().nonnegative(),
  resources: z.record(
    z.string(),
    z.object({
      kind: resourceKindSchema,
      attributes: attributesSchema,
      outputs: z.record(z.string(), attributeValueSchema),
    }),
  ),
});

export class SimulatedProvider implements ResourceProvider {
  readonly name = "simulated";
  /** Every call in order, including failed ones. */
  readonly calls: SimulatedCall[] = [];

  private records = new Map<string, SimulatedRecord>();
  private sequence = 0;
  private ready: Promise<void> | null = null;
  private writes: Promise<void> = Promise.resolve();
  private options: SimulatedProviderOptions;

  constructor(options: SimulatedProviderOptions = {}) {
    this.options = options;
  }

  /** Read the persisted inventory, if any. Called lazily by every operation. */
  initialize(): Promise<void> {
    this.ready ??= this.loadInventory();
    return this.ready;
  }

  private async loadInventory(): Promise<void> {
    if (!this.options.persistPath) return;

    let raw: string;
    try {
      raw = await fs.readFile(this.options.persistPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }
    const inventory = inventorySchema.parse(JSON.parse(raw));
    this.sequence = inventory.sequence;
    this.records = new Map(Object.entries(inventory.resources));
  }

  async create(kind: ResourceKind, attributes: Attributes, ctx?: ProviderCallContext): Promise<ResourceOutputs> {
    await this.begin({ operation: "create", kind, address: ctx?.address, attributes });

    this.sequence += 1;
    const id = `${ID_PREFIX[kind]}-${String(this.sequence).padStart(6, "0")}`;
    const outputs = buildOutputs(kind, id, attributes);
    this.records.set(id, { kind, attributes: structuredClone(attributes), outputs });
    await this.persist();
    return structuredClone(outputs);
  }

  async update(id: string, attributes: Attributes, ctx?: ProviderCallContext): Promise<ResourceOutputs> {
    await this.begin({ operation: "update", id, kind: ctx?.kind, address: ctx?.address, attributes });

    const record = this.records.get(id);
    if (!record) throw new Error(`Resource ${id} not found`);
    const outputs = buildOutputs(record.kind, id, attributes);
    this.records.set(id, { kind: record.kind, attributes: structuredClone(attributes), outputs });
    await this.persist();
    return structuredClone(outputs);
  }

  async destroy(id: string, ctx?: ProviderCallContext): Promise<void> {
    await this.begin({ operation: "destroy", id, kind: ctx?.kind, address: ctx?.address });

    if (!this.records.delete(id)) throw new Error(`Resource ${id} not found`);
    await this.persist();
  }

  async describe(id: string, ctx?: ProviderCallContext): Promise<Attributes | null> {
    await this.begin({ operation: "describe", id, kind: ctx?.kind, address: ctx?.address });
    const record = this.records.get(id);
    return record ? structuredClone(record.attributes) : null;
  }

  /** Ids currently alive in the simulated cloud. */
  listIds(): string[] {
    return [...this.records.keys()];
  }

  /** Drop a resource behind the orchestrator's back (simulates out-of-band deletion). */
  forget(id: string): boolean {
    return this.records.delete(id);
  }

  private async begin(call: SimulatedCall): Promise<void> {
    await this.initialize();
    this.calls.push(call);
    if (this.options.latencyMs) await sleep(this.options.latencyMs);
    const failure = this.options.shouldFail?.(call);
    if (failure) throw new Error(failure);
  }

  private async persist(): Promise<void> {
    const filePath = this.options.persistPath;
    if (!filePath) return;
    const content = JSON.stringify({ sequence: this.sequence, resources: Object.fromEntries(this.records) }, null, 2);
    const write = this.writes.then(async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content, "utf-8");
    });
    // Writes are serialized; a failure surfaces through the awaiting call only.
    this.writes = write.catch(() => undefined);
    await write;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function buildOutputs(kind: ResourceKind, id: string, attributes: Attributes): ResourceOutputs {
  const arn = `arn:sim:${kind}:${id}`;
  switch (kind) {
    case "network":
      return { id, arn, cidr_block: attributes.cidr_block ?? null };
    case "security-policy":
      return { id, arn };
    case "identity-role":
      return { id, arn, name: typeof attributes.name === "string" ? attributes.name : id };
    case "registry":
      return { id, arn, url: `registry.sim.local/${typeof attributes.name === "string" ? attributes.name : id}` };
    case "compute-service": {
      const port = typeof attributes.port === "number" ? attributes.port : 3000;
      return { id, arn, endpoint: `http://${id}.svc.sim.local:${port}` };
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
