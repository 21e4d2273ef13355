/**
 * graphform — Orchestrator
 *
 * Wires the graph builder, planner and executor to a state store and a
 * provider. Graph and declaration errors are raised before the state lock
 * is taken or any provider call is made.
 */

import { randomUUID } from "node:crypto";
import os from "node:os";

import { Executor } from "./engine/executor.js";
import type { ApplyResult, ExecutionEventListener } from "./engine/types.js";
import { StateCorruptionError, StateLockError } from "./errors.js";
import { buildResourceGraph } from "./graph/builder.js";
import { resolveOrder } from "./graph/resolver.js";
import type { AttributeValue, DeclarationDocument, ResourceGraph } from "./graph/types.js";
import { getLogger, type Logger } from "./logging/index.js";
import { generateDestroyPlan, generatePlan, resolveStackOutputs } from "./plan/planner.js";
import type { Plan } from "./plan/types.js";
import type { ResourceProvider } from "./provider/types.js";
import type { StateLock, StateStore } from "./state/types.js";
import type { ExecutionConfig } from "./config/schema.js";

export type OrchestratorOptions = {
  store: StateStore;
  provider: ResourceProvider;
  execution?: Partial<ExecutionConfig>;
  logger?: Logger;
  /** Recorded on the state lock while an apply or destroy runs. */
  lockOwner?: string;
};

export type ApplyReport = ApplyResult & {
  plan: Plan;
  /** Stack outputs resolved against the state left by this run. */
  outputs: Record<string, AttributeValue>;
};

export type RunOptions = {
  signal?: AbortSignal;
};

export type VerifyReport = {
  /** Provider ids described, current and deposed. */
  checked: number;
};

export class Orchestrator {
  private readonly store: StateStore;
  private readonly provider: ResourceProvider;
  private readonly executor: Executor;
  private readonly logger: Logger;
  private readonly lockOwner: string;

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.logger = options.logger ?? getLogger("orchestrator");
    this.lockOwner = options.lockOwner ?? `${os.hostname()}:${process.pid}`;
    this.executor = new Executor(this.store, this.provider, {
      ...options.execution,
      logger: this.logger.child("executor"),
    });
  }

  /** Subscribe to executor lifecycle events. */
  on(listener: ExecutionEventListener): () => void {
    return this.executor.on(listener);
  }

  /** Compute the plan for `document` without touching the provider. */
  async plan(document: DeclarationDocument): Promise<Plan> {
    const graph = buildResourceGraph(document);
    const plan = generatePlan(graph, await this.store.load());
    this.logger.debug(`Planned ${plan.actions.length} action(s)`, { planId: plan.id });
    return plan;
  }

  /** Plan and execute `document` under the state lock. */
  async apply(document: DeclarationDocument, options: RunOptions = {}): Promise<ApplyReport> {
    const graph = buildResourceGraph(document);
    resolveOrder(graph);
    return this.withLock("apply", async () => {
      const plan = generatePlan(graph, await this.store.load());
      return this.run(plan, graph, options);
    });
  }

  /** Destroy everything recorded in state, dependents first. */
  async destroy(options: RunOptions = {}): Promise<ApplyReport> {
    return this.withLock("destroy", async () => {
      const plan = generateDestroyPlan(await this.store.load());
      return this.run(plan, null, options);
    });
  }

  /**
   * Describe every recorded provider id.
   *
   * @throws StateCorruptionError listing addresses whose resource no longer exists
   */
  async verify(): Promise<VerifyReport> {
    const snapshot = await this.store.load();
    const missing: string[] = [];
    let checked = 0;

    for (const state of snapshot.values()) {
      const ctx = { address: state.address, kind: state.kind };
      checked++;
      if ((await this.provider.describe(state.id, ctx)) === null) missing.push(state.address);
      for (const deposed of state.deposed) {
        checked++;
        if ((await this.provider.describe(deposed.id, { ...ctx, kind: deposed.kind })) === null) {
          missing.push(`${state.address}#${deposed.id}`);
        }
      }
    }

    if (missing.length > 0) {
      throw new StateCorruptionError(missing, "recorded resource no longer exists at the provider");
    }
    this.logger.info(`Verified ${checked} resource(s)`);
    return { checked };
  }

  private async run(plan: Plan, graph: ResourceGraph | null, options: RunOptions): Promise<ApplyReport> {
    const result = await this.executor.execute(plan, { signal: options.signal });
    const snapshot = await this.store.load();
    const outputs = graph ? resolveStackOutputs(graph.outputs, (address) => snapshot.get(address)?.outputs) : {};
    return { ...result, plan, outputs };
  }

  private async withLock<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const lock: StateLock = {
      id: randomUUID(),
      operation,
      lockedBy: this.lockOwner,
      lockedAt: new Date().toISOString(),
    };
    if (!(await this.store.acquireLock(lock))) {
      const held = await this.store.getLock();
      throw new StateLockError(held?.lockedBy ?? "unknown", held?.lockedAt ?? "unknown");
    }
    try {
      return await fn();
    } finally {
      await this.store.releaseLock(lock.id);
    }
  }
}
