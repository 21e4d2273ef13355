/**
 * graphform — Executor
 *
 * Carries out a plan against a provider:
 * - Runs layers in order, actions within a layer with bounded concurrency
 * - Re-resolves references from outputs committed earlier in the same run,
 *   skipping updates whose resolved attributes match the applied ones
 * - Commits each successful action to the state store as it completes
 * - Stops starting new actions after the first failure or on abort;
 *   actions already in flight finish and are recorded
 * - Retries failed provider calls with exponential backoff
 * - Emits lifecycle events
 */

import { isDeepStrictEqual } from "node:util";

import { resolveAttributes } from "../graph/references.js";
import type { Attributes } from "../graph/types.js";
import { getLogger, type Logger } from "../logging/index.js";
import { planLayers } from "../plan/planner.js";
import type { Plan, PlanAction } from "../plan/types.js";
import type { ProviderCallContext, ResourceProvider } from "../provider/types.js";
import type { DeposedInstance, ResourceOutputs, ResourceState, StateStore } from "../state/types.js";
import { ProviderActionError, StateCorruptionError, toError } from "../errors.js";
import type {
  ActionOutcome,
  ApplyResult,
  ApplyStatus,
  ExecutionEvent,
  ExecutionEventListener,
  ExecutorOptions,
} from "./types.js";

// =============================================================================
// Default Options
// =============================================================================

const DEFAULT_OPTIONS: Omit<ExecutorOptions, "logger"> = {
  maxConcurrency: 4,
  actionTimeoutMs: 120_000, // 2 min per action
  maxRetries: 0,
  retryDelayMs: 1000,
};

const MAX_BACKOFF_MS = 30_000;

export type ExecuteOptions = {
  /** Aborting stops new actions from starting; in-flight actions finish. */
  signal?: AbortSignal;
};

type WorkingState = Map<string, ResourceState>;

// =============================================================================
// Executor
// =============================================================================

export class Executor {
  private options: Omit<ExecutorOptions, "logger">;
  private logger: Logger;
  private listeners: ExecutionEventListener[] = [];

  constructor(
    private readonly store: StateStore,
    private readonly provider: ResourceProvider,
    options?: Partial<ExecutorOptions>,
  ) {
    const { logger, ...rest } = options ?? {};
    this.options = { ...DEFAULT_OPTIONS, ...rest };
    this.logger = logger ?? getLogger("executor");
  }

  /** Subscribe to execution lifecycle events. */
  on(listener: ExecutionEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private emit(event: ExecutionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.warn(`Event listener threw on ${event.type}: ${toError(err).message}`);
      }
    }
  }

  /**
   * Execute a plan. Provider failures are recorded per action and reflected
   * in the result status; only state store load failures reject.
   */
  async execute(plan: Plan, options: ExecuteOptions = {}): Promise<ApplyResult> {
    const started = Date.now();
    const { signal } = options;
    const log = this.logger.withContext({ planId: plan.id });
    const layers = planLayers(plan);
    const total = plan.actions.length;

    const outcomes = new Map<string, ActionOutcome>(plan.actions.map((a) => [a.id, notAttempted(a)]));
    const working: WorkingState = new Map(await this.store.load());

    this.emit({
      type: "apply:start",
      planId: plan.id,
      timestamp: new Date().toISOString(),
      message: `Applying ${total} action(s) in ${layers.length} layer(s)`,
      progress: { completed: 0, total, percentage: 0 },
    });
    log.info(`Applying ${total} action(s) in ${layers.length} layer(s)`);

    let failed = false;
    let completed = 0;
    const stopped = () => failed || (signal?.aborted ?? false);

    for (const layer of layers) {
      if (stopped()) break;

      await runBounded(layer, this.options.maxConcurrency, async (action) => {
        if (stopped()) return;

        const outcome = await this.runAction(plan, action, working, signal, log);
        outcomes.set(action.id, outcome);
        completed++;
        if (outcome.status === "failed") failed = true;

        this.emit({
          type: outcome.status === "succeeded" ? "action:complete" : "action:failed",
          planId: plan.id,
          actionId: action.id,
          address: action.address,
          timestamp: new Date().toISOString(),
          message:
            outcome.status === "succeeded"
              ? `${action.id} completed in ${outcome.durationMs}ms`
              : `${action.id} failed: ${outcome.error ?? "unknown error"}`,
          error: outcome.error,
          outputs: outcome.outputs,
          progress: { completed, total, percentage: Math.round((completed / total) * 100) },
        });
      });
    }

    for (const outcome of outcomes.values()) {
      if (outcome.status !== "not-attempted") continue;
      this.emit({
        type: "action:skipped",
        planId: plan.id,
        actionId: outcome.actionId,
        address: outcome.address,
        timestamp: new Date().toISOString(),
        message: `${outcome.actionId} not attempted`,
      });
    }

    const list = plan.actions.map((a) => outcomes.get(a.id) ?? notAttempted(a));
    const errors = list.flatMap((o) => (o.error ? [o.error] : []));
    const pending = list.some((o) => o.status === "not-attempted");
    const status: ApplyStatus = failed ? "failed" : pending && signal?.aborted ? "cancelled" : "succeeded";

    const result: ApplyResult = {
      planId: plan.id,
      status,
      startedAt: new Date(started).toISOString(),
      completedAt: new Date().toISOString(),
      totalDurationMs: Date.now() - started,
      outcomes: list,
      errors,
    };

    this.emit({
      type: status === "succeeded" ? "apply:complete" : status === "failed" ? "apply:failed" : "apply:cancelled",
      planId: plan.id,
      timestamp: result.completedAt,
      message: `Apply ${status} in ${result.totalDurationMs}ms (${completed}/${total} action(s) attempted)`,
      progress: { completed, total, percentage: total === 0 ? 100 : Math.round((completed / total) * 100) },
    });
    if (status === "succeeded") log.info(`Apply succeeded in ${result.totalDurationMs}ms`);
    else log.warn(`Apply ${status}: ${completed}/${total} action(s) attempted`);

    return result;
  }

  // ---------------------------------------------------------------------------
  // Single action
  // ---------------------------------------------------------------------------

  private async runAction(
    plan: Plan,
    action: PlanAction,
    working: WorkingState,
    signal: AbortSignal | undefined,
    log: Logger,
  ): Promise<ActionOutcome> {
    const start = Date.now();
    const actionLog = log.withContext({ address: action.address, action: action.action });
    const maxAttempts = 1 + Math.max(0, this.options.maxRetries);
    let attempts = 0;

    this.emit({
      type: "action:start",
      planId: plan.id,
      actionId: action.id,
      address: action.address,
      timestamp: new Date().toISOString(),
      message: `Starting ${action.id}`,
    });
    actionLog.debug(`Starting ${action.id}`);

    try {
      const attributes = action.action === "destroy" ? {} : resolveInputs(action, working);

      // Planned against outputs that were unknown and turned out unchanged.
      const prior = working.get(action.address);
      if (action.action === "update" && prior && isDeepStrictEqual(attributes, prior.attributes)) {
        const committed = await this.record(action, attributes, undefined, working);
        actionLog.info(`${action.id} unchanged after resolving references; provider not called`);
        return { ...baseOutcome(action), status: "succeeded", durationMs: Date.now() - start, attempts, outputs: committed };
      }

      let outputs: ResourceOutputs | undefined;
      for (;;) {
        attempts++;
        try {
          outputs = await this.callProvider(action, attributes);
          break;
        } catch (err) {
          const error = toError(err);
          if (attempts >= maxAttempts || signal?.aborted) {
            throw new ProviderActionError(action.address, action.action, error);
          }
          const delay = Math.min(this.options.retryDelayMs * 2 ** (attempts - 1), MAX_BACKOFF_MS);
          actionLog.warn(`Attempt ${attempts}/${maxAttempts} failed, retrying in ${delay}ms: ${error.message}`);
          this.emit({
            type: "action:retry",
            planId: plan.id,
            actionId: action.id,
            address: action.address,
            timestamp: new Date().toISOString(),
            message: `Retrying ${action.id} (attempt ${attempts + 1}/${maxAttempts})`,
            error: error.message,
          });
          await sleep(delay);
          if (signal?.aborted) throw new ProviderActionError(action.address, action.action, error);
        }
      }

      const committed = await this.record(action, attributes, outputs, working);
      const durationMs = Date.now() - start;
      actionLog.info(`${action.id} succeeded`, { duration: durationMs });
      return { ...baseOutcome(action), status: "succeeded", durationMs, attempts, outputs: committed };
    } catch (err) {
      const error = toError(err);
      actionLog.error(`${action.id} failed: ${error.message}`);
      return { ...baseOutcome(action), status: "failed", durationMs: Date.now() - start, attempts, error: error.message };
    }
  }

  private callProvider(action: PlanAction, attributes: Attributes): Promise<ResourceOutputs | undefined> {
    const controller = new AbortController();
    const ctx: ProviderCallContext = { address: action.address, kind: action.kind, signal: controller.signal };
    const ms = this.options.actionTimeoutMs;

    const call = async (): Promise<ResourceOutputs | undefined> => {
      switch (action.action) {
        case "create":
          return this.provider.create(action.kind, attributes, ctx);
        case "update":
          return this.provider.update(requireTarget(action), attributes, ctx);
        case "destroy":
          await this.provider.destroy(requireTarget(action), ctx);
          return undefined;
      }
    };

    return withTimeout(call(), ms, `Action "${action.id}" timed out after ${ms}ms`, () => controller.abort());
  }

  /**
   * Apply the action's effect to the working state (synchronously, so later
   * layers see it) and persist it. Returns the outputs now recorded.
   */
  private async record(
    action: PlanAction,
    attributes: Attributes,
    outputs: ResourceOutputs | undefined,
    working: WorkingState,
  ): Promise<ResourceOutputs | undefined> {
    const now = new Date().toISOString();
    const prior = working.get(action.address);

    switch (action.action) {
      case "create": {
        const id = outputs?.id;
        if (!outputs || typeof id !== "string" || id === "") {
          throw new ProviderActionError(action.address, "create", new Error("provider returned no resource id"));
        }
        const deposed: DeposedInstance[] = [...(prior?.deposed ?? [])];
        if (action.reason === "replace" && prior) {
          deposed.push({
            id: prior.id,
            kind: prior.kind,
            outputs: prior.outputs,
            dependencies: prior.dependencies,
            deposedAt: now,
          });
        }
        const next: ResourceState = {
          address: action.address,
          type: action.type,
          name: action.name,
          kind: action.kind,
          id,
          declared: action.declared,
          attributes,
          outputs,
          dependencies: action.dependencies,
          deposed,
          updatedAt: now,
        };
        working.set(action.address, next);
        await this.store.commit(action.address, next);
        return outputs;
      }

      case "update": {
        if (!prior) throw new StateCorruptionError([action.address], "no state entry to update");
        const next: ResourceState = {
          ...prior,
          declared: action.declared,
          attributes,
          outputs: outputs ?? prior.outputs,
          dependencies: action.dependencies,
          updatedAt: now,
        };
        working.set(action.address, next);
        await this.store.commit(action.address, next);
        return next.outputs;
      }

      case "destroy": {
        if (action.reason === "removed") {
          working.delete(action.address);
          await this.store.remove(action.address);
          return undefined;
        }
        if (!prior) return undefined;
        // updatedAt tracks the current instance, which this does not touch.
        const next: ResourceState = { ...prior, deposed: prior.deposed.filter((d) => d.id !== action.targetId) };
        working.set(action.address, next);
        await this.store.commit(action.address, next);
        return undefined;
      }
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Every reference must resolve by the time an action runs; producers are
 * always in an earlier layer.
 */
function resolveInputs(action: PlanAction, working: WorkingState): Attributes {
  const { values, unknown } = resolveAttributes(action.declared, (address) => working.get(address)?.outputs);
  if (unknown.length > 0) {
    throw new Error(`Unresolved references in ${unknown.join(", ")}`);
  }
  return values;
}

function requireTarget(action: PlanAction): string {
  if (!action.targetId) throw new Error(`${action.id} has no target id`);
  return action.targetId;
}

function baseOutcome(action: PlanAction): Pick<ActionOutcome, "actionId" | "address" | "action" | "reason"> {
  return { actionId: action.id, address: action.address, action: action.action, reason: action.reason };
}

function notAttempted(action: PlanAction): ActionOutcome {
  return { ...baseOutcome(action), status: "not-attempted", durationMs: 0, attempts: 0 };
}

/**
 * Run `worker` over `items` with at most `limit` in flight.
 */
async function runBounded<T>(items: readonly T[], limit: number, worker: (item: T) => Promise<void>): Promise<void> {
  let next = 0;
  const size = Math.max(1, Math.min(limit, items.length));
  const runners = Array.from({ length: size }, async () => {
    while (next < items.length) {
      const item = items[next++];
      await worker(item);
    }
  });
  await Promise.all(runners);
}

function withTimeout<T>(promise: Promise<T>, ms: number, message: string, onTimeout?: () => void): Promise<T> {
  if (ms <= 0) return promise;
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      reject(new Error(message));
    }, ms);
    promise
      .then((val) => { clearTimeout(timer); resolve(val); })
      .catch((err: unknown) => { clearTimeout(timer); reject(toError(err)); });
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
