/**
 * graphform — Executor Types
 */

import type { Logger } from "../logging/index.js";
import type { ActionReason, ActionType } from "../plan/types.js";
import type { ResourceOutputs } from "../state/types.js";

export type ActionStatus = "succeeded" | "failed" | "not-attempted";

export type ActionOutcome = {
  actionId: string;
  address: string;
  action: ActionType;
  reason: ActionReason;
  status: ActionStatus;
  durationMs: number;
  attempts: number;
  outputs?: ResourceOutputs;
  error?: string;
};

export type ApplyStatus = "succeeded" | "failed" | "cancelled";

/** Complete per-action outcome list; partial application is a normal result. */
export type ApplyResult = {
  planId: string;
  status: ApplyStatus;
  startedAt: string;
  completedAt: string;
  totalDurationMs: number;
  /** In plan order. */
  outcomes: ActionOutcome[];
  errors: string[];
};

export type ExecutorOptions = {
  /** Maximum actions in flight within one layer (default: 4). */
  maxConcurrency: number;
  /** Per-action timeout (ms, default: 120_000; 0 disables). */
  actionTimeoutMs: number;
  /** Retries per action after the first attempt (default: 0). */
  maxRetries: number;
  /** Base backoff between retries (ms, default: 1000), doubled per attempt. */
  retryDelayMs: number;
  logger?: Logger;
};

// =============================================================================
// Events
// =============================================================================

export type ExecutionEventType =
  | "apply:start"
  | "apply:complete"
  | "apply:failed"
  | "apply:cancelled"
  | "action:start"
  | "action:complete"
  | "action:failed"
  | "action:retry"
  | "action:skipped";

export type ExecutionEvent = {
  type: ExecutionEventType;
  planId: string;
  actionId?: string;
  address?: string;
  timestamp: string;
  message: string;
  error?: string;
  outputs?: ResourceOutputs;
  progress?: { completed: number; total: number; percentage: number };
};

export type ExecutionEventListener = (event: ExecutionEvent) => void;
