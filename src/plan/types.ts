/**
 * graphform — Plan Types
 */

import type { AttributeValue, Attributes, ResourceAddress, ResourceKind } from "../graph/types.js";

export type ActionType = "create" | "update" | "destroy";

/**
 * - `new`: desired, not in state
 * - `changed`: attributes differ, kind allows an in-place update
 * - `replace`: attributes differ in a way the kind cannot update in place
 * - `removed`: in state, no longer desired
 * - `deposed`: old instance left behind by a replacement
 */
export type ActionReason = "new" | "changed" | "replace" | "removed" | "deposed";

export type PlanPhase = "apply" | "destroy";

export type PlanAction = {
  /** Unique within the plan: `create:network.main`, `destroy:network.main#net-000001`. */
  id: string;
  action: ActionType;
  reason: ActionReason;
  phase: PlanPhase;
  /** Actions sharing a layer have no dependency between them. */
  layer: number;
  address: ResourceAddress;
  type: string;
  name: string;
  kind: ResourceKind;
  /** Declared attributes (create/update) with references unresolved. */
  declared: Attributes;
  /** Attribute values resolved where already known. */
  attributes: Attributes;
  /** Attribute names whose value is only known after apply. */
  unknown: string[];
  /** Attribute names that differ from the last-applied state. */
  changed: string[];
  /** Addresses this resource references (orders create/update; recorded in state). */
  dependencies: ResourceAddress[];
  /** Provider id the action targets (update, destroy, instance deposed by a replace). */
  targetId?: string;
};

export type PlanSummary = {
  create: number;
  update: number;
  replace: number;
  destroy: number;
};

export type Plan = {
  id: string;
  createdAt: string;
  /** Strictly ordered; layers ascend. */
  actions: PlanAction[];
  layerCount: number;
  summary: PlanSummary;
  /** Stack outputs resolved against state where known. */
  outputs: Record<string, AttributeValue>;
};
