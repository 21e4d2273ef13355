/**
 * graphform — Plan Generator
 *
 * Diffs the desired graph against the last-applied snapshot and orders the
 * resulting actions in two phases:
 *
 * 1. creates and updates, dependencies before dependents;
 * 2. destroys, dependents before dependencies.
 *
 * A replacement is a create in phase 1 plus a destroy of the deposed old
 * instance in phase 2, so every dependent has moved to the new instance
 * before the old one disappears.
 */

import { randomUUID } from "node:crypto";
import { isDeepStrictEqual } from "node:util";

import { buildResourceGraph } from "../graph/builder.js";
import { resolveAttributes, resolveValue, type OutputLookup } from "../graph/references.js";
import { outputsChangedBy, requiresReplacement } from "../graph/registry.js";
import { layerItems, resolveOrder } from "../graph/resolver.js";
import type { AttributeValue, ResourceAddress, ResourceGraph, ResourceNode } from "../graph/types.js";
import type { DeposedInstance, ResourceState, StateSnapshot } from "../state/types.js";
import type { Plan, PlanAction, PlanSummary } from "./types.js";

// =============================================================================
// Plan generation
// =============================================================================

/**
 * Compute the ordered action list reconciling `snapshot` with `graph`.
 *
 * @throws CyclicDependencyError if the graph cannot be ordered (before any remote call)
 */
export function generatePlan(graph: ResourceGraph, snapshot: StateSnapshot): Plan {
  const { order } = resolveOrder(graph);

  // Outputs that will change during this plan: all of them for creates and
  // replacements, the derived ones for in-place updates.
  const pendingOutputs = new Map<ResourceAddress, "all" | ReadonlySet<string>>();
  const lookup: OutputLookup = (address) => {
    const pending = pendingOutputs.get(address);
    const outputs = snapshot.get(address)?.outputs;
    if (pending === "all") return undefined;
    if (!outputs || !pending) return outputs;
    return Object.fromEntries(Object.entries(outputs).filter(([key]) => !pending.has(key)));
  };

  const applyActions: PlanAction[] = [];
  const destroyActions: PlanAction[] = [];

  for (const node of order) {
    const prior = snapshot.get(node.address);
    const dependencies = orderedDependencies(graph, node);
    const resolved = resolveAttributes(node.attributes, lookup);
    const base = {
      address: node.address,
      type: node.type,
      name: node.name,
      kind: node.kind,
      declared: node.attributes,
      attributes: resolved.values,
      unknown: resolved.unknown,
      dependencies,
      phase: "apply" as const,
      layer: 0,
    };

    if (!prior) {
      pendingOutputs.set(node.address, "all");
      applyActions.push({ ...base, id: `create:${node.address}`, action: "create", reason: "new", changed: Object.keys(node.attributes) });
    } else {
      const changed = diffAttributes(resolved.values, resolved.unknown, prior.attributes);
      const kindChanged = prior.kind !== node.kind;

      if (kindChanged || (changed.length > 0 && requiresReplacement(node.kind, changed))) {
        pendingOutputs.set(node.address, "all");
        applyActions.push({ ...base, id: `create:${node.address}`, action: "create", reason: "replace", changed, targetId: prior.id });
        destroyActions.push(deposedAction(prior, prior));
      } else if (changed.length > 0) {
        const stale = outputsChangedBy(node.kind, changed);
        if (stale.length > 0) pendingOutputs.set(node.address, new Set(stale));
        applyActions.push({ ...base, id: `update:${node.address}`, action: "update", reason: "changed", changed, targetId: prior.id });
      }
    }

    for (const deposed of prior?.deposed ?? []) {
      if (prior) destroyActions.push(deposedAction(prior, deposed));
    }
  }

  const removed = [...snapshot.values()]
    .filter((s) => !graph.byAddress.has(s.address))
    .sort((a, b) => a.address.localeCompare(b.address));
  for (const prior of removed) {
    for (const deposed of prior.deposed) destroyActions.push(deposedAction(prior, deposed));
    destroyActions.push({
      id: `destroy:${prior.address}`,
      action: "destroy",
      reason: "removed",
      phase: "destroy",
      layer: 0,
      address: prior.address,
      type: prior.type,
      name: prior.name,
      kind: prior.kind,
      declared: prior.declared,
      attributes: prior.attributes,
      unknown: [],
      changed: [],
      dependencies: prior.dependencies,
      targetId: prior.id,
    });
  }

  const applyLayers = layerApplyActions(graph, applyActions);
  const destroyLayers = layerDestroyActions(destroyActions, snapshot);

  const actions: PlanAction[] = [];
  [...applyLayers, ...destroyLayers].forEach((layer, i) => {
    for (const action of layer) actions.push({ ...action, layer: i });
  });

  return {
    id: randomUUID(),
    createdAt: new Date().toISOString(),
    actions,
    layerCount: applyLayers.length + destroyLayers.length,
    summary: summarize(actions),
    outputs: resolveStackOutputs(graph.outputs, lookup),
  };
}

/** Plan a full teardown of everything in state. */
export function generateDestroyPlan(snapshot: StateSnapshot): Plan {
  return generatePlan(buildResourceGraph([]), snapshot);
}

/** Group actions by layer, preserving plan order. */
export function planLayers(plan: Plan): PlanAction[][] {
  const layers: PlanAction[][] = Array.from({ length: plan.layerCount }, () => []);
  for (const action of plan.actions) layers[action.layer].push(action);
  return layers.filter((l) => l.length > 0);
}

export function isEmptyPlan(plan: Plan): boolean {
  return plan.actions.length === 0;
}

// =============================================================================
// Stack outputs
// =============================================================================

export function resolveStackOutputs(
  outputs: Record<string, AttributeValue>,
  lookup: OutputLookup,
): Record<string, AttributeValue> {
  const resolved: Record<string, AttributeValue> = {};
  for (const [name, value] of Object.entries(outputs)) {
    resolved[name] = resolveValue(value, lookup, () => {});
  }
  return resolved;
}

// =============================================================================
// Diffing
// =============================================================================

/**
 * Attribute names whose desired value differs from the last-applied value.
 * Values only known after apply always count as changed.
 */
export function diffAttributes(
  desired: Record<string, AttributeValue>,
  unknown: readonly string[],
  applied: Record<string, AttributeValue>,
): string[] {
  const keys = new Set([...Object.keys(desired), ...Object.keys(applied)]);
  return [...keys]
    .filter((key) => unknown.includes(key) || !isDeepStrictEqual(desired[key], applied[key]))
    .sort();
}

// =============================================================================
// Ordering
// =============================================================================

function layerApplyActions(graph: ResourceGraph, actions: PlanAction[]): PlanAction[][] {
  const affected = new Set(actions.map((a) => a.address));
  return layerItems(
    actions,
    (a) => a.address,
    (a) => affectedAncestors(graph, a.address, affected),
  );
}

/**
 * Affected resources reachable through the dependency graph, including
 * paths that pass through unaffected resources.
 */
function affectedAncestors(graph: ResourceGraph, address: ResourceAddress, affected: Set<ResourceAddress>): ResourceAddress[] {
  const found: ResourceAddress[] = [];
  const seen = new Set<ResourceAddress>();
  const stack = [...(graph.dependencies.get(address) ?? [])];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    if (affected.has(current)) found.push(current);
    stack.push(...(graph.dependencies.get(current) ?? []));
  }
  return found;
}

/**
 * Reverse dependency order over the recorded state dependencies: a destroy
 * waits for every destroy of something that referenced it. The current
 * instance of an address also waits for its deposed instances, since both
 * write the same state entry.
 *
 * A deposed instance was only referenced by instances applied before it was
 * deposed; current instances applied since then point at its successor.
 */
function layerDestroyActions(actions: PlanAction[], snapshot: StateSnapshot): PlanAction[][] {
  const dependentsOf = new Map<ResourceAddress, PlanAction[]>();
  for (const action of actions) {
    for (const dep of action.dependencies) {
      const list = dependentsOf.get(dep) ?? [];
      list.push(action);
      dependentsOf.set(dep, list);
    }
  }

  const referencedBy = (target: PlanAction, dependent: PlanAction): boolean => {
    if (target.reason !== "deposed" || dependent.reason === "deposed") return true;
    // Deposed by this plan: every current consumer still references it.
    const deposedAt = snapshot.get(target.address)?.deposed.find((d) => d.id === target.targetId)?.deposedAt;
    const appliedAt = snapshot.get(dependent.address)?.updatedAt;
    return deposedAt === undefined || appliedAt === undefined || appliedAt < deposedAt;
  };

  return layerItems(
    actions,
    (a) => a.id,
    (a) => {
      const waitFor = (dependentsOf.get(a.address) ?? []).filter((d) => referencedBy(a, d)).map((d) => d.id);
      if (a.reason === "removed") {
        waitFor.push(...actions.filter((o) => o.reason === "deposed" && o.address === a.address).map((o) => o.id));
      }
      return waitFor.filter((id) => id !== a.id);
    },
  );
}

function orderedDependencies(graph: ResourceGraph, node: ResourceNode): ResourceAddress[] {
  const deps = graph.dependencies.get(node.address) ?? new Set<ResourceAddress>();
  return graph.nodes.filter((n) => deps.has(n.address)).map((n) => n.address);
}

function deposedAction(owner: ResourceState, deposed: Pick<DeposedInstance, "id" | "kind" | "dependencies">): PlanAction {
  return {
    id: `destroy:${owner.address}#${deposed.id}`,
    action: "destroy",
    reason: "deposed",
    phase: "destroy",
    layer: 0,
    address: owner.address,
    type: owner.type,
    name: owner.name,
    kind: deposed.kind,
    declared: {},
    attributes: {},
    unknown: [],
    changed: [],
    dependencies: deposed.dependencies,
    targetId: deposed.id,
  };
}

/** Replacement pairs count once, as a replace. */
function summarize(actions: PlanAction[]): PlanSummary {
  const replaced = new Map(
    actions.filter((a) => a.reason === "replace").map((a) => [a.address, a.targetId]),
  );
  const pairedDestroy = (a: PlanAction) => a.reason === "deposed" && replaced.get(a.address) === a.targetId;
  return {
    create: actions.filter((a) => a.reason === "new").length,
    update: actions.filter((a) => a.action === "update").length,
    replace: replaced.size,
    destroy: actions.filter((a) => a.action === "destroy" && !pairedDestroy(a)).length,
  };
}
