/**
 * graphform — Plan & Result Rendering
 */

import type { AttributeValue } from "../graph/types.js";
import type { Plan, PlanAction } from "./types.js";

const SYMBOLS: Record<PlanAction["reason"], string> = {
  new: "+",
  changed: "~",
  replace: "+/-",
  removed: "-",
  deposed: "-",
};

export function formatActionLine(action: PlanAction): string {
  const symbol = SYMBOLS[action.reason];
  switch (action.reason) {
    case "new":
      return `${symbol} ${action.address} (${action.kind})`;
    case "changed":
      return `${symbol} ${action.address} (${action.kind}) update in place: ${action.changed.join(", ")}`;
    case "replace":
      return `${symbol} ${action.address} (${action.kind}) replace, forced by: ${action.changed.join(", ")}`;
    case "removed":
      return `${symbol} ${action.address} (${action.kind}) ${action.targetId ?? ""}`.trimEnd();
    case "deposed":
      return `${symbol} ${action.address} (${action.kind}) deposed ${action.targetId ?? ""}`.trimEnd();
  }
}

/**
 * Human-readable plan, one block per action in execution order.
 */
export function formatPlan(plan: Plan): string {
  if (plan.actions.length === 0) {
    return "No changes. Infrastructure matches the declarations.";
  }

  const lines: string[] = ["Planned actions (in execution order):", ""];
  let layer = -1;
  for (const action of plan.actions) {
    if (action.layer !== layer) {
      layer = action.layer;
      lines.push(`  ── layer ${layer + 1} (${action.phase}) ──`);
    }
    lines.push(`  ${formatActionLine(action)}`);
    if (action.action !== "destroy") {
      const keys = action.reason === "new" ? Object.keys(action.attributes).sort() : action.changed;
      for (const key of keys) {
        lines.push(`        ${key} = ${formatValue(action.attributes[key])}`);
      }
    }
  }

  const { create, update, replace, destroy } = plan.summary;
  lines.push("", `Plan: ${create} to create, ${update} to update, ${replace} to replace, ${destroy} to destroy.`);

  const outputNames = Object.keys(plan.outputs);
  if (outputNames.length > 0) {
    lines.push("", "Outputs:");
    for (const name of outputNames.sort()) lines.push(`  ${name} = ${formatValue(plan.outputs[name])}`);
  }
  return lines.join("\n");
}

export function formatValue(value: AttributeValue | undefined): string {
  if (value === undefined) return "(removed)";
  return JSON.stringify(value);
}
