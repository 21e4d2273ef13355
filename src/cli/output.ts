/**
 * graphform — CLI Output Formatting
 */

import type { ActionOutcome } from "../engine/types.js";
import type { ResourceKindDefinition } from "../graph/types.js";
import type { ApplyReport } from "../orchestrator.js";
import { formatValue } from "../plan/render.js";
import type { StateSnapshot } from "../state/types.js";

const OUTCOME_ICONS: Record<ActionOutcome["status"], string> = {
  "succeeded": "✓",
  "failed": "✗",
  "not-attempted": "○",
};

/** Simple table formatter for terminal output. */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) =>
    cells.map((c, i) => ` ${c.padEnd(widths[i] ?? 0)} `).join("│").trimEnd();

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

export function formatApplyReport(report: ApplyReport, verb = "Apply"): string {
  const count = (status: ActionOutcome["status"]) => report.outcomes.filter((o) => o.status === status).length;
  const lines = [
    `${verb} ${report.status}: ${count("succeeded")} succeeded, ${count("failed")} failed, ${count("not-attempted")} not attempted`,
  ];

  if (report.outcomes.length > 0) lines.push("");
  for (const outcome of report.outcomes) {
    const suffix =
      outcome.status === "failed" ? `  ${outcome.error ?? "unknown error"}` :
      outcome.status === "not-attempted" ? "  not attempted" : "";
    lines.push(`  ${OUTCOME_ICONS[outcome.status]} ${outcome.actionId}${suffix}`);
  }

  const names = Object.keys(report.outputs).sort();
  if (names.length > 0) {
    lines.push("", "Outputs:");
    for (const name of names) lines.push(`  ${name} = ${formatValue(report.outputs[name])}`);
  }
  return lines.join("\n");
}

export function formatStateList(snapshot: StateSnapshot): string {
  if (snapshot.size === 0) return "State is empty.";
  const rows = [...snapshot.values()]
    .sort((a, b) => a.address.localeCompare(b.address))
    .map((s) => [s.address, s.kind, s.id, s.deposed.map((d) => d.id).join(", ")]);
  return table(["ADDRESS", "KIND", "ID", "DEPOSED"], rows);
}

export function formatKinds(kinds: readonly ResourceKindDefinition[]): string {
  const rows = kinds.map((k) => [
    k.kind,
    k.outputs.join(", "),
    k.policy.updatable === "all" ? "all" : k.policy.updatable.join(", "),
    k.policy.forceNew ? k.policy.forceNew.join(", ") : k.policy.updatable === "all" ? "" : "any other attribute",
  ]);
  return table(["KIND", "OUTPUTS", "UPDATABLE IN PLACE", "FORCES REPLACEMENT"], rows);
}
