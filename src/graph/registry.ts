/**
 * graphform — Resource Kind Registry
 *
 * Outputs each kind exposes and the update-vs-replace policy table.
 * Network and identity changes replace, tag-only changes update in place,
 * compute services roll in place unless their name or cluster moves.
 */

import type { ResourceKind, ResourceKindDefinition } from "./types.js";

// =============================================================================
// Built-in kinds
// =============================================================================

export const BUILTIN_KIND_DEFINITIONS: readonly ResourceKindDefinition[] = [
  {
    kind: "network",
    label: "Network",
    description: "Virtual network with its address space",
    outputs: ["id", "arn", "cidr_block"],
    derivedOutputs: { cidr_block: ["cidr_block"] },
    policy: { updatable: ["tags"] },
  },
  {
    kind: "security-policy",
    label: "Security Policy",
    description: "Ingress/egress rules attached to a network",
    outputs: ["id", "arn"],
    policy: { updatable: ["ingress", "egress", "tags", "description"] },
  },
  {
    kind: "identity-role",
    label: "Identity Role",
    description: "Role assumed by a workload",
    outputs: ["id", "arn", "name"],
    derivedOutputs: { name: ["name"] },
    policy: { updatable: ["tags"] },
  },
  {
    kind: "registry",
    label: "Container Registry",
    description: "Image repository the build step pushes to",
    outputs: ["id", "arn", "url"],
    derivedOutputs: { url: ["name"] },
    policy: { updatable: ["tags", "scan_on_push"] },
  },
  {
    kind: "compute-service",
    label: "Compute Service",
    description: "Scheduled container process bound to a port",
    outputs: ["id", "arn", "endpoint"],
    derivedOutputs: { endpoint: ["port"] },
    policy: { updatable: "all", forceNew: ["name", "cluster"] },
  },
];

// =============================================================================
// Registry
// =============================================================================

const kindDefinitions = new Map<ResourceKind, ResourceKindDefinition>(
  BUILTIN_KIND_DEFINITIONS.map((d) => [d.kind, d]),
);

export function getKindDefinition(kind: ResourceKind): ResourceKindDefinition {
  const def = kindDefinitions.get(kind);
  if (!def) throw new Error(`Unknown resource kind "${kind}"`);
  return def;
}

export function listKinds(): ResourceKindDefinition[] {
  return [...kindDefinitions.values()];
}

export function kindExposesOutput(kind: ResourceKind, output: string): boolean {
  return getKindDefinition(kind).outputs.includes(output);
}

/** Outputs whose value an in-place update of `changedAttributes` may change. */
export function outputsChangedBy(kind: ResourceKind, changedAttributes: readonly string[]): string[] {
  const derived = getKindDefinition(kind).derivedOutputs ?? {};
  return Object.keys(derived).filter((output) => derived[output].some((attr) => changedAttributes.includes(attr)));
}

/**
 * Decide whether the given attribute changes can be applied in place.
 * An empty change set never requires replacement.
 */
export function requiresReplacement(kind: ResourceKind, changedAttributes: readonly string[]): boolean {
  const { policy } = getKindDefinition(kind);
  return changedAttributes.some((attr) => {
    if (policy.forceNew?.includes(attr)) return true;
    if (policy.updatable === "all") return false;
    return !policy.updatable.includes(attr);
  });
}
