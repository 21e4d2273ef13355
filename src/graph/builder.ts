/**
 * graphform — Resource Graph Builder
 *
 * Turns declarations into a graph: nodes are resources, edges are the
 * references between their attributes plus explicit `dependsOn` entries.
 */

import { DuplicateResourceError, UndeclaredReferenceError } from "../errors.js";
import { collectReferences, formatAddress, resolveValue } from "./references.js";
import { kindExposesOutput } from "./registry.js";
import type {
  AttributeValue,
  DeclarationDocument,
  ResourceAddress,
  ResourceDeclaration,
  ResourceGraph,
  ResourceNode,
  ResourceReference,
} from "./types.js";

/**
 * Build the resource graph.
 *
 * @throws DuplicateResourceError when two declarations share type and name
 * @throws UndeclaredReferenceError when a reference, `dependsOn` entry or stack
 *   output names a resource (or output) that is not declared
 */
export function buildResourceGraph(
  declarations: readonly ResourceDeclaration[] | DeclarationDocument,
): ResourceGraph {
  const doc: DeclarationDocument = "resources" in declarations
    ? declarations
    : { resources: [...declarations] };

  const nodes: ResourceNode[] = [];
  const byAddress = new Map<ResourceAddress, ResourceNode>();

  doc.resources.forEach((decl, index) => {
    const address = formatAddress(decl.type, decl.name);
    if (byAddress.has(address)) throw new DuplicateResourceError(address);
    const node: ResourceNode = {
      address,
      type: decl.type,
      name: decl.name,
      kind: decl.kind,
      attributes: decl.attributes ?? {},
      dependsOn: [...(decl.dependsOn ?? [])],
      index,
    };
    nodes.push(node);
    byAddress.set(address, node);
  });

  const references: ResourceReference[] = [];
  const dependencies = new Map<ResourceAddress, Set<ResourceAddress>>();
  const dependents = new Map<ResourceAddress, Set<ResourceAddress>>();
  for (const node of nodes) {
    dependencies.set(node.address, new Set());
    dependents.set(node.address, new Set());
  }

  const link = (from: ResourceAddress, to: ResourceAddress): void => {
    dependencies.get(from)?.add(to);
    dependents.get(to)?.add(from);
  };

  for (const node of nodes) {
    for (const ref of collectReferences(node.address, node.attributes)) {
      const target = byAddress.get(ref.to);
      if (!target) throw new UndeclaredReferenceError(`${node.address}.${ref.attribute}`, ref.to);
      if (!kindExposesOutput(target.kind, ref.output)) {
        throw new UndeclaredReferenceError(
          `${node.address}.${ref.attribute}`,
          ref.to,
          `output "${ref.output}" of ${target.kind} "${ref.to}"`,
        );
      }
      references.push(ref);
      link(node.address, ref.to);
    }

    for (const dep of node.dependsOn) {
      if (!byAddress.has(dep)) throw new UndeclaredReferenceError(`${node.address}.dependsOn`, dep);
      link(node.address, dep);
    }
  }

  const outputs = doc.outputs ?? {};
  for (const [name, value] of Object.entries(outputs)) {
    validateOutputReferences(name, value, byAddress);
  }

  return { nodes, byAddress, references, dependencies, dependents, outputs };
}

function validateOutputReferences(
  name: string,
  value: AttributeValue,
  byAddress: Map<ResourceAddress, ResourceNode>,
): void {
  resolveValue(value, () => undefined, (ref) => {
    const target = byAddress.get(ref.address);
    if (!target) throw new UndeclaredReferenceError(`output.${name}`, ref.address);
    if (!kindExposesOutput(target.kind, ref.output)) {
      throw new UndeclaredReferenceError(
        `output.${name}`,
        ref.address,
        `output "${ref.output}" of ${target.kind} "${ref.address}"`,
      );
    }
  });
}
