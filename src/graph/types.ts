/**
 * graphform — Resource Graph Types
 */

// =============================================================================
// Kinds
// =============================================================================

export const RESOURCE_KINDS = [
  "network",
  "security-policy",
  "identity-role",
  "registry",
  "compute-service",
] as const;

/** The provider kind a resource is provisioned as. */
export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/** JSON-compatible attribute value. Strings may carry `${type.name.output}` references. */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export type Attributes = Record<string, AttributeValue>;

/** `"<type>.<name>"`, unique within a graph. */
export type ResourceAddress = string;

// =============================================================================
// Declarations
// =============================================================================

export type ResourceDeclaration = {
  type: string;
  name: string;
  kind: ResourceKind;
  attributes?: Attributes;
  /** Extra ordering edges to resources whose outputs are not referenced. */
  dependsOn?: ResourceAddress[];
};

export type DeclarationDocument = {
  resources: ResourceDeclaration[];
  /** Stack outputs, resolved against state after planning or applying. */
  outputs?: Record<string, AttributeValue>;
};

// =============================================================================
// Graph
// =============================================================================

export type ResourceNode = {
  address: ResourceAddress;
  type: string;
  name: string;
  kind: ResourceKind;
  attributes: Attributes;
  dependsOn: ResourceAddress[];
  /** Position in the declaration set; the deterministic tie-break. */
  index: number;
};

/**
 * An edge from a consuming attribute to a producing resource's output.
 * `attribute` is the dotted path inside the consumer (`"env.DB_HOST"`, `"subnets.0"`).
 */
export type ResourceReference = {
  from: ResourceAddress;
  attribute: string;
  to: ResourceAddress;
  output: string;
};

export type ResourceGraph = {
  nodes: ResourceNode[];
  byAddress: Map<ResourceAddress, ResourceNode>;
  references: ResourceReference[];
  /** address → addresses it depends on (references and dependsOn). */
  dependencies: Map<ResourceAddress, Set<ResourceAddress>>;
  /** address → addresses that depend on it. */
  dependents: Map<ResourceAddress, Set<ResourceAddress>>;
  /** Stack outputs as declared. */
  outputs: Record<string, AttributeValue>;
};

// =============================================================================
// Kind registry
// =============================================================================

/**
 * Which attribute changes a kind can apply in place. Any other change
 * forces a replacement (create new, then destroy old).
 */
export type ReplacementPolicy = {
  updatable: "all" | readonly string[];
  /** Attributes that force replacement even when `updatable` is "all". */
  forceNew?: readonly string[];
};

export type ResourceKindDefinition = {
  kind: ResourceKind;
  label: string;
  description: string;
  /** Outputs the provider returns; references may only name these. */
  outputs: readonly string[];
  /**
   * Outputs the provider derives from attributes. Updating a listed attribute
   * in place leaves the output unknown until the update is applied; outputs
   * not listed keep their value across updates.
   */
  derivedOutputs?: Readonly<Record<string, readonly string[]>>;
  policy: ReplacementPolicy;
};
