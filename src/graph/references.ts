/**
 * graphform — Reference Expressions
 *
 * `${type.name.output}` inside any string attribute. A string that is exactly
 * one reference resolves to the raw output value; embedded references are
 * interpolated as text.
 */

import type { AttributeValue, Attributes, ResourceAddress, ResourceReference } from "./types.js";

const REFERENCE_SOURCE = String.raw`\$\{([a-zA-Z][a-zA-Z0-9_-]*)\.([a-zA-Z0-9_-]+)\.([a-zA-Z0-9_]+)\}`;
const REFERENCE_REGEX = new RegExp(REFERENCE_SOURCE, "g");
const WHOLE_REFERENCE_REGEX = new RegExp(`^${REFERENCE_SOURCE}$`);

/** Placeholder shown in plans for values that only exist once a producer is applied. */
export const KNOWN_AFTER_APPLY = "(known after apply)";

export type ParsedReference = {
  address: ResourceAddress;
  type: string;
  name: string;
  output: string;
};

export type OutputLookup = (address: ResourceAddress) => Record<string, AttributeValue> | undefined;

export function formatAddress(type: string, name: string): ResourceAddress {
  return `${type}.${name}`;
}

/** True when the whole string is a single reference. */
export function isReference(value: string): boolean {
  return WHOLE_REFERENCE_REGEX.test(value);
}

/** All references found in a string, in order of appearance. */
export function parseReferences(value: string): ParsedReference[] {
  return [...value.matchAll(REFERENCE_REGEX)].map((m) => ({
    address: formatAddress(m[1], m[2]),
    type: m[1],
    name: m[2],
    output: m[3],
  }));
}

/**
 * Walk an attribute map and return every reference edge it carries,
 * with the dotted path of the consuming attribute.
 */
export function collectReferences(from: ResourceAddress, attributes: Attributes): ResourceReference[] {
  const refs: ResourceReference[] = [];
  const visit = (value: AttributeValue, path: string): void => {
    if (typeof value === "string") {
      for (const ref of parseReferences(value)) {
        refs.push({ from, attribute: path, to: ref.address, output: ref.output });
      }
    } else if (Array.isArray(value)) {
      value.forEach((item, i) => visit(item, `${path}.${i}`));
    } else if (value !== null && typeof value === "object") {
      for (const [key, item] of Object.entries(value)) visit(item, `${path}.${key}`);
    }
  };
  for (const [key, value] of Object.entries(attributes)) visit(value, key);
  return refs;
}

// =============================================================================
// Resolution
// =============================================================================

export type ResolvedAttributes = {
  values: Attributes;
  /** Top-level attribute names holding at least one unresolved reference. */
  unknown: string[];
};

/**
 * Substitute references with producer outputs. Outputs the lookup cannot
 * provide become {@link KNOWN_AFTER_APPLY} and are reported in `unknown`.
 */
export function resolveAttributes(attributes: Attributes, lookup: OutputLookup): ResolvedAttributes {
  const values: Attributes = {};
  const unknown: string[] = [];

  for (const [key, value] of Object.entries(attributes)) {
    let missing = false;
    values[key] = resolveValue(value, lookup, () => {
      missing = true;
    });
    if (missing) unknown.push(key);
  }

  return { values, unknown };
}

/** Resolve a single value (used for stack outputs). */
export function resolveValue(
  value: AttributeValue,
  lookup: OutputLookup,
  onUnknown: (ref: ParsedReference) => void,
): AttributeValue {
  if (typeof value === "string") return resolveString(value, lookup, onUnknown);
  if (Array.isArray(value)) return value.map((item) => resolveValue(item, lookup, onUnknown));
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: AttributeValue } = {};
    for (const [key, item] of Object.entries(value)) out[key] = resolveValue(item, lookup, onUnknown);
    return out;
  }
  return value;
}

function resolveString(
  value: string,
  lookup: OutputLookup,
  onUnknown: (ref: ParsedReference) => void,
): AttributeValue {
  const read = (ref: ParsedReference): AttributeValue | undefined => {
    const found = lookup(ref.address)?.[ref.output];
    if (found === undefined) onUnknown(ref);
    return found;
  };

  if (isReference(value)) {
    const [ref] = parseReferences(value);
    const found = read(ref);
    return found === undefined ? KNOWN_AFTER_APPLY : found;
  }

  return value.replace(REFERENCE_REGEX, (_match, type: string, name: string, output: string) => {
    const found = read({ address: formatAddress(type, name), type, name, output });
    if (found === undefined) return KNOWN_AFTER_APPLY;
    return typeof found === "string" ? found : JSON.stringify(found);
  });
}
