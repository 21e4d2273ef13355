/**
 * graphform — Provider Interface
 *
 * The remote API surface that actually creates and destroys infrastructure.
 */

import type { Attributes, ResourceAddress, ResourceKind } from "../graph/types.js";
import type { ResourceOutputs } from "../state/types.js";

/** Context passed to every provider call. */
export type ProviderCallContext = {
  address: ResourceAddress;
  kind: ResourceKind;
  signal?: AbortSignal;
};

export interface ResourceProvider {
  readonly name: string;
  /** Create a resource; outputs must include a string `id`. */
  create(kind: ResourceKind, attributes: Attributes, ctx?: ProviderCallContext): Promise<ResourceOutputs>;
  update(id: string, attributes: Attributes, ctx?: ProviderCallContext): Promise<ResourceOutputs>;
  destroy(id: string, ctx?: ProviderCallContext): Promise<void>;
  /** Current attributes of a resource, or null when it no longer exists. */
  describe(id: string, ctx?: ProviderCallContext): Promise<Attributes | null>;
}
