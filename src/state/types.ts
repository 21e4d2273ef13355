/**
 * graphform — State Types
 *
 * One ResourceState per applied resource, keyed by address.
 */

import type { AttributeValue, Attributes, ResourceAddress, ResourceKind } from "../graph/types.js";

export type ResourceOutputs = Record<string, AttributeValue>;

/**
 * An old instance kept alive by a replacement until its destroy completes.
 */
export type DeposedInstance = {
  id: string;
  kind: ResourceKind;
  outputs: ResourceOutputs;
  /** What the old instance referenced; orders its destroy. */
  dependencies: ResourceAddress[];
  deposedAt: string;
};

export type ResourceState = {
  address: ResourceAddress;
  type: string;
  name: string;
  kind: ResourceKind;
  /** Provider-assigned identifier. */
  id: string;
  /** Attributes as declared, references unresolved. */
  declared: Attributes;
  /** Last-applied attribute values with references substituted. */
  attributes: Attributes;
  outputs: ResourceOutputs;
  dependencies: ResourceAddress[];
  deposed: DeposedInstance[];
  /** When the current instance was last created or updated. */
  updatedAt: string;
};

export type StateSnapshot = ReadonlyMap<ResourceAddress, ResourceState>;

export type StateLock = {
  id: string;
  operation: string;
  lockedBy: string;
  lockedAt: string;
  info?: string;
};

/**
 * Persistence for applied resources. Each commit/remove is a single atomic
 * write keyed by address, so concurrent actions on different resources never
 * contend.
 */
export interface StateStore {
  initialize(): Promise<void>;
  load(): Promise<StateSnapshot>;
  commit(address: ResourceAddress, state: ResourceState): Promise<void>;
  remove(address: ResourceAddress): Promise<void>;

  acquireLock(lock: StateLock): Promise<boolean>;
  releaseLock(lockId: string): Promise<boolean>;
  getLock(): Promise<StateLock | null>;

  close(): Promise<void>;
}
