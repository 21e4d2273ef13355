/**
 * graphform — Providers
 */

import type { ProviderConfig } from "../config/schema.js";
import { SimulatedProvider } from "./simulated.js";
import type { ResourceProvider } from "./types.js";

export type { ProviderCallContext, ResourceProvider } from "./types.js";
export { SimulatedProvider, type SimulatedCall, type SimulatedOperation, type SimulatedProviderOptions } from "./simulated.js";

export function createProvider(config: ProviderConfig): ResourceProvider {
  switch (config.type) {
    case "simulated":
      return new SimulatedProvider({ persistPath: config.path, latencyMs: config.latencyMs });
  }
}
