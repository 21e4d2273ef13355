/**
 * graphform — Public API
 */

// Declarations & graph
export { parseDeclarations, loadDeclarationFile } from "./declarations/loader.js";
export { declarationDocumentSchema, resourceDeclarationSchema } from "./declarations/schema.js";
export { buildResourceGraph } from "./graph/builder.js";
export { resolveOrder, reverseLayers, findCycle } from "./graph/resolver.js";
export { KNOWN_AFTER_APPLY, formatAddress, parseReferences, collectReferences, resolveAttributes } from "./graph/references.js";
export {
  BUILTIN_KIND_DEFINITIONS,
  getKindDefinition,
  listKinds,
  kindExposesOutput,
  outputsChangedBy,
  requiresReplacement,
} from "./graph/registry.js";
export type {
  AttributeValue,
  Attributes,
  DeclarationDocument,
  ReplacementPolicy,
  ResourceAddress,
  ResourceDeclaration,
  ResourceGraph,
  ResourceKind,
  ResourceKindDefinition,
  ResourceNode,
  ResourceReference,
} from "./graph/types.js";

// Planning
export { generatePlan, generateDestroyPlan, planLayers, isEmptyPlan, diffAttributes } from "./plan/planner.js";
export { formatPlan, formatActionLine } from "./plan/render.js";
export type { ActionReason, ActionType, Plan, PlanAction, PlanPhase, PlanSummary } from "./plan/types.js";

// Execution
export { Executor, type ExecuteOptions } from "./engine/executor.js";
export type {
  ActionOutcome,
  ActionStatus,
  ApplyResult,
  ApplyStatus,
  ExecutionEvent,
  ExecutionEventListener,
  ExecutionEventType,
  ExecutorOptions,
} from "./engine/types.js";
export { Orchestrator, type ApplyReport, type OrchestratorOptions, type RunOptions, type VerifyReport } from "./orchestrator.js";

// State & providers
export { InMemoryStateStore, SQLiteStateStore, createStateStore } from "./state/storage.js";
export type { DeposedInstance, ResourceOutputs, ResourceState, StateLock, StateSnapshot, StateStore } from "./state/types.js";
export { SimulatedProvider, createProvider } from "./provider/index.js";
export type { ProviderCallContext, ResourceProvider, SimulatedCall, SimulatedProviderOptions } from "./provider/index.js";

// Ambient
export { loadConfig, DEFAULT_CONFIG_FILENAME } from "./config/io.js";
export { graphformConfigSchema, getDefaultConfig, validateConfig, type GraphformConfig } from "./config/schema.js";
export { createLogger, getLogger, setGlobalLogger, type Logger, type LogLevel } from "./logging/index.js";
export * from "./errors.js";
export { VERSION } from "./version.js";
