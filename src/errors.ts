/**
 * graphform — Error Taxonomy
 *
 * Pre-execution errors (declaration, duplicate, reference, cycle) abort
 * before any provider call. Execution errors are recorded per action.
 */

export type OrchestratorErrorCode =
  | "DECLARATION_INVALID"
  | "DUPLICATE_RESOURCE"
  | "UNDECLARED_REFERENCE"
  | "CYCLIC_DEPENDENCY"
  | "PROVIDER_ACTION_FAILED"
  | "STATE_CORRUPTION"
  | "STATE_LOCKED"
  | "CONFIG_INVALID";

export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly code: OrchestratorErrorCode,
    public readonly retryable = false,
  ) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class DeclarationValidationError extends OrchestratorError {
  constructor(public readonly issues: string[], source?: string) {
    super(
      `Invalid declarations${source ? ` in ${source}` : ""}:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      "DECLARATION_INVALID",
    );
    this.name = "DeclarationValidationError";
  }
}

export class DuplicateResourceError extends OrchestratorError {
  constructor(public readonly address: string) {
    super(`Resource "${address}" is declared more than once`, "DUPLICATE_RESOURCE");
    this.name = "DuplicateResourceError";
  }
}

export class UndeclaredReferenceError extends OrchestratorError {
  constructor(
    public readonly from: string,
    public readonly target: string,
    detail?: string,
  ) {
    super(
      `"${from}" references undeclared ${detail ?? `resource "${target}"`}`,
      "UNDECLARED_REFERENCE",
    );
    this.name = "UndeclaredReferenceError";
  }
}

export class CyclicDependencyError extends OrchestratorError {
  constructor(public readonly cycle: string[]) {
    super(`Circular dependency detected: ${cycle.join(" → ")}`, "CYCLIC_DEPENDENCY");
    this.name = "CyclicDependencyError";
  }
}

export class ProviderActionError extends OrchestratorError {
  constructor(
    public readonly address: string,
    public readonly action: "create" | "update" | "destroy",
    public readonly providerError?: Error,
  ) {
    super(
      `Provider failed to ${action} "${address}": ${providerError?.message ?? "unknown error"}`,
      "PROVIDER_ACTION_FAILED",
      true,
    );
    this.name = "ProviderActionError";
  }
}

export class StateCorruptionError extends OrchestratorError {
  constructor(public readonly addresses: string[], reason: string) {
    super(`State corruption (${addresses.join(", ")}): ${reason}`, "STATE_CORRUPTION");
    this.name = "StateCorruptionError";
  }
}

export class StateLockError extends OrchestratorError {
  constructor(public readonly lockedBy: string, public readonly lockedAt: string) {
    super(`State is locked by ${lockedBy} since ${lockedAt}`, "STATE_LOCKED", true);
    this.name = "StateLockError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(public readonly issues: string[], public readonly configPath?: string) {
    super(
      `Invalid configuration${configPath ? ` (${configPath})` : ""}:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      "CONFIG_INVALID",
    );
    this.name = "ConfigError";
  }
}

const PRE_EXECUTION_CODES = new Set<OrchestratorErrorCode>([
  "DECLARATION_INVALID",
  "DUPLICATE_RESOURCE",
  "UNDECLARED_REFERENCE",
  "CYCLIC_DEPENDENCY",
  "CONFIG_INVALID",
]);

/** True for errors detected before any provider call (graph and input errors). */
export function isPreExecutionError(err: unknown): boolean {
  return err instanceof OrchestratorError && PRE_EXECUTION_CODES.has(err.code);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function formatError(err: unknown): string {
  if (err instanceof OrchestratorError) return `${err.name} [${err.code}]: ${err.message}`;
  const e = toError(err);
  return `${e.name}: ${e.message}`;
}
