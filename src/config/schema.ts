/**
 * graphform — Configuration Schema
 *
 * Schema-based validation for `graphform.config.json` using Zod.
 */

import { z } from "zod";

// =============================================================================
// Zod Schemas
// =============================================================================

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

/**
 * Where applied state lives
 */
export const stateConfigSchema = z.object({
  backend: z.enum(["sqlite", "memory"]).default("sqlite"),
  path: z.string().min(1).default(".graphform/state.db"),
});

/**
 * Which provider executes actions
 */
export const providerConfigSchema = z.object({
  type: z.literal("simulated").default("simulated"),
  /** Inventory file of the simulated provider. */
  path: z.string().min(1).default(".graphform/simulated-cloud.json"),
  latencyMs: z.number().int().nonnegative().default(0),
});

/**
 * Executor tuning
 */
export const executionConfigSchema = z.object({
  maxConcurrency: z.number().int().positive().default(4),
  actionTimeoutMs: z.number().int().nonnegative().default(120_000),
  maxRetries: z.number().int().nonnegative().default(0),
  retryDelayMs: z.number().int().nonnegative().default(1000),
});

export const logDestinationSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("console"), minLevel: logLevelSchema.optional() }),
  z.object({ type: z.literal("file"), path: z.string().min(1), minLevel: logLevelSchema.optional() }),
]);

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default("info"),
  destinations: z.array(logDestinationSchema).default([{ type: "console" }]),
  redactPatterns: z.array(z.string()).default([]),
});

/**
 * Full configuration schema
 */
export const graphformConfigSchema = z
  .object({
    state: stateConfigSchema.default({}),
    provider: providerConfigSchema.default({}),
    execution: executionConfigSchema.default({}),
    logging: loggingConfigSchema.default({}),
  })
  .strict();

export type GraphformConfig = z.infer<typeof graphformConfigSchema>;
export type StateConfig = z.infer<typeof stateConfigSchema>;
export type ProviderConfig = z.infer<typeof providerConfigSchema>;
export type ExecutionConfig = z.infer<typeof executionConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

// =============================================================================
// Validation Functions
// =============================================================================

export function validateConfig(config: unknown): ReturnType<typeof graphformConfigSchema.safeParse> {
  return graphformConfigSchema.safeParse(config);
}

export function getDefaultConfig(): GraphformConfig {
  return graphformConfigSchema.parse({});
}
