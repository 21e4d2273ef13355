/**
 * graphform — Configuration IO
 *
 * Reads `graphform.config.json` (or an explicit path), applies environment
 * overrides, validates, and resolves relative paths against the config
 * file's directory.
 */

import fs from "node:fs/promises";
import path from "node:path";

import { formatZodIssues } from "../declarations/schema.js";
import { ConfigError } from "../errors.js";
import { validateConfig, type GraphformConfig } from "./schema.js";

export const DEFAULT_CONFIG_FILENAME = "graphform.config.json";

export type LoadConfigOptions = {
  /** Explicit config file; must exist when given. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type LoadedConfig = {
  config: GraphformConfig;
  /** Absolute path of the file read, or null when defaults were used. */
  configPath: string | null;
};

export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicit = options.configPath ? path.resolve(cwd, options.configPath) : null;
  const candidate = explicit ?? path.join(cwd, DEFAULT_CONFIG_FILENAME);

  let text: string | undefined;
  try {
    text = await fs.readFile(candidate, "utf-8");
  } catch (err) {
    if (explicit || !isNotFound(err)) {
      throw new ConfigError([err instanceof Error ? err.message : String(err)], candidate);
    }
  }
  const configPath = text === undefined ? null : candidate;
  const raw = text === undefined ? {} : parseJson(text, candidate);

  const result = validateConfig(applyEnvOverrides(raw, env));
  if (!result.success) {
    throw new ConfigError(formatZodIssues(result.error), configPath ?? undefined);
  }

  const baseDir = configPath ? path.dirname(configPath) : cwd;
  return { config: resolvePaths(result.data, baseDir), configPath };
}

/**
 * GRAPHFORM_STATE_BACKEND, GRAPHFORM_STATE_PATH, GRAPHFORM_LOG_LEVEL and
 * GRAPHFORM_MAX_CONCURRENCY take precedence over the file.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) return raw;
  const section = (key: string): Record<string, unknown> => {
    const value = raw[key];
    return isRecord(value) ? { ...value } : {};
  };

  const state = section("state");
  const logging = section("logging");
  const execution = section("execution");
  if (env.GRAPHFORM_STATE_BACKEND) state.backend = env.GRAPHFORM_STATE_BACKEND;
  if (env.GRAPHFORM_STATE_PATH) state.path = env.GRAPHFORM_STATE_PATH;
  if (env.GRAPHFORM_LOG_LEVEL) logging.level = env.GRAPHFORM_LOG_LEVEL;
  if (env.GRAPHFORM_MAX_CONCURRENCY) execution.maxConcurrency = Number(env.GRAPHFORM_MAX_CONCURRENCY);

  return { ...raw, state, logging, execution };
}

function resolvePaths(config: GraphformConfig, baseDir: string): GraphformConfig {
  return {
    ...config,
    state: { ...config.state, path: path.resolve(baseDir, config.state.path) },
    provider: { ...config.provider, path: path.resolve(baseDir, config.provider.path) },
    logging: {
      ...config.logging,
      destinations: config.logging.destinations.map((d) =>
        d.type === "file" ? { ...d, path: path.resolve(baseDir, d.path) } : d,
      ),
    },
  };
}

function parseJson(text: string, file: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError([`not valid JSON: ${err instanceof Error ? err.message : String(err)}`], file);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
