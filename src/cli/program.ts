/**
 * graphform — CLI Commands
 *
 * `graphform plan|apply|destroy|verify|state|kinds`. Exit codes:
 * 0 success, 1 partial or failed execution, 2 declaration/graph/config error.
 */

import path from "node:path";

import { Command, CommanderError } from "commander";

import { loadConfig } from "../config/io.js";
import type { GraphformConfig } from "../config/schema.js";
import { loadDeclarationFile } from "../declarations/loader.js";
import { ConfigError, formatError, isPreExecutionError } from "../errors.js";
import { buildResourceGraph } from "../graph/builder.js";
import { listKinds } from "../graph/registry.js";
import { resolveOrder } from "../graph/resolver.js";
import { createLogger, isLogLevel, type Logger } from "../logging/index.js";
import { Orchestrator } from "../orchestrator.js";
import { formatPlan } from "../plan/render.js";
import { createProvider } from "../provider/index.js";
import type { ResourceProvider } from "../provider/types.js";
import { createStateStore } from "../state/storage.js";
import type { StateStore } from "../state/types.js";
import { VERSION } from "../version.js";
import { formatApplyReport, formatKinds, formatStateList } from "./output.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_GRAPH_ERROR = 2;

// =============================================================================
// Types
// =============================================================================

export type CliDeps = {
  /** Use this store instead of the configured one. Not initialized or closed by the CLI. */
  store?: StateStore;
  /** Use this provider instead of the configured one. */
  provider?: ResourceProvider;
  /** Logger for the run; defaults to one built from the logging config. */
  logger?: Logger;
  /** Aborting stops apply/destroy from starting new actions. */
  signal?: AbortSignal;
  out?: (text: string) => void;
  err?: (text: string) => void;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

type GlobalOptions = {
  config?: string;
  state?: string;
  logLevel?: string;
  json?: boolean;
  concurrency?: string;
};

type Runtime = {
  config: GraphformConfig;
  logger: Logger;
  store: StateStore;
  orchestrator: Orchestrator;
  json: boolean;
};

// =============================================================================
// Entry
// =============================================================================

/**
 * Parse `argv` (without the node/script prefix), run the command and return
 * its exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}

export function createProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const out = deps.out ?? ((text: string) => process.stdout.write(`${text}\n`));
  const err = deps.err ?? ((text: string) => process.stderr.write(`${text}\n`));

  const program = new Command("graphform")
    .description("Dependency-aware declarative resource orchestrator")
    .version(VERSION)
    .option("-c, --config <path>", "Config file (default: ./graphform.config.json)")
    .option("--state <path>", "State database path (overrides config)")
    .option("--log-level <level>", "trace | debug | info | warn | error | fatal")
    .option("--json", "Output as JSON")
    .option("--concurrency <n>", "Maximum concurrent actions per layer")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out(text.trimEnd()),
      writeErr: (text) => err(text.trimEnd()),
    });

  /** Run `fn` with a runtime, mapping thrown errors to exit codes. */
  const run = async (command: Command, fn: (rt: Runtime) => Promise<number>): Promise<void> => {
    try {
      setExitCode(await withRuntime(command.optsWithGlobals<GlobalOptions>(), deps, fn));
    } catch (e) {
      err(formatError(e));
      setExitCode(isPreExecutionError(e) ? EXIT_GRAPH_ERROR : EXIT_FAILED);
    }
  };

  // ── plan ────────────────────────────────────────────────────
  program
    .command("plan")
    .description("Show the actions needed to reach the declared state")
    .argument("<file>", "Declaration file (JSON)")
    .action(async (file: string, _opts: unknown, command: Command) => {
      await run(command, async (rt) => {
        const plan = await rt.orchestrator.plan(await loadDeclarationFile(resolveFrom(deps, file)));
        out(rt.json ? JSON.stringify(plan, null, 2) : formatPlan(plan));
        return EXIT_OK;
      });
    });

  // ── apply ───────────────────────────────────────────────────
  program
    .command("apply")
    .description("Create, update and replace resources to match the declarations")
    .argument("<file>", "Declaration file (JSON)")
    .action(async (file: string, _opts: unknown, command: Command) => {
      await run(command, async (rt) => {
        const document = await loadDeclarationFile(resolveFrom(deps, file));
        const report = await rt.orchestrator.apply(document, { signal: deps.signal });
        out(rt.json ? JSON.stringify(report, null, 2) : `${formatPlan(report.plan)}\n\n${formatApplyReport(report)}`);
        return report.status === "succeeded" ? EXIT_OK : EXIT_FAILED;
      });
    });

  // ── destroy ─────────────────────────────────────────────────
  program
    .command("destroy")
    .description("Destroy every resource recorded in state, dependents first")
    .argument("[file]", "Declaration file to validate before tearing down")
    .action(async (file: string | undefined, _opts: unknown, command: Command) => {
      await run(command, async (rt) => {
        if (file) resolveOrder(buildResourceGraph(await loadDeclarationFile(resolveFrom(deps, file))));
        const report = await rt.orchestrator.destroy({ signal: deps.signal });
        out(rt.json ? JSON.stringify(report, null, 2) : `${formatPlan(report.plan)}\n\n${formatApplyReport(report, "Destroy")}`);
        return report.status === "succeeded" ? EXIT_OK : EXIT_FAILED;
      });
    });

  // ── verify ──────────────────────────────────────────────────
  program
    .command("verify")
    .description("Check that every resource in state still exists at the provider")
    .action(async (_opts: unknown, command: Command) => {
      await run(command, async (rt) => {
        const report = await rt.orchestrator.verify();
        out(rt.json ? JSON.stringify(report, null, 2) : `State verified: ${report.checked} resource(s) exist.`);
        return EXIT_OK;
      });
    });

  // ── state ───────────────────────────────────────────────────
  const state = program.command("state").description("Inspect recorded state");

  state
    .command("list")
    .description("List resources in state")
    .action(async (_opts: unknown, command: Command) => {
      await run(command, async (rt) => {
        const snapshot = await rt.store.load();
        out(rt.json ? JSON.stringify([...snapshot.values()], null, 2) : formatStateList(snapshot));
        return EXIT_OK;
      });
    });

  state
    .command("show")
    .description("Show one resource's recorded state")
    .argument("<address>", "Resource address (type.name)")
    .action(async (address: string, _opts: unknown, command: Command) => {
      await run(command, async (rt) => {
        const entry = (await rt.store.load()).get(address);
        if (!entry) {
          err(`No state recorded for "${address}"`);
          return EXIT_FAILED;
        }
        out(JSON.stringify(entry, null, 2));
        return EXIT_OK;
      });
    });

  // ── kinds ───────────────────────────────────────────────────
  program
    .command("kinds")
    .description("List resource kinds, their outputs and update policy")
    .action((_opts: unknown, command: Command) => {
      const { json } = command.optsWithGlobals<GlobalOptions>();
      out(json ? JSON.stringify(listKinds(), null, 2) : formatKinds(listKinds()));
      setExitCode(EXIT_OK);
    });

  return program;
}

// =============================================================================
// Runtime
// =============================================================================

async function withRuntime(
  opts: GlobalOptions,
  deps: CliDeps,
  fn: (rt: Runtime) => Promise<number>,
): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const loaded = await loadConfig({ configPath: opts.config, cwd, env: deps.env });
  const config = applyCliOverrides(loaded.config, opts, cwd);

  const logger = deps.logger ?? createLogger("cli", { ...config.logging, colors: process.stderr.isTTY });
  const store = deps.store ?? createStateStore(config.state);
  const provider = deps.provider ?? createProvider(config.provider);

  try {
    if (!deps.store) await store.initialize();
    logger.debug(`State backend: ${config.state.backend}${config.state.backend === "sqlite" ? ` (${config.state.path})` : ""}`);
    const orchestrator = new Orchestrator({ store, provider, execution: config.execution, logger });
    return await fn({ config, logger, store, orchestrator, json: opts.json ?? false });
  } finally {
    if (!deps.store) await store.close();
    if (!deps.logger) await logger.close();
  }
}

function applyCliOverrides(config: GraphformConfig, opts: GlobalOptions, cwd: string): GraphformConfig {
  const issues: string[] = [];
  let { state, logging, execution } = config;

  if (opts.state) state = { ...state, path: path.resolve(cwd, opts.state) };
  if (opts.logLevel) {
    if (isLogLevel(opts.logLevel)) logging = { ...logging, level: opts.logLevel };
    else issues.push(`--log-level: unknown level "${opts.logLevel}"`);
  }
  if (opts.concurrency) {
    const n = Number(opts.concurrency);
    if (Number.isInteger(n) && n > 0) execution = { ...execution, maxConcurrency: n };
    else issues.push(`--concurrency: expected a positive integer, got "${opts.concurrency}"`);
  }

  if (issues.length > 0) throw new ConfigError(issues);
  return { ...config, state, logging, execution };
}

function resolveFrom(deps: CliDeps, file: string): string {
  return path.resolve(deps.cwd ?? process.cwd(), file);
}
