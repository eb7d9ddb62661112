import { pathToFileURL } from "node:url";
import { config as loadDotenv } from "dotenv";
import { loadConfig, ConfigError } from "./config.ts";
import type { RuntimeConfig } from "./config.ts";
import { createApplication } from "./bootstrap.ts";
import type { Application, ApplicationOverrides } from "./bootstrap.ts";
import { SKIPPABLE_PHASES, isSkippablePhase } from "./orchestrator/phase-table.ts";
import { renderJson, renderReport } from "./report/render.ts";
import { FatalSetupError, errorMessage } from "./state/errors.ts";
import { ensureStateRoot } from "./state/state-root.ts";
import { KNOWN_NOTIFICATION_TYPES } from "./types/notification.ts";
import type { PhaseId } from "./types/phase.ts";
import type { RunMode } from "./types/run.ts";

// ── Parsed CLI Arguments ───────────────────────────────────────────────────

export type CliCommand = "run" | "publish" | "prune";

export interface PublishArgs {
  type: string;
  from: string;
  payload: Record<string, unknown>;
}

export interface ParsedArgs {
  command: CliCommand;
  mode: RunMode;
  skip: Set<PhaseId>;
  json: boolean;
  help: boolean;
  publish: PublishArgs | null;
  olderThanDays: number | null;
}

export const DEFAULT_PUBLISHER = "cli";

// ── Argument Parser ────────────────────────────────────────────────────────

function addSkips(skip: Set<PhaseId>, raw: string): void {
  for (const name of raw.split(",").map((s) => s.trim()).filter(Boolean)) {
    if (name === "summary") {
      throw new Error("The summary phase cannot be skipped");
    }
    if (!isSkippablePhase(name)) {
      throw new Error(`Unknown phase "${name}". Phases: ${SKIPPABLE_PHASES.join(", ")}`);
    }
    skip.add(name);
  }
}

function parsePayload(raw: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new Error("--payload must be valid JSON");
  }
  if (!isJsonObject(value)) {
    throw new Error("--payload must be a JSON object");
  }
  return value;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireValue(argv: readonly string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse CLI arguments into a structured ParsedArgs object.
 *
 * @param argv Arguments after the script name (e.g. process.argv.slice(2))
 * @throws Error if arguments are invalid
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: "run",
    mode: "normal",
    skip: new Set(),
    json: false,
    help: false,
    publish: null,
    olderThanDays: null,
  };
  let from = DEFAULT_PUBLISHER;
  let payload: Record<string, unknown> = {};
  let type: string | null = null;

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
    } else if (arg === "--quick") {
      result.mode = "quick";
      i++;
    } else if (arg === "--json") {
      result.json = true;
      i++;
    } else if (arg === "--skip") {
      addSkips(result.skip, requireValue(argv, i, "--skip"));
      i += 2;
    } else if (arg.startsWith("--skip-")) {
      addSkips(result.skip, arg.slice("--skip-".length));
      i++;
    } else if (arg === "--from") {
      from = requireValue(argv, i, "--from");
      i += 2;
    } else if (arg === "--payload") {
      payload = parsePayload(requireValue(argv, i, "--payload"));
      i += 2;
    } else if (arg === "--older-than-days") {
      const raw = requireValue(argv, i, "--older-than-days");
      const days = Number(raw);
      if (!/^\d+(\.\d+)?$/.test(raw) || !Number.isFinite(days)) {
        throw new Error(`--older-than-days must be a non-negative number, got "${raw}"`);
      }
      result.olderThanDays = days;
      i += 2;
    } else if (!arg.startsWith("-")) {
      // Positional: subcommand, then the publish type
      if (i === 0 && (arg === "publish" || arg === "prune")) {
        result.command = arg;
      } else if (result.command === "publish" && type === null) {
        type = arg;
      } else {
        throw new Error(`Unexpected argument: ${arg}`);
      }
      i++;
    } else {
      throw new Error(`Unknown flag: ${arg}`);
    }
  }

  if (result.help) return result;

  if (result.command === "publish") {
    if (type === null) {
      throw new Error("publish requires a message type");
    }
    result.publish = { type, from, payload };
  }
  if (result.command === "prune" && result.olderThanDays === null) {
    throw new Error("prune requires --older-than-days <n>");
  }
  if (result.command !== "run" && (result.mode === "quick" || result.skip.size > 0)) {
    throw new Error(`--quick and --skip only apply to a wake check run`);
  }

  return result;
}

// ── Help Text ──────────────────────────────────────────────────────────────

export const HELP_TEXT = `
wake-check: wake-up and status orchestrator

Usage:
  wake-check [--quick] [--skip <phase[,phase]>] [--skip-<phase>] [--json]
  wake-check publish <type> [--from <name>] [--payload <json>]
  wake-check prune --older-than-days <n>

Options:
  --quick                 Run only health, backup and memory checks
  --skip <phases>         Skip phases (comma-separated, repeatable)
  --skip-<phase>          Skip a single phase, e.g. --skip-freshness
  --json                  Print the run report as JSON
  --help, -h              Show this help message

Phases:
  ${SKIPPABLE_PHASES.join(", ")}

Known message types (any other type is accepted too):
  ${KNOWN_NOTIFICATION_TYPES.join(", ")}

Examples:
  wake-check --quick
  wake-check --skip security,freshness
  wake-check publish task_finished --from nightly-agent --payload '{"task":"digest"}'
  wake-check prune --older-than-days 14
`.trim();

// ── Commands ───────────────────────────────────────────────────────────────

const DAY_MS = 24 * 60 * 60 * 1000;

async function runCheck(app: Application, args: ParsedArgs): Promise<number> {
  const controller = new AbortController();
  let interrupts = 0;
  const onSigint = (): void => {
    interrupts++;
    if (interrupts > 1) process.exit(130);
    app.logger.warn("Interrupted, finishing current phase. Press Ctrl+C again to exit now.");
    controller.abort();
  };
  process.on("SIGINT", onSigint);

  try {
    const report = await app.orchestrator.run(args.mode, args.skip, controller.signal);
    console.log(args.json ? renderJson(report) : renderReport(report));
    return 0;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

async function publishMessage(app: Application, publish: PublishArgs): Promise<number> {
  await ensureStateRoot(app.paths.root, { create: app.config.createStateDir });
  const id = await app.bus.publish(publish);
  console.log(id);
  return 0;
}

async function prune(app: Application, olderThanDays: number): Promise<number> {
  await ensureStateRoot(app.paths.root, { create: app.config.createStateDir });
  const cutoff = new Date(Date.now() - olderThanDays * DAY_MS);
  const moved = await app.bus.archive(cutoff);
  app.logger.info("Archived notifications", { moved, cutoff: cutoff.toISOString() });
  console.log(`Archived ${moved} notification(s)`);
  return 0;
}

/**
 * Execute parsed arguments against a configured application.
 * Returns the process exit code. Any completed run exits 0.
 */
export async function execute(
  args: ParsedArgs,
  config: RuntimeConfig,
  overrides?: ApplicationOverrides,
): Promise<number> {
  const app = createApplication(config, overrides);

  try {
    switch (args.command) {
      case "publish":
        if (args.publish === null) throw new Error("publish requires a message type");
        return await publishMessage(app, args.publish);
      case "prune":
        return await prune(app, args.olderThanDays ?? 0);
      case "run":
        return await runCheck(app, args);
    }
  } catch (err: unknown) {
    if (err instanceof FatalSetupError) {
      app.logger.fatal("Fatal setup error", { path: err.path, error: err.message });
      console.error(`Fatal: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  loadDotenv();

  // Parse arguments
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(`Error: ${errorMessage(err)}`);
    console.error("Run with --help for usage information.");
    process.exit(1);
  }

  // Help mode
  if (args.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  // Load config
  let config: RuntimeConfig;
  try {
    config = loadConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(`Failed to load config: ${errorMessage(err)}`);
    }
    process.exit(1);
  }

  process.exit(await execute(args, config));
}

// Run only when executed as the entry point (not when imported for testing)
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    console.error(`Fatal: failed to start: ${errorMessage(err)}`);
    process.exit(1);
  });
}
