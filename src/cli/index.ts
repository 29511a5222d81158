import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config";
import type { RunConfig } from "../config";
import { runArchive, runDryRun } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";

export interface ParsedCliArgs {
  outputDir: string;
  username: string;
  password: string;
  verbose: boolean;
  dryRun: boolean;
  ignoreHttpsErrors: boolean;
  concurrency?: number;
  fromYear?: number;
  configPath?: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const HELP_TEXT = `
Usage:
  wggf-digest-archiver <out_dir> -u <username> -p <password> [options]

Downloads every monthly digest of the WGGF mailing-list archive into <out_dir>
(created if missing). Months without a digest are skipped.

Options:
  -u, --username <name>    Member username (or ARCHIVE_USERNAME)
  -p, --password <secret>  Member password (or ARCHIVE_PASSWORD)
  -v, --verbose            Log every digest at debug level instead of a progress bar
  --config <path>          Optional path to JSON config file
  --concurrency <n>        Fetches in flight at once, 0 for no limit
  --from-year <yyyy>       First archive year to request
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  --dry-run                List candidate URLs without logging in or downloading
  -h, --help               Show this help
`;

const VALUE_OPTIONS = new Set(["-u", "--username", "-p", "--password", "--config", "--concurrency", "--from-year"]);

function parseInteger(flag: string, raw: string): number {
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new CliUsageError(`${flag} expects a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const values = new Map<string, string>();
  const positionals: string[] = [];
  let verbose = false;
  let dryRun = false;
  let ignoreHttpsErrors = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (VALUE_OPTIONS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new CliUsageError(`${arg} requires a value`);
      }
      values.set(arg, value);
      i += 1;
    } else if (arg === "-v" || arg === "--verbose") {
      verbose = true;
    } else if (arg === "--dry-run") {
      dryRun = true;
    } else if (arg === "--ignore-https-errors") {
      ignoreHttpsErrors = true;
    } else if (arg.startsWith("-")) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length === 0) {
    return "help";
  }
  if (positionals.length > 1) {
    throw new CliUsageError(`Expected a single output directory, got: ${positionals.join(" ")}`);
  }

  const username = values.get("--username") ?? values.get("-u") ?? env.ARCHIVE_USERNAME;
  const password = values.get("--password") ?? values.get("-p") ?? env.ARCHIVE_PASSWORD;
  if (!dryRun && !username) {
    throw new CliUsageError("Missing username: pass -u/--username or set ARCHIVE_USERNAME");
  }
  if (!dryRun && !password) {
    throw new CliUsageError("Missing password: pass -p/--password or set ARCHIVE_PASSWORD");
  }

  const concurrencyRaw = values.get("--concurrency");
  const fromYearRaw = values.get("--from-year");
  return {
    outputDir: positionals[0],
    username: username ?? "",
    password: password ?? "",
    verbose,
    dryRun,
    ignoreHttpsErrors,
    concurrency: concurrencyRaw === undefined ? undefined : parseInteger("--concurrency", concurrencyRaw),
    fromYear: fromYearRaw === undefined ? undefined : parseInteger("--from-year", fromYearRaw),
    configPath: values.get("--config"),
  };
}

function ensureOutputDir(outputDir: string, logger: Logger): void {
  if (fs.existsSync(outputDir)) {
    return;
  }
  fs.mkdirSync(outputDir, { recursive: true });
  logger.debug("output_dir_created", { path: outputDir });
}

export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv, env);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`error: ${error.message}`);
      console.error(HELP_TEXT.trim());
      return 2;
    }
    throw error;
  }

  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath, env);
  if (parsed.ignoreHttpsErrors) {
    config = { ...config, ignoreHttpsErrors: true };
  }
  if (parsed.concurrency !== undefined) {
    config = { ...config, fetchConcurrency: parsed.concurrency };
  }
  if (parsed.fromYear !== undefined) {
    config = { ...config, firstYear: parsed.fromYear };
  }

  const runId = createRunId();
  const logger = new Logger({ component: "cli", runId }, { level: parsed.verbose ? "debug" : "info" });
  const metrics = new MetricsRegistry();
  const run: RunConfig = Object.freeze({
    credentials: Object.freeze({ username: parsed.username, password: parsed.password }),
    outputDir: path.resolve(parsed.outputDir),
    verbose: parsed.verbose,
  });
  const context = { runId, config, run, metrics };

  logger.info("command_start", {
    command: parsed.dryRun ? "dry-run" : "archive",
    outputDir: run.outputDir,
    username: run.credentials.username,
    verbose: run.verbose,
    concurrency: config.fetchConcurrency,
    firstYear: config.firstYear,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  if (parsed.dryRun) {
    runDryRun({ ...context, logger: logger.child("dry_run") });
    return 0;
  }

  ensureOutputDir(run.outputDir, logger);
  try {
    const summary = await runArchive({ ...context, logger: logger.child("archive") });
    logger.info("files_saved", { path: summary.outputDir, saved: summary.saved });
    logger.info("command_complete", {
      command: "archive",
      elapsedSeconds: Math.floor(summary.elapsedMs / 1000),
      failed: summary.failed + summary.writeFailed,
    });
    return 0;
  } finally {
    metrics.logSummary(logger.child("metrics"));
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
