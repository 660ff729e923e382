#!/usr/bin/env node
/**
 * Evaluate one job: a sensor log against a process specification.
 *
 * Prints the decision and, unless the outcome is ERROR, writes the evidence
 * bundle directory.
 *
 * Usage:
 *   npx tsx src/cli/evaluate.ts --data run.csv --spec spec.json [options]
 *   npm run evaluate -- --data run.csv --spec spec.json
 *
 * Options:
 *   --data <path>        Sensor log (CSV)
 *   --spec <path>        Process specification (JSON)
 *   --industry <name>    Expected industry; must match the specification
 *   --timezone <zone>    Timezone of naive timestamps (IANA, UTC or ±HH:MM)
 *   --units <unit>       Temperature unit of untagged columns (C or F)
 *   --out <dir>          Bundle directory (default: evidence/<job_id or run id>)
 *   --created-at <iso>   Manifest creation time (default: fixed epoch)
 *   --safe-mode          Require the independent calculation to agree
 *   --json               Print the decision as JSON
 *   -h, --help           Show help
 *
 * Pipeline policy comes from the environment (see .env.example).
 *
 * Exit codes:
 *   0 - PASS
 *   1 - FAIL
 *   2 - INDETERMINATE
 *   3 - ERROR (including an unwritable bundle)
 *   4 - Usage error (bad arguments, unreadable input files, invalid config)
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { parseArgs } from "node:util";

import { config as appConfig, loadPipelineConfig, parseLogLevel, pipelineConfigFromEnv, type PipelineConfig } from "../config/index.js";
import { runJob, type Decision, type Outcome } from "../decision/index.js";
import { writeBundle } from "../evidence/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import { canonicalJson } from "../utils/canonical-json.js";
import { isEntryPoint } from "../utils/entry-point.js";
import { banner, c, consoleIo, detail, formatNumber, outcomeColor, rule, type CliIo } from "./output.js";

export const EXIT_CODES: Readonly<Record<Outcome | "USAGE", number>> = {
  PASS: 0,
  FAIL: 1,
  INDETERMINATE: 2,
  ERROR: 3,
  USAGE: 4,
};

const HELP = `
Usage: evaluate-job --data <csv> --spec <json> [options]

Options:
  --data <path>        Sensor log (CSV)
  --spec <path>        Process specification (JSON)
  --industry <name>    Expected industry; must match the specification
  --timezone <zone>    Timezone of naive timestamps (IANA, UTC or ±HH:MM)
  --units <unit>       Temperature unit of untagged columns (C or F)
  --out <dir>          Bundle directory (default: evidence/<job_id or run id>)
  --created-at <iso>   Manifest creation time (default: fixed epoch)
  --safe-mode          Require the independent calculation to agree
  --json               Print the decision as JSON
  -h, --help           Show this help message
`;

export interface EvaluateContext {
  io?: CliIo;
  logger?: Logger;
  /** Pipeline policy; read from the environment when omitted */
  config?: Readonly<PipelineConfig>;
  runId?: string;
}

function parseCliArgs(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      data: { type: "string" },
      spec: { type: "string" },
      industry: { type: "string" },
      timezone: { type: "string" },
      units: { type: "string" },
      out: { type: "string" },
      "created-at": { type: "string" },
      "safe-mode": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });
  return values;
}

function printDecision(io: CliIo, decision: Decision): void {
  banner(io, `Compliance decision: ${decision.industry ?? "unknown industry"}`);
  io.out(`${c("bold", "Outcome")}: ${c(outcomeColor(decision.outcome), decision.outcome)}`);
  if (decision.job_id !== null) io.out(`${c("bold", "Job")}: ${decision.job_id}`);
  io.out(`${c("bold", "Reasons")}: ${decision.reasons.join(", ")}`);

  if (decision.checks.length > 0) {
    io.out("");
    io.out(c("bold", "Checks"));
    for (const check of decision.checks) {
      const mark = check.status === "met" ? c("green", "✓") : check.status === "ambiguous" ? c("yellow", "?") : c("red", "✗");
      io.out(
        `  ${mark} ${check.label}: ${formatNumber(check.nominal)} ${check.unit} ${check.comparator} ${formatNumber(check.limit)} ${check.unit}` +
          c("dim", ` (conservative ${formatNumber(check.conservative)})`)
      );
    }
  }

  if (decision.error !== undefined) {
    io.out("");
    io.out(c("red", decision.error.message));
  }

  if (decision.warnings.length > 0) {
    io.out("");
    io.out(c("bold", `Warnings (${decision.warnings.length})`));
    for (const item of decision.warnings) detail(io, `${c("yellow", item.code)} ${item.message}`);
  }

  if (decision.shadow.status !== "DISABLED") {
    io.out("");
    io.out(`${c("bold", "Independent check")}: ${decision.shadow.status}`);
  }
}

/**
 * Run the command.
 *
 * @returns the process exit code
 */
export function runEvaluate(argv: string[], context: EvaluateContext = {}): number {
  const io = context.io ?? consoleIo;

  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    io.err(HELP);
    return EXIT_CODES.USAGE;
  }

  if (args.help) {
    io.out(HELP);
    return EXIT_CODES.PASS;
  }
  if (args.data === undefined || args.spec === undefined) {
    io.err("Both --data and --spec are required.");
    io.err(HELP);
    return EXIT_CODES.USAGE;
  }

  let clock: (() => Date) | undefined;
  const createdAt = args["created-at"];
  if (createdAt !== undefined) {
    const instant = new Date(createdAt);
    if (Number.isNaN(instant.getTime())) {
      io.err(`Invalid --created-at: ${createdAt}`);
      return EXIT_CODES.USAGE;
    }
    clock = () => instant;
  }

  let rawData: Buffer;
  let specBytes: Buffer;
  let config: Readonly<PipelineConfig>;
  try {
    rawData = readFileSync(args.data);
    specBytes = readFileSync(args.spec);
    const base = context.config ?? pipelineConfigFromEnv();
    config = args["safe-mode"] ? loadPipelineConfig({ ...base, safeMode: true }) : base;
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    return EXIT_CODES.USAGE;
  }

  const runId = context.runId ?? initRunId();
  const logger =
    context.logger ??
    createLogger({ level: parseLogLevel(appConfig.logLevel), logDir: appConfig.logDir, console: false });

  const run = runJob(
    {
      rawData,
      specification: specBytes,
      industry: args.industry,
      declaredTimezone: args.timezone,
      declaredUnits: args.units,
    },
    { config, logger, clock }
  );
  const { decision, bundle } = run;

  let bundleDir: string | null = null;
  if (bundle !== null) {
    try {
      bundleDir = writeBundle(bundle, args.out ?? join("evidence", decision.job_id ?? runId));
    } catch (error) {
      io.err(`Cannot write evidence bundle: ${error instanceof Error ? error.message : String(error)}`);
      return EXIT_CODES.ERROR;
    }
  }

  if (args.json) {
    io.out(canonicalJson({ decision, bundle: bundleDir, root_hash: bundle?.manifest.root_hash ?? null }).trimEnd());
  } else {
    printDecision(io, decision);
    io.out("");
    rule(io);
    if (bundle !== null && bundleDir !== null) {
      io.out(`Evidence bundle: ${bundleDir}`);
      io.out(c("dim", `Root hash: ${bundle.manifest.root_hash}`));
    } else {
      io.out(c("dim", "No evidence bundle for an ERROR outcome."));
    }
    rule(io);
  }

  return EXIT_CODES[decision.outcome];
}

function main(): void {
  process.exit(runEvaluate(process.argv.slice(2)));
}

if (isEntryPoint(import.meta.url)) {
  main();
}
