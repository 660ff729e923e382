#!/usr/bin/env node
/**
 * Verify an evidence bundle directory.
 *
 * Checks every file against the manifest, recomputes the root hash, then
 * re-runs the evaluation from the bundle's inputs and compares the result
 * with the recorded decision.
 *
 * Usage:
 *   npx tsx src/cli/verify-bundle.ts --bundle evidence/job-42 [--json]
 *
 * Exit codes:
 *   0 - Bundle verified and decision reproduced
 *   1 - Integrity or reproduction mismatch
 *   2 - Bundle unreadable (or usage error)
 */

import { parseArgs } from "node:util";

import { readBundle, verifyBundle, type VerificationReport } from "../evidence/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { canonicalJson } from "../utils/canonical-json.js";
import { isEntryPoint } from "../utils/entry-point.js";
import { banner, c, consoleIo, detail, outcomeColor, rule, type CliIo } from "./output.js";

export const VERIFY_EXIT_CODES = {
  MATCH: 0,
  MISMATCH: 1,
  UNREADABLE: 2,
} as const;

const HELP = `
Usage: verify-bundle --bundle <dir> [options]

Options:
  --bundle <dir>   Evidence bundle directory
  --json           Print the verification report as JSON
  -h, --help       Show this help message
`;

export interface VerifyContext {
  io?: CliIo;
  logger?: Logger;
}

function printReport(io: CliIo, dir: string, report: VerificationReport): void {
  const { integrity } = report;
  banner(io, "Evidence bundle verification");
  io.out(`${c("bold", "Bundle")}: ${dir}`);
  io.out(
    `${c("bold", "Files")}: ${integrity.files_verified}/${integrity.files_total} verified` +
      (integrity.root_hash_valid ? c("green", " · root hash valid") : c("red", " · root hash invalid"))
  );
  if (report.recomputed_decision !== null) {
    const { outcome, reasons } = report.recomputed_decision;
    io.out(`${c("bold", "Recomputed")}: ${c(outcomeColor(outcome), outcome)} (${reasons.join(", ")})`);
  }

  io.out("");
  rule(io);
  if (report.match) {
    io.out(c("green", "✓ Bundle verified: integrity intact and decision reproduced"));
  } else {
    io.out(c("red", `✗ Verification failed: ${report.mismatches.length} mismatch(es)`));
    for (const mismatch of report.mismatches) {
      detail(io, `${c("yellow", mismatch.kind)} ${mismatch.path}: ${mismatch.message}`);
    }
  }
  rule(io);
}

export function runVerify(argv: string[], context: VerifyContext = {}): number {
  const io = context.io ?? consoleIo;

  let values: { bundle?: string; json: boolean; help: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        bundle: { type: "string" },
        json: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
    }));
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    io.err(HELP);
    return VERIFY_EXIT_CODES.UNREADABLE;
  }

  if (values.help) {
    io.out(HELP);
    return VERIFY_EXIT_CODES.MATCH;
  }
  if (values.bundle === undefined) {
    io.err("--bundle is required.");
    io.err(HELP);
    return VERIFY_EXIT_CODES.UNREADABLE;
  }

  let report: VerificationReport;
  try {
    const bundle = readBundle(values.bundle);
    if (bundle.files.length === 0) {
      io.err(`No files in bundle directory ${values.bundle}`);
      return VERIFY_EXIT_CODES.UNREADABLE;
    }
    report = verifyBundle(bundle, { logger: context.logger ?? createSilentLogger() });
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    return VERIFY_EXIT_CODES.UNREADABLE;
  }

  if (values.json) {
    io.out(canonicalJson(report).trimEnd());
  } else {
    printReport(io, values.bundle, report);
  }

  return report.match ? VERIFY_EXIT_CODES.MATCH : VERIFY_EXIT_CODES.MISMATCH;
}

function main(): void {
  process.exit(runVerify(process.argv.slice(2)));
}

if (isEntryPoint(import.meta.url)) {
  main();
}
