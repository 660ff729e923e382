/**
 * Terminal output shared by the CLI commands.
 */

import type { Outcome } from "../decision/index.js";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const useColors = process.stdout.isTTY === true && !process.env.NO_COLOR;

export function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

export function outcomeColor(outcome: Outcome): keyof typeof COLORS {
  switch (outcome) {
    case "PASS":
      return "green";
    case "FAIL":
    case "ERROR":
      return "red";
    case "INDETERMINATE":
      return "yellow";
  }
}

export function banner(io: CliIo, title: string): void {
  io.out("");
  io.out(c("bold", "═".repeat(60)));
  io.out(c("bold", ` ${title}`));
  io.out(c("bold", "═".repeat(60)));
  io.out("");
}

export function rule(io: CliIo): void {
  io.out("─".repeat(60));
}

export function detail(io: CliIo, text: string, indent = 2): void {
  io.out(`${" ".repeat(indent)}${c("dim", "•")} ${text}`);
}

/** Compact number rendering for summaries; JSON output keeps full precision. */
export function formatNumber(value: number | null): string {
  if (value === null) return "n/a";
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}
