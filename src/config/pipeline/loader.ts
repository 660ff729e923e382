/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Validating configuration objects against the schema
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 * - Reading policy flags from the environment at the process edge
 */

import type { ZodIssue } from "zod";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
import { DuplicatePolicy, GapPolicy, DateOrder } from "./enums.js";
import {
  optionalEnv,
  optionalEnvBool,
  optionalEnvEnum,
  optionalEnvInt,
  optionalEnvNumber,
} from "../env.js";
import { deepFreeze } from "../../utils/freeze.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for pipeline configuration.
 */
export class PipelineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Pipeline configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate and load pipeline configuration.
 *
 * Partial input is merged over DEFAULT_PIPELINE_CONFIG before validation.
 *
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(input: unknown = {}): Readonly<PipelineConfig> {
  const merged =
    input !== null && typeof input === "object" && !Array.isArray(input)
      ? { ...DEFAULT_PIPELINE_CONFIG, ...input }
      : input;

  const result = PipelineConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate pipeline configuration without throwing.
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = PipelineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Build pipeline configuration from policy environment variables.
 *
 * Only the CLI entry points call this; library callers construct the
 * configuration explicitly.
 */
export function pipelineConfigFromEnv(): Readonly<PipelineConfig> {
  const d = DEFAULT_PIPELINE_CONFIG;
  return loadPipelineConfig({
    safeMode: optionalEnvBool("SAFE_MODE", d.safeMode),
    humanQaRequiredForPass: optionalEnvBool(
      "HUMAN_QA_REQUIRED_FOR_PASS",
      d.humanQaRequiredForPass
    ),
    failOnParserWarnings: optionalEnvBool(
      "FAIL_ON_PARSER_WARNINGS",
      d.failOnParserWarnings
    ),
    duplicatePolicy: optionalEnvEnum(
      "DUPLICATE_POLICY",
      DuplicatePolicy.options,
      d.duplicatePolicy
    ),
    gapPolicy: optionalEnvEnum("GAP_POLICY", GapPolicy.options, d.gapPolicy),
    dateOrder: optionalEnvEnum("DATE_ORDER", DateOrder.options, d.dateOrder),
    defaultTimezone: optionalEnv("DEFAULT_TIMEZONE", d.defaultTimezone),
    minDistinctPoints: optionalEnvInt("MIN_DISTINCT_POINTS", d.minDistinctPoints),
    resampleStepS: optionalEnvNumber("RESAMPLE_STEP_S"),
  });
}

/**
 * One-line policy summary for logs and CLI headers.
 */
export function summarizePolicy(cfg: PipelineConfig): string {
  return [
    cfg.safeMode ? "Safe Mode: ENABLED" : "Safe Mode: DISABLED",
    cfg.humanQaRequiredForPass ? "Human QA: REQUIRED" : "Human QA: BYPASSED",
    cfg.failOnParserWarnings ? "Parser Warnings: BLOCKING" : "Parser Warnings: LOG ONLY",
    `Duplicates: ${cfg.duplicatePolicy}`,
  ].join(" | ");
}
