/**
 * Pipeline error taxonomy.
 *
 * Every failure that can stop a job is one of four typed errors. Each keeps
 * its structured detail (issues, signal lists) next to a readable message,
 * and renders to a JSON-safe report for decision output.
 */

/**
 * Individual schema validation issue.
 */
export interface SchemaIssue {
  /** Path to the offending field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Machine-readable code (zod issue code or a cross-field rule id) */
  code: string;
}

/**
 * Specification structurally or semantically invalid.
 */
export class SchemaValidationError extends Error {
  public readonly kind = "schema_validation" as const;
  public readonly issues: SchemaIssue[];

  constructor(message: string, issues: SchemaIssue[]) {
    super(message);
    this.name = "SchemaValidationError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Specification validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Machine-readable data-quality defect codes.
 */
export type DataQualityCode =
  | "INPUT_TOO_LARGE"
  | "EMPTY_INPUT"
  | "MALFORMED_ROW"
  | "NO_TIMESTAMP_COLUMN"
  | "NO_SENSOR_COLUMNS"
  | "DUPLICATE_COLUMN"
  | "UNRECOGNIZED_UNIT"
  | "UNPARSEABLE_TIMESTAMP"
  | "INCONSISTENT_DATE_ORDER"
  | "UNKNOWN_TIMEZONE"
  | "DUPLICATE_TIMESTAMPS"
  | "INSUFFICIENT_DATA_POINTS"
  | "TOO_MANY_POINTS"
  | "GAP_EXCEEDS_ALLOWED"
  | "PARSER_WARNING";

export interface DataQualityIssue {
  code: DataQualityCode;
  message: string;
  detail?: Record<string, unknown>;
}

/**
 * Input data cannot be trusted enough to compute a decision.
 */
export class DataQualityError extends Error {
  public readonly kind = "data_quality" as const;
  public readonly issues: DataQualityIssue[];

  constructor(issues: DataQualityIssue[]) {
    super(
      issues.length === 1
        ? issues[0].message
        : `${issues.length} data quality defects: ${issues.map((i) => i.code).join(", ")}`
    );
    this.name = "DataQualityError";
    this.issues = issues;
  }

  /** Whether any issue carries the given code. */
  has(code: DataQualityCode): boolean {
    return this.issues.some((issue) => issue.code === code);
  }

  format(): string {
    const lines = ["Data quality checks failed:"];
    for (const issue of this.issues) {
      lines.push(`  - [${issue.code}] ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Sensors the selected industry needs are absent from the normalized data.
 */
export class RequiredSignalMissingError extends Error {
  public readonly kind = "required_signal_missing" as const;
  public readonly required: string[];
  public readonly missing: string[];
  public readonly available: string[];
  public readonly industry: string;

  constructor(options: {
    industry: string;
    required: string[];
    missing: string[];
    available: string[];
  }) {
    const { industry, required, missing, available } = options;
    const noun = missing.length === 1 ? "signal" : "signals";
    let message = `${industry} validation requires required ${noun} missing: ${missing.join(", ")}`;
    message += ` (available: ${available.length > 0 ? available.join(", ") : "none"})`;
    super(message);
    this.name = "RequiredSignalMissingError";
    this.industry = industry;
    this.required = required;
    this.missing = missing;
    this.available = available;
  }

  format(): string {
    return [
      `Required signals missing for ${this.industry}:`,
      `  required:  ${this.required.join(", ")}`,
      `  missing:   ${this.missing.join(", ")}`,
      `  available: ${this.available.join(", ") || "(none)"}`,
    ].join("\n");
  }
}

/**
 * An internal invariant was violated inside a calculator. Always a defect.
 */
export class ComputationError extends Error {
  public readonly kind = "computation" as const;
  public readonly calculator: string;
  public readonly detail: Record<string, unknown>;

  constructor(calculator: string, message: string, detail: Record<string, unknown> = {}) {
    super(`${calculator}: ${message}`);
    this.name = "ComputationError";
    this.calculator = calculator;
    this.detail = detail;
  }

  format(): string {
    return `Computation failed in ${this.calculator}: ${this.message}`;
  }
}

export type PipelineError =
  | SchemaValidationError
  | DataQualityError
  | RequiredSignalMissingError
  | ComputationError;

export type PipelineErrorKind = PipelineError["kind"];

/**
 * JSON-safe rendering of a pipeline error.
 */
export interface ErrorReport {
  kind: PipelineErrorKind;
  name: string;
  message: string;
  details: Record<string, unknown>;
}

export function toErrorReport(error: PipelineError): ErrorReport {
  const base = { kind: error.kind, name: error.name, message: error.message };
  switch (error.kind) {
    case "schema_validation":
      return { ...base, details: { issues: error.issues } };
    case "data_quality":
      return { ...base, details: { issues: error.issues } };
    case "required_signal_missing":
      return {
        ...base,
        details: {
          industry: error.industry,
          required: error.required,
          missing: error.missing,
          available: error.available,
        },
      };
    case "computation":
      return { ...base, details: { calculator: error.calculator, ...error.detail } };
  }
}

export function isPipelineError(value: unknown): value is PipelineError {
  return (
    value instanceof SchemaValidationError ||
    value instanceof DataQualityError ||
    value instanceof RequiredSignalMissingError ||
    value instanceof ComputationError
  );
}
