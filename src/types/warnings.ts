/**
 * Non-fatal findings reported alongside every outcome.
 */

export type WarningSource = "parser" | "quality" | "resample" | "metrics" | "shadow";

export interface PipelineWarning {
  /** Stable machine-readable code, e.g. OUT_OF_ORDER_ROWS */
  readonly code: string;
  readonly message: string;
  readonly source: WarningSource;
  readonly detail?: Readonly<Record<string, unknown>>;
}

export function warning(
  source: WarningSource,
  code: string,
  message: string,
  detail?: Record<string, unknown>
): PipelineWarning {
  return detail === undefined ? { code, message, source } : { code, message, source, detail };
}
