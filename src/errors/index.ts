/**
 * Typed pipeline errors and the per-stage Result type.
 */

export {
  SchemaValidationError,
  DataQualityError,
  RequiredSignalMissingError,
  ComputationError,
  toErrorReport,
  isPipelineError,
  type SchemaIssue,
  type DataQualityCode,
  type DataQualityIssue,
  type PipelineError,
  type PipelineErrorKind,
  type ErrorReport,
} from "./errors.js";

export { ok, err, type Ok, type Err, type Result } from "./result.js";
