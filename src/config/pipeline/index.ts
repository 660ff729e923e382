/**
 * Pipeline configuration module.
 *
 * Usage:
 *   import { loadPipelineConfig } from "./config/index.js";
 *
 *   const config = loadPipelineConfig({ safeMode: true });
 */

export { DuplicatePolicy, GapPolicy, DateOrder } from "./enums.js";

export type { PipelineConfig } from "./schema.js";
export { PipelineConfigSchema } from "./schema.js";

export {
  loadPipelineConfig,
  validatePipelineConfig,
  pipelineConfigFromEnv,
  summarizePolicy,
  formatZodIssues,
  PipelineConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
