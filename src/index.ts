/**
 * Compliance evidence pipeline.
 *
 * Library entry: everything needed to evaluate a job and verify its
 * evidence bundle. Run directly, it checks the process configuration and
 * prints the active pipeline policy.
 */

import {
  config,
  ConfigError,
  parseLogLevel,
  pipelineConfigFromEnv,
  PipelineConfigError,
  summarizePolicy,
  validateConfig,
} from "./config/index.js";
import { initRunId, createLogger } from "./logging/index.js";
import { isEntryPoint } from "./utils/entry-point.js";

export * from "./errors/index.js";
export * from "./decision/index.js";
export * from "./evidence/index.js";
export * from "./metrics/index.js";
export * from "./normalize/index.js";
export * from "./specification/index.js";
export * from "./types/index.js";
export {
  loadPipelineConfig,
  validatePipelineConfig,
  pipelineConfigFromEnv,
  summarizePolicy,
  PipelineConfigError,
  DEFAULT_PIPELINE_CONFIG,
  type PipelineConfig,
} from "./config/index.js";
export { createLogger, createSilentLogger, type Logger } from "./logging/index.js";
export { canonicalJson, canonicalJsonBytes, CanonicalJsonError } from "./utils/canonical-json.js";

function main(): void {
  const runId = initRunId();

  try {
    validateConfig();
    const logger = createLogger({ level: parseLogLevel(config.logLevel), logDir: config.logDir });
    const policy = pipelineConfigFromEnv();

    logger.info("Configuration loaded", {
      runId,
      env: config.env,
      logLevel: config.logLevel,
      appName: config.appName,
    });
    console.log(summarizePolicy(policy));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(1);
    }
    if (err instanceof PipelineConfigError) {
      console.error(err.format());
      process.exit(1);
    }
    throw err;
  }
}

if (isEntryPoint(import.meta.url)) {
  main();
}
