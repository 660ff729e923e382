/**
 * Decision engine and job orchestration.
 */

export { decide, evaluateChecks, errorDecision, type Decision, type DecisionPolicyConfig } from "./engine.js";
export {
  evaluateJob,
  runJob,
  jobDescriptor,
  submittedSpecificationBytes,
  type JobInput,
  type JobOptions,
  type JobEvaluation,
  type JobRun,
} from "./pipeline.js";
export { ReasonCode, Outcome } from "./reasons.js";
