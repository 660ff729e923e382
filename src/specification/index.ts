/**
 * Process specification module.
 *
 * A specification is the machine-readable statement of what a sensor log
 * must demonstrate. It is validated once, frozen, and then consumed by the
 * metric calculators and the decision engine.
 *
 * ```
 *  JSON / bytes / object
 *          │
 *          ▼
 *   ┌──────────────┐   ┌──────────────┐   ┌──────────────┐
 *   │ applyAliases │──▶│  zod schema  │──▶│ cross-field  │──▶ Specification
 *   │ (v1 layout)  │   │ (per industry│   │    rules     │    (frozen)
 *   └──────────────┘   │  + defaults) │   └──────────────┘
 *                      └──────────────┘
 * ```
 *
 * ```typescript
 * import { validateSpecification } from "./specification/index.js";
 *
 * const result = validateSpecification(specJson, "powder");
 * if (!result.ok) {
 *   console.error(result.error.format());
 * }
 * ```
 */

// Enumerations
export { Industry, HoldMode, SensorSelectionMode, Method } from "./enums.js";

// Schema and types
export {
  SpecificationSchema,
  SensorSelectionSchema,
  DataRequirementsSchema,
  LogicSchema,
  DecisionPolicySchema,
  PowderParametersSchema,
  AutoclaveParametersSchema,
  HaccpParametersSchema,
  ColdChainParametersSchema,
  ConcreteParametersSchema,
  SterileParametersSchema,
  SPECIFICATION_VERSION,
  JOB_ID_PATTERN,
  type Specification,
  type SpecificationFor,
  type SensorSelection,
  type DataRequirements,
  type Logic,
  type DecisionPolicy,
  type PowderParameters,
  type AutoclaveParameters,
  type HaccpParameters,
  type ColdChainParameters,
  type ConcreteParameters,
  type SterileParameters,
  type PowderSpecification,
  type AutoclaveSpecification,
  type HaccpSpecification,
  type ColdChainSpecification,
  type ConcreteSpecification,
  type SterileSpecification,
} from "./schema.js";

// Aliases
export {
  SPEC_ALIASES,
  applyAliases,
  resolveIndustryAlias,
  type SpecAlias,
  type AliasScope,
  type AliasOutcome,
} from "./aliases.js";

// Validation
export {
  validateSpecification,
  crossFieldIssues,
  isVersionCompatible,
  type SpecificationInput,
} from "./validator.js";

// Serialization
export {
  serializeSpecification,
  deserializeSpecification,
  summarizeSpecification,
} from "./serialization.js";
