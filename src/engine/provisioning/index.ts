export type {
  Period,
  DemandSchedule,
  PricingTier,
  PricingCatalog,
  TierCount,
  PeriodAllocation,
  ProvisioningPlan,
} from './types.js';

export type {
  VariableDomain,
  ModelVariable,
  LinearTerm,
  LinearExpression,
  ConstraintOrigin,
  ModelConstraint,
  Objective,
  Model,
  ModelStats,
} from './model.js';

export type { VariableKey, VariableId, IndexedVariable } from './variable-index.js';
export type { PlanViolation, PlanCost, TierCost } from './plan-checks.js';

export { ModelDraft, modelStats } from './model.js';
export {
  VariableIndex,
  onDemandKey,
  reservedKey,
  reservationKey,
  describeVariableKey,
} from './variable-index.js';
export { findInputIssues, validatePlanningInputs } from './validate-inputs.js';
export { amortizedFixedCost } from './pricing.js';
export { buildProvisioningModel, indexFor } from './model-builder.js';
export { decodeProvisioningPlan } from './plan-decoder.js';
export { findPlanViolations, costPlan } from './plan-checks.js';
