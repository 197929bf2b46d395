// careplan-core: Pure logic. Gates, scoring, adjudication, cost estimation.
// No HTTP, no persistence. The only I/O is reading a care pack from disk.

export const CAREPLAN_CORE_VERSION = '0.1.0';

export { computeCarePlan, DEFAULT_ADVISORY_TIMEOUT_MS, type CarePlan, type CarePlanOptions } from './care-plan';
export {
  computeCostPlan,
  createCostCache,
  DEFAULT_COST_CACHE_TTL_MS,
  type CostPlan,
  type CostComputation,
  type ScenarioParams,
} from './cost-calculator';
export {
  computeHouseholdTotal,
  type HouseholdMember,
  type HouseholdSettings,
  type HouseholdTotal,
} from './household';
export { loadCarePack, buildCarePack, type CarePack } from './care-pack';
export {
  consultAdvisory,
  noAdvisoryPort,
  staticAdvisoryPort,
  type AdjudicationContext,
  type AdvisoryPort,
} from './advisory';
export { isUnlocked, unlockedProducts, type JourneyState } from './journey';
export { CarePackError, IntakeContractError, InvariantViolationError, ScoringError } from './errors';
