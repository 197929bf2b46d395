import { Router } from 'express';
import { z } from 'zod';
import {
  computeCostPlan,
  hoursForBand,
  type CostPlan,
  type ScenarioParams,
} from '@core/cost-calculator';
import { FACILITY_TIERS, HOURS_BANDS, TIERS } from '@shared/constants';
import type { ApiResponse } from '@shared/types';
import { formatIssues } from '../middleware/index';

const homeCarryOverride = z.number().min(0).nullable().optional();

const scenarioSchema = z.discriminatedUnion('scenario', [
  z.object({
    scenario: z.literal('facility'),
    careType: z.enum(FACILITY_TIERS).optional(),
    keepHome: z.boolean().default(false),
    homeCarryOverride,
  }),
  z.object({
    scenario: z.literal('in_home'),
    hoursPerDay: z.number().positive().max(24).optional(),
    homeCarryOverride,
  }),
]);

// Only the care plan fields cost estimation reads; the rest passes through.
const carePlanRefSchema = z
  .object({
    id: z.string().min(1),
    personId: z.string().min(1),
    finalTier: z.enum(TIERS),
    hoursBand: z.enum(HOURS_BANDS),
    flags: z.array(z.object({ id: z.string() }).passthrough()),
    degraded: z.boolean(),
  })
  .passthrough();

export const costPlanRequestSchema = z.object({
  carePlan: carePlanRefSchema,
  zip: z.string().optional(),
  state: z.string().optional(),
  scenario: scenarioSchema,
  allowDegraded: z.boolean().default(false),
});

export type CostPlanRequest = z.infer<typeof costPlanRequestSchema>;

/** In-home hours default to the upper bound of the plan's intake hours band. */
export function toScenarioParams(request: CostPlanRequest): ScenarioParams {
  const { scenario, carePlan } = request;
  if (scenario.scenario === 'facility') return scenario;
  return {
    scenario: 'in_home',
    hoursPerDay: scenario.hoursPerDay ?? hoursForBand(carePlan.hoursBand),
    homeCarryOverride: scenario.homeCarryOverride,
  };
}

export const DEGRADED_PLAN_ERROR =
  'Care plan is a placeholder pending manual review; pass allowDegraded to estimate anyway';

/** Refusal message for a degraded care plan, or null when estimation may proceed. */
export function degradedPlanRefusal(request: Pick<CostPlanRequest, 'carePlan' | 'allowDegraded'>): string | null {
  return request.carePlan.degraded && !request.allowDegraded ? DEGRADED_PLAN_ERROR : null;
}

const router = Router();

router.post('/cost-plans', (req, res) => {
  const parsed = costPlanRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: formatIssues(parsed.error.issues) });
  }

  const refusal = degradedPlanRefusal(parsed.data);
  if (refusal !== null) {
    return res.status(409).json({ success: false, error: refusal });
  }

  const { carePlan, zip, state } = parsed.data;
  const { carePack, costCache } = req.app.locals;
  const plan = computeCostPlan(carePlan, zip, toScenarioParams(parsed.data), {
    pack: carePack,
    state,
    cache: costCache,
  });

  const response: ApiResponse<CostPlan> = { success: true, data: plan };
  res.status(201).json(response);
});

export default router;
