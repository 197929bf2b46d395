import { Router } from 'express';
import { z } from 'zod';
import { computeHouseholdTotal, type HouseholdTotal } from '@core/household';
import { SCENARIOS, TENURES } from '@shared/constants';
import type { ApiResponse } from '@shared/types';
import { formatIssues } from '../middleware/index';

const memberSchema = z
  .object({
    personId: z.string().min(1),
    scenario: z.enum(SCENARIOS),
    careMonthly: z.number().int().min(0),
  })
  .passthrough();

export const householdRequestSchema = z.object({
  primary: memberSchema,
  partner: memberSchema.nullable().default(null),
  settings: z.object({
    keepHome: z.boolean(),
    ownerTenant: z.enum(TENURES).default('unknown'),
    homeCarryOverride: z.number().min(0).nullable().optional(),
  }),
});

const router = Router();

router.post('/household', (req, res) => {
  const parsed = householdRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: formatIssues(parsed.error.issues) });
  }

  const { primary, partner, settings } = parsed.data;
  const total = computeHouseholdTotal(primary, partner, settings, req.app.locals.carePack.rates);

  const response: ApiResponse<HouseholdTotal> = { success: true, data: total };
  res.json(response);
});

export default router;
