import { Router } from 'express';
import { z } from 'zod';
import { computeCarePlan, type CarePlan } from '@core/care-plan';
import type { ApiResponse } from '@shared/types';
import { config } from '../config';
import { asyncHandler, formatIssues } from '../middleware/index';

// Answers are validated by the engine itself; a contract violation surfaces
// as IntakeContractError and the error middleware answers 400.
export const carePlanRequestSchema = z.object({
  personId: z.string().trim().min(1),
  answers: z.unknown(),
});

const router = Router();

router.post(
  '/care-plans',
  asyncHandler(async (req, res) => {
    const parsed = carePlanRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: formatIssues(parsed.error.issues) });
      return;
    }

    const { carePack, advisoryPort } = req.app.locals;
    const plan = await computeCarePlan(parsed.data.answers, advisoryPort, {
      personId: parsed.data.personId,
      pack: carePack,
      advisoryTimeoutMs: config.advisory.timeoutMs,
      mcBehaviorGate: config.gates.mcBehaviorGate,
    });

    const response: ApiResponse<CarePlan> = { success: true, data: plan };
    res.status(201).json(response);
  }),
);

export default router;
