import { Router } from 'express';
import { z } from 'zod';
import { unlockedProducts } from '@core/journey';
import { PRODUCTS } from '@shared/constants';
import type { ApiResponse, Product } from '@shared/types';
import { formatIssues } from '../middleware/index';

export const journeyRequestSchema = z.object({
  progress: z.record(z.enum(PRODUCTS), z.number().min(0).max(100)).default({}),
  flags: z.array(z.string()).default([]),
});

const router = Router();

router.post('/journey/unlocks', (req, res) => {
  const parsed = journeyRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: formatIssues(parsed.error.issues) });
  }

  const response: ApiResponse<{ unlocked: Product[] }> = {
    success: true,
    data: { unlocked: unlockedProducts(parsed.data, req.app.locals.carePack.journey) },
  };
  res.json(response);
});

export default router;
