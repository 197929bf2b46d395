import { Router } from 'express';
import { TIERS } from '@shared/constants';
import type { ApiResponse } from '@shared/types';

const router = Router();

router.get('/', (req, res) => {
  const { carePack } = req.app.locals;
  const response: ApiResponse = {
    success: true,
    data: {
      meta: carePack.meta,
      tiers: TIERS,
      questionIds: carePack.scoring.questions.map((q) => q.id),
      flagIds: Object.keys(carePack.flags).sort(),
    },
  };
  res.json(response);
});

export { router as carePackRouter };
