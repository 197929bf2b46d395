import { Router } from 'express';
import type { ApiResponse } from '@shared/types';

const router = Router();

router.get('/health', (req, res) => {
  const response: ApiResponse = {
    success: true,
    data: {
      status: 'ok',
      packId: req.app.locals.carePack.meta.packId,
      uptimeSeconds: Math.round(process.uptime()),
    },
  };
  res.json(response);
});

export default router;
