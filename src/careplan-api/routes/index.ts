import { Router } from 'express';
import healthRouter from './health';
import { carePackRouter } from './care-pack';
import carePlansRouter from './care-plans';
import costPlansRouter from './cost-plans';
import householdRouter from './household';
import journeyRouter from './journey';

const router = Router();
router.use(healthRouter);
router.use('/care-pack', carePackRouter);
router.use(carePlansRouter);
router.use(costPlansRouter);
router.use(householdRouter);
router.use(journeyRouter);

export default router;
