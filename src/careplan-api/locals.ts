import type { AdvisoryPort } from '@core/advisory';
import type { CarePack } from '@core/care-pack';
import type { CostComputation } from '@core/cost-calculator';
import type { TtlCache } from '@core/ttl-cache';

// Services the server attaches to app.locals at start-up.
declare global {
  namespace Express {
    interface Locals {
      carePack: CarePack;
      advisoryPort: AdvisoryPort;
      costCache: TtlCache<CostComputation>;
    }
  }
}

export {};
