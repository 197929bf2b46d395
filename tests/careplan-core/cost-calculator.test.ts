import { describe, it, expect, beforeAll } from 'vitest';
import path from 'path';
import { loadCarePack, type CarePack } from '@core/care-pack';
import {
  computeCostPlan,
  costCacheKey,
  createCostCache,
  hoursForBand,
  regionalHomeCarry,
  type CostComputation,
} from '@core/cost-calculator';
import { parseRegionalTable } from '@core/regional';
import { TtlCache } from '@core/ttl-cache';
import { exampleRates, exampleSubject } from './fixtures';

const PACK_DIR = path.resolve('care-packs/national-2025-v1');

let pack: CarePack;
let national: CarePack;

beforeAll(async () => {
  national = await loadCarePack(PACK_DIR);
  pack = {
    ...national,
    rates: exampleRates,
    regional: parseRegionalTable({
      zip_multipliers: { '60614': { multiplier: 1.15, name: 'Test Zip' } },
    }),
  };
});

describe('computeCostPlan: facility', () => {
  it('prices the worked cost example', () => {
    const plan = computeCostPlan(exampleSubject, '60614', { scenario: 'facility', keepHome: false }, { pack });
    expect(plan.careType).toBe('assisted_living');
    expect(plan.region).toEqual({ multiplier: 1.15, regionName: 'Test Zip', precision: 'zip' });
    expect(plan.breakdown).toEqual({
      base: 450000,
      regional_adjustment: 67500,
      care_modifiers: 74934,
      home_carry: 0,
    });
    expect(plan.careMonthly).toBe(592434);
    expect(plan.totalMonthly).toBe(592434);
    expect(plan.annualTotal).toBe(7109208);
    expect(plan.threeYearTotal).toBe(21327624);
    expect(plan.adjustments.map((a) => a.runningTotal)).toEqual([558900, 592434]);
  });

  it('links the cost plan to its person and care plan', () => {
    const plan = computeCostPlan(exampleSubject, '60614', { scenario: 'facility', keepHome: false }, { pack });
    expect(plan.personId).toBe('person-1');
    expect(plan.carePlanId).toBe('cp_test');
    expect(plan.scenario).toBe('facility');
    expect(plan.id).toMatch(/^cost_/);
  });

  it('adds a regionally dampened home carry when the home is kept', () => {
    const plan = computeCostPlan(exampleSubject, '60614', { scenario: 'facility', keepHome: true }, { pack });
    // 4500 × (1 + 0.15 × 0.5)
    expect(plan.homeCarry).toBe(483750);
    expect(plan.careMonthly).toBe(592434);
    expect(plan.totalMonthly).toBe(1076184);
  });

  it('scales a home carry override by the dampened regional multiplier', () => {
    const plan = computeCostPlan(
      exampleSubject,
      '60614',
      { scenario: 'facility', keepHome: true, homeCarryOverride: 1800 },
      { pack },
    );
    // 1800 × (1 + 0.15 × 0.5)
    expect(plan.breakdown.home_carry).toBe(193500);
    expect(plan.totalMonthly).toBe(785934);
  });

  it('leaves an override unscaled at the national default', () => {
    const plan = computeCostPlan(
      exampleSubject,
      '99999',
      { scenario: 'facility', keepHome: true, homeCarryOverride: 1800 },
      { pack },
    );
    expect(plan.homeCarry).toBe(180000);
  });

  it('ignores the override when the home is not kept', () => {
    const plan = computeCostPlan(
      exampleSubject,
      '60614',
      { scenario: 'facility', keepHome: false, homeCarryOverride: 1800 },
      { pack },
    );
    expect(plan.homeCarry).toBe(0);
  });

  it('prices the care plan tier, or an explicit care type', () => {
    const memoryCare = { ...exampleSubject, finalTier: 'memory_care' as const, flags: [] };
    expect(
      computeCostPlan(memoryCare, null, { scenario: 'facility', keepHome: false }, { pack }).breakdown.base,
    ).toBe(650000);
    expect(
      computeCostPlan(
        memoryCare,
        null,
        { scenario: 'facility', keepHome: false, careType: 'memory_care_high_acuity' },
        { pack },
      ).careMonthly,
    ).toBe(1125000);
  });

  it('prices non-facility tiers as assisted living', () => {
    const inHome = { ...exampleSubject, finalTier: 'in_home' as const, flags: [] };
    const plan = computeCostPlan(inHome, null, { scenario: 'facility', keepHome: false }, { pack });
    expect(plan.careType).toBe('assisted_living');
    expect(plan.totalMonthly).toBe(450000);
  });

  it('uses the national default for an unknown zip', () => {
    const plan = computeCostPlan(exampleSubject, '99999', { scenario: 'facility', keepHome: false }, { pack });
    expect(plan.region.precision).toBe('national');
    expect(plan.breakdown.regional_adjustment).toBe(0);
  });
});

describe('computeCostPlan: in-home', () => {
  it('prices hourly care with home carry always included', () => {
    const plan = computeCostPlan(
      { ...exampleSubject, finalTier: 'in_home' },
      '60614',
      { scenario: 'in_home', hoursPerDay: 8 },
      { pack },
    );
    expect(plan.careType).toBe('in_home');
    // 30 × 8 × 30.4 = 7296
    expect(plan.breakdown).toEqual({
      base: 729600,
      regional_adjustment: 109440,
      care_modifiers: 83904,
      home_carry: 483750,
    });
    expect(plan.careMonthly).toBe(922944);
    expect(plan.totalMonthly).toBe(1406694);
  });

  it('scales an in-home override with the pack regional table', () => {
    const plan = computeCostPlan(
      { ...exampleSubject, finalTier: 'in_home' },
      '60614',
      { scenario: 'in_home', hoursPerDay: 8, homeCarryOverride: 2000 },
      { pack: { ...pack, regional: national.regional } },
    );
    expect(plan.region.multiplier).toBe(1.35);
    // 2000 × (1 + 0.35 × 0.5)
    expect(plan.homeCarry).toBe(235000);
  });

  it('maps intake hour bands to hours', () => {
    expect(hoursForBand('<1h')).toBe(1);
    expect(hoursForBand('4-8h')).toBe(8);
    expect(hoursForBand('24h')).toBe(24);
  });
});

describe('cost cache', () => {
  it('shares a computation between identical queries', () => {
    const cache = createCostCache();
    const params = { scenario: 'facility', keepHome: false } as const;
    const first = computeCostPlan(exampleSubject, '60614', params, { pack, cache });
    const second = computeCostPlan({ ...exampleSubject, id: 'cp_other', personId: 'person-2' }, '60614', params, {
      pack,
      cache,
    });
    expect(second.breakdown).toBe(first.breakdown);
    expect(second.carePlanId).toBe('cp_other');
    expect(second.personId).toBe('person-2');
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1 });
  });

  it('keys on active flags', () => {
    const cache = createCostCache();
    const params = { scenario: 'facility', keepHome: false } as const;
    computeCostPlan(exampleSubject, '60614', params, { pack, cache });
    const plain = computeCostPlan({ ...exampleSubject, flags: [] }, '60614', params, { pack, cache });
    expect(plain.careMonthly).toBe(517500);
    expect(cache.stats().entries).toBe(2);
  });

  it('recomputes after the entry expires', () => {
    let now = 0;
    const cache = new TtlCache<CostComputation>(30 * 60 * 1000, () => now);
    const params = { scenario: 'in_home', hoursPerDay: 4 } as const;
    computeCostPlan(exampleSubject, '60614', params, { pack, cache });
    now = 30 * 60 * 1000 + 1;
    computeCostPlan(exampleSubject, '60614', params, { pack, cache });
    expect(cache.stats()).toEqual({ entries: 1, hits: 0, misses: 2 });
  });

  it('builds keys that ignore flag order', () => {
    const params = { scenario: 'facility', keepHome: true } as const;
    expect(costCacheKey(params, 'assisted_living', ['b', 'a'], '60614', null)).toBe(
      costCacheKey(params, 'assisted_living', ['a', 'b', 'a'], '60614', null),
    );
  });
});

describe('regionalHomeCarry', () => {
  it('scales the base by half the regional premium', () => {
    expect(
      regionalHomeCarry({ multiplier: 0.8, regionName: 'x', precision: 'state' }, exampleRates),
    ).toBe(405000);
  });

  it('scales an explicit base the same way', () => {
    expect(
      regionalHomeCarry({ multiplier: 1.35, regionName: 'x', precision: 'zip' }, exampleRates, 2000),
    ).toBe(235000);
  });
});
