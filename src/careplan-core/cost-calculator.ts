// src/careplan-core/cost-calculator.ts
// Monthly cost for one person, facility or in-home. The facility path has no
// hours input at all; hours only exist on the in-home variant.

import { randomUUID } from 'crypto';
import { FACILITY_TIERS } from '@shared/constants';
import type { CareType, CostSegment, FacilityTier, HoursBand, Scenario, Tier } from '@shared/types';
import type { CarePack, RateTable } from './care-pack';
import { applyCostModifiers, type CostAdjustment } from './cost-modifiers';
import {
  BP_SCALE,
  divideHalfUp,
  dollarsToCents,
  scaleByBasisPoints,
  sumCents,
  toBasisPoints,
  type Cents,
} from './money';
import {
  normalizeState,
  normalizeZip5,
  resolveRegionalMultiplier,
  type RegionalMultiplier,
} from './regional';
import { TtlCache } from './ttl-cache';

// --- Types ---

export type ScenarioParams =
  | {
      scenario: 'facility';
      /** Defaults to the care plan's tier, or assisted living for non-facility tiers. */
      careType?: FacilityTier;
      keepHome: boolean;
      /** Monthly dollars replacing the home carry base; still regionally scaled. */
      homeCarryOverride?: number | null;
    }
  | {
      scenario: 'in_home';
      hoursPerDay: number;
      homeCarryOverride?: number | null;
    };

export type CostBreakdown = Readonly<Record<CostSegment, Cents>>;

/** The cacheable part of a cost plan; independent of who asked. */
export interface CostComputation {
  scenario: Scenario;
  careType: CareType;
  region: RegionalMultiplier;
  adjustments: readonly CostAdjustment[];
  breakdown: CostBreakdown;
  /** Care cost without home carry. */
  careMonthly: Cents;
  homeCarry: Cents;
  totalMonthly: Cents;
  annualTotal: Cents;
  threeYearTotal: Cents;
}

export interface CostPlan extends CostComputation {
  id: string;
  personId: string;
  carePlanId: string;
}

/** The parts of a care plan cost estimation reads. */
export interface CostSubject {
  id: string;
  personId: string;
  finalTier: Tier;
  flags: readonly { id: string }[];
}

export interface CostPlanOptions {
  pack: CarePack;
  state?: string | null;
  cache?: TtlCache<CostComputation>;
}

export const DEFAULT_COST_CACHE_TTL_MS = 30 * 60 * 1000;

function isFacilityTier(tier: Tier): tier is FacilityTier {
  return FACILITY_TIERS.some((facility) => facility === tier);
}

export function facilityCareType(tier: Tier): FacilityTier {
  return isFacilityTier(tier) ? tier : 'assisted_living';
}

const HOURS_BY_BAND: Readonly<Record<HoursBand, number>> = {
  '<1h': 1,
  '1-3h': 3,
  '4-8h': 8,
  '24h': 24,
};

/** Upper bound of an intake hours band, used when no explicit hours are given. */
export function hoursForBand(band: HoursBand): number {
  return HOURS_BY_BAND[band];
}

// --- Base amounts ---

function facilityBase(careType: FacilityTier, rates: RateTable): Cents {
  return dollarsToCents(rates.facilityBaseRates[careType]);
}

function inHomeBase(hoursPerDay: number, rates: RateTable): Cents {
  // hourly cents × hours × days, with days carried in hundredths (30.4 → 3040).
  const hourly = BigInt(dollarsToCents(rates.inHomeHourlyRate));
  const hours = BigInt(Math.round(hoursPerDay * 100));
  const days = BigInt(Math.round(rates.daysPerMonth * 100));
  return Number(divideHalfUp(hourly * hours * days, 10_000n));
}

/**
 * Home carry scaled by a dampened regional multiplier: 1 + (m − 1) × d.
 * `baseDollars` defaults to the rate table's home carry base.
 */
export function regionalHomeCarry(
  region: RegionalMultiplier,
  rates: RateTable,
  baseDollars: number = rates.homeCarry.base,
): Cents {
  const multiplierBp = toBasisPoints(region.multiplier);
  const dampenedBp =
    BP_SCALE + Math.round((multiplierBp - BP_SCALE) * rates.homeCarry.regionalDampening);
  return scaleByBasisPoints(dollarsToCents(baseDollars), dampenedBp);
}

function homeCarryFor(
  included: boolean,
  override: number | null | undefined,
  region: RegionalMultiplier,
  rates: RateTable,
): Cents {
  if (!included) return 0;
  return regionalHomeCarry(region, rates, override ?? undefined);
}

// --- Computation ---

function compute(
  params: ScenarioParams,
  careType: CareType,
  flagIds: readonly string[],
  region: RegionalMultiplier,
  rates: RateTable,
): CostComputation {
  const base =
    params.scenario === 'facility'
      ? facilityBase(params.careType ?? 'assisted_living', rates)
      : inHomeBase(params.hoursPerDay, rates);

  const regionalized = scaleByBasisPoints(base, toBasisPoints(region.multiplier));
  const modifiers = applyCostModifiers(regionalized, flagIds, careType, rates);

  const homeCarry =
    params.scenario === 'facility'
      ? homeCarryFor(params.keepHome, params.homeCarryOverride, region, rates)
      : homeCarryFor(true, params.homeCarryOverride, region, rates);

  const breakdown: CostBreakdown = Object.freeze({
    base,
    regional_adjustment: regionalized - base,
    care_modifiers: modifiers.finalAmount - regionalized,
    home_carry: homeCarry,
  });
  const totalMonthly = sumCents(Object.values(breakdown));

  return Object.freeze({
    scenario: params.scenario,
    careType,
    region,
    adjustments: Object.freeze(modifiers.adjustments),
    breakdown,
    careMonthly: modifiers.finalAmount,
    homeCarry,
    totalMonthly,
    annualTotal: totalMonthly * 12,
    threeYearTotal: totalMonthly * 36,
  });
}

export function costCacheKey(
  params: ScenarioParams,
  careType: CareType,
  flagIds: readonly string[],
  zip: string | null,
  state: string | null,
): string {
  return JSON.stringify([
    params.scenario,
    careType,
    [...new Set(flagIds)].sort(),
    zip,
    state,
    params.scenario === 'in_home' ? params.hoursPerDay : null,
    params.scenario === 'facility' ? params.keepHome : true,
    params.homeCarryOverride ?? null,
  ]);
}

export function computeCostPlan(
  carePlan: CostSubject,
  zip: string | null | undefined,
  params: ScenarioParams,
  options: CostPlanOptions,
): CostPlan {
  const rates = options.pack.rates;
  const zip5 = normalizeZip5(zip);
  const state = normalizeState(options.state);
  const flagIds = carePlan.flags.map((flag) => flag.id);

  const resolved: ScenarioParams =
    params.scenario === 'facility'
      ? { ...params, careType: params.careType ?? facilityCareType(carePlan.finalTier) }
      : params;
  const careType: CareType =
    resolved.scenario === 'facility' ? (resolved.careType ?? 'assisted_living') : 'in_home';

  const run = () =>
    compute(
      resolved,
      careType,
      flagIds,
      resolveRegionalMultiplier(options.pack.regional, zip5, state),
      rates,
    );
  const computation = options.cache
    ? options.cache.getOrCompute(costCacheKey(resolved, careType, flagIds, zip5, state), run)
    : run();

  return {
    ...computation,
    id: `cost_${randomUUID()}`,
    personId: carePlan.personId,
    carePlanId: carePlan.id,
  };
}

export function createCostCache(ttlMs: number = DEFAULT_COST_CACHE_TTL_MS): TtlCache<CostComputation> {
  return new TtlCache<CostComputation>(ttlMs);
}
