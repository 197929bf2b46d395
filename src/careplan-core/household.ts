// src/careplan-core/household.ts
// Household view over up to two cost plans. Home carry is counted once and
// depends on the shared settings only, never on the partner plan. The split is
// always even regardless of individual totals.

import type { Tenure } from '@shared/types';
import type { RateTable } from './care-pack';
import type { CostPlan } from './cost-calculator';
import { dollarsToCents, sumCents, type Cents } from './money';

export type HouseholdMember = Pick<CostPlan, 'personId' | 'scenario' | 'careMonthly'>;

export interface HouseholdSettings {
  /** Callers pricing in-home care set this, since the home stays in use. */
  keepHome: boolean;
  ownerTenant: Tenure;
  /** Monthly dollars, taken verbatim when present. */
  homeCarryOverride?: number | null;
}

export interface HouseholdTotal {
  primaryTotal: Cents;
  partnerTotal: Cents;
  homeCarry: Cents;
  householdTotal: Cents;
  /** Exactly half the household total each; an odd total gives half-cents. */
  split: { primary: number; partner: number };
}

export function householdHomeCarry(settings: HouseholdSettings, rates: RateTable): Cents {
  if (!settings.keepHome) return 0;
  if (settings.homeCarryOverride !== null && settings.homeCarryOverride !== undefined) {
    return dollarsToCents(settings.homeCarryOverride);
  }
  switch (settings.ownerTenant) {
    case 'owner':
      return dollarsToCents(rates.homeCarry.owner);
    case 'tenant':
      return dollarsToCents(rates.homeCarry.tenant);
    case 'unknown':
      return 0;
  }
}

/** A missing partner counts exactly like a partner plan costing zero. */
export function computeHouseholdTotal(
  primary: HouseholdMember,
  partner: HouseholdMember | null,
  settings: HouseholdSettings,
  rates: RateTable,
): HouseholdTotal {
  const primaryTotal = primary.careMonthly;
  const partnerTotal = partner?.careMonthly ?? 0;
  const homeCarry = householdHomeCarry(settings, rates);
  const householdTotal = sumCents([primaryTotal, partnerTotal, homeCarry]);
  const half = householdTotal / 2;

  return {
    primaryTotal,
    partnerTotal,
    homeCarry,
    householdTotal,
    split: { primary: half, partner: half },
  };
}
