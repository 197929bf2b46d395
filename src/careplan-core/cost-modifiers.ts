// src/careplan-core/cost-modifiers.ts
// Cumulative multiplicative cost adjustments. Each step compounds on the
// running total, not on the base: amountₙ = amountₙ₋₁ × (1 + pctₙ).

import { TIER_LABELS } from '@shared/constants';
import type { CareType } from '@shared/types';
import type { RateTable } from './care-pack';
import {
  compoundSteps,
  formatBasisPoints,
  formatCents,
  toBasisPoints,
  type BasisPoints,
  type Cents,
} from './money';

export const HIGH_ACUITY_ADJUSTMENT_ID = 'high_acuity_tier';

export interface CostAdjustment {
  flagId: string;
  /** Fraction of the running total, e.g. 0.08. */
  percentage: number;
  basisPoints: BasisPoints;
  /** Cent delta contributed by this step. */
  amount: Cents;
  /** Running total after this step. */
  runningTotal: Cents;
  label: string;
  rationale: string;
}

export interface ModifierResult {
  baseAmount: Cents;
  adjustments: CostAdjustment[];
  finalAmount: Cents;
}

interface PlannedStep {
  flagId: string;
  percentage: number;
  label: string;
  rationale: string;
}

function planSteps(
  flagIds: readonly string[],
  careType: CareType,
  rates: RateTable,
  order: readonly string[],
): PlannedStep[] {
  const active = new Set(flagIds);
  const table = rates.modifiers[careType];
  const steps: PlannedStep[] = [];

  for (const flagId of new Set(order)) {
    if (!active.has(flagId)) continue;
    const percentage = Object.hasOwn(table, flagId) ? table[flagId] : 0;
    if (percentage <= 0) continue;
    const text = rates.modifierLabels[flagId];
    steps.push({
      flagId,
      percentage,
      label: text?.label ?? flagId,
      rationale: text?.rationale ?? '',
    });
  }

  if (careType === 'memory_care_high_acuity') {
    steps.push({
      flagId: HIGH_ACUITY_ADJUSTMENT_ID,
      percentage: rates.highAcuity.percentage,
      label: rates.highAcuity.label,
      rationale: rates.highAcuity.rationale,
    });
  }

  return steps;
}

/**
 * Apply the care type's modifiers for the active flags, in `order` (the
 * rate table's fixed modifier order unless given). High-acuity memory care
 * always gets its surcharge last.
 */
export function applyCostModifiers(
  baseAmount: Cents,
  flagIds: readonly string[],
  careType: CareType,
  rates: RateTable,
  order: readonly string[] = rates.modifierOrder,
): ModifierResult {
  const steps = planSteps(flagIds, careType, rates, order);
  const increments = steps.map((step) => toBasisPoints(step.percentage));
  const totals = compoundSteps(baseAmount, increments);

  let previous = baseAmount;
  const adjustments = steps.map((step, i): CostAdjustment => {
    const runningTotal = totals[i];
    const adjustment: CostAdjustment = {
      flagId: step.flagId,
      percentage: step.percentage,
      basisPoints: increments[i],
      amount: runningTotal - previous,
      runningTotal,
      label: step.label,
      rationale: `${step.rationale} +${formatBasisPoints(increments[i])} of ${formatCents(previous)} for ${TIER_LABELS[careType]}.`.trim(),
    };
    previous = runningTotal;
    return adjustment;
  });

  return {
    baseAmount,
    adjustments,
    finalAmount: totals.length > 0 ? totals[totals.length - 1] : baseAmount,
  };
}
