// src/careplan-core/gates.ts
// Bands and the allowed-tier set. Gates decide what is structurally
// permissible before any score or advisory opinion is considered.

import { MEMORY_CARE_TIERS, SAFE_DEFAULT_TIER, TIERS } from '@shared/constants';
import type { Bands, CognitionBand, SupportBand, Tier } from '@shared/types';
import { InvariantViolationError } from './errors';
import { hasRiskyBehavior, type Answers } from './intake';

export type AllowedTierSet = readonly Tier[];

export interface GateResult {
  bands: Bands;
  allowed: AllowedTierSet;
  riskyBehaviors: boolean;
}

export interface GateOptions {
  /** Remove memory care for moderate cognition with high support needs and no risky behaviors. */
  mcBehaviorGate?: boolean;
}

/** Tiers a clamped score may fall back to, in order. */
const CLAMP_ORDER: readonly Tier[] = ['assisted_living', 'in_home', 'no_care_needed'];

export function isTier(value: string): value is Tier {
  return TIERS.some((tier) => tier === value);
}

export function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

function isMemoryCareTier(tier: Tier): boolean {
  return MEMORY_CARE_TIERS.some((mc) => mc === tier);
}

// ── Bands ────────────────────────────────────────────────────────────────────

export function cognitionBand(answers: Answers): CognitionBand {
  switch (answers.memory_changes) {
    case 'none':
      return 'none';
    case 'mild':
      return 'mild';
    case 'moderate':
      return 'moderate';
    case 'severe':
      // Without a confirmed diagnosis severe changes gate as moderate.
      return answers.cognitive_dx_confirm === 'dx_yes' ? 'severe' : 'moderate';
  }
}

export function supportBand(answers: Answers): SupportBand {
  const badls = answers.badls.length;
  const iadls = answers.iadls.length;

  if (answers.hours_per_day === '24h' || badls >= 3 || badls + iadls >= 6) {
    return 'high';
  }
  if (answers.hours_per_day === '4-8h' || badls >= 1 || iadls >= 2) {
    return 'medium';
  }
  return 'low';
}

// ── Allowed set ──────────────────────────────────────────────────────────────

export function evaluateGates(answers: Answers, options: GateOptions = {}): GateResult {
  const bands: Bands = { cognition: cognitionBand(answers), support: supportBand(answers) };
  const riskyBehaviors = hasRiskyBehavior(answers);
  const cognitiveRisk = bands.cognition === 'moderate' || bands.cognition === 'severe';

  let memoryCareAllowed = cognitiveRisk || riskyBehaviors;

  if (
    options.mcBehaviorGate &&
    bands.cognition === 'moderate' &&
    bands.support === 'high' &&
    !riskyBehaviors
  ) {
    memoryCareAllowed = false;
  }

  // Behavioral risk is a safety override, not a scored preference.
  if (riskyBehaviors && cognitiveRisk) {
    memoryCareAllowed = true;
  }

  const allowed = Object.freeze(
    TIERS.filter((tier) => memoryCareAllowed || !isMemoryCareTier(tier)),
  );

  if (allowed.length === 0 || !allowed.includes(SAFE_DEFAULT_TIER)) {
    throw new InvariantViolationError(
      `Allowed tier set must contain ${SAFE_DEFAULT_TIER}: [${allowed.join(', ')}]`,
    );
  }

  return { bands, allowed, riskyBehaviors };
}

export function clampToAllowed(tier: Tier, allowed: AllowedTierSet): Tier {
  if (allowed.includes(tier)) return tier;
  const fallback = CLAMP_ORDER.find((candidate) => allowed.includes(candidate));
  if (!fallback) {
    throw new InvariantViolationError(`No fallback tier available in [${allowed.join(', ')}]`);
  }
  return fallback;
}
