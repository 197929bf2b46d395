// src/careplan-core/adjudicator.ts
// Advisory-first, deterministic-fallback tier adjudication.
//
// Validity (membership in the allowed set) is the only gate on the advisory
// tier. Confidence is recorded and never consulted.

import { SAFE_DEFAULT_TIER } from '@shared/constants';
import type { AdjudicationSource, ReasonCode, Tier } from '@shared/types';
import type { AdvisoryOutcome } from './advisory';
import { InvariantViolationError } from './errors';
import type { AllowedTierSet } from './gates';

export interface AdjudicationInput {
  deterministicTier: Tier | null;
  advisory: AdvisoryOutcome;
  allowed: AllowedTierSet;
  riskyBehaviors: boolean;
}

export interface AdjudicationDecision {
  readonly deterministicTier: Tier | null;
  /** Normalized advisory label; may be outside the tier enum when rejected. */
  readonly advisoryTier: string | null;
  readonly advisoryConfidence: number | null;
  readonly allowed: AllowedTierSet;
  readonly finalTier: Tier;
  readonly source: AdjudicationSource;
  readonly reason: ReasonCode;
  readonly riskyBehaviors: boolean;
  /** The tier not chosen when the two sources disagree. */
  readonly alternativeTier: string | null;
}

type Resolution = Pick<AdjudicationDecision, 'finalTier' | 'source' | 'reason' | 'alternativeTier'>;

function allowedTier(label: string, allowed: AllowedTierSet): Tier | null {
  return allowed.find((tier) => tier === label) ?? null;
}

function doubleMissing(rejected: string | null): Resolution {
  return {
    finalTier: SAFE_DEFAULT_TIER,
    source: 'deterministic',
    reason: 'DOUBLE_MISSING_DEFAULT',
    alternativeTier: rejected,
  };
}

function resolve(input: AdjudicationInput, advisoryTier: string | null): Resolution {
  const { deterministicTier, allowed } = input;

  if (advisoryTier === null) {
    if (deterministicTier === null) return doubleMissing(null);
    return {
      finalTier: deterministicTier,
      source: 'deterministic',
      reason: 'ADVISORY_UNAVAILABLE',
      alternativeTier: null,
    };
  }

  const valid = allowedTier(advisoryTier, allowed);
  if (valid === null) {
    console.warn(
      `[ADJUDICATION] Rejected advisory tier "${advisoryTier}": not in allowed set [${allowed.join(', ')}]`,
    );
    if (deterministicTier === null) return doubleMissing(advisoryTier);
    return {
      finalTier: deterministicTier,
      source: 'deterministic',
      reason: 'ADVISORY_TIER_NOT_ALLOWED',
      alternativeTier: advisoryTier,
    };
  }

  return {
    finalTier: valid,
    source: 'advisory',
    reason: 'ADVISORY_VALID',
    alternativeTier: deterministicTier !== null && deterministicTier !== valid ? deterministicTier : null,
  };
}

export function adjudicate(input: AdjudicationInput): AdjudicationDecision {
  const available = input.advisory.status === 'available' ? input.advisory : null;
  const resolution = resolve(input, available?.tier ?? null);

  if (!input.allowed.includes(resolution.finalTier)) {
    throw new InvariantViolationError(
      `Final tier ${resolution.finalTier} is not in allowed set [${input.allowed.join(', ')}]`,
    );
  }

  console.warn(
    `[ADJUDICATION] final=${resolution.finalTier} source=${resolution.source} reason=${resolution.reason}`,
  );

  return Object.freeze({
    deterministicTier: input.deterministicTier,
    advisoryTier: available?.tier ?? null,
    advisoryConfidence: available?.confidence ?? null,
    allowed: input.allowed,
    riskyBehaviors: input.riskyBehaviors,
    ...resolution,
  });
}
