import { randomUUID } from 'crypto';
import { TIER_LABELS } from '@shared/constants';
import type { Bands, HoursBand, Product, Tier } from '@shared/types';
import { consultAdvisory, type AdvisoryPort } from './advisory';
import { adjudicate, type AdjudicationDecision } from './adjudicator';
import type { CarePack } from './care-pack';
import { ScoringError } from './errors';
import { deriveFlagIds, resolveFlags, type Flag } from './flags';
import { clampToAllowed, evaluateGates, type AllowedTierSet } from './gates';
import { parseAnswers } from './intake';
import { scoreAnswers, type DomainScores, type ScoreResult, type TierRanking } from './scorer';

// --- Types ---

export interface CarePlan {
  id: string;
  personId: string;
  packId: string;
  finalTier: Tier;
  confidence: number;
  allowedTiers: AllowedTierSet;
  bands: Bands;
  flags: Flag[];
  rationale: string[];
  adjudication: AdjudicationDecision;
  hoursBand: HoursBand;
  domainScores: DomainScores;
  tierRankings: TierRanking[];
  suggestedNextProduct: Product;
  /** Placeholder produced on the double-missing path; needs manual review. */
  degraded: boolean;
  createdAt: string;
}

export interface CarePlanOptions {
  personId: string;
  pack: CarePack;
  advisoryTimeoutMs?: number;
  mcBehaviorGate?: boolean;
}

export const DEFAULT_ADVISORY_TIMEOUT_MS = 4000;
const RATIONALE_LIMIT = 6;

const EMPTY_DOMAIN_SCORES: DomainScores = Object.freeze({
  mobility: 0,
  cognition: 0,
  adl: 0,
  medical: 0,
  isolation: 0,
  safety: 0,
});

// --- Rationale ---

function advisoryNote(decision: AdjudicationDecision): string | null {
  if (decision.source !== 'advisory') return null;
  const { deterministicTier, finalTier } = decision;
  if (deterministicTier !== null && deterministicTier !== finalTier) {
    return `Advisory review adjusted the recommendation from ${TIER_LABELS[deterministicTier]} to ${TIER_LABELS[finalTier]}.`;
  }
  return 'Advisory review confirmed the recommendation.';
}

function buildRationale(decision: AdjudicationDecision, score: ScoreResult | null): string[] {
  const label = TIER_LABELS[decision.finalTier];

  if (decision.reason === 'DOUBLE_MISSING_DEFAULT') {
    return [`We could not complete scoring; ${label} is a placeholder pending manual review.`];
  }

  const lines = score
    ? [`Based on ${Math.round(score.total)} points, we recommend: ${label}`, ...score.summaryPoints]
    : [`We recommend: ${label}`];

  const note = advisoryNote(decision);
  if (note === null) return lines.slice(0, RATIONALE_LIMIT);
  // The advisory note survives the cap.
  return [...lines.slice(0, RATIONALE_LIMIT - 1), note];
}

// --- Workflow ---

/**
 * Full assessment for one person. Always yields a plan unless the answers
 * violate the intake contract; advisory failures fall back silently.
 */
export async function computeCarePlan(
  rawAnswers: unknown,
  advisoryPort: AdvisoryPort,
  options: CarePlanOptions,
): Promise<CarePlan> {
  const answers = parseAnswers(rawAnswers);
  const gates = evaluateGates(answers, { mcBehaviorGate: options.mcBehaviorGate });

  let score: ScoreResult | null = null;
  try {
    score = scoreAnswers(answers, options.pack.scoring);
  } catch (err) {
    if (!(err instanceof ScoringError)) throw err;
    console.error(`[ADJUDICATION] Scoring failed for ${options.personId}: ${err.message}`);
  }

  const deterministicTier = score ? clampToAllowed(score.tier, gates.allowed) : null;
  const domainScores = score?.domainScores ?? EMPTY_DOMAIN_SCORES;

  const advisory = await consultAdvisory(
    advisoryPort,
    { bands: gates.bands, allowedTiers: gates.allowed, domainScores },
    options.advisoryTimeoutMs ?? DEFAULT_ADVISORY_TIMEOUT_MS,
  );

  const decision = adjudicate({
    deterministicTier,
    advisory,
    allowed: gates.allowed,
    riskyBehaviors: gates.riskyBehaviors,
  });

  const flagIds = deriveFlagIds(answers, gates.bands, gates.riskyBehaviors, score?.optionFlags ?? []);
  const degraded = decision.reason === 'DOUBLE_MISSING_DEFAULT';

  return {
    id: `cp_${randomUUID()}`,
    personId: options.personId,
    packId: options.pack.meta.packId,
    finalTier: decision.finalTier,
    confidence: score?.confidence ?? 0,
    allowedTiers: gates.allowed,
    bands: gates.bands,
    flags: resolveFlags(flagIds, options.pack.flags),
    rationale: buildRationale(decision, score),
    adjudication: decision,
    hoursBand: answers.hours_per_day,
    domainScores,
    tierRankings: score?.tierRankings ?? [],
    suggestedNextProduct:
      degraded || !score ? 'care_recommendation' : score.suggestedNextProduct,
    degraded,
    createdAt: new Date().toISOString(),
  };
}
