// src/careplan-core/scorer.ts
// Deterministic weighted-sum scoring over the question catalog. Independent
// of any advisory input.

import { DOMAINS, TIERS } from '@shared/constants';
import type { Domain, Product, Tier } from '@shared/types';
import type { ScoringCatalog } from './care-pack';
import { ScoringError } from './errors';
import { cognitionBand, tierRank } from './gates';
import { answerFor, hasRiskyBehavior, type Answers } from './intake';

export type DomainScores = Readonly<Record<Domain, number>>;

export interface TierRanking {
  tier: Tier;
  score: number;
}

export interface ScoreResult {
  tier: Tier;
  total: number;
  domainScores: DomainScores;
  summaryPoints: string[];
  tierRankings: TierRanking[];
  confidence: number;
  suggestedNextProduct: Product;
  /** Flag ids attached to the selected options. */
  optionFlags: string[];
}

interface Contribution {
  text: string;
  score: number;
  order: number;
}

interface ThresholdBand {
  tier: Tier;
  min: number;
  /** Exclusive upper bound; null for the open-ended top band. */
  next: number | null;
}

const CONFIDENCE_FLOOR = 0.5;
const CONFIDENCE_NEXT_STEP = 0.7;
const BOUNDARY_DISTANCE_SCALE = 3;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function selectedValues(answer: unknown): string[] {
  if (Array.isArray(answer)) {
    return answer.filter((v): v is string => typeof v === 'string');
  }
  return typeof answer === 'string' ? [answer] : [];
}

function isAnswered(answer: unknown): boolean {
  if (answer === undefined || answer === null) return false;
  if (Array.isArray(answer)) return answer.length > 0;
  return true;
}

/** Threshold bands sorted by minimum total, ties broken by tier order. */
export function thresholdBands(catalog: ScoringCatalog): ThresholdBand[] {
  const entries: { tier: Tier; min: number }[] = [];
  for (const tier of TIERS) {
    const min = catalog.tierThresholds[tier];
    if (min !== undefined) entries.push({ tier, min });
  }
  if (entries.length === 0) {
    throw new ScoringError('Scoring catalog defines no tier thresholds');
  }
  entries.sort((a, b) => a.min - b.min || tierRank(a.tier) - tierRank(b.tier));
  return entries.map((entry, i) => ({
    ...entry,
    next: i + 1 < entries.length ? entries[i + 1].min : null,
  }));
}

export function tierForTotal(total: number, bands: readonly ThresholdBand[]): Tier {
  let tier = bands[0].tier;
  for (const band of bands) {
    if (total >= band.min) tier = band.tier;
  }
  return tier;
}

function rankTiers(
  winner: Tier,
  total: number,
  bands: readonly ThresholdBand[],
  ceiling: number | undefined,
): TierRanking[] {
  return bands
    .map((band) => {
      if (band.tier === winner) return { tier: band.tier, score: round2(total) };
      // Without a ceiling the top band has no range and ranks at its minimum.
      const upper = band.next === null ? Math.max(band.min, ceiling ?? band.min) : band.next - 1;
      return { tier: band.tier, score: round2((band.min + upper) / 2) };
    })
    .sort((a, b) => b.score - a.score || tierRank(b.tier) - tierRank(a.tier));
}

function recommendationConfidence(
  answers: Answers,
  catalog: ScoringCatalog,
  total: number,
  bands: readonly ThresholdBand[],
): number {
  const required = catalog.questions.filter((q) => q.required);
  const answered = required.filter((q) => isAnswered(answerFor(answers, q.id))).length;
  const completeness = required.length === 0 ? 1 : answered / required.length;

  const boundaries = bands.slice(1).map((band) => band.min);
  const distance =
    boundaries.length === 0
      ? BOUNDARY_DISTANCE_SCALE
      : Math.min(...boundaries.map((b) => Math.abs(total - b)));
  const margin = Math.min(distance / BOUNDARY_DISTANCE_SCALE, 1);

  return round2(Math.max(CONFIDENCE_FLOOR, 0.6 * completeness + 0.4 * margin));
}

export function scoreAnswers(answers: Answers, catalog: ScoringCatalog): ScoreResult {
  const bands = thresholdBands(catalog);

  const raw: Record<Domain, number> = {
    mobility: 0,
    cognition: 0,
    adl: 0,
    medical: 0,
    isolation: 0,
    safety: 0,
  };
  const contributions: Contribution[] = [];
  const optionFlags = new Set<string>();

  catalog.questions.forEach((question, questionIndex) => {
    const weight = catalog.domainWeights[question.domain] ?? 1;
    for (const value of selectedValues(answerFor(answers, question.id))) {
      const option = question.options.find((o) => o.value === value);
      if (!option) continue;
      raw[question.domain] += option.score;
      option.flags.forEach((id) => optionFlags.add(id));
      contributions.push({
        text: `${question.label}: ${option.label}`,
        score: option.score * weight,
        order: questionIndex,
      });
    }
  });

  const domainScores: Record<Domain, number> = { ...raw };
  for (const domain of DOMAINS) {
    domainScores[domain] = round2(raw[domain] * (catalog.domainWeights[domain] ?? 1));
  }
  const total = round2(DOMAINS.reduce((sum, domain) => sum + domainScores[domain], 0));

  let tier = tierForTotal(total, bands);
  // Confirmed severe cognition with risky behavior lifts to memory care at least.
  if (
    cognitionBand(answers) === 'severe' &&
    hasRiskyBehavior(answers) &&
    tierRank(tier) < tierRank('memory_care')
  ) {
    tier = 'memory_care';
  }

  const summaryPoints = contributions
    .filter((c) => c.score > 0)
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .slice(0, catalog.summaryPointLimit)
    .map((c) => c.text);

  const confidence = recommendationConfidence(answers, catalog, total, bands);

  return {
    tier,
    total,
    domainScores: Object.freeze(domainScores),
    summaryPoints,
    tierRankings: rankTiers(tier, total, bands, catalog.scoreCeiling),
    confidence,
    suggestedNextProduct: confidence < CONFIDENCE_NEXT_STEP ? 'care_recommendation' : 'cost_planner',
    optionFlags: [...optionFlags],
  };
}
