import { describe, it, expect, beforeAll } from 'vitest';
import path from 'path';
import { loadCarePack, type CarePack, type ScoringCatalog } from '@core/care-pack';
import { ScoringError } from '@core/errors';
import { parseAnswers, type AnswersInput } from '@core/intake';
import { scoreAnswers, thresholdBands, tierForTotal } from '@core/scorer';

const PACK_DIR = path.resolve('care-packs/national-2025-v1');

function answers(overrides: Partial<AnswersInput> = {}) {
  return parseAnswers({ memory_changes: 'none', hours_per_day: '<1h', ...overrides });
}

let pack: CarePack;

beforeAll(async () => {
  pack = await loadCarePack(PACK_DIR);
});

describe('scoreAnswers with the national pack', () => {
  it('lifts confirmed severe cognition with wandering to memory care', () => {
    const result = scoreAnswers(
      answers({
        memory_changes: 'severe',
        cognitive_dx_confirm: 'dx_yes',
        behaviors: ['wandering'],
        hours_per_day: '24h',
      }),
      pack.scoring,
    );
    expect(result.total).toBe(18);
    expect(result.tier).toBe('memory_care');
    expect(result.domainScores).toEqual({
      mobility: 0,
      cognition: 12,
      adl: 6,
      medical: 0,
      isolation: 0,
      safety: 0,
    });
    expect(result.summaryPoints).toEqual([
      'Memory changes: Severe memory loss',
      'Daily help needed: Around the clock',
      'Behaviors: Wandering',
    ]);
  });

  it('does not override without a confirmed diagnosis', () => {
    const result = scoreAnswers(
      answers({ memory_changes: 'severe', behaviors: ['wandering'], hours_per_day: '24h' }),
      pack.scoring,
    );
    expect(result.tier).toBe('assisted_living');
  });

  it('ranks the winning tier by its total and the rest by range midpoint', () => {
    const result = scoreAnswers(
      answers({
        memory_changes: 'severe',
        cognitive_dx_confirm: 'dx_yes',
        behaviors: ['wandering'],
        hours_per_day: '24h',
      }),
      pack.scoring,
    );
    expect(result.tierRankings).toEqual([
      { tier: 'memory_care_high_acuity', score: 70 },
      { tier: 'assisted_living', score: 20.5 },
      { tier: 'memory_care', score: 18 },
      { tier: 'in_home', score: 12.5 },
      { tier: 'no_care_needed', score: 4 },
    ]);
  });

  it('floors confidence at 0.5 for sparse answers near a boundary', () => {
    const result = scoreAnswers(
      answers({
        memory_changes: 'severe',
        cognitive_dx_confirm: 'dx_yes',
        behaviors: ['wandering'],
        hours_per_day: '24h',
      }),
      pack.scoring,
    );
    expect(result.confidence).toBe(0.5);
    expect(result.suggestedNextProduct).toBe('care_recommendation');
  });

  it('is fully confident with complete answers far from a boundary', () => {
    const result = scoreAnswers(
      answers({
        mobility: 'independent',
        falls: 'none',
        meds_complexity: 'none',
        isolation: 'accessible',
      }),
      pack.scoring,
    );
    expect(result.tier).toBe('no_care_needed');
    expect(result.total).toBe(0);
    expect(result.confidence).toBe(1);
    expect(result.suggestedNextProduct).toBe('cost_planner');
    expect(result.summaryPoints).toEqual([]);
  });

  it('scores a behavioral case at assisted living by total', () => {
    const result = scoreAnswers(
      answers({
        memory_changes: 'moderate',
        behaviors: ['wandering'],
        hours_per_day: '4-8h',
        falls: 'once',
        badls: ['bathing', 'dressing'],
      }),
      pack.scoring,
    );
    expect(result.total).toBe(17);
    expect(result.tier).toBe('assisted_living');
  });

  it('caps summary points at five, highest first', () => {
    const result = scoreAnswers(
      answers({
        memory_changes: 'moderate',
        behaviors: ['wandering', 'aggression'],
        hours_per_day: '24h',
        badls: ['bathing'],
        mobility: 'wheelchair',
        meds_complexity: 'complex',
      }),
      pack.scoring,
    );
    expect(result.total).toBe(28);
    expect(result.tier).toBe('memory_care');
    expect(result.summaryPoints).toEqual([
      'Daily help needed: Around the clock',
      'Memory changes: Frequent confusion',
      'Behaviors: Wandering',
      'Behaviors: Aggression',
      'Mobility: Uses a wheelchair',
    ]);
    expect(result.optionFlags).toEqual(['mobility_limited', 'medication_management']);
  });
});

describe('scoreAnswers with a custom catalog', () => {
  const catalog: ScoringCatalog = {
    summaryPointLimit: 5,
    domainWeights: { cognition: 2 },
    tierThresholds: { no_care_needed: 0, in_home: 5, assisted_living: 10 },
    questions: [
      {
        id: 'memory_changes',
        label: 'Memory',
        domain: 'cognition',
        required: true,
        options: [{ value: 'moderate', label: 'Moderate', score: 3, flags: [] }],
      },
      {
        id: 'hours_per_day',
        label: 'Hours',
        domain: 'adl',
        required: true,
        options: [{ value: '4-8h', label: 'Part day', score: 2, flags: [] }],
      },
    ],
  };

  it('applies domain weights', () => {
    const result = scoreAnswers(
      answers({ memory_changes: 'moderate', hours_per_day: '4-8h' }),
      catalog,
    );
    expect(result.domainScores.cognition).toBe(6);
    expect(result.domainScores.adl).toBe(2);
    expect(result.total).toBe(8);
    expect(result.tier).toBe('in_home');
    expect(result.summaryPoints).toEqual(['Memory: Moderate', 'Hours: Part day']);
  });

  it('ranks an open-ended top band at its minimum', () => {
    const result = scoreAnswers(
      answers({ memory_changes: 'moderate', hours_per_day: '4-8h' }),
      catalog,
    );
    expect(result.tierRankings).toEqual([
      { tier: 'assisted_living', score: 10 },
      { tier: 'in_home', score: 8 },
      { tier: 'no_care_needed', score: 2 },
    ]);
    expect(result.confidence).toBe(0.87);
  });

  it('ranks the top band at the midpoint up to the score ceiling', () => {
    const result = scoreAnswers(
      answers({ memory_changes: 'moderate', hours_per_day: '4-8h' }),
      { ...catalog, tierThresholds: { no_care_needed: 0, in_home: 5, assisted_living: 20 }, scoreCeiling: 30 },
    );
    expect(result.tier).toBe('in_home');
    expect(result.tierRankings).toEqual([
      { tier: 'assisted_living', score: 25 },
      { tier: 'in_home', score: 8 },
      { tier: 'no_care_needed', score: 2 },
    ]);
  });

  it('raises ScoringError without thresholds', () => {
    expect(() =>
      scoreAnswers(answers(), { ...catalog, tierThresholds: {} }),
    ).toThrow(ScoringError);
  });
});

describe('threshold bands', () => {
  it('treats minimums as inclusive', () => {
    const bands = thresholdBands(pack.scoring);
    expect(tierForTotal(8, bands)).toBe('no_care_needed');
    expect(tierForTotal(9, bands)).toBe('in_home');
    expect(tierForTotal(24, bands)).toBe('assisted_living');
    expect(tierForTotal(25, bands)).toBe('memory_care');
    expect(tierForTotal(40, bands)).toBe('memory_care_high_acuity');
  });
});
