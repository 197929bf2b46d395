// src/careplan-core/intake.ts
// Intake answers contract. Parsed once, frozen, never mutated; a revision
// produces a new Answers value.

import { z } from 'zod';
import { HOURS_BANDS } from '@shared/constants';
import { IntakeContractError } from './errors';

// ── Option vocabularies ──────────────────────────────────────────────────────

export const MEMORY_CHANGES = ['none', 'mild', 'moderate', 'severe'] as const;
export const DX_CONFIRM = ['dx_yes', 'dx_no', 'dx_unsure'] as const;

export const BEHAVIOR_TAGS = [
  'wandering',
  'elopement',
  'aggression',
  'severe_sundowning',
  'confusion',
  'repetitive_questions',
  'agitation',
  'sleep_disturbance',
] as const;

/** Behaviors that mark a safety override rather than a scored preference. */
export const RISKY_BEHAVIORS: ReadonlySet<string> = new Set([
  'wandering',
  'elopement',
  'aggression',
  'severe_sundowning',
]);

export const BADLS = [
  'bathing',
  'dressing',
  'eating',
  'toileting',
  'transferring',
  'continence',
] as const;

export const IADLS = [
  'meal_prep',
  'housekeeping',
  'transportation',
  'finances',
  'shopping',
  'medication_reminders',
  'phone',
] as const;

export const MOBILITY = ['independent', 'cane', 'walker', 'wheelchair', 'bedbound'] as const;
export const FALLS = ['none', 'once', 'multiple'] as const;
export const MEDS_COMPLEXITY = ['none', 'simple', 'moderate', 'complex'] as const;

export const CHRONIC_CONDITIONS = [
  'diabetes',
  'heart_disease',
  'copd',
  'parkinsons',
  'stroke',
  'kidney_disease',
  'cancer',
  'arthritis',
] as const;

export const ISOLATION = ['accessible', 'somewhat_isolated', 'very_isolated'] as const;
export const LIVING_SITUATION = ['alone', 'with_partner', 'with_family', 'with_others'] as const;
export const HOME_SAFETY = ['safe', 'some_concerns', 'unsafe'] as const;
export const CAREGIVER_STRESS = ['none', 'some', 'high'] as const;
export const AGE_RANGES = ['under_65', '65_74', '75_84', '85_plus'] as const;

// ── Schema ───────────────────────────────────────────────────────────────────

export const answersSchema = z
  .object({
    memory_changes: z.enum(MEMORY_CHANGES),
    hours_per_day: z.enum(HOURS_BANDS),
    cognitive_dx_confirm: z.enum(DX_CONFIRM).optional(),
    behaviors: z.array(z.enum(BEHAVIOR_TAGS)).default([]),
    badls: z.array(z.enum(BADLS)).default([]),
    iadls: z.array(z.enum(IADLS)).default([]),
    mobility: z.enum(MOBILITY).optional(),
    falls: z.enum(FALLS).optional(),
    meds_complexity: z.enum(MEDS_COMPLEXITY).optional(),
    chronic_conditions: z.array(z.enum(CHRONIC_CONDITIONS)).default([]),
    isolation: z.enum(ISOLATION).optional(),
    living_situation: z.enum(LIVING_SITUATION).optional(),
    home_safety: z.enum(HOME_SAFETY).optional(),
    caregiver_stress: z.enum(CAREGIVER_STRESS).optional(),
    age_range: z.enum(AGE_RANGES).optional(),
    has_partner: z.boolean().optional(),
    move_preference: z.number().int().min(1).max(4).optional(),
  })
  .strict();

export type AnswersInput = z.input<typeof answersSchema>;
type AnswersOutput = z.output<typeof answersSchema>;
export type Answers = Readonly<{
  [K in keyof AnswersOutput]: AnswersOutput[K] extends (infer U)[] ? readonly U[] : AnswersOutput[K];
}>;

/**
 * Parse raw intake answers. Unknown keys and missing required fields are an
 * intake-form/engine version mismatch and throw `IntakeContractError`.
 */
export function parseAnswers(raw: unknown): Answers {
  const result = answersSchema.safeParse(raw);
  if (!result.success) {
    throw new IntakeContractError(
      result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  const data = result.data;
  return Object.freeze({
    ...data,
    behaviors: Object.freeze([...data.behaviors]),
    badls: Object.freeze([...data.badls]),
    iadls: Object.freeze([...data.iadls]),
    chronic_conditions: Object.freeze([...data.chronic_conditions]),
  });
}

/** Answer value for a catalog question, by key. */
export function answerFor(answers: Answers, questionId: string): unknown {
  const entry = Object.entries(answers).find(([key]) => key === questionId);
  return entry?.[1];
}

export function hasRiskyBehavior(answers: Answers): boolean {
  return answers.behaviors.some((b) => RISKY_BEHAVIORS.has(b));
}
