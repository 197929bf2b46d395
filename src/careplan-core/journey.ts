// src/careplan-core/journey.ts
// Product unlock requirements. Requirement strings from journey.json are
// parsed once when the care pack loads; evaluation only sees the union.

import { PRODUCTS } from '@shared/constants';
import type { Product } from '@shared/types';
import { CarePackError } from './errors';

export type Requirement =
  | { kind: 'product_complete'; product: Product }
  | { kind: 'progress_at_least'; product: Product; percent: number }
  | { kind: 'any_flag'; flagIds: string[] };

export type JourneyRules = Readonly<Record<Product, readonly Requirement[]>>;

export interface JourneyState {
  /** Completion percentage per product, 0–100. Absent means not started. */
  progress: Partial<Record<Product, number>>;
  flags: readonly string[];
}

const COMPLETE_PERCENT = 100;

function isProduct(value: string): value is Product {
  return PRODUCTS.some((product) => product === value);
}

function parseProduct(value: string, source: string): Product {
  if (!isProduct(value)) {
    throw new CarePackError(`Unknown product "${value}" in requirement "${source}"`);
  }
  return value;
}

// --- Parsing ---

export function parseRequirement(source: string): Requirement {
  const text = source.trim();

  const flagMatch = /^flag:(.+)$/.exec(text);
  if (flagMatch) {
    const flagIds = flagMatch[1].split('|').map((id) => id.trim());
    if (flagIds.some((id) => id.length === 0)) {
      throw new CarePackError(`Empty flag id in requirement "${source}"`);
    }
    return { kind: 'any_flag', flagIds };
  }

  const completeMatch = /^([a-z_]+):complete$/.exec(text);
  if (completeMatch) {
    return { kind: 'product_complete', product: parseProduct(completeMatch[1], source) };
  }

  const progressMatch = /^([a-z_]+):progress>=(\d+(?:\.\d+)?)$/.exec(text);
  if (progressMatch) {
    const percent = Number(progressMatch[2]);
    if (percent > COMPLETE_PERCENT) {
      throw new CarePackError(`Progress threshold above 100 in requirement "${source}"`);
    }
    return {
      kind: 'progress_at_least',
      product: parseProduct(progressMatch[1], source),
      percent,
    };
  }

  throw new CarePackError(`Malformed requirement "${source}"`);
}

export function parseJourneyRules(raw: Partial<Record<Product, string[]>>): JourneyRules {
  const rules: Record<Product, readonly Requirement[]> = {
    care_recommendation: [],
    cost_planner: [],
    financial_review: [],
  };
  for (const product of PRODUCTS) {
    rules[product] = Object.freeze((raw[product] ?? []).map(parseRequirement));
  }
  return Object.freeze(rules);
}

// --- Evaluation ---

function progressOf(state: JourneyState, product: Product): number {
  return state.progress[product] ?? 0;
}

export function isRequirementMet(requirement: Requirement, state: JourneyState): boolean {
  switch (requirement.kind) {
    case 'product_complete':
      return progressOf(state, requirement.product) >= COMPLETE_PERCENT;
    case 'progress_at_least':
      return progressOf(state, requirement.product) >= requirement.percent;
    case 'any_flag':
      return requirement.flagIds.some((id) => state.flags.includes(id));
    default: {
      const unreachable: never = requirement;
      return unreachable;
    }
  }
}

/** A product unlocks when every one of its requirements holds. */
export function isUnlocked(product: Product, state: JourneyState, rules: JourneyRules): boolean {
  return rules[product].every((requirement) => isRequirementMet(requirement, state));
}

export function unlockedProducts(state: JourneyState, rules: JourneyRules): Product[] {
  return PRODUCTS.filter((product) => isUnlocked(product, state, rules));
}
