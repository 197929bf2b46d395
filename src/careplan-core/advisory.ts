// src/careplan-core/advisory.ts
// Advisory port: an optional second opinion on the tier. The engine only
// knows this contract; model-backed implementations live elsewhere.

import { z } from 'zod';
import type { Bands, Tier } from '@shared/types';
import type { AllowedTierSet } from './gates';
import type { DomainScores } from './scorer';

/** Everything an advisor may see. Never raw answers. */
export interface AdjudicationContext {
  bands: Bands;
  allowedTiers: AllowedTierSet;
  domainScores: DomainScores;
}

export interface AdvisoryResponse {
  tier: string;
  confidence: number;
}

export interface AdvisoryPort {
  advise(context: AdjudicationContext, signal: AbortSignal): Promise<AdvisoryResponse | null>;
}

export type UnavailableCause = 'timeout' | 'error' | 'empty' | 'malformed';

export type AdvisoryOutcome =
  | { status: 'available'; tier: string; confidence: number }
  | { status: 'unavailable'; cause: UnavailableCause };

const responseSchema = z.object({
  tier: z.string().trim().min(1),
  confidence: z.number().min(0).max(1),
});

const TIER_ALIASES: Readonly<Record<string, Tier>> = {
  in_home_care: 'in_home',
  home_care: 'in_home',
  no_care: 'no_care_needed',
  none: 'no_care_needed',
};

/**
 * Lower-cases and resolves known aliases. Labels outside the tier enum are
 * returned as-is so the adjudicator can reject them.
 */
export function normalizeTierLabel(label: string): string {
  const key = label.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return Object.hasOwn(TIER_ALIASES, key) ? TIER_ALIASES[key] : key;
}

const TIMED_OUT = Symbol('advisory-timeout');

export async function consultAdvisory(
  port: AdvisoryPort,
  context: AdjudicationContext,
  timeoutMs: number,
): Promise<AdvisoryOutcome> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(TIMED_OUT);
    }, timeoutMs);
  });

  try {
    const raw = await Promise.race([port.advise(context, controller.signal), timeout]);
    if (raw === TIMED_OUT) {
      console.warn(`[ADVISORY] No response within ${timeoutMs}ms`);
      return { status: 'unavailable', cause: 'timeout' };
    }
    if (raw === null) {
      return { status: 'unavailable', cause: 'empty' };
    }
    const parsed = responseSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn('[ADVISORY] Malformed response:', parsed.error.issues[0]?.message);
      return { status: 'unavailable', cause: 'malformed' };
    }
    return {
      status: 'available',
      tier: normalizeTierLabel(parsed.data.tier),
      confidence: parsed.data.confidence,
    };
  } catch (err) {
    console.warn('[ADVISORY] Port failed:', err instanceof Error ? err.message : String(err));
    return { status: 'unavailable', cause: 'error' };
  } finally {
    clearTimeout(timer);
  }
}

// --- Stub ports ---

export const noAdvisoryPort: AdvisoryPort = {
  advise: async () => null,
};

export function staticAdvisoryPort(tier: string, confidence: number): AdvisoryPort {
  return {
    advise: async () => ({ tier, confidence }),
  };
}
