// src/careplan-core/regional.ts
// Regional cost multipliers: exact zip → zip3 prefix → state → national
// default. First matching level wins, levels are never blended.

import { z } from 'zod';
import type { RegionPrecision } from '@shared/types';

export interface RegionEntry {
  multiplier: number;
  name: string;
}

export interface RegionalTable {
  zipMultipliers: Readonly<Record<string, RegionEntry>>;
  zip3Multipliers: Readonly<Record<string, RegionEntry>>;
  stateMultipliers: Readonly<Record<string, RegionEntry>>;
  defaultMultiplier: number;
}

export interface RegionalMultiplier {
  multiplier: number;
  regionName: string;
  precision: RegionPrecision;
}

export const NATIONAL_REGION_NAME = 'National Average';
const FALLBACK_MULTIPLIER = 1.0;

export const EMPTY_REGIONAL_TABLE: RegionalTable = Object.freeze({
  zipMultipliers: {},
  zip3Multipliers: {},
  stateMultipliers: {},
  defaultMultiplier: FALLBACK_MULTIPLIER,
});

// ── Parsing ──────────────────────────────────────────────────────────────────
// The table is external data. Bad entries are dropped one by one and a bad
// default falls back to 1.0; parsing never throws.

const entrySchema = z.object({
  multiplier: z.number().finite().positive(),
  name: z.string().default(''),
});

const mapSchema = z.record(z.string(), z.unknown());

const tableSchema = z
  .object({
    zip_multipliers: z.unknown().optional(),
    zip3_multipliers: z.unknown().optional(),
    state_multipliers: z.unknown().optional(),
    default_multiplier: z.unknown().optional(),
  })
  .passthrough();

function parseEntries(
  raw: unknown,
  normalizeKey: (key: string) => string | null,
): { entries: Record<string, RegionEntry>; dropped: number } {
  const entries: Record<string, RegionEntry> = {};
  let dropped = 0;
  if (raw === undefined) return { entries, dropped };

  const map = mapSchema.safeParse(raw);
  if (!map.success) return { entries, dropped: 1 };

  for (const [key, value] of Object.entries(map.data)) {
    const normalized = normalizeKey(key);
    const entry = entrySchema.safeParse(value);
    if (normalized === null || !entry.success) {
      dropped++;
      continue;
    }
    entries[normalized] = entry.data;
  }
  return { entries, dropped };
}

export function parseRegionalTable(raw: unknown): RegionalTable {
  const table = tableSchema.safeParse(raw);
  if (!table.success) {
    console.warn('[REGIONAL] Regional table is not an object; using national default only');
    return EMPTY_REGIONAL_TABLE;
  }

  const zips = parseEntries(table.data.zip_multipliers, normalizeZip5);
  const zip3s = parseEntries(table.data.zip3_multipliers, (key) =>
    /^\d{3}$/.test(key.trim()) ? key.trim() : null,
  );
  const states = parseEntries(table.data.state_multipliers, normalizeState);
  const fallback = z.number().finite().positive().safeParse(table.data.default_multiplier);

  const dropped = zips.dropped + zip3s.dropped + states.dropped;
  if (dropped > 0) {
    console.warn(`[REGIONAL] Dropped ${dropped} malformed regional entries`);
  }
  if (table.data.default_multiplier !== undefined && !fallback.success) {
    console.warn(`[REGIONAL] Invalid default_multiplier; using ${FALLBACK_MULTIPLIER}`);
  }

  return Object.freeze({
    zipMultipliers: Object.freeze(zips.entries),
    zip3Multipliers: Object.freeze(zip3s.entries),
    stateMultipliers: Object.freeze(states.entries),
    defaultMultiplier: fallback.success ? fallback.data : FALLBACK_MULTIPLIER,
  });
}

// ── Resolution ───────────────────────────────────────────────────────────────

/** '60614', ' 60614-1234 ' → '60614'; anything else → null. */
export function normalizeZip5(zip: string | null | undefined): string | null {
  if (!zip) return null;
  const match = /^(\d{5})(-\d{4})?$/.exec(zip.trim());
  return match ? match[1] : null;
}

export function normalizeState(state: string | null | undefined): string | null {
  if (!state) return null;
  const code = state.trim().toUpperCase();
  return /^[A-Z]{2}$/.test(code) ? code : null;
}

export function resolveRegionalMultiplier(
  table: RegionalTable,
  zip?: string | null,
  state?: string | null,
): RegionalMultiplier {
  const zip5 = normalizeZip5(zip);
  if (zip5) {
    const exact = table.zipMultipliers[zip5];
    if (exact) {
      return { multiplier: exact.multiplier, regionName: exact.name || zip5, precision: 'zip' };
    }
    const zip3 = zip5.slice(0, 3);
    const prefix = table.zip3Multipliers[zip3];
    if (prefix) {
      return {
        multiplier: prefix.multiplier,
        regionName: prefix.name || `Region ${zip3}`,
        precision: 'zip3',
      };
    }
  }

  const code = normalizeState(state);
  if (code) {
    const byState = table.stateMultipliers[code];
    if (byState) {
      return { multiplier: byState.multiplier, regionName: byState.name || code, precision: 'state' };
    }
  }

  return {
    multiplier: table.defaultMultiplier,
    regionName: NATIONAL_REGION_NAME,
    precision: 'national',
  };
}
