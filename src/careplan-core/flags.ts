import type { Bands, FlagTone } from '@shared/types';
import type { FlagSchema } from './care-pack';
import type { Answers } from './intake';

export interface Flag {
  id: string;
  label: string;
  tone: FlagTone;
  description: string;
  priority: number;
  suggestedNextAction: string | null;
}

const UNKNOWN_FLAG_PRIORITY = 99;

// --- Derivation ---

export function deriveFlagIds(
  answers: Answers,
  bands: Bands,
  riskyBehaviors: boolean,
  optionFlags: readonly string[],
): string[] {
  const ids = new Set(optionFlags);
  if (answers.badls.length >= 3) ids.add('adl_support_high');
  if (answers.chronic_conditions.length >= 2) ids.add('chronic_conditions');
  if (bands.cognition === 'severe') ids.add('memory_support');
  if (riskyBehaviors) ids.add('behavioral_concerns');
  if ((answers.move_preference ?? 0) >= 3) ids.add('is_move_flexible');
  return [...ids];
}

// --- Lookup ---

function titleCase(id: string): string {
  return id
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}

export function lookupFlag(id: string, schema: FlagSchema): Flag {
  const definition = Object.hasOwn(schema, id) ? schema[id] : undefined;
  if (!definition) {
    return {
      id,
      label: titleCase(id),
      tone: 'info',
      description: '',
      priority: UNKNOWN_FLAG_PRIORITY,
      suggestedNextAction: null,
    };
  }
  return { id, ...definition };
}

/** Deduplicated, ordered by priority then id. */
export function resolveFlags(ids: readonly string[], schema: FlagSchema): Flag[] {
  return [...new Set(ids)]
    .map((id) => lookupFlag(id, schema))
    .sort((a, b) => a.priority - b.priority || a.id.localeCompare(b.id));
}
