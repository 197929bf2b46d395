import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { DOMAINS, FACILITY_TIERS, FLAG_TONES, PRODUCTS, TIERS } from '@shared/constants';
import type { CareType } from '@shared/types';
import { CarePackError } from './errors';
import { answersSchema } from './intake';
import { parseJourneyRules, type JourneyRules } from './journey';
import { EMPTY_REGIONAL_TABLE, parseRegionalTable, type RegionalTable } from './regional';

// --- Schemas ---

const packMetaSchema = z.object({
  packId: z.string().min(1),
  name: z.string(),
  version: z.string(),
  effectiveDate: z.string(),
  currency: z.literal('USD'),
  createdAt: z.string(),
});

const optionSchema = z.object({
  value: z.string(),
  label: z.string(),
  score: z.number().min(0),
  flags: z.array(z.string()).default([]),
});

const questionSchema = z.object({
  id: z.string(),
  label: z.string(),
  domain: z.enum(DOMAINS),
  required: z.boolean().default(false),
  options: z.array(optionSchema).min(1),
});

const scoringSchema = z.object({
  questions: z.array(questionSchema),
  domainWeights: z.record(z.enum(DOMAINS), z.number().min(0)).default({}),
  tierThresholds: z.record(z.enum(TIERS), z.number().min(0)),
  /** Upper bound of the top threshold band, used for its ranking midpoint. */
  scoreCeiling: z.number().min(0).optional(),
  summaryPointLimit: z.number().int().positive().default(5),
});

const flagDefinitionSchema = z.object({
  label: z.string(),
  description: z.string(),
  tone: z.enum(FLAG_TONES),
  priority: z.number().int(),
  suggestedNextAction: z.string().nullable().default(null),
});

const flagSchemaFile = z.record(z.string(), flagDefinitionSchema);

const percentTable = z.record(z.string(), z.number().min(0).max(1));

const ratesSchema = z.object({
  facilityBaseRates: z.object({
    assisted_living: z.number().positive(),
    memory_care: z.number().positive(),
    memory_care_high_acuity: z.number().positive(),
  }),
  inHomeHourlyRate: z.number().positive(),
  daysPerMonth: z.number().positive(),
  homeCarry: z.object({
    base: z.number().min(0),
    regionalDampening: z.number().min(0).max(1),
    owner: z.number().min(0),
    tenant: z.number().min(0),
  }),
  modifierOrder: z.array(z.string()).min(1),
  modifierLabels: z.record(
    z.string(),
    z.object({ label: z.string(), rationale: z.string() }),
  ),
  modifiers: z.object({
    assisted_living: percentTable,
    memory_care: percentTable,
    memory_care_high_acuity: percentTable,
    in_home: percentTable,
  }),
  highAcuity: z.object({
    percentage: z.number().min(0).max(1),
    label: z.string(),
    rationale: z.string(),
  }),
});

const journeySchema = z.record(z.enum(PRODUCTS), z.array(z.string()));

// --- Types ---

export type PackMeta = z.infer<typeof packMetaSchema>;
export type QuestionOption = z.infer<typeof optionSchema>;
export type Question = z.infer<typeof questionSchema>;
export type ScoringCatalog = z.infer<typeof scoringSchema>;
export type FlagDefinition = z.infer<typeof flagDefinitionSchema>;
export type FlagSchema = Readonly<Record<string, FlagDefinition>>;
export type RateTable = z.infer<typeof ratesSchema>;

export interface CarePack {
  meta: PackMeta;
  scoring: ScoringCatalog;
  flags: FlagSchema;
  regional: RegionalTable;
  rates: RateTable;
  journey: JourneyRules;
}

/** Raw file contents, one entry per JSON file in a pack directory. */
export interface CarePackSources {
  pack: unknown;
  scoring: unknown;
  flags: unknown;
  regional?: unknown;
  rates: unknown;
  journey: unknown;
}

// --- Validation ---

function parseFile<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, file: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new CarePackError(`${file} is invalid: ${detail}`);
  }
  return result.data;
}

const ANSWER_KEYS: ReadonlySet<string> = new Set(answersSchema.keyof().options);
const CARE_TYPES: readonly CareType[] = [...FACILITY_TIERS, 'in_home'];

function checkScoring(scoring: ScoringCatalog): void {
  const seen = new Set<string>();
  for (const question of scoring.questions) {
    if (!ANSWER_KEYS.has(question.id)) {
      throw new CarePackError(`scoring.json question "${question.id}" is not an intake answer key`);
    }
    if (seen.has(question.id)) {
      throw new CarePackError(`scoring.json question "${question.id}" is defined twice`);
    }
    seen.add(question.id);
  }
}

function checkRates(rates: RateTable): void {
  const ordered = new Set(rates.modifierOrder);
  for (const careType of CARE_TYPES) {
    for (const flagId of Object.keys(rates.modifiers[careType])) {
      if (!ordered.has(flagId)) {
        throw new CarePackError(
          `rates.json modifier "${flagId}" for ${careType} is missing from modifierOrder`,
        );
      }
    }
  }
  for (const flagId of rates.modifierOrder) {
    if (!rates.modifierLabels[flagId]) {
      throw new CarePackError(`rates.json modifier "${flagId}" has no label`);
    }
  }
}

export function buildCarePack(sources: CarePackSources): CarePack {
  const meta = parseFile(packMetaSchema, sources.pack, 'pack.json');
  const scoring = parseFile(scoringSchema, sources.scoring, 'scoring.json');
  const flags = parseFile(flagSchemaFile, sources.flags, 'flags.json');
  const rates = parseFile(ratesSchema, sources.rates, 'rates.json');
  const journeyRaw = parseFile(journeySchema, sources.journey, 'journey.json');

  checkScoring(scoring);
  checkRates(rates);

  return {
    meta,
    scoring,
    flags,
    regional:
      sources.regional === undefined ? EMPTY_REGIONAL_TABLE : parseRegionalTable(sources.regional),
    rates,
    journey: parseJourneyRules(journeyRaw),
  };
}

// --- Loader ---

async function readJson(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');
  return JSON.parse(raw);
}

/** Missing or unreadable regional data degrades to the national default. */
async function readRegional(filePath: string): Promise<unknown> {
  try {
    return await readJson(filePath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[REGIONAL] Could not read ${path.basename(filePath)} (${message}); using national default`);
    return undefined;
  }
}

export async function loadCarePack(packDir: string): Promise<CarePack> {
  const [pack, scoring, flags, regional, rates, journey] = await Promise.all([
    readJson(path.join(packDir, 'pack.json')),
    readJson(path.join(packDir, 'scoring.json')),
    readJson(path.join(packDir, 'flags.json')),
    readRegional(path.join(packDir, 'regional.json')),
    readJson(path.join(packDir, 'rates.json')),
    readJson(path.join(packDir, 'journey.json')),
  ]);

  return buildCarePack({ pack, scoring, flags, regional, rates, journey });
}
