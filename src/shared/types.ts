import type {
  TIERS,
  MEMORY_CARE_TIERS,
  FACILITY_TIERS,
  COGNITION_BANDS,
  SUPPORT_BANDS,
  DOMAINS,
  ADJUDICATION_SOURCES,
  REASON_CODES,
  FLAG_TONES,
  REGION_PRECISIONS,
  SCENARIOS,
  COST_SEGMENTS,
  HOURS_BANDS,
  PRODUCTS,
  TENURES,
} from './constants';

export type Tier = (typeof TIERS)[number];
export type MemoryCareTier = (typeof MEMORY_CARE_TIERS)[number];
export type FacilityTier = (typeof FACILITY_TIERS)[number];
export type CognitionBand = (typeof COGNITION_BANDS)[number];
export type SupportBand = (typeof SUPPORT_BANDS)[number];
export type Domain = (typeof DOMAINS)[number];
export type AdjudicationSource = (typeof ADJUDICATION_SOURCES)[number];
export type ReasonCode = (typeof REASON_CODES)[number];
export type FlagTone = (typeof FLAG_TONES)[number];
export type RegionPrecision = (typeof REGION_PRECISIONS)[number];
export type Scenario = (typeof SCENARIOS)[number];
export type CostSegment = (typeof COST_SEGMENTS)[number];
export type HoursBand = (typeof HOURS_BANDS)[number];
export type Product = (typeof PRODUCTS)[number];
export type Tenure = (typeof TENURES)[number];

/** Cost modifier tables are keyed by the care setting being priced. */
export type CareType = FacilityTier | 'in_home';

export interface Bands {
  cognition: CognitionBand;
  support: SupportBand;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}
