export const API_PREFIX = '/api';

export const TIERS = [
  'no_care_needed',
  'in_home',
  'assisted_living',
  'memory_care',
  'memory_care_high_acuity',
] as const;

export const MEMORY_CARE_TIERS = ['memory_care', 'memory_care_high_acuity'] as const;

export const FACILITY_TIERS = [
  'assisted_living',
  'memory_care',
  'memory_care_high_acuity',
] as const;

export const SAFE_DEFAULT_TIER = 'assisted_living';

export const TIER_LABELS = {
  no_care_needed: 'No Care Needed',
  in_home: 'In-Home Care',
  assisted_living: 'Assisted Living',
  memory_care: 'Memory Care',
  memory_care_high_acuity: 'Memory Care (High Acuity)',
} as const;

export const COGNITION_BANDS = ['none', 'mild', 'moderate', 'severe'] as const;

export const SUPPORT_BANDS = ['low', 'medium', 'high'] as const;

export const DOMAINS = [
  'mobility',
  'cognition',
  'adl',
  'medical',
  'isolation',
  'safety',
] as const;

export const ADJUDICATION_SOURCES = ['deterministic', 'advisory'] as const;

export const REASON_CODES = [
  'ADVISORY_VALID',
  'ADVISORY_UNAVAILABLE',
  'ADVISORY_TIER_NOT_ALLOWED',
  'DOUBLE_MISSING_DEFAULT',
] as const;

export const FLAG_TONES = ['info', 'warning', 'critical'] as const;

export const REGION_PRECISIONS = ['zip', 'zip3', 'state', 'national'] as const;

export const SCENARIOS = ['facility', 'in_home'] as const;

export const COST_SEGMENTS = [
  'base',
  'regional_adjustment',
  'care_modifiers',
  'home_carry',
] as const;

export const HOURS_BANDS = ['<1h', '1-3h', '4-8h', '24h'] as const;

export const PRODUCTS = ['care_recommendation', 'cost_planner', 'financial_review'] as const;

export const TENURES = ['owner', 'tenant', 'unknown'] as const;
