// Shared cost fixtures: a small rate table whose percentages make the
// arithmetic easy to follow by hand.

import type { RateTable } from '@core/care-pack';
import type { CostSubject } from '@core/cost-calculator';

export const exampleRates: RateTable = {
  facilityBaseRates: { assisted_living: 4500, memory_care: 6500, memory_care_high_acuity: 9000 },
  inHomeHourlyRate: 30,
  daysPerMonth: 30.4,
  homeCarry: { base: 4500, regionalDampening: 0.5, owner: 2000, tenant: 1500 },
  modifierOrder: ['mobility_limited', 'medication_management', 'falls_risk'],
  modifierLabels: {
    mobility_limited: { label: 'Mobility/Transfer Assistance', rationale: 'Transfers add staff time.' },
    medication_management: { label: 'Medication Management', rationale: 'Needs licensed oversight.' },
    falls_risk: { label: 'Fall Prevention & Monitoring', rationale: 'Needs monitoring.' },
  },
  modifiers: {
    assisted_living: { mobility_limited: 0.08, medication_management: 0.06, falls_risk: 0.05 },
    memory_care: { mobility_limited: 0.06 },
    memory_care_high_acuity: { mobility_limited: 0.08 },
    in_home: { mobility_limited: 0.1 },
  },
  highAcuity: {
    percentage: 0.25,
    label: 'High-Acuity Intensive Care',
    rationale: 'Needs intensive staffing.',
  },
};

export const exampleSubject: CostSubject = {
  id: 'cp_test',
  personId: 'person-1',
  finalTier: 'assisted_living',
  flags: [{ id: 'medication_management' }, { id: 'mobility_limited' }],
};
