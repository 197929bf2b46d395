import { describe, it, expect } from 'vitest';
import householdRouter, { householdRequestSchema } from '../../../src/careplan-api/routes/household';

describe('household router', () => {
  it('exports a router', () => {
    expect(householdRouter).toBeDefined();
    expect(householdRouter.stack).toBeDefined();
  });

  it('defaults the partner and tenure', () => {
    const parsed = householdRequestSchema.parse({
      primary: { personId: 'a', scenario: 'facility', careMonthly: 592434 },
      settings: { keepHome: true },
    });
    expect(parsed.partner).toBeNull();
    expect(parsed.settings.ownerTenant).toBe('unknown');
  });

  it('rejects fractional cents', () => {
    expect(
      householdRequestSchema.safeParse({
        primary: { personId: 'a', scenario: 'facility', careMonthly: 5924.34 },
        settings: { keepHome: true },
      }).success,
    ).toBe(false);
  });
});
