// src/careplan-core/money.ts
// Fixed-point money. Amounts are integer cents, rates are integer basis
// points (1.15 → 11500). Compounding chains run in bigint against the
// starting amount so the final amount is the same for every ordering.

export type Cents = number;
export type BasisPoints = number;

export const BP_SCALE = 10_000;
const BP_SCALE_N = BigInt(BP_SCALE);

export function dollarsToCents(dollars: number): Cents {
  return Math.round(dollars * 100);
}

export function centsToDollars(cents: Cents): number {
  return cents / 100;
}

/** 0.08 → 800, 1.15 → 11500. */
export function toBasisPoints(fraction: number): BasisPoints {
  return Math.round(fraction * BP_SCALE);
}

export function divideHalfUp(numerator: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw new RangeError('denominator must be positive');
  }
  if (numerator < 0n) {
    return -divideHalfUp(-numerator, denominator);
  }
  return (numerator * 2n + denominator) / (denominator * 2n);
}

function assertCents(cents: Cents): void {
  if (!Number.isSafeInteger(cents)) {
    throw new RangeError(`Not an integer cent amount: ${cents}`);
  }
}

/** cents × factor, where the factor is given in basis points of 1.0. */
export function scaleByBasisPoints(cents: Cents, factor: BasisPoints): Cents {
  assertCents(cents);
  return Number(divideHalfUp(BigInt(cents) * BigInt(factor), BP_SCALE_N));
}

/**
 * Running totals of `base × Π(1 + incrementᵢ)`. Each entry is the exact
 * product up to that step, rounded half-up to the cent once.
 */
export function compoundSteps(base: Cents, increments: readonly BasisPoints[]): Cents[] {
  assertCents(base);
  const steps: Cents[] = [];
  let numerator = BigInt(base);
  let denominator = 1n;
  for (const bp of increments) {
    numerator *= BP_SCALE_N + BigInt(bp);
    denominator *= BP_SCALE_N;
    steps.push(Number(divideHalfUp(numerator, denominator)));
  }
  return steps;
}

export function sumCents(amounts: readonly Cents[]): Cents {
  return amounts.reduce((total, amount) => {
    assertCents(amount);
    return total + amount;
  }, 0);
}

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
});

export function formatCents(cents: Cents): string {
  return usd.format(centsToDollars(cents));
}

/** 800 → '8%', 1250 → '12.5%'. */
export function formatBasisPoints(bp: BasisPoints): string {
  return `${Number((bp / 100).toFixed(2))}%`;
}
