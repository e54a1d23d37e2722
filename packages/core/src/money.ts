/**
 * Money helpers
 *
 * Amounts enter the core as currency units (e.g. 12.5) and are stored as
 * integer cents.
 */

const MAX_FRACTION_DIGITS = 2;

/**
 * Convert a currency amount to integer cents.
 * Returns null when the amount is not finite or has more than two decimals.
 */
export function toCents(amount: number): number | null {
  if (!Number.isFinite(amount)) {
    return null;
  }

  const cents = Math.round(amount * 100);
  // 0.1 * 100 is 10.000000000000002, so compare with a tolerance
  if (Math.abs(cents - amount * 100) > 1e-6) {
    return null;
  }

  if (!Number.isSafeInteger(cents)) {
    return null;
  }

  return cents;
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function formatCents(cents: number): string {
  return fromCents(cents).toFixed(MAX_FRACTION_DIGITS);
}
