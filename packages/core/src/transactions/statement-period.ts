/**
 * Statement period policies
 *
 * The withdrawal counter of an account belongs to one statement period. When
 * the policy reports a new period key the counter starts again from zero.
 */

export interface StatementPeriodPolicy {
  key(at: Date): string;
}

export type StatementPeriodKind = 'daily' | 'session';

/**
 * One period per calendar day in the given IANA time zone (YYYY-MM-DD keys)
 */
export function dailyPeriod(timeZone = 'UTC'): StatementPeriodPolicy {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });

  return {
    key(at: Date): string {
      const parts = formatter.formatToParts(at);
      const part = (type: Intl.DateTimeFormatPartTypes) =>
        parts.find((p) => p.type === type)?.value ?? '';
      return `${part('year')}-${part('month')}-${part('day')}`;
    },
  };
}

/**
 * A single period for the life of the process; the counter never resets
 */
export function sessionPeriod(): StatementPeriodPolicy {
  return {
    key: () => 'session',
  };
}

export function createPeriodPolicy(kind: StatementPeriodKind, timeZone?: string): StatementPeriodPolicy {
  switch (kind) {
    case 'daily':
      return dailyPeriod(timeZone);
    case 'session':
      return sessionPeriod();
  }
}
