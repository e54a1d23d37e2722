import { describe, it, expect } from 'vitest';
import { createPeriodPolicy, dailyPeriod, sessionPeriod } from '../statement-period.js';

describe('dailyPeriod', () => {
  it('keys by UTC calendar day by default', () => {
    const policy = dailyPeriod();

    expect(policy.key(new Date('2026-03-10T00:00:00.000Z'))).toBe('2026-03-10');
    expect(policy.key(new Date('2026-03-10T23:59:59.999Z'))).toBe('2026-03-10');
    expect(policy.key(new Date('2026-03-11T00:00:00.000Z'))).toBe('2026-03-11');
  });

  it('uses the calendar day of the given time zone', () => {
    const policy = dailyPeriod('America/Sao_Paulo');

    // 02:00 UTC is 23:00 of the previous day in Sao Paulo (UTC-3)
    expect(policy.key(new Date('2026-03-11T02:00:00.000Z'))).toBe('2026-03-10');
    expect(policy.key(new Date('2026-03-11T03:00:00.000Z'))).toBe('2026-03-11');
  });

  it('throws for an unknown time zone', () => {
    expect(() => dailyPeriod('Mars/Olympus')).toThrow(RangeError);
  });
});

describe('sessionPeriod', () => {
  it('returns the same key for any time', () => {
    const policy = sessionPeriod();

    expect(policy.key(new Date('2020-01-01T00:00:00.000Z'))).toBe(
      policy.key(new Date('2030-12-31T00:00:00.000Z'))
    );
  });
});

describe('createPeriodPolicy', () => {
  it('builds the policy named by the kind', () => {
    const at = new Date('2026-03-11T02:00:00.000Z');

    expect(createPeriodPolicy('daily', 'America/Sao_Paulo').key(at)).toBe('2026-03-10');
    expect(createPeriodPolicy('session').key(at)).toBe('session');
  });
});
