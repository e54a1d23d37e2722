import { describe, it, expect, beforeEach } from 'vitest';
import { BankEventEmitter } from '@simple-bank/core';
import { createLogger } from '@simple-bank/observability';
import { initializeAuditLogging } from '../audit-logger.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');

describe('initializeAuditLogging', () => {
  let logs: Record<string, unknown>[];
  let events: BankEventEmitter;

  beforeEach(() => {
    logs = [];
    const logger = createLogger(
      { level: 'info' },
      {
        write: (line: string) => {
          logs.push(JSON.parse(line));
        },
      }
    );
    events = new BankEventEmitter({ clock: () => NOW });
    initializeAuditLogging(events, logger);
  });

  it('logs created customers without their document', () => {
    events.emit({ type: 'customer.created', document: '52998224725', name: 'Ana' });

    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      level: 30,
      msg: 'Customer created',
      event: 'customer.created',
      document: '[REDACTED]',
      name: 'Ana',
      timestamp: '2026-03-10T12:00:00.000Z',
    });
  });

  it('logs opened accounts', () => {
    events.emit({ type: 'account.opened', document: '52998224725', branch: '0001', accountNumber: 2 });

    expect(logs[0]).toMatchObject({
      level: 30,
      msg: 'Account opened',
      branch: '0001',
      accountNumber: 2,
    });
  });

  it('logs posted transactions', () => {
    events.emit({
      type: 'transaction.posted',
      accountNumber: 1,
      kind: 'withdrawal',
      amountCents: 3000,
      balanceCents: 7000,
    });

    expect(logs[0]).toMatchObject({
      level: 30,
      msg: 'Transaction posted',
      kind: 'withdrawal',
      amountCents: 3000,
      balanceCents: 7000,
    });
  });

  it('logs rejected transactions as warnings', () => {
    events.emit({
      type: 'transaction.rejected',
      accountNumber: 1,
      kind: 'withdrawal',
      amount: 4,
      reason: 'DailyLimitExceededError',
      message: 'Withdrawal limit of 3 per period reached',
    });

    expect(logs[0]).toMatchObject({
      level: 40,
      msg: 'Withdrawal limit of 3 per period reached',
      reason: 'DailyLimitExceededError',
      amount: 4,
    });
  });
});
