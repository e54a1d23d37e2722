/**
 * Text rendering for statements and account listings
 */

import type { AccountSummary, Statement, Transaction } from '@simple-bank/core';

export type MoneyFormatter = (cents: number) => string;

export function createMoneyFormatter(locale: string, currency: string): MoneyFormatter {
  const formatter = new Intl.NumberFormat(locale, { style: 'currency', currency });
  return (cents) => formatter.format(cents / 100);
}

/**
 * `YYYY-MM-DD HH:mm:ss` in the given time zone
 */
export function formatTimestamp(at: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(at);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`;
}

const KIND_LABELS: Record<Transaction['kind'], string> = {
  deposit: 'Deposit',
  withdrawal: 'Withdrawal',
};

export interface FormatOptions {
  money: MoneyFormatter;
  timeZone: string;
}

export function formatStatement(statement: Statement, options: FormatOptions): string {
  const lines = [
    '================ STATEMENT ================',
    `Branch: ${statement.branch}  Account: ${statement.accountNumber}`,
    '',
  ];

  if (statement.transactions.length === 0) {
    lines.push('No transactions recorded.');
  } else {
    for (const transaction of statement.transactions) {
      lines.push(
        `${KIND_LABELS[transaction.kind]}: ${options.money(transaction.amountCents)} on ${formatTimestamp(
          transaction.timestamp,
          options.timeZone
        )}`
      );
    }
  }

  lines.push(
    '',
    `Balance: ${options.money(statement.balanceCents)}`,
    `Withdrawals left in period: ${statement.withdrawalsRemaining}`,
    '==========================================='
  );

  return lines.join('\n');
}

/**
 * The Limit line appears only for accounts with a per-withdrawal cap
 */
export function formatAccountSummary(summary: AccountSummary, money: MoneyFormatter): string {
  const lines = [
    `Branch:\t\t${summary.branch}`,
    `Account:\t${summary.number}`,
    `Holder:\t\t${summary.holderName}`,
  ];
  if (summary.withdrawalAmountLimitCents !== null) {
    lines.push(`Limit:\t\t${money(summary.withdrawalAmountLimitCents)}`);
  }
  return lines.join('\n');
}
