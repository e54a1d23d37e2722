import { z } from 'zod';
import { BankError } from '../errors.js';
import type { StatementPeriodKind } from '../transactions/statement-period.js';

export const DEFAULT_BRANCH_NUMBER = '0001';
export const DEFAULT_DAILY_WITHDRAWAL_LIMIT = 3;

export type BankConfig = {
  branch: string;
  dailyWithdrawalLimit: number;
  /** Per-withdrawal cap in currency units; null when withdrawals are uncapped */
  withdrawalAmountLimit: number | null;
  statementPeriod: StatementPeriodKind;
  timeZone: string;
  currency: string;
  locale: string;
  logLevel: string;
};

export class InvalidConfigError extends BankError {}

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  BANK_BRANCH_NUMBER: z
    .string()
    .regex(/^\d{4}$/, 'must be 4 digits')
    .default(DEFAULT_BRANCH_NUMBER),
  BANK_DAILY_WITHDRAWAL_LIMIT: z.coerce.number().int().min(0).default(DEFAULT_DAILY_WITHDRAWAL_LIMIT),
  BANK_WITHDRAWAL_AMOUNT_LIMIT: z.coerce.number().positive().multipleOf(0.01).optional(),
  BANK_STATEMENT_PERIOD: z.enum(['daily', 'session']).default('daily'),
  BANK_TIME_ZONE: z.string().refine(isTimeZone, 'must be an IANA time zone').default('UTC'),
  BANK_CURRENCY: z
    .string()
    .regex(/^[A-Z]{3}$/, 'must be an ISO 4217 code')
    .default('BRL'),
  BANK_LOCALE: z.string().min(2).default('pt-BR'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

/**
 * Read bank settings from the environment
 *
 * @throws InvalidConfigError listing every invalid variable
 */
export function loadBankConfig(env: NodeJS.ProcessEnv = process.env): BankConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new InvalidConfigError(`Invalid bank configuration: ${errors}`);
  }

  const parsed = result.data;
  return {
    branch: parsed.BANK_BRANCH_NUMBER,
    dailyWithdrawalLimit: parsed.BANK_DAILY_WITHDRAWAL_LIMIT,
    withdrawalAmountLimit: parsed.BANK_WITHDRAWAL_AMOUNT_LIMIT ?? null,
    statementPeriod: parsed.BANK_STATEMENT_PERIOD,
    timeZone: parsed.BANK_TIME_ZONE,
    currency: parsed.BANK_CURRENCY,
    locale: parsed.BANK_LOCALE,
    logLevel: parsed.LOG_LEVEL,
  };
}
