/**
 * Account Domain Types
 *
 * Type definitions for account registry operations.
 */

import type { Transaction } from '../transactions/transaction-types.js';

/**
 * Read-only view of a checking account. Balance, withdrawal counter and
 * history reflect the current state and change only through the
 * repository's `applyTransaction`.
 */
export interface Account {
  readonly branch: string;
  readonly number: number;
  readonly customerDocument: string;
  readonly createdAt: Date;
  /** Withdrawals allowed per statement period */
  readonly dailyWithdrawalLimit: number;
  /** Largest amount a single withdrawal may take; null when uncapped */
  readonly withdrawalAmountLimitCents: number | null;
  readonly balanceCents: number;
  readonly withdrawalsInPeriod: number;
  /** Statement period the withdrawal counter belongs to; null until the first withdrawal */
  readonly periodKey: string | null;
  readonly history: readonly Transaction[];
}

export interface CreateAccountData {
  branch: string;
  customerDocument: string;
  createdAt: Date;
  dailyWithdrawalLimit: number;
  withdrawalAmountLimitCents: number | null;
}

/**
 * State written by a posted transaction
 */
export interface AccountUpdate {
  balanceCents: number;
  withdrawalsInPeriod: number;
  periodKey: string | null;
  transaction: Transaction;
}

/**
 * Listing line for an account
 */
export interface AccountSummary {
  branch: string;
  number: number;
  holderName: string;
  balanceCents: number;
  withdrawalAmountLimitCents: number | null;
}
