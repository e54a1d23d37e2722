/**
 * Transaction Domain Types
 */

export type TransactionKind = 'deposit' | 'withdrawal';

/**
 * One entry of an account history. Frozen when appended.
 */
export interface Transaction {
  readonly kind: TransactionKind;
  readonly amountCents: number;
  readonly timestamp: Date;
}

/**
 * Read-only view of an account returned by `statement`
 */
export interface Statement {
  branch: string;
  accountNumber: number;
  balanceCents: number;
  transactions: readonly Transaction[];
  withdrawalsInPeriod: number;
  withdrawalsRemaining: number;
}
