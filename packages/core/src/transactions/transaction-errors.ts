/**
 * Transaction Domain Errors
 *
 * Raised by the transaction service before any account state changes.
 */

import { BankError } from '../errors.js';
import { formatCents } from '../money.js';

export class TransactionError extends BankError {}

export class InvalidAmountError extends TransactionError {
  constructor(public readonly amount: number) {
    super(`Invalid amount: ${amount}. Amounts must be positive with at most two decimals`);
  }
}

export class InsufficientFundsError extends TransactionError {
  constructor(
    public readonly requestedCents: number,
    public readonly balanceCents: number
  ) {
    super(
      `Insufficient funds: requested ${formatCents(requestedCents)}, available ${formatCents(balanceCents)}`
    );
  }
}

export class WithdrawalAmountLimitExceededError extends TransactionError {
  constructor(
    public readonly requestedCents: number,
    public readonly limitCents: number
  ) {
    super(
      `Withdrawal of ${formatCents(requestedCents)} exceeds the per-withdrawal limit of ${formatCents(limitCents)}`
    );
  }
}

export class DailyLimitExceededError extends TransactionError {
  constructor(public readonly limit: number) {
    super(`Withdrawal limit of ${limit} per period reached`);
  }
}
