/**
 * Transactions Domain
 *
 * Exports for deposits, withdrawals and statements
 */

export { TransactionService } from './transaction-service.js';
export type { TransactionServiceOptions } from './transaction-service.js';
export { dailyPeriod, sessionPeriod, createPeriodPolicy } from './statement-period.js';
export type { StatementPeriodPolicy, StatementPeriodKind } from './statement-period.js';
export type { Transaction, TransactionKind, Statement } from './transaction-types.js';

export {
  TransactionError,
  InvalidAmountError,
  InsufficientFundsError,
  WithdrawalAmountLimitExceededError,
  DailyLimitExceededError,
} from './transaction-errors.js';
