/**
 * Transaction Service
 *
 * Applies deposits and withdrawals to an account and appends them to its
 * history. Every check runs before the repository writes the new state.
 */

import type { AccountRepository } from '../accounts/account-repository.js';
import type { Account, AccountUpdate } from '../accounts/account-types.js';
import { systemClock, type Clock } from '../clock.js';
import type { BankEventEmitter } from '../events/bank-events.js';
import { toCents } from '../money.js';
import { dailyPeriod, type StatementPeriodPolicy } from './statement-period.js';
import {
  DailyLimitExceededError,
  InsufficientFundsError,
  InvalidAmountError,
  TransactionError,
  WithdrawalAmountLimitExceededError,
} from './transaction-errors.js';
import type { Statement, Transaction, TransactionKind } from './transaction-types.js';

export interface TransactionServiceOptions {
  periodPolicy?: StatementPeriodPolicy;
  clock?: Clock;
}

export class TransactionService {
  private readonly periodPolicy: StatementPeriodPolicy;
  private readonly clock: Clock;

  constructor(
    private readonly accountRepo: AccountRepository,
    private readonly events: BankEventEmitter,
    options: TransactionServiceOptions = {}
  ) {
    this.periodPolicy = options.periodPolicy ?? dailyPeriod();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Credit an account
   *
   * @param amount - currency units, positive with at most two decimals
   * @throws InvalidAmountError also when the new balance would lose cent precision
   */
  deposit(account: Account, amount: number): Transaction {
    return this.rejectOnError(account, 'deposit', amount, () => {
      const amountCents = this.requirePositiveCents(amount);

      const balanceCents = account.balanceCents + amountCents;
      if (!Number.isSafeInteger(balanceCents)) {
        throw new InvalidAmountError(amount);
      }

      return this.append(account, 'deposit', amountCents, {
        balanceCents,
        withdrawalsInPeriod: account.withdrawalsInPeriod,
        periodKey: account.periodKey,
      });
    });
  }

  /**
   * Debit an account
   *
   * Rules, checked in order:
   * - amount must be positive with at most two decimals
   * - amount must not exceed the balance
   * - amount must not exceed the account's per-withdrawal limit, when it has one
   * - the account must have withdrawals left in the current statement period
   *
   * @throws InvalidAmountError
   * @throws InsufficientFundsError
   * @throws WithdrawalAmountLimitExceededError
   * @throws DailyLimitExceededError
   */
  withdraw(account: Account, amount: number): Transaction {
    return this.rejectOnError(account, 'withdrawal', amount, () => {
      const amountCents = this.requirePositiveCents(amount);

      if (amountCents > account.balanceCents) {
        throw new InsufficientFundsError(amountCents, account.balanceCents);
      }

      const limitCents = account.withdrawalAmountLimitCents;
      if (limitCents !== null && amountCents > limitCents) {
        throw new WithdrawalAmountLimitExceededError(amountCents, limitCents);
      }

      const periodKey = this.periodPolicy.key(this.clock());
      const withdrawals = account.periodKey === periodKey ? account.withdrawalsInPeriod : 0;

      if (withdrawals >= account.dailyWithdrawalLimit) {
        throw new DailyLimitExceededError(account.dailyWithdrawalLimit);
      }

      return this.append(account, 'withdrawal', amountCents, {
        balanceCents: account.balanceCents - amountCents,
        withdrawalsInPeriod: withdrawals + 1,
        periodKey,
      });
    });
  }

  /**
   * Balance and history of an account. Does not modify the account.
   */
  statement(account: Account): Statement {
    const withdrawalsInPeriod = this.withdrawalsInCurrentPeriod(account);

    return {
      branch: account.branch,
      accountNumber: account.number,
      balanceCents: account.balanceCents,
      transactions: Object.freeze([...account.history]),
      withdrawalsInPeriod,
      withdrawalsRemaining: Math.max(account.dailyWithdrawalLimit - withdrawalsInPeriod, 0),
    };
  }

  private withdrawalsInCurrentPeriod(account: Account): number {
    const periodKey = this.periodPolicy.key(this.clock());
    return account.periodKey === periodKey ? account.withdrawalsInPeriod : 0;
  }

  private requirePositiveCents(amount: number): number {
    const cents = toCents(amount);
    if (cents === null || cents <= 0) {
      throw new InvalidAmountError(amount);
    }
    return cents;
  }

  private append(
    account: Account,
    kind: TransactionKind,
    amountCents: number,
    update: Omit<AccountUpdate, 'transaction'>
  ): Transaction {
    const transaction: Transaction = Object.freeze({
      kind,
      amountCents,
      timestamp: this.clock(),
    });
    this.accountRepo.applyTransaction(account, { ...update, transaction });

    this.events.emit({
      type: 'transaction.posted',
      accountNumber: account.number,
      kind,
      amountCents,
      balanceCents: account.balanceCents,
    });

    return transaction;
  }

  private rejectOnError(
    account: Account,
    kind: TransactionKind,
    amount: number,
    operation: () => Transaction
  ): Transaction {
    try {
      return operation();
    } catch (error) {
      if (error instanceof TransactionError) {
        this.events.emit({
          type: 'transaction.rejected',
          accountNumber: account.number,
          kind,
          amount,
          reason: error.name,
          message: error.message,
        });
      }
      throw error;
    }
  }
}
