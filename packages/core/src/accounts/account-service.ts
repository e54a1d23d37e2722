/**
 * Account Service
 *
 * Opens checking accounts for registered customers and exposes the
 * account listings.
 */

import { systemClock, type Clock } from '../clock.js';
import { DEFAULT_BRANCH_NUMBER, DEFAULT_DAILY_WITHDRAWAL_LIMIT } from '../config/bank-config.js';
import type { CustomerService } from '../customers/customer-service.js';
import type { BankEventEmitter } from '../events/bank-events.js';
import { toCents } from '../money.js';
import { AccountNotFoundError } from './account-errors.js';
import type { AccountRepository } from './account-repository.js';
import type { Account, AccountSummary } from './account-types.js';

export interface AccountServiceOptions {
  branch?: string;
  dailyWithdrawalLimit?: number;
  /** Per-withdrawal limit in currency units; null or omitted for no cap */
  withdrawalAmountLimit?: number | null;
  clock?: Clock;
}

export class AccountService {
  private readonly branch: string;
  private readonly dailyWithdrawalLimit: number;
  private readonly withdrawalAmountLimitCents: number | null;
  private readonly clock: Clock;

  constructor(
    private readonly accountRepo: AccountRepository,
    private readonly customerService: CustomerService,
    private readonly events: BankEventEmitter,
    options: AccountServiceOptions = {}
  ) {
    this.branch = options.branch ?? DEFAULT_BRANCH_NUMBER;
    this.dailyWithdrawalLimit = options.dailyWithdrawalLimit ?? DEFAULT_DAILY_WITHDRAWAL_LIMIT;
    this.clock = options.clock ?? systemClock;

    if (!Number.isInteger(this.dailyWithdrawalLimit) || this.dailyWithdrawalLimit < 0) {
      throw new RangeError(
        `Daily withdrawal limit must be a non-negative integer, got ${this.dailyWithdrawalLimit}`
      );
    }

    const limit = options.withdrawalAmountLimit ?? null;
    if (limit === null) {
      this.withdrawalAmountLimitCents = null;
    } else {
      const limitCents = toCents(limit);
      if (limitCents === null || limitCents <= 0) {
        throw new RangeError(`Withdrawal amount limit must be a positive amount, got ${limit}`);
      }
      this.withdrawalAmountLimitCents = limitCents;
    }
  }

  /**
   * Open a checking account for an existing customer
   *
   * @throws CustomerNotFoundError if the document is not registered
   */
  createAccount(document: string): Account {
    const customer = this.customerService.findCustomer(document);

    const account = this.accountRepo.create({
      branch: this.branch,
      customerDocument: customer.document,
      createdAt: this.clock(),
      dailyWithdrawalLimit: this.dailyWithdrawalLimit,
      withdrawalAmountLimitCents: this.withdrawalAmountLimitCents,
    });

    this.events.emit({
      type: 'account.opened',
      document: customer.document,
      branch: account.branch,
      accountNumber: account.number,
    });

    return account;
  }

  /**
   * All accounts in creation order. Each call returns a fresh snapshot.
   */
  listAccounts(): readonly Account[] {
    return this.accountRepo.list();
  }

  /**
   * Accounts owned by one customer
   *
   * @throws CustomerNotFoundError if the document is not registered
   */
  listCustomerAccounts(document: string): readonly Account[] {
    const customer = this.customerService.findCustomer(document);
    return this.accountRepo.listByCustomer(customer.document);
  }

  findAccount(accountNumber: number): Account {
    const account = this.accountRepo.findByNumber(accountNumber);
    if (!account) {
      throw new AccountNotFoundError(accountNumber);
    }
    return account;
  }

  summarize(account: Account): AccountSummary {
    const holder = this.customerService.findCustomer(account.customerDocument);
    return {
      branch: account.branch,
      number: account.number,
      holderName: holder.name,
      balanceCents: account.balanceCents,
      withdrawalAmountLimitCents: account.withdrawalAmountLimitCents,
    };
  }
}
