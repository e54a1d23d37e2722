/**
 * Account Repository
 *
 * In-memory data access for accounts. Owns the sequential account counter,
 * so numbering is scoped to one repository instance. Callers only ever see
 * frozen views; the mutable state stays here.
 */

import type { Transaction } from '../transactions/transaction-types.js';
import { AccountNotFoundError } from './account-errors.js';
import type { Account, AccountUpdate, CreateAccountData } from './account-types.js';

interface AccountState {
  balanceCents: number;
  withdrawalsInPeriod: number;
  periodKey: string | null;
  history: Transaction[];
}

export class AccountRepository {
  private readonly accounts: Account[] = [];
  private readonly states = new Map<Account, AccountState>();
  private lastNumber = 0;

  /**
   * Create an account with the next sequential number (first is 1)
   */
  create(data: CreateAccountData): Account {
    this.lastNumber += 1;

    const state: AccountState = {
      balanceCents: 0,
      withdrawalsInPeriod: 0,
      periodKey: null,
      history: [],
    };

    const account: Account = Object.freeze({
      branch: data.branch,
      number: this.lastNumber,
      customerDocument: data.customerDocument,
      createdAt: data.createdAt,
      dailyWithdrawalLimit: data.dailyWithdrawalLimit,
      withdrawalAmountLimitCents: data.withdrawalAmountLimitCents,
      get balanceCents() {
        return state.balanceCents;
      },
      get withdrawalsInPeriod() {
        return state.withdrawalsInPeriod;
      },
      get periodKey() {
        return state.periodKey;
      },
      get history() {
        return Object.freeze([...state.history]);
      },
    });

    this.accounts.push(account);
    this.states.set(account, state);
    return account;
  }

  /**
   * Write the outcome of a posted transaction and append it to the history
   *
   * @throws AccountNotFoundError if the account belongs to another repository
   */
  applyTransaction(account: Account, update: AccountUpdate): void {
    const state = this.states.get(account);
    if (!state) {
      throw new AccountNotFoundError(account.number);
    }

    state.balanceCents = update.balanceCents;
    state.withdrawalsInPeriod = update.withdrawalsInPeriod;
    state.periodKey = update.periodKey;
    state.history.push(update.transaction);
  }

  findByNumber(accountNumber: number): Account | null {
    return this.accounts.find((account) => account.number === accountNumber) ?? null;
  }

  /**
   * Accounts of one customer, in creation order
   */
  listByCustomer(document: string): readonly Account[] {
    return Object.freeze(this.accounts.filter((account) => account.customerDocument === document));
  }

  /**
   * Snapshot of all accounts in creation order
   */
  list(): readonly Account[] {
    return Object.freeze([...this.accounts]);
  }
}
