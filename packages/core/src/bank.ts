/**
 * Bank context
 *
 * Wires repositories and services into one explicit context. Each call
 * creates fresh registries and a fresh account counter.
 */

import { AccountRepository } from './accounts/account-repository.js';
import { AccountService } from './accounts/account-service.js';
import { systemClock, type Clock } from './clock.js';
import { loadBankConfig, type BankConfig } from './config/bank-config.js';
import { CustomerRepository } from './customers/customer-repository.js';
import { CustomerService } from './customers/customer-service.js';
import type { DocumentValidator } from './customers/document.js';
import { BankEventEmitter } from './events/bank-events.js';
import { createPeriodPolicy, type StatementPeriodPolicy } from './transactions/statement-period.js';
import { TransactionService } from './transactions/transaction-service.js';

export interface CreateBankOptions {
  config?: Partial<BankConfig>;
  clock?: Clock;
  documentValidator?: DocumentValidator;
  /** Overrides the policy selected by `config.statementPeriod` */
  periodPolicy?: StatementPeriodPolicy;
  events?: BankEventEmitter;
}

export interface Bank {
  config: BankConfig;
  events: BankEventEmitter;
  customers: CustomerService;
  accounts: AccountService;
  transactions: TransactionService;
}

export function createBank(options: CreateBankOptions = {}): Bank {
  const config: BankConfig = { ...loadBankConfig({}), ...options.config };
  const clock = options.clock ?? systemClock;
  const events = options.events ?? new BankEventEmitter({ clock });

  const customers = new CustomerService(new CustomerRepository(), events, {
    clock,
    ...(options.documentValidator && { documentValidator: options.documentValidator }),
  });

  const accountRepo = new AccountRepository();
  const accounts = new AccountService(accountRepo, customers, events, {
    branch: config.branch,
    dailyWithdrawalLimit: config.dailyWithdrawalLimit,
    withdrawalAmountLimit: config.withdrawalAmountLimit,
    clock,
  });

  const transactions = new TransactionService(accountRepo, events, {
    periodPolicy: options.periodPolicy ?? createPeriodPolicy(config.statementPeriod, config.timeZone),
    clock,
  });

  return { config, events, customers, accounts, transactions };
}
