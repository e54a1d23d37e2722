/**
 * Interactive bank menu
 *
 * Each option runs one core operation. Domain errors end the current
 * operation with a message and return to the menu.
 */

import { BankError, type Account, type Bank, type Customer } from '@simple-bank/core';
import type { Logger } from '@simple-bank/observability';
import { formatAccountSummary, formatStatement, type MoneyFormatter } from './format.js';
import type { Prompter } from './prompter.js';

export const MENU_TEXT = `
================ MENU ================
[1] Deposit
[2] Withdraw
[3] Statement
[4] New customer
[5] New account
[6] List accounts
[0] Quit
======================================
=> `;

const DOCUMENT_PROMPT = 'Customer document (e.g. 123.456.789-09): ';

export type Output = (text: string) => void;

export interface BankMenuOptions {
  bank: Bank;
  prompter: Prompter;
  output: Output;
  money: MoneyFormatter;
  logger: Logger;
}

/**
 * Parse a typed amount, accepting a decimal comma ("10,50")
 */
export function parseAmount(input: string): number | null {
  const normalized = input.trim().replace(',', '.');
  if (!/^-?\d+(\.\d+)?$/.test(normalized)) {
    return null;
  }
  return Number(normalized);
}

export class BankMenu {
  private readonly bank: Bank;
  private readonly prompter: Prompter;
  private readonly output: Output;
  private readonly money: MoneyFormatter;
  private readonly logger: Logger;

  constructor(options: BankMenuOptions) {
    this.bank = options.bank;
    this.prompter = options.prompter;
    this.output = options.output;
    this.money = options.money;
    this.logger = options.logger;
  }

  /**
   * Run until the user quits or input closes
   */
  async run(): Promise<void> {
    for (;;) {
      const option = await this.prompter.ask(MENU_TEXT);
      if (option === null || option.trim() === '0') {
        return;
      }

      await this.runOption(option.trim());
    }
  }

  private async runOption(option: string): Promise<void> {
    try {
      switch (option) {
        case '1':
          return await this.deposit();
        case '2':
          return await this.withdraw();
        case '3':
          return await this.statement();
        case '4':
          return await this.createCustomer();
        case '5':
          return await this.createAccount();
        case '6':
          return this.listAccounts();
        default:
          this.output('\n@@@ Invalid option, please choose again. @@@');
      }
    } catch (error) {
      if (error instanceof BankError) {
        this.output(`\n@@@ Operation failed: ${error.message} @@@`);
        return;
      }
      this.logger.error({ err: error, option }, 'Menu operation failed');
      throw error;
    }
  }

  private async deposit(): Promise<void> {
    const customer = await this.askCustomer();
    if (!customer) return;

    const amount = await this.askAmount('Deposit amount: ');
    if (amount === null) return;

    const account = await this.chooseAccount(customer);
    if (!account) return;

    this.bank.transactions.deposit(account, amount);
    this.output('\n=== Deposit completed. ===');
  }

  private async withdraw(): Promise<void> {
    const customer = await this.askCustomer();
    if (!customer) return;

    const amount = await this.askAmount('Withdrawal amount: ');
    if (amount === null) return;

    const account = await this.chooseAccount(customer);
    if (!account) return;

    this.bank.transactions.withdraw(account, amount);
    this.output('\n=== Withdrawal completed. ===');
  }

  private async statement(): Promise<void> {
    const customer = await this.askCustomer();
    if (!customer) return;

    const account = await this.chooseAccount(customer);
    if (!account) return;

    const statement = this.bank.transactions.statement(account);
    this.output(
      formatStatement(statement, { money: this.money, timeZone: this.bank.config.timeZone })
    );
  }

  private async createCustomer(): Promise<void> {
    const rawDocument = await this.prompter.ask(DOCUMENT_PROMPT);
    if (rawDocument === null) return;

    const document = this.bank.customers.assertDocumentAvailable(rawDocument);

    const name = await this.prompter.ask('Full name: ');
    if (name === null) return;
    const birthDate = await this.prompter.ask('Birth date (dd-mm-yyyy): ');
    if (birthDate === null) return;
    const address = await this.prompter.ask('Address (street, number - district - city/state): ');
    if (address === null) return;

    this.bank.customers.createCustomer({ document, name, birthDate, address });
    this.output('\n=== Customer created. ===');
  }

  private async createAccount(): Promise<void> {
    const document = await this.prompter.ask(DOCUMENT_PROMPT);
    if (document === null) return;

    const account = this.bank.accounts.createAccount(document);
    this.output(`\n=== Account created: branch ${account.branch}, number ${account.number}. ===`);
  }

  private listAccounts(): void {
    const accounts = this.bank.accounts.listAccounts();
    if (accounts.length === 0) {
      this.output('\nNo accounts opened yet.');
      return;
    }

    for (const account of accounts) {
      this.output('='.repeat(40));
      this.output(formatAccountSummary(this.bank.accounts.summarize(account), this.money));
    }
  }

  private async askCustomer(): Promise<Customer | null> {
    const document = await this.prompter.ask(DOCUMENT_PROMPT);
    if (document === null) return null;

    return this.bank.customers.findCustomer(document);
  }

  private async askAmount(question: string): Promise<number | null> {
    const input = await this.prompter.ask(question);
    if (input === null) return null;

    const amount = parseAmount(input);
    if (amount === null) {
      this.output('\n@@@ Invalid value. @@@');
    }
    return amount;
  }

  /**
   * Pick one of the customer's accounts; asks only when there are several
   */
  private async chooseAccount(customer: Customer): Promise<Account | null> {
    const accounts = this.bank.accounts.listCustomerAccounts(customer.document);
    const [first] = accounts;

    if (!first) {
      this.output('\n@@@ Customer has no account. @@@');
      return null;
    }
    if (accounts.length === 1) {
      return first;
    }

    this.output('\nChoose the account:');
    accounts.forEach((account, index) => {
      this.output(`${index + 1}: ${account.number} - Balance: ${this.money(account.balanceCents)}`);
    });

    const answer = await this.prompter.ask('Account position: ');
    if (answer === null) return null;

    const trimmed = answer.trim();
    const position = /^\d+$/.test(trimmed) ? Number(trimmed) : 0;
    const chosen = position >= 1 ? accounts[position - 1] : undefined;
    if (!chosen) {
      this.output('\n@@@ Invalid choice. @@@');
      return null;
    }
    return chosen;
  }
}
