/**
 * Account Domain Errors
 */

import { BankError } from '../errors.js';

export class AccountError extends BankError {}

export class AccountNotFoundError extends AccountError {
  constructor(public readonly accountNumber: number) {
    super(`Account not found: ${accountNumber}`);
  }
}
