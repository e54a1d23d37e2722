/**
 * Accounts Domain
 *
 * Exports for the account registry
 */

export { AccountRepository } from './account-repository.js';
export { AccountService } from './account-service.js';
export type { AccountServiceOptions } from './account-service.js';
export type { Account, AccountSummary, AccountUpdate, CreateAccountData } from './account-types.js';
export { AccountError, AccountNotFoundError } from './account-errors.js';
