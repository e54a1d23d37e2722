/**
 * @simple-bank/core - Domain logic for the bank simulator
 *
 * Customer and account registries, the transaction engine, and the context
 * factory that wires them together.
 */

export * from './accounts/index.js';
export * from './customers/index.js';
export * from './transactions/index.js';
export * from './events/index.js';
export * from './config/index.js';
export { BankError } from './errors.js';
export { createBank } from './bank.js';
export type { Bank, CreateBankOptions } from './bank.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { toCents, fromCents, formatCents } from './money.js';
