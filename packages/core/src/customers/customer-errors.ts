/**
 * Customer Domain Errors
 *
 * Custom error classes for customer registry rule violations.
 */

import { BankError } from '../errors.js';

export class CustomerError extends BankError {}

export class DuplicateCustomerError extends CustomerError {
  constructor(public readonly document: string) {
    super(`A customer with document ${document} already exists`);
  }
}

export class CustomerNotFoundError extends CustomerError {
  constructor(public readonly document: string) {
    super(`Customer not found: ${document}`);
  }
}

export class InvalidDocumentError extends CustomerError {
  constructor(public readonly document: string) {
    super(`Invalid document: ${document === '' ? '(empty)' : document}`);
  }
}

export class InvalidCustomerDataError extends CustomerError {}
