/**
 * Customer Service
 *
 * Business logic layer for the customer registry.
 * Validates customer data and enforces document uniqueness.
 */

import { systemClock, type Clock } from '../clock.js';
import type { BankEventEmitter } from '../events/bank-events.js';
import type { CustomerRepository } from './customer-repository.js';
import {
  CustomerNotFoundError,
  DuplicateCustomerError,
  InvalidCustomerDataError,
  InvalidDocumentError,
} from './customer-errors.js';
import { CreateCustomerSchema } from './customer-types.js';
import type { CreateCustomerParams, Customer } from './customer-types.js';
import { cpfValidator, normalizeDocument, type DocumentValidator } from './document.js';

export interface CustomerServiceOptions {
  documentValidator?: DocumentValidator;
  clock?: Clock;
}

export class CustomerService {
  private readonly documentValidator: DocumentValidator;
  private readonly clock: Clock;

  constructor(
    private readonly customerRepo: CustomerRepository,
    private readonly events: BankEventEmitter,
    options: CustomerServiceOptions = {}
  ) {
    this.documentValidator = options.documentValidator ?? cpfValidator;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Register a new customer
   *
   * Business rules:
   * - Document is normalized (mask removed) and must pass the document validator
   * - Document must be unique across the registry
   * - Name, birth date and address must be non-empty
   * - Emits customer.created for audit logging
   */
  createCustomer(params: CreateCustomerParams): Customer {
    const document = this.assertDocumentAvailable(params.document);

    const result = CreateCustomerSchema.safeParse(params);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new InvalidCustomerDataError(`Validation failed: ${errors}`);
    }

    const customer = this.customerRepo.create({
      document,
      name: result.data.name,
      birthDate: result.data.birthDate,
      address: result.data.address,
      createdAt: this.clock(),
    });

    this.events.emit({
      type: 'customer.created',
      document: customer.document,
      name: customer.name,
    });

    return customer;
  }

  /**
   * Look up a customer by document (masked or bare digits)
   *
   * @throws CustomerNotFoundError if no customer holds the document
   */
  findCustomer(document: string): Customer {
    const normalized = normalizeDocument(document);
    const customer = this.customerRepo.findByDocument(normalized);

    if (!customer) {
      throw new CustomerNotFoundError(normalized);
    }

    return customer;
  }

  listCustomers(): readonly Customer[] {
    return this.customerRepo.list();
  }

  /**
   * Check that a document could register a new customer, so interactive
   * callers can fail before asking for the remaining fields.
   *
   * @returns the normalized document
   * @throws InvalidDocumentError
   * @throws DuplicateCustomerError
   */
  assertDocumentAvailable(raw: string): string {
    const document = normalizeDocument(raw);
    if (document === '' || !this.documentValidator.isValid(document)) {
      throw new InvalidDocumentError(document);
    }

    if (this.customerRepo.findByDocument(document)) {
      throw new DuplicateCustomerError(document);
    }

    return document;
  }
}
