/**
 * Customer Repository
 *
 * In-memory data access for customers, keyed by normalized document.
 * No business rules beyond keeping insertion order.
 */

import type { Customer } from './customer-types.js';

export class CustomerRepository {
  private readonly customers = new Map<string, Customer>();

  findByDocument(document: string): Customer | null {
    return this.customers.get(document) ?? null;
  }

  /**
   * Store a customer. The caller is responsible for uniqueness checks.
   */
  create(customer: Customer): Customer {
    this.customers.set(customer.document, customer);
    return customer;
  }

  /**
   * All customers in registration order
   */
  list(): readonly Customer[] {
    return Array.from(this.customers.values());
  }

  count(): number {
    return this.customers.size;
  }
}
