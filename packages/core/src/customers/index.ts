/**
 * Customers Domain
 *
 * Exports for the customer registry
 */

export { CustomerRepository } from './customer-repository.js';
export { CustomerService } from './customer-service.js';
export type { CustomerServiceOptions } from './customer-service.js';
export { CreateCustomerSchema } from './customer-types.js';
export type { Customer, CreateCustomerParams } from './customer-types.js';
export { cpfValidator, normalizeDocument } from './document.js';
export type { DocumentValidator } from './document.js';

export {
  CustomerError,
  DuplicateCustomerError,
  CustomerNotFoundError,
  InvalidDocumentError,
  InvalidCustomerDataError,
} from './customer-errors.js';
