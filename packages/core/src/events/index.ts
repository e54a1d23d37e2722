export { BankEventEmitter } from './bank-events.js';
export type {
  BankEvent,
  BankEventType,
  BankEventPayload,
  BankEventHandler,
  BankEventEmitterOptions,
  CustomerCreatedEvent,
  AccountOpenedEvent,
  TransactionPostedEvent,
  TransactionRejectedEvent,
} from './bank-events.js';
