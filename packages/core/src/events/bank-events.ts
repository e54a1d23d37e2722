/**
 * Bank event emitter for audit logging
 * Handlers run synchronously, in registration order, after the state change
 */

import { systemClock, type Clock } from '../clock.js';
import type { TransactionKind } from '../transactions/transaction-types.js';

export type BankEventType =
  | 'customer.created'
  | 'account.opened'
  | 'transaction.posted'
  | 'transaction.rejected';

/**
 * Emitted after a customer is added to the registry
 */
export interface CustomerCreatedEvent {
  type: 'customer.created';
  document: string;
  name: string;
}

/**
 * Emitted after an account is opened for a customer
 */
export interface AccountOpenedEvent {
  type: 'account.opened';
  document: string;
  branch: string;
  accountNumber: number;
}

/**
 * Emitted after a deposit or withdrawal is appended to an account history
 */
export interface TransactionPostedEvent {
  type: 'transaction.posted';
  accountNumber: number;
  kind: TransactionKind;
  amountCents: number;
  balanceCents: number;
}

/**
 * Emitted when a deposit or withdrawal fails validation.
 * `amount` is the raw value the caller passed, which may not convert to cents.
 */
export interface TransactionRejectedEvent {
  type: 'transaction.rejected';
  accountNumber: number;
  kind: TransactionKind;
  amount: number;
  reason: string;
  message: string;
}

export type BankEventPayload =
  | CustomerCreatedEvent
  | AccountOpenedEvent
  | TransactionPostedEvent
  | TransactionRejectedEvent;

export type BankEvent = BankEventPayload & { timestamp: Date };

export type BankEventHandler = (event: BankEvent) => void;

export interface BankEventEmitterOptions {
  clock?: Clock;
  onHandlerError?: (error: unknown, event: BankEvent) => void;
}

export class BankEventEmitter {
  private handlers: BankEventHandler[] = [];
  private readonly clock: Clock;
  private readonly onHandlerError: (error: unknown, event: BankEvent) => void;

  constructor(options: BankEventEmitterOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.onHandlerError =
      options.onHandlerError ??
      ((error) => {
        console.error('Bank event handler error:', error);
      });
  }

  on(handler: BankEventHandler): void {
    this.handlers.push(handler);
  }

  emit(event: BankEventPayload): void {
    const fullEvent: BankEvent = {
      ...event,
      timestamp: this.clock(),
    };

    // A failing handler must not undo or abort the operation that emitted
    for (const handler of this.handlers) {
      try {
        handler(fullEvent);
      } catch (error) {
        this.onHandlerError(error, fullEvent);
      }
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers(): void {
    this.handlers = [];
  }
}
