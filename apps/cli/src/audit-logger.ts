import type { BankEvent, BankEventEmitter } from '@simple-bank/core';
import type { Logger } from '@simple-bank/observability';

/**
 * Log every bank event through the structured logger.
 * Documents are redacted or masked by the logger itself.
 */
export function initializeAuditLogging(events: BankEventEmitter, logger: Logger): void {
  events.on((event) => handleBankEvent(event, logger));
  logger.debug('Audit logging initialized for bank events');
}

function handleBankEvent(event: BankEvent, logger: Logger): void {
  const timestamp = event.timestamp.toISOString();

  switch (event.type) {
    case 'customer.created':
      logger.info(
        { event: event.type, document: event.document, name: event.name, timestamp },
        'Customer created'
      );
      break;

    case 'account.opened':
      logger.info(
        {
          event: event.type,
          document: event.document,
          branch: event.branch,
          accountNumber: event.accountNumber,
          timestamp,
        },
        'Account opened'
      );
      break;

    case 'transaction.posted':
      logger.info(
        {
          event: event.type,
          accountNumber: event.accountNumber,
          kind: event.kind,
          amountCents: event.amountCents,
          balanceCents: event.balanceCents,
          timestamp,
        },
        'Transaction posted'
      );
      break;

    case 'transaction.rejected':
      logger.warn(
        {
          event: event.type,
          accountNumber: event.accountNumber,
          kind: event.kind,
          amount: event.amount,
          reason: event.reason,
          timestamp,
        },
        event.message
      );
      break;
  }
}
