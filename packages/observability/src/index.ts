/**
 * @simple-bank/observability
 *
 * Structured logging for the bank simulator.
 */

export { createLogger, maskDocuments } from './logger.js';
export type { Logger } from 'pino';
