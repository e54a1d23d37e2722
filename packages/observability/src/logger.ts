import { pino, stdSerializers, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Redact customer PII from logs
 * - Document numbers (CPF)
 * - Birth dates and addresses
 */
const REDACTION_PATHS = [
  'document',
  'birthDate',
  'address',
  '*.document',
  '*.birthDate',
  '*.address',
];

const DOCUMENT_PATTERN = /\b\d{3}\.?\d{3}\.?\d{3}-?(\d{2})\b/g;

/**
 * Mask document numbers in a string, keeping the two check digits
 */
export function maskDocuments(value: string): string {
  return value.replace(DOCUMENT_PATTERN, '***.***.***-$1');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively mask documents in strings of plain objects and arrays.
 * Dates, errors and other class instances are left to the serializers.
 */
function maskObjectDocuments(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskDocuments(value);
  }
  if (Array.isArray(value)) {
    return value.map(maskObjectDocuments);
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(value)) {
      result[key] = maskObjectDocuments(value[key]);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Redaction of customer PII fields and masking of document numbers in messages
 * - Structured JSON output
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const settings: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: stdSerializers.err,
    },
    // Format timestamps as ISO 8601
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
      logMethod(args, method) {
        // Mask document numbers in every argument, message strings included
        for (let i = 0; i < args.length; i++) {
          args[i] = maskObjectDocuments(args[i]);
        }
        method.apply(this, args);
      },
    },
    ...options,
  };

  return destination ? pino(settings, destination) : pino(settings);
}
