/**
 * Tests for logger redaction functionality
 * Verifies that customer PII is redacted or masked before it is written
 */

import { describe, it, expect } from 'vitest';
import { createLogger, maskDocuments } from '../logger.js';
import * as observability from '../index.js';

function captureLogger() {
  const logs: string[] = [];
  const stream = {
    write: (log: string) => {
      logs.push(log);
    },
  };
  const logger = createLogger({ level: 'info' }, stream);
  const entry = (index = 0): Record<string, unknown> => {
    expect(logs[index]).toBeDefined();
    return JSON.parse(logs[index] ?? '{}');
  };
  return { logger, logs, entry };
}

describe('maskDocuments', () => {
  it('should mask bare and formatted documents', () => {
    expect(maskDocuments('cpf 52998224725')).toBe('cpf ***.***.***-25');
    expect(maskDocuments('cpf 529.982.247-25')).toBe('cpf ***.***.***-25');
  });

  it('should mask several documents in one string', () => {
    expect(maskDocuments('52998224725 and 11144477735')).toBe(
      '***.***.***-25 and ***.***.***-35'
    );
  });

  it('should leave shorter numbers alone', () => {
    expect(maskDocuments('account 12 balance 7000')).toBe('account 12 balance 7000');
  });
});

describe('createLogger', () => {
  describe('PII Redaction', () => {
    it('should redact document, birth date and address fields', () => {
      const { logger, entry } = captureLogger();

      logger.info({ document: '52998224725', birthDate: '1990-01-01', address: 'Rua A', name: 'Ana' });

      const log = entry();
      expect(log.document).toBe('[REDACTED]');
      expect(log.birthDate).toBe('[REDACTED]');
      expect(log.address).toBe('[REDACTED]');
      expect(log.name).toBe('Ana');
    });

    it('should redact nested customer fields', () => {
      const { logger, entry } = captureLogger();

      logger.info({ customer: { document: '52998224725', name: 'Ana' } });

      expect(entry().customer).toEqual({ document: '[REDACTED]', name: 'Ana' });
    });
  });

  describe('Document Masking', () => {
    it('should mask documents in messages', () => {
      const { logger, entry } = captureLogger();

      logger.info('Customer 529.982.247-25 not found');

      expect(entry().msg).toBe('Customer ***.***.***-25 not found');
    });

    it('should mask documents in unredacted string fields', () => {
      const { logger, entry } = captureLogger();

      logger.warn({ message: 'A customer with document 52998224725 already exists' }, 'rejected');

      const log = entry();
      expect(log.message).toBe('A customer with document ***.***.***-25 already exists');
      expect(log.msg).toBe('rejected');
    });
  });

  describe('Non-Sensitive Data', () => {
    it('should not alter account data', () => {
      const { logger, entry } = captureLogger();

      logger.info({ accountNumber: 3, branch: '0001', balanceCents: 7000 });

      const log = entry();
      expect(log.accountNumber).toBe(3);
      expect(log.branch).toBe('0001');
      expect(log.balanceCents).toBe(7000);
    });
  });

  describe('Timestamp Format', () => {
    it('should format timestamps as ISO 8601', () => {
      const { logger, entry } = captureLogger();

      logger.info('test');

      expect(entry().time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });
  });

  it('should respect the configured level', () => {
    const { logger, logs } = captureLogger();

    logger.debug('hidden');

    expect(logs).toHaveLength(0);
  });
});

describe('package exports', () => {
  it('should expose the factory without building a logger on import', () => {
    expect(Object.keys(observability).sort()).toEqual(['createLogger', 'maskDocuments']);
  });
});
