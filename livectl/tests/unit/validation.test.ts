/**
 * Unit tests for argument and option parsing
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@live-osc/client';
import { parseConnectionOptions, parseIndex, parsePort, parseTempo, parseTimeout } from '../../src/validation.js';

function captureValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('Port Parsing', () => {
  // TC-001: Valid ports parse to numbers
  it('should accept ports in range', () => {
    expect(parsePort('send port', '11000')).toBe(11000);
    expect(parsePort('send port', ' 1 ')).toBe(1);
    expect(parsePort('receive port', '65535')).toBe(65535);
  });

  // TC-002: Out-of-range and non-numeric ports are rejected
  it('should reject invalid ports', () => {
    expect(() => parsePort('send port', '0')).toThrow(ValidationError);
    expect(() => parsePort('send port', '65536')).toThrow(ValidationError);
    expect(() => parsePort('send port', '11000.5')).toThrow(ValidationError);

    const error = captureValidationError(() => parsePort('send port', 'abc'));
    expect(error.field).toBe('send port');
    expect(error.message).toBe('Invalid send port: abc. Must be 1-65535');
    expect(error.actual).toBe('abc');
    expect(error.expected).toBe('1-65535');
  });
});

describe('Timeout Parsing', () => {
  // TC-003: Positive integer timeouts are accepted
  it('should accept positive integers', () => {
    expect(parseTimeout('250')).toBe(250);
  });

  // TC-004: Zero, negative and fractional timeouts are rejected
  it('should reject other values', () => {
    expect(() => parseTimeout('0')).toThrow(ValidationError);
    expect(() => parseTimeout('-5')).toThrow(ValidationError);
    expect(() => parseTimeout('1.5')).toThrow('Invalid timeout: 1.5. Must be a positive number of milliseconds');
  });
});

describe('Index Parsing', () => {
  // TC-005: Non-negative integers are accepted
  it('should accept non-negative integers', () => {
    expect(parseIndex('track', '0')).toBe(0);
    expect(parseIndex('clip', '12')).toBe(12);
  });

  // TC-006: Negative and non-integer indices are rejected
  it('should reject negative and non-integer indices', () => {
    const error = captureValidationError(() => parseIndex('track', '-1'));
    expect(error.field).toBe('track');
    expect(error.message).toBe('Invalid track: -1. Must be a non-negative integer');

    expect(() => parseIndex('device', 'first')).toThrow(ValidationError);
    expect(() => parseIndex('device', '')).toThrow(ValidationError);
  });
});

describe('Tempo Parsing', () => {
  // TC-007: Tempos within Live's range are accepted
  it('should accept tempos between 20 and 999', () => {
    expect(parseTempo('128')).toBe(128);
    expect(parseTempo('93.5')).toBe(93.5);
    expect(parseTempo('20')).toBe(20);
    expect(parseTempo('999')).toBe(999);
  });

  // TC-008: Out-of-range tempos are rejected with the accepted range
  it('should reject tempos outside the range', () => {
    expect(() => parseTempo('19.9')).toThrow(ValidationError);
    expect(() => parseTempo('1000')).toThrow(ValidationError);

    const error = captureValidationError(() => parseTempo('fast'));
    expect(error.field).toBe('tempo');
    expect(error.message).toBe('Invalid tempo: fast. Must be 20-999 BPM');
    expect(error.expected).toBe('20-999');
  });
});

describe('Connection Options', () => {
  // TC-009: Unset options are left to the library defaults
  it('should leave unset options undefined', () => {
    expect(parseConnectionOptions({})).toEqual({});
  });

  // TC-010: Set options are parsed and the timeout applies to both budgets
  it('should parse every option', () => {
    expect(
      parseConnectionOptions({ host: ' 10.0.0.2 ', sendPort: '9000', receivePort: '9001', timeout: '250' })
    ).toEqual({
      host: '10.0.0.2',
      sendPort: 9000,
      receivePort: 9001,
      requestTimeout: 250,
      connectionTimeout: 250,
    });
  });

  // TC-011: Invalid options are rejected before any connection
  it('should reject a blank host and invalid ports', () => {
    expect(() => parseConnectionOptions({ host: '   ' })).toThrow('Host cannot be empty');
    expect(() => parseConnectionOptions({ receivePort: '70000' })).toThrow(
      'Invalid receive port: 70000. Must be 1-65535'
    );
  });
});
