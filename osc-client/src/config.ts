// Gateway configuration with validation and defaults
// Follows idiomatic TypeScript: plain object configuration, NOT builder pattern

import { ValidationError } from './errors.js';
import type { OscEndpoint } from './types.js';

/**
 * Gateway configuration
 */
export interface GatewayConfig extends OscEndpoint {
  readonly requestTimeout: number; // milliseconds, default 5000
  readonly connectionTimeout: number; // milliseconds, default 5000
  readonly parseErrorWarnThreshold: number; // consecutive decode failures, default 10
}

/**
 * Default configuration values
 */
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_SEND_PORT = 11000;
export const DEFAULT_RECEIVE_PORT = 11001;
export const DEFAULT_REQUEST_TIMEOUT = 5000; // 5 seconds
export const DEFAULT_CONNECTION_TIMEOUT = 5000; // 5 seconds
export const DEFAULT_PARSE_ERROR_WARN_THRESHOLD = 10;

/**
 * Longest delay a Node timer honours; larger values fire after 1ms
 */
export const MAX_TIMEOUT = 2 ** 31 - 1;

/**
 * Partial gateway configuration (user-provided)
 * Every field is optional
 */
export interface GatewayConfigInput {
  readonly host?: string;
  readonly sendPort?: number;
  readonly receivePort?: number;
  readonly requestTimeout?: number;
  readonly connectionTimeout?: number;
  readonly parseErrorWarnThreshold?: number;
}

function validatePort(field: 'sendPort' | 'receivePort', port: number): void {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError(field, `${field} must be an integer between 1 and 65535`, port, '1-65535');
  }
}

function validateTimeout(field: 'requestTimeout' | 'connectionTimeout', value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(field, `${field} must be positive`, value, '> 0');
  }
  if (value > MAX_TIMEOUT) {
    throw new ValidationError(field, `${field} must be at most ${MAX_TIMEOUT}ms`, value, `<= ${MAX_TIMEOUT}`);
  }
}

/**
 * Validate gateway configuration
 * Throws synchronous error if invalid
 */
export function validateConfig(config: GatewayConfig): void {
  if (config.host.trim().length === 0) {
    throw new ValidationError('host', 'host cannot be empty');
  }

  validatePort('sendPort', config.sendPort);
  validatePort('receivePort', config.receivePort);
  validateTimeout('requestTimeout', config.requestTimeout);
  validateTimeout('connectionTimeout', config.connectionTimeout);

  if (!Number.isInteger(config.parseErrorWarnThreshold) || config.parseErrorWarnThreshold < 1) {
    throw new ValidationError(
      'parseErrorWarnThreshold',
      'parseErrorWarnThreshold must be a positive integer',
      config.parseErrorWarnThreshold,
      '>= 1'
    );
  }
}

/**
 * Create a complete GatewayConfig from partial input
 * Applies defaults for missing values
 */
export function createConfig(input: GatewayConfigInput = {}): GatewayConfig {
  const config: GatewayConfig = {
    host: input.host ?? DEFAULT_HOST,
    sendPort: input.sendPort ?? DEFAULT_SEND_PORT,
    receivePort: input.receivePort ?? DEFAULT_RECEIVE_PORT,
    requestTimeout: input.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT,
    connectionTimeout: input.connectionTimeout ?? DEFAULT_CONNECTION_TIMEOUT,
    parseErrorWarnThreshold: input.parseErrorWarnThreshold ?? DEFAULT_PARSE_ERROR_WARN_THRESHOLD,
  };

  // Validate before returning
  validateConfig(config);

  return config;
}
