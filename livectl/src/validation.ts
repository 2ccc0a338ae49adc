/**
 * Input parsing and validation for command arguments and options
 */

import { ValidationError, TEMPO_MAX, TEMPO_MIN, type GatewayConfigInput } from '@live-osc/client';

/**
 * Connection options as commander hands them over (strings from argv or env)
 */
export interface ConnectionOptions {
  host?: string;
  sendPort?: string;
  receivePort?: string;
  timeout?: string;
}

const INTEGER = /^-?\d+$/;
const NUMBER = /^-?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parses a UDP port
 * @throws ValidationError if the value is not an integer in 1-65535
 */
export function parsePort(field: string, input: string): number {
  const trimmed = input.trim();
  const port = INTEGER.test(trimmed) ? Number(trimmed) : Number.NaN;

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError(field, `Invalid ${field}: ${input}. Must be 1-65535`, input, '1-65535');
  }
  return port;
}

/**
 * Parses a timeout in milliseconds
 * @throws ValidationError if the value is not a positive integer
 */
export function parseTimeout(input: string): number {
  const trimmed = input.trim();
  const timeout = INTEGER.test(trimmed) ? Number(trimmed) : Number.NaN;

  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ValidationError('timeout', `Invalid timeout: ${input}. Must be a positive number of milliseconds`, input, '> 0');
  }
  return timeout;
}

/**
 * Parses a track, clip or device index
 * @throws ValidationError if the value is not a non-negative integer
 */
export function parseIndex(field: string, input: string): number {
  const trimmed = input.trim();
  const index = INTEGER.test(trimmed) ? Number(trimmed) : Number.NaN;

  if (!Number.isInteger(index) || index < 0) {
    throw new ValidationError(field, `Invalid ${field}: ${input}. Must be a non-negative integer`, input, '>= 0');
  }
  return index;
}

/**
 * Parses a tempo in BPM
 * @throws ValidationError if the value is not a number within Live's tempo range
 */
export function parseTempo(input: string): number {
  const trimmed = input.trim();
  const bpm = NUMBER.test(trimmed) ? Number(trimmed) : Number.NaN;

  if (Number.isNaN(bpm) || bpm < TEMPO_MIN || bpm > TEMPO_MAX) {
    throw new ValidationError(
      'tempo',
      `Invalid tempo: ${input}. Must be ${TEMPO_MIN}-${TEMPO_MAX} BPM`,
      input,
      `${TEMPO_MIN}-${TEMPO_MAX}`
    );
  }
  return bpm;
}

/**
 * Turns connection options into gateway configuration
 * Options left unset fall back to the library defaults
 * @throws ValidationError if any option is invalid
 */
export function parseConnectionOptions(options: ConnectionOptions): GatewayConfigInput {
  const host = options.host?.trim();
  if (host !== undefined && host.length === 0) {
    throw new ValidationError('host', 'Host cannot be empty');
  }

  const timeout = options.timeout === undefined ? undefined : parseTimeout(options.timeout);

  return {
    host,
    sendPort: options.sendPort === undefined ? undefined : parsePort('send port', options.sendPort),
    receivePort: options.receivePort === undefined ? undefined : parsePort('receive port', options.receivePort),
    requestTimeout: timeout,
    connectionTimeout: timeout,
  };
}
