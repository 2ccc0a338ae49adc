// Custom error classes for the Live OSC client
// Extends Error with type-safe error hierarchy

import type { OscValue } from './types.js';

/**
 * Base error class for all Live OSC client errors
 */
export class LiveOscError extends Error {
  public override readonly name: string = 'LiveOscError';

  constructor(message: string) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Connection error - bind, resolve or probe failure
 * The connect attempt is fully rolled back before this is thrown
 */
export class ConnectionError extends LiveOscError {
  public override readonly name = 'ConnectionError';
  public readonly endpoint?: string;
  public override readonly cause?: Error;

  constructor(message: string, endpoint?: string, cause?: Error) {
    super(message);
    this.endpoint = endpoint;
    this.cause = cause;
  }
}

/**
 * Not connected error - operation attempted while disconnected
 */
export class NotConnectedError extends LiveOscError {
  public override readonly name = 'NotConnectedError';
  public readonly address?: string;

  constructor(address?: string) {
    super(address === undefined ? 'Not connected to Live' : `Not connected to Live (${address})`);
    this.address = address;
  }
}

/**
 * Timeout error - no correlated reply within budget
 */
export class TimeoutError extends LiveOscError {
  public override readonly name = 'TimeoutError';
  public readonly address: string;
  public readonly timeoutMs: number;

  constructor(address: string, timeoutMs: number) {
    super(`No response on ${address} within ${timeoutMs}ms`);
    this.address = address;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Cancelled error - pending wait cancelled before a reply arrived
 */
export class CancelledError extends LiveOscError {
  public override readonly name = 'CancelledError';
  public readonly address: string;

  constructor(address: string, message?: string) {
    super(message ?? `Request on ${address} was cancelled`);
    this.address = address;
  }
}

/**
 * Encoding error - argument cannot be put on the wire
 */
export class EncodingError extends LiveOscError {
  public override readonly name = 'EncodingError';
  public readonly address?: string;

  constructor(message: string, address?: string) {
    super(`Encoding error: ${message}`);
    this.address = address;
  }
}

/**
 * Decoding error - malformed inbound bytes
 */
export class DecodingError extends LiveOscError {
  public override readonly name = 'DecodingError';
  public readonly offset?: number;

  constructor(message: string, offset?: number) {
    super(`Decoding error: ${message}`);
    this.offset = offset;
  }
}

/**
 * Validation error - thrown synchronously for invalid input, before any I/O
 */
export class ValidationError extends LiveOscError {
  public override readonly name = 'ValidationError';

  constructor(
    public readonly field: string,
    message: string,
    public readonly actual?: string | number,
    public readonly expected?: string
  ) {
    super(message);
  }
}

/**
 * Malformed response error - reply does not have the declared shape
 */
export class MalformedResponseError extends LiveOscError {
  public override readonly name = 'MalformedResponseError';
  public readonly address: string;
  public readonly args: readonly OscValue[];

  constructor(address: string, args: readonly OscValue[], message: string) {
    super(`Malformed response on ${address}: ${message}`);
    this.address = address;
    this.args = args;
  }
}
