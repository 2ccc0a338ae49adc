// Reply unwrapping for request-response operations
// Live restates a query's identifying arguments before the payload; how many
// it restates is declared per query (see operations.ts)

import { MalformedResponseError } from '../errors.js';
import type { OscValue } from '../types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('osc.gateway');

/**
 * Converts one reply value, or returns undefined when it has the wrong type
 */
export type ValueDecoder<T> = (value: OscValue) => T | undefined;

/**
 * Number of leading reply values echoing the request
 * 0 for song-level queries, 1 per track/scene, 2 per clip/device, 3 per parameter
 */
export type EchoCount = 0 | 1 | 2 | 3;

/**
 * Declared reply shape of a single-value query
 */
export interface QuerySpec<T> {
  readonly address: string;
  readonly echo: EchoCount;
  readonly decode: ValueDecoder<T>;
  /** Returned for an empty reply instead of failing */
  readonly emptyDefault?: T;
}

/**
 * Declared reply shape of a query answered with a list of values after the echo
 */
export interface ListSpec<T> {
  readonly address: string;
  readonly echo: EchoCount;
  readonly decode: ValueDecoder<T>;
}

/**
 * Declared reply shape of a record-list query:
 * echo values, a record count, then count × recordSize values
 */
export interface RecordListSpec<T> {
  readonly address: string;
  readonly echo: EchoCount;
  readonly recordSize: number;
  readonly decodeRecord: (values: readonly OscValue[]) => T | undefined;
}

// ============================================================================
// Value decoders
// ============================================================================

export const Decoders = {
  number: (value: OscValue): number | undefined => {
    if (typeof value === 'number') {
      return value;
    }
    if (typeof value === 'boolean') {
      return value ? 1 : 0;
    }
    return undefined;
  },

  integer: (value: OscValue): number | undefined => {
    const n = Decoders.number(value);
    return n === undefined ? undefined : Math.trunc(n);
  },

  boolean: (value: OscValue): boolean | undefined => {
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'number') {
      return value !== 0;
    }
    return undefined;
  },

  string: (value: OscValue): string => String(value),
} as const;

// ============================================================================
// Unwrapping
// ============================================================================

/**
 * Extract the payload of a single-value reply
 *
 * Legal shapes: the declared echo followed by the payload, or a shorter
 * reply (bare payload, partial echo) whose last value is the payload.
 *
 * @param requestArgs - Plain values sent with the query, compared against the echo
 * @throws MalformedResponseError
 */
export function unwrapValue<T>(spec: QuerySpec<T>, args: readonly OscValue[], requestArgs: readonly OscValue[]): T {
  if (args.length === 0) {
    if (spec.emptyDefault !== undefined) {
      logger.debug('Empty reply, using default', { address: spec.address, value: spec.emptyDefault });
      return spec.emptyDefault;
    }
    throw new MalformedResponseError(spec.address, args, 'empty response');
  }

  let raw: OscValue | undefined;
  if (args.length > spec.echo) {
    checkEcho(spec.address, spec.echo, args, requestArgs);
    raw = args[spec.echo];
  } else {
    // Bare payload, or only part of the echo: the payload is the last value
    raw = args[args.length - 1];
  }

  if (raw === undefined) {
    throw new MalformedResponseError(spec.address, args, 'empty response');
  }

  const value = spec.decode(raw);
  if (value === undefined) {
    throw new MalformedResponseError(spec.address, args, `unexpected ${typeof raw} payload`);
  }
  return value;
}

/**
 * Extract every value after the echo
 * An empty reply or a bare echo yields an empty list
 */
export function unwrapList<T>(spec: ListSpec<T>, args: readonly OscValue[], requestArgs: readonly OscValue[]): T[] {
  if (args.length <= spec.echo) {
    return [];
  }
  checkEcho(spec.address, spec.echo, args, requestArgs);

  return args.slice(spec.echo).map((raw) => {
    const value = spec.decode(raw);
    if (value === undefined) {
      throw new MalformedResponseError(spec.address, args, `unexpected ${typeof raw} list entry`);
    }
    return value;
  });
}

/**
 * Decode a count-prefixed record list
 * An empty reply yields an empty list; a list shorter than its count is malformed
 */
export function unwrapRecords<T>(
  spec: RecordListSpec<T>,
  args: readonly OscValue[],
  requestArgs: readonly OscValue[]
): T[] {
  if (args.length === 0) {
    return [];
  }

  const countValue = args[spec.echo];
  if (countValue === undefined) {
    throw new MalformedResponseError(spec.address, args, 'missing record count');
  }
  checkEcho(spec.address, spec.echo, args, requestArgs);

  const count = typeof countValue === 'number' ? countValue : Number.NaN;
  if (!Number.isInteger(count) || count < 0) {
    throw new MalformedResponseError(spec.address, args, `invalid record count ${String(countValue)}`);
  }

  const data = args.slice(spec.echo + 1);
  const needed = count * spec.recordSize;
  if (data.length < needed) {
    throw new MalformedResponseError(
      spec.address,
      args,
      `expected ${count} records (${needed} values), got ${data.length} values`
    );
  }
  if (data.length > needed) {
    logger.debug('Ignoring trailing values after records', { address: spec.address, extra: data.length - needed });
  }

  const records: T[] = [];
  for (let i = 0; i < count; i++) {
    const values = data.slice(i * spec.recordSize, (i + 1) * spec.recordSize);
    const record = spec.decodeRecord(values);
    if (record === undefined) {
      throw new MalformedResponseError(spec.address, args, `record ${i} has unexpected value types`);
    }
    records.push(record);
  }
  return records;
}

/**
 * Warn when the echoed identifiers disagree with what was asked
 */
function checkEcho(address: string, echo: EchoCount, args: readonly OscValue[], requestArgs: readonly OscValue[]): void {
  if (echo === 0 || requestArgs.length < echo) {
    return;
  }
  for (let i = 0; i < echo; i++) {
    const sent = requestArgs[i];
    const received = args[i];
    // Live may echo an int as a float
    const same =
      typeof sent === 'number' && typeof received === 'number' ? sent === received : String(sent) === String(received);
    if (!same) {
      logger.warn('Reply echo does not match request', {
        address,
        expected: requestArgs.slice(0, echo),
        received: args.slice(0, echo),
      });
      return;
    }
  }
}
