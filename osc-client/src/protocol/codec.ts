// OSC wire codec: messages and single-level bundles
// Byte-level only, no knowledge of what an address means

import { DecodingError, EncodingError } from '../errors.js';
import type { OscArgument, OscMessage, OscValue } from '../types.js';
import { OscArg } from '../types.js';
import { BUNDLE_HEADER, IMMEDIATE_TIMETAG, INT32_MAX, INT32_MIN, TypeTag } from './constants.js';

// ============================================================================
// Encoding Primitives
// ============================================================================

function padding(length: number): number {
  return (4 - (length % 4)) % 4;
}

/**
 * Encode an OSC string: UTF-8, NUL-terminated, padded to a multiple of 4 bytes
 */
export function encodeString(str: string): Buffer {
  const utf8 = Buffer.from(str, 'utf8');
  const terminated = utf8.length + 1;
  const buffer = Buffer.alloc(terminated + padding(terminated));
  utf8.copy(buffer, 0);
  return buffer;
}

export function encodeInt32(value: number): Buffer {
  const buffer = Buffer.allocUnsafe(4);
  buffer.writeInt32BE(value, 0);
  return buffer;
}

export function encodeFloat32(value: number): Buffer {
  const buffer = Buffer.allocUnsafe(4);
  buffer.writeFloatBE(value, 0);
  return buffer;
}

export function encodeFloat64(value: number): Buffer {
  const buffer = Buffer.allocUnsafe(8);
  buffer.writeDoubleBE(value, 0);
  return buffer;
}

function encodeInt(value: number, address: string): Buffer {
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new EncodingError(`int argument out of int32 range: ${value}`, address);
  }
  return encodeInt32(value);
}

/**
 * Encode a single argument, returning its type tag and data bytes
 */
function encodeArgument(arg: OscArgument, address: string): { tag: TypeTag; data: Buffer } {
  if (OscArg.isTyped(arg)) {
    switch (arg.type) {
      case 'int':
        return { tag: TypeTag.Int32, data: encodeInt(arg.value, address) };
      case 'float':
        return { tag: TypeTag.Float32, data: encodeFloat32(arg.value) };
      case 'double':
        return { tag: TypeTag.Float64, data: encodeFloat64(arg.value) };
    }
  }

  switch (typeof arg) {
    case 'string':
      return { tag: TypeTag.String, data: encodeString(arg) };
    case 'boolean':
      return { tag: arg ? TypeTag.True : TypeTag.False, data: Buffer.alloc(0) };
    case 'number':
      if (Number.isInteger(arg) && arg >= INT32_MIN && arg <= INT32_MAX) {
        return { tag: TypeTag.Int32, data: encodeInt32(arg) };
      }
      return { tag: TypeTag.Float32, data: encodeFloat32(arg) };
    default:
      throw new EncodingError(`unsupported argument type: ${describe(arg)}`, address);
  }
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

/**
 * Encode one OSC message
 * Format: [address][,typetags][argument data...]
 */
export function encodeMessage(address: string, args: readonly OscArgument[] = []): Buffer {
  if (typeof address !== 'string' || !address.startsWith('/')) {
    throw new EncodingError(`address must start with "/": ${String(address)}`);
  }

  let tags = ',';
  const data: Buffer[] = [];
  for (const arg of args) {
    const encoded = encodeArgument(arg, address);
    tags += encoded.tag;
    data.push(encoded.data);
  }

  return Buffer.concat([encodeString(address), encodeString(tags), ...data]);
}

/**
 * Encode a bundle of messages (one level, no nested bundles)
 * Format: ["#bundle\0"][timetag:8][size:4][message]...
 */
export function encodeBundle(messages: readonly OscMessage[], timetag: bigint = IMMEDIATE_TIMETAG): Buffer {
  const header = Buffer.allocUnsafe(8);
  header.writeBigUInt64BE(timetag, 0);

  const parts: Buffer[] = [BUNDLE_HEADER, header];
  for (const message of messages) {
    const encoded = encodeMessage(message.address, message.args);
    parts.push(encodeInt32(encoded.length), encoded);
  }
  return Buffer.concat(parts);
}

// ============================================================================
// Decoding Primitives
// ============================================================================

/**
 * Decode an OSC string at offset
 * @returns Decoded string and the offset just past its padding
 */
export function decodeString(buffer: Buffer, offset: number): { value: string; next: number } {
  const end = buffer.indexOf(0, offset);
  if (end === -1) {
    throw new DecodingError('unterminated string', offset);
  }
  const terminated = end + 1 - offset;
  const next = offset + terminated + padding(terminated);
  if (next > buffer.length) {
    throw new DecodingError('string padding runs past end of packet', offset);
  }
  return { value: buffer.toString('utf8', offset, end), next };
}

function requireBytes(buffer: Buffer, offset: number, count: number, what: string): void {
  if (offset + count > buffer.length) {
    throw new DecodingError(`truncated ${what} argument`, offset);
  }
}

/**
 * Decode a single (non-bundle) message
 */
export function decodeMessage(buffer: Buffer): OscMessage {
  if (buffer.length === 0 || buffer[0] !== 0x2f) {
    // '/'
    throw new DecodingError('message must start with an address', 0);
  }

  const address = decodeString(buffer, 0);
  let offset = address.next;

  // A message without a type tag string carries no arguments
  if (offset >= buffer.length) {
    return { address: address.value, args: [] };
  }

  const tags = decodeString(buffer, offset);
  if (!tags.value.startsWith(',')) {
    throw new DecodingError('type tag string must start with ","', offset);
  }
  offset = tags.next;

  const args: OscValue[] = [];
  for (const tag of tags.value.slice(1)) {
    switch (tag) {
      case TypeTag.Int32:
        requireBytes(buffer, offset, 4, 'int32');
        args.push(buffer.readInt32BE(offset));
        offset += 4;
        break;
      case TypeTag.Float32:
        requireBytes(buffer, offset, 4, 'float32');
        args.push(buffer.readFloatBE(offset));
        offset += 4;
        break;
      case TypeTag.Float64:
        requireBytes(buffer, offset, 8, 'float64');
        args.push(buffer.readDoubleBE(offset));
        offset += 8;
        break;
      case TypeTag.String: {
        const str = decodeString(buffer, offset);
        args.push(str.value);
        offset = str.next;
        break;
      }
      case TypeTag.True:
        args.push(true);
        break;
      case TypeTag.False:
        args.push(false);
        break;
      default:
        throw new DecodingError(`unsupported type tag "${tag}"`, offset);
    }
  }

  return { address: address.value, args };
}

export function isBundle(buffer: Buffer): boolean {
  return buffer.length >= BUNDLE_HEADER.length && buffer.subarray(0, BUNDLE_HEADER.length).equals(BUNDLE_HEADER);
}

/**
 * Decode a datagram into zero or more logical messages
 * Elements of a bundle that are themselves bundles are skipped
 */
export function decodePacket(buffer: Buffer): OscMessage[] {
  if (!isBundle(buffer)) {
    return [decodeMessage(buffer)];
  }

  let offset = BUNDLE_HEADER.length;
  if (offset + 8 > buffer.length) {
    throw new DecodingError('truncated bundle timetag', offset);
  }
  offset += 8;

  const messages: OscMessage[] = [];
  while (offset < buffer.length) {
    if (offset + 4 > buffer.length) {
      throw new DecodingError('truncated bundle element size', offset);
    }
    const size = buffer.readInt32BE(offset);
    offset += 4;
    if (size <= 0 || size % 4 !== 0 || offset + size > buffer.length) {
      throw new DecodingError(`invalid bundle element size ${size}`, offset - 4);
    }

    const element = buffer.subarray(offset, offset + size);
    if (!isBundle(element)) {
      messages.push(decodeMessage(element));
    }
    offset += size;
  }

  return messages;
}
