// OSC codec unit tests
// Byte layout of encoded messages, decoding of every supported tag,
// bundles, and rejection of malformed input

import { describe, it, expect } from 'vitest';
import {
  decodeMessage,
  decodePacket,
  decodeString,
  encodeBundle,
  encodeInt32,
  encodeMessage,
  encodeString,
  isBundle,
} from '../../../src/protocol/codec.js';
import { BUNDLE_HEADER } from '../../../src/protocol/constants.js';
import { DecodingError, EncodingError } from '../../../src/errors.js';
import { OscArg } from '../../../src/types.js';

function bundleOf(...elements: Buffer[]): Buffer {
  const timetag = Buffer.alloc(8);
  timetag.writeBigUInt64BE(1n, 0);
  const parts: Buffer[] = [BUNDLE_HEADER, timetag];
  for (const element of elements) {
    parts.push(encodeInt32(element.length), element);
  }
  return Buffer.concat(parts);
}

describe('OSC Codec', () => {
  describe('Strings', () => {
    it('TC-CODEC-001: should NUL-terminate and pad strings to 4 bytes', () => {
      expect(encodeString('abc')).toEqual(Buffer.from('abc\0', 'ascii'));
      expect(encodeString('abcd')).toEqual(Buffer.from('abcd\0\0\0\0', 'ascii'));
      expect(encodeString('')).toEqual(Buffer.alloc(4));
    });

    it('TC-CODEC-002: should decode a string and report the padded end offset', () => {
      const buffer = Buffer.concat([encodeString('hello'), encodeString('x')]);

      expect(decodeString(buffer, 0)).toEqual({ value: 'hello', next: 8 });
      expect(decodeString(buffer, 8)).toEqual({ value: 'x', next: 12 });
    });

    it('TC-CODEC-003: should round-trip UTF-8 text', () => {
      const encoded = encodeMessage('/live/track/set/name', [0, 'Bäss ♪']);

      expect(decodeMessage(encoded).args).toEqual([0, 'Bäss ♪']);
    });
  });

  describe('Message Encoding', () => {
    it('TC-CODEC-010: should lay out address, type tags and int32 data', () => {
      const encoded = encodeMessage('/a', [1]);

      expect(encoded).toEqual(
        Buffer.concat([Buffer.from('/a\0\0,i\0\0', 'ascii'), Buffer.from([0x00, 0x00, 0x00, 0x01])])
      );
    });

    it('TC-CODEC-011: should write an empty type tag string for no arguments', () => {
      expect(encodeMessage('/live/test')).toEqual(Buffer.from('/live/test\0\0,\0\0\0', 'ascii'));
    });

    it('TC-CODEC-012: should encode integral numbers as int32 and others as float32', () => {
      const decoded = decodeMessage(encodeMessage('/n', [7, -3, 1.5]));

      expect(decoded.args).toEqual([7, -3, 1.5]);
      expect(encodeMessage('/n', [7, 1.5]).toString('ascii', 4, 8)).toBe(',if\0');
    });

    it('TC-CODEC-013: should encode integers outside int32 range as float32', () => {
      const encoded = encodeMessage('/n', [2 ** 31]);

      expect(encoded.toString('ascii', 4, 7)).toBe(',f\0');
      expect(decodeMessage(encoded).args).toEqual([2147483648]);
    });

    it('TC-CODEC-014: should honour explicitly typed numbers', () => {
      const encoded = encodeMessage('/n', [OscArg.int(3), OscArg.float(3), OscArg.double(0.1)]);

      expect(encoded.toString('ascii', 4, 8)).toBe(',ifd');
      expect(decodeMessage(encoded).args).toEqual([3, 3, 0.1]);
    });

    it('TC-CODEC-015: should encode booleans as T/F with no data bytes', () => {
      const encoded = encodeMessage('/b', [true, false]);

      expect(encoded).toEqual(Buffer.from('/b\0\0,TF\0', 'ascii'));
      expect(decodeMessage(encoded).args).toEqual([true, false]);
    });

    it('TC-CODEC-016: should reject addresses not starting with "/"', () => {
      expect(() => encodeMessage('live/test')).toThrow(EncodingError);
      expect(() => encodeMessage('')).toThrow('Encoding error: address must start with "/"');
    });

    it('TC-CODEC-017: should reject typed ints that are fractional or out of range', () => {
      expect(() => encodeMessage('/n', [OscArg.int(1.5)])).toThrow(EncodingError);
      expect(() => encodeMessage('/n', [OscArg.int(2 ** 31)])).toThrow(
        'Encoding error: int argument out of int32 range: 2147483648'
      );
    });
  });

  describe('Message Decoding', () => {
    it('TC-CODEC-020: should decode float32 values to the nearest double', () => {
      const decoded = decodeMessage(encodeMessage('/f', [OscArg.float(0.1)]));

      expect(decoded.args[0]).toBeCloseTo(0.1, 6);
    });

    it('TC-CODEC-021: should treat a message without type tags as having no arguments', () => {
      expect(decodeMessage(Buffer.from('/ping\0\0\0', 'ascii'))).toEqual({ address: '/ping', args: [] });
    });

    it('TC-CODEC-022: should reject data that does not start with an address', () => {
      expect(() => decodeMessage(Buffer.from('abc\0', 'ascii'))).toThrow(DecodingError);
      expect(() => decodeMessage(Buffer.alloc(0))).toThrow(DecodingError);
    });

    it('TC-CODEC-023: should reject an unterminated address', () => {
      expect(() => decodeMessage(Buffer.from('/abc', 'ascii'))).toThrow('Decoding error: unterminated string');
    });

    it('TC-CODEC-024: should reject a type tag string without a leading comma', () => {
      expect(() => decodeMessage(Buffer.from('/a\0\0i\0\0\0', 'ascii'))).toThrow(
        'Decoding error: type tag string must start with ","'
      );
    });

    it('TC-CODEC-025: should reject unknown type tags', () => {
      expect(() => decodeMessage(Buffer.from('/a\0\0,x\0\0', 'ascii'))).toThrow(
        'Decoding error: unsupported type tag "x"'
      );
    });

    it('TC-CODEC-026: should reject truncated arguments', () => {
      const encoded = encodeMessage('/a', [1]);

      expect(() => decodeMessage(encoded.subarray(0, 10))).toThrow('Decoding error: truncated int32 argument');
    });
  });

  describe('Bundles', () => {
    it('TC-CODEC-030: should write the bundle header and immediate timetag', () => {
      const bundle = encodeBundle([{ address: '/a', args: [] }]);

      expect(bundle.subarray(0, 8)).toEqual(BUNDLE_HEADER);
      expect(bundle.readBigUInt64BE(8)).toBe(1n);
      expect(bundle.readInt32BE(16)).toBe(8);
      expect(isBundle(bundle)).toBe(true);
      expect(isBundle(encodeMessage('/a'))).toBe(false);
    });

    it('TC-CODEC-031: should decode every message of a bundle in order', () => {
      const bundle = encodeBundle([
        { address: '/live/song/get/tempo', args: [120] },
        { address: '/live/track/get/name', args: [0, 'Drums'] },
      ]);

      expect(decodePacket(bundle)).toEqual([
        { address: '/live/song/get/tempo', args: [120] },
        { address: '/live/track/get/name', args: [0, 'Drums'] },
      ]);
    });

    it('TC-CODEC-032: should yield exactly one message for a plain packet', () => {
      expect(decodePacket(encodeMessage('/x', ['y']))).toEqual([{ address: '/x', args: ['y'] }]);
    });

    it('TC-CODEC-033: should yield no messages for an empty bundle', () => {
      expect(decodePacket(encodeBundle([]))).toEqual([]);
    });

    it('TC-CODEC-034: should skip nested bundles', () => {
      const inner = encodeBundle([{ address: '/inner', args: [] }]);
      const packet = bundleOf(inner, encodeMessage('/outer', [1]));

      expect(decodePacket(packet)).toEqual([{ address: '/outer', args: [1] }]);
    });

    it('TC-CODEC-035: should reject invalid element sizes', () => {
      const misaligned = Buffer.concat([bundleOf(), encodeInt32(6), Buffer.alloc(8)]);
      const overlong = Buffer.concat([bundleOf(), encodeInt32(64), encodeMessage('/a')]);

      expect(() => decodePacket(misaligned)).toThrow('Decoding error: invalid bundle element size 6');
      expect(() => decodePacket(overlong)).toThrow('Decoding error: invalid bundle element size 64');
    });

    it('TC-CODEC-036: should reject a truncated timetag', () => {
      const packet = Buffer.concat([BUNDLE_HEADER, Buffer.alloc(4)]);

      expect(() => decodePacket(packet)).toThrow('Decoding error: truncated bundle timetag');
    });

    it('TC-CODEC-037: should fail the whole bundle when one element is malformed', () => {
      const packet = bundleOf(encodeMessage('/ok', [1]), Buffer.from('/a\0\0,x\0\0', 'ascii'));

      expect(() => decodePacket(packet)).toThrow(DecodingError);
    });
  });
});
