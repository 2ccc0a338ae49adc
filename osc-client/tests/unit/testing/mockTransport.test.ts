// Unit tests for MockTransport

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockTransport } from '../../../src/testing/MockTransport.js';
import { ConnectionError, EncodingError, NotConnectedError } from '../../../src/errors.js';
import type { OscValue } from '../../../src/types.js';

const endpoint = { host: '127.0.0.1', sendPort: 11000, receivePort: 11001 };

describe('MockTransport', () => {
  let transport: MockTransport;
  let received: Array<[string, OscValue[]]>;

  beforeEach(() => {
    transport = new MockTransport();
    received = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const handler = (address: string, args: OscValue[]): void => {
    received.push([address, args]);
  };

  it('should record sent messages while connected', async () => {
    await transport.connect(endpoint, handler);
    transport.send('/live/song/start_playing');
    transport.send('/live/track/set/name', [0, 'Lead']);

    expect(transport.getSentMessages()).toEqual([
      { address: '/live/song/start_playing', args: [] },
      { address: '/live/track/set/name', args: [0, 'Lead'] },
    ]);
    expect(transport.getSentMessages('/live/track/set/name')).toHaveLength(1);
  });

  it('should refuse to send when disconnected', () => {
    expect(() => transport.send('/live/test')).toThrow(NotConnectedError);
  });

  it('should reject messages the encoder would reject', async () => {
    await transport.connect(endpoint, handler);

    expect(() => transport.send('no-slash')).toThrow(EncodingError);
    expect(transport.sentMessages).toHaveLength(0);
  });

  it('should answer on the microtask queue by default', async () => {
    await transport.connect(endpoint, handler);
    transport.respondTo('/live/song/get/tempo', [120]);

    transport.send('/live/song/get/tempo');
    expect(received).toEqual([]);
    await Promise.resolve();

    expect(received).toEqual([['/live/song/get/tempo', [120]]]);
  });

  it('should compute replies from the request arguments', async () => {
    await transport.connect(endpoint, handler);
    transport.respondTo('/live/track/get/name', (args) => [...args, 'Drums']);

    transport.send('/live/track/get/name', [3]);
    await Promise.resolve();

    expect(received).toEqual([['/live/track/get/name', [3, 'Drums']]]);
  });

  it('should delay replies and drop them after disconnect', async () => {
    vi.useFakeTimers();
    await transport.connect(endpoint, handler);
    transport.autoResponseDelay = 100;
    transport.respondTo('/live/test', ['ok']);

    transport.send('/live/test');
    await transport.disconnect();
    vi.advanceTimersByTime(100);

    expect(received).toEqual([]);
  });

  it('should inject messages only while connected', async () => {
    expect(() => transport.inject('/live/test')).toThrow('MockTransport: Cannot inject message while disconnected');

    await transport.connect(endpoint, handler);
    transport.inject('/live/song/get/beat', [1]);

    expect(received).toEqual([['/live/song/get/beat', [1]]]);
  });

  it('should fail the next connect once', async () => {
    transport.failNextConnect = new Error('port busy');

    await expect(transport.connect(endpoint, handler)).rejects.toThrow(ConnectionError);
    await transport.connect(endpoint, handler);

    expect(transport.isConnected()).toBe(true);
    expect(transport.connectCount).toBe(2);
  });

  it('should disconnect before reconnecting', async () => {
    await transport.connect(endpoint, handler);
    await transport.connect({ ...endpoint, sendPort: 9000 }, handler);

    expect(transport.disconnectCount).toBe(1);
    expect(transport.getEndpoint()?.sendPort).toBe(9000);
  });
});
