// LiveGateway unit tests against MockTransport
// Connection lifecycle, fire-and-forget commands, queries, validation

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LiveGateway } from '../../../src/gateway/liveGateway.js';
import { ResponseCorrelator } from '../../../src/correlator/responseCorrelator.js';
import { MockTransport } from '../../../src/testing/MockTransport.js';
import {
  CancelledError,
  ConnectionError,
  EncodingError,
  MalformedResponseError,
  NotConnectedError,
  TimeoutError,
  ValidationError,
} from '../../../src/errors.js';
import type {
  ConnectedEvent,
  DisconnectedEvent,
  RequestTimeoutEvent,
  UnmatchedResponseEvent,
} from '../../../src/events/eventTypes.js';
import { OscArg } from '../../../src/types.js';

const TEMPO = '/live/song/get/tempo';

describe('LiveGateway', () => {
  let transport: MockTransport;
  let gateway: LiveGateway;

  beforeEach(() => {
    transport = new MockTransport();
    transport.respondTo(TEMPO, [120]);
    gateway = new LiveGateway({ requestTimeout: 50, connectionTimeout: 50 }, transport);
  });

  describe('TC-GW-001: connect()', () => {
    it('should open the transport and probe tempo', async () => {
      const events: ConnectedEvent[] = [];
      gateway.on('connected', (evt) => events.push(evt));

      await gateway.connect();

      expect(gateway.isConnected()).toBe(true);
      expect(transport.getEndpoint()).toEqual({ host: '127.0.0.1', sendPort: 11000, receivePort: 11001 });
      expect(transport.getSentMessages(TEMPO)).toHaveLength(1);
      expect(events).toHaveLength(1);
      expect(events[0]?.tempo).toBe(120);
    });

    it('should apply endpoint overrides', async () => {
      await gateway.connect({ host: '10.0.0.5', sendPort: 9000 });

      expect(gateway.getEndpoint()).toEqual({ host: '10.0.0.5', sendPort: 9000, receivePort: 11001 });
    });

    it('should validate overrides before opening anything', async () => {
      await expect(gateway.connect({ sendPort: 0 })).rejects.toThrow(ValidationError);
      expect(transport.connectCount).toBe(0);
    });

    it('should roll back when Live does not answer the probe', async () => {
      const correlator = new ResponseCorrelator();
      transport.stopResponding(TEMPO);
      gateway = new LiveGateway({ connectionTimeout: 20 }, transport, correlator);
      let connectedEvents = 0;
      gateway.on('connected', () => {
        connectedEvents += 1;
      });

      await expect(gateway.connect()).rejects.toThrow(
        'Live did not respond within 20ms. Is AbletonOSC installed and enabled?'
      );

      expect(gateway.isConnected()).toBe(false);
      expect(transport.isConnected()).toBe(false);
      expect(transport.disconnectCount).toBe(1);
      expect(correlator.pendingCount()).toBe(0);
      expect(connectedEvents).toBe(0);
    });

    it('should report a probe timeout as ConnectionError with the timeout as cause', async () => {
      transport.stopResponding(TEMPO);

      const error = await gateway.connect().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectionError);
      if (error instanceof ConnectionError) {
        expect(error.cause).toBeInstanceOf(TimeoutError);
        expect(error.endpoint).toBe('127.0.0.1:11000');
      }
    });

    it('should roll back when the probe reply is malformed', async () => {
      transport.respondTo(TEMPO, ['fast']);

      await expect(gateway.connect()).rejects.toThrow('Connection probe failed: Malformed response');
      expect(transport.isConnected()).toBe(false);
    });

    it('should refuse user traffic while the probe is pending', async () => {
      transport.stopResponding(TEMPO);
      gateway = new LiveGateway({ connectionTimeout: 200 }, transport);

      const connectFailed = expect(gateway.connect()).rejects.toThrow(ConnectionError);
      await vi.waitFor(() => expect(transport.getSentMessages(TEMPO)).toHaveLength(1));

      expect(transport.isConnected()).toBe(true);
      expect(gateway.isConnected()).toBe(false);
      await expect(gateway.setTempo(130)).rejects.toThrow(NotConnectedError);
      await expect(gateway.request(TEMPO)).rejects.toThrow(NotConnectedError);
      expect(() => gateway.send('/live/song/start_playing')).toThrow(NotConnectedError);

      await connectFailed;
      expect(transport.getSentMessages()).toEqual([{ address: TEMPO, args: [] }]);
    });

    it('should surface transport failures as ConnectionError', async () => {
      transport.failNextConnect = new Error('EADDRINUSE');

      await expect(gateway.connect()).rejects.toThrow(ConnectionError);
      expect(gateway.isConnected()).toBe(false);
    });

    it('should disconnect and cancel in-flight requests when connecting again', async () => {
      await gateway.connect();
      const disconnects: DisconnectedEvent[] = [];
      gateway.on('disconnected', (evt) => disconnects.push(evt));

      const inFlight = gateway.getTrackName(0);
      const cancelled = expect(inFlight).rejects.toThrow(CancelledError);
      await gateway.connect();
      await cancelled;

      expect(gateway.isConnected()).toBe(true);
      expect(transport.connectCount).toBe(2);
      expect(disconnects).toHaveLength(1);
      expect(disconnects[0]).toMatchObject({ reason: 'reconnect', cancelledRequests: 1 });
    });
  });

  describe('TC-GW-002: disconnect()', () => {
    it('should cancel pending requests and close the transport', async () => {
      await gateway.connect();
      const disconnects: DisconnectedEvent[] = [];
      gateway.on('disconnected', (evt) => disconnects.push(evt));

      const pending = gateway.getTrackVolume(0);
      const cancelled = expect(pending).rejects.toThrow(CancelledError);
      await gateway.disconnect();
      await cancelled;

      expect(gateway.isConnected()).toBe(false);
      expect(transport.isConnected()).toBe(false);
      expect(disconnects).toHaveLength(1);
      expect(disconnects[0]).toMatchObject({ reason: 'client-shutdown', cancelledRequests: 1 });
    });

    it('should be idempotent', async () => {
      await gateway.connect();
      let count = 0;
      gateway.on('disconnected', () => {
        count += 1;
      });

      await gateway.disconnect();
      await gateway.disconnect();

      expect(count).toBe(1);
      expect(transport.disconnectCount).toBe(1);
    });

    it('should be safe when never connected', async () => {
      await expect(gateway.disconnect()).resolves.toBeUndefined();
    });
  });

  describe('TC-GW-003: not connected', () => {
    it('should reject queries and commands', async () => {
      await expect(gateway.getTempo()).rejects.toThrow(NotConnectedError);
      await expect(gateway.startPlaying()).rejects.toThrow('Not connected to Live (/live/song/start_playing)');
      expect(transport.sentMessages).toHaveLength(0);
    });
  });

  describe('TC-GW-004: fire-and-forget commands', () => {
    beforeEach(async () => {
      await gateway.connect();
      transport.clearSentMessages();
    });

    it('should send transport commands without arguments', async () => {
      await gateway.startPlaying();
      await gateway.stopPlaying();
      await gateway.jumpToNextCue();

      expect(transport.getSentMessages().map((m) => m.address)).toEqual([
        '/live/song/start_playing',
        '/live/song/stop_playing',
        '/live/song/jump_to_next_cue',
      ]);
      expect(transport.getLastSentMessage()?.args).toEqual([]);
    });

    it('should send tempo as float32', async () => {
      await gateway.setTempo(128);

      expect(transport.getLastSentMessage()).toEqual({
        address: '/live/song/set/tempo',
        args: [OscArg.float(128)],
      });
    });

    it('should send booleans as 1/0', async () => {
      await gateway.setTrackMute(2, true);
      await gateway.setMetronome(false);

      expect(transport.getSentMessages('/live/track/set/mute')[0]?.args).toEqual([OscArg.int(2), OscArg.int(1)]);
      expect(transport.getSentMessages('/live/song/set/metronome')[0]?.args).toEqual([OscArg.int(0)]);
    });

    it('should invert bypass into the enabled flag', async () => {
      await gateway.bypassDevice(0, 1, true);

      expect(transport.getLastSentMessage()).toEqual({
        address: '/live/device/set/enabled',
        args: [OscArg.int(0), OscArg.int(1), OscArg.int(0)],
      });
    });

    it('should append tracks and scenes by default', async () => {
      await gateway.createMidiTrack();
      await gateway.createScene(2);

      expect(transport.getSentMessages('/live/song/create_midi_track')[0]?.args).toEqual([OscArg.int(-1)]);
      expect(transport.getSentMessages('/live/song/create_scene')[0]?.args).toEqual([OscArg.int(2)]);
    });

    it('should send notes with mute defaulting to off', async () => {
      await gateway.addNote(1, 0, { pitch: 60, start: 0, duration: 0.5, velocity: 100 });

      expect(transport.getLastSentMessage()).toEqual({
        address: '/live/clip/add/notes',
        args: [OscArg.int(1), OscArg.int(0), OscArg.int(60), OscArg.float(0), OscArg.float(0.5), OscArg.int(100), OscArg.int(0)],
      });
    });

    it('should clear the full pitch range unless told otherwise', async () => {
      await gateway.removeNotes(1, 0, { start: 0, span: 4 });

      expect(transport.getLastSentMessage()).toEqual({
        address: '/live/clip/remove_notes',
        args: [OscArg.int(1), OscArg.int(0), OscArg.float(0), OscArg.float(4), OscArg.int(0), OscArg.int(128)],
      });
    });

    it('should address device parameters by track, device and parameter', async () => {
      await gateway.setDeviceParameter(0, 2, 5, 0.75);

      expect(transport.getLastSentMessage()).toEqual({
        address: '/live/device/set/parameter/value',
        args: [OscArg.int(0), OscArg.int(2), OscArg.int(5), OscArg.float(0.75)],
      });
    });
  });

  describe('TC-GW-005: validation before I/O', () => {
    beforeEach(async () => {
      await gateway.connect();
      transport.clearSentMessages();
    });

    it.each([
      ['tempo below range', (g: LiveGateway) => g.setTempo(10)],
      ['tempo above range', (g: LiveGateway) => g.setTempo(1000)],
      ['negative track index', (g: LiveGateway) => g.setTrackVolume(-1, 0.5)],
      ['volume above 1', (g: LiveGateway) => g.setTrackVolume(0, 1.5)],
      ['pan below -1', (g: LiveGateway) => g.setMasterPanning(-2)],
      ['swing above 1', (g: LiveGateway) => g.setSwingAmount(1.1)],
      ['fractional clip index', (g: LiveGateway) => g.fireClip(0, 0.5)],
      ['pitch above 127', (g: LiveGateway) => g.addNote(0, 0, { pitch: 128, start: 0, duration: 1, velocity: 100 })],
      ['zero note duration', (g: LiveGateway) => g.addNote(0, 0, { pitch: 60, start: 0, duration: 0, velocity: 100 })],
      ['zero clip length', (g: LiveGateway) => g.createClip(0, 0, 0)],
      ['zero loop length', (g: LiveGateway) => g.setLoopLength(0)],
      ['zero removal span', (g: LiveGateway) => g.removeNotes(0, 0, { start: 0, span: 0 })],
      ['negative colour', (g: LiveGateway) => g.setTrackColor(0, -5)],
      ['create index below -1', (g: LiveGateway) => g.createAudioTrack(-2)],
      ['negative send index', (g: LiveGateway) => g.getTrackSend(0, -1)],
    ])('should reject %s without sending', async (_name, call) => {
      await expect(call(gateway)).rejects.toThrow(ValidationError);
      expect(transport.sentMessages).toHaveLength(0);
    });
  });

  describe('TC-GW-006: queries', () => {
    beforeEach(async () => {
      await gateway.connect();
      transport.clearSentMessages();
    });

    it('should unwrap a reply that echoes the track index', async () => {
      transport.respondTo('/live/track/get/volume', (args) => [...args, 0.8]);

      await expect(gateway.getTrackVolume(2)).resolves.toBe(0.8);
      expect(transport.getLastSentMessage()?.args).toEqual([OscArg.int(2)]);
    });

    it('should accept a bare reply', async () => {
      transport.respondTo('/live/clip/get/name', ['Intro']);

      await expect(gateway.getClipName(0, 0)).resolves.toBe('Intro');
    });

    it('should take the last value when Live echoes only part of the identifiers', async () => {
      transport.respondTo('/live/clip/get/length', (args) => [args[1] ?? 0, 4]);
      transport.respondTo('/live/device/get/parameter/value', (args) => [args[1] ?? 0, args[2] ?? 0, 0.5]);

      await expect(gateway.getClipLength(0, 3)).resolves.toBe(4);
      await expect(gateway.getDeviceParameterValue(0, 1, 2)).resolves.toBe(0.5);
    });

    it('should read parameter values after a three-value echo', async () => {
      transport.respondTo('/live/device/get/parameter/value', (args) => [...args, 0.25]);

      await expect(gateway.getDeviceParameterValue(0, 1, 4)).resolves.toBe(0.25);
    });

    it('should return false for an empty mute reply', async () => {
      transport.respondTo('/live/track/get/mute', []);

      await expect(gateway.getTrackMute(0)).resolves.toBe(false);
    });

    it('should reject a reply of the wrong shape', async () => {
      transport.respondTo('/live/clip/get/length', [0, 1]);

      await expect(gateway.getClipLength(0, 1)).rejects.toThrow(MalformedResponseError);
    });

    it('should read the time signature from two queries', async () => {
      transport.respondTo('/live/song/get/signature_numerator', [3]);
      transport.respondTo('/live/song/get/signature_denominator', [4]);

      await expect(gateway.getTimeSignature()).resolves.toEqual({ numerator: 3, denominator: 4 });
    });

    it('should list device names on a track', async () => {
      transport.respondTo('/live/track/get/devices/name', (args) => [...args, 'Drum Rack', 'Compressor']);

      await expect(gateway.getTrackDevices(1)).resolves.toEqual(['Drum Rack', 'Compressor']);
    });

    it('should decode clip notes', async () => {
      transport.respondTo('/live/clip/get/notes', (args) => [...args, 1, 60, 0, 1, 100, 0]);

      await expect(gateway.getClipNotes(0, 0)).resolves.toEqual([
        { pitch: 60, start: 0, duration: 1, velocity: 100, mute: false },
      ]);
    });

    it('should reject a short note list', async () => {
      transport.respondTo('/live/clip/get/notes', (args) => [...args, 2, 60, 0, 1, 100, 0]);

      await expect(gateway.getClipNotes(0, 0)).rejects.toThrow(
        'Malformed response on /live/clip/get/notes: expected 2 records (10 values), got 5 values'
      );
    });

    it('should decode device parameters', async () => {
      transport.respondTo('/live/device/get/parameters', [1, 0, 'Gain', 0.5, 0, 1]);

      await expect(gateway.getDeviceParameters(0, 0)).resolves.toEqual([
        { id: 0, name: 'Gain', value: 0.5, min: 0, max: 1 },
      ]);
    });

    it('should match concurrent replies on one address in order', async () => {
      const first = gateway.getTrackVolume(0);
      const second = gateway.getTrackVolume(1);

      transport.inject('/live/track/get/volume', [0, 0.1]);
      transport.inject('/live/track/get/volume', [1, 0.9]);

      await expect(first).resolves.toBe(0.1);
      await expect(second).resolves.toBe(0.9);
    });

    it('should keep addresses independent', async () => {
      const name = gateway.getTrackName(0);
      const volume = gateway.getTrackVolume(0);

      transport.inject('/live/track/get/volume', [0, 0.5]);
      transport.inject('/live/track/get/name', [0, 'Keys']);

      await expect(volume).resolves.toBe(0.5);
      await expect(name).resolves.toBe('Keys');
    });

    it('should time out and emit requestTimeout', async () => {
      const timeouts: RequestTimeoutEvent[] = [];
      gateway.on('requestTimeout', (evt) => timeouts.push(evt));

      await expect(gateway.getTrackName(0)).rejects.toThrow('No response on /live/track/get/name within 50ms');

      expect(timeouts).toHaveLength(1);
      expect(timeouts[0]).toMatchObject({ address: '/live/track/get/name', timeoutMs: 50 });
    });

    it('should honour a per-call timeout on raw requests', async () => {
      await expect(gateway.request('/live/song/get/groove_amount', [], { timeoutMs: 10 })).rejects.toThrow(
        'No response on /live/song/get/groove_amount within 10ms'
      );
    });

    it('should return raw reply arguments', async () => {
      transport.respondTo('/live/song/get/cue_points', ['A', 0, 'B', 16]);

      await expect(gateway.request('/live/song/get/cue_points')).resolves.toEqual(['A', 0, 'B', 16]);
    });

    it('should cancel the wait and rethrow when sending fails', async () => {
      const correlator = new ResponseCorrelator();
      gateway = new LiveGateway({}, transport, correlator);
      await gateway.connect();

      await expect(gateway.getTrackName(2 ** 40)).rejects.toThrow(EncodingError);
      expect(correlator.pendingCount()).toBe(0);
    });
  });

  describe('TC-GW-007: unmatched replies', () => {
    it('should report replies nobody waited for', async () => {
      await gateway.connect();
      const unmatched: UnmatchedResponseEvent[] = [];
      gateway.on('unmatchedResponse', (evt) => unmatched.push(evt));

      transport.inject('/live/song/get/beat', [4]);

      expect(unmatched).toHaveLength(1);
      expect(unmatched[0]).toMatchObject({ address: '/live/song/get/beat', args: [4] });
    });
  });

  describe('TC-GW-008: testConnection()', () => {
    it('should be true when Live answers', async () => {
      transport.respondTo('/live/test', ['ok']);
      await gateway.connect();

      await expect(gateway.testConnection()).resolves.toBe(true);
    });

    it('should be false on timeout', async () => {
      await gateway.connect();

      await expect(gateway.testConnection()).resolves.toBe(false);
    });

    it('should be false when not connected', async () => {
      await expect(gateway.testConnection()).resolves.toBe(false);
    });
  });
});
