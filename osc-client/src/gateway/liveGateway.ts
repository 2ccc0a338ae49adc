// LiveGateway - public API for controlling Live over OSC
// Idiomatic TypeScript: EventEmitter-based, Promise API, injected collaborators

import { createConfig, type GatewayConfig, type GatewayConfigInput } from '../config.js';
import { ResponseCorrelator } from '../correlator/responseCorrelator.js';
import { CancelledError, ConnectionError, NotConnectedError, TimeoutError } from '../errors.js';
import { TypedEventEmitter, emitGatewayEvent, type GatewayEventMap } from '../events/eventEmitter.js';
import { EventFactory, type DisconnectedEvent } from '../events/eventTypes.js';
import type { OscTransport } from '../transport/transport.js';
import {
  OscArg,
  type DeviceParameter,
  type Note,
  type OscArgument,
  type OscEndpoint,
  type OscValue,
  type TimeSignature,
} from '../types.js';
import { createLogger } from '../utils/logger.js';
import { toError } from '../utils/toError.js';
import { Commands, Lists, Queries, RecordLists } from './operations.js';
import { unwrapList, unwrapRecords, unwrapValue, type ListSpec, type QuerySpec, type RecordListSpec } from './replies.js';
import {
  APPEND_INDEX,
  validateColor,
  validateIndex,
  validateInsertIndex,
  validateMidi,
  validateName,
  validateNonNegative,
  validateNumber,
  validatePan,
  validatePositive,
  validateRange,
  validateTempo,
  validateVolume,
} from './validation.js';

const logger = createLogger('osc.gateway');

/**
 * Per-call options for raw requests
 */
export interface RequestOptions {
  /** Overrides the configured requestTimeout */
  readonly timeoutMs?: number;
}

/**
 * Note to add to a clip; mute defaults to false
 */
export interface NoteInput {
  readonly pitch: number;
  readonly start: number;
  readonly duration: number;
  readonly velocity: number;
  readonly mute?: boolean;
}

/**
 * Area of a clip to clear; pitches default to the full MIDI range
 */
export interface NoteRange {
  readonly start: number;
  readonly span: number;
  readonly pitchStart?: number;
  readonly pitchSpan?: number;
}

const FULL_PITCH_SPAN = 128;

/**
 * Gateway to a running Live set
 *
 * Fire-and-forget commands resolve as soon as the datagram is handed to the
 * transport. Queries register a wait with the correlator before sending and
 * resolve with the unwrapped reply, or reject with TimeoutError.
 *
 * Usage:
 * ```typescript
 * import { LiveGateway, UdpTransport } from '@live-osc/client';
 *
 * const gateway = new LiveGateway({ host: '127.0.0.1' }, new UdpTransport());
 *
 * await gateway.connect();
 * await gateway.setTempo(128);
 * const volume = await gateway.getTrackVolume(0);
 * await gateway.disconnect();
 * ```
 */
export class LiveGateway extends TypedEventEmitter<GatewayEventMap> {
  private readonly config: GatewayConfig;
  private readonly transport: OscTransport;
  private readonly correlator: ResponseCorrelator;

  // Set only once the connect probe has been answered
  private endpoint: OscEndpoint | null = null;

  /**
   * Constructor - validates config
   * Does NOT open any socket (lazy initialization)
   *
   * @param transport - UdpTransport in production, MockTransport for testing
   * @param correlator - Defaults to one using the configured requestTimeout
   */
  constructor(configInput: GatewayConfigInput, transport: OscTransport, correlator?: ResponseCorrelator) {
    super();
    this.config = createConfig(configInput);
    this.transport = transport;
    this.correlator = correlator ?? new ResponseCorrelator(this.config.requestTimeout);
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  /**
   * Open the transport and probe Live with a tempo query
   * When already connected, disconnects first and cancels in-flight requests.
   * On any failure the transport is closed again before the error is thrown.
   *
   * @param overrides - Endpoint fields replacing the configured ones for this connection
   * @throws ConnectionError
   */
  async connect(overrides: Partial<OscEndpoint> = {}): Promise<void> {
    const endpoint = resolveEndpoint(this.config, overrides);

    if (this.transport.isConnected()) {
      logger.debug('Already connected, reconnecting');
      await this.teardown('reconnect');
    }

    try {
      await this.transport.connect(endpoint, this.handleMessage);
    } catch (error) {
      if (error instanceof ConnectionError) {
        throw error;
      }
      const cause = toError(error);
      throw new ConnectionError(`Failed to open connection to Live: ${cause.message}`, describe(endpoint), cause);
    }

    let tempo: number;
    try {
      const reply = await this.exchange(Queries.tempo.address, [], this.config.connectionTimeout);
      tempo = unwrapValue(Queries.tempo, reply, []);
    } catch (error) {
      this.correlator.cancelAll();
      await this.closeTransportQuietly();
      const cause = toError(error);
      logger.error('Live did not answer the connection probe', { endpoint: describe(endpoint), error: cause });
      throw new ConnectionError(
        error instanceof TimeoutError
          ? `Live did not respond within ${this.config.connectionTimeout}ms. Is AbletonOSC installed and enabled?`
          : `Connection probe failed: ${cause.message}`,
        describe(endpoint),
        cause
      );
    }

    this.endpoint = endpoint;
    logger.info('Connected to Live', { endpoint: describe(endpoint), tempo });
    emitGatewayEvent(this, EventFactory.connected(endpoint, tempo));
  }

  /**
   * Cancel every pending request and close the transport
   * Safe to call when not connected
   */
  async disconnect(): Promise<void> {
    await this.teardown('client-shutdown');
  }

  isConnected(): boolean {
    return this.endpoint !== null && this.transport.isConnected();
  }

  getEndpoint(): OscEndpoint | null {
    return this.endpoint;
  }

  getConfig(): GatewayConfig {
    return this.config;
  }

  /**
   * Round trip on /live/test
   * @returns false on timeout, cancellation or when not connected
   */
  async testConnection(): Promise<boolean> {
    try {
      const reply = await this.request(Queries.test.address);
      return reply.length > 0;
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof CancelledError || error instanceof NotConnectedError) {
        return false;
      }
      throw error;
    }
  }

  // ==========================================================================
  // Raw messaging
  // ==========================================================================

  /**
   * Send a fire-and-forget message
   * @throws NotConnectedError
   */
  send(address: string, args: readonly OscArgument[] = []): void {
    this.ensureConnected(address);
    this.transport.send(address, args);
  }

  /**
   * Send a message and wait for the next reply on the same address
   * @returns The raw reply arguments
   * @throws NotConnectedError | TimeoutError | CancelledError
   */
  async request(address: string, args: readonly OscArgument[] = [], options: RequestOptions = {}): Promise<OscValue[]> {
    const timeoutMs = options.timeoutMs ?? this.config.requestTimeout;
    try {
      return await this.roundTrip(address, args, timeoutMs);
    } catch (error) {
      if (error instanceof TimeoutError) {
        emitGatewayEvent(this, EventFactory.requestTimeout(address, timeoutMs));
      }
      throw error;
    }
  }

  // ==========================================================================
  // Application and view
  // ==========================================================================

  async getApplicationVersion(): Promise<string> {
    return this.query(Queries.applicationVersion);
  }

  async getSelectedTrack(): Promise<number> {
    return this.query(Queries.selectedTrack);
  }

  async setSelectedTrack(trackIndex: number): Promise<void> {
    validateIndex('trackIndex', trackIndex);
    this.send(Commands.setSelectedTrack, [OscArg.int(trackIndex)]);
  }

  async getSelectedScene(): Promise<number> {
    return this.query(Queries.selectedScene);
  }

  async setSelectedScene(sceneIndex: number): Promise<void> {
    validateIndex('sceneIndex', sceneIndex);
    this.send(Commands.setSelectedScene, [OscArg.int(sceneIndex)]);
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  async startPlaying(): Promise<void> {
    this.send(Commands.startPlaying);
  }

  async stopPlaying(): Promise<void> {
    this.send(Commands.stopPlaying);
  }

  async continuePlaying(): Promise<void> {
    this.send(Commands.continuePlaying);
  }

  async startRecording(): Promise<void> {
    this.send(Commands.startRecording);
  }

  async stopRecording(): Promise<void> {
    this.send(Commands.stopRecording);
  }

  async stopAllClips(): Promise<void> {
    this.send(Commands.stopAllClips);
  }

  async tapTempo(): Promise<void> {
    this.send(Commands.tapTempo);
  }

  async undo(): Promise<void> {
    this.send(Commands.undo);
  }

  async redo(): Promise<void> {
    this.send(Commands.redo);
  }

  async captureMidi(): Promise<void> {
    this.send(Commands.captureMidi);
  }

  async triggerSessionRecord(): Promise<void> {
    this.send(Commands.triggerSessionRecord);
  }

  /**
   * Move the playhead by a number of beats (negative moves back)
   */
  async jumpBy(beats: number): Promise<void> {
    validateNumber('beats', beats);
    this.send(Commands.jumpBy, [OscArg.float(beats)]);
  }

  async jumpTo(beat: number): Promise<void> {
    validateNonNegative('beat', beat);
    this.send(Commands.jumpTo, [OscArg.float(beat)]);
  }

  async jumpToNextCue(): Promise<void> {
    this.send(Commands.jumpToNextCue);
  }

  async jumpToPrevCue(): Promise<void> {
    this.send(Commands.jumpToPrevCue);
  }

  // ==========================================================================
  // Song
  // ==========================================================================

  async getTempo(): Promise<number> {
    return this.query(Queries.tempo);
  }

  /**
   * @param bpm - 20 to 999
   */
  async setTempo(bpm: number): Promise<void> {
    validateTempo(bpm);
    this.send(Commands.setTempo, [OscArg.float(bpm)]);
  }

  async getTimeSignature(): Promise<TimeSignature> {
    const numerator = await this.query(Queries.signatureNumerator);
    const denominator = await this.query(Queries.signatureDenominator);
    return { numerator, denominator };
  }

  async getSongTime(): Promise<number> {
    return this.query(Queries.songTime);
  }

  async getSongLength(): Promise<number> {
    return this.query(Queries.songLength);
  }

  async getNumTracks(): Promise<number> {
    return this.query(Queries.numTracks);
  }

  async getNumScenes(): Promise<number> {
    return this.query(Queries.numScenes);
  }

  async getNumReturnTracks(): Promise<number> {
    return this.query(Queries.numReturnTracks);
  }

  async getIsPlaying(): Promise<boolean> {
    return this.query(Queries.isPlaying);
  }

  async getSwingAmount(): Promise<number> {
    return this.query(Queries.swingAmount);
  }

  async setSwingAmount(amount: number): Promise<void> {
    validateRange('swingAmount', amount, 0, 1);
    this.send(Commands.setSwingAmount, [OscArg.float(amount)]);
  }

  async getMetronome(): Promise<boolean> {
    return this.query(Queries.metronome);
  }

  async setMetronome(enabled: boolean): Promise<void> {
    this.send(Commands.setMetronome, [flag(enabled)]);
  }

  async getOverdub(): Promise<boolean> {
    return this.query(Queries.overdub);
  }

  async setOverdub(enabled: boolean): Promise<void> {
    this.send(Commands.setOverdub, [flag(enabled)]);
  }

  async getLoop(): Promise<boolean> {
    return this.query(Queries.loop);
  }

  async setLoop(enabled: boolean): Promise<void> {
    this.send(Commands.setLoop, [flag(enabled)]);
  }

  async getLoopStart(): Promise<number> {
    return this.query(Queries.loopStart);
  }

  async setLoopStart(beat: number): Promise<void> {
    validateNonNegative('loopStart', beat);
    this.send(Commands.setLoopStart, [OscArg.float(beat)]);
  }

  async getLoopLength(): Promise<number> {
    return this.query(Queries.loopLength);
  }

  async setLoopLength(beats: number): Promise<void> {
    validatePositive('loopLength', beats);
    this.send(Commands.setLoopLength, [OscArg.float(beats)]);
  }

  async getRecordMode(): Promise<boolean> {
    return this.query(Queries.recordMode);
  }

  async getSessionRecord(): Promise<boolean> {
    return this.query(Queries.sessionRecord);
  }

  async getPunchIn(): Promise<boolean> {
    return this.query(Queries.punchIn);
  }

  async getPunchOut(): Promise<boolean> {
    return this.query(Queries.punchOut);
  }

  // ==========================================================================
  // Tracks
  // ==========================================================================

  /**
   * @param index - Insertion position, -1 appends
   */
  async createMidiTrack(index: number = APPEND_INDEX): Promise<void> {
    validateInsertIndex('index', index);
    this.send(Commands.createMidiTrack, [OscArg.int(index)]);
  }

  /**
   * @param index - Insertion position, -1 appends
   */
  async createAudioTrack(index: number = APPEND_INDEX): Promise<void> {
    validateInsertIndex('index', index);
    this.send(Commands.createAudioTrack, [OscArg.int(index)]);
  }

  async createReturnTrack(): Promise<void> {
    this.send(Commands.createReturnTrack);
  }

  async deleteTrack(trackIndex: number): Promise<void> {
    validateIndex('trackIndex', trackIndex);
    this.send(Commands.deleteTrack, [OscArg.int(trackIndex)]);
  }

  async duplicateTrack(trackIndex: number): Promise<void> {
    validateIndex('trackIndex', trackIndex);
    this.send(Commands.duplicateTrack, [OscArg.int(trackIndex)]);
  }

  async stopAllTrackClips(trackIndex: number): Promise<void> {
    validateIndex('trackIndex', trackIndex);
    this.send(Commands.stopAllTrackClips, [OscArg.int(trackIndex)]);
  }

  async getTrackName(trackIndex: number): Promise<string> {
    return this.query(Queries.trackName, trackIds(trackIndex));
  }

  async setTrackName(trackIndex: number, name: string): Promise<void> {
    const ids = trackIds(trackIndex);
    validateName('name', name);
    this.send(Commands.setTrackName, [...ids, name]);
  }

  async getTrackVolume(trackIndex: number): Promise<number> {
    return this.query(Queries.trackVolume, trackIds(trackIndex));
  }

  /**
   * @param volume - 0 to 1
   */
  async setTrackVolume(trackIndex: number, volume: number): Promise<void> {
    const ids = trackIds(trackIndex);
    validateVolume(volume);
    this.send(Commands.setTrackVolume, [...ids, OscArg.float(volume)]);
  }

  async getTrackPanning(trackIndex: number): Promise<number> {
    return this.query(Queries.trackPanning, trackIds(trackIndex));
  }

  /**
   * @param pan - -1 (left) to 1 (right)
   */
  async setTrackPanning(trackIndex: number, pan: number): Promise<void> {
    const ids = trackIds(trackIndex);
    validatePan(pan);
    this.send(Commands.setTrackPanning, [...ids, OscArg.float(pan)]);
  }

  /**
   * An empty reply reads as false
   */
  async getTrackMute(trackIndex: number): Promise<boolean> {
    return this.query(Queries.trackMute, trackIds(trackIndex));
  }

  async setTrackMute(trackIndex: number, mute: boolean): Promise<void> {
    this.send(Commands.setTrackMute, [...trackIds(trackIndex), flag(mute)]);
  }

  /**
   * An empty reply reads as false
   */
  async getTrackSolo(trackIndex: number): Promise<boolean> {
    return this.query(Queries.trackSolo, trackIds(trackIndex));
  }

  async setTrackSolo(trackIndex: number, solo: boolean): Promise<void> {
    this.send(Commands.setTrackSolo, [...trackIds(trackIndex), flag(solo)]);
  }

  /**
   * An empty reply reads as false
   */
  async getTrackArm(trackIndex: number): Promise<boolean> {
    return this.query(Queries.trackArm, trackIds(trackIndex));
  }

  async setTrackArm(trackIndex: number, arm: boolean): Promise<void> {
    this.send(Commands.setTrackArm, [...trackIds(trackIndex), flag(arm)]);
  }

  async getTrackColor(trackIndex: number): Promise<number> {
    return this.query(Queries.trackColor, trackIds(trackIndex));
  }

  async setTrackColor(trackIndex: number, color: number): Promise<void> {
    const ids = trackIds(trackIndex);
    validateColor(color);
    this.send(Commands.setTrackColor, [...ids, OscArg.int(color)]);
  }

  /**
   * An empty reply reads as false
   */
  async getTrackHasMidiInput(trackIndex: number): Promise<boolean> {
    return this.query(Queries.trackHasMidiInput, trackIds(trackIndex));
  }

  async getTrackSend(trackIndex: number, sendIndex: number): Promise<number> {
    return this.query(Queries.trackSend, sendIds(trackIndex, sendIndex));
  }

  /**
   * @param amount - 0 to 1
   */
  async setTrackSend(trackIndex: number, sendIndex: number, amount: number): Promise<void> {
    const ids = sendIds(trackIndex, sendIndex);
    validateRange('amount', amount, 0, 1);
    this.send(Commands.setTrackSend, [...ids, OscArg.float(amount)]);
  }

  async getTrackNumDevices(trackIndex: number): Promise<number> {
    return this.query(Queries.trackNumDevices, trackIds(trackIndex));
  }

  /**
   * Names of the devices on a track, in chain order
   */
  async getTrackDevices(trackIndex: number): Promise<string[]> {
    return this.queryList(Lists.trackDeviceNames, trackIds(trackIndex));
  }

  // ==========================================================================
  // Return and master tracks
  // ==========================================================================

  async getReturnTrackVolume(returnIndex: number): Promise<number> {
    return this.query(Queries.returnVolume, returnIds(returnIndex));
  }

  async setReturnTrackVolume(returnIndex: number, volume: number): Promise<void> {
    const ids = returnIds(returnIndex);
    validateVolume(volume);
    this.send(Commands.setReturnVolume, [...ids, OscArg.float(volume)]);
  }

  async getReturnTrackPanning(returnIndex: number): Promise<number> {
    return this.query(Queries.returnPanning, returnIds(returnIndex));
  }

  async setReturnTrackPanning(returnIndex: number, pan: number): Promise<void> {
    const ids = returnIds(returnIndex);
    validatePan(pan);
    this.send(Commands.setReturnPanning, [...ids, OscArg.float(pan)]);
  }

  /**
   * An empty reply reads as false
   */
  async getReturnTrackMute(returnIndex: number): Promise<boolean> {
    return this.query(Queries.returnMute, returnIds(returnIndex));
  }

  async setReturnTrackMute(returnIndex: number, mute: boolean): Promise<void> {
    this.send(Commands.setReturnMute, [...returnIds(returnIndex), flag(mute)]);
  }

  async getReturnTrackName(returnIndex: number): Promise<string> {
    return this.query(Queries.returnName, returnIds(returnIndex));
  }

  async setReturnTrackName(returnIndex: number, name: string): Promise<void> {
    const ids = returnIds(returnIndex);
    validateName('name', name);
    this.send(Commands.setReturnName, [...ids, name]);
  }

  async getMasterVolume(): Promise<number> {
    return this.query(Queries.masterVolume);
  }

  async setMasterVolume(volume: number): Promise<void> {
    validateVolume(volume);
    this.send(Commands.setMasterVolume, [OscArg.float(volume)]);
  }

  async getMasterPanning(): Promise<number> {
    return this.query(Queries.masterPanning);
  }

  async setMasterPanning(pan: number): Promise<void> {
    validatePan(pan);
    this.send(Commands.setMasterPanning, [OscArg.float(pan)]);
  }

  // ==========================================================================
  // Scenes
  // ==========================================================================

  async fireScene(sceneIndex: number): Promise<void> {
    this.send(Commands.fireScene, sceneIds(sceneIndex));
  }

  /**
   * @param index - Insertion position, -1 appends
   */
  async createScene(index: number = APPEND_INDEX): Promise<void> {
    validateInsertIndex('index', index);
    this.send(Commands.createScene, [OscArg.int(index)]);
  }

  async deleteScene(sceneIndex: number): Promise<void> {
    this.send(Commands.deleteScene, sceneIds(sceneIndex));
  }

  async getSceneName(sceneIndex: number): Promise<string> {
    return this.query(Queries.sceneName, sceneIds(sceneIndex));
  }

  async setSceneName(sceneIndex: number, name: string): Promise<void> {
    const ids = sceneIds(sceneIndex);
    validateName('name', name);
    this.send(Commands.setSceneName, [...ids, name]);
  }

  async getSceneColor(sceneIndex: number): Promise<number> {
    return this.query(Queries.sceneColor, sceneIds(sceneIndex));
  }

  async setSceneColor(sceneIndex: number, color: number): Promise<void> {
    const ids = sceneIds(sceneIndex);
    validateColor(color);
    this.send(Commands.setSceneColor, [...ids, OscArg.int(color)]);
  }

  // ==========================================================================
  // Clip slots and clips
  // ==========================================================================

  async fireClip(trackIndex: number, clipIndex: number): Promise<void> {
    this.send(Commands.fireClip, clipIds(trackIndex, clipIndex));
  }

  async stopClip(trackIndex: number, clipIndex: number): Promise<void> {
    this.send(Commands.stopClip, clipIds(trackIndex, clipIndex));
  }

  /**
   * Create an empty MIDI clip in a slot
   * @param length - Clip length in beats
   */
  async createClip(trackIndex: number, clipIndex: number, length: number): Promise<void> {
    const ids = clipIds(trackIndex, clipIndex);
    validatePositive('length', length);
    this.send(Commands.createClip, [...ids, OscArg.float(length)]);
  }

  async deleteClip(trackIndex: number, clipIndex: number): Promise<void> {
    this.send(Commands.deleteClip, clipIds(trackIndex, clipIndex));
  }

  /**
   * An empty reply reads as false
   */
  async hasClip(trackIndex: number, clipIndex: number): Promise<boolean> {
    return this.query(Queries.hasClip, clipIds(trackIndex, clipIndex));
  }

  async getClipName(trackIndex: number, clipIndex: number): Promise<string> {
    return this.query(Queries.clipName, clipIds(trackIndex, clipIndex));
  }

  async setClipName(trackIndex: number, clipIndex: number, name: string): Promise<void> {
    const ids = clipIds(trackIndex, clipIndex);
    validateName('name', name);
    this.send(Commands.setClipName, [...ids, name]);
  }

  async getClipLength(trackIndex: number, clipIndex: number): Promise<number> {
    return this.query(Queries.clipLength, clipIds(trackIndex, clipIndex));
  }

  async setClipLength(trackIndex: number, clipIndex: number, length: number): Promise<void> {
    const ids = clipIds(trackIndex, clipIndex);
    validatePositive('length', length);
    this.send(Commands.setClipLength, [...ids, OscArg.float(length)]);
  }

  async getClipLoopStart(trackIndex: number, clipIndex: number): Promise<number> {
    return this.query(Queries.clipLoopStart, clipIds(trackIndex, clipIndex));
  }

  async setClipLoopStart(trackIndex: number, clipIndex: number, beat: number): Promise<void> {
    const ids = clipIds(trackIndex, clipIndex);
    validateNonNegative('loopStart', beat);
    this.send(Commands.setClipLoopStart, [...ids, OscArg.float(beat)]);
  }

  async getClipLoopEnd(trackIndex: number, clipIndex: number): Promise<number> {
    return this.query(Queries.clipLoopEnd, clipIds(trackIndex, clipIndex));
  }

  async setClipLoopEnd(trackIndex: number, clipIndex: number, beat: number): Promise<void> {
    const ids = clipIds(trackIndex, clipIndex);
    validateNonNegative('loopEnd', beat);
    this.send(Commands.setClipLoopEnd, [...ids, OscArg.float(beat)]);
  }

  /**
   * An empty reply reads as false
   */
  async getClipIsPlaying(trackIndex: number, clipIndex: number): Promise<boolean> {
    return this.query(Queries.clipIsPlaying, clipIds(trackIndex, clipIndex));
  }

  async getClipPlayingPosition(trackIndex: number, clipIndex: number): Promise<number> {
    return this.query(Queries.clipPlayingPosition, clipIds(trackIndex, clipIndex));
  }

  async addNote(trackIndex: number, clipIndex: number, note: NoteInput): Promise<void> {
    const ids = clipIds(trackIndex, clipIndex);
    validateMidi('pitch', note.pitch);
    validateNonNegative('start', note.start);
    validatePositive('duration', note.duration);
    validateMidi('velocity', note.velocity);
    this.send(Commands.addNotes, [
      ...ids,
      OscArg.int(note.pitch),
      OscArg.float(note.start),
      OscArg.float(note.duration),
      OscArg.int(note.velocity),
      flag(note.mute ?? false),
    ]);
  }

  /**
   * Remove the notes inside a time and pitch window
   */
  async removeNotes(trackIndex: number, clipIndex: number, range: NoteRange): Promise<void> {
    const ids = clipIds(trackIndex, clipIndex);
    const pitchStart = range.pitchStart ?? 0;
    const pitchSpan = range.pitchSpan ?? FULL_PITCH_SPAN;
    validateNonNegative('start', range.start);
    validatePositive('span', range.span);
    validateMidi('pitchStart', pitchStart);
    validateRange('pitchSpan', pitchSpan, 1, FULL_PITCH_SPAN);
    this.send(Commands.removeNotes, [
      ...ids,
      OscArg.float(range.start),
      OscArg.float(range.span),
      OscArg.int(pitchStart),
      OscArg.int(pitchSpan),
    ]);
  }

  async getClipNotes(trackIndex: number, clipIndex: number): Promise<Note[]> {
    return this.queryRecords(RecordLists.clipNotes, clipIds(trackIndex, clipIndex));
  }

  // ==========================================================================
  // Devices
  // ==========================================================================

  async getDeviceParameters(trackIndex: number, deviceIndex: number): Promise<DeviceParameter[]> {
    return this.queryRecords(RecordLists.deviceParameters, deviceIds(trackIndex, deviceIndex));
  }

  async setDeviceParameter(trackIndex: number, deviceIndex: number, parameterIndex: number, value: number): Promise<void> {
    const ids = parameterIds(trackIndex, deviceIndex, parameterIndex);
    validateNumber('value', value);
    this.send(Commands.setParameterValue, [...ids, OscArg.float(value)]);
  }

  /**
   * @param bypass - true switches the device off
   */
  async bypassDevice(trackIndex: number, deviceIndex: number, bypass: boolean): Promise<void> {
    this.send(Commands.setDeviceEnabled, [...deviceIds(trackIndex, deviceIndex), flag(!bypass)]);
  }

  async setDeviceIsActive(trackIndex: number, deviceIndex: number, active: boolean): Promise<void> {
    this.send(Commands.setDeviceIsActive, [...deviceIds(trackIndex, deviceIndex), flag(active)]);
  }

  async getDeviceName(trackIndex: number, deviceIndex: number): Promise<string> {
    return this.query(Queries.deviceName, deviceIds(trackIndex, deviceIndex));
  }

  async getDeviceClassName(trackIndex: number, deviceIndex: number): Promise<string> {
    return this.query(Queries.deviceClassName, deviceIds(trackIndex, deviceIndex));
  }

  async getDeviceNumParameters(trackIndex: number, deviceIndex: number): Promise<number> {
    return this.query(Queries.deviceNumParameters, deviceIds(trackIndex, deviceIndex));
  }

  /**
   * An empty reply reads as false
   */
  async getDeviceIsActive(trackIndex: number, deviceIndex: number): Promise<boolean> {
    return this.query(Queries.deviceIsActive, deviceIds(trackIndex, deviceIndex));
  }

  async getDeviceParameterValue(trackIndex: number, deviceIndex: number, parameterIndex: number): Promise<number> {
    return this.query(Queries.parameterValue, parameterIds(trackIndex, deviceIndex, parameterIndex));
  }

  async getDeviceParameterName(trackIndex: number, deviceIndex: number, parameterIndex: number): Promise<string> {
    return this.query(Queries.parameterName, parameterIds(trackIndex, deviceIndex, parameterIndex));
  }

  async getDeviceParameterDisplayValue(
    trackIndex: number,
    deviceIndex: number,
    parameterIndex: number
  ): Promise<string> {
    return this.query(Queries.parameterDisplayValue, parameterIds(trackIndex, deviceIndex, parameterIndex));
  }

  async getDeviceParameterMin(trackIndex: number, deviceIndex: number, parameterIndex: number): Promise<number> {
    return this.query(Queries.parameterMin, parameterIds(trackIndex, deviceIndex, parameterIndex));
  }

  async getDeviceParameterMax(trackIndex: number, deviceIndex: number, parameterIndex: number): Promise<number> {
    return this.query(Queries.parameterMax, parameterIds(trackIndex, deviceIndex, parameterIndex));
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  /**
   * Inbound messages from the transport
   * Replies nobody waits for are reported and dropped
   */
  private readonly handleMessage = (address: string, args: OscValue[]): void => {
    if (!this.correlator.handleResponse(address, args)) {
      emitGatewayEvent(this, EventFactory.unmatchedResponse(address, args));
    }
  };

  /**
   * Only a connection whose probe succeeded takes user traffic
   */
  private ensureConnected(address: string): void {
    if (!this.isConnected()) {
      throw new NotConnectedError(address);
    }
  }

  private async roundTrip(address: string, args: readonly OscArgument[], timeoutMs: number): Promise<OscValue[]> {
    this.ensureConnected(address);
    return this.exchange(address, args, timeoutMs);
  }

  /**
   * Register the wait, then send
   * A send failure cancels the wait with that error, which the await rethrows
   */
  private async exchange(address: string, args: readonly OscArgument[], timeoutMs: number): Promise<OscValue[]> {
    if (!this.transport.isConnected()) {
      throw new NotConnectedError(address);
    }
    const pending = this.correlator.expectResponse(address, timeoutMs);
    try {
      this.transport.send(address, args);
    } catch (error) {
      pending.cancel(toError(error));
    }
    return pending.response;
  }

  private async query<T>(spec: QuerySpec<T>, args: readonly OscArgument[] = []): Promise<T> {
    const reply = await this.request(spec.address, args);
    return unwrapValue(spec, reply, args.map(OscArg.unwrap));
  }

  private async queryList<T>(spec: ListSpec<T>, args: readonly OscArgument[]): Promise<T[]> {
    const reply = await this.request(spec.address, args);
    return unwrapList(spec, reply, args.map(OscArg.unwrap));
  }

  private async queryRecords<T>(spec: RecordListSpec<T>, args: readonly OscArgument[]): Promise<T[]> {
    const reply = await this.request(spec.address, args);
    return unwrapRecords(spec, reply, args.map(OscArg.unwrap));
  }

  private async teardown(reason: DisconnectedEvent['reason']): Promise<void> {
    const wasConnected = this.endpoint !== null;
    this.endpoint = null;

    const cancelled = this.correlator.cancelAll();
    await this.transport.disconnect();

    if (wasConnected) {
      logger.info('Disconnected from Live', { reason, cancelled });
      emitGatewayEvent(this, EventFactory.disconnected(reason, cancelled));
    }
  }

  private async closeTransportQuietly(): Promise<void> {
    try {
      await this.transport.disconnect();
    } catch (error) {
      logger.error('Failed to close transport after connection failure', { error: toError(error) });
    }
  }
}

// ============================================================================
// Argument helpers
// ============================================================================

function resolveEndpoint(config: GatewayConfig, overrides: Partial<OscEndpoint>): OscEndpoint {
  const merged = createConfig({ ...config, ...overrides });
  return { host: merged.host, sendPort: merged.sendPort, receivePort: merged.receivePort };
}

function describe(endpoint: OscEndpoint): string {
  return `${endpoint.host}:${endpoint.sendPort}`;
}

function flag(value: boolean): OscArgument {
  return OscArg.int(value ? 1 : 0);
}

function trackIds(trackIndex: number): OscArgument[] {
  validateIndex('trackIndex', trackIndex);
  return [OscArg.int(trackIndex)];
}

function returnIds(returnIndex: number): OscArgument[] {
  validateIndex('returnIndex', returnIndex);
  return [OscArg.int(returnIndex)];
}

function sceneIds(sceneIndex: number): OscArgument[] {
  validateIndex('sceneIndex', sceneIndex);
  return [OscArg.int(sceneIndex)];
}

function sendIds(trackIndex: number, sendIndex: number): OscArgument[] {
  validateIndex('sendIndex', sendIndex);
  return [...trackIds(trackIndex), OscArg.int(sendIndex)];
}

function clipIds(trackIndex: number, clipIndex: number): OscArgument[] {
  validateIndex('clipIndex', clipIndex);
  return [...trackIds(trackIndex), OscArg.int(clipIndex)];
}

function deviceIds(trackIndex: number, deviceIndex: number): OscArgument[] {
  validateIndex('deviceIndex', deviceIndex);
  return [...trackIds(trackIndex), OscArg.int(deviceIndex)];
}

function parameterIds(trackIndex: number, deviceIndex: number, parameterIndex: number): OscArgument[] {
  validateIndex('parameterIndex', parameterIndex);
  return [...deviceIds(trackIndex, deviceIndex), OscArg.int(parameterIndex)];
}
