// UDP transport implementation for OSC communication with Live

import * as dgram from 'dgram';
import { isIPv6 } from 'net';
import type { OscTransport, TransportState } from './transport.js';
import type { MessageHandler, OscArgument, OscEndpoint, OscMessage } from '../types.js';
import { OscArg } from '../types.js';
import { decodePacket, encodeMessage } from '../protocol/codec.js';
import { ConnectionError, NotConnectedError } from '../errors.js';
import { TypedEventEmitter, emitTransportEvent, type TransportEventMap } from '../events/eventEmitter.js';
import { EventFactory } from '../events/eventTypes.js';
import { DEFAULT_PARSE_ERROR_WARN_THRESHOLD, type GatewayConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { toError } from '../utils/toError.js';

const logger = createLogger('osc.transport');

export interface UdpTransportOptions {
  /** Consecutive decode failures before a parseErrorThreshold warning */
  readonly parseErrorWarnThreshold?: number;
  /** Local interface for the receive socket, default all interfaces */
  readonly receiveAddress?: string;
}

export const DEFAULT_RECEIVE_ADDRESS = '0.0.0.0';

/**
 * Two-socket UDP transport: a send socket connected to the remote peer and
 * a receive socket bound on a local port
 *
 * Lifecycle calls are serialised, so a reconnect never interleaves with a
 * disconnect and at most one receive socket ever delivers messages.
 */
export class UdpTransport extends TypedEventEmitter<TransportEventMap> implements OscTransport {
  private readonly parseErrorWarnThreshold: number;
  private readonly receiveAddress: string;

  private state: TransportState = 'Idle';
  private sendSocket: dgram.Socket | null = null;
  private receiveSocket: dgram.Socket | null = null;
  private endpoint: OscEndpoint | null = null;
  private consecutiveParseErrors = 0;
  private lifecycle: Promise<void> = Promise.resolve();

  constructor(options: UdpTransportOptions = {}) {
    super();
    this.parseErrorWarnThreshold = options.parseErrorWarnThreshold ?? DEFAULT_PARSE_ERROR_WARN_THRESHOLD;
    this.receiveAddress = options.receiveAddress ?? DEFAULT_RECEIVE_ADDRESS;
  }

  /**
   * Transport for a gateway configuration, taking its parse-error threshold
   */
  static fromConfig(
    config: Pick<GatewayConfig, 'parseErrorWarnThreshold'>,
    options: Omit<UdpTransportOptions, 'parseErrorWarnThreshold'> = {}
  ): UdpTransport {
    return new UdpTransport({ ...options, parseErrorWarnThreshold: config.parseErrorWarnThreshold });
  }

  /**
   * Open both endpoints, closing any existing ones first
   */
  connect(endpoint: OscEndpoint, onMessage: MessageHandler): Promise<void> {
    return this.serialize(() => this.openEndpoints(endpoint, onMessage));
  }

  /**
   * Close both endpoints
   */
  disconnect(): Promise<void> {
    return this.serialize(() => this.closeEndpoints());
  }

  /**
   * Encode and send a message to the connected peer
   */
  send(address: string, args: readonly OscArgument[] = []): void {
    const socket = this.sendSocket;
    if (this.state !== 'Connected' || socket === null) {
      throw new NotConnectedError(address);
    }

    const packet = encodeMessage(address, args);
    socket.send(packet, (error) => {
      if (error) {
        logger.error('Failed to send OSC message', { address, error });
      }
    });

    logger.debug('Sent OSC message', { address, args: args.map(OscArg.unwrap) });
  }

  isConnected(): boolean {
    return this.state === 'Connected';
  }

  getState(): TransportState {
    return this.state;
  }

  getEndpoint(): OscEndpoint | null {
    return this.endpoint;
  }

  /**
   * Port the receive socket is actually bound to (differs from the
   * requested one when 0 was requested)
   */
  getReceivePort(): number | null {
    return this.receiveSocket?.address().port ?? null;
  }

  getConsecutiveParseErrors(): number {
    return this.consecutiveParseErrors;
  }

  // ==========================================================================
  // Lifecycle (Private)
  // ==========================================================================

  private serialize(operation: () => Promise<void>): Promise<void> {
    const run = this.lifecycle.then(operation);
    // Callers observe failures through `run`; the chain itself must keep going
    this.lifecycle = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async openEndpoints(endpoint: OscEndpoint, onMessage: MessageHandler): Promise<void> {
    if (this.state === 'Connected') {
      logger.debug('Closing existing connection before reconnecting');
      await this.closeEndpoints();
    }

    this.state = 'Connecting';

    const sendSocket = dgram.createSocket(isIPv6(endpoint.host) ? 'udp6' : 'udp4');
    const receiveSocket = dgram.createSocket('udp4');

    try {
      await connectSocket(sendSocket, endpoint.sendPort, endpoint.host);
      await bindSocket(receiveSocket, endpoint.receivePort, this.receiveAddress);
    } catch (error) {
      await Promise.all([closeSocket(sendSocket), closeSocket(receiveSocket)]);
      this.state = 'Idle';
      const cause = toError(error);
      throw new ConnectionError(
        `Failed to open OSC endpoints for ${describeEndpoint(endpoint)}: ${cause.message}`,
        describeEndpoint(endpoint),
        cause
      );
    }

    receiveSocket.on('message', (data: Buffer) => {
      // Datagrams still queued on a replaced socket are dropped
      if (this.receiveSocket === receiveSocket) {
        this.handleDatagram(data, onMessage);
      }
    });
    receiveSocket.on('error', (error: Error) => this.handleSocketError('receive', error));
    sendSocket.on('error', (error: Error) => this.handleSocketError('send', error));

    this.sendSocket = sendSocket;
    this.receiveSocket = receiveSocket;
    this.endpoint = endpoint;
    this.consecutiveParseErrors = 0;
    this.state = 'Connected';

    logger.info('OSC transport connected', {
      host: endpoint.host,
      sendPort: endpoint.sendPort,
      receivePort: receiveSocket.address().port,
    });
  }

  private async closeEndpoints(): Promise<void> {
    if (this.state === 'Idle') {
      return; // Already disconnected
    }

    this.state = 'Disconnecting';

    const sendSocket = this.sendSocket;
    const receiveSocket = this.receiveSocket;
    this.sendSocket = null;
    this.receiveSocket = null;

    await Promise.all([closeSocket(sendSocket), closeSocket(receiveSocket)]);

    this.endpoint = null;
    this.state = 'Idle';
    logger.info('OSC transport disconnected');
  }

  // ==========================================================================
  // Listener (Private)
  // ==========================================================================

  private handleDatagram(data: Buffer, onMessage: MessageHandler): void {
    let messages: OscMessage[];
    try {
      messages = decodePacket(data);
    } catch (error) {
      this.recordParseError(toError(error), data.length);
      return;
    }

    this.consecutiveParseErrors = 0;

    for (const message of messages) {
      logger.debug('Received OSC message', { address: message.address, args: message.args });
      try {
        onMessage(message.address, message.args);
      } catch (error) {
        logger.error('OSC message handler failed', { address: message.address, error: toError(error) });
      }
    }
  }

  private recordParseError(error: Error, byteLength: number): void {
    this.consecutiveParseErrors += 1;

    logger.error('Failed to parse OSC datagram', {
      error,
      byteLength,
      errorCount: this.consecutiveParseErrors,
    });
    emitTransportEvent(this, EventFactory.parseError(error, byteLength, this.consecutiveParseErrors));

    if (this.consecutiveParseErrors >= this.parseErrorWarnThreshold) {
      logger.warn('High number of consecutive OSC parse errors - connection may be corrupted', {
        errorCount: this.consecutiveParseErrors,
      });
      emitTransportEvent(
        this,
        EventFactory.parseErrorThreshold(this.consecutiveParseErrors, this.parseErrorWarnThreshold)
      );
    }
  }

  private handleSocketError(socket: 'send' | 'receive', error: Error): void {
    logger.error('OSC socket error', { socket, error });
    emitTransportEvent(this, EventFactory.socketError(socket, error));
  }
}

// ============================================================================
// Socket helpers
// ============================================================================

function describeEndpoint(endpoint: OscEndpoint): string {
  return `${endpoint.host}:${endpoint.sendPort} (receive ${endpoint.receivePort})`;
}

function connectSocket(socket: dgram.Socket, port: number, host: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (error: Error): void => reject(error);
    socket.once('error', onError);
    socket.connect(port, host, (error?: Error) => {
      socket.off('error', onError);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

function bindSocket(socket: dgram.Socket, port: number, address: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (error: Error): void => reject(error);
    socket.once('error', onError);
    socket.bind(port, address, () => {
      socket.off('error', onError);
      resolve();
    });
  });
}

function closeSocket(socket: dgram.Socket | null): Promise<void> {
  if (socket === null) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    try {
      socket.close(() => resolve());
    } catch (error) {
      // ERR_SOCKET_DGRAM_NOT_RUNNING: socket never started or is already closed
      logger.debug('OSC socket already closed', { error: toError(error) });
      resolve();
    }
  });
}
