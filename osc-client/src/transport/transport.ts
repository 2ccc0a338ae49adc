// Transport layer interface for OSC datagram communication

import type { MessageHandler, OscArgument, OscEndpoint } from '../types.js';

/**
 * Transport lifecycle: Idle → Connecting → Connected → Disconnecting → Idle
 */
export type TransportState = 'Idle' | 'Connecting' | 'Connected' | 'Disconnecting';

/**
 * Datagram transport for sending to one remote peer and receiving on a local port
 */
export interface OscTransport {
  /**
   * Open the send and receive endpoints
   * Fully disconnects first when already connected
   * @param endpoint - Remote host/port and local receive port
   * @param onMessage - Invoked once per decoded inbound message
   */
  connect(endpoint: OscEndpoint, onMessage: MessageHandler): Promise<void>;

  /**
   * Close both endpoints (no-op when not connected)
   */
  disconnect(): Promise<void>;

  /**
   * Encode and hand a message to the OS send buffer
   * Synchronous; delivery is never confirmed
   * @throws NotConnectedError when not connected
   */
  send(address: string, args?: readonly OscArgument[]): void;

  /**
   * Check if both endpoints are open
   */
  isConnected(): boolean;
}
