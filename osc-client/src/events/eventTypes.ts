// Event types for gateway and transport observability
// Uses discriminated unions for type-safe event handling

import type { OscEndpoint, OscValue } from '../types.js';

// ============================================================================
// Gateway events
// ============================================================================

export type GatewayEvent = ConnectedEvent | DisconnectedEvent | RequestTimeoutEvent | UnmatchedResponseEvent;

export interface ConnectedEvent {
  readonly type: 'connected';
  readonly endpoint: OscEndpoint;
  readonly tempo: number;
  readonly timestamp: Date;
}

export interface DisconnectedEvent {
  readonly type: 'disconnected';
  readonly reason: 'client-shutdown' | 'reconnect' | 'probe-failed';
  readonly cancelledRequests: number;
  readonly timestamp: Date;
}

export interface RequestTimeoutEvent {
  readonly type: 'requestTimeout';
  readonly address: string;
  readonly timeoutMs: number;
  readonly timestamp: Date;
}

/**
 * Replies nobody waits for are expected (stale replies after a timeout,
 * listeners Live pushes on its own) and are dropped after this event
 */
export interface UnmatchedResponseEvent {
  readonly type: 'unmatchedResponse';
  readonly address: string;
  readonly args: readonly OscValue[];
  readonly timestamp: Date;
}

// ============================================================================
// Transport events
// ============================================================================

export type TransportEvent = ParseErrorEvent | ParseErrorThresholdEvent | SocketErrorEvent;

export interface ParseErrorEvent {
  readonly type: 'parseError';
  readonly error: Error;
  readonly byteLength: number;
  readonly consecutiveErrors: number;
  readonly timestamp: Date;
}

export interface ParseErrorThresholdEvent {
  readonly type: 'parseErrorThreshold';
  readonly consecutiveErrors: number;
  readonly threshold: number;
  readonly timestamp: Date;
}

export interface SocketErrorEvent {
  readonly type: 'socketError';
  readonly socket: 'send' | 'receive';
  readonly error: Error;
  readonly timestamp: Date;
}

/**
 * Helper to create timestamped events
 */
export const EventFactory = {
  connected: (endpoint: OscEndpoint, tempo: number): ConnectedEvent => ({
    type: 'connected',
    endpoint,
    tempo,
    timestamp: new Date(),
  }),

  disconnected: (reason: DisconnectedEvent['reason'], cancelledRequests: number): DisconnectedEvent => ({
    type: 'disconnected',
    reason,
    cancelledRequests,
    timestamp: new Date(),
  }),

  requestTimeout: (address: string, timeoutMs: number): RequestTimeoutEvent => ({
    type: 'requestTimeout',
    address,
    timeoutMs,
    timestamp: new Date(),
  }),

  unmatchedResponse: (address: string, args: readonly OscValue[]): UnmatchedResponseEvent => ({
    type: 'unmatchedResponse',
    address,
    args,
    timestamp: new Date(),
  }),

  parseError: (error: Error, byteLength: number, consecutiveErrors: number): ParseErrorEvent => ({
    type: 'parseError',
    error,
    byteLength,
    consecutiveErrors,
    timestamp: new Date(),
  }),

  parseErrorThreshold: (consecutiveErrors: number, threshold: number): ParseErrorThresholdEvent => ({
    type: 'parseErrorThreshold',
    consecutiveErrors,
    threshold,
    timestamp: new Date(),
  }),

  socketError: (socket: SocketErrorEvent['socket'], error: Error): SocketErrorEvent => ({
    type: 'socketError',
    socket,
    error,
    timestamp: new Date(),
  }),
};
