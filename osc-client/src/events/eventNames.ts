// Event name constants for type-safe event handling
// Provides compile-time and runtime safety for event names

/**
 * Event name constants for LiveGateway events
 *
 * Usage:
 * ```typescript
 * gateway.on(GatewayEvents.REQUEST_TIMEOUT, (evt) => {
 *   console.log(evt.address, evt.timeoutMs);
 * });
 * ```
 */
export const GatewayEvents = {
  /** Emitted when the transport is up and Live answered the probe */
  CONNECTED: 'connected',

  /** Emitted when a connected gateway is torn down */
  DISCONNECTED: 'disconnected',

  /** Emitted when a request-response operation gets no reply in time */
  REQUEST_TIMEOUT: 'requestTimeout',

  /** Emitted for an inbound message no pending wait was expecting */
  UNMATCHED_RESPONSE: 'unmatchedResponse',
} as const;

/**
 * Event name constants for transport listener events
 */
export const TransportEvents = {
  /** Emitted for every datagram that failed to decode */
  PARSE_ERROR: 'parseError',

  /** Emitted when consecutive decode failures reach the warning threshold */
  PARSE_ERROR_THRESHOLD: 'parseErrorThreshold',

  /** Emitted for socket-level errors after the endpoints are up */
  SOCKET_ERROR: 'socketError',
} as const;

/**
 * Type representing all valid gateway event names
 */
export type GatewayEventName = (typeof GatewayEvents)[keyof typeof GatewayEvents];

export type TransportEventName = (typeof TransportEvents)[keyof typeof TransportEvents];

/**
 * Type guard to check if a string is a valid gateway event name
 */
export function isGatewayEventName(name: string): name is GatewayEventName {
  return Object.values<string>(GatewayEvents).includes(name);
}
