// Type-safe event emitters for the gateway and the transport
// Uses Node.js EventEmitter with TypeScript type safety

import { EventEmitter } from 'events';
import type {
  ConnectedEvent,
  DisconnectedEvent,
  GatewayEvent,
  ParseErrorEvent,
  ParseErrorThresholdEvent,
  RequestTimeoutEvent,
  SocketErrorEvent,
  TransportEvent,
  UnmatchedResponseEvent,
} from './eventTypes.js';

/**
 * Event map for type-safe gateway event handling
 * Maps event names to their corresponding event data
 */
export interface GatewayEventMap {
  connected: ConnectedEvent;
  disconnected: DisconnectedEvent;
  requestTimeout: RequestTimeoutEvent;
  unmatchedResponse: UnmatchedResponseEvent;
}

/**
 * Event map for type-safe transport event handling
 */
export interface TransportEventMap {
  parseError: ParseErrorEvent;
  parseErrorThreshold: ParseErrorThresholdEvent;
  socketError: SocketErrorEvent;
}

/**
 * Node.js EventEmitter narrowed to one event map
 * Every event carries exactly one data argument
 */
export class TypedEventEmitter<TEvents extends object> extends EventEmitter {
  /**
   * Emit a typed event
   */
  override emit<K extends keyof TEvents & string>(event: K, data: TEvents[K]): boolean {
    return super.emit(event, data);
  }

  /**
   * Add a typed event listener
   */
  override on<K extends keyof TEvents & string>(event: K, listener: (data: TEvents[K]) => void): this {
    return super.on(event, listener);
  }

  /**
   * Add a typed event listener (one-time)
   */
  override once<K extends keyof TEvents & string>(event: K, listener: (data: TEvents[K]) => void): this {
    return super.once(event, listener);
  }

  /**
   * Remove a typed event listener
   */
  override off<K extends keyof TEvents & string>(event: K, listener: (data: TEvents[K]) => void): this {
    return super.off(event, listener);
  }
}

/**
 * Helper to emit a GatewayEvent using the appropriate event name
 */
export function emitGatewayEvent(emitter: TypedEventEmitter<GatewayEventMap>, event: GatewayEvent): void {
  switch (event.type) {
    case 'connected':
      emitter.emit('connected', event);
      break;
    case 'disconnected':
      emitter.emit('disconnected', event);
      break;
    case 'requestTimeout':
      emitter.emit('requestTimeout', event);
      break;
    case 'unmatchedResponse':
      emitter.emit('unmatchedResponse', event);
      break;
  }
}

/**
 * Helper to emit a TransportEvent using the appropriate event name
 */
export function emitTransportEvent(emitter: TypedEventEmitter<TransportEventMap>, event: TransportEvent): void {
  switch (event.type) {
    case 'parseError':
      emitter.emit('parseError', event);
      break;
    case 'parseErrorThreshold':
      emitter.emit('parseErrorThreshold', event);
      break;
    case 'socketError':
      emitter.emit('socketError', event);
      break;
  }
}
