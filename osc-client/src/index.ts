// Public API exports for @live-osc/client
// Main entry point for the library

// Main gateway class
export { LiveGateway } from './gateway/liveGateway.js';
export type { NoteInput, NoteRange, RequestOptions } from './gateway/liveGateway.js';

// Reply shapes (for advanced usage)
export { Commands, Lists, Queries, RecordLists } from './gateway/operations.js';
export { Decoders, unwrapList, unwrapRecords, unwrapValue } from './gateway/replies.js';
export type { EchoCount, ListSpec, QuerySpec, RecordListSpec, ValueDecoder } from './gateway/replies.js';
export { APPEND_INDEX, MIDI_MAX, MIDI_MIN, TEMPO_MAX, TEMPO_MIN } from './gateway/validation.js';

// Configuration
export type { GatewayConfig, GatewayConfigInput } from './config.js';
export {
  createConfig,
  validateConfig,
  DEFAULT_HOST,
  DEFAULT_SEND_PORT,
  DEFAULT_RECEIVE_PORT,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_CONNECTION_TIMEOUT,
  DEFAULT_PARSE_ERROR_WARN_THRESHOLD,
  MAX_TIMEOUT,
} from './config.js';

// Error types
export {
  LiveOscError,
  ConnectionError,
  NotConnectedError,
  TimeoutError,
  CancelledError,
  EncodingError,
  DecodingError,
  ValidationError,
  MalformedResponseError,
} from './errors.js';

// Core types
export { OscArg } from './types.js';
export type {
  OscAddress,
  OscValue,
  OscArgument,
  TypedNumber,
  OscMessage,
  OscEndpoint,
  MessageHandler,
  Note,
  DeviceParameter,
  TimeSignature,
} from './types.js';

// Wire codec
export { encodeMessage, encodeBundle, decodeMessage, decodePacket, isBundle } from './protocol/codec.js';

// Transport
export type { OscTransport, TransportState } from './transport/transport.js';
export { UdpTransport, DEFAULT_RECEIVE_ADDRESS } from './transport/udpTransport.js';
export type { UdpTransportOptions } from './transport/udpTransport.js';

// Correlation
export { ResponseCorrelator, DEFAULT_RESPONSE_TIMEOUT } from './correlator/responseCorrelator.js';
export type { PendingResponse } from './correlator/responseCorrelator.js';

// Event types
export { GatewayEvents, TransportEvents, isGatewayEventName } from './events/eventNames.js';
export type { GatewayEventName, TransportEventName } from './events/eventNames.js';
export type {
  GatewayEvent,
  TransportEvent,
  ConnectedEvent,
  DisconnectedEvent,
  RequestTimeoutEvent,
  UnmatchedResponseEvent,
  ParseErrorEvent,
  ParseErrorThresholdEvent,
  SocketErrorEvent,
} from './events/eventTypes.js';
export { TypedEventEmitter } from './events/eventEmitter.js';
export type { GatewayEventMap, TransportEventMap } from './events/eventEmitter.js';

// Logging
export { createLogger, setLogLevel, getLogLevel } from './utils/logger.js';
export type { LogLevel, Logger } from './utils/logger.js';
