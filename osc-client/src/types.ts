// Core value types for OSC messages exchanged with Live
// Plain values on the way in, optionally typed numbers on the way out

/**
 * OSC address pattern (e.g. "/live/track/get/volume")
 * Identifies an operation category, NOT a unique request
 */
export type OscAddress = string;

/**
 * A decoded argument as it arrives from the peer
 */
export type OscValue = number | string | boolean;

/**
 * Number tagged with its wire type
 * Plain numbers are encoded as int32 when integral, float32 otherwise
 */
export interface TypedNumber {
  readonly type: 'int' | 'float' | 'double';
  readonly value: number;
}

/**
 * An argument accepted by the encoder
 */
export type OscArgument = OscValue | TypedNumber;

export const OscArg = {
  int: (value: number): TypedNumber => ({ type: 'int', value }),
  float: (value: number): TypedNumber => ({ type: 'float', value }),
  double: (value: number): TypedNumber => ({ type: 'double', value }),
  isTyped: (arg: unknown): arg is TypedNumber =>
    typeof arg === 'object' &&
    arg !== null &&
    'type' in arg &&
    'value' in arg &&
    typeof arg.value === 'number' &&
    (arg.type === 'int' || arg.type === 'float' || arg.type === 'double'),
  /** The plain value an argument would decode to */
  unwrap: (arg: OscArgument): OscValue => (OscArg.isTyped(arg) ? arg.value : arg),
};

/**
 * One logical OSC message
 */
export interface OscMessage {
  readonly address: OscAddress;
  readonly args: OscValue[];
}

/**
 * Remote peer and local listening port
 */
export interface OscEndpoint {
  readonly host: string;
  readonly sendPort: number;
  readonly receivePort: number;
}

/**
 * Callback invoked once per decoded inbound message
 */
export type MessageHandler = (address: OscAddress, args: OscValue[]) => void;

/**
 * MIDI note as stored in a clip
 */
export interface Note {
  readonly pitch: number;
  readonly start: number;
  readonly duration: number;
  readonly velocity: number;
  readonly mute: boolean;
}

/**
 * Device parameter description
 */
export interface DeviceParameter {
  readonly id: number;
  readonly name: string;
  readonly value: number;
  readonly min: number;
  readonly max: number;
}

export interface TimeSignature {
  readonly numerator: number;
  readonly denominator: number;
}
