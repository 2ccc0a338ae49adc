// Protocol constants for OSC 1.0 framing

/**
 * Bundle marker: "#bundle\0"
 */
export const BUNDLE_HEADER = Buffer.from('#bundle\0', 'ascii');

/**
 * Timetag meaning "immediately" (seconds = 0, fraction = 1)
 */
export const IMMEDIATE_TIMETAG = 1n;

/**
 * Type tag characters (subset supported by this client)
 */
export enum TypeTag {
  Int32 = 'i',
  Float32 = 'f',
  Float64 = 'd',
  String = 's',
  True = 'T',
  False = 'F',
}

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;
