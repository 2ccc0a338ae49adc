// Input validation for gateway operations
// Every check runs before any I/O; failures surface as ValidationError

import { ValidationError } from '../errors.js';

export const TEMPO_MIN = 20;
export const TEMPO_MAX = 999;
export const MIDI_MIN = 0;
export const MIDI_MAX = 127;

/**
 * Index that may also be -1, meaning "append at the end"
 */
export const APPEND_INDEX = -1;

export function validateNumber(field: string, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(field, `${field} must be a finite number`, String(value), 'finite number');
  }
}

export function validateRange(field: string, value: number, min: number, max: number): void {
  validateNumber(field, value);
  if (value < min || value > max) {
    throw new ValidationError(field, `${field} must be between ${min} and ${max}`, value, `${min}-${max}`);
  }
}

export function validatePositive(field: string, value: number): void {
  validateNumber(field, value);
  if (value <= 0) {
    throw new ValidationError(field, `${field} must be positive`, value, '> 0');
  }
}

export function validateNonNegative(field: string, value: number): void {
  validateNumber(field, value);
  if (value < 0) {
    throw new ValidationError(field, `${field} cannot be negative`, value, '>= 0');
  }
}

/**
 * Track, clip, scene, device, parameter, send and return indices
 */
export function validateIndex(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(field, `${field} must be a non-negative integer`, String(value), '>= 0');
  }
}

/**
 * Insertion index for created tracks and scenes
 */
export function validateInsertIndex(field: string, value: number): void {
  if (!Number.isInteger(value) || value < APPEND_INDEX) {
    throw new ValidationError(field, `${field} must be a non-negative integer or -1`, String(value), '>= -1');
  }
}

export function validateMidi(field: string, value: number): void {
  if (!Number.isInteger(value) || value < MIDI_MIN || value > MIDI_MAX) {
    throw new ValidationError(
      field,
      `${field} must be an integer between ${MIDI_MIN} and ${MIDI_MAX}`,
      String(value),
      `${MIDI_MIN}-${MIDI_MAX}`
    );
  }
}

export function validateTempo(bpm: number): void {
  validateRange('tempo', bpm, TEMPO_MIN, TEMPO_MAX);
}

export function validateVolume(value: number): void {
  validateRange('volume', value, 0, 1);
}

export function validatePan(value: number): void {
  validateRange('pan', value, -1, 1);
}

export function validateColor(value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError('color', 'color must be a non-negative integer', String(value), '>= 0');
  }
}

export function validateName(field: string, value: string): void {
  if (typeof value !== 'string') {
    throw new ValidationError(field, `${field} must be a string`, String(value), 'string');
  }
}
