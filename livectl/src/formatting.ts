/**
 * Output formatting utilities
 */

import {
  ConnectionError,
  DecodingError,
  MalformedResponseError,
  NotConnectedError,
  TimeoutError,
  ValidationError,
  type DeviceParameter,
  type Note,
  type TimeSignature,
} from '@live-osc/client';

/**
 * Song overview printed by `status`
 */
export interface SongStatus {
  readonly tempo: number;
  readonly timeSignature: TimeSignature;
  readonly isPlaying: boolean;
  readonly numTracks: number;
  readonly numScenes: number;
}

/**
 * One row of the `tracks` listing
 */
export interface TrackSummary {
  readonly index: number;
  readonly name: string;
  readonly volume: number;
  readonly pan: number;
  readonly mute: boolean;
  readonly solo: boolean;
}

/**
 * Format an error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    if (error.actual !== undefined && error.expected !== undefined) {
      return `Error: ${error.message} (actual: ${error.actual}, expected: ${error.expected})`;
    }
    return `Error: ${error.message}`;
  }

  if (error instanceof ConnectionError) {
    const where = error.endpoint === undefined ? '' : ` at ${error.endpoint}`;
    return `Error: Could not connect to Live${where} - ${error.message}`;
  }

  if (error instanceof TimeoutError) {
    return `Error: Live did not respond within ${error.timeoutMs}ms (${error.address})`;
  }

  if (error instanceof MalformedResponseError || error instanceof DecodingError) {
    return `Error: Protocol error - ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Error: ${String(error)}`;
}

/**
 * Get appropriate exit code for error
 *
 * Exit codes follow Unix conventions:
 * - 0: Success (not handled here)
 * - 1: Validation error (bad user input)
 * - 2: Connection/timeout error (Live unreachable or not answering)
 * - 3: Operational error (malformed replies, unexpected failures)
 */
export function getExitCode(error: unknown): number {
  if (error instanceof ValidationError) {
    return 1;
  }

  if (error instanceof ConnectionError || error instanceof TimeoutError || error instanceof NotConnectedError) {
    return 2;
  }

  return 3;
}

export function formatTempo(bpm: number): string {
  return `${bpm.toFixed(2)} BPM`;
}

/**
 * Format the song overview, one "Label: value" line per field
 */
export function formatStatus(status: SongStatus): string[] {
  const rows: Array<[string, string]> = [
    ['Tempo', formatTempo(status.tempo)],
    ['Time signature', `${status.timeSignature.numerator}/${status.timeSignature.denominator}`],
    ['Playing', status.isPlaying ? 'yes' : 'no'],
    ['Tracks', String(status.numTracks)],
    ['Scenes', String(status.numScenes)],
  ];
  const width = Math.max(...rows.map(([label]) => label.length)) + 1;

  return rows.map(([label, value]) => `${`${label}:`.padEnd(width)} ${value}`);
}

/**
 * Format tracks as an aligned table with a header row
 */
export function formatTracks(tracks: readonly TrackSummary[]): string[] {
  if (tracks.length === 0) {
    return ['No tracks'];
  }

  const header = ['#', 'Name', 'Volume', 'Pan', 'Mute', 'Solo'];
  const rows = tracks.map((track) => [
    String(track.index),
    track.name,
    track.volume.toFixed(2),
    formatPan(track.pan),
    track.mute ? 'yes' : 'no',
    track.solo ? 'yes' : 'no',
  ]);

  return formatTable(header, rows);
}

/**
 * Format a note: pitch=60 start=0.000 duration=0.500 velocity=100 [muted]
 */
export function formatNote(note: Note): string {
  const line = `pitch=${note.pitch} start=${note.start.toFixed(3)} duration=${note.duration.toFixed(3)} velocity=${note.velocity}`;
  return note.mute ? `${line} muted` : line;
}

export function formatNotes(notes: readonly Note[]): string[] {
  return notes.length === 0 ? ['No notes'] : notes.map(formatNote);
}

/**
 * Format a device parameter: [id] name = value (min..max)
 */
export function formatParameter(parameter: DeviceParameter): string {
  return `[${parameter.id}] ${parameter.name} = ${parameter.value.toFixed(3)} (${parameter.min.toFixed(3)}..${parameter.max.toFixed(3)})`;
}

export function formatParameters(parameters: readonly DeviceParameter[]): string[] {
  return parameters.length === 0 ? ['No parameters'] : parameters.map(formatParameter);
}

/**
 * Pan as L/R percentage, C for centre
 */
export function formatPan(pan: number): string {
  const percent = Math.round(Math.abs(pan) * 100);
  if (percent === 0) {
    return 'C';
  }
  return pan < 0 ? `${percent}L` : `${percent}R`;
}

function formatTable(header: readonly string[], rows: readonly string[][]): string[] {
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const render = (cells: readonly string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join('  ')
      .trimEnd();

  return [render(header), ...rows.map(render)];
}
