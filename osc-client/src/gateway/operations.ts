// Reply-shape declarations for every request-response operation
// Each query names its address, how many request arguments Live echoes
// before the payload, and how to decode the payload

import type { DeviceParameter, Note, OscValue } from '../types.js';
import { Decoders, type ListSpec, type QuerySpec, type RecordListSpec, type EchoCount, type ValueDecoder } from './replies.js';

function query<T>(address: string, echo: EchoCount, decode: ValueDecoder<T>, emptyDefault?: T): QuerySpec<T> {
  return emptyDefault === undefined ? { address, echo, decode } : { address, echo, decode, emptyDefault };
}

const num = Decoders.number;
const int = Decoders.integer;
const bool = Decoders.boolean;
const str = Decoders.string;

/**
 * Single-value queries
 */
export const Queries = {
  // Connectivity and application
  test: query('/live/test', 0, str),
  applicationVersion: query('/live/application/get/version', 0, str),
  selectedTrack: query('/live/view/get/selected_track', 0, int),
  selectedScene: query('/live/view/get/selected_scene', 0, int),

  // Song
  tempo: query('/live/song/get/tempo', 0, num),
  signatureNumerator: query('/live/song/get/signature_numerator', 0, int),
  signatureDenominator: query('/live/song/get/signature_denominator', 0, int),
  songTime: query('/live/song/get/current_song_time', 0, num),
  songLength: query('/live/song/get/song_length', 0, num),
  numTracks: query('/live/song/get/num_tracks', 0, int),
  numScenes: query('/live/song/get/num_scenes', 0, int),
  numReturnTracks: query('/live/song/get/num_return_tracks', 0, int),
  isPlaying: query('/live/song/get/is_playing', 0, bool),
  swingAmount: query('/live/song/get/swing_amount', 0, num),
  metronome: query('/live/song/get/metronome', 0, bool),
  overdub: query('/live/song/get/overdub', 0, bool),
  loop: query('/live/song/get/loop', 0, bool),
  loopStart: query('/live/song/get/loop_start', 0, num),
  loopLength: query('/live/song/get/loop_length', 0, num),
  recordMode: query('/live/song/get/record_mode', 0, bool),
  sessionRecord: query('/live/song/get/session_record', 0, bool),
  punchIn: query('/live/song/get/punch_in', 0, bool),
  punchOut: query('/live/song/get/punch_out', 0, bool),

  // Tracks: [track]
  trackName: query('/live/track/get/name', 1, str),
  trackVolume: query('/live/track/get/volume', 1, num),
  trackPanning: query('/live/track/get/panning', 1, num),
  trackMute: query('/live/track/get/mute', 1, bool, false),
  trackSolo: query('/live/track/get/solo', 1, bool, false),
  trackArm: query('/live/track/get/arm', 1, bool, false),
  trackColor: query('/live/track/get/color', 1, int),
  trackHasMidiInput: query('/live/track/get/has_midi_input', 1, bool, false),
  trackNumDevices: query('/live/track/get/num_devices', 1, int),
  // [track, send]
  trackSend: query('/live/track/get/send', 2, num),

  // Return and master tracks
  returnVolume: query('/live/return_track/get/volume', 1, num),
  returnPanning: query('/live/return_track/get/panning', 1, num),
  returnMute: query('/live/return_track/get/mute', 1, bool, false),
  returnName: query('/live/return_track/get/name', 1, str),
  masterVolume: query('/live/master_track/get/volume', 0, num),
  masterPanning: query('/live/master_track/get/panning', 0, num),

  // Scenes: [scene]
  sceneName: query('/live/scene/get/name', 1, str),
  sceneColor: query('/live/scene/get/color', 1, int),

  // Clip slots and clips: [track, clip]
  hasClip: query('/live/clip_slot/get/has_clip', 2, bool, false),
  clipName: query('/live/clip/get/name', 2, str),
  clipLength: query('/live/clip/get/length', 2, num),
  clipLoopStart: query('/live/clip/get/loop_start', 2, num),
  clipLoopEnd: query('/live/clip/get/loop_end', 2, num),
  clipIsPlaying: query('/live/clip/get/is_playing', 2, bool, false),
  clipPlayingPosition: query('/live/clip/get/playing_position', 2, num),

  // Devices: [track, device]
  deviceName: query('/live/device/get/name', 2, str),
  deviceClassName: query('/live/device/get/class_name', 2, str),
  deviceNumParameters: query('/live/device/get/num_parameters', 2, int),
  deviceIsActive: query('/live/device/get/is_active', 2, bool, false),
  // [track, device, parameter]
  parameterValue: query('/live/device/get/parameter/value', 3, num),
  parameterName: query('/live/device/get/parameter/name', 3, str),
  parameterDisplayValue: query('/live/device/get/parameter/display_value', 3, str),
  parameterMin: query('/live/device/get/parameter/min', 3, num),
  parameterMax: query('/live/device/get/parameter/max', 3, num),
} as const;

/**
 * Queries answered with a list of values after the echo
 */
export const Lists = {
  trackDeviceNames: { address: '/live/track/get/devices/name', echo: 1, decode: str } satisfies ListSpec<string>,
} as const;

/**
 * Count-prefixed record lists, five values per record
 */
export const RecordLists = {
  clipNotes: {
    address: '/live/clip/get/notes',
    echo: 2,
    recordSize: 5,
    decodeRecord: decodeNote,
  } satisfies RecordListSpec<Note>,
  deviceParameters: {
    address: '/live/device/get/parameters',
    echo: 0,
    recordSize: 5,
    decodeRecord: decodeParameter,
  } satisfies RecordListSpec<DeviceParameter>,
} as const;

/**
 * Fire-and-forget commands
 */
export const Commands = {
  // Transport
  startPlaying: '/live/song/start_playing',
  stopPlaying: '/live/song/stop_playing',
  continuePlaying: '/live/song/continue_playing',
  startRecording: '/live/song/start_recording',
  stopRecording: '/live/song/stop_recording',
  stopAllClips: '/live/song/stop_all_clips',
  tapTempo: '/live/song/tap_tempo',
  undo: '/live/song/undo',
  redo: '/live/song/redo',
  captureMidi: '/live/song/capture_midi',
  triggerSessionRecord: '/live/song/trigger_session_record',
  jumpBy: '/live/song/jump_by',
  jumpTo: '/live/song/jump_to',
  jumpToNextCue: '/live/song/jump_to_next_cue',
  jumpToPrevCue: '/live/song/jump_to_prev_cue',

  // Song
  setTempo: '/live/song/set/tempo',
  setSwingAmount: '/live/song/set/swing_amount',
  setMetronome: '/live/song/set/metronome',
  setOverdub: '/live/song/set/overdub',
  setLoop: '/live/song/set/loop',
  setLoopStart: '/live/song/set/loop_start',
  setLoopLength: '/live/song/set/loop_length',

  // View
  setSelectedTrack: '/live/view/set/selected_track',
  setSelectedScene: '/live/view/set/selected_scene',

  // Tracks
  createMidiTrack: '/live/song/create_midi_track',
  createAudioTrack: '/live/song/create_audio_track',
  createReturnTrack: '/live/song/create_return_track',
  deleteTrack: '/live/song/delete_track',
  duplicateTrack: '/live/song/duplicate_track',
  stopAllTrackClips: '/live/track/stop_all_clips',
  setTrackName: '/live/track/set/name',
  setTrackVolume: '/live/track/set/volume',
  setTrackPanning: '/live/track/set/panning',
  setTrackMute: '/live/track/set/mute',
  setTrackSolo: '/live/track/set/solo',
  setTrackArm: '/live/track/set/arm',
  setTrackColor: '/live/track/set/color',
  setTrackSend: '/live/track/set/send',

  // Return and master tracks
  setReturnVolume: '/live/return_track/set/volume',
  setReturnPanning: '/live/return_track/set/panning',
  setReturnMute: '/live/return_track/set/mute',
  setReturnName: '/live/return_track/set/name',
  setMasterVolume: '/live/master_track/set/volume',
  setMasterPanning: '/live/master_track/set/panning',

  // Scenes
  fireScene: '/live/scene/fire',
  createScene: '/live/song/create_scene',
  deleteScene: '/live/song/delete_scene',
  setSceneName: '/live/scene/set/name',
  setSceneColor: '/live/scene/set/color',

  // Clip slots and clips
  fireClip: '/live/clip_slot/fire',
  stopClip: '/live/clip_slot/stop',
  createClip: '/live/clip_slot/create_clip',
  deleteClip: '/live/clip_slot/delete_clip',
  setClipName: '/live/clip/set/name',
  setClipLength: '/live/clip/set/length',
  setClipLoopStart: '/live/clip/set/loop_start',
  setClipLoopEnd: '/live/clip/set/loop_end',
  addNotes: '/live/clip/add/notes',
  removeNotes: '/live/clip/remove_notes',

  // Devices
  setParameterValue: '/live/device/set/parameter/value',
  setDeviceEnabled: '/live/device/set/enabled',
  setDeviceIsActive: '/live/device/set/is_active',
} as const;

// ============================================================================
// Record decoders
// ============================================================================

function decodeNote(values: readonly OscValue[]): Note | undefined {
  const [pitch, start, duration, velocity, mute] = values;
  if (pitch === undefined || start === undefined || duration === undefined || velocity === undefined || mute === undefined) {
    return undefined;
  }
  const note = {
    pitch: int(pitch),
    start: num(start),
    duration: num(duration),
    velocity: int(velocity),
    mute: bool(mute),
  };
  if (
    note.pitch === undefined ||
    note.start === undefined ||
    note.duration === undefined ||
    note.velocity === undefined ||
    note.mute === undefined
  ) {
    return undefined;
  }
  return { pitch: note.pitch, start: note.start, duration: note.duration, velocity: note.velocity, mute: note.mute };
}

function decodeParameter(values: readonly OscValue[]): DeviceParameter | undefined {
  const [id, name, value, min, max] = values;
  if (id === undefined || name === undefined || value === undefined || min === undefined || max === undefined) {
    return undefined;
  }
  const parameter = { id: int(id), value: num(value), min: num(min), max: num(max) };
  if (
    parameter.id === undefined ||
    parameter.value === undefined ||
    parameter.min === undefined ||
    parameter.max === undefined
  ) {
    return undefined;
  }
  return { id: parameter.id, name: str(name), value: parameter.value, min: parameter.min, max: parameter.max };
}
