/**
 * StateRecord
 *
 * Flat persistent key/value record shared by the physical-control loop and
 * the management backend. Values are text; consumers parse on read.
 */

export type StateRecord = Record<string, string>;

/** Values accepted by a state update before they are coerced to text */
export type StateValue = string | number | boolean;

export type StateUpdate = Record<string, StateValue>;

export const STATE_KEYS = {
  currentBank: 'current_bank',
  currentStation: 'current_station',
  bankName: 'bank_name',
  stationName: 'station_name',
  playbackState: 'playback_state',
  lastVolume: 'last_volume',
} as const;

export type StateKey = (typeof STATE_KEYS)[keyof typeof STATE_KEYS];

export type PlaybackState = 'playing' | 'paused' | 'stopped';

/** State record as reported to the management surface */
export interface StateView {
  bank: number;
  station: number;
  bankName: string;
  stationName: string;
  playbackState: string;
  lastVolume: number | null;
}
