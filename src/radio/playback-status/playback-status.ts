/**
 * Playback Status
 *
 * Reads the playback daemon's `mpc current` / `mpc status` output.
 */

import type { PlaybackState } from '../types/index.js';

export const DEFAULT_VOLUME = 50;

export interface PlaybackStatus {
  currentTrack: string;
  state: PlaybackState;
  isPlaying: boolean;
  isPaused: boolean;
  volume: number;
}

const VOLUME_PATTERN = /volume:\s*(\d+)%/;

export function parsePlaybackStatus(currentOutput: string, statusOutput: string): PlaybackStatus {
  const isPlaying = statusOutput.includes('[playing]');
  const isPaused = statusOutput.includes('[paused]');
  const volumeMatch = VOLUME_PATTERN.exec(statusOutput);

  return {
    currentTrack: currentOutput.trim(),
    state: isPlaying ? 'playing' : isPaused ? 'paused' : 'stopped',
    isPlaying,
    isPaused,
    volume: volumeMatch ? Number.parseInt(volumeMatch[1], 10) : DEFAULT_VOLUME,
  };
}
