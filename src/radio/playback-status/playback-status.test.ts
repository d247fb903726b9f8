/**
 * Playback Status Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_VOLUME, parsePlaybackStatus } from './playback-status.js';

const PLAYING = [
  'Jazz FM: Late Night Session',
  '[playing] #3/12   1:02/0:00 (0%)',
  'volume: 65%   repeat: off   random: off   single: off   consume: off',
].join('\n');

describe('parsePlaybackStatus', () => {
  it('should read a playing status', () => {
    expect(parsePlaybackStatus('Jazz FM: Late Night Session\n', PLAYING)).toEqual({
      currentTrack: 'Jazz FM: Late Night Session',
      state: 'playing',
      isPlaying: true,
      isPaused: false,
      volume: 65,
    });
  });

  it('should read a paused status', () => {
    const status = parsePlaybackStatus('News', 'News\n[paused]  #1/1   0:10/0:00 (0%)\nvolume:100%   repeat: off');

    expect(status.state).toBe('paused');
    expect(status.isPaused).toBe(true);
    expect(status.isPlaying).toBe(false);
    expect(status.volume).toBe(100);
  });

  it('should treat a stopped daemon as stopped', () => {
    const status = parsePlaybackStatus('', 'volume: 30%   repeat: off   random: off');

    expect(status).toEqual({ currentTrack: '', state: 'stopped', isPlaying: false, isPaused: false, volume: 30 });
  });

  it('should fall back to the default volume', () => {
    expect(parsePlaybackStatus('', 'volume: n/a   repeat: off').volume).toBe(DEFAULT_VOLUME);
    expect(parsePlaybackStatus('', '').volume).toBe(50);
  });
});
