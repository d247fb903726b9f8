/**
 * Playback Status Component
 */

export * from './playback-status.js';
