/**
 * Radio Control Plane Entry Point
 *
 * Validated configuration, persistent playback state and command
 * authorization for the rotary-switch radio appliance.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './config-loader/index.js';
export * from './hardware/index.js';
export * from './stations/index.js';
export * from './state-store/index.js';
export * from './command-authorizer/index.js';
export * from './command-runner/index.js';
export * from './playback-status/index.js';
export * from './settings/index.js';
export * from './startup.js';
export { createRadioControlHandlers } from '../gateway/server-methods/radio-control.js';
export type {
  RadioControlHandlers,
  RadioControlDeps,
  RadioResponse,
  RadioFailure,
  RadioErrorType,
  RadioConfigInfo,
} from '../gateway/server-methods/radio-control.js';
