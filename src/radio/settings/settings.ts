/**
 * Radio Settings
 *
 * Process settings for the management backend, read from the environment
 * once at startup.
 */

import { CommandLexError, SettingsError } from '../errors.js';
import { COMMAND_SETS, splitCommandLine, type CommandSet } from '../command-authorizer/command-authorizer.js';
import { HARDWARE_VARIANTS, type HardwareVariant } from '../types/index.js';

export interface RadioSettings {
  bindHost: string;
  bindPort: number;
  /** Executable substituted for the logical `radio-play` command */
  radioPlayCommand: string;
  stateFile: string;
  hardwareConfigPath: string;
  stationsConfigPath: string;
  hardwareVariant: HardwareVariant;
  commandSet: CommandSet;
  /** Command line that refreshes the stations directory from its source */
  updateStationsCommand: string;
  /** Timeout for ordinary commands */
  commandTimeoutMs: number;
  /** Timeout for refresh and fetch operations */
  longCommandTimeoutMs: number;
}

export type SettingsEnv = Readonly<Record<string, string | undefined>>;

export const DEFAULT_SETTINGS: Readonly<RadioSettings> = Object.freeze({
  bindHost: '0.0.0.0',
  bindPort: 8080,
  radioPlayCommand: 'radio-play',
  stateFile: '/home/radio/.radio-state',
  hardwareConfigPath: '/home/radio/hardware-rotary.yaml',
  stationsConfigPath: '/home/radio/stations.yaml',
  hardwareVariant: 'rotary',
  commandSet: 'standard',
  updateStationsCommand: 'update-stations',
  commandTimeoutMs: 10_000,
  longCommandTimeoutMs: 60_000,
});

function text(env: SettingsEnv, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function integer(env: SettingsEnv, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new SettingsError(name, `expected an integer, got '${raw}'`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min || value > max) {
    throw new SettingsError(name, `must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function choice<T extends string>(env: SettingsEnv, name: string, allowed: readonly T[], fallback: T): T {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const match = allowed.find(candidate => candidate === raw);
  if (match === undefined) {
    throw new SettingsError(name, `must be one of ${allowed.join(', ')}, got '${raw}'`);
  }
  return match;
}

/**
 * Reads a command line that is run without a shell
 */
function commandLine(env: SettingsEnv, name: string, fallback: string): string {
  const value = text(env, name, fallback);
  let argv: string[];
  try {
    argv = splitCommandLine(value);
  } catch (error) {
    if (error instanceof CommandLexError) {
      throw new SettingsError(name, error.message);
    }
    throw error;
  }
  if (argv.length === 0) {
    throw new SettingsError(name, `names no command: '${value}'`);
  }
  return value;
}

/**
 * Reads settings from the environment, applying defaults
 *
 * @throws SettingsError for a malformed value
 */
export function loadRadioSettings(env: SettingsEnv = process.env): Readonly<RadioSettings> {
  return Object.freeze({
    bindHost: text(env, 'BIND_HOST', DEFAULT_SETTINGS.bindHost),
    bindPort: integer(env, 'BIND_PORT', DEFAULT_SETTINGS.bindPort, 1, 65_535),
    radioPlayCommand: text(env, 'RADIO_PLAY_CMD', DEFAULT_SETTINGS.radioPlayCommand),
    stateFile: text(env, 'RADIO_STATE_FILE', DEFAULT_SETTINGS.stateFile),
    hardwareConfigPath: text(env, 'RADIO_HARDWARE_CONFIG', DEFAULT_SETTINGS.hardwareConfigPath),
    stationsConfigPath: text(env, 'RADIO_STATIONS_CONFIG', DEFAULT_SETTINGS.stationsConfigPath),
    hardwareVariant: choice(env, 'RADIO_HARDWARE_VARIANT', HARDWARE_VARIANTS, DEFAULT_SETTINGS.hardwareVariant),
    commandSet: choice(env, 'RADIO_COMMAND_SET', COMMAND_SETS, DEFAULT_SETTINGS.commandSet),
    updateStationsCommand: commandLine(env, 'RADIO_UPDATE_STATIONS_CMD', DEFAULT_SETTINGS.updateStationsCommand),
    commandTimeoutMs: integer(env, 'RADIO_COMMAND_TIMEOUT_MS', DEFAULT_SETTINGS.commandTimeoutMs, 1, 600_000),
    longCommandTimeoutMs: integer(env, 'RADIO_LONG_COMMAND_TIMEOUT_MS', DEFAULT_SETTINGS.longCommandTimeoutMs, 1, 3_600_000),
  });
}
