/**
 * Radio Control Gateway Methods
 *
 * Transport-neutral method table for the local management backend. The HTTP
 * layer maps each method to a route; every result is either
 * `{ success: true, ... }` or `{ success: false, error, errorType }`.
 *
 * Requests are handled one at a time and synchronously, subprocess included.
 * Every command from a request passes the command authorizer before it is
 * split into arguments or executed.
 */

import { createSubsystemLogger, errorMeta } from '../../logging/subsystem.js';
import {
  CommandAuthorizer,
  splitCommandLine,
} from '../../radio/command-authorizer/command-authorizer.js';
import { runCommand, type CommandResult, type CommandRunner } from '../../radio/command-runner/command-runner.js';
import {
  CommandLexError,
  CommandNotAllowedError,
  ConfigLoadError,
  InvalidSourceUrlError,
  StateFileNotFoundError,
} from '../../radio/errors.js';
import { readStationsSourceUrl, updateStationsSourceUrl } from '../../radio/hardware/source-url.js';
import { parsePlaybackStatus, type PlaybackStatus } from '../../radio/playback-status/playback-status.js';
import type { RadioSettings } from '../../radio/settings/settings.js';
import { readStateStrict, toStateView } from '../../radio/state-store/state-store.js';
import type { StateView } from '../../radio/types/index.js';

const log = createSubsystemLogger('gateway/radio-control');

export type RadioErrorType =
  | 'invalid_request'
  | 'forbidden_command'
  | 'command_failed'
  | 'command_not_found'
  | 'timeout'
  | 'state_file_not_found'
  | 'invalid_source_url'
  | 'config_load_failed'
  | 'invalid_settings'
  | 'io_error';

export interface RadioFailure {
  success: false;
  error: string;
  errorType: RadioErrorType;
  exitCode?: number | null;
}

export type RadioResponse<T extends object> = ({ success: true } & T) | RadioFailure;

export interface RadioConfigInfo {
  mode: 'local';
  bindHost: string;
  bindPort: number;
  radioPlayCommand: string;
  hardwareVariant: RadioSettings['hardwareVariant'];
  commandSet: RadioSettings['commandSet'];
}

export interface RadioControlHandlers {
  'radio.command': (params: { command?: unknown }) => RadioResponse<{ output: string; command: string }>;
  'radio.status': () => RadioResponse<PlaybackStatus>;
  'radio.state': () => RadioResponse<StateView>;
  'radio.config': () => RadioResponse<RadioConfigInfo>;
  'radio.getSourceUrl': () => RadioResponse<{ url: string | null }>;
  'radio.setSourceUrl': (params: { url?: unknown }) => RadioResponse<{ url: string }>;
  'radio.refreshStations': () => RadioResponse<{ output: string }>;
}

export interface RadioControlDeps {
  settings: Readonly<RadioSettings>;
  /** Defaults to an authorizer built from the settings */
  authorizer?: CommandAuthorizer;
  /** Defaults to spawning real processes */
  runner?: CommandRunner;
}

function failure(errorType: RadioErrorType, error: string, exitCode?: number | null): RadioFailure {
  return exitCode === undefined ? { success: false, error, errorType } : { success: false, error, errorType, exitCode };
}

/**
 * Maps filesystem errors to io_error and rethrows anything else
 */
function ioFailure(error: unknown): RadioFailure {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    log.error('Filesystem access failed', errorMeta(error));
    return failure('io_error', error.message);
  }
  throw error;
}

type NonOkResult = Exclude<CommandResult, { status: 'ok' }>;

function commandFailure(result: NonOkResult, messages: { failed: string; timeout: string }): RadioFailure {
  switch (result.status) {
    case 'failed':
      return failure('command_failed', result.stderr.trim() || messages.failed, result.exitCode);
    case 'timeout':
      return failure('timeout', messages.timeout);
    case 'not_found':
      return failure('command_not_found', `Command not found: ${result.message}`);
  }
}

/**
 * Creates the radio control method table
 */
export function createRadioControlHandlers(deps: RadioControlDeps): RadioControlHandlers {
  const { settings } = deps;
  const runner = deps.runner ?? runCommand;
  const authorizer = deps.authorizer ?? new CommandAuthorizer({
    commandSet: settings.commandSet,
    aliases: { 'radio-play': settings.radioPlayCommand },
  });

  return {
    /**
     * Runs a whitelisted command
     */
    'radio.command': ({ command }) => {
      if (typeof command !== 'string') {
        return failure('invalid_request', 'Invalid request format');
      }

      let argv: string[];
      try {
        argv = authorizer.authorize(command);
      } catch (error) {
        if (error instanceof CommandNotAllowedError || error instanceof CommandLexError) {
          return failure(error instanceof CommandNotAllowedError ? 'forbidden_command' : 'invalid_request', error.message);
        }
        throw error;
      }

      log.info('Running command', { command });
      const result = runner(argv, { timeoutMs: settings.commandTimeoutMs });
      if (result.status === 'ok') {
        return { success: true, output: result.stdout.trim(), command };
      }
      return commandFailure(result, { failed: 'Command failed', timeout: 'Command timed out' });
    },

    /**
     * Reports what the playback daemon is doing
     */
    'radio.status': () => {
      const options = { timeoutMs: settings.commandTimeoutMs };
      const current = runner(['mpc', 'current'], options);
      const status = runner(['mpc', 'status'], options);

      for (const result of [current, status]) {
        if (result.status === 'timeout' || result.status === 'not_found') {
          return commandFailure(result, { failed: 'Command failed', timeout: 'Timeout getting status' });
        }
      }

      const currentOutput = current.status === 'ok' ? current.stdout : '';
      const statusOutput = status.status === 'ok' || status.status === 'failed' ? status.stdout : '';
      return { success: true, ...parsePlaybackStatus(currentOutput, statusOutput) };
    },

    /**
     * Reads the persisted playback state
     */
    'radio.state': () => {
      try {
        const record = readStateStrict(settings.stateFile);
        return { success: true, ...toStateView(record) };
      } catch (error) {
        if (error instanceof StateFileNotFoundError) {
          return failure('state_file_not_found', error.message);
        }
        return ioFailure(error);
      }
    },

    'radio.config': () => ({
      success: true,
      mode: 'local',
      bindHost: settings.bindHost,
      bindPort: settings.bindPort,
      radioPlayCommand: settings.radioPlayCommand,
      hardwareVariant: settings.hardwareVariant,
      commandSet: settings.commandSet,
    }),

    'radio.getSourceUrl': () => {
      try {
        return { success: true, url: readStationsSourceUrl(settings.hardwareConfigPath) ?? null };
      } catch (error) {
        if (error instanceof ConfigLoadError) {
          return failure('config_load_failed', error.message);
        }
        return ioFailure(error);
      }
    },

    /**
     * Persists a new stations source URL into the hardware config
     */
    'radio.setSourceUrl': ({ url }) => {
      if (typeof url !== 'string') {
        return failure('invalid_request', 'Invalid request format');
      }
      try {
        return { success: true, url: updateStationsSourceUrl(settings.hardwareConfigPath, url) };
      } catch (error) {
        if (error instanceof InvalidSourceUrlError) {
          return failure('invalid_source_url', error.message);
        }
        if (error instanceof ConfigLoadError) {
          return failure('config_load_failed', error.message);
        }
        return ioFailure(error);
      }
    },

    /**
     * Refreshes the stations directory from its source
     */
    'radio.refreshStations': () => {
      let argv: string[];
      try {
        argv = splitCommandLine(settings.updateStationsCommand);
      } catch (error) {
        if (error instanceof CommandLexError) {
          log.error('Station refresh command is invalid', errorMeta(error));
          return failure('invalid_settings', error.message);
        }
        throw error;
      }

      log.info('Refreshing stations', { command: settings.updateStationsCommand });
      const result = runner(argv, { timeoutMs: settings.longCommandTimeoutMs });
      if (result.status === 'ok') {
        return { success: true, output: result.stdout.trim() };
      }
      return commandFailure(result, { failed: 'Station refresh failed', timeout: 'Station refresh timed out' });
    },
  };
}
