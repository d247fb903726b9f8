/**
 * Radio Control Plane Errors
 *
 * Thrown error types. Validators never throw for malformed data; these cover
 * the cases where a caller has to decide what to do (refuse a command, fail
 * startup, or fall back to an empty config).
 */

import type { ValidationIssue } from './types/index.js';

export type RadioErrorCode =
  | 'config_load_failed'
  | 'i2c_address_type'
  | 'i2c_address_parse'
  | 'hardware_config_invalid'
  | 'stations_config_invalid'
  | 'forbidden_command'
  | 'command_lex_failed'
  | 'state_file_not_found'
  | 'invalid_state_entry'
  | 'invalid_source_url'
  | 'invalid_settings';

export class RadioError extends Error {
  readonly code: RadioErrorCode;

  constructor(code: RadioErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A configuration file exists but could not be read or decoded
 */
export class ConfigLoadError extends RadioError {
  readonly path: string;

  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super('config_load_failed', `Cannot load ${path}: ${detail}`, options);
    this.path = path;
  }
}

export abstract class I2CAddressError extends RadioError {}

/**
 * The address was neither an integer nor a string
 */
export class I2CAddressTypeError extends I2CAddressError {
  readonly received: string;

  constructor(received: string) {
    super('i2c_address_type', `Unsupported I2C address type: ${received}`);
    this.received = received;
  }
}

/**
 * The address text was not valid hex or decimal
 */
export class I2CAddressParseError extends I2CAddressError {
  readonly text: string;

  constructor(text: string, base: 10 | 16) {
    super('i2c_address_parse', `invalid literal for base ${base}: '${text}'`);
    this.text = text;
  }
}

abstract class ConfigIssuesError extends RadioError {
  readonly issues: readonly ValidationIssue[];

  constructor(code: RadioErrorCode, summary: string, issues: readonly ValidationIssue[]) {
    super(code, `${summary} (${issues.length} issue${issues.length === 1 ? '' : 's'}): ${issues.map(issue => issue.message).join('; ')}`);
    this.issues = issues;
  }
}

export class HardwareConfigError extends ConfigIssuesError {
  constructor(issues: readonly ValidationIssue[]) {
    super('hardware_config_invalid', 'Invalid hardware configuration', issues);
  }
}

export class StationsConfigError extends ConfigIssuesError {
  constructor(issues: readonly ValidationIssue[]) {
    super('stations_config_invalid', 'Invalid stations configuration', issues);
  }
}

export class CommandNotAllowedError extends RadioError {
  readonly command: string;

  constructor(command: string) {
    super('forbidden_command', `Command not allowed: ${command}`);
    this.command = command;
  }
}

export class CommandLexError extends RadioError {
  constructor(command: string, detail: string) {
    super('command_lex_failed', `Cannot split command '${command}': ${detail}`);
  }
}

export class StateFileNotFoundError extends RadioError {
  readonly path: string;

  constructor(path: string) {
    super('state_file_not_found', `State file not found: ${path}`);
    this.path = path;
  }
}

/**
 * A state update cannot be represented as a `key=value` line
 */
export class StateEntryError extends RadioError {
  readonly key: string;

  constructor(key: string, detail: string) {
    super('invalid_state_entry', `Cannot store state key '${key}': ${detail}`);
    this.key = key;
  }
}

export class InvalidSourceUrlError extends RadioError {
  readonly url: string;

  constructor(url: string, detail: string) {
    super('invalid_source_url', `Invalid source URL '${url}': ${detail}`);
    this.url = url;
  }
}

export class SettingsError extends RadioError {
  readonly variable: string;

  constructor(variable: string, detail: string) {
    super('invalid_settings', `${variable}: ${detail}`);
    this.variable = variable;
  }
}
