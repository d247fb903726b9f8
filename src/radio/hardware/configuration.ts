/**
 * Hardware Configuration Validation
 *
 * Variant-dispatched validation of the hardware config tree. Malformed input
 * is the expected case: every problem becomes an issue, nothing throws, and
 * all issues come back together in the order the fields were checked.
 *
 * A section that is absent or not a mapping produces one section-level issue
 * and its fields are not inspected. Cross-field checks only run once both
 * operands have passed their own type check.
 */

import { describeValue, isInteger, isMapping, isNumber } from '../config-loader/config-tree.js';
import { I2CAddressError } from '../errors.js';
import { parseI2CAddress } from './i2c-address.js';
import { POLLING_DEFAULTS, VOLUME_BUTTON_ACTIONS } from '../types/index.js';
import type { ConfigMapping, ConfigValue, ValidationIssue } from '../types/index.js';

type Report = (path: string, message: string) => void;

export const CONTROL_KEYS = [
  'bank_min',
  'bank_max',
  'station_min',
  'station_max',
  'volume_min',
  'volume_max',
  'volume_step',
] as const;

export type ControlKey = (typeof CONTROL_KEYS)[number];

const CONTROL_PAIRS: ReadonlyArray<readonly [ControlKey, ControlKey]> = [
  ['bank_min', 'bank_max'],
  ['station_min', 'station_max'],
  ['volume_min', 'volume_max'],
];

export const SWITCH_NAMES = ['station_switch', 'bank_switch'] as const;
export const SWITCH_BITS = ['bit0', 'bit1', 'bit2', 'bit3'] as const;
export const DECODE_MAP_NAMES = ['bank_decode_map', 'station_decode_map'] as const;

export const RAW_CODE_RANGE = { min: 0, max: 15 } as const;
export const DIGIT_RANGE = { min: 0, max: 9 } as const;

/** Top-level key holding the remote stations source */
export const STATIONS_URL_KEY = 'stations_url';

/**
 * Validates a hardware config tree and returns human-readable errors
 *
 * An unknown variant yields a single error naming it.
 */
export function validateHardwareConfig(tree: ConfigValue, variant: string): string[] {
  return inspectHardwareConfig(tree, variant).map(issue => issue.message);
}

/**
 * Validates a hardware config tree and returns structured issues
 */
export function inspectHardwareConfig(tree: ConfigValue, variant: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const report: Report = (path, message) => {
    issues.push({ path, message });
  };

  switch (variant) {
    case 'encoder_oled':
      checkEncoderOledConfig(tree, report);
      break;
    case 'rotary':
      checkRotaryConfig(tree, report);
      break;
    default:
      report('', `Unknown hardware variant: ${variant}`);
  }

  return issues;
}

/**
 * Returns the named section when it is a mapping, reporting it otherwise
 */
function requireSection(cfg: ConfigMapping, name: string, report: Report): ConfigMapping | undefined {
  const section = cfg.get(name);
  if (!isMapping(section)) {
    report(name, `Missing or invalid '${name}' section (must be a mapping)`);
    return undefined;
  }
  return section;
}

function checkStationsUrl(cfg: ConfigMapping, report: Report): void {
  const url = cfg.get(STATIONS_URL_KEY);
  if (url !== undefined && url !== null && typeof url !== 'string') {
    report(STATIONS_URL_KEY, `${STATIONS_URL_KEY} must be a string`);
  }
}

// ---------------------------------------------------------------------------
// encoder_oled (legacy): presence checks only
// ---------------------------------------------------------------------------

function checkEncoderOledConfig(tree: ConfigValue, report: Report): void {
  if (!isMapping(tree)) {
    report('', 'Hardware config must be a mapping');
    return;
  }

  const i2c = presentSection(tree, 'i2c', report);
  if (i2c) {
    for (const key of ['encoder_i2c_address', 'oled_i2c_address']) {
      if (!i2c.has(key)) {
        report(`i2c.${key}`, `Missing i2c.${key}`);
      }
    }
  }

  if (!tree.has('encoders')) {
    report('encoders', "Missing 'encoders' section");
  }

  const controls = presentSection(tree, 'controls', report);
  if (controls) {
    for (const key of CONTROL_KEYS) {
      if (!controls.has(key)) {
        report(`controls.${key}`, `Missing controls.${key}`);
      }
    }
  }

  if (!tree.has('buttons')) {
    report('buttons', "Missing 'buttons' section");
  }

  if (!tree.has('display')) {
    report('display', "Missing 'display' section");
  }

  checkStationsUrl(tree, report);
}

/**
 * Presence check for a section whose fields are then looked up by key
 */
function presentSection(cfg: ConfigMapping, name: string, report: Report): ConfigMapping | undefined {
  if (!cfg.has(name)) {
    report(name, `Missing '${name}' section`);
    return undefined;
  }
  const section = cfg.get(name);
  if (!isMapping(section)) {
    report(name, `Invalid '${name}' section (must be a mapping)`);
    return undefined;
  }
  return section;
}

// ---------------------------------------------------------------------------
// rotary: BCD switches for bank/station, I2C encoder for volume
// ---------------------------------------------------------------------------

function checkRotaryConfig(tree: ConfigValue, report: Report): void {
  if (!isMapping(tree)) {
    report('', 'Hardware config must be a mapping');
    return;
  }

  const i2c = requireSection(tree, 'i2c', report);
  if (i2c) {
    checkI2cAddress(i2c, 'volume_i2c_address', report);
  }

  const switches = requireSection(tree, 'switches', report);
  if (switches) {
    checkSwitches(switches, report);
  }

  const encoders = requireSection(tree, 'encoders', report);
  if (encoders && !isInteger(encoders.get('volume_encoder'))) {
    report('encoders.volume_encoder', 'encoders.volume_encoder must be an integer');
  }

  const controls = requireSection(tree, 'controls', report);
  if (controls) {
    checkControlRanges(controls, report);
  }

  const buttons = requireSection(tree, 'buttons', report);
  if (buttons) {
    const action = buttons.get('volume_button');
    if (typeof action !== 'string' || !VOLUME_BUTTON_ACTIONS.some(allowed => allowed === action)) {
      report('buttons.volume_button', `buttons.volume_button must be one of: ${VOLUME_BUTTON_ACTIONS.join(', ')}`);
    }
  }

  const polling = requireSection(tree, 'polling', report);
  if (polling) {
    checkPolling(polling, report);
  }

  checkStationsUrl(tree, report);
}

function checkI2cAddress(i2c: ConfigMapping, key: string, report: Report): void {
  const path = `i2c.${key}`;
  const address = i2c.get(key);
  if (address === undefined || address === null) {
    report(path, `Missing ${path}`);
    return;
  }

  try {
    parseI2CAddress(address);
  } catch (error) {
    if (!(error instanceof I2CAddressError)) {
      throw error;
    }
    report(path, `Invalid ${path} (${describeValue(address)}): ${error.message}`);
  }
}

function checkSwitches(switches: ConfigMapping, report: Report): void {
  for (const name of SWITCH_NAMES) {
    const pins = switches.get(name);
    if (!isMapping(pins)) {
      report(`switches.${name}`, `Missing or invalid switches.${name} (must be a mapping)`);
      continue;
    }
    for (const bit of SWITCH_BITS) {
      if (!isInteger(pins.get(bit))) {
        report(`switches.${name}.${bit}`, `switches.${name}.${bit} must be an integer GPIO pin`);
      }
    }
  }

  for (const name of DECODE_MAP_NAMES) {
    const decodeMap = switches.get(name);
    if (decodeMap === undefined || decodeMap === null) {
      continue;
    }
    if (!isMapping(decodeMap)) {
      report(`switches.${name}`, `switches.${name} must be a mapping of raw_code->decoded_digit`);
      continue;
    }
    checkDecodeMap(name, decodeMap, report);
  }
}

/**
 * Reports every bad entry of a decode map, key before value
 */
function checkDecodeMap(name: string, decodeMap: ConfigMapping, report: Report): void {
  for (const [rawCode, digit] of decodeMap) {
    const label = describeValue(rawCode);
    const path = `switches.${name}.${String(rawCode)}`;

    if (!isInteger(rawCode)) {
      report(path, `switches.${name} key ${label} must be an integer`);
    } else if (rawCode < RAW_CODE_RANGE.min || rawCode > RAW_CODE_RANGE.max) {
      report(path, `switches.${name} key ${label} must be in range ${RAW_CODE_RANGE.min}-${RAW_CODE_RANGE.max}`);
    }

    if (!isInteger(digit)) {
      report(path, `switches.${name}[${label}] must be an integer`);
    } else if (digit < DIGIT_RANGE.min || digit > DIGIT_RANGE.max) {
      report(path, `switches.${name}[${label}] must be in range ${DIGIT_RANGE.min}-${DIGIT_RANGE.max}`);
    }
  }
}

function checkControlRanges(controls: ConfigMapping, report: Report): void {
  for (const key of CONTROL_KEYS) {
    if (!isInteger(controls.get(key))) {
      report(`controls.${key}`, `controls.${key} must be an integer`);
    }
  }

  for (const [minKey, maxKey] of CONTROL_PAIRS) {
    const min = controls.get(minKey);
    const max = controls.get(maxKey);
    if (isInteger(min) && isInteger(max) && min > max) {
      report(`controls.${minKey}`, `controls.${minKey} must be <= controls.${maxKey}`);
    }
  }

  const step = controls.get('volume_step');
  if (isInteger(step) && step <= 0) {
    report('controls.volume_step', 'controls.volume_step must be > 0');
  }
}

function checkPolling(polling: ConfigMapping, report: Report): void {
  const timing = (key: string, fallback?: number): ConfigValue | undefined =>
    polling.has(key) ? polling.get(key) : fallback;

  const pollInterval = timing('switch_poll_interval');
  if (!isNumber(pollInterval) || pollInterval <= 0) {
    report('polling.switch_poll_interval', 'polling.switch_poll_interval must be a number > 0');
  }

  const nonNegative: ReadonlyArray<readonly [string, number | undefined]> = [
    ['switch_debounce', undefined],
    ['switch_stability_window', POLLING_DEFAULTS.switchStabilityWindow],
    ['invalid_code_log_interval', POLLING_DEFAULTS.invalidCodeLogInterval],
  ];
  for (const [key, fallback] of nonNegative) {
    const value = timing(key, fallback);
    if (!isNumber(value) || value < 0) {
      report(`polling.${key}`, `polling.${key} must be a number >= 0`);
    }
  }
}
