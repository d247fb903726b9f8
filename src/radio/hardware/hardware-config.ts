/**
 * Hardware Config Projection
 *
 * Turns a validated ConfigValue tree into the typed HardwareConfig used by
 * driver initialization. Validation always runs first; the readers below
 * only fail for fields the variant's validator checks for presence alone.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { loadConfigTree } from '../config-loader/config-loader.js';
import { describeValue, isInteger, isMapping, isNumber } from '../config-loader/config-tree.js';
import { HardwareConfigError, I2CAddressError } from '../errors.js';
import { CONTROL_KEYS, inspectHardwareConfig, STATIONS_URL_KEY } from './configuration.js';
import { parseI2CAddress } from './i2c-address.js';
import { POLLING_DEFAULTS, VOLUME_BUTTON_ACTIONS } from '../types/index.js';
import type {
  ConfigMapping,
  ConfigValue,
  ControlRanges,
  DecodeMap,
  EncoderOledConfig,
  HardwareConfig,
  HardwareVariant,
  RotaryConfig,
  SwitchPins,
  ValidationIssue,
  VolumeButtonAction,
} from '../types/index.js';

const log = createSubsystemLogger('radio/hardware');

function fail(path: string, message: string): never {
  throw new HardwareConfigError([{ path, message }]);
}

function readSection(cfg: ConfigMapping, key: string): ConfigMapping {
  const section = cfg.get(key);
  return isMapping(section) ? section : fail(key, `Missing or invalid '${key}' section (must be a mapping)`);
}

function readInteger(section: ConfigMapping, key: string, path: string): number {
  const value = section.get(key);
  return isInteger(value) ? value : fail(path, `${path} must be an integer`);
}

function readNumber(section: ConfigMapping, key: string, path: string, fallback?: number): number {
  const value = section.has(key) ? section.get(key) : fallback;
  return isNumber(value) ? value : fail(path, `${path} must be a number`);
}

function readAddress(section: ConfigMapping, key: string): number {
  return parseI2CAddress(section.get(key));
}

function readStationsUrl(cfg: ConfigMapping): string | undefined {
  const url = cfg.get(STATIONS_URL_KEY);
  return typeof url === 'string' ? url : undefined;
}

function readControls(cfg: ConfigMapping): ControlRanges {
  const controls = readSection(cfg, 'controls');
  const field = (key: string) => readInteger(controls, key, `controls.${key}`);
  return {
    bankMin: field('bank_min'),
    bankMax: field('bank_max'),
    stationMin: field('station_min'),
    stationMax: field('station_max'),
    volumeMin: field('volume_min'),
    volumeMax: field('volume_max'),
    volumeStep: field('volume_step'),
  };
}

function readSwitchPins(switches: ConfigMapping, name: string): SwitchPins {
  const pins = readSection(switches, name);
  const bit = (key: string) => readInteger(pins, key, `switches.${name}.${key}`);
  return { bit0: bit('bit0'), bit1: bit('bit1'), bit2: bit('bit2'), bit3: bit('bit3') };
}

function readDecodeMap(switches: ConfigMapping, name: string): DecodeMap | undefined {
  const raw = switches.get(name);
  if (!isMapping(raw)) {
    return undefined;
  }
  const decoded = new Map<number, number>();
  for (const [code, digit] of raw) {
    if (isInteger(code) && isInteger(digit)) {
      decoded.set(code, digit);
    }
  }
  return decoded;
}

function readVolumeButton(buttons: ConfigMapping): VolumeButtonAction {
  const action = buttons.get('volume_button');
  const match = VOLUME_BUTTON_ACTIONS.find(allowed => allowed === action);
  return match ?? fail('buttons.volume_button', `buttons.volume_button must be one of: ${VOLUME_BUTTON_ACTIONS.join(', ')}`);
}

function projectRotary(cfg: ConfigMapping): RotaryConfig {
  const switches = readSection(cfg, 'switches');
  const polling = readSection(cfg, 'polling');
  const bankDecodeMap = readDecodeMap(switches, 'bank_decode_map');
  const stationDecodeMap = readDecodeMap(switches, 'station_decode_map');

  return {
    variant: 'rotary',
    i2c: {
      volumeI2cAddress: readAddress(readSection(cfg, 'i2c'), 'volume_i2c_address'),
    },
    switches: {
      stationSwitch: readSwitchPins(switches, 'station_switch'),
      bankSwitch: readSwitchPins(switches, 'bank_switch'),
      ...(bankDecodeMap ? { bankDecodeMap } : {}),
      ...(stationDecodeMap ? { stationDecodeMap } : {}),
    },
    encoders: {
      volumeEncoder: readInteger(readSection(cfg, 'encoders'), 'volume_encoder', 'encoders.volume_encoder'),
    },
    controls: readControls(cfg),
    buttons: {
      volumeButton: readVolumeButton(readSection(cfg, 'buttons')),
    },
    polling: {
      switchPollInterval: readNumber(polling, 'switch_poll_interval', 'polling.switch_poll_interval'),
      switchDebounce: readNumber(polling, 'switch_debounce', 'polling.switch_debounce'),
      switchStabilityWindow: readNumber(
        polling,
        'switch_stability_window',
        'polling.switch_stability_window',
        POLLING_DEFAULTS.switchStabilityWindow,
      ),
      invalidCodeLogInterval: readNumber(
        polling,
        'invalid_code_log_interval',
        'polling.invalid_code_log_interval',
        POLLING_DEFAULTS.invalidCodeLogInterval,
      ),
    },
    stationsUrl: readStationsUrl(cfg),
  };
}

const ENCODER_OLED_ADDRESS_KEYS = ['encoder_i2c_address', 'oled_i2c_address'] as const;

/**
 * Collects the typed-field problems the presence-only encoder/OLED checks let through
 */
function inspectEncoderOledFields(cfg: ConfigMapping): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  const i2c = cfg.get('i2c');
  if (isMapping(i2c)) {
    for (const key of ENCODER_OLED_ADDRESS_KEYS) {
      const path = `i2c.${key}`;
      const address = i2c.get(key);
      try {
        parseI2CAddress(address);
      } catch (error) {
        if (!(error instanceof I2CAddressError)) {
          throw error;
        }
        issues.push({ path, message: `Invalid ${path} (${describeValue(address)}): ${error.message}` });
      }
    }
  }

  const controls = cfg.get('controls');
  if (isMapping(controls)) {
    for (const key of CONTROL_KEYS) {
      if (!isInteger(controls.get(key))) {
        issues.push({ path: `controls.${key}`, message: `controls.${key} must be an integer` });
      }
    }
  }

  return issues;
}

function projectEncoderOled(cfg: ConfigMapping): EncoderOledConfig {
  const i2c = readSection(cfg, 'i2c');
  return {
    variant: 'encoder_oled',
    i2c: {
      encoderI2cAddress: readAddress(i2c, 'encoder_i2c_address'),
      oledI2cAddress: readAddress(i2c, 'oled_i2c_address'),
    },
    controls: readControls(cfg),
    encoders: cfg.get('encoders') ?? null,
    buttons: cfg.get('buttons') ?? null,
    display: cfg.get('display') ?? null,
    stationsUrl: readStationsUrl(cfg),
  };
}

/**
 * Validates a tree and projects it to the typed config for a variant
 *
 * @throws HardwareConfigError carrying every validation issue; for
 * encoder_oled also every control or address that is present but unusable
 */
export function toHardwareConfig(tree: ConfigValue, variant: HardwareVariant): HardwareConfig {
  const issues = inspectHardwareConfig(tree, variant);
  if (issues.length > 0 || !isMapping(tree)) {
    throw new HardwareConfigError(issues);
  }
  if (variant === 'rotary') {
    return projectRotary(tree);
  }

  const fieldIssues = inspectEncoderOledFields(tree);
  if (fieldIssues.length > 0) {
    throw new HardwareConfigError(fieldIssues);
  }
  return projectEncoderOled(tree);
}

/**
 * Loads, validates and projects a hardware config file
 */
export function loadHardwareConfig(path: string, variant: HardwareVariant): HardwareConfig {
  const tree = loadConfigTree(path);
  const config = toHardwareConfig(tree, variant);
  log.info('Hardware config loaded', { path, variant });
  return config;
}
