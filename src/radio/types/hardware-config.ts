/**
 * HardwareConfig
 *
 * Typed views of the two hardware configuration variants. The variant is a
 * deployment choice and is not stored in the file.
 */

import type { ConfigValue } from './config-tree.js';

export const HARDWARE_VARIANTS = ['encoder_oled', 'rotary'] as const;

export type HardwareVariant = (typeof HARDWARE_VARIANTS)[number];

export const VOLUME_BUTTON_ACTIONS = ['play_pause', 'mute_toggle', 'noop'] as const;

export type VolumeButtonAction = (typeof VOLUME_BUTTON_ACTIONS)[number];

export interface ControlRanges {
  bankMin: number;
  bankMax: number;
  stationMin: number;
  stationMax: number;
  volumeMin: number;
  volumeMax: number;
  volumeStep: number;
}

/** GPIO pins of a 4-bit BCD rotary switch, least significant bit first */
export interface SwitchPins {
  bit0: number;
  bit1: number;
  bit2: number;
  bit3: number;
}

/** Raw 4-bit switch code (0-15) to decimal digit (0-9); partial coverage is legal */
export type DecodeMap = ReadonlyMap<number, number>;

export interface PollingSettings {
  /** Seconds between switch reads, > 0 */
  switchPollInterval: number;
  /** Seconds, >= 0 */
  switchDebounce: number;
  /** Seconds a reading must hold before it is accepted, >= 0 */
  switchStabilityWindow: number;
  /** Seconds between repeated invalid-code warnings, >= 0 */
  invalidCodeLogInterval: number;
}

export interface RotaryConfig {
  variant: 'rotary';
  i2c: {
    volumeI2cAddress: number;
  };
  switches: {
    stationSwitch: SwitchPins;
    bankSwitch: SwitchPins;
    bankDecodeMap?: DecodeMap;
    stationDecodeMap?: DecodeMap;
  };
  encoders: {
    volumeEncoder: number;
  };
  controls: ControlRanges;
  buttons: {
    volumeButton: VolumeButtonAction;
  };
  polling: PollingSettings;
  /** Remote source the station directory is refreshed from */
  stationsUrl?: string;
}

export interface EncoderOledConfig {
  variant: 'encoder_oled';
  i2c: {
    encoderI2cAddress: number;
    oledI2cAddress: number;
  };
  controls: ControlRanges;
  /** Sections checked for presence only */
  encoders: ConfigValue;
  buttons: ConfigValue;
  display: ConfigValue;
  stationsUrl?: string;
}

export type HardwareConfig = RotaryConfig | EncoderOledConfig;

export const POLLING_DEFAULTS = {
  switchStabilityWindow: 0.12,
  invalidCodeLogInterval: 5.0,
} as const;
