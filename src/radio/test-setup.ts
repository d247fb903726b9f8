/**
 * Property-Based Testing Setup for the Radio Control Plane
 *
 * Shared fast-check generators and fixtures.
 */

import * as fc from 'fast-check';
import { toConfigValue } from './config-loader/config-loader.js';
import type { ConfigValue } from './types/index.js';

/**
 * Test configuration for property-based tests
 */
export const propertyTestConfig = {
  numRuns: 50,
};

/** A rotary config that passes validation, as the YAML loader would decode it */
export function validRotaryTree(): Map<string, unknown> {
  return new Map<string, unknown>([
    ['i2c', new Map([['volume_i2c_address', '0x36']])],
    ['switches', new Map<string, unknown>([
      ['station_switch', new Map([['bit0', 10], ['bit1', 9], ['bit2', 22], ['bit3', 17]])],
      ['bank_switch', new Map([['bit0', 5], ['bit1', 6], ['bit2', 13], ['bit3', 11]])],
    ])],
    ['encoders', new Map([['volume_encoder', 0]])],
    ['controls', new Map([
      ['bank_min', 0], ['bank_max', 9],
      ['station_min', 0], ['station_max', 9],
      ['volume_min', 0], ['volume_max', 100], ['volume_step', 5],
    ])],
    ['buttons', new Map([['volume_button', 'play_pause']])],
    ['polling', new Map([['switch_poll_interval', 0.05], ['switch_debounce', 0.2]])],
  ]);
}

/** A legacy encoder/OLED config that passes validation */
export function validEncoderOledTree(): Map<string, unknown> {
  return new Map<string, unknown>([
    ['i2c', new Map<string, unknown>([['encoder_i2c_address', 0x36], ['oled_i2c_address', '0x3c']])],
    ['encoders', new Map([['bank', 0], ['station', 1], ['volume', 2]])],
    ['controls', new Map([
      ['bank_min', 0], ['bank_max', 3],
      ['station_min', 0], ['station_max', 7],
      ['volume_min', 0], ['volume_max', 100], ['volume_step', 2],
    ])],
    ['buttons', new Map([['bank', 'noop']])],
    ['display', new Map([['width', 128], ['height', 64]])],
  ]);
}

/**
 * Replaces one section (or removes it when value is undefined) and converts to a ConfigValue
 */
export function withSection(base: Map<string, unknown>, key: string, value: unknown): ConfigValue {
  const copy = new Map(base);
  if (value === undefined) {
    copy.delete(key);
  } else {
    copy.set(key, value);
  }
  return toConfigValue(copy);
}

/** GPIO pin on the 40-pin header */
export const gpioPinArbitrary = fc.integer({ min: 0, max: 27 });

export const controlRangeArbitrary = fc
  .tuple(fc.integer({ min: 0, max: 99 }), fc.integer({ min: 0, max: 99 }))
  .map(([a, b]) => [Math.min(a, b), Math.max(a, b)] as const);

/** Partial decode map with every entry in range */
export const decodeMapArbitrary = fc
  .dictionary(fc.integer({ min: 0, max: 15 }).map(String), fc.integer({ min: 0, max: 9 }))
  .map(entries => new Map(Object.entries(entries).map(([code, digit]) => [Number(code), digit] as const)));

/** Rotary config trees that must validate cleanly */
export const validRotaryTreeArbitrary: fc.Arbitrary<ConfigValue> = fc
  .record({
    address: fc.oneof(
      fc.integer({ min: 0x03, max: 0x77 }),
      fc.integer({ min: 0x03, max: 0x77 }).map(value => `0x${value.toString(16)}`),
      fc.integer({ min: 0x03, max: 0x77 }).map(String),
    ),
    stationPins: fc.tuple(gpioPinArbitrary, gpioPinArbitrary, gpioPinArbitrary, gpioPinArbitrary),
    bankPins: fc.tuple(gpioPinArbitrary, gpioPinArbitrary, gpioPinArbitrary, gpioPinArbitrary),
    bankDecodeMap: fc.option(decodeMapArbitrary, { nil: undefined }),
    banks: controlRangeArbitrary,
    stations: controlRangeArbitrary,
    volumes: controlRangeArbitrary,
    volumeStep: fc.integer({ min: 1, max: 20 }),
    volumeButton: fc.constantFrom('play_pause', 'mute_toggle', 'noop'),
    pollInterval: fc.double({ min: 0.001, max: 1, noNaN: true }),
    debounce: fc.double({ min: 0, max: 1, noNaN: true }),
  })
  .map(spec => {
    const pins = (values: readonly number[]) => new Map(values.map((pin, bit) => [`bit${bit}`, pin] as const));
    const switches = new Map<string, unknown>([
      ['station_switch', pins(spec.stationPins)],
      ['bank_switch', pins(spec.bankPins)],
    ]);
    if (spec.bankDecodeMap) {
      switches.set('bank_decode_map', spec.bankDecodeMap);
    }
    return toConfigValue(new Map<string, unknown>([
      ['i2c', new Map([['volume_i2c_address', spec.address]])],
      ['switches', switches],
      ['encoders', new Map([['volume_encoder', 0]])],
      ['controls', new Map([
        ['bank_min', spec.banks[0]], ['bank_max', spec.banks[1]],
        ['station_min', spec.stations[0]], ['station_max', spec.stations[1]],
        ['volume_min', spec.volumes[0]], ['volume_max', spec.volumes[1]],
        ['volume_step', spec.volumeStep],
      ])],
      ['buttons', new Map([['volume_button', spec.volumeButton]])],
      ['polling', new Map([['switch_poll_interval', spec.pollInterval], ['switch_debounce', spec.debounce]])],
    ]));
  });

/** State keys that survive the `key=value` format */
export const stateKeyArbitrary = fc.stringMatching(/^[a-z][a-z0-9_]{0,15}$/);

/** State values without line breaks or surrounding whitespace */
export const stateValueArbitrary = fc.stringMatching(/^[A-Za-z0-9][A-Za-z0-9 ._:\/=-]{0,30}[A-Za-z0-9]$|^[A-Za-z0-9]?$/);
