/**
 * Radio Settings Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_SETTINGS, loadRadioSettings } from './settings.js';
import { SettingsError } from '../errors.js';

describe('loadRadioSettings', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadRadioSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it('should read every variable', () => {
    const settings = loadRadioSettings({
      BIND_HOST: '127.0.0.1',
      BIND_PORT: '9090',
      RADIO_PLAY_CMD: '/opt/radio/bin/radio-play',
      RADIO_STATE_FILE: '/tmp/radio-state',
      RADIO_HARDWARE_CONFIG: '/etc/radio/hardware.yaml',
      RADIO_STATIONS_CONFIG: '/etc/radio/stations.yaml',
      RADIO_HARDWARE_VARIANT: 'encoder_oled',
      RADIO_COMMAND_SET: 'extended',
      RADIO_UPDATE_STATIONS_CMD: 'update-stations --quiet',
      RADIO_COMMAND_TIMEOUT_MS: '5000',
      RADIO_LONG_COMMAND_TIMEOUT_MS: '120000',
    });

    expect(settings).toEqual({
      bindHost: '127.0.0.1',
      bindPort: 9090,
      radioPlayCommand: '/opt/radio/bin/radio-play',
      stateFile: '/tmp/radio-state',
      hardwareConfigPath: '/etc/radio/hardware.yaml',
      stationsConfigPath: '/etc/radio/stations.yaml',
      hardwareVariant: 'encoder_oled',
      commandSet: 'extended',
      updateStationsCommand: 'update-stations --quiet',
      commandTimeoutMs: 5000,
      longCommandTimeoutMs: 120_000,
    });
  });

  it('should treat blank values as unset', () => {
    expect(loadRadioSettings({ BIND_HOST: '  ', BIND_PORT: '' })).toMatchObject({ bindHost: '0.0.0.0', bindPort: 8080 });
  });

  it('should return frozen settings', () => {
    expect(Object.isFrozen(loadRadioSettings({}))).toBe(true);
  });

  it('should reject a port that is not an integer', () => {
    expect(() => loadRadioSettings({ BIND_PORT: 'http' })).toThrow("BIND_PORT: expected an integer, got 'http'");
  });

  it('should reject a port out of range', () => {
    expect(() => loadRadioSettings({ BIND_PORT: '70000' })).toThrow('BIND_PORT: must be between 1 and 65535, got 70000');
    expect(() => loadRadioSettings({ BIND_PORT: '0' })).toThrow(SettingsError);
  });

  it('should reject an unknown variant or command set', () => {
    expect(() => loadRadioSettings({ RADIO_HARDWARE_VARIANT: 'touchscreen' })).toThrow(
      "RADIO_HARDWARE_VARIANT: must be one of encoder_oled, rotary, got 'touchscreen'"
    );
    expect(() => loadRadioSettings({ RADIO_COMMAND_SET: 'all' })).toThrow(SettingsError);
  });

  it('should reject a refresh command that needs a shell', () => {
    expect(() => loadRadioSettings({ RADIO_UPDATE_STATIONS_CMD: 'update-stations && true' })).toThrow(
      "RADIO_UPDATE_STATIONS_CMD: Cannot split command 'update-stations && true': unexpected shell operator '&&'"
    );
    expect(() => loadRadioSettings({ RADIO_UPDATE_STATIONS_CMD: '# disabled' })).toThrow(
      "RADIO_UPDATE_STATIONS_CMD: names no command: '# disabled'"
    );
  });
});
