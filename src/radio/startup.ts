/**
 * Radio Startup
 *
 * Loads and validates the hardware and stations configuration before any
 * driver or backend starts. Every issue is logged before startup fails, so a
 * broken file is fixed in one pass.
 */

import { createSubsystemLogger } from '../logging/subsystem.js';
import { HardwareConfigError, StationsConfigError } from './errors.js';
import { formatI2CAddress } from './hardware/i2c-address.js';
import { loadHardwareConfig } from './hardware/hardware-config.js';
import { loadStationsDirectory } from './stations/stations.js';
import type { RadioSettings } from './settings/settings.js';
import type { HardwareConfig, StationsDirectory } from './types/index.js';

const log = createSubsystemLogger('radio/startup');

export interface RadioConfiguration {
  hardware: HardwareConfig;
  stations: StationsDirectory;
}

type ConfigPaths = Pick<RadioSettings, 'hardwareConfigPath' | 'stationsConfigPath' | 'hardwareVariant'>;

function describeAddresses(hardware: HardwareConfig): Record<string, string> {
  if (hardware.variant === 'rotary') {
    return { volume: formatI2CAddress(hardware.i2c.volumeI2cAddress) };
  }
  return {
    encoder: formatI2CAddress(hardware.i2c.encoderI2cAddress),
    oled: formatI2CAddress(hardware.i2c.oledI2cAddress),
  };
}

/**
 * Loads both configuration files
 *
 * @throws HardwareConfigError | StationsConfigError after logging each issue
 */
export function loadRadioConfiguration(settings: ConfigPaths): RadioConfiguration {
  try {
    const hardware = loadHardwareConfig(settings.hardwareConfigPath, settings.hardwareVariant);
    const stations = loadStationsDirectory(settings.stationsConfigPath);
    log.info('Radio configuration ready', {
      variant: hardware.variant,
      i2c: describeAddresses(hardware),
      banks: stations.length,
    });
    return { hardware, stations };
  } catch (error) {
    if (error instanceof HardwareConfigError || error instanceof StationsConfigError) {
      for (const issue of error.issues) {
        log.error(issue.message, { path: issue.path, code: error.code });
      }
    }
    throw error;
  }
}
