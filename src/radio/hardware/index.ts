/**
 * Radio Hardware Configuration
 *
 * Validation and typed projection of the hardware config variants, plus the
 * I2C address parser shared with driver initialization.
 */

export * from './i2c-address.js';
export * from './configuration.js';
export * from './hardware-config.js';
export * from './source-url.js';
