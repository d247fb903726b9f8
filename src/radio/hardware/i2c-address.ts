/**
 * I2C Address Parsing
 *
 * Hardware configs give bus addresses as native integers (`0x49` in YAML),
 * hex strings ("0x49") or decimal strings ("73").
 */

import { I2CAddressParseError, I2CAddressTypeError } from '../errors.js';

const HEX_PATTERN = /^0x[0-9a-f]+$/;
const DECIMAL_PATTERN = /^[+-]?\d+$/;

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Map) {
    return 'mapping';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  return typeof value;
}

/**
 * Normalizes an I2C address to an integer
 *
 * @throws I2CAddressTypeError when the value is neither an integer nor a string
 * @throws I2CAddressParseError when the text is not valid hex or decimal
 *
 * @example
 * parseI2CAddress(0x49);    // 73
 * parseI2CAddress('0x49');  // 73
 * parseI2CAddress(' 73 ');  // 73
 */
export function parseI2CAddress(value: unknown): number {
  if (typeof value === 'number' && Number.isInteger(value)) {
    if (!Number.isSafeInteger(value)) {
      throw new I2CAddressParseError(String(value), 10);
    }
    return value;
  }
  if (typeof value === 'bigint') {
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new I2CAddressParseError(value.toString(), 10);
    }
    return Number(value);
  }
  if (typeof value !== 'string') {
    throw new I2CAddressTypeError(describeType(value));
  }

  const text = value.trim().toLowerCase();
  const base = text.startsWith('0x') ? 16 : 10;
  const pattern = base === 16 ? HEX_PATTERN : DECIMAL_PATTERN;
  if (!pattern.test(text)) {
    throw new I2CAddressParseError(text, base);
  }

  // Past 2^53 the parsed number is no longer the written one
  const address = Number.parseInt(base === 16 ? text.slice(2) : text, base);
  if (!Number.isSafeInteger(address)) {
    throw new I2CAddressParseError(text, base);
  }
  return address;
}

/**
 * Formats an address the way i2cdetect prints it
 */
export function formatI2CAddress(address: number): string {
  return `0x${address.toString(16).padStart(2, '0')}`;
}
