/**
 * I2C Address Parser Tests
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { formatI2CAddress, parseI2CAddress } from './i2c-address.js';
import { I2CAddressError, I2CAddressParseError, I2CAddressTypeError } from '../errors.js';
import { propertyTestConfig } from '../test-setup.js';

describe('parseI2CAddress', () => {
  it('should accept native integers, hex strings and decimal strings alike', () => {
    expect(parseI2CAddress('0x49')).toBe(73);
    expect(parseI2CAddress('73')).toBe(73);
    expect(parseI2CAddress(73)).toBe(73);
  });

  it('should trim whitespace and ignore hex case', () => {
    expect(parseI2CAddress('  0X3C \n')).toBe(0x3c);
    expect(parseI2CAddress('0xAb')).toBe(0xab);
    expect(parseI2CAddress(' 54 ')).toBe(54);
  });

  it('should accept bigint values', () => {
    expect(parseI2CAddress(BigInt(0x36))).toBe(0x36);
  });

  it('should reject floats with a type mismatch', () => {
    expect(() => parseI2CAddress(3.5)).toThrow(I2CAddressTypeError);
    expect(() => parseI2CAddress(3.5)).toThrow('Unsupported I2C address type: float');
  });

  it('should reject non-numeric types with a type mismatch', () => {
    for (const value of [null, undefined, true, ['0x49'], new Map()]) {
      expect(() => parseI2CAddress(value)).toThrow(I2CAddressTypeError);
    }
  });

  it('should reject malformed hex text with a parse failure', () => {
    expect(() => parseI2CAddress('0xZZ')).toThrow(I2CAddressParseError);
    expect(() => parseI2CAddress('0xZZ')).toThrow("invalid literal for base 16: '0xzz'");
    expect(() => parseI2CAddress('0x')).toThrow(I2CAddressParseError);
  });

  it('should reject malformed decimal text with a parse failure', () => {
    expect(() => parseI2CAddress('')).toThrow(I2CAddressParseError);
    expect(() => parseI2CAddress('seventy')).toThrow("invalid literal for base 10: 'seventy'");
    expect(() => parseI2CAddress('-0x10')).toThrow(I2CAddressParseError);
  });

  it('should reject addresses too large to represent exactly', () => {
    expect(() => parseI2CAddress('0x1ffffffffffffffff')).toThrow("invalid literal for base 16: '0x1ffffffffffffffff'");
    expect(() => parseI2CAddress('99999999999999999999')).toThrow(I2CAddressParseError);
    expect(() => parseI2CAddress(2 ** 60)).toThrow(I2CAddressParseError);
    expect(() => parseI2CAddress(2n ** 64n)).toThrow(I2CAddressParseError);
    expect(parseI2CAddress('0x1fffffffffffff')).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('should keep type mismatch and parse failure distinguishable', () => {
    const typeError = captureError(() => parseI2CAddress(3.5));
    const parseError = captureError(() => parseI2CAddress('0xZZ'));

    expect(typeError).toBeInstanceOf(I2CAddressError);
    expect(parseError).toBeInstanceOf(I2CAddressError);
    expect(typeError).not.toBeInstanceOf(I2CAddressParseError);
    expect(parseError).not.toBeInstanceOf(I2CAddressTypeError);
    expect(typeError?.code).toBe('i2c_address_type');
    expect(parseError?.code).toBe('i2c_address_parse');
  });

  it('should agree across encodings for any 7-bit address', () => {
    fc.assert(fc.property(
      fc.integer({ min: 0, max: 0x7f }),
      (address) => {
        expect(parseI2CAddress(address)).toBe(address);
        expect(parseI2CAddress(`0x${address.toString(16)}`)).toBe(address);
        expect(parseI2CAddress(String(address))).toBe(address);
        expect(parseI2CAddress(formatI2CAddress(address))).toBe(address);
      }
    ), propertyTestConfig);
  });
});

describe('formatI2CAddress', () => {
  it('should print two hex digits', () => {
    expect(formatI2CAddress(0x36)).toBe('0x36');
    expect(formatI2CAddress(8)).toBe('0x08');
  });
});

function captureError(fn: () => unknown): I2CAddressError | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof I2CAddressError) {
      return error;
    }
    throw error;
  }
  return undefined;
}
