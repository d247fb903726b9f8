/**
 * Configuration Loader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfigTree, parseConfigText, toConfigValue } from './config-loader.js';
import { describeValue, isInteger, isMapping, isNumber } from './config-tree.js';
import { ConfigLoadError } from '../errors.js';

describe('parseConfigText', () => {
  it('should treat an empty document as an empty mapping', () => {
    expect(parseConfigText('')).toEqual(new Map());
    expect(parseConfigText('# nothing configured yet\n')).toEqual(new Map());
  });

  it('should keep integer mapping keys as integers', () => {
    const tree = parseConfigText('banks:\n  0:\n    name: Jazz\n  "1":\n    name: News\n');

    expect(tree).toEqual(new Map([
      ['banks', new Map<string | number, unknown>([
        [0, new Map([['name', 'Jazz']])],
        ['1', new Map([['name', 'News']])],
      ])],
    ]));
  });

  it('should decode YAML scalars into numbers, booleans, strings and null', () => {
    const tree = parseConfigText('hex: 0x49\nint: 73\nfloat: 0.05\nflag: true\nnothing: null\ntext: "0x49"\n');

    expect(tree).toEqual(new Map<string, unknown>([
      ['hex', 73],
      ['int', 73],
      ['float', 0.05],
      ['flag', true],
      ['nothing', null],
      ['text', '0x49'],
    ]));
  });

  it('should keep the last value of a repeated key', () => {
    const tree = parseConfigText('banks:\n  0:\n    stations: {}\n  0:\n    name: Late\n');

    expect(tree).toEqual(new Map([['banks', new Map([[0, new Map([['name', 'Late']])]])]]));
  });

  it('should apply merge keys without overriding explicit fields', () => {
    const text = [
      'defaults: &ranges',
      '  bank_min: 0',
      '  bank_max: 9',
      'controls:',
      '  <<: *ranges',
      '  bank_max: 3',
    ].join('\n');

    const tree = parseConfigText(text);

    expect(isMapping(tree) ? tree.get('controls') : undefined).toEqual(new Map([['bank_min', 0], ['bank_max', 3]]));
  });

  it('should read a leading zero as octal', () => {
    expect(parseConfigText('bank_max: 010\n')).toEqual(new Map([['bank_max', 8]]));
  });

  it('should keep sequences as arrays', () => {
    expect(parseConfigText('pins: [5, 6, 13, 11]')).toEqual(new Map([['pins', [5, 6, 13, 11]]]));
  });

  it('should return a scalar document unchanged', () => {
    expect(parseConfigText('just text')).toBe('just text');
  });

  it('should throw ConfigLoadError for malformed YAML', () => {
    expect(() => parseConfigText('i2c: [1, 2', 'hardware.yaml')).toThrow(ConfigLoadError);
    expect(() => parseConfigText('i2c: [1, 2', 'hardware.yaml')).toThrow(/^Cannot load hardware\.yaml: invalid YAML/);
  });
});

describe('loadConfigTree', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'radio-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return an empty mapping for a missing file', () => {
    expect(loadConfigTree(join(dir, 'missing.yaml'))).toEqual(new Map());
  });

  it('should load a file from disk', () => {
    const path = join(dir, 'stations.yaml');
    writeFileSync(path, 'banks:\n  0:\n    stations: {}\n');

    expect(loadConfigTree(path)).toEqual(new Map([
      ['banks', new Map([[0, new Map([['stations', new Map()]])]])],
    ]));
  });

  it('should name the file when it is not valid YAML', () => {
    const path = join(dir, 'broken.yaml');
    writeFileSync(path, 'controls: {bank_min: 0\n');

    try {
      loadConfigTree(path);
      expect.unreachable('broken YAML should not load');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigLoadError);
      if (error instanceof ConfigLoadError) {
        expect(error.path).toBe(path);
        expect(error.code).toBe('config_load_failed');
      }
    }
  });
});

describe('toConfigValue', () => {
  it('should convert plain objects into string-keyed mappings', () => {
    expect(toConfigValue({ i2c: { volume_i2c_address: '0x36' }, pins: [1, 2] })).toEqual(new Map<string, unknown>([
      ['i2c', new Map([['volume_i2c_address', '0x36']])],
      ['pins', [1, 2]],
    ]));
  });

  it('should normalize undefined, bigint and dates', () => {
    expect(toConfigValue(undefined)).toBeNull();
    expect(toConfigValue(BigInt(54))).toBe(54);
    expect(toConfigValue(new Date('2026-01-02T03:04:05.000Z'))).toBe('2026-01-02T03:04:05.000Z');
  });
});

describe('config tree accessors', () => {
  it('should narrow mappings and numbers', () => {
    expect(isMapping(new Map())).toBe(true);
    expect(isMapping([])).toBe(false);
    expect(isInteger(3)).toBe(true);
    expect(isInteger(3.5)).toBe(false);
    expect(isInteger('3')).toBe(false);
    expect(isNumber(3.5)).toBe(true);
    expect(isNumber(Number.NaN)).toBe(false);
    expect(isNumber(true)).toBe(false);
  });

  it('should describe values the way error messages quote them', () => {
    expect(describeValue('0xZZ')).toBe("'0xZZ'");
    expect(describeValue(16)).toBe('16');
    expect(describeValue(null)).toBe('null');
    expect(describeValue([1, 'a'])).toBe("[1, 'a']");
    expect(describeValue(new Map([['k', 1]]))).toBe("{'k': 1}");
  });
});
