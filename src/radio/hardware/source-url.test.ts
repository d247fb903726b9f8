/**
 * Stations Source URL Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { normalizeSourceUrl, readStationsSourceUrl, updateStationsSourceUrl } from './source-url.js';
import { ConfigLoadError, InvalidSourceUrlError } from '../errors.js';

describe('normalizeSourceUrl', () => {
  it('should accept http and https URLs, trimmed', () => {
    expect(normalizeSourceUrl('  https://stations.example/list.yaml ')).toBe('https://stations.example/list.yaml');
    expect(normalizeSourceUrl('http://192.168.1.20:8000/stations')).toBe('http://192.168.1.20:8000/stations');
  });

  it('should reject other protocols', () => {
    expect(() => normalizeSourceUrl('file:///etc/passwd')).toThrow(
      "Invalid source URL 'file:///etc/passwd': unsupported protocol file:"
    );
  });

  it('should reject text that is not an absolute URL', () => {
    expect(() => normalizeSourceUrl('stations.yaml')).toThrow(InvalidSourceUrlError);
    expect(() => normalizeSourceUrl('')).toThrow("Invalid source URL '': not an absolute URL");
  });
});

describe('stations source URL in the hardware config', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'radio-source-url-'));
    configPath = join(dir, 'hardware.yaml');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read nothing from a missing file or a file without the key', () => {
    expect(readStationsSourceUrl(configPath)).toBeUndefined();
    writeFileSync(configPath, 'i2c:\n  volume_i2c_address: 0x36\n');
    expect(readStationsSourceUrl(configPath)).toBeUndefined();
  });

  it('should read a configured URL', () => {
    writeFileSync(configPath, 'stations_url: https://stations.example/a.yaml\n');
    expect(readStationsSourceUrl(configPath)).toBe('https://stations.example/a.yaml');
  });

  it('should update the URL and keep other keys and comments', () => {
    writeFileSync(configPath, '# rotary build\ni2c:\n  volume_i2c_address: 0x36\nstations_url: http://old.example/\n');

    const url = updateStationsSourceUrl(configPath, ' https://new.example/stations.yaml ');

    expect(url).toBe('https://new.example/stations.yaml');
    expect(readStationsSourceUrl(configPath)).toBe('https://new.example/stations.yaml');
    const text = readFileSync(configPath, 'utf8');
    expect(text).toContain('# rotary build');
    expect(text).toContain('volume_i2c_address: 0x36');
  });

  it('should create a missing file', () => {
    updateStationsSourceUrl(configPath, 'https://stations.example/a.yaml');
    expect(readFileSync(configPath, 'utf8')).toBe('stations_url: https://stations.example/a.yaml\n');
  });

  it('should refuse to rewrite a file whose top level is not a mapping', () => {
    writeFileSync(configPath, '- one\n- two\n');
    expect(() => updateStationsSourceUrl(configPath, 'https://stations.example/a.yaml')).toThrow(
      `Cannot load ${configPath}: top level must be a mapping`
    );
  });

  it('should refuse to rewrite malformed YAML', () => {
    writeFileSync(configPath, 'i2c: {volume_i2c_address: 0x36\n');
    expect(() => updateStationsSourceUrl(configPath, 'https://stations.example/a.yaml')).toThrow(ConfigLoadError);
    expect(readFileSync(configPath, 'utf8')).toBe('i2c: {volume_i2c_address: 0x36\n');
  });

  it('should validate the URL before touching the file', () => {
    expect(() => updateStationsSourceUrl(configPath, 'ftp://stations.example/')).toThrow(InvalidSourceUrlError);
    expect(readStationsSourceUrl(configPath)).toBeUndefined();
  });
});
