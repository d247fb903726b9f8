/**
 * Configuration Loader
 *
 * Reads YAML configuration files into the generic ConfigValue tree. A missing
 * file is not an error: it loads as an empty mapping, the same as an empty
 * document.
 */

import { readFileSync, existsSync } from 'node:fs';
import YAML from 'yaml';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ConfigLoadError } from '../errors.js';
import type { ConfigMapping, ConfigScalar, ConfigValue } from '../types/index.js';

const log = createSubsystemLogger('radio/config-loader');

/**
 * Decoding options shared by every config reader and writer
 *
 * Config files are written for YAML 1.1 loaders: `<<` merge keys apply, `010`
 * is octal and a repeated key keeps its last value.
 */
export const YAML_OPTIONS = { version: '1.1', uniqueKeys: false } as const;

/**
 * Converts a decoded JS value into a ConfigValue tree
 *
 * Maps keep their key types; plain objects become mappings with string keys.
 * Anything that is not a JSON-like value is kept as its string form.
 */
export function toConfigValue(raw: unknown): ConfigValue {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (typeof raw === 'boolean' || typeof raw === 'number' || typeof raw === 'string') {
    return raw;
  }
  if (typeof raw === 'bigint') {
    return Number(raw);
  }
  if (Array.isArray(raw)) {
    return raw.map(item => toConfigValue(item));
  }
  if (raw instanceof Map) {
    const mapping: ConfigMapping = new Map();
    for (const [key, value] of raw) {
      mapping.set(toConfigKey(key), toConfigValue(value));
    }
    return mapping;
  }
  if (raw instanceof Date) {
    return raw.toISOString();
  }
  if (typeof raw === 'object') {
    const mapping: ConfigMapping = new Map();
    for (const [key, value] of Object.entries(raw)) {
      mapping.set(key, toConfigValue(value));
    }
    return mapping;
  }
  return String(raw);
}

function toConfigKey(key: unknown): ConfigScalar {
  const value = toConfigValue(key);
  if (value === null || typeof value !== 'object') {
    return value;
  }
  // Complex YAML keys (`? [a, b]`) are flattened to text
  return String(key);
}

/**
 * Parses YAML text into a ConfigValue tree; an empty document is an empty mapping
 */
export function parseConfigText(text: string, source = '<inline>'): ConfigValue {
  let decoded: unknown;
  try {
    decoded = YAML.parse(text, { ...YAML_OPTIONS, mapAsMap: true });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(source, `invalid YAML: ${detail}`, { cause: error });
  }
  const tree = toConfigValue(decoded);
  return tree ?? new Map();
}

/**
 * Loads a YAML configuration file
 *
 * Returns an empty mapping when the file does not exist. Throws
 * ConfigLoadError when the file exists but cannot be read or parsed.
 */
export function loadConfigTree(path: string): ConfigValue {
  if (!existsSync(path)) {
    log.debug('Config file not found, using empty config', { path });
    return new Map();
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(path, detail, { cause: error });
  }

  const tree = parseConfigText(text, path);
  log.debug('Config file loaded', { path });
  return tree;
}
