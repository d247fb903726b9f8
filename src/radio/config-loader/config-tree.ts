/**
 * ConfigValue accessors
 *
 * Narrowing helpers shared by the validators and the typed projections.
 */

import type { ConfigMapping, ConfigValue } from '../types/index.js';

export function isMapping(value: ConfigValue | undefined): value is ConfigMapping {
  return value instanceof Map;
}

export function isInteger(value: ConfigValue | undefined): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

export function isNumber(value: ConfigValue | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Renders a value for an error message: strings quoted, everything else as written
 */
export function describeValue(value: ConfigValue | undefined): string {
  if (value === undefined) {
    return 'undefined';
  }
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map(item => describeValue(item)).join(', ')}]`;
  }
  if (value instanceof Map) {
    const entries = [...value].map(([key, item]) => `${describeValue(key)}: ${describeValue(item)}`);
    return `{${entries.join(', ')}}`;
  }
  return String(value);
}

