/**
 * Stations Source URL
 *
 * The hardware config carries the URL the stations directory is refreshed
 * from. Updating it is a read-modify-write of the YAML document that keeps
 * every other key and comment; like the state store it takes no lock.
 */

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import YAML from 'yaml';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { loadConfigTree, YAML_OPTIONS } from '../config-loader/config-loader.js';
import { isMapping } from '../config-loader/config-tree.js';
import { ConfigLoadError, InvalidSourceUrlError } from '../errors.js';
import { STATIONS_URL_KEY } from './configuration.js';

const log = createSubsystemLogger('radio/source-url');

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Checks that a source URL is an absolute http(s) URL and returns it trimmed
 *
 * @throws InvalidSourceUrlError
 */
export function normalizeSourceUrl(url: string): string {
  const candidate = url.trim();
  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    throw new InvalidSourceUrlError(url, 'not an absolute URL');
  }
  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    throw new InvalidSourceUrlError(url, `unsupported protocol ${parsed.protocol}`);
  }
  return candidate;
}

/**
 * Reads the stations source URL; undefined when the file or key is absent
 */
export function readStationsSourceUrl(configPath: string): string | undefined {
  const tree = loadConfigTree(configPath);
  if (!isMapping(tree)) {
    return undefined;
  }
  const url = tree.get(STATIONS_URL_KEY);
  return typeof url === 'string' ? url : undefined;
}

/**
 * Persists a new stations source URL into the hardware config
 *
 * A missing file is created holding only the URL.
 *
 * @throws InvalidSourceUrlError
 * @throws ConfigLoadError when the existing file is not a YAML mapping
 */
export function updateStationsSourceUrl(configPath: string, url: string): string {
  const normalized = normalizeSourceUrl(url);
  const text = existsSync(configPath) ? readFileSync(configPath, 'utf8') : '';
  const doc = YAML.parseDocument(text, YAML_OPTIONS);

  if (doc.errors.length > 0) {
    throw new ConfigLoadError(configPath, `invalid YAML: ${doc.errors[0].message}`);
  }
  if (doc.contents !== null && !YAML.isMap(doc.contents)) {
    throw new ConfigLoadError(configPath, 'top level must be a mapping');
  }

  doc.set(STATIONS_URL_KEY, normalized);
  writeFileSync(configPath, doc.toString(), 'utf8');
  log.info('Stations source URL updated', { path: configPath, url: normalized });
  return normalized;
}
