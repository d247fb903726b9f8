/**
 * State Store
 *
 * Flat `key=value` state file shared by the physical-control loop and the
 * management backend. Every write re-reads the file, overlays the update and
 * rewrites the whole file, so keys not named in an update survive.
 *
 * There is no locking and no atomic replace: two writers racing on the same
 * file can lose an update. Callers that share the file accept that.
 */

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { StateEntryError, StateFileNotFoundError } from '../errors.js';
import { STATE_KEYS } from '../types/index.js';
import type { StateRecord, StateUpdate, StateView } from '../types/index.js';

const log = createSubsystemLogger('radio/state-store');

/**
 * Parses state file text
 *
 * Blank lines and `#` comments are skipped, lines without `=` are ignored,
 * keys and values are trimmed and the last duplicate wins.
 */
export function parseStateText(text: string): StateRecord {
  const entries = new Map<string, string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || !line.includes('=')) {
      continue;
    }
    const separator = line.indexOf('=');
    entries.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
  }
  return Object.fromEntries(entries);
}

/**
 * Serializes a record as one `key=value` line per key
 */
export function serializeState(record: StateRecord): string {
  return Object.entries(record)
    .map(([key, value]) => `${key}=${value}\n`)
    .join('');
}

/**
 * Reads the state file; a missing file is an empty record
 */
export function readState(path: string): StateRecord {
  if (!existsSync(path)) {
    return {};
  }
  return parseStateText(readFileSync(path, 'utf8'));
}

/**
 * Reads the state file, failing when it does not exist
 *
 * @throws StateFileNotFoundError
 */
export function readStateStrict(path: string): StateRecord {
  if (!existsSync(path)) {
    throw new StateFileNotFoundError(path);
  }
  return parseStateText(readFileSync(path, 'utf8'));
}

/**
 * Trims each entry the way a read would and rejects what a line cannot hold
 */
function normalizeUpdate(updates: StateUpdate): StateRecord {
  const normalized = new Map<string, string>();
  for (const [rawKey, raw] of Object.entries(updates)) {
    const key = rawKey.trim();
    const value = String(raw).trim();
    if (!key || key.startsWith('#') || /[=\r\n]/.test(key)) {
      throw new StateEntryError(rawKey, 'keys must be non-empty, must not start with "#" and contain no "=" or line breaks');
    }
    if (/[\r\n]/.test(value)) {
      throw new StateEntryError(rawKey, 'values must not contain line breaks');
    }
    normalized.set(key, value);
  }
  return Object.fromEntries(normalized);
}

/**
 * Merges updates into the state file and rewrites it
 *
 * Keys and values are trimmed and stored as text. Returns the record that
 * was written, which is what the next read returns.
 *
 * @throws StateEntryError when a key or value cannot be stored on one line
 */
export function writeState(path: string, updates: StateUpdate): StateRecord {
  const normalized = normalizeUpdate(updates);
  const merged: StateRecord = { ...readState(path), ...normalized };
  writeFileSync(path, serializeState(merged), 'utf8');
  log.debug('State written', { path, updated: Object.keys(normalized) });
  return merged;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^[+-]?\d+$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

/**
 * Projects a record for the management surface
 *
 * Bank and station default to 0 (also when the stored text is not a number),
 * names to an empty string and playback state to `stopped`.
 */
export function toStateView(record: StateRecord): StateView {
  return {
    bank: parseInteger(record[STATE_KEYS.currentBank]) ?? 0,
    station: parseInteger(record[STATE_KEYS.currentStation]) ?? 0,
    bankName: record[STATE_KEYS.bankName] ?? '',
    stationName: record[STATE_KEYS.stationName] ?? '',
    playbackState: record[STATE_KEYS.playbackState] ?? 'stopped',
    lastVolume: parseInteger(record[STATE_KEYS.lastVolume]) ?? null,
  };
}
