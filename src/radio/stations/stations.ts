/**
 * Stations Directory
 *
 * Structural validation of the content directory (banks of stations) and its
 * projection to an ordered StationsDirectory. Station records themselves are
 * not validated: their shape is the content provider's concern.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { loadConfigTree } from '../config-loader/config-loader.js';
import { isInteger, isMapping } from '../config-loader/config-tree.js';
import { StationsConfigError } from '../errors.js';
import type { Bank, ConfigMapping, ConfigScalar, ConfigValue, Station, StationsDirectory, ValidationIssue } from '../types/index.js';

const log = createSubsystemLogger('radio/stations');

/**
 * Validates a stations tree and returns human-readable errors
 */
export function validateStationsConfig(tree: ConfigValue): string[] {
  return inspectStationsConfig(tree).map(issue => issue.message);
}

/**
 * Validates a stations tree and returns structured issues
 *
 * A missing or non-mapping `banks` section is reported alone. Each bank is
 * checked independently, in input order.
 */
export function inspectStationsConfig(tree: ConfigValue): ValidationIssue[] {
  if (!isMapping(tree)) {
    return [{ path: '', message: 'Stations config must be a mapping' }];
  }
  if (!tree.has('banks')) {
    return [{ path: 'banks', message: "Missing 'banks' section" }];
  }

  const banks = tree.get('banks');
  if (!isMapping(banks)) {
    return [{ path: 'banks', message: "'banks' must be a mapping" }];
  }

  const issues: ValidationIssue[] = [];
  for (const [bankId, bank] of banks) {
    const path = `banks.${String(bankId)}`;
    if (!isMapping(bank)) {
      issues.push({ path, message: `Bank ${String(bankId)} must be a mapping` });
      continue;
    }
    if (!bank.has('stations')) {
      issues.push({ path, message: `Bank ${String(bankId)} missing 'stations'` });
      continue;
    }
    if (!isMapping(bank.get('stations'))) {
      issues.push({ path: `${path}.stations`, message: `Bank ${String(bankId)}.stations must be a mapping` });
    }
  }
  return issues;
}

/**
 * Reads an index key, accepting integers and their decimal text
 */
function toIndex(key: ConfigScalar): number | undefined {
  if (isInteger(key)) {
    return key;
  }
  if (typeof key === 'string' && /^\d+$/.test(key.trim())) {
    return Number.parseInt(key, 10);
  }
  return undefined;
}

function optionalText(record: ConfigMapping, key: string): string | undefined {
  const value = record.get(key);
  return typeof value === 'string' ? value : undefined;
}

function projectStation(bankIndex: number, key: ConfigScalar, record: ConfigValue): Station {
  const index = toIndex(key);
  const path = `banks.${bankIndex}.stations.${String(key)}`;
  if (index === undefined) {
    throw new StationsConfigError([{ path, message: `Bank ${bankIndex} station key ${String(key)} must be an integer` }]);
  }
  if (!isMapping(record)) {
    throw new StationsConfigError([{ path, message: `Bank ${bankIndex} station ${index} must be a mapping` }]);
  }
  return {
    index,
    name: optionalText(record, 'name'),
    url: optionalText(record, 'url'),
    fields: record,
  };
}

function projectBank(key: ConfigScalar, bank: ConfigMapping): Bank {
  const index = toIndex(key);
  if (index === undefined) {
    throw new StationsConfigError([{ path: `banks.${String(key)}`, message: `Bank key ${String(key)} must be an integer` }]);
  }

  const stations: Station[] = [];
  const records = bank.get('stations');
  if (isMapping(records)) {
    for (const [stationKey, record] of records) {
      stations.push(projectStation(index, stationKey, record));
    }
  }
  stations.sort((a, b) => a.index - b.index);

  return { index, name: optionalText(bank, 'name'), stations };
}

/**
 * Validates a stations tree and projects it to banks ordered by index
 *
 * @throws StationsConfigError carrying every validation issue, or naming a
 * bank or station whose key is not an index
 */
export function toStationsDirectory(tree: ConfigValue): StationsDirectory {
  const issues = inspectStationsConfig(tree);
  if (issues.length > 0 || !isMapping(tree)) {
    throw new StationsConfigError(issues);
  }

  const banks = tree.get('banks');
  const directory: StationsDirectory = [];
  if (isMapping(banks)) {
    for (const [key, bank] of banks) {
      if (isMapping(bank)) {
        directory.push(projectBank(key, bank));
      }
    }
  }
  return directory.sort((a, b) => a.index - b.index);
}

/**
 * Loads, validates and projects a stations file
 */
export function loadStationsDirectory(path: string): StationsDirectory {
  const directory = toStationsDirectory(loadConfigTree(path));
  const stationCount = directory.reduce((sum, bank) => sum + bank.stations.length, 0);
  log.info('Stations directory loaded', { path, banks: directory.length, stations: stationCount });
  return directory;
}

