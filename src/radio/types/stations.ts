/**
 * StationsDirectory
 *
 * Two-level content index: banks of stations, both keyed by integer index.
 */

import type { ConfigMapping } from './config-tree.js';

export interface Station {
  index: number;
  name?: string;
  url?: string;
  /** The station record as written; its shape belongs to the content provider */
  fields: ConfigMapping;
}

export interface Bank {
  index: number;
  name?: string;
  /** Ascending by station index */
  stations: Station[];
}

/** Ascending by bank index */
export type StationsDirectory = Bank[];
