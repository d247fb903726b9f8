/**
 * ConfigValue
 *
 * Generic decoded form of a YAML configuration file. Untyped until a
 * validator has checked it; mappings keep their original key types so that
 * integer keys (bank indices, decode-map codes) stay integers.
 */

export type ConfigScalar = null | boolean | number | string;

export type ConfigValue = ConfigScalar | ConfigValue[] | Map<ConfigScalar, ConfigValue>;

export type ConfigMapping = Map<ConfigScalar, ConfigValue>;

export type ConfigSequence = ConfigValue[];

/** A single problem found by a validator */
export interface ValidationIssue {
  /** Dotted path of the offending section or field, empty for the document root */
  path: string;
  /** Human-readable description, including the path */
  message: string;
}
