/**
 * Configuration Loader Component
 *
 * Decodes YAML configuration files into untyped ConfigValue trees.
 */

export * from './config-loader.js';
export * from './config-tree.js';
