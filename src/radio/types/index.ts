/**
 * Radio Control Plane - Type Definitions
 */

export * from './config-tree.js';
export * from './hardware-config.js';
export * from './stations.js';
export * from './radio-state.js';
