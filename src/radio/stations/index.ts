/**
 * Stations Directory Component
 */

export * from './stations.js';
