/**
 * State Store Component
 *
 * Persistent flat key/value state with merge-on-write semantics.
 */

export * from './state-store.js';
