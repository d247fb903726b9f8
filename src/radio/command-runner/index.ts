/**
 * Command Runner Component
 */

export * from './command-runner.js';
