/**
 * Command Authorizer Component
 */

export * from './command-authorizer.js';
