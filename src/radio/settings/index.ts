/**
 * Radio Settings Component
 *
 * Environment-driven process settings for the management backend.
 */

export * from './settings.js';
