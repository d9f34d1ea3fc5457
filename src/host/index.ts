/**
 * Host Module
 *
 * Exports host-control types, the PowerShell executor, script builders and queries.
 */

export * from './types.js';
export * from './executor.js';
export * from './commands.js';
export * from './queries.js';
export * from './control.js';
export * from './verbose.js';
