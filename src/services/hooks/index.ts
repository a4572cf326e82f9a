/**
 * Hooks Module
 *
 * Runs template lifecycle hooks and action groups: file actions inside the
 * generated project, and whitelisted commands, scripts and git invocations.
 *
 * @module services/hooks
 */

export * from './action-executor.js';
export * from './hook-runner.js';
