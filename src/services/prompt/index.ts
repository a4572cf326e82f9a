/**
 * Prompt Module
 *
 * Interactive prompting for template variables, with TTY detection
 * and git-based defaults.
 *
 * @module services/prompt
 */

export * from './variable-prompter.js';
