// Input validation and path safety utilities

import * as path from 'path';
import { SecurityError, ValidationError } from './errors.js';

export const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

/** Prefix check only */
export const URL_PATTERN = /^https?:\/\//;

/** Semantic version with optional pre-release and build metadata */
export const SEMVER_PATTERN = /^(\d+)\.(\d+)\.(\d+)(-[\w.-]+)?(\+[\w.-]+)?$/;

export const STRICT_VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

export const PERMISSION_PATTERN = /^[0-7]{3}$/;

/** Lowercase alphanumeric with hyphens and underscores, at least one alphanumeric */
export const TAG_PATTERN = /^(?=.*[a-z0-9])[a-z0-9_-]+$/;

/**
 * Characters not allowed in file and directory names
 */
const INVALID_NAME_CHARS = /[<>:"|?*]/;

const RESERVED_WINDOWS_NAMES = new Set([
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9'
]);

/**
 * Returns the problem with a file or directory name, or null when it is usable
 */
export function checkItemName(name: string, kind: 'File' | 'Directory'): string | null {
  if (name.trim().length === 0) {
    return `${kind} name cannot be empty`;
  }
  if (INVALID_NAME_CHARS.test(name)) {
    return `${kind} name contains invalid characters: ${name}`;
  }
  if (RESERVED_WINDOWS_NAMES.has(name.split('.')[0].toUpperCase())) {
    return `${kind} name '${name}' is reserved on Windows`;
  }
  if (name.split(/[\\/]/).some(segment => segment === '..')) {
    return `${kind} name '${name}' cannot contain '..'`;
  }
  return null;
}

/**
 * Returns the problem with a path that must stay relative, or null
 */
export function checkRelativePath(value: string): string | null {
  if (value.startsWith('/') || value.startsWith('\\') || value.includes(':')) {
    return 'Path must be relative';
  }
  if (value.split(/[\\/]/).some(segment => segment === '..')) {
    return "Path cannot contain '..'";
  }
  if (value.includes('\0')) {
    return 'Path cannot contain null bytes';
  }
  return null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasOwn(record: Readonly<Record<string, unknown>>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

export function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves `target` against `root` and rejects anything that escapes it
 */
export function ensureInside(root: string, target: string): string {
  const resolvedRoot = path.resolve(root);
  const resolved = path.resolve(resolvedRoot, target);
  const relative = path.relative(resolvedRoot, resolved);
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new SecurityError('Path traversal detected', { root: resolvedRoot, path: target });
  }
  return resolved;
}

/**
 * Parses a 3-digit octal permission string into a mode number
 */
export function parsePermissions(value: string): number {
  if (!PERMISSION_PATTERN.test(value)) {
    throw new ValidationError(`Permissions must be a 3-digit octal string: ${value}`, 'permissions');
  }
  return Number.parseInt(value, 8);
}
