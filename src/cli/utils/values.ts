// Variable values given on the command line or in a values file

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ValidationError } from '../../core/errors.js';
import { IDENTIFIER_PATTERN, isRecord } from '../../core/validation.js';

const VALUES_FILE_EXTENSIONS = ['.yaml', '.yml', '.json'];

/**
 * Commander collector for the repeatable --var option
 */
export function collectVar(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Turns `key=value` assignments into a record; later assignments win.
 * Only the first `=` separates, so values may contain `=`.
 */
export function parseVarAssignments(assignments: readonly string[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const assignment of assignments) {
    const separator = assignment.indexOf('=');
    if (separator <= 0) {
      throw new ValidationError(`Invalid --var '${assignment}'. Expected key=value`, 'var');
    }
    const key = assignment.slice(0, separator).trim();
    if (!IDENTIFIER_PATTERN.test(key)) {
      throw new ValidationError(`Invalid variable name '${key}' in --var`, 'var');
    }
    values[key] = assignment.slice(separator + 1);
  }
  return values;
}

/**
 * Reads a YAML or JSON mapping of variable values
 */
export async function readValuesFile(filePath: string): Promise<Record<string, unknown>> {
  const extension = path.extname(filePath).toLowerCase();
  if (!VALUES_FILE_EXTENSIONS.includes(extension)) {
    throw new ValidationError(
      `Unsupported values file type '${extension}'. Expected one of: ${VALUES_FILE_EXTENSIONS.join(', ')}`,
      'values'
    );
  }

  const content = await fs.readFile(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    if (!(error instanceof yaml.YAMLParseError)) {
      throw error;
    }
    throw new ValidationError(`Invalid values file ${filePath}: ${error.message}`, 'values');
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`Values file ${filePath} must contain a mapping of variable names to values`, 'values');
  }
  return parsed;
}
