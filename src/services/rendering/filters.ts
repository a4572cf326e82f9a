// Name transforms applied to variable values and template placeholders

import type { FilterName } from '../../models/types.js';

export type StringFilter = (value: string) => string;

/**
 * Splits text into words at separators and camelCase boundaries
 */
export function splitWords(value: string): string[] {
  return value
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .replace(/([a-z\d])([A-Z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .filter(word => word.length > 0);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function pascalCase(value: string): string {
  return splitWords(value).map(capitalize).join('');
}

/**
 * Filters a variable may declare. Each one maps a string to a string.
 */
export const FILTERS: Readonly<Record<FilterName, StringFilter>> = {
  snake_case: value => splitWords(value).map(word => word.toLowerCase()).join('_'),
  kebab_case: value => splitWords(value).map(word => word.toLowerCase()).join('-'),
  camel_case: value => {
    const pascal = pascalCase(value);
    return pascal.charAt(0).toLowerCase() + pascal.slice(1);
  },
  pascal_case: pascalCase,
  upper: value => value.toUpperCase(),
  lower: value => value.toLowerCase(),
  title: value => value.toLowerCase().replace(/(^|[^a-z0-9])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase()),
  capitalize: value => capitalize(value),
  strip: value => value.trim(),
  slugify: value => value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\w\s-]/g, '')
    .trim()
    .toLowerCase()
    .replace(/[\s_-]+/g, '-')
    .replace(/^-+|-+$/g, ''),
  sanitize: value => value.replace(/[^\w.-]/g, ''),
  replace_spaces: value => value.replace(/ /g, '_'),
  normalize_path: value => value
    .replace(/\\/g, '/')
    .replace(/\/{2,}/g, '/')
    .replace(/(^|\/)(\.\/)+/g, '$1')
};

export function isFilterName(name: string): name is FilterName {
  return Object.prototype.hasOwnProperty.call(FILTERS, name);
}

/**
 * Applies filters in order
 */
export function applyFilters(value: string, filters: readonly FilterName[]): string {
  return filters.reduce((current, name) => FILTERS[name](current), value);
}
