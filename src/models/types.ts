// Core type definitions for the project scaffolder

/**
 * Closed set of variable types
 */
export const VARIABLE_TYPES = [
  'string',
  'boolean',
  'integer',
  'float',
  'choice',
  'multichoice',
  'list',
  'email',
  'url',
  'path'
] as const;
export type VariableType = typeof VARIABLE_TYPES[number];

/**
 * Operators accepted by structured (show_if / hide_if) conditions
 */
export const LOGIC_OPERATORS = [
  '==',
  '!=',
  '<',
  '<=',
  '>',
  '>=',
  'in',
  'not_in',
  'contains',
  'not_contains',
  'startswith',
  'endswith',
  'is_empty',
  'is_not_empty',
  'matches',
  'not_matches'
] as const;
export type LogicOperator = typeof LOGIC_OPERATORS[number];

export const RULE_KINDS = [
  'pattern',
  'min_length',
  'max_length',
  'min_value',
  'max_value',
  'min_items',
  'max_items'
] as const;
export type RuleKind = typeof RULE_KINDS[number];

/**
 * Name transforms a variable may declare under `filters`
 */
export const FILTER_NAMES = [
  'snake_case',
  'kebab_case',
  'camel_case',
  'pascal_case',
  'upper',
  'lower',
  'title',
  'capitalize',
  'strip',
  'slugify',
  'sanitize',
  'replace_spaces',
  'normalize_path'
] as const;
export type FilterName = typeof FILTER_NAMES[number];

export const TEMPLATE_CATEGORIES = [
  'script',
  'cli_single',
  'cli_complex',
  'web_api',
  'web_app',
  'library',
  'custom'
] as const;
export type TemplateCategory = typeof TEMPLATE_CATEGORIES[number];

export const TEMPLATE_LICENSES = ['MIT', 'Apache-2.0', 'GPL-3.0', 'BSD-3-Clause', 'Unlicense', 'Proprietary'] as const;
export type TemplateLicense = typeof TEMPLATE_LICENSES[number];

export const OPERATING_SYSTEMS = ['macOS', 'Linux', 'Windows'] as const;
export type OperatingSystem = typeof OPERATING_SYSTEMS[number];

export const FILE_ENCODINGS = ['utf-8', 'ascii', 'latin-1', 'binary'] as const;
export type FileEncoding = typeof FILE_ENCODINGS[number];

export const ACTION_TYPES = ['command', 'script', 'git', 'copy', 'move', 'delete', 'mkdir', 'chmod'] as const;
export type ActionType = typeof ACTION_TYPES[number];

export const PLATFORMS = ['windows', 'macos', 'linux', 'unix'] as const;
export type Platform = typeof PLATFORMS[number];

/**
 * The six lifecycle stages hooks attach to, in model (camelCase) form
 */
export const HOOK_STAGES = ['preGenerate', 'postGenerate', 'preFile', 'postFile', 'onError', 'cleanup'] as const;
export type HookStage = typeof HOOK_STAGES[number];

/**
 * Any value a variable default or condition operand can hold
 */
export type VariableValue =
  | string
  | number
  | boolean
  | null
  | readonly VariableValue[]
  | { readonly [key: string]: VariableValue };

/**
 * Final name -> value map produced by variable resolution
 */
export type ResolvedVariables = Readonly<Record<string, unknown>>;
