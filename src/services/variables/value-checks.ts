// Type, rule and coercion checks for variable values

import { matchesAtStart } from '../../core/expression.js';
import { EMAIL_PATTERN, URL_PATTERN } from '../../core/validation.js';
import type { TemplateVariable, ValidationRule } from '../../models/variable.js';

/**
 * Returns the type error for a value, or null when the value fits the variable
 */
export function checkType(variable: TemplateVariable, value: unknown): string | null {
  const name = variable.name;
  switch (variable.type) {
    case 'string':
    case 'path':
      return typeof value === 'string' ? null : `Variable '${name}' must be string`;
    case 'email':
      if (typeof value !== 'string') {
        return `Variable '${name}' must be string`;
      }
      return EMAIL_PATTERN.test(value) ? null : `Variable '${name}' must be valid email address`;
    case 'url':
      if (typeof value !== 'string') {
        return `Variable '${name}' must be string`;
      }
      return URL_PATTERN.test(value) ? null : `Variable '${name}' must be valid URL`;
    case 'boolean':
      return typeof value === 'boolean' ? null : `Variable '${name}' must be boolean`;
    case 'integer':
      return Number.isInteger(value) ? null : `Variable '${name}' must be integer`;
    case 'float':
      return typeof value === 'number' && Number.isFinite(value) ? null : `Variable '${name}' must be number`;
    case 'list':
      return Array.isArray(value) ? null : `Variable '${name}' must be list`;
    case 'choice': {
      const allowed = variable.choices.map(choice => choice.value);
      if (typeof value === 'string' && allowed.includes(value)) {
        return null;
      }
      return `Invalid choice '${String(value)}' for variable '${name}'. Must be one of: ${allowed.join(', ')}`;
    }
    case 'multichoice': {
      if (!Array.isArray(value)) {
        return `Variable '${name}' must be list`;
      }
      const allowed = variable.choices.map(choice => choice.value);
      const valid = value.every(item => typeof item === 'string' && allowed.includes(item));
      return valid ? null : `Variable '${name}' must be one of: ${allowed.join(', ')}`;
    }
  }
}

function ruleFailure(name: string, rule: ValidationRule, value: unknown): string | null {
  if (rule.ruleKind === 'pattern') {
    if (typeof value !== 'string' || matchesAtStart(rule.operand, value)) {
      return null;
    }
    return `Variable '${name}' must match pattern: ${rule.operand}`;
  }

  const limit = rule.operand;
  switch (rule.ruleKind) {
    case 'min_length':
      if ((typeof value === 'string' || Array.isArray(value)) && value.length < limit) {
        return `Variable '${name}' must be at least ${limit} characters`;
      }
      return null;
    case 'max_length':
      if ((typeof value === 'string' || Array.isArray(value)) && value.length > limit) {
        return `Variable '${name}' must be at most ${limit} characters`;
      }
      return null;
    case 'min_value':
      return typeof value === 'number' && value < limit ? `Variable '${name}' must be at least ${limit}` : null;
    case 'max_value':
      return typeof value === 'number' && value > limit ? `Variable '${name}' must be at most ${limit}` : null;
    case 'min_items':
      return Array.isArray(value) && value.length < limit ? `Variable '${name}' must have at least ${limit} items` : null;
    case 'max_items':
      return Array.isArray(value) && value.length > limit ? `Variable '${name}' must have at most ${limit} items` : null;
  }
}

/**
 * First failing rule's message (custom message first), or null.
 * Rules that do not apply to the value's type pass.
 */
export function checkRules(variable: TemplateVariable, value: unknown): string | null {
  for (const rule of variable.validationRules) {
    const failure = ruleFailure(variable.name, rule, value);
    if (failure) {
      return rule.message ?? failure;
    }
  }
  return null;
}

const TRUE_WORDS = new Set(['true', 'yes', '1', 'on']);
const FALSE_WORDS = new Set(['false', 'no', '0', 'off']);

/**
 * Converts command-line text into the variable's type. Values that do not convert are
 * returned unchanged so the type check reports them.
 */
export function coerceValue(variable: TemplateVariable, value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const text = value.trim();
  switch (variable.type) {
    case 'boolean': {
      const lowered = text.toLowerCase();
      if (TRUE_WORDS.has(lowered)) {
        return true;
      }
      return FALSE_WORDS.has(lowered) ? false : value;
    }
    case 'integer':
      return /^-?\d+$/.test(text) ? Number.parseInt(text, 10) : value;
    case 'float': {
      const parsed = Number(text);
      return text.length > 0 && Number.isFinite(parsed) ? parsed : value;
    }
    case 'list':
    case 'multichoice':
      return text.length === 0
        ? []
        : text.split(',').map(item => item.trim()).filter(item => item.length > 0);
    default:
      return value;
  }
}
