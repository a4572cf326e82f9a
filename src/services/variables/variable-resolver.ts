// Variable resolution: defaults, visibility, validation and filters

import { VariableResolutionError, type VariableIssue } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { hasOwn } from '../../core/validation.js';
import type { ResolvedVariables } from '../../models/types.js';
import { choiceLabel, type TemplateVariable } from '../../models/variable.js';
import { conditionEvaluator, type ConditionEvaluator } from '../condition/condition-evaluator.js';
import { applyFilters } from '../rendering/filters.js';
import { checkRules, checkType, coerceValue } from './value-checks.js';

export interface ResolveOptions {
  /** Visible to conditions and merged into the result; declared variables win */
  systemValues?: Readonly<Record<string, unknown>>;
  /** Convert command-line strings into typed values before checking */
  coerce?: boolean;
}

/**
 * Turns user-supplied values into the final variable map for rendering
 */
export class VariableResolver {
  constructor(private readonly evaluator: ConditionEvaluator = conditionEvaluator) {}

  /**
   * Resolves variables in declaration order. A condition can only see variables
   * declared before it. Every problem is collected before throwing.
   */
  resolve(
    variables: readonly TemplateVariable[],
    supplied: Readonly<Record<string, unknown>>,
    options: ResolveOptions = {}
  ): ResolvedVariables {
    const system = options.systemValues ?? {};
    const resolved: Record<string, unknown> = {};
    const issues: VariableIssue[] = [];

    for (const variable of variables) {
      const { name } = variable;

      if (!this.evaluator.isVisible(variable, { ...system, ...resolved })) {
        if (hasOwn(supplied, name)) {
          logger.debug(`Ignoring value for hidden variable '${name}'`);
        }
        resolved[name] = variable.default ?? null;
        continue;
      }

      const given = hasOwn(supplied, name) ? supplied[name] : undefined;
      let value: unknown;
      if (given !== undefined && given !== null) {
        value = options.coerce ? coerceValue(variable, given) : given;
      } else if (variable.default !== undefined) {
        value = variable.default;
      } else if (variable.required) {
        issues.push({ variable: name, message: `Variable '${name}' is required` });
        continue;
      } else {
        resolved[name] = null;
        continue;
      }

      const problem = this.validateValue(variable, value);
      if (problem) {
        issues.push({ variable: name, message: problem });
        continue;
      }

      resolved[name] = typeof value === 'string' ? applyFilters(value, variable.filters) : value;
    }

    const declared = new Set(variables.map(variable => variable.name));
    for (const key of Object.keys(supplied)) {
      if (!declared.has(key)) {
        logger.debug(`Ignoring value for undeclared variable '${key}'`);
      }
    }

    if (issues.length > 0) {
      throw new VariableResolutionError(issues);
    }

    return Object.freeze({ ...system, ...resolved });
  }

  /**
   * The type error, or else the first failing rule, or null
   */
  validateValue(variable: TemplateVariable, value: unknown): string | null {
    return checkType(variable, value) ?? checkRules(variable, value);
  }

  /**
   * Text shown when asking for a variable interactively
   */
  promptText(variable: TemplateVariable): string {
    if (variable.prompt) {
      return variable.prompt;
    }
    const base = `Enter ${variable.description.toLowerCase()}`;
    switch (variable.type) {
      case 'boolean':
        return `${base} (y/n)`;
      case 'choice':
        return `${base} (${variable.choices.map(choiceLabel).join(', ')})`;
      case 'multichoice':
        return `${base} (multiple allowed: ${variable.choices.map(choiceLabel).join(', ')})`;
      default:
        return `${base}:`;
    }
  }
}
