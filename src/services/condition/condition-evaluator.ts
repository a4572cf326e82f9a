// Condition evaluation for variable visibility and structural inclusion

import { applyLogicOperator, evaluateCondition } from '../../core/expression.js';
import { ConditionSyntaxError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { hasOwn } from '../../core/validation.js';
import type { ConditionalLogic, TemplateVariable } from '../../models/variable.js';
import { renderString } from '../rendering/string-renderer.js';

type Values = Readonly<Record<string, unknown>>;

const TRUE_LITERALS = new Set(['true', '1', 'yes', 'on']);
const FALSE_LITERALS = new Set(['false', '0', 'no', 'off', '']);

/**
 * Case-insensitive boolean literal, or null when the text is something else
 */
export function parseBooleanLiteral(text: string): boolean | null {
  const normalized = text.trim().toLowerCase();
  if (TRUE_LITERALS.has(normalized)) {
    return true;
  }
  if (FALSE_LITERALS.has(normalized)) {
    return false;
  }
  return null;
}

/**
 * Evaluates structured show_if/hide_if logic and string conditions.
 * Stateless; every call is pure apart from warning logs.
 */
export class ConditionEvaluator {
  /**
   * A variable absent from `values` never satisfies a condition
   */
  evaluateLogic(condition: ConditionalLogic, values: Values): boolean {
    if (!hasOwn(values, condition.variable)) {
      return false;
    }
    return applyLogicOperator(condition.operator, values[condition.variable], condition.value);
  }

  /**
   * All showIf conditions hold and no hideIf condition holds
   */
  isVisible(variable: TemplateVariable, values: Values): boolean {
    const shown = variable.showIf.every(condition => this.evaluateLogic(condition, values));
    if (!shown) {
      return false;
    }
    return !variable.hideIf.some(condition => this.evaluateLogic(condition, values));
  }

  /**
   * Evaluates a condition string attached to a directory, file or action.
   * Templated conditions are rendered first. Text that does not parse is false.
   */
  evaluateExpression(condition: string, values: Values): boolean {
    const literal = parseBooleanLiteral(condition);
    if (literal !== null) {
      return literal;
    }

    const text = condition.trim();
    let expression = text;
    if (text.includes('{{')) {
      const rendered = renderString(text, values, { strict: false });
      const renderedLiteral = parseBooleanLiteral(rendered);
      if (renderedLiteral !== null) {
        return renderedLiteral;
      }
      expression = rendered.trim();
    }

    try {
      return evaluateCondition(expression, values);
    } catch (error) {
      if (error instanceof ConditionSyntaxError) {
        logger.warn('Condition is not a valid expression; treating as false', {
          condition: text,
          rendered: expression,
          error: error.message
        });
        return false;
      }
      throw error;
    }
  }
}

export const conditionEvaluator = new ConditionEvaluator();
