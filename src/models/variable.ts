// Template variable model

import type { FilterName, LogicOperator, VariableValue } from './types.js';

export interface ChoiceItem {
  readonly value: string;
  readonly label?: string;
  readonly description?: string;
}

export interface PatternRule {
  readonly ruleKind: 'pattern';
  readonly operand: string;
  readonly message?: string;
}

export interface NumericRule {
  readonly ruleKind: 'min_length' | 'max_length' | 'min_value' | 'max_value' | 'min_items' | 'max_items';
  readonly operand: number;
  readonly message?: string;
}

export type ValidationRule = PatternRule | NumericRule;

/**
 * Structured comparison used by show_if / hide_if
 */
export interface ConditionalLogic {
  readonly variable: string;
  readonly operator: LogicOperator;
  readonly value: VariableValue;
}

interface VariableBase {
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
  readonly prompt?: string;
  readonly helpText?: string;
  readonly validationRules: readonly ValidationRule[];
  readonly showIf: readonly ConditionalLogic[];
  readonly hideIf: readonly ConditionalLogic[];
  readonly filters: readonly FilterName[];
}

export interface TextVariable extends VariableBase {
  readonly type: 'string' | 'path' | 'email' | 'url';
  readonly default?: string;
}

export interface BooleanVariable extends VariableBase {
  readonly type: 'boolean';
  readonly default?: boolean;
}

export interface NumberVariable extends VariableBase {
  readonly type: 'integer' | 'float';
  readonly default?: number;
}

export interface ListVariable extends VariableBase {
  readonly type: 'list';
  readonly default?: readonly VariableValue[];
}

export interface ChoiceVariable extends VariableBase {
  readonly type: 'choice';
  readonly choices: readonly ChoiceItem[];
  readonly default?: string;
}

export interface MultiChoiceVariable extends VariableBase {
  readonly type: 'multichoice';
  readonly choices: readonly ChoiceItem[];
  readonly default?: readonly string[];
}

export type TemplateVariable =
  | TextVariable
  | BooleanVariable
  | NumberVariable
  | ListVariable
  | ChoiceVariable
  | MultiChoiceVariable;

export function hasChoices(variable: TemplateVariable): variable is ChoiceVariable | MultiChoiceVariable {
  return variable.type === 'choice' || variable.type === 'multichoice';
}

export function choiceLabel(choice: ChoiceItem): string {
  return choice.label ?? choice.value;
}
