/**
 * Interactive Variable Prompter
 *
 * Asks for template variables the user did not supply, one at a time so that
 * visibility conditions see earlier answers. Needs a TTY.
 */

import inquirer from 'inquirer';
import { simpleGit, type SimpleGit } from 'simple-git';
import { ValidationError, describeError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { hasOwn } from '../../core/validation.js';
import { choiceLabel, type TemplateVariable } from '../../models/variable.js';
import { conditionEvaluator, type ConditionEvaluator } from '../condition/condition-evaluator.js';
import { coerceValue } from '../variables/value-checks.js';
import { VariableResolver } from '../variables/variable-resolver.js';

/** Variables that default to the git user name when they declare no default */
const AUTHOR_VARIABLES = new Set(['author', 'author_name']);

function isSupplied(values: Readonly<Record<string, unknown>>, name: string): boolean {
  return hasOwn(values, name) && values[name] !== undefined && values[name] !== null;
}

function textDefault(variable: TemplateVariable): string | undefined {
  if (variable.default === undefined) {
    return undefined;
  }
  return Array.isArray(variable.default) ? variable.default.join(', ') : String(variable.default);
}

export class VariablePrompter {
  private git: SimpleGit;

  constructor(
    private readonly resolver: VariableResolver = new VariableResolver(),
    private readonly evaluator: ConditionEvaluator = conditionEvaluator,
    basePath?: string
  ) {
    this.git = simpleGit(basePath);
  }

  /**
   * Check if the terminal supports interactive input
   */
  isInteractive(): boolean {
    return process.stdin.isTTY === true;
  }

  /**
   * Git user.name, falling back to user.email; undefined when git has neither
   */
  async getGitUserName(): Promise<string | undefined> {
    try {
      const userName = await this.git.getConfig('user.name', 'global');
      if (userName.value && userName.value.trim()) {
        return userName.value.trim();
      }
      const userEmail = await this.git.getConfig('user.email', 'global');
      if (userEmail.value && userEmail.value.trim()) {
        return userEmail.value.trim();
      }
      return undefined;
    } catch (error) {
      logger.debug('Could not read git user config', { error: describeError(error) });
      return undefined;
    }
  }

  /**
   * Returns the supplied values plus an answer for every visible variable that was missing.
   * Optional questions left blank are not added.
   */
  async promptForMissing(
    variables: readonly TemplateVariable[],
    supplied: Readonly<Record<string, unknown>>,
    systemValues: Readonly<Record<string, unknown>> = {}
  ): Promise<Record<string, unknown>> {
    const values: Record<string, unknown> = { ...supplied };
    const known: Record<string, unknown> = { ...systemValues };

    for (const variable of variables) {
      if (isSupplied(values, variable.name)) {
        known[variable.name] = coerceValue(variable, values[variable.name]);
        continue;
      }
      if (!this.evaluator.isVisible(variable, known)) {
        continue;
      }

      if (!this.isInteractive()) {
        throw new ValidationError(
          `Interactive mode requires a terminal (TTY). Supply '${variable.name}' with --var ${variable.name}=<value>.`,
          variable.name
        );
      }

      const answer = await this.ask(variable);
      if (answer !== undefined) {
        values[variable.name] = answer;
        known[variable.name] = coerceValue(variable, answer);
      }
    }
    return values;
  }

  private async ask(variable: TemplateVariable): Promise<unknown> {
    const message = this.resolver.promptText(variable);

    switch (variable.type) {
      case 'boolean': {
        const { value } = await inquirer.prompt([
          { type: 'confirm', name: 'value', message, default: variable.default ?? false }
        ]);
        return value;
      }
      case 'choice': {
        const { value } = await inquirer.prompt([
          {
            type: 'list',
            name: 'value',
            message,
            choices: variable.choices.map(choice => ({ name: choiceLabel(choice), value: choice.value })),
            default: variable.default
          }
        ]);
        return value;
      }
      case 'multichoice': {
        const selected = new Set(variable.default ?? []);
        const { value } = await inquirer.prompt([
          {
            type: 'checkbox',
            name: 'value',
            message,
            choices: variable.choices.map(choice => ({
              name: choiceLabel(choice),
              value: choice.value,
              checked: selected.has(choice.value)
            }))
          }
        ]);
        return value;
      }
      default:
        return this.askText(variable, message);
    }
  }

  private async askText(variable: TemplateVariable, message: string): Promise<string | undefined> {
    let fallback = textDefault(variable);
    if (fallback === undefined && AUTHOR_VARIABLES.has(variable.name)) {
      fallback = await this.getGitUserName();
    }

    const { value } = await inquirer.prompt([
      {
        type: 'input',
        name: 'value',
        message,
        default: fallback,
        validate: (input: string) => {
          if (input.trim() === '') {
            return variable.required && variable.default === undefined ? `${variable.name} is required` : true;
          }
          return this.resolver.validateValue(variable, coerceValue(variable, input)) ?? true;
        }
      }
    ]);
    const text = String(value ?? '');
    return text.trim() === '' ? undefined : text;
  }
}
