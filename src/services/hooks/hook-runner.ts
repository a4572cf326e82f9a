// Runs a template's lifecycle hooks and action groups

import { ActionError, describeError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { isActionSupportedOn, type ActionGroup, type TemplateAction } from '../../models/action.js';
import type { Template } from '../../models/template.js';
import type { HookStage } from '../../models/types.js';
import { conditionEvaluator, type ConditionEvaluator } from '../condition/condition-evaluator.js';
import { renderString } from '../rendering/string-renderer.js';
import { SystemActionExecutor, type ActionContext, type ActionExecutor } from './action-executor.js';

export type ActionStatus = 'success' | 'failed' | 'skipped';

export interface ActionResult {
  action: string;
  /** Hook stage, or `group:<name>` for action groups */
  source: string;
  status: ActionStatus;
  output?: string;
  error?: string;
  /** Why a skipped action did not run */
  reason?: string;
  durationMs: number;
}

export interface HookContext extends ActionContext {
  /** Values only visible to this run, such as the file a pre-file hook fires for */
  extraVariables?: Readonly<Record<string, unknown>>;
  platform?: NodeJS.Platform;
}

interface Attempt {
  action: TemplateAction;
  result: ActionResult;
  error?: unknown;
}

function skipped(action: TemplateAction, source: string, reason: string): Attempt {
  return { action, result: { action: action.name, source, status: 'skipped', reason, durationMs: 0 } };
}

/**
 * Evaluates conditions and platforms, renders commands and hands actions to an executor
 */
export class HookRunner {
  constructor(
    private readonly executor: ActionExecutor = new SystemActionExecutor(),
    private readonly evaluator: ConditionEvaluator = conditionEvaluator
  ) {}

  /**
   * Runs a stage's actions in order. A failing required action throws ActionError;
   * optional failures are recorded.
   */
  async runStage(template: Template, stage: HookStage, context: HookContext): Promise<ActionResult[]> {
    const results: ActionResult[] = [];
    for (const action of template.hooks[stage]) {
      const attempt = await this.attempt(action, stage, context);
      results.push(attempt.result);
      this.settle(attempt, stage);
    }
    return results;
  }

  /**
   * Runs one action group. Without continueOnError the first failure stops the group.
   */
  async runGroup(group: ActionGroup, context: HookContext): Promise<ActionResult[]> {
    const source = `group:${group.name}`;
    if (group.condition !== undefined && !this.evaluator.evaluateExpression(group.condition, this.variablesOf(context))) {
      logger.debug(`Skipping action group '${group.name}': condition is false`);
      return group.actions.map(action => skipped(action, source, 'group condition is false').result);
    }

    const attempts = group.parallel
      ? await this.attemptParallel(group.actions, source, context)
      : await this.attemptSequential(group, source, context);

    const results = attempts.map(attempt => attempt.result);
    const failures = attempts.filter(attempt => attempt.result.status === 'failed');
    const fatal = failures.find(attempt => attempt.action.required);
    for (const attempt of failures) {
      if (attempt !== fatal) {
        logger.warn(`Action '${attempt.action.name}' in group '${group.name}' failed`, { error: attempt.result.error });
      }
    }
    if (fatal) {
      this.settle(fatal, source);
    }
    return results;
  }

  async runGroups(template: Template, context: HookContext): Promise<ActionResult[]> {
    const results: ActionResult[] = [];
    for (const group of template.actionGroups) {
      results.push(...(await this.runGroup(group, context)));
    }
    return results;
  }

  private async attemptSequential(group: ActionGroup, source: string, context: HookContext): Promise<Attempt[]> {
    const attempts: Attempt[] = [];
    let stopped = false;
    for (const action of group.actions) {
      if (stopped) {
        attempts.push(skipped(action, source, 'an earlier action in the group failed'));
        continue;
      }
      const attempt = await this.attempt(action, source, context);
      attempts.push(attempt);
      if (attempt.result.status === 'failed' && !group.continueOnError) {
        stopped = true;
      }
    }
    return attempts;
  }

  private async attemptParallel(actions: readonly TemplateAction[], source: string, context: HookContext): Promise<Attempt[]> {
    const settled = await Promise.allSettled(actions.map(action => this.attempt(action, source, context)));
    return settled.map((outcome, index): Attempt => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      const action = actions[index];
      return {
        action,
        error: outcome.reason,
        result: { action: action.name, source, status: 'failed', error: describeError(outcome.reason), durationMs: 0 }
      };
    });
  }

  private variablesOf(context: HookContext): Record<string, unknown> {
    return { ...context.variables, ...context.extraVariables };
  }

  /**
   * Runs one action and reports the outcome without throwing
   */
  private async attempt(action: TemplateAction, source: string, context: HookContext): Promise<Attempt> {
    const platform = context.platform ?? process.platform;
    if (!isActionSupportedOn(action, platform)) {
      logger.debug(`Skipping action '${action.name}': not supported on ${platform}`);
      return skipped(action, source, `not supported on ${platform}`);
    }

    const variables = this.variablesOf(context);
    if (action.condition !== undefined && !this.evaluator.evaluateExpression(action.condition, variables)) {
      logger.debug(`Skipping action '${action.name}': condition is false`);
      return skipped(action, source, 'condition is false');
    }

    const started = Date.now();
    try {
      const rendered: TemplateAction = {
        ...action,
        command: renderString(action.command, variables),
        workingDirectory: action.workingDirectory === undefined
          ? undefined
          : renderString(action.workingDirectory, variables)
      };
      logger.info(`Running ${source} action: ${action.name}`);
      const { output } = await this.executor.execute(rendered, context);
      return { action, result: { action: action.name, source, status: 'success', output, durationMs: Date.now() - started } };
    } catch (error) {
      return {
        action,
        error,
        result: { action: action.name, source, status: 'failed', error: describeError(error), durationMs: Date.now() - started }
      };
    }
  }

  /**
   * Throws for a failed required action, warns for a failed optional one
   */
  private settle(attempt: Attempt, source: string): void {
    if (attempt.result.status !== 'failed') {
      return;
    }
    const { action } = attempt;
    if (action.required) {
      throw new ActionError(
        `Required action '${action.name}' failed during ${source}: ${attempt.result.error}`,
        action.name,
        source,
        { cause: attempt.error }
      );
    }
    logger.warn(`Optional action '${action.name}' failed during ${source}`, { error: attempt.result.error });
  }
}
