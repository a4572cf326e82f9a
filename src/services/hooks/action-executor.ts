/**
 * Action Executor
 *
 * Runs a single hook action. File actions work through fs/promises inside the
 * generated project, commands and scripts go through execa, and git actions
 * through simple-git. External processes are only started when the security
 * settings allow them.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { execa } from 'execa';
import { simpleGit } from 'simple-git';
import { ActionError, SecurityError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { ensureInside, parsePermissions } from '../../core/validation.js';
import type { TemplateAction } from '../../models/action.js';
import type { ResolvedVariables } from '../../models/types.js';

/**
 * Where an action runs
 */
export interface ActionContext {
  /** Absolute project directory; file actions may not leave it */
  projectRoot: string;
  variables: ResolvedVariables;
}

export interface ActionOutput {
  output: string;
}

/**
 * Runs one action whose command text has already been rendered
 */
export interface ActionExecutor {
  execute(action: TemplateAction, context: ActionContext): Promise<ActionOutput>;
}

/**
 * Security settings for external processes
 */
export interface ExecutorConfig {
  allowExternalCommands: boolean;
  commandWhitelist: string[];
  maxCommandTimeoutSeconds: number;
}

const DEFAULT_CONFIG: ExecutorConfig = {
  allowExternalCommands: false,
  commandWhitelist: ['git', 'npm', 'npx', 'node', 'pnpm', 'yarn'],
  maxCommandTimeoutSeconds: 300
};

/**
 * Splits command text on whitespace and appends the action's extra arguments
 */
export function commandTokens(action: TemplateAction): string[] {
  return [...action.command.split(/\s+/).filter(token => token.length > 0), ...action.arguments];
}

function executableName(token: string): string {
  return path.basename(token).replace(/\.(exe|cmd|bat)$/i, '');
}

export class SystemActionExecutor implements ActionExecutor {
  private config: ExecutorConfig;

  constructor(config: Partial<ExecutorConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async execute(action: TemplateAction, context: ActionContext): Promise<ActionOutput> {
    const cwd = action.workingDirectory
      ? ensureInside(context.projectRoot, action.workingDirectory)
      : path.resolve(context.projectRoot);
    const tokens = commandTokens(action);

    switch (action.type) {
      case 'copy':
      case 'move':
      case 'delete':
      case 'mkdir':
      case 'chmod':
        return this.runFileAction(action, tokens, cwd, context.projectRoot);
      case 'command':
        return this.runProcess(action, tokens, cwd);
      case 'script':
        return this.runScript(action, tokens, cwd, context.projectRoot);
      case 'git':
        return this.runGit(action, tokens.slice(1), cwd);
    }
  }

  /**
   * Seconds to milliseconds, never above the configured maximum
   */
  timeoutMs(action: TemplateAction): number {
    const seconds = Math.min(action.timeout ?? this.config.maxCommandTimeoutSeconds, this.config.maxCommandTimeoutSeconds);
    return Math.round(seconds * 1000);
  }

  private checkAllowed(action: TemplateAction, executable: string): void {
    if (!this.config.commandWhitelist.includes(executableName(executable))) {
      throw new SecurityError(`Command '${executableName(executable)}' is not in the command whitelist`, {
        action: action.name,
        whitelist: this.config.commandWhitelist
      });
    }
  }

  private checkExternalAllowed(action: TemplateAction, executable: string): void {
    if (!this.config.allowExternalCommands) {
      throw new SecurityError(
        `External commands are disabled; set security.allowExternalCommands to run '${action.name}'`,
        { action: action.name }
      );
    }
    this.checkAllowed(action, executable);
  }

  private async runProcess(action: TemplateAction, tokens: string[], cwd: string): Promise<ActionOutput> {
    const [executable, ...args] = tokens;
    this.checkExternalAllowed(action, executable);
    logger.debug('Running command', { action: action.name, executable, args, cwd });

    const result = await execa(executable, args, {
      cwd,
      env: { ...action.environment },
      timeout: this.timeoutMs(action)
    });
    return { output: result.stdout };
  }

  /**
   * Runs a Node.js script file from the project with the current interpreter
   */
  private async runScript(action: TemplateAction, tokens: string[], cwd: string, projectRoot: string): Promise<ActionOutput> {
    this.checkExternalAllowed(action, 'node');
    const [script, ...args] = tokens;
    const scriptPath = ensureInside(projectRoot, path.resolve(cwd, script));
    logger.debug('Running script', { action: action.name, script: scriptPath, args });

    const result = await execa(process.execPath, [scriptPath, ...args], {
      cwd,
      env: { ...action.environment },
      timeout: this.timeoutMs(action)
    });
    return { output: result.stdout };
  }

  private async runGit(action: TemplateAction, args: string[], cwd: string): Promise<ActionOutput> {
    this.checkAllowed(action, 'git');
    logger.debug('Running git', { action: action.name, args, cwd });

    const git = simpleGit({ baseDir: cwd, timeout: { block: this.timeoutMs(action) } });
    const output = await git.env({ ...process.env, ...action.environment }).raw(args);
    return { output: output.trim() };
  }

  private async runFileAction(
    action: TemplateAction,
    tokens: string[],
    cwd: string,
    projectRoot: string
  ): Promise<ActionOutput> {
    const inside = (token: string) => ensureInside(projectRoot, path.resolve(cwd, token));
    const requireArgs = (count: number, usage: string) => {
      if (tokens.length < count) {
        throw new ActionError(`Action '${action.name}' needs ${usage}`, action.name);
      }
    };

    switch (action.type) {
      case 'copy':
      case 'move': {
        if (tokens.length !== 2) {
          throw new ActionError(`Action '${action.name}' takes exactly a source and a destination`, action.name);
        }
        const [source, destination] = tokens.map(inside);
        await fs.mkdir(path.dirname(destination), { recursive: true });
        if (action.type === 'copy') {
          await fs.cp(source, destination, { recursive: true });
        } else {
          await fs.rename(source, destination);
        }
        return { output: `${action.type} ${source} -> ${destination}` };
      }
      case 'delete': {
        requireArgs(1, 'at least one path');
        const targets = tokens.map(inside);
        for (const target of targets) {
          if (target === path.resolve(projectRoot)) {
            throw new SecurityError('Refusing to delete the project root', { action: action.name });
          }
          await fs.rm(target, { recursive: true, force: true });
        }
        return { output: `deleted ${targets.length} path(s)` };
      }
      case 'mkdir': {
        requireArgs(1, 'at least one path');
        const targets = tokens.map(inside);
        for (const target of targets) {
          await fs.mkdir(target, { recursive: true });
        }
        return { output: `created ${targets.length} director(ies)` };
      }
      default: {
        requireArgs(2, 'a mode and at least one path');
        const [mode, ...paths] = tokens;
        const parsedMode = parsePermissions(mode);
        for (const target of paths.map(inside)) {
          await fs.chmod(target, parsedMode);
        }
        return { output: `chmod ${mode} on ${paths.length} path(s)` };
      }
    }
  }
}
