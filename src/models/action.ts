// Hook action model

import { HOOK_STAGES, type ActionType, type HookStage, type Platform } from './types.js';

export interface TemplateAction {
  readonly name: string;
  readonly type: ActionType;
  readonly command: string;
  readonly description: string;
  readonly workingDirectory?: string;
  readonly platforms: readonly Platform[];
  readonly condition?: string;
  readonly required: boolean;
  /** Seconds */
  readonly timeout?: number;
  readonly environment: Readonly<Record<string, string>>;
  readonly arguments: readonly string[];
}

export type TemplateHooks = { readonly [S in HookStage]: readonly TemplateAction[] };

export interface ActionGroup {
  readonly name: string;
  readonly description: string;
  readonly actions: readonly TemplateAction[];
  readonly condition?: string;
  readonly parallel: boolean;
  readonly continueOnError: boolean;
}

export const EMPTY_HOOKS: TemplateHooks = {
  preGenerate: [],
  postGenerate: [],
  preFile: [],
  postFile: [],
  onError: [],
  cleanup: []
};

/**
 * Actions of every stage in lifecycle order
 */
export function allActions(hooks: TemplateHooks): TemplateAction[] {
  return HOOK_STAGES.flatMap(stage => hooks[stage]);
}

const NODE_PLATFORMS: Partial<Record<NodeJS.Platform, Platform>> = {
  darwin: 'macos',
  linux: 'linux',
  win32: 'windows',
  cygwin: 'windows'
};

/**
 * Whether an action applies on a Node platform name such as "darwin"
 */
export function isActionSupportedOn(action: TemplateAction, nodePlatform: NodeJS.Platform): boolean {
  const current = NODE_PLATFORMS[nodePlatform];
  if (!current) {
    return false;
  }
  if (action.platforms.includes(current)) {
    return true;
  }
  return action.platforms.includes('unix') && (current === 'macos' || current === 'linux');
}
