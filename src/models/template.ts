// Template aggregate model

import type { ActionGroup, TemplateHooks } from './action.js';
import type { ProjectStructure, TemplateFiles } from './structure.js';
import type { FileEncoding, OperatingSystem, TemplateCategory, TemplateLicense } from './types.js';
import type { TemplateVariable } from './variable.js';

/**
 * Descriptive information about a template
 */
export interface TemplateMetadata {
  /** Human-readable template name */
  readonly name: string;
  readonly description: string;
  /** Semantic version, pre-release and build metadata allowed */
  readonly version: string;
  readonly category: TemplateCategory;
  readonly tags: readonly string[];
  readonly author: string;
  readonly authorEmail?: string;
  readonly license: TemplateLicense;
  readonly created: Date;
  /** Never earlier than `created` */
  readonly updated?: Date;
  /** Strict X.Y.Z minimum Node.js version of generated projects */
  readonly minRuntimeVersion: string;
  readonly compatibility: readonly OperatingSystem[];
  readonly documentationUrl?: string;
  readonly sourceUrl?: string;
}

/**
 * Processing settings for a template
 */
export interface TemplateConfiguration {
  readonly schemaVersion: string;
  /** Suffix every standalone template file name ends with */
  readonly templateSuffix: string;
  /** When false, rendered files and directories keep the process umask */
  readonly preservePermissions: boolean;
  /** Default encoding of text files */
  readonly encoding: FileEncoding;
}

/**
 * Validated, read-only template. Built once, rendered many times.
 */
export interface Template {
  readonly metadata: TemplateMetadata;
  readonly configuration: TemplateConfiguration;
  readonly variables: readonly TemplateVariable[];
  readonly structure: ProjectStructure;
  readonly templateFiles: TemplateFiles;
  readonly hooks: TemplateHooks;
  readonly actionGroups: readonly ActionGroup[];
  /** Definition file the template was loaded from, when there is one */
  readonly sourcePath?: string;
}

/**
 * Stable identifier: author plus the dashed, lowercased name
 */
export function templateId(metadata: TemplateMetadata): string {
  return `${metadata.author}/${metadata.name.toLowerCase().replace(/ /g, '-')}`;
}

/**
 * Compares a strict X.Y.Z runtime version against the template minimum
 */
export function isCompatibleWithRuntime(metadata: TemplateMetadata, version: string): boolean {
  const required = parseVersionParts(metadata.minRuntimeVersion);
  const actual = parseVersionParts(version.replace(/^v/, ''));
  if (!required || !actual) {
    return false;
  }
  for (let index = 0; index < 3; index++) {
    if (actual[index] !== required[index]) {
      return actual[index] > required[index];
    }
  }
  return true;
}

export function isCompatibleWithOs(metadata: TemplateMetadata, os: string): boolean {
  return metadata.compatibility.some(entry => entry === os);
}

function parseVersionParts(version: string): [number, number, number] | null {
  const match = /^(\d+)\.(\d+)\.(\d+)/.exec(version);
  if (!match) {
    return null;
  }
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

/**
 * Recursively freezes a validated model so cached templates stay read-only
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
