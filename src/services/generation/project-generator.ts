/**
 * Project Generator
 *
 * Orchestrates one generation run: cross-validation, variable resolution,
 * lifecycle hooks around rendering, and error and cleanup hooks.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { TemplateValidationError, describeError, isNotFoundError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { ensureInside } from '../../core/validation.js';
import type { RenderStats } from '../../models/render.js';
import type { Template } from '../../models/template.js';
import type { HookStage, ResolvedVariables } from '../../models/types.js';
import { HookRunner, type ActionResult, type HookContext } from '../hooks/hook-runner.js';
import { RenderingEngine, type FileRenderContext, type RenderObserver } from '../rendering/project-renderer.js';
import { directoryChain, removeCreatedPaths, type CreatedPath } from '../rendering/rollback.js';
import { renderString } from '../rendering/string-renderer.js';
import { TemplateFileResolver } from '../rendering/template-file-resolver.js';
import { crossValidator, type CrossValidator } from '../validation/cross-validator.js';
import { BuiltinLicenseProvider, systemVariables, type LicenseProvider } from '../variables/system-variables.js';
import { VariableResolver } from '../variables/variable-resolver.js';

export interface GenerateOptions {
  overwrite?: boolean;
  allowNonEmpty?: boolean;
  /** Generate even when cross-validation reports problems */
  force?: boolean;
  dryRun?: boolean;
  /** Defaults to true; hooks never run during a dry run */
  runHooks?: boolean;
  /** Convert string values (from the command line) to the declared types */
  coerce?: boolean;
  /** Clock for date system variables */
  now?: Date;
}

export interface GenerateRequest {
  template: Template;
  values: Readonly<Record<string, unknown>>;
  outputPath: string;
  options?: GenerateOptions;
}

export interface GenerationResult {
  /** Absolute path of the generated root directory */
  projectRoot: string;
  stats: RenderStats;
  variables: ResolvedVariables;
  hookResults: ActionResult[];
  warnings: string[];
}

export interface GeneratorDependencies {
  validator: CrossValidator;
  fileResolver: TemplateFileResolver;
  resolver: VariableResolver;
  renderer: RenderingEngine;
  hooks: HookRunner;
  licenseProvider: LicenseProvider;
}

export interface GeneratorConfig {
  /** Author used for license text when the template does not ask for one */
  defaultAuthor?: string;
}

/** Variables whose resolved value replaces the template author in license text */
const AUTHOR_VARIABLES = ['author', 'author_name'];

function stringValue(values: ResolvedVariables, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = values[name];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value;
    }
  }
  return undefined;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }
}

export class ProjectGenerator {
  private deps: GeneratorDependencies;
  private config: GeneratorConfig;

  constructor(dependencies: Partial<GeneratorDependencies> = {}, config: GeneratorConfig = {}) {
    const fileResolver = dependencies.fileResolver ?? new TemplateFileResolver();
    this.deps = {
      validator: dependencies.validator ?? crossValidator,
      fileResolver,
      resolver: dependencies.resolver ?? new VariableResolver(),
      renderer: dependencies.renderer ?? new RenderingEngine(fileResolver),
      hooks: dependencies.hooks ?? new HookRunner(),
      licenseProvider: dependencies.licenseProvider ?? new BuiltinLicenseProvider()
    };
    this.config = config;
  }

  /**
   * Cross-field diagnostics, including template files that only exist on disk
   */
  async check(template: Template): Promise<string[]> {
    const external = await this.deps.fileResolver.listExternal(template);
    return this.deps.validator.validate(template, { externalTemplateFiles: external });
  }

  /**
   * Resolves declared variables together with the system variables
   */
  resolveVariables(
    template: Template,
    values: Readonly<Record<string, unknown>>,
    options: Pick<GenerateOptions, 'coerce' | 'now'> = {}
  ): ResolvedVariables {
    const { metadata } = template;
    const author = this.config.defaultAuthor ?? metadata.author;
    const system = systemVariables({
      now: options.now,
      license: metadata.license,
      author,
      licenseProvider: this.deps.licenseProvider
    });
    const resolved = this.deps.resolver.resolve(template.variables, values, {
      systemValues: system,
      coerce: options.coerce
    });

    if (template.variables.some(variable => variable.name === 'license_text')) {
      return resolved;
    }
    const license = stringValue(resolved, ['license']) ?? metadata.license;
    const holder = stringValue(resolved, AUTHOR_VARIABLES) ?? author;
    if (license === metadata.license && holder === author) {
      return resolved;
    }
    const { license_text } = systemVariables({
      now: options.now,
      license,
      author: holder,
      licenseProvider: this.deps.licenseProvider
    });
    return Object.freeze({ ...resolved, license_text });
  }

  async generate(request: GenerateRequest): Promise<GenerationResult> {
    const { template, values, outputPath } = request;
    const options = request.options ?? {};
    const warnings: string[] = [];

    const diagnostics = await this.check(template);
    if (diagnostics.length > 0) {
      if (!options.force) {
        throw new TemplateValidationError(diagnostics);
      }
      for (const diagnostic of diagnostics) {
        logger.warn(`Template problem ignored: ${diagnostic}`);
      }
      warnings.push(...diagnostics);
    }

    const variables = this.resolveVariables(template, values, options);
    const outputRoot = path.resolve(outputPath);
    const projectRoot = ensureInside(
      outputRoot,
      renderString(template.structure.rootDirectory.name, variables).trim()
    );
    const runHooks = options.runHooks !== false && !options.dryRun;
    const hookResults: ActionResult[] = [];
    const createdPaths: CreatedPath[] = [];
    logger.info(`Generating '${template.metadata.name}' into ${projectRoot}`);

    await this.deps.renderer.checkOutputPath(outputRoot, options);
    const createdOutput = options.dryRun ? undefined : await fs.mkdir(outputRoot, { recursive: true });

    let stats: RenderStats;
    try {
      if (runHooks) {
        hookResults.push(...(await this.deps.hooks.runStage(template, 'preGenerate', { projectRoot: outputRoot, variables })));
      }

      stats = await this.deps.renderer.renderProject(template, variables, outputRoot, {
        overwrite: options.overwrite,
        // emptiness was checked above, before pre-generate hooks could add entries
        allowNonEmpty: true,
        dryRun: options.dryRun,
        observer: runHooks ? this.fileHooks(template, variables, hookResults) : undefined,
        createdPaths
      });

      if (runHooks) {
        const context: HookContext = { projectRoot, variables };
        hookResults.push(...(await this.deps.hooks.runStage(template, 'postGenerate', context)));
        hookResults.push(...(await this.deps.hooks.runGroups(template, context)));
      }
    } catch (error) {
      await this.rollback(createdPaths);
      if (runHooks) {
        const context = await this.fallbackContext(projectRoot, outputRoot, variables);
        await this.runAfterFailure(template, 'onError', { ...context, extraVariables: { error_message: describeError(error) } }, hookResults);
        await this.runAfterFailure(template, 'cleanup', context, hookResults);
      }
      if (createdOutput !== undefined) {
        const outputDirectories = directoryChain(createdOutput, outputRoot).map(
          (directory): CreatedPath => ({ kind: 'directory', path: directory })
        );
        await removeCreatedPaths(outputDirectories);
      }
      throw error;
    }

    if (runHooks) {
      hookResults.push(...(await this.deps.hooks.runStage(template, 'cleanup', { projectRoot, variables })));
    }

    logger.info(
      `Generated ${stats.filesCreated} file(s), overwrote ${stats.filesOverwritten}, skipped ${stats.filesSkipped}`
    );
    return { projectRoot, stats, variables, hookResults, warnings };
  }

  /**
   * Runs pre-file and post-file hooks around every written file
   */
  private fileHooks(template: Template, variables: ResolvedVariables, hookResults: ActionResult[]): RenderObserver {
    const run = async (stage: HookStage, file: FileRenderContext) => {
      hookResults.push(
        ...(await this.deps.hooks.runStage(template, stage, {
          projectRoot: file.outputRoot,
          variables,
          extraVariables: { file_path: file.relativePath, file_name: path.basename(file.path) }
        }))
      );
    };
    return {
      onFileStart: file => run('preFile', file),
      onFileDone: file => run('postFile', file)
    };
  }

  /**
   * Removes the files and directories the failed render created
   */
  private async rollback(createdPaths: readonly CreatedPath[]): Promise<void> {
    if (createdPaths.length === 0) {
      return;
    }
    const removed = await removeCreatedPaths(createdPaths);
    logger.info(`Rolled back ${removed.length} of ${createdPaths.length} generated path(s)`);
  }

  private async fallbackContext(projectRoot: string, outputRoot: string, variables: ResolvedVariables): Promise<HookContext> {
    return { projectRoot: (await pathExists(projectRoot)) ? projectRoot : outputRoot, variables };
  }

  /**
   * Hooks that run while another error is propagating; their own failure is logged
   * so the original error reaches the caller
   */
  private async runAfterFailure(
    template: Template,
    stage: HookStage,
    context: HookContext,
    hookResults: ActionResult[]
  ): Promise<void> {
    try {
      hookResults.push(...(await this.deps.hooks.runStage(template, stage, context)));
    } catch (hookError) {
      logger.error(`${stage} hooks failed while handling a generation error`, { error: describeError(hookError) });
    }
  }
}
