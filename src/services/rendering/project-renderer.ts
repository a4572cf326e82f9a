// Rendering engine: materializes a template's tree on disk

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import {
  RenderingError,
  SecurityError,
  describeError,
  isNotFoundError
} from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { ensureInside, parsePermissions } from '../../core/validation.js';
import { copyRenderStats, emptyRenderStats, type RenderStats } from '../../models/render.js';
import { effectivePermissions, outputNameOf, type DirectoryItem, type FileItem, type TemplateFile } from '../../models/structure.js';
import type { Template } from '../../models/template.js';
import type { FileEncoding, ResolvedVariables } from '../../models/types.js';
import { conditionEvaluator, type ConditionEvaluator } from '../condition/condition-evaluator.js';
import { directoryChain, type CreatedPath } from './rollback.js';
import { renderString } from './string-renderer.js';
import { TemplateFileResolver, toBufferEncoding } from './template-file-resolver.js';

/**
 * Passed to observers around every file write
 */
export interface FileRenderContext {
  template: Template;
  variables: ResolvedVariables;
  outputRoot: string;
  /** Absolute target path */
  path: string;
  /** Target path relative to the output root, with forward slashes */
  relativePath: string;
  file?: FileItem;
  templateFile?: TemplateFile;
}

export interface RenderObserver {
  onFileStart?(context: FileRenderContext): void | Promise<void>;
  onFileDone?(context: FileRenderContext): void | Promise<void>;
}

export interface RenderOptions {
  overwrite?: boolean;
  allowNonEmpty?: boolean;
  /** Report what would happen without touching the filesystem */
  dryRun?: boolean;
  observer?: RenderObserver;
  /** Receives every file and directory the run creates, in creation order */
  createdPaths?: CreatedPath[];
}

type FileContent =
  | { kind: 'text'; text: string; encoding: FileEncoding }
  | { kind: 'binary'; data: Buffer };

interface PreparedFile {
  context: FileRenderContext;
  existed: boolean;
  content: FileContent;
}

interface RenderRun {
  template: Template;
  variables: ResolvedVariables;
  outputRoot: string;
  options: RenderOptions;
  stats: RenderStats;
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }
}

function toRelative(root: string, target: string): string {
  return path.relative(root, target).split(path.sep).join('/') || '.';
}

/**
 * Walks a template's directory tree and writes the rendered project
 */
export class RenderingEngine {
  constructor(
    private readonly resolver: TemplateFileResolver = new TemplateFileResolver(),
    private readonly evaluator: ConditionEvaluator = conditionEvaluator
  ) {}

  async renderProject(
    template: Template,
    variables: ResolvedVariables,
    outputPath: string,
    options: RenderOptions = {}
  ): Promise<RenderStats> {
    const outputRoot = path.resolve(outputPath);
    await this.checkOutputPath(outputRoot, options);

    const run: RenderRun = { template, variables, outputRoot, options, stats: emptyRenderStats() };
    if (!options.dryRun) {
      await this.makeDirectory(run, outputRoot);
    }
    logger.debug('Rendering project', { template: template.metadata.name, outputRoot, dryRun: Boolean(options.dryRun) });

    await this.renderDirectory(run, template.structure.rootDirectory, outputRoot);
    await this.renderTemplateFiles(run);

    logger.debug('Rendering finished', {
      filesCreated: run.stats.filesCreated,
      filesOverwritten: run.stats.filesOverwritten,
      filesSkipped: run.stats.filesSkipped,
      directoriesCreated: run.stats.directoriesCreated
    });
    return copyRenderStats(run.stats);
  }

  /**
   * Rejects an output path that is a file, or a non-empty directory unless
   * overwrite or allowNonEmpty is set
   */
  async checkOutputPath(outputRoot: string, options: Pick<RenderOptions, 'overwrite' | 'allowNonEmpty'>): Promise<void> {
    const stats = await statOrNull(outputRoot);
    if (!stats) {
      return;
    }
    if (!stats.isDirectory()) {
      throw new RenderingError(`Output path exists and is not a directory: ${outputRoot}`);
    }
    if (options.overwrite || options.allowNonEmpty) {
      return;
    }
    const entries = await fs.readdir(outputRoot);
    if (entries.length > 0) {
      throw new RenderingError(
        `Output directory is not empty: ${outputRoot}. Use overwrite or allow non-empty output to continue.`
      );
    }
  }

  private failure(run: RenderRun, item: string, error: unknown): RenderingError {
    run.stats.errors.push(`${item}: ${describeError(error)}`);
    return new RenderingError(
      `Failed to render '${item}': ${describeError(error)}`,
      [...run.stats.errors],
      copyRenderStats(run.stats),
      { cause: error }
    );
  }

  private recordCreated(run: RenderRun, kind: CreatedPath['kind'], target: string): void {
    run.options.createdPaths?.push({ kind, path: target });
  }

  private async makeDirectory(run: RenderRun, target: string): Promise<void> {
    const first = await fs.mkdir(target, { recursive: true });
    if (first !== undefined) {
      for (const created of directoryChain(first, target)) {
        this.recordCreated(run, 'directory', created);
      }
    }
  }

  private renderName(run: RenderRun, name: string, kind: string): string {
    const rendered = renderString(name, run.variables).trim();
    if (rendered.length === 0) {
      throw new RenderingError(`${kind} name '${name}' rendered to an empty string`);
    }
    return rendered;
  }

  /**
   * Runs one item's work, turning any failure except a path escape into a RenderingError
   */
  private async guard<T>(run: RenderRun, item: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof SecurityError) {
        throw error;
      }
      throw this.failure(run, item, error);
    }
  }

  private async renderDirectory(run: RenderRun, directory: DirectoryItem, parentPath: string): Promise<void> {
    const target = await this.guard(run, directory.name, () => this.prepareDirectory(run, directory, parentPath));
    if (target === null) {
      return;
    }
    for (const file of directory.files) {
      await this.renderFile(run, file, target);
    }
    for (const child of directory.directories) {
      await this.renderDirectory(run, child, target);
    }
  }

  /**
   * Creates the directory and returns its path, or null when it is left out
   */
  private async prepareDirectory(run: RenderRun, directory: DirectoryItem, parentPath: string): Promise<string | null> {
    const { template, variables, outputRoot, options, stats } = run;
    if (directory.condition !== undefined && !this.evaluator.evaluateExpression(directory.condition, variables)) {
      logger.debug('Skipping directory: condition is false', { directory: directory.name });
      return null;
    }

    const isEmpty = directory.files.length === 0 && directory.directories.length === 0;
    if (isEmpty && (!directory.createIfEmpty || !template.structure.preserveEmptyDirectories)) {
      logger.debug('Skipping empty directory', { directory: directory.name });
      return null;
    }

    const target = ensureInside(outputRoot, path.join(parentPath, this.renderName(run, directory.name, 'Directory')));
    if (!(await statOrNull(target))) {
      if (!options.dryRun) {
        await this.makeDirectory(run, target);
      }
      stats.directoriesCreated++;
    }
    if (template.configuration.preservePermissions && !options.dryRun) {
      await fs.chmod(target, parsePermissions(directory.permissions));
    }
    return target;
  }

  private async renderFile(run: RenderRun, file: FileItem, directoryPath: string): Promise<void> {
    const { template, options, stats } = run;
    const prepared = await this.guard(run, file.name, () => this.prepareFile(run, file, directoryPath));
    if (!prepared) {
      return;
    }

    const { context, existed } = prepared;
    await options.observer?.onFileStart?.(context);
    if (!options.dryRun) {
      await this.guard(run, file.name, async () => {
        await this.write(run, prepared);
        if (template.configuration.preservePermissions) {
          await fs.chmod(context.path, parsePermissions(effectivePermissions(file)));
        }
      });
    }

    if (existed) {
      stats.filesOverwritten++;
    } else {
      stats.filesCreated++;
    }
    await options.observer?.onFileDone?.(context);
  }

  /**
   * Evaluates the skip rules and renders content, or returns null when the file is skipped
   */
  private async prepareFile(run: RenderRun, file: FileItem, directoryPath: string): Promise<PreparedFile | null> {
    const { template, variables, outputRoot, options, stats } = run;
    if (file.condition !== undefined && !this.evaluator.evaluateExpression(file.condition, variables)) {
      stats.filesSkipped++;
      logger.debug('Skipping file: condition is false', { file: file.name });
      return null;
    }

    const target = ensureInside(outputRoot, path.join(directoryPath, this.renderName(run, file.name, 'File')));
    const existed = (await statOrNull(target)) !== null;
    if (existed && !options.overwrite) {
      stats.filesSkipped++;
      logger.info(`Skipping existing file: ${toRelative(outputRoot, target)}`);
      return null;
    }

    const context: FileRenderContext = {
      template, variables, outputRoot, path: target, relativePath: toRelative(outputRoot, target), file
    };
    return { context, existed, content: await this.produceContent(run, file) };
  }

  private async produceContent(run: RenderRun, file: FileItem): Promise<FileContent> {
    const { template, variables } = run;
    const encoding = file.encoding ?? template.configuration.encoding;
    switch (file.source.kind) {
      case 'inline':
        return { kind: 'text', text: renderString(file.source.content, variables), encoding };
      case 'binary':
        return { kind: 'binary', data: Buffer.from(file.source.data, 'base64') };
      case 'template': {
        const resolved = await this.resolver.resolve(template, file.source.templateFile);
        if (!resolved) {
          throw new RenderingError(`Template file not found: ${file.source.templateFile}`);
        }
        return {
          kind: 'text',
          text: renderString(resolved.content, variables),
          encoding: file.encoding ?? resolved.encoding ?? template.configuration.encoding
        };
      }
    }
  }

  private async write(run: RenderRun, { context, existed, content }: PreparedFile): Promise<void> {
    const target = context.path;
    await this.makeDirectory(run, path.dirname(target));
    if (!existed) {
      this.recordCreated(run, 'file', target);
    }
    if (content.kind === 'binary') {
      await fs.writeFile(target, content.data);
    } else {
      await fs.writeFile(target, content.text, { encoding: toBufferEncoding(content.encoding) });
    }
  }

  /**
   * Renders the standalone template files. Failures are recorded and the pass continues.
   */
  private async renderTemplateFiles(run: RenderRun): Promise<void> {
    const { template, options, stats } = run;

    for (const templateFile of template.templateFiles.files) {
      let prepared: PreparedFile | null;
      try {
        prepared = await this.prepareTemplateFile(run, templateFile);
      } catch (error) {
        if (error instanceof SecurityError) {
          throw error;
        }
        this.recordTemplateFileFailure(run, templateFile, error);
        continue;
      }
      if (!prepared) {
        continue;
      }

      const { context, existed } = prepared;
      await options.observer?.onFileStart?.(context);
      if (!options.dryRun) {
        try {
          await this.write(run, prepared);
        } catch (error) {
          this.recordTemplateFileFailure(run, templateFile, error);
          continue;
        }
      }
      if (existed) {
        stats.filesOverwritten++;
      } else {
        stats.filesCreated++;
      }
      await options.observer?.onFileDone?.(context);
    }
  }

  private async prepareTemplateFile(run: RenderRun, templateFile: TemplateFile): Promise<PreparedFile | null> {
    const { template, variables, outputRoot, options, stats } = run;
    const relative = renderString(
      templateFile.outputPath ?? outputNameOf(templateFile, template.configuration.templateSuffix),
      variables
    );
    const target = ensureInside(outputRoot, relative);
    const existed = (await statOrNull(target)) !== null;
    if (existed && !options.overwrite) {
      stats.filesSkipped++;
      logger.info(`Skipping existing file: ${toRelative(outputRoot, target)}`);
      return null;
    }

    const context: FileRenderContext = {
      template, variables, outputRoot, path: target, relativePath: toRelative(outputRoot, target), templateFile
    };
    const content: FileContent = {
      kind: 'text',
      text: renderString(templateFile.content, variables),
      encoding: templateFile.encoding ?? template.configuration.encoding
    };
    return { context, existed, content };
  }

  private recordTemplateFileFailure(run: RenderRun, templateFile: TemplateFile, error: unknown): void {
    run.stats.errors.push(`${templateFile.name}: ${describeError(error)}`);
    logger.warn(`Failed to render template file '${templateFile.name}'`, { error: describeError(error) });
  }
}
