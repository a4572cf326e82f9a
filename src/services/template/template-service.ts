// Template discovery, lookup and validation

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  NotFoundError,
  SchemaValidationError,
  ScaffoldError,
  describeError,
  isNotFoundError
} from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import {
  isCompatibleWithOs,
  isCompatibleWithRuntime,
  templateId,
  type Template
} from '../../models/template.js';
import type { TemplateCategory } from '../../models/types.js';
import type { TemplateValidationReport } from '../../models/validation.js';
import { TemplateFileResolver } from '../rendering/template-file-resolver.js';
import { TemplateCache, type CacheConfig } from '../storage/cache.js';
import { crossValidator, type CrossValidator } from '../validation/cross-validator.js';
import { TemplateLoader, type TemplateLoaderConfig } from './template-loader.js';

/**
 * One line of `scaffold list`
 */
export interface TemplateSummary {
  id: string;
  name: string;
  description: string;
  version: string;
  category: TemplateCategory;
  path: string;
  variableCount: number;
}

export interface InvalidTemplate {
  path: string;
  error: string;
}

export interface TemplateListing {
  templates: TemplateSummary[];
  invalid: InvalidTemplate[];
}

/**
 * Configuration for the template service
 */
export interface TemplateServiceConfig extends TemplateLoaderConfig {
  /** Directories scanned for definition files */
  directories: string[];
  /** Extra directories for template files referenced by definitions */
  searchPaths: string[];
  cache: Partial<CacheConfig>;
}

const DEFAULT_CONFIG: TemplateServiceConfig = {
  directories: ['templates'],
  searchPaths: [],
  maxTemplateSizeMb: 10,
  maxVariablesPerTemplate: 50,
  fileExtensions: ['.yaml', '.yml', '.json'],
  cache: {}
};

const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  darwin: 'macOS',
  linux: 'Linux',
  win32: 'Windows'
};

/**
 * Template management service
 * Finds definition files, loads them through the cache and reports on their health
 */
export class TemplateService {
  private config: TemplateServiceConfig;
  private loader: TemplateLoader;
  private cache: TemplateCache;
  readonly fileResolver: TemplateFileResolver;

  constructor(config: Partial<TemplateServiceConfig> = {}, private readonly validator: CrossValidator = crossValidator) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.loader = new TemplateLoader(this.config);
    this.cache = new TemplateCache(this.config.cache);
    this.fileResolver = new TemplateFileResolver({ searchPaths: this.config.searchPaths });
  }

  async loadTemplate(templatePath: string): Promise<Template> {
    return this.cache.getOrLoad(templatePath, absolutePath => this.loader.loadTemplate(absolutePath));
  }

  invalidate(templatePath: string): void {
    this.cache.invalidate(templatePath);
  }

  /**
   * Definition files in the configured directories, sorted by path.
   * Missing directories are skipped.
   */
  async discover(directories: string[] = this.config.directories): Promise<string[]> {
    const found: string[] = [];
    for (const directory of directories) {
      const root = path.resolve(directory);
      let entries: string[];
      try {
        entries = await fs.readdir(root);
      } catch (error) {
        if (isNotFoundError(error)) {
          logger.debug('Template directory does not exist', { directory: root });
          continue;
        }
        throw error;
      }
      for (const entry of entries) {
        const candidate = path.join(root, entry);
        if (this.loader.isDefinitionFile(candidate) && (await fs.stat(candidate)).isFile()) {
          found.push(candidate);
        }
      }
    }
    return found.sort();
  }

  /**
   * Summaries of every loadable template; files that fail to load are reported separately
   */
  async listTemplates(directories?: string[]): Promise<TemplateListing> {
    const templates: TemplateSummary[] = [];
    const invalid: InvalidTemplate[] = [];

    for (const templatePath of await this.discover(directories)) {
      try {
        templates.push(this.summarize(await this.loadTemplate(templatePath)));
      } catch (error) {
        if (!(error instanceof ScaffoldError)) {
          throw error;
        }
        logger.warn(`Skipping invalid template: ${templatePath}`, { error: describeError(error) });
        invalid.push({ path: templatePath, error: describeError(error) });
      }
    }
    return { templates, invalid };
  }

  /**
   * Accepts a definition path, a file stem, a metadata name or a template id
   */
  async findTemplate(nameOrId: string, directories?: string[]): Promise<Template> {
    if (this.loader.isDefinitionFile(nameOrId)) {
      return this.loadTemplate(nameOrId);
    }

    const wanted = nameOrId.toLowerCase();
    const candidates = await this.discover(directories);
    const byStem = candidates.find(candidate => path.basename(candidate, path.extname(candidate)).toLowerCase() === wanted);
    if (byStem) {
      return this.loadTemplate(byStem);
    }

    const { templates } = await this.listTemplates(directories);
    const match = templates.find(summary => summary.name.toLowerCase() === wanted || summary.id.toLowerCase() === wanted);
    if (!match) {
      throw new NotFoundError('Template', nameOrId);
    }
    return this.loadTemplate(match.path);
  }

  /**
   * Loads a definition and runs every check without throwing on template problems
   */
  async validateTemplateFile(templatePath: string): Promise<TemplateValidationReport> {
    const report: TemplateValidationReport = { path: path.resolve(templatePath), valid: true, errors: [], warnings: [] };

    let template: Template;
    try {
      template = await this.loader.loadTemplate(templatePath);
    } catch (error) {
      if (error instanceof SchemaValidationError) {
        report.errors.push(...error.issues.map(issue => `${issue.path || '<root>'}: ${issue.message}`));
      } else if (error instanceof ScaffoldError && !(error instanceof NotFoundError)) {
        report.errors.push(error.message);
      } else {
        throw error;
      }
      report.valid = false;
      return report;
    }

    const external = await this.fileResolver.listExternal(template);
    report.errors.push(...this.validator.validate(template, { externalTemplateFiles: external }));
    report.warnings.push(...this.compatibilityWarnings(template));
    for (const name of this.validator.findUnusedVariables(template)) {
      report.warnings.push(`Variable '${name}' is declared but never used`);
    }
    report.valid = report.errors.length === 0;
    return report;
  }

  compatibilityWarnings(
    template: Template,
    runtimeVersion: string = process.version,
    platform: NodeJS.Platform = process.platform
  ): string[] {
    const warnings: string[] = [];
    const { metadata } = template;
    if (!isCompatibleWithRuntime(metadata, runtimeVersion)) {
      warnings.push(`Template requires Node.js ${metadata.minRuntimeVersion} or later (running ${runtimeVersion})`);
    }
    const osName = OS_NAMES[platform];
    if (osName && !isCompatibleWithOs(metadata, osName)) {
      warnings.push(`Template does not list ${osName} as compatible (supports: ${metadata.compatibility.join(', ')})`);
    }
    return warnings;
  }

  summarize(template: Template): TemplateSummary {
    const { metadata } = template;
    return {
      id: templateId(metadata),
      name: metadata.name,
      description: metadata.description,
      version: metadata.version,
      category: metadata.category,
      path: template.sourcePath ?? '',
      variableCount: template.variables.length
    };
  }
}
