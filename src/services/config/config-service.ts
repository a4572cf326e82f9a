/**
 * Configuration Service
 *
 * Loads scaffolder settings from .scaffold/config.yaml: where templates live,
 * which commands hooks may run, generation defaults, caching and logging.
 * A missing file yields the defaults.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ValidationError, isNotFoundError } from '../../core/errors.js';

export const DEFAULT_CONFIG_DIR = '.scaffold';
export const CONFIG_FILE_NAME = 'config.yaml';

const TemplatesConfigSchema = z
  .object({
    directories: z.array(z.string().min(1)).default(['templates']),
    maxTemplateSizeMb: z.number().positive().default(10),
    maxVariablesPerTemplate: z.number().int().positive().default(50),
    fileExtensions: z.array(z.string().startsWith('.')).default(['.yaml', '.yml', '.json']),
    /** Directories searched for template files a definition references */
    searchPaths: z.array(z.string().min(1)).default([])
  })
  .default({});

const SecurityConfigSchema = z
  .object({
    allowExternalCommands: z.boolean().default(false),
    commandWhitelist: z.array(z.string().min(1)).default(['git', 'npm', 'npx', 'node', 'pnpm', 'yarn']),
    maxCommandTimeoutSeconds: z.number().int().positive().default(300)
  })
  .default({});

const GenerationConfigSchema = z
  .object({
    /** Copyright holder in license text, instead of the template author */
    defaultAuthor: z.string().min(1).optional()
  })
  .default({});

const CacheConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    ttlMs: z.number().int().nonnegative().default(300000),
    maxEntries: z.number().int().positive().default(50)
  })
  .default({});

const LoggingConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
  })
  .default({});

export const ScaffoldConfigSchema = z
  .object({
    templates: TemplatesConfigSchema,
    security: SecurityConfigSchema,
    generation: GenerationConfigSchema,
    cache: CacheConfigSchema,
    logging: LoggingConfigSchema
  })
  .default({});

export type ScaffoldConfig = z.infer<typeof ScaffoldConfigSchema>;
export type TemplatesConfig = ScaffoldConfig['templates'];
export type SecurityConfig = ScaffoldConfig['security'];
export type GenerationConfig = ScaffoldConfig['generation'];

/**
 * Settings with every default applied
 */
export function defaultConfig(): ScaffoldConfig {
  return ScaffoldConfigSchema.parse(undefined);
}

/**
 * Parses raw settings, reporting the first offending field
 */
export function parseConfig(raw: unknown, source = CONFIG_FILE_NAME): ScaffoldConfig {
  const result = ScaffoldConfigSchema.safeParse(raw ?? undefined);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(`Invalid configuration in ${source}: ${field || '<root>'}: ${issue.message}`, field);
  }
  return result.data;
}

/**
 * Configuration Service
 *
 * Provides access to configuration values from .scaffold/config.yaml
 * with defaults when configuration is not present.
 */
export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private cachedConfig: ScaffoldConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = options.baseDir || DEFAULT_CONFIG_DIR;
    this.configPath = path.join(this.baseDir, CONFIG_FILE_NAME);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, with caching
   */
  async loadConfig(): Promise<ScaffoldConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
      this.cachedConfig = defaultConfig();
      return this.cachedConfig;
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      if (!(error instanceof yaml.YAMLParseError)) {
        throw error;
      }
      throw new ValidationError(`Invalid configuration in ${this.configPath}: ${error.message}`);
    }

    this.cachedConfig = parseConfig(parsed, this.configPath);
    return this.cachedConfig;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  async getTemplatesConfig(): Promise<TemplatesConfig> {
    return (await this.loadConfig()).templates;
  }

  async getSecurityConfig(): Promise<SecurityConfig> {
    return (await this.loadConfig()).security;
  }

  async getGenerationConfig(): Promise<GenerationConfig> {
    return (await this.loadConfig()).generation;
  }

  /**
   * Template directories resolved against the working directory
   */
  async getTemplateDirectories(): Promise<string[]> {
    const templates = await this.getTemplatesConfig();
    return templates.directories.map(directory => path.resolve(directory));
  }
}
