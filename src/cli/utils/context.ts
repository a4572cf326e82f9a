// Shared setup for CLI commands: configuration, logging and the template service

import * as path from 'path';
import { fileURLToPath } from 'url';
import { Logger, LogLevel, parseLogLevel } from '../../core/logger.js';
import { ConfigService, type ScaffoldConfig } from '../../services/config/config-service.js';
import { TemplateService, type TemplateServiceConfig } from '../../services/template/template-service.js';

/**
 * Options declared on the root program
 */
export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CliContext {
  config: ScaffoldConfig;
  templates: TemplateService;
}

/** Example templates shipped with the package (same depth from src/ and dist/) */
export const BUILTIN_TEMPLATES_DIR = fileURLToPath(new URL('../../../templates', import.meta.url));

/**
 * --verbose and --quiet win over the configured level
 */
export function resolveLogLevel(options: GlobalOptions, configured: string): LogLevel {
  if (options.verbose) {
    return LogLevel.DEBUG;
  }
  if (options.quiet) {
    return LogLevel.ERROR;
  }
  return parseLogLevel(configured);
}

/**
 * Template service settings derived from the loaded configuration.
 * The built-in templates directory is always searched last.
 */
export function templateServiceConfig(config: ScaffoldConfig, builtinDir: string = BUILTIN_TEMPLATES_DIR): Partial<TemplateServiceConfig> {
  const { templates, cache } = config;
  const directories = templates.directories.map(directory => path.resolve(directory));
  if (!directories.includes(builtinDir)) {
    directories.push(builtinDir);
  }
  return {
    directories,
    searchPaths: templates.searchPaths.map(searchPath => path.resolve(searchPath)),
    maxTemplateSizeMb: templates.maxTemplateSizeMb,
    maxVariablesPerTemplate: templates.maxVariablesPerTemplate,
    fileExtensions: templates.fileExtensions,
    cache: { enabled: cache.enabled, ttl: cache.ttlMs, maxEntries: cache.maxEntries }
  };
}

export async function createContext(options: GlobalOptions): Promise<CliContext> {
  const config = await new ConfigService({ baseDir: options.config }).loadConfig();
  Logger.configure({ level: resolveLogLevel(options, config.logging.level) });
  return { config, templates: new TemplateService(templateServiceConfig(config)) };
}
