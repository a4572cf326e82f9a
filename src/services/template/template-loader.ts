// Reads template definition files from disk

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { NotFoundError, TemplateLoadError, isNotFoundError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { validateTemplateDefinition } from '../../core/schemas.js';
import { isRecord } from '../../core/validation.js';
import type { Template } from '../../models/template.js';

export interface TemplateLoaderConfig {
  maxTemplateSizeMb: number;
  maxVariablesPerTemplate: number;
  fileExtensions: string[];
}

const DEFAULT_CONFIG: TemplateLoaderConfig = {
  maxTemplateSizeMb: 10,
  maxVariablesPerTemplate: 50,
  fileExtensions: ['.yaml', '.yml', '.json']
};

/**
 * Loads, parses and schema-validates one definition file
 */
export class TemplateLoader {
  private config: TemplateLoaderConfig;

  constructor(config: Partial<TemplateLoaderConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  isDefinitionFile(filePath: string): boolean {
    return this.config.fileExtensions.includes(path.extname(filePath).toLowerCase());
  }

  async loadTemplate(templatePath: string): Promise<Template> {
    const absolutePath = path.resolve(templatePath);
    if (!this.isDefinitionFile(absolutePath)) {
      throw new TemplateLoadError(
        `Unsupported template file type '${path.extname(absolutePath)}'. Expected one of: ${this.config.fileExtensions.join(', ')}`,
        absolutePath
      );
    }

    const content = await this.readDefinition(absolutePath);
    const data = this.parse(content, absolutePath);

    if (isRecord(data) && Array.isArray(data.variables) && data.variables.length > this.config.maxVariablesPerTemplate) {
      throw new TemplateLoadError(
        `Template declares ${data.variables.length} variables, more than maxVariablesPerTemplate (${this.config.maxVariablesPerTemplate})`,
        absolutePath
      );
    }

    const template = validateTemplateDefinition(data, { sourcePath: absolutePath });
    logger.debug('Loaded template', { name: template.metadata.name, path: absolutePath });
    return template;
  }

  private async readDefinition(absolutePath: string): Promise<string> {
    const limit = this.config.maxTemplateSizeMb * 1024 * 1024;
    try {
      const stats = await fs.stat(absolutePath);
      if (!stats.isFile()) {
        throw new TemplateLoadError(`Template path is not a file: ${absolutePath}`, absolutePath);
      }
      if (stats.size > limit) {
        throw new TemplateLoadError(
          `Template file is ${stats.size} bytes, larger than maxTemplateSizeMb (${this.config.maxTemplateSizeMb} MB)`,
          absolutePath
        );
      }
      return await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new NotFoundError('Template', absolutePath);
      }
      throw error;
    }
  }

  private parse(content: string, absolutePath: string): unknown {
    if (path.extname(absolutePath).toLowerCase() === '.json') {
      try {
        return JSON.parse(content);
      } catch (error) {
        if (!(error instanceof SyntaxError)) {
          throw error;
        }
        throw new TemplateLoadError(`Invalid JSON in template: ${error.message}`, absolutePath);
      }
    }

    try {
      return yaml.parse(content);
    } catch (error) {
      if (!(error instanceof yaml.YAMLParseError)) {
        throw error;
      }
      const position = error.linePos?.[0];
      throw new TemplateLoadError(
        `Invalid YAML in template: ${error.message}`,
        absolutePath,
        position?.line,
        position?.col
      );
    }
  }
}
