// Locates template files referenced by structure items

import * as fs from 'fs/promises';
import * as path from 'path';
import { isNotFoundError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { ensureInside } from '../../core/validation.js';
import { allFiles, findTemplateFile } from '../../models/structure.js';
import type { Template } from '../../models/template.js';
import type { FileEncoding } from '../../models/types.js';

export interface ResolvedTemplateFile {
  name: string;
  content: string;
  encoding?: FileEncoding;
  /** Absolute path when the file came from disk */
  path?: string;
}

export interface TemplateFileResolverConfig {
  /** Extra directories searched after the template's own base path */
  searchPaths: string[];
}

const DEFAULT_CONFIG: TemplateFileResolverConfig = {
  searchPaths: []
};

const BUFFER_ENCODINGS: Record<FileEncoding, BufferEncoding> = {
  'utf-8': 'utf8',
  'ascii': 'ascii',
  'latin-1': 'latin1',
  'binary': 'latin1'
};

export function toBufferEncoding(encoding: FileEncoding): BufferEncoding {
  return BUFFER_ENCODINGS[encoding];
}

/**
 * Resolves a template file from the template's own collection first, then from
 * `<definition dir>/<basePath>` and the configured search paths
 */
export class TemplateFileResolver {
  private config: TemplateFileResolverConfig;

  constructor(config: Partial<TemplateFileResolverConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  searchDirectories(template: Template): string[] {
    const directories: string[] = [];
    if (template.sourcePath) {
      directories.push(path.resolve(path.dirname(template.sourcePath), template.templateFiles.basePath));
    }
    for (const searchPath of this.config.searchPaths) {
      directories.push(path.resolve(searchPath));
    }
    return directories;
  }

  /**
   * Null when the file exists nowhere
   */
  async resolve(template: Template, name: string): Promise<ResolvedTemplateFile | null> {
    const bundled = findTemplateFile(template.templateFiles, name);
    if (bundled) {
      return { name, content: bundled.content, encoding: bundled.encoding };
    }

    const encoding = toBufferEncoding(template.configuration.encoding);
    for (const directory of this.searchDirectories(template)) {
      const candidate = ensureInside(directory, name);
      try {
        const content = await fs.readFile(candidate, { encoding });
        logger.debug('Resolved template file from disk', { name, path: candidate });
        return { name, content, path: candidate };
      } catch (error) {
        if (!isNotFoundError(error)) {
          throw error;
        }
      }
    }
    return null;
  }

  /**
   * Referenced template files missing from the collection but present on disk
   */
  async listExternal(template: Template): Promise<Set<string>> {
    const found = new Set<string>();
    for (const file of allFiles(template.structure.rootDirectory)) {
      if (file.source.kind !== 'template' || findTemplateFile(template.templateFiles, file.source.templateFile)) {
        continue;
      }
      if (await this.resolve(template, file.source.templateFile)) {
        found.add(file.source.templateFile);
      }
    }
    return found;
  }
}
