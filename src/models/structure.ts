// Directory/file tree model

import type { FileEncoding } from './types.js';

/**
 * Where a file's bytes come from. Exactly one source per file.
 */
export type FileSource =
  | { readonly kind: 'inline'; readonly content: string }
  | { readonly kind: 'template'; readonly templateFile: string }
  | { readonly kind: 'binary'; readonly data: string };

export interface FileItem {
  readonly name: string;
  readonly source: FileSource;
  /** Falls back to the template's configured encoding */
  readonly encoding?: FileEncoding;
  readonly permissions: string;
  readonly executable: boolean;
  readonly condition?: string;
}

export interface DirectoryItem {
  readonly name: string;
  readonly permissions: string;
  readonly condition?: string;
  readonly files: readonly FileItem[];
  readonly directories: readonly DirectoryItem[];
  readonly createIfEmpty: boolean;
}

export interface ProjectStructure {
  readonly rootDirectory: DirectoryItem;
  readonly preserveEmptyDirectories: boolean;
}

/**
 * Standalone template text, rendered on its own or referenced by a FileItem
 */
export interface TemplateFile {
  readonly name: string;
  readonly content: string;
  readonly encoding?: FileEncoding;
  readonly description?: string;
  readonly outputPath?: string;
  readonly variablesUsed: readonly string[];
}

export interface TemplateFiles {
  readonly files: readonly TemplateFile[];
  readonly basePath: string;
}

/**
 * Every file in the subtree, depth-first
 */
export function allFiles(directory: DirectoryItem): FileItem[] {
  const files = [...directory.files];
  for (const child of directory.directories) {
    files.push(...allFiles(child));
  }
  return files;
}

/**
 * Every directory below this one, depth-first, excluding itself
 */
export function allDirectories(directory: DirectoryItem): DirectoryItem[] {
  const directories: DirectoryItem[] = [];
  for (const child of directory.directories) {
    directories.push(child, ...allDirectories(child));
  }
  return directories;
}

export function findFile(directory: DirectoryItem, name: string): FileItem | undefined {
  return allFiles(directory).find(file => file.name === name);
}

export function findDirectory(directory: DirectoryItem, name: string): DirectoryItem | undefined {
  return allDirectories(directory).find(child => child.name === name);
}

/**
 * Longest chain of nested directories, counting the given one
 */
export function structureDepth(directory: DirectoryItem): number {
  let deepest = 0;
  for (const child of directory.directories) {
    deepest = Math.max(deepest, structureDepth(child));
  }
  return deepest + 1;
}

/**
 * Mode string after applying the executable flag: each read bit gains its execute bit
 */
export function effectivePermissions(file: FileItem): string {
  if (!file.executable) {
    return file.permissions;
  }
  return file.permissions
    .split('')
    .map(digit => {
      const bits = Number.parseInt(digit, 8);
      return (bits & 4 ? bits | 1 : bits).toString(8);
    })
    .join('');
}

/**
 * Whether the file's name or text goes through the renderer
 */
export function isTemplated(file: FileItem): boolean {
  if (file.name.includes('{{')) {
    return true;
  }
  switch (file.source.kind) {
    case 'inline':
      return file.source.content.includes('{{') || file.source.content.includes('{%');
    case 'template':
      return true;
    case 'binary':
      return false;
  }
}

/**
 * Output file name of a template file: its name without the template suffix
 */
export function outputNameOf(templateFile: TemplateFile, suffix: string): string {
  return templateFile.name.endsWith(suffix)
    ? templateFile.name.slice(0, -suffix.length)
    : templateFile.name;
}

export function findTemplateFile(templateFiles: TemplateFiles, name: string): TemplateFile | undefined {
  return templateFiles.files.find(file => file.name === name);
}
