// Cross-field template validation
//
// Runs after schema validation and finds problems that span several parts of
// a template: duplicates, dangling references and broken conditions. It needs
// neither variable values nor the filesystem.

import { collectVariables, parseExpression } from '../../core/expression.js';
import { ConditionSyntaxError, TemplateSyntaxError, describeError } from '../../core/errors.js';
import { allActions } from '../../models/action.js';
import { allFiles, findTemplateFile, outputNameOf, structureDepth, type DirectoryItem } from '../../models/structure.js';
import type { Template } from '../../models/template.js';
import { parseBooleanLiteral } from '../condition/condition-evaluator.js';
import { checkTemplateSyntax, extractVariableNames, unparsedPlaceholders } from '../rendering/string-renderer.js';
import { SYSTEM_VARIABLE_NAMES } from '../variables/system-variables.js';

export const MAX_STRUCTURE_FILES = 1000;
export const MAX_STRUCTURE_DEPTH = 20;

/**
 * Output types whose own template syntax uses braces; their content is not scanned
 */
const FOREIGN_TEMPLATE_EXTENSIONS = [
  '.html', '.htm', '.vue', '.svelte', '.hbs', '.handlebars', '.mustache', '.njk', '.jinja', '.liquid'
];

export interface CrossValidationOptions {
  /** Template file names that resolve outside the template's own collection */
  externalTemplateFiles?: ReadonlySet<string>;
}

/**
 * Names compare equal when they differ only in whitespace inside placeholders
 */
export function normalizeItemName(name: string): string {
  return name.replace(/\{\{([\s\S]*?)\}\}/g, (_match, inner: string) => `{{${inner.replace(/\s+/g, '')}}}`);
}

/**
 * Items whose names appear more than once, in first-appearance order
 */
function duplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      repeated.add(name);
    }
    seen.add(name);
  }
  return [...repeated];
}

function groupByNormalizedName(names: readonly string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const name of names) {
    const key = normalizeItemName(name);
    const group = groups.get(key) ?? [];
    group.push(name);
    groups.set(key, group);
  }
  return groups;
}

function collidingNames(names: readonly string[]): string[] {
  return [...groupByNormalizedName(names).values()]
    .filter(group => group.length > 1)
    .flat();
}

export function isForeignTemplate(name: string, suffix: string): boolean {
  let lowered = name.toLowerCase();
  if (lowered.endsWith(suffix.toLowerCase())) {
    lowered = lowered.slice(0, -suffix.length);
  }
  return FOREIGN_TEMPLATE_EXTENSIONS.some(extension => lowered.endsWith(extension));
}

export class CrossValidator {
  /**
   * Every cross-field diagnostic; an empty list means the template is consistent
   */
  validate(template: Template, options: CrossValidationOptions = {}): string[] {
    return [
      ...this.checkVariables(template),
      ...this.validateStructure(template),
      ...this.checkReferences(template),
      ...this.checkConditions(template),
      ...this.checkTemplateFiles(template, options.externalTemplateFiles ?? new Set()),
      ...this.checkActions(template)
    ];
  }

  /**
   * Duplicate and conflicting names in the directory tree, and its overall size
   */
  validateStructure(template: Template): string[] {
    const errors: string[] = [];
    const visit = (directory: DirectoryItem): void => {
      const fileNames = directory.files.map(file => file.name);
      const directoryNames = directory.directories.map(child => child.name);

      const duplicateFiles = collidingNames(fileNames);
      if (duplicateFiles.length > 0) {
        errors.push(`Duplicate file names in directory '${directory.name}': ${duplicateFiles.join(', ')}`);
      }
      const duplicateDirectories = collidingNames(directoryNames);
      if (duplicateDirectories.length > 0) {
        errors.push(`Duplicate directory names in directory '${directory.name}': ${duplicateDirectories.join(', ')}`);
      }

      const directoryKeys = new Set(directoryNames.map(normalizeItemName));
      const fileKeys = new Set(fileNames.map(normalizeItemName));
      const conflicts = [
        ...fileNames.filter(name => directoryKeys.has(normalizeItemName(name))),
        ...directoryNames.filter(name => fileKeys.has(normalizeItemName(name)))
      ];
      if (conflicts.length > 0) {
        errors.push(`Name conflicts between files and directories in '${directory.name}': ${conflicts.join(', ')}`);
      }

      directory.directories.forEach(visit);
    };

    const root = template.structure.rootDirectory;
    visit(root);

    const fileCount = allFiles(root).length;
    const depth = structureDepth(root);
    if (fileCount > MAX_STRUCTURE_FILES || depth > MAX_STRUCTURE_DEPTH) {
      errors.push(`Template structure is very large (${fileCount} files, depth ${depth})`);
    }
    return errors;
  }

  private knownNames(template: Template): Set<string> {
    return new Set<string>([...template.variables.map(variable => variable.name), ...SYSTEM_VARIABLE_NAMES]);
  }

  private checkVariables(template: Template): string[] {
    const errors: string[] = [];
    const names = template.variables.map(variable => variable.name);
    const repeated = duplicates(names);
    if (repeated.length > 0) {
      errors.push(`Duplicate variable names: ${repeated.join(', ')}`);
    }

    const known = this.knownNames(template);
    for (const variable of template.variables) {
      const referenced = [...variable.showIf, ...variable.hideIf].map(condition => condition.variable);
      for (const name of new Set(referenced)) {
        if (!known.has(name)) {
          errors.push(`Variable '${variable.name}' has a condition on undeclared variable '${name}'`);
        }
      }
    }
    return errors;
  }

  /**
   * Placeholders in names and content that reference nothing
   */
  private checkReferences(template: Template): string[] {
    const errors: string[] = [];
    const known = this.knownNames(template);
    const suffix = template.configuration.templateSuffix;

    const report = (text: string, where: string) => {
      for (const name of extractVariableNames(text)) {
        if (!known.has(name)) {
          errors.push(`Undefined variable '${name}' used in ${where}`);
        }
      }
    };
    const checkSyntax = (text: string, where: string) => {
      try {
        checkTemplateSyntax(text);
      } catch (error) {
        if (!(error instanceof TemplateSyntaxError)) {
          throw error;
        }
        errors.push(`Invalid template syntax in ${where}: ${error.message}`);
      }
    };

    const visit = (directory: DirectoryItem): void => {
      report(directory.name, `directory name: ${directory.name}`);
      for (const file of directory.files) {
        report(file.name, `file name: ${file.name}`);
        if (file.source.kind === 'inline' && !isForeignTemplate(file.name, suffix)) {
          report(file.source.content, `file content: ${file.name}`);
          checkSyntax(file.source.content, `file content: ${file.name}`);
        }
      }
      directory.directories.forEach(visit);
    };
    visit(template.structure.rootDirectory);

    for (const templateFile of template.templateFiles.files) {
      const where = `template file '${templateFile.name}'`;
      if (templateFile.outputPath) {
        report(templateFile.outputPath, where);
      }
      if (!isForeignTemplate(outputNameOf(templateFile, suffix), suffix)) {
        report(templateFile.content, where);
        checkSyntax(templateFile.content, where);
      }
    }
    return errors;
  }

  private checkConditions(template: Template): string[] {
    const errors: string[] = [];
    const known = this.knownNames(template);

    const check = (condition: string | undefined, kind: string, name: string) => {
      if (condition === undefined || parseBooleanLiteral(condition) !== null) {
        return;
      }
      let referenced: string[];
      if (condition.includes('{{')) {
        for (const placeholder of unparsedPlaceholders(condition)) {
          errors.push(`Invalid placeholder in condition on ${kind} '${name}': ${placeholder}`);
        }
        try {
          checkTemplateSyntax(condition);
        } catch (error) {
          if (!(error instanceof TemplateSyntaxError)) {
            throw error;
          }
          errors.push(`Invalid template syntax in condition on ${kind} '${name}': ${error.message}`);
        }
        referenced = extractVariableNames(condition);
      } else {
        try {
          referenced = collectVariables(parseExpression(condition.trim()));
        } catch (error) {
          if (!(error instanceof ConditionSyntaxError)) {
            throw error;
          }
          errors.push(`Invalid condition on ${kind} '${name}': ${describeError(error)}`);
          return;
        }
      }
      for (const variable of new Set(referenced)) {
        if (!known.has(variable)) {
          errors.push(`Undefined variable '${variable}' used in condition on ${kind} '${name}'`);
        }
      }
    };

    const visit = (directory: DirectoryItem): void => {
      check(directory.condition, 'directory', directory.name);
      for (const file of directory.files) {
        check(file.condition, 'file', file.name);
      }
      directory.directories.forEach(visit);
    };
    visit(template.structure.rootDirectory);

    for (const action of allActions(template.hooks)) {
      check(action.condition, 'action', action.name);
    }
    for (const group of template.actionGroups) {
      check(group.condition, 'action group', group.name);
      for (const action of group.actions) {
        check(action.condition, 'action', action.name);
      }
    }
    return errors;
  }

  /**
   * Declared variables referenced nowhere in the template. Template files that
   * live only on disk are not scanned.
   */
  findUnusedVariables(template: Template): string[] {
    const used = new Set<string>();
    const addText = (text: string | undefined) => {
      if (text !== undefined) {
        extractVariableNames(text).forEach(name => used.add(name));
      }
    };
    const addCondition = (condition: string | undefined) => {
      if (condition === undefined || parseBooleanLiteral(condition) !== null) {
        return;
      }
      if (condition.includes('{{')) {
        addText(condition);
        return;
      }
      try {
        collectVariables(parseExpression(condition.trim())).forEach(name => used.add(name));
      } catch (error) {
        // reported by validate()
        if (!(error instanceof ConditionSyntaxError)) {
          throw error;
        }
      }
    };

    const visit = (directory: DirectoryItem): void => {
      addText(directory.name);
      addCondition(directory.condition);
      for (const file of directory.files) {
        addText(file.name);
        addCondition(file.condition);
        if (file.source.kind === 'inline') {
          addText(file.source.content);
        }
      }
      directory.directories.forEach(visit);
    };
    visit(template.structure.rootDirectory);

    for (const templateFile of template.templateFiles.files) {
      addText(templateFile.outputPath);
      addText(templateFile.content);
      templateFile.variablesUsed.forEach(name => used.add(name));
    }
    for (const variable of template.variables) {
      [...variable.showIf, ...variable.hideIf].forEach(condition => used.add(condition.variable));
    }
    const actions = [...allActions(template.hooks), ...template.actionGroups.flatMap(group => group.actions)];
    for (const action of actions) {
      addText(action.command);
      addText(action.workingDirectory);
      addCondition(action.condition);
    }
    template.actionGroups.forEach(group => addCondition(group.condition));

    return template.variables.map(variable => variable.name).filter(name => !used.has(name));
  }

  private checkTemplateFiles(template: Template, external: ReadonlySet<string>): string[] {
    const errors: string[] = [];
    for (const file of allFiles(template.structure.rootDirectory)) {
      if (file.source.kind !== 'template') {
        continue;
      }
      const reference = file.source.templateFile;
      if (!findTemplateFile(template.templateFiles, reference) && !external.has(reference)) {
        errors.push(`Template file '${reference}' not found (referenced by ${file.name})`);
      }
    }

    const repeated = duplicates(template.templateFiles.files.map(file => file.name));
    if (repeated.length > 0) {
      errors.push(`Duplicate template file names: ${repeated.join(', ')}`);
    }
    return errors;
  }

  private checkActions(template: Template): string[] {
    const errors: string[] = [];
    const repeated = duplicates(allActions(template.hooks).map(action => action.name));
    if (repeated.length > 0) {
      errors.push(`Duplicate action names across hooks: ${repeated.join(', ')}`);
    }
    for (const group of template.actionGroups) {
      const inGroup = duplicates(group.actions.map(action => action.name));
      if (inGroup.length > 0) {
        errors.push(`Duplicate action names in group '${group.name}': ${inGroup.join(', ')}`);
      }
    }
    return errors;
  }
}

export const crossValidator = new CrossValidator();
