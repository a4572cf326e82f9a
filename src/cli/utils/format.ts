// Text output of the CLI commands

import { HOOK_STAGES } from '../../models/types.js';
import type { DirectoryItem, FileItem } from '../../models/structure.js';
import { templateId, type Template } from '../../models/template.js';
import type { TemplateValidationReport } from '../../models/validation.js';
import { choiceLabel, hasChoices, type TemplateVariable } from '../../models/variable.js';
import type { GenerationResult } from '../../services/generation/project-generator.js';
import type { ActionStatus } from '../../services/hooks/hook-runner.js';
import { formatValue } from '../../services/rendering/string-renderer.js';
import type { TemplateListing } from '../../services/template/template-service.js';

export function formatTemplateList(listing: TemplateListing): string[] {
  const lines: string[] = [];
  if (listing.templates.length === 0) {
    lines.push('No templates found.');
  } else {
    lines.push('Available templates:', '');
    for (const summary of listing.templates) {
      lines.push(`  ${summary.name} (${summary.version})`);
      lines.push(`    ID: ${summary.id}`);
      lines.push(`    Category: ${summary.category}`);
      lines.push(`    Variables: ${summary.variableCount}`);
      lines.push(`    ${summary.description}`);
      lines.push('');
    }
  }
  if (listing.invalid.length > 0) {
    lines.push(`Skipped ${listing.invalid.length} invalid template(s):`);
    for (const invalid of listing.invalid) {
      lines.push(`  ${invalid.path}: ${invalid.error.split('\n')[0]}`);
    }
  }
  return lines;
}

export function formatValidationReport(report: TemplateValidationReport): string[] {
  const lines = [report.valid ? `✓ ${report.path} is valid` : `✗ ${report.path} has ${report.errors.length} error(s)`];
  for (const error of report.errors) {
    lines.push(`  ✗ ${error}`);
  }
  for (const warning of report.warnings) {
    lines.push(`  ⚠ ${warning}`);
  }
  return lines;
}

function describeVariable(variable: TemplateVariable): string {
  const flags: string[] = [variable.type, variable.required ? 'required' : 'optional'];
  if (variable.showIf.length > 0 || variable.hideIf.length > 0) {
    flags.push('conditional');
  }
  let line = `  ${variable.name} (${flags.join(', ')}) - ${variable.description}`;
  if (variable.default !== undefined) {
    line += ` [default: ${formatValue(variable.default)}]`;
  }
  if (hasChoices(variable)) {
    line += ` [choices: ${variable.choices.map(choiceLabel).join(', ')}]`;
  }
  return line;
}

function fileLabel(file: FileItem): string {
  let label = file.name;
  if (file.source.kind === 'template') {
    label += ` <- ${file.source.templateFile}`;
  } else if (file.source.kind === 'binary') {
    label += ' (binary)';
  }
  if (file.executable) {
    label += ' *';
  }
  if (file.condition) {
    label += ` (if ${file.condition})`;
  }
  return label;
}

function directoryLabel(directory: DirectoryItem): string {
  return directory.condition ? `${directory.name}/ (if ${directory.condition})` : `${directory.name}/`;
}

/**
 * Box-drawing tree of a directory; files are listed before subdirectories
 */
export function formatStructureTree(root: DirectoryItem): string[] {
  const lines = [directoryLabel(root)];
  const walk = (directory: DirectoryItem, indent: string) => {
    const entries = [
      ...directory.files.map(file => ({ label: fileLabel(file), child: undefined })),
      ...directory.directories.map(child => ({ label: directoryLabel(child), child }))
    ];
    entries.forEach((entry, index) => {
      const last = index === entries.length - 1;
      lines.push(`${indent}${last ? '└── ' : '├── '}${entry.label}`);
      if (entry.child) {
        walk(entry.child, indent + (last ? '    ' : '│   '));
      }
    });
  };
  walk(root, '');
  return lines;
}

export function formatTemplateDetails(template: Template): string[] {
  const { metadata } = template;
  const author = metadata.authorEmail ? `${metadata.author} <${metadata.authorEmail}>` : metadata.author;
  const lines = [
    `Name:        ${metadata.name}`,
    `ID:          ${templateId(metadata)}`,
    `Version:     ${metadata.version}`,
    `Category:    ${metadata.category}`,
    `Author:      ${author}`,
    `License:     ${metadata.license}`,
    `Description: ${metadata.description}`
  ];
  if (metadata.tags.length > 0) {
    lines.push(`Tags:        ${metadata.tags.join(', ')}`);
  }
  lines.push(`Requires:    Node.js ${metadata.minRuntimeVersion}+ on ${metadata.compatibility.join(', ')}`);

  lines.push('', `Variables (${template.variables.length}):`);
  lines.push(...template.variables.map(describeVariable));

  lines.push('', 'Structure:');
  lines.push(...formatStructureTree(template.structure.rootDirectory).map(line => `  ${line}`));

  if (template.templateFiles.files.length > 0) {
    lines.push('', `Template files (${template.templateFiles.files.length}):`);
    for (const file of template.templateFiles.files) {
      lines.push(`  ${file.name}${file.outputPath ? ` -> ${file.outputPath}` : ''}`);
    }
  }

  const stages = HOOK_STAGES.filter(stage => template.hooks[stage].length > 0);
  if (stages.length > 0 || template.actionGroups.length > 0) {
    lines.push('', 'Hooks:');
    for (const stage of stages) {
      lines.push(`  ${stage}: ${template.hooks[stage].map(action => action.name).join(', ')}`);
    }
    for (const group of template.actionGroups) {
      lines.push(`  group ${group.name}: ${group.actions.map(action => action.name).join(', ')}`);
    }
  }
  return lines;
}

export function formatGenerationSummary(result: GenerationResult, dryRun: boolean): string[] {
  const { stats } = result;
  const lines = [
    dryRun ? 'Dry run, nothing was written:' : 'Generation complete:',
    `  Files created:       ${stats.filesCreated}`,
    `  Files overwritten:   ${stats.filesOverwritten}`,
    `  Files skipped:       ${stats.filesSkipped}`,
    `  Directories created: ${stats.directoriesCreated}`
  ];
  const count = (status: ActionStatus) => result.hookResults.filter(hook => hook.status === status).length;
  const failed = result.hookResults.filter(hook => hook.status === 'failed');
  if (result.hookResults.length > 0) {
    lines.push(`  Hook actions:        ${count('success')} succeeded, ${failed.length} failed, ${count('skipped')} skipped`);
  }
  for (const hook of failed) {
    lines.push(`  ⚠ ${hook.action} (${hook.source}): ${hook.error ?? 'failed'}`);
  }
  for (const error of stats.errors) {
    lines.push(`  ⚠ ${error}`);
  }
  return lines;
}
