// Generate command - render a template into an output directory

import { Command } from 'commander';
import { ProjectGenerator } from '../../services/generation/project-generator.js';
import { SystemActionExecutor } from '../../services/hooks/action-executor.js';
import { HookRunner } from '../../services/hooks/hook-runner.js';
import { VariablePrompter } from '../../services/prompt/variable-prompter.js';
import { systemVariables } from '../../services/variables/system-variables.js';
import { createContext, type GlobalOptions } from '../utils/context.js';
import { success, warn, withErrorHandling } from '../utils/error-handler.js';
import { formatGenerationSummary } from '../utils/format.js';
import { collectVar, parseVarAssignments, readValuesFile } from '../utils/values.js';

interface GenerateOptions {
  var: string[];
  values?: string;
  overwrite?: boolean;
  allowNonEmpty?: boolean;
  force?: boolean;
  dryRun?: boolean;
  /** False with --no-hooks */
  hooks: boolean;
  interactive?: boolean;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate <template> <output>')
    .description('Generate a project from a template')
    .option('--var <key=value>', 'Set a variable (repeatable)', collectVar, [])
    .option('--values <file>', 'Read variable values from a YAML or JSON file')
    .option('--overwrite', 'Replace files that already exist')
    .option('--allow-non-empty', 'Render into a non-empty directory, skipping existing files')
    .option('--force', 'Generate even when the template has validation problems')
    .option('--dry-run', 'Report what would be generated without writing anything')
    .option('--no-hooks', 'Do not run template hooks')
    .option('-i, --interactive', 'Prompt for variables that were not supplied')
    .action(
      withErrorHandling(async (templateRef: string, outputPath: string, options: GenerateOptions) => {
        const { config, templates } = await createContext(program.opts<GlobalOptions>());
        const template = await templates.findTemplate(templateRef);

        const fileValues = options.values ? await readValuesFile(options.values) : {};
        let values: Record<string, unknown> = { ...fileValues, ...parseVarAssignments(options.var) };

        if (options.interactive) {
          const system = systemVariables({
            license: template.metadata.license,
            author: config.generation.defaultAuthor ?? template.metadata.author
          });
          values = await new VariablePrompter().promptForMissing(template.variables, values, system);
        }

        const generator = new ProjectGenerator(
          {
            fileResolver: templates.fileResolver,
            hooks: new HookRunner(new SystemActionExecutor(config.security))
          },
          { defaultAuthor: config.generation.defaultAuthor }
        );

        const result = await generator.generate({
          template,
          values,
          outputPath,
          options: {
            overwrite: options.overwrite,
            allowNonEmpty: options.allowNonEmpty,
            force: options.force,
            dryRun: options.dryRun,
            runHooks: options.hooks,
            coerce: true
          }
        });

        for (const warning of result.warnings) {
          warn(warning);
        }
        console.log(formatGenerationSummary(result, options.dryRun === true).join('\n'));
        if (!options.dryRun) {
          success(`Generated '${template.metadata.name}' in ${result.projectRoot}`);
        }
      })
    );
}
