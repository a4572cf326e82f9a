// Validate command - schema and cross-field checks for one definition file

import { Command } from 'commander';
import { createContext, type GlobalOptions } from '../utils/context.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { formatValidationReport } from '../utils/format.js';

/** Exit code when the definition has errors */
const INVALID_TEMPLATE_EXIT_CODE = 2;

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <template>')
    .description('Validate a template definition file')
    .action(
      withErrorHandling(async (templatePath: string) => {
        const { templates } = await createContext(program.opts<GlobalOptions>());
        const report = await templates.validateTemplateFile(templatePath);
        console.log(formatValidationReport(report).join('\n'));
        if (!report.valid) {
          process.exitCode = INVALID_TEMPLATE_EXIT_CODE;
        }
      })
    );
}
