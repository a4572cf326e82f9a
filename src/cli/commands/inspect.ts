// Inspect command - metadata, variables and structure of a template

import { Command } from 'commander';
import { createContext, type GlobalOptions } from '../utils/context.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { formatTemplateDetails } from '../utils/format.js';

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect <template>')
    .description('Show a template: metadata, variables, structure and hooks')
    .action(
      withErrorHandling(async (templateRef: string) => {
        const { templates } = await createContext(program.opts<GlobalOptions>());
        const template = await templates.findTemplate(templateRef);
        console.log(formatTemplateDetails(template).join('\n'));
      })
    );
}
