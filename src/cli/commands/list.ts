// List command - show templates found in the template directories

import { Command } from 'commander';
import { createContext, type GlobalOptions } from '../utils/context.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { formatTemplateList } from '../utils/format.js';

interface ListOptions {
  dir?: string;
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List available project templates')
    .option('-d, --dir <dir>', 'Scan this directory instead of the configured ones')
    .action(
      withErrorHandling(async (options: ListOptions) => {
        const { templates } = await createContext(program.opts<GlobalOptions>());
        const listing = await templates.listTemplates(options.dir ? [options.dir] : undefined);
        console.log(formatTemplateList(listing).join('\n'));
      })
    );
}
