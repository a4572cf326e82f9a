#!/usr/bin/env node
// Project scaffolder CLI

import { Command } from 'commander';
import { GENERATOR_VERSION } from '../services/variables/system-variables.js';
import { registerGenerateCommand } from './commands/generate.js';
import { registerInspectCommand } from './commands/inspect.js';
import { registerListCommand } from './commands/list.js';
import { registerValidateCommand } from './commands/validate.js';

const program = new Command();

program
  .name('scaffold')
  .description('Generate projects from declarative templates')
  .version(GENERATOR_VERSION)
  .option('--config <dir>', 'Directory containing config.yaml', '.scaffold')
  .option('--verbose', 'Show debug output')
  .option('--quiet', 'Only show errors');

// Register all commands
registerListCommand(program);
registerValidateCommand(program);
registerInspectCommand(program);
registerGenerateCommand(program);

await program.parseAsync();
