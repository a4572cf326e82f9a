// Tests for the generate and validate commands

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { registerGenerateCommand } from './generate.js';
import { registerValidateCommand } from './validate.js';

const DEFINITION = `metadata:
  name: Demo
  description: Demo template
  version: 1.0.0
  category: script
  author: tester
variables:
  - name: project_name
    type: string
    description: Project name
    filters: [slugify]
  - name: use_docker
    type: boolean
    description: Docker support
    default: false
structure:
  root_directory:
    name: "{{ project_name }}"
    files:
      - name: README.md
        content: "# {{ project_name }}"
      - name: Dockerfile
        condition: use_docker
        content: FROM node:20
`;

function buildProgram(): Command {
  const program = new Command();
  program.option('--config <dir>').option('--verbose').option('--quiet');
  registerGenerateCommand(program);
  registerValidateCommand(program);
  return program;
}

describe('CLI commands', () => {
  let testDir: string;
  let configDir: string;
  let definition: string;
  let outputDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scaffold-cli-'));
    configDir = path.join(testDir, '.scaffold');
    definition = path.join(testDir, 'demo.yaml');
    outputDir = path.join(testDir, 'out');
    await fs.mkdir(configDir);
    await fs.writeFile(path.join(configDir, 'config.yaml'), 'logging:\n  level: silent\n');
    await fs.writeFile(definition, DEFINITION);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(code => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(testDir, { recursive: true, force: true });
  });

  const run = (...args: string[]) =>
    buildProgram().parseAsync(['--config', configDir, ...args], { from: 'user' });

  describe('generate', () => {
    it('should render with --var values converted to their types', async () => {
      await run('generate', definition, outputDir, '--var', 'project_name=Demo App', '--var', 'use_docker=yes');

      const projectRoot = path.join(path.resolve(outputDir), 'demo-app');
      expect(await fs.readFile(path.join(projectRoot, 'README.md'), 'utf8')).toBe('# demo-app');
      expect(await fs.readFile(path.join(projectRoot, 'Dockerfile'), 'utf8')).toBe('FROM node:20');
      expect(console.log).toHaveBeenCalledWith(`✓ Generated 'Demo' in ${projectRoot}`);
    });

    it('should let --var override a values file', async () => {
      const valuesFile = path.join(testDir, 'values.json');
      await fs.writeFile(valuesFile, JSON.stringify({ project_name: 'From File', use_docker: false }));

      await run('generate', definition, outputDir, '--values', valuesFile, '--var', 'project_name=cli');

      expect(await fs.readdir(path.join(outputDir, 'cli'))).toEqual(['README.md']);
    });

    it('should write nothing during a dry run', async () => {
      await run('generate', definition, outputDir, '--var', 'project_name=demo', '--dry-run');

      await expect(fs.stat(outputDir)).rejects.toThrow();
      expect(console.log).toHaveBeenCalledWith(
        [
          'Dry run, nothing was written:',
          '  Files created:       1',
          '  Files overwritten:   0',
          '  Files skipped:       1',
          '  Directories created: 1'
        ].join('\n')
      );
    });

    it('should exit with code 2 when a required variable is missing', async () => {
      await expect(run('generate', definition, outputDir)).rejects.toThrow('exit 2');
      expect(console.error).toHaveBeenCalledWith(
        "\n❌ Error [VARIABLE_RESOLUTION_ERROR]: Variable resolution failed:\n  - Variable 'project_name' is required\n"
      );
    });

    it('should exit with code 4 for an unknown template', async () => {
      await expect(run('generate', 'no-such-template', outputDir)).rejects.toThrow('exit 4');
    });
  });

  describe('validate', () => {
    it('should report a valid definition', async () => {
      await run('validate', definition);

      expect(console.log).toHaveBeenCalledWith(`✓ ${definition} is valid`);
    });

    it('should set exit code 2 when the definition has errors', async () => {
      const broken = path.join(testDir, 'broken.yaml');
      await fs.writeFile(broken, DEFINITION.replace('content: "# {{ project_name }}"', 'content: "# {{ missing }}"'));

      await run('validate', broken);

      expect(process.exitCode).toBe(2);
      expect(console.log).toHaveBeenCalledWith(
        `✗ ${broken} has 1 error(s)\n  ✗ Undefined variable 'missing' used in file content: README.md`
      );
    });
  });
});
