// Tests for template file lookup

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { TemplateFileResolver, toBufferEncoding } from './template-file-resolver.js';
import { validateTemplateDefinition } from '../../core/schemas.js';
import { SecurityError } from '../../core/errors.js';

function buildTemplate(files: Record<string, unknown>[], sourcePath?: string) {
  return validateTemplateDefinition(
    {
      metadata: {
        name: 'Resolver Fixture',
        description: 'Fixture for resolver tests',
        version: '1.0.0',
        category: 'library',
        author: 'tester'
      },
      structure: { root_directory: { name: 'pkg', files } },
      template_files: { files: [{ name: 'bundled.py.tpl', content: 'bundled' }] }
    },
    { sourcePath }
  );
}

describe('TemplateFileResolver', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scaffold-resolver-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('should prefer the template collection', async () => {
    const resolver = new TemplateFileResolver();
    const template = buildTemplate([]);

    const resolved = await resolver.resolve(template, 'bundled.py.tpl');

    expect(resolved).toEqual({ name: 'bundled.py.tpl', content: 'bundled', encoding: undefined });
  });

  it('should read from the base path beside the definition', async () => {
    await fs.mkdir(path.join(workDir, 'templates'));
    await fs.writeFile(path.join(workDir, 'templates', 'setup.py.tpl'), 'setup()');
    const template = buildTemplate([], path.join(workDir, 'template.yaml'));

    const resolved = await new TemplateFileResolver().resolve(template, 'setup.py.tpl');

    expect(resolved?.content).toBe('setup()');
    expect(resolved?.path).toBe(path.join(workDir, 'templates', 'setup.py.tpl'));
  });

  it('should return null when the file exists nowhere', async () => {
    const resolver = new TemplateFileResolver({ searchPaths: [workDir] });

    expect(await resolver.resolve(buildTemplate([]), 'absent.tpl')).toBeNull();
  });

  it('should reject names that leave the search directory', async () => {
    const resolver = new TemplateFileResolver({ searchPaths: [workDir] });

    await expect(resolver.resolve(buildTemplate([]), '../outside.tpl')).rejects.toBeInstanceOf(SecurityError);
  });

  it('should list referenced files found only on disk', async () => {
    await fs.writeFile(path.join(workDir, 'on-disk.tpl'), 'x');
    const resolver = new TemplateFileResolver({ searchPaths: [workDir] });
    const template = buildTemplate([
      { name: 'a.py', template_file: 'bundled.py.tpl' },
      { name: 'b.py', template_file: 'on-disk.tpl' },
      { name: 'c.py', template_file: 'absent.tpl' }
    ]);

    const external = await resolver.listExternal(template);

    expect([...external]).toEqual(['on-disk.tpl']);
  });

  it('should map file encodings to buffer encodings', () => {
    expect(toBufferEncoding('utf-8')).toBe('utf8');
    expect(toBufferEncoding('latin-1')).toBe('latin1');
  });
});
