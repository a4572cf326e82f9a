// Tests for removing paths created by a failed run

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { directoryChain, removeCreatedPaths } from './rollback.js';

describe('directoryChain', () => {
  it('should list every directory from the first created one down', () => {
    expect(directoryChain('/out/a', '/out/a/b/c')).toEqual(['/out/a', '/out/a/b', '/out/a/b/c']);
  });

  it('should hold a single entry when only the target was created', () => {
    expect(directoryChain('/out/a', '/out/a')).toEqual(['/out/a']);
  });
});

describe('removeCreatedPaths', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scaffold-rollback-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('should remove files and directories newest first', async () => {
    const app = path.join(workDir, 'app');
    const readme = path.join(app, 'README.md');
    await fs.mkdir(app);
    await fs.writeFile(readme, '# app');

    const removed = await removeCreatedPaths([
      { kind: 'directory', path: app },
      { kind: 'file', path: readme }
    ]);

    expect(removed).toEqual([readme, app]);
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it('should keep a directory that holds entries it did not create', async () => {
    const app = path.join(workDir, 'app');
    await fs.mkdir(app);
    await fs.writeFile(path.join(app, 'hook-output.log'), 'kept');

    const removed = await removeCreatedPaths([{ kind: 'directory', path: app }]);

    expect(removed).toEqual([]);
    expect(await fs.readdir(app)).toEqual(['hook-output.log']);
  });

  it('should count paths that are already gone as removed', async () => {
    const missing = path.join(workDir, 'missing');

    expect(await removeCreatedPaths([{ kind: 'directory', path: missing }])).toEqual([missing]);
  });
});
