// Tests for input validation and path safety

import { describe, it, expect } from 'vitest';
import * as path from 'path';
import {
  checkItemName,
  checkRelativePath,
  ensureInside,
  parsePermissions,
  isValidRegex,
  SEMVER_PATTERN,
  TAG_PATTERN
} from './validation.js';
import { ValidationError, SecurityError } from './errors.js';

describe('checkItemName', () => {
  it('should accept names with placeholders', () => {
    expect(checkItemName('{{ project_name }}', 'Directory')).toBeNull();
    expect(checkItemName('README.md', 'File')).toBeNull();
  });

  it('should reject empty names', () => {
    expect(checkItemName('   ', 'File')).toBe('File name cannot be empty');
  });

  it('should reject invalid characters', () => {
    expect(checkItemName('a?b', 'File')).toBe('File name contains invalid characters: a?b');
  });

  it('should reject reserved Windows names regardless of case and extension', () => {
    expect(checkItemName('nul', 'Directory')).toBe("Directory name 'nul' is reserved on Windows");
    expect(checkItemName('com1.log', 'File')).toBe("File name 'com1.log' is reserved on Windows");
  });

  it('should reject parent directory segments', () => {
    expect(checkItemName('..', 'Directory')).toBe("Directory name '..' cannot contain '..'");
    expect(checkItemName('..hidden', 'File')).toBeNull();
  });
});

describe('checkRelativePath', () => {
  it('should accept nested relative paths', () => {
    expect(checkRelativePath('src/index.ts.tpl')).toBeNull();
  });

  it('should reject absolute paths and traversal', () => {
    expect(checkRelativePath('/etc/passwd')).toBe('Path must be relative');
    expect(checkRelativePath('C:\\temp')).toBe('Path must be relative');
    expect(checkRelativePath('a/../../b')).toBe("Path cannot contain '..'");
  });
});

describe('ensureInside', () => {
  const root = path.resolve('/tmp/project');

  it('should resolve paths inside the root', () => {
    expect(ensureInside(root, 'src/main.ts')).toBe(path.join(root, 'src', 'main.ts'));
    expect(ensureInside(root, '.')).toBe(root);
  });

  it('should allow names starting with two dots', () => {
    expect(ensureInside(root, '..config')).toBe(path.join(root, '..config'));
  });

  it('should reject escapes', () => {
    expect(() => ensureInside(root, '../outside')).toThrow(SecurityError);
    expect(() => ensureInside(root, '/etc')).toThrow('Path traversal detected');
  });
});

describe('parsePermissions', () => {
  it('should parse octal strings', () => {
    expect(parsePermissions('755')).toBe(0o755);
    expect(parsePermissions('644')).toBe(0o644);
  });

  it('should reject invalid modes', () => {
    expect(() => parsePermissions('9')).toThrow(ValidationError);
  });
});

describe('patterns', () => {
  it('should accept semantic versions with pre-release and build metadata', () => {
    expect(SEMVER_PATTERN.test('1.2.3-beta.1+build.5')).toBe(true);
    expect(SEMVER_PATTERN.test('1.2')).toBe(false);
  });

  it('should require an alphanumeric character in tags', () => {
    expect(TAG_PATTERN.test('cli-tool')).toBe(true);
    expect(TAG_PATTERN.test('--')).toBe(false);
  });

  it('should detect invalid regular expressions', () => {
    expect(isValidRegex('^[a-z]+$')).toBe(true);
    expect(isValidRegex('(')).toBe(false);
  });
});
