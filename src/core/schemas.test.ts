// Tests for template definition schemas

import { describe, it, expect } from 'vitest';
import {
  safeValidateTemplateDefinition,
  validateTemplateDefinition,
  TemplateVariableSchema,
  TemplateActionSchema,
  FileItemSchema,
  ValidationRuleSchema,
  ConditionalLogicSchema
} from './schemas.js';
import { SchemaValidationError } from './errors.js';

function definition(
  overrides: Record<string, unknown> = {},
  metadata: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    metadata: {
      name: 'Basic Script',
      description: 'A single-file script',
      version: '1.0.0',
      category: 'script',
      author: 'tester',
      ...metadata
    },
    structure: {
      root_directory: {
        name: '{{ project_name }}',
        files: [{ name: 'README.md', content: '# {{ project_name }}' }]
      }
    },
    variables: [{ name: 'project_name', type: 'string', description: 'Project name' }],
    ...overrides
  };
}

describe('validateTemplateDefinition', () => {
  it('should build a template with defaults applied', () => {
    const template = validateTemplateDefinition(definition());

    expect(template.metadata.license).toBe('MIT');
    expect(template.metadata.minRuntimeVersion).toBe('20.0.0');
    expect(template.metadata.compatibility).toEqual(['macOS', 'Linux', 'Windows']);
    expect(template.configuration).toEqual({
      schemaVersion: '1.0.0',
      templateSuffix: '.tpl',
      preservePermissions: true,
      encoding: 'utf-8'
    });
    expect(template.structure.preserveEmptyDirectories).toBe(true);
    expect(template.structure.rootDirectory.permissions).toBe('755');
    expect(template.structure.rootDirectory.createIfEmpty).toBe(true);
    expect(template.hooks.postGenerate).toEqual([]);
    expect(template.templateFiles).toEqual({ files: [], basePath: 'templates' });
  });

  it('should map snake_case keys to the model', () => {
    const template = validateTemplateDefinition(definition({
      variables: [{
        name: 'use_git',
        type: 'boolean',
        description: 'Initialize git',
        help_text: 'Runs git init',
        show_if: [{ variable: 'project_name', operator: 'is_not_empty' }]
      }]
    }));

    const variable = template.variables[0];
    expect(variable.helpText).toBe('Runs git init');
    expect(variable.showIf).toEqual([{ variable: 'project_name', operator: 'is_not_empty', value: null }]);
    expect(variable.hideIf).toEqual([]);
  });

  it('should freeze the resulting template', () => {
    const template = validateTemplateDefinition(definition());

    expect(Object.isFrozen(template)).toBe(true);
    expect(Object.isFrozen(template.structure.rootDirectory.files)).toBe(true);
    expect(Object.isFrozen(template.variables[0])).toBe(true);
  });

  it('should record the source path', () => {
    const template = validateTemplateDefinition(definition(), { sourcePath: '/tmp/basic.yaml' });
    expect(template.sourcePath).toBe('/tmp/basic.yaml');
  });

  it('should throw SchemaValidationError naming every issue', () => {
    const invalid = definition({}, { name: '', version: '1.0' });

    try {
      validateTemplateDefinition(invalid, { sourcePath: 'broken.yaml' });
      expect.fail('expected a SchemaValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        const paths = error.issues.map(issue => issue.path);
        expect(paths).toContain('metadata.name');
        expect(paths).toContain('metadata.version');
        expect(error.message.startsWith('Invalid template definition (broken.yaml):')).toBe(true);
        expect(error.exitCode).toBe(2);
      }
    }
  });

  it('should accept min_node_version as an alias', () => {
    const template = validateTemplateDefinition(definition({}, { min_node_version: '18.17.0' }));
    expect(template.metadata.minRuntimeVersion).toBe('18.17.0');
  });

  it('should reject updated before created', () => {
    const result = safeValidateTemplateDefinition(definition({}, { created: '2024-05-01', updated: '2024-04-01' }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues).toContainEqual({ path: 'metadata.updated', message: 'Updated date must be after created date' });
    }
  });

  it('should reject uppercase tags', () => {
    const result = safeValidateTemplateDefinition(definition({}, { tags: ['Python'] }));
    expect(result.success).toBe(false);
  });

  it('should require template file names to end with the suffix', () => {
    const result = safeValidateTemplateDefinition(definition({
      template_files: { files: [{ name: 'main.ts', content: '' }] }
    }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues).toContainEqual({
        path: 'template_files.files.0.name',
        message: "Template file name must end with '.tpl'"
      });
    }
  });

  it('should honour a custom template suffix', () => {
    const result = safeValidateTemplateDefinition(definition({
      configuration: { template_suffix: '.j2' },
      template_files: { files: [{ name: 'main.ts.j2', content: 'x', output_path: 'src/main.ts' }] }
    }));

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.template.templateFiles.files[0].outputPath).toBe('src/main.ts');
    }
  });
});

describe('TemplateVariableSchema', () => {
  it('should reject a default of the wrong type', () => {
    const result = TemplateVariableSchema.safeParse({
      name: 'use_git',
      type: 'boolean',
      description: 'Initialize git',
      default: 'yes'
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Default value for boolean variable must be boolean');
    }
  });

  it('should reject a non-integer default for integer variables', () => {
    const result = TemplateVariableSchema.safeParse({
      name: 'port', type: 'integer', description: 'Port', default: 80.5
    });
    expect(result.success).toBe(false);
  });

  it('should require at least two choices', () => {
    const result = TemplateVariableSchema.safeParse({
      name: 'framework', type: 'choice', description: 'Framework', choices: ['express']
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('At least 2 choices required for choice variables');
    }
  });

  it('should reject a choice default outside the choices', () => {
    const result = TemplateVariableSchema.safeParse({
      name: 'framework',
      type: 'choice',
      description: 'Framework',
      choices: ['express', 'fastify'],
      default: 'koa'
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("Default value 'koa' is not one of the choices");
    }
  });

  it('should accept plain strings and objects as choices', () => {
    const result = TemplateVariableSchema.safeParse({
      name: 'framework',
      type: 'choice',
      description: 'Framework',
      choices: ['express', { value: 'fastify', label: 'Fastify' }],
      default: 'fastify'
    });

    expect(result.success).toBe(true);
    if (result.success && result.data.type === 'choice') {
      expect(result.data.choices).toEqual([{ value: 'express' }, { value: 'fastify', label: 'Fastify' }]);
      expect(result.data.default).toBe('fastify');
    }
  });

  it('should reject names that are not identifiers', () => {
    const result = TemplateVariableSchema.safeParse({ name: '1name', type: 'string', description: 'x' });
    expect(result.success).toBe(false);
  });

  it('should default required to true and drop a null default', () => {
    const result = TemplateVariableSchema.safeParse({
      name: 'author', type: 'string', description: 'Author', default: null
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.required).toBe(true);
      expect(result.data.default).toBeUndefined();
    }
  });
});

describe('ValidationRuleSchema', () => {
  it('should accept rule_type with value', () => {
    const result = ValidationRuleSchema.safeParse({ rule_type: 'min_length', value: 3 });
    expect(result.success && result.data).toEqual({ ruleKind: 'min_length', operand: 3, message: undefined });
  });

  it('should accept the rule_kind and operand aliases', () => {
    const result = ValidationRuleSchema.safeParse({ rule_kind: 'pattern', operand: '^[a-z]+', message: 'lowercase only' });
    expect(result.success && result.data).toEqual({ ruleKind: 'pattern', operand: '^[a-z]+', message: 'lowercase only' });
  });

  it('should reject an invalid regular expression', () => {
    const result = ValidationRuleSchema.safeParse({ rule_type: 'pattern', value: '([a-z' });
    expect(result.success).toBe(false);
  });

  it('should reject a string operand for numeric rules', () => {
    const result = ValidationRuleSchema.safeParse({ rule_type: 'max_value', value: 'ten' });
    expect(result.success).toBe(false);
  });
});

describe('ConditionalLogicSchema', () => {
  it('should reject matches with an invalid pattern', () => {
    const result = ConditionalLogicSchema.safeParse({ variable: 'name', operator: 'matches', value: '[' });
    expect(result.success).toBe(false);
  });

  it('should reject unknown operators', () => {
    const result = ConditionalLogicSchema.safeParse({ variable: 'name', operator: 'like', value: 'x' });
    expect(result.success).toBe(false);
  });
});

describe('FileItemSchema', () => {
  it('should require a content source', () => {
    const result = FileItemSchema.safeParse({ name: 'a.txt' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('File must have content, template_file, or binary_content');
    }
  });

  it('should reject more than one content source', () => {
    const result = FileItemSchema.safeParse({ name: 'a.txt', content: 'x', template_file: 'a.txt.tpl' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('File must have only one of content, template_file, or binary_content');
    }
  });

  it('should accept numeric permissions as written by YAML', () => {
    const result = FileItemSchema.safeParse({ name: 'run.sh', content: '', permissions: 700 });
    expect(result.success && result.data.permissions).toBe('700');
  });

  it('should reject permissions that are not octal', () => {
    const result = FileItemSchema.safeParse({ name: 'run.sh', content: '', permissions: '789' });
    expect(result.success).toBe(false);
  });

  it('should reject reserved and invalid names', () => {
    expect(FileItemSchema.safeParse({ name: 'CON.txt', content: '' }).success).toBe(false);
    expect(FileItemSchema.safeParse({ name: 'a|b', content: '' }).success).toBe(false);
    expect(FileItemSchema.safeParse({ name: '..', content: '' }).success).toBe(false);
  });

  it('should reject traversal in template_file', () => {
    const result = FileItemSchema.safeParse({ name: 'a.txt', template_file: '../secret.tpl' });
    expect(result.success).toBe(false);
  });

  it('should mark binary content as binary encoded', () => {
    const result = FileItemSchema.safeParse({ name: 'logo.png', binary_content: 'aGVsbG8=' });
    expect(result.success && result.data.source).toEqual({ kind: 'binary', data: 'aGVsbG8=' });
    expect(result.success && result.data.encoding).toBe('binary');
  });

  it('should accept object and boolean conditions', () => {
    const objectForm = FileItemSchema.safeParse({ name: 'a', content: '', condition: { expression: 'use_git' } });
    const booleanForm = FileItemSchema.safeParse({ name: 'a', content: '', condition: false });

    expect(objectForm.success && objectForm.data.condition).toBe('use_git');
    expect(booleanForm.success && booleanForm.data.condition).toBe('false');
  });
});

describe('TemplateActionSchema', () => {
  it('should require git commands to start with git', () => {
    const result = TemplateActionSchema.safeParse({ name: 'init', type: 'git', command: 'init' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("Git action command must start with 'git '");
    }
  });

  it('should reject dangerous commands', () => {
    const result = TemplateActionSchema.safeParse({ name: 'wipe', type: 'command', command: 'rm -rf /' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Command contains potentially dangerous operations');
    }
  });

  it('should reject a non-positive timeout', () => {
    const result = TemplateActionSchema.safeParse({ name: 'install', type: 'command', command: 'npm install', timeout: 0 });
    expect(result.success).toBe(false);
  });

  it('should apply defaults', () => {
    const result = TemplateActionSchema.safeParse({ name: 'init', type: 'git', command: 'git init' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.platforms).toEqual(['windows', 'macos', 'linux']);
      expect(result.data.required).toBe(true);
      expect(result.data.environment).toEqual({});
      expect(result.data.arguments).toEqual([]);
    }
  });
});
