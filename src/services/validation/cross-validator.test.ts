// Tests for CrossValidator

import { describe, it, expect } from 'vitest';
import { CrossValidator, normalizeItemName, isForeignTemplate } from './cross-validator.js';
import { validateTemplateDefinition } from '../../core/schemas.js';
import type { Template } from '../../models/template.js';

function template(parts: Record<string, unknown>): Template {
  return validateTemplateDefinition({
    metadata: {
      name: 'Checked',
      description: 'Template under test',
      version: '1.0.0',
      category: 'library',
      author: 'tester'
    },
    variables: [
      { name: 'project_name', type: 'string', description: 'Project name' },
      { name: 'use_git', type: 'boolean', description: 'Use git', default: true }
    ],
    structure: { root_directory: { name: '{{ project_name }}' } },
    ...parts
  });
}

describe('CrossValidator', () => {
  const validator = new CrossValidator();

  it('should accept a consistent template', () => {
    const checked = template({
      structure: {
        root_directory: {
          name: '{{ project_name }}',
          files: [
            { name: 'README.md', content: '# {{ project_name | title }} ({{ current_year }})' },
            { name: '.gitignore', content: 'node_modules', condition: 'use_git' },
            { name: 'index.ts', template_file: 'index.ts.tpl' }
          ],
          directories: [{ name: 'src', condition: "project_name != ''" }]
        }
      },
      template_files: { files: [{ name: 'index.ts.tpl', content: 'export const name = "{{ project_name }}";' }] },
      hooks: { post_generate: [{ name: 'init', type: 'git', command: 'git init', condition: 'use_git' }] }
    });

    expect(validator.validate(checked)).toEqual([]);
  });

  it('should report duplicate variable names', () => {
    const checked = template({
      variables: [
        { name: 'project_name', type: 'string', description: 'Project name' },
        { name: 'project_name', type: 'string', description: 'Again' }
      ]
    });

    expect(validator.validate(checked)).toEqual(['Duplicate variable names: project_name']);
  });

  it('should report names that only differ in placeholder whitespace', () => {
    const checked = template({
      structure: {
        root_directory: {
          name: 'root',
          files: [
            { name: '{{project_name}}.md', content: '' },
            { name: '{{ project_name }}.md', content: '' }
          ],
          directories: [{ name: 'docs' }, { name: 'docs' }]
        }
      }
    });

    expect(validator.validateStructure(checked)).toEqual([
      "Duplicate file names in directory 'root': {{project_name}}.md, {{ project_name }}.md",
      "Duplicate directory names in directory 'root': docs, docs"
    ]);
  });

  it('should report file and directory name conflicts', () => {
    const checked = template({
      structure: {
        root_directory: {
          name: 'root',
          files: [{ name: 'build', content: '' }],
          directories: [{ name: 'build' }]
        }
      }
    });

    expect(validator.validateStructure(checked)).toEqual([
      "Name conflicts between files and directories in 'root': build, build"
    ]);
  });

  it('should report undefined variables in names and content', () => {
    const checked = template({
      structure: {
        root_directory: {
          name: '{{ project_name }}',
          files: [{ name: '{{ module }}.ts', content: 'by {{ author }}' }],
          directories: [{ name: '{{ package }}' }]
        }
      },
      template_files: { files: [{ name: 'x.txt.tpl', content: '{{ version }}' }] }
    });

    expect(validator.validate(checked)).toEqual([
      "Undefined variable 'module' used in file name: {{ module }}.ts",
      "Undefined variable 'author' used in file content: {{ module }}.ts",
      "Undefined variable 'package' used in directory name: {{ package }}",
      "Undefined variable 'version' used in template file 'x.txt.tpl'"
    ]);
  });

  it('should not scan content meant for other template engines', () => {
    const checked = template({
      structure: {
        root_directory: {
          name: 'root',
          files: [
            { name: 'App.vue', content: '<p>{{ message }}</p>' },
            { name: 'ci.yml', content: 'sha: ${{ github.sha }}' },
            { name: 'raw.txt', content: '{% raw %}{{ literal }}{% endraw %}' }
          ]
        }
      }
    });

    expect(validator.validate(checked)).toEqual([]);
  });

  it('should report malformed template syntax', () => {
    const checked = template({
      structure: { root_directory: { name: 'root', files: [{ name: 'a.txt', content: '{% if use_git %}x' }] } }
    });

    expect(validator.validate(checked)).toEqual([
      "Invalid template syntax in file content: a.txt: Missing '{% endif %}'"
    ]);
  });

  it('should report invalid conditions and unknown condition variables', () => {
    const checked = template({
      structure: {
        root_directory: {
          name: 'root',
          files: [{ name: 'a.txt', content: '', condition: 'use_git and' }],
          directories: [{ name: 'b', condition: 'use_docker' }]
        }
      },
      hooks: { pre_generate: [{ name: 'check', type: 'command', command: 'node -v', condition: '{{ has_node }}' }] }
    });

    expect(validator.validate(checked)).toEqual([
      "Invalid condition on file 'a.txt': Unexpected end of expression",
      "Undefined variable 'use_docker' used in condition on directory 'b'",
      "Undefined variable 'has_node' used in condition on action 'check'"
    ]);
  });

  it('should report templated conditions that cannot be rendered as written', () => {
    const checked = template({
      structure: {
        root_directory: {
          name: 'root',
          files: [
            { name: 'a.txt', content: '', condition: '{{ use_git | default(true) }}' },
            { name: 'b.txt', content: '', condition: '{{ use_git | default(maybe) }}' },
            { name: 'c.txt', content: '', condition: '{{ use_git | reverse }}' }
          ]
        }
      }
    });

    expect(validator.validate(checked)).toEqual([
      "Invalid placeholder in condition on file 'b.txt': {{ use_git | default(maybe) }}",
      "Invalid template syntax in condition on file 'c.txt': Unknown filter 'reverse'"
    ]);
  });

  it('should report show_if on undeclared variables', () => {
    const checked = template({
      variables: [{
        name: 'db_name',
        type: 'string',
        description: 'Database',
        show_if: [{ variable: 'use_db', operator: '==', value: true }]
      }],
      structure: { root_directory: { name: 'root' } }
    });

    expect(validator.validate(checked)).toEqual(["Variable 'db_name' has a condition on undeclared variable 'use_db'"]);
  });

  it('should report missing and duplicate template files', () => {
    const checked = template({
      structure: { root_directory: { name: 'root', files: [{ name: 'main.ts', template_file: 'main.ts.tpl' }] } },
      template_files: {
        files: [
          { name: 'other.tpl', content: '' },
          { name: 'other.tpl', content: '' }
        ]
      }
    });

    expect(validator.validate(checked)).toEqual([
      "Template file 'main.ts.tpl' not found (referenced by main.ts)",
      'Duplicate template file names: other.tpl'
    ]);
    expect(validator.validate(checked, { externalTemplateFiles: new Set(['main.ts.tpl']) })).toEqual([
      'Duplicate template file names: other.tpl'
    ]);
  });

  it('should report duplicate action names', () => {
    const action = { name: 'install', type: 'command', command: 'npm install' };
    const checked = template({
      hooks: { pre_generate: [action], post_generate: [action] },
      action_groups: [{ name: 'setup', actions: [action, action] }]
    });

    expect(validator.validate(checked)).toEqual([
      'Duplicate action names across hooks: install',
      "Duplicate action names in group 'setup': install"
    ]);
  });

  it('should flag very large structures', () => {
    const files = Array.from({ length: 1001 }, (_, index) => ({ name: `f${index}.txt`, content: '' }));
    const checked = template({ structure: { root_directory: { name: 'root', files } } });

    expect(validator.validateStructure(checked)).toEqual(['Template structure is very large (1001 files, depth 1)']);
  });
});

describe('findUnusedVariables', () => {
  const validator = new CrossValidator();

  it('should list variables referenced nowhere', () => {
    const checked = template({
      variables: [
        { name: 'project_name', type: 'string', description: 'Project name' },
        { name: 'use_git', type: 'boolean', description: 'Use git', default: true },
        { name: 'license_holder', type: 'string', description: 'License holder', required: false }
      ]
    });

    expect(validator.findUnusedVariables(checked)).toEqual(['use_git', 'license_holder']);
  });

  it('should count conditions, template files, visibility rules and actions as uses', () => {
    const checked = template({
      variables: [
        { name: 'project_name', type: 'string', description: 'Project name' },
        { name: 'use_git', type: 'boolean', description: 'Use git', default: true },
        { name: 'module', type: 'string', description: 'Module', default: 'core' },
        { name: 'remote', type: 'url', description: 'Remote', show_if: [{ variable: 'use_git', operator: '==', value: true }] },
        { name: 'branch', type: 'string', description: 'Branch', default: 'main' },
        { name: 'hidden_from_files', type: 'string', description: 'Declared by the template file', required: false }
      ],
      template_files: {
        files: [{ name: 'mod.py.tpl', content: 'import {{ module }}', variables_used: ['hidden_from_files'] }]
      },
      hooks: {
        post_generate: [
          { name: 'remote', type: 'git', command: 'git remote add origin {{ remote }}', working_directory: '{{ branch }}' }
        ]
      }
    });

    expect(validator.findUnusedVariables(checked)).toEqual([]);
  });

  it('should ignore conditions that do not parse', () => {
    const checked = template({
      structure: { root_directory: { name: '{{ project_name }}', directories: [{ name: 'x', condition: 'use_git and' }] } }
    });

    expect(validator.findUnusedVariables(checked)).toEqual(['use_git']);
  });
});

describe('helpers', () => {
  it('should normalize placeholder whitespace only', () => {
    expect(normalizeItemName('{{ a | upper }} b.txt')).toBe('{{a|upper}} b.txt');
  });

  it('should detect foreign templates through the template suffix', () => {
    expect(isForeignTemplate('index.html.tpl', '.tpl')).toBe(true);
    expect(isForeignTemplate('index.ts', '.tpl')).toBe(false);
  });
});
