// Tests for the string renderer

import { describe, it, expect } from 'vitest';
import {
  renderString,
  extractVariableNames,
  formatValue,
  checkTemplateSyntax,
  unparsedPlaceholders
} from './string-renderer.js';
import { TemplateSyntaxError, UndefinedVariableError } from '../../core/errors.js';

describe('renderString', () => {
  const values = {
    project_name: 'My App',
    use_git: true,
    license: 'MIT',
    features: ['auth', 'docs'],
    port: 8080,
    author: null,
    settings: { db: 'postgres' }
  };

  describe('placeholders', () => {
    it('should substitute values with or without spaces', () => {
      expect(renderString('# {{project_name}} ({{ license }})', values)).toBe('# My App (MIT)');
    });

    it('should apply filter chains', () => {
      expect(renderString('{{ project_name | snake_case | upper }}', values)).toBe('MY_APP');
    });

    it('should apply filters with arguments', () => {
      expect(renderString('{{ project_name | replace(" ", "_") }}', values)).toBe('My_App');
      expect(renderString("{{ author | default('anonymous') }}", values)).toBe('anonymous');
      expect(renderString("{{ missing | default('none') }}", values)).toBe('none');
    });

    it('should accept unquoted literal arguments', () => {
      expect(renderString('{{ init_git | default(true) }}', { init_git: false })).toBe('false');
      expect(renderString('{{ init_git | default(true) }}', {})).toBe('true');
      expect(renderString('{{ workers | default(4) }}', {})).toBe('4');
      expect(renderString('[{{ author | default(none) }}]', values)).toBe('[]');
      expect(renderString("{{ license | replace('MIT', 2) }}", values)).toBe('2');
    });

    it('should keep placeholders whose arguments are not literals verbatim', () => {
      expect(renderString('{{ author | default(license) }}', values)).toBe('{{ author | default(license) }}');
      expect(renderString('{{ author | default(1 + 2) }}', values)).toBe('{{ author | default(1 + 2) }}');
    });

    it('should read dotted members', () => {
      expect(renderString('db={{ settings.db }}', values)).toBe('db=postgres');
    });

    it('should format values', () => {
      expect(renderString('{{ use_git }} {{ port }} {{ features }} [{{ author }}]', values))
        .toBe('true 8080 auth, docs []');
      expect(renderString('{{ settings }}', values)).toBe('{"db":"postgres"}');
    });

    it('should throw for unknown names in strict mode', () => {
      expect(() => renderString('{{ missing }}', values)).toThrow(UndefinedVariableError);
      expect(() => renderString('{{ settings.port }}', values)).toThrow("Undefined variable 'settings.port'");
    });

    it('should render unknown names as empty when not strict', () => {
      expect(renderString('a{{ missing }}b', values, { strict: false })).toBe('ab');
    });

    it('should keep foreign placeholders verbatim', () => {
      expect(renderString('run: ${{ github.sha }}', values)).toBe('run: ${{ github.sha }}');
      expect(renderString('{{ a + b }} and {{ }}', values)).toBe('{{ a + b }} and {{ }}');
      expect(renderString('open {{ brace', values)).toBe('open {{ brace');
    });

    it('should reject unknown filters and bad argument counts', () => {
      expect(() => renderString('{{ license | reverse }}', values)).toThrow("Unknown filter 'reverse'");
      expect(() => renderString('{{ license | replace("a") }}', values)).toThrow(TemplateSyntaxError);
    });
  });

  describe('blocks', () => {
    it('should render if/elif/else branches', () => {
      const text = "{% if license == 'GPL-3.0' %}gpl{% elif license == 'MIT' %}mit{% else %}other{% endif %}";
      expect(renderString(text, values)).toBe('mit');
      expect(renderString(text, { license: 'Unlicense' })).toBe('other');
    });

    it('should support nesting', () => {
      const text = '{% if use_git %}git{% if port > 9000 %} high{% else %} low{% endif %}{% endif %}';
      expect(renderString(text, values)).toBe('git low');
    });

    it('should treat unknown names in conditions as false', () => {
      expect(renderString('{% if include_tests %}tests{% endif %}done', values)).toBe('done');
    });

    it('should output raw sections verbatim', () => {
      const text = '{% raw %}{{ not_rendered }}{% if x %}{% endraw %}!';
      expect(renderString(text, values)).toBe('{{ not_rendered }}{% if x %}!');
    });

    it('should reject malformed tags', () => {
      expect(() => renderString('{% if use_git %}x', values)).toThrow("Missing '{% endif %}'");
      expect(() => renderString('{% else %}', values)).toThrow("'{% else %}' outside of '{% if %}'");
      expect(() => renderString('{% elif a %}', values)).toThrow("'{% elif %}' outside of '{% if %}'");
      expect(() => renderString('{% for x in y %}{% endfor %}', values)).toThrow("Unknown tag 'for'");
      expect(() => renderString('{% if a', values)).toThrow("Unclosed tag: missing '%}'");
      expect(() => renderString('{% if a == %}{% endif %}', values)).toThrow(TemplateSyntaxError);
      expect(() => renderString('{% raw %}x', values)).toThrow("Missing '{% endraw %}'");
    });
  });

  it('should return text without markup unchanged', () => {
    expect(renderString('plain { text }', {})).toBe('plain { text }');
  });
});

describe('checkTemplateSyntax', () => {
  it('should accept valid text and reject unknown filters', () => {
    expect(() => checkTemplateSyntax('{{ a | lower }}{% if b %}{% endif %}')).not.toThrow();
    expect(() => checkTemplateSyntax('{% if b %}{{ a | nope }}{% endif %}')).toThrow("Unknown filter 'nope'");
  });
});

describe('extractVariableNames', () => {
  it('should list placeholder and condition names once, in order', () => {
    const text = '{{ name | upper }} {% if use_git and license %}{{ name }}{% elif db.engine %}{% endif %}';
    expect(extractVariableNames(text)).toEqual(['name', 'use_git', 'license', 'db']);
  });

  it('should skip raw sections and foreign expressions', () => {
    const text = '{% raw %}{{ hidden }}{% endraw %}${{ env.TOKEN }}{{ shown }}';
    expect(extractVariableNames(text)).toEqual(['shown']);
  });

  it('should not throw on malformed text', () => {
    expect(extractVariableNames('{% if a == %}{{ b }}{% if')).toEqual(['b']);
  });
});

describe('unparsedPlaceholders', () => {
  it('should list placeholders that are not a name followed by filters', () => {
    expect(unparsedPlaceholders('{{ ok | default(true) }} {{ a | default(b) }} ${{ env.X }}')).toEqual([
      '{{ a | default(b) }}'
    ]);
  });
});

describe('formatValue', () => {
  it('should render nested lists flat', () => {
    expect(formatValue([1, [true, null]])).toBe('1, true, ');
  });
});
