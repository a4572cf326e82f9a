// String template rendering
//
// Supports `{{ name | filter }}` placeholders, `{% if %}` / `{% elif %}` /
// `{% else %}` / `{% endif %}` blocks and `{% raw %}` sections. Placeholders whose
// body is not a name followed by filters, and `${{ ... }}` expressions, are kept
// verbatim so templates can carry text meant for other tools.

import {
  collectVariables,
  evaluateNode,
  isTruthy,
  lookupPath,
  parseExpression,
  type ExpressionNode
} from '../../core/expression.js';
import { ConditionSyntaxError, TemplateSyntaxError, UndefinedVariableError } from '../../core/errors.js';
import { FILTERS, isFilterName } from './filters.js';

type Values = Readonly<Record<string, unknown>>;

export interface RenderStringOptions {
  /** Throw UndefinedVariableError for unknown placeholder names (default true) */
  strict?: boolean;
}

// ---------------------------------------------------------------------------
// Scanning
// ---------------------------------------------------------------------------

type Segment =
  | { kind: 'text'; value: string }
  | { kind: 'output'; body: string; raw: string; position: number }
  | { kind: 'tag'; body: string; position: number };

const OPEN_PATTERN = /\{\{|\{%/g;
const ENDRAW_PATTERN = /\{%\s*endraw\s*%\}/g;

/**
 * Splits text into literal text, placeholders and tags.
 * In lenient mode unterminated tags are kept as text instead of throwing.
 */
function scan(text: string, lenient: boolean): Segment[] {
  const segments: Segment[] = [];
  const open = new RegExp(OPEN_PATTERN);
  let cursor = 0;

  while (cursor < text.length) {
    open.lastIndex = cursor;
    const match = open.exec(text);
    if (!match) {
      segments.push({ kind: 'text', value: text.slice(cursor) });
      break;
    }

    const start = match.index;
    if (start > cursor) {
      segments.push({ kind: 'text', value: text.slice(cursor, start) });
    }

    if (match[0] === '{{') {
      const end = text.indexOf('}}', start + 2);
      if (end === -1) {
        segments.push({ kind: 'text', value: text.slice(start) });
        break;
      }
      const raw = text.slice(start, end + 2);
      cursor = end + 2;
      if (start > 0 && text[start - 1] === '$') {
        segments.push({ kind: 'text', value: raw });
      } else {
        segments.push({ kind: 'output', body: text.slice(start + 2, end), raw, position: start });
      }
      continue;
    }

    const end = text.indexOf('%}', start + 2);
    if (end === -1) {
      if (lenient) {
        segments.push({ kind: 'text', value: text.slice(start) });
        break;
      }
      throw new TemplateSyntaxError("Unclosed tag: missing '%}'", start);
    }
    const body = text.slice(start + 2, end).trim();
    cursor = end + 2;

    if (body === 'raw') {
      const endraw = new RegExp(ENDRAW_PATTERN);
      endraw.lastIndex = cursor;
      const closing = endraw.exec(text);
      if (!closing) {
        if (lenient) {
          segments.push({ kind: 'text', value: text.slice(cursor) });
          break;
        }
        throw new TemplateSyntaxError("Missing '{% endraw %}'", start);
      }
      segments.push({ kind: 'text', value: text.slice(cursor, closing.index) });
      cursor = closing.index + closing[0].length;
      continue;
    }

    segments.push({ kind: 'tag', body, position: start });
  }

  return segments;
}

// ---------------------------------------------------------------------------
// Placeholders
// ---------------------------------------------------------------------------

/** Literal argument of a filter call: a quoted string, a number, true, false or none */
type FilterArg = string | number | boolean | null;

interface FilterCall {
  name: string;
  args: FilterArg[];
}

interface Placeholder {
  path: string[];
  filters: FilterCall[];
}

const NAME = /[A-Za-z_][A-Za-z0-9_]*/y;
const PATH_PATTERN = /^\s*([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)\s*/;

/**
 * Index of the `)` closing the argument list opened at `open`, skipping quoted text, or -1
 */
function closingParen(body: string, open: number): number {
  let quote: string | null = null;
  for (let index = open + 1; index < body.length; index++) {
    const char = body[index];
    if (quote) {
      if (char === '\\') {
        index++;
      } else if (char === quote) {
        quote = null;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === ')') {
      return index;
    }
  }
  return -1;
}

/**
 * Parses comma-separated literals with the condition tokenizer, or null when
 * an argument is not a literal
 */
function parseFilterArgs(text: string): FilterArg[] | null {
  if (text.trim().length === 0) {
    return [];
  }
  let node: ExpressionNode;
  try {
    node = parseExpression(`[${text}]`);
  } catch (error) {
    if (error instanceof ConditionSyntaxError) {
      return null;
    }
    throw error;
  }
  if (node.kind !== 'list') {
    return null;
  }
  const args: FilterArg[] = [];
  for (const item of node.items) {
    if (item.kind !== 'literal') {
      return null;
    }
    args.push(item.value);
  }
  return args;
}

/**
 * Reads `name.path | filter | filter("arg", 2, true)`, or null when the body has another shape
 */
function parsePlaceholder(body: string): Placeholder | null {
  const head = PATH_PATTERN.exec(body);
  if (!head) {
    return null;
  }

  const filters: FilterCall[] = [];
  let index = head[0].length;
  const skipSpace = () => {
    while (index < body.length && /\s/.test(body[index])) {
      index++;
    }
  };

  while (index < body.length) {
    if (body[index] !== '|') {
      return null;
    }
    index++;
    skipSpace();

    const name = new RegExp(NAME);
    name.lastIndex = index;
    const nameMatch = name.exec(body);
    if (!nameMatch) {
      return null;
    }
    index += nameMatch[0].length;
    skipSpace();

    let args: FilterArg[] = [];
    if (body[index] === '(') {
      const close = closingParen(body, index);
      if (close === -1) {
        return null;
      }
      const parsed = parseFilterArgs(body.slice(index + 1, close));
      if (!parsed) {
        return null;
      }
      args = parsed;
      index = close + 1;
      skipSpace();
    }

    filters.push({ name: nameMatch[0], args });
  }

  return { path: head[1].split('.'), filters };
}

/**
 * Text form of a rendered value
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (Array.isArray(value)) {
    return value.map(formatValue).join(', ');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

function expectArgs(call: FilterCall, count: number, position: number): void {
  if (call.args.length !== count) {
    throw new TemplateSyntaxError(`Filter '${call.name}' takes ${count} argument(s), got ${call.args.length}`, position);
  }
}

function applyFilter(value: unknown, call: FilterCall, position: number): unknown {
  switch (call.name) {
    case 'default':
      expectArgs(call, 1, position);
      return isBlank(value) ? call.args[0] : value;
    case 'replace': {
      expectArgs(call, 2, position);
      const [search, replacement] = call.args.map(formatValue);
      return formatValue(value).split(search).join(replacement);
    }
    default:
      if (!isFilterName(call.name)) {
        throw new TemplateSyntaxError(`Unknown filter '${call.name}'`, position);
      }
      expectArgs(call, 0, position);
      return FILTERS[call.name](formatValue(value));
  }
}

// ---------------------------------------------------------------------------
// Block structure
// ---------------------------------------------------------------------------

type TemplateNode =
  | { kind: 'text'; value: string }
  | { kind: 'output'; placeholder: Placeholder; position: number }
  | IfNode;

interface IfBranch {
  condition: ExpressionNode;
  body: TemplateNode[];
}

interface IfNode {
  kind: 'if';
  branches: IfBranch[];
  otherwise: TemplateNode[] | null;
}

interface IfFrame {
  node: IfNode;
  position: number;
  body: TemplateNode[];
}

function parseTagExpression(source: string, tag: string, position: number): ExpressionNode {
  try {
    return parseExpression(source);
  } catch (error) {
    if (error instanceof ConditionSyntaxError) {
      throw new TemplateSyntaxError(`Invalid expression in '{% ${tag} %}': ${error.message}`, position);
    }
    throw error;
  }
}

/**
 * Builds the node tree, validating tag nesting
 */
function parseTemplate(text: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const frames: IfFrame[] = [];
  const current = () => frames.length > 0 ? frames[frames.length - 1].body : root;

  for (const segment of scan(text, false)) {
    if (segment.kind === 'text') {
      current().push({ kind: 'text', value: segment.value });
      continue;
    }
    if (segment.kind === 'output') {
      const placeholder = parsePlaceholder(segment.body);
      current().push(placeholder
        ? { kind: 'output', placeholder, position: segment.position }
        : { kind: 'text', value: segment.raw });
      continue;
    }

    const [keyword = ''] = segment.body.split(/\s+/, 1);
    const rest = segment.body.slice(keyword.length).trim();
    const frame = frames.length > 0 ? frames[frames.length - 1] : undefined;

    switch (keyword) {
      case 'if': {
        if (!rest) {
          throw new TemplateSyntaxError("'{% if %}' needs a condition", segment.position);
        }
        const body: TemplateNode[] = [];
        const node: IfNode = {
          kind: 'if',
          branches: [{ condition: parseTagExpression(rest, 'if', segment.position), body }],
          otherwise: null
        };
        current().push(node);
        frames.push({ node, position: segment.position, body });
        break;
      }
      case 'elif': {
        if (!frame) {
          throw new TemplateSyntaxError("'{% elif %}' outside of '{% if %}'", segment.position);
        }
        if (frame.node.otherwise) {
          throw new TemplateSyntaxError("'{% elif %}' after '{% else %}'", segment.position);
        }
        if (!rest) {
          throw new TemplateSyntaxError("'{% elif %}' needs a condition", segment.position);
        }
        const body: TemplateNode[] = [];
        frame.node.branches.push({ condition: parseTagExpression(rest, 'elif', segment.position), body });
        frame.body = body;
        break;
      }
      case 'else': {
        if (!frame) {
          throw new TemplateSyntaxError("'{% else %}' outside of '{% if %}'", segment.position);
        }
        if (frame.node.otherwise) {
          throw new TemplateSyntaxError("Duplicate '{% else %}'", segment.position);
        }
        const body: TemplateNode[] = [];
        frame.node.otherwise = body;
        frame.body = body;
        break;
      }
      case 'endif':
        if (!frame) {
          throw new TemplateSyntaxError("'{% endif %}' without '{% if %}'", segment.position);
        }
        frames.pop();
        break;
      default:
        throw new TemplateSyntaxError(`Unknown tag '${keyword}'`, segment.position);
    }
  }

  if (frames.length > 0) {
    throw new TemplateSyntaxError("Missing '{% endif %}'", frames[frames.length - 1].position);
  }
  return root;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function renderNodes(nodes: readonly TemplateNode[], values: Values, strict: boolean): string {
  let output = '';
  for (const node of nodes) {
    switch (node.kind) {
      case 'text':
        output += node.value;
        break;
      case 'output':
        output += renderPlaceholder(node.placeholder, node.position, values, strict);
        break;
      case 'if': {
        const branch = node.branches.find(candidate => isTruthy(evaluateNode(candidate.condition, values)));
        const body = branch ? branch.body : node.otherwise;
        if (body) {
          output += renderNodes(body, values, strict);
        }
        break;
      }
    }
  }
  return output;
}

function renderPlaceholder(placeholder: Placeholder, position: number, values: Values, strict: boolean): string {
  const value = lookupPath(values, placeholder.path);
  const hasDefault = placeholder.filters.some(call => call.name === 'default');
  if (value === undefined && strict && !hasDefault) {
    throw new UndefinedVariableError(placeholder.path.join('.'));
  }
  const filtered = placeholder.filters.reduce<unknown>((current, call) => applyFilter(current, call, position), value);
  return formatValue(filtered);
}

/**
 * Renders template text against resolved values
 */
export function renderString(text: string, values: Values, options: RenderStringOptions = {}): string {
  if (!text.includes('{{') && !text.includes('{%')) {
    return text;
  }
  return renderNodes(parseTemplate(text), values, options.strict ?? true);
}

/**
 * Checks tag structure and filter names without rendering, throwing TemplateSyntaxError
 */
export function checkTemplateSyntax(text: string): void {
  const visit = (nodes: readonly TemplateNode[]): void => {
    for (const node of nodes) {
      if (node.kind === 'output') {
        for (const call of node.placeholder.filters) {
          applyFilter('', call, node.position);
        }
      } else if (node.kind === 'if') {
        node.branches.forEach(branch => visit(branch.body));
        if (node.otherwise) {
          visit(node.otherwise);
        }
      }
    }
  };
  visit(parseTemplate(text));
}

/**
 * Root variable names referenced by placeholders and if/elif conditions, in order of appearance.
 * Raw sections are ignored and malformed pieces are skipped.
 */
export function extractVariableNames(text: string): string[] {
  const names = new Set<string>();
  for (const segment of scan(text, true)) {
    if (segment.kind === 'output') {
      const placeholder = parsePlaceholder(segment.body);
      if (placeholder) {
        names.add(placeholder.path[0]);
      }
    } else if (segment.kind === 'tag') {
      const match = /^(if|elif)\s+([\s\S]+)$/.exec(segment.body);
      if (match) {
        for (const name of expressionVariables(match[2])) {
          names.add(name);
        }
      }
    }
  }
  return [...names];
}

/**
 * Raw text of `{{ }}` placeholders that are not a name followed by filters
 */
export function unparsedPlaceholders(text: string): string[] {
  const unparsed: string[] = [];
  for (const segment of scan(text, true)) {
    if (segment.kind === 'output' && parsePlaceholder(segment.body) === null) {
      unparsed.push(segment.raw);
    }
  }
  return unparsed;
}

function expressionVariables(source: string): string[] {
  try {
    return collectVariables(parseExpression(source));
  } catch (error) {
    if (error instanceof ConditionSyntaxError) {
      // rendering reports the syntax error; extraction only lists names
      return [];
    }
    throw error;
  }
}
