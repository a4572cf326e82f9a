// Boolean expression language for string conditions
//
// Grammar (lowest precedence first):
//   or         := and (('or' | '||') and)*
//   and        := not (('and' | '&&') not)*
//   not        := ('not' | '!') not | comparison
//   comparison := primary (('==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in') primary)?
//   primary    := number | string | true | false | none | null | name ('.' name)*
//               | '(' or ')' | '[' (or (',' or)*)? ']'
//
// Evaluation only reads values from the scope. Nothing in here calls host code.

import type { LogicOperator } from '../models/types.js';
import { ConditionSyntaxError } from './errors.js';
import { hasOwn, isRecord } from './validation.js';

export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in';

export type ExpressionNode =
  | { readonly kind: 'literal'; readonly value: string | number | boolean | null }
  | { readonly kind: 'variable'; readonly path: readonly string[] }
  | { readonly kind: 'list'; readonly items: readonly ExpressionNode[] }
  | { readonly kind: 'not'; readonly operand: ExpressionNode }
  | { readonly kind: 'logical'; readonly operator: 'and' | 'or'; readonly left: ExpressionNode; readonly right: ExpressionNode }
  | { readonly kind: 'compare'; readonly operator: CompareOperator; readonly left: ExpressionNode; readonly right: ExpressionNode };

type TokenKind = 'number' | 'string' | 'name' | 'operator' | 'punctuation';

interface Token {
  kind: TokenKind;
  value: string;
  position: number;
}

const OPERATOR_TOKENS = ['==', '!=', '<=', '>=', '&&', '||', '<', '>', '!'];
const PUNCTUATION = new Set(['(', ')', '[', ']', ',', '.']);
const KEYWORDS = new Set(['and', 'or', 'not', 'in']);
const SYMBOL_COMPARISONS = new Map<string, CompareOperator>([
  ['==', '=='],
  ['!=', '!='],
  ['<', '<'],
  ['<=', '<='],
  ['>', '>'],
  ['>=', '>=']
]);
const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r' };

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source[index];

    if (/\s/.test(char)) {
      index++;
      continue;
    }

    const number = /^-?\d+(?:\.\d+)?/.exec(source.slice(index));
    if (number && (char !== '-' || /\d/.test(source[index + 1] ?? ''))) {
      tokens.push({ kind: 'number', value: number[0], position: index });
      index += number[0].length;
      continue;
    }

    if (char === '"' || char === "'") {
      let value = '';
      let cursor = index + 1;
      while (cursor < source.length && source[cursor] !== char) {
        if (source[cursor] === '\\' && cursor + 1 < source.length) {
          const escaped = source[cursor + 1];
          value += ESCAPES[escaped] ?? escaped;
          cursor += 2;
        } else {
          value += source[cursor];
          cursor++;
        }
      }
      if (cursor >= source.length) {
        throw new ConditionSyntaxError(`Unterminated string starting at position ${index}`, source, index);
      }
      tokens.push({ kind: 'string', value, position: index });
      index = cursor + 1;
      continue;
    }

    const name = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(index));
    if (name) {
      tokens.push({ kind: 'name', value: name[0], position: index });
      index += name[0].length;
      continue;
    }

    const operator = OPERATOR_TOKENS.find(candidate => source.startsWith(candidate, index));
    if (operator) {
      tokens.push({ kind: 'operator', value: operator, position: index });
      index += operator.length;
      continue;
    }

    if (PUNCTUATION.has(char)) {
      tokens.push({ kind: 'punctuation', value: char, position: index });
      index++;
      continue;
    }

    throw new ConditionSyntaxError(`Unexpected character '${char}' at position ${index}`, source, index);
  }

  return tokens;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[], private readonly source: string) {}

  parse(): ExpressionNode {
    if (this.tokens.length === 0) {
      throw new ConditionSyntaxError('Empty expression', this.source, 0);
    }
    const node = this.parseOr();
    const extra = this.peek();
    if (extra) {
      throw this.error(`Unexpected '${extra.value}' at position ${extra.position}`, extra);
    }
    return node;
  }

  private peek(offset = 0): Token | undefined {
    return this.tokens[this.index + offset];
  }

  private matchWord(word: string): boolean {
    const token = this.peek();
    if (token?.kind === 'name' && token.value === word) {
      this.index++;
      return true;
    }
    return false;
  }

  private matchSymbol(kind: TokenKind, value: string): boolean {
    const token = this.peek();
    if (token?.kind === kind && token.value === value) {
      this.index++;
      return true;
    }
    return false;
  }

  private expectSymbol(value: string): void {
    if (!this.matchSymbol('punctuation', value)) {
      const token = this.peek();
      throw this.error(
        token ? `Expected '${value}' but found '${token.value}' at position ${token.position}` : `Expected '${value}' at end of expression`,
        token
      );
    }
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.matchWord('or') || this.matchSymbol('operator', '||')) {
      left = { kind: 'logical', operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseNot();
    while (this.matchWord('and') || this.matchSymbol('operator', '&&')) {
      left = { kind: 'logical', operator: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ExpressionNode {
    if (this.matchWord('not') || this.matchSymbol('operator', '!')) {
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExpressionNode {
    const left = this.parsePrimary();
    const operator = this.matchComparison();
    if (!operator) {
      return left;
    }
    return { kind: 'compare', operator, left, right: this.parsePrimary() };
  }

  private matchComparison(): CompareOperator | null {
    const token = this.peek();
    if (!token) {
      return null;
    }
    if (token.kind === 'operator') {
      const operator = SYMBOL_COMPARISONS.get(token.value);
      if (operator) {
        this.index++;
      }
      return operator ?? null;
    }
    if (this.matchWord('in')) {
      return 'in';
    }
    const next = this.peek(1);
    if (token.kind === 'name' && token.value === 'not' && next?.kind === 'name' && next.value === 'in') {
      this.index += 2;
      return 'not in';
    }
    return null;
  }

  private parsePrimary(): ExpressionNode {
    const token = this.peek();
    if (!token) {
      throw this.error('Unexpected end of expression', undefined);
    }

    switch (token.kind) {
      case 'number':
        this.index++;
        return { kind: 'literal', value: Number(token.value) };
      case 'string':
        this.index++;
        return { kind: 'literal', value: token.value };
      case 'name':
        return this.parseName(token);
      case 'punctuation':
        if (this.matchSymbol('punctuation', '(')) {
          const inner = this.parseOr();
          this.expectSymbol(')');
          return inner;
        }
        if (this.matchSymbol('punctuation', '[')) {
          return this.parseList();
        }
        break;
      case 'operator':
        break;
    }
    throw this.error(`Unexpected '${token.value}' at position ${token.position}`, token);
  }

  private parseName(token: Token): ExpressionNode {
    const lowered = token.value.toLowerCase();
    if (lowered === 'true' || lowered === 'false') {
      this.index++;
      return { kind: 'literal', value: lowered === 'true' };
    }
    if (lowered === 'none' || lowered === 'null') {
      this.index++;
      return { kind: 'literal', value: null };
    }
    if (KEYWORDS.has(token.value)) {
      throw this.error(`Unexpected keyword '${token.value}' at position ${token.position}`, token);
    }

    this.index++;
    const path = [token.value];
    while (this.matchSymbol('punctuation', '.')) {
      const member = this.peek();
      if (member?.kind !== 'name') {
        throw this.error(`Expected a member name after '.' at position ${member?.position ?? this.source.length}`, member);
      }
      this.index++;
      path.push(member.value);
    }
    return { kind: 'variable', path };
  }

  private parseList(): ExpressionNode {
    const items: ExpressionNode[] = [];
    if (this.matchSymbol('punctuation', ']')) {
      return { kind: 'list', items };
    }
    do {
      items.push(this.parseOr());
    } while (this.matchSymbol('punctuation', ','));
    this.expectSymbol(']');
    return { kind: 'list', items };
  }

  private error(message: string, token: Token | undefined): ConditionSyntaxError {
    return new ConditionSyntaxError(message, this.source, token?.position ?? this.source.length);
  }
}

/**
 * Parses condition text into an expression tree, throwing ConditionSyntaxError
 */
export function parseExpression(source: string): ExpressionNode {
  return new Parser(tokenize(source), source).parse();
}

/**
 * Parses and evaluates condition text to a boolean
 */
export function evaluateCondition(source: string, scope: Readonly<Record<string, unknown>>): boolean {
  return isTruthy(evaluateNode(parseExpression(source), scope));
}

export function evaluateNode(node: ExpressionNode, scope: Readonly<Record<string, unknown>>): unknown {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'variable':
      return lookupPath(scope, node.path);
    case 'list':
      return node.items.map(item => evaluateNode(item, scope));
    case 'not':
      return !isTruthy(evaluateNode(node.operand, scope));
    case 'logical': {
      const left = isTruthy(evaluateNode(node.left, scope));
      if (node.operator === 'and') {
        return left && isTruthy(evaluateNode(node.right, scope));
      }
      return left || isTruthy(evaluateNode(node.right, scope));
    }
    case 'compare':
      return compare(node.operator, evaluateNode(node.left, scope), evaluateNode(node.right, scope));
  }
}

function compare(operator: CompareOperator, left: unknown, right: unknown): boolean {
  switch (operator) {
    case '==':
      return valuesEqual(left, right);
    case '!=':
      return !valuesEqual(left, right);
    case 'in':
      return containsValue(right, left) === true;
    case 'not in':
      return containsValue(right, left) === false;
    default:
      return orderingHolds(operator, compareOrdered(left, right));
  }
}

function orderingHolds(operator: '<' | '<=' | '>' | '>=', order: number | null): boolean {
  if (order === null) {
    return false;
  }
  switch (operator) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
  }
}

/**
 * Reads a dotted path from the scope. Only own properties of plain objects are visible.
 */
export function lookupPath(scope: Readonly<Record<string, unknown>>, path: readonly string[]): unknown {
  let current: unknown = scope;
  for (const key of path) {
    if (!isRecord(current) || !hasOwn(current, key)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Root variable names an expression reads
 */
export function collectVariables(node: ExpressionNode): string[] {
  switch (node.kind) {
    case 'literal':
      return [];
    case 'variable':
      return [node.path[0]];
    case 'list':
      return node.items.flatMap(collectVariables);
    case 'not':
      return collectVariables(node.operand);
    case 'logical':
    case 'compare':
      return [...collectVariables(node.left), ...collectVariables(node.right)];
  }
}

/**
 * Empty strings, lists and objects, zero, null and undefined are false
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0 && !Number.isNaN(value);
  }
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length > 0;
  }
  if (isRecord(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
}

/**
 * Structural equality over primitives, arrays and plain objects
 */
export function valuesEqual(left: unknown, right: unknown): boolean {
  if (left === right) {
    return true;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((item, index) => valuesEqual(item, right[index]));
  }
  if (isRecord(left) && isRecord(right)) {
    const keys = Object.keys(left);
    return keys.length === Object.keys(right).length &&
      keys.every(key => hasOwn(right, key) && valuesEqual(left[key], right[key]));
  }
  return false;
}

/**
 * Sign of the ordering between two values, or null when they are not comparable
 */
export function compareOrdered(left: unknown, right: unknown): number | null {
  if (typeof left === 'number' && typeof right === 'number') {
    if (Number.isNaN(left) || Number.isNaN(right)) {
      return null;
    }
    return Math.sign(left - right);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    const shared = Math.min(left.length, right.length);
    for (let index = 0; index < shared; index++) {
      if (valuesEqual(left[index], right[index])) {
        continue;
      }
      return compareOrdered(left[index], right[index]);
    }
    return Math.sign(left.length - right.length);
  }
  return null;
}

/**
 * Membership test. Arrays hold elements, strings hold substrings, objects hold keys.
 * Returns null when the container cannot hold the item.
 */
export function containsValue(container: unknown, item: unknown): boolean | null {
  if (Array.isArray(container)) {
    return container.some(element => valuesEqual(element, item));
  }
  if (typeof container === 'string') {
    return typeof item === 'string' ? container.includes(item) : null;
  }
  if (isRecord(container)) {
    return typeof item === 'string' ? hasOwn(container, item) : null;
  }
  return null;
}

/**
 * Regex test anchored at the start of the text (not at the end)
 */
export function matchesAtStart(pattern: string, text: string): boolean {
  const regex = new RegExp(pattern, 'y');
  return regex.test(text);
}

/**
 * Applies a structured-condition operator. Mismatched types give false, never an exception.
 */
export function applyLogicOperator(operator: LogicOperator, value: unknown, operand: unknown): boolean {
  switch (operator) {
    case '==':
      return valuesEqual(value, operand);
    case '!=':
      return !valuesEqual(value, operand);
    case '<':
    case '<=':
    case '>':
    case '>=':
      return orderingHolds(operator, compareOrdered(value, operand));
    case 'in':
      return containsValue(operand, value) === true;
    case 'not_in':
      return containsValue(operand, value) === false;
    case 'contains':
      return containsValue(value, operand) === true;
    case 'not_contains':
      return containsValue(value, operand) === false;
    case 'startswith':
      return String(value).startsWith(String(operand));
    case 'endswith':
      return String(value).endsWith(String(operand));
    case 'is_empty':
      return !isTruthy(value);
    case 'is_not_empty':
      return isTruthy(value);
    case 'matches':
    case 'not_matches':
      return regexOperator(operator, String(operand), String(value));
  }
}

function regexOperator(operator: 'matches' | 'not_matches', pattern: string, text: string): boolean {
  let matched: boolean;
  try {
    matched = matchesAtStart(pattern, text);
  } catch {
    // invalid pattern: the condition does not hold either way
    return false;
  }
  return operator === 'matches' ? matched : !matched;
}
