// Domain-specific error types for the project scaffolder

import type { RenderStats } from '../models/render.js';

/**
 * Base error class for all scaffolder errors
 */
export abstract class ScaffoldError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid input
 */
export class ValidationError extends ScaffoldError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * A single field-level problem found while validating a definition
 */
export interface FieldIssue {
  path: string;
  message: string;
}

/**
 * Construction-time template definition errors. The template cannot be used.
 */
export class SchemaValidationError extends ScaffoldError {
  readonly code = 'SCHEMA_ERROR';
  readonly exitCode = 2;

  constructor(public readonly issues: readonly FieldIssue[], source?: string) {
    const header = source ? `Invalid template definition (${source})` : 'Invalid template definition';
    const lines = issues.map(issue => `  - ${issue.path || '<root>'}: ${issue.message}`);
    super([`${header}:`, ...lines].join('\n'), { source, issueCount: issues.length });
  }
}

/**
 * Security errors for path traversal, disallowed commands, etc.
 */
export class SecurityError extends ScaffoldError {
  readonly code = 'SECURITY_ERROR';
  readonly exitCode = 3;
}

/**
 * Not found errors
 */
export class NotFoundError extends ScaffoldError {
  readonly code = 'NOT_FOUND';
  readonly exitCode = 4;

  constructor(resourceType: string, id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * Template file could not be read or parsed
 */
export class TemplateLoadError extends ScaffoldError {
  readonly code = 'TEMPLATE_LOAD_ERROR';
  readonly exitCode = 2;

  constructor(
    message: string,
    public readonly path: string,
    public readonly line?: number,
    public readonly column?: number
  ) {
    super(message, { path, line, column });
  }
}

/**
 * Boolean condition text that does not parse
 */
export class ConditionSyntaxError extends ScaffoldError {
  readonly code = 'CONDITION_SYNTAX_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly expression: string, public readonly position?: number) {
    super(message, { expression, position });
  }
}

/**
 * Malformed `{% %}` tags or filters in template text
 */
export class TemplateSyntaxError extends ScaffoldError {
  readonly code = 'TEMPLATE_SYNTAX_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly position?: number) {
    super(message, { position });
  }
}

/**
 * Strict rendering hit a placeholder with no value
 */
export class UndefinedVariableError extends ScaffoldError {
  readonly code = 'UNDEFINED_VARIABLE';
  readonly exitCode = 2;

  constructor(public readonly variable: string) {
    super(`Undefined variable '${variable}'`, { variable });
  }
}

/**
 * One problem with one variable's value
 */
export interface VariableIssue {
  variable: string;
  message: string;
}

/**
 * Aggregates every problem found during one resolution pass
 */
export class VariableResolutionError extends ScaffoldError {
  readonly code = 'VARIABLE_RESOLUTION_ERROR';
  readonly exitCode = 2;

  constructor(public readonly issues: readonly VariableIssue[]) {
    const lines = issues.map(issue => `  - ${issue.message}`);
    super(['Variable resolution failed:', ...lines].join('\n'), {
      variables: issues.map(issue => issue.variable)
    });
  }
}

/**
 * Fatal to a rendering run
 */
export class RenderingError extends ScaffoldError {
  readonly code = 'RENDERING_ERROR';
  readonly exitCode = 5;

  constructor(
    message: string,
    public readonly errors: readonly string[] = [],
    public readonly stats?: RenderStats,
    options?: ErrorOptions
  ) {
    super(message, { errorCount: errors.length }, options);
  }
}

/**
 * A required hook action failed
 */
export class ActionError extends ScaffoldError {
  readonly code = 'ACTION_ERROR';
  readonly exitCode = 1;

  constructor(message: string, public readonly action: string, public readonly stage?: string, options?: ErrorOptions) {
    super(message, { action, stage }, options);
  }
}

/**
 * Cross-validation produced diagnostics and generation was not forced
 */
export class TemplateValidationError extends ScaffoldError {
  readonly code = 'TEMPLATE_VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(public readonly diagnostics: readonly string[]) {
    const lines = diagnostics.map(diagnostic => `  - ${diagnostic}`);
    super(['Template validation failed:', ...lines].join('\n'), { diagnosticCount: diagnostics.length });
  }
}

/**
 * Extracts a printable message from anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for filesystem errors reporting a missing path
 */
export function isNotFoundError(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT');
}

/**
 * True for system errors carrying the given code, such as ENOTEMPTY
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
