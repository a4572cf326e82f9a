// Zod schemas for template definitions
//
// Definition files use snake_case keys. Every schema here transforms its input
// into the camelCase, read-only models in src/models.

import { z } from 'zod';
import type { ActionGroup, TemplateAction, TemplateHooks } from '../models/action.js';
import type { DirectoryItem, FileItem, FileSource, ProjectStructure, TemplateFile, TemplateFiles } from '../models/structure.js';
import { deepFreeze, type Template, type TemplateConfiguration, type TemplateMetadata } from '../models/template.js';
import {
  ACTION_TYPES,
  FILE_ENCODINGS,
  FILTER_NAMES,
  LOGIC_OPERATORS,
  OPERATING_SYSTEMS,
  PLATFORMS,
  RULE_KINDS,
  TEMPLATE_CATEGORIES,
  TEMPLATE_LICENSES,
  type VariableValue
} from '../models/types.js';
import type { ConditionalLogic, TemplateVariable, ValidationRule } from '../models/variable.js';
import { SchemaValidationError, type FieldIssue } from './errors.js';
import {
  checkItemName,
  checkRelativePath,
  EMAIL_PATTERN,
  IDENTIFIER_PATTERN,
  isValidRegex,
  PERMISSION_PATTERN,
  SEMVER_PATTERN,
  STRICT_VERSION_PATTERN,
  TAG_PATTERN,
  URL_PATTERN
} from './validation.js';

export const DEFAULT_TEMPLATE_SUFFIX = '.tpl';
export const DEFAULT_MIN_RUNTIME_VERSION = '20.0.0';

const BASE64_PATTERN = /^[A-Za-z0-9+/\s]*={0,2}\s*$/;

/** Substrings that make a `command` action unacceptable */
const DANGEROUS_COMMANDS = ['rm -rf', 'del /f', 'format', 'fdisk', 'mkfs'];

// ---------------------------------------------------------------------------
// Shared field schemas
// ---------------------------------------------------------------------------

export const VariableValueSchema: z.ZodType<VariableValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(VariableValueSchema),
    z.record(VariableValueSchema)
  ])
);

const identifierSchema = z
  .string()
  .regex(IDENTIFIER_PATTERN, 'Must be a valid identifier (letters, digits and underscores, not starting with a digit)');

function textSchema(label: string, max: number) {
  return z
    .string()
    .trim()
    .min(1, `${label} cannot be empty`)
    .max(max, `${label} must be at most ${max} characters`);
}

/**
 * YAML reads `644` as a number, so both forms are accepted
 */
function permissionsSchema(fallback: string) {
  return z
    .union([z.string(), z.number().int()])
    .default(fallback)
    .transform(value => String(value))
    .pipe(z.string().regex(PERMISSION_PATTERN, 'Permissions must be a 3-digit octal string such as 644'));
}

function itemNameSchema(kind: 'File' | 'Directory') {
  return z
    .string()
    .superRefine((value, ctx) => {
      const problem = checkItemName(value, kind);
      if (problem) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      }
    })
    .transform(value => value.trim());
}

const relativePathSchema = z
  .string()
  .trim()
  .min(1, 'Path cannot be empty')
  .superRefine((value, ctx) => {
    const problem = checkRelativePath(value);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  });

/**
 * A condition may be written as text, a bare boolean/number, or `{ expression }`
 */
const conditionSchema = z
  .union([z.string(), z.boolean(), z.number(), z.object({ expression: z.string() })])
  .transform(value => (typeof value === 'object' ? value.expression : String(value)))
  .pipe(z.string().trim().min(1, 'Condition cannot be empty'));

// ---------------------------------------------------------------------------
// Variables
// ---------------------------------------------------------------------------

const ChoiceItemSchema = z.union([
  z.string().min(1).transform(value => ({ value })),
  z.object({
    value: z.string().min(1, 'Choice value cannot be empty'),
    label: z.string().optional(),
    description: z.string().optional()
  })
]);

function choicesSchema(type: 'choice' | 'multichoice') {
  return z
    .array(ChoiceItemSchema, { required_error: `Choices must be provided for ${type} variables` })
    .min(2, `At least 2 choices required for ${type} variables`);
}

const ruleOperandSchema = z.union([z.string(), z.number()]);

export const ValidationRuleSchema = z
  .object({
    rule_type: z.enum(RULE_KINDS).optional(),
    rule_kind: z.enum(RULE_KINDS).optional(),
    value: ruleOperandSchema.optional(),
    operand: ruleOperandSchema.optional(),
    message: z.string().optional()
  })
  .transform((raw, ctx): ValidationRule => {
    const ruleKind = raw.rule_type ?? raw.rule_kind;
    const operand = raw.value ?? raw.operand;
    if (ruleKind === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rule_type'], message: 'Validation rule needs a rule_type' });
      return z.NEVER;
    }
    if (operand === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: `Validation rule '${ruleKind}' needs a value` });
      return z.NEVER;
    }
    if (ruleKind === 'pattern') {
      if (typeof operand !== 'string' || !isValidRegex(operand)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: 'Pattern rule needs a valid regular expression' });
        return z.NEVER;
      }
      return { ruleKind, operand, message: raw.message };
    }
    if (typeof operand !== 'number') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: `Validation rule '${ruleKind}' needs a numeric value` });
      return z.NEVER;
    }
    return { ruleKind, operand, message: raw.message };
  });

export const ConditionalLogicSchema = z
  .object({
    variable: identifierSchema,
    operator: z.enum(LOGIC_OPERATORS),
    value: VariableValueSchema.optional()
  })
  .superRefine((raw, ctx) => {
    const isRegexOperator = raw.operator === 'matches' || raw.operator === 'not_matches';
    if (isRegexOperator && (typeof raw.value !== 'string' || !isValidRegex(raw.value))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: `Operator '${raw.operator}' needs a valid regular expression` });
    }
  })
  .transform((raw): ConditionalLogic => ({ variable: raw.variable, operator: raw.operator, value: raw.value ?? null }));

const conditionListSchema = z
  .array(ConditionalLogicSchema)
  .nullish()
  .transform(value => value ?? []);

const variableBaseShape = {
  name: identifierSchema,
  description: textSchema('Description', 200),
  required: z.boolean().default(true),
  prompt: z.string().optional(),
  help_text: z.string().optional(),
  validation_rules: z.array(ValidationRuleSchema).default([]),
  show_if: conditionListSchema,
  hide_if: conditionListSchema,
  filters: z.array(z.enum(FILTER_NAMES)).default([])
};

const RawVariableSchema = z.discriminatedUnion('type', [
  z.object({
    ...variableBaseShape,
    type: z.enum(['string', 'path']),
    default: z.string({ invalid_type_error: 'Default value for string variable must be string' }).nullish()
  }),
  z.object({
    ...variableBaseShape,
    type: z.literal('email'),
    default: z
      .string({ invalid_type_error: 'Default value for email variable must be string' })
      .regex(EMAIL_PATTERN, 'Default value must be valid email address')
      .nullish()
  }),
  z.object({
    ...variableBaseShape,
    type: z.literal('url'),
    default: z
      .string({ invalid_type_error: 'Default value for URL variable must be string' })
      .regex(URL_PATTERN, 'Default value must be valid URL')
      .nullish()
  }),
  z.object({
    ...variableBaseShape,
    type: z.literal('boolean'),
    default: z.boolean({ invalid_type_error: 'Default value for boolean variable must be boolean' }).nullish()
  }),
  z.object({
    ...variableBaseShape,
    type: z.literal('integer'),
    default: z
      .number({ invalid_type_error: 'Default value for integer variable must be integer' })
      .int('Default value for integer variable must be integer')
      .nullish()
  }),
  z.object({
    ...variableBaseShape,
    type: z.literal('float'),
    default: z.number({ invalid_type_error: 'Default value for float variable must be number' }).finite().nullish()
  }),
  z.object({
    ...variableBaseShape,
    type: z.literal('list'),
    default: z.array(VariableValueSchema, { invalid_type_error: 'Default value for list variable must be list' }).nullish()
  }),
  z.object({
    ...variableBaseShape,
    type: z.literal('choice'),
    choices: choicesSchema('choice'),
    default: z.string({ invalid_type_error: 'Default value for choice variable must be string' }).nullish()
  }),
  z.object({
    ...variableBaseShape,
    type: z.literal('multichoice'),
    choices: choicesSchema('multichoice'),
    default: z.array(z.string(), { invalid_type_error: 'Default value for multichoice variable must be list' }).nullish()
  })
]);

type RawVariable = z.infer<typeof RawVariableSchema>;

function toVariable(raw: RawVariable): TemplateVariable {
  const base = {
    name: raw.name,
    description: raw.description,
    required: raw.required,
    prompt: raw.prompt,
    helpText: raw.help_text,
    validationRules: raw.validation_rules,
    showIf: raw.show_if,
    hideIf: raw.hide_if,
    filters: raw.filters
  };
  switch (raw.type) {
    case 'string':
    case 'path':
    case 'email':
    case 'url':
      return { ...base, type: raw.type, default: raw.default ?? undefined };
    case 'boolean':
      return { ...base, type: raw.type, default: raw.default ?? undefined };
    case 'integer':
    case 'float':
      return { ...base, type: raw.type, default: raw.default ?? undefined };
    case 'list':
      return { ...base, type: raw.type, default: raw.default ?? undefined };
    case 'choice':
      return { ...base, type: raw.type, choices: raw.choices, default: raw.default ?? undefined };
    case 'multichoice':
      return { ...base, type: raw.type, choices: raw.choices, default: raw.default ?? undefined };
  }
}

export const TemplateVariableSchema = RawVariableSchema
  .superRefine((raw, ctx) => {
    if (raw.type === 'choice' && raw.default != null) {
      const selected = raw.default;
      if (!raw.choices.some(choice => choice.value === selected)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['default'], message: `Default value '${selected}' is not one of the choices` });
      }
    }
    if (raw.type === 'multichoice' && raw.default != null) {
      for (const item of raw.default) {
        if (!raw.choices.some(choice => choice.value === item)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['default'], message: `Default value '${item}' is not one of the choices` });
        }
      }
    }
  })
  .transform(toVariable);

// ---------------------------------------------------------------------------
// Structure
// ---------------------------------------------------------------------------

export const FileItemSchema = z
  .object({
    name: itemNameSchema('File'),
    content: z.string().optional(),
    template_file: relativePathSchema.optional(),
    binary_content: z.string().regex(BASE64_PATTERN, 'binary_content must be base64 encoded').optional(),
    encoding: z.enum(FILE_ENCODINGS).optional(),
    permissions: permissionsSchema('644'),
    executable: z.boolean().default(false),
    condition: conditionSchema.optional()
  })
  .transform((raw, ctx): FileItem => {
    let source: FileSource | undefined;
    let count = 0;
    if (raw.content !== undefined) {
      source = { kind: 'inline', content: raw.content };
      count++;
    }
    if (raw.template_file !== undefined) {
      source = { kind: 'template', templateFile: raw.template_file };
      count++;
    }
    if (raw.binary_content !== undefined) {
      source = { kind: 'binary', data: raw.binary_content.replace(/\s+/g, '') };
      count++;
    }
    if (!source || count !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: count === 0
          ? 'File must have content, template_file, or binary_content'
          : 'File must have only one of content, template_file, or binary_content'
      });
      return z.NEVER;
    }
    return {
      name: raw.name,
      source,
      encoding: source.kind === 'binary' ? 'binary' : raw.encoding,
      permissions: raw.permissions,
      executable: raw.executable,
      condition: raw.condition
    };
  });

export const DirectoryItemSchema: z.ZodType<DirectoryItem, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      name: itemNameSchema('Directory'),
      permissions: permissionsSchema('755'),
      condition: conditionSchema.optional(),
      files: z.array(FileItemSchema).default([]),
      directories: z.array(DirectoryItemSchema).default([]),
      create_if_empty: z.boolean().default(true)
    })
    .transform((raw): DirectoryItem => ({
      name: raw.name,
      permissions: raw.permissions,
      condition: raw.condition,
      files: raw.files,
      directories: raw.directories,
      createIfEmpty: raw.create_if_empty
    }))
);

const ProjectStructureSchema = z
  .object({
    root_directory: DirectoryItemSchema,
    preserve_empty_directories: z.boolean().default(true)
  })
  .transform((raw): ProjectStructure => ({
    rootDirectory: raw.root_directory,
    preserveEmptyDirectories: raw.preserve_empty_directories
  }));

export const TemplateFileSchema = z
  .object({
    name: relativePathSchema,
    content: z.string(),
    encoding: z.enum(FILE_ENCODINGS).optional(),
    description: z.string().optional(),
    output_path: relativePathSchema.optional(),
    variables_used: z.array(identifierSchema).default([])
  })
  .transform((raw): TemplateFile => ({
    name: raw.name,
    content: raw.content,
    encoding: raw.encoding,
    description: raw.description,
    outputPath: raw.output_path,
    variablesUsed: raw.variables_used
  }));

const TemplateFilesSchema = z
  .object({
    files: z.array(TemplateFileSchema).default([]),
    base_path: relativePathSchema.default('templates')
  })
  .transform((raw): TemplateFiles => ({ files: raw.files, basePath: raw.base_path }));

// ---------------------------------------------------------------------------
// Hooks
// ---------------------------------------------------------------------------

export const TemplateActionSchema = z
  .object({
    name: z.string().trim().min(1, 'Action name cannot be empty'),
    type: z.enum(ACTION_TYPES),
    command: z.string().trim().min(1, 'Command cannot be empty'),
    description: z.string().default(''),
    working_directory: relativePathSchema.optional(),
    platforms: z.array(z.enum(PLATFORMS)).default(['windows', 'macos', 'linux']),
    condition: conditionSchema.optional(),
    required: z.boolean().default(true),
    timeout: z.number().positive('Timeout must be positive').optional(),
    environment: z.record(z.string()).default({}),
    arguments: z.array(z.string()).default([])
  })
  .superRefine((raw, ctx) => {
    if (raw.type === 'git' && !raw.command.startsWith('git ')) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['command'], message: "Git action command must start with 'git '" });
    }
    const lowered = raw.command.toLowerCase();
    if (raw.type === 'command' && DANGEROUS_COMMANDS.some(pattern => lowered.includes(pattern))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['command'], message: 'Command contains potentially dangerous operations' });
    }
  })
  .transform((raw): TemplateAction => ({
    name: raw.name,
    type: raw.type,
    command: raw.command,
    description: raw.description,
    workingDirectory: raw.working_directory,
    platforms: raw.platforms,
    condition: raw.condition,
    required: raw.required,
    timeout: raw.timeout,
    environment: raw.environment,
    arguments: raw.arguments
  }));

const actionListSchema = z.array(TemplateActionSchema).default([]);

const TemplateHooksSchema = z
  .object({
    pre_generate: actionListSchema,
    post_generate: actionListSchema,
    pre_file: actionListSchema,
    post_file: actionListSchema,
    on_error: actionListSchema,
    cleanup: actionListSchema
  })
  .transform((raw): TemplateHooks => ({
    preGenerate: raw.pre_generate,
    postGenerate: raw.post_generate,
    preFile: raw.pre_file,
    postFile: raw.post_file,
    onError: raw.on_error,
    cleanup: raw.cleanup
  }));

const ActionGroupSchema = z
  .object({
    name: z.string().trim().min(1, 'Group name cannot be empty'),
    description: z.string().default(''),
    actions: actionListSchema,
    condition: conditionSchema.optional(),
    parallel: z.boolean().default(false),
    continue_on_error: z.boolean().default(false)
  })
  .transform((raw): ActionGroup => ({
    name: raw.name,
    description: raw.description,
    actions: raw.actions,
    condition: raw.condition,
    parallel: raw.parallel,
    continueOnError: raw.continue_on_error
  }));

// ---------------------------------------------------------------------------
// Metadata and configuration
// ---------------------------------------------------------------------------

const strictVersionSchema = z.string().regex(STRICT_VERSION_PATTERN, 'Version must be in format X.Y.Z');

export const TemplateMetadataSchema = z
  .object({
    name: textSchema('Template name', 100),
    description: textSchema('Template description', 500),
    version: z.string().regex(SEMVER_PATTERN, 'Version must be semantic (X.Y.Z with optional pre-release and build metadata)'),
    category: z.enum(TEMPLATE_CATEGORIES),
    tags: z
      .array(z.string().regex(TAG_PATTERN, 'Tags must be lowercase alphanumeric (hyphens and underscores allowed)'))
      .default([]),
    author: textSchema('Template author', 100),
    author_email: z.string().regex(EMAIL_PATTERN, 'Author email must be a valid email address').optional(),
    license: z.enum(TEMPLATE_LICENSES).default('MIT'),
    created: z.coerce.date().default(() => new Date()),
    updated: z.coerce.date().optional(),
    min_runtime_version: strictVersionSchema.optional(),
    min_node_version: strictVersionSchema.optional(),
    compatibility: z.array(z.enum(OPERATING_SYSTEMS)).default(['macOS', 'Linux', 'Windows']),
    documentation_url: z.string().url().optional(),
    source_url: z.string().url().optional()
  })
  .superRefine((raw, ctx) => {
    if (raw.updated && raw.updated.getTime() < raw.created.getTime()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['updated'], message: 'Updated date must be after created date' });
    }
  })
  .transform((raw): TemplateMetadata => ({
    name: raw.name,
    description: raw.description,
    version: raw.version,
    category: raw.category,
    tags: raw.tags,
    author: raw.author,
    authorEmail: raw.author_email,
    license: raw.license,
    created: raw.created,
    updated: raw.updated,
    minRuntimeVersion: raw.min_runtime_version ?? raw.min_node_version ?? DEFAULT_MIN_RUNTIME_VERSION,
    compatibility: raw.compatibility,
    documentationUrl: raw.documentation_url,
    sourceUrl: raw.source_url
  }));

const TemplateConfigurationSchema = z
  .object({
    schema_version: strictVersionSchema.default('1.0.0'),
    template_suffix: z.string().startsWith('.', "Template suffix must start with '.'").default(DEFAULT_TEMPLATE_SUFFIX),
    preserve_permissions: z.boolean().default(true),
    encoding: z.enum(FILE_ENCODINGS).default('utf-8')
  })
  .transform((raw): TemplateConfiguration => ({
    schemaVersion: raw.schema_version,
    templateSuffix: raw.template_suffix,
    preservePermissions: raw.preserve_permissions,
    encoding: raw.encoding
  }));

// ---------------------------------------------------------------------------
// Template
// ---------------------------------------------------------------------------

export const TemplateDefinitionSchema = z
  .object({
    metadata: TemplateMetadataSchema,
    configuration: TemplateConfigurationSchema.default({}),
    variables: z.array(TemplateVariableSchema).default([]),
    structure: ProjectStructureSchema,
    template_files: TemplateFilesSchema.default({}),
    hooks: TemplateHooksSchema.default({}),
    action_groups: z.array(ActionGroupSchema).default([])
  })
  .superRefine((raw, ctx) => {
    const suffix = raw.configuration.templateSuffix;
    raw.template_files.files.forEach((file, index) => {
      if (!file.name.endsWith(suffix)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['template_files', 'files', index, 'name'],
          message: `Template file name must end with '${suffix}'`
        });
      }
    });
  })
  .transform((raw): Template => ({
    metadata: raw.metadata,
    configuration: raw.configuration,
    variables: raw.variables,
    structure: raw.structure,
    templateFiles: raw.template_files,
    hooks: raw.hooks,
    actionGroups: raw.action_groups
  }));

export type TemplateValidationResult =
  | { success: true; template: Template }
  | { success: false; issues: FieldIssue[] };

export interface DefinitionOptions {
  /** Recorded on the template and named in error messages */
  sourcePath?: string;
}

function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
}

/**
 * Safe validation (returns result instead of throwing)
 */
export function safeValidateTemplateDefinition(data: unknown, options: DefinitionOptions = {}): TemplateValidationResult {
  const result = TemplateDefinitionSchema.safeParse(data);
  if (!result.success) {
    return { success: false, issues: toFieldIssues(result.error) };
  }
  const template: Template = options.sourcePath
    ? { ...result.data, sourcePath: options.sourcePath }
    : result.data;
  return { success: true, template: deepFreeze(template) };
}

/**
 * Builds a frozen Template, throwing SchemaValidationError with every field issue
 */
export function validateTemplateDefinition(data: unknown, options: DefinitionOptions = {}): Template {
  const result = safeValidateTemplateDefinition(data, options);
  if (!result.success) {
    throw new SchemaValidationError(result.issues, options.sourcePath);
  }
  return result.template;
}
