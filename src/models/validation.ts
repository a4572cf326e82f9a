// Validation result types

/**
 * Result of validating a template definition file
 */
export interface TemplateValidationReport {
  /** Definition file that was checked */
  path: string;
  /** True when there are no errors; warnings do not count */
  valid: boolean;
  /** Schema issues and cross-validation diagnostics */
  errors: string[];
  /** Non-blocking observations such as unused variables */
  warnings: string[];
}
