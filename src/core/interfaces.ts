/**
 * Validation result for a configuration source
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Validation error details
 */
export interface ValidationError {
  field: string;
  message: string;
  severity: 'error';
}

/**
 * Validation warning details
 */
export interface ValidationWarning {
  field: string;
  message: string;
  severity: 'warning';
}
