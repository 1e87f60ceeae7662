/**
 * Validator for raw demo configuration sources
 */

import { ValidationResult, ValidationError, ValidationWarning } from '../interfaces';
import {
  DEMO_FORMATS,
  DEMO_NAMES,
  LOG_LEVELS,
  isDemoFormat,
  isDemoName,
  isLogLevel,
  toDemoList,
} from '../../config/DemoConfig';

const KNOWN_KEYS = ['format', 'demos', 'logLevel'];

export class ConfigValidator {
  /**
   * Validate a merged configuration object
   */
  validate(raw: Record<string, unknown>): ValidationResult {
    const errors: ValidationError[] = [];
    const warnings: ValidationWarning[] = [];

    for (const key of Object.keys(raw)) {
      if (!KNOWN_KEYS.includes(key)) {
        warnings.push({
          field: key,
          message: `Unknown configuration key: ${key}`,
          severity: 'warning',
        });
      }
    }

    if (raw.format !== undefined && !isDemoFormat(raw.format)) {
      errors.push({
        field: 'format',
        message: `format must be one of ${DEMO_FORMATS.join(', ')}`,
        severity: 'error',
      });
    }

    if (raw.logLevel !== undefined && !isLogLevel(raw.logLevel)) {
      errors.push({
        field: 'logLevel',
        message: `logLevel must be one of ${LOG_LEVELS.join(', ')}`,
        severity: 'error',
      });
    }

    if (raw.demos !== undefined) {
      this.validateDemos(toDemoList(raw.demos), errors, warnings);
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
   * Validate the demo selection
   */
  private validateDemos(
    demos: unknown[],
    errors: ValidationError[],
    warnings: ValidationWarning[],
  ): void {
    const isBlank = (demo: unknown): boolean => demo === '';

    if (demos.every(isBlank)) {
      errors.push({
        field: 'demos',
        message: `At least one demo must be selected (${DEMO_NAMES.join(', ')})`,
        severity: 'error',
      });
      return;
    }

    const seen = new Set<unknown>();
    // index is the position in the raw list, blanks included
    demos.forEach((demo, index) => {
      if (isBlank(demo)) {
        return;
      }
      if (!isDemoName(demo)) {
        errors.push({
          field: `demos[${index}]`,
          message: `Unknown demo: ${String(demo)}`,
          severity: 'error',
        });
      } else if (seen.has(demo)) {
        warnings.push({
          field: `demos[${index}]`,
          message: `Demo ${demo} is selected more than once`,
          severity: 'warning',
        });
      }
      seen.add(demo);
    });
  }
}

/**
 * Factory function to create a config validator
 */
export function createConfigValidator(): ConfigValidator {
  return new ConfigValidator();
}
