import { ValidationError } from './interfaces';

/**
 * Raised when a builder receives an argument it cannot accept
 */
export class InvalidArgumentError extends Error {
  constructor(
    readonly argumentName: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Raised when the demo configuration does not validate
 */
export class ConfigError extends Error {
  constructor(readonly errors: ValidationError[]) {
    super(`Invalid configuration: ${errors.map(e => `${e.field}: ${e.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}
