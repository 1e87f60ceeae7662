import * as yaml from 'js-yaml';

/**
 * Anything that can hand out a finished value in several output formats
 */
export interface Buildable<T> {
  build(): T;
  buildAsYaml(): string;
  buildAsJson(): string;
}

/**
 * Base builder class that supports multiple output formats
 */
export abstract class BaseBuilder<T> implements Buildable<T> {
  /**
   * Build and return the finished value
   */
  abstract build(): T;

  /**
   * Build and return as YAML string
   */
  buildAsYaml(): string {
    return yaml.dump(this.toPlainObject(this.build()));
  }

  /**
   * Build and return as JSON string
   */
  buildAsJson(): string {
    return JSON.stringify(this.toPlainObject(this.build()), null, 2);
  }

  /**
   * Convert the built value to plain data before serialization
   * (can be overridden by subclasses)
   */
  protected toPlainObject(value: T): unknown {
    return value;
  }
}
