/**
 * Demo runner configuration: accepted values, defaults and type guards
 */

export const DEMO_FORMATS = ['text', 'yaml', 'json'] as const;
export type DemoFormat = (typeof DEMO_FORMATS)[number];

// Catalogue order; the runner always follows it
export const DEMO_NAMES = ['markup', 'person', 'vehicle', 'employee', 'member'] as const;
export type DemoName = (typeof DEMO_NAMES)[number];

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface DemoConfig {
  format: DemoFormat;
  demos: DemoName[];
  logLevel: LogLevel;
}

export const DEFAULT_DEMO_CONFIG: Readonly<DemoConfig> = {
  format: 'text',
  demos: [...DEMO_NAMES],
  logLevel: 'info',
};

export function isDemoFormat(value: unknown): value is DemoFormat {
  return DEMO_FORMATS.some(format => format === value);
}

export function isDemoName(value: unknown): value is DemoName {
  return DEMO_NAMES.some(name => name === value);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Demo selection may be given as a list or a comma separated string.
 * Blank entries are kept so positions match the raw input.
 */
export function toDemoList(value: unknown): unknown[] {
  if (typeof value === 'string') {
    return value.split(',').map(name => name.trim());
  }
  return Array.isArray(value) ? value : [value];
}
