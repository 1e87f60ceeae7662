/**
 * Loads demo configuration from YAML files and merges it with
 * command-line overrides
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { ConfigError } from '../core/errors';
import { ValidationWarning } from '../core/interfaces';
import { createConfigValidator } from '../core/validators/ConfigValidator';
import {
  DEFAULT_DEMO_CONFIG,
  DEMO_NAMES,
  DemoConfig,
  isDemoFormat,
  isDemoName,
  isLogLevel,
  toDemoList,
} from './DemoConfig';

export type ConfigLayer = Record<string, unknown>;

export interface ResolvedDemoConfig {
  config: DemoConfig;
  warnings: ValidationWarning[];
}

function isConfigLayer(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function configFileError(message: string): ConfigError {
  return new ConfigError([{ field: 'config', message, severity: 'error' }]);
}

/**
 * Read a YAML config file. An empty file yields an empty layer.
 */
export function loadConfigFile(configPath: string): ConfigLayer {
  if (!fs.existsSync(configPath)) {
    throw configFileError(`Config file not found: ${configPath}`);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw configFileError(`Invalid YAML in ${configPath}: ${reason}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isConfigLayer(parsed)) {
    throw configFileError(`Config file ${configPath} must contain a mapping`);
  }
  return parsed;
}

/**
 * Merge layers (later layers win, undefined values are skipped), validate
 * the result and fill in defaults
 */
export function resolveDemoConfig(...layers: ConfigLayer[]): ResolvedDemoConfig {
  const merged: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }

  const result = createConfigValidator().validate(merged);
  if (!result.valid) {
    throw new ConfigError(result.errors);
  }

  const selected = merged.demos === undefined ? DEFAULT_DEMO_CONFIG.demos : toDemoList(merged.demos).filter(isDemoName);

  return {
    config: {
      format: isDemoFormat(merged.format) ? merged.format : DEFAULT_DEMO_CONFIG.format,
      demos: DEMO_NAMES.filter(name => selected.includes(name)),
      logLevel: isLogLevel(merged.logLevel) ? merged.logLevel : DEFAULT_DEMO_CONFIG.logLevel,
    },
    warnings: result.warnings,
  };
}
