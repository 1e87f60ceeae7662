// Export builders
export * from './builders';

// Export core types and errors
export { VehicleCategory } from './core/models';
export type { MarkupNode, Vehicle, WheelSizeRange, Employee, Member } from './core/models';
export { InvalidArgumentError, ConfigError } from './core/errors';
export type { ValidationResult, ValidationError, ValidationWarning } from './core/interfaces';
export { ConfigValidator, createConfigValidator } from './core/validators/ConfigValidator';

// Export configuration
export { DEFAULT_DEMO_CONFIG, DEMO_FORMATS, DEMO_NAMES, LOG_LEVELS } from './config/DemoConfig';
export type { DemoConfig, DemoFormat, DemoName, LogLevel } from './config/DemoConfig';
export { loadConfigFile, resolveDemoConfig } from './config/ConfigLoader';
export type { ConfigLayer, ResolvedDemoConfig } from './config/ConfigLoader';

// Export demo runner
export { DemoRunner } from './demo/DemoRunner';
export type { OutputSink } from './demo/DemoRunner';
export { DEMOS } from './demo/demos';
export type { Demo, DemoResult } from './demo/demos';
export { createLogger } from './services/createLogger';
export { LoggerWrapper } from './services/LoggerWrapper';
