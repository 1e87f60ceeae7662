/**
 * CLI Adapter - bridges command-line environment with the demo runner
 * Handles config loading, logger setup and error reporting
 */

import { ConfigLayer, loadConfigFile, resolveDemoConfig } from '../../config/ConfigLoader';
import { DemoRunner, OutputSink } from '../../demo/DemoRunner';
import { createLogger, LoggerOptions } from '../../services/createLogger';
import { LoggerWrapper } from '../../services/LoggerWrapper';

export interface CLIOptions {
  format?: string;
  demos?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CLIStreams {
  stdout: OutputSink;
  stderr: OutputSink;
}

export class CLIAdapter {
  constructor(
    private readonly streams: CLIStreams,
    private readonly loggerFactory: (options: LoggerOptions) => LoggerWrapper = createLogger,
  ) {}

  /**
   * Main CLI entry point, returns the process exit code
   */
  execute(options: CLIOptions): number {
    try {
      const fileLayer = options.config ? loadConfigFile(options.config) : {};
      const cliLayer: ConfigLayer = {
        format: options.format,
        demos: options.demos,
        logLevel: options.verbose ? 'debug' : undefined,
      };
      const { config, warnings } = resolveDemoConfig(fileLayer, cliLayer);

      const logger = this.loggerFactory({ level: config.logLevel, silent: options.quiet ?? false });
      for (const warning of warnings) {
        logger.warn(warning.message, { field: warning.field });
      }

      new DemoRunner(this.streams.stdout, logger).run(config);
      return 0;
    } catch (error) {
      this.error(error instanceof Error ? error.message : String(error));
      return 1;
    }
  }

  /**
   * Print error message
   */
  private error(message: string): void {
    this.streams.stderr.write(`❌ Error: ${message}`);
  }
}
