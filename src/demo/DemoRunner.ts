/**
 * Demo runner - runs the selected builder demos and writes their output
 */

import { DemoConfig, DemoFormat, DemoName } from '../config/DemoConfig';
import { LoggerWrapper } from '../services/LoggerWrapper';
import { DEMOS, Demo, DemoResult } from './demos';

/**
 * Line-oriented output target (stdout in the CLI)
 */
export interface OutputSink {
  write(line: string): void;
}

export class DemoRunner {
  constructor(
    private readonly output: OutputSink,
    private readonly logger: LoggerWrapper,
    private readonly demos: Readonly<Record<DemoName, Demo>> = DEMOS,
  ) {}

  /**
   * Run the configured demos in order. Failures propagate to the caller.
   */
  run(config: DemoConfig): DemoResult[] {
    const results: DemoResult[] = [];

    for (const name of config.demos) {
      this.logger.debug('Running demo', { demo: name });
      const result = this.demos[name]();

      if (results.length > 0) {
        this.output.write('');
      }
      this.output.write(`=== ${result.title} ===`);
      this.output.write(this.render(result, config.format));

      results.push(result);
    }

    this.logger.info(`Ran ${results.length} demo(s)`, { format: config.format });
    return results;
  }

  private render(result: DemoResult, format: DemoFormat): string {
    let body: string;
    switch (format) {
      case 'yaml':
        body = result.builder.buildAsYaml();
        break;
      case 'json':
        body = result.builder.buildAsJson();
        break;
      default:
        body = result.text;
    }
    return body.replace(/\n+$/, '');
  }
}
