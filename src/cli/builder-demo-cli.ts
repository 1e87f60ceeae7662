#!/usr/bin/env node

/**
 * Builder demo CLI - prints a sample construction for every builder
 * in the catalogue
 */

import * as fs from 'fs';
import * as path from 'path';
import { program } from 'commander';
import { CLIAdapter, CLIOptions } from './adapters/CLIAdapter';

function readVersion(): string {
  // ../../package.json from both src/cli and dist/cli
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const adapter = new CLIAdapter({
  stdout: { write: line => process.stdout.write(`${line}\n`) },
  stderr: { write: line => process.stderr.write(`${line}\n`) },
});

// Configure CLI
program
  .name('builder-demo')
  .description('Run the builder pattern demos')
  .version(readVersion())
  .option('-f, --format <format>', 'Output format (text, yaml or json)')
  .option('-d, --demos <names>', 'Demos to run (comma-separated)')
  .option('-c, --config <path>', 'YAML config file')
  .option('--verbose', 'Show debug logging')
  .option('--quiet', 'Suppress logging');

// Parse arguments
program.parse();

process.exitCode = adapter.execute(program.opts<CLIOptions>());
