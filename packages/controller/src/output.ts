/**
 * CLI Output Utilities
 *
 * Human-readable or JSON lines for the command-line entry point.
 * @module @rbac-sync/controller/output
 */

import chalk from 'chalk';

export type OutputFormat = 'json' | 'plain';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'plain'];

let globalOutputFormat: OutputFormat = 'plain';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
}

/**
 * Outputs a success message
 */
export function success(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ success: true, message }));
  } else {
    console.log(chalk.green('✓') + ' ' + message);
  }
}

/**
 * Outputs an error message, with optional details below it
 */
export function error(message: string, details?: unknown): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗') + ' ' + message);
    if (details) {
      console.error(chalk.gray(JSON.stringify(details, null, 2)));
    }
  }
}

export function warn(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ warning: message }));
  } else {
    console.log(chalk.yellow('⚠') + ' ' + message);
  }
}

export function info(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ info: message }));
  } else {
    console.log(chalk.blue('ℹ') + ' ' + message);
  }
}
