/**
 * CLI Output Formatter
 *
 * Converts CliResult/CliOutput to strings, styled with chalk unless plain.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  if (output.plain && !isError) {
    return [output.message, ...(output.details ?? [])].join('\n');
  }

  const lines: string[] = [];

  if (isError) {
    lines.push(chalk.red(`✗ ${output.message}`));
  } else {
    lines.push(chalk.green(`✓ ${output.message}`));
  }

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach(detail => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('Warnings:'));
    output.warnings.forEach(warning => {
      lines.push(chalk.yellow(`  • ${warning}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('Suggestions:'));
    output.suggestions.forEach(suggestion => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);

    default:
      return assertNever(result);
  }
}

/**
 * Print a CliResult: successes to stdout, failures to stderr.
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (formatted) {
    if (result.kind === 'failure') {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }
}

export function formatKeyValue(key: string, value: string | number | null): string {
  return `${key}: ${value === null ? '-' : String(value)}`;
}
