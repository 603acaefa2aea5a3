/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 *
 * Stream split: the engine transcript and success lines go to stdout; warnings
 * and failures go to stderr.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

/**
 * Format the message, details and suggestions of a CliOutput.
 * Warnings are formatted separately (see formatWarnings).
 */
export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  if (isError) {
    lines.push(chalk.red(`❌ ${output.message}`));
  } else {
    lines.push(chalk.green(`✅ ${output.message}`));
  }

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  ${detail}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

/**
 * Format warnings; empty string when there are none.
 */
export function formatWarnings(warnings: readonly string[] | undefined): string {
  if (!warnings || warnings.length === 0) return '';
  return warnings.map((warning) => chalk.yellow(`⚠️  Warning: ${warning}`)).join('\n');
}

export interface FormattedResult {
  /** Engine transcript, verbatim. */
  readonly transcript: string;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Format a CliResult, already split by destination stream.
 */
export function formatResult(result: CliResult): FormattedResult {
  const output = result.output;
  if (!output) return { transcript: '', stdout: '', stderr: '' };

  const transcript = output.transcript ?? '';
  const warnings = formatWarnings(output.warnings);

  switch (result.kind) {
    case 'success':
      return { transcript, stdout: formatOutput(output, false), stderr: warnings };

    case 'failure':
      return {
        transcript,
        stdout: '',
        stderr: [warnings, formatOutput(output, true)].filter((block) => block !== '').join('\n'),
      };
  }
}

/**
 * Print a CliResult: transcript first, then the headline on its stream.
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (formatted.transcript) process.stdout.write(formatted.transcript);
  if (formatted.stderr) console.error(formatted.stderr);
  if (formatted.stdout) console.log(formatted.stdout);
}
