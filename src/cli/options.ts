/**
 * Option parsers shared by the subcommands. Bad values are reported by
 * commander before any workspace is opened.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { OUTPUT_FORMATS, type OutputFormat } from './output/index.js';

export interface CommonOptions {
  db?: string;
  format: OutputFormat;
}

export function choice<T extends string>(values: readonly T[]): (value: string) => T {
  return (value) => {
    const found = values.find((item) => item === value);
    if (found === undefined) {
      throw new InvalidArgumentError(`Expected one of: ${values.join(', ')}.`);
    }
    return found;
  };
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return parsed;
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * `--db` and `--format`, attached to every subcommand that opens a workspace
 */
export function withCommonOptions(command: Command, defaultFormat: OutputFormat = 'table'): Command {
  return command
    .option('--db <path>', 'Workspace database path (overrides configuration)')
    .option(
      '-f, --format <format>',
      `Output format: ${OUTPUT_FORMATS.join(', ')}`,
      choice(OUTPUT_FORMATS),
      defaultFormat
    );
}
