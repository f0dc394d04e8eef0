/**
 * fluentpipe CLI
 *
 * Command-line front end over the pipeline stages.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   fluentpipe --help
 *   fluentpipe extract date "Due 2024-12-10" --default-regex --output yyyy-MM-dd
 *   fluentpipe similarity "John Smith" "Jon Smith"
 *   fluentpipe correct chicgo Boston Chicago Denver
 *
 * Exit codes: 0 valid, 1 invalid, 2 usage or configuration error.
 *
 * @module cli
 */

import { Command, CommanderError, Option, type OutputConfiguration } from 'commander';
import { VERSION, getVersionInfo } from './version.js';
import {
  BaseCommand,
  EXIT_CODES,
  getBaseCommand,
  type ExitCode,
  type GlobalOptions,
} from './base-command.js';
import { parseLocale } from './parsers.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @param output - Overrides where commander writes help and usage errors
 */
export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command();

  // Program metadata
  program
    .name('fluentpipe')
    .description('Extract, validate, fuzzy-match and format values')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .addOption(
      new Option('-v, --verbose', 'Enable verbose output for debugging').conflicts('quiet')
    )
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-l, --locale <tag>', 'Locale for parsing and formatting', parseLocale);

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const baseCommand = new BaseCommand(thisCommand.opts<GlobalOptions>());

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);
    baseCommand.debug(getVersionInfo());
  });

  // Subcommands inherit these settings when created, so set them first
  program.exitOverride();
  if (output) {
    program.configureOutput(output);
  }

  registerCommands(program);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments, runs the command and resolves to its exit code.
 */
export async function main(
  argv: readonly string[] = process.argv,
  output?: OutputConfiguration
): Promise<ExitCode> {
  const program = createProgram(output);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Commander has already printed help or the usage error
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
    }
    throw error;
  }

  return getBaseCommand(program).exitCode;
}
