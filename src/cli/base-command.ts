/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, locale)
 * - Exit code tracking
 * - Output utilities (result, warn, error, report)
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { config } from '../config/index.js';
import { ConfigurationError } from '../core/errors.js';
import type { PipelineValue } from '../core/pipeline-value.js';
import { createLogger, setLogger } from '../logging/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** BCP 47 tag overriding PIPELINE_LOCALE */
  locale?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** The result is valid */
  SUCCESS: 0,
  /** The result is invalid */
  INVALID: 1,
  /** Invalid usage, arguments or configuration */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * Command handlers receive a BaseCommand to write output and record the
 * exit code; `main()` reads the code back once parsing is done.
 *
 * @example
 * ```typescript
 * const base = getBaseCommand(cmd);
 * base.report(extractInt(input), (value) => String(value));
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Locale for extraction and formatting */
  readonly locale: string;

  private readonly useColor: boolean;
  private readonly paint: chalk.Chalk;
  private code: ExitCode = EXIT_CODES.SUCCESS;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.locale = options.locale ?? config.locale;
    this.useColor = options.color !== false && config.color && process.stdout.isTTY === true;
    this.paint = new chalk.Instance({ level: this.useColor ? chalk.level : 0 });

    // Stage diagnostics follow the output flags
    setLogger(
      createLogger({
        level: options.verbose ? 'debug' : options.quiet ? 'error' : config.logLevel,
        color: this.useColor,
      })
    );
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(this.paint.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Print the primary output of a command. Shown even in quiet mode.
   */
  result(text: string): void {
    console.log(text);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(this.paint.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and record the exit code.
   *
   * @param message - Error message
   * @param errorOrCode - Error object (stack shown when verbose) or exit code
   */
  error(message: string, errorOrCode: Error | ExitCode = EXIT_CODES.USAGE_ERROR): void {
    console.error(this.paint.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(this.paint.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      this.setExitCode(EXIT_CODES.USAGE_ERROR);
    } else {
      this.setExitCode(errorOrCode);
    }
  }

  /**
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(this.paint.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print data as formatted JSON.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a pipeline outcome: the rendered text, then one line per recorded
   * error. Valid values exit 0, invalid ones 1.
   */
  report<T>(value: PipelineValue<T>, render: (value: PipelineValue<T>) => string): void {
    this.result(render(value));
    for (const error of value.errors) {
      if (value.isValid) {
        this.warn(`${error.operation}: ${error.message}`);
      } else {
        this.fail(`${error.operation}: ${error.message}`);
      }
    }
    this.setExitCode(value.isValid ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID);
  }

  /**
   * Run a command handler, reporting configuration errors (a malformed
   * pattern, an unsupported format) as usage errors.
   */
  guard(handler: () => void): void {
    try {
      handler();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.error(error.message, error);
        return;
      }
      throw error;
    }
  }

  get exitCode(): ExitCode {
    return this.code;
  }

  setExitCode(code: ExitCode): void {
    this.code = code;
  }
}

/**
 * Get the base command stored on the program by the preAction hook.
 * Subcommands see it through their merged global options.
 *
 * @param cmd - Commander command instance
 * @returns BaseCommand, or a default one when none was stored (for testing)
 */
export function getBaseCommand(cmd: { optsWithGlobals(): Record<string, unknown> }): BaseCommand {
  const base = cmd.optsWithGlobals()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
