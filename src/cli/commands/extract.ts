/**
 * Extract Command
 *
 * Runs a single extraction over the input text and prints the formatted
 * value, or the recorded errors when extraction fails.
 *
 * @module cli/commands/extract
 */

import { Argument, Command, Option } from 'commander';
import { EXIT_CODES, getBaseCommand, type BaseCommand } from '../base-command.js';
import { collect, parseNonNegativeInt, parseThreshold } from '../parsers.js';
import type { PipelineValue } from '../../core/pipeline-value.js';
import {
  FuzzyExtractionModeSchema,
  type ExtractOptions,
  type FuzzyExtractionMode,
  type SemanticType,
} from '../../schemas/extract-config.js';
import { extractAs, extractString } from '../../stages/extract.js';
import { format } from '../../stages/format.js';

// ============================================================================
// Types
// ============================================================================

export const EXTRACT_TYPES = ['string', 'date', 'int', 'double', 'decimal', 'bool', 'guid'] as const;

export type ExtractType = (typeof EXTRACT_TYPES)[number];

const SEMANTIC_TYPES: Readonly<Record<Exclude<ExtractType, 'string'>, SemanticType>> = {
  date: 'Date',
  int: 'Int',
  double: 'Double',
  decimal: 'Decimal',
  bool: 'Bool',
  guid: 'Guid',
};

/**
 * Options for the extract command.
 */
export interface ExtractCommandOptions {
  pattern?: string;
  group?: number;
  /** Repeatable date-fns patterns */
  dateFormat?: string[];
  defaultRegex?: boolean;
  fuzzy?: FuzzyExtractionMode;
  threshold?: number;
  /** Format string for the printed value */
  output?: string;
  json?: boolean;
}

// ============================================================================
// Handler
// ============================================================================

export function toExtractOptions(options: ExtractCommandOptions, locale: string): ExtractOptions {
  return {
    locale,
    regexPattern: options.pattern,
    groupIndex: options.group,
    dateTimeFormats: options.dateFormat,
    useDefaultRegex: options.defaultRegex === true,
    fuzzyExtractionMode: options.fuzzy,
    fuzzyMatching:
      options.threshold === undefined ? undefined : { similarityThreshold: options.threshold },
  };
}

export function handleExtract(
  type: ExtractType,
  input: string,
  options: ExtractCommandOptions,
  base: BaseCommand
): void {
  base.debug(`Extracting ${type} from '${input}'`);

  const extractOptions = toExtractOptions(options, base.locale);
  const value: PipelineValue<unknown> =
    type === 'string'
      ? extractString(input, extractOptions)
      : extractAs(input, SEMANTIC_TYPES[type], extractOptions);

  if (options.json) {
    base.json(value.toJSON());
    base.setExitCode(value.isValid ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID);
    return;
  }

  base.report(value, format<unknown>({ locale: base.locale, formatString: options.output }));
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerExtractCommand(program: Command): void {
  program
    .command('extract')
    .description('Extract a typed value from text')
    .addArgument(new Argument('<type>', 'Value type').choices(EXTRACT_TYPES))
    .argument('<input>', 'Text to extract from')
    .option('-p, --pattern <regex>', 'Regular expression selecting the text')
    .option('-g, --group <index>', 'Capture group of the pattern', parseNonNegativeInt)
    .option('-d, --date-format <pattern>', 'date-fns pattern to try (repeatable)', collect)
    .option('--default-regex', 'Use the default pattern of the value type')
    .addOption(
      new Option('--fuzzy <mode>', 'Fuzzy extraction mode').choices(
        FuzzyExtractionModeSchema.options
      )
    )
    .option('-t, --threshold <score>', 'Fuzzy similarity threshold (0-1)', parseThreshold)
    .option('-o, --output <format>', 'Format string for the printed value')
    .option('--json', 'Print the result as JSON')
    .action((type: ExtractType, input: string, options: ExtractCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      base.guard(() => handleExtract(type, input, options, base));
    });
}
