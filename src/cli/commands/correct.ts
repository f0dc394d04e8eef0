/**
 * Correct Command
 *
 * Replaces the input with the closest of the given candidates.
 *
 * @module cli/commands/correct
 */

import { Command, Option } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { parseThreshold } from '../parsers.js';
import { FuzzyAlgorithmSchema, type FuzzyAlgorithm } from '../../schemas/fuzzy-config.js';
import { correctTypos } from '../../fuzzy/matching.js';
import { extractString } from '../../stages/extract.js';

export interface CorrectCommandOptions {
  algorithm?: FuzzyAlgorithm;
  threshold?: number;
  /** Print the closest candidate even below the threshold */
  best?: boolean;
}

export function handleCorrect(
  input: string,
  candidates: string[],
  options: CorrectCommandOptions,
  base: BaseCommand
): void {
  base.debug(`Correcting '${input}' against ${candidates.length} candidates`);
  const result = extractString(input).pipe(
    correctTypos(candidates, {
      algorithm: options.algorithm,
      similarityThreshold: options.threshold,
      returnBestMatch: options.best === true,
    })
  );
  base.report(result, (value) => value.value ?? '');
}

export function registerCorrectCommand(program: Command): void {
  program
    .command('correct')
    .description('Correct a typo against a list of known values')
    .argument('<input>', 'Possibly misspelled value')
    .argument('<candidates...>', 'Known values')
    .addOption(
      new Option('-a, --algorithm <name>', 'Similarity algorithm').choices(
        FuzzyAlgorithmSchema.options
      )
    )
    .option('-t, --threshold <score>', 'Minimum similarity (0-1)', parseThreshold)
    .option('--best', 'Print the closest candidate even below the threshold')
    .action((input: string, candidates: string[], options: CorrectCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      base.guard(() => handleCorrect(input, candidates, options, base));
    });
}
