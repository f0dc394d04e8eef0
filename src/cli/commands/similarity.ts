/**
 * Similarity Command
 *
 * Scores two strings with a fuzzy algorithm and reports whether they match
 * at the threshold.
 *
 * @module cli/commands/similarity
 */

import { Command, Option } from 'commander';
import { EXIT_CODES, getBaseCommand, type BaseCommand } from '../base-command.js';
import { parseThreshold } from '../parsers.js';
import {
  createFuzzyMatchingConfig,
  FuzzyAlgorithmSchema,
  type FuzzyAlgorithm,
} from '../../schemas/fuzzy-config.js';
import { fuzzyMatch, scoreWithConfig } from '../../fuzzy/matching.js';
import { extractString } from '../../stages/extract.js';

export const NORMALIZE_KINDS = ['address', 'phone', 'name'] as const;

export type NormalizeKind = (typeof NORMALIZE_KINDS)[number];

export interface SimilarityCommandOptions {
  algorithm?: FuzzyAlgorithm;
  threshold?: number;
  caseSensitive?: boolean;
  normalize?: NormalizeKind;
  json?: boolean;
}

export function handleSimilarity(
  a: string,
  b: string,
  options: SimilarityCommandOptions,
  base: BaseCommand
): void {
  const fuzzyOptions = {
    algorithm: options.algorithm,
    similarityThreshold: options.threshold,
    caseSensitive: options.caseSensitive === true,
    normalizeAddress: options.normalize === 'address',
    normalizePhone: options.normalize === 'phone',
    normalizeName: options.normalize === 'name',
  };
  const config = createFuzzyMatchingConfig(fuzzyOptions);
  const score = scoreWithConfig(a, b, config);
  base.debug(`${config.algorithm} score for '${a}' / '${b}': ${score}`);

  const result = extractString(a).pipe(fuzzyMatch(b, fuzzyOptions));

  if (options.json) {
    base.json({
      algorithm: config.algorithm,
      score,
      threshold: config.similarityThreshold,
      match: result.isValid,
    });
    base.setExitCode(result.isValid ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID);
    return;
  }

  base.report(result, () => score.toFixed(4));
}

export function registerSimilarityCommand(program: Command): void {
  program
    .command('similarity')
    .description('Score the similarity of two strings')
    .argument('<a>', 'First string')
    .argument('<b>', 'Second string')
    .addOption(
      new Option('-a, --algorithm <name>', 'Similarity algorithm').choices(
        FuzzyAlgorithmSchema.options
      )
    )
    .option('-t, --threshold <score>', 'Match threshold (0-1)', parseThreshold)
    .option('--case-sensitive', 'Compare without case folding')
    .addOption(
      new Option('-n, --normalize <kind>', 'Normalize both strings first').choices(NORMALIZE_KINDS)
    )
    .option('--json', 'Print the result as JSON')
    .action((a: string, b: string, options: SimilarityCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      base.guard(() => handleSimilarity(a, b, options, base));
    });
}
