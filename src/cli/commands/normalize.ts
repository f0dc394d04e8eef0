/**
 * Normalize Command
 *
 * Prints the canonical form of an address, phone number or personal name.
 *
 * @module cli/commands/normalize
 */

import { Argument, Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { NORMALIZE_KINDS, type NormalizeKind } from './similarity.js';
import type { Stage } from '../../stages/engine.js';
import { extractString } from '../../stages/extract.js';
import {
  normalizeAddressStage,
  normalizeNameStage,
  normalizePhoneStage,
} from '../../fuzzy/matching.js';

export interface NormalizeCommandOptions {
  /** false with --no-lowercase */
  lowercase?: boolean;
  removeCommonWords?: boolean;
  removeTitles?: boolean;
  keepExtensions?: boolean;
}

function stageFor(kind: NormalizeKind, options: NormalizeCommandOptions): Stage<string> {
  const toLowercase = options.lowercase !== false;
  switch (kind) {
    case 'address':
      return normalizeAddressStage({
        toLowercase,
        removeCommonWords: options.removeCommonWords === true,
      });
    case 'phone':
      return normalizePhoneStage({ removeExtensions: options.keepExtensions !== true });
    case 'name':
      return normalizeNameStage({ toLowercase, removeTitles: options.removeTitles === true });
  }
}

export function handleNormalize(
  kind: NormalizeKind,
  input: string,
  options: NormalizeCommandOptions,
  base: BaseCommand
): void {
  const result = extractString(input).pipe(stageFor(kind, options));
  base.report(result, (value) => value.value ?? '');
}

export function registerNormalizeCommand(program: Command): void {
  program
    .command('normalize')
    .description('Normalize an address, phone number or name')
    .addArgument(new Argument('<kind>', 'What the input is').choices(NORMALIZE_KINDS))
    .argument('<input>', 'Text to normalize')
    .option('--no-lowercase', 'Keep the original case (address, name)')
    .option('--remove-common-words', 'Drop articles and conjunctions (address)')
    .option('--remove-titles', 'Drop a leading title such as Dr. (name)')
    .option('--keep-extensions', 'Keep extension digits (phone)')
    .action((kind: NormalizeKind, input: string, options: NormalizeCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      base.guard(() => handleNormalize(kind, input, options, base));
    });
}
