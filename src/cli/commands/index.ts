/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - extract: Extract a typed value from text
 * - similarity: Score two strings
 * - normalize: Canonicalize an address, phone number or name
 * - correct: Correct a typo against known values
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerExtractCommand } from './extract.js';
import { registerSimilarityCommand } from './similarity.js';
import { registerNormalizeCommand } from './normalize.js';
import { registerCorrectCommand } from './correct.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerExtractCommand(program);
  registerSimilarityCommand(program);
  registerNormalizeCommand(program);
  registerCorrectCommand(program);
}

// Re-export individual command registrations for testing
export { registerExtractCommand, handleExtract, toExtractOptions } from './extract.js';
export { registerSimilarityCommand, handleSimilarity } from './similarity.js';
export { registerNormalizeCommand, handleNormalize } from './normalize.js';
export { registerCorrectCommand, handleCorrect } from './correct.js';
