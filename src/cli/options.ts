/**
 * Shared CLI option helpers.
 *
 * Option registration, output-path derivation and the colored message
 * helpers used by every command.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';

import type { ConfigOverrides } from '../types/config.js';
import type { AttackGroup } from '../types/mitre-attack.js';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

/** Options every command that loads the dataset accepts. */
export interface DatasetOptions {
  dataFile?: string;
  url?: string;
  config?: string;
  verbose?: boolean;
}

/**
 * Add --data-file, --url, --config and --verbose to a command.
 */
export function addDatasetOptions(cmd: Command): Command {
  return cmd
    .option('--data-file <path>', 'Read a local ATT&CK STIX bundle instead of downloading it')
    .option('--url <url>', 'Download the ATT&CK STIX bundle from this URL')
    .option('--config <file>', 'YAML configuration file')
    .option('--verbose', 'Verbose output');
}

/**
 * Translate dataset flags into config overrides.
 */
export function toConfigOverrides(options: DatasetOptions): ConfigOverrides {
  return {
    datasetFile: options.dataFile,
    datasetUrl: options.url,
    logLevel: options.verbose ? 'debug' : undefined,
  };
}

// ---------------------------------------------------------------------------
// Output paths
// ---------------------------------------------------------------------------

/**
 * Default layer filename for a group: lower-cased name with spaces and
 * slashes turned into underscores and anything else non-alphanumeric dropped.
 *
 * @example deriveOutputFilename({ name: 'Lazarus Group', ... }) => 'lazarus_group_navigator_layer.json'
 */
export function deriveOutputFilename(group: Pick<AttackGroup, 'id' | 'name'>): string {
  const safe = group.name
    .toLowerCase()
    .replace(/[\s/]+/g, '_')
    .replace(/[^a-z0-9_-]/g, '');

  return `${safe || group.id.toLowerCase()}_navigator_layer.json`;
}

export function resolveOutputFile(output: string | undefined, group: Pick<AttackGroup, 'id' | 'name'>): string {
  return resolve(output ?? deriveOutputFilename(group));
}

// ---------------------------------------------------------------------------
// Message display
// ---------------------------------------------------------------------------

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
