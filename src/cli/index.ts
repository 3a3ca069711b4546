#!/usr/bin/env node

/**
 * ATT&CK Group Mapper CLI
 *
 * Usage:
 *   attack-group-mapper                         (interactive)
 *   attack-group-mapper "APT1"
 *   attack-group-mapper "G0006" -o custom.json
 *   attack-group-mapper --list-groups
 *   attack-group-mapper list --data-file enterprise-attack.json
 */

import 'dotenv/config';

import { Command } from 'commander';
import { readFileSync } from 'fs';
import chalk from 'chalk';

import { MapperError } from '../utils/errors.js';
import { registerMapCommand } from './commands/map.js';
import { registerListCommand } from './commands/list.js';

const pkg: unknown = JSON.parse(
  readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'),
);
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('attack-group-mapper')
  .description('Map APT groups to MITRE ATT&CK techniques and export ATT&CK Navigator layers')
  .version(version);

registerMapCommand(program);
registerListCommand(program);

// Global error handling
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // CommanderError for help/version is expected, don't treat as error
    if (err instanceof Error && 'code' in err) {
      const { code } = err;
      if (code === 'commander.helpDisplayed' || code === 'commander.version' || code === 'commander.help') {
        return;
      }
    }

    console.error('');
    if (err instanceof MapperError) {
      console.error(chalk.red(`Error [${err.code}]: ${err.message}`));
    } else {
      console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    }
    console.error('');
    console.error(chalk.gray('Run "attack-group-mapper --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

void main();
