/**
 * List command: every group in the dataset with its leading aliases.
 */

import type { Command } from 'commander';

import { printGroupList } from '../../reporting/group-report.js';
import { loadAttackIndex, loadCliConfig } from '../dataset.js';
import { addDatasetOptions, type DatasetOptions } from '../options.js';

export function registerListCommand(program: Command): void {
  const cmd = program
    .command('list')
    .description('List all APT groups in MITRE ATT&CK');

  addDatasetOptions(cmd).action(async (options: DatasetOptions) => {
    await runList(options);
  });
}

export async function runList(options: DatasetOptions): Promise<number> {
  const config = loadCliConfig(options);
  const index = await loadAttackIndex(config);
  const groups = index.listGroups();
  printGroupList(groups);
  return groups.length;
}
