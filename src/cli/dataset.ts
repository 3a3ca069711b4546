/**
 * Config + dataset bootstrap shared by the CLI commands.
 */

import ora from 'ora';

import { loadConfig } from '../config.js';
import { AttackIndex } from '../knowledge/mitre-attack/attack-index.js';
import { loadDataset, type DatasetSource } from '../knowledge/mitre-attack/loader.js';
import type { MapperConfig } from '../types/config.js';
import { setLogLevel } from '../utils/logger.js';
import { toConfigOverrides, type DatasetOptions } from './options.js';

export function loadCliConfig(options: DatasetOptions): MapperConfig {
  const config = loadConfig({
    configFile: options.config,
    overrides: toConfigOverrides(options),
  });
  setLogLevel(config.logLevel);
  return config;
}

export function datasetSourceFor(config: MapperConfig): DatasetSource {
  if (config.datasetFile) {
    return { kind: 'file', path: config.datasetFile };
  }
  return { kind: 'url', url: config.datasetUrl, fallbackPath: config.fallbackFile };
}

/**
 * Load the bundle and build the index behind a spinner.
 */
export async function loadAttackIndex(config: MapperConfig): Promise<AttackIndex> {
  const source = datasetSourceFor(config);
  const spinner = ora(
    source.kind === 'file'
      ? `Loading MITRE ATT&CK data from ${source.path}...`
      : 'Loading MITRE ATT&CK data...',
  ).start();

  try {
    const dataset = await loadDataset(source, { timeoutMs: config.fetchTimeoutMs });
    spinner.text = 'Indexing MITRE ATT&CK data...';
    const index = AttackIndex.build(dataset);

    const stats = index.stats;
    spinner.succeed(
      `Loaded ${stats.groups} groups, ${stats.techniques} techniques ` +
        `(+${stats.subtechniques} sub-techniques), ${stats.tactics} tactics` +
        (index.version ? ` from ATT&CK v${index.version}` : ''),
    );
    return index;
  } catch (err) {
    spinner.fail('Failed to load MITRE ATT&CK data');
    throw err;
  }
}
