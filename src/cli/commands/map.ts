/**
 * Map command: resolve a group, print its analysis and write a Navigator layer.
 *
 * This is the default command, so `attack-group-mapper "APT1"` and
 * `attack-group-mapper map "APT1"` are equivalent.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import type { AttackIndex } from '../../knowledge/mitre-attack/attack-index.js';
import { GroupResolver, type Resolution } from '../../knowledge/mitre-attack/group-resolver.js';
import { mapGroupTechniques } from '../../mapping/technique-mapper.js';
import { formatSuggestions, printGroupList, printGroupReport } from '../../reporting/group-report.js';
import { emitLayer, writeLayerFile } from '../../reporting/navigator-layer.js';
import { NotFoundError } from '../../utils/errors.js';
import { loadAttackIndex, loadCliConfig } from '../dataset.js';
import {
  addDatasetOptions,
  printError,
  printInfo,
  printSuccess,
  printWarning,
  resolveOutputFile,
  type DatasetOptions,
} from '../options.js';
import { GroupPrompt, printPromptGuide, type PromptStreams } from '../prompt.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MapOptions extends DatasetOptions {
  output?: string;
  listGroups?: boolean;
  interactive?: boolean;
}

export interface MapDependencies {
  /** Source of interactive answers; defaults to a {@link GroupPrompt}. */
  prompt?: () => Promise<string>;
  /** Streams for the default prompt (stdin/stdout when omitted). */
  promptStreams?: PromptStreams;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerMapCommand(program: Command): void {
  const cmd = program
    .command('map', { isDefault: true })
    .description('Map an APT group to its ATT&CK techniques and export a Navigator layer')
    .argument('[group]', 'Group name, ATT&CK ID or alias (prompts when omitted)')
    .option('-o, --output <file>', 'Output layer file (default: <group>_navigator_layer.json)')
    .option('--list-groups', 'List all available groups and exit')
    .option('--interactive', 'Prompt for the group even if one is given');

  addDatasetOptions(cmd).action(async (group: string | undefined, options: MapOptions) => {
    await runMap(group, options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

/**
 * @returns the written layer path, or `undefined` when no layer was written
 *   (listing mode, or an unresolved group in non-interactive mode).
 */
export async function runMap(
  groupArg: string | undefined,
  options: MapOptions,
  deps: MapDependencies = {},
): Promise<string | undefined> {
  const config = loadCliConfig(options);

  printBanner();

  const index = await loadAttackIndex(config);

  if (options.listGroups) {
    printGroupList(index.listGroups());
    return undefined;
  }

  const interactive = options.interactive === true || !groupArg;

  if (interactive) {
    printPromptGuide();
  }

  // One prompt for the whole session so buffered answers survive a re-prompt.
  const groupPrompt = new GroupPrompt(deps.promptStreams);
  const prompt = deps.prompt ?? (() => groupPrompt.ask());
  const resolver = new GroupResolver(index, config.resolver);

  let resolution: Resolution | undefined;
  try {
    resolution = await resolveQuery(resolver, index, interactive ? undefined : groupArg, prompt);
  } finally {
    groupPrompt.close();
  }

  if (!resolution) {
    process.exitCode = 1;
    return undefined;
  }

  reportResolution(resolution);

  const mapping = mapGroupTechniques(index, resolution.group);
  printSuccess(`Mapped ${chalk.bold(String(mapping.techniques.length))} techniques`);
  printGroupReport(mapping);

  const layer = emitLayer(mapping, {
    score: config.layer.score,
    color: config.layer.color,
    attackVersion: index.version,
  });

  const outputPath = resolveOutputFile(options.output, resolution.group);
  writeLayerFile(outputPath, layer);

  console.log('');
  printSuccess(`Navigator layer saved to: ${chalk.bold(outputPath)}`);
  printSuccess('JSON validation: file structure is valid');
  printInfo('Import into MITRE ATT&CK Navigator with "Open Existing Layer":');
  printInfo('https://mitre-attack.github.io/attack-navigator/');
  console.log('');

  return outputPath;
}

/**
 * Resolve `groupArg`, or prompted answers when it is undefined. A miss on a
 * given argument returns `undefined`; a miss on a prompted answer asks again.
 */
async function resolveQuery(
  resolver: GroupResolver,
  index: AttackIndex,
  groupArg: string | undefined,
  prompt: () => Promise<string>,
): Promise<Resolution | undefined> {
  let query = groupArg ?? (await prompt());

  for (;;) {
    console.log('');
    printInfo(`Searching for group: ${chalk.bold(query)}`);

    try {
      return resolver.resolve(query);
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;

      printError(err.message);
      console.log(formatSuggestions(err.suggestions, index.listGroups()));
      console.log('');

      if (groupArg !== undefined) return undefined;
      query = await prompt();
    }
  }
}

// ---------------------------------------------------------------------------
// Display Helpers
// ---------------------------------------------------------------------------

function printBanner(): void {
  console.log('');
  console.log(chalk.bold.cyan('  ATT&CK Group Mapper: Navigator Layer Export'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

function reportResolution(resolution: Resolution): void {
  switch (resolution.matchedBy) {
    case 'id':
      printSuccess(`Found by ATT&CK ID: ${resolution.matchedOn}`);
      break;
    case 'name':
      printSuccess(`Found by name: ${resolution.matchedOn}`);
      break;
    case 'alias':
      printSuccess(`Found by alias: ${resolution.matchedOn} (${resolution.group.name})`);
      break;
    case 'fuzzy':
      printWarning(
        `Closest match: ${resolution.group.name} via "${resolution.matchedOn}" ` +
          `(similarity ${resolution.score.toFixed(2)})`,
      );
      break;
  }
}
