/**
 * Terminal renderers for group analysis, the group listing and
 * not-found suggestions.
 *
 * Each `format*` function returns a string so it can be asserted on; the
 * `print*` wrappers write it to stdout.
 */

import chalk from 'chalk';

import type { AttackGroup, MappingResult } from '../types/mitre-attack.js';
import type { GroupSuggestion } from '../utils/errors.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const RULE = '─'.repeat(60);
const WIDE_RULE = '─'.repeat(90);

/** Aliases shown per row in the group listing before "(+N more)". */
const LIST_ALIAS_LIMIT = 3;

/** Groups shown when a lookup fails and nothing is similar enough to suggest. */
export const SAMPLE_GROUP_COUNT = 10;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Group profile, statistics, tactic counts and platforms for one mapping.
 */
export function formatGroupReport(mapping: MappingResult): string {
  const { group } = mapping;
  const lines: string[] = [];

  lines.push('');
  lines.push(chalk.bold.magenta('  GROUP ANALYSIS RESULTS'));
  lines.push(chalk.gray(`  ${RULE}`));

  lines.push(chalk.bold('  Group Profile'));
  lines.push(`    ${chalk.bold('Name:')}         ${group.name}`);
  lines.push(`    ${chalk.bold('ATT&CK ID:')}    ${chalk.blue(group.id)}`);
  lines.push(`    ${chalk.bold('Aliases:')}      ${otherAliases(group).join(', ') || 'None'}`);
  lines.push(`    ${chalk.bold('First Seen:')}   ${formatDate(group.created)}`);
  lines.push(`    ${chalk.bold('Last Updated:')} ${formatDate(group.modified)}`);
  lines.push('');

  lines.push(chalk.bold('  Attack Statistics'));
  lines.push(`    ${chalk.green('Total Techniques:')}   ${chalk.bold(String(mapping.techniques.length))}`);
  lines.push(`    ${chalk.green('Sub-techniques:')}     ${chalk.bold(String(mapping.subtechniqueCount))}`);
  lines.push(`    ${chalk.greenBright('Tactics Covered:')}    ${chalk.bold(String(mapping.tactics.length))}`);
  lines.push(`    ${chalk.cyan('Platforms Targeted:')} ${chalk.bold(String(mapping.platforms.length))}`);
  lines.push(`    ${chalk.yellow('Data Sources:')}       ${chalk.bold(String(mapping.dataSources.length))}`);
  lines.push('');

  if (mapping.techniques.length === 0) {
    lines.push(chalk.yellow(`  No techniques are attributed to ${group.name} in this dataset.`));
    lines.push(chalk.gray(`  ${RULE}`));
    return lines.join('\n');
  }

  lines.push(chalk.bold('  Tactics Used'));
  for (const tactic of mapping.tactics) {
    lines.push(`    ${chalk.greenBright(tactic.name.padEnd(24))} ${pluralize(tactic.count, 'technique')}`);
  }
  lines.push('');

  lines.push(chalk.bold('  Target Platforms'));
  for (const platform of mapping.platforms) {
    lines.push(`    ${chalk.cyan(platform)}`);
  }
  lines.push(chalk.gray(`  ${RULE}`));

  return lines.join('\n');
}

export function printGroupReport(mapping: MappingResult): void {
  console.log(formatGroupReport(mapping));
}

/**
 * Table of groups: ID, name and the first few aliases.
 */
export function formatGroupList(groups: AttackGroup[]): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(chalk.bold.magenta(`  Available APT Groups in MITRE ATT&CK (${groups.length} total)`));
  lines.push(chalk.gray(`  ${WIDE_RULE}`));
  lines.push(chalk.bold(`  ${'ID'.padEnd(10)} ${'Name'.padEnd(35)} Aliases`));
  lines.push(chalk.gray(`  ${WIDE_RULE}`));

  for (const group of groups) {
    const aliases = otherAliases(group);
    let aliasText = aliases.slice(0, LIST_ALIAS_LIMIT).join(', ');
    if (aliases.length > LIST_ALIAS_LIMIT) {
      aliasText += ` (+${aliases.length - LIST_ALIAS_LIMIT} more)`;
    }

    lines.push(
      `  ${chalk.blue(group.id.padEnd(10))} ${chalk.bold(group.name.padEnd(35))} ${chalk.cyan(aliasText)}`,
    );
  }

  return lines.join('\n');
}

export function printGroupList(groups: AttackGroup[]): void {
  console.log(formatGroupList(groups));
}

/**
 * "Did you mean" block for a failed lookup. Falls back to a sample of
 * groups (by ID) when there are no suggestions.
 */
export function formatSuggestions(suggestions: GroupSuggestion[], sample: AttackGroup[]): string {
  const lines: string[] = [];

  if (suggestions.length > 0) {
    lines.push(chalk.yellow('  Did you mean one of these?'));
    for (const { group, matchedOn } of suggestions) {
      const via = matchedOn !== group.name ? ` (alias: ${matchedOn})` : '';
      lines.push(`    ${chalk.cyan(`${group.id} - ${group.name}${via}`)}`);
    }
  } else {
    lines.push(chalk.cyan('  Sample available groups:'));
    for (const group of sample.slice(0, SAMPLE_GROUP_COUNT)) {
      lines.push(`    ${chalk.blue(`${group.id} - ${group.name}`)}`);
    }
  }

  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function otherAliases(group: AttackGroup): string[] {
  return group.aliases.filter((alias) => alias !== group.name);
}

/** STIX timestamps are ISO 8601; keep the date part. */
function formatDate(timestamp: string): string {
  return timestamp ? timestamp.slice(0, 10) : 'Unknown';
}

function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
