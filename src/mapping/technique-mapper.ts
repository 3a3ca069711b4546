/**
 * Group → technique mapping.
 *
 * Walks a group's "uses" links, resolves each technique through the index
 * and aggregates the tactics, platforms and data sources the group's
 * techniques touch.
 */

import type { AttackIndex } from '../knowledge/mitre-attack/attack-index.js';
import type {
  AttackGroup,
  MappedTechnique,
  MappingResult,
  TacticUsage,
} from '../types/mitre-attack.js';
import { titleCase } from '../utils/text.js';

/**
 * Build the {@link MappingResult} for `group`.
 *
 * Techniques are deduplicated by ID (the first edge's procedure text is
 * kept) and ordered by ID. A group with no links yields an empty result.
 * A technique listing several tactics counts once towards each of them.
 */
export function mapGroupTechniques(index: AttackIndex, group: AttackGroup): MappingResult {
  const byId = new Map<string, MappedTechnique>();

  for (const link of index.getGroupTechniqueLinks(group.id)) {
    const existing = byId.get(link.techniqueId);
    if (existing) {
      if (!existing.procedure && link.description) {
        existing.procedure = link.description;
      }
      continue;
    }

    const technique = index.getTechnique(link.techniqueId);
    if (!technique) continue;

    byId.set(link.techniqueId, { technique, procedure: link.description });
  }

  const techniques = [...byId.values()].sort((a, b) =>
    compareTechniqueIds(a.technique.id, b.technique.id),
  );

  const tacticCounts = new Map<string, number>();
  const platforms = new Set<string>();
  const dataSources = new Set<string>();
  let subtechniqueCount = 0;

  for (const { technique } of techniques) {
    for (const tactic of technique.tactics) {
      tacticCounts.set(tactic, (tacticCounts.get(tactic) ?? 0) + 1);
    }
    for (const platform of technique.platforms) platforms.add(platform);
    for (const source of technique.dataSources) dataSources.add(source);
    if (technique.isSubtechnique) subtechniqueCount++;
  }

  const tactics: TacticUsage[] = [...tacticCounts.entries()]
    .map(([shortName, count]) => ({
      shortName,
      name: index.getTactic(shortName)?.name ?? titleCase(shortName),
      count,
    }))
    .sort(
      (a, b) =>
        index.tacticRank(a.shortName) - index.tacticRank(b.shortName) ||
        (a.name < b.name ? -1 : a.name > b.name ? 1 : 0),
    );

  return {
    group,
    techniques,
    tactics,
    platforms: [...platforms].sort(),
    dataSources: [...dataSources].sort(),
    subtechniqueCount,
  };
}

/**
 * Order "T1059" before "T1059.001" before "T1071".
 */
function compareTechniqueIds(a: string, b: string): number {
  const [aBase, aSub = ''] = a.split('.');
  const [bBase, bSub = ''] = b.split('.');
  if (aBase !== bBase) return aBase < bBase ? -1 : 1;
  if (aSub === bSub) return 0;
  return aSub < bSub ? -1 : 1;
}
