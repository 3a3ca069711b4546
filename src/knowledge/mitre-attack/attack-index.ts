/**
 * In-memory index over a parsed ATT&CK bundle.
 *
 * Built once per invocation and passed explicitly to the resolver and
 * mapper. Revoked and deprecated objects never enter the index, and a
 * relationship only survives when both of its endpoints did.
 */

import type {
  AttackGroup,
  AttackTactic,
  AttackTechnique,
  GroupTechniqueLink,
} from '../../types/mitre-attack.js';
import { IndexError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { cleanText } from '../../utils/text.js';
import type { StixObject } from './bundle-schema.js';
import type { AttackDataset } from './loader.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AliasCollision {
  alias: string;
  keptGroupId: string;
  droppedGroupId: string;
}

export interface IndexStats {
  groups: number;
  techniques: number;
  subtechniques: number;
  tactics: number;
  usesLinks: number;
}

// ---------------------------------------------------------------------------
// STIX helpers
// ---------------------------------------------------------------------------

function getAttackReference(obj: StixObject) {
  return obj.external_references?.find((ref) => ref.source_name === 'mitre-attack');
}

function getAttackId(obj: StixObject): string | undefined {
  return getAttackReference(obj)?.external_id;
}

function getAttackUrl(obj: StixObject): string {
  return getAttackReference(obj)?.url ?? '';
}

function isActive(obj: StixObject): boolean {
  return obj.revoked !== true && obj.x_mitre_deprecated !== true;
}

const log = createLogger('index');

// ---------------------------------------------------------------------------
// AttackIndex
// ---------------------------------------------------------------------------

export class AttackIndex {
  readonly aliasCollisions: readonly AliasCollision[];

  private constructor(
    private readonly groupsById: ReadonlyMap<string, AttackGroup>,
    private readonly nameIndex: ReadonlyMap<string, string>,
    private readonly aliasIndex: ReadonlyMap<string, string>,
    private readonly techniquesById: ReadonlyMap<string, AttackTechnique>,
    private readonly tacticsByShortName: ReadonlyMap<string, AttackTactic>,
    private readonly groupTechniqueLinks: ReadonlyMap<string, readonly GroupTechniqueLink[]>,
    aliasCollisions: AliasCollision[],
    readonly version: string | undefined,
  ) {
    this.aliasCollisions = aliasCollisions;
  }

  /**
   * Build the index from parsed collections.
   *
   * @throws {IndexError} when groups, techniques, tactics or relationships
   *   are missing entirely (empty bundle or schema drift).
   */
  static build(dataset: AttackDataset): AttackIndex {
    const intrusionSets = dataset.intrusionSets.filter(isActive);
    const attackPatterns = dataset.attackPatterns.filter(isActive);
    const tacticObjects = dataset.tactics.filter(isActive);
    const relationships = dataset.relationships.filter(isActive);

    // Tactics, in bundle order ------------------------------------------------
    const tacticsByShortName = new Map<string, AttackTactic>();
    for (const obj of tacticObjects) {
      const attackId = getAttackId(obj);
      const shortName = obj.x_mitre_shortname;
      if (!attackId || !shortName || tacticsByShortName.has(shortName)) continue;

      tacticsByShortName.set(
        shortName,
        Object.freeze({
          id: attackId,
          stixId: obj.id,
          name: cleanText(obj.name),
          shortName,
        }),
      );
    }

    // Data components, named "<Data Source>: <Component>" ---------------------
    const dataSourceNames = new Map<string, string>();
    for (const obj of dataset.dataSources.filter(isActive)) {
      if (obj.name) dataSourceNames.set(obj.id, cleanText(obj.name));
    }

    const dataComponentNames = new Map<string, string>();
    for (const obj of dataset.dataComponents.filter(isActive)) {
      if (!obj.name) continue;
      const componentName = cleanText(obj.name);
      const parent = obj.x_mitre_data_source_ref
        ? dataSourceNames.get(obj.x_mitre_data_source_ref)
        : undefined;
      dataComponentNames.set(obj.id, parent ? `${parent}: ${componentName}` : componentName);
    }

    // Techniques ---------------------------------------------------------------
    const techniqueDrafts = new Map<string, { technique: AttackTechnique; dataSources: Set<string> }>();
    const techniqueIdByStixId = new Map<string, string>();

    for (const obj of attackPatterns) {
      const attackId = getAttackId(obj);
      if (!attackId || techniqueDrafts.has(attackId)) continue;

      const tactics =
        obj.kill_chain_phases
          ?.filter((kc) => kc.kill_chain_name === 'mitre-attack')
          .map((kc) => kc.phase_name) ?? [];

      const isSubtechnique = obj.x_mitre_is_subtechnique === true;
      const parentId = isSubtechnique ? attackId.split('.')[0] : undefined;

      techniqueDrafts.set(attackId, {
        technique: {
          id: attackId,
          stixId: obj.id,
          name: cleanText(obj.name),
          description: cleanText(obj.description),
          tactics: [...new Set(tactics)],
          platforms: obj.x_mitre_platforms ?? [],
          dataSources: [],
          detection: cleanText(obj.x_mitre_detection),
          isSubtechnique,
          ...(parentId ? { parentId } : {}),
          url: getAttackUrl(obj),
        },
        dataSources: new Set(obj.x_mitre_data_sources ?? []),
      });
      techniqueIdByStixId.set(obj.id, attackId);
    }

    // Groups, names and aliases -----------------------------------------------
    const groupsById = new Map<string, AttackGroup>();
    const groupIdByStixId = new Map<string, string>();
    const nameIndex = new Map<string, string>();
    const aliasIndex = new Map<string, string>();
    const aliasCollisions: AliasCollision[] = [];

    for (const obj of intrusionSets) {
      const rawId = getAttackId(obj);
      if (!rawId) continue;
      const groupId = rawId.toUpperCase();
      if (groupsById.has(groupId)) continue;

      const name = cleanText(obj.name);
      const aliases = uniqueIgnoringCase([name, ...(obj.aliases ?? []).map((a) => cleanText(a))]);

      const group: AttackGroup = Object.freeze({
        id: groupId,
        stixId: obj.id,
        name,
        aliases,
        description: cleanText(obj.description),
        created: obj.created ?? '',
        modified: obj.modified ?? '',
        url: getAttackUrl(obj),
      });

      groupsById.set(groupId, group);
      groupIdByStixId.set(obj.id, groupId);

      const nameKey = name.toLowerCase();
      if (nameKey && !nameIndex.has(nameKey)) {
        nameIndex.set(nameKey, groupId);
      }

      for (const alias of aliases) {
        const key = alias.toLowerCase();
        if (!key) continue;

        const owner = aliasIndex.get(key);
        if (owner === undefined) {
          aliasIndex.set(key, groupId);
        } else if (owner !== groupId) {
          aliasCollisions.push({ alias, keptGroupId: owner, droppedGroupId: groupId });
          log.debug(`Alias "${alias}" claimed by ${owner} and ${groupId}; keeping ${owner}`);
        }
      }
    }

    // Objects without an ATT&CK ID were skipped above, so count what was built.
    const missing: string[] = [];
    if (groupsById.size === 0) missing.push('intrusion-set');
    if (techniqueDrafts.size === 0) missing.push('attack-pattern');
    if (tacticsByShortName.size === 0) missing.push('x-mitre-tactic');
    if (relationships.length === 0) missing.push('relationship');
    if (missing.length > 0) {
      throw new IndexError(missing);
    }

    // Relationships ------------------------------------------------------------
    const groupTechniqueLinks = new Map<string, GroupTechniqueLink[]>();

    for (const rel of relationships) {
      if (!rel.source_ref || !rel.target_ref) continue;

      const techniqueId = techniqueIdByStixId.get(rel.target_ref);
      if (!techniqueId) continue;

      if (rel.relationship_type === 'uses') {
        const groupId = groupIdByStixId.get(rel.source_ref);
        if (!groupId) continue;

        const links = groupTechniqueLinks.get(groupId) ?? [];
        links.push({ techniqueId, description: cleanText(rel.description) });
        groupTechniqueLinks.set(groupId, links);
      } else if (rel.relationship_type === 'detects') {
        const componentName = dataComponentNames.get(rel.source_ref);
        if (componentName) {
          techniqueDrafts.get(techniqueId)?.dataSources.add(componentName);
        }
      }
    }

    const techniquesById = new Map<string, AttackTechnique>();
    for (const [id, draft] of techniqueDrafts) {
      techniquesById.set(
        id,
        Object.freeze({ ...draft.technique, dataSources: [...draft.dataSources] }),
      );
    }

    if (aliasCollisions.length > 0) {
      log.debug(`${aliasCollisions.length} alias collisions resolved first-loaded-wins`);
    }

    return new AttackIndex(
      groupsById,
      nameIndex,
      aliasIndex,
      techniquesById,
      tacticsByShortName,
      groupTechniqueLinks,
      aliasCollisions,
      dataset.version,
    );
  }

  // -----------------------------------------------------------------------
  // Lookups
  // -----------------------------------------------------------------------

  getGroup(id: string): AttackGroup | undefined {
    return this.groupsById.get(id.trim().toUpperCase());
  }

  /** Group ID whose canonical name equals `name` (case-insensitive). */
  findGroupIdByName(name: string): string | undefined {
    return this.nameIndex.get(name.trim().toLowerCase());
  }

  /** Group ID owning `alias` (case-insensitive); first-loaded group wins. */
  findGroupIdByAlias(alias: string): string | undefined {
    return this.aliasIndex.get(alias.trim().toLowerCase());
  }

  getTechnique(id: string): AttackTechnique | undefined {
    return this.techniquesById.get(id);
  }

  getTactic(shortName: string): AttackTactic | undefined {
    return this.tacticsByShortName.get(shortName);
  }

  /** Position of a tactic in bundle order; unknown tactics sort last. */
  tacticRank(shortName: string): number {
    let rank = 0;
    for (const key of this.tacticsByShortName.keys()) {
      if (key === shortName) return rank;
      rank++;
    }
    return Number.MAX_SAFE_INTEGER;
  }

  /**
   * Raw "uses" links for a group, in bundle order. May contain the same
   * technique more than once when the bundle has duplicate edges.
   */
  getGroupTechniqueLinks(groupId: string): readonly GroupTechniqueLink[] {
    return this.groupTechniqueLinks.get(groupId) ?? [];
  }

  /** All groups sorted by ATT&CK ID. */
  listGroups(): AttackGroup[] {
    return [...this.groupsById.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  listTactics(): AttackTactic[] {
    return [...this.tacticsByShortName.values()];
  }

  get stats(): IndexStats {
    let subtechniques = 0;
    for (const technique of this.techniquesById.values()) {
      if (technique.isSubtechnique) subtechniques++;
    }

    let usesLinks = 0;
    for (const links of this.groupTechniqueLinks.values()) {
      usesLinks += links.length;
    }

    return {
      groups: this.groupsById.size,
      techniques: this.techniquesById.size - subtechniques,
      subtechniques,
      tactics: this.tacticsByShortName.size,
      usesLinks,
    };
  }
}

function uniqueIgnoringCase(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (!value || seen.has(key)) continue;
    seen.add(key);
    result.push(value);
  }
  return result;
}
