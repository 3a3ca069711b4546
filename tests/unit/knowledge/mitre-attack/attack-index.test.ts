/**
 * Unit tests for AttackIndex.
 *
 * Tests: build (filtering, aliases, techniques, relationships), lookups,
 * listGroups, tacticRank, stats, IndexError
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { AttackIndex } from '@/knowledge/mitre-attack/attack-index.js';
import { parseBundle } from '@/knowledge/mitre-attack/loader.js';
import { IndexError } from '@/utils/errors.js';
import { setLogLevel } from '@/utils/logger.js';
import { buildAttackIndex, buildStixBundle } from '../../../fixtures/stix-bundle.js';

let index: AttackIndex;

beforeAll(() => {
  setLogLevel('error');
  index = buildAttackIndex();
});

// ---------------------------------------------------------------------------
// Groups
// ---------------------------------------------------------------------------

describe('groups', () => {
  it('indexes groups by upper-case ATT&CK ID', () => {
    const group = index.getGroup(' g0006 ');

    expect(group).toMatchObject({
      id: 'G0006',
      stixId: 'intrusion-set--g0006',
      name: 'APT1',
      description: 'APT1 is a threat group used in tests.',
      created: '2017-05-31T21:31:47.955Z',
      url: 'https://attack.mitre.org/groups/G0006',
    });
  });

  it('puts the canonical name first in the alias list without duplicates', () => {
    expect(index.getGroup('G0006')?.aliases).toEqual(['APT1', 'Comment Crew', 'Comment Group']);
  });

  it('gives a group without aliases its name as the only alias', () => {
    expect(index.getGroup('G0050')?.aliases).toEqual(['Quiet Group']);
  });

  it('excludes deprecated groups', () => {
    expect(index.getGroup('G0099')).toBeUndefined();
    expect(index.findGroupIdByName('Old Group')).toBeUndefined();
  });

  it('freezes group records', () => {
    expect(Object.isFrozen(index.getGroup('G0007'))).toBe(true);
  });

  it('finds groups by name and alias case-insensitively', () => {
    expect(index.findGroupIdByName('lazarus group')).toBe('G0032');
    expect(index.findGroupIdByAlias('hidden cobra')).toBe('G0032');
    expect(index.findGroupIdByAlias('FANCY BEAR')).toBe('G0007');
  });

  it('keeps the first-loaded owner of a shared alias and records the collision', () => {
    expect(index.findGroupIdByAlias('Comment Crew')).toBe('G0006');
    expect(index.aliasCollisions).toEqual([
      { alias: 'Comment Crew', keptGroupId: 'G0006', droppedGroupId: 'G0032' },
    ]);
  });

  it('lists groups sorted by ID', () => {
    expect(index.listGroups().map((g) => g.id)).toEqual(['G0006', 'G0007', 'G0032', 'G0050']);
  });
});

// ---------------------------------------------------------------------------
// Techniques and tactics
// ---------------------------------------------------------------------------

describe('techniques', () => {
  it('reads tactics from mitre-attack kill chain phases only', () => {
    expect(index.getTechnique('T1547')?.tactics).toEqual(['persistence', 'privilege-escalation']);
  });

  it('links sub-techniques to their parent', () => {
    expect(index.getTechnique('T1059.001')).toMatchObject({
      name: 'PowerShell',
      isSubtechnique: true,
      parentId: 'T1059',
    });
    expect(index.getTechnique('T1059')?.parentId).toBeUndefined();
  });

  it('merges declared data sources with detecting data components', () => {
    expect(index.getTechnique('T1059')?.dataSources).toEqual(['Process: Process Creation']);
    expect(index.getTechnique('T1059.001')?.dataSources).toEqual(['Command: Command Execution']);
  });

  it('cleans markup and whitespace from descriptions', () => {
    expect(index.getTechnique('T1071')?.description).toBe('Uses HTTP & HTTPS for C2.');
  });

  it('excludes revoked techniques', () => {
    expect(index.getTechnique('T1000')).toBeUndefined();
  });

  it('keeps tactics in bundle order', () => {
    expect(index.listTactics().map((t) => t.shortName)).toEqual([
      'initial-access',
      'execution',
      'persistence',
      'command-and-control',
    ]);
    expect(index.getTactic('command-and-control')).toMatchObject({ id: 'TA0011', name: 'Command and Control' });
  });

  it('ranks tactics by bundle position, unknown tactics last', () => {
    expect(index.tacticRank('initial-access')).toBe(0);
    expect(index.tacticRank('persistence')).toBe(2);
    expect(index.tacticRank('privilege-escalation')).toBe(Number.MAX_SAFE_INTEGER);
  });
});

// ---------------------------------------------------------------------------
// Relationships
// ---------------------------------------------------------------------------

describe('group technique links', () => {
  it('keeps duplicate edges and drops edges to revoked techniques', () => {
    expect(index.getGroupTechniqueLinks('G0006').map((l) => l.techniqueId)).toEqual([
      'T1566',
      'T1059.001',
      'T1059',
      'T1059',
      'T1547',
    ]);
  });

  it('drops revoked relationships', () => {
    expect(index.getGroupTechniqueLinks('G0007').map((l) => l.techniqueId)).toEqual(['T1071', 'T1059']);
  });

  it('returns no links for a group without techniques', () => {
    expect(index.getGroupTechniqueLinks('G0050')).toEqual([]);
  });
});

describe('stats and version', () => {
  it('counts indexed entities', () => {
    expect(index.stats).toEqual({
      groups: 4,
      techniques: 4,
      subtechniques: 1,
      tactics: 4,
      usesLinks: 8,
    });
  });

  it('exposes the bundle version', () => {
    expect(index.version).toBe('15.1');
  });
});

// ---------------------------------------------------------------------------
// Incomplete bundles
// ---------------------------------------------------------------------------

describe('IndexError', () => {
  it('names every missing object type', () => {
    const bundle = buildStixBundle();
    bundle.objects = bundle.objects.filter(
      (obj) => obj.type !== 'x-mitre-tactic' && obj.type !== 'relationship',
    );

    expect(() => AttackIndex.build(parseBundle(JSON.stringify(bundle)))).toThrow(
      'ATT&CK bundle is missing required object types: x-mitre-tactic, relationship',
    );
  });

  it('treats a bundle of only deprecated groups as having no groups', () => {
    const bundle = buildStixBundle();
    bundle.objects = bundle.objects.filter(
      (obj) => obj.type !== 'intrusion-set' || obj.x_mitre_deprecated === true,
    );

    let caught: unknown;
    try {
      AttackIndex.build(parseBundle(JSON.stringify(bundle)));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(IndexError);
    expect(caught).toMatchObject({ code: 'INDEX_INCOMPLETE', missingTypes: ['intrusion-set'] });
  });

  it('counts only groups that carry an ATT&CK ID', () => {
    const bundle = buildStixBundle();
    bundle.objects = bundle.objects.map((obj) =>
      obj.type === 'intrusion-set'
        ? { ...obj, external_references: [{ source_name: 'other-source', external_id: 'X-1' }] }
        : obj,
    );

    expect(() => AttackIndex.build(parseBundle(JSON.stringify(bundle)))).toThrow(
      'ATT&CK bundle is missing required object types: intrusion-set',
    );
  });
});
