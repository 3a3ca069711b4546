/**
 * Unit tests for GroupResolver.
 *
 * Tests: resolve (ID, name, alias, fuzzy, not found), rank ordering,
 * threshold and suggestion options, determinism over every fixture group
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { AttackIndex } from '@/knowledge/mitre-attack/attack-index.js';
import { GroupResolver } from '@/knowledge/mitre-attack/group-resolver.js';
import { parseBundle } from '@/knowledge/mitre-attack/loader.js';
import { NotFoundError } from '@/utils/errors.js';
import { setLogLevel } from '@/utils/logger.js';
import { buildAttackIndex, buildStixBundle } from '../../../fixtures/stix-bundle.js';

let index: AttackIndex;
let resolver: GroupResolver;

beforeAll(() => {
  setLogLevel('error');
  index = buildAttackIndex();
  resolver = new GroupResolver(index);
});

function catchNotFound(fn: () => unknown): NotFoundError {
  try {
    fn();
  } catch (err) {
    if (err instanceof NotFoundError) return err;
    throw err;
  }
  throw new Error('expected NotFoundError');
}

// ---------------------------------------------------------------------------
// Exact lookups
// ---------------------------------------------------------------------------

describe('resolve: exact', () => {
  it('matches an ATT&CK ID case-insensitively', () => {
    expect(resolver.resolve('g0006')).toMatchObject({
      group: { id: 'G0006', name: 'APT1' },
      matchedBy: 'id',
      matchedOn: 'G0006',
      score: 1,
    });
  });

  it('matches a canonical name after trimming', () => {
    expect(resolver.resolve('  apt28 ')).toMatchObject({
      group: { id: 'G0007' },
      matchedBy: 'name',
      matchedOn: 'APT28',
    });
  });

  it('matches an alias and reports it with its original casing', () => {
    expect(resolver.resolve('hidden cobra')).toMatchObject({
      group: { id: 'G0032' },
      matchedBy: 'alias',
      matchedOn: 'HIDDEN COBRA',
      score: 1,
    });
  });

  it('gives a shared alias to the first-loaded group', () => {
    expect(resolver.resolve('COMMENT CREW')).toMatchObject({
      group: { id: 'G0006' },
      matchedBy: 'alias',
      matchedOn: 'Comment Crew',
    });
  });
});

// ---------------------------------------------------------------------------
// Fuzzy lookups
// ---------------------------------------------------------------------------

describe('resolve: fuzzy', () => {
  it('accepts a candidate scoring above the threshold', () => {
    const resolution = resolver.resolve('Lazarus Grup');

    expect(resolution.matchedBy).toBe('fuzzy');
    expect(resolution.group.id).toBe('G0032');
    expect(resolution.matchedOn).toBe('Lazarus Group');
    expect(resolution.score).toBeCloseTo(12 / 13);
  });

  it('rejects a near miss at the default threshold and suggests candidates', () => {
    const err = catchNotFound(() => resolver.resolve('Aptt1'));

    expect(err.message).toBe('APT group "Aptt1" not found in MITRE ATT&CK data');
    expect(err.query).toBe('Aptt1');
    expect(err.suggestions.map((s) => [s.group.id, s.matchedOn])).toEqual([
      ['G0006', 'APT1'],
      ['G0007', 'APT28'],
    ]);
    expect(err.suggestions[0]?.score).toBeCloseTo(0.8);
    expect(err.suggestions[1]?.score).toBeCloseTo(0.6);
  });

  it('accepts the same near miss with a lower threshold', () => {
    const lenient = new GroupResolver(index, { threshold: 0.75 });

    expect(lenient.resolve('Aptt1')).toMatchObject({
      group: { id: 'G0006' },
      matchedBy: 'fuzzy',
      matchedOn: 'APT1',
    });
  });

  it('does not accept a score equal to the threshold', () => {
    const strict = new GroupResolver(index, { threshold: 0.8 });

    expect(() => strict.resolve('Aptt1')).toThrow(NotFoundError);
  });

  it('limits suggestions by count and minimum score', () => {
    const single = new GroupResolver(index, { maxSuggestions: 1 });
    const picky = new GroupResolver(index, { minSuggestionScore: 0.7 });

    expect(catchNotFound(() => single.resolve('Aptt1')).suggestions).toHaveLength(1);
    expect(catchNotFound(() => picky.resolve('Aptt1')).suggestions.map((s) => s.group.id)).toEqual(['G0006']);
  });

  it('never resolves deprecated groups', () => {
    expect(() => resolver.resolve('Old Group')).toThrow(NotFoundError);
  });

  it('rejects a blank query without suggestions', () => {
    const err = catchNotFound(() => resolver.resolve('   '));

    expect(err.suggestions).toEqual([]);
    expect(err.code).toBe('GROUP_NOT_FOUND');
  });
});

// ---------------------------------------------------------------------------
// rank
// ---------------------------------------------------------------------------

describe('rank', () => {
  it('scores each group by its best name or alias', () => {
    const ranked = resolver.rank('comment');

    expect(ranked).toHaveLength(4);
    expect(ranked[0]).toMatchObject({ group: { id: 'G0006' }, matchedOn: 'Comment Crew' });
    expect(ranked[0]?.score).toBeCloseTo(7 / 12);
  });

  it('breaks score ties by group name', () => {
    const [first, second] = resolver.rank('comment');

    expect(first?.score).toBe(second?.score);
    expect([first?.group.name, second?.group.name]).toEqual(['APT1', 'Lazarus Group']);
  });

  it('orders tied names alphabetically regardless of case', () => {
    const bundle = buildStixBundle();
    const extra = [
      { id: 'G0901', name: 'Zeta' },
      { id: 'G0902', name: 'beta' },
    ];
    for (const { id, name } of extra) {
      bundle.objects.push({
        type: 'intrusion-set',
        id: `intrusion-set--${id.toLowerCase()}`,
        name,
        external_references: [{ source_name: 'mitre-attack', external_id: id }],
      });
    }
    const extended = new GroupResolver(AttackIndex.build(parseBundle(JSON.stringify(bundle))));

    const [first, second] = extended.rank('eta');

    expect(first?.score).toBeCloseTo(0.75);
    expect(second?.score).toBeCloseTo(0.75);
    expect([first?.group.name, second?.group.name]).toEqual(['beta', 'Zeta']);
  });

  it('sorts by descending score', () => {
    const scores = resolver.rank('apt').map((s) => s.score);

    expect(scores).toEqual([...scores].sort((a, b) => b - a));
  });
});

// ---------------------------------------------------------------------------
// Stability
// ---------------------------------------------------------------------------

describe('resolve: stability', () => {
  it('returns the same result for repeated queries', () => {
    for (const query of ['APT1', 'comment crew', 'Lazarus Grup']) {
      expect(resolver.resolve(query)).toEqual(resolver.resolve(query));
    }

    const first = catchNotFound(() => resolver.resolve('Aptt1')).suggestions;
    const second = catchNotFound(() => resolver.resolve('Aptt1')).suggestions;
    expect(second).toEqual(first);
  });

  it('returns the same group object for a name and its alias', () => {
    expect(resolver.resolve('Comment Crew').group).toBe(resolver.resolve('APT1').group);
  });

  it('resolves every group by its ID, its name and each alias it owns', () => {
    for (const group of index.listGroups()) {
      expect(resolver.resolve(group.id).group).toBe(group);
      expect(resolver.resolve(group.name).group).toBe(group);

      for (const alias of group.aliases) {
        if (index.findGroupIdByAlias(alias) !== group.id) continue;
        expect(resolver.resolve(alias).group).toBe(group);
      }
    }
  });
});
