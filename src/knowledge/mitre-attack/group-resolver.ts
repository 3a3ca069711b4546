/**
 * Resolves a free-text query to a single ATT&CK group.
 *
 * Lookup order, first hit wins:
 *   1. exact ATT&CK ID ("G0006")
 *   2. exact canonical name ("APT1")
 *   3. exact alias ("Comment Crew")
 *   4. fuzzy match above the acceptance threshold
 *
 * All exact steps are case-insensitive. When nothing is accepted a
 * {@link NotFoundError} carries the closest candidates as suggestions.
 */

import type { AttackGroup } from '../../types/mitre-attack.js';
import { NotFoundError, type GroupSuggestion } from '../../utils/errors.js';
import type { AttackIndex } from './attack-index.js';
import { similarity } from './similarity.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MatchKind = 'id' | 'name' | 'alias' | 'fuzzy';

export interface Resolution {
  group: AttackGroup;
  matchedBy: MatchKind;
  /** The identifier, name or alias that matched. */
  matchedOn: string;
  score: number;
}

export interface ResolverOptions {
  /** A fuzzy match is accepted only when its score is strictly above this. */
  threshold?: number;
  maxSuggestions?: number;
  /** Candidates scoring below this are not offered as suggestions. */
  minSuggestionScore?: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_MATCH_THRESHOLD = 0.9;
export const DEFAULT_MAX_SUGGESTIONS = 5;
export const DEFAULT_MIN_SUGGESTION_SCORE = 0.4;

// ---------------------------------------------------------------------------
// GroupResolver
// ---------------------------------------------------------------------------

export class GroupResolver {
  private readonly threshold: number;
  private readonly maxSuggestions: number;
  private readonly minSuggestionScore: number;

  constructor(
    private readonly index: AttackIndex,
    options: ResolverOptions = {},
  ) {
    this.threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
    this.maxSuggestions = options.maxSuggestions ?? DEFAULT_MAX_SUGGESTIONS;
    this.minSuggestionScore = options.minSuggestionScore ?? DEFAULT_MIN_SUGGESTION_SCORE;
  }

  /**
   * @throws {NotFoundError} when no exact match exists and the best fuzzy
   *   candidate does not clear the threshold.
   */
  resolve(query: string): Resolution {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new NotFoundError(query, []);
    }

    const byId = this.index.getGroup(trimmed);
    if (byId) {
      return { group: byId, matchedBy: 'id', matchedOn: byId.id, score: 1 };
    }

    const byName = this.lookup(this.index.findGroupIdByName(trimmed));
    if (byName) {
      return { group: byName, matchedBy: 'name', matchedOn: byName.name, score: 1 };
    }

    const byAlias = this.lookup(this.index.findGroupIdByAlias(trimmed));
    if (byAlias) {
      const lower = trimmed.toLowerCase();
      const matchedOn = byAlias.aliases.find((a) => a.toLowerCase() === lower) ?? trimmed;
      return { group: byAlias, matchedBy: 'alias', matchedOn, score: 1 };
    }

    const ranked = this.rank(trimmed);
    const best = ranked[0];
    if (best && best.score > this.threshold) {
      return { group: best.group, matchedBy: 'fuzzy', matchedOn: best.matchedOn, score: best.score };
    }

    const suggestions = ranked
      .filter((candidate) => candidate.score >= this.minSuggestionScore)
      .slice(0, this.maxSuggestions);

    throw new NotFoundError(trimmed, suggestions);
  }

  /**
   * Score every group against `query` (best of its name and aliases) and
   * sort by descending score, then name, then ID.
   */
  rank(query: string): GroupSuggestion[] {
    const candidates: GroupSuggestion[] = [];

    for (const group of this.index.listGroups()) {
      let best: GroupSuggestion | undefined;
      for (const key of group.aliases) {
        const score = similarity(query, key);
        if (!best || score > best.score) {
          best = { group, matchedOn: key, score };
        }
      }
      if (best) candidates.push(best);
    }

    return candidates.sort(
      (a, b) =>
        b.score - a.score ||
        compareNames(a.group.name, b.group.name) ||
        compareStrings(a.group.id, b.group.id),
    );
  }

  private lookup(groupId: string | undefined): AttackGroup | undefined {
    return groupId === undefined ? undefined : this.index.getGroup(groupId);
  }
}

/** Alphabetical, ignoring case; names differing only in case fall back to code units. */
function compareNames(a: string, b: string): number {
  return a.localeCompare(b, 'en', { sensitivity: 'base' }) || compareStrings(a, b);
}

/** Code-unit ordering, independent of locale. */
function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
