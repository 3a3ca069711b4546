/**
 * Error taxonomy for the mapper pipeline.
 *
 * Every failure carries a stable `code` so the CLI can pick an exit message
 * without string matching. Only {@link NotFoundError} has a recovery path
 * (suggestions, re-prompt); the rest end the invocation.
 */

import type { AttackGroup } from '../types/mitre-attack.js';

export type MapperErrorCode =
  | 'FETCH_FAILED'
  | 'PARSE_FAILED'
  | 'INDEX_INCOMPLETE'
  | 'GROUP_NOT_FOUND'
  | 'LAYER_INVALID'
  | 'CONFIG_INVALID';

export abstract class MapperError extends Error {
  abstract readonly code: MapperErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport failure while obtaining the dataset (network, timeout, HTTP status, unreadable file). */
export class FetchError extends MapperError {
  readonly code = 'FETCH_FAILED';

  constructor(
    message: string,
    public readonly source: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The dataset bytes are not a well-formed STIX bundle. */
export class ParseError extends MapperError {
  readonly code = 'PARSE_FAILED';
}

/** The bundle parsed but lacks entity types the index needs. */
export class IndexError extends MapperError {
  readonly code = 'INDEX_INCOMPLETE';

  constructor(public readonly missingTypes: string[]) {
    super(`ATT&CK bundle is missing required object types: ${missingTypes.join(', ')}`);
  }
}

export interface GroupSuggestion {
  group: AttackGroup;
  /** The name or alias that scored best for this group. */
  matchedOn: string;
  score: number;
}

export class NotFoundError extends MapperError {
  readonly code = 'GROUP_NOT_FOUND';

  constructor(
    public readonly query: string,
    public readonly suggestions: GroupSuggestion[],
  ) {
    super(`APT group "${query}" not found in MITRE ATT&CK data`);
  }
}

export class ValidationError extends MapperError {
  readonly code = 'LAYER_INVALID';

  constructor(public readonly issues: string[]) {
    super(`Navigator layer failed validation: ${issues.join('; ')}`);
  }
}

export class ConfigError extends MapperError {
  readonly code = 'CONFIG_INVALID';
}

/**
 * Render an unknown thrown value as a single line.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
