/**
 * Obtains the Enterprise ATT&CK STIX bundle and splits it into the typed
 * collections the index consumes.
 *
 * One attempt per source, no retries. Transport problems surface as
 * {@link FetchError}, malformed bundles as {@link ParseError}.
 */

import { readFile } from 'node:fs/promises';

import { describeError, FetchError, ParseError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import {
  isIndexedType,
  StixBundleEnvelopeSchema,
  StixObjectSchema,
  type StixObject,
} from './bundle-schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AttackDataset {
  intrusionSets: StixObject[];
  attackPatterns: StixObject[];
  tactics: StixObject[];
  relationships: StixObject[];
  dataSources: StixObject[];
  dataComponents: StixObject[];
  /** ATT&CK release from the bundle's x-mitre-collection, e.g. "15.1". */
  version?: string;
  /** Where the bytes came from (URL, file path or "inline"). */
  origin: string;
  objectCount: number;
  /** Indexed-type objects dropped because they did not match the schema. */
  skippedCount: number;
}

export type DatasetSource =
  | { kind: 'url'; url: string; fallbackPath?: string }
  | { kind: 'file'; path: string };

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<FetchResponseLike>;

export interface LoadOptions {
  timeoutMs?: number;
  /** Transport override; defaults to the global `fetch`. */
  fetch?: FetchLike;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const ATTACK_STIX_URL =
  'https://raw.githubusercontent.com/mitre-attack/attack-stix-data/master/enterprise-attack/enterprise-attack.json';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

const log = createLogger('loader');

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load and parse the bundle from `source`.
 *
 * A URL source with a `fallbackPath` reads that file when the fetch fails;
 * if the fallback cannot be read either, the original fetch error is thrown.
 */
export async function loadDataset(
  source: DatasetSource,
  options: LoadOptions = {},
): Promise<AttackDataset> {
  if (source.kind === 'file') {
    const raw = await readBundleFile(source.path);
    return parseBundle(raw, source.path);
  }

  let raw: string;
  let origin = source.url;

  try {
    raw = await fetchBundle(source.url, options);
  } catch (err) {
    if (!(err instanceof FetchError) || !source.fallbackPath) {
      throw err;
    }

    log.warn(`${err.message}; falling back to ${source.fallbackPath}`);
    try {
      raw = await readBundleFile(source.fallbackPath);
    } catch (fallbackErr) {
      log.debug(`Fallback read failed: ${describeError(fallbackErr)}`);
      throw err;
    }
    origin = source.fallbackPath;
  }

  return parseBundle(raw, origin);
}

/**
 * Download the raw bundle text. Times out after `timeoutMs` (default 30s).
 */
export async function fetchBundle(url: string, options: LoadOptions = {}): Promise<string> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const fetchImpl: FetchLike = options.fetch ?? fetch;

  log.debug(`GET ${url} (timeout ${timeoutMs} ms)`);

  let response: FetchResponseLike;
  try {
    response = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    if (err instanceof Error && err.name === 'TimeoutError') {
      throw new FetchError(`Timed out after ${timeoutMs} ms fetching ${url}`, url, undefined, {
        cause: err,
      });
    }
    throw new FetchError(`Network error fetching ${url}: ${describeError(err)}`, url, undefined, {
      cause: err,
    });
  }

  if (!response.ok) {
    throw new FetchError(
      `Failed to download ATT&CK data: ${response.status} ${response.statusText}`.trim(),
      url,
      response.status,
    );
  }

  try {
    return await response.text();
  } catch (err) {
    throw new FetchError(`Failed to read response body from ${url}: ${describeError(err)}`, url, response.status, {
      cause: err,
    });
  }
}

export async function readBundleFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    throw new FetchError(`Could not read ATT&CK bundle at ${path}: ${describeError(err)}`, path, undefined, {
      cause: err,
    });
  }
}

/**
 * Parse raw bundle text into typed collections.
 *
 * The envelope must be a STIX bundle with an `objects` array of typed,
 * identified objects. Member objects of the types we index are validated
 * individually; a malformed member is skipped rather than failing the load.
 */
export function parseBundle(raw: string, origin = 'inline'): AttackDataset {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ParseError(`ATT&CK bundle from ${origin} is not valid JSON: ${describeError(err)}`, {
      cause: err,
    });
  }

  const envelope = StixBundleEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    const issues = envelope.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ParseError(`ATT&CK bundle from ${origin} is malformed: ${issues.join('; ')}`);
  }

  const dataset: AttackDataset = {
    intrusionSets: [],
    attackPatterns: [],
    tactics: [],
    relationships: [],
    dataSources: [],
    dataComponents: [],
    origin,
    objectCount: envelope.data.objects.length,
    skippedCount: 0,
  };

  for (const candidate of envelope.data.objects) {
    if (!isIndexedType(candidate.type)) continue;

    const parsed = StixObjectSchema.safeParse(candidate);
    if (!parsed.success) {
      dataset.skippedCount++;
      log.debug(`Skipping malformed ${candidate.type} ${candidate.id}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      continue;
    }

    const obj = parsed.data;
    switch (obj.type) {
      case 'intrusion-set':
        dataset.intrusionSets.push(obj);
        break;
      case 'attack-pattern':
        dataset.attackPatterns.push(obj);
        break;
      case 'x-mitre-tactic':
        dataset.tactics.push(obj);
        break;
      case 'relationship':
        dataset.relationships.push(obj);
        break;
      case 'x-mitre-data-source':
        dataset.dataSources.push(obj);
        break;
      case 'x-mitre-data-component':
        dataset.dataComponents.push(obj);
        break;
      case 'x-mitre-collection':
        dataset.version ??= obj.x_mitre_version;
        break;
    }
  }

  if (dataset.skippedCount > 0) {
    log.warn(`Skipped ${dataset.skippedCount} malformed objects in ${origin}`);
  }

  return dataset;
}
