/**
 * ATT&CK Navigator layer generation.
 *
 * Turns a {@link MappingResult} into a layer (format 4.5) that the
 * Navigator can open with "Open Existing Layer". Every layer is checked
 * against a structural schema before it is returned or written.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';

import type { MappedTechnique, MappingResult } from '../types/mitre-attack.js';
import { describeError, ValidationError } from '../utils/errors.js';
import { truncate } from '../utils/text.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface LayerMetadataEntry {
  name: string;
  value: string;
}

export interface LayerLink {
  label: string;
  url: string;
}

export interface LayerTechnique {
  techniqueID: string;
  tactic?: string;
  score: number;
  color: string;
  comment: string;
  enabled: boolean;
  metadata: LayerMetadataEntry[];
  links: LayerLink[];
  showSubtechniques?: boolean;
}

export interface NavigatorLayer {
  name: string;
  versions: { attack: string; navigator: string; layer: string };
  domain: string;
  description: string;
  filters: { platforms: string[] };
  sorting: number;
  layout: {
    layout: 'side' | 'flat' | 'mini';
    aggregateFunction: 'average' | 'min' | 'max' | 'sum';
    showID: boolean;
    showName: boolean;
    showAggregateScores: boolean;
    countUnscored: boolean;
    expandedSubtechniques: 'none' | 'all' | 'annotated';
  };
  hideDisabled: boolean;
  techniques: LayerTechnique[];
  gradient: { colors: string[]; minValue: number; maxValue: number };
  legendItems: Array<{ label: string; color: string }>;
  showTacticRowBackground: boolean;
  tacticRowBackground: string;
  selectTechniquesAcrossTactics: boolean;
  selectSubtechniquesWithParent: boolean;
  metadata: LayerMetadataEntry[];
  links: LayerLink[];
}

export interface LayerOptions {
  /** Score given to every technique; only drives color intensity in the Navigator. */
  score?: number;
  color?: string;
  /** ATT&CK release the bundle came from, e.g. "15.1". */
  attackVersion?: string;
  now?: Date;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_TECHNIQUE_SCORE = 100;
export const DEFAULT_TECHNIQUE_COLOR = '#fd8d3c';

const NAVIGATOR_VERSIONS = {
  attack: '14',
  navigator: '4.9.1',
  layer: '4.5',
};

const DEFAULT_PLATFORMS = ['Windows', 'Linux', 'macOS'];

const MAX_TEXT_LENGTH = 200;

const ATTACK_SITE = 'https://attack.mitre.org';

// ---------------------------------------------------------------------------
// Validation schema
// ---------------------------------------------------------------------------

const LayerTechniqueSchema = z
  .object({
    techniqueID: z.string().min(1, 'techniqueID must not be empty'),
    score: z.number(),
    color: z.string(),
  })
  .passthrough();

export const NavigatorLayerSchema = z
  .object({
    name: z.string().min(1),
    versions: z.object({
      attack: z.string(),
      navigator: z.string(),
      layer: z.string(),
    }),
    domain: z.string().min(1),
    description: z.string(),
    techniques: z.array(LayerTechniqueSchema),
  })
  .passthrough();

export type ValidatedLayer = z.infer<typeof NavigatorLayerSchema>;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build and validate the layer for a mapping.
 *
 * @throws {ValidationError} if the built layer fails the structural check.
 */
export function emitLayer(mapping: MappingResult, options: LayerOptions = {}): NavigatorLayer {
  const layer = buildNavigatorLayer(mapping, options);
  validateNavigatorLayer(layer);
  return layer;
}

export function buildNavigatorLayer(
  mapping: MappingResult,
  options: LayerOptions = {},
): NavigatorLayer {
  const { group } = mapping;
  const score = options.score ?? DEFAULT_TECHNIQUE_SCORE;
  const color = options.color ?? DEFAULT_TECHNIQUE_COLOR;
  const now = options.now ?? new Date();
  const label = `${group.name} (${group.id})`;

  return {
    name: `${label} - Techniques`,
    versions: {
      ...NAVIGATOR_VERSIONS,
      attack: majorVersion(options.attackVersion) ?? NAVIGATOR_VERSIONS.attack,
    },
    domain: 'enterprise-attack',
    description: `Techniques used by ${label} based on MITRE ATT&CK data. ${truncate(group.description, MAX_TEXT_LENGTH)}`.trim(),
    filters: {
      platforms: mapping.platforms.length > 0 ? [...mapping.platforms] : [...DEFAULT_PLATFORMS],
    },
    sorting: 0,
    layout: {
      layout: 'side',
      aggregateFunction: 'average',
      showID: true,
      showName: true,
      showAggregateScores: false,
      countUnscored: false,
      expandedSubtechniques: 'annotated',
    },
    hideDisabled: false,
    techniques: mapping.techniques.map((mapped) => buildTechniqueEntry(mapped, group.name, score, color)),
    gradient: {
      colors: ['#ff6666', '#ffe766', '#8ec843'],
      minValue: 0,
      maxValue: 100,
    },
    legendItems: [{ label: `Used by ${group.name}`, color }],
    showTacticRowBackground: false,
    tacticRowBackground: '#dddddd',
    selectTechniquesAcrossTactics: true,
    selectSubtechniquesWithParent: false,
    metadata: [
      { name: 'Group', value: label },
      { name: 'Aliases', value: joinOr(group.aliases.filter((a) => a !== group.name), 'None') },
      { name: 'Total Techniques', value: String(mapping.techniques.length) },
      { name: 'Generated', value: now.toISOString().replace('T', ' ').slice(0, 19) },
      { name: 'Data Source', value: 'MITRE ATT&CK Enterprise' },
    ],
    links: [{ label: 'MITRE ATT&CK Group Page', url: `${ATTACK_SITE}/groups/${group.id}/` }],
  };
}

/**
 * Structural check of a layer document: required top-level keys, and a
 * non-empty `techniqueID`, numeric `score` and string `color` on every entry.
 *
 * @throws {ValidationError} listing every problem found.
 */
export function validateNavigatorLayer(value: unknown): ValidatedLayer {
  const result = NavigatorLayerSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

export function serializeLayer(layer: NavigatorLayer): string {
  return `${JSON.stringify(layer, null, 2)}\n`;
}

/**
 * Write the layer to disk, then read it back and re-validate.
 *
 * Parent directories are created as needed. The write is a single
 * whole-file write; an interrupted write can leave a truncated file.
 */
export function writeLayerFile(outputPath: string, layer: NavigatorLayer): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, serializeLayer(layer), 'utf-8');

  let reread: unknown;
  try {
    reread = JSON.parse(readFileSync(outputPath, 'utf-8'));
  } catch (err) {
    throw new ValidationError([`${outputPath} is not valid JSON after writing: ${describeError(err)}`]);
  }
  validateNavigatorLayer(reread);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buildTechniqueEntry(
  mapped: MappedTechnique,
  groupName: string,
  score: number,
  color: string,
): LayerTechnique {
  const { technique } = mapped;

  const entry: LayerTechnique = {
    techniqueID: technique.id,
    score,
    color,
    comment: `Used by ${groupName}. ${truncate(mapped.procedure, MAX_TEXT_LENGTH)}`.trim(),
    enabled: true,
    metadata: [
      { name: 'Technique', value: technique.name },
      { name: 'Tactics', value: joinOr(technique.tactics, 'Not specified') },
      { name: 'Platforms', value: joinOr(technique.platforms, 'Not specified') },
      { name: 'Sub-technique', value: technique.isSubtechnique ? 'Yes' : 'No' },
    ],
    links: [
      {
        label: 'MITRE ATT&CK Technique Page',
        url: `${ATTACK_SITE}/techniques/${technique.id.replace('.', '/')}/`,
      },
    ],
  };

  // Without a tactic the Navigator annotates the technique under every tactic it belongs to.
  if (technique.tactics.length === 1) {
    entry.tactic = technique.tactics[0];
  }

  if (!technique.isSubtechnique) {
    entry.showSubtechniques = true;
  }

  return entry;
}

function joinOr(values: string[], fallback: string): string {
  return values.length > 0 ? values.join(', ') : fallback;
}

function majorVersion(version: string | undefined): string | undefined {
  const major = version?.split('.')[0]?.trim();
  return major ? major : undefined;
}
