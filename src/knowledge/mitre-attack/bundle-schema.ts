/**
 * Zod schemas for the Enterprise ATT&CK STIX 2.1 bundle.
 *
 * Only the fields the index reads are declared; everything else on an
 * object is passed through untouched.
 */

import { z } from 'zod';

export const ExternalReferenceSchema = z
  .object({
    source_name: z.string().optional(),
    external_id: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

export const KillChainPhaseSchema = z.object({
  kill_chain_name: z.string(),
  phase_name: z.string(),
});

export const StixObjectSchema = z
  .object({
    type: z.string(),
    id: z.string(),
    name: z.string().optional(),
    description: z.string().optional(),
    created: z.string().optional(),
    modified: z.string().optional(),
    revoked: z.boolean().optional(),
    x_mitre_deprecated: z.boolean().optional(),
    external_references: z.array(ExternalReferenceSchema).optional(),

    // intrusion-set
    aliases: z.array(z.string()).optional(),

    // attack-pattern
    kill_chain_phases: z.array(KillChainPhaseSchema).optional(),
    x_mitre_platforms: z.array(z.string()).optional(),
    x_mitre_data_sources: z.array(z.string()).optional(),
    x_mitre_detection: z.string().optional(),
    x_mitre_is_subtechnique: z.boolean().optional(),

    // x-mitre-tactic
    x_mitre_shortname: z.string().optional(),

    // relationship
    source_ref: z.string().optional(),
    target_ref: z.string().optional(),
    relationship_type: z.string().optional(),

    // x-mitre-data-component
    x_mitre_data_source_ref: z.string().optional(),

    // x-mitre-collection
    x_mitre_version: z.string().optional(),
  })
  .passthrough();

export type StixObject = z.infer<typeof StixObjectSchema>;

/** The envelope is checked strictly; member objects are checked one by one. */
export const StixBundleEnvelopeSchema = z.object({
  type: z.literal('bundle'),
  id: z.string().optional(),
  objects: z.array(
    z
      .object({
        type: z.string(),
        id: z.string(),
      })
      .passthrough(),
  ),
});

/** STIX types the index consumes. */
export const INDEXED_TYPES = [
  'intrusion-set',
  'attack-pattern',
  'x-mitre-tactic',
  'relationship',
  'x-mitre-data-source',
  'x-mitre-data-component',
  'x-mitre-collection',
] as const;

export type IndexedType = (typeof INDEXED_TYPES)[number];

const INDEXED_TYPE_SET: ReadonlySet<string> = new Set(INDEXED_TYPES);

export function isIndexedType(type: string): type is IndexedType {
  return INDEXED_TYPE_SET.has(type);
}
