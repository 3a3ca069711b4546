/**
 * MITRE ATT&CK entity types used by the index, resolver and mapper.
 */

export interface AttackGroup {
  id: string;                    // e.g., "G0006"
  stixId: string;                // e.g., "intrusion-set--6a2e693f-..."
  name: string;                  // e.g., "APT1"
  aliases: string[];             // always includes `name`
  description: string;
  created: string;               // first seen in the knowledge base
  modified: string;
  url: string;
}

export interface AttackTechnique {
  id: string;                    // e.g., "T1059.001"
  stixId: string;
  name: string;                  // e.g., "PowerShell"
  description: string;
  tactics: string[];             // tactic short names, e.g., ["execution"]
  platforms: string[];           // e.g., ["Windows"]
  dataSources: string[];         // e.g., ["Process: Process Creation"]
  detection: string;
  isSubtechnique: boolean;
  parentId?: string;             // e.g., "T1059" for T1059.001
  url: string;
}

export interface AttackTactic {
  id: string;                    // e.g., "TA0002"
  stixId: string;
  name: string;                  // e.g., "Execution"
  shortName: string;             // e.g., "execution"
}

/** A "uses" edge from a group to an indexed technique. */
export interface GroupTechniqueLink {
  techniqueId: string;
  description: string;
}

// Mapping result types

export interface MappedTechnique {
  technique: AttackTechnique;
  /** Procedure text from the first "uses" edge between the group and technique. */
  procedure: string;
}

export interface TacticUsage {
  shortName: string;
  name: string;
  count: number;
}

export interface MappingResult {
  group: AttackGroup;
  techniques: MappedTechnique[];
  tactics: TacticUsage[];
  platforms: string[];
  dataSources: string[];
  subtechniqueCount: number;
}
