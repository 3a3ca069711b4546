/**
 * Configuration types for the group mapper.
 */

export interface MapperConfig {
  datasetUrl: string;
  datasetFile?: string;          // read this bundle instead of fetching
  fallbackFile?: string;         // read this bundle when the fetch fails
  fetchTimeoutMs: number;
  layer: LayerConfig;
  resolver: ResolverConfig;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export interface LayerConfig {
  score: number;                 // constant score for every technique entry
  color: string;                 // hex color for every technique entry
}

export interface ResolverConfig {
  threshold: number;             // fuzzy acceptance threshold, 0..1
  maxSuggestions: number;
}

/** Values supplied directly on the command line; these win over env and file. */
export interface ConfigOverrides {
  datasetUrl?: string;
  datasetFile?: string;
  logLevel?: MapperConfig['logLevel'];
}
