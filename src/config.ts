/**
 * Configuration loading.
 *
 * Precedence: command-line overrides > environment (populated from `.env`
 * by dotenv) > YAML config file > defaults. The merged result is validated
 * with zod; any invalid value fails the whole load.
 */

import { readFileSync } from 'fs';
import YAML from 'yaml';
import { z } from 'zod';

import { ATTACK_STIX_URL, DEFAULT_FETCH_TIMEOUT_MS } from './knowledge/mitre-attack/loader.js';
import { DEFAULT_MATCH_THRESHOLD, DEFAULT_MAX_SUGGESTIONS } from './knowledge/mitre-attack/group-resolver.js';
import { DEFAULT_TECHNIQUE_COLOR, DEFAULT_TECHNIQUE_SCORE } from './reporting/navigator-layer.js';
import type { ConfigOverrides, MapperConfig } from './types/config.js';
import { ConfigError, describeError } from './utils/errors.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const ConfigSchema = z.object({
  datasetUrl: z.string().url(),
  datasetFile: z.string().min(1).optional(),
  fallbackFile: z.string().min(1).optional(),
  fetchTimeoutMs: z.coerce.number().int().positive(),
  layer: z.object({
    score: z.coerce.number().finite(),
    color: z.string().regex(/^#[0-9a-fA-F]{6}$/, 'must be a hex color like #fd8d3c'),
  }),
  resolver: z.object({
    threshold: z.coerce.number().min(0).max(1),
    maxSuggestions: z.coerce.number().int().positive(),
  }),
  logLevel: LogLevelSchema,
});

const Scalar = z.union([z.string(), z.number()]);

/** Shape of the optional YAML file; every key may be omitted. */
const FileConfigSchema = z
  .object({
    datasetUrl: z.string(),
    datasetFile: z.string(),
    fallbackFile: z.string(),
    fetchTimeoutMs: Scalar,
    layer: z.object({ score: Scalar, color: z.string() }).partial(),
    resolver: z.object({ threshold: Scalar, maxSuggestions: Scalar }).partial(),
    logLevel: z.string(),
  })
  .partial()
  .strict();

type PartialConfig = z.infer<typeof FileConfigSchema>;

const DEFAULTS: PartialConfig = {
  datasetUrl: ATTACK_STIX_URL,
  fetchTimeoutMs: DEFAULT_FETCH_TIMEOUT_MS,
  layer: { score: DEFAULT_TECHNIQUE_SCORE, color: DEFAULT_TECHNIQUE_COLOR },
  resolver: { threshold: DEFAULT_MATCH_THRESHOLD, maxSuggestions: DEFAULT_MAX_SUGGESTIONS },
  logLevel: 'info',
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Path to a YAML config file. */
  configFile?: string;
  overrides?: ConfigOverrides;
}

/**
 * @throws {ConfigError} when the file is unreadable or any merged value is invalid.
 */
export function loadConfig(options: LoadConfigOptions = {}): MapperConfig {
  const env = options.env ?? process.env;
  const fromFile = options.configFile ? readConfigFile(options.configFile) : {};

  const merged = mergeConfig(DEFAULTS, fromFile, configFromEnv(env), options.overrides ?? {});

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const config: MapperConfig = result.data;
  return config;
}

export function readConfigFile(path: string): PartialConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not read config file ${path}: ${describeError(err)}`, { cause: err });
  }

  // An empty YAML document parses to null.
  const result = FileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid config file ${path}: ${issues.join('; ')}`);
  }
  return result.data;
}

export function configFromEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const read = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };

  return {
    datasetUrl: read('ATTACK_DATASET_URL'),
    datasetFile: read('ATTACK_DATASET_FILE'),
    fallbackFile: read('ATTACK_FALLBACK_FILE'),
    fetchTimeoutMs: read('ATTACK_FETCH_TIMEOUT_MS'),
    layer: {
      score: read('LAYER_TECHNIQUE_SCORE'),
      color: read('LAYER_TECHNIQUE_COLOR'),
    },
    resolver: {
      threshold: read('GROUP_MATCH_THRESHOLD'),
      maxSuggestions: read('GROUP_MAX_SUGGESTIONS'),
    },
    logLevel: read('LOG_LEVEL'),
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Later layers win; `undefined` never overwrites a value. */
function mergeConfig(...layers: PartialConfig[]): PartialConfig {
  const merged: PartialConfig = { layer: {}, resolver: {} };

  for (const layer of layers) {
    merged.datasetUrl = layer.datasetUrl ?? merged.datasetUrl;
    merged.datasetFile = layer.datasetFile ?? merged.datasetFile;
    merged.fallbackFile = layer.fallbackFile ?? merged.fallbackFile;
    merged.fetchTimeoutMs = layer.fetchTimeoutMs ?? merged.fetchTimeoutMs;
    merged.logLevel = layer.logLevel ?? merged.logLevel;
    merged.layer = {
      score: layer.layer?.score ?? merged.layer?.score,
      color: layer.layer?.color ?? merged.layer?.color,
    };
    merged.resolver = {
      threshold: layer.resolver?.threshold ?? merged.resolver?.threshold,
      maxSuggestions: layer.resolver?.maxSuggestions ?? merged.resolver?.maxSuggestions,
    };
  }

  return merged;
}
