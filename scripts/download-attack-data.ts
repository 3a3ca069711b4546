/**
 * Download the MITRE ATT&CK Enterprise STIX bundle for offline use.
 *
 * Usage:  npm run download-data [-- <url>]
 *
 * Outputs:
 *   data/mitre-attack/enterprise-attack.json   raw STIX bundle
 *
 * Point ATTACK_FALLBACK_FILE (or ATTACK_DATASET_FILE) at the output to use it.
 */

import 'dotenv/config';

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { AttackIndex } from '../src/knowledge/mitre-attack/attack-index.js';
import { ATTACK_STIX_URL, fetchBundle, parseBundle } from '../src/knowledge/mitre-attack/loader.js';
import { describeError } from '../src/utils/errors.js';

const DATA_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', 'data', 'mitre-attack');

async function main(): Promise<void> {
  const url = process.argv[2] ?? process.env.ATTACK_DATASET_URL ?? ATTACK_STIX_URL;

  console.log(`[download-attack-data] Downloading Enterprise ATT&CK STIX bundle from ${url}...`);
  const raw = await fetchBundle(url, { timeoutMs: 120_000 });
  console.log(`[download-attack-data] Downloaded ${(raw.length / 1024 / 1024).toFixed(1)} MB`);

  // Refuse to save anything the mapper could not load.
  const index = AttackIndex.build(parseBundle(raw, url));
  const stats = index.stats;

  await mkdir(DATA_DIR, { recursive: true });
  const rawPath = join(DATA_DIR, 'enterprise-attack.json');
  await writeFile(rawPath, raw, 'utf-8');

  console.log(`[download-attack-data] Saved raw bundle -> ${rawPath}`);
  console.log(
    `[download-attack-data] ATT&CK ${index.version ?? 'unknown version'}: ` +
      `${stats.groups} groups, ${stats.techniques} techniques, ` +
      `${stats.subtechniques} sub-techniques, ${stats.tactics} tactics`,
  );
}

main().catch((err: unknown) => {
  console.error('[download-attack-data] Fatal error:', describeError(err));
  process.exit(1);
});
