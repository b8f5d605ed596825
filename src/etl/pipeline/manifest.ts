import { z } from 'zod';
import { TABLES, ManifestRow } from '../../db/schema';
import { RelationalStore } from '../../db/store';

/**
 * Build manifest: one row per derived table describing the run that produced
 * it and the content hashes of the derived inputs it was built from
 */
export type Manifest = Map<string, ManifestRow>;

const inputHashesSchema = z.record(z.string());

export async function loadManifest(store: RelationalStore): Promise<Manifest> {
  if (!(await store.hasTable(TABLES.derivationManifest.name))) {
    return new Map();
  }
  const rows = await store.readTable(TABLES.derivationManifest);
  return new Map(rows.map(row => [row.table_name, row]));
}

export async function saveManifest(store: RelationalStore, manifest: Manifest): Promise<void> {
  await store.replaceTable(TABLES.derivationManifest, [...manifest.values()]);
}

export function parseInputHashes(row: ManifestRow): Record<string, string> {
  return inputHashesSchema.parse(JSON.parse(row.input_hashes));
}

export function serializeInputHashes(hashes: Record<string, string>): string {
  const ordered: Record<string, string> = {};
  for (const key of Object.keys(hashes).sort()) {
    ordered[key] = hashes[key];
  }
  return JSON.stringify(ordered);
}

export function nextBuildSeq(manifest: Manifest): number {
  let max = 0;
  for (const row of manifest.values()) {
    max = Math.max(max, row.build_seq);
  }
  return max + 1;
}
