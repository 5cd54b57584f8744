/**
 * @fileoverview RNA 3D Motif Atlas release files: schema, version
 * discovery and conversion of motif groups into instances.
 * @module src/services/motif/providers/atlas/release
 */
import { z } from 'zod';

import { instanceFromResidues, parseResidueSpec } from '../../core/residueSpec.js';
import type { ResidueSpec } from '../../core/residueSpec.js';
import type { MotifInstance } from '../../types.js';

const AtlasMotifGroupSchema = z
  .object({
    motif_id: z.string(),
    common_name: z.string().nullish(),
    annotation: z.string().nullish(),
    annotations: z.record(z.string().nullable()).nullish(),
    alignment: z.record(z.record(z.string())),
  })
  .passthrough();

export const AtlasReleaseSchema = z.array(AtlasMotifGroupSchema);

export type AtlasMotifGroup = z.infer<typeof AtlasMotifGroupSchema>;

const RELEASE_FILE_PATTERN = /^([a-z][a-z0-9]*)_(.+)\.json$/i;

export interface AtlasReleaseFile {
  fileName: string;
  /** Uppercase file prefix, e.g. "HL". */
  motifType: string;
  version: string;
}

/**
 * Recognizes `<type>_<version>.json` file names.
 */
export function parseReleaseFileName(
  fileName: string,
): AtlasReleaseFile | undefined {
  const [, prefix, version] = RELEASE_FILE_PATTERN.exec(fileName) ?? [];
  if (prefix === undefined || version === undefined) return undefined;
  return { fileName, motifType: prefix.toUpperCase(), version };
}

function versionParts(version: string): number[] | undefined {
  const parts = version.split('.').filter(Boolean);
  if (parts.length === 0 || !parts.every((part) => /^\d+$/.test(part))) {
    return undefined;
  }
  return parts.map((part) => Number.parseInt(part, 10));
}

function compareVersions(left: number[], right: number[]): number {
  for (let i = 0; i < Math.max(left.length, right.length); i += 1) {
    const delta = (left[i] ?? 0) - (right[i] ?? 0);
    if (delta !== 0) return delta;
  }
  return 0;
}

/**
 * Picks one release file per motif type. A file whose version equals
 * `override` wins; otherwise the highest numeric version, and when no
 * version is numeric the last file name in sort order.
 */
export function selectReleaseFiles(
  files: readonly AtlasReleaseFile[],
  override?: string,
): AtlasReleaseFile[] {
  const byType = new Map<string, AtlasReleaseFile[]>();
  for (const file of files) {
    const group = byType.get(file.motifType) ?? [];
    group.push(file);
    byType.set(file.motifType, group);
  }

  const selected: AtlasReleaseFile[] = [];
  for (const candidates of byType.values()) {
    const pinned = override
      ? candidates.find((file) => file.version === override)
      : undefined;
    if (pinned) {
      selected.push(pinned);
      continue;
    }

    let best: { file: AtlasReleaseFile; parts: number[] } | undefined;
    for (const file of candidates) {
      const parts = versionParts(file.version);
      if (parts && (!best || compareVersions(parts, best.parts) > 0)) {
        best = { file, parts };
      }
    }
    const fallback = [...candidates].sort((a, b) =>
      a.fileName.localeCompare(b.fileName),
    ).at(-1);
    const choice = best?.file ?? fallback;
    if (choice) selected.push(choice);
  }

  return selected.sort((a, b) => a.motifType.localeCompare(b.motifType));
}

function positionOrder(key: string): number {
  return /^\d+$/.test(key) ? Number.parseInt(key, 10) : Number.MAX_SAFE_INTEGER;
}

/**
 * Converts every aligned instance of a release into motif instances.
 * Residue positions are read in numeric key order; instances without a
 * usable residue are dropped.
 */
export function convertRelease(
  groups: readonly AtlasMotifGroup[],
  motifType: string,
  sourceId: string,
): MotifInstance[] {
  const instances: MotifInstance[] = [];

  for (const group of groups) {
    for (const [instanceId, positions] of Object.entries(group.alignment)) {
      const residues = Object.entries(positions)
        .sort(([a], [b]) => positionOrder(a) - positionOrder(b))
        .map(([, spec]) => parseResidueSpec(spec))
        .filter((residue): residue is ResidueSpec => residue !== undefined);

      const instance = instanceFromResidues({
        instanceId,
        motifType,
        residues,
        sourceId,
        description:
          group.annotations?.[instanceId] || group.common_name || undefined,
      });
      if (instance) instances.push(instance);
    }
  }
  return instances;
}
