/**
 * @fileoverview Minimal Stockholm alignment reader for Rfam motif SEED files.
 * Only the pieces the motif index needs are kept: `#=GF` features and the
 * aligned sequences, with interleaved blocks concatenated per name.
 * @module src/services/motif/providers/rfam/stockholm
 */

export interface StockholmAlignment {
  /** `#=GF` features; repeated tags are joined with a space. */
  features: Record<string, string>;
  /** Sequence name to aligned sequence, in first-seen order. */
  sequences: Map<string, string>;
}

export function parseStockholm(text: string): StockholmAlignment {
  const features: Record<string, string> = {};
  const sequences = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line === '//') continue;

    if (line.startsWith('#=GF')) {
      const [, tag, ...rest] = line.split(/\s+/);
      const value = rest.join(' ');
      if (!tag || !value) continue;
      const existing = features[tag];
      features[tag] = existing ? `${existing} ${value}` : value;
      continue;
    }
    if (line.startsWith('#')) continue;

    const [name, residues] = line.split(/\s+/);
    if (!name || !residues) continue;
    sequences.set(name, (sequences.get(name) ?? '') + residues);
  }

  return { features, sequences };
}

export interface SeedSequenceName {
  pdbId: string;
  chain: string;
  start: number;
  end: number;
}

const WITH_CHAIN = /^([0-9A-Za-z]{4})_([0-9A-Za-z]+)\/(\d+)-(\d+)$/;
const WITHOUT_CHAIN = /^([0-9A-Za-z]{4})\/(\d+)-(\d+)$/;

/** Chain assumed when a sequence name does not carry one. */
export const DEFAULT_SEED_CHAIN = 'A';

/**
 * Reads `PDBID_CHAIN/start-end` or `PDBID/start-end`. Other names (plain
 * sequence database accessions) are not structure-backed.
 */
export function parseSeedSequenceName(
  name: string,
): SeedSequenceName | undefined {
  const [, pdbId, chain, start, end] = WITH_CHAIN.exec(name) ?? [];
  if (pdbId && chain && start && end) {
    return {
      pdbId: pdbId.toUpperCase(),
      chain,
      start: Number.parseInt(start, 10),
      end: Number.parseInt(end, 10),
    };
  }

  const [, bareId, bareStart, bareEnd] = WITHOUT_CHAIN.exec(name) ?? [];
  if (bareId && bareStart && bareEnd) {
    return {
      pdbId: bareId.toUpperCase(),
      chain: DEFAULT_SEED_CHAIN,
      start: Number.parseInt(bareStart, 10),
      end: Number.parseInt(bareEnd, 10),
    };
  }
  return undefined;
}

/**
 * Alignment gap characters removed to recover the residue sequence.
 */
export function ungap(aligned: string): string {
  return aligned.replace(/[.\-~]/g, '');
}

/**
 * Directory name to motif type: runs of characters outside `[A-Za-z0-9]`
 * become `_`, then uppercase.
 */
export function motifTypeFromDirectory(name: string): string {
  return name.replace(/[^A-Za-z0-9]+/g, '_').toUpperCase();
}
