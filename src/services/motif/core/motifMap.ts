/**
 * @fileoverview Construction and combination helpers for canonical motif
 * records. Every provider and converter builds instances through
 * {@link createMotifInstance} so the record invariants hold at one place.
 * @module src/services/motif/core/motifMap
 */
import type {
  AnnotationResult,
  MotifInstance,
  MotifMap,
  PdbId,
  ResidueSegment,
} from '../types.js';

/**
 * Trims and uppercases a structure identifier.
 */
export function normalizePdbId(identifier: string): PdbId {
  return identifier.trim().toUpperCase();
}

export interface MotifInstanceInput {
  instanceId: string;
  motifType: string;
  pdbId: string;
  chain: string;
  modelNumber: number;
  residueStart: number;
  residueEnd: number;
  segments?: ResidueSegment[] | undefined;
  sequence?: string | undefined;
  score?: number | undefined;
  description?: string | undefined;
  sourceId: string;
}

/**
 * Builds a frozen {@link MotifInstance}. Uppercases the PDB id and swaps a
 * descending residue range. Optional fields that are empty are left out.
 *
 * @throws {RangeError} if the motif type or source id is blank, or a bound is
 *   not an integer.
 */
export function createMotifInstance(input: MotifInstanceInput): MotifInstance {
  const motifType = input.motifType.trim();
  if (!motifType) {
    throw new RangeError('Motif type must not be empty.');
  }
  if (!input.sourceId) {
    throw new RangeError('Motif instance requires a source id.');
  }
  if (
    !Number.isInteger(input.residueStart) ||
    !Number.isInteger(input.residueEnd)
  ) {
    throw new RangeError(
      `Residue bounds must be integers (got ${input.residueStart}-${input.residueEnd}).`,
    );
  }

  const instance: MotifInstance = {
    instanceId: input.instanceId,
    motifType,
    pdbId: normalizePdbId(input.pdbId),
    chain: input.chain,
    modelNumber: input.modelNumber,
    residueStart: Math.min(input.residueStart, input.residueEnd),
    residueEnd: Math.max(input.residueStart, input.residueEnd),
    sourceId: input.sourceId,
  };
  if (input.segments && input.segments.length > 1) {
    instance.segments = input.segments.map((segment) =>
      Object.freeze({
        chain: segment.chain,
        start: Math.min(segment.start, segment.end),
        end: Math.max(segment.start, segment.end),
      }),
    );
  }
  if (input.sequence) instance.sequence = input.sequence;
  if (input.score !== undefined && Number.isFinite(input.score)) {
    instance.score = input.score;
  }
  if (input.description) instance.description = input.description;

  return Object.freeze(instance);
}

/**
 * Collapses individually listed residues into contiguous segments, keeping
 * the listed order. A change of chain or a gap in numbering starts a new
 * segment.
 */
export function segmentsFromResidues(
  residues: ReadonlyArray<{ chain: string; number: number }>,
): ResidueSegment[] {
  const segments: ResidueSegment[] = [];
  let current: ResidueSegment | undefined;

  for (const residue of residues) {
    if (
      current &&
      current.chain === residue.chain &&
      residue.number === current.end + 1
    ) {
      current.end = residue.number;
      continue;
    }
    current = { chain: residue.chain, start: residue.number, end: residue.number };
    segments.push(current);
  }
  return segments;
}

/**
 * Bounds of the segments lying on the first segment's chain.
 */
export function primaryBounds(
  segments: readonly ResidueSegment[],
): { chain: string; start: number; end: number } | undefined {
  const first = segments[0];
  if (!first) return undefined;

  let start = Math.min(first.start, first.end);
  let end = Math.max(first.start, first.end);
  for (const segment of segments) {
    if (segment.chain !== first.chain) continue;
    start = Math.min(start, segment.start, segment.end);
    end = Math.max(end, segment.start, segment.end);
  }
  return { chain: first.chain, start, end };
}

/**
 * Accumulates instances into a {@link MotifMap}, preserving first-seen type
 * order and per-type insertion order.
 */
export class MotifMapBuilder {
  private readonly groups = new Map<string, MotifInstance[]>();

  add(instance: MotifInstance): this {
    const group = this.groups.get(instance.motifType);
    if (group) {
      group.push(instance);
    } else {
      this.groups.set(instance.motifType, [instance]);
    }
    return this;
  }

  addAll(motifs: MotifMap): this {
    for (const instances of Object.values(motifs)) {
      for (const instance of instances) this.add(instance);
    }
    return this;
  }

  get size(): number {
    let total = 0;
    for (const group of this.groups.values()) total += group.length;
    return total;
  }

  build(): MotifMap {
    return Object.fromEntries(
      [...this.groups].map(([type, instances]) => [
        type,
        Object.freeze([...instances]),
      ]),
    );
  }
}

/**
 * Total number of instances across all motif types.
 */
export function countInstances(motifs: MotifMap): number {
  let total = 0;
  for (const instances of Object.values(motifs)) total += instances.length;
  return total;
}

export function isEmptyMotifMap(motifs: MotifMap): boolean {
  return countInstances(motifs) === 0;
}

/**
 * Per-type concatenation of `maps` in the given order. No deduplication:
 * an instance reported by two sources appears twice.
 */
export function unionMotifMaps(maps: readonly MotifMap[]): MotifMap {
  const builder = new MotifMapBuilder();
  for (const map of maps) builder.addAll(map);
  return builder.build();
}

export function createResult(
  providerId: string,
  motifs: MotifMap,
  now: Date = new Date(),
): AnnotationResult {
  return { providerId, fetchedAt: now.toISOString(), motifs };
}

/**
 * Instance counts keyed by motif type, for summaries and logs.
 */
export function summarizeMotifs(motifs: MotifMap): Record<string, number> {
  return Object.fromEntries(
    Object.entries(motifs).map(([type, instances]) => [type, instances.length]),
  );
}
