/**
 * @fileoverview Parsing of BGSU-style residue specifiers
 * (`PDB|Model|Chain|Nucleotide|Number[|InsertionCode]`) and assembly of
 * motif instances from residue lists. Shared by the Atlas release files and
 * the RNA 3D Hub loop download.
 * @module src/services/motif/core/residueSpec
 */
import type { MotifInstance } from '../types.js';
import {
  createMotifInstance,
  normalizePdbId,
  primaryBounds,
  segmentsFromResidues,
} from './motifMap.js';

export interface ResidueSpec {
  pdbId: string;
  modelNumber: number;
  chain: string;
  nucleotide: string;
  number: number;
}

/**
 * Parses one residue specifier. A non-numeric model reads as model 1.
 * @returns `undefined` when fewer than five fields are present or the residue
 *   number is not an integer.
 */
export function parseResidueSpec(spec: string): ResidueSpec | undefined {
  const parts = spec.trim().split('|');
  if (parts.length < 5) return undefined;
  const [pdbId = '', modelText = '', chain = '', nucleotide = '', numberText = ''] =
    parts;
  if (!pdbId || !chain || !/^-?\d+$/.test(numberText.trim())) return undefined;

  const model = modelText.trim();
  return {
    pdbId: normalizePdbId(pdbId),
    modelNumber: /^\d+$/.test(model) ? Number.parseInt(model, 10) : 1,
    chain,
    nucleotide: nucleotide.trim(),
    number: Number.parseInt(numberText.trim(), 10),
  };
}

export interface ResidueInstanceInput {
  instanceId: string;
  motifType: string;
  residues: readonly ResidueSpec[];
  sourceId: string;
  description?: string | undefined;
}

/**
 * Builds an instance spanning `residues`, in listed order. Consecutive
 * residues collapse into segments and the nucleotide letters form the
 * sequence.
 * @returns `undefined` for an empty residue list.
 */
export function instanceFromResidues(
  input: ResidueInstanceInput,
): MotifInstance | undefined {
  const [first] = input.residues;
  const segments = segmentsFromResidues(input.residues);
  const bounds = primaryBounds(segments);
  if (!first || !bounds) return undefined;

  return createMotifInstance({
    instanceId: input.instanceId,
    motifType: input.motifType,
    pdbId: first.pdbId,
    chain: bounds.chain,
    modelNumber: first.modelNumber,
    residueStart: bounds.start,
    residueEnd: bounds.end,
    segments,
    sequence: input.residues.map((residue) => residue.nucleotide).join(''),
    description: input.description,
    sourceId: input.sourceId,
  });
}
