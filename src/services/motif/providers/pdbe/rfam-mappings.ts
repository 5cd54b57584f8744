/**
 * @fileoverview Schema of the PDBe `mappings/rfam/{pdb}` response and its
 * conversion into motif instances.
 * @module src/services/motif/providers/pdbe/rfam-mappings
 */
import { z } from 'zod';

import { createMotifInstance, MotifMapBuilder } from '../../core/motifMap.js';
import type { MotifMap } from '../../types.js';

const ResiduePositionSchema = z
  .object({
    author_residue_number: z.number().int(),
  })
  .passthrough();

const RfamMappingSchema = z
  .object({
    chain_id: z.string(),
    start: ResiduePositionSchema,
    end: ResiduePositionSchema,
  })
  .passthrough();

const RfamFamilySchema = z
  .object({
    identifier: z.string().nullish(),
    description: z.string().nullish(),
    mappings: z.array(RfamMappingSchema),
  })
  .passthrough();

export const RfamMappingResponseSchema = z.record(
  z
    .object({
      Rfam: z.record(RfamFamilySchema).optional(),
    })
    .passthrough(),
);

export type RfamMappingResponse = z.infer<typeof RfamMappingResponseSchema>;

/**
 * One instance per chain mapping, grouped by family name (the accession when
 * the family has no name).
 */
export function convertRfamMappings(
  response: RfamMappingResponse,
  pdbId: string,
  sourceId: string,
): MotifMap {
  const entry = response[pdbId.toLowerCase()] ?? response[pdbId.toUpperCase()];
  const builder = new MotifMapBuilder();

  for (const [accession, family] of Object.entries(entry?.Rfam ?? {})) {
    const motifType = family.identifier?.trim() || accession;
    family.mappings.forEach((mapping, index) => {
      builder.add(
        createMotifInstance({
          instanceId: `${pdbId.toUpperCase()}_${accession}_${index + 1}`,
          motifType,
          pdbId,
          chain: mapping.chain_id,
          modelNumber: 1,
          residueStart: mapping.start.author_residue_number,
          residueEnd: mapping.end.author_residue_number,
          description: family.description?.trim() || undefined,
          sourceId,
        }),
      );
    });
  }
  return builder.build();
}
