/**
 * @fileoverview Zod schemas mirroring the canonical record types. Used to
 * validate data read back from disk and to describe tool output.
 * @module src/services/motif/schemas
 */
import { z } from 'zod';

export const ResidueSegmentSchema = z.object({
  chain: z.string(),
  start: z.number().int(),
  end: z.number().int(),
});

export const MotifInstanceSchema = z
  .object({
    instanceId: z.string().describe('Source-defined instance identifier.'),
    motifType: z.string().min(1).describe('Motif category (e.g. "HL").'),
    pdbId: z.string().describe('Uppercase structure identifier.'),
    chain: z.string().describe('Chain of the instance.'),
    modelNumber: z.number().int().describe('Model number.'),
    residueStart: z.number().int().describe('First residue number.'),
    residueEnd: z.number().int().describe('Last residue number.'),
    segments: z
      .array(ResidueSegmentSchema)
      .optional()
      .describe('Contiguous ranges when the instance is discontinuous.'),
    sequence: z.string().optional().describe('Nucleotide sequence.'),
    score: z.number().optional().describe('Source-specific score or metric.'),
    description: z.string().optional().describe('Free-text annotation.'),
    sourceId: z.string().min(1).describe('Provider or tool that reported it.'),
  })
  .refine((instance) => instance.residueStart <= instance.residueEnd, {
    message: 'residueStart must not exceed residueEnd',
  });

export const MotifMapSchema = z.record(z.array(MotifInstanceSchema));

export const AnnotationResultSchema = z.object({
  providerId: z.string(),
  fetchedAt: z.string(),
  motifs: MotifMapSchema,
});
