/**
 * @fileoverview Parser for the RNA 3D Hub loop download: two-column CSV
 * records `"<loop id>","<residue spec>,<residue spec>,..."`.
 * @module src/services/motif/providers/bgsu/loops
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';
import { tokenize } from '../../converters/tabular.js';
import { MotifMapBuilder } from '../../core/motifMap.js';
import {
  instanceFromResidues,
  parseResidueSpec,
  type ResidueSpec,
} from '../../core/residueSpec.js';
import type { MotifMap } from '../../types.js';
import { LOOP_TYPE_NAMES } from './config.js';

/**
 * Converts a loop download body into motifs grouped by loop type (the loop
 * id prefix). Records without a loop id or a usable residue are skipped.
 *
 * @throws {McpError} MalformedData when the body is non-empty but holds no
 *   well-formed record.
 */
export function parseLoopCsv(
  body: string,
  sourceId: string,
  context: RequestContext,
): MotifMap {
  const label = `${sourceId} response`;
  const records = tokenize(body, ',', label);
  const builder = new MotifMapBuilder();

  records.forEach((record, index) => {
    const [loopId = '', residueList = ''] = record;
    const separator = loopId.indexOf('_');
    if (separator <= 0) {
      logger.warning(`Skipping record ${index + 1} of ${label}: no loop type in "${loopId}"`, {
        ...context,
        recordNumber: index + 1,
      });
      return;
    }

    const motifType = loopId.slice(0, separator).toUpperCase();
    const residues = residueList
      .split(',')
      .map((spec) => parseResidueSpec(spec))
      .filter((residue): residue is ResidueSpec => residue !== undefined);
    const instance = instanceFromResidues({
      instanceId: loopId,
      motifType,
      residues,
      sourceId,
      description: LOOP_TYPE_NAMES[motifType],
    });
    if (!instance) {
      logger.warning(`Skipping loop ${loopId}: no usable residue`, {
        ...context,
        recordNumber: index + 1,
      });
      return;
    }
    builder.add(instance);
  });

  if (records.length > 0 && builder.size === 0) {
    throw new McpError(
      JsonRpcErrorCode.MalformedData,
      `${label} held ${records.length} record(s) but none was a loop`,
      { ...context, records: records.length },
    );
  }
  return builder.build();
}
