/**
 * @fileoverview Converter for RNAMotifScan result tables. Comma- or
 * tab-separated, with separate category, start, end and chain columns.
 * @module src/services/motif/converters/rnamotifscan.converter
 */
import path from 'node:path';

import { logger, type RequestContext } from '@/utils/index.js';
import {
  createMotifInstance,
  MotifMapBuilder,
  normalizePdbId,
} from '../core/motifMap.js';
import { UserTool, type MotifMap } from '../types.js';
import type { MotifFileConverter } from './MotifFileConverter.js';
import {
  cell,
  ColumnIndex,
  decodeUtf8,
  firstLine,
  parseFiniteNumber,
  parseInteger,
  readTabular,
  requireColumns,
  warnSkippedRow,
} from './tabular.js';

/**
 * Tab for `.tsv` files, or for a header line holding tabs and no commas.
 * Comma otherwise.
 */
export function detectDelimiter(fileName: string, text: string): ',' | '\t' {
  if (path.extname(fileName).toLowerCase() === '.tsv') return '\t';
  const header = firstLine(text);
  return header.includes('\t') && !header.includes(',') ? '\t' : ',';
}

export class RnaMotifScanConverter implements MotifFileConverter {
  readonly tool = UserTool.RNAMOTIFSCAN;
  readonly extensions = ['.csv', '.tsv', '.txt'] as const;

  convert(
    bytes: Uint8Array,
    fileName: string,
    pdbId: string,
    context: RequestContext,
  ): MotifMap {
    const text = decodeUtf8(bytes, fileName);
    const { header, rows } = readTabular(
      text,
      detectDelimiter(fileName, text),
      fileName,
    );
    const columns = new ColumnIndex(header);
    const categoryColumn = columns.find('Motif_Name', 'Motif', 'Type');
    const startColumn = columns.find('Start', 'Start_Position');
    const endColumn = columns.find('End', 'End_Position');
    const chainColumn = columns.find('Chain');
    requireColumns(
      {
        Motif_Name: categoryColumn,
        Start: startColumn,
        End: endColumn,
        Chain: chainColumn,
      },
      fileName,
      this.tool,
    );
    const scoreColumn = columns.find('Score');
    const sequenceColumn = columns.find('Sequence');

    const structureId = normalizePdbId(pdbId);
    const builder = new MotifMapBuilder();
    rows.forEach((row, index) => {
      const rowNumber = index + 1;
      const skip = (reason: string): void =>
        warnSkippedRow(this.tool, fileName, rowNumber, reason, context);

      const motifType = cell(row, categoryColumn);
      if (!motifType) return skip('empty motif category');

      const start = parseInteger(cell(row, startColumn));
      const end = parseInteger(cell(row, endColumn));
      if (start === undefined || end === undefined) {
        return skip(
          `bounds "${cell(row, startColumn)}"-"${cell(row, endColumn)}" are not integers`,
        );
      }
      if (start <= 0 || end <= 0) return skip('bounds must be positive');
      if (start > end) return skip(`start ${start} exceeds end ${end}`);

      const chain = cell(row, chainColumn);
      if (!chain) return skip('empty chain');

      builder.add(
        createMotifInstance({
          instanceId: `${structureId}_${rowNumber}`,
          motifType,
          pdbId: structureId,
          chain,
          modelNumber: 1,
          residueStart: start,
          residueEnd: end,
          sequence: cell(row, sequenceColumn) || undefined,
          score: parseFiniteNumber(cell(row, scoreColumn)),
          sourceId: this.tool,
        }),
      );
    });

    logger.debug('Converted RNAMotifScan file', {
      ...context,
      fileName,
      rows: rows.length,
      instances: builder.size,
    });
    return builder.build();
  }
}
