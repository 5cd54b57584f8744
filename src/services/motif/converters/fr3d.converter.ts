/**
 * @fileoverview Converter for FR3D motif search exports (comma-separated).
 *
 * Each row carries a combined `Positions` field of one or more `;`-joined
 * ranges, each written `PDB|chain|model|start-end`.
 * @module src/services/motif/converters/fr3d.converter
 */
import { logger, type RequestContext } from '@/utils/index.js';
import {
  createMotifInstance,
  MotifMapBuilder,
  normalizePdbId,
  primaryBounds,
} from '../core/motifMap.js';
import { UserTool, type MotifMap, type ResidueSegment } from '../types.js';
import type { MotifFileConverter } from './MotifFileConverter.js';
import {
  cell,
  ColumnIndex,
  decodeUtf8,
  parseFiniteNumber,
  parseInteger,
  readTabular,
  requireColumns,
  warnSkippedRow,
} from './tabular.js';

export interface Fr3dPositions {
  pdbId: string;
  modelNumber: number;
  segments: ResidueSegment[];
}

/**
 * Parses an FR3D `Positions` value.
 * @throws {RangeError} describing the first range that does not parse.
 */
export function parseFr3dPositions(value: string): Fr3dPositions {
  const ranges = value
    .split(';')
    .map((part) => part.trim())
    .filter(Boolean);
  if (ranges.length === 0) {
    throw new RangeError('Positions field is empty');
  }

  let pdbId: string | undefined;
  let modelNumber: number | undefined;
  const segments: ResidueSegment[] = [];

  for (const range of ranges) {
    const components = range.split('|').map((part) => part.trim());
    if (components.length !== 4) {
      throw new RangeError(
        `expected 4 '|'-separated components in "${range}", found ${components.length}`,
      );
    }
    const [rangePdb = '', chain = '', modelText = '', span = ''] = components;
    const model = parseInteger(modelText);
    if (model === undefined) {
      throw new RangeError(`model "${modelText}" is not an integer`);
    }
    const [, startText, endText] = /^(\d+)\s*-\s*(\d+)$/.exec(span) ?? [];
    if (startText === undefined || endText === undefined) {
      throw new RangeError(`range "${span}" is not start-end`);
    }
    if (!rangePdb || !chain) {
      throw new RangeError(`range "${range}" lacks an identifier or chain`);
    }

    pdbId ??= rangePdb;
    modelNumber ??= model;
    segments.push({
      chain,
      start: Number.parseInt(startText, 10),
      end: Number.parseInt(endText, 10),
    });
  }

  return {
    pdbId: pdbId ?? '',
    modelNumber: modelNumber ?? 0,
    segments,
  };
}

export class Fr3dConverter implements MotifFileConverter {
  readonly tool = UserTool.FR3D;
  readonly extensions = ['.csv', '.txt'] as const;

  convert(
    bytes: Uint8Array,
    fileName: string,
    pdbId: string,
    context: RequestContext,
  ): MotifMap {
    const { header, rows } = readTabular(
      decodeUtf8(bytes, fileName),
      ',',
      fileName,
    );
    const columns = new ColumnIndex(header);
    const motifTypeColumn = columns.find('Motif type');
    const positionsColumn = columns.find('Positions');
    requireColumns(
      { 'Motif type': motifTypeColumn, Positions: positionsColumn },
      fileName,
      this.tool,
    );
    const orderColumn = columns.find('Motif order');
    const sequenceColumn = columns.find('Sequence');
    const scoreColumn = columns.find('cWW');
    const descriptionColumn = columns.find('Description');

    const builder = new MotifMapBuilder();
    rows.forEach((row, index) => {
      const rowNumber = index + 1;
      const motifType = cell(row, motifTypeColumn);
      if (!motifType) {
        warnSkippedRow(this.tool, fileName, rowNumber, 'empty motif type', context);
        return;
      }

      let positions: Fr3dPositions;
      try {
        positions = parseFr3dPositions(cell(row, positionsColumn));
      } catch (error) {
        const reason = error instanceof RangeError ? error.message : String(error);
        warnSkippedRow(this.tool, fileName, rowNumber, reason, context);
        return;
      }

      const bounds = primaryBounds(positions.segments);
      if (!bounds) {
        warnSkippedRow(this.tool, fileName, rowNumber, 'no residue range', context);
        return;
      }

      const rowPdbId = normalizePdbId(positions.pdbId || pdbId);
      const order = cell(row, orderColumn) || String(rowNumber);
      builder.add(
        createMotifInstance({
          instanceId: `${rowPdbId}_${order}`,
          motifType,
          pdbId: rowPdbId,
          chain: bounds.chain,
          modelNumber: positions.modelNumber,
          residueStart: bounds.start,
          residueEnd: bounds.end,
          segments: positions.segments,
          sequence: cell(row, sequenceColumn) || undefined,
          score: parseFiniteNumber(cell(row, scoreColumn)),
          description: cell(row, descriptionColumn) || undefined,
          sourceId: this.tool,
        }),
      );
    });

    logger.debug('Converted FR3D file', {
      ...context,
      fileName,
      rows: rows.length,
      instances: builder.size,
    });
    return builder.build();
  }
}
