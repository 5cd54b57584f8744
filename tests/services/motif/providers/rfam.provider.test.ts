/**
 * @fileoverview Unit tests for the bundled Rfam seed provider.
 * @module tests/services/motif/providers/rfam.provider.test
 */
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { RfamMotifProvider } from '@/services/motif/providers/rfam.provider.js';
import {
  motifTypeFromDirectory,
  parseSeedSequenceName,
  parseStockholm,
  ungap,
} from '@/services/motif/providers/rfam/stockholm.js';
import {
  makeConfig,
  makeTempDir,
  removeDir,
  testContext,
  writeFixture,
} from '../../../helpers.js';

const T_LOOP_SEED = [
  '# STOCKHOLM 1.0',
  '#=GF ID   T-loop',
  '#=GF DE   T-loop motif',
  '#=GF DE   in transfer RNA',
  '',
  '1ABC_B/54-58     GUU.CG',
  '2XYZ/10-14       GU-UCA',
  'AB000001.1/1-5   GUUCG',
  '#=GC SS_cons     ......',
  '',
  '1ABC_B/54-58     AA',
  '//',
].join('\n');

describe('stockholm helpers', () => {
  it('should join repeated features and concatenate sequence blocks', () => {
    const { features, sequences } = parseStockholm(T_LOOP_SEED);

    expect(features['DE']).toBe('T-loop motif in transfer RNA');
    expect(sequences.get('1ABC_B/54-58')).toBe('GUU.CGAA');
    expect([...sequences.keys()]).toEqual([
      '1ABC_B/54-58',
      '2XYZ/10-14',
      'AB000001.1/1-5',
    ]);
  });

  it('should parse seed names with and without a chain', () => {
    expect(parseSeedSequenceName('1abc_B/54-58')).toEqual({
      pdbId: '1ABC',
      chain: 'B',
      start: 54,
      end: 58,
    });
    expect(parseSeedSequenceName('2XYZ/10-14')).toEqual({
      pdbId: '2XYZ',
      chain: 'A',
      start: 10,
      end: 14,
    });
    expect(parseSeedSequenceName('AB000001.1/1-5')).toBeUndefined();
  });

  it('should strip gaps and normalize directory names', () => {
    expect(ungap('G.U-U~C')).toBe('GUUC');
    expect(motifTypeFromDirectory('T-loop')).toBe('T_LOOP');
  });
});

describe('RfamMotifProvider', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    await writeFixture(dataDir, 'rfam/T-loop/SEED', T_LOOP_SEED);
    await writeFixture(dataDir, 'rfam/empty-family/README', 'no seed here');
  });

  afterEach(async () => {
    await removeDir(dataDir);
  });

  it('should convert structure-backed seed members', async () => {
    const provider = new RfamMotifProvider(makeConfig({ MOTIF_DATA_DIR: dataDir }));

    const result = await provider.getMotifs('1abc', testContext);

    expect(result.providerId).toBe('rfam');
    expect(result.motifs).toEqual({
      T_LOOP: [
        {
          instanceId: '1ABC_B/54-58',
          motifType: 'T_LOOP',
          pdbId: '1ABC',
          chain: 'B',
          modelNumber: 1,
          residueStart: 54,
          residueEnd: 58,
          sequence: 'GUUCGAA',
          description: 'T-loop motif in transfer RNA',
          sourceId: 'rfam',
        },
      ],
    });
    expect(provider.describe().motifTypes).toEqual(['T_LOOP']);
  });

  it('should default the chain for names without one', async () => {
    const provider = new RfamMotifProvider(makeConfig({ MOTIF_DATA_DIR: dataDir }));

    const result = await provider.getMotifs('2XYZ', testContext);

    expect(result.motifs['T_LOOP']?.[0]).toMatchObject({ chain: 'A', sequence: 'GUUCA' });
  });

  it('should return an empty result for structures absent from every seed', async () => {
    const provider = new RfamMotifProvider(makeConfig({ MOTIF_DATA_DIR: dataDir }));

    expect((await provider.getMotifs('9ZZZ', testContext)).motifs).toEqual({});
  });
});
