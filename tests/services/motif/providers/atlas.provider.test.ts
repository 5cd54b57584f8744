/**
 * @fileoverview Unit tests for the bundled Motif Atlas provider.
 * @module tests/services/motif/providers/atlas.provider.test
 */
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { AtlasMotifProvider } from '@/services/motif/providers/atlas.provider.js';
import {
  parseReleaseFileName,
  selectReleaseFiles,
  type AtlasReleaseFile,
} from '@/services/motif/providers/atlas/release.js';
import { ProviderKind } from '@/services/motif/types.js';
import { logger } from '@/utils/index.js';
import {
  makeConfig,
  makeTempDir,
  removeDir,
  testContext,
  writeFixture,
} from '../../../helpers.js';

function release(commonName: string): string {
  return JSON.stringify([
    {
      motif_id: 'HL_00001.1',
      common_name: commonName,
      annotations: { HL_1ABC_001: 'capping loop' },
      alignment: {
        HL_1ABC_001: {
          '1': '1ABC|1|A|G|10',
          '2': '1ABC|1|A|A|11',
          '3': '1ABC|1|A|A|12',
        },
        HL_2XYZ_004: {
          '10': '2XYZ|1|B|A|45',
          '2': '2XYZ|1|B|C|41',
          '1': '2XYZ|1|B|G|40',
        },
      },
    },
  ]);
}

describe('selectReleaseFiles', () => {
  const files = ['hl_4.2.json', 'hl_4.10.json', 'il_beta.json', 'il_alpha.json']
    .map((name) => parseReleaseFileName(name))
    .filter((file): file is AtlasReleaseFile => file !== undefined);

  it('should pick the highest numeric version, else the last name', () => {
    expect(selectReleaseFiles(files).map((file) => file.fileName)).toEqual([
      'hl_4.10.json',
      'il_beta.json',
    ]);
  });

  it('should prefer an exact version override', () => {
    expect(selectReleaseFiles(files, '4.2').map((file) => file.fileName)).toEqual([
      'hl_4.2.json',
      'il_beta.json',
    ]);
  });

  it('should ignore names that are not release files', () => {
    expect(parseReleaseFileName('README.md')).toBeUndefined();
    expect(parseReleaseFileName('hl.json')).toBeUndefined();
  });
});

describe('AtlasMotifProvider', () => {
  let dataDir: string;
  let warningSpy: MockInstance;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    warningSpy = vi.spyOn(logger, 'warning').mockImplementation(() => {});
    await writeFixture(dataDir, 'atlas/hl_4.2.json', release('old name'));
    await writeFixture(dataDir, 'atlas/hl_4.10.json', release('GNRA tetraloop'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dataDir);
  });

  it('should return the instances of the requested structure', async () => {
    const provider = new AtlasMotifProvider(makeConfig({ MOTIF_DATA_DIR: dataDir }));

    const result = await provider.getMotifs('2xyz', testContext);

    expect(result.providerId).toBe('atlas');
    expect(result.motifs).toEqual({
      HL: [
        {
          instanceId: 'HL_2XYZ_004',
          motifType: 'HL',
          pdbId: '2XYZ',
          chain: 'B',
          modelNumber: 1,
          residueStart: 40,
          residueEnd: 45,
          segments: [
            { chain: 'B', start: 40, end: 41 },
            { chain: 'B', start: 45, end: 45 },
          ],
          sequence: 'GCA',
          description: 'GNRA tetraloop',
          sourceId: 'atlas',
        },
      ],
    });
  });

  it('should prefer the per-instance annotation', async () => {
    const provider = new AtlasMotifProvider(makeConfig({ MOTIF_DATA_DIR: dataDir }));

    const result = await provider.getMotifs('1ABC', testContext);

    expect(result.motifs['HL']?.[0]).toMatchObject({
      residueStart: 10,
      residueEnd: 12,
      sequence: 'GAA',
      description: 'capping loop',
    });
  });

  it('should load the pinned release version', async () => {
    const provider = new AtlasMotifProvider(
      makeConfig({ MOTIF_DATA_DIR: dataDir, MOTIF_ATLAS_VERSION: '4.2' }),
    );

    const result = await provider.getMotifs('2XYZ', testContext);

    expect(result.motifs['HL']?.[0]?.description).toBe('old name');
    expect(provider.describe().description).toBe(
      'Bundled RNA 3D Motif Atlas release 4.2',
    );
  });

  it('should return an empty result for an unknown structure', async () => {
    const provider = new AtlasMotifProvider(makeConfig({ MOTIF_DATA_DIR: dataDir }));

    expect((await provider.getMotifs('9ZZZ', testContext)).motifs).toEqual({});
  });

  it('should skip invalid release files and keep valid ones', async () => {
    await writeFixture(dataDir, 'atlas/il_1.0.json', '{"not": "a list"}');
    await writeFixture(dataDir, 'atlas/j3_1.0.json', '[{broken');
    const provider = new AtlasMotifProvider(makeConfig({ MOTIF_DATA_DIR: dataDir }));

    const result = await provider.getMotifs('1ABC', testContext);

    expect(Object.keys(result.motifs)).toEqual(['HL']);
    expect(warningSpy).toHaveBeenCalledWith(
      'Skipping Atlas file il_1.0.json: unexpected structure',
      expect.objectContaining({ requestId: 'test-req-1' }),
    );
    expect(provider.describe()).toMatchObject({
      kind: ProviderKind.LOCAL,
      cacheable: false,
      motifTypes: ['HL'],
    });
  });

  it('should treat a missing atlas directory as empty', async () => {
    const provider = new AtlasMotifProvider(
      makeConfig({ MOTIF_DATA_DIR: `${dataDir}/absent` }),
    );

    expect((await provider.getMotifs('1ABC', testContext)).motifs).toEqual({});
    expect(warningSpy).toHaveBeenCalledTimes(1);
  });
});
