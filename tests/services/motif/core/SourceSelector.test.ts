/**
 * @fileoverview Unit tests for source selection, merging and cache routing.
 * @module tests/services/motif/core/SourceSelector.test
 */
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { CacheManager } from '@/services/motif/core/CacheManager.js';
import type { IMotifProvider } from '@/services/motif/core/IMotifProvider.js';
import { createMotifInstance, createResult } from '@/services/motif/core/motifMap.js';
import { SourceSelector } from '@/services/motif/core/SourceSelector.js';
import { UserAnnotationProvider } from '@/services/motif/providers/user.provider.js';
import {
  ProviderKind,
  SourceMode,
  type AnnotationResult,
  type MotifMap,
} from '@/services/motif/types.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import type { RequestContext } from '@/utils/index.js';
import {
  captureMcpError,
  makeConfig,
  makeTempDir,
  removeDir,
  testContext,
  writeFixture,
} from '../../../helpers.js';

type GetMotifs = (pdbId: string, context: RequestContext) => Promise<AnnotationResult>;

interface FakeProvider extends IMotifProvider {
  getMotifs: Mock<GetMotifs>;
}

function motifs(sourceId: string, ...types: string[]): MotifMap {
  const map: Record<string, ReturnType<typeof createMotifInstance>[]> = {};
  types.forEach((motifType, index) => {
    const instance = createMotifInstance({
      instanceId: `${sourceId}_${index + 1}`,
      motifType,
      pdbId: '1ABC',
      chain: 'A',
      modelNumber: 1,
      residueStart: 10 + index,
      residueEnd: 14 + index,
      sourceId,
    });
    map[motifType] = [...(map[motifType] ?? []), instance];
  });
  return map;
}

function fakeProvider(
  id: string,
  kind: ProviderKind,
  impl: GetMotifs = async () => createResult(id, {}),
): FakeProvider {
  return {
    id,
    getMotifs: vi.fn<GetMotifs>(impl),
    describe: () => ({
      id,
      name: id,
      kind,
      description: `${id} fake`,
      coverage: 'test',
      cacheable: kind === ProviderKind.REMOTE,
      motifTypes: [],
    }),
    ...(kind === ProviderKind.REMOTE
      ? { cacheParameters: () => ({ endpoint: `https://${id}.test` }) }
      : {}),
  };
}

function returning(id: string, map: MotifMap): GetMotifs {
  return async () => createResult(id, map);
}

function failing(error: Error): GetMotifs {
  return async () => {
    throw error;
  };
}

describe('SourceSelector', () => {
  let workDir: string;
  let cache: CacheManager;
  let userAnnotations: UserAnnotationProvider;
  let atlas: FakeProvider;
  let rfam: FakeProvider;
  let bgsu: FakeProvider;
  let rfamApi: FakeProvider;

  const build = (
    defaultMode: SourceMode = SourceMode.AUTO,
    providerTimeoutMs = 1000,
  ): SourceSelector =>
    new SourceSelector([atlas, rfam], [bgsu, rfamApi], userAnnotations, cache, {
      defaultMode,
      providerTimeoutMs,
    });

  beforeEach(async () => {
    workDir = await makeTempDir();
    cache = new CacheManager({ cacheDir: path.join(workDir, 'cache') });
    userAnnotations = new UserAnnotationProvider(
      makeConfig({ MOTIF_USER_ANNOTATIONS_DIR: path.join(workDir, 'user') }),
    );
    atlas = fakeProvider('atlas', ProviderKind.LOCAL);
    rfam = fakeProvider('rfam', ProviderKind.LOCAL);
    bgsu = fakeProvider('bgsu_api', ProviderKind.REMOTE);
    rfamApi = fakeProvider('rfam_api', ProviderKind.REMOTE);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(workDir);
  });

  it('should refuse user mode as the default', async () => {
    const error = await captureMcpError(() => build(SourceMode.USER));
    expect(error.code).toBe(JsonRpcErrorCode.ConfigurationError);
  });

  describe('auto mode', () => {
    it('should return the first non-empty result without querying later sources', async () => {
      const atlasResult = createResult('atlas', motifs('atlas', 'HL'));
      atlas.getMotifs.mockResolvedValue(atlasResult);
      const mustNotRun = failing(new Error('must not be called'));
      rfam.getMotifs.mockImplementation(mustNotRun);
      bgsu.getMotifs.mockImplementation(mustNotRun);
      rfamApi.getMotifs.mockImplementation(mustNotRun);
      const selector = build();

      const result = await selector.resolve('1abc', testContext);

      expect(result).toBe(atlasResult);
      expect(atlas.getMotifs).toHaveBeenCalledWith('1ABC', testContext);
      expect(rfam.getMotifs).not.toHaveBeenCalled();
      expect(bgsu.getMotifs).not.toHaveBeenCalled();
      expect(selector.getLastSourceUsed()).toBe('atlas');
      expect(selector.getLastOutcomes()).toEqual({ atlas: 'hit' });
    });

    it('should fall through empty and failing sources', async () => {
      atlas.getMotifs.mockImplementation(failing(new Error('disk gone')));
      rfam.getMotifs.mockImplementation(
        failing(new McpError(JsonRpcErrorCode.MalformedData, 'bad seed')),
      );
      bgsu.getMotifs.mockImplementation(
        failing(new McpError(JsonRpcErrorCode.ServiceUnavailable, 'down')),
      );
      rfamApi.getMotifs.mockImplementation(
        returning('rfam_api', motifs('rfam_api', 'tRNA')),
      );
      const selector = build();

      const result = await selector.resolve('1ABC', testContext);

      expect(result.providerId).toBe('rfam_api');
      expect(selector.getLastOutcomes()).toEqual({
        atlas: 'unavailable',
        rfam: 'malformed',
        bgsu_api: 'unavailable',
        rfam_api: 'hit',
      });
    });

    it('should return an empty "none" result when no source has data', async () => {
      const selector = build();

      const result = await selector.resolve('1ABC', testContext);

      expect(result.providerId).toBe('none');
      expect(result.motifs).toEqual({});
      expect(selector.getLastSourceUsed()).toBeUndefined();
      expect(selector.getLastResolvedId()).toBe('1ABC');
    });

    it('should propagate configuration errors', async () => {
      atlas.getMotifs.mockImplementation(
        failing(new McpError(JsonRpcErrorCode.ConfigurationError, 'no data dir')),
      );

      const error = await captureMcpError(() => build().resolve('1ABC', testContext));

      expect(error.code).toBe(JsonRpcErrorCode.ConfigurationError);
    });

    it('should reject a blank structure id', async () => {
      const error = await captureMcpError(() => build().resolve('   ', testContext));
      expect(error.code).toBe(JsonRpcErrorCode.InvalidParams);
    });
  });

  describe('all mode', () => {
    it('should union every source in fixed order regardless of completion order', async () => {
      atlas.getMotifs.mockImplementation(async () => {
        await new Promise((resolve) => setTimeout(resolve, 20));
        return createResult('atlas', motifs('atlas', 'HL'));
      });
      bgsu.getMotifs.mockImplementation(
        returning('bgsu_api', motifs('bgsu_api', 'HL', 'IL')),
      );
      rfamApi.getMotifs.mockImplementation(
        failing(new McpError(JsonRpcErrorCode.NotFound, 'no entry')),
      );
      const selector = build(SourceMode.ALL);

      const result = await selector.resolve('1ABC', testContext);

      expect(result.providerId).toBe('all');
      expect(result.motifs['HL']?.map((item) => item.sourceId)).toEqual([
        'atlas',
        'bgsu_api',
      ]);
      expect(result.motifs['IL']?.map((item) => item.sourceId)).toEqual(['bgsu_api']);
      expect(selector.getLastOutcomes()).toEqual({
        atlas: 'hit',
        rfam: 'empty',
        bgsu_api: 'hit',
        rfam_api: 'not_found',
      });
    });

    it('should drop a source that misses the per-provider deadline', async () => {
      atlas.getMotifs.mockImplementation(returning('atlas', motifs('atlas', 'HL')));
      bgsu.getMotifs.mockImplementation(() => new Promise<AnnotationResult>(() => {}));
      const selector = build(SourceMode.ALL, 25);

      const result = await selector.resolve('1ABC', testContext);

      expect(result.motifs['HL']?.map((item) => item.sourceId)).toEqual(['atlas']);
      expect(selector.getLastOutcomes()['bgsu_api']).toBe('unavailable');
    });
  });

  describe('caching', () => {
    it('should serve a repeated remote query from the cache', async () => {
      bgsu.getMotifs.mockImplementation(returning('bgsu_api', motifs('bgsu_api', 'HL')));
      const selector = build();
      selector.setMode('web', 'bgsu');

      const first = await selector.resolve('1ABC', testContext);
      const second = await selector.resolve('1abc', testContext);

      expect(bgsu.getMotifs).toHaveBeenCalledTimes(1);
      expect(second).toEqual(first);
      expect(selector.getLastOutcomes()).toEqual({ bgsu_api: 'cache_hit' });
    });

    it('should not cache empty results', async () => {
      const selector = build();
      selector.setMode('web', 'bgsu');

      await selector.resolve('1ABC', testContext);
      await selector.resolve('1ABC', testContext);

      expect(bgsu.getMotifs).toHaveBeenCalledTimes(2);
      expect((await cache.stats(testContext)).totalEntries).toBe(0);
    });

    it('should never cache local sources', async () => {
      atlas.getMotifs.mockImplementation(returning('atlas', motifs('atlas', 'HL')));
      const selector = build();

      await selector.resolve('1ABC', testContext);
      await selector.resolve('1ABC', testContext);

      expect(atlas.getMotifs).toHaveBeenCalledTimes(2);
      expect((await cache.stats(testContext)).totalEntries).toBe(0);
    });

    it('should bypass and overwrite the cache on a forced refresh', async () => {
      bgsu.getMotifs
        .mockImplementationOnce(returning('bgsu_api', motifs('bgsu_api', 'HL')))
        .mockImplementation(returning('bgsu_api', motifs('bgsu_api', 'J3')));
      const getSpy = vi.spyOn(cache, 'get');
      const selector = build();
      selector.setMode('web', 'bgsu');

      await selector.resolve('1ABC', testContext);
      const refreshed = await selector.forceRefresh(undefined, testContext);
      const afterwards = await selector.resolve('1ABC', testContext);

      expect(bgsu.getMotifs).toHaveBeenCalledTimes(2);
      expect(getSpy).toHaveBeenCalledTimes(2);
      expect(Object.keys(refreshed.motifs)).toEqual(['J3']);
      expect(afterwards).toEqual(refreshed);
    });

    it('should drop remote entries that a fallback refresh never reached', async () => {
      bgsu.getMotifs
        .mockImplementationOnce(returning('bgsu_api', motifs('bgsu_api', 'HL')))
        .mockImplementation(returning('bgsu_api', motifs('bgsu_api', 'J3')));
      atlas.getMotifs.mockImplementation(returning('atlas', motifs('atlas', 'IL')));
      const selector = build();
      selector.setMode('web', 'bgsu');
      await selector.resolve('1ABC', testContext);

      selector.setMode('auto');
      const refreshed = await selector.forceRefresh('1ABC', testContext);
      selector.setMode('web', 'bgsu');
      const afterwards = await selector.resolve('1ABC', testContext);

      expect(refreshed.providerId).toBe('atlas');
      expect(bgsu.getMotifs).toHaveBeenCalledTimes(2);
      expect(Object.keys(afterwards.motifs)).toEqual(['J3']);
      expect(selector.getLastOutcomes()).toEqual({ bgsu_api: 'hit' });
    });

    it('should refuse to refresh before anything was resolved', async () => {
      const error = await captureMcpError(() =>
        build().forceRefresh(undefined, testContext),
      );
      expect(error.code).toBe(JsonRpcErrorCode.InvalidParams);
    });

    it('should clear the cache through the selector', async () => {
      bgsu.getMotifs.mockImplementation(returning('bgsu_api', motifs('bgsu_api', 'HL')));
      const selector = build();
      selector.setMode('web');
      await selector.resolve('1ABC', testContext);

      expect(await selector.clearCache(testContext)).toBe(1);
    });
  });

  describe('checkAvailability', () => {
    it('should check local sources and user files directly and remote ones by cache', async () => {
      atlas.getMotifs.mockImplementation(returning('atlas', motifs('atlas', 'HL')));
      rfam.getMotifs.mockImplementation(
        failing(new McpError(JsonRpcErrorCode.NotFound, 'No seed alignment')),
      );
      bgsu.getMotifs.mockImplementation(returning('bgsu_api', motifs('bgsu_api', 'IL')));
      await writeFixture(
        workDir,
        'user/fr3d/1ABC.csv',
        'Motif type,Positions\nHL,"1ABC|A|1|10-14"\n',
      );
      const selector = build();
      selector.setMode('web', 'bgsu');
      await selector.resolve('1ABC', testContext);
      bgsu.getMotifs.mockClear();

      const availability = await selector.checkAvailability('1abc', testContext);

      expect(availability).toEqual({
        atlas: 'available',
        rfam: 'absent',
        bgsu_api: 'available',
        rfam_api: 'unknown',
        'user:fr3d': 'available',
        'user:rnamotifscan': 'absent',
      });
      expect(bgsu.getMotifs).not.toHaveBeenCalled();
      expect(rfamApi.getMotifs).not.toHaveBeenCalled();
    });

    it('should report a failing local source as unknown', async () => {
      atlas.getMotifs.mockImplementation(
        failing(new McpError(JsonRpcErrorCode.MalformedData, 'bad release')),
      );

      const availability = await build().checkAvailability('1ABC', testContext);

      expect(availability['atlas']).toBe('unknown');
      expect(availability['rfam']).toBe('absent');
    });

    it('should reject a blank structure id', async () => {
      const error = await captureMcpError(() =>
        build().checkAvailability('  ', testContext),
      );
      expect(error.code).toBe(JsonRpcErrorCode.InvalidParams);
    });
  });

  describe('setMode', () => {
    it('should narrow web mode to one source', async () => {
      const selector = build();

      expect(selector.setMode('WEB', ' Rfam ')).toEqual({
        mode: SourceMode.WEB,
        narrowing: 'rfam',
      });
      await selector.resolve('1ABC', testContext);

      expect(rfamApi.getMotifs).toHaveBeenCalledTimes(1);
      expect(bgsu.getMotifs).not.toHaveBeenCalled();
      expect(rfam.getMotifs).not.toHaveBeenCalled();
      expect(selector.describeActiveSources().map((info) => info.id)).toEqual([
        'rfam_api',
      ]);
    });

    it('should narrow local mode to the local rfam seeds', async () => {
      const selector = build();
      selector.setMode('local', 'rfam');

      await selector.resolve('1ABC', testContext);

      expect(rfam.getMotifs).toHaveBeenCalledTimes(1);
      expect(atlas.getMotifs).not.toHaveBeenCalled();
      expect(rfamApi.getMotifs).not.toHaveBeenCalled();
    });

    it('should query both local sources in order without a narrowing', () => {
      const selector = build();
      expect(selector.setMode('local')).toEqual({ mode: SourceMode.LOCAL });
      expect(selector.describeActiveSources().map((info) => info.id)).toEqual([
        'atlas',
        'rfam',
      ]);
    });

    it.each([
      ['sideways', undefined],
      ['auto', 'atlas'],
      ['all', 'bgsu'],
      ['local', 'bgsu'],
      ['web', 'atlas'],
      ['user', undefined],
    ])('should reject mode %s with narrowing %s and keep the config', async (mode, narrowing) => {
      const selector = build();
      selector.setMode('web', 'bgsu');

      const error = await captureMcpError(() => selector.setMode(mode, narrowing));

      expect(error.code).toBe(JsonRpcErrorCode.InvalidMode);
      expect(selector.getConfig()).toEqual({ mode: SourceMode.WEB, narrowing: 'bgsu' });
    });

    it('should reject an unsupported user tool and keep the config', async () => {
      const selector = build();

      const error = await captureMcpError(() => selector.selectUserTool('dssr'));

      expect(error.code).toBe(JsonRpcErrorCode.UnsupportedTool);
      expect(selector.getConfig()).toEqual({ mode: SourceMode.AUTO });
    });
  });

  describe('user mode', () => {
    beforeEach(async () => {
      await writeFixture(
        workDir,
        'user/fr3d/1ABC.csv',
        'Motif type,Positions\nHL,"1ABC|A|1|10-14"\n',
      );
    });

    it('should resolve from the selected tool only and never cache', async () => {
      const selector = build();
      expect(selector.setMode('user', 'FR3D')).toEqual({
        mode: SourceMode.USER,
        activeUserTool: 'fr3d',
      });

      const result = await selector.resolve('1abc', testContext);

      expect(result.providerId).toBe('user');
      expect(result.motifs['HL']?.[0]?.sourceId).toBe('fr3d');
      expect(atlas.getMotifs).not.toHaveBeenCalled();
      expect(bgsu.getMotifs).not.toHaveBeenCalled();
      expect((await cache.stats(testContext)).totalEntries).toBe(0);
    });

    it('should report a missing annotation file as an empty resolution', async () => {
      const selector = build();
      selector.selectUserTool('fr3d');

      const result = await selector.resolve('3ZZZ', testContext);

      expect(result.providerId).toBe('none');
      expect(selector.getLastOutcomes()).toEqual({ user: 'not_found' });
    });

    it('should drop the active tool when leaving user mode', () => {
      const selector = build();
      selector.selectUserTool('fr3d');

      expect(selector.setMode('auto')).toEqual({ mode: SourceMode.AUTO });
      expect(selector.getConfig().activeUserTool).toBeUndefined();
    });

    it('should list structures with annotation files', async () => {
      const selector = build();

      expect(await selector.listAvailableUserFiles()).toEqual(['1ABC']);
      expect(await selector.listAvailableUserFiles('rnamotifscan')).toEqual([]);
    });
  });
});
