/**
 * @fileoverview Unit tests for the BGSU RNA 3D Hub loop provider.
 * @module tests/services/motif/providers/bgsu-api.provider.test
 */
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { BgsuApiMotifProvider } from '@/services/motif/providers/bgsu-api.provider.js';
import { JsonRpcErrorCode } from '@/types-global/errors.js';
import { logger } from '@/utils/index.js';
import {
  captureMcpError,
  makeConfig,
  stalledResponse,
  testContext,
} from '../../../helpers.js';

const LOOPS_CSV = [
  '"HL_1ABC_001","1ABC|1|A|G|10,1ABC|1|A|A|11,1ABC|1|A|A|12"',
  '"IL_1ABC_002","1ABC|1|A|C|20,1ABC|1|A|G|21,1ABC|1|A|U|30,1ABC|1|A|A|31"',
  '"J3_1ABC_003","not a residue"',
].join('\n');

describe('BgsuApiMotifProvider', () => {
  let fetchMock: Mock;
  let provider: BgsuApiMotifProvider;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(logger, 'warning').mockImplementation(() => {});
    provider = new BgsuApiMotifProvider(
      makeConfig({
        BGSU_API_URL: 'https://bgsu.test/loops/',
        MOTIF_REQUEST_TIMEOUT_MS: '50',
      }),
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should request the structure and convert each loop', async () => {
    fetchMock.mockResolvedValue(new Response(LOOPS_CSV, { status: 200 }));

    const result = await provider.getMotifs('1abc', testContext);

    expect(fetchMock).toHaveBeenCalledWith(
      'https://bgsu.test/loops/1ABC',
      expect.objectContaining({
        method: 'GET',
        headers: { Accept: 'text/csv, text/plain' },
      }),
    );
    expect(result.providerId).toBe('bgsu_api');
    expect(result.motifs).toEqual({
      HL: [
        {
          instanceId: 'HL_1ABC_001',
          motifType: 'HL',
          pdbId: '1ABC',
          chain: 'A',
          modelNumber: 1,
          residueStart: 10,
          residueEnd: 12,
          sequence: 'GAA',
          description: 'Hairpin Loop',
          sourceId: 'bgsu_api',
        },
      ],
      IL: [
        {
          instanceId: 'IL_1ABC_002',
          motifType: 'IL',
          pdbId: '1ABC',
          chain: 'A',
          modelNumber: 1,
          residueStart: 20,
          residueEnd: 31,
          segments: [
            { chain: 'A', start: 20, end: 21 },
            { chain: 'A', start: 30, end: 31 },
          ],
          sequence: 'CGUA',
          description: 'Internal Loop',
          sourceId: 'bgsu_api',
        },
      ],
    });
  });

  it('should return an empty result on 404', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 404 }));

    const result = await provider.getMotifs('9ZZZ', testContext);

    expect(result.providerId).toBe('bgsu_api');
    expect(result.motifs).toEqual({});
  });

  it('should return an empty result for an empty body', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 200 }));

    expect((await provider.getMotifs('9ZZZ', testContext)).motifs).toEqual({});
  });

  it('should surface server errors as ServiceUnavailable', async () => {
    fetchMock.mockResolvedValue(new Response('oops', { status: 500 }));

    const error = await captureMcpError(() => provider.getMotifs('1ABC', testContext));

    expect(error.code).toBe(JsonRpcErrorCode.ServiceUnavailable);
  });

  it('should surface an aborted request as Timeout', async () => {
    fetchMock.mockRejectedValue(
      Object.assign(new Error('aborted'), { name: 'AbortError' }),
    );

    const error = await captureMcpError(() => provider.getMotifs('1ABC', testContext));

    expect(error.code).toBe(JsonRpcErrorCode.Timeout);
  });

  it('should time out when the body stalls after the headers', async () => {
    fetchMock.mockImplementation(async (_url: string, init: RequestInit) =>
      stalledResponse(init.signal, '"HL_1ABC_001","1ABC|1|A|G|10,'),
    );

    const error = await captureMcpError(() => provider.getMotifs('1ABC', testContext));

    expect(error.code).toBe(JsonRpcErrorCode.Timeout);
    expect(error.data?.['timeoutMs']).toBe(50);
  });

  it('should reject a body with no usable loop', async () => {
    fetchMock.mockResolvedValue(
      new Response('"unlabelled","1ABC|1|A|G|10"\n', { status: 200 }),
    );

    const error = await captureMcpError(() => provider.getMotifs('1ABC', testContext));

    expect(error.code).toBe(JsonRpcErrorCode.MalformedData);
    expect(error.message).toBe(
      'bgsu_api response held 1 record(s) but none was a loop',
    );
  });

  it('should describe itself as a cacheable remote source', () => {
    expect(provider.describe()).toMatchObject({
      id: 'bgsu_api',
      kind: 'remote',
      cacheable: true,
    });
    expect(provider.cacheParameters()).toEqual({
      endpoint: 'https://bgsu.test/loops',
    });
  });
});
