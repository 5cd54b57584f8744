/**
 * @fileoverview Shared fixtures for the test suites.
 * @module tests/helpers
 */
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ReadableStream } from 'node:stream/web';

import { parseConfig, type AppConfig } from '@/config/index.js';
import { McpError } from '@/types-global/errors.js';
import type { RequestContext } from '@/utils/index.js';

export const testContext: RequestContext = {
  requestId: 'test-req-1',
  timestamp: '2026-01-01T00:00:00.000Z',
  operation: 'test',
};

export function makeConfig(
  env: Record<string, string | undefined> = {},
): AppConfig {
  return parseConfig(env);
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), 'rna-motif-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Writes `content` to `root/relativePath`, creating parent directories.
 */
export async function writeFixture(
  root: string,
  relativePath: string,
  content: string | Uint8Array,
): Promise<string> {
  const filePath = path.join(root, relativePath);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content);
  return filePath;
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * Runs `fn` and returns the McpError it throws; fails the test otherwise.
 */
export async function captureMcpError(
  fn: () => unknown,
): Promise<McpError> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof McpError) return error;
    throw new Error(`Expected McpError, got ${String(error)}`);
  }
  throw new Error('Expected an McpError to be thrown');
}

/**
 * A 200 response that sends `head` and then stalls until `signal` aborts,
 * like a server that hangs partway through the body.
 */
export function stalledResponse(
  signal: AbortSignal | null | undefined,
  head: string,
): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(utf8(head));
      signal?.addEventListener('abort', () => {
        controller.error(
          Object.assign(new Error('This operation was aborted'), {
            name: 'AbortError',
          }),
        );
      });
    },
  });
  return new Response(body, { status: 200 });
}
