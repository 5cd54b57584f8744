/**
 * @fileoverview Bounds an arbitrary promise with a deadline.
 * @module src/utils/network/withTimeout
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

/**
 * Resolves or rejects with `promise`, or rejects with a `Timeout` McpError
 * once `timeoutMs` elapses. The underlying work is not cancelled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      reject(
        new McpError(
          JsonRpcErrorCode.Timeout,
          `${label} did not complete within ${timeoutMs}ms.`,
          { timeoutMs },
        ),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}
