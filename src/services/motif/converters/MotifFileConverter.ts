/**
 * @fileoverview Contract shared by the converters that turn an external
 * tool's output file into canonical motif instances.
 * @module src/services/motif/converters/MotifFileConverter
 */
import type { RequestContext } from '@/utils/index.js';
import type { MotifMap, UserTool } from '../types.js';

export interface MotifFileConverter {
  /** Tool whose output this converter reads; also the instances' `sourceId`. */
  readonly tool: UserTool;

  /** Lowercase file extensions, dot included, that the converter accepts. */
  readonly extensions: readonly string[];

  /**
   * Converts the raw bytes of one file.
   * @param bytes - File content
   * @param fileName - Base name, used for delimiter sniffing and logs
   * @param pdbId - Identifier the file was located by
   * @throws {McpError} MalformedData for undecodable content or an invalid
   *   header. Bad rows are skipped, not thrown.
   */
  convert(
    bytes: Uint8Array,
    fileName: string,
    pdbId: string,
    context: RequestContext,
  ): MotifMap;
}
