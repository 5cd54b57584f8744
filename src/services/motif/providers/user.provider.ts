/**
 * @fileoverview User annotation provider. Reads output files of the supported
 * external motif tools from `<userDir>/<tool>/` and converts them with the
 * matching format converter.
 * @module src/services/motif/providers/user.provider
 */
import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';

import { inject, injectable } from 'tsyringe';

import type { AppConfig } from '@/config/index.js';
import { AppConfig as AppConfigToken } from '@/container/tokens.js';
import { JsonRpcErrorCode, McpError, errorMessage } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';
import {
  Fr3dConverter,
  RnaMotifScanConverter,
  type MotifFileConverter,
} from '../converters/index.js';
import type { IMotifProvider } from '../core/IMotifProvider.js';
import {
  createResult,
  normalizePdbId,
  summarizeMotifs,
  unionMotifMaps,
} from '../core/motifMap.js';
import {
  ProviderId,
  ProviderKind,
  UserTool,
  type AnnotationResult,
  type MotifMap,
  type ProviderInfo,
  type UserAnnotationFile,
} from '../types.js';

const USER_TOOLS: readonly UserTool[] = Object.values(UserTool);

function isUserTool(value: string): value is UserTool {
  return USER_TOOLS.some((tool) => tool === value);
}

/**
 * Owns the user annotation directory and one converter per supported tool.
 */
@injectable()
export class UserAnnotationProvider {
  private readonly rootDir: string;
  private readonly converters: ReadonlyMap<UserTool, MotifFileConverter>;

  constructor(@inject(AppConfigToken) appConfig: AppConfig) {
    this.rootDir = appConfig.userAnnotationsDir;
    this.converters = new Map<UserTool, MotifFileConverter>([
      [UserTool.FR3D, new Fr3dConverter()],
      [UserTool.RNAMOTIFSCAN, new RnaMotifScanConverter()],
    ]);
  }

  /**
   * Validates a tool name, matched case-insensitively after trimming.
   * @throws {McpError} UnsupportedTool for names outside the supported set.
   */
  static parseUserTool(name: string): UserTool {
    const candidate = name.trim().toLowerCase();
    if (isUserTool(candidate)) return candidate;
    throw new McpError(
      JsonRpcErrorCode.UnsupportedTool,
      `Unsupported annotation tool "${name}". Supported tools: ${USER_TOOLS.join(', ')}`,
      { tool: name, supportedTools: [...USER_TOOLS] },
    );
  }

  get directory(): string {
    return this.rootDir;
  }

  /**
   * A provider bound to one tool's converter.
   */
  forTool(tool: UserTool): IMotifProvider {
    return new UserToolProvider(this, tool);
  }

  toolDirectory(tool: UserTool): string {
    return path.join(this.rootDir, tool);
  }

  converterFor(tool: UserTool): MotifFileConverter {
    const converter = this.converters.get(tool);
    if (!converter) {
      throw new McpError(
        JsonRpcErrorCode.UnsupportedTool,
        `No converter registered for "${tool}"`,
        { tool },
      );
    }
    return converter;
  }

  /**
   * Files in the tool directory that belong to `pdbId`, sorted by name. A
   * file belongs when its lowercased name is `<pdb><ext>` or starts with
   * `<pdb>_` or `<pdb>.`, and its extension is one the converter reads.
   */
  async findFiles(tool: UserTool, pdbId: string): Promise<UserAnnotationFile[]> {
    const converter = this.converterFor(tool);
    const normalizedId = normalizePdbId(pdbId);
    const prefix = normalizedId.toLowerCase();

    return (await this.listToolDirectory(tool))
      .filter((fileName) => {
        const lower = fileName.toLowerCase();
        if (!converter.extensions.includes(path.extname(lower))) return false;
        return (
          converter.extensions.some((ext) => lower === `${prefix}${ext}`) ||
          lower.startsWith(`${prefix}_`) ||
          lower.startsWith(`${prefix}.`)
        );
      })
      .map((fileName) => ({ tool, pdbId: normalizedId, fileName }));
  }

  /**
   * Uppercase ids of every file with a usable extension, sorted and unique.
   * The id is the file name up to its first `_` or `.`.
   */
  async listAvailableFiles(tool: UserTool): Promise<string[]> {
    const converter = this.converterFor(tool);
    const ids = new Set<string>();
    for (const fileName of await this.listToolDirectory(tool)) {
      const lower = fileName.toLowerCase();
      if (!converter.extensions.includes(path.extname(lower))) continue;
      const [stem = ''] = fileName.split(/[_.]/);
      if (stem) ids.add(normalizePdbId(stem));
    }
    return [...ids].sort();
  }

  /**
   * Converts every matching file and unions the results in file name order.
   * @throws {McpError} NotFound when no file matches; MalformedData from the
   *   converter.
   */
  async convert(
    tool: UserTool,
    pdbId: string,
    context: RequestContext,
  ): Promise<MotifMap> {
    const files = await this.findFiles(tool, pdbId);
    if (files.length === 0) {
      throw new McpError(
        JsonRpcErrorCode.NotFound,
        `No ${tool} annotation file for ${normalizePdbId(pdbId)} in ${this.toolDirectory(tool)}`,
        { ...context, tool, pdbId: normalizePdbId(pdbId) },
      );
    }

    const converter = this.converterFor(tool);
    const maps: MotifMap[] = [];
    for (const file of files) {
      const filePath = path.join(this.toolDirectory(tool), file.fileName);
      let bytes: Uint8Array;
      try {
        bytes = await readFile(filePath);
      } catch (error) {
        throw new McpError(
          JsonRpcErrorCode.ServiceUnavailable,
          `Could not read ${file.fileName}: ${errorMessage(error)}`,
          { ...context, tool, filePath },
          { cause: error },
        );
      }
      maps.push(converter.convert(bytes, file.fileName, file.pdbId, context));
    }

    const motifs = unionMotifMaps(maps);
    logger.info('User annotations converted', {
      ...context,
      tool,
      files: files.map((file) => file.fileName),
      motifs: summarizeMotifs(motifs),
    });
    return motifs;
  }

  private async listToolDirectory(tool: UserTool): Promise<string[]> {
    try {
      return (await readdir(this.toolDirectory(tool))).sort();
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}

/**
 * {@link IMotifProvider} view of one tool's annotation files. Never cached.
 */
class UserToolProvider implements IMotifProvider {
  public readonly id = ProviderId.USER;

  constructor(
    private readonly owner: UserAnnotationProvider,
    private readonly tool: UserTool,
  ) {}

  async getMotifs(
    pdbId: string,
    context: RequestContext,
  ): Promise<AnnotationResult> {
    const motifs = await this.owner.convert(this.tool, pdbId, context);
    return createResult(this.id, motifs);
  }

  describe(): ProviderInfo {
    return {
      id: this.id,
      name: `User annotations (${this.tool})`,
      kind: ProviderKind.USER,
      description: `${this.tool} output files under ${this.owner.toolDirectory(this.tool)}`,
      coverage: 'Structures with a user-supplied annotation file',
      cacheable: false,
      motifTypes: [],
    };
  }
}
