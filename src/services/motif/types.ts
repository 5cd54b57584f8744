/**
 * @fileoverview Type definitions for the motif resolution domain: the
 * canonical record every source normalizes into, the result envelope moved
 * between components, and the closed vocabularies used by source selection.
 * @module src/services/motif/types
 */

/**
 * Uppercase structure accession (e.g. "1S72").
 */
export type PdbId = string;

/**
 * A contiguous run of residues on one chain. `start <= end`.
 */
export interface ResidueSegment {
  chain: string;
  start: number;
  end: number;
}

/**
 * One occurrence of a motif in one structure.
 */
export interface MotifInstance {
  instanceId: string;
  motifType: string;
  pdbId: PdbId;
  chain: string;
  modelNumber: number;
  residueStart: number;
  residueEnd: number;
  /** Present when the instance spans more than one contiguous range. */
  segments?: ResidueSegment[] | undefined;
  sequence?: string | undefined;
  score?: number | undefined;
  description?: string | undefined;
  /** Provider id, or tool name for user annotation files. */
  sourceId: string;
}

/**
 * Motif type to instances, in source order within each type.
 */
export type MotifMap = Record<string, readonly MotifInstance[]>;

/**
 * The unit returned by providers, the cache and the selector.
 */
export interface AnnotationResult {
  providerId: string;
  fetchedAt: string;
  motifs: MotifMap;
}

/**
 * Provider id of a merged result in `all` mode.
 */
export const UNION_PROVIDER_ID = 'all';

/**
 * Provider id of the empty result when no source had data.
 */
export const NO_PROVIDER_ID = 'none';

/**
 * Backing category of a provider.
 */
export enum ProviderKind {
  LOCAL = 'local',
  REMOTE = 'remote',
  USER = 'user',
}

/**
 * Status-display metadata for a provider.
 */
export interface ProviderInfo {
  id: string;
  name: string;
  kind: ProviderKind;
  description: string;
  coverage: string;
  /** Responses are persisted by the cache manager. */
  cacheable: boolean;
  motifTypes: string[];
}

/**
 * Source selection modes.
 */
export enum SourceMode {
  AUTO = 'auto',
  LOCAL = 'local',
  WEB = 'web',
  ALL = 'all',
  USER = 'user',
}

/**
 * Narrowing accepted by `local` mode.
 */
export enum LocalSource {
  ATLAS = 'atlas',
  RFAM = 'rfam',
}

/**
 * Narrowing accepted by `web` mode.
 */
export enum WebSource {
  BGSU = 'bgsu',
  RFAM = 'rfam',
}

/**
 * External analysis tools whose output files the user provider reads.
 */
export enum UserTool {
  FR3D = 'fr3d',
  RNAMOTIFSCAN = 'rnamotifscan',
}

/**
 * Process-scoped selection state. Exactly one is live per selector.
 */
export interface SourceConfig {
  mode: SourceMode;
  narrowing?: LocalSource | WebSource | undefined;
  activeUserTool?: UserTool | undefined;
}

/**
 * Provider ids in fixed priority order.
 */
export const ProviderId = {
  ATLAS: 'atlas',
  RFAM: 'rfam',
  BGSU_API: 'bgsu_api',
  RFAM_API: 'rfam_api',
  USER: 'user',
} as const;

export type ProviderId = (typeof ProviderId)[keyof typeof ProviderId];

/**
 * Outcome of querying one provider, recorded for diagnostics.
 */
export type ProviderOutcome =
  | 'hit'
  | 'cache_hit'
  | 'empty'
  | 'not_found'
  | 'unavailable'
  | 'malformed';

/**
 * Whether a source holds data for a structure. Remote sources are judged by
 * their cache entry alone and are `unknown` without one.
 */
export type SourceAvailability = 'available' | 'absent' | 'unknown';

/**
 * A user annotation file discovered on disk.
 */
export interface UserAnnotationFile {
  tool: UserTool;
  pdbId: PdbId;
  fileName: string;
}
