/**
 * @fileoverview Barrel export for the motif resolution domain.
 * @module src/services/motif/index
 */

// Core
export type { IMotifProvider } from './core/IMotifProvider.js';
export { CacheManager } from './core/CacheManager.js';
export type {
  CacheEntryMeta,
  CacheManagerOptions,
  CacheStats,
} from './core/CacheManager.js';
export { SourceSelector } from './core/SourceSelector.js';
export type { SourceSelectorOptions } from './core/SourceSelector.js';
export {
  countInstances,
  createMotifInstance,
  createResult,
  isEmptyMotifMap,
  MotifMapBuilder,
  normalizePdbId,
  summarizeMotifs,
  unionMotifMaps,
} from './core/motifMap.js';

// Converters
export * from './converters/index.js';

// Providers
export { AtlasMotifProvider } from './providers/atlas.provider.js';
export { RfamMotifProvider } from './providers/rfam.provider.js';
export { BgsuApiMotifProvider } from './providers/bgsu-api.provider.js';
export { RfamApiMotifProvider } from './providers/rfam-api.provider.js';
export { UserAnnotationProvider } from './providers/user.provider.js';

// Types and schemas
export * from './types.js';
export * from './schemas.js';
