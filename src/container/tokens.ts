/**
 * @fileoverview Dependency injection tokens for the tsyringe container.
 * @module src/container/tokens
 */

export const AppConfig = Symbol('AppConfig');
export const CacheOptions = Symbol('CacheOptions');
export const MotifCache = Symbol('MotifCache');
export const LocalMotifProviders = Symbol('LocalMotifProviders');
export const RemoteMotifProviders = Symbol('RemoteMotifProviders');
export const UserAnnotations = Symbol('UserAnnotations');
export const SourceSelectorOptions = Symbol('SourceSelectorOptions');
export const MotifSourceSelector = Symbol('MotifSourceSelector');
