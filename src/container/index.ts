/**
 * @fileoverview Registers the motif services with the tsyringe container.
 * Call {@link registerMotifServices} once at startup, before resolving
 * anything.
 * @module src/container/index
 */
import { container, type DependencyContainer } from 'tsyringe';

import { config as defaultConfig, type AppConfig as AppConfigShape } from '@/config/index.js';
import { CacheManager } from '@/services/motif/core/CacheManager.js';
import { SourceSelector } from '@/services/motif/core/SourceSelector.js';
import { AtlasMotifProvider } from '@/services/motif/providers/atlas.provider.js';
import { BgsuApiMotifProvider } from '@/services/motif/providers/bgsu-api.provider.js';
import { RfamApiMotifProvider } from '@/services/motif/providers/rfam-api.provider.js';
import { RfamMotifProvider } from '@/services/motif/providers/rfam.provider.js';
import { UserAnnotationProvider } from '@/services/motif/providers/user.provider.js';
import type { IMotifProvider } from '@/services/motif/core/IMotifProvider.js';
import {
  AppConfig,
  CacheOptions,
  LocalMotifProviders,
  MotifCache,
  MotifSourceSelector,
  RemoteMotifProviders,
  SourceSelectorOptions,
  UserAnnotations,
} from './tokens.js';

/**
 * Wires config, cache, providers and the source selector. The selector is a
 * singleton: its source configuration is process-wide.
 */
export function registerMotifServices(
  appConfig: AppConfigShape = defaultConfig,
  target: DependencyContainer = container,
): DependencyContainer {
  target.register(AppConfig, { useValue: appConfig });
  target.register(CacheOptions, {
    useValue: {
      cacheDir: appConfig.cacheDir,
      ttlSeconds: appConfig.cacheTtlSeconds,
    },
  });
  target.register(SourceSelectorOptions, {
    useValue: {
      defaultMode: appConfig.defaultSourceMode,
      providerTimeoutMs: appConfig.providerTimeoutMs,
    },
  });

  target.registerSingleton(MotifCache, CacheManager);
  target.registerSingleton(UserAnnotations, UserAnnotationProvider);
  target.register<IMotifProvider[]>(LocalMotifProviders, {
    useFactory: (c) => [c.resolve(AtlasMotifProvider), c.resolve(RfamMotifProvider)],
  });
  target.register<IMotifProvider[]>(RemoteMotifProviders, {
    useFactory: (c) => [c.resolve(BgsuApiMotifProvider), c.resolve(RfamApiMotifProvider)],
  });
  target.registerSingleton(MotifSourceSelector, SourceSelector);

  return target;
}
