/**
 * @fileoverview Source selection and merge policy. Owns the process-wide
 * {@link SourceConfig}, picks the providers a mode allows, routes cacheable
 * providers through the {@link CacheManager} and folds provider failures into
 * empty contributions.
 * @module src/services/motif/core/SourceSelector
 */
import { inject, injectable } from 'tsyringe';

import {
  LocalMotifProviders,
  MotifCache,
  RemoteMotifProviders,
  SourceSelectorOptions as SourceSelectorOptionsToken,
  UserAnnotations,
} from '@/container/tokens.js';
import {
  isConfigurationError,
  JsonRpcErrorCode,
  McpError,
  errorMessage,
} from '@/types-global/errors.js';
import { logger, withTimeout, type RequestContext } from '@/utils/index.js';
import { UserAnnotationProvider } from '../providers/user.provider.js';
import {
  LocalSource,
  NO_PROVIDER_ID,
  ProviderId,
  SourceMode,
  UNION_PROVIDER_ID,
  UserTool,
  WebSource,
  type AnnotationResult,
  type ProviderInfo,
  type ProviderOutcome,
  type SourceAvailability,
  type SourceConfig,
} from '../types.js';
import { CacheManager, type CacheStats } from './CacheManager.js';
import type { IMotifProvider } from './IMotifProvider.js';
import {
  countInstances,
  createResult,
  isEmptyMotifMap,
  normalizePdbId,
  summarizeMotifs,
  unionMotifMaps,
} from './motifMap.js';

export interface SourceSelectorOptions {
  defaultMode: SourceMode;
  /** Deadline for each provider in `all` mode. */
  providerTimeoutMs: number;
}

type ResolutionStrategy = 'first-non-empty' | 'union';

interface ResolutionPlan {
  strategy: ResolutionStrategy;
  providers: IMotifProvider[];
}

interface ResolveOptions {
  refresh: boolean;
}

const LOCAL_TARGETS: Readonly<Record<LocalSource, string>> = {
  [LocalSource.ATLAS]: ProviderId.ATLAS,
  [LocalSource.RFAM]: ProviderId.RFAM,
};

const WEB_TARGETS: Readonly<Record<WebSource, string>> = {
  [WebSource.BGSU]: ProviderId.BGSU_API,
  [WebSource.RFAM]: ProviderId.RFAM_API,
};

function parseMember<T extends string>(
  values: readonly T[],
  raw: string,
): T | undefined {
  const candidate = raw.trim().toLowerCase();
  return values.find((value) => value === candidate);
}

function outcomeOf(error: unknown): ProviderOutcome {
  if (!(error instanceof McpError)) return 'unavailable';
  switch (error.code) {
    case JsonRpcErrorCode.NotFound:
      return 'not_found';
    case JsonRpcErrorCode.MalformedData:
      return 'malformed';
    default:
      return 'unavailable';
  }
}

/**
 * Resolves motif annotations for a structure according to the active
 * source configuration.
 */
@injectable()
export class SourceSelector {
  private config: Readonly<SourceConfig>;
  private lastSourceUsed: string | undefined;
  private lastPdbId: string | undefined;
  private lastOutcomes: Readonly<Record<string, ProviderOutcome>> = {};
  private readonly providerTimeoutMs: number;

  constructor(
    @inject(LocalMotifProviders)
    private readonly localProviders: readonly IMotifProvider[],
    @inject(RemoteMotifProviders)
    private readonly remoteProviders: readonly IMotifProvider[],
    @inject(UserAnnotations)
    private readonly userAnnotations: UserAnnotationProvider,
    @inject(MotifCache) private readonly cache: CacheManager,
    @inject(SourceSelectorOptionsToken) options: SourceSelectorOptions,
  ) {
    if (options.defaultMode === SourceMode.USER) {
      throw new McpError(
        JsonRpcErrorCode.ConfigurationError,
        'The default source mode cannot be "user"; select a tool at run time instead.',
      );
    }
    this.config = Object.freeze({ mode: options.defaultMode });
    this.providerTimeoutMs = options.providerTimeoutMs;
  }

  /**
   * Motif annotations for `pdbId` under the current configuration. Provider
   * failures contribute nothing; only configuration errors propagate.
   * @throws {McpError} InvalidParams for a blank id, or a configuration error.
   */
  async resolve(
    pdbId: string,
    context: RequestContext,
  ): Promise<AnnotationResult> {
    return this.run(pdbId, context, { refresh: false });
  }

  /**
   * Like {@link resolve}, but cacheable providers skip the cache read and
   * overwrite their entry. Cached entries of remote providers the refresh did
   * not reach (a fallback that stopped early, or a mode that excludes them)
   * are dropped. Without an id, the last resolved id is refreshed.
   * @throws {McpError} InvalidParams when there is no id to refresh.
   */
  async forceRefresh(
    pdbId: string | undefined,
    context: RequestContext,
  ): Promise<AnnotationResult> {
    const target = pdbId?.trim() ? pdbId : this.lastPdbId;
    if (!target) {
      throw new McpError(
        JsonRpcErrorCode.InvalidParams,
        'No structure id given and nothing has been resolved yet.',
        { requestId: context.requestId },
      );
    }
    return this.run(target, context, { refresh: true });
  }

  /**
   * Switches mode. For `local` and `web` an optional narrowing names one
   * source; for `user` the narrowing is the tool name and is required.
   * @throws {McpError} InvalidMode or UnsupportedTool; the configuration is
   *   unchanged on failure.
   */
  setMode(mode: string, narrowing?: string): Readonly<SourceConfig> {
    const parsedMode = parseMember(Object.values(SourceMode), mode);
    if (!parsedMode) {
      throw new McpError(
        JsonRpcErrorCode.InvalidMode,
        `Unknown source mode "${mode}". Expected one of: ${Object.values(SourceMode).join(', ')}`,
        { mode },
      );
    }

    const requested = narrowing?.trim() ? narrowing : undefined;
    if (parsedMode === SourceMode.USER) {
      if (!requested) {
        throw new McpError(
          JsonRpcErrorCode.InvalidMode,
          'User mode needs a tool name.',
          { mode, supportedTools: Object.values(UserTool) },
        );
      }
      return this.selectUserTool(requested);
    }

    const next = this.buildConfig(parsedMode, requested);
    this.config = Object.freeze(
      next.narrowing ? next : { mode: next.mode },
    );
    logger.info('Source mode changed', { ...this.config });
    return this.config;
  }

  /**
   * Activates user-annotation mode with the named tool.
   * @throws {McpError} UnsupportedTool for an unknown name; the configuration
   *   is unchanged.
   */
  selectUserTool(name: string): Readonly<SourceConfig> {
    const tool = UserAnnotationProvider.parseUserTool(name);
    this.config = Object.freeze({ mode: SourceMode.USER, activeUserTool: tool });
    logger.info('User annotation tool selected', { ...this.config });
    return this.config;
  }

  /**
   * Structure ids with annotation files for `tool`, else for the active
   * tool, else for every supported tool.
   */
  async listAvailableUserFiles(tool?: string): Promise<string[]> {
    const tools = tool
      ? [UserAnnotationProvider.parseUserTool(tool)]
      : this.config.activeUserTool
        ? [this.config.activeUserTool]
        : Object.values(UserTool);

    const ids = new Set<string>();
    for (const entry of tools) {
      for (const id of await this.userAnnotations.listAvailableFiles(entry)) {
        ids.add(id);
      }
    }
    return [...ids].sort();
  }

  getConfig(): Readonly<SourceConfig> {
    return this.config;
  }

  /**
   * Metadata of every provider the current configuration would query, in
   * query order.
   */
  describeActiveSources(): ProviderInfo[] {
    return this.plan(this.config).providers.map((provider) => provider.describe());
  }

  /**
   * Provider id of the most recent non-empty resolution.
   */
  getLastSourceUsed(): string | undefined {
    return this.lastSourceUsed;
  }

  /**
   * Structure id of the most recent resolution, the default target of
   * {@link forceRefresh}.
   */
  getLastResolvedId(): string | undefined {
    return this.lastPdbId;
  }

  /**
   * Per-provider outcome of the most recent resolution.
   */
  getLastOutcomes(): Readonly<Record<string, ProviderOutcome>> {
    return this.lastOutcomes;
  }

  clearCache(context: RequestContext): Promise<number> {
    return this.cache.clear(context);
  }

  /**
   * Drops the cached responses for `pdbId`, from every remote provider or
   * only from `providerId`.
   */
  invalidateCache(
    pdbId: string,
    providerId: string | undefined,
    context: RequestContext,
  ): Promise<number> {
    return this.cache.invalidate(pdbId, providerId, context);
  }

  purgeExpiredCache(context: RequestContext): Promise<number> {
    return this.cache.purgeExpired(context);
  }

  /**
   * Which sources hold data for `pdbId`, keyed by provider id, with user
   * annotation tools keyed `user:<tool>`. Local sources and user files are
   * checked directly; remote sources only through their cache entry, so no
   * network request is made.
   */
  async checkAvailability(
    pdbId: string,
    context: RequestContext,
  ): Promise<Record<string, SourceAvailability>> {
    const normalizedId = normalizePdbId(pdbId);
    if (!normalizedId) {
      throw new McpError(
        JsonRpcErrorCode.InvalidParams,
        'Structure id must not be empty.',
        { requestId: context.requestId },
      );
    }

    const availability: Record<string, SourceAvailability> = {};
    for (const provider of this.localProviders) {
      availability[provider.id] = await provider
        .getMotifs(normalizedId, context)
        .then((result): SourceAvailability =>
          isEmptyMotifMap(result.motifs) ? 'absent' : 'available',
        )
        .catch((error: unknown): SourceAvailability => {
          if (isConfigurationError(error)) throw error;
          logger.debug(`Availability of ${provider.id} undetermined: ${errorMessage(error)}`, {
            ...context,
            providerId: provider.id,
            pdbId: normalizedId,
          });
          return outcomeOf(error) === 'not_found' ? 'absent' : 'unknown';
        });
    }

    for (const provider of this.remoteProviders) {
      const cached = provider.describe().cacheable
        ? await this.cache.get(this.cacheKey(provider, normalizedId), context)
        : undefined;
      availability[provider.id] = !cached
        ? 'unknown'
        : isEmptyMotifMap(cached.motifs)
          ? 'absent'
          : 'available';
    }

    for (const tool of Object.values(UserTool)) {
      const ids = await this.userAnnotations.listAvailableFiles(tool);
      availability[`${ProviderId.USER}:${tool}`] = ids.includes(normalizedId)
        ? 'available'
        : 'absent';
    }
    return availability;
  }

  cacheStats(context: RequestContext): Promise<CacheStats> {
    return this.cache.stats(context);
  }

  private buildConfig(
    mode: Exclude<SourceMode, SourceMode.USER>,
    requested: string | undefined,
  ): SourceConfig {
    switch (mode) {
      case SourceMode.LOCAL:
        return {
          mode,
          narrowing: this.parseNarrowing(mode, Object.values(LocalSource), requested),
        };
      case SourceMode.WEB:
        return {
          mode,
          narrowing: this.parseNarrowing(mode, Object.values(WebSource), requested),
        };
      case SourceMode.AUTO:
      case SourceMode.ALL:
        if (requested) {
          throw new McpError(
            JsonRpcErrorCode.InvalidMode,
            `Mode "${mode}" does not accept a source narrowing (got "${requested}").`,
            { mode, narrowing: requested },
          );
        }
        return { mode };
    }
  }

  private parseNarrowing<T extends LocalSource | WebSource>(
    mode: SourceMode,
    allowed: readonly T[],
    requested: string | undefined,
  ): T | undefined {
    if (requested === undefined) return undefined;
    const narrowing = parseMember(allowed, requested);
    if (!narrowing) {
      throw new McpError(
        JsonRpcErrorCode.InvalidMode,
        `Unknown ${mode} source "${requested}". Expected one of: ${allowed.join(', ')}`,
        { mode, narrowing: requested },
      );
    }
    return narrowing;
  }

  private plan(config: Readonly<SourceConfig>): ResolutionPlan {
    switch (config.mode) {
      case SourceMode.AUTO:
        return {
          strategy: 'first-non-empty',
          providers: [...this.localProviders, ...this.remoteProviders],
        };
      case SourceMode.ALL:
        return {
          strategy: 'union',
          providers: [...this.localProviders, ...this.remoteProviders],
        };
      case SourceMode.LOCAL:
        return {
          strategy: 'first-non-empty',
          providers: this.narrow(this.localProviders, LOCAL_TARGETS, config.narrowing),
        };
      case SourceMode.WEB:
        return {
          strategy: 'first-non-empty',
          providers: this.narrow(this.remoteProviders, WEB_TARGETS, config.narrowing),
        };
      case SourceMode.USER: {
        if (!config.activeUserTool) {
          throw new McpError(
            JsonRpcErrorCode.InvalidMode,
            'User mode is active without a selected tool.',
          );
        }
        return {
          strategy: 'first-non-empty',
          providers: [this.userAnnotations.forTool(config.activeUserTool)],
        };
      }
    }
  }

  private narrow(
    providers: readonly IMotifProvider[],
    targets: Readonly<Record<string, string>>,
    narrowing: string | undefined,
  ): IMotifProvider[] {
    if (!narrowing) return [...providers];
    const targetId = targets[narrowing];
    const provider = providers.find((candidate) => candidate.id === targetId);
    if (!targetId || !provider) {
      throw new McpError(
        JsonRpcErrorCode.ConfigurationError,
        `Source "${narrowing}" has no registered provider.`,
        { narrowing, providerId: targetId },
      );
    }
    return [provider];
  }

  private async run(
    pdbId: string,
    context: RequestContext,
    options: ResolveOptions,
  ): Promise<AnnotationResult> {
    const normalizedId = normalizePdbId(pdbId);
    if (!normalizedId) {
      throw new McpError(
        JsonRpcErrorCode.InvalidParams,
        'Structure id must not be empty.',
        { requestId: context.requestId },
      );
    }

    const snapshot = this.config;
    const plan = this.plan(snapshot);
    const outcomes: Record<string, ProviderOutcome> = {};
    this.lastPdbId = normalizedId;

    logger.debug('Resolving motifs', {
      ...context,
      pdbId: normalizedId,
      mode: snapshot.mode,
      narrowing: snapshot.narrowing,
      providers: plan.providers.map((provider) => provider.id),
      refresh: options.refresh,
    });

    const result =
      plan.strategy === 'union'
        ? await this.resolveUnion(plan.providers, normalizedId, context, options, outcomes)
        : await this.resolveFirst(plan.providers, normalizedId, context, options, outcomes);

    if (options.refresh) await this.dropStaleEntries(normalizedId, outcomes, context);

    this.lastOutcomes = Object.freeze({ ...outcomes });
    if (!isEmptyMotifMap(result.motifs)) this.lastSourceUsed = result.providerId;

    logger.info('Motif resolution complete', {
      ...context,
      pdbId: normalizedId,
      mode: snapshot.mode,
      providerId: result.providerId,
      instances: countInstances(result.motifs),
      motifs: summarizeMotifs(result.motifs),
      outcomes,
    });
    return result;
  }

  private async resolveFirst(
    providers: readonly IMotifProvider[],
    pdbId: string,
    context: RequestContext,
    options: ResolveOptions,
    outcomes: Record<string, ProviderOutcome>,
  ): Promise<AnnotationResult> {
    for (const provider of providers) {
      const result = await this.fetchThroughCache(provider, pdbId, context, options, outcomes)
        .catch((error: unknown) => this.absorbFailure(provider, error, context, outcomes));
      if (result && !isEmptyMotifMap(result.motifs)) return result;
    }
    return createResult(NO_PROVIDER_ID, {});
  }

  private async resolveUnion(
    providers: readonly IMotifProvider[],
    pdbId: string,
    context: RequestContext,
    options: ResolveOptions,
    outcomes: Record<string, ProviderOutcome>,
  ): Promise<AnnotationResult> {
    const settled = await Promise.all(
      providers.map((provider) =>
        withTimeout(
          this.fetchThroughCache(provider, pdbId, context, options, outcomes),
          this.providerTimeoutMs,
          `Provider ${provider.id}`,
        ).catch((error: unknown) =>
          this.absorbFailure(provider, error, context, outcomes),
        ),
      ),
    );

    const maps = settled.flatMap((result) => (result ? [result.motifs] : []));
    return createResult(UNION_PROVIDER_ID, unionMotifMaps(maps));
  }

  private async fetchThroughCache(
    provider: IMotifProvider,
    pdbId: string,
    context: RequestContext,
    options: ResolveOptions,
    outcomes: Record<string, ProviderOutcome>,
  ): Promise<AnnotationResult> {
    if (!provider.describe().cacheable) {
      const result = await provider.getMotifs(pdbId, context);
      outcomes[provider.id] = isEmptyMotifMap(result.motifs) ? 'empty' : 'hit';
      return result;
    }

    const key = this.cacheKey(provider, pdbId);
    if (!options.refresh) {
      const cached = await this.cache.get(key, context);
      if (cached) {
        outcomes[provider.id] = 'cache_hit';
        logger.debug('Serving motifs from cache', {
          ...context,
          providerId: provider.id,
          pdbId,
          key,
        });
        return cached;
      }
    }

    const result = await provider.getMotifs(pdbId, context);
    const empty = isEmptyMotifMap(result.motifs);
    outcomes[provider.id] = empty ? 'empty' : 'hit';
    if (!empty || options.refresh) {
      await this.store(key, result, pdbId, context);
    }
    return result;
  }

  private cacheKey(provider: IMotifProvider, pdbId: string): string {
    return CacheManager.deriveKey(provider.id, pdbId, provider.cacheParameters?.() ?? {});
  }

  /**
   * After a refresh, removes the entries of cacheable remote providers that
   * were not queried, so a later mode change cannot serve them.
   */
  private async dropStaleEntries(
    pdbId: string,
    outcomes: Readonly<Record<string, ProviderOutcome>>,
    context: RequestContext,
  ): Promise<void> {
    for (const provider of this.remoteProviders) {
      if (outcomes[provider.id] !== undefined || !provider.describe().cacheable) {
        continue;
      }
      try {
        await this.cache.invalidate(pdbId, provider.id, context);
      } catch (error) {
        logger.warning(`Could not drop cached ${provider.id} response: ${errorMessage(error)}`, {
          ...context,
          providerId: provider.id,
          pdbId,
        });
      }
    }
  }

  private async store(
    key: string,
    result: AnnotationResult,
    pdbId: string,
    context: RequestContext,
  ): Promise<void> {
    try {
      await this.cache.put(key, result, context, { pdbId });
    } catch (error) {
      logger.warning(`Could not cache ${result.providerId} response: ${errorMessage(error)}`, {
        ...context,
        providerId: result.providerId,
        pdbId,
        key,
      });
    }
  }

  /**
   * Records and logs a provider failure. Configuration errors are rethrown;
   * everything else resolves to `undefined` (no contribution).
   */
  private absorbFailure(
    provider: IMotifProvider,
    error: unknown,
    context: RequestContext,
    outcomes: Record<string, ProviderOutcome>,
  ): undefined {
    if (isConfigurationError(error)) throw error;

    outcomes[provider.id] = outcomeOf(error);
    const logContext = {
      ...context,
      providerId: provider.id,
      errorCode: error instanceof McpError ? error.code : undefined,
    };
    const message = `Provider ${provider.id} contributed nothing: ${errorMessage(error)}`;

    if (!(error instanceof McpError)) {
      logger.error(message, { ...logContext, error });
      return undefined;
    }
    switch (error.code) {
      case JsonRpcErrorCode.NotFound:
        logger.debug(message, logContext);
        break;
      case JsonRpcErrorCode.ServiceUnavailable:
      case JsonRpcErrorCode.Timeout:
        logger.warning(message, logContext);
        break;
      case JsonRpcErrorCode.MalformedData:
        logger.warning(message, { ...logContext, details: error.data });
        break;
      default:
        logger.error(message, { ...logContext, error });
    }
    return undefined;
  }
}
