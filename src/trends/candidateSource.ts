import type { TrendProvider } from './trendProvider';
import { isStaticImageUrl } from './imageFilter';
import type { Candidate, RawTrendItem } from '../types/candidate';
import type { ContentSafetyFilter } from '../safety/contentSafetyFilter';
import { ResultCache } from '../cache/resultCache';
import { MemoryCacheStore } from '../cache/cacheStore';
import { withTimeout } from '../utils/timeouts';
import { logger } from '../utils/logger';
import { describeError } from '../utils/errorHandler';

export interface CandidateSourceOptions {
  groupTimeoutMs: number;
  maxCandidates: number;
  imageHosts: readonly string[];
  cacheTtlMs: number;
  now?: () => number;
}

/**
 * One fetch across a set of groups, as stored in the short-lived trend cache.
 */
export interface TrendSnapshot {
  candidates: Candidate[];
  failedGroups: string[];
  groupCount: number;
}

type GroupLoader = (group: string, signal: AbortSignal) => Promise<RawTrendItem[]>;

export function trendCacheKey(groups: readonly string[], perGroupLimit: number): string {
  return `trends:${perGroupLimit}:${groups.join('|')}`;
}

/**
 * Builds the ranked candidate list: concurrent per-group fetches, still-image
 * filter, content safety, dedup by identity key (last seen wins), score order, cap.
 */
export class CandidateSource {
  // Group list -> per-group limit -> cache
  private readonly caches = new Map<string, Map<number, ResultCache<TrendSnapshot>>>();

  constructor(
    private readonly provider: TrendProvider,
    private readonly safety: ContentSafetyFilter,
    private readonly options: CandidateSourceOptions
  ) {}

  async fetch(groups: readonly string[], perGroupLimit: number, signal?: AbortSignal): Promise<Candidate[]> {
    const cache = this.cacheFor(groups, perGroupLimit);
    const lookup = await cache.getOrRegenerate(
      (cacheSignal) => this.collect(groups, (group, groupSignal) => this.provider.hot(group, perGroupLimit, groupSignal), cacheSignal),
      { signal }
    );

    switch (lookup.state) {
      case 'hit':
      case 'regenerated':
      case 'stale':
        return lookup.entry.payload.candidates;
      case 'empty':
        return lookup.payload.candidates;
      case 'unavailable':
        logger.warn(`No trend data available for ${trendCacheKey(groups, perGroupLimit)} (${lookup.reason})`);
        return [];
    }
  }

  /**
   * Free-text search across groups; same filtering and ranking as fetch, never cached.
   */
  async search(query: string, groups: readonly string[], perGroupLimit: number, signal?: AbortSignal): Promise<Candidate[]> {
    const snapshot = await this.collect(
      groups,
      (group, groupSignal) => this.provider.search(group, query, perGroupLimit, groupSignal),
      signal
    );
    return snapshot.candidates;
  }

  /**
   * Drops the cached fetch for one limit, or for every limit when none is given.
   */
  async invalidate(groups: readonly string[], perGroupLimit?: number): Promise<void> {
    const byLimit = this.caches.get(groups.join('|'));
    if (!byLimit) {
      return;
    }
    const targets = perGroupLimit === undefined ? [...byLimit.values()] : [byLimit.get(perGroupLimit)];
    for (const cache of targets) {
      await cache?.invalidate();
    }
  }

  /**
   * Raw items to ranked candidates. Exposed for callers that already hold provider items.
   */
  refine(items: ReadonlyArray<{ group: string; item: RawTrendItem }>): Candidate[] {
    const byIdentity = new Map<string, Candidate>();
    let dropped = 0;

    for (const { group, item } of items) {
      if (!isStaticImageUrl(item.url, this.options.imageHosts)) {
        dropped++;
        continue;
      }
      const flagged = item.flagged ?? false;
      if (!this.safety.isAdmissible(item.title, flagged)) {
        logger.debug(`Filtered out ${item.identityKey} from ${group}`);
        dropped++;
        continue;
      }
      byIdentity.set(item.identityKey, {
        identityKey: item.identityKey,
        label: item.title,
        sourceTag: group,
        popularityScore: item.score,
        flagged,
        imageUrl: item.url,
      });
    }

    const ranked = [...byIdentity.values()]
      .sort((a, b) => b.popularityScore - a.popularityScore)
      .slice(0, this.options.maxCandidates);

    logger.debug(`Refined ${items.length} items into ${ranked.length} candidates (${dropped} filtered)`);
    return ranked;
  }

  private cacheFor(groups: readonly string[], perGroupLimit: number): ResultCache<TrendSnapshot> {
    const groupsKey = groups.join('|');
    let byLimit = this.caches.get(groupsKey);
    if (!byLimit) {
      byLimit = new Map<number, ResultCache<TrendSnapshot>>();
      this.caches.set(groupsKey, byLimit);
    }
    let cache = byLimit.get(perGroupLimit);
    if (!cache) {
      const key = trendCacheKey(groups, perGroupLimit);
      cache = new ResultCache<TrendSnapshot>({
        name: key,
        store: new MemoryCacheStore<TrendSnapshot>(),
        ttlMs: this.options.cacheTtlMs,
        whileRegenerating: 'wait',
        waitTimeoutMs: this.options.groupTimeoutMs * 2,
        // A fetch where every group failed says nothing about the trends
        shouldStore: (snapshot) => snapshot.groupCount === 0 || snapshot.failedGroups.length < snapshot.groupCount,
        now: this.options.now,
      });
      byLimit.set(perGroupLimit, cache);
    }
    return cache;
  }

  private async collect(groups: readonly string[], load: GroupLoader, signal?: AbortSignal): Promise<TrendSnapshot> {
    const failedGroups: string[] = [];

    const perGroup = await Promise.all(groups.map(async (group) => {
      try {
        const items = await withTimeout(
          (groupSignal) => load(group, groupSignal),
          this.options.groupTimeoutMs,
          `${this.provider.name}:${group}`,
          signal
        );
        logger.debug(`Fetched ${items.length} items from ${group}`);
        return items.map(item => ({ group, item }));
      } catch (error) {
        logger.warn(`Group ${group} unavailable: ${describeError(error)}`);
        failedGroups.push(group);
        return [];
      }
    }));

    const candidates = this.refine(perGroup.flat());
    logger.info(`Candidate fetch over ${groups.length} groups: ${candidates.length} candidates, ${failedGroups.length} groups failed`);
    return { candidates, failedGroups, groupCount: groups.length };
  }
}
