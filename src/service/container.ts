import * as path from 'path';
import type { Config } from '../config/config';
import { ResultCache } from '../cache/resultCache';
import { type CacheStore, FileCacheStore, MemoryCacheStore } from '../cache/cacheStore';
import type { CacheWarmer } from '../cache/cacheWarmer';
import { BatchGenerator } from '../batch/batchGenerator';
import { CandidateSource } from '../trends/candidateSource';
import { RedditClient } from '../trends/redditClient';
import { createContentSafetyFilter } from '../safety/contentSafetyFilter';
import { HttpFaceModelClient } from '../faceswap/httpFaceModelClient';
import { BlendFaceSwapper } from '../faceswap/blendSwapper';
import type { FaceSwapper } from '../faceswap/faceModel';
import { HttpImageFetcher } from '../faceswap/imageFetcher';
import { QualityGatedTransform } from '../faceswap/qualityGatedTransform';
import { ReferenceFaceProvider } from '../faceswap/referenceFace';
import { FallbackImageSearch } from '../search/imageSearch';
import { WikimediaImageSearch } from '../search/wikimediaClient';
import { DuckDuckGoImageSearch } from '../search/duckDuckGoClient';
import { FileArtifactStore } from '../storage/artifactStore';
import type { SuccessfulTransform } from '../types/transform';
import { TrendSwapService } from './trendSwapService';
import { isBatchPayload } from './batchPayload';
import { logger } from '../utils/logger';

export interface AppContext {
  config: Config;
  service: TrendSwapService;
  batchCache: ResultCache<SuccessfulTransform[]>;
  warmer: CacheWarmer<SuccessfulTransform[]>;
  faceModel: HttpFaceModelClient;
  artifactDir: string;
}

function resolvePath(baseDir: string, target: string): string {
  return path.isAbsolute(target) ? target : path.join(baseDir, target);
}

/**
 * Wires the pipeline from configuration. Relative paths resolve against `baseDir`.
 */
export function createAppContext(config: Config, baseDir: string = process.cwd()): AppContext {
  const safety = createContentSafetyFilter(resolvePath(baseDir, config.safety.blockListPath));

  const reddit = new RedditClient({
    userAgent: config.reddit.userAgent,
    timeoutMs: config.reddit.timeoutMs,
    clientId: config.reddit.clientId,
    clientSecret: config.reddit.clientSecret,
  });

  const candidates = new CandidateSource(reddit, safety, {
    groupTimeoutMs: config.trends.groupTimeoutMs,
    maxCandidates: config.trends.maxCandidates,
    imageHosts: config.trends.imageHosts,
    cacheTtlMs: config.trends.cacheTtlMs,
  });

  const faceModel = new HttpFaceModelClient(config.faceModel.baseUrl, config.faceModel.timeoutMs);
  const swapper: FaceSwapper = config.faceModel.swapMode === 'blend'
    ? new BlendFaceSwapper(config.faceModel.blendOpacity)
    : faceModel;

  const artifactDir = resolvePath(baseDir, config.storage.artifactDir);
  const transform = new QualityGatedTransform(
    {
      fetcher: new HttpImageFetcher(config.transform.downloadTimeoutMs),
      detector: faceModel,
      swapper,
      artifacts: new FileArtifactStore(artifactDir, config.server.artifactRoute),
    },
    {
      detectionTiers: config.transform.detectionTiers,
      gate: config.transform.gate,
      jpegQuality: config.transform.jpegQuality,
    }
  );

  const generator = new BatchGenerator(candidates, transform, {
    groups: config.trends.groups,
    perGroupLimit: config.trends.perGroupLimit,
    poolSize: config.batch.poolSize,
    shuffle: config.batch.shuffle,
  });

  const store: CacheStore<SuccessfulTransform[]> = config.cache.store === 'file'
    ? new FileCacheStore(resolvePath(baseDir, config.cache.filePath), isBatchPayload)
    : new MemoryCacheStore();

  const batchCache = new ResultCache<SuccessfulTransform[]>({
    name: 'batch',
    store,
    ttlMs: config.cache.ttlMs,
    whileRegenerating: config.cache.whileRegenerating,
    waitTimeoutMs: config.cache.waitTimeoutMs,
    // Never let a zero-yield run evict a good batch
    shouldStore: (payload) => payload.length > 0,
  });

  const imageSearch = new FallbackImageSearch(
    new WikimediaImageSearch({ userAgent: config.search.userAgent, timeoutMs: config.search.timeoutMs }),
    new DuckDuckGoImageSearch({ timeoutMs: config.search.timeoutMs }),
    config.search.minResults
  );

  const service = new TrendSwapService(
    {
      batchCache,
      generator,
      transform,
      references: new ReferenceFaceProvider(resolvePath(baseDir, config.faceModel.referenceFacePath), faceModel),
      candidates,
      imageSearch,
    },
    {
      targetSuccesses: config.batch.targetSuccesses,
      maxAttempts: config.batch.maxAttempts,
      trendGroups: config.trends.groups,
      perGroupLimit: config.trends.perGroupLimit,
      searchGroups: config.trends.searchGroups,
      searchLimit: config.trends.searchLimit,
      imageLimit: config.search.imageLimit,
    }
  );

  const warmer = service.createWarmer(config.cache.warmIntervalMs);

  logger.debug(`Pipeline wired: cache ${store.description}, swap via ${swapper.name}, ${safety.termCount} blocked terms`);
  return { config, service, batchCache, warmer, faceModel, artifactDir };
}
