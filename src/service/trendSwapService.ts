import type { ResultCache, CacheLookup, CacheStatus, StaleReason } from '../cache/resultCache';
import { CacheWarmer } from '../cache/cacheWarmer';
import type { BatchGenerator, BatchRun, OutcomeTally } from '../batch/batchGenerator';
import type { CandidateSource } from '../trends/candidateSource';
import type { QualityGatedTransform } from '../faceswap/qualityGatedTransform';
import { directCandidate } from '../faceswap/qualityGatedTransform';
import type { ReferenceFaceProvider } from '../faceswap/referenceFace';
import type { ImageSearchProvider } from '../search/imageSearch';
import { isHttpUrl } from '../trends/imageFilter';
import type { Candidate } from '../types/candidate';
import type { SuccessfulTransform, TransformResult } from '../types/transform';
import { type BatchItem, toBatchItem } from './batchPayload';
import { logger } from '../utils/logger';
import { PipelineError } from '../utils/errorHandler';

export interface TrendSwapSettings {
  targetSuccesses: number;
  maxAttempts: number;
  trendGroups: readonly string[];
  perGroupLimit: number;
  searchGroups: readonly string[];
  searchLimit: number;
  imageLimit: number;
}

export interface TrendSwapDeps {
  batchCache: ResultCache<SuccessfulTransform[]>;
  generator: BatchGenerator;
  transform: QualityGatedTransform;
  references: ReferenceFaceProvider;
  candidates: CandidateSource;
  imageSearch: ImageSearchProvider;
}

/**
 * What a reader of the current batch gets. `empty` (the last run found
 * nothing) and `unavailable` (no data, regeneration failed or is still
 * running) are deliberately different states.
 */
export type BatchView =
  | { status: 'fresh'; items: BatchItem[]; generatedAt: string; ageMs: number; regenerated: boolean }
  | { status: 'stale'; items: BatchItem[]; generatedAt: string; ageMs: number; reason: string; message: string }
  | { status: 'empty'; items: []; message: string }
  | { status: 'unavailable'; items: []; message: string; error?: PipelineError };

export interface RunSummary {
  finishedAt: string;
  durationMs: number;
  successes: number;
  attempted: number;
  cancelled: number;
  tally: OutcomeTally;
}

export interface ServiceStatus extends CacheStatus {
  lastRun: RunSummary | null;
}

export interface SingleSwapResult {
  query: string;
  attempted: number;
  item: BatchItem | null;
  message?: string;
}

const STALE_MESSAGES: Record<StaleReason, string> = {
  regenerating: 'Showing the previous batch while a new one is generated.',
  timeout: 'Generating a new batch is taking longer than expected; showing the previous one.',
  error: 'Could not generate a new batch; showing the previous one.',
  rejected: 'The latest run found no usable images; showing the previous batch.',
};

export class TrendSwapService {
  private lastRun: RunSummary | null = null;

  constructor(
    private readonly deps: TrendSwapDeps,
    private readonly settings: TrendSwapSettings,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * The cached batch, regenerating on a miss. `signal` ends only this
   * caller's wait; a started regeneration still completes.
   */
  async getCurrentBatch(signal?: AbortSignal): Promise<BatchView> {
    const lookup = await this.deps.batchCache.getOrRegenerate(this.generateBatch, { signal });
    return this.toView(lookup);
  }

  async forceRegenerate(): Promise<BatchView> {
    logger.info('Forced batch regeneration requested');
    return this.toView(await this.deps.batchCache.regenerate(this.generateBatch));
  }

  async transformSingle(url: string, signal?: AbortSignal): Promise<TransformResult> {
    const trimmed = url.trim();
    if (!isHttpUrl(trimmed)) {
      throw new PipelineError(`Invalid image URL: ${url}`, 'INVALID_INPUT', 400);
    }
    const reference = await this.deps.references.get();
    return this.deps.transform.transform(directCandidate(trimmed), reference, signal);
  }

  async cacheStatus(): Promise<ServiceStatus> {
    return { ...(await this.deps.batchCache.status()), lastRun: this.lastRun };
  }

  async invalidate(): Promise<void> {
    await this.deps.batchCache.invalidate();
  }

  /**
   * A URL is swapped directly; anything else searches the configured groups
   * and returns the first candidate that swaps.
   */
  async customSearch(query: string, signal?: AbortSignal): Promise<SingleSwapResult> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new PipelineError('A search term or image URL is required', 'INVALID_INPUT', 400);
    }

    if (isHttpUrl(trimmed)) {
      const result = await this.transformSingle(trimmed, signal);
      return result.outcome === 'success'
        ? { query: trimmed, attempted: 1, item: toBatchItem(result) }
        : { query: trimmed, attempted: 1, item: null, message: result.reason };
    }

    const candidates = await this.deps.candidates.search(trimmed, this.settings.searchGroups, this.settings.searchLimit, signal);
    return this.firstSuccess(trimmed, candidates.slice(0, this.settings.searchLimit), signal);
  }

  async celebritySwap(name: string, signal?: AbortSignal): Promise<SingleSwapResult> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new PipelineError('A name is required', 'INVALID_INPUT', 400);
    }

    const urls = await this.deps.imageSearch.search(trimmed, this.settings.imageLimit, signal);
    const candidates: Candidate[] = urls.map(url => ({ ...directCandidate(url, trimmed), sourceTag: 'celebrity' }));
    return this.firstSuccess(trimmed, candidates, signal);
  }

  /**
   * Background warmer that regenerates the batch cache through the same path as readers.
   */
  createWarmer(intervalMs: number): CacheWarmer<SuccessfulTransform[]> {
    return new CacheWarmer(this.deps.batchCache, this.generateBatch, intervalMs);
  }

  async getTrends(limit: number, signal?: AbortSignal): Promise<Candidate[]> {
    const candidates = await this.deps.candidates.fetch(this.settings.trendGroups, this.settings.perGroupLimit, signal);
    return candidates.slice(0, Math.max(0, limit));
  }

  private readonly generateBatch = async (signal: AbortSignal): Promise<SuccessfulTransform[]> => {
    const started = this.now();
    const reference = await this.deps.references.get();
    const run = await this.deps.generator.generate(
      this.settings.targetSuccesses,
      this.settings.maxAttempts,
      reference,
      { signal }
    );
    if (run.aborted) {
      throw new PipelineError('Batch generation aborted', 'REQUEST_ABORTED', 499, true);
    }
    this.lastRun = this.summarize(run, started);
    return run.results;
  };

  private async firstSuccess(query: string, candidates: Candidate[], signal?: AbortSignal): Promise<SingleSwapResult> {
    if (candidates.length === 0) {
      return { query, attempted: 0, item: null, message: 'No images found' };
    }
    const reference = await this.deps.references.get();
    const run = await this.deps.generator.generateFrom(candidates, 1, candidates.length, reference, { signal });
    const first = run.results[0];
    return first
      ? { query, attempted: run.attempted, item: toBatchItem(first) }
      : { query, attempted: run.attempted, item: null, message: `None of ${run.attempted} images had a usable face` };
  }

  private summarize(run: BatchRun, started: number): RunSummary {
    return {
      finishedAt: new Date(this.now()).toISOString(),
      durationMs: this.now() - started,
      successes: run.results.length,
      attempted: run.attempted,
      cancelled: run.cancelled,
      tally: run.tally,
    };
  }

  private toView(lookup: CacheLookup<SuccessfulTransform[]>): BatchView {
    switch (lookup.state) {
      case 'hit':
      case 'regenerated':
        return {
          status: 'fresh',
          items: lookup.entry.payload.map(toBatchItem),
          generatedAt: new Date(lookup.entry.createdAt).toISOString(),
          ageMs: this.now() - lookup.entry.createdAt,
          regenerated: lookup.state === 'regenerated',
        };
      case 'stale':
        return {
          status: 'stale',
          items: lookup.entry.payload.map(toBatchItem),
          generatedAt: new Date(lookup.entry.createdAt).toISOString(),
          ageMs: this.now() - lookup.entry.createdAt,
          reason: lookup.reason,
          message: STALE_MESSAGES[lookup.reason],
        };
      case 'empty':
        return { status: 'empty', items: [], message: 'No images with a usable face were found this time.' };
      case 'unavailable':
        return {
          status: 'unavailable',
          items: [],
          message: lookup.reason === 'timeout'
            ? 'A new batch is still being generated. Please try again shortly.'
            : 'The batch is temporarily unavailable.',
          error: lookup.error,
        };
    }
  }
}
