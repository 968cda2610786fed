import type { CacheEntry, CacheStore } from './cacheStore';
import { SingleFlight } from '../utils/singleFlight';
import { waitWithTimeout } from '../utils/timeouts';
import { logger } from '../utils/logger';
import { PipelineError, describeError, handleError } from '../utils/errorHandler';

export type { CacheEntry, CacheStore } from './cacheStore';

/**
 * What a reader does when the entry is expired and a regeneration is running:
 * wait for it (bounded by waitTimeoutMs) or take the stale entry right away.
 */
export type RegenerationPolicy = 'wait' | 'serve-stale';

export type StaleReason = 'regenerating' | 'timeout' | 'error' | 'rejected';

export type CacheLookup<T> =
  | { state: 'hit'; entry: CacheEntry<T> }
  | { state: 'regenerated'; entry: CacheEntry<T> }
  | { state: 'stale'; entry: CacheEntry<T>; reason: StaleReason; error?: PipelineError }
  | { state: 'empty'; payload: T }
  | { state: 'unavailable'; reason: 'timeout' | 'error' | 'aborted'; error?: PipelineError };

export interface CacheStatus {
  present: boolean;
  valid: boolean;
  ageMs: number | null;
  ttlMs: number;
  createdAt: string | null;
  regenerating: boolean;
}

export type Generator<T> = (signal: AbortSignal) => Promise<T>;

type RegenerationOutcome<T> =
  | { kind: 'stored'; entry: CacheEntry<T> }
  | { kind: 'rejected'; payload: T }
  | { kind: 'failed'; error: PipelineError };

export interface ResultCacheOptions<T> {
  name: string;
  store: CacheStore<T>;
  ttlMs: number;
  whileRegenerating?: RegenerationPolicy;
  waitTimeoutMs?: number;
  /** Payloads failing this check are handed back but never replace the stored entry. */
  shouldStore?: (payload: T) => boolean;
  now?: () => number;
}

/**
 * Single named, TTL-bound value with single-flight regeneration.
 *
 * Absent -> put -> Valid -> (ttl) -> Expired (still readable as stale fallback) -> put -> Valid.
 * invalidate() drops the entry whatever its state.
 */
export class ResultCache<T> {
  readonly name: string;
  private readonly store: CacheStore<T>;
  private readonly ttlMs: number;
  private readonly policy: RegenerationPolicy;
  private readonly waitTimeoutMs: number;
  private readonly shouldStore?: (payload: T) => boolean;
  private readonly now: () => number;
  private readonly guard = new SingleFlight<RegenerationOutcome<T>>();
  private activeRun: AbortController | null = null;

  constructor(options: ResultCacheOptions<T>) {
    this.name = options.name;
    this.store = options.store;
    this.ttlMs = options.ttlMs;
    this.policy = options.whileRegenerating ?? 'wait';
    this.waitTimeoutMs = options.waitTimeoutMs ?? 120000;
    this.shouldStore = options.shouldStore;
    this.now = options.now ?? Date.now;
  }

  isValid(entry: CacheEntry<T>): boolean {
    return this.now() - entry.createdAt < entry.ttlMs;
  }

  /**
   * The current entry, or null when absent or expired.
   */
  async get(): Promise<CacheEntry<T> | null> {
    const entry = await this.store.read();
    return entry && this.isValid(entry) ? entry : null;
  }

  /**
   * The most recent entry regardless of age, for degraded serving.
   */
  async getStaleFallback(): Promise<CacheEntry<T> | null> {
    return this.store.read();
  }

  async put(payload: T): Promise<CacheEntry<T>> {
    const entry: CacheEntry<T> = { payload, createdAt: this.now(), ttlMs: this.ttlMs };
    await this.store.write(entry);
    return entry;
  }

  async invalidate(): Promise<void> {
    await this.store.clear();
    logger.info(`Cache "${this.name}" invalidated`);
  }

  async status(): Promise<CacheStatus> {
    const entry = await this.store.read();
    return {
      present: entry !== null,
      valid: entry !== null && this.isValid(entry),
      ageMs: entry ? this.now() - entry.createdAt : null,
      ttlMs: this.ttlMs,
      createdAt: entry ? new Date(entry.createdAt).toISOString() : null,
      regenerating: this.guard.isRunning,
    };
  }

  get regenerationCount(): number {
    return this.guard.startedRuns;
  }

  get isRegenerating(): boolean {
    return this.guard.isRunning;
  }

  /**
   * Serves the valid entry, or regenerates through the single-flight guard.
   * `signal` only ends this caller's wait; the regeneration itself always
   * runs to completion and populates the cache for later readers.
   */
  async getOrRegenerate(generate: Generator<T>, options: { signal?: AbortSignal } = {}): Promise<CacheLookup<T>> {
    const current = await this.store.read();
    if (current && this.isValid(current)) {
      return { state: 'hit', entry: current };
    }

    const joining = this.guard.isRunning;
    const flight = this.startRegeneration(generate);

    if (current && this.policy === 'serve-stale') {
      logger.debug(`Cache "${this.name}" expired; serving stale entry while ${joining ? 'a refresh runs' : 'refreshing in background'}`);
      return { state: 'stale', entry: current, reason: 'regenerating' };
    }

    const waited = await waitWithTimeout(flight, this.waitTimeoutMs, options.signal);
    if (waited.status === 'settled') {
      return this.toLookup(waited.value);
    }

    const fallback = await this.store.read();
    if (waited.status === 'aborted') {
      logger.debug(`Cache "${this.name}": caller stopped waiting, regeneration continues`);
      return { state: 'unavailable', reason: 'aborted' };
    }

    logger.warn(`Cache "${this.name}": regeneration still running after ${this.waitTimeoutMs}ms`);
    const error = new PipelineError(
      `Regeneration of ${this.name} did not finish within ${this.waitTimeoutMs}ms`,
      'REGENERATION_TIMEOUT',
      503,
      true
    );
    if (fallback) {
      return { state: 'stale', entry: fallback, reason: 'timeout', error };
    }
    return { state: 'unavailable', reason: 'timeout', error };
  }

  /**
   * Regenerates regardless of the current entry's validity, joining a run
   * already in flight.
   */
  async regenerate(generate: Generator<T>): Promise<CacheLookup<T>> {
    return this.toLookup(await this.startRegeneration(generate));
  }

  /**
   * Cancels the regeneration in flight, if any (shutdown).
   */
  abortRegeneration(): void {
    if (this.activeRun) {
      this.activeRun.abort(new PipelineError(`Cache ${this.name} shutting down`, 'REQUEST_ABORTED', 503, true));
    }
  }

  private startRegeneration(generate: Generator<T>): Promise<RegenerationOutcome<T>> {
    return this.guard.run(async () => {
      const controller = new AbortController();
      this.activeRun = controller;
      const started = this.now();
      logger.info(`Cache "${this.name}": regeneration started`);

      try {
        const payload = await generate(controller.signal);
        if (this.shouldStore && !this.shouldStore(payload)) {
          logger.warn(`Cache "${this.name}": regeneration produced nothing worth storing; keeping previous entry`);
          return { kind: 'rejected', payload };
        }
        const entry = await this.put(payload);
        logger.info(`Cache "${this.name}": regenerated in ${this.now() - started}ms`);
        return { kind: 'stored', entry };
      } catch (error) {
        const failure = error instanceof PipelineError
          ? error
          : new PipelineError(`Regeneration of ${this.name} failed: ${describeError(error)}`, 'REGENERATION_FAILED', 503, true, error);
        handleError(failure, `cache:${this.name}`);
        return { kind: 'failed', error: failure };
      } finally {
        this.activeRun = null;
      }
    });
  }

  private async toLookup(outcome: RegenerationOutcome<T>): Promise<CacheLookup<T>> {
    if (outcome.kind === 'stored') {
      return { state: 'regenerated', entry: outcome.entry };
    }
    const fallback = await this.store.read();
    if (outcome.kind === 'rejected') {
      return fallback
        ? { state: 'stale', entry: fallback, reason: 'rejected' }
        : { state: 'empty', payload: outcome.payload };
    }
    return fallback
      ? { state: 'stale', entry: fallback, reason: 'error', error: outcome.error }
      : { state: 'unavailable', reason: 'error', error: outcome.error };
  }
}
