import { ResultCache, type Generator } from './resultCache';
import { logger } from '../utils/logger';
import { handleError } from '../utils/errorHandler';

/**
 * Keeps a cache populated ahead of readers: checks on start and every
 * `intervalMs`, regenerating whenever the entry is absent or expired.
 */
export class CacheWarmer<T> {
  private interval: NodeJS.Timeout | null = null;
  private isRunning = false;
  private ticks = 0;

  constructor(
    private readonly cache: ResultCache<T>,
    private readonly generate: Generator<T>,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.interval || this.intervalMs <= 0) return;

    logger.info(`Starting cache warmer for "${this.cache.name}" (every ${Math.round(this.intervalMs / 1000)}s)`);

    void this.tick();

    this.interval = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.interval.unref();
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      logger.info(`Cache warmer for "${this.cache.name}" stopped`);
    }
  }

  get isStarted(): boolean {
    return this.interval !== null;
  }

  get completedTicks(): number {
    return this.ticks;
  }

  /**
   * One warm-up pass. Resolves once the pass (and any regeneration it started) is done.
   */
  async tick(): Promise<void> {
    if (this.isRunning) {
      logger.warn(`Cache warm-up for "${this.cache.name}" already in progress, skipping this tick.`);
      return;
    }

    this.isRunning = true;
    try {
      const entry = await this.cache.get();
      if (entry) {
        logger.debug(`Cache "${this.cache.name}" still valid, nothing to warm`);
        return;
      }
      const lookup = await this.cache.regenerate(this.generate);
      logger.info(`Cache warm-up for "${this.cache.name}" finished: ${lookup.state}`);
    } catch (error) {
      handleError(error, `warmer:${this.cache.name}`);
    } finally {
      this.isRunning = false;
      this.ticks++;
    }
  }
}
