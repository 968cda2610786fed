import { logger } from './logger';

/**
 * At most one execution in flight; callers arriving while it runs share its promise.
 * The slot frees itself once the run settles, successful or not.
 */
export class SingleFlight<T> {
  private pending: Promise<T> | null = null;
  private runs = 0;

  run(fn: () => Promise<T>): Promise<T> {
    if (this.pending) {
      return this.pending;
    }
    this.runs++;
    // Deferred start: the slot is taken before fn can settle, even synchronously
    const flight: Promise<T> = Promise.resolve()
      .then(fn)
      .finally(() => {
        if (this.pending === flight) {
          this.pending = null;
        }
      });
    this.pending = flight;
    return flight;
  }

  get isRunning(): boolean {
    return this.pending !== null;
  }

  /** Number of executions started so far. */
  get startedRuns(): number {
    return this.runs;
  }
}

type ResourceState<T> = { ready: false } | { ready: true; value: T };

/**
 * Process-wide resource that is expensive to create: initialised once on first use,
 * concurrent first callers share one initialisation, a failed attempt is retried
 * by the next caller.
 */
export class LazyResource<T> {
  private state: ResourceState<T> = { ready: false };
  private readonly flight = new SingleFlight<T>();

  constructor(
    private readonly name: string,
    private readonly init: () => Promise<T>
  ) {}

  async get(): Promise<T> {
    if (this.state.ready) {
      return this.state.value;
    }
    return this.flight.run(async () => {
      const started = Date.now();
      try {
        const value = await this.init();
        this.state = { ready: true, value };
        logger.info(`${this.name} initialised in ${Date.now() - started}ms`);
        return value;
      } catch (error) {
        logger.error(`${this.name} failed to initialise: ${error instanceof Error ? error.message : error}`);
        throw error;
      }
    });
  }

  get isReady(): boolean {
    return this.state.ready;
  }

  get initAttempts(): number {
    return this.flight.startedRuns;
  }

  reset(): void {
    this.state = { ready: false };
  }
}
