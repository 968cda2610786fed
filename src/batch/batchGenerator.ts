import type { Candidate } from '../types/candidate';
import type { ReferenceFace } from '../types/detection';
import { type SuccessfulTransform, type TransformOutcome, type TransformResult, isSuccess } from '../types/transform';
import { logger } from '../utils/logger';

export interface CandidateFeed {
  fetch(groups: readonly string[], perGroupLimit: number, signal?: AbortSignal): Promise<Candidate[]>;
}

export interface CandidateTransformer {
  transform(candidate: Candidate, reference: ReferenceFace, signal?: AbortSignal): Promise<TransformResult>;
}

export type OutcomeTally = Record<TransformOutcome, number>;

export interface BatchRun {
  results: SuccessfulTransform[];
  // Candidates issued to the transform, cancelled ones included
  attempted: number;
  tally: OutcomeTally;
  cancelled: number;
  aborted: boolean;
}

export interface BatchGeneratorOptions {
  groups: readonly string[];
  perGroupLimit: number;
  poolSize: number;
  shuffle: boolean;
  random?: () => number;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

export function emptyTally(): OutcomeTally {
  return {
    success: 0,
    no_face_detected: 0,
    no_qualifying_face: 0,
    source_unavailable: 0,
    transform_error: 0,
  };
}

/**
 * Fisher-Yates over a copy.
 */
export function shuffled<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const swap = copy[i];
    copy[i] = copy[j];
    copy[j] = swap;
  }
  return copy;
}

/**
 * Runs candidates through the transform on a fixed-size pool until `target`
 * successes exist or `maxAttempts` candidates were issued. Reaching the target
 * cancels whatever is still in flight.
 */
export class BatchGenerator {
  constructor(
    private readonly feed: CandidateFeed,
    private readonly transformer: CandidateTransformer,
    private readonly options: BatchGeneratorOptions
  ) {}

  async generate(
    target: number,
    maxAttempts: number,
    reference: ReferenceFace,
    options: GenerateOptions = {}
  ): Promise<BatchRun> {
    const candidates = await this.feed.fetch(this.options.groups, this.options.perGroupLimit, options.signal);
    const ordered = this.options.shuffle ? shuffled(candidates, this.options.random) : candidates;
    logger.info(`Generating batch: target ${target}, budget ${maxAttempts}, ${ordered.length} candidates`);
    return this.generateFrom(ordered, target, maxAttempts, reference, options);
  }

  async generateFrom(
    candidates: readonly Candidate[],
    target: number,
    maxAttempts: number,
    reference: ReferenceFace,
    options: GenerateOptions = {}
  ): Promise<BatchRun> {
    const tally = emptyTally();
    const slots: Array<SuccessfulTransform | undefined> = [];
    const budget = Math.min(maxAttempts, candidates.length);
    const run = new AbortController();
    let issued = 0;
    let successes = 0;
    let cancelled = 0;
    let targetReached = false;

    const parent = options.signal;
    const onParentAbort = () => run.abort(parent?.reason);
    if (parent?.aborted) {
      run.abort(parent.reason);
    } else {
      parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    const canIssue = () => !run.signal.aborted && successes < target && issued < budget;

    const worker = async () => {
      while (canIssue()) {
        const index = issued++;
        const candidate = candidates[index];
        const result = await this.transformer.transform(candidate, reference, run.signal);

        if (result.outcome === 'transform_error' && result.error.code === 'TRANSFORM_CANCELLED') {
          cancelled++;
          continue;
        }
        tally[result.outcome]++;
        if (isSuccess(result)) {
          slots[index] = result;
          successes++;
          if (successes >= target && !targetReached) {
            targetReached = true;
            run.abort();
          }
        }
      }
    };

    try {
      const workers = Math.max(0, Math.min(this.options.poolSize, budget));
      await Promise.all(Array.from({ length: workers }, () => worker()));
    } finally {
      parent?.removeEventListener('abort', onParentAbort);
    }

    const results = slots
      .filter((slot): slot is SuccessfulTransform => slot !== undefined)
      .slice(0, Math.max(0, target));
    const aborted = Boolean(parent?.aborted);

    logger.info(
      `Batch finished: ${results.length}/${target} successes after ${issued} attempts` +
      ` (no face ${tally.no_face_detected}, no qualifying face ${tally.no_qualifying_face},` +
      ` unavailable ${tally.source_unavailable}, errors ${tally.transform_error}, cancelled ${cancelled})` +
      (aborted ? ' [aborted]' : '')
    );

    return { results, attempted: issued, tally, cancelled, aborted };
  }
}
