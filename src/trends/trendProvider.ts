import type { RawTrendItem } from '../types/candidate';

/**
 * Source of trending items for a named group (a subreddit, for Reddit).
 * Implementations throw on network or provider failure; the caller decides
 * whether that is fatal.
 */
export interface TrendProvider {
  readonly name: string;
  hot(group: string, limit: number, signal?: AbortSignal): Promise<RawTrendItem[]>;
  search(group: string, query: string, limit: number, signal?: AbortSignal): Promise<RawTrendItem[]>;
}
