/**
 * One externally-sourced image reference eligible for transformation.
 * Produced by the candidate source and never mutated afterwards.
 */
export interface Candidate {
  identityKey: string;      // Unique per source item (e.g. Reddit fullname t3_abc)
  label: string;            // Title shown next to the result
  sourceTag: string;        // Group the item came from (subreddit, 'direct', 'celebrity')
  popularityScore: number;
  flagged: boolean;         // Provider-side adult/NSFW marker
  imageUrl: string;
}

/**
 * Raw item as returned by a trend provider, before filtering.
 */
export interface RawTrendItem {
  identityKey: string;
  title: string;
  url: string;
  score: number;
  flagged?: boolean;
}
