export interface DetectionTier {
  label: string;
  // null: the image as decoded
  longestSide: number | null;
}

/**
 * Resolutions to try detection at, in order: native first, then one downscale
 * per threshold the image's longest side exceeds (largest threshold first).
 * Every downscale is taken from the original image.
 */
export function planDetectionTiers(width: number, height: number, thresholds: readonly number[]): DetectionTier[] {
  const longest = Math.max(width, height);
  const tiers: DetectionTier[] = [{ label: 'native', longestSide: null }];

  for (const threshold of [...thresholds].sort((a, b) => b - a)) {
    if (longest > threshold) {
      tiers.push({ label: `downscale-${threshold}`, longestSide: threshold });
    }
  }
  return tiers;
}
