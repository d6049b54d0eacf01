import { tokenWeight, weightToTokens } from './token-estimator';

/**
 * Packs consecutive structural segments into chunks of at most `chunkSize`
 * estimated tokens. A segment that is too large on its own flushes the
 * accumulator and is handed to `splitOversized`.
 *
 * Fit is judged on the weight of the joined text, not on the sum of
 * per-segment estimates, which truncate separately and undercount.
 */
export function mergeSegments(
  segments: readonly string[],
  chunkSize: number,
  splitOversized: (segment: string) => string[]
): string[] {
  const merged: string[] = [];
  let current = '';
  let currentWeight = 0;

  const flush = (): void => {
    if (current.length > 0) {
      merged.push(current);
    }
    current = '';
    currentWeight = 0;
  };

  for (const segment of segments) {
    const weight = tokenWeight(segment);

    if (weightToTokens(weight) > chunkSize) {
      flush();
      merged.push(...splitOversized(segment));
    } else if (current.length > 0 && weightToTokens(currentWeight + weight) > chunkSize) {
      flush();
      current = segment;
      currentWeight = weight;
    } else {
      // Segments are joined by a space, which adds no weight
      current = current.length > 0 ? `${current} ${segment}` : segment;
      currentWeight += weight;
    }
  }

  flush();
  return merged;
}
