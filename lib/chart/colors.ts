import { interpolateTurbo } from "d3";

/**
 * Colour for the `rank`-th of `total` calendar days, sampled at evenly spaced
 * positions of a rainbow-style spectrum. A lone day sits at position 0.
 */
export function colorForRank(rank: number, total: number): string {
  if (!Number.isInteger(total) || total < 1) {
    throw new RangeError(`Day count must be a positive integer, got ${total}`);
  }
  if (!Number.isInteger(rank) || rank < 0 || rank >= total) {
    throw new RangeError(`Day rank ${rank} out of range for ${total} day(s)`);
  }
  const position = total === 1 ? 0 : rank / (total - 1);
  return interpolateTurbo(position);
}
