/**
 * Range tiers selecting how large the arithmetic tables are.
 *
 * A tier R accepts operands in -R..R and results in -2R..2R.
 */

export type RangeTier = 256 | 512 | 1024;

export const RANGE_TIERS: readonly RangeTier[] = [256, 512, 1024];

export const DEFAULT_RANGE: RangeTier = 256;

export const DEFAULT_MAX_EXPONENT = 73;

export const isRangeTier = (value: number): value is RangeTier =>
  RANGE_TIERS.some((tier) => tier === value);
