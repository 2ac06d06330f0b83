/**
 * Lookup Table Store for the bounded arithmetic unit
 */

export {
  type RangeTier,
  RANGE_TIERS,
  DEFAULT_RANGE,
  DEFAULT_MAX_EXPONENT,
  isRangeTier,
} from "./tiers";

export { type Lookup, type TableOptions, LookupTableStore } from "./store";
