import type { Token } from "#tokens";

import { DEFAULT_MAX_EXPONENT, DEFAULT_RANGE, type RangeTier } from "./tiers";

/**
 * Outcome of a single table lookup. A miss tells whether the key itself
 * lies outside the table or the entry exists but its result does not fit
 * the tier.
 */
export type Lookup<T> =
  | { found: true; value: T }
  | { found: false; miss: "key" | "result" };

export interface TableOptions {
  range: RangeTier;
  maxExponent: number;
}

// Never a valid entry: results are bounded by the largest span (2048)
const OUT_OF_RANGE = -0x8000;

const hit = <T>(value: T): Lookup<T> => ({ found: true, value });
const miss = <T>(reason: "key" | "result"): Lookup<T> => ({
  found: false,
  miss: reason,
});

/**
 * Precomputed ADD / SUB / MINUS / LOG2 / POW2 tables for one range tier.
 *
 * Binary tables hold one sign quadrant of the second operand: the first
 * operand spans -2R..2R and the second 0..R. Each table is generated on
 * first use and never modified afterwards, so one store is shared by every
 * evaluation of the same tier.
 */
export class LookupTableStore {
  private static readonly stores = new Map<string, LookupTableStore>();

  /**
   * Shared store for the given options
   */
  static for({
    range = DEFAULT_RANGE,
    maxExponent = DEFAULT_MAX_EXPONENT,
  }: Partial<TableOptions> = {}): LookupTableStore {
    const key = `${range}:${maxExponent}`;
    let store = LookupTableStore.stores.get(key);
    if (!store) {
      store = new LookupTableStore({ range, maxExponent });
      LookupTableStore.stores.set(key, store);
    }
    return store;
  }

  readonly range: RangeTier;
  readonly span: number;
  readonly maxExponent: number;

  private sumTable?: Int16Array;
  private differenceTable?: Int16Array;
  private minusTable?: Int16Array;
  private pow2Table?: readonly Token[];
  private log2Table?: ReadonlyMap<Token, number>;

  constructor({ range, maxExponent }: TableOptions) {
    if (!Number.isInteger(maxExponent) || maxExponent < 0) {
      throw new RangeError(`Invalid exponent bound: ${maxExponent}`);
    }
    this.range = range;
    this.span = 2 * range;
    this.maxExponent = maxExponent;
  }

  sum(a: number, b: number): Lookup<number> {
    this.sumTable ??= this.generateBinary((x, y) => x + y);
    return this.lookupBinary(this.sumTable, a, b);
  }

  difference(a: number, b: number): Lookup<number> {
    this.differenceTable ??= this.generateBinary((x, y) => x - y);
    return this.lookupBinary(this.differenceTable, a, b);
  }

  minus(a: number): Lookup<number> {
    this.minusTable ??= this.generateMinus();
    if (!this.inSpan(a)) {
      return miss("key");
    }
    return hit(this.minusTable[a + this.span]);
  }

  pow2(n: number): Lookup<Token> {
    this.pow2Table ??= this.generatePow2();
    if (!Number.isInteger(n) || Math.abs(n) > this.maxExponent) {
      return miss("key");
    }
    return hit(this.pow2Table[n + this.maxExponent]);
  }

  log2(token: Token): Lookup<number> {
    this.pow2Table ??= this.generatePow2();
    this.log2Table ??= new Map(
      this.pow2Table.map((power, i) => [power, i - this.maxExponent]),
    );
    const exponent = this.log2Table.get(token);
    return exponent === undefined ? miss("key") : hit(exponent);
  }

  /**
   * Whether a first operand (or negation input) has table entries
   */
  inSpan(value: number): boolean {
    return Number.isInteger(value) && value >= -this.span && value <= this.span;
  }

  /**
   * Whether a non-negative second operand has table entries
   */
  inRange(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= this.range;
  }

  private lookupBinary(table: Int16Array, a: number, b: number): Lookup<number> {
    if (!this.inSpan(a) || !this.inRange(b)) {
      return miss("key");
    }
    const entry = table[this.binaryIndex(a, b)];
    return entry === OUT_OF_RANGE ? miss("result") : hit(entry);
  }

  private binaryIndex(a: number, b: number): number {
    return (a + this.span) * (this.range + 1) + b;
  }

  private generateBinary(combine: (a: number, b: number) => number): Int16Array {
    const table = new Int16Array((2 * this.span + 1) * (this.range + 1));
    for (let a = -this.span; a <= this.span; a++) {
      for (let b = 0; b <= this.range; b++) {
        const result = combine(a, b);
        table[this.binaryIndex(a, b)] =
          Math.abs(result) > this.span ? OUT_OF_RANGE : result;
      }
    }
    return table;
  }

  private generateMinus(): Int16Array {
    const table = new Int16Array(2 * this.span + 1);
    for (let a = -this.span; a <= this.span; a++) {
      table[a + this.span] = -a;
    }
    return table;
  }

  private generatePow2(): Token[] {
    const table: Token[] = [];
    for (let n = -this.maxExponent; n <= this.maxExponent; n++) {
      const magnitude = (1n << BigInt(Math.abs(n))).toString();
      table.push(n < 0 ? `1/${magnitude}` : magnitude);
    }
    return table;
  }
}
