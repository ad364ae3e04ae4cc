import { randomBytes } from "crypto";

/**
 * Source of row numbers for identity literals written as `@table:_`.
 * One instance is shared by every query in the process.
 */
export interface RowIdPort {
  /**
   * Next unsigned 64-bit row number.
   */
  nextRow(): bigint;
}

/**
 * xorshift64* generator seeded once from the OS entropy pool.
 * Rows drawn from one instance do not repeat until the 2^64 - 1 period wraps.
 */
export class SeededRowIdSource implements RowIdPort {
  private state: bigint;

  constructor(seed: bigint = randomBytes(8).readBigUInt64LE()) {
    this.state = BigInt.asUintN(64, seed) || 0x9e3779b97f4a7c15n;
  }

  nextRow(): bigint {
    let x = this.state;
    x ^= x >> 12n;
    x = BigInt.asUintN(64, x ^ (x << 25n));
    x ^= x >> 27n;
    this.state = x;
    return BigInt.asUintN(64, x * 0x2545f4914f6cdd1dn);
  }
}

/**
 * Deterministic counter, for tests and reproducible runs.
 */
export class SequentialRowIdSource implements RowIdPort {
  constructor(private next: bigint = 1n) {}

  nextRow(): bigint {
    const row = this.next;
    this.next = BigInt.asUintN(64, this.next + 1n);
    return row;
  }
}
