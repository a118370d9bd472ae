// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Rational time: an integer tick count over a tick rate (the base).
// Ticks live in the signed 64-bit range; any result outside it is the
// invalid sentinel rather than a wrapped value.

import { assertContract } from './errors';
import * as is from './is';

const INT64_MAX = (1n << 63n) - 1n;
const INT64_MIN = -(1n << 63n);

export const MICROSECONDS_PER_SECOND = 1_000_000;

function checked(ticks: bigint): bigint | null {
  return ticks > INT64_MAX || ticks < INT64_MIN ? null : ticks;
}

/** Round-half-away-from-zero division of bigints. */
function divRound(num: bigint, den: bigint): bigint {
  const q = num / den;
  const r = num % den;
  const twice = (r < 0n ? -r : r) * 2n;
  if (twice >= den) {
    return num < 0n ? q - 1n : q + 1n;
  }
  return q;
}

export class TimeUnit {
  private readonly _ticks: bigint | null;
  readonly base: number;

  private constructor(ticks: bigint | null, base: number) {
    this._ticks = ticks === null ? null : checked(ticks);
    this.base = base;
  }

  static fromTicks(ticks: number | bigint, base: number): TimeUnit {
    is.assertPositiveInteger(base, 'base');
    if (typeof ticks === 'number') {
      if (!Number.isSafeInteger(ticks)) {
        return TimeUnit.invalid();
      }
      return new TimeUnit(BigInt(ticks), base);
    }
    return new TimeUnit(ticks, base);
  }

  static fromSeconds(seconds: number, base: number = MICROSECONDS_PER_SECOND): TimeUnit {
    if (!Number.isFinite(seconds)) {
      return TimeUnit.invalid();
    }
    return TimeUnit.fromTicks(Math.round(seconds * base), base);
  }

  static fromMicroseconds(us: number): TimeUnit {
    return TimeUnit.fromTicks(us, MICROSECONDS_PER_SECOND);
  }

  static zero(base: number = MICROSECONDS_PER_SECOND): TimeUnit {
    return new TimeUnit(0n, base);
  }

  static invalid(): TimeUnit {
    return new TimeUnit(null, 1);
  }

  isValid(): boolean {
    return this._ticks !== null;
  }

  /** Tick count; only meaningful on a valid value. */
  get ticks(): bigint {
    assertContract(this._ticks !== null, 'Reading ticks of an invalid TimeUnit');
    return this._ticks;
  }

  isNegative(): boolean {
    return this._ticks !== null && this._ticks < 0n;
  }

  isPositive(): boolean {
    return this._ticks !== null && this._ticks > 0n;
  }

  isZero(): boolean {
    return this._ticks === 0n;
  }

  isBase(base: number): boolean {
    return this.base === base;
  }

  /**
   * Re-express this value at another base, rounding to the nearest tick.
   */
  toBase(base: number): TimeUnit {
    is.assertPositiveInteger(base, 'base');
    if (this._ticks === null) return this;
    if (base === this.base) return this;
    return new TimeUnit(divRound(this._ticks * BigInt(base), BigInt(this.base)), base);
  }

  /**
   * Number of whole ticks at `rate` covered by this value, truncated toward zero.
   */
  toTicksAtRate(rate: number): number {
    const ticks = this.ticks;
    if (rate === this.base) {
      return Number(ticks);
    }
    return Number((ticks * BigInt(rate)) / BigInt(this.base));
  }

  toSeconds(): number {
    return Number(this.ticks) / this.base;
  }

  toMicroseconds(): number {
    return Number(this.toBase(MICROSECONDS_PER_SECOND).ticks);
  }

  add(other: TimeUnit): TimeUnit {
    if (this._ticks === null || other._ticks === null) {
      return TimeUnit.invalid();
    }
    if (this.base === other.base) {
      return new TimeUnit(this._ticks + other._ticks, this.base);
    }
    // Mixed bases resolve to the finer one.
    if (this.base > other.base) {
      const converted = other.toBase(this.base);
      return converted.isValid() ? new TimeUnit(this._ticks + converted.ticks, this.base) : converted;
    }
    const converted = this.toBase(other.base);
    return converted.isValid() ? new TimeUnit(other._ticks + converted.ticks, other.base) : converted;
  }

  sub(other: TimeUnit): TimeUnit {
    return this.add(other.neg());
  }

  neg(): TimeUnit {
    return this._ticks === null ? this : new TimeUnit(-this._ticks, this.base);
  }

  /**
   * Exact three-way comparison across bases. Both values must be valid.
   */
  compare(other: TimeUnit): -1 | 0 | 1 {
    assertContract(this.isValid() && other.isValid(), 'Comparing an invalid TimeUnit');
    const lhs = this.ticks * BigInt(other.base);
    const rhs = other.ticks * BigInt(this.base);
    return lhs < rhs ? -1 : lhs > rhs ? 1 : 0;
  }

  eq(other: TimeUnit): boolean {
    if (!this.isValid() || !other.isValid()) {
      return this.isValid() === other.isValid();
    }
    return this.compare(other) === 0;
  }

  lt(other: TimeUnit): boolean {
    return this.compare(other) < 0;
  }

  le(other: TimeUnit): boolean {
    return this.compare(other) <= 0;
  }

  gt(other: TimeUnit): boolean {
    return this.compare(other) > 0;
  }

  ge(other: TimeUnit): boolean {
    return this.compare(other) >= 0;
  }

  toString(): string {
    if (this._ticks === null) return '{invalid}';
    return `{${this.toSeconds().toFixed(6)} (${this._ticks}/${this.base})}`;
  }
}

export class TimeInterval {
  constructor(
    readonly start: TimeUnit,
    readonly end: TimeUnit,
  ) {}

  /** Both ends moved back by `delta`. */
  shift(delta: TimeUnit): TimeInterval {
    return new TimeInterval(this.start.sub(delta), this.end.sub(delta));
  }

  length(): TimeUnit {
    return this.end.sub(this.start);
  }

  isValid(): boolean {
    return this.start.isValid() && this.end.isValid();
  }

  eq(other: TimeInterval): boolean {
    return this.start.eq(other.start) && this.end.eq(other.end);
  }

  toString(): string {
    return `[${this.start.toString()}, ${this.end.toString()}]`;
  }
}
