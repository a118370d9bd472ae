// test/unit/time-unit.test.ts

import { describe, expect, it } from 'vitest';
import { ContractViolationError, TimeInterval, TimeUnit } from '../../lib';

describe('TimeUnit', () => {
  describe('construction', () => {
    it('defaults to microsecond base', () => {
      const t = TimeUnit.fromSeconds(0.5);
      expect(t.base).toBe(1_000_000);
      expect(t.ticks).toBe(500_000n);
    });

    it('rejects a non-positive base', () => {
      expect(() => TimeUnit.fromTicks(1, 0)).toThrow(TypeError);
    });

    it('maps non-finite seconds and unsafe integers to invalid', () => {
      expect(TimeUnit.fromSeconds(Number.NaN).isValid()).toBe(false);
      expect(TimeUnit.fromTicks(Number.MAX_SAFE_INTEGER + 2, 1).isValid()).toBe(false);
    });

    it('maps bigint ticks outside int64 to invalid', () => {
      expect(TimeUnit.fromTicks(1n << 63n, 1).isValid()).toBe(false);
      expect(TimeUnit.fromTicks(-(1n << 63n), 1).isValid()).toBe(true);
    });
  });

  describe('arithmetic', () => {
    it('adds values with the same base', () => {
      const sum = TimeUnit.fromTicks(3, 48000).add(TimeUnit.fromTicks(5, 48000));
      expect(sum.ticks).toBe(8n);
      expect(sum.base).toBe(48000);
    });

    it('resolves mixed bases to the larger one', () => {
      const sum = TimeUnit.fromMicroseconds(0).add(TimeUnit.fromTicks(960, 48000));
      expect(sum.base).toBe(1_000_000);
      expect(sum.ticks).toBe(20_000n);
    });

    it('rounds to the nearest tick when converting', () => {
      // 1/3 s at base 3 -> 333333.33 us
      expect(TimeUnit.fromTicks(1, 3).toBase(1_000_000).ticks).toBe(333_333n);
      // 2/3 s -> 666666.67 us
      expect(TimeUnit.fromTicks(2, 3).toBase(1_000_000).ticks).toBe(666_667n);
      expect(TimeUnit.fromTicks(-2, 3).toBase(1_000_000).ticks).toBe(-666_667n);
    });

    it('produces invalid on overflow instead of wrapping', () => {
      const max = TimeUnit.fromTicks((1n << 63n) - 1n, 1);
      expect(max.add(TimeUnit.fromTicks(1, 1)).isValid()).toBe(false);
      const min = TimeUnit.fromTicks(-(1n << 63n), 1);
      expect(min.sub(TimeUnit.fromTicks(1, 1)).isValid()).toBe(false);
    });

    it('propagates invalid operands', () => {
      expect(TimeUnit.invalid().add(TimeUnit.zero()).isValid()).toBe(false);
      expect(TimeUnit.zero().sub(TimeUnit.invalid()).isValid()).toBe(false);
    });

    it('truncates toward zero in toTicksAtRate', () => {
      expect(TimeUnit.fromMicroseconds(10_000).toTicksAtRate(48000)).toBe(480);
      // 1 us at 44100 Hz is 0.0441 frames
      expect(TimeUnit.fromMicroseconds(1).toTicksAtRate(44100)).toBe(0);
      expect(TimeUnit.fromTicks(7, 48000).toTicksAtRate(48000)).toBe(7);
    });
  });

  describe('comparison', () => {
    it('compares exactly across bases', () => {
      const a = TimeUnit.fromTicks(1, 3);
      const b = TimeUnit.fromMicroseconds(333_333);
      expect(a.gt(b)).toBe(true);
      expect(b.lt(a)).toBe(true);
      expect(TimeUnit.fromTicks(480, 48000).eq(TimeUnit.fromMicroseconds(10_000))).toBe(true);
    });

    it('treats comparison with an invalid value as a contract violation', () => {
      expect(() => TimeUnit.invalid().lt(TimeUnit.zero())).toThrow(ContractViolationError);
    });

    it('reports sign and base', () => {
      expect(TimeUnit.fromMicroseconds(-1).isNegative()).toBe(true);
      expect(TimeUnit.zero().isZero()).toBe(true);
      expect(TimeUnit.fromTicks(1, 48000).isBase(48000)).toBe(true);
      expect(TimeUnit.fromTicks(1, 48000).isBase(44100)).toBe(false);
    });
  });

  it('formats seconds with ticks and base', () => {
    expect(TimeUnit.fromTicks(480, 48000).toString()).toBe('{0.010000 (480/48000)}');
    expect(TimeUnit.invalid().toString()).toBe('{invalid}');
  });
});

describe('TimeInterval', () => {
  it('shifts both ends back', () => {
    const interval = new TimeInterval(TimeUnit.fromMicroseconds(100), TimeUnit.fromMicroseconds(300));
    const shifted = interval.shift(TimeUnit.fromMicroseconds(50));
    expect(shifted.start.toMicroseconds()).toBe(50);
    expect(shifted.end.toMicroseconds()).toBe(250);
    expect(shifted.length().toMicroseconds()).toBe(200);
  });
});
