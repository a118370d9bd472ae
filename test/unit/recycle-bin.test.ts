// test/unit/recycle-bin.test.ts

import { describe, expect, it } from 'vitest';
import { BufferRecycleBin } from '../../lib';

describe('BufferRecycleBin', () => {
  it('hands out a fresh zeroed buffer when the pool is empty', () => {
    const bin = new BufferRecycleBin();
    const buffer = bin.getBuffer(16);
    expect(buffer).not.toBeNull();
    expect(buffer?.length).toBe(16);
    expect(buffer?.every((b) => b === 0)).toBe(true);
  });

  it('reuses a recycled buffer of the same size', () => {
    const bin = new BufferRecycleBin();
    const first = new Uint8Array(32);
    bin.recycleBuffer(first, 32);
    expect(bin.retainedCount).toBe(1);
    expect(bin.getBuffer(32)).toBe(first);
    expect(bin.retainedCount).toBe(0);
  });

  it('drops the pool when a different size is recycled', () => {
    const bin = new BufferRecycleBin();
    bin.recycleBuffer(new Uint8Array(8), 8);
    bin.recycleBuffer(new Uint8Array(8), 8);
    bin.recycleBuffer(new Uint8Array(4), 4);
    expect(bin.retainedCount).toBe(1);
    expect(bin.getBuffer(8)?.length).toBe(8);
    expect(bin.retainedCount).toBe(1);
  });

  it('retains at most maxRetained buffers', () => {
    const bin = new BufferRecycleBin({ maxRetained: 2 });
    for (let i = 0; i < 5; i++) {
      bin.recycleBuffer(new Uint8Array(8), 8);
    }
    expect(bin.retainedCount).toBe(2);
  });

  it('returns null above the allocation ceiling', () => {
    const bin = new BufferRecycleBin({ maxAllocation: 64 });
    expect(bin.getBuffer(64)).not.toBeNull();
    expect(bin.getBuffer(65)).toBeNull();
  });

  it('clear empties the pool', () => {
    const bin = new BufferRecycleBin();
    bin.recycleBuffer(new Uint8Array(8), 8);
    bin.clear();
    expect(bin.retainedCount).toBe(0);
  });
});
