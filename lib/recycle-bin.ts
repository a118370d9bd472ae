// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Buffer recycling pool for the 8-bit conversion path. Only buffers of the
// most recently requested size are kept; a request for another size drops
// the pool. JavaScript runs each isolate on one thread, so calls from
// several decode loops on the same event loop need no further locking.

import { getConfig } from './config';

export interface BufferRecycleBinOptions {
  /** Buffers retained for reuse. */
  maxRetained?: number;
  /** Requests above this many bytes fail with null. */
  maxAllocation?: number;
}

export class BufferRecycleBin {
  private readonly maxRetained: number;
  private readonly maxAllocation: number;
  private recycled: Uint8Array[] = [];
  private recycledSize = 0;

  constructor(options?: BufferRecycleBinOptions) {
    const config = getConfig();
    this.maxRetained = options?.maxRetained ?? config.recycleLimit;
    this.maxAllocation = options?.maxAllocation ?? config.maxAllocation;
  }

  /**
   * Hand out a buffer of exactly `size` bytes, reusing a recycled one when
   * available. Returns null when the allocation cannot be made.
   */
  getBuffer(size: number): Uint8Array | null {
    if (size === this.recycledSize) {
      const reused = this.recycled.pop();
      if (reused) return reused;
    }
    if (size > this.maxAllocation) return null;
    try {
      return new Uint8Array(size);
    } catch (error) {
      if (error instanceof RangeError) return null;
      throw error;
    }
  }

  /**
   * Return a buffer. `allocatedSize` is the size it was requested with.
   */
  recycleBuffer(buffer: Uint8Array, allocatedSize: number): void {
    if (allocatedSize !== this.recycledSize) {
      this.recycled = [];
      this.recycledSize = allocatedSize;
    }
    if (this.recycled.length < this.maxRetained) {
      this.recycled.push(buffer);
    }
  }

  /** Number of buffers waiting for reuse. */
  get retainedCount(): number {
    return this.recycled.length;
  }

  clear(): void {
    this.recycled = [];
    this.recycledSize = 0;
  }
}
