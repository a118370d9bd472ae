// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Owned, growable typed-array storage. Views handed out by data() and
// view() alias the storage; they stay valid until the next operation that
// reallocates (setLength/append/prepend/replace growing past capacity).

import { getConfig } from './config';
import * as is from './is';

export type SampleArray = Uint8Array | Int16Array | Float32Array;

export interface SampleArrayConstructor<T extends SampleArray> {
  new (length: number): T;
  new (buffer: ArrayBufferLike, byteOffset: number, length: number): T;
  readonly BYTES_PER_ELEMENT: number;
}

export interface AlignedBufferOptions {
  /** Byte ceiling for the storage; growth past it fails. */
  maxByteLength?: number;
}

export class AlignedBuffer<T extends SampleArray> {
  private readonly ctor: SampleArrayConstructor<T>;
  private readonly maxByteLength: number;
  private storage: T;
  private _length: number;

  constructor(ctor: SampleArrayConstructor<T>, length: number = 0, options?: AlignedBufferOptions) {
    is.assertNonNegativeInteger(length, 'length');
    this.ctor = ctor;
    this.maxByteLength = options?.maxByteLength ?? getConfig().maxAllocation;
    const storage = this.allocate(length);
    if (!storage) {
      throw new RangeError(`Cannot allocate ${length * ctor.BYTES_PER_ELEMENT} bytes`);
    }
    this.storage = storage;
    this._length = length;
  }

  /**
   * Adopt an existing array as storage. No copy is made.
   */
  static adopt<T extends SampleArray>(
    ctor: SampleArrayConstructor<T>,
    array: T,
    options?: AlignedBufferOptions,
  ): AlignedBuffer<T> {
    const buffer = new AlignedBuffer(ctor, 0, options);
    buffer.storage = array;
    buffer._length = array.length;
    return buffer;
  }

  get length(): number {
    return this._length;
  }

  get byteLength(): number {
    return this._length * this.ctor.BYTES_PER_ELEMENT;
  }

  /** Bytes held by the storage, including unused capacity. */
  get capacityBytes(): number {
    return this.storage.byteLength;
  }

  isEmpty(): boolean {
    return this._length === 0;
  }

  /** The whole logical content, as a view over the storage. */
  data(): T {
    return this.view(0, this._length);
  }

  /** A view of `length` elements starting at `offset`. */
  view(offset: number, length: number): T {
    if (offset < 0 || length < 0 || offset + length > this._length) {
      throw new RangeError(
        `View [${offset}, ${offset + length}) outside buffer of length ${this._length}`,
      );
    }
    return new this.ctor(
      this.storage.buffer,
      this.storage.byteOffset + offset * this.ctor.BYTES_PER_ELEMENT,
      length,
    );
  }

  /**
   * Resize to `length` elements. New elements are zeroed.
   */
  setLength(length: number): boolean {
    if (!is.nonNegativeInteger(length)) return false;
    if (length > this.storage.length) {
      if (!this.reserve(length)) return false;
    } else if (length > this._length) {
      this.storage.fill(0, this._length, length);
    }
    this._length = length;
    return true;
  }

  append(src: ArrayLike<number>): boolean {
    const oldLength = this._length;
    if (!this.setLength(oldLength + src.length)) return false;
    this.storage.set(src, oldLength);
    return true;
  }

  prepend(src: ArrayLike<number>): boolean {
    const oldLength = this._length;
    if (!this.setLength(oldLength + src.length)) return false;
    this.storage.copyWithin(src.length, 0, oldLength);
    this.storage.set(src, 0);
    return true;
  }

  /**
   * Overwrite the content with `src`, resizing as needed.
   */
  replace(src: ArrayLike<number>): boolean {
    if (!this.setLength(src.length)) return false;
    this.storage.set(src, 0);
    return true;
  }

  clear(): void {
    this._length = 0;
  }

  /**
   * Drop `count` elements from the front, in place.
   */
  popFront(count: number): void {
    const n = Math.min(Math.max(0, count), this._length);
    if (n === 0) return;
    this.storage.copyWithin(0, n, this._length);
    this._length -= n;
  }

  private reserve(length: number): boolean {
    // Grow geometrically so repeated appends stay amortised.
    const capacity = Math.max(length, Math.min(this.storage.length * 2, this.maxElements()));
    const next = this.allocate(capacity);
    if (!next) return false;
    next.set(this.view(0, this._length), 0);
    this.storage = next;
    return true;
  }

  private maxElements(): number {
    return Math.floor(this.maxByteLength / this.ctor.BYTES_PER_ELEMENT);
  }

  private allocate(length: number): T | null {
    if (length > this.maxElements()) return null;
    try {
      return new this.ctor(length);
    } catch (error) {
      if (error instanceof RangeError) return null;
      throw error;
    }
  }
}

export type AlignedByteBuffer = AlignedBuffer<Uint8Array>;
export type AlignedAudioBuffer = AlignedBuffer<Float32Array>;

export function createByteBuffer(data?: ArrayLike<number>): AlignedByteBuffer {
  const buffer = new AlignedBuffer<Uint8Array>(Uint8Array);
  if (data && !buffer.append(data)) {
    throw new RangeError(`Cannot allocate ${data.length} bytes`);
  }
  return buffer;
}

export function createAudioBuffer(length: number = 0): AlignedAudioBuffer {
  return new AlignedBuffer<Float32Array>(Float32Array, length);
}
