/**
 * node-mediadata - decoded media sample model for Node.js
 *
 * RawSample and RawSampleWriter classes
 */

import { type AlignedByteBuffer, AlignedBuffer } from './aligned-buffer';
import { type CryptoSample, cloneCryptoSample, createCryptoSample } from './crypto';
import { MediaData } from './media-data';
import { PerformanceRecorder } from './performance';
import type { TimeInterval } from './time-unit';
import type { TrackInfo } from './types';

function bufferFrom(data: ArrayLike<number> | undefined): AlignedByteBuffer {
  const buffer = new AlignedBuffer<Uint8Array>(Uint8Array);
  if (data && data.length > 0 && !buffer.append(data)) {
    throw new RangeError(`Cannot allocate ${data.length} bytes`);
  }
  return buffer;
}

/**
 * A demuxed, still-encoded sample. Buffers change only through the
 * RawSampleWriter obtained from createWriter(); once the sample is handed
 * downstream it is read-only.
 */
export class RawSample extends MediaData {
  readonly type = 'raw';
  /** Codec configuration bytes. Shared between clones, never mutated. */
  extraData: Uint8Array | null = null;
  trackInfo: TrackInfo | null = null;
  /** Presentation window of the sample before any edit list was applied. */
  originalPresentationWindow: TimeInterval | null = null;

  /** @internal */
  _buffer: AlignedByteBuffer;
  /** @internal */
  _alphaBuffer: AlignedByteBuffer;
  /** @internal */
  _crypto: CryptoSample = createCryptoSample();

  constructor(data?: ArrayLike<number>, alphaData?: ArrayLike<number>) {
    super();
    this._buffer = bufferFrom(data);
    this._alphaBuffer = bufferFrom(alphaData);
  }

  /** Adopt owned buffers without copying. */
  static fromBuffers(buffer: AlignedByteBuffer, alphaBuffer?: AlignedByteBuffer): RawSample {
    const sample = new RawSample();
    sample._buffer = buffer;
    if (alphaBuffer) {
      sample._alphaBuffer = alphaBuffer;
    }
    return sample;
  }

  get data(): Uint8Array {
    return this._buffer.data();
  }

  get size(): number {
    return this._buffer.length;
  }

  get alphaData(): Uint8Array {
    return this._alphaBuffer.data();
  }

  get alphaSize(): number {
    return this._alphaBuffer.length;
  }

  get crypto(): Readonly<CryptoSample> {
    return this._crypto;
  }

  createWriter(): RawSampleWriter {
    return new RawSampleWriter(this);
  }

  /**
   * Independent deep copy of the sample. Returns null when a buffer
   * cannot be allocated; never a partial copy.
   */
  clone(): RawSample | null {
    const sampleHeight = this.trackInfo?.type === 'video' ? this.trackInfo.image.height : 0;
    const perfRecorder = new PerformanceRecorder('CopyDemuxedData', sampleHeight);

    const s = new RawSample();
    s.timecode = this.timecode;
    s.time = this.time;
    s.duration = this.duration;
    s.offset = this.offset;
    s.keyframe = this.keyframe;
    s.extraData = this.extraData;
    s._crypto = cloneCryptoSample(this._crypto);
    s.trackInfo = this.trackInfo;
    s.eos = this.eos;
    s.originalPresentationWindow = this.originalPresentationWindow;
    if (!s._buffer.append(this._buffer.data())) {
      return null;
    }
    if (!s._alphaBuffer.append(this._alphaBuffer.data())) {
      return null;
    }
    perfRecorder.record();
    return s;
  }

  byteSize(): number {
    return this._buffer.capacityBytes + this._alphaBuffer.capacityBytes;
  }
}

/**
 * The only mutator of a RawSample's main buffer. Each operation reports
 * the buffer's own success or failure.
 */
export class RawSampleWriter {
  /** Encryption record of the target; writable. */
  readonly crypto: CryptoSample;

  constructor(private readonly target: RawSample) {
    this.crypto = target._crypto;
  }

  /** Resize the buffer; new bytes are zeroed. */
  setSize(size: number): boolean {
    return this.target._buffer.setLength(size);
  }

  prepend(data: ArrayLike<number>): boolean {
    return this.target._buffer.prepend(data);
  }

  append(data: ArrayLike<number>): boolean {
    return this.target._buffer.append(data);
  }

  replace(data: ArrayLike<number>): boolean {
    return this.target._buffer.replace(data);
  }

  clear(): void {
    this.target._buffer.clear();
  }

  /** Drop `size` bytes from the front of the buffer. */
  popFront(size: number): void {
    this.target._buffer.popFront(size);
  }

  /**
   * Writable view of the buffer. Invalidated by the next operation that
   * grows the buffer.
   */
  data(): Uint8Array {
    return this.target._buffer.data();
  }

  size(): number {
    return this.target.size;
  }
}
