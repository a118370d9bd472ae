/**
 * node-mediadata - decoded media sample model for Node.js
 *
 * AudioSample class
 */

import { type AlignedAudioBuffer, AlignedBuffer } from './aligned-buffer';
import { assertContract } from './errors';
import { MediaData } from './media-data';
import { TimeInterval, TimeUnit } from './time-unit';
import { warn } from './warnings';

/** Channel layout mask for "no known layout". */
export const UNKNOWN_CHANNEL_MAP = 0;

/**
 * A decoded audio frame: interleaved float samples plus a trim window that
 * narrows what is played without copying.
 */
export class AudioSample extends MediaData {
  readonly type = 'audio';
  readonly channels: number;
  readonly channelMap: number;
  readonly rate: number;

  private _originalTime: TimeUnit;
  private _trimWindow: TimeInterval | null = null;
  private _audioData: AlignedAudioBuffer | null;
  // Offset into _audioData, in samples (frames * channels).
  private _dataOffset = 0;
  private _frames: number;
  private _audioBuffer: Float32Array | null = null;

  constructor(
    offset: number,
    time: TimeUnit,
    data: AlignedAudioBuffer | Float32Array,
    channels: number,
    rate: number,
    channelMap: number = UNKNOWN_CHANNEL_MAP,
  ) {
    super(offset, time);
    assertContract(channels !== 0, "Can't create an AudioSample with 0 channels.");
    assertContract(rate !== 0, "Can't create an AudioSample with a sample-rate of 0.");
    this.channels = channels;
    this.channelMap = channelMap;
    this.rate = rate;
    this._originalTime = time;
    this._audioData = data instanceof Float32Array ? AlignedBuffer.adopt<Float32Array>(Float32Array, data) : data;
    this._frames = Math.floor(this._audioData.length / channels);
    this.duration = TimeUnit.fromTicks(this._frames, rate);
  }

  /** Frames in the current (possibly trimmed) view. */
  get frames(): number {
    return this._frames;
  }

  /** Presentation time before any trimming. */
  get originalTime(): TimeUnit {
    return this._originalTime;
  }

  get trimWindow(): TimeInterval | null {
    return this._trimWindow;
  }

  /** Offset of the current view into the buffer, in samples. */
  get dataOffset(): number {
    return this._dataOffset;
  }

  /** False once moveableData() has handed the buffer over. */
  hasData(): boolean {
    return this._audioData !== null && !this._audioData.isEmpty();
  }

  /**
   * The current view: `frames * channels` interleaved samples. Aliases the
   * underlying buffer.
   */
  data(): Float32Array {
    if (!this._audioData) {
      return new Float32Array(0);
    }
    return this._audioData.view(this._dataOffset, this._frames * this.channels);
  }

  /**
   * Rebase the sample on `startTime`. Only valid before any trimming.
   */
  setOriginalStartTime(startTime: TimeUnit): void {
    assertContract(this.time.eq(this._originalTime), 'Do not call this if data has been trimmed!');
    this.time = startTime;
    this._originalTime = startTime;
  }

  /**
   * Move the sample back by `startTime`. Returns false on overflow. A
   * negative result is kept and reported as a warning.
   */
  adjustForStartTime(startTime: TimeUnit): boolean {
    this._originalTime = this._originalTime.sub(startTime);
    this.time = this.time.sub(startTime);
    if (this._trimWindow) {
      this._trimWindow = this._trimWindow.shift(startTime);
    }
    if (this.time.isNegative()) {
      warn('Negative audio start time after time-adjustment!');
    }
    return this.time.isValid() && this._originalTime.isValid();
  }

  /**
   * Restrict playback to `trim`, which must lie inside
   * [originalTime, end time] with start <= end. Otherwise, and once the
   * buffer has been moved out, returns false and leaves the sample untouched.
   */
  setTrimWindow(trim: TimeInterval): boolean {
    assertContract(trim.isValid(), 'An overflow occurred on the provided TimeInterval');
    if (this._audioData === null) {
      // moveableData() got called. Can no longer work on it.
      return false;
    }
    if (trim.start.gt(trim.end)) {
      return false;
    }
    const endTime = this.getEndTime();
    if (!endTime.isValid() || trim.start.lt(this._originalTime) || trim.end.gt(endTime)) {
      return false;
    }

    const trimBefore = trim.start.sub(this._originalTime);
    const trimAfter = trim.end.sub(this._originalTime);
    if (!trimBefore.isValid() || !trimAfter.isValid()) {
      // Overflow.
      return false;
    }
    // Nothing to change; recomputing would only accumulate rounding error.
    if (!this._trimWindow && trimBefore.isZero() && trimAfter.eq(this.duration)) {
      return true;
    }
    if (this._trimWindow && this._trimWindow.eq(trim)) {
      return true;
    }

    const buffer = this.bufferOrThrow();
    const frameOffset = trimBefore.toTicksAtRate(this.rate);
    const dataOffset = frameOffset * this.channels;
    assertContract(dataOffset <= buffer.length, 'Data offset outside original buffer', {
      dataOffset,
      length: buffer.length,
    });

    const frameCountAfterTrim = trimAfter.sub(trimBefore).toTicksAtRate(this.rate);
    const availableFrames = Math.floor(buffer.length / this.channels);
    let frames: number;
    if (frameCountAfterTrim > availableFrames) {
      // Accept rounding error caused by an imprecise time_base in the
      // container; an offset already at the sample rate cannot produce it.
      assertContract(!trimBefore.isBase(this.rate), 'Trim frame count exceeds buffer', {
        frameCountAfterTrim,
        availableFrames,
      });
      warn(
        `Trim window ${trim.toString()} needs ${frameCountAfterTrim} frames but only ` +
          `${availableFrames} are available; clamping to 0`,
      );
      frames = 0;
    } else {
      frames = frameCountAfterTrim;
    }

    this._trimWindow = trim;
    this._dataOffset = dataOffset;
    this._frames = frames;
    this.time = this._originalTime.add(trimBefore);
    this.duration = TimeUnit.fromTicks(frames, this.rate);
    return true;
  }

  /**
   * Build the channel-planar copy of the current view, once.
   */
  ensureAudioBuffer(): void {
    if (this._audioBuffer || !this.hasData()) {
      return;
    }
    const src = this.data();
    const frames = this._frames;
    const channels = this.channels;
    const dest = new Float32Array(frames * channels);
    for (let i = 0; i < frames; i++) {
      for (let j = 0; j < channels; j++) {
        dest[j * frames + i] = src[i * channels + j];
      }
    }
    this._audioBuffer = dest;
  }

  /** Channel-planar copy built by ensureAudioBuffer(), or null. */
  get audioBuffer(): Float32Array | null {
    return this._audioBuffer;
  }

  /**
   * Drop samples outside the trim window and hand the buffer to the caller.
   * The sample is empty afterwards.
   */
  moveableData(): AlignedAudioBuffer {
    const buffer = this.bufferOrThrow();
    buffer.popFront(this._dataOffset);
    buffer.setLength(this._frames * this.channels);
    this._dataOffset = 0;
    this._frames = 0;
    this._trimWindow = null;
    this._audioData = null;
    return buffer;
  }

  byteSize(): number {
    return (this._audioData?.capacityBytes ?? 0) + (this._audioBuffer?.byteLength ?? 0);
  }

  toString(): string {
    return (
      `AudioSample: ${this.time.toString()} ${this.duration.toString()} ` +
      `${this._frames} frames ${this.rate}Hz, ${this.channels}ch`
    );
  }

  private bufferOrThrow(): AlignedAudioBuffer {
    assertContract(this._audioData !== null, 'AudioSample buffer has been moved out');
    return this._audioData;
  }
}
