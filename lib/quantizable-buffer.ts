/**
 * node-mediadata - decoded media sample model for Node.js
 *
 * High-bit-depth plane buffer with in-place 8-bit down-conversion.
 */

import { selectConverter } from './convert';
import { AllocationError, assertContract, DecodingError } from './errors';
import type { BufferRecycleBin } from './recycle-bin';
import type {
  ChromaSubsampling,
  ColorDepth,
  ColorRange,
  Plane,
  VideoColorPrimaries,
  VideoMatrixCoefficients,
  YCbCrBuffer,
} from './types';

interface PooledBuffer {
  bin: BufferRecycleBin;
  buffer: Uint8Array;
  allocatedLength: number;
}

/**
 * FinalizationRegistry returning pooled 8-bit buffers when a
 * QuantizableBuffer is collected without close(). The held value must not
 * reference the buffer object itself.
 */
const pooledRegistry = new FinalizationRegistry<PooledBuffer>((pooled) => {
  pooled.bin.recycleBuffer(pooled.buffer, pooled.allocatedLength);
});

/**
 * A Y/Cb/Cr buffer that can be converted once from 10 or 12 bits per
 * channel to 8. The 8-bit planes live in one allocation drawn from a
 * recycle bin and go back to it on close().
 */
export class QuantizableBuffer implements YCbCrBuffer {
  planes: [Plane, Plane, Plane];
  colorDepth: ColorDepth;
  chromaSubsampling: ChromaSubsampling;
  yuvColorSpace: VideoMatrixCoefficients;
  colorPrimaries: VideoColorPrimaries;
  colorRange: ColorRange;

  private recycleBin: BufferRecycleBin | null = null;
  private pooled: PooledBuffer | null = null;

  constructor(buffer: YCbCrBuffer) {
    const [y, cb, cr] = buffer.planes;
    this.planes = [{ ...y }, { ...cb }, { ...cr }];
    this.colorDepth = buffer.colorDepth;
    this.chromaSubsampling = buffer.chromaSubsampling;
    this.yuvColorSpace = buffer.yuvColorSpace;
    this.colorPrimaries = buffer.colorPrimaries;
    this.colorRange = buffer.colorRange;
  }

  /** Bytes requested from the recycle bin, 0 before conversion. */
  get allocatedLength(): number {
    return this.pooled?.allocatedLength ?? 0;
  }

  /**
   * Rewrite the planes as 8 bits per channel. Callable once per instance.
   *
   * @throws AllocationError when the recycle bin cannot provide the buffer
   * @throws DecodingError for an unsupported depth/subsampling pair or a
   *   failing conversion routine
   */
  to8BitPerChannel(recycleBin: BufferRecycleBin): void {
    assertContract(this.recycleBin === null, 'Should not be called more than once.');
    this.recycleBin = recycleBin;

    const [y, cb, cr] = this.planes;
    // 16-bit strides in bytes halve into 8-bit strides in bytes, which are
    // also the 16-bit strides in samples.
    const yStride = Math.floor(y.stride / 2);
    const uvStride = Math.floor(cb.stride / 2);
    const yLength = yStride * y.height;
    const uvLength = uvStride * cb.height;
    const totalLength = yLength + uvLength * 2;

    const convert = selectConverter(this.colorDepth, this.chromaSubsampling);
    if (!convert) {
      throw new DecodingError(
        `Source format (color depth=${this.colorDepth}, subsampling=${this.chromaSubsampling}) not supported`,
        { context: { colorDepth: this.colorDepth, chromaSubsampling: this.chromaSubsampling } },
      );
    }

    const dest = this.allocateRecyclableData(recycleBin, totalLength);
    if (!dest) {
      throw new AllocationError('8-bit conversion', {
        requestedSize: totalLength,
        detail: `Cannot allocate ${totalLength} bytes for 8-bit conversion`,
      });
    }
    const destPlanes = [
      dest.subarray(0, yLength),
      dest.subarray(yLength, yLength + uvLength),
      dest.subarray(yLength + uvLength, totalLength),
    ] as const;

    const status = convert(
      y.data,
      yStride,
      cb.data,
      uvStride,
      cr.data,
      uvStride,
      destPlanes[0],
      yStride,
      destPlanes[1],
      uvStride,
      destPlanes[2],
      uvStride,
      y.width,
      y.height,
    );
    if (status !== 0) {
      throw new DecodingError(`Conversion to 8-bit failed. libyuv error=${status}`, {
        nativeCode: status,
      });
    }

    this.colorDepth = 8;
    this.planes = [
      { ...y, data: destPlanes[0], stride: yStride },
      { ...cb, data: destPlanes[1], stride: uvStride },
      { ...cr, data: destPlanes[2], stride: uvStride },
    ];
  }

  /**
   * Give the 8-bit buffer back to the recycle bin it came from, with the
   * length it was requested with. Idempotent.
   */
  close(): void {
    if (!this.pooled) return;
    pooledRegistry.unregister(this);
    const { bin, buffer, allocatedLength } = this.pooled;
    this.pooled = null;
    bin.recycleBuffer(buffer, allocatedLength);
  }

  private allocateRecyclableData(bin: BufferRecycleBin, length: number): Uint8Array | null {
    assertContract(this.pooled === null, 'Should not allocate more than once.');
    assertContract(length > 0, 'Zero-length allocation!');
    const buffer = bin.getBuffer(length);
    if (!buffer) return null;
    this.pooled = { bin, buffer, allocatedLength: length };
    pooledRegistry.register(this, this.pooled, this);
    return buffer;
  }
}
