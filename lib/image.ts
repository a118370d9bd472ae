// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Image representations a decoded video sample can carry. The set is
// closed; consumers switch on `format`.

import { getConfig } from './config';
import type { BufferRecycleBin } from './recycle-bin';
import type {
  ChromaSubsampling,
  ColorDepth,
  ImageFormat,
  IntSize,
  PlanarYCbCrData,
  SurfaceFormat,
} from './types';

interface ImageBase {
  readonly format: ImageFormat;
  readonly colorDepth: ColorDepth;
  readonly size: IntSize;
}

function chromaSize(width: number, height: number, subsampling: ChromaSubsampling): IntSize {
  switch (subsampling) {
    case 'half-width-and-height':
      return { width: (width + 1) >> 1, height: (height + 1) >> 1 };
    case 'half-width':
      return { width: (width + 1) >> 1, height };
    case 'full':
      return { width, height };
  }
}

/** Odd origins round down, unlike sizes. */
function chromaOffset(
  x: number,
  y: number,
  subsampling: ChromaSubsampling,
): { x: number; y: number } {
  return {
    x: subsampling === 'full' ? x : x >> 1,
    y: subsampling === 'half-width-and-height' ? y >> 1 : y,
  };
}

/**
 * Copy a `width` x `height` region of samples starting at (`x`, `y`) into
 * a tightly packed destination. Returns false when the source is too short.
 */
function copyRegion(
  src: Uint8Array,
  stride: number,
  skip: number,
  bytesPerSample: number,
  x: number,
  y: number,
  width: number,
  height: number,
  dst: Uint8Array,
  dstOffset: number,
): boolean {
  const step = bytesPerSample * (skip + 1);
  const rowBytes = width * bytesPerSample;
  for (let row = 0; row < height; row++) {
    const srcRow = (y + row) * stride + x * step;
    const dstRow = dstOffset + row * rowBytes;
    if (skip === 0) {
      if (srcRow + rowBytes > src.length) return false;
      dst.set(src.subarray(srcRow, srcRow + rowBytes), dstRow);
      continue;
    }
    if (srcRow + (width - 1) * step + bytesPerSample > src.length) return false;
    for (let col = 0; col < width; col++) {
      for (let b = 0; b < bytesPerSample; b++) {
        dst[dstRow + col * bytesPerSample + b] = src[srcRow + col * step + b];
      }
    }
  }
  return true;
}

/**
 * Software planar Y/Cb/Cr image. `copyData` keeps an owned, tightly packed
 * copy of the picture rect; `adoptData` aliases the caller's planes.
 */
export class PlanarYCbCrImage implements ImageBase {
  readonly format = 'PLANAR_YCBCR';
  private _colorDepth: ColorDepth = 8;
  private _data: PlanarYCbCrData | null = null;
  private _owned: Uint8Array | null = null;
  private _ownedLength = 0;

  constructor(
    private readonly recycleBin: BufferRecycleBin | null = null,
    private readonly maxAllocation: number = getConfig().maxAllocation,
  ) {}

  get colorDepth(): ColorDepth {
    return this._colorDepth;
  }

  setColorDepth(depth: ColorDepth): void {
    this._colorDepth = depth;
  }

  get size(): IntSize {
    if (!this._data) return { width: 0, height: 0 };
    return { width: this._data.pictureRect.width, height: this._data.pictureRect.height };
  }

  getData(): PlanarYCbCrData | null {
    return this._data;
  }

  copyData(data: PlanarYCbCrData): boolean {
    const bytesPerSample = data.colorDepth === 8 ? 1 : 2;
    const { x, y, width, height } = data.pictureRect;
    const chroma = chromaSize(width, height, data.chromaSubsampling);
    const chromaOrigin = chromaOffset(x, y, data.chromaSubsampling);

    const yStride = width * bytesPerSample;
    const cStride = chroma.width * bytesPerSample;
    const yLength = yStride * height;
    const cLength = cStride * chroma.height;
    const total = yLength + cLength * 2;

    const buffer = this.allocate(total);
    if (!buffer) return false;

    const ok =
      copyRegion(data.yChannel, data.yStride, data.ySkip, bytesPerSample, x, y, width, height, buffer, 0) &&
      copyRegion(
        data.cbChannel,
        data.cbCrStride,
        data.cbSkip,
        bytesPerSample,
        chromaOrigin.x,
        chromaOrigin.y,
        chroma.width,
        chroma.height,
        buffer,
        yLength,
      ) &&
      copyRegion(
        data.crChannel,
        data.cbCrStride,
        data.crSkip,
        bytesPerSample,
        chromaOrigin.x,
        chromaOrigin.y,
        chroma.width,
        chroma.height,
        buffer,
        yLength + cLength,
      );
    if (!ok) {
      this.release(buffer, total);
      return false;
    }

    this.releaseOwned();
    this._owned = buffer;
    this._ownedLength = total;
    this._data = {
      ...data,
      yChannel: buffer.subarray(0, yLength),
      yStride,
      ySkip: 0,
      cbChannel: buffer.subarray(yLength, yLength + cLength),
      crChannel: buffer.subarray(yLength + cLength, total),
      cbCrStride: cStride,
      cbSkip: 0,
      crSkip: 0,
      pictureRect: { x: 0, y: 0, width, height },
    };
    this._colorDepth = data.colorDepth;
    return true;
  }

  adoptData(data: PlanarYCbCrData): boolean {
    this.releaseOwned();
    this._data = { ...data };
    this._colorDepth = data.colorDepth;
    return true;
  }

  /** Bytes owned by this image. */
  byteSize(): number {
    return this._owned ? this._owned.byteLength : 0;
  }

  /** Give any owned buffer back to the recycle bin. */
  close(): void {
    this.releaseOwned();
    this._data = null;
  }

  private allocate(size: number): Uint8Array | null {
    if (this.recycleBin) {
      return this.recycleBin.getBuffer(size);
    }
    if (size > this.maxAllocation) return null;
    try {
      return new Uint8Array(size);
    } catch (error) {
      if (error instanceof RangeError) return null;
      throw error;
    }
  }

  private release(buffer: Uint8Array, size: number): void {
    this.recycleBin?.recycleBuffer(buffer, size);
  }

  private releaseOwned(): void {
    if (this._owned) {
      this.release(this._owned, this._ownedLength);
      this._owned = null;
      this._ownedLength = 0;
    }
  }
}

/**
 * Packed 4-channel color image written by software conversion.
 */
export class SharedRGBImage implements ImageBase {
  readonly format = 'SHARED_RGB';
  readonly colorDepth = 8;
  private _size: IntSize = { width: 0, height: 0 };
  private _surfaceFormat: SurfaceFormat | null = null;
  private _data: Uint8Array | null = null;

  constructor(private readonly maxAllocation: number = getConfig().maxAllocation) {}

  get size(): IntSize {
    return { ...this._size };
  }

  get surfaceFormat(): SurfaceFormat | null {
    return this._surfaceFormat;
  }

  get stride(): number {
    return this._size.width * 4;
  }

  /** Mapped pixel storage; null until allocate() succeeds. */
  get data(): Uint8Array | null {
    return this._data;
  }

  allocate(size: IntSize, surfaceFormat: SurfaceFormat): boolean {
    const bytes = size.width * size.height * 4;
    if (size.width <= 0 || size.height <= 0 || bytes > this.maxAllocation) {
      return false;
    }
    try {
      this._data = new Uint8Array(bytes);
    } catch (error) {
      if (error instanceof RangeError) return false;
      throw error;
    }
    this._size = { ...size };
    this._surfaceFormat = surfaceFormat;
    return true;
  }
}

/**
 * Backend hook for zero-copy platform surfaces. Returns an opaque handle,
 * or null when the backend cannot take the data.
 */
export interface SurfaceUploader {
  upload(data: PlanarYCbCrData): unknown;
}

export class PlatformSurfaceImage implements ImageBase {
  readonly format = 'PLATFORM_SURFACE';
  private _colorDepth: ColorDepth = 8;
  private _size: IntSize = { width: 0, height: 0 };
  private _handle: unknown = null;

  constructor(private readonly uploader: SurfaceUploader) {}

  get colorDepth(): ColorDepth {
    return this._colorDepth;
  }

  get size(): IntSize {
    return { ...this._size };
  }

  get handle(): unknown {
    return this._handle;
  }

  setData(data: PlanarYCbCrData): boolean {
    const handle = this.uploader.upload(data);
    if (handle === null || handle === undefined) {
      return false;
    }
    this._handle = handle;
    this._colorDepth = data.colorDepth;
    this._size = { width: data.pictureRect.width, height: data.pictureRect.height };
    return true;
  }
}

/**
 * An image produced outside this package (hardware decoder output, a
 * texture handed over by a GPU process). Trusted as-is.
 */
export class ExternalImage implements ImageBase {
  readonly format = 'EXTERNAL';

  constructor(
    readonly size: IntSize,
    readonly colorDepth: ColorDepth,
    readonly handle: unknown,
  ) {}
}

export type Image = PlanarYCbCrImage | SharedRGBImage | PlatformSurfaceImage | ExternalImage;

/**
 * Factory for images. Returning null from a create method reports that the
 * backend could not provide that representation.
 */
export interface ImageContainer {
  createPlanarYCbCrImage(): PlanarYCbCrImage | null;
  createSharedRGBImage(): SharedRGBImage | null;
  createPlatformSurfaceImage?(): PlatformSurfaceImage | null;
}

export interface MemoryImageContainerOptions {
  recycleBin?: BufferRecycleBin;
  surfaceUploader?: SurfaceUploader;
  maxAllocation?: number;
}

/**
 * In-process container backed by plain memory. Offers platform surfaces
 * only when given an uploader.
 */
export class MemoryImageContainer implements ImageContainer {
  constructor(private readonly options: MemoryImageContainerOptions = {}) {}

  createPlanarYCbCrImage(): PlanarYCbCrImage | null {
    return new PlanarYCbCrImage(this.options.recycleBin ?? null, this.options.maxAllocation);
  }

  createSharedRGBImage(): SharedRGBImage | null {
    return new SharedRGBImage(this.options.maxAllocation);
  }

  createPlatformSurfaceImage(): PlatformSurfaceImage | null {
    const uploader = this.options.surfaceUploader;
    return uploader ? new PlatformSurfaceImage(uploader) : null;
  }
}
