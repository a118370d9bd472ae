// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Pixel conversion routines. Each returns 0 on success and -1 on invalid
// arguments, like the libyuv functions they stand in for.

import type { ChromaSubsampling, ColorDepth } from './types';

/**
 * 16-bit planar to 8-bit planar. Source strides count 16-bit samples,
 * destination strides count bytes. Source samples are little-endian.
 */
export type Convert16To8 = (
  srcY: Uint8Array,
  srcStrideY: number,
  srcU: Uint8Array,
  srcStrideU: number,
  srcV: Uint8Array,
  srcStrideV: number,
  dstY: Uint8Array,
  dstStrideY: number,
  dstU: Uint8Array,
  dstStrideU: number,
  dstV: Uint8Array,
  dstStrideV: number,
  width: number,
  height: number,
) => number;

// Fixed-point scale such that (sample * scale) >> 16 drops the extra bits.
const SCALE_10_BIT = 16384;
const SCALE_12_BIT = 4096;

function convertPlane16To8(
  src: Uint8Array,
  srcStride: number,
  dst: Uint8Array,
  dstStride: number,
  width: number,
  height: number,
  scale: number,
): boolean {
  if (srcStride < width || dstStride < width) return false;
  if (((height - 1) * srcStride + width) * 2 > src.length) return false;
  if ((height - 1) * dstStride + width > dst.length) return false;

  for (let row = 0; row < height; row++) {
    const srcRow = row * srcStride * 2;
    const dstRow = row * dstStride;
    for (let col = 0; col < width; col++) {
      const i = srcRow + col * 2;
      const sample = src[i] | (src[i + 1] << 8);
      dst[dstRow + col] = Math.min(255, (sample * scale) >> 16);
    }
  }
  return true;
}

function makeConverter(scale: number, subsampleX: boolean, subsampleY: boolean): Convert16To8 {
  return (srcY, srcStrideY, srcU, srcStrideU, srcV, srcStrideV, dstY, dstStrideY, dstU, dstStrideU, dstV, dstStrideV, width, height) => {
    if (width <= 0 || height <= 0) return -1;
    const chromaWidth = subsampleX ? (width + 1) >> 1 : width;
    const chromaHeight = subsampleY ? (height + 1) >> 1 : height;
    const ok =
      convertPlane16To8(srcY, srcStrideY, dstY, dstStrideY, width, height, scale) &&
      convertPlane16To8(srcU, srcStrideU, dstU, dstStrideU, chromaWidth, chromaHeight, scale) &&
      convertPlane16To8(srcV, srcStrideV, dstV, dstStrideV, chromaWidth, chromaHeight, scale);
    return ok ? 0 : -1;
  };
}

export const I010ToI420 = makeConverter(SCALE_10_BIT, true, true);
export const I012ToI420 = makeConverter(SCALE_12_BIT, true, true);
export const I210ToI422 = makeConverter(SCALE_10_BIT, true, false);
export const I212ToI422 = makeConverter(SCALE_12_BIT, true, false);
export const I410ToI444 = makeConverter(SCALE_10_BIT, false, false);
export const I412ToI444 = makeConverter(SCALE_12_BIT, false, false);

/**
 * Pick the 16-to-8 routine for a source layout, or null when the pair is
 * not one of {10, 12} x {4:2:0, 4:2:2, 4:4:4}.
 */
export function selectConverter(
  depth: ColorDepth,
  subsampling: ChromaSubsampling,
): Convert16To8 | null {
  if (depth !== 10 && depth !== 12) return null;
  switch (subsampling) {
    case 'half-width-and-height':
      return depth === 10 ? I010ToI420 : I012ToI420;
    case 'half-width':
      return depth === 10 ? I210ToI422 : I212ToI422;
    case 'full':
      return depth === 10 ? I410ToI444 : I412ToI444;
    default:
      return null;
  }
}

function clamp255(v: number): number {
  return v < 0 ? 0 : v > 255 ? 255 : v;
}

function attenuate(channel: number, alpha: number): number {
  return (channel * alpha + 255) >> 8;
}

/**
 * 8-bit 4:2:0 YUV plus alpha to premultiplied BGRA bytes (libyuv's ARGB
 * word order). BT.601 limited range. The alpha plane shares the luma stride.
 */
export function I420AlphaToARGB(
  srcY: Uint8Array,
  srcU: Uint8Array,
  srcV: Uint8Array,
  srcA: Uint8Array,
  yStride: number,
  uvStride: number,
  dst: Uint8Array,
  dstStride: number,
  width: number,
  height: number,
): number {
  if (width <= 0 || height <= 0) return -1;
  const chromaWidth = (width + 1) >> 1;
  const chromaHeight = (height + 1) >> 1;
  if (yStride < width || uvStride < chromaWidth || dstStride < width * 4) return -1;
  const lumaNeeded = (height - 1) * yStride + width;
  if (lumaNeeded > srcY.length || lumaNeeded > srcA.length) return -1;
  const chromaNeeded = (chromaHeight - 1) * uvStride + chromaWidth;
  if (chromaNeeded > srcU.length || chromaNeeded > srcV.length) return -1;
  if ((height - 1) * dstStride + width * 4 > dst.length) return -1;

  for (let row = 0; row < height; row++) {
    const uvRow = (row >> 1) * uvStride;
    for (let col = 0; col < width; col++) {
      const yi = row * yStride + col;
      const ci = uvRow + (col >> 1);
      const c = srcY[yi] - 16;
      const d = srcU[ci] - 128;
      const e = srcV[ci] - 128;
      const a = srcA[yi];
      const r = clamp255((298 * c + 409 * e + 128) >> 8);
      const g = clamp255((298 * c - 100 * d - 208 * e + 128) >> 8);
      const b = clamp255((298 * c + 516 * d + 128) >> 8);
      const o = row * dstStride + col * 4;
      dst[o] = attenuate(b, a);
      dst[o + 1] = attenuate(g, a);
      dst[o + 2] = attenuate(r, a);
      dst[o + 3] = a;
    }
  }
  return 0;
}
