// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Geometry checks run on decoder output before any plane is read.

import { InvalidDataError } from './errors';
import * as is from './is';
import type { IntRect, Plane, YCbCrBuffer } from './types';

/** Largest width or height of a single plane. */
export const MAX_DIMENSION = 16384;

/** Ceiling on width * height of a single plane. */
export const MAX_VIDEO_WIDTH = 10000;
export const MAX_VIDEO_HEIGHT = 10000;

/**
 * Is this plane's geometry usable: bounded dimensions, bounded pixel
 * count, positive stride, and rows that fit in the stride?
 */
export function validatePlane(plane: Plane): boolean {
  return (
    is.nonNegativeInteger(plane.width) &&
    is.nonNegativeInteger(plane.height) &&
    plane.width <= MAX_DIMENSION &&
    plane.height <= MAX_DIMENSION &&
    plane.width * plane.height < MAX_VIDEO_WIDTH * MAX_VIDEO_HEIGHT &&
    is.integer(plane.stride) &&
    plane.stride > 0 &&
    plane.width <= plane.stride
  );
}

/**
 * Throws InvalidDataError unless `picture` can be cut out of `buffer`
 * without reading past the luma plane.
 */
export function validateBufferAndPicture(buffer: YCbCrBuffer, picture: IntRect): void {
  const [y, cb, cr] = buffer.planes;

  // Only a decoder bug gets here.
  if (cb.width !== cr.width || cb.height !== cr.height) {
    throw new InvalidDataError('Chroma planes with different sizes', {
      context: { cb: [cb.width, cb.height], cr: [cr.width, cr.height] },
    });
  }

  // The rest can be triggered by invalid input.
  if (picture.width <= 0 || picture.height <= 0) {
    throw new InvalidDataError('Empty picture rect', { context: { picture } });
  }
  if (!validatePlane(y) || !validatePlane(cb) || !validatePlane(cr)) {
    throw new InvalidDataError('Invalid plane size');
  }

  const xLimit = is.checkedUint32Add(picture.x, picture.width);
  const yLimit = is.checkedUint32Add(picture.y, picture.height);
  if (xLimit === null || xLimit > y.stride || yLimit === null || yLimit > y.height) {
    throw new InvalidDataError('Overflowing picture rect', {
      context: { picture, stride: y.stride, height: y.height },
    });
  }
}
