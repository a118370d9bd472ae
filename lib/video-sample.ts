/**
 * node-mediadata - decoded media sample model for Node.js
 *
 * VideoSample class
 */

import { I420AlphaToARGB } from './convert';
import { AllocationError, assertContract, ImageDataError, InvalidDataError } from './errors';
import type { Image, ImageContainer, PlanarYCbCrImage } from './image';
import { MediaData } from './media-data';
import { PerformanceRecorder } from './performance';
import { validateBufferAndPicture } from './plane-validator';
import { TimeUnit } from './time-unit';
import type {
  ColorDepth,
  IntRect,
  IntSize,
  KnowsCompositor,
  Plane,
  PlanarYCbCrData,
  VideoInfo,
  YCbCrBuffer,
} from './types';
import { warn } from './warnings';

/** Identifier the compositor uses to track frames; 0 when unassigned. */
export type FrameID = number;

export function constructPlanarYCbCrData(
  info: VideoInfo,
  buffer: YCbCrBuffer,
  picture: IntRect,
): PlanarYCbCrData {
  const [y, cb, cr] = buffer.planes;
  const data: PlanarYCbCrData = {
    yChannel: y.data,
    yStride: y.stride,
    ySkip: y.skip,
    cbChannel: cb.data,
    crChannel: cr.data,
    cbCrStride: cb.stride,
    cbSkip: cb.skip,
    crSkip: cr.skip,
    pictureRect: { ...picture },
    stereoMode: info.stereoMode ?? 'mono',
    yuvColorSpace: buffer.yuvColorSpace,
    colorPrimaries: buffer.colorPrimaries,
    colorDepth: buffer.colorDepth,
    colorRange: buffer.colorRange,
    chromaSubsampling: buffer.chromaSubsampling,
  };
  if (info.transferFunction) {
    data.transferFunction = info.transferFunction;
  }
  return data;
}

/**
 * A decoded video frame. The image is attached once at creation; after
 * that only the timing and the compositor flag change.
 */
export class VideoSample extends MediaData {
  readonly type = 'video';
  readonly display: IntSize;
  readonly frameID: FrameID;
  /** Set by the renderer once the image has been handed to the compositor. */
  sentToCompositor = false;
  /** Time of the next keyframe, when the decoder knows it. */
  nextKeyframeTime: TimeUnit = TimeUnit.invalid();

  private _image: Image | null = null;

  constructor(
    offset: number,
    time: TimeUnit,
    duration: TimeUnit,
    keyframe: boolean,
    timecode: TimeUnit,
    display: IntSize,
    frameID: FrameID = 0,
  ) {
    super(offset, time, duration);
    assertContract(!duration.isNegative(), 'Frame must have non-negative duration.');
    this.keyframe = keyframe;
    this.timecode = timecode;
    this.display = { ...display };
    this.frameID = frameID;
  }

  get image(): Image | null {
    return this._image;
  }

  getColorDepth(): ColorDepth {
    return this._image ? this._image.colorDepth : 8;
  }

  updateDuration(duration: TimeUnit): void {
    assertContract(!duration.isNegative(), 'Duration must not be negative');
    this.duration = duration;
  }

  /**
   * Move the start while keeping the end time fixed.
   */
  updateTimestamp(timestamp: TimeUnit): void {
    assertContract(!timestamp.isNegative(), 'Timestamp must not be negative');
    const updatedDuration = this.getEndTime().sub(timestamp);
    assertContract(!updatedDuration.isNegative(), 'Timestamp past the end time', {
      timestamp: timestamp.toString(),
      end: this.getEndTime().toString(),
    });
    this.time = timestamp;
    this.duration = updatedDuration;
  }

  /**
   * Move the sample back by `startTime`. Returns false on overflow.
   */
  adjustForStartTime(startTime: TimeUnit): boolean {
    this.time = this.time.sub(startTime);
    if (this.time.isNegative()) {
      warn('Negative video start time after time-adjustment!');
    }
    return this.time.isValid();
  }

  byteSize(): number {
    // Only planar images know their size.
    if (this._image && this._image.format === 'PLANAR_YCBCR') {
      return this._image.byteSize();
    }
    return 0;
  }

  toString(): string {
    return (
      `VideoSample [${this.time.toString()},${this.duration.toString()}] ` +
      `[${this.display.width}x${this.display.height}] format: ${this._image ? this._image.format : 'null'}`
    );
  }

  /**
   * Copy or adopt `buffer` into a planar image. Throws ImageDataError when
   * the image refuses the data.
   */
  static setVideoDataToImage(
    image: PlanarYCbCrImage,
    info: VideoInfo,
    buffer: YCbCrBuffer,
    picture: IntRect,
    copyData: boolean,
  ): void {
    const data = constructPlanarYCbCrData(info, buffer, picture);
    if (copyData) {
      if (!image.copyData(data)) {
        throw new ImageDataError('Failed to copy image data');
      }
      return;
    }
    if (!image.adoptData(data)) {
      throw new ImageDataError('Failed to adopt image data');
    }
  }

  /**
   * Validate decoder output and copy it into a new image.
   *
   * With no container the sample carries no image; it still feeds media
   * streams. A compositor other than the software one gets a platform
   * surface when the container offers one and accepts the data.
   *
   * @throws InvalidDataError when the buffer or picture rect is malformed
   * @throws AllocationError when no planar image can be created
   * @throws ImageDataError when the image cannot take the data
   */
  static createAndCopyData(
    info: VideoInfo,
    container: ImageContainer | null,
    offset: number,
    time: TimeUnit,
    duration: TimeUnit,
    buffer: YCbCrBuffer,
    keyframe: boolean,
    timecode: TimeUnit,
    picture: IntRect,
    allocator: KnowsCompositor | null = null,
  ): VideoSample {
    if (!container) {
      return new VideoSample(offset, time, duration, keyframe, timecode, info.display, 0);
    }

    validateBufferAndPicture(buffer, picture);

    const perfRecorder = new PerformanceRecorder('CopyDecodedVideo', info.image.height);
    const v = new VideoSample(offset, time, duration, keyframe, timecode, info.display, 0);

    if (allocator && allocator.compositorType !== 'software' && container.createPlatformSurfaceImage) {
      const surface = container.createPlatformSurfaceImage();
      if (surface && surface.setData(constructPlanarYCbCrData(info, buffer, picture))) {
        v._image = surface;
        perfRecorder.record();
        return v;
      }
    }

    const videoImage = container.createPlanarYCbCrImage();
    if (!videoImage) {
      throw new AllocationError('PlanarYCbCrImage', {
        detail: 'Failed to create a PlanarYCbCrImage',
      });
    }
    videoImage.setColorDepth(buffer.colorDepth);
    VideoSample.setVideoDataToImage(videoImage, info, buffer, picture, true);
    v._image = videoImage;

    perfRecorder.record();
    return v;
  }

  /**
   * Validate 8-bit 4:2:0 planes plus an alpha plane and convert them to a
   * packed BGRA image. Any failure drops the frame: the result is null.
   */
  static createAndCopyDataWithAlpha(
    info: VideoInfo,
    container: ImageContainer | null,
    offset: number,
    time: TimeUnit,
    duration: TimeUnit,
    buffer: YCbCrBuffer,
    alphaPlane: Plane,
    keyframe: boolean,
    timecode: TimeUnit,
    picture: IntRect,
  ): VideoSample | null {
    if (!container) {
      return new VideoSample(offset, time, duration, keyframe, timecode, info.display, 0);
    }

    try {
      validateBufferAndPicture(buffer, picture);
    } catch (error) {
      if (error instanceof InvalidDataError) {
        warn(error.message);
        return null;
      }
      throw error;
    }
    if (buffer.colorDepth !== 8 || buffer.chromaSubsampling !== 'half-width-and-height') {
      warn(`Alpha conversion needs 8-bit 4:2:0 input, got ${buffer.colorDepth}-bit ${buffer.chromaSubsampling}`);
      return null;
    }

    const v = new VideoSample(offset, time, duration, keyframe, timecode, info.display, 0);

    // Convert from YUVA to BGRA on the software side.
    const videoImage = container.createSharedRGBImage();
    if (!videoImage) {
      return null;
    }
    const [y, cb, cr] = buffer.planes;
    if (!videoImage.allocate({ width: y.width, height: y.height }, 'B8G8R8A8')) {
      warn('Failed to allocate shared RGB image');
      return null;
    }
    const mapped = videoImage.data;
    if (!mapped) {
      return null;
    }

    // libyuv names formats in word order; B8G8R8A8 bytes are ARGB words.
    const result = I420AlphaToARGB(
      y.data,
      cb.data,
      cr.data,
      alphaPlane.data,
      y.stride,
      cb.stride,
      mapped,
      videoImage.stride,
      y.width,
      y.height,
    );
    if (result !== 0) {
      warn('Failed to convert I420 YUVA into RGBA data');
      return null;
    }
    v._image = videoImage;
    return v;
  }

  /**
   * Wrap an image produced elsewhere. No validation: the source is trusted.
   */
  static createFromImage(
    display: IntSize,
    offset: number,
    time: TimeUnit,
    duration: TimeUnit,
    image: Image,
    keyframe: boolean,
    timecode: TimeUnit,
  ): VideoSample {
    const v = new VideoSample(offset, time, duration, keyframe, timecode, display, 0);
    v._image = image;
    return v;
  }
}
