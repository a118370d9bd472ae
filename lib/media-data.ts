/**
 * node-mediadata - decoded media sample model for Node.js
 *
 * Copyright 2024 The node-webcodecs Authors
 * SPDX-License-Identifier: MIT
 */

import { TimeUnit } from './time-unit';

export type MediaDataType = 'audio' | 'video' | 'raw';

/**
 * Abstract base class for every sample flowing from demuxer to renderer.
 * Holds the timing fields common to raw, audio and video samples.
 */
export abstract class MediaData {
  abstract readonly type: MediaDataType;

  /** Approximate byte offset in the source stream. */
  offset: number;
  /** Presentation time. */
  time: TimeUnit;
  /** Decode timestamp. */
  timecode: TimeUnit;
  duration: TimeUnit;
  keyframe = false;
  /** Last sample of the stream. */
  eos = false;

  protected constructor(
    offset: number = 0,
    time: TimeUnit = TimeUnit.zero(),
    duration: TimeUnit = TimeUnit.zero(),
  ) {
    this.offset = offset;
    this.time = time;
    this.timecode = TimeUnit.zero();
    this.duration = duration;
  }

  getEndTime(): TimeUnit {
    return this.time.add(this.duration);
  }

  /** Bytes held by this sample. */
  abstract byteSize(): number;
}
