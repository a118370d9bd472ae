/**
 * node-mediadata - decoded media sample model for Node.js
 *
 * Samples move demuxer -> decoder -> renderer:
 * - RawSample / RawSampleWriter: encoded payload and track metadata
 * - AudioSample: interleaved float frames with a copy-free trim window
 * - VideoSample: validated planes copied into an image, or an external image
 * - QuantizableBuffer: 10/12-bit planes down-converted to 8-bit via a recycle bin
 *
 * Nothing here locks. A sample is mutated by one owner at a time; the
 * recycle bin is the only object meant to be shared between decode loops.
 */

export {
  AlignedBuffer,
  type AlignedAudioBuffer,
  type AlignedBufferOptions,
  type AlignedByteBuffer,
  createAudioBuffer,
  createByteBuffer,
  type SampleArray,
  type SampleArrayConstructor,
} from './aligned-buffer';
export { AudioSample, UNKNOWN_CHANNEL_MAP } from './audio-sample';
export {
  DEFAULT_MAX_ALLOCATION,
  DEFAULT_RECYCLE_LIMIT,
  getConfig,
  type MediaDataConfig,
  resetConfig,
} from './config';
export {
  type Convert16To8,
  I010ToI420,
  I012ToI420,
  I210ToI422,
  I212ToI422,
  I410ToI444,
  I412ToI444,
  I420AlphaToARGB,
  selectConverter,
} from './convert';
export {
  cloneCryptoSample,
  type CryptoSample,
  type CryptoScheme,
  type CryptoSchemeSet,
  createCryptoSample,
  cryptoSchemeSetToString,
  type InitData,
  isEncrypted,
  stringToCryptoScheme,
} from './crypto';
export {
  AllocationError,
  assertContract,
  ContractViolationError,
  DecodingError,
  ErrorCode,
  type ErrorCodeType,
  ImageDataError,
  InvalidDataError,
  MediaDataError,
} from './errors';
export {
  ExternalImage,
  type Image,
  type ImageContainer,
  MemoryImageContainer,
  type MemoryImageContainerOptions,
  PlanarYCbCrImage,
  PlatformSurfaceImage,
  SharedRGBImage,
  type SurfaceUploader,
} from './image';
export { MediaData, type MediaDataType } from './media-data';
export { PerformanceRecorder, type PerformanceSink, setPerformanceSink } from './performance';
export {
  MAX_DIMENSION,
  MAX_VIDEO_HEIGHT,
  MAX_VIDEO_WIDTH,
  validateBufferAndPicture,
  validatePlane,
} from './plane-validator';
export { QuantizableBuffer } from './quantizable-buffer';
export { RawSample, RawSampleWriter } from './raw-sample';
export { BufferRecycleBin, type BufferRecycleBinOptions } from './recycle-bin';
export { MICROSECONDS_PER_SECOND, TimeInterval, TimeUnit } from './time-unit';
export type * from './types';
export { constructPlanarYCbCrData, type FrameID, VideoSample } from './video-sample';
export {
  clearMediaWarnings,
  getMediaWarnings,
  MAX_RETAINED_WARNINGS,
  WarningAccumulator,
} from './warnings';
