/**
 * Media sample type definitions
 *
 * Plane geometry, color description and track metadata shared by the
 * audio, video and raw sample classes. Color enums follow the W3C
 * WebCodecs naming so values can be passed straight to a VideoFrame.
 */

// =============================================================================
// GEOMETRY
// =============================================================================

export interface IntSize {
  width: number;
  height: number;
}

/**
 * Integer rectangle. x/y may be negative on malformed input; validation
 * rejects that before any plane access.
 */
export interface IntRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// =============================================================================
// COLOR DESCRIPTION
// =============================================================================

/** Bits per channel of the decoded samples. */
export type ColorDepth = 8 | 10 | 12 | 16;

/**
 * Chroma resolution relative to luma.
 * - "full": 4:4:4
 * - "half-width": 4:2:2
 * - "half-width-and-height": 4:2:0
 */
export type ChromaSubsampling = 'full' | 'half-width' | 'half-width-and-height';

export type ColorRange = 'limited' | 'full';

/**
 * WebIDL:
 * enum VideoColorPrimaries { "bt709", "bt470bg", "smpte170m", "bt2020", "smpte432" };
 */
export type VideoColorPrimaries = 'bt709' | 'bt470bg' | 'smpte170m' | 'bt2020' | 'smpte432';

/**
 * WebIDL:
 * enum VideoTransferCharacteristics { "bt709", "smpte170m", "iec61966-2-1", "linear", "pq", "hlg" };
 */
export type VideoTransferCharacteristics =
  | 'bt709'
  | 'smpte170m'
  | 'iec61966-2-1'
  | 'linear'
  | 'pq'
  | 'hlg';

/**
 * WebIDL:
 * enum VideoMatrixCoefficients { "rgb", "bt709", "bt470bg", "smpte170m", "bt2020-ncl" };
 */
export type VideoMatrixCoefficients = 'rgb' | 'bt709' | 'bt470bg' | 'smpte170m' | 'bt2020-ncl';

export type StereoMode = 'mono' | 'left-right' | 'right-left' | 'top-bottom' | 'bottom-top';

// =============================================================================
// DECODED PLANES
// =============================================================================

/**
 * One single-channel plane as produced by a decoder. Not owned: `data`
 * aliases decoder memory. 10/12-bit planes hold little-endian 16-bit
 * samples; `stride` is always in bytes.
 */
export interface Plane {
  data: Uint8Array;
  width: number;
  height: number;
  stride: number;
  /** Samples to skip between two consecutive samples of a row. */
  skip: number;
}

export interface YCbCrBuffer {
  /** Y, Cb, Cr */
  planes: [Plane, Plane, Plane];
  colorDepth: ColorDepth;
  chromaSubsampling: ChromaSubsampling;
  yuvColorSpace: VideoMatrixCoefficients;
  colorPrimaries: VideoColorPrimaries;
  colorRange: ColorRange;
}

/**
 * Planar description handed to an image for copy or adoption.
 * Strides are in bytes.
 */
export interface PlanarYCbCrData {
  yChannel: Uint8Array;
  yStride: number;
  ySkip: number;
  cbChannel: Uint8Array;
  crChannel: Uint8Array;
  cbCrStride: number;
  cbSkip: number;
  crSkip: number;
  pictureRect: IntRect;
  stereoMode: StereoMode;
  yuvColorSpace: VideoMatrixCoefficients;
  colorPrimaries: VideoColorPrimaries;
  transferFunction?: VideoTransferCharacteristics;
  colorDepth: ColorDepth;
  colorRange: ColorRange;
  chromaSubsampling: ChromaSubsampling;
}

// =============================================================================
// IMAGES
// =============================================================================

export type ImageFormat = 'PLANAR_YCBCR' | 'SHARED_RGB' | 'PLATFORM_SURFACE' | 'EXTERNAL';

/** Byte order B, G, R, A. */
export type SurfaceFormat = 'B8G8R8A8';

export type CompositorType = 'software' | 'hardware';

/**
 * The renderer side of a copy: tells the sample factory which compositor
 * will consume the image.
 */
export interface KnowsCompositor {
  readonly compositorType: CompositorType;
}

// =============================================================================
// TRACK METADATA
// =============================================================================

export interface VideoInfo {
  display: IntSize;
  image: IntSize;
  stereoMode?: StereoMode;
  transferFunction?: VideoTransferCharacteristics;
}

interface TrackInfoBase {
  id: number;
  mimeType: string;
}

export interface VideoTrackInfo extends TrackInfoBase, VideoInfo {
  type: 'video';
}

export interface AudioTrackInfo extends TrackInfoBase {
  type: 'audio';
  rate: number;
  channels: number;
  channelMap: number;
}

export type TrackInfo = VideoTrackInfo | AudioTrackInfo;

// =============================================================================
// PERFORMANCE
// =============================================================================

export type MediaStage = 'CopyDecodedVideo' | 'CopyDemuxedData';

export interface PerformanceEvent {
  stage: MediaStage;
  /** Frame height the event is tagged with; 0 when not video. */
  height: number;
  durationMs: number;
}
