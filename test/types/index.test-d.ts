// Compile-time assertions on the public API. tsconfig.json includes this
// file, so `npm run typecheck` (tsc --noEmit) fails when an assertion does.

import {expectAssignable, expectType} from 'tsd';
import {
  type AlignedAudioBuffer,
  AudioSample,
  type ColorDepth,
  type CryptoSample,
  type Image,
  type MediaDataType,
  QuantizableBuffer,
  RawSample,
  type RawSampleWriter,
  TimeInterval,
  TimeUnit,
  VideoSample,
  type YCbCrBuffer,
} from '../../lib';

// TimeUnit
declare const time: TimeUnit;
expectType<bigint>(time.ticks);
expectType<-1 | 0 | 1>(time.compare(TimeUnit.zero()));
expectType<TimeUnit>(time.add(TimeUnit.fromMicroseconds(1)));
expectType<TimeInterval>(new TimeInterval(time, time).shift(time));

// AudioSample
declare const audio: AudioSample;
expectType<'audio'>(audio.type);
expectType<Float32Array>(audio.data());
expectType<boolean>(audio.setTrimWindow(new TimeInterval(time, time)));
expectType<AlignedAudioBuffer>(audio.moveableData());
expectType<Float32Array | null>(audio.audioBuffer);

// VideoSample
declare const video: VideoSample;
expectType<'video'>(video.type);
expectType<Image | null>(video.image);
expectType<ColorDepth>(video.getColorDepth());
expectAssignable<MediaDataType>(video.type);

// QuantizableBuffer is usable wherever a YCbCrBuffer is
declare const quantizable: QuantizableBuffer;
expectAssignable<YCbCrBuffer>(quantizable);

// RawSample
declare const raw: RawSample;
expectType<RawSample | null>(raw.clone());
expectType<RawSampleWriter>(raw.createWriter());
expectType<Readonly<CryptoSample>>(raw.crypto);
