/**
 * Tests for AudioSample trim windows, rebasing and buffer hand-over
 */

import {describe, it, expect} from 'vitest';
import {
  AudioSample,
  ContractViolationError,
  createAudioBuffer,
  getMediaWarnings,
  TimeInterval,
  TimeUnit,
} from '../../lib';

function rampSample(): AudioSample {
  // 960 frames of 4 channels at 48 kHz = 20 ms; sample i holds value i.
  const data = new Float32Array(3840);
  for (let i = 0; i < data.length; i++) {
    data[i] = i;
  }
  return new AudioSample(0, TimeUnit.zero(), data, 4, 48000);
}

function us(value: number): TimeUnit {
  return TimeUnit.fromMicroseconds(value);
}

describe('AudioSample', () => {
  describe('construction', () => {
    it('should derive frames and duration from the buffer', () => {
      const sample = rampSample();
      expect(sample.type).toBe('audio');
      expect(sample.frames).toBe(960);
      expect(sample.duration.toMicroseconds()).toBe(20000);
      expect(sample.getEndTime().toMicroseconds()).toBe(20000);
      expect(sample.hasData()).toBe(true);
    });

    it('should accept an owned aligned buffer', () => {
      const sample = new AudioSample(0, TimeUnit.zero(), createAudioBuffer(6), 2, 44100);
      expect(sample.frames).toBe(3);
      expect(sample.data().length).toBe(6);
    });

    it('should treat an empty buffer as having no data', () => {
      const sample = new AudioSample(0, TimeUnit.zero(), new Float32Array(0), 2, 44100);
      expect(sample.hasData()).toBe(false);
      expect(sample.frames).toBe(0);
    });

    it('should reject zero channels or a zero rate', () => {
      expect(() => new AudioSample(0, TimeUnit.zero(), new Float32Array(4), 0, 48000)).toThrow(
        ContractViolationError,
      );
      expect(() => new AudioSample(0, TimeUnit.zero(), new Float32Array(4), 2, 0)).toThrow(
        "Can't create an AudioSample with a sample-rate of 0.",
      );
    });
  });

  describe('setTrimWindow', () => {
    it('should narrow the view to the window without copying', () => {
      const sample = rampSample();
      expect(sample.setTrimWindow(new TimeInterval(us(10000), us(15000)))).toBe(true);

      expect(sample.frames).toBe(240);
      expect(sample.dataOffset).toBe(1920);
      expect(sample.time.toMicroseconds()).toBe(10000);
      expect(sample.duration.toMicroseconds()).toBe(5000);
      expect(sample.originalTime.toMicroseconds()).toBe(0);

      const view = sample.data();
      expect(view.length).toBe(960);
      expect(view[0]).toBe(1920);
      expect(view[959]).toBe(2879);
    });

    it('should allow moving the start back within the current end', () => {
      const sample = rampSample();
      sample.setTrimWindow(new TimeInterval(us(10000), us(15000)));
      expect(sample.setTrimWindow(new TimeInterval(us(5000), us(15000)))).toBe(true);
      expect(sample.frames).toBe(480);
      expect(sample.data()[0]).toBe(960);
    });

    it('should not extend past the current end time', () => {
      const sample = rampSample();
      sample.setTrimWindow(new TimeInterval(us(10000), us(15000)));
      expect(sample.setTrimWindow(new TimeInterval(us(10000), us(20000)))).toBe(false);
      expect(sample.frames).toBe(240);
    });

    it('should leave the sample untouched for a window outside its range', () => {
      const sample = rampSample();
      expect(sample.setTrimWindow(new TimeInterval(us(10000), us(25000)))).toBe(false);
      expect(sample.setTrimWindow(new TimeInterval(us(-1), us(10000)))).toBe(false);
      expect(sample.frames).toBe(960);
      expect(sample.time.toMicroseconds()).toBe(0);
      expect(sample.trimWindow).toBeNull();
    });

    it('should be a no-op for the full range', () => {
      const sample = rampSample();
      expect(sample.setTrimWindow(new TimeInterval(us(0), us(20000)))).toBe(true);
      expect(sample.trimWindow).toBeNull();
      expect(sample.frames).toBe(960);
    });

    it('should accept the same window twice', () => {
      const sample = rampSample();
      const window = new TimeInterval(us(2000), us(4000));
      expect(sample.setTrimWindow(window)).toBe(true);
      expect(sample.setTrimWindow(new TimeInterval(us(2000), us(4000)))).toBe(true);
      expect(sample.frames).toBe(96);
      expect(sample.dataOffset).toBe(384);
    });

    it('should refuse an inverted window and leave the sample intact', () => {
      const sample = rampSample();
      expect(sample.setTrimWindow(new TimeInterval(us(15000), us(10000)))).toBe(false);
      expect(sample.frames).toBe(960);
      expect(sample.duration.toMicroseconds()).toBe(20000);
      expect(sample.trimWindow).toBeNull();
      expect(sample.data().length).toBe(3840);
    });

    it('should accept an empty window on an empty buffer', () => {
      const sample = new AudioSample(0, TimeUnit.zero(), new Float32Array(0), 2, 44100);
      expect(sample.setTrimWindow(new TimeInterval(us(0), us(0)))).toBe(true);
      expect(sample.frames).toBe(0);
    });

    it('should clamp to zero frames when container rounding overshoots the buffer', () => {
      // Three frames at 6 Hz starting at 0/3 s end at 1/2 s. The window end
      // 1/2 s rounds up to 2/3 s when rebased on thirds: four frames.
      const sample = new AudioSample(0, TimeUnit.fromTicks(0, 3), new Float32Array(3), 1, 6);
      const window = new TimeInterval(TimeUnit.fromTicks(0, 2), TimeUnit.fromTicks(1, 2));
      expect(sample.setTrimWindow(window)).toBe(true);

      expect(sample.frames).toBe(0);
      expect(sample.duration.isZero()).toBe(true);
      expect(sample.data().length).toBe(0);
      expect(getMediaWarnings()).toEqual([
        'Trim window [{0.000000 (0/2)}, {0.500000 (1/2)}] needs 4 frames but only 3 are available; clamping to 0',
      ]);
    });

    it('should not clamp when the offset is already at the sample rate', () => {
      const buffer = createAudioBuffer(8);
      const sample = new AudioSample(0, TimeUnit.zero(8), buffer, 1, 8);
      // The caller shrinks the buffer it handed over.
      buffer.setLength(4);
      const window = new TimeInterval(TimeUnit.fromTicks(0, 8), TimeUnit.fromTicks(6, 8));
      expect(() => sample.setTrimWindow(window)).toThrow(ContractViolationError);
      expect(getMediaWarnings()).toEqual([]);
    });

    it('should reject an invalid interval as a contract violation', () => {
      const sample = rampSample();
      expect(() => sample.setTrimWindow(new TimeInterval(TimeUnit.invalid(), us(10)))).toThrow(
        ContractViolationError,
      );
    });
  });

  describe('start time', () => {
    it('should shift time, original time and the trim window', () => {
      const sample = new AudioSample(0, us(50000), new Float32Array(960), 1, 48000);
      sample.setTrimWindow(new TimeInterval(us(55000), us(60000)));
      expect(sample.adjustForStartTime(us(50000))).toBe(true);
      expect(sample.time.toMicroseconds()).toBe(5000);
      expect(sample.originalTime.toMicroseconds()).toBe(0);
      expect(sample.trimWindow?.start.toMicroseconds()).toBe(5000);
      expect(sample.trimWindow?.end.toMicroseconds()).toBe(10000);
      expect(getMediaWarnings()).toEqual([]);
    });

    it('should warn when the adjusted time is negative', () => {
      const sample = rampSample();
      expect(sample.adjustForStartTime(us(5000))).toBe(true);
      expect(sample.time.toMicroseconds()).toBe(-5000);
      expect(getMediaWarnings()).toEqual(['Negative audio start time after time-adjustment!']);
    });

    it('should rebase an untrimmed sample', () => {
      const sample = rampSample();
      sample.setOriginalStartTime(us(1000));
      expect(sample.time.toMicroseconds()).toBe(1000);
      expect(sample.originalTime.toMicroseconds()).toBe(1000);
    });

    it('should refuse to rebase a trimmed sample', () => {
      const sample = rampSample();
      sample.setTrimWindow(new TimeInterval(us(10000), us(15000)));
      expect(() => sample.setOriginalStartTime(us(1000))).toThrow(
        'Do not call this if data has been trimmed!',
      );
    });
  });

  describe('moveableData', () => {
    it('should hand over exactly the trimmed samples', () => {
      const sample = rampSample();
      sample.setTrimWindow(new TimeInterval(us(10000), us(15000)));
      const buffer = sample.moveableData();

      expect(buffer.length).toBe(960);
      expect(buffer.data()[0]).toBe(1920);
      expect(buffer.data()[959]).toBe(2879);

      expect(sample.hasData()).toBe(false);
      expect(sample.frames).toBe(0);
      expect(sample.data().length).toBe(0);
      expect(sample.trimWindow).toBeNull();
    });

    it('should make later trims fail', () => {
      const sample = rampSample();
      sample.moveableData();
      expect(sample.setTrimWindow(new TimeInterval(us(0), us(1000)))).toBe(false);
    });

    it('should not hand the buffer over twice', () => {
      const sample = rampSample();
      sample.moveableData();
      expect(() => sample.moveableData()).toThrow(ContractViolationError);
    });
  });

  describe('ensureAudioBuffer', () => {
    it('should build a channel-planar copy of the view', () => {
      const sample = new AudioSample(
        0,
        TimeUnit.zero(),
        new Float32Array([1, 2, 3, 4, 5, 6]),
        2,
        48000,
      );
      expect(sample.audioBuffer).toBeNull();
      sample.ensureAudioBuffer();
      expect(Array.from(sample.audioBuffer ?? [])).toEqual([1, 3, 5, 2, 4, 6]);
    });

    it('should build the copy only once', () => {
      const sample = rampSample();
      sample.ensureAudioBuffer();
      const first = sample.audioBuffer;
      sample.ensureAudioBuffer();
      expect(sample.audioBuffer).toBe(first);
    });
  });

  describe('byteSize and toString', () => {
    it('should count the buffer and the planar copy', () => {
      const sample = rampSample();
      expect(sample.byteSize()).toBe(15360);
      sample.ensureAudioBuffer();
      expect(sample.byteSize()).toBe(30720);
    });

    it('should describe timing and layout', () => {
      expect(rampSample().toString()).toBe(
        'AudioSample: {0.000000 (0/1000000)} {0.020000 (960/48000)} 960 frames 48000Hz, 4ch',
      );
    });
  });
});
