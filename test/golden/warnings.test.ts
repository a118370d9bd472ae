/**
 * Tests for warning accumulation and debug echo
 */

import {afterEach, describe, it, expect, vi} from 'vitest';
import {
  getMediaWarnings,
  clearMediaWarnings,
  MAX_RETAINED_WARNINGS,
  resetConfig,
  TimeUnit,
  VideoSample,
  WarningAccumulator,
} from '../../lib';

function negativeVideoSample(): void {
  const sample = new VideoSample(0, TimeUnit.zero(), TimeUnit.zero(), false, TimeUnit.zero(), {
    width: 1,
    height: 1,
  });
  sample.adjustForStartTime(TimeUnit.fromMicroseconds(1));
}

describe('WarningAccumulator', () => {
  it('should count and drain warnings', () => {
    const acc = new WarningAccumulator();
    expect(acc.hasWarnings()).toBe(false);
    acc.add('first');
    acc.add('second');
    expect(acc.count()).toBe(2);
    expect(acc.drain()).toEqual(['first', 'second']);
    expect(acc.count()).toBe(0);
  });

  it('should keep only the most recent warnings past its limit', () => {
    const acc = new WarningAccumulator(2);
    acc.add('a');
    acc.add('b');
    acc.add('c');
    expect(acc.count()).toBe(2);
    expect(acc.dropped()).toBe(1);
    expect(acc.drain()).toEqual(['b', 'c']);
    expect(acc.dropped()).toBe(0);
  });
});

describe('process warnings', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('should collect warnings until drained', () => {
    negativeVideoSample();
    negativeVideoSample();
    expect(getMediaWarnings()).toHaveLength(2);
    expect(getMediaWarnings()).toEqual([]);
  });

  it('should stay bounded when never drained', () => {
    for (let i = 0; i < MAX_RETAINED_WARNINGS * 4; i++) {
      negativeVideoSample();
    }
    expect(getMediaWarnings()).toHaveLength(MAX_RETAINED_WARNINGS);
  });

  it('should clear warnings', () => {
    negativeVideoSample();
    clearMediaWarnings();
    expect(getMediaWarnings()).toEqual([]);
  });

  it('should stay quiet on the console by default', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubEnv('NODE_MEDIADATA_DEBUG', '');
    resetConfig();
    negativeVideoSample();
    expect(spy).not.toHaveBeenCalled();
  });

  it('should echo warnings when debugging is enabled', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubEnv('NODE_MEDIADATA_DEBUG', '1');
    resetConfig();
    negativeVideoSample();
    expect(spy).toHaveBeenCalledWith(
      'node-mediadata: Negative video start time after time-adjustment!',
    );
  });
});
