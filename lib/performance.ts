// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Timing of the copy stages. Events are fire-and-forget: the sink decides
// what to keep.

import { performance } from 'node:perf_hooks';
import type { MediaStage, PerformanceEvent } from './types';

export interface PerformanceSink {
  record(event: PerformanceEvent): void;
}

const discardSink: PerformanceSink = {
  record() {},
};

let currentSink: PerformanceSink = discardSink;

/**
 * Install a sink for performance events. Pass null to go back to discarding.
 */
export function setPerformanceSink(sink: PerformanceSink | null): void {
  currentSink = sink ?? discardSink;
}

export class PerformanceRecorder {
  private readonly start = performance.now();
  private recorded = false;

  constructor(
    private readonly stage: MediaStage,
    private readonly height: number,
  ) {}

  /** Report the elapsed time once; later calls are ignored. */
  record(): void {
    if (this.recorded) return;
    this.recorded = true;
    currentSink.record({
      stage: this.stage,
      height: this.height,
      durationMs: performance.now() - this.start,
    });
  }
}
