// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Collects conditions that are tolerated but worth surfacing: negative
// timestamps after rebasing, trim windows clamped for container rounding.

import { getConfig } from './config';

/** Warnings kept by the process-wide accumulator between drains. */
export const MAX_RETAINED_WARNINGS = 256;

/**
 * Keeps the most recent `limit` warnings; older ones are counted and dropped.
 */
export class WarningAccumulator {
  private warnings: string[] = [];
  private droppedCount = 0;

  constructor(private readonly limit: number = Number.POSITIVE_INFINITY) {}

  add(warning: string): void {
    this.warnings.push(warning);
    if (this.warnings.length > this.limit) {
      this.warnings.shift();
      this.droppedCount++;
    }
  }

  count(): number {
    return this.warnings.length;
  }

  /** Warnings discarded since the last drain. */
  dropped(): number {
    return this.droppedCount;
  }

  hasWarnings(): boolean {
    return this.warnings.length > 0;
  }

  /**
   * Return all retained warnings and empty the accumulator.
   */
  drain(): string[] {
    const drained = this.warnings;
    this.warnings = [];
    this.droppedCount = 0;
    return drained;
  }
}

const processWarnings = new WarningAccumulator(MAX_RETAINED_WARNINGS);

export function warn(message: string): void {
  processWarnings.add(message);
  if (getConfig().debug) {
    console.warn(`node-mediadata: ${message}`);
  }
}

/**
 * Return and clear the warnings recorded since the last call, at most
 * MAX_RETAINED_WARNINGS of them (the most recent).
 */
export function getMediaWarnings(): string[] {
  return processWarnings.drain();
}

export function clearMediaWarnings(): void {
  processWarnings.drain();
}
