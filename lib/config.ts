// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Environment-driven defaults. Every component also takes explicit options
// that win over these values.

import * as is from './is';

export interface MediaDataConfig {
  /** Echo accumulated warnings to the console (NODE_MEDIADATA_DEBUG=1). */
  debug: boolean;
  /** Buffers kept per recycle bin (NODE_MEDIADATA_RECYCLE_LIMIT). */
  recycleLimit: number;
  /** Byte ceiling for any allocation made by this package (NODE_MEDIADATA_MAX_ALLOCATION). */
  maxAllocation: number;
}

export const DEFAULT_RECYCLE_LIMIT = 8;
export const DEFAULT_MAX_ALLOCATION = 1024 * 1024 * 1024;

let cached: MediaDataConfig | null = null;

function readInteger(name: string, fallback: number, allowZero: boolean): number {
  const raw = process.env[name];
  if (!is.string(raw)) {
    return fallback;
  }
  const value = Number(raw);
  const valid = allowZero ? is.nonNegativeInteger(value) : is.positiveInteger(value);
  if (!valid) {
    throw is.invalidParameterError(
      name,
      allowZero ? 'non-negative integer' : 'positive integer',
      raw,
    );
  }
  return value;
}

/**
 * Read configuration from the environment. The result is cached until
 * resetConfig() is called.
 */
export function getConfig(): MediaDataConfig {
  if (!cached) {
    cached = {
      debug: process.env.NODE_MEDIADATA_DEBUG === '1',
      recycleLimit: readInteger('NODE_MEDIADATA_RECYCLE_LIMIT', DEFAULT_RECYCLE_LIMIT, true),
      maxAllocation: readInteger('NODE_MEDIADATA_MAX_ALLOCATION', DEFAULT_MAX_ALLOCATION, false),
    };
  }
  return cached;
}

/**
 * Drop the cached configuration so the next getConfig() re-reads the environment.
 */
export function resetConfig(): void {
  cached = null;
}
