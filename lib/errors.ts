// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Structured error classes for media sample operations.

/**
 * Error codes for media sample operations.
 * These can be used for programmatic error handling.
 */
export const ErrorCode = {
  // Input errors
  ERR_INVALID_ARG: 'ERR_INVALID_ARG',

  // Decoding errors
  ERR_DECODE_FAILED: 'ERR_DECODE_FAILED',

  // Resource errors
  ERR_OUT_OF_MEMORY: 'ERR_OUT_OF_MEMORY',
  ERR_IMAGE_DATA: 'ERR_IMAGE_DATA',

  // Caller bugs
  ERR_CONTRACT_VIOLATION: 'ERR_CONTRACT_VIOLATION',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

interface MediaErrorOptions {
  nativeCode?: number;
  context?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Base error class for all media sample errors.
 * Provides structured error information for debugging and programmatic handling.
 */
export class MediaDataError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCodeType;

  /** Status returned by a conversion routine, if applicable */
  readonly nativeCode?: number;

  /** Additional context for debugging */
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodeType, options?: MediaErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'MediaDataError';
    this.code = code;
    this.nativeCode = options?.nativeCode;
    this.context = options?.context;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns a JSON-serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      nativeCode: this.nativeCode,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when decoder output fails validation: bad picture rect,
 * mismatched chroma planes, oversized planes.
 */
export class InvalidDataError extends MediaDataError {
  constructor(message: string, options?: { context?: Record<string, unknown> }) {
    super(message, ErrorCode.ERR_INVALID_ARG, options);
    this.name = 'InvalidDataError';
  }
}

/**
 * Error thrown when decoding or pixel conversion fails.
 */
export class DecodingError extends MediaDataError {
  constructor(message: string, options?: MediaErrorOptions) {
    super(message, ErrorCode.ERR_DECODE_FAILED, options);
    this.name = 'DecodingError';
  }
}

/**
 * Error thrown when a buffer or image allocation fails.
 */
export class AllocationError extends MediaDataError {
  readonly resource: string;
  readonly requestedSize?: number;

  constructor(resource: string, options?: { requestedSize?: number; detail?: string }) {
    const detail =
      options?.detail ??
      (options?.requestedSize !== undefined
        ? `Cannot allocate ${options.requestedSize} bytes for ${resource}`
        : `Failed to allocate ${resource}`);
    super(detail, ErrorCode.ERR_OUT_OF_MEMORY, {
      context: { resource, requestedSize: options?.requestedSize },
    });
    this.name = 'AllocationError';
    this.resource = resource;
    this.requestedSize = options?.requestedSize;
  }
}

/**
 * Error thrown when an image refuses to copy or adopt plane data.
 */
export class ImageDataError extends MediaDataError {
  constructor(message: string, options?: { context?: Record<string, unknown> }) {
    super(message, ErrorCode.ERR_IMAGE_DATA, options);
    this.name = 'ImageDataError';
  }
}

/**
 * Error thrown when the calling pipeline breaks a precondition.
 * Not recoverable: it points at a bug in the caller, never at bad input.
 */
export class ContractViolationError extends MediaDataError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.ERR_CONTRACT_VIOLATION, { context });
    this.name = 'ContractViolationError';
  }
}

/**
 * Throws a ContractViolationError unless `condition` holds.
 */
export function assertContract(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>,
): asserts condition {
  if (!condition) {
    throw new ContractViolationError(message, context);
  }
}
