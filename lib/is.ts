// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Type guards and validation helpers following sharp's lib/is.js pattern.

/**
 * Is this value a non-empty string?
 */
export function string(val: unknown): val is string {
  return typeof val === 'string' && val.length > 0;
}

/**
 * Is this value an integer?
 */
export function integer(val: unknown): val is number {
  return typeof val === 'number' && Number.isInteger(val);
}

/**
 * Is this value a positive integer (> 0)?
 */
export function positiveInteger(val: unknown): val is number {
  return integer(val) && val > 0;
}

/**
 * Is this value a non-negative integer (>= 0)?
 */
export function nonNegativeInteger(val: unknown): val is number {
  return integer(val) && val >= 0;
}

/**
 * Is this value representable as an unsigned 32-bit integer?
 */
export function uint32(val: unknown): val is number {
  return nonNegativeInteger(val) && val <= 0xffffffff;
}

/**
 * Unsigned 32-bit addition. Returns null when either operand is not a
 * uint32 or when the sum overflows.
 */
export function checkedUint32Add(a: number, b: number): number | null {
  if (!uint32(a) || !uint32(b)) return null;
  const sum = a + b;
  return sum > 0xffffffff ? null : sum;
}

//==============================================================================
// Error Factories (following sharp pattern)
//==============================================================================

/**
 * Create an Error with a message relating to an invalid parameter.
 *
 * @example
 * throw invalidParameterError('numberOfChannels', 'positive integer', -5);
 * // TypeError: Expected positive integer for numberOfChannels but received -5 of type number
 */
export function invalidParameterError(name: string, expected: string, actual: unknown): TypeError {
  let actualType: string;
  if (actual === null) {
    actualType = 'null';
  } else if (actual === undefined) {
    actualType = 'undefined';
  } else {
    actualType = typeof actual;
  }

  const actualStr =
    typeof actual === 'string'
      ? `'${actual}'`
      : typeof actual === 'number' || typeof actual === 'boolean'
        ? String(actual)
        : actualType;

  return new TypeError(
    `Expected ${expected} for ${name} but received ${actualStr} of type ${actualType}`,
  );
}

//==============================================================================
// Assertion Helpers
//==============================================================================

/**
 * Assert value is a positive integer, throw if not.
 */
export function assertPositiveInteger(val: unknown, name: string): asserts val is number {
  if (!positiveInteger(val)) {
    throw invalidParameterError(name, 'positive integer', val);
  }
}

/**
 * Assert value is a non-negative integer, throw if not.
 */
export function assertNonNegativeInteger(val: unknown, name: string): asserts val is number {
  if (!nonNegativeInteger(val)) {
    throw invalidParameterError(name, 'non-negative integer', val);
  }
}
