/**
 * Saturating length arithmetic shared by the size-bound calculators.
 *
 * @module cobsr-codec/size
 */

import { MAX_SIZE } from './constants.js'

/**
 * Checks that a value is a usable length.
 * @throws RangeError if the value is not a non-negative safe integer
 */
export function checkLength (inputLen: number): void {
  if (!Number.isSafeInteger(inputLen) || inputLen < 0) {
    throw new RangeError(`Invalid length: ${inputLen}`)
  }
}

/**
 * Exact floor division of non-negative safe integers.
 */
export function floorDiv (dividend: number, divisor: number): number {
  return (dividend - (dividend % divisor)) / divisor
}

/**
 * Adds two lengths, clamping at MAX_SIZE.
 */
export function saturatingAdd (a: number, b: number): number {
  return a >= MAX_SIZE - b ? MAX_SIZE : a + b
}

/**
 * Worst-case encoded size, common to COBS and COBS/R.
 */
export function encodeMaxSize (inputLen: number): number {
  checkLength(inputLen)
  if (inputLen === 0) {
    return 1
  }
  if (inputLen >= MAX_SIZE - 253) {
    return MAX_SIZE
  }
  return saturatingAdd(inputLen, floorDiv(inputLen + 253, 254))
}

/**
 * Smallest decoded size, common to COBS and COBS/R. The worst case is
 * input from an encoder that never elides the final code.
 */
export function decodeMinSize (inputLen: number): number {
  checkLength(inputLen)
  if (inputLen >= 1) {
    return inputLen - 1 - floorDiv(inputLen - 1, 255)
  }
  return 0
}
