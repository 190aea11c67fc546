/**
 * Shared plumbing for the lazy encoders and decoders.
 *
 * @module cobsr-codec/iter
 */

import type { DecodeError } from './error.js'

/**
 * Item produced by a checked decoder: a decoded byte, or the error that ended decoding.
 */
export type DecodeResult = number | DecodeError

/**
 * Pulls bytes one at a time from an iterable, masking each to 8 bits.
 *
 * Values are not checked: anything outside 0..255 wraps the way `& 0xFF`
 * does, so 256 reads as 0, -1 as 255, 1.5 as 1 and NaN as 0. A value that
 * wraps to zero is then a zero byte to the encoder and an error to the
 * checked decoders.
 */
export class ByteSource {
  private readonly iterator: Iterator<number>
  private position: number = -1

  constructor (input: Iterable<number>) {
    this.iterator = input[Symbol.iterator]()
  }

  /**
   * Offset of the most recently read byte.
   */
  get offset (): number {
    return this.position
  }

  /**
   * Returns the next byte, or undefined at the end of input.
   */
  next (): number | undefined {
    const result = this.iterator.next()
    if (result.done === true) {
      return undefined
    }
    this.position++
    return result.value & 0xFF
  }
}

/**
 * Collects the output of a checked decoder.
 * @param items - Output of `decodeResultIter()`
 * @returns The decoded bytes
 * @throws The first DecodeError found in the sequence
 */
export function collectDecoded (items: Iterable<DecodeResult>): Uint8Array {
  const bytes: number[] = []
  for (const item of items) {
    if (typeof item !== 'number') {
      throw item
    }
    bytes.push(item)
  }
  return new Uint8Array(bytes)
}

/**
 * Best-effort view of a checked decoder: passes decoded bytes through and
 * ends quietly at the first error.
 */
export class BestEffortDecodeIterator implements IterableIterator<number> {
  private finished: boolean = false

  constructor (private readonly inner: Iterator<DecodeResult>) {}

  next (): IteratorResult<number> {
    if (!this.finished) {
      const result = this.inner.next()
      if (result.done !== true && typeof result.value === 'number') {
        return { done: false, value: result.value }
      }
      this.finished = true
    }
    return { done: true, value: undefined }
  }

  [Symbol.iterator] (): IterableIterator<number> {
    return this
  }
}
