/**
 * Consistent Overhead Byte Stuffing (COBS).
 *
 * Encoding replaces every zero byte with a length code giving the distance
 * to the next one, so the output contains no zeros and a zero can mark the
 * end of a frame on the wire. Every encoding costs at least one byte over
 * the input, plus one more for each run of 254 non-zero bytes.
 *
 * @module cobsr-codec/cobs
 */

import { HOLD_BUF_SIZE, MAX_CODE, MAX_RUN_LENGTH } from './constants.js'
import { OutputBufferTooSmallError, TruncatedEncodedDataError, ZeroInEncodedDataError } from './error.js'
import { ByteBuffer } from './byte-buffer.js'
import { ByteSource, BestEffortDecodeIterator } from './iter.js'
import type { DecodeResult } from './iter.js'
import { checkLength, decodeMinSize, encodeMaxSize, saturatingAdd } from './size.js'

/**
 * Calculates the smallest possible COBS encoded size for an input length.
 */
export function encodeMinOutputSize (inputLen: number): number {
  checkLength(inputLen)
  return saturatingAdd(inputLen, 1)
}

/**
 * Calculates the largest possible COBS encoded size for an input length.
 * Use it to size the output buffer passed to `encodeInto()`.
 */
export function encodeMaxOutputSize (inputLen: number): number {
  return encodeMaxSize(inputLen)
}

/**
 * Calculates the smallest possible decoded size for a COBS encoded length.
 */
export function decodeMinOutputSize (inputLen: number): number {
  return decodeMinSize(inputLen)
}

/**
 * Calculates the largest possible decoded size for a COBS encoded length.
 * Use it to size the output buffer passed to `decodeInto()`.
 */
export function decodeMaxOutputSize (inputLen: number): number {
  checkLength(inputLen)
  return inputLen > 1 ? inputLen - 1 : 0
}

function checkCapacity (out: Uint8Array, pos: number): void {
  if (pos >= out.length) {
    throw new OutputBufferTooSmallError()
  }
}

/**
 * Encodes data into COBS form, writing to the given output buffer.
 * @param out - Output buffer, at least `encodeMaxOutputSize(input.length)` bytes to never fail
 * @param input - The data to encode
 * @returns A view of the encoded bytes in `out`
 * @throws OutputBufferTooSmallError if `out` cannot hold the encoding
 */
export function encodeInto (out: Uint8Array, input: Uint8Array): Uint8Array {
  let codePos = 0
  let writePos = 1

  checkCapacity(out, codePos)
  for (const byte of input) {
    if (writePos - codePos >= MAX_CODE) {
      out[codePos] = MAX_CODE
      codePos = writePos
      checkCapacity(out, codePos)
      writePos = codePos + 1
    }
    if (byte === 0) {
      out[codePos] = writePos - codePos
      codePos = writePos
      checkCapacity(out, codePos)
      writePos = codePos + 1
    } else {
      checkCapacity(out, writePos)
      out[writePos] = byte
      writePos++
    }
  }

  // Final length code. There is always one, even for empty input.
  out[codePos] = writePos - codePos

  return out.subarray(0, writePos)
}

/**
 * Decodes COBS data, writing to the given output buffer.
 * @param out - Output buffer, at least `decodeMaxOutputSize(input.length)` bytes to never fail
 * @param input - The encoded data, without a frame delimiter
 * @returns A view of the decoded bytes in `out`
 * @throws ZeroInEncodedDataError if the input holds a zero byte
 * @throws TruncatedEncodedDataError if a length code runs past the end of the input
 * @throws OutputBufferTooSmallError if `out` cannot hold the decoded data
 */
export function decodeInto (out: Uint8Array, input: Uint8Array): Uint8Array {
  let codePos = 0
  let writePos = 0

  while (codePos < input.length) {
    const code = input[codePos]
    if (code === 0) {
      throw new ZeroInEncodedDataError(codePos)
    }
    const runEnd = codePos + code
    for (let readPos = codePos + 1; readPos < runEnd; readPos++) {
      if (readPos >= input.length) {
        throw new TruncatedEncodedDataError()
      }
      const byte = input[readPos]
      if (byte === 0) {
        throw new ZeroInEncodedDataError(readPos)
      }
      checkCapacity(out, writePos)
      out[writePos] = byte
      writePos++
    }
    codePos = runEnd
    if (codePos >= input.length) {
      // No zero after the last run
      break
    }
    if (code < MAX_CODE) {
      checkCapacity(out, writePos)
      out[writePos] = 0
      writePos++
    }
  }

  return out.subarray(0, writePos)
}

/**
 * Encodes data into COBS form, returning a new array.
 */
export function encode (input: Uint8Array): Uint8Array {
  const out = new ByteBuffer(encodeMaxOutputSize(input.length))
  let codePos = 0
  let runLen = 0

  for (const byte of input) {
    if (runLen === MAX_CODE) {
      out.set(codePos, MAX_CODE)
      codePos += MAX_CODE
      runLen = 0
    }
    if (byte === 0) {
      if (runLen === 0) {
        out.push(1)
        codePos += 1
      } else {
        out.set(codePos, runLen)
        codePos += runLen
      }
      runLen = 0
    } else {
      if (runLen === 0) {
        // Placeholder for the length code
        out.push(MAX_CODE)
        runLen = 1
      }
      out.push(byte)
      runLen++
    }
  }

  if (runLen === 0) {
    out.push(1)
  } else {
    out.set(codePos, runLen)
  }

  return out.toUint8Array()
}

/**
 * Decodes COBS data, returning a new array.
 * @throws ZeroInEncodedDataError if the input holds a zero byte
 * @throws TruncatedEncodedDataError if a length code runs past the end of the input
 */
export function decode (input: Uint8Array): Uint8Array {
  const out = new ByteBuffer(decodeMaxOutputSize(input.length))
  let codePos = 0

  while (codePos < input.length) {
    const code = input[codePos]
    if (code === 0) {
      throw new ZeroInEncodedDataError(codePos)
    }
    const runEnd = codePos + code
    for (let readPos = codePos + 1; readPos < runEnd; readPos++) {
      if (readPos >= input.length) {
        throw new TruncatedEncodedDataError()
      }
      const byte = input[readPos]
      if (byte === 0) {
        throw new ZeroInEncodedDataError(readPos)
      }
      out.push(byte)
    }
    codePos = runEnd
    if (codePos >= input.length) {
      break
    }
    if (code < MAX_CODE) {
      out.push(0)
    }
  }

  return out.toUint8Array()
}

/**
 * Lazy COBS encoder.
 *
 * A length code can only be written once the end of its run is known, so
 * each run is held back in `holdBuf` until a zero byte, a full run or the
 * end of input. The code is returned first and the held run drains on the
 * following pulls.
 */
class EncodeIterator implements IterableIterator<number> {
  private readonly source: ByteSource
  private readonly holdBuf = new Uint8Array(HOLD_BUF_SIZE)
  private holdWrite: number = 0
  private holdRead: number = 0
  private eof: boolean = false
  private lastRunFull: boolean = false

  constructor (input: Iterable<number>) {
    this.source = new ByteSource(input)
  }

  next (): IteratorResult<number> {
    if (this.holdWrite !== 0) {
      if (this.holdRead < this.holdWrite) {
        const value = this.holdBuf[this.holdRead]
        this.holdRead++
        return { done: false, value }
      }
      this.holdRead = 0
      this.holdWrite = 0
    }
    if (this.eof) {
      return { done: true, value: undefined }
    }
    for (;;) {
      if (this.holdWrite === MAX_RUN_LENGTH) {
        this.lastRunFull = true
        return { done: false, value: MAX_CODE }
      }
      const byte = this.source.next()
      if (byte === undefined) {
        this.eof = true
      }
      if (this.lastRunFull) {
        this.lastRunFull = false
        // A full run at the end of input needs no trailing code
        if (this.eof) {
          return { done: true, value: undefined }
        }
      }
      if (byte === undefined || byte === 0) {
        return { done: false, value: this.holdWrite + 1 }
      }
      this.holdBuf[this.holdWrite] = byte
      this.holdWrite++
    }
  }

  [Symbol.iterator] (): IterableIterator<number> {
    return this
  }
}

/**
 * Checked lazy COBS decoder. Yields decoded bytes, or a single error item
 * followed by the end of the sequence.
 */
class DecodeResultIterator implements IterableIterator<DecodeResult> {
  private readonly source: ByteSource
  private finished: boolean = false
  private lastRun: number = 0
  private countRun: number = 0

  constructor (input: Iterable<number>) {
    this.source = new ByteSource(input)
  }

  next (): IteratorResult<DecodeResult> {
    while (!this.finished) {
      const byte = this.source.next()
      if (byte === undefined) {
        this.finished = true
        if (this.countRun !== 0) {
          return { done: false, value: new TruncatedEncodedDataError() }
        }
        break
      }
      if (byte === 0) {
        this.finished = true
        return { done: false, value: new ZeroInEncodedDataError(this.source.offset) }
      }
      if (this.countRun === 0) {
        const lastRun = this.lastRun
        this.lastRun = byte
        this.countRun = byte - 1
        if (lastRun !== 0 && lastRun !== MAX_CODE) {
          return { done: false, value: 0 }
        }
      } else {
        this.countRun--
        return { done: false, value: byte }
      }
    }
    return { done: true, value: undefined }
  }

  [Symbol.iterator] (): IterableIterator<DecodeResult> {
    return this
  }
}

/**
 * Encodes a byte sequence into COBS form lazily.
 * @param input - Any iterable of bytes, such as a Uint8Array or a generator
 * @returns An iterator of encoded bytes
 */
export function encodeIter (input: Iterable<number>): IterableIterator<number> {
  return new EncodeIterator(input)
}

/**
 * Decodes a COBS byte sequence lazily.
 *
 * Decoding is best-effort: no errors are reported. A zero byte is treated
 * as the end of the data, and a length code that runs past the end of the
 * input ends the output at the last available byte.
 */
export function decodeIter (input: Iterable<number>): IterableIterator<number> {
  return new BestEffortDecodeIterator(new DecodeResultIterator(input))
}

/**
 * Decodes a COBS byte sequence lazily, reporting malformed input.
 *
 * Yields decoded bytes. On malformed input, yields one
 * `ZeroInEncodedDataError` or `TruncatedEncodedDataError` and then ends.
 * Pass the result to `collectDecoded()` to gather it into an array.
 */
export function decodeResultIter (input: Iterable<number>): IterableIterator<DecodeResult> {
  return new DecodeResultIterator(input)
}
