/**
 * Consistent Overhead Byte Stuffing, Reduced (COBS/R).
 *
 * COBS/R saves the final length code whenever the last data byte is at
 * least as large as that code would be: the byte takes the code's place
 * and is dropped from the end of the output. A decoder sees a code that
 * claims more bytes than remain and outputs the code itself as the last
 * byte. COBS/R decoding also accepts plain COBS input.
 *
 * Input `2F A2 00 92 73 26` encodes to `03 2F A2 04 92 73 26` in COBS
 * and to `03 2F A2 26 92 73` in COBS/R.
 *
 * @module cobsr-codec/cobsr
 */

import { HOLD_BUF_SIZE, MAX_CODE, MAX_RUN_LENGTH } from './constants.js'
import { OutputBufferTooSmallError, ZeroInEncodedDataError } from './error.js'
import { ByteBuffer } from './byte-buffer.js'
import { ByteSource, BestEffortDecodeIterator } from './iter.js'
import type { DecodeResult } from './iter.js'
import { checkLength, decodeMinSize, encodeMaxSize } from './size.js'

/**
 * Calculates the smallest possible COBS/R encoded size for an input length.
 */
export function encodeMinOutputSize (inputLen: number): number {
  checkLength(inputLen)
  return inputLen === 0 ? 1 : inputLen
}

/**
 * Calculates the largest possible COBS/R encoded size for an input length.
 */
export function encodeMaxOutputSize (inputLen: number): number {
  return encodeMaxSize(inputLen)
}

/**
 * Calculates the smallest possible decoded size for an encoded length.
 * The worst case is plain COBS input, so this matches COBS.
 */
export function decodeMinOutputSize (inputLen: number): number {
  return decodeMinSize(inputLen)
}

/**
 * Calculates the largest possible decoded size for a COBS/R encoded length.
 */
export function decodeMaxOutputSize (inputLen: number): number {
  checkLength(inputLen)
  return inputLen
}

function checkCapacity (out: Uint8Array, pos: number): void {
  if (pos >= out.length) {
    throw new OutputBufferTooSmallError()
  }
}

/**
 * Encodes data into COBS/R form, writing to the given output buffer.
 * @returns A view of the encoded bytes in `out`
 * @throws OutputBufferTooSmallError if `out` cannot hold the encoding
 */
export function encodeInto (out: Uint8Array, input: Uint8Array): Uint8Array {
  let codePos = 0
  let writePos = 1
  let lastValue = 0

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
      lastValue = 0
    } else {
      lastValue = byte
      checkCapacity(out, writePos)
      out[writePos] = byte
      writePos++
    }
  }

  if (lastValue >= writePos - codePos) {
    out[codePos] = lastValue
    writePos--
  } else {
    out[codePos] = writePos - codePos
  }

  return out.subarray(0, writePos)
}

/**
 * Decodes COBS/R (or plain COBS) data, writing to the given output buffer.
 * @returns A view of the decoded bytes in `out`
 * @throws ZeroInEncodedDataError if the input holds a zero byte
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
      checkCapacity(out, writePos)
      if (readPos >= input.length) {
        // The code was the last data byte
        out[writePos] = code
        writePos++
        break
      }
      const byte = input[readPos]
      if (byte === 0) {
        throw new ZeroInEncodedDataError(readPos)
      }
      out[writePos] = byte
      writePos++
    }
    codePos = runEnd
    if (codePos >= input.length) {
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
 * Encodes data into COBS/R form, returning a new array.
 */
export function encode (input: Uint8Array): Uint8Array {
  const out = new ByteBuffer(encodeMaxOutputSize(input.length))
  let codePos = 0
  let runLen = 0
  let lastValue = 0

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
      lastValue = 0
    } else {
      if (runLen === 0) {
        out.push(MAX_CODE)
        runLen = 1
      }
      lastValue = byte
      out.push(byte)
      runLen++
    }
  }

  if (runLen === 0) {
    out.push(1)
  } else if (lastValue >= runLen) {
    out.set(codePos, lastValue)
    out.pop()
  } else {
    out.set(codePos, runLen)
  }

  return out.toUint8Array()
}

/**
 * Decodes COBS/R (or plain COBS) data, returning a new array.
 * @throws ZeroInEncodedDataError if the input holds a zero byte
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
        out.push(code)
        break
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
 * Lazy COBS/R encoder. Works like the COBS one, with a byte of lookahead
 * at each full run to learn whether the input ends there, and the final
 * code replaced by the last data byte when it is large enough.
 */
class EncodeIterator implements IterableIterator<number> {
  private readonly source: ByteSource
  private readonly holdBuf = new Uint8Array(HOLD_BUF_SIZE)
  private holdWrite: number = 0
  private holdRead: number = 0
  private eof: boolean = false
  private lastRunFull: boolean = false
  private lookahead: { byte: number | undefined } | null = null

  constructor (input: Iterable<number>) {
    this.source = new ByteSource(input)
  }

  next (): IteratorResult<number> {
    // A run is always gathered within a single call
    let lastByte = 0

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
        const byte = this.source.next()
        if (byte === undefined) {
          this.eof = true
          if (lastByte >= MAX_CODE) {
            this.holdWrite--
          }
        }
        this.lookahead = { byte }
        return { done: false, value: MAX_CODE }
      }
      let byte: number | undefined
      if (this.lookahead !== null) {
        byte = this.lookahead.byte
        this.lookahead = null
      } else {
        byte = this.source.next()
      }
      if (byte === undefined) {
        this.eof = true
      }
      if (this.lastRunFull) {
        this.lastRunFull = false
        if (this.eof) {
          return { done: true, value: undefined }
        }
      }
      if (byte === undefined || byte === 0) {
        const runLen = this.holdWrite + 1
        if (this.eof && this.holdWrite > 0 && lastByte >= runLen) {
          this.holdWrite--
          return { done: false, value: lastByte }
        }
        return { done: false, value: runLen }
      }
      lastByte = byte
      this.holdBuf[this.holdWrite] = byte
      this.holdWrite++
    }
  }

  [Symbol.iterator] (): IterableIterator<number> {
    return this
  }
}

/**
 * Checked lazy COBS/R decoder. A run cut short by the end of input ends
 * with its code byte, as in `decodeInto()`; only zero bytes are errors.
 * A zero that cuts a run short, such as the delimiter after a frame, also
 * releases the code byte before the error item.
 */
class DecodeResultIterator implements IterableIterator<DecodeResult> {
  private readonly source: ByteSource
  private finished: boolean = false
  private lastRun: number = 0
  private countRun: number = 0
  private pendingError: ZeroInEncodedDataError | null = null

  constructor (input: Iterable<number>) {
    this.source = new ByteSource(input)
  }

  next (): IteratorResult<DecodeResult> {
    if (this.pendingError !== null) {
      const error = this.pendingError
      this.pendingError = null
      return { done: false, value: error }
    }
    while (!this.finished) {
      const byte = this.source.next()
      if (byte === undefined) {
        this.finished = true
        if (this.countRun !== 0) {
          return { done: false, value: this.lastRun }
        }
        break
      }
      if (byte === 0) {
        this.finished = true
        const error = new ZeroInEncodedDataError(this.source.offset)
        if (this.countRun !== 0) {
          this.pendingError = error
          return { done: false, value: this.lastRun }
        }
        return { done: false, value: error }
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
 * Encodes a byte sequence into COBS/R form lazily.
 */
export function encodeIter (input: Iterable<number>): IterableIterator<number> {
  return new EncodeIterator(input)
}

/**
 * Decodes a COBS/R byte sequence lazily. Best-effort: a zero byte ends the
 * data like the end of input does, and no errors are reported.
 */
export function decodeIter (input: Iterable<number>): IterableIterator<number> {
  return new BestEffortDecodeIterator(new DecodeResultIterator(input))
}

/**
 * Decodes a COBS/R byte sequence lazily, yielding a `ZeroInEncodedDataError`
 * item and ending on a zero byte. When the zero cuts the final run short,
 * its code byte is yielded first.
 */
export function decodeResultIter (input: Iterable<number>): IterableIterator<DecodeResult> {
  return new DecodeResultIterator(input)
}
