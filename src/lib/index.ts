/**
 * COBS and COBS/R byte stuffing for JavaScript/TypeScript.
 *
 * Both encodings turn arbitrary bytes into bytes with no zeros, so a zero
 * can delimit frames on a serial line or any other byte stream.
 *
 * ## Usage
 *
 * Each family (`cobs`, `cobsr`) offers the same shapes:
 *
 * 1. `encodeInto()` / `decodeInto()` write into a caller-provided
 *    `Uint8Array`, sized with `encodeMaxOutputSize()` or
 *    `decodeMaxOutputSize()`.
 * 2. `encode()` / `decode()` return a new `Uint8Array`.
 * 3. `encodeIter()` / `decodeIter()` / `decodeResultIter()` work lazily
 *    over any iterable of bytes.
 *
 * Framing is up to the caller: append a zero after each encoded frame, and
 * split the incoming stream on zeros before decoding.
 *
 * @module cobsr-codec
 */

// Constants
export { FRAME_DELIMITER, MAX_CODE, MAX_RUN_LENGTH, MAX_SIZE } from './constants.js'

// Errors
export {
  CobsError,
  OutputBufferTooSmallError,
  ZeroInEncodedDataError,
  TruncatedEncodedDataError,
  type DecodeError,
  type Error as CobsErrorType
} from './error.js'

// Containers and iterator helpers
export { ByteBuffer } from './byte-buffer.js'
export { collectDecoded, type DecodeResult } from './iter.js'

// Codecs
export * as cobs from './cobs.js'
export * as cobsr from './cobsr.js'
