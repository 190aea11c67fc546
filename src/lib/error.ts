/**
 * COBS and COBS/R error types.
 *
 * @module cobsr-codec/error
 */

/**
 * Top-level error type for COBS operations.
 */
export class CobsError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'CobsError'
  }
}

/**
 * The caller-supplied output buffer cannot hold the result.
 */
export class OutputBufferTooSmallError extends CobsError {
  constructor () {
    super('Output buffer is too small')
    this.name = 'OutputBufferTooSmallError'
  }
}

/**
 * A zero byte was found in encoded data, either as a length code or inside a run.
 */
export class ZeroInEncodedDataError extends CobsError {
  /** Offset of the zero byte in the encoded input */
  public readonly offset: number

  constructor (offset: number) {
    super(`Zero found in encoded input data at offset ${offset}`)
    this.name = 'ZeroInEncodedDataError'
    this.offset = offset
  }
}

/**
 * A length code claims more bytes than the encoded input holds.
 */
export class TruncatedEncodedDataError extends CobsError {
  constructor () {
    super('Unexpected end of encoded input data')
    this.name = 'TruncatedEncodedDataError'
  }
}

/**
 * Errors raised while decoding.
 */
export type DecodeError =
  | ZeroInEncodedDataError
  | TruncatedEncodedDataError

/**
 * Union type of all COBS errors.
 */
export type Error =
  | OutputBufferTooSmallError
  | DecodeError
