/**
 * Shared test data.
 */

export type ByteSpec = number | string | number[] | Uint8Array

/**
 * Builds a byte array from numbers, strings and arrays.
 */
export function bytes (...parts: ByteSpec[]): Uint8Array {
  const out: number[] = []
  for (const part of parts) {
    if (typeof part === 'number') {
      out.push(part)
    } else if (typeof part === 'string') {
      out.push(...new TextEncoder().encode(part))
    } else {
      out.push(...part)
    }
  }
  return new Uint8Array(out)
}

/**
 * Non-zero bytes cycling through 'A'..'Z'.
 */
export function letters (length: number): Uint8Array {
  const out = new Uint8Array(length)
  for (let i = 0; i < length; i++) {
    out[i] = 0x41 + (i % 26)
  }
  return out
}

/**
 * Deterministic pseudo-random bytes. Roughly one byte in `zeroEvery` is zero.
 */
export function pseudoRandomBytes (seed: number, length: number, zeroEvery: number): Uint8Array {
  const out = new Uint8Array(length)
  let state = seed >>> 0
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0
    const value = state >>> 24
    out[i] = value % zeroEvery === 0 ? 0 : value
  }
  return out
}

export interface Mapping {
  description: string
  raw: Uint8Array
  encoded: Uint8Array
}

const RUN_253 = letters(253)
const RUN_254 = letters(254)
const RUN_255 = letters(255)
// Last byte of RUN_255, 'U'
const RUN_255_LAST = RUN_255[254]

/**
 * Inputs whose COBS encoding is checked byte for byte.
 */
export const COBS_ENCODINGS: Mapping[] = [
  { description: 'empty', raw: bytes(), encoded: bytes(0x01) },
  { description: '1 non-zero', raw: bytes('1'), encoded: bytes(0x02, '1') },
  { description: '5 non-zero', raw: bytes('12345'), encoded: bytes(0x06, '12345') },
  { description: '1 zero in middle', raw: bytes('12345', 0, '6789'), encoded: bytes(0x06, '12345', 0x05, '6789') },
  { description: '2 clumps starting with zero', raw: bytes(0, '12345', 0, '6789'), encoded: bytes(0x01, 0x06, '12345', 0x05, '6789') },
  { description: '2 clumps ending with zero', raw: bytes('12345', 0, '6789', 0), encoded: bytes(0x06, '12345', 0x05, '6789', 0x01) },
  { description: '1 zero', raw: bytes(0), encoded: bytes(0x01, 0x01) },
  { description: '2 zeros', raw: bytes(0, 0), encoded: bytes(0x01, 0x01, 0x01) },
  { description: '3 zeros', raw: bytes(0, 0, 0), encoded: bytes(0x01, 0x01, 0x01, 0x01) },
  { description: '253 non-zero', raw: RUN_253, encoded: bytes(0xFE, RUN_253) },
  { description: '254 non-zero', raw: RUN_254, encoded: bytes(0xFF, RUN_254) },
  { description: '255 non-zero', raw: RUN_255, encoded: bytes(0xFF, RUN_254, 0x02, RUN_255_LAST) },
  { description: 'zero then 255 non-zero', raw: bytes(0, RUN_255), encoded: bytes(0x01, 0xFF, RUN_254, 0x02, RUN_255_LAST) },
  { description: '253 non-zero then zero', raw: bytes(RUN_253, 0), encoded: bytes(0xFE, RUN_253, 0x01) },
  { description: '254 non-zero then zero', raw: bytes(RUN_254, 0), encoded: bytes(0xFF, RUN_254, 0x01, 0x01) },
  { description: '255 non-zero then zero', raw: bytes(RUN_255, 0), encoded: bytes(0xFF, RUN_254, 0x02, RUN_255_LAST, 0x01) }
]

/**
 * Encoded inputs an encoder would not produce but a decoder must accept.
 */
export const COBS_DECODINGS: Mapping[] = [
  { description: 'empty', raw: bytes(), encoded: bytes() },
  { description: '254 non-zero with redundant final code', raw: RUN_254, encoded: bytes(0xFF, RUN_254, 0x01) }
]

/**
 * Inputs whose COBS/R encoding is checked byte for byte.
 */
export const COBSR_ENCODINGS: Mapping[] = [
  { description: 'empty', raw: bytes(), encoded: bytes(0x01) },
  { description: '01', raw: bytes(0x01), encoded: bytes(0x02, 0x01) },
  { description: '02', raw: bytes(0x02), encoded: bytes(0x02) },
  { description: '03', raw: bytes(0x03), encoded: bytes(0x03) },
  { description: '7F', raw: bytes(0x7F), encoded: bytes(0x7F) },
  { description: '80', raw: bytes(0x80), encoded: bytes(0x80) },
  { description: 'FE', raw: bytes(0xFE), encoded: bytes(0xFE) },
  { description: 'FF', raw: bytes(0xFF), encoded: bytes(0xFF) },
  { description: '1 non-zero', raw: bytes('1'), encoded: bytes('1') },
  { description: 'descending small values', raw: bytes(5, 4, 3, 2, 1), encoded: bytes(0x06, 5, 4, 3, 2, 1) },
  { description: '5 non-zero', raw: bytes('12345'), encoded: bytes('51234') },
  { description: 'small final run', raw: bytes('12345', 0, 4, 3, 2, 1), encoded: bytes(0x06, '12345', 0x05, 4, 3, 2, 1) },
  { description: '1 zero in middle', raw: bytes('12345', 0, '6789'), encoded: bytes(0x06, '12345', '9678') },
  { description: '2 clumps starting with zero', raw: bytes(0, '12345', 0, '6789'), encoded: bytes(0x01, 0x06, '12345', '9678') },
  { description: '2 clumps ending with zero', raw: bytes('12345', 0, '6789', 0), encoded: bytes(0x06, '12345', 0x05, '6789', 0x01) },
  { description: '1 zero', raw: bytes(0), encoded: bytes(0x01, 0x01) },
  { description: '2 zeros', raw: bytes(0, 0), encoded: bytes(0x01, 0x01, 0x01) },
  { description: '3 zeros', raw: bytes(0, 0, 0), encoded: bytes(0x01, 0x01, 0x01, 0x01) },
  { description: '253 non-zero', raw: RUN_253, encoded: bytes(0xFE, RUN_253) },
  { description: '254 non-zero', raw: RUN_254, encoded: bytes(0xFF, RUN_254) },
  { description: '254 non-zero ending in FF', raw: bytes(RUN_253, 0xFF), encoded: bytes(0xFF, RUN_253) },
  { description: '255 non-zero', raw: RUN_255, encoded: bytes(0xFF, RUN_254, RUN_255_LAST) },
  { description: '254 non-zero then zero', raw: bytes(RUN_254, 0), encoded: bytes(0xFF, RUN_254, 0x01, 0x01) }
]
