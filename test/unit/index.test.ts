/**
 * Tests for the package entry point.
 */

import { describe, it, expect } from 'vitest'
import { cobs, cobsr, collectDecoded, FRAME_DELIMITER, MAX_CODE, MAX_RUN_LENGTH, TruncatedEncodedDataError } from '../../src/lib/index.js'

describe('package exports', () => {
  it('should expose both codec families', () => {
    const payload = new TextEncoder().encode('12345')
    expect(cobs.encode(payload)).toEqual(new Uint8Array([0x06, 0x31, 0x32, 0x33, 0x34, 0x35]))
    expect(cobsr.encode(payload)).toEqual(new Uint8Array([0x35, 0x31, 0x32, 0x33, 0x34]))
  })

  it('should expose the constants', () => {
    expect(FRAME_DELIMITER).toBe(0x00)
    expect(MAX_CODE).toBe(0xFF)
    expect(MAX_RUN_LENGTH).toBe(254)
  })

  it('should decode the same bytes differently per family', () => {
    const frame = new Uint8Array([0x05, 0x41, 0x41, 0x41])
    expect(() => collectDecoded(cobs.decodeResultIter(frame))).toThrow(TruncatedEncodedDataError)
    expect(collectDecoded(cobsr.decodeResultIter(frame))).toEqual(new Uint8Array([0x41, 0x41, 0x41, 0x05]))
  })

  it('should frame several payloads on one stream', () => {
    const payloads = [new Uint8Array([1, 0, 2]), new Uint8Array([]), new Uint8Array([0xFF])]
    const stream: number[] = []
    for (const payload of payloads) {
      stream.push(...cobsr.encode(payload), FRAME_DELIMITER)
    }
    expect(stream).toEqual([0x02, 0x01, 0x02, 0x00, 0x01, 0x00, 0xFF, 0x00])

    const frames: Uint8Array[] = []
    let start = 0
    for (let i = 0; i < stream.length; i++) {
      if (stream[i] === FRAME_DELIMITER) {
        frames.push(cobsr.decode(new Uint8Array(stream.slice(start, i))))
        start = i + 1
      }
    }
    expect(frames).toEqual(payloads)
  })
})
