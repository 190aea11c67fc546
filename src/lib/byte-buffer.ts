/**
 * Growable byte container used by the allocating encoders and decoders.
 *
 * @module cobsr-codec/byte-buffer
 */

/**
 * A byte array that grows as bytes are pushed.
 */
export class ByteBuffer {
  private data: Uint8Array
  private size: number = 0

  /**
   * Creates an empty buffer.
   * @param capacity - Initial capacity in bytes, typically from a size-bound calculator
   */
  constructor (capacity: number = 16) {
    this.data = new Uint8Array(Math.max(capacity, 1))
  }

  get length (): number {
    return this.size
  }

  push (byte: number): void {
    if (this.size >= this.data.length) {
      this.grow()
    }
    this.data[this.size] = byte & 0xFF
    this.size++
  }

  /**
   * Removes and returns the last byte, or undefined when empty.
   */
  pop (): number | undefined {
    if (this.size === 0) {
      return undefined
    }
    this.size--
    return this.data[this.size]
  }

  /**
   * Overwrites a byte that has already been pushed.
   * @throws RangeError if the index is outside the written bytes
   */
  set (index: number, byte: number): void {
    if (index < 0 || index >= this.size) {
      throw new RangeError(`Index ${index} out of range for length ${this.size}`)
    }
    this.data[index] = byte & 0xFF
  }

  /**
   * Copies the written bytes into a new array.
   */
  toUint8Array (): Uint8Array {
    return this.data.slice(0, this.size)
  }

  private grow (): void {
    const next = new Uint8Array(this.data.length * 2)
    next.set(this.data)
    this.data = next
  }
}
