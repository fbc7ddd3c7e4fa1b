import { INITIAL_RING_BUFFER_CAPACITY } from './constants';

/**
 * A fixed-capacity byte queue used to hold sample bytes until they form whole frames.
 * Capacity must be a power of two.
 */
export class RingBuffer {
  public readonly capacity: number;
  private readonly mask: number;
  private readonly buffer: Uint8Array;
  private writePos = 0;
  private readPos = 0;
  private size = 0;

  /**
   * Creates an instance of RingBuffer.
   * @param capacity The capacity of the buffer. Must be a power of two and at least 2.
   */
  constructor(capacity: number = INITIAL_RING_BUFFER_CAPACITY) {
    if ((capacity & (capacity - 1)) !== 0 || capacity < 2) {
      throw new Error('Capacity must be a power of two and at least 2');
    }

    this.capacity = capacity;
    this.mask = capacity - 1;
    this.buffer = new Uint8Array(capacity);
  }

  /**
   * The number of bytes available to be read from the buffer.
   */
  get available(): number {
    return this.size;
  }

  get free(): number {
    return this.capacity - this.size;
  }

  /**
   * Writes as much of `data` as fits.
   * @returns The number of bytes actually written.
   */
  write(data: Uint8Array): number {
    const bytesToWrite = Math.min(data.length, this.free);
    if (bytesToWrite === 0) return 0;

    const wp = this.writePos;
    const firstChunk = this.capacity - wp;
    if (bytesToWrite <= firstChunk) {
      this.buffer.set(data.subarray(0, bytesToWrite), wp);
    } else {
      this.buffer.set(data.subarray(0, firstChunk), wp);
      this.buffer.set(data.subarray(firstChunk, bytesToWrite), 0);
    }

    this.writePos = (wp + bytesToWrite) & this.mask;
    this.size += bytesToWrite;
    return bytesToWrite;
  }

  /**
   * Removes every complete `frameLength`-byte frame and returns them as one contiguous array.
   * Bytes of an incomplete trailing frame stay in the buffer.
   */
  readFrames(frameLength: number): Uint8Array {
    const length = this.size - (this.size % frameLength);
    const target = new Uint8Array(length);
    if (length === 0) return target;

    const rp = this.readPos;
    const firstChunk = this.capacity - rp;
    if (length <= firstChunk) {
      target.set(this.buffer.subarray(rp, rp + length), 0);
    } else {
      target.set(this.buffer.subarray(rp, rp + firstChunk), 0);
      target.set(this.buffer.subarray(0, length - firstChunk), firstChunk);
    }

    this.readPos = (rp + length) & this.mask;
    this.size -= length;
    return target;
  }

  /**
   * Clears the buffer, resetting all positions and the size.
   */
  clear(): void {
    this.writePos = 0;
    this.readPos = 0;
    this.size = 0;
  }
}
