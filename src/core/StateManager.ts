import type { DecodeError, WaveHeader } from '../types';
import { UNKNOWN_DATA_SIZES } from '../constants';

/**
 * Progress counters of a stream decoder.
 */
export class StateManager {
  /**
   * Header of the stream being decoded. Its `dataLength` is the declared data size, or, when the size is a
   * placeholder, the sample-region bytes received so far.
   */
  public header: WaveHeader | null = null;
  public frameLength = 0;
  public decodedBytes = 0;
  /** Sample-region bytes still expected, or null when the header does not declare a size. */
  public remainingBytes: number | null = null;
  public samplesDecoded = 0;
  public errors: DecodeError[] = [];
  public headerBuffer = new Uint8Array(0);

  public initialize(header: WaveHeader, frameLength: number): void {
    const declared = !UNKNOWN_DATA_SIZES.includes(header.declaredDataLength);
    // parsed from a partial buffer: its dataLength only counts the bytes that had arrived
    this.header = Object.freeze({ ...header, dataLength: declared ? header.declaredDataLength : 0 });
    this.frameLength = frameLength;
    this.remainingBytes = declared ? header.declaredDataLength : null;
    this.decodedBytes = 0;
    this.samplesDecoded = 0;
    this.headerBuffer = new Uint8Array(0);
  }

  public appendHeader(chunk: Uint8Array): void {
    const prev = this.headerBuffer;
    this.headerBuffer = new Uint8Array(prev.length + chunk.length);
    this.headerBuffer.set(prev, 0);
    this.headerBuffer.set(chunk, prev.length);
  }

  /**
   * Returns the part of `chunk` that still belongs to the sample region.
   */
  public takeDataBytes(chunk: Uint8Array): Uint8Array {
    if (this.remainingBytes === null) {
      if (this.header && chunk.length > 0) {
        this.header = Object.freeze({ ...this.header, dataLength: this.header.dataLength + chunk.length });
      }
      return chunk;
    }
    const taken = chunk.subarray(0, this.remainingBytes);
    this.remainingBytes -= taken.length;
    return taken;
  }

  public updateProgress(bytesProcessed: number, samples: number): void {
    this.decodedBytes += bytesProcessed;
    this.samplesDecoded += samples;
  }

  public reset(): void {
    this.header = null;
    this.frameLength = 0;
    this.decodedBytes = 0;
    this.remainingBytes = null;
    this.samplesDecoded = 0;
    this.errors = [];
    this.headerBuffer = new Uint8Array(0);
  }
}
