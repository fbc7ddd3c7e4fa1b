import type { DecodeError, PcmSampleFormat, SampleSource, StreamDecoderOptions, WaveHeader } from '../types';
import { INITIAL_RING_BUFFER_CAPACITY, MAX_HEADER_SIZE, MIN_HEADER_SIZE } from '../constants';
import { readMonoFrame, resolveSampleFormat } from '../decoders';
import { RingBuffer } from '../RingBuffer';
import { parseHeader } from '../utils/parseWavHeader';
import { MalformedHeaderError } from './errors';
import { ErrorFactory } from './ErrorFactory';
import { DecoderState, DecoderStateMachine } from './StateMachine';
import { StateManager } from './StateManager';

export interface WavStreamDecoderInfo {
  state: DecoderState;
  /**
   * Null until the header is parsed. `dataLength` is the declared data size, or the sample bytes received so far
   * when the file leaves the size undeclared, so `getDuration(header)` gives the track length.
   */
  header: WaveHeader | null;
  /** Sample-region bytes decoded so far. */
  decodedBytes: number;
  /** Sample-region bytes still expected, or null when the header does not declare a size. */
  remainingBytes: number | null;
  samplesDecoded: number;
  errors: DecodeError[];
}

/**
 * Decodes a WAV file delivered as arbitrary byte chunks into normalized mono samples.
 *
 * The header may be split across chunks, and so may frames: bytes of an incomplete frame wait in a ring buffer
 * for the next chunk. Samples are identical to those of `decodeSamples` over the concatenated input.
 */
export class WavStreamDecoder {
  private readonly stateMachine = new DecoderStateMachine();
  private readonly stateManager = new StateManager();
  private readonly errorFactory = new ErrorFactory(this.stateManager);
  private readonly ringBuffer: RingBuffer;
  private readonly maxHeaderSize: number;
  private format: PcmSampleFormat | null = null;

  constructor(options: StreamDecoderOptions = {}) {
    this.ringBuffer = new RingBuffer(options.bufferSize ?? INITIAL_RING_BUFFER_CAPACITY);
    this.maxHeaderSize = options.maxHeaderSize ?? MAX_HEADER_SIZE;
  }

  public get info(): WavStreamDecoderInfo {
    const { header, decodedBytes, remainingBytes, samplesDecoded, errors } = this.stateManager;
    return {
      state: this.stateMachine.state,
      header,
      decodedBytes,
      remainingBytes,
      samplesDecoded,
      errors: [...errors],
    };
  }

  /**
   * Feeds the next chunk of the file and returns the samples it completes.
   *
   * @throws {MalformedHeaderError} when the header is rejected, or no `data` chunk shows up within `maxHeaderSize` bytes.
   * @throws {UnsupportedFormatError} when the header describes a layout that cannot be decoded.
   */
  public decode(chunk: Uint8Array): number[] {
    switch (this.stateMachine.state) {
      case DecoderState.IDLE:
        return this.handleHeaderParsing(chunk);
      case DecoderState.DECODING:
        return this.handleAudioData(chunk);
      default:
        return [];
    }
  }

  /**
   * Ends the stream. Bytes of an incomplete final frame are discarded and reported in `info.errors`.
   *
   * @throws {MalformedHeaderError} if the stream ended before a complete header was seen.
   * @throws {Error} if the decoder has already ended.
   */
  public flush(): void {
    const state = this.stateMachine.state;

    if (state === DecoderState.IDLE) {
      // the stream ended before the header completed: report why it cannot be parsed
      try {
        parseHeader(this.stateManager.headerBuffer);
      } catch (err) {
        this.stateMachine.transition(DecoderState.ERROR);
        throw err;
      }
    }

    if (state === DecoderState.DECODING) {
      const leftover = this.ringBuffer.available;
      if (leftover > 0) {
        const err = this.errorFactory.create(`Discarded ${leftover} bytes of incomplete final frame`);
        this.stateManager.errors.push(err);
        console.debug(`wav: ${err.message}`);
        this.ringBuffer.clear();
      }
    }

    if (state !== DecoderState.ERROR) {
      this.stateMachine.transition(DecoderState.ENDED);
    }
  }

  /** Releases buffered bytes and puts the decoder in the `ENDED` state. */
  public free(): void {
    const state = this.stateMachine.state;
    if (state !== DecoderState.ENDED && state !== DecoderState.ERROR) {
      this.stateMachine.transition(DecoderState.ENDED);
    }
    this.ringBuffer.clear();
    this.stateManager.headerBuffer = new Uint8Array(0);
  }

  /** Returns the decoder to `IDLE`, ready for a new file. */
  public reset(): void {
    this.stateMachine.reset();
    this.stateManager.reset();
    this.ringBuffer.clear();
    this.format = null;
  }

  private handleHeaderParsing(chunk: Uint8Array): number[] {
    this.stateManager.appendHeader(chunk);
    const headerData = this.stateManager.headerBuffer;
    if (headerData.length < MIN_HEADER_SIZE) return [];

    let header: WaveHeader;
    try {
      header = parseHeader(headerData);
    } catch (err) {
      const waitForMore =
        err instanceof MalformedHeaderError &&
        err.reason === 'missing-chunk' &&
        headerData.length < this.maxHeaderSize;
      if (waitForMore) return [];
      this.stateMachine.transition(DecoderState.ERROR);
      throw err;
    }

    let format: PcmSampleFormat;
    try {
      format = resolveSampleFormat(header);
    } catch (err) {
      this.stateMachine.transition(DecoderState.ERROR);
      throw err;
    }

    const frameLength = format.bytesPerSample * header.channelCount;
    if (this.ringBuffer.capacity < frameLength) {
      this.stateMachine.transition(DecoderState.ERROR);
      throw new RangeError(`Buffer size ${this.ringBuffer.capacity} cannot hold one ${frameLength}-byte frame`);
    }

    this.format = format;
    this.stateManager.initialize(header, frameLength);
    this.stateMachine.transition(DecoderState.DECODING);
    console.debug(
      `wav: ${header.channelCount}ch ${header.sampleRateHz} Hz ${header.bitsPerSample}-bit, data at byte ${header.dataOffset}`
    );

    return this.handleAudioData(headerData.subarray(header.dataOffset));
  }

  private handleAudioData(chunk: Uint8Array): number[] {
    const data = this.stateManager.takeDataBytes(chunk);
    const samples: number[] = [];

    let offset = 0;
    while (offset < data.length) {
      offset += this.ringBuffer.write(data.subarray(offset));
      this.processBufferedFrames(samples);
    }

    return samples;
  }

  private processBufferedFrames(out: number[]): void {
    const format = this.format;
    const header = this.stateManager.header;
    if (!format || !header) return;

    const frames = this.ringBuffer.readFrames(this.stateManager.frameLength);
    const frameLength = this.stateManager.frameLength;
    for (let offset = 0; offset < frames.length; offset += frameLength) {
      out.push(readMonoFrame(format, header.channelCount, frames, offset));
    }
    this.stateManager.updateProgress(frames.length, frames.length / frameLength);
  }
}

/**
 * Runs `chunks` through `decoder` and yields every sample in order, flushing the decoder at the end.
 * Stops without flushing once `signal` is aborted; the decoder is freed whenever the run ends early.
 */
export async function* pumpDecoder(
  decoder: WavStreamDecoder,
  chunks: SampleSource<Uint8Array>,
  signal?: AbortSignal
): AsyncGenerator<number, void, undefined> {
  let flushed = false;
  try {
    for await (const chunk of chunks) {
      if (signal?.aborted) return;
      yield* decoder.decode(chunk);
    }
    decoder.flush();
    flushed = true;
  } finally {
    // aborted, abandoned by the consumer, or failed
    if (!flushed) decoder.free();
  }
}

/**
 * Decodes a stream of WAV byte chunks into normalized mono samples.
 */
export function decodeStream(
  chunks: SampleSource<Uint8Array>,
  options: StreamDecoderOptions & { signal?: AbortSignal } = {}
): AsyncGenerator<number, void, undefined> {
  const { signal, ...decoderOptions } = options;
  return pumpDecoder(new WavStreamDecoder(decoderOptions), chunks, signal);
}
