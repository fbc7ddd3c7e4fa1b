/**
 * The PCM bit depths the decoder understands.
 */
export type WavBitDepth = 8 | 16 | 24 | 32;

/**
 * Identifier for the audio encoding format in a WAVE file header.
 * - `1`: PCM (uncompressed)
 * - `65534`: Extensible format
 * Anything else is parsed but rejected when samples are requested.
 */
export type WavFormatTag = 1 | 65534 | (number & {});

/**
 * The number of audio samples per second (in Hertz).
 * Common values include 8000, 16000, 44100, and 48000.
 */
export type WavSampleRate = 8000 | 11025 | 16000 | 22050 | 32000 | 44100 | 48000 | 96000 | (number & {});

/**
 * Header fields of a RIFF/WAVE buffer, as read by `parseHeader`.
 *
 * `bitsPerSample` and `channelCount` are reported exactly as stored; whether they are supported is
 * decided when samples are requested.
 *
 * @property formatTag - Value of the `fmt ` chunk's format tag.
 * @property channelCount - Number of interleaved channels.
 * @property sampleRateHz - Frames per second.
 * @property bitsPerSample - Stored bits per sample.
 * @property dataOffset - Byte offset of the first sample byte within the source buffer.
 * @property dataLength - Readable byte length of the sample region (never past the end of the buffer).
 * @property declaredDataLength - The size field of the `data` chunk as written in the file.
 * @property subFormat - SubFormat GUID of a WAVEFORMATEXTENSIBLE `fmt ` chunk, null for any other `fmt ` chunk.
 */
export interface WaveHeader {
  readonly formatTag: WavFormatTag;
  readonly channelCount: number;
  readonly sampleRateHz: WavSampleRate;
  readonly bitsPerSample: number;
  readonly dataOffset: number;
  readonly dataLength: number;
  readonly declaredDataLength: number;
  readonly subFormat: Uint8Array | null;
}

/**
 * Reads one sample at `offset` and returns it normalized to [-1, 1].
 */
export type SampleReader = (bytes: Uint8Array, offset: number) => number;

/**
 * A supported integer PCM layout, selected once per decode.
 */
export interface PcmSampleFormat {
  readonly bitsPerSample: WavBitDepth;
  readonly bytesPerSample: number;
  readonly read: SampleReader;
}

/**
 * The decoded mono signal of a whole buffer.
 */
export interface DecodedWav {
  header: WaveHeader;
  samples: Float64Array;
}

/**
 * Describes a non-fatal problem noticed while decoding a stream.
 * @property frameLength - Bytes per frame of the stream being decoded.
 * @property frameNumber - Index of the frame at which the problem occurred.
 * @property inputBytes - Sample-region bytes consumed before the problem.
 * @property message - A descriptive message.
 * @property outputSamples - Mono samples produced before the problem.
 */
export interface DecodeError {
  frameLength: number;
  frameNumber: number;
  inputBytes: number;
  message: string;
  outputSamples: number;
}

/**
 * Configuration for `WavStreamDecoder`.
 * @property bufferSize - Capacity of the internal ring buffer in bytes. Must be a power of two.
 * @property maxHeaderSize - Bytes to accumulate while looking for the `data` chunk before giving up.
 */
export interface StreamDecoderOptions {
  bufferSize?: number;
  maxHeaderSize?: number;
}

/**
 * Anything the reducers and pipeline can pull samples or chunks from.
 */
export type SampleSource<T> = AsyncIterable<T> | Iterable<T>;

export interface ReduceStreamingOptions {
  /** Stops consuming input once aborted. The partially filled bucket is not emitted. */
  signal?: AbortSignal;
}

export interface ProcessOptions {
  /** When set, the decoded signal is reduced to at most this many points (more are passed through untouched). */
  targetLength?: number;
  /** Number of points per `onChunk` call. */
  chunkSize?: number;
  onSample?: (value: number, index: number) => void;
  onChunk?: (chunk: number[], startIndex: number) => void;
  signal?: AbortSignal;
}

export interface StreamWaveformOptions {
  targetLength?: number;
  signal?: AbortSignal;
  decoder?: StreamDecoderOptions;
}
