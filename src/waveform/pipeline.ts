import type { ProcessOptions, SampleSource, StreamWaveformOptions } from '../types';
import { DEFAULT_CHUNK_SIZE, DEFAULT_TARGET_LENGTH } from '../constants';
import { decodeSamples, getDeclaredSampleCount, getSampleCount } from '../core/WavDecoder';
import { WavStreamDecoder, pumpDecoder } from '../core/WavStreamDecoder';
import { parseHeader } from '../utils/parseWavHeader';
import { assertTargetLength } from './buckets';
import { reduceStreaming } from './reduceStreaming';

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('The operation was aborted');
}

async function* fromIterable(samples: Iterable<number>): AsyncGenerator<number, void, undefined> {
  yield* samples;
}

/**
 * Decodes a complete WAV buffer into waveform points.
 *
 * With `targetLength` the samples are reduced on the fly, using the sample count implied by the header as the
 * bucketing hint. `onSample` sees every output point, `onChunk` receives them in groups of `chunkSize`.
 *
 * Rejects with the signal's reason once `signal` is aborted.
 */
export async function processWav(bytes: Uint8Array, options: ProcessOptions = {}): Promise<number[]> {
  const { targetLength, chunkSize = DEFAULT_CHUNK_SIZE, onSample, onChunk, signal } = options;
  if (targetLength !== undefined) assertTargetLength(targetLength);
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (signal?.aborted) throw abortReason(signal);

  const header = parseHeader(bytes);
  const decoded = decodeSamples(bytes, header);
  const stream =
    targetLength === undefined
      ? fromIterable(decoded)
      : reduceStreaming(decoded, targetLength, getSampleCount(header), { signal });

  const points: number[] = [];
  let chunk: number[] = [];
  let index = 0;

  for await (const point of stream) {
    if (signal?.aborted) break;
    points.push(point);
    chunk.push(point);
    onSample?.(point, index);
    index++;

    if (chunk.length >= chunkSize) {
      onChunk?.(chunk, index - chunk.length);
      chunk = [];
    }
  }

  if (signal?.aborted) throw abortReason(signal);

  if (chunk.length > 0) {
    onChunk?.(chunk, index - chunk.length);
  }
  return points;
}

async function* prepend(first: number, rest: AsyncGenerator<number, void, undefined>): AsyncGenerator<number, void, undefined> {
  yield first;
  yield* rest;
}

/**
 * Decodes and reduces a WAV file arriving as byte chunks, without ever holding the whole signal.
 *
 * The bucketing hint is taken from the `data` chunk's declared size. When the header leaves the size undeclared
 * (a recorder placeholder) the samples are passed through unreduced.
 */
export async function* streamWaveform(
  chunks: SampleSource<Uint8Array>,
  options: StreamWaveformOptions = {}
): AsyncGenerator<number, void, undefined> {
  const { targetLength = DEFAULT_TARGET_LENGTH, signal, decoder: decoderOptions } = options;
  assertTargetLength(targetLength);

  const decoder = new WavStreamDecoder(decoderOptions);
  const samples = pumpDecoder(decoder, chunks, signal);

  // the header is parsed by the time the first sample exists
  const first = await samples.next();
  if (first.done) return;

  const header = decoder.info.header;
  const hint = header ? getDeclaredSampleCount(header) : null;
  if (hint === null) {
    console.debug('wav: data size not declared, passing samples through');
    yield* prepend(first.value, samples);
    return;
  }

  yield* reduceStreaming(prepend(first.value, samples), targetLength, hint, { signal });
}
