import type { DecodedWav, PcmSampleFormat, WaveHeader } from '../types';
import { readMonoFrame, resolveSampleFormat } from '../decoders';
import { parseHeader } from '../utils/parseWavHeader';
import { UNKNOWN_DATA_SIZES } from '../constants';

/**
 * Number of mono samples `decodeSamples` yields for `header`, computed from the header alone.
 * Returns 0 when the format is not supported.
 */
export function getSampleCount(header: WaveHeader): number {
  const bytesPerSample = header.bitsPerSample / 8;
  if (!Number.isInteger(bytesPerSample) || bytesPerSample <= 0 || header.channelCount <= 0) return 0;
  return Math.floor(header.dataLength / bytesPerSample / header.channelCount);
}

/**
 * Sample count implied by the `data` chunk's size field, for readers that see the header before the data.
 * Returns null when the size field is a placeholder (0 or 0xFFFFFFFF) or the format is not supported.
 */
export function getDeclaredSampleCount(header: WaveHeader): number | null {
  if (UNKNOWN_DATA_SIZES.includes(header.declaredDataLength)) return null;
  const count = getSampleCount({ ...header, dataLength: header.declaredDataLength });
  return count > 0 ? count : null;
}

function* iterateFrames(
  bytes: Uint8Array,
  header: WaveHeader,
  format: PcmSampleFormat,
  frameCount: number
): Generator<number, void, undefined> {
  const { channelCount, dataOffset } = header;
  const frameLength = format.bytesPerSample * channelCount;
  for (let i = 0, offset = dataOffset; i < frameCount; i++, offset += frameLength) {
    yield readMonoFrame(format, channelCount, bytes, offset);
  }
}

/**
 * Lazily decodes the sample region of `bytes` into normalized mono samples.
 *
 * The returned iterable can be iterated any number of times; each pass re-reads `bytes`.
 * Trailing bytes that do not complete a frame are ignored.
 *
 * @throws {UnsupportedFormatError} before any sample is produced if the format cannot be decoded.
 */
export function decodeSamples(bytes: Uint8Array, header: WaveHeader): Iterable<number> {
  const format = resolveSampleFormat(header);
  const frameCount = getSampleCount(header);
  const trailing = header.dataLength - frameCount * format.bytesPerSample * header.channelCount;
  if (trailing > 0) {
    console.debug(`wav: ignoring ${trailing} trailing byte(s) after the last complete frame`);
  }

  return {
    [Symbol.iterator]: () => iterateFrames(bytes, header, format, frameCount),
  };
}

/**
 * Parses `bytes` and decodes every sample.
 */
export function decodeWav(bytes: Uint8Array): DecodedWav {
  const header = parseHeader(bytes);
  const samples = Float64Array.from(decodeSamples(bytes, header));
  return { header, samples };
}
