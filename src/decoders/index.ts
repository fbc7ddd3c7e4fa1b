import type { PcmSampleFormat, WavBitDepth, WaveHeader } from '../types';
import { KSDATAFORMAT_SUBTYPE_PCM, WAVE_FORMAT_EXTENSIBLE, WAVE_FORMAT_PCM } from '../constants';
import { UnsupportedFormatError } from '../core/errors';
import { decodePCM8 } from './pcm/decodePCM8';
import { decodePCM16 } from './pcm/decodePCM16';
import { decodePCM24 } from './pcm/decodePCM24';
import { decodePCM32 } from './pcm/decodePCM32';

/**
 * Sample readers for every supported integer PCM depth.
 */
export const PCM_FORMATS: Readonly<Record<WavBitDepth, PcmSampleFormat>> = {
  8: { bitsPerSample: 8, bytesPerSample: 1, read: decodePCM8 },
  16: { bitsPerSample: 16, bytesPerSample: 2, read: decodePCM16 },
  24: { bitsPerSample: 24, bytesPerSample: 3, read: decodePCM24 },
  32: { bitsPerSample: 32, bytesPerSample: 4, read: decodePCM32 },
};

const SUPPORTED_FORMAT_TAGS: ReadonlySet<number> = new Set([WAVE_FORMAT_PCM, WAVE_FORMAT_EXTENSIBLE]);

export function isSupportedBitDepth(bits: number): bits is WavBitDepth {
  return bits === 8 || bits === 16 || bits === 24 || bits === 32;
}

function arraysEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Picks the sample reader for `header`.
 *
 * WAVE_FORMAT_EXTENSIBLE headers must carry the PCM SubFormat; float and compressed SubFormats are rejected.
 *
 * @throws {UnsupportedFormatError} for a non-PCM format, a bit depth outside 8/16/24/32, or a channel count other than 1 or 2.
 */
export function resolveSampleFormat(header: WaveHeader): PcmSampleFormat {
  const { formatTag, bitsPerSample, channelCount } = header;
  const details = { formatTag, bitsPerSample, channelCount };

  if (!SUPPORTED_FORMAT_TAGS.has(formatTag)) {
    throw new UnsupportedFormatError(`Unsupported audio format: 0x${formatTag.toString(16)}`, details);
  }
  const { subFormat } = header;
  if (formatTag === WAVE_FORMAT_EXTENSIBLE && !(subFormat && arraysEqual(subFormat, KSDATAFORMAT_SUBTYPE_PCM))) {
    throw new UnsupportedFormatError('Unsupported extensible sub-format (expected integer PCM)', details);
  }
  if (!isSupportedBitDepth(bitsPerSample)) {
    throw new UnsupportedFormatError(`Unsupported bit depth: ${bitsPerSample} (expected 8, 16, 24 or 32)`, details);
  }
  if (channelCount !== 1 && channelCount !== 2) {
    throw new UnsupportedFormatError(`Unsupported channel count: ${channelCount} (expected 1 or 2)`, details);
  }

  return PCM_FORMATS[bitsPerSample];
}

/**
 * Reads one mono frame at `offset`. Stereo frames fold to the mean of left and right.
 */
export function readMonoFrame(format: PcmSampleFormat, channelCount: number, bytes: Uint8Array, offset: number): number {
  const left = format.read(bytes, offset);
  if (channelCount === 1) return left;
  const right = format.read(bytes, offset + format.bytesPerSample);
  return (left + right) / 2;
}
