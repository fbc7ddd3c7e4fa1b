import type { WaveHeader } from '../types';
import {
  DATA_CHUNK,
  EXTENSIBLE_CB_SIZE,
  FMT_CHUNK,
  FMT_EXTENSIBLE_SIZE,
  FMT_CHUNK_MIN_SIZE,
  MIN_HEADER_SIZE,
  RIFF_TAG,
  UNKNOWN_DATA_SIZES,
  WAVE_FORMAT_EXTENSIBLE,
  WAVE_TAG,
} from '../constants';
import { MalformedHeaderError } from '../core/errors';
import { readFourCC, readUint16LE, readUint32LE } from './bytes';

interface FormatFields {
  formatTag: number;
  channelCount: number;
  sampleRateHz: number;
  bitsPerSample: number;
  subFormat: Uint8Array | null;
}

/**
 * Validates the RIFF header and the WAVE form type
 */
function validateRiffHeader(bytes: Uint8Array): void {
  const byteLength = bytes.length;

  if (byteLength < MIN_HEADER_SIZE) {
    throw new MalformedHeaderError(
      `File is too small to be a valid WAV (expected at least ${MIN_HEADER_SIZE} bytes, got ${byteLength})`,
      { reason: 'too-small', byteLength }
    );
  }

  const riff = readFourCC(bytes, 0);
  if (riff !== RIFF_TAG) {
    throw new MalformedHeaderError(`Missing "RIFF" signature at byte 0 (found ${JSON.stringify(riff)})`, {
      reason: 'bad-riff-tag',
      byteLength,
      found: riff,
    });
  }

  const wave = readFourCC(bytes, 8);
  if (wave !== WAVE_TAG) {
    throw new MalformedHeaderError(`Missing "WAVE" signature at byte 8 (found ${JSON.stringify(wave)})`, {
      reason: 'bad-wave-tag',
      byteLength,
      found: wave,
    });
  }
}

/**
 * Reads the fields of a `fmt ` chunk starting at `offset` (the chunk id).
 * The SubFormat GUID is read only from a complete WAVEFORMATEXTENSIBLE extension.
 */
function parseFormatChunk(bytes: Uint8Array, offset: number, chunkSize: number): FormatFields {
  const off = offset + 8;
  const formatTag = readUint16LE(bytes, off);

  let subFormat: Uint8Array | null = null;
  if (
    formatTag === WAVE_FORMAT_EXTENSIBLE &&
    chunkSize >= FMT_EXTENSIBLE_SIZE &&
    off + FMT_EXTENSIBLE_SIZE <= bytes.length &&
    readUint16LE(bytes, off + 16) >= EXTENSIBLE_CB_SIZE
  ) {
    // cbSize at +16, then validBitsPerSample (2), channelMask (4), SubFormat (16)
    subFormat = bytes.slice(off + 24, off + 40);
  }

  return {
    formatTag,
    channelCount: readUint16LE(bytes, off + 2),
    sampleRateHz: readUint32LE(bytes, off + 4),
    bitsPerSample: readUint16LE(bytes, off + 14),
    subFormat,
  };
}

function resolveDataLength(declared: number, available: number): number {
  if (UNKNOWN_DATA_SIZES.includes(declared)) return available;
  return Math.min(declared, available);
}

/**
 * Parses the RIFF/WAVE header of `bytes`.
 *
 * Chunks are scanned from byte 12 until the `data` chunk is found. A `fmt ` chunk must appear before it.
 * The header is returned frozen; bit depth and channel count are not validated here, see `resolveSampleFormat`.
 *
 * @throws {MalformedHeaderError} when the buffer is too small, a tag is wrong, or a required chunk is missing.
 */
export function parseHeader(bytes: Uint8Array): WaveHeader {
  validateRiffHeader(bytes);

  const len = bytes.length;
  let offset = 12;
  let format: FormatFields | null = null;
  let dataOffset = -1;
  let declaredDataLength = 0;

  while (offset + 8 <= len) {
    const chunkId = readFourCC(bytes, offset);
    const chunkSize = readUint32LE(bytes, offset + 4);

    if (chunkId === FMT_CHUNK) {
      if (offset + 8 + FMT_CHUNK_MIN_SIZE <= len) {
        format = parseFormatChunk(bytes, offset, chunkSize);
      }
    } else if (chunkId === DATA_CHUNK) {
      dataOffset = offset + 8;
      declaredDataLength = chunkSize;
      break;
    }

    // chunks are word-aligned
    offset += 8 + chunkSize + (chunkSize & 1);
  }

  if (!format || dataOffset < 0) {
    const missing: ('fmt ' | 'data')[] = [];
    if (!format) missing.push(FMT_CHUNK);
    if (dataOffset < 0) missing.push(DATA_CHUNK);
    throw new MalformedHeaderError(`Missing required ${missing.map((id) => `"${id}"`).join(' and ')} chunk`, {
      reason: 'missing-chunk',
      byteLength: len,
      missing,
    });
  }

  return Object.freeze({
    ...format,
    dataOffset,
    dataLength: resolveDataLength(declaredDataLength, len - dataOffset),
    declaredDataLength,
  });
}
