import type { WavFormatTag } from '../types';

export type WavErrorCode = 'MALFORMED_HEADER' | 'UNSUPPORTED_FORMAT';

export type MalformedHeaderReason = 'too-small' | 'bad-riff-tag' | 'bad-wave-tag' | 'missing-chunk';

/**
 * Base class of every error the decoder throws on bad input.
 */
export abstract class WavError extends Error {
  public abstract readonly code: WavErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface MalformedHeaderDetails {
  reason: MalformedHeaderReason;
  /** Length of the rejected buffer. */
  byteLength: number;
  /** The four characters read where a tag was expected. */
  found?: string;
  /** Required chunks the scan never reached. */
  missing?: ('fmt ' | 'data')[];
}

/**
 * The buffer is not a readable RIFF/WAVE container. Not retryable.
 */
export class MalformedHeaderError extends WavError {
  public readonly code = 'MALFORMED_HEADER' as const;
  public readonly reason: MalformedHeaderReason;
  public readonly byteLength: number;
  public readonly found?: string;
  public readonly missing?: ('fmt ' | 'data')[];

  constructor(message: string, details: MalformedHeaderDetails) {
    super(message);
    this.reason = details.reason;
    this.byteLength = details.byteLength;
    this.found = details.found;
    this.missing = details.missing;
  }
}

export interface UnsupportedFormatDetails {
  formatTag: WavFormatTag;
  bitsPerSample: number;
  channelCount: number;
}

/**
 * A valid container whose sample layout cannot be decoded. Not retryable.
 */
export class UnsupportedFormatError extends WavError {
  public readonly code = 'UNSUPPORTED_FORMAT' as const;
  public readonly formatTag: WavFormatTag;
  public readonly bitsPerSample: number;
  public readonly channelCount: number;

  constructor(message: string, details: UnsupportedFormatDetails) {
    super(message);
    this.formatTag = details.formatTag;
    this.bitsPerSample = details.bitsPerSample;
    this.channelCount = details.channelCount;
  }
}

export function isWavError(value: unknown): value is MalformedHeaderError | UnsupportedFormatError {
  return value instanceof MalformedHeaderError || value instanceof UnsupportedFormatError;
}
