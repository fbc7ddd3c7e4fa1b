export { parseHeader } from './utils/parseWavHeader';
export { decodeSamples, decodeWav, getDeclaredSampleCount, getSampleCount } from './core/WavDecoder';
export { WavStreamDecoder, decodeStream, type WavStreamDecoderInfo } from './core/WavStreamDecoder';
export { DecoderState } from './core/StateMachine';
export {
  WavError,
  MalformedHeaderError,
  UnsupportedFormatError,
  isWavError,
  type MalformedHeaderReason,
  type WavErrorCode,
} from './core/errors';
export { PCM_FORMATS, isSupportedBitDepth, resolveSampleFormat } from './decoders';
export { reduceBatch } from './waveform/reduceBatch';
export { reduceStreaming } from './waveform/reduceStreaming';
export { processWav, streamWaveform } from './waveform/pipeline';
export { signedRms } from './utils/math';
export { formatDuration, getDuration, playbackProgress, progressToMillis } from './utils/format';
export { DEFAULT_CHUNK_SIZE, DEFAULT_TARGET_LENGTH, WAVE_FORMAT_EXTENSIBLE, WAVE_FORMAT_PCM } from './constants';
export type {
  DecodeError,
  DecodedWav,
  PcmSampleFormat,
  ProcessOptions,
  ReduceStreamingOptions,
  SampleReader,
  SampleSource,
  StreamDecoderOptions,
  StreamWaveformOptions,
  WavBitDepth,
  WavFormatTag,
  WavSampleRate,
  WaveHeader,
} from './types';
