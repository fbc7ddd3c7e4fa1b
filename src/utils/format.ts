import type { WaveHeader } from '../types';
import { getSampleCount } from '../core/WavDecoder';

/**
 * Playback length in seconds of the decodable sample region.
 */
export function getDuration(header: WaveHeader): number {
  if (header.sampleRateHz <= 0) return 0;
  return getSampleCount(header) / header.sampleRateHz;
}

const twoDigits = (n: number): string => n.toString().padStart(2, '0');

/**
 * Formats seconds as `mm:ss`. Hours are not shown; minutes wrap at 60.
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(total / 60) % 60;
  return `${twoDigits(minutes)}:${twoDigits(total % 60)}`;
}

const clampProgress = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Seek target in milliseconds for a progress fraction of the track.
 */
export function progressToMillis(durationSeconds: number, progress: number): number {
  return Math.round(durationSeconds * 1000 * clampProgress(progress));
}

/**
 * Fraction of the track played so far, 0 when the duration is unknown.
 */
export function playbackProgress(positionMs: number, durationMs: number): number {
  if (durationMs <= 0) return 0;
  return clampProgress(positionMs / durationMs);
}
