import { signedRms } from '../utils/math';
import { assertTargetLength, bucketEnd, bucketStart } from './buckets';

/**
 * Reduces `samples` to `targetLength` points, one per bucket of consecutive samples.
 *
 * Each point is the bucket's RMS carrying the sign of its mean polarity (see `signedRms`).
 * When there are no more samples than points the input array itself is returned.
 */
export function reduceBatch(samples: readonly number[], targetLength: number): readonly number[] {
  assertTargetLength(targetLength);
  const length = samples.length;
  if (length <= targetLength) return samples;

  const ratio = length / targetLength;
  const points = new Array<number>(targetLength);
  for (let i = 0; i < targetLength; i++) {
    points[i] = signedRms(samples, bucketStart(i, ratio), bucketEnd(i, ratio, length));
  }
  return points;
}
