import type { ReduceStreamingOptions, SampleSource } from '../types';
import { signedRms } from '../utils/math';
import { assertTargetLength, bucketEnd } from './buckets';

function assertLengthHint(totalLengthHint: number): void {
  if (!Number.isInteger(totalLengthHint) || totalLengthHint < 0) {
    throw new RangeError(`totalLengthHint must be a non-negative integer (got ${totalLengthHint})`);
  }
}

/**
 * Incremental form of `reduceBatch`.
 *
 * Bucket boundaries are derived from `totalLengthHint`, so when the hint equals the number of samples the
 * source yields, the emitted points are identical to `reduceBatch(samples, targetLength)`. Only the bucket
 * being filled is held in memory.
 *
 * The hint is a precondition, not a guess that gets corrected: a shorter source simply ends early, and samples
 * beyond the hint are grouped into further buckets of the same width, producing more than `targetLength` points.
 *
 * When `totalLengthHint <= targetLength` every sample is passed through as its own point.
 */
export async function* reduceStreaming(
  source: SampleSource<number>,
  targetLength: number,
  totalLengthHint: number,
  options: ReduceStreamingOptions = {}
): AsyncGenerator<number, void, undefined> {
  assertTargetLength(targetLength);
  assertLengthHint(totalLengthHint);
  const { signal } = options;

  if (totalLengthHint <= targetLength) {
    for await (const sample of source) {
      if (signal?.aborted) return;
      yield sample;
    }
    return;
  }

  const total = totalLengthHint;
  const ratio = total / targetLength;
  const bucket: number[] = [];
  let current = 0;
  let currentEnd = bucketEnd(0, ratio, total);
  let index = 0;

  for await (const sample of source) {
    if (signal?.aborted) return;
    const i = index++;

    if (i < total) {
      if (i >= currentEnd) {
        // close every bucket that ends at or before this sample; empty ones reduce to 0 as in reduceBatch
        while (current < targetLength && i >= currentEnd) {
          yield signedRms(bucket);
          bucket.length = 0;
          current++;
          currentEnd = bucketEnd(current, ratio, total);
        }
      }
      // past the last boundary floor((T * ratio)) can fall one short of `total`; reduceBatch skips that sample too
      if (current < targetLength) bucket.push(sample);
      continue;
    }

    const overflowBucket = targetLength + Math.floor((i - total) / ratio);
    if (overflowBucket !== current) {
      if (bucket.length > 0) {
        yield signedRms(bucket);
        bucket.length = 0;
      }
      current = overflowBucket;
    }
    bucket.push(sample);
  }

  if (bucket.length > 0) {
    yield signedRms(bucket);
  }
}
