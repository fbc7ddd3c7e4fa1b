/**
 * Validates a requested point count.
 * @throws {RangeError} unless `targetLength` is a positive integer.
 */
export function assertTargetLength(targetLength: number): void {
  if (!Number.isInteger(targetLength) || targetLength <= 0) {
    throw new RangeError(`targetLength must be a positive integer (got ${targetLength})`);
  }
}

/** First sample index of bucket `i`. */
export function bucketStart(i: number, ratio: number): number {
  return Math.floor(i * ratio);
}

/** One past the last sample index of bucket `i`, never beyond `total`. */
export function bucketEnd(i: number, ratio: number, total: number): number {
  return Math.min(Math.max(Math.floor((i + 1) * ratio), 0), total);
}
