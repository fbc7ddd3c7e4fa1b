/** Clamps to the closed interval [-1, 1]. */
export function clampUnit(value: number): number {
  return value < -1 ? -1 : value > 1 ? 1 : value;
}

/**
 * RMS of `values[start:end)` carrying the sign of the range's mean polarity.
 *
 * Each sample contributes `Math.sign(s)` to the polarity, so a range that is as often positive as negative
 * yields exactly 0 whatever its energy. An empty range yields 0.
 */
export function signedRms(values: ArrayLike<number>, start = 0, end = values.length): number {
  const count = end - start;
  if (count <= 0) return 0;

  let sum = 0;
  let signSum = 0;
  for (let i = start; i < end; i++) {
    const s = values[i]!;
    sum += s * s;
    signSum += Math.sign(s);
  }

  const rms = Math.sqrt(sum / count);
  return rms * Math.sign(signSum / count);
}
