/**
 * Time-domain frame statistics: zero-crossing rate and RMS energy.
 */

/** Fraction of sign changes across the frame; zero counts as positive. */
export function zeroCrossingRate(frame: Float64Array): number {
  if (frame.length === 0) return 0;
  let crossings = 0;
  for (let i = 1; i < frame.length; i++) {
    if ((frame[i] >= 0) !== (frame[i - 1] >= 0)) crossings++;
  }
  return crossings / frame.length;
}

export function rootMeanSquare(frame: Float64Array): number {
  if (frame.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < frame.length; i++) sum += frame[i] * frame[i];
  return Math.sqrt(sum / frame.length);
}
