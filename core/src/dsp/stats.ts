/**
 * Statistical helpers for frame-wise feature reduction.
 */

export type NumericArray = Float64Array | readonly number[];

export function mean(arr: NumericArray): number {
  const len = arr.length;
  if (len === 0) return 0;
  let sum = 0;
  for (let i = 0; i < len; i++) sum += arr[i];
  return sum / len;
}

/** Population variance (divides by N). */
export function variance(arr: NumericArray): number {
  const len = arr.length;
  if (len === 0) return 0;
  const m = mean(arr);
  let sum = 0;
  for (let i = 0; i < len; i++) {
    const d = arr[i] - m;
    sum += d * d;
  }
  return sum / len;
}

export function std(arr: NumericArray): number {
  return Math.sqrt(variance(arr));
}

export function max(arr: NumericArray): number {
  let mx = -Infinity;
  for (let i = 0; i < arr.length; i++) if (arr[i] > mx) mx = arr[i];
  return mx;
}

export function min(arr: NumericArray): number {
  let mn = Infinity;
  for (let i = 0; i < arr.length; i++) if (arr[i] < mn) mn = arr[i];
  return mn;
}

export function clamp(val: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, val));
}

export function roundTo(val: number, digits: number): number {
  const scale = Math.pow(10, digits);
  return Math.round(val * scale) / scale;
}
