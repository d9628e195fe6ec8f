/**
 * Frame-wise magnitude-spectrum shape descriptors.
 *
 * Every function takes one frame's magnitude spectrum together with the bin
 * centre frequencies and returns a scalar. Zero-energy frames map to 0.
 */
import { Spectrogram } from '../dsp/spectrogram';

export function spectralCentroid(mag: Float64Array, freqs: Float64Array): number {
  let weighted = 0;
  let total = 0;
  for (let k = 0; k < mag.length; k++) {
    weighted += freqs[k] * mag[k];
    total += mag[k];
  }
  return total > 0 ? weighted / total : 0;
}

export function spectralRolloff(mag: Float64Array, freqs: Float64Array, rollPercent = 0.85): number {
  let total = 0;
  for (let k = 0; k < mag.length; k++) total += mag[k];
  if (total <= 0) return 0;

  const threshold = rollPercent * total;
  let cumulative = 0;
  for (let k = 0; k < mag.length; k++) {
    cumulative += mag[k];
    if (cumulative >= threshold) return freqs[k];
  }
  return freqs[freqs.length - 1];
}

export function spectralBandwidth(mag: Float64Array, freqs: Float64Array): number {
  let total = 0;
  for (let k = 0; k < mag.length; k++) total += mag[k];
  if (total <= 0) return 0;

  const centroid = spectralCentroid(mag, freqs);
  let acc = 0;
  for (let k = 0; k < mag.length; k++) {
    const d = freqs[k] - centroid;
    acc += (mag[k] / total) * d * d;
  }
  return Math.sqrt(acc);
}

/** Geometric over arithmetic mean of the power spectrum. */
export function spectralFlatness(mag: Float64Array, amin = 1e-10): number {
  let logSum = 0;
  let sum = 0;
  for (let k = 0; k < mag.length; k++) {
    const p = Math.max(amin, mag[k] * mag[k]);
    logSum += Math.log(p);
    sum += p;
  }
  const n = mag.length;
  return Math.exp(logSum / n) / (sum / n);
}

// ---------------------------------------------------------------------------
// Spectral contrast
// ---------------------------------------------------------------------------

export interface ContrastOptions {
  nBands: number;
  fMin: number;
  quantile: number;
}

const DEFAULT_CONTRAST: ContrastOptions = { nBands: 6, fMin: 200, quantile: 0.02 };

/**
 * Bin index ranges of the octave sub-bands: [0, fMin), [fMin, 2·fMin), …,
 * with the last band running to Nyquist.
 */
export function octaveBands(freqs: Float64Array, options: ContrastOptions = DEFAULT_CONTRAST): Array<[number, number]> {
  const edges: number[] = [0];
  for (let k = 0; k <= options.nBands; k++) edges.push(options.fMin * Math.pow(2, k));

  const bands: Array<[number, number]> = [];
  for (let b = 0; b <= options.nBands; b++) {
    const lo = edges[b];
    const hi = b === options.nBands ? Infinity : edges[b + 1];
    let start = -1;
    let end = -1;
    for (let k = 0; k < freqs.length; k++) {
      if (freqs[k] >= lo && freqs[k] < hi) {
        if (start < 0) start = k;
        end = k + 1;
      }
    }
    if (start >= 0) bands.push([start, end]);
  }
  return bands;
}

const toDb = (power: number): number => 10 * Math.log10(Math.max(1e-10, power));

/** Mean peak-to-valley contrast (dB) over the octave sub-bands of one frame. */
export function spectralContrast(
  mag: Float64Array,
  bands: Array<[number, number]>,
  quantile = DEFAULT_CONTRAST.quantile
): number {
  if (bands.length === 0) return 0;
  let acc = 0;
  for (const [start, end] of bands) {
    const sorted = Array.from(mag.subarray(start, end)).sort((a, b) => a - b);
    const idx = Math.max(1, Math.round(quantile * sorted.length));
    let valley = 0;
    let peak = 0;
    for (let i = 0; i < idx; i++) {
      valley += sorted[i];
      peak += sorted[sorted.length - 1 - i];
    }
    acc += toDb(peak / idx) - toDb(valley / idx);
  }
  return acc / bands.length;
}

// ---------------------------------------------------------------------------
// Chroma
// ---------------------------------------------------------------------------

/** Pitch class (C = 0) of every bin; -1 for bins below 20 Hz. */
export function chromaBins(freqs: Float64Array, tuningHz = 440): Int32Array {
  const classes = new Int32Array(freqs.length);
  for (let k = 0; k < freqs.length; k++) {
    if (freqs[k] < 20) {
      classes[k] = -1;
      continue;
    }
    const semitonesFromA = Math.round(12 * Math.log2(freqs[k] / tuningHz));
    classes[k] = (((semitonesFromA + 9) % 12) + 12) % 12;
  }
  return classes;
}

/** Mean of per-frame, max-normalised 12-bin pitch-class energy. */
export function chromaMean(spec: Spectrogram): number {
  const classes = chromaBins(spec.freqs);
  let acc = 0;
  for (const mag of spec.magnitudes) {
    const chroma = new Float64Array(12);
    for (let k = 0; k < mag.length; k++) {
      if (classes[k] >= 0) chroma[classes[k]] += mag[k] * mag[k];
    }
    let peak = 0;
    for (let c = 0; c < 12; c++) if (chroma[c] > peak) peak = chroma[c];
    if (peak > 0) {
      for (let c = 0; c < 12; c++) acc += chroma[c] / peak;
    }
  }
  return acc / (12 * spec.nFrames);
}
