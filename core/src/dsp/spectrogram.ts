import { fftPlan, nextPow2 } from './fft';

// ---------------------------------------------------------------------------
// Framing
// ---------------------------------------------------------------------------

/** Periodic Hann window of length `n`. */
export function hannWindow(n: number): Float64Array {
  const win = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    win[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / n);
  }
  return win;
}

/** Zero-pad `pad` samples on both sides so frame t is centred on sample t·hop. */
export function padCenter(samples: Float64Array, pad: number): Float64Array {
  const out = new Float64Array(samples.length + 2 * pad);
  out.set(samples, pad);
  return out;
}

export function frameCount(nSamples: number, hop: number): number {
  return 1 + Math.floor(nSamples / hop);
}

/**
 * Split a signal into centred, overlapping frames. Frames are views into a
 * single padded buffer and must not be mutated.
 */
export function centeredFrames(
  samples: Float64Array,
  frameLength: number,
  hop: number
): Float64Array[] {
  const padded = padCenter(samples, Math.floor(frameLength / 2));
  const n = frameCount(samples.length, hop);
  const frames: Float64Array[] = [];
  for (let t = 0; t < n; t++) {
    frames.push(padded.subarray(t * hop, t * hop + frameLength));
  }
  return frames;
}

// ---------------------------------------------------------------------------
// STFT
// ---------------------------------------------------------------------------

export interface Spectrogram {
  magnitudes: Float64Array[]; // one row per frame, one column per frequency bin
  freqs: Float64Array;
  nFrames: number;
  nBins: number;
  nFft: number;
  sampleRate: number;
}

export function stft(
  samples: Float64Array,
  sampleRate: number,
  nFft: number,
  hop: number
): Spectrogram {
  const fftSize = nextPow2(nFft);
  const nBins = Math.floor(fftSize / 2) + 1;
  const win = hannWindow(nFft);
  const plan = fftPlan(fftSize);
  const frames = centeredFrames(samples, nFft, hop);

  // Reused across all frames
  const re = new Float64Array(fftSize);
  const im = new Float64Array(fftSize);

  const magnitudes: Float64Array[] = [];
  for (const frame of frames) {
    re.fill(0);
    im.fill(0);
    for (let i = 0; i < nFft; i++) re[i] = frame[i] * win[i];
    plan.transform(re, im);

    const mag = new Float64Array(nBins);
    for (let f = 0; f < nBins; f++) {
      mag[f] = Math.sqrt(re[f] * re[f] + im[f] * im[f]);
    }
    magnitudes.push(mag);
  }

  const freqs = new Float64Array(nBins);
  for (let f = 0; f < nBins; f++) freqs[f] = (f * sampleRate) / fftSize;

  return { magnitudes, freqs, nFrames: frames.length, nBins, nFft: fftSize, sampleRate };
}

/** Element-wise square of each magnitude row. */
export function powerSpectrum(spec: Spectrogram): Float64Array[] {
  return spec.magnitudes.map((row) => row.map((v) => v * v));
}

// ---------------------------------------------------------------------------
// Mel filterbank
// ---------------------------------------------------------------------------

export const hzToMel = (hz: number): number => 2595.0 * Math.log10(1.0 + hz / 700.0);
export const melToHz = (mel: number): number => 700.0 * (Math.pow(10, mel / 2595.0) - 1.0);

/**
 * Triangular mel filters over the bins of `freqs`, each normalised to unit
 * area (2 / bandwidth in Hz).
 */
export function melFilterbank(
  freqs: Float64Array,
  sampleRate: number,
  nMels: number,
  fMin = 0,
  fMax = sampleRate / 2
): Float64Array[] {
  const lowMel = hzToMel(fMin);
  const highMel = hzToMel(fMax);
  const hzPoints = new Float64Array(nMels + 2);
  for (let i = 0; i < nMels + 2; i++) {
    hzPoints[i] = melToHz(lowMel + (i * (highMel - lowMel)) / (nMels + 1));
  }

  const fb: Float64Array[] = [];
  for (let m = 0; m < nMels; m++) {
    const left = hzPoints[m];
    const center = hzPoints[m + 1];
    const right = hzPoints[m + 2];
    const norm = 2.0 / (right - left);
    const row = new Float64Array(freqs.length);
    for (let k = 0; k < freqs.length; k++) {
      const f = freqs[k];
      const lower = (f - left) / (center - left);
      const upper = (right - f) / (right - center);
      row[k] = Math.max(0, Math.min(lower, upper)) * norm;
    }
    fb.push(row);
  }
  return fb;
}

/** Project power spectrum rows (per frame) onto mel bands. */
export function applyFilterbank(power: Float64Array[], fb: Float64Array[]): Float64Array[] {
  return power.map((row) => {
    const out = new Float64Array(fb.length);
    for (let m = 0; m < fb.length; m++) {
      const filter = fb[m];
      let sum = 0;
      for (let k = 0; k < row.length; k++) sum += filter[k] * row[k];
      out[m] = sum;
    }
    return out;
  });
}

// ---------------------------------------------------------------------------
// Decibels and DCT
// ---------------------------------------------------------------------------

/**
 * Convert power rows to dB relative to 1.0, floored at `amin` and clipped to
 * `topDb` below the global peak.
 */
export function powerToDb(rows: Float64Array[], amin = 1e-10, topDb = 80): Float64Array[] {
  let peak = -Infinity;
  const db = rows.map((row) => {
    const out = new Float64Array(row.length);
    for (let i = 0; i < row.length; i++) {
      out[i] = 10 * Math.log10(Math.max(amin, row[i]));
      if (out[i] > peak) peak = out[i];
    }
    return out;
  });
  const floor = peak - topDb;
  for (const row of db) {
    for (let i = 0; i < row.length; i++) {
      if (row[i] < floor) row[i] = floor;
    }
  }
  return db;
}

/** Orthonormal DCT-II, first `nCoeffs` coefficients. */
export function dctOrtho(input: Float64Array, nCoeffs: number): Float64Array {
  const n = input.length;
  const out = new Float64Array(nCoeffs);
  for (let k = 0; k < nCoeffs; k++) {
    let sum = 0;
    for (let i = 0; i < n; i++) {
      sum += input[i] * Math.cos((Math.PI * k * (2 * i + 1)) / (2 * n));
    }
    out[k] = sum * (k === 0 ? Math.sqrt(1 / n) : Math.sqrt(2 / n));
  }
  return out;
}
