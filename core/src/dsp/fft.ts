/**
 * Radix-2 FFT for the STFT. Every frame of a spectrogram has the same length,
 * so the bit-reversed order and twiddle factors are built once per size.
 */

export function nextPow2(n: number): number {
  let p = 1;
  while (p < n) p <<= 1;
  return p;
}

export class FftPlan {
  readonly size: number;
  private readonly reversed: Uint32Array;
  private readonly cosTable: Float64Array;
  private readonly sinTable: Float64Array;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1 || (size & (size - 1)) !== 0) {
      throw new RangeError(`FFT length must be a power of 2, got ${size}`);
    }
    this.size = size;

    const bits = Math.round(Math.log2(size));
    this.reversed = new Uint32Array(size);
    for (let i = 0; i < size; i++) {
      let r = 0;
      for (let b = 0; b < bits; b++) r = (r << 1) | ((i >> b) & 1);
      this.reversed[i] = r;
    }

    const half = size >> 1;
    this.cosTable = new Float64Array(half);
    this.sinTable = new Float64Array(half);
    for (let k = 0; k < half; k++) {
      const angle = (-2 * Math.PI * k) / size;
      this.cosTable[k] = Math.cos(angle);
      this.sinTable[k] = Math.sin(angle);
    }
  }

  /** In-place forward transform of one frame. */
  transform(re: Float64Array, im: Float64Array): void {
    const n = this.size;
    if (re.length !== n || im.length !== n) {
      throw new RangeError(`FFT plan of size ${n} given ${re.length} real and ${im.length} imaginary values`);
    }

    for (let i = 0; i < n; i++) {
      const j = this.reversed[i];
      if (i < j) {
        let tmp = re[i]; re[i] = re[j]; re[j] = tmp;
        tmp = im[i]; im[i] = im[j]; im[j] = tmp;
      }
    }

    for (let len = 2; len <= n; len <<= 1) {
      const half = len >> 1;
      const stride = n / len; // twiddle k of this stage is entry k·stride
      for (let start = 0; start < n; start += len) {
        for (let k = 0; k < half; k++) {
          const wRe = this.cosTable[k * stride];
          const wIm = this.sinTable[k * stride];
          const a = start + k;
          const b = a + half;
          const tRe = wRe * re[b] - wIm * im[b];
          const tIm = wRe * im[b] + wIm * re[b];
          re[b] = re[a] - tRe;
          im[b] = im[a] - tIm;
          re[a] += tRe;
          im[a] += tIm;
        }
      }
    }
  }
}

const plans = new Map<number, FftPlan>();

/** Shared plan for `size`, built on first use. */
export function fftPlan(size: number): FftPlan {
  let plan = plans.get(size);
  if (!plan) {
    plan = new FftPlan(size);
    plans.set(size, plan);
  }
  return plan;
}

/** One-off in-place FFT; the length must be a power of 2. */
export function fft1d(re: Float64Array, im: Float64Array): void {
  if (re.length <= 1) return;
  fftPlan(re.length).transform(re, im);
}
