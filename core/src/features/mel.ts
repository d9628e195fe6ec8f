import {
  Spectrogram,
  applyFilterbank,
  dctOrtho,
  melFilterbank,
  powerSpectrum,
} from '../dsp/spectrogram';
import { mean, std } from '../dsp/stats';

/** Mel power spectrogram, one row of `nMels` bands per frame. */
export function melSpectrogram(spec: Spectrogram, nMels: number): Float64Array[] {
  const fb = melFilterbank(spec.freqs, spec.sampleRate, nMels);
  return applyFilterbank(powerSpectrum(spec), fb);
}

export interface MfccStats {
  mean: number[];
  std: number[];
}

/** Per-coefficient mean and std of the first `nMfcc` cepstral coefficients. */
export function mfccStats(melDb: Float64Array[], nMfcc: number): MfccStats {
  const coeffs = melDb.map((row) => dctOrtho(row, nMfcc));
  const meanOut: number[] = [];
  const stdOut: number[] = [];
  for (let c = 0; c < nMfcc; c++) {
    const track = coeffs.map((frame) => frame[c]);
    meanOut.push(mean(track));
    stdOut.push(std(track));
  }
  return { mean: meanOut, std: stdOut };
}

/** Mean and std over every cell of the mel power spectrogram. */
export function melStats(mel: Float64Array[]): { mean: number; std: number } {
  const cells: number[] = [];
  for (const row of mel) for (let i = 0; i < row.length; i++) cells.push(row[i]);
  return { mean: mean(cells), std: std(cells) };
}

/**
 * Spectral-flux onset envelope: mean over mel bands of the positive dB
 * increase from the previous frame. The first frame has no predecessor and
 * contributes 0.
 */
export function onsetEnvelope(melDb: Float64Array[]): Float64Array {
  const env = new Float64Array(melDb.length);
  for (let t = 1; t < melDb.length; t++) {
    const cur = melDb[t];
    const prev = melDb[t - 1];
    let acc = 0;
    for (let m = 0; m < cur.length; m++) acc += Math.max(0, cur[m] - prev[m]);
    env[t] = acc / cur.length;
  }
  return env;
}
