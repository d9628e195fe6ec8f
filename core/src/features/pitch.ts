import { Spectrogram } from '../dsp/spectrogram';
import { max, mean, min, std } from '../dsp/stats';

export interface PitchTrackOptions {
  fMin: number;
  fMax: number;
  /** Peaks below this fraction of the frame maximum are ignored. */
  threshold: number;
  maxFrames: number;
}

export const DEFAULT_PITCH_OPTIONS: PitchTrackOptions = {
  fMin: 150,
  fMax: 4000,
  threshold: 0.1,
  maxFrames: 100,
};

/**
 * Dominant pitch of one frame, or 0 when the frame has no qualifying peak.
 *
 * Candidates are local maxima inside [fMin, fMax] above `threshold` × frame
 * maximum. Each candidate is refined by parabolic interpolation over its
 * neighbours and the one with the largest interpolated magnitude wins.
 */
export function framePitch(
  mag: Float64Array,
  freqs: Float64Array,
  nFft: number,
  sampleRate: number,
  options: PitchTrackOptions
): number {
  const ref = options.threshold * max(mag);
  let bestMag = 0;
  let bestPitch = 0;

  for (let k = 1; k < mag.length - 1; k++) {
    if (freqs[k] < options.fMin || freqs[k] >= options.fMax) continue;
    const s = mag[k];
    if (!(s > ref && s > mag[k - 1] && s >= mag[k + 1])) continue;

    const avg = 0.5 * (mag[k + 1] - mag[k - 1]);
    let curvature = 2 * s - mag[k + 1] - mag[k - 1];
    if (Math.abs(curvature) < Number.EPSILON) curvature = 1;
    const shift = avg / curvature;
    const peakMag = s + 0.5 * avg * shift;

    if (peakMag > bestMag) {
      bestMag = peakMag;
      bestPitch = ((k + shift) * sampleRate) / nFft;
    }
  }
  return bestPitch;
}

export interface PitchStats {
  mean: number;
  std: number;
  range: number;
  voicedFrames: number;
}

/** Pitch statistics over the voiced frames among the first `maxFrames`. */
export function pitchStats(spec: Spectrogram, options: PitchTrackOptions = DEFAULT_PITCH_OPTIONS): PitchStats {
  const voiced: number[] = [];
  const limit = Math.min(spec.nFrames, options.maxFrames);
  for (let t = 0; t < limit; t++) {
    const pitch = framePitch(spec.magnitudes[t], spec.freqs, spec.nFft, spec.sampleRate, options);
    if (pitch > 0) voiced.push(pitch);
  }

  if (voiced.length === 0) {
    return { mean: 0, std: 0, range: 0, voicedFrames: 0 };
  }
  return {
    mean: mean(voiced),
    std: std(voiced),
    range: max(voiced) - min(voiced),
    voicedFrames: voiced.length,
  };
}
