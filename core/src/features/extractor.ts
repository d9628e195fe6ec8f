/**
 * Feature extraction: AudioSignal → FeatureVector.
 *
 * One magnitude spectrogram is computed per call; every feature group is then
 * derived independently. A group that throws or produces a non-finite value
 * is replaced by its default (zeros) and logged, so a partially degenerate
 * signal still yields a complete vector.
 */
import { AudioSignal, FeatureVector } from '../types';
import { FeatureComputationError } from '../errors';
import { DetectorLogger, silentLogger } from '../logger';
import { centeredFrames, powerToDb, Spectrogram, stft } from '../dsp/spectrogram';
import { mean, std } from '../dsp/stats';
import {
  chromaMean,
  octaveBands,
  spectralBandwidth,
  spectralCentroid,
  spectralContrast,
  spectralFlatness,
  spectralRolloff,
} from './spectral';
import { melSpectrogram, melStats, mfccStats, onsetEnvelope } from './mel';
import { rootMeanSquare, zeroCrossingRate } from './temporal';
import { DEFAULT_PITCH_OPTIONS, pitchStats } from './pitch';

export interface ExtractorOptions {
  mfccCount: number;
  maxPitchFrames: number;
  nFft: number;
  hopLength: number;
  nMels: number;
}

export const DEFAULT_EXTRACTOR_OPTIONS: Readonly<ExtractorOptions> = Object.freeze({
  mfccCount: 20,
  maxPitchFrames: 100,
  nFft: 2048,
  hopLength: 512,
  nMels: 128,
});

interface SpectralAnalysis {
  spec: Spectrogram;
  melPower: Float64Array[];
  melDb: Float64Array[];
}

type FeatureValue = FeatureVector[keyof FeatureVector];

function isFiniteValue(value: FeatureValue): boolean {
  return typeof value === 'number' ? Number.isFinite(value) : value.every(Number.isFinite);
}

export class FeatureExtractor {
  private readonly options: ExtractorOptions;

  constructor(
    options: Partial<ExtractorOptions> = {},
    private readonly logger: DetectorLogger = silentLogger
  ) {
    this.options = { ...DEFAULT_EXTRACTOR_OPTIONS, ...options };
  }

  extract(signal: AudioSignal): FeatureVector {
    const { samples, sampleRate } = signal;
    if (samples.length === 0) {
      throw new FeatureComputationError('Cannot extract features from an empty signal');
    }
    if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
      throw new FeatureComputationError(`Invalid sample rate: ${sampleRate}`);
    }

    const { nFft, hopLength, mfccCount } = this.options;
    const { spec, melPower, melDb } = this.analyze(signal);
    this.logger.debug(`Spectrogram: ${spec.nFrames} frames x ${spec.nBins} bins @ ${sampleRate} Hz`);

    const frameTrack = (fn: (mag: Float64Array) => number): number[] =>
      spec.magnitudes.map(fn);
    const zeros = (): number[] => new Array<number>(mfccCount).fill(0);

    const vector: FeatureVector = {
      ...this.group('spectral centroid', () => {
        const track = frameTrack((mag) => spectralCentroid(mag, spec.freqs));
        return { spectralCentroidMean: mean(track), spectralCentroidStd: std(track) };
      }, { spectralCentroidMean: 0, spectralCentroidStd: 0 }),

      ...this.group('spectral rolloff', () => ({
        spectralRolloffMean: mean(frameTrack((mag) => spectralRolloff(mag, spec.freqs))),
      }), { spectralRolloffMean: 0 }),

      ...this.group('spectral bandwidth', () => ({
        spectralBandwidthMean: mean(frameTrack((mag) => spectralBandwidth(mag, spec.freqs))),
      }), { spectralBandwidthMean: 0 }),

      ...this.group('spectral contrast', () => {
        const bands = octaveBands(spec.freqs);
        return { spectralContrastMean: mean(frameTrack((mag) => spectralContrast(mag, bands))) };
      }, { spectralContrastMean: 0 }),

      ...this.group('spectral flatness', () => {
        const track = frameTrack((mag) => spectralFlatness(mag));
        return { spectralFlatnessMean: mean(track), spectralFlatnessStd: std(track) };
      }, { spectralFlatnessMean: 0, spectralFlatnessStd: 0 }),

      ...this.group('mfcc', () => {
        const stats = mfccStats(melDb, mfccCount);
        return { mfccMean: stats.mean, mfccStd: stats.std };
      }, { mfccMean: zeros(), mfccStd: zeros() }),

      ...this.group('zero-crossing rate', () => {
        const track = centeredFrames(samples, nFft, hopLength).map(zeroCrossingRate);
        return { zcrMean: mean(track), zcrStd: std(track) };
      }, { zcrMean: 0, zcrStd: 0 }),

      ...this.group('rms energy', () => {
        const track = centeredFrames(samples, nFft, hopLength).map(rootMeanSquare);
        return { rmsMean: mean(track), rmsStd: std(track) };
      }, { rmsMean: 0, rmsStd: 0 }),

      ...this.group('pitch', () => {
        const stats = pitchStats(spec, { ...DEFAULT_PITCH_OPTIONS, maxFrames: this.options.maxPitchFrames });
        this.logger.debug(`Pitch: ${stats.voicedFrames} voiced frames`);
        return { pitchMean: stats.mean, pitchStd: stats.std, pitchRange: stats.range };
      }, { pitchMean: 0, pitchStd: 0, pitchRange: 0 }),

      ...this.group('onset strength', () => ({
        onsetStrengthMean: mean(onsetEnvelope(melDb)),
      }), { onsetStrengthMean: 0 }),

      ...this.group('chroma', () => ({ chromaMean: chromaMean(spec) }), { chromaMean: 0 }),

      ...this.group('mel spectrogram', () => {
        const stats = melStats(melPower);
        return { melSpecMean: stats.mean, melSpecStd: stats.std };
      }, { melSpecMean: 0, melSpecStd: 0 }),
    };

    return Object.freeze({
      ...vector,
      mfccMean: Object.freeze([...vector.mfccMean]),
      mfccStd: Object.freeze([...vector.mfccStd]),
    });
  }

  private analyze(signal: AudioSignal): SpectralAnalysis {
    const { nFft, hopLength, nMels } = this.options;
    try {
      const spec = stft(signal.samples, signal.sampleRate, nFft, hopLength);
      const melPower = melSpectrogram(spec, nMels);
      return { spec, melPower, melDb: powerToDb(melPower) };
    } catch (err) {
      throw new FeatureComputationError(`Spectral analysis failed: ${String(err)}`);
    }
  }

  /**
   * Run one feature group in isolation. Throws and non-finite outputs both
   * resolve to `fallback`.
   */
  private group<K extends keyof FeatureVector>(
    name: string,
    compute: () => Pick<FeatureVector, K>,
    fallback: Pick<FeatureVector, K>
  ): Pick<FeatureVector, K> {
    try {
      const result = compute();
      let finite = true;
      for (const key in result) {
        if (!isFiniteValue(result[key])) finite = false;
      }
      if (finite) return result;
      this.logger.warn(`Feature group "${name}" produced non-finite values; using defaults`);
    } catch (err) {
      this.logger.warn(`Feature group "${name}" failed; using defaults`, err);
    }
    return fallback;
  }
}
