import { BatteryName, FeatureVector } from '../types';
import { mean } from '../dsp/stats';

export interface HeuristicCheck {
  id: number;
  description: string;
  weight: number;
  test(features: FeatureVector): boolean;
}

/**
 * The synthetic-voice indicators. Thresholds and weights are the whole
 * scoring model; they must not drift.
 */
export const CHECKS: readonly HeuristicCheck[] = Object.freeze([
  {
    id: 1,
    description: 'spectral centroid std < 200',
    weight: 1.0,
    test: (f: FeatureVector) => f.spectralCentroidStd < 200,
  },
  {
    id: 2,
    description: 'mean MFCC std < 15',
    weight: 1.0,
    test: (f: FeatureVector) => mean(f.mfccStd) < 15,
  },
  {
    id: 3,
    description: 'zero-crossing rate std < 0.02',
    weight: 1.0,
    test: (f: FeatureVector) => f.zcrStd < 0.02,
  },
  {
    id: 4,
    description: 'pitch std < 20 with voiced pitch',
    weight: 1.0,
    test: (f: FeatureVector) => f.pitchStd < 20 && f.pitchMean > 0,
  },
  {
    id: 5,
    description: 'spectral flatness mean > 0.3 or std < 0.05',
    weight: 0.5,
    test: (f: FeatureVector) => f.spectralFlatnessMean > 0.3 || f.spectralFlatnessStd < 0.05,
  },
  {
    id: 6,
    description: 'rms std < 0.01',
    weight: 0.5,
    test: (f: FeatureVector) => f.rmsStd < 0.01,
  },
  {
    id: 7,
    description: 'spectral contrast mean > 25',
    weight: 0.5,
    test: (f: FeatureVector) => f.spectralContrastMean > 25,
  },
  {
    id: 8,
    description: 'mel spectrogram std < 5',
    weight: 0.5,
    test: (f: FeatureVector) => f.melSpecStd < 5,
  },
  {
    id: 9,
    description: 'pitch range < 50 with voiced pitch',
    weight: 0.5,
    test: (f: FeatureVector) => f.pitchRange < 50 && f.pitchMean > 0,
  },
]);

/** Check ids evaluated by each named battery. */
export const BATTERIES: Readonly<Record<BatteryName, readonly number[]>> = Object.freeze({
  full: Object.freeze([1, 2, 3, 4, 5, 6, 7, 8, 9]),
  lean: Object.freeze([1, 2, 3, 4, 6, 9]),
  core: Object.freeze([1, 2, 3, 4]),
  minimal: Object.freeze([1, 2, 3]),
});

export function batteryChecks(battery: BatteryName): HeuristicCheck[] {
  const ids = BATTERIES[battery];
  return CHECKS.filter((check) => ids.includes(check.id));
}
