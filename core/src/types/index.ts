export const SUPPORTED_LANGUAGES = ['tamil', 'english', 'hindi', 'malayalam', 'telugu'] as const;

export type Language = typeof SUPPORTED_LANGUAGES[number];

export enum VoiceLabel {
  AI_GENERATED = 'AI_GENERATED',
  HUMAN = 'HUMAN'
}

export type BatteryName = 'full' | 'lean' | 'core' | 'minimal';

export interface AudioSignal {
  samples: Float64Array; // mono, in [-1, 1]
  sampleRate: number;
}

export interface FeatureVector {
  readonly spectralCentroidMean: number;
  readonly spectralCentroidStd: number;
  readonly spectralRolloffMean: number;
  readonly spectralBandwidthMean: number;
  readonly spectralContrastMean: number;
  readonly spectralFlatnessMean: number;
  readonly spectralFlatnessStd: number;
  readonly mfccMean: readonly number[];
  readonly mfccStd: readonly number[];
  readonly zcrMean: number;
  readonly zcrStd: number;
  readonly rmsMean: number;
  readonly rmsStd: number;
  readonly pitchMean: number;
  readonly pitchStd: number;
  readonly pitchRange: number;
  readonly onsetStrengthMean: number;
  readonly chromaMean: number;
  readonly melSpecMean: number;
  readonly melSpecStd: number;
}

export interface Classification {
  label: VoiceLabel;
  confidence: number;
}

export interface CheckOutcome {
  id: number;
  description: string;
  weight: number;
  satisfied: boolean;
}

export interface ClassificationReport extends Classification {
  battery: BatteryName;
  rawConfidence: number;
  adjustedConfidence: number;
  languageFactor: number;
  checks: CheckOutcome[];
}

export interface DetectionMetadata {
  audioSizeBytes: number;
  featuresExtracted: number;
  modelVersion: string;
  sampleRate: number;
  durationSeconds: number;
  battery: BatteryName;
}

export interface DetectionResult {
  status: 'success';
  result: VoiceLabel;
  confidence: number;
  language: Language;
  timestamp: string;
  metadata: DetectionMetadata;
}

export interface DecodeOptions {
  maxDurationSeconds: number;
  targetSampleRate?: number;
}

export interface AudioDecoder {
  decode(bytes: Uint8Array, options: DecodeOptions): AudioSignal;
}
