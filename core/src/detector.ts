import {
  AudioSignal,
  ClassificationReport,
  DetectionResult,
  FeatureVector,
  Language,
} from './types';
import { DetectorConfig, DetectorOptions, resolveConfig } from './config';
import { FeatureExtractor } from './features/extractor';
import { HeuristicClassifier } from './classifier/heuristic';

export interface SignalSummary {
  sampleRate: number;
  sampleCount: number;
  durationSeconds: number;
}

export interface AnalysisResult {
  signal: SignalSummary;
  features: FeatureVector;
  report: ClassificationReport;
}

/**
 * Decode → extract → classify. Stateless apart from its frozen
 * configuration, so one instance can serve any number of calls.
 */
export class VoiceDetector {
  readonly config: Readonly<DetectorConfig>;
  private readonly extractor: FeatureExtractor;
  private readonly classifier: HeuristicClassifier;

  constructor(options: DetectorOptions = {}) {
    this.config = resolveConfig(options);
    this.extractor = new FeatureExtractor(
      { mfccCount: this.config.mfccCount, maxPitchFrames: this.config.maxPitchFrames },
      this.config.logger
    );
    this.classifier = new HeuristicClassifier(this.config.battery);
  }

  /**
   * Decode encoded audio bytes with the configured decoder, analysis window
   * and sample rate.
   * @throws DecodeError, EmptyAudioError
   */
  decode(bytes: Uint8Array): AudioSignal {
    const signal = this.config.decoder.decode(bytes, {
      maxDurationSeconds: this.config.maxDurationSeconds,
      targetSampleRate: this.config.targetSampleRate,
    });
    this.config.logger.debug(
      `Decoded ${signal.samples.length} samples @ ${signal.sampleRate} Hz from ${bytes.length} bytes`
    );
    return signal;
  }

  extractFeatures(signal: AudioSignal): FeatureVector {
    return this.extractor.extract(signal);
  }

  classify(features: FeatureVector, language: string): ClassificationReport {
    return this.classifier.classify(features, language);
  }

  analyze(bytes: Uint8Array, language: string): AnalysisResult {
    const signal = this.decode(bytes);
    const features = this.extractFeatures(signal);
    const report = this.classify(features, language);
    return {
      signal: {
        sampleRate: signal.sampleRate,
        sampleCount: signal.samples.length,
        durationSeconds: signal.samples.length / signal.sampleRate,
      },
      features,
      report,
    };
  }

  /**
   * Classify a recording and assemble the transport-facing result.
   */
  async detect(bytes: Uint8Array, language: Language): Promise<DetectionResult> {
    const { signal, features, report } = this.analyze(bytes, language);
    this.config.logger.info(`Detection result: ${report.label} with confidence ${report.confidence}`);

    return {
      status: 'success',
      result: report.label,
      confidence: report.confidence,
      language,
      timestamp: new Date().toISOString(),
      metadata: {
        audioSizeBytes: bytes.length,
        featuresExtracted: Object.keys(features).length,
        modelVersion: this.config.modelVersion,
        sampleRate: signal.sampleRate,
        durationSeconds: signal.durationSeconds,
        battery: report.battery,
      },
    };
  }
}
