import {
  BatteryName,
  CheckOutcome,
  ClassificationReport,
  FeatureVector,
  VoiceLabel,
} from '../types';
import { clamp, roundTo } from '../dsp/stats';
import { batteryChecks, HeuristicCheck } from './checks';
import { languageFactor } from './languages';

export const DECISION_THRESHOLD = 0.5;

/**
 * Weighted threshold scorer. The raw score is the satisfied weight over the
 * evaluated weight, scaled by the language factor; at or above 0.5 the voice
 * is labelled AI_GENERATED.
 */
export class HeuristicClassifier {
  private readonly checks: HeuristicCheck[];

  constructor(readonly battery: BatteryName = 'full') {
    this.checks = batteryChecks(battery);
  }

  classify(features: FeatureVector, language: string): ClassificationReport {
    const outcomes: CheckOutcome[] = this.checks.map((check) => ({
      id: check.id,
      description: check.description,
      weight: check.weight,
      satisfied: check.test(features),
    }));

    let satisfiedWeight = 0;
    let totalWeight = 0;
    for (const outcome of outcomes) {
      totalWeight += outcome.weight;
      if (outcome.satisfied) satisfiedWeight += outcome.weight;
    }

    const rawConfidence = totalWeight > 0 ? satisfiedWeight / totalWeight : 0;
    const factor = languageFactor(language);
    const adjustedConfidence = rawConfidence * factor;

    let label: VoiceLabel;
    let confidence: number;
    if (adjustedConfidence >= DECISION_THRESHOLD) {
      label = VoiceLabel.AI_GENERATED;
      confidence = Math.min(adjustedConfidence, 1.0);
    } else {
      label = VoiceLabel.HUMAN;
      confidence = Math.min(1.0 - adjustedConfidence, 1.0);
    }

    return {
      label,
      confidence: roundTo(clamp(confidence, 0, 1), 4),
      battery: this.battery,
      rawConfidence,
      adjustedConfidence,
      languageFactor: factor,
      checks: outcomes,
    };
  }
}
