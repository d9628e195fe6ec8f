import path from 'path';
import chalk from 'chalk';
import {
  AnalysisResult,
  CheckOutcome,
  LANGUAGE_FACTORS,
  SUPPORTED_LANGUAGES,
  VoiceLabel,
} from '@voicecheck/core';

const RULE = '='.repeat(60);

function labelColor(label: VoiceLabel) {
  switch (label) {
    case VoiceLabel.AI_GENERATED:
      return chalk.red.bold;
    case VoiceLabel.HUMAN:
      return chalk.green.bold;
    default:
      return chalk.gray;
  }
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

function formatCheck(check: CheckOutcome): string {
  const icon = check.satisfied ? chalk.red('●') : chalk.green('○');
  return `  ${icon} [${check.id}] ${check.description} ${chalk.gray(`(weight ${check.weight})`)}`;
}

export function formatFeature(value: unknown): string {
  if (typeof value === 'number') return value.toFixed(4);
  if (Array.isArray(value)) {
    return `[${value.map((v: unknown) => (typeof v === 'number' ? v.toFixed(2) : String(v))).join(', ')}]`;
  }
  return String(value);
}

/** Human-readable detection report, one entry per output line. */
export function renderReport(file: string, analysis: AnalysisResult, verbose = false): string[] {
  const { signal, report, features } = analysis;
  const lines: string[] = [];

  lines.push('', chalk.bold(RULE), chalk.bold('  Voice Detection Report'), chalk.bold(RULE), '');
  lines.push(`${chalk.gray('File:')} ${path.resolve(file)}`);
  lines.push(`${chalk.gray('Result:')} ${labelColor(report.label)(report.label)}`);
  lines.push(`${chalk.gray('Confidence:')} ${formatPercent(report.confidence)}`);
  lines.push(`${chalk.gray('Battery:')} ${report.battery}`);
  lines.push(
    `${chalk.gray('Audio:')} ${signal.durationSeconds.toFixed(2)}s @ ${signal.sampleRate} Hz`
  );

  if (verbose) {
    const satisfied = report.checks.filter((c) => c.satisfied).length;
    lines.push('', chalk.bold(`Checks (${satisfied}/${report.checks.length} indicate synthetic speech):`));
    report.checks.forEach((check) => lines.push(formatCheck(check)));

    lines.push('', chalk.bold('Scoring:'));
    lines.push(`${chalk.gray('  Raw confidence:')} ${report.rawConfidence.toFixed(4)}`);
    lines.push(`${chalk.gray('  Language factor:')} ${report.languageFactor}`);
    lines.push(`${chalk.gray('  Adjusted confidence:')} ${report.adjustedConfidence.toFixed(4)}`);

    lines.push('', chalk.bold('Features:'));
    Object.entries(features).forEach(([key, value]) => {
      lines.push(chalk.gray(`  ${key}: ${formatFeature(value)}`));
    });
  }

  lines.push('', chalk.bold(RULE), '');
  return lines;
}

export function renderLanguages(): string[] {
  return SUPPORTED_LANGUAGES.map(
    (language) => `${language.padEnd(12)}${LANGUAGE_FACTORS[language].toFixed(2)}`
  );
}
