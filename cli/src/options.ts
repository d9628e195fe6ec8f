import fs from 'fs-extra';
import chalk from 'chalk';
import {
  ConfigurationError,
  DetectorLogger,
  parseSettings,
  SettingsInput,
  VoiceCheckError,
} from '@voicecheck/core';

/** Flags shared by every command that runs the detector. */
export interface SettingsFlags {
  battery?: string;
  maxDuration?: string;
  sampleRate?: string;
  nativeRate?: boolean;
  mfcc?: string;
  config?: string;
  verbose?: boolean;
}

export function numberFlag(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

export function positiveIntegerFlag(flag: string, value: string): number {
  const parsed = numberFlag(flag, value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Merge a JSON config file (if given) with command-line flags. Flags win,
 * and the merged result is validated as a whole.
 */
export async function loadSettings(flags: SettingsFlags): Promise<SettingsInput> {
  let fileSettings: SettingsInput = {};
  if (flags.config) {
    if (!await fs.pathExists(flags.config)) {
      throw new ConfigurationError(`Config file not found: ${flags.config}`);
    }
    fileSettings = parseSettings(await fs.readJson(flags.config));
  }

  const overrides: Record<string, unknown> = {};
  if (flags.battery !== undefined) overrides.battery = flags.battery;
  if (flags.maxDuration !== undefined) {
    overrides.maxDurationSeconds = numberFlag('--max-duration', flags.maxDuration);
  }
  if (flags.nativeRate) {
    overrides.targetSampleRate = null;
  } else if (flags.sampleRate !== undefined) {
    overrides.targetSampleRate = numberFlag('--sample-rate', flags.sampleRate);
  }
  if (flags.mfcc !== undefined) overrides.mfccCount = numberFlag('--mfcc', flags.mfcc);

  return parseSettings({ ...fileSettings, ...overrides });
}

/** Logger writing to stderr so JSON on stdout stays parseable. */
export function createCliLogger(verbose = false): DetectorLogger {
  return {
    debug: (msg, ...args) => {
      if (verbose) console.error(chalk.gray(msg), ...args);
    },
    info: (msg, ...args) => {
      if (verbose) console.error(chalk.cyan(msg), ...args);
    },
    warn: (msg, ...args) => console.error(chalk.yellow(`⚠ ${msg}`), ...args),
    error: (msg, ...args) => console.error(chalk.red(`✖ ${msg}`), ...args),
  };
}

/** 2 when the input was at fault, 1 for everything else. */
export function exitCodeFor(error: unknown): number {
  return error instanceof VoiceCheckError && error.fault === 'client' ? 2 : 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
