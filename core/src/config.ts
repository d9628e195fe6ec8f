import { z } from 'zod';
import { AudioDecoder, BatteryName } from './types';
import { DetectorLogger, consoleLogger } from './logger';
import { ConfigurationError } from './errors';
import { AudioFileDecoder } from './audio/decode';

export const BATTERY_NAMES = ['full', 'lean', 'core', 'minimal'] as const satisfies readonly BatteryName[];

export type MfccCount = 13 | 20;

/** Serializable part of the detector configuration (safe to post to a worker). */
export interface DetectorSettings {
  /** Audio past this many seconds is discarded before analysis. */
  maxDurationSeconds: number;
  /** Resample to this rate; `undefined` keeps the file's native rate. */
  targetSampleRate?: number;
  battery: BatteryName;
  mfccCount: MfccCount;
  maxPitchFrames: number;
  modelVersion: string;
}

export interface DetectorConfig extends DetectorSettings {
  logger: DetectorLogger;
  decoder: AudioDecoder;
}

export const DEFAULT_TARGET_SAMPLE_RATE = 22050;

export const DEFAULT_SETTINGS: Readonly<DetectorSettings> = Object.freeze({
  maxDurationSeconds: 30,
  targetSampleRate: DEFAULT_TARGET_SAMPLE_RATE,
  battery: 'full',
  mfccCount: 20,
  maxPitchFrames: 100,
  modelVersion: '1.0.0',
});

const positiveNumber = () =>
  z.number({ invalid_type_error: 'must be a number' })
    .finite('must be a finite number')
    .positive('must be positive');

/**
 * Partial detector settings as they arrive from code, a config file or a
 * worker's init data. Unknown keys are dropped. A `targetSampleRate` of
 * `null` selects the native rate.
 */
export const SettingsSchema = z.object({
  maxDurationSeconds: positiveNumber().optional(),
  targetSampleRate: positiveNumber().nullable().optional(),
  battery: z.enum(BATTERY_NAMES, {
    errorMap: () => ({ message: `must be one of ${BATTERY_NAMES.join(', ')}` }),
  }).optional(),
  mfccCount: z.union([z.literal(13), z.literal(20)], {
    errorMap: () => ({ message: 'must be 13 or 20' }),
  }).optional(),
  maxPitchFrames: positiveNumber().int('must be an integer').optional(),
  modelVersion: z.string({ invalid_type_error: 'must be a string' }).min(1, 'must not be empty').optional(),
}, { invalid_type_error: 'Settings must be a JSON object' });

export type SettingsInput = z.infer<typeof SettingsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate untrusted settings, such as a parsed JSON config file. Only the
 * keys present in the input appear in the result.
 * @throws ConfigurationError
 */
export function parseSettings(data: unknown): SettingsInput {
  if (data === undefined || data === null) return {};
  const result = SettingsSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

/** Validate settings and fill unset fields from the defaults. */
export function resolveSettings(partial: SettingsInput = {}): DetectorSettings {
  const settings = parseSettings(partial);
  return {
    maxDurationSeconds: settings.maxDurationSeconds ?? DEFAULT_SETTINGS.maxDurationSeconds,
    targetSampleRate: settings.targetSampleRate === null
      ? undefined
      : settings.targetSampleRate ?? DEFAULT_TARGET_SAMPLE_RATE,
    battery: settings.battery ?? DEFAULT_SETTINGS.battery,
    mfccCount: settings.mfccCount ?? DEFAULT_SETTINGS.mfccCount,
    maxPitchFrames: settings.maxPitchFrames ?? DEFAULT_SETTINGS.maxPitchFrames,
    modelVersion: settings.modelVersion ?? DEFAULT_SETTINGS.modelVersion,
  };
}

export type DetectorOptions = SettingsInput & Partial<Pick<DetectorConfig, 'logger' | 'decoder'>>;

export function resolveConfig(options: DetectorOptions = {}): Readonly<DetectorConfig> {
  const { logger = consoleLogger, decoder = new AudioFileDecoder(), ...settings } = options;
  return Object.freeze({ ...resolveSettings(settings), logger, decoder });
}
