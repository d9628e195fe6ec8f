export type FaultKind = 'client' | 'server';

/**
 * Base class for every terminal failure raised by the detection pipeline.
 * `fault` tells a caller whether the input or the service was at fault.
 */
export class VoiceCheckError extends Error {
  readonly fault: FaultKind = 'server';
  readonly code: string = 'VOICECHECK_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'VoiceCheckError';
  }
}

export class DecodeError extends VoiceCheckError {
  readonly fault = 'client';
  readonly code = 'DECODE_ERROR';

  constructor(message: string, public readonly container?: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class EmptyAudioError extends VoiceCheckError {
  readonly fault = 'client';
  readonly code = 'EMPTY_AUDIO';

  constructor(message = 'Decoded audio contains no samples') {
    super(message);
    this.name = 'EmptyAudioError';
  }
}

export class FeatureComputationError extends VoiceCheckError {
  readonly fault = 'server';
  readonly code = 'FEATURE_COMPUTATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'FeatureComputationError';
  }
}

export class UnsupportedLanguageError extends VoiceCheckError {
  readonly fault = 'client';
  readonly code = 'UNSUPPORTED_LANGUAGE';

  constructor(public readonly language: string) {
    super(`Unsupported language: ${language}`);
    this.name = 'UnsupportedLanguageError';
  }
}

export class ConfigurationError extends VoiceCheckError {
  readonly fault = 'client';
  readonly code = 'CONFIGURATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class WorkerPoolError extends VoiceCheckError {
  readonly fault = 'server';
  readonly code = 'WORKER_POOL_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'WorkerPoolError';
  }
}

export interface SerializedError {
  name: string;
  message: string;
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'Error', message: String(err) };
}

/** Rebuild a pipeline error from its serialized form (e.g. across a worker boundary). */
export function deserializeError(data: SerializedError): Error {
  switch (data.name) {
    case 'DecodeError':
      return new DecodeError(data.message);
    case 'EmptyAudioError':
      return new EmptyAudioError(data.message);
    case 'FeatureComputationError':
      return new FeatureComputationError(data.message);
    case 'UnsupportedLanguageError':
      return new UnsupportedLanguageError(data.message.replace(/^Unsupported language: /, ''));
    case 'ConfigurationError':
      return new ConfigurationError(data.message);
    case 'WorkerPoolError':
      return new WorkerPoolError(data.message);
    default: {
      const err = new Error(data.message);
      err.name = data.name;
      return err;
    }
  }
}
