import { z } from 'zod';
import { DetectionResult, Language, SUPPORTED_LANGUAGES } from '../types';
import { parseSettings, SettingsInput } from '../config';
import { SerializedError } from '../errors';
import { LogLevel } from '../logger';

export interface WorkerInit {
  settings: SettingsInput;
}

export interface WorkerRequest {
  id: number;
  bytes: Uint8Array;
  language: Language;
}

export type WorkerResponse =
  | { type: 'ready' }
  | { type: 'result'; id: number; result: DetectionResult }
  | { type: 'error'; id: number; error: SerializedError }
  | { type: 'log'; level: LogLevel; message: string };

const WorkerInitSchema = z.object({ settings: z.unknown() });

const WorkerRequestSchema = z.object({
  id: z.number().int(),
  bytes: z.instanceof(Uint8Array),
  language: z.enum(SUPPORTED_LANGUAGES),
});

// Results come from our own worker; only their envelope is checked here
const WorkerResponseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready') }),
  z.object({ type: z.literal('result'), id: z.number().int(), result: z.object({}).passthrough() }),
  z.object({
    type: z.literal('error'),
    id: z.number().int(),
    error: z.object({ name: z.string(), message: z.string() }),
  }),
  z.object({ type: z.literal('log'), level: z.enum(['debug', 'info', 'warn', 'error']), message: z.string() }),
]);

export function isWorkerResponse(value: unknown): value is WorkerResponse {
  return WorkerResponseSchema.safeParse(value).success;
}

export function isWorkerRequest(value: unknown): value is WorkerRequest {
  return WorkerRequestSchema.safeParse(value).success;
}

export function readSettings(data: unknown): SettingsInput {
  const init = WorkerInitSchema.safeParse(data);
  return init.success ? parseSettings(init.data.settings) : {};
}
