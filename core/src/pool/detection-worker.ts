import { parentPort, workerData } from 'worker_threads';
import { VoiceDetector } from '../detector';
import { serializeError } from '../errors';
import { DetectorLogger, LogLevel } from '../logger';
import { isWorkerRequest, readSettings, WorkerResponse } from './protocol';

const port = parentPort;
if (!port) {
  throw new Error('detection-worker must run inside a worker thread');
}

const post = (response: WorkerResponse): void => port.postMessage(response);
const forward = (level: LogLevel) => (message: string): void => post({ type: 'log', level, message });

// Log lines travel to the parent, which owns the real logger
const logger: DetectorLogger = {
  debug: forward('debug'),
  info: forward('info'),
  warn: forward('warn'),
  error: forward('error'),
};

const detector = new VoiceDetector({ ...readSettings(workerData), logger });

port.on('message', (message: unknown) => {
  if (!isWorkerRequest(message)) {
    logger.error('Ignoring malformed request');
    return;
  }
  const { id, bytes, language } = message;
  detector.detect(bytes, language).then(
    (result) => post({ type: 'result', id, result }),
    (err: unknown) => post({ type: 'error', id, error: serializeError(err) })
  );
});

post({ type: 'ready' });
