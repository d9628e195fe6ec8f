export * from './types';
export * from './errors';
export * from './logger';
export * from './config';
export * from './audio/decode';
export * from './audio/mp3';
export * from './features/extractor';
export * from './classifier/checks';
export * from './classifier/languages';
export * from './classifier/heuristic';
export * from './detector';
export * from './pool/detection-pool';

import { VoiceDetector } from './detector';

export default VoiceDetector;
