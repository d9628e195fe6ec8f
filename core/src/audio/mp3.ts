/// <reference path="../types/js-mp3.d.ts" />
/**
 * MPEG audio (MP3) decoding on top of js-mp3, with the same mono mixdown and
 * analysis-window truncation as the WAV path.
 */
import { newDecoder } from 'js-mp3';
import { AudioSignal } from '../types';
import { DecodeError } from '../errors';

export interface MpegFrameHeader {
  offset: number;
  sampleRate: number;
}

/** Frame sync with a non-reserved layer, which rules out ADTS AAC. */
export function isMpegFrameSync(b0: number, b1: number): boolean {
  return b0 === 0xff && (b1 & 0xe0) === 0xe0 && (b1 & 0x06) !== 0;
}

function sampleRates(version: number): readonly number[] | null {
  switch (version) {
    case 3:
      return [44100, 48000, 32000]; // MPEG-1
    case 2:
      return [22050, 24000, 16000]; // MPEG-2
    case 0:
      return [11025, 12000, 8000]; // MPEG-2.5
    default:
      return null;
  }
}

/** Length of a leading ID3v2 tag including its header and footer, or 0. */
export function id3Length(bytes: Uint8Array): number {
  if (bytes.length < 10 || bytes[0] !== 0x49 || bytes[1] !== 0x44 || bytes[2] !== 0x33) return 0;
  // Sync-safe integer: 7 bits per byte
  const size = ((bytes[6] & 0x7f) << 21) | ((bytes[7] & 0x7f) << 14) | ((bytes[8] & 0x7f) << 7) | (bytes[9] & 0x7f);
  const footer = (bytes[5] & 0x10) !== 0 ? 10 : 0;
  return 10 + size + footer;
}

/** First valid frame header after any ID3v2 tag. */
export function findFrameHeader(bytes: Uint8Array): MpegFrameHeader | null {
  for (let i = id3Length(bytes); i + 4 <= bytes.length; i++) {
    if (!isMpegFrameSync(bytes[i], bytes[i + 1])) continue;
    const rates = sampleRates((bytes[i + 1] >> 3) & 0x03);
    const bitrateIndex = bytes[i + 2] >> 4;
    const rateIndex = (bytes[i + 2] >> 2) & 0x03;
    if (!rates || bitrateIndex === 0x0f || rateIndex === 3) continue;
    return { offset: i, sampleRate: rates[rateIndex] };
  }
  return null;
}

function decodePcm(bytes: Uint8Array): ArrayBuffer | null {
  const copy = new Uint8Array(bytes.byteLength);
  copy.set(bytes);
  try {
    const decoder = newDecoder(copy.buffer);
    return decoder ? decoder.decode() : null;
  } catch (err) {
    throw new DecodeError(`Invalid MP3: ${err instanceof Error ? err.message : String(err)}`, 'mp3');
  }
}

/**
 * Decode an MP3 stream to mono float samples, keeping at most the first
 * `maxDurationSeconds` of audio.
 */
export function decodeMp3(bytes: Uint8Array, maxDurationSeconds = Infinity): AudioSignal {
  const header = findFrameHeader(bytes);
  if (!header) {
    throw new DecodeError('Invalid MP3: no frame header found', 'mp3');
  }

  const pcm = decodePcm(bytes);
  if (!pcm || pcm.byteLength < 4) {
    throw new DecodeError('Invalid MP3: no decodable frames', 'mp3');
  }

  // Output is always 16-bit stereo, mono sources duplicated
  const view = new DataView(pcm);
  const totalFrames = Math.floor(pcm.byteLength / 4);
  const nFrames = Math.min(totalFrames, Math.floor(maxDurationSeconds * header.sampleRate));
  const samples = new Float64Array(nFrames);
  for (let i = 0; i < nFrames; i++) {
    samples[i] = (view.getInt16(4 * i, true) + view.getInt16(4 * i + 2, true)) / 65536;
  }
  return { samples, sampleRate: header.sampleRate };
}
