/**
 * Audio decoding: container sniffing, a RIFF/WAVE decoder, mono mixdown,
 * analysis-window truncation and resampling.
 */
import { AudioDecoder, AudioSignal, DecodeOptions } from '../types';
import { DecodeError, EmptyAudioError } from '../errors';
import { decodeMp3, isMpegFrameSync } from './mp3';

export type ContainerKind = 'wav' | 'mp3' | 'unknown';

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export function sniffContainer(bytes: Uint8Array): ContainerKind {
  if (bytes.length >= 12) {
    const buf = toBuffer(bytes);
    if (buf.toString('ascii', 0, 4) === 'RIFF' && buf.toString('ascii', 8, 12) === 'WAVE') {
      return 'wav';
    }
  }
  if (bytes.length >= 3 && bytes[0] === 0x49 && bytes[1] === 0x44 && bytes[2] === 0x33) {
    return 'mp3'; // ID3 tag
  }
  if (bytes.length >= 2 && isMpegFrameSync(bytes[0], bytes[1])) {
    return 'mp3';
  }
  return 'unknown';
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes)
    ? bytes
    : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

interface WavFormat {
  formatTag: number;
  numChannels: number;
  sampleRate: number;
  bitsPerSample: number;
}

interface RawWav {
  format: WavFormat;
  data: Buffer;
}

function readChunks(buffer: Buffer): RawWav {
  let offset = 12;
  let format: WavFormat | null = null;
  let data: Buffer | null = null;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    offset += 8;

    if (chunkId === 'fmt ') {
      if (chunkSize < 16 || offset + 16 > buffer.length) {
        throw new DecodeError('Invalid WAV: truncated fmt chunk', 'wav');
      }
      let formatTag = buffer.readUInt16LE(offset);
      if (formatTag === WAVE_FORMAT_EXTENSIBLE && chunkSize >= 40 && offset + 26 <= buffer.length) {
        // First two bytes of the sub-format GUID carry the real format tag
        formatTag = buffer.readUInt16LE(offset + 24);
      }
      format = {
        formatTag,
        numChannels: buffer.readUInt16LE(offset + 2),
        sampleRate: buffer.readUInt32LE(offset + 4),
        bitsPerSample: buffer.readUInt16LE(offset + 14),
      };
    } else if (chunkId === 'data') {
      // Streaming writers leave the size unset; clamp to what is present
      data = buffer.subarray(offset, Math.min(buffer.length, offset + chunkSize));
    }
    offset += chunkSize;
    // Align to 2-byte boundary
    if (chunkSize % 2 !== 0) offset++;
  }

  if (!format || !data) {
    throw new DecodeError('Invalid WAV: missing fmt or data chunk', 'wav');
  }
  return { format, data };
}

function readSample(data: Buffer, pos: number, format: WavFormat): number {
  const { formatTag, bitsPerSample } = format;
  if (formatTag === WAVE_FORMAT_IEEE_FLOAT) {
    return bitsPerSample === 32 ? data.readFloatLE(pos) : data.readDoubleLE(pos);
  }
  switch (bitsPerSample) {
    case 8:
      return data[pos] / 128.0 - 1.0;
    case 16:
      return data.readInt16LE(pos) / 32768.0;
    case 24:
      return data.readIntLE(pos, 3) / 8388608.0;
    default:
      return data.readInt32LE(pos) / 2147483648.0;
  }
}

function validateFormat(format: WavFormat): void {
  if (format.numChannels < 1) {
    throw new DecodeError('Invalid WAV: zero channels', 'wav');
  }
  if (format.sampleRate <= 0) {
    throw new DecodeError('Invalid WAV: zero sample rate', 'wav');
  }
  if (format.formatTag === WAVE_FORMAT_PCM) {
    if (![8, 16, 24, 32].includes(format.bitsPerSample)) {
      throw new DecodeError(`Unsupported PCM bit depth: ${format.bitsPerSample}`, 'wav');
    }
  } else if (format.formatTag === WAVE_FORMAT_IEEE_FLOAT) {
    if (format.bitsPerSample !== 32 && format.bitsPerSample !== 64) {
      throw new DecodeError(`Unsupported float bit depth: ${format.bitsPerSample}`, 'wav');
    }
  } else {
    throw new DecodeError(`Unsupported WAV encoding (format tag 0x${format.formatTag.toString(16)})`, 'wav');
  }
}

/**
 * Decode a RIFF/WAVE buffer to mono float samples, keeping at most the first
 * `maxDurationSeconds` of audio.
 */
export function decodeWav(bytes: Uint8Array, maxDurationSeconds = Infinity): AudioSignal {
  const buffer = toBuffer(bytes);
  if (sniffContainer(buffer) !== 'wav') {
    throw new DecodeError('Not a valid WAV file (missing RIFF/WAVE header)');
  }

  const { format, data } = readChunks(buffer);
  validateFormat(format);

  const bytesPerSample = format.bitsPerSample / 8;
  const blockAlign = bytesPerSample * format.numChannels;
  const totalFrames = Math.floor(data.length / blockAlign);
  const nFrames = Math.min(totalFrames, Math.floor(maxDurationSeconds * format.sampleRate));

  // Convert to mono by averaging channels
  const samples = new Float64Array(nFrames);
  for (let i = 0; i < nFrames; i++) {
    let sum = 0;
    for (let ch = 0; ch < format.numChannels; ch++) {
      sum += readSample(data, i * blockAlign + ch * bytesPerSample, format);
    }
    samples[i] = sum / format.numChannels;
  }

  return { samples, sampleRate: format.sampleRate };
}

/** Linear-interpolation resampler; output length is ceil(n · to / from). */
export function resample(samples: Float64Array, fromRate: number, toRate: number): Float64Array {
  if (fromRate === toRate || samples.length === 0) return samples;
  const outLen = Math.ceil((samples.length * toRate) / fromRate);
  const out = new Float64Array(outLen);
  const step = fromRate / toRate;
  const last = samples.length - 1;
  for (let i = 0; i < outLen; i++) {
    const pos = i * step;
    const lo = Math.min(Math.floor(pos), last);
    const hi = Math.min(lo + 1, last);
    const frac = pos - lo;
    out[i] = samples[lo] + (samples[hi] - samples[lo]) * frac;
  }
  return out;
}

/** Default decoder: WAV and MP3, chosen by sniffing the leading bytes. */
export class AudioFileDecoder implements AudioDecoder {
  decode(bytes: Uint8Array, options: DecodeOptions): AudioSignal {
    // Truncated at the native rate, before resampling
    let decoded: AudioSignal;
    switch (sniffContainer(bytes)) {
      case 'wav':
        decoded = decodeWav(bytes, options.maxDurationSeconds);
        break;
      case 'mp3':
        decoded = decodeMp3(bytes, options.maxDurationSeconds);
        break;
      default:
        throw new DecodeError('Unrecognised audio container');
    }

    if (decoded.samples.length === 0) {
      throw new EmptyAudioError();
    }

    const { targetSampleRate } = options;
    if (targetSampleRate === undefined || targetSampleRate === decoded.sampleRate) {
      return decoded;
    }
    return {
      samples: resample(decoded.samples, decoded.sampleRate, targetSampleRate),
      sampleRate: targetSampleRate,
    };
  }
}
