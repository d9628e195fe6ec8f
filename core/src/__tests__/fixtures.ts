// ---------------------------------------------------------------------------
// Helpers: generate synthetic WAV files and signals
// ---------------------------------------------------------------------------

export interface WavFixture {
  sampleRate: number;
  channels?: number;
  bitsPerSample?: number;
  /** 1 = PCM, 3 = IEEE float */
  formatTag?: number;
  /** Interleaved sample values in [-1, 1]. */
  samples: ArrayLike<number>;
}

function writeSample(buf: Buffer, pos: number, value: number, formatTag: number, bits: number): void {
  if (formatTag === 3) {
    if (bits === 32) buf.writeFloatLE(value, pos);
    else buf.writeDoubleLE(value, pos);
    return;
  }
  switch (bits) {
    case 8:
      buf[pos] = Math.max(0, Math.min(255, Math.round((value + 1) * 128)));
      break;
    case 16:
      buf.writeInt16LE(Math.max(-32768, Math.min(32767, Math.round(value * 32768))), pos);
      break;
    case 24:
      buf.writeIntLE(Math.max(-8388608, Math.min(8388607, Math.round(value * 8388608))), pos, 3);
      break;
    default:
      buf.writeInt32LE(Math.max(-2147483648, Math.min(2147483647, Math.round(value * 2147483648))), pos);
  }
}

/** Build a canonical 44-byte-header RIFF/WAVE file. */
export function makeWav(wav: WavFixture): Buffer {
  const channels = wav.channels ?? 1;
  const bits = wav.bitsPerSample ?? 16;
  const formatTag = wav.formatTag ?? 1;
  const bytesPerSample = bits / 8;
  const dataSize = wav.samples.length * bytesPerSample;
  const buf = Buffer.alloc(44 + dataSize);

  // RIFF header
  buf.write('RIFF', 0);
  buf.writeUInt32LE(36 + dataSize, 4);
  buf.write('WAVE', 8);

  // fmt chunk
  buf.write('fmt ', 12);
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(formatTag, 20);
  buf.writeUInt16LE(channels, 22);
  buf.writeUInt32LE(wav.sampleRate, 24);
  buf.writeUInt32LE(wav.sampleRate * channels * bytesPerSample, 28);
  buf.writeUInt16LE(channels * bytesPerSample, 32);
  buf.writeUInt16LE(bits, 34);

  // data chunk
  buf.write('data', 36);
  buf.writeUInt32LE(dataSize, 40);
  for (let i = 0; i < wav.samples.length; i++) {
    writeSample(buf, 44 + i * bytesPerSample, wav.samples[i], formatTag, bits);
  }
  return buf;
}

export function sine(freq: number, sampleRate: number, seconds: number, amplitude = 0.5): Float64Array {
  const n = Math.floor(sampleRate * seconds);
  const out = new Float64Array(n);
  for (let i = 0; i < n; i++) out[i] = amplitude * Math.sin((2 * Math.PI * freq * i) / sampleRate);
  return out;
}

export function silence(sampleRate: number, seconds: number): Float64Array {
  return new Float64Array(Math.floor(sampleRate * seconds));
}
