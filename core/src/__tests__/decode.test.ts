import { decodeWav, resample, sniffContainer, AudioFileDecoder } from '../audio/decode';
import { DecodeError, EmptyAudioError } from '../errors';
import { makeWav } from './fixtures';

describe('sniffContainer', () => {
    it('recognises RIFF/WAVE', () => {
        expect(sniffContainer(makeWav({ sampleRate: 8000, samples: [0] }))).toBe('wav');
    });

    it('recognises an ID3 tag and a bare MPEG frame sync as mp3', () => {
        expect(sniffContainer(Buffer.from([0x49, 0x44, 0x33, 0x04, 0x00]))).toBe('mp3');
        expect(sniffContainer(Buffer.from([0xff, 0xfb, 0x90, 0x00]))).toBe('mp3');
    });

    it('does not mistake an ADTS AAC header for MPEG audio', () => {
        expect(sniffContainer(Buffer.from([0xff, 0xf1, 0x50, 0x80]))).toBe('unknown');
        expect(sniffContainer(Buffer.from([0xff, 0xf9, 0x50, 0x80]))).toBe('unknown');
    });

    it('returns unknown for anything else', () => {
        expect(sniffContainer(Buffer.from('hello world!'))).toBe('unknown');
        expect(sniffContainer(new Uint8Array(0))).toBe('unknown');
    });
});

describe('decodeWav', () => {
    it('decodes 16-bit PCM', () => {
        const { samples, sampleRate } = decodeWav(makeWav({ sampleRate: 8000, samples: [0, 0.5, -0.5, -1] }));
        expect(sampleRate).toBe(8000);
        expect(Array.from(samples)).toEqual([0, 0.5, -0.5, -1]);
    });

    it('decodes 8-bit unsigned PCM', () => {
        const { samples } = decodeWav(makeWav({ sampleRate: 8000, bitsPerSample: 8, samples: [0, 0.5, -1] }));
        expect(Array.from(samples)).toEqual([0, 0.5, -1]);
    });

    it('decodes 24-bit and 32-bit PCM', () => {
        const s24 = decodeWav(makeWav({ sampleRate: 8000, bitsPerSample: 24, samples: [0.25, -0.75] }));
        expect(Array.from(s24.samples)).toEqual([0.25, -0.75]);
        const s32 = decodeWav(makeWav({ sampleRate: 8000, bitsPerSample: 32, samples: [0.125, -0.5] }));
        expect(Array.from(s32.samples)).toEqual([0.125, -0.5]);
    });

    it('decodes 32-bit and 64-bit IEEE float', () => {
        const f32 = decodeWav(makeWav({ sampleRate: 16000, formatTag: 3, bitsPerSample: 32, samples: [0.25, -0.5] }));
        expect(Array.from(f32.samples)).toEqual([0.25, -0.5]);
        const f64 = decodeWav(makeWav({ sampleRate: 16000, formatTag: 3, bitsPerSample: 64, samples: [0.1, -0.3] }));
        expect(Array.from(f64.samples)).toEqual([0.1, -0.3]);
    });

    it('averages channels to mono', () => {
        const { samples } = decodeWav(makeWav({ sampleRate: 8000, channels: 2, samples: [0.5, 0, -0.5, -0.25] }));
        expect(Array.from(samples)).toEqual([0.25, -0.375]);
    });

    it('keeps only the first maxDurationSeconds of audio', () => {
        const wav = makeWav({ sampleRate: 8000, samples: new Float64Array(8000) });
        expect(decodeWav(wav, 0.5).samples.length).toBe(4000);
        expect(decodeWav(wav, 2).samples.length).toBe(8000);
    });

    it('reads WAVE_FORMAT_EXTENSIBLE headers', () => {
        const body = Buffer.alloc(4);
        body.writeInt16LE(16384, 0);
        body.writeInt16LE(-16384, 2);

        const buf = Buffer.alloc(12 + 48 + 8 + body.length);
        buf.write('RIFF', 0);
        buf.writeUInt32LE(buf.length - 8, 4);
        buf.write('WAVE', 8);
        buf.write('fmt ', 12);
        buf.writeUInt32LE(40, 16);
        buf.writeUInt16LE(0xfffe, 20);
        buf.writeUInt16LE(1, 22);
        buf.writeUInt32LE(8000, 24);
        buf.writeUInt32LE(16000, 28);
        buf.writeUInt16LE(2, 32);
        buf.writeUInt16LE(16, 34);
        buf.writeUInt16LE(22, 36);     // cbSize
        buf.writeUInt16LE(16, 38);     // valid bits
        buf.writeUInt32LE(4, 40);      // channel mask
        buf.writeUInt16LE(1, 44);      // sub-format: PCM
        buf.write('data', 60);
        buf.writeUInt32LE(body.length, 64);
        body.copy(buf, 68);

        expect(Array.from(decodeWav(buf).samples)).toEqual([0.5, -0.5]);
    });

    it('skips odd-sized chunks with their pad byte', () => {
        const wav = makeWav({ sampleRate: 8000, samples: [0.5] });
        const list = Buffer.alloc(8 + 3 + 1);
        list.write('LIST', 0);
        list.writeUInt32LE(3, 4);
        const buf = Buffer.concat([wav.subarray(0, 36), list, wav.subarray(36)]);
        expect(Array.from(decodeWav(buf).samples)).toEqual([0.5]);
    });

    it('rejects unsupported encodings', () => {
        const wav = makeWav({ sampleRate: 8000, samples: [0] });
        wav.writeUInt16LE(2, 20);
        expect(() => decodeWav(wav)).toThrow('Unsupported WAV encoding (format tag 0x2)');

        const odd = makeWav({ sampleRate: 8000, samples: [0] });
        odd.writeUInt16LE(12, 34);
        expect(() => decodeWav(odd)).toThrow('Unsupported PCM bit depth: 12');
    });

    it('rejects a file without a data chunk', () => {
        const wav = makeWav({ sampleRate: 8000, samples: [0] }).subarray(0, 36);
        expect(() => decodeWav(wav)).toThrow(DecodeError);
        expect(() => decodeWav(wav)).toThrow('Invalid WAV: missing fmt or data chunk');
    });
});

describe('resample', () => {
    it('interpolates linearly and rounds the length up', () => {
        const out = resample(new Float64Array([0, 1]), 1, 2);
        expect(Array.from(out)).toEqual([0, 0.5, 1, 1]);
    });

    it('returns the input when the rates match', () => {
        const input = new Float64Array([1, 2, 3]);
        expect(resample(input, 8000, 8000)).toBe(input);
    });
});

describe('AudioFileDecoder', () => {
    let decoder: AudioFileDecoder;

    beforeEach(() => {
        decoder = new AudioFileDecoder();
    });

    it('resamples to the target rate', () => {
        const wav = makeWav({ sampleRate: 8000, samples: new Float64Array(8000) });
        const signal = decoder.decode(wav, { maxDurationSeconds: 30, targetSampleRate: 22050 });
        expect(signal.sampleRate).toBe(22050);
        expect(signal.samples.length).toBe(22050);
    });

    it('keeps the native rate when no target is given', () => {
        const wav = makeWav({ sampleRate: 8000, samples: new Float64Array(800) });
        const signal = decoder.decode(wav, { maxDurationSeconds: 30 });
        expect(signal.sampleRate).toBe(8000);
        expect(signal.samples.length).toBe(800);
    });

    it('truncates before resampling', () => {
        const wav = makeWav({ sampleRate: 8000, samples: new Float64Array(16000) });
        const signal = decoder.decode(wav, { maxDurationSeconds: 1, targetSampleRate: 16000 });
        expect(signal.samples.length).toBe(16000);
    });

    it('reports an MP3 without a frame header as undecodable', () => {
        let caught: unknown;
        try {
            decoder.decode(Buffer.from([0x49, 0x44, 0x33, 0x04, 0x00]), { maxDurationSeconds: 30 });
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(DecodeError);
        expect(caught).toMatchObject({
            message: 'Invalid MP3: no frame header found',
            container: 'mp3',
            fault: 'client',
            code: 'DECODE_ERROR',
        });
    });

    it('rejects unrecognised bytes', () => {
        expect(() => decoder.decode(Buffer.from('not audio at all'), { maxDurationSeconds: 30 }))
            .toThrow('Unrecognised audio container');
    });

    it('raises EmptyAudioError for a WAV without samples', () => {
        const wav = makeWav({ sampleRate: 8000, samples: [] });
        expect(() => decoder.decode(wav, { maxDurationSeconds: 30 })).toThrow(EmptyAudioError);
    });
});
