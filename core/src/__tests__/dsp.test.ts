import { fft1d, fftPlan, FftPlan, nextPow2 } from '../dsp/fft';
import { clamp, max, mean, min, roundTo, std, variance } from '../dsp/stats';
import {
    centeredFrames,
    dctOrtho,
    frameCount,
    hannWindow,
    hzToMel,
    melToHz,
    powerToDb,
    stft,
} from '../dsp/spectrogram';
import { sine } from './fixtures';

describe('dsp/fft', () => {
    it('fft1d of an impulse should be flat', () => {
        // FFT of [1, 0, 0, 0] should give [1, 1, 1, 1]
        const re = new Float64Array([1, 0, 0, 0]);
        const im = new Float64Array(4);
        fft1d(re, im);
        for (let i = 0; i < 4; i++) {
            expect(re[i]).toBeCloseTo(1, 5);
            expect(im[i]).toBeCloseTo(0, 5);
        }
    });

    it('fft1d of [1,1,1,1] should produce DC peak', () => {
        const re = new Float64Array([1, 1, 1, 1]);
        const im = new Float64Array(4);
        fft1d(re, im);
        expect(re[0]).toBeCloseTo(4, 5);
        for (let i = 1; i < 4; i++) {
            expect(re[i]).toBeCloseTo(0, 5);
        }
    });

    it('fft1d rejects lengths that are not a power of 2', () => {
        expect(() => fft1d(new Float64Array(3), new Float64Array(3))).toThrow(RangeError);
    });

    it('puts a cosine at bin 1 into bins 1 and n-1', () => {
        const re = Float64Array.from({ length: 8 }, (_, i) => Math.cos((2 * Math.PI * i) / 8));
        const im = new Float64Array(8);
        fftPlan(8).transform(re, im);
        [0, 4, 0, 0, 0, 0, 0, 4].forEach((expected, bin) => {
            expect(Math.hypot(re[bin], im[bin])).toBeCloseTo(expected, 9);
        });
    });

    it('reuses one plan per size', () => {
        expect(fftPlan(16)).toBe(fftPlan(16));
        expect(fftPlan(16).size).toBe(16);
        expect(() => new FftPlan(12)).toThrow('FFT length must be a power of 2, got 12');
    });

    it('rejects frames that do not match the plan', () => {
        expect(() => fftPlan(4).transform(new Float64Array(8), new Float64Array(8)))
            .toThrow('FFT plan of size 4 given 8 real and 8 imaginary values');
    });

    it('nextPow2 rounds up', () => {
        expect(nextPow2(2048)).toBe(2048);
        expect(nextPow2(1000)).toBe(1024);
        expect(nextPow2(1)).toBe(1);
    });
});

describe('dsp/stats', () => {
    it('mean of [1,2,3,4,5] should be 3', () => {
        expect(mean([1, 2, 3, 4, 5])).toBe(3);
    });

    it('variance is the population variance', () => {
        expect(variance([0, 10])).toBe(25);
        expect(std([0, 10])).toBe(5);
    });

    it('empty input reduces to 0', () => {
        expect(mean([])).toBe(0);
        expect(std(new Float64Array(0))).toBe(0);
    });

    it('max and min', () => {
        expect(max([3, -1, 7])).toBe(7);
        expect(min([3, -1, 7])).toBe(-1);
    });

    it('clamp and roundTo', () => {
        expect(clamp(1.5, 0, 1)).toBe(1);
        expect(clamp(-0.5, 0, 1)).toBe(0);
        expect(roundTo(0.123456, 4)).toBe(0.1235);
        expect(roundTo(0.69230769, 4)).toBe(0.6923);
    });
});

describe('dsp/spectrogram', () => {
    it('hannWindow is periodic', () => {
        const win = hannWindow(4);
        expect(win[0]).toBe(0);
        expect(win[1]).toBeCloseTo(0.5, 12);
        expect(win[2]).toBe(1);
        expect(win[3]).toBeCloseTo(0.5, 12);
    });

    it('frames are centred on multiples of the hop', () => {
        const frames = centeredFrames(new Float64Array([1, 2, 3, 4]), 4, 2);
        expect(frames.map((f) => Array.from(f))).toEqual([
            [0, 0, 1, 2],
            [1, 2, 3, 4],
            [3, 4, 0, 0],
        ]);
        expect(frameCount(22050, 512)).toBe(44);
    });

    it('stft of a bin-centred sine peaks at that bin', () => {
        const sr = 22050;
        const spec = stft(sine((20 * sr) / 2048, sr, 1), sr, 2048, 512);
        expect(spec.nFrames).toBe(44);
        expect(spec.nBins).toBe(1025);
        expect(spec.freqs[20]).toBeCloseTo(215.33203125, 8);

        const mid = spec.magnitudes[22];
        let peak = 0;
        for (let k = 1; k < mid.length; k++) if (mid[k] > mid[peak]) peak = k;
        expect(peak).toBe(20);
    });

    it('mel scale round-trips', () => {
        expect(hzToMel(700)).toBeCloseTo(2595 * Math.log10(2), 8);
        expect(melToHz(hzToMel(1000))).toBeCloseTo(1000, 8);
    });

    it('powerToDb floors at amin and clips to topDb below the peak', () => {
        const [row] = powerToDb([new Float64Array([1, 100, 0])]);
        expect(Array.from(row)).toEqual([0, 20, -60]);
    });

    it('dctOrtho of a constant row is all DC', () => {
        const out = dctOrtho(new Float64Array([2, 2, 2, 2]), 3);
        expect(out[0]).toBeCloseTo(4, 12);
        expect(out[1]).toBeCloseTo(0, 12);
        expect(out[2]).toBeCloseTo(0, 12);
    });
});
