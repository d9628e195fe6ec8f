import { DEFAULT_SETTINGS, parseSettings, resolveConfig, resolveSettings } from '../config';
import { ConfigurationError } from '../errors';
import { consoleLogger, silentLogger } from '../logger';
import { AudioFileDecoder } from '../audio/decode';

describe('resolveSettings', () => {
    it('fills defaults', () => {
        expect(resolveSettings()).toEqual({
            maxDurationSeconds: 30,
            targetSampleRate: 22050,
            battery: 'full',
            mfccCount: 20,
            maxPitchFrames: 100,
            modelVersion: '1.0.0',
        });
        expect(DEFAULT_SETTINGS.maxDurationSeconds).toBe(30);
    });

    it('maps a null sample rate to the native rate', () => {
        expect(resolveSettings({ targetSampleRate: null }).targetSampleRate).toBeUndefined();
    });

    it('rejects out-of-range values', () => {
        expect(() => resolveSettings({ maxDurationSeconds: 0 }))
            .toThrow('maxDurationSeconds must be positive');
        expect(() => resolveSettings({ targetSampleRate: -1 })).toThrow(ConfigurationError);
        expect(() => resolveSettings({ maxPitchFrames: 2.5 }))
            .toThrow('maxPitchFrames must be an integer');
        expect(() => resolveSettings({ maxDurationSeconds: Infinity }))
            .toThrow('maxDurationSeconds must be a finite number');
    });
});

describe('parseSettings', () => {
    it('keeps known keys and ignores the rest', () => {
        expect(parseSettings({ battery: 'lean', mfccCount: 13, targetSampleRate: null, extra: true })).toEqual({
            battery: 'lean',
            mfccCount: 13,
            targetSampleRate: null,
        });
    });

    it('treats a missing config as empty', () => {
        expect(parseSettings(undefined)).toEqual({});
        expect(parseSettings(null)).toEqual({});
    });

    it('rejects wrong types', () => {
        expect(() => parseSettings([])).toThrow('Settings must be a JSON object');
        expect(() => parseSettings({ maxDurationSeconds: '30' })).toThrow('maxDurationSeconds must be a number');
        expect(() => parseSettings({ maxPitchFrames: NaN })).toThrow('maxPitchFrames must be a number');
        expect(() => parseSettings({ mfccCount: 40 })).toThrow('mfccCount must be 13 or 20');
        expect(() => parseSettings({ battery: 'huge' }))
            .toThrow('battery must be one of full, lean, core, minimal');
        expect(() => parseSettings({ modelVersion: 2 })).toThrow('modelVersion must be a string');
    });

    it('reports every invalid field at once', () => {
        expect(() => parseSettings({ mfccCount: 12, targetSampleRate: -8000 }))
            .toThrow('targetSampleRate must be positive; mfccCount must be 13 or 20');
    });
});

describe('resolveConfig', () => {
    it('defaults the logger and decoder', () => {
        const config = resolveConfig();
        expect(config.logger).toBe(consoleLogger);
        expect(config.decoder).toBeInstanceOf(AudioFileDecoder);
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('keeps injected collaborators', () => {
        const config = resolveConfig({ logger: silentLogger, battery: 'minimal' });
        expect(config.logger).toBe(silentLogger);
        expect(config.battery).toBe('minimal');
    });
});
