import path from 'path';

import { loadConfig } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
    it('falls back to defaults', () => {
        expect(loadConfig({}, '/srv/g3')).toEqual({
            hostname: null,
            host: '0.0.0.0',
            port: 5002,
            recordingsDir: path.resolve('/srv/g3', 'recordings'),
            decimation: { gaze: 1, imu: 1 },
            gazeFrequency: 50,
            requestTimeoutMs: 5000,
            keepAliveMs: 2000,
            displayIntervalMs: 40,
            streamBufferSize: 2000,
        });
    });

    it('reads the environment', () => {
        const config = loadConfig({
            G3_HOSTNAME: ' tg03b-080200045321.local ',
            PORT: '8080',
            RECORDINGS_DIR: 'data/out',
            GAZE_DECIMATION: '2',
            IMU_DECIMATION: '5',
            G3_GAZE_FREQUENCY: '100',
        }, '/srv/g3');

        expect(config.hostname).toBe('tg03b-080200045321.local');
        expect(config.port).toBe(8080);
        expect(config.recordingsDir).toBe(path.resolve('/srv/g3', 'data/out'));
        expect(config.decimation).toEqual({ gaze: 2, imu: 5 });
        expect(config.gazeFrequency).toBe(100);
    });

    it('treats a blank hostname as unset', () => {
        expect(loadConfig({ G3_HOSTNAME: '  ' }).hostname).toBeNull();
    });

    it('rejects decimation rates that are not positive integers', () => {
        expect(() => loadConfig({ GAZE_DECIMATION: '0' })).toThrow(ConfigError);
        expect(() => loadConfig({ IMU_DECIMATION: 'five' }))
            .toThrow('IMU_DECIMATION must be an integer >= 1, got "five"');
        expect(() => loadConfig({ GAZE_DECIMATION: '1.5' })).toThrow(ConfigError);
    });

    it('is frozen', () => {
        const config = loadConfig({});

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.decimation)).toBe(true);
    });
});
