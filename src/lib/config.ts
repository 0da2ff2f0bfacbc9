import path from 'path';

import { ConfigError } from './errors';
import { DecimationConfig } from './g3-interfaces';

export interface AppConfig {
    readonly hostname: string | null;
    readonly host: string;
    readonly port: number;
    readonly recordingsDir: string;
    readonly decimation: DecimationConfig;
    readonly gazeFrequency: number;
    readonly requestTimeoutMs: number;
    readonly keepAliveMs: number;
    readonly displayIntervalMs: number;
    readonly streamBufferSize: number;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

export function loadConfig(env: Env = process.env, cwd = process.cwd()): AppConfig {
    const hostname = env.G3_HOSTNAME?.trim();
    return Object.freeze({
        hostname: hostname ? hostname : null,
        host: env.HOST ?? '0.0.0.0',
        port: readInteger(env, 'PORT', 5002, 0),
        recordingsDir: path.resolve(cwd, env.RECORDINGS_DIR ?? 'recordings'),
        decimation: Object.freeze({
            gaze: readInteger(env, 'GAZE_DECIMATION', 1, 1),
            imu: readInteger(env, 'IMU_DECIMATION', 1, 1),
        }),
        gazeFrequency: readInteger(env, 'G3_GAZE_FREQUENCY', 50, 1),
        requestTimeoutMs: readInteger(env, 'G3_REQUEST_TIMEOUT_MS', 5000, 1),
        keepAliveMs: readInteger(env, 'G3_KEEPALIVE_MS', 2000, 1),
        displayIntervalMs: readInteger(env, 'DISPLAY_INTERVAL_MS', 40, 0),
        streamBufferSize: readInteger(env, 'STREAM_BUFFER_SIZE', 2000, 1),
    });
}
