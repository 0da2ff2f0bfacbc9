import fs from 'fs';
import os from 'os';
import path from 'path';

import { FakeHeadUnit, flush, gazeBody, imuBody } from '../__fixtures__/fake-head-unit';
import { G3Client, GAZE_SIGNAL, IMU_SIGNAL } from '../g3';
import { AppConfig, loadConfig } from './config';
import { ControlService, RecordingSaved, parseStreamingRequest } from './control-service';
import { ConfigError, ConnectionError, G3Error, NotConnectedError } from './errors';

const HOST = 'g3-test.local';

let directory: string;
let unit: FakeHeadUnit;
let client: G3Client;
let notify: jest.Mock;
let service: ControlService;

function serviceWith(config: AppConfig) {
    return new ControlService(client, { push: () => undefined }, config, notify);
}

function notified(event: string) {
    return notify.mock.calls.filter(([name]) => name === event).map(([, payload]) => payload);
}

beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'g3-control-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    unit = new FakeHeadUnit();
    client = new G3Client({ openTransport: unit.open, keepAliveMs: 60000, clock: () => 1700000000 });
    notify = jest.fn();
    service = serviceWith(loadConfig({ RECORDINGS_DIR: directory }));
});

afterEach(async () => {
    await service.disconnect();
    jest.restoreAllMocks();
    fs.rmSync(directory, { recursive: true, force: true });
});

describe('connect', () => {
    it('needs a hostname from the request or the environment', async () => {
        await expect(service.connect()).rejects.toThrow(
            new ConfigError('No device hostname given and G3_HOSTNAME is not set'),
        );
        expect(unit.sockets).toHaveLength(0);
    });

    it('falls back to G3_HOSTNAME', async () => {
        service = serviceWith(loadConfig({ G3_HOSTNAME: HOST, RECORDINGS_DIR: directory }));

        const status = await service.connect('  ');

        expect(status).toMatchObject({ connected: true, hostname: HOST, streaming: false, calibrated: false });
        expect(status.device?.serial).toBe('TG03B-TEST0001');
    });

    it('refuses a second connect while the first is in flight', async () => {
        const results = await Promise.allSettled([service.connect(HOST), service.connect(HOST)]);

        expect(results.map(result => result.status)).toEqual(['fulfilled', 'rejected']);
        expect(results[1]).toMatchObject({ reason: new G3Error('Already connecting') });
        expect(unit.sockets).toHaveLength(1);
    });

    it('leaves no files behind after a failed connection', async () => {
        unit.reachable = false;

        await expect(service.connect('bad-host')).rejects.toBeInstanceOf(ConnectionError);
        await expect(service.startStreaming()).rejects.toBeInstanceOf(NotConnectedError);
        expect(service.status().connected).toBe(false);
        expect(fs.readdirSync(directory)).toEqual([]);
    });
});

describe('calibrate', () => {
    it('remembers a successful calibration until disconnect', async () => {
        await service.connect(HOST);

        expect(await service.calibrate()).toEqual({ success: true, message: 'Calibration succeeded' });
        expect(service.status().calibrated).toBe(true);

        expect((await service.disconnect()).calibrated).toBe(false);
    });
});

describe('streaming', () => {
    it('records a session from start to stop', async () => {
        await service.connect(HOST);

        const started = await service.startStreaming({ gaze_decimation: '2' });
        expect(started.streaming).toBe(true);
        expect(started.session?.decimation).toEqual({ gaze: 2, imu: 1 });

        for (let i = 1; i <= 4; i++) {
            unit.emit(GAZE_SIGNAL, gazeBody(i));
        }
        unit.emit(IMU_SIGNAL, imuBody(1));
        await flush();
        expect(service.status().session).toMatchObject({ gazeSamples: 2, imuSamples: 1 });

        const saved = await service.stopStreaming();

        expect(saved).toEqual({
            files: [
                expect.stringMatching(/^tobii_gaze_\d{8}_\d{6}\.csv$/),
                expect.stringMatching(/^tobii_imu_\d{8}_\d{6}\.csv$/),
            ],
            gazeSamples: 2,
            imuSamples: 1,
            startedAt: expect.any(String),
            fault: null,
        });
        expect(notified('recording_saved')).toEqual([saved]);
        expect(notified('error')).toEqual([]);
        expect(service.status()).toMatchObject({ connected: true, streaming: false, session: null });
        expect(fs.readdirSync(directory)).toHaveLength(3);
    });

    it('refuses to start twice', async () => {
        await service.connect(HOST);
        await service.startStreaming();

        await expect(service.startStreaming()).rejects.toThrow('Already streaming');
        expect(unit.sockets).toHaveLength(2);
    });

    it('rejects a bad decimation rate before touching the device', async () => {
        await service.connect(HOST);

        await expect(service.startStreaming({ imu_decimation: -1 })).rejects.toThrow('imu_decimation must be a positive integer');
        expect(unit.sockets).toHaveLength(1);
        expect(fs.readdirSync(directory)).toEqual([]);
    });

    it('stops a session that is still starting', async () => {
        await service.connect(HOST);

        const started = service.startStreaming();
        const saved = await service.stopStreaming();
        await started;

        expect(saved).toMatchObject({ gazeSamples: 0, imuSamples: 0, fault: null });
        expect(notified('recording_saved')).toEqual([saved]);
        expect(service.status().streaming).toBe(false);
        expect(unit.sockets[1].closed).toBe(true);
    });

    it('returns null when nothing is streaming', async () => {
        expect(await service.stopStreaming()).toBeNull();
    });

    it('reports a stream fault and saves what was recorded', async () => {
        await service.connect(HOST);
        await service.startStreaming();
        unit.emit(GAZE_SIGNAL, gazeBody(1));
        unit.emit(GAZE_SIGNAL, gazeBody(2));
        await flush();

        unit.sockets[1].drop();
        await flush();

        expect(notify.mock.calls.map(([event]) => event)).toEqual(['error', 'recording_saved', 'status_update']);
        expect(notified('error')).toEqual([
            { message: 'Streaming stopped: Sample stream failed: Connection to device closed' },
        ]);
        const [saved]: RecordingSaved[] = notified('recording_saved');
        expect(saved).toMatchObject({ gazeSamples: 2, imuSamples: 0, fault: 'Sample stream failed: Connection to device closed' });
        expect(service.status()).toMatchObject({ connected: true, streaming: false });
    });

    it('stops the session on disconnect', async () => {
        await service.connect(HOST);
        await service.startStreaming();

        const status = await service.disconnect();

        expect(status).toMatchObject({ connected: false, streaming: false });
        expect(notified('recording_saved')).toHaveLength(1);
        expect(unit.sockets.every(socket => socket.closed)).toBe(true);
    });
});

describe('parseStreamingRequest', () => {
    const defaults = { gaze: 2, imu: 5 };

    it('fills in missing rates from the defaults', () => {
        expect(parseStreamingRequest(undefined, defaults)).toEqual(defaults);
        expect(parseStreamingRequest({}, defaults)).toEqual(defaults);
        expect(parseStreamingRequest({ gaze_decimation: '' }, defaults)).toEqual(defaults);
        expect(parseStreamingRequest({ gaze_decimation: 3, imu_decimation: '4' }, defaults)).toEqual({ gaze: 3, imu: 4 });
    });

    it('rejects rates that are not positive integers', () => {
        expect(() => parseStreamingRequest({ gaze_decimation: 0 }, defaults))
            .toThrow(new ConfigError('gaze_decimation must be a positive integer'));
        expect(() => parseStreamingRequest({ imu_decimation: '2.5' }, defaults)).toThrow(ConfigError);
        expect(() => parseStreamingRequest({ imu_decimation: true }, defaults)).toThrow(ConfigError);
    });
});
