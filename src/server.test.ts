import fs from 'fs';
import http from 'http';
import os from 'os';
import path from 'path';
import { Socket as BrowserSocket, io as connectTo } from 'socket.io-client';

import { FakeHeadUnit } from './__fixtures__/fake-head-unit';
import { EVENT_SIGNAL, G3Client } from './g3';
import { loadConfig } from './lib/config';
import { RecordingSaved, StatusSnapshot } from './lib/control-service';
import { DisplayFrame } from './lib/live-display';
import { AppServer, createServer } from './server';

const HOST = 'g3-test.local';

interface Reply {
    status: number;
    type: string | undefined;
    body: string;
}

let directory: string;
let unit: FakeHeadUnit;
let app: AppServer;
let port: number;

function request(method: string, pathname: string) {
    return new Promise<Reply>((resolve, reject) => {
        const req = http.request({ host: '127.0.0.1', port, method, path: pathname }, res => {
            let body = '';
            res.setEncoding('utf-8');
            res.on('data', chunk => body += chunk);
            res.on('end', () => resolve({ status: res.statusCode ?? 0, type: res.headers['content-type'], body }));
        });
        req.on('error', reject);
        req.end();
    });
}

/** Resolves with the next `event` payload that `accept` takes. */
function next<T>(socket: BrowserSocket, event: string, accept: (payload: T) => boolean = () => true) {
    return new Promise<T>(resolve => {
        const listener = (payload: T) => {
            if (accept(payload)) {
                socket.off(event, listener);
                resolve(payload);
            }
        };
        socket.on(event, listener);
    });
}

async function connectDevice(browser: BrowserSocket) {
    const connected = next<StatusSnapshot>(browser, 'status_update', status => status.connected);
    browser.emit('connect_device', HOST);
    return connected;
}

async function startStreaming(browser: BrowserSocket) {
    const streaming = next<StatusSnapshot>(browser, 'status_update', status => status.streaming);
    browser.emit('start_streaming', { gaze_decimation: 1, imu_decimation: 1 });
    return streaming;
}

beforeEach(async () => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'g3-server-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    unit = new FakeHeadUnit();
    const client = new G3Client({ openTransport: unit.open, keepAliveMs: 60000, clock: () => 1700000000 });
    app = createServer(loadConfig({ RECORDINGS_DIR: directory }), client);
    await new Promise<void>(resolve => app.http.listen(0, '127.0.0.1', resolve));
    const address = app.http.address();
    port = typeof address === 'object' && address !== null ? address.port : 0;
});

afterEach(async () => {
    await app.close();
    jest.restoreAllMocks();
    fs.rmSync(directory, { recursive: true, force: true });
});

describe('http api', () => {
    it('reports the status', async () => {
        const reply = await request('GET', '/api/status');

        expect(reply.status).toBe(200);
        expect(JSON.parse(reply.body)).toEqual({
            connected: false,
            hostname: null,
            device: null,
            streaming: false,
            calibrated: false,
            session: null,
        });
    });

    it('lists and serves recordings', async () => {
        fs.writeFileSync(path.join(directory, 'tobii_imu_20240305_070809.csv'), 'device_timestamp\n');

        const listed = JSON.parse((await request('GET', '/api/recordings')).body);
        const download = await request('GET', '/api/recordings/tobii_imu_20240305_070809.csv');

        expect(listed).toHaveLength(1);
        expect(listed[0]).toMatchObject({ filename: 'tobii_imu_20240305_070809.csv', kind: 'imu', size: 17 });
        expect(download).toEqual({ status: 200, type: 'text/csv', body: 'device_timestamp\n' });
    });

    it('answers 404 for files that are not recordings', async () => {
        fs.writeFileSync(path.join(directory, 'notes.txt'), 'private');

        const reply = await request('GET', '/api/recordings/notes.txt');

        expect(reply.status).toBe(404);
        expect(JSON.parse(reply.body)).toEqual({ error: 'Recording not found' });
    });

    it('answers 404 for a name that does not decode', async () => {
        const reply = await request('GET', '/api/recordings/%E0');

        expect(reply.status).toBe(404);
        expect(JSON.parse(reply.body)).toEqual({ error: 'Recording not found' });
    });

    it('accepts only GET', async () => {
        expect((await request('POST', '/api/status')).status).toBe(405);
    });
});

describe('socket commands', () => {
    let browser: BrowserSocket;

    beforeEach(async () => {
        browser = connectTo(`http://127.0.0.1:${port}`, { transports: ['websocket'], forceNew: true, autoConnect: false });
        const greeted = next<StatusSnapshot>(browser, 'status_update');
        browser.connect();
        expect(await greeted).toMatchObject({ connected: false, streaming: false });
    });

    afterEach(() => {
        browser.disconnect();
    });

    it('connects to the hostname sent as a string', async () => {
        const status = await connectDevice(browser);

        expect(status).toMatchObject({ connected: true, hostname: HOST, calibrated: false });
        expect(unit.sockets[0].url).toBe('ws://g3-test.local/websocket');
    });

    it('connects to the hostname sent in an object', async () => {
        const connected = next<StatusSnapshot>(browser, 'status_update', status => status.connected);
        browser.emit('connect_device', { hostname: HOST });

        expect((await connected).hostname).toBe(HOST);
        expect(unit.sockets).toHaveLength(1);
    });

    it('reports the calibration result and the calibrated status', async () => {
        await connectDevice(browser);
        const result = next(browser, 'calibration_result');
        const calibrated = next<StatusSnapshot>(browser, 'status_update', status => status.calibrated);

        browser.emit('run_calibration');

        expect(await result).toEqual({ success: true, message: 'Calibration succeeded' });
        expect((await calibrated).calibrated).toBe(true);
    });

    it('reports a calibration that could not run as a failed result and an error', async () => {
        const result = next(browser, 'calibration_result');
        const error = next(browser, 'error');

        browser.emit('run_calibration');

        expect(await result).toEqual({ success: false, message: 'Cannot run calibration: not connected to a device' });
        expect(await error).toEqual({ message: 'Cannot run calibration: not connected to a device' });
    });

    it('reports a failing command to the client that sent it', async () => {
        const error = next(browser, 'error');

        browser.emit('start_streaming');

        expect(await error).toEqual({ message: 'Cannot start streaming: not connected to a device' });
        expect(unit.sockets).toHaveLength(0);
    });

    it('broadcasts the status and the saved recording after stop_streaming', async () => {
        await connectDevice(browser);
        await startStreaming(browser);
        const stopped = next<StatusSnapshot>(browser, 'status_update', status => !status.streaming);
        const saved = next<RecordingSaved>(browser, 'recording_saved');

        browser.emit('stop_streaming');

        expect(await stopped).toMatchObject({ connected: true, streaming: false, session: null });
        expect(await saved).toMatchObject({ gazeSamples: 0, imuSamples: 0, fault: null });
        expect(fs.readdirSync(directory)).toHaveLength(3);
    });

    it('sends device events to the display as they arrive', async () => {
        await connectDevice(browser);
        await startStreaming(browser);
        const frame = next<DisplayFrame>(browser, 'new_data', data => data.type === 'event');

        unit.emit(EVENT_SIGNAL, [4.5, { tag: 'stimulus-on' }]);

        expect(await frame).toEqual({ type: 'event', data: '{"tag":"stimulus-on"}', ts: 1700000000 });
    });
});
