import fs from 'fs';
import http from 'http';
import path from 'path';
import { Server, Socket } from 'socket.io';

import { G3Client } from './g3';
import { AppConfig } from './lib/config';
import { ControlService } from './lib/control-service';
import { errorMessage } from './lib/errors';
import { DisplayFrame, LiveDisplaySink } from './lib/live-display';
import { listRecordings, resolveRecording } from './lib/recordings';

export interface AppServer {
    http: http.Server;
    io: Server;
    service: ControlService;
    client: G3Client;
    display: LiveDisplaySink;
    close(): Promise<void>;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
}

async function handleHttp(config: AppConfig, service: ControlService, req: http.IncomingMessage, res: http.ServerResponse) {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (req.method !== 'GET') {
        sendJson(res, 405, { error: 'Method not allowed' });
        return;
    }
    if (url.pathname === '/api/status') {
        sendJson(res, 200, service.status());
        return;
    }
    if (url.pathname === '/api/recordings') {
        sendJson(res, 200, await listRecordings(config.recordingsDir));
        return;
    }
    const download = /^\/api\/recordings\/([^/]+)$/.exec(url.pathname);
    if (download) {
        const filename = decodeFilename(download[1]);
        const filePath = filename === null ? null : await resolveRecording(config.recordingsDir, filename);
        if (!filePath) {
            sendJson(res, 404, { error: 'Recording not found' });
            return;
        }
        res.writeHead(200, {
            'Content-Type': path.extname(filePath) === '.json' ? 'application/json' : 'text/csv',
            'Content-Disposition': `attachment; filename="${filename}"`,
        });
        fs.createReadStream(filePath)
            .on('error', err => {
                console.error(`[server] reading ${filename} failed: ${errorMessage(err)}`);
                res.destroy(err);
            })
            .pipe(res);
        return;
    }
    sendJson(res, 404, { error: 'Not found' });
}

function decodeFilename(encoded: string) {
    try {
        return decodeURIComponent(encoded);
    } catch (err) {
        if (err instanceof URIError) {
            return null;
        }
        throw err;
    }
}

/** Runs one command and reports failure to the client that issued it. */
function command<T>(socket: Socket, name: string, run: (payload: unknown) => Promise<T>, reply: (result: T) => void) {
    socket.on(name, (payload: unknown) => {
        run(payload).then(reply).catch(err => {
            console.error(`[server] ${name} failed: ${errorMessage(err)}`);
            socket.emit('error', { message: errorMessage(err) });
        });
    });
}

export function createServer(config: AppConfig, client = new G3Client({
    requestTimeoutMs: config.requestTimeoutMs,
    keepAliveMs: config.keepAliveMs,
    gazeFrequency: config.gazeFrequency,
    bufferSize: config.streamBufferSize,
})): AppServer {
    // Samples may be dropped under load; device events may not.
    const emitFrame = (event: string, frame: DisplayFrame) => frame.type === 'gaze' || frame.type === 'imu'
        ? io.volatile.emit(event, frame)
        : io.emit(event, frame);
    const display = new LiveDisplaySink({ emit: emitFrame }, config.displayIntervalMs);
    const events = client.deviceEvents.subscribe(event => display.pushEvent(event));
    const control = new ControlService(client, display, config, (event, payload) => {
        io.emit(event, payload);
    });
    const server = http.createServer((req, res) => {
        handleHttp(config, control, req, res).catch(err => {
            console.error(`[server] ${req.method} ${req.url} failed: ${errorMessage(err)}`);
            if (!res.headersSent) {
                sendJson(res, 500, { error: errorMessage(err) });
            } else {
                res.destroy();
            }
        });
    });
    const io = new Server(server, { cors: { origin: '*' } });

    io.on('connection', socket => {
        socket.emit('status_update', control.status());
        const broadcastStatus = () => io.emit('status_update', control.status());

        command(socket, 'connect_device', payload => control.connect(hostnameFrom(payload)), broadcastStatus);
        command(socket, 'disconnect_device', () => control.disconnect(), broadcastStatus);
        command(socket, 'refresh_status', () => control.refreshStatus(), broadcastStatus);
        command(socket, 'start_streaming', payload => control.startStreaming(payload), broadcastStatus);
        command(socket, 'stop_streaming', () => control.stopStreaming(), broadcastStatus);
        const calibrate = () => control.calibrate().catch(err => {
            socket.emit('calibration_result', { success: false, message: errorMessage(err) });
            throw err;
        });
        command(socket, 'run_calibration', calibrate, result => {
            socket.emit('calibration_result', result);
            broadcastStatus();
        });
    });

    return {
        http: server,
        io,
        service: control,
        client,
        display,
        async close() {
            await control.disconnect();
            events.unsubscribe();
            display.dispose();
            await new Promise<void>(resolve => io.close(() => resolve()));
        },
    };
}

function hostnameFrom(payload: unknown) {
    if (typeof payload === 'string') {
        return payload;
    }
    if (typeof payload === 'object' && payload !== null && 'hostname' in payload && typeof payload.hostname === 'string') {
        return payload.hostname;
    }
    return null;
}
