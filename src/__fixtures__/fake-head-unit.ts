import { Subject } from 'rxjs';

import { ConnectionError } from '../lib/errors';
import { DeviceTransport, TransportFactory } from '../lib/g3-utils';

interface Incoming {
    path: string;
    id: number;
    method: string;
    body: unknown;
}

/** One socket to the fake head unit. */
export class FakeSocket implements DeviceTransport {
    readonly incoming = new Subject<string>();
    readonly messages = this.incoming.asObservable();
    readonly requests: Incoming[] = [];
    readonly signals = new Map<number, string>();
    closed = false;

    constructor(readonly url: string, private readonly unit: FakeHeadUnit) {}

    send(text: string) {
        if (this.closed) {
            throw new Error('socket is closed');
        }
        const request: Incoming = JSON.parse(text);
        this.requests.push(request);
        this.unit.handle(this, request);
    }

    close() {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.incoming.complete();
    }

    reply(id: number, body: unknown) {
        this.incoming.next(JSON.stringify({ id, body }));
    }

    /** Drops the socket as if the network went away. */
    drop() {
        this.closed = true;
        this.incoming.complete();
    }
}

/**
 * In-process stand-in for a head unit's WebSocket API. Answers property
 * reads from `properties`, actions from `actions`, hands out signal ids and
 * lets a test push signal frames to subscribed sockets.
 */
export class FakeHeadUnit {
    readonly sockets: FakeSocket[] = [];
    reachable = true;
    /** When false, requests go unanswered. */
    responsive = true;
    properties: Record<string, unknown> = {
        'system.head-unit-serial': 'TG03B-TEST0001',
        'system.version': '1.20.0',
        'system/battery.level': 0.873,
        'system/battery.charging': false,
    };
    actions: Record<string, unknown> = {
        'system!available-gaze-frequencies': [50, 100],
        'settings.gaze-frequency': true,
        'rudimentary!keepalive': true,
        'rudimentary!calibrate': true,
    };
    failing: Record<string, string> = {};
    private readonly held = new Map<string, Array<{ socket: FakeSocket; id: number }>>();
    private nextSignal = 100;

    readonly open: TransportFactory = async url => {
        if (!this.reachable) {
            throw new ConnectionError(`Cannot reach ${url}: getaddrinfo ENOTFOUND`);
        }
        const socket = new FakeSocket(url, this);
        this.sockets.push(socket);
        return socket;
    };

    handle(socket: FakeSocket, request: Incoming) {
        if (!this.responsive) {
            return;
        }
        const { path, id, method, body } = request;
        if (this.failing[path]) {
            socket.incoming.next(JSON.stringify({ id, error: 1, message: this.failing[path] }));
            return;
        }
        const waiting = this.held.get(path);
        if (waiting) {
            waiting.push({ socket, id });
            return;
        }
        if (path.startsWith('rudimentary:')) {
            if (typeof body === 'number') {
                socket.signals.delete(body);
                socket.reply(id, true);
                return;
            }
            const signal = this.nextSignal++;
            socket.signals.set(signal, path);
            socket.reply(id, signal);
            return;
        }
        if (method === 'GET') {
            socket.reply(id, this.properties[path] ?? null);
            return;
        }
        socket.reply(id, this.actions[path] ?? null);
    }

    /** Leaves requests to `path` unanswered until `release`. */
    hold(path: string) {
        this.held.set(path, []);
    }

    release(path: string, body: unknown) {
        const waiting = this.held.get(path) ?? [];
        this.held.delete(path);
        waiting.forEach(({ socket, id }) => socket.reply(id, body));
    }

    /** Pushes one signal body to every open socket subscribed to `path`. */
    emit(path: string, body: unknown) {
        for (const socket of this.sockets) {
            if (socket.closed) {
                continue;
            }
            for (const [signal, signalPath] of socket.signals) {
                if (signalPath === path) {
                    socket.incoming.next(JSON.stringify({ signal, body }));
                }
            }
        }
    }

    requestsTo(path: string) {
        return this.sockets.flatMap(socket => socket.requests.filter(request => request.path === path));
    }
}

export function gazeBody(timestamp: number, x = 0.5, y = 0.5) {
    return [timestamp, {
        gaze2d: [x, y],
        gaze3d: [12.5, -3.25, 600],
        eyeleft: { gazeorigin: [31.5, 8.25, -22], gazedirection: [-0.1, 0.05, 0.99], pupildiameter: 3.12 },
        eyeright: { gazeorigin: [-30.75, 8, -21.5], gazedirection: [0.1, 0.05, 0.99], pupildiameter: 3.05 },
    }];
}

export function imuBody(timestamp: number) {
    return [timestamp, {
        accelerometer: [0.12, -9.79, 0.31],
        gyroscope: [1.5, -0.25, 0.75],
        magnetometer: [22.5, -4.5, 40.25],
    }];
}

/** Lets queued promise callbacks and rxjs work settle. */
export function flush() {
    return new Promise<void>(resolve => setImmediate(resolve));
}

export function sleep(ms: number) {
    return new Promise<void>(resolve => setTimeout(resolve, ms));
}
