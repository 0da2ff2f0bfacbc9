import WebSocket from 'ws';
import { Observable, Subject } from 'rxjs';

import { ConnectionError } from './errors';
import { G3Request } from './g3-interfaces';

export const G3_SUBPROTOCOL = 'g3api';

/** A text-frame duplex channel to the head unit. `messages` completes when the socket closes. */
export interface DeviceTransport {
    readonly messages: Observable<string>;
    send(text: string): void;
    close(): void;
}

export type TransportFactory = (url: string, timeoutMs: number) => Promise<DeviceTransport>;

export function deviceUrl(hostname: string) {
    return `ws://${hostname}/websocket`;
}

export function encodeRequest(request: G3Request) {
    return JSON.stringify(request);
}

export function decodeFrame(data: WebSocket.RawData) {
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf-8');
    }
    if (data instanceof ArrayBuffer) {
        return Buffer.from(data).toString('utf-8');
    }
    return data.toString('utf-8');
}

export function openTransport(url: string, timeoutMs: number): Promise<DeviceTransport> {
    return new Promise((resolve, reject) => {
        const socket = new WebSocket(url, G3_SUBPROTOCOL, { handshakeTimeout: timeoutMs });
        const messages = new Subject<string>();
        let opened = false;

        socket.on('open', () => {
            opened = true;
            resolve({
                messages: messages.asObservable(),
                send: text => socket.send(text),
                close: () => socket.close(),
            });
        });
        socket.on('message', (data: WebSocket.RawData) => messages.next(decodeFrame(data)));
        socket.on('error', (err: Error) => {
            if (opened) {
                messages.error(new ConnectionError(`Socket error: ${err.message}`, err));
            } else {
                reject(new ConnectionError(`Cannot reach ${url}: ${err.message}`, err));
            }
        });
        socket.on('close', () => {
            if (!opened) {
                reject(new ConnectionError(`Connection to ${url} closed during handshake`));
            }
            messages.complete();
        });
    });
}
