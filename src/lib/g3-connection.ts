import { Observable, concat, defer, merge, EMPTY, throwError, firstValueFrom, TimeoutError } from 'rxjs';
import { filter, map, share, take, timeout } from 'rxjs/operators';

import { ConnectionError, DeviceRequestError } from './errors';
import { G3Message } from './g3-interfaces';
import { decodeMessage } from './g3-parse';
import { DeviceTransport, encodeRequest } from './g3-utils';

/**
 * Request/response and signal multiplexing over one G3 API socket.
 *
 * `messages` errors with a ConnectionError when the socket goes away without
 * `close()` having been called, so every pending request and signal
 * subscriber sees the loss.
 */
export class G3Connection {
    readonly messages: Observable<G3Message>;
    private nextId = 1;
    private closed = false;

    constructor(private readonly transport: DeviceTransport, private readonly requestTimeoutMs: number) {
        const lost = defer(() => this.closed ? EMPTY : throwError(() => new ConnectionError('Connection to device closed')));
        this.messages = concat(transport.messages, lost).pipe(
            map(decodeMessage),
            filter((message): message is G3Message => message !== null),
            share(),
        );
    }

    get isClosed() {
        return this.closed;
    }

    async get(path: string): Promise<unknown> {
        return this.request('GET', path, null, this.requestTimeoutMs);
    }

    async post(path: string, body: unknown = [], timeoutMs = this.requestTimeoutMs): Promise<unknown> {
        return this.request('POST', path, body, timeoutMs);
    }

    /** Subscribes to a signal path; the promise resolves once the device has accepted it. */
    async subscribe(path: string): Promise<SignalSubscription> {
        const id = await this.post(path, null);
        if (typeof id !== 'number') {
            throw new ConnectionError(`${path}: device returned no signal id`);
        }
        const bodies = this.messages.pipe(
            filter(message => message.type === 'signal' && message.signal === id),
            map(message => message.type === 'signal' ? message.body : undefined),
        );
        return { path, id, bodies, unsubscribe: () => this.post(path, id) };
    }

    close() {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.transport.close();
    }

    private async request(method: 'GET' | 'POST', path: string, body: unknown, timeoutMs: number): Promise<unknown> {
        if (this.closed) {
            throw new ConnectionError(`${path}: connection is closed`);
        }
        const id = this.nextId++;
        const reply = this.messages.pipe(
            filter(message => message.type !== 'signal' && message.id === id),
            take(1),
            timeout({ first: timeoutMs }),
        );
        const send = defer(() => {
            this.transport.send(encodeRequest({ path, id, method, body }));
            return EMPTY;
        });

        let message: G3Message;
        try {
            message = await firstValueFrom(merge(reply, send));
        } catch (err) {
            if (err instanceof ConnectionError) {
                throw err;
            }
            if (err instanceof TimeoutError) {
                throw new ConnectionError(`${path}: no response within ${timeoutMs} ms`, err);
            }
            throw new ConnectionError(`${path}: request failed`, err);
        }
        if (message.type === 'error') {
            throw new DeviceRequestError(path, message.error, message.message);
        }
        return message.type === 'response' ? message.body : undefined;
    }
}

export interface SignalSubscription {
    readonly path: string;
    readonly id: number;
    readonly bodies: Observable<unknown>;
    unsubscribe(): Promise<unknown>;
}
