import { BehaviorSubject, EMPTY, Subject, Subscription, defer, interval, merge } from 'rxjs';
import { catchError, concatMap, map, tap } from 'rxjs/operators';

import { CalibrationResult, DecimationConfig, DeviceClient, DeviceEvent, DeviceStatus } from './lib/g3-interfaces';
import { G3Connection, SignalSubscription } from './lib/g3-connection';
import { ConnectionError, G3Error, NotConnectedError, StreamFault, errorMessage } from './lib/errors';
import {
    parseDeviceEvent, parseGazeSample, parseImuSample, readBoolean, readNumber, readNumberList, readString,
} from './lib/g3-parse';
import { TransportFactory, deviceUrl, openTransport } from './lib/g3-utils';
import { SampleStream } from './lib/sample-stream';

export * from './lib/g3-interfaces';

export const GAZE_SIGNAL = 'rudimentary:gaze';
export const IMU_SIGNAL = 'rudimentary:imu';
export const EVENT_SIGNAL = 'rudimentary:event';
export const SYNC_PORT_SIGNAL = 'rudimentary:sync-port';
const KEEPALIVE_ACTION = 'rudimentary!keepalive';
const CALIBRATE_ACTION = 'rudimentary!calibrate';
/** Consecutive unanswered keep-alives after which the head unit has stopped streaming. */
const KEEPALIVE_MAX_MISSES = 3;

const SERIAL_PROPERTY = 'system.head-unit-serial';
const VERSION_PROPERTY = 'system.version';
const BATTERY_LEVEL_PROPERTY = 'system/battery.level';
const BATTERY_CHARGING_PROPERTY = 'system/battery.charging';
const GAZE_FREQUENCIES_ACTION = 'system!available-gaze-frequencies';
const GAZE_FREQUENCY_PROPERTY = 'settings.gaze-frequency';

export interface G3ClientOptions {
    requestTimeoutMs?: number;
    calibrationTimeoutMs?: number;
    keepAliveMs?: number;
    /** Gaze rate to select on connect when the head unit offers it. */
    gazeFrequency?: number;
    bufferSize?: number;
    openTransport?: TransportFactory;
    /** Local receive time in seconds. */
    clock?: () => number;
}

interface ActiveStream {
    connection: G3Connection;
    stream: SampleStream;
    signals: SignalSubscription[];
    keepAlive: Subscription;
    events: Subscription;
}

export class G3Client implements DeviceClient {
    private control: G3Connection | null = null;
    private controlWatch: Subscription | null = null;
    private active: ActiveStream | null = null;
    private connecting: string | null = null;
    private connectCancelled = false;
    private streamStarting = false;
    private streamCancelled = false;

    private readonly requestTimeoutMs: number;
    private readonly calibrationTimeoutMs: number;
    private readonly keepAliveMs: number;
    private readonly gazeFrequency: number;
    private readonly bufferSize: number;
    private readonly openTransport: TransportFactory;
    private readonly clock: () => number;

    public hostname: string | null = null;
    public deviceStatus: DeviceStatus | null = null;
    public connectionStatus = new BehaviorSubject<boolean>(false);
    /** Scene events and sync-port signals of the active stream. */
    public deviceEvents = new Subject<DeviceEvent>();

    constructor(options: G3ClientOptions = {}) {
        this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
        this.calibrationTimeoutMs = options.calibrationTimeoutMs ?? 60000;
        this.keepAliveMs = options.keepAliveMs ?? 2000;
        this.gazeFrequency = options.gazeFrequency ?? 50;
        this.bufferSize = options.bufferSize ?? 2000;
        this.openTransport = options.openTransport ?? openTransport;
        this.clock = options.clock ?? (() => Date.now() / 1000);
    }

    get isConnected() {
        return this.control !== null;
    }

    get isStreaming() {
        return this.active !== null;
    }

    async connect(hostname: string): Promise<DeviceStatus> {
        if (this.control) {
            throw new G3Error(`Already connected to ${this.hostname}`);
        }
        if (this.connecting !== null) {
            throw new G3Error(`Already connecting to ${this.connecting}`);
        }
        this.connecting = hostname;
        this.connectCancelled = false;
        try {
            return await this.openControl(hostname);
        } finally {
            this.connecting = null;
        }
    }

    async refreshStatus(): Promise<DeviceStatus> {
        const connection = this.requireControl('refresh status');
        const battery = await this.readBattery(connection);
        const status = this.deviceStatus ? { ...this.deviceStatus, ...battery } : await this.readStatus(connection);
        this.deviceStatus = status;
        return status;
    }

    async calibrate(): Promise<CalibrationResult> {
        const connection = this.requireControl('run calibration');
        // The head unit only calibrates while the rudimentary API is kept alive.
        await connection.post(KEEPALIVE_ACTION);
        const keepAlive = this.active ? null : this.keepAlive(connection);
        let result: unknown;
        try {
            result = await connection.post(CALIBRATE_ACTION, [], this.calibrationTimeoutMs);
        } finally {
            keepAlive?.unsubscribe();
        }
        const success = result === true;
        console.log(`[g3] calibration ${success ? 'succeeded' : 'failed'}`);
        return {
            success,
            message: success
                ? 'Calibration succeeded'
                : 'Calibration failed: the participant should look at the calibration target and retry',
        };
    }

    async startStream(decimation: DecimationConfig): Promise<SampleStream> {
        const hostname = this.hostname;
        if (!this.control || hostname === null) {
            throw new NotConnectedError('start streaming');
        }
        if (this.active || this.streamStarting) {
            throw new G3Error('Already streaming');
        }
        this.streamStarting = true;
        this.streamCancelled = false;
        try {
            return await this.openStream(hostname, decimation);
        } finally {
            this.streamStarting = false;
        }
    }

    /**
     * Ends the active sample stream. Safe to call at any time and from any
     * caller; once it returns no further samples are delivered and the
     * streaming socket is closed.
     */
    async stopStream(): Promise<void> {
        if (this.streamStarting) {
            this.streamCancelled = true;
        }
        const active = this.active;
        if (!active) {
            return;
        }
        this.active = null;
        active.stream.end();
        active.keepAlive.unsubscribe();
        active.events.unsubscribe();
        try {
            if (!active.connection.isClosed) {
                await Promise.all(active.signals.map(signal => signal.unsubscribe()));
            }
        } catch (err) {
            console.warn(`[g3] could not unsubscribe streams: ${errorMessage(err)}`);
        } finally {
            active.connection.close();
        }
        console.log('[g3] streaming stopped');
    }

    async disconnect() {
        if (this.connecting !== null) {
            this.connectCancelled = true;
        }
        await this.stopStream();
        const connection = this.control;
        if (!connection) {
            return;
        }
        this.dropControl();
        connection.close();
        console.log('[g3] disconnected');
    }

    private async openControl(hostname: string) {
        const connection = await this.openConnection(hostname);
        let status: DeviceStatus;
        try {
            status = await this.readStatus(connection);
        } catch (err) {
            connection.close();
            throw err instanceof ConnectionError ? err : new ConnectionError(`Handshake with ${hostname} failed`, err);
        }
        if (this.connectCancelled) {
            connection.close();
            throw new ConnectionError(`Connection to ${hostname} cancelled by disconnect`);
        }

        this.control = connection;
        this.hostname = hostname;
        this.deviceStatus = status;
        this.controlWatch = connection.messages.subscribe({
            error: err => this.onControlLost(connection, err),
        });
        this.connectionStatus.next(true);
        console.log(`[g3] connected to ${hostname} (serial=${status.serial}, fw=${status.firmware}, battery=${status.battery}%, charging=${status.charging})`);
        return status;
    }

    private async openStream(hostname: string, decimation: DecimationConfig) {
        const connection = await this.openConnection(hostname);
        try {
            const gaze = await connection.subscribe(GAZE_SIGNAL);
            const imu = await connection.subscribe(IMU_SIGNAL);
            const event = await connection.subscribe(EVENT_SIGNAL);
            const sync = await connection.subscribe(SYNC_PORT_SIGNAL);
            await connection.post(KEEPALIVE_ACTION);
            if (this.streamCancelled) {
                throw new G3Error('Streaming stopped before it started');
            }

            const samples = merge(
                gaze.bodies.pipe(map(body => parseGazeSample(body, this.clock()))),
                imu.bodies.pipe(map(body => parseImuSample(body, this.clock()))),
            );
            const stream = new SampleStream(samples, decimation, this.bufferSize);
            const keepAlive = this.keepAlive(connection, err => stream.fail(
                new StreamFault(`Device keep-alive failed: ${errorMessage(err)}`, err),
            ));
            const events = merge(
                event.bodies.pipe(map(body => parseDeviceEvent('event', body, this.clock()))),
                sync.bodies.pipe(map(body => parseDeviceEvent('sync', body, this.clock()))),
            ).subscribe({
                next: received => {
                    console.log(`[g3] ${received.kind} received: ${JSON.stringify(received.data)}`);
                    this.deviceEvents.next(received);
                },
                error: err => console.warn(`[g3] device events stopped: ${errorMessage(err)}`),
            });
            this.active = { connection, stream, signals: [gaze, imu, event, sync], keepAlive, events };
            console.log(`[g3] streaming from ${hostname} (gaze 1/${decimation.gaze}, imu 1/${decimation.imu})`);
            return stream;
        } catch (err) {
            connection.close();
            throw err;
        }
    }

    /**
     * Posts a keep-alive every `keepAliveMs` until unsubscribed. A missed
     * reply is logged and the next tick tries again; `onLost` runs once
     * KEEPALIVE_MAX_MISSES replies in a row have gone missing.
     */
    private keepAlive(connection: G3Connection, onLost?: (err: unknown) => void) {
        let misses = 0;
        return interval(this.keepAliveMs)
            .pipe(concatMap(() => defer(() => connection.post(KEEPALIVE_ACTION)).pipe(
                tap(() => misses = 0),
                catchError(err => {
                    misses++;
                    console.warn(`[g3] keep-alive missed (${misses} in a row): ${errorMessage(err)}`);
                    if (misses === KEEPALIVE_MAX_MISSES) {
                        onLost?.(err);
                    }
                    return EMPTY;
                }),
            )))
            .subscribe();
    }

    private async openConnection(hostname: string) {
        try {
            const transport = await this.openTransport(deviceUrl(hostname), this.requestTimeoutMs);
            return new G3Connection(transport, this.requestTimeoutMs);
        } catch (err) {
            throw err instanceof ConnectionError ? err : new ConnectionError(`Cannot connect to ${hostname}`, err);
        }
    }

    private async readStatus(connection: G3Connection): Promise<DeviceStatus> {
        const serial = readString(SERIAL_PROPERTY, await connection.get(SERIAL_PROPERTY));
        const firmware = readString(VERSION_PROPERTY, await connection.get(VERSION_PROPERTY));
        const battery = await this.readBattery(connection);
        const gazeFrequency = await this.selectGazeFrequency(connection);
        return { serial, firmware, gazeFrequency, ...battery };
    }

    private async readBattery(connection: G3Connection) {
        const level = readNumber(BATTERY_LEVEL_PROPERTY, await connection.get(BATTERY_LEVEL_PROPERTY));
        const charging = readBoolean(BATTERY_CHARGING_PROPERTY, await connection.get(BATTERY_CHARGING_PROPERTY));
        return { battery: Math.round(level * 1000) / 10, charging };
    }

    private async selectGazeFrequency(connection: G3Connection) {
        const offered = readNumberList(await connection.post(GAZE_FREQUENCIES_ACTION));
        if (offered.length === 0) {
            return null;
        }
        const chosen = offered.includes(this.gazeFrequency) ? this.gazeFrequency : Math.max(...offered);
        if (chosen !== this.gazeFrequency) {
            console.warn(`[g3] gaze frequency ${this.gazeFrequency} Hz not offered, using ${chosen} Hz`);
        }
        await connection.post(GAZE_FREQUENCY_PROPERTY, chosen);
        return chosen;
    }

    private requireControl(action: string) {
        if (!this.control) {
            throw new NotConnectedError(action);
        }
        return this.control;
    }

    private onControlLost(connection: G3Connection, err: unknown) {
        if (this.control !== connection) {
            return;
        }
        console.error(`[g3] lost connection to ${this.hostname}: ${errorMessage(err)}`);
        this.dropControl();
        connection.close();
    }

    private dropControl() {
        this.controlWatch?.unsubscribe();
        this.controlWatch = null;
        this.control = null;
        this.hostname = null;
        this.deviceStatus = null;
        this.connectionStatus.next(false);
    }
}
