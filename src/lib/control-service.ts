import path from 'path';

import { AcquisitionSession, SessionResult } from './acquisition-session';
import { AppConfig } from './config';
import { ConfigError, G3Error, NotConnectedError, errorMessage } from './errors';
import { CalibrationResult, DecimationConfig, DeviceClient, DeviceStatus } from './g3-interfaces';
import { DisplaySink } from './sample-router';

/** The device operations the control surface drives; `G3Client` in production. */
export interface ControlledDevice extends DeviceClient {
    readonly isConnected: boolean;
    readonly hostname: string | null;
    readonly deviceStatus: DeviceStatus | null;
    connect(hostname: string): Promise<DeviceStatus>;
    refreshStatus(): Promise<DeviceStatus>;
    calibrate(): Promise<CalibrationResult>;
    disconnect(): Promise<void>;
}

export interface StatusSnapshot {
    connected: boolean;
    hostname: string | null;
    device: DeviceStatus | null;
    streaming: boolean;
    calibrated: boolean;
    session: {
        startedAt: string;
        decimation: DecimationConfig;
        gazeSamples: number;
        imuSamples: number;
    } | null;
}

export interface RecordingSaved {
    files: string[];
    gazeSamples: number;
    imuSamples: number;
    startedAt: string;
    fault: string | null;
}

export interface ControlEvents {
    status_update: StatusSnapshot;
    recording_saved: RecordingSaved;
    error: { message: string };
}

export type Notify = <E extends keyof ControlEvents>(event: E, payload: ControlEvents[E]) => void;

function readRate(name: string, value: unknown, fallback: number) {
    if (value === undefined || value === null || value === '') {
        return fallback;
    }
    const rate = typeof value === 'string' ? Number(value) : value;
    if (typeof rate !== 'number' || !Number.isInteger(rate) || rate < 1) {
        throw new ConfigError(`${name} must be a positive integer`);
    }
    return rate;
}

export function parseStreamingRequest(request: unknown, defaults: DecimationConfig): DecimationConfig {
    if (typeof request !== 'object' || request === null) {
        return defaults;
    }
    return {
        gaze: readRate('gaze_decimation', 'gaze_decimation' in request ? request.gaze_decimation : undefined, defaults.gaze),
        imu: readRate('imu_decimation', 'imu_decimation' in request ? request.imu_decimation : undefined, defaults.imu),
    };
}

function savedPayload(result: SessionResult): RecordingSaved {
    const summary = result.summary;
    return {
        files: summary ? [path.basename(summary.files.gaze), path.basename(summary.files.imu)] : [],
        gazeSamples: summary?.gazeRows ?? 0,
        imuSamples: summary?.imuRows ?? 0,
        startedAt: result.session.startedAt.toISOString(),
        fault: result.fault?.message ?? null,
    };
}

/**
 * The user-facing commands. Holds at most one running session and reports
 * every outcome through `notify`, including sessions ended by a stream fault.
 */
export class ControlService {
    private session: AcquisitionSession | null = null;
    private starting: Promise<AcquisitionSession> | null = null;
    private connecting = false;
    private calibrated = false;

    constructor(
        private readonly device: ControlledDevice,
        private readonly display: DisplaySink,
        private readonly config: AppConfig,
        private readonly notify: Notify,
    ) {}

    status(): StatusSnapshot {
        const session = this.session;
        return {
            connected: this.device.isConnected,
            hostname: this.device.hostname,
            device: this.device.deviceStatus,
            streaming: session !== null,
            calibrated: this.calibrated,
            session: session && {
                startedAt: session.session.startedAt.toISOString(),
                decimation: session.session.decimation,
                gazeSamples: session.router.countsFor('gaze').forwarded,
                imuSamples: session.router.countsFor('imu').forwarded,
            },
        };
    }

    async connect(hostname?: string | null) {
        const target = hostname?.trim() || this.config.hostname;
        if (!target) {
            throw new ConfigError('No device hostname given and G3_HOSTNAME is not set');
        }
        if (this.connecting) {
            throw new G3Error('Already connecting');
        }
        this.connecting = true;
        try {
            await this.device.connect(target);
        } finally {
            this.connecting = false;
        }
        this.calibrated = false;
        return this.status();
    }

    async disconnect() {
        await this.stopStreaming();
        await this.device.disconnect();
        this.calibrated = false;
        return this.status();
    }

    async refreshStatus() {
        await this.device.refreshStatus();
        return this.status();
    }

    async calibrate(): Promise<CalibrationResult> {
        const result = await this.device.calibrate();
        this.calibrated = result.success;
        return result;
    }

    async startStreaming(request?: unknown) {
        if (this.session || this.starting) {
            throw new G3Error('Already streaming');
        }
        const decimation = parseStreamingRequest(request, this.config.decimation);
        const hostname = this.device.hostname;
        if (!this.device.isConnected || hostname === null) {
            throw new NotConnectedError('start streaming');
        }
        const starting = AcquisitionSession.start(this.device, this.display, {
            hostname,
            decimation,
            directory: this.config.recordingsDir,
            device: this.device.deviceStatus,
        }).then(session => {
            this.session = session;
            void session.done.then(
                result => this.finish(session, result),
                err => console.error(`[control] session ended unexpectedly: ${errorMessage(err)}`),
            );
            return session;
        });
        this.starting = starting;
        try {
            await starting;
        } finally {
            this.starting = null;
        }
        return this.status();
    }

    /**
     * Stops the running session, or the one still starting once it is up.
     * @returns the saved recording, or null when nothing was streaming
     */
    async stopStreaming(): Promise<RecordingSaved | null> {
        const session = this.session ?? await this.pendingSession();
        if (!session) {
            return null;
        }
        return savedPayload(await session.stop());
    }

    /** A start that fails is reported to its own caller; here it only means nothing is streaming. */
    private async pendingSession() {
        const starting = this.starting;
        if (!starting) {
            return null;
        }
        return starting.then(session => session, () => null);
    }

    private finish(session: AcquisitionSession, result: SessionResult) {
        if (this.session === session) {
            this.session = null;
        }
        if (result.fault) {
            this.notify('error', { message: `Streaming stopped: ${result.fault.message}` });
        }
        this.notify('recording_saved', savedPayload(result));
        this.notify('status_update', this.status());
    }
}
