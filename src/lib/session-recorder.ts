import fs from 'fs';
import path from 'path';

import { RecordingIOError, errorMessage } from './errors';
import { DecimationConfig, DeviceStatus, SampleKind, TaggedSample } from './g3-interfaces';
import { GAZE_COLUMNS, IMU_COLUMNS, formatLine, sampleRow } from './csv-schema';
import { RecorderSink } from './sample-router';

export interface SessionFiles {
    readonly gaze: string;
    readonly imu: string;
    readonly metadata: string;
}

/** One stream-start to stream-stop interval. Immutable once created. */
export interface Session {
    readonly startedAt: Date;
    readonly hostname: string;
    readonly decimation: DecimationConfig;
    readonly device: DeviceStatus | null;
    readonly files: SessionFiles;
}

export interface RecordingSummary {
    files: SessionFiles;
    startedAt: Date;
    stoppedAt: Date;
    gazeRows: number;
    imuRows: number;
    skippedRows: number;
    fault: string | null;
}

function pad(value: number) {
    return String(value).padStart(2, '0');
}

/** Local-time `YYYYMMDD_HHMMSS`. */
export function fileStamp(date: Date) {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `${day}_${time}`;
}

export function sessionFiles(directory: string, startedAt: Date): SessionFiles {
    const stamp = fileStamp(startedAt);
    return {
        gaze: path.join(directory, `tobii_gaze_${stamp}.csv`),
        imu: path.join(directory, `tobii_imu_${stamp}.csv`),
        metadata: path.join(directory, `tobii_session_${stamp}.json`),
    };
}

export function createSession(options: {
    directory: string;
    hostname: string;
    decimation: DecimationConfig;
    device?: DeviceStatus | null;
    startedAt?: Date;
}): Session {
    const startedAt = options.startedAt ?? new Date();
    return Object.freeze({
        startedAt,
        hostname: options.hostname,
        decimation: Object.freeze({ ...options.decimation }),
        device: options.device ? Object.freeze({ ...options.device }) : null,
        files: Object.freeze(sessionFiles(options.directory, startedAt)),
    });
}

interface OpenFile {
    path: string;
    fd: number;
}

/**
 * Writes one session's samples to a gaze CSV and an IMU CSV.
 *
 * Both files get their header row as soon as they are opened, so a session
 * cut short still leaves valid CSV. Rows are appended synchronously in
 * arrival order; a row that fails to write is logged and skipped.
 */
export class SessionRecorder implements RecorderSink {
    private session: Session | null = null;
    private files: Record<SampleKind, OpenFile> | null = null;
    private rows: Record<SampleKind, number> = { gaze: 0, imu: 0 };
    private skipped = 0;
    private summary: RecordingSummary | null = null;

    get isOpen() {
        return this.files !== null;
    }

    open(session: Session) {
        if (this.session) {
            throw new RecordingIOError('Recorder already holds a session');
        }
        const gaze = createCsv(session.files.gaze, GAZE_COLUMNS);
        let imu: OpenFile;
        try {
            imu = createCsv(session.files.imu, IMU_COLUMNS);
        } catch (err) {
            discard(gaze);
            throw err;
        }
        this.session = session;
        this.files = { gaze, imu };
        console.log(`[recorder] recording to ${gaze.path} and ${imu.path}`);
    }

    write(sample: TaggedSample) {
        if (!this.files) {
            console.warn(`[recorder] no open session, ${sample.kind} sample skipped`);
            this.skipped++;
            return false;
        }
        const file = this.files[sample.kind];
        try {
            fs.writeSync(file.fd, formatLine(sampleRow(sample)));
        } catch (err) {
            this.skipped++;
            console.warn(`[recorder] ${sample.kind} row skipped: ${errorMessage(err)}`);
            return false;
        }
        this.rows[sample.kind]++;
        return true;
    }

    /**
     * Closes both files and writes the session's metadata sidecar. Runs once;
     * later calls return the first summary.
     * @returns null when no session was ever opened
     */
    close(fault?: string): RecordingSummary | null {
        if (this.summary) {
            return this.summary;
        }
        const session = this.session;
        const files = this.files;
        if (!session || !files) {
            return null;
        }
        this.files = null;
        closeFile(files.gaze);
        closeFile(files.imu);

        const summary: RecordingSummary = {
            files: session.files,
            startedAt: session.startedAt,
            stoppedAt: new Date(),
            gazeRows: this.rows.gaze,
            imuRows: this.rows.imu,
            skippedRows: this.skipped,
            fault: fault ?? null,
        };
        this.summary = summary;
        writeMetadata(session, summary);
        console.log(`[recorder] saved ${summary.gazeRows} gaze and ${summary.imuRows} imu rows`);
        return summary;
    }
}

function createCsv(filePath: string, columns: readonly string[]): OpenFile {
    let fd: number;
    try {
        fd = fs.openSync(filePath, 'wx');
    } catch (err) {
        throw new RecordingIOError(`Cannot create ${filePath}: ${errorMessage(err)}`, err);
    }
    const file = { path: filePath, fd };
    try {
        fs.writeSync(fd, formatLine(columns));
    } catch (err) {
        discard(file);
        throw new RecordingIOError(`Cannot write header to ${filePath}: ${errorMessage(err)}`, err);
    }
    return file;
}

function closeFile(file: OpenFile) {
    try {
        fs.closeSync(file.fd);
    } catch (err) {
        console.error(`[recorder] could not close ${file.path}: ${errorMessage(err)}`);
    }
}

function discard(file: OpenFile) {
    closeFile(file);
    try {
        fs.unlinkSync(file.path);
    } catch (err) {
        console.error(`[recorder] could not remove ${file.path}: ${errorMessage(err)}`);
    }
}

function writeMetadata(session: Session, summary: RecordingSummary) {
    const metadata = {
        hostname: session.hostname,
        startedAt: summary.startedAt.toISOString(),
        stoppedAt: summary.stoppedAt.toISOString(),
        decimation: session.decimation,
        device: session.device,
        files: {
            gaze: path.basename(session.files.gaze),
            imu: path.basename(session.files.imu),
        },
        gazeSamples: summary.gazeRows,
        imuSamples: summary.imuRows,
        skippedSamples: summary.skippedRows,
        fault: summary.fault,
    };
    try {
        fs.writeFileSync(session.files.metadata, JSON.stringify(metadata, null, 2) + '\n');
    } catch (err) {
        console.error(`[recorder] could not write ${session.files.metadata}: ${errorMessage(err)}`);
    }
}
