import fs from 'fs/promises';
import path from 'path';

import { errorMessage } from './errors';

export type RecordingKind = 'gaze' | 'imu' | 'session';

/** What the session's metadata file says about a recording. */
export interface RecordingMetadata {
    serial: string | null;
    samples: number | null;
    startedAt: string | null;
}

export interface RecordingEntry {
    filename: string;
    kind: RecordingKind;
    size: number;
    modifiedAt: string;
    /** null when the session left no readable metadata file */
    metadata: RecordingMetadata | null;
}

type Fields = Record<string, unknown>;

const RECORDING_PATTERN = /^tobii_(gaze|imu|session)_(\d{8}_\d{6})\.(csv|json)$/;

export function recordingKind(filename: string): RecordingKind | null {
    const match = RECORDING_PATTERN.exec(filename);
    if (!match) {
        return null;
    }
    const [, kind, , extension] = match;
    if (kind === 'session') {
        return extension === 'json' ? 'session' : null;
    }
    if (kind === 'gaze' || kind === 'imu') {
        return extension === 'csv' ? kind : null;
    }
    return null;
}

/** Recording files in `directory`, newest first. A missing directory lists as empty. */
export async function listRecordings(directory: string): Promise<RecordingEntry[]> {
    let names: string[];
    try {
        names = await fs.readdir(directory);
    } catch (err) {
        if (isMissing(err)) {
            return [];
        }
        throw err;
    }

    const sidecars = new Map<string, Fields | null>();
    const entries: RecordingEntry[] = [];
    for (const filename of names) {
        const kind = recordingKind(filename);
        if (!kind) {
            continue;
        }
        const stamp = sessionStamp(filename);
        let sidecar = sidecars.get(stamp);
        if (sidecar === undefined) {
            sidecar = await readSidecar(directory, stamp);
            sidecars.set(stamp, sidecar);
        }
        const stats = await fs.stat(path.join(directory, filename));
        entries.push({
            filename,
            kind,
            size: stats.size,
            modifiedAt: stats.mtime.toISOString(),
            metadata: sidecar && metadataFor(kind, sidecar),
        });
    }
    return entries.sort((a, b) => b.modifiedAt.localeCompare(a.modifiedAt) || b.filename.localeCompare(a.filename));
}

/**
 * Maps a requested file name onto the recordings directory.
 * @returns null when the name is not a recording or the file does not exist
 */
export async function resolveRecording(directory: string, filename: string): Promise<string | null> {
    const name = path.basename(filename);
    if (name !== filename || !recordingKind(name)) {
        return null;
    }
    const filePath = path.join(directory, name);
    try {
        await fs.access(filePath);
    } catch (err) {
        if (isMissing(err)) {
            return null;
        }
        throw err;
    }
    return filePath;
}

function sessionStamp(filename: string) {
    return RECORDING_PATTERN.exec(filename)?.[2] ?? '';
}

function isFields(value: unknown): value is Fields {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function count(value: unknown) {
    return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

async function readSidecar(directory: string, stamp: string): Promise<Fields | null> {
    const filename = `tobii_session_${stamp}.json`;
    let text: string;
    try {
        text = await fs.readFile(path.join(directory, filename), 'utf-8');
    } catch (err) {
        if (isMissing(err)) {
            return null;
        }
        throw err;
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        console.warn(`[recordings] ignoring unreadable ${filename}: ${errorMessage(err)}`);
        return null;
    }
    return isFields(parsed) ? parsed : null;
}

function metadataFor(kind: RecordingKind, sidecar: Fields): RecordingMetadata {
    const device = sidecar.device;
    const gaze = count(sidecar.gazeSamples);
    const imu = count(sidecar.imuSamples);
    let samples: number | null;
    if (kind === 'gaze') {
        samples = gaze;
    } else if (kind === 'imu') {
        samples = imu;
    } else {
        samples = gaze !== null && imu !== null ? gaze + imu : null;
    }
    return {
        serial: isFields(device) && typeof device.serial === 'string' ? device.serial : null,
        samples,
        startedAt: typeof sidecar.startedAt === 'string' ? sidecar.startedAt : null,
    };
}

function isMissing(err: unknown) {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
