import { DeviceEvent, DeviceEventKind, G3Message, GazeSample, ImuSample, Vec2, Vec3 } from './g3-interfaces';
import { ConnectionError } from './errors';

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function component(values: unknown, index: number) {
    return Array.isArray(values) ? toNumber(values[index]) : null;
}

function vec2(values: unknown): Vec2 {
    return [component(values, 0), component(values, 1)];
}

function vec3(values: unknown): Vec3 {
    return [component(values, 0), component(values, 1), component(values, 2)];
}

/**
 * Classifies one text frame from the device.
 * @returns null for frames that are not JSON or match none of the API shapes
 */
export function decodeMessage(text: string): G3Message | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return null;
    }
    if (!isFields(parsed)) {
        return null;
    }
    if (typeof parsed.signal === 'number') {
        return { type: 'signal', signal: parsed.signal, body: parsed.body };
    }
    if (typeof parsed.id !== 'number') {
        return null;
    }
    if (parsed.error !== undefined && parsed.error !== null) {
        const error = typeof parsed.error === 'number' ? parsed.error : String(parsed.error);
        const message = typeof parsed.message === 'string' ? parsed.message : 'request failed';
        return { type: 'error', id: parsed.id, error, message };
    }
    return { type: 'response', id: parsed.id, body: parsed.body };
}

/**
 * Splits a rudimentary signal body into its device timestamp and data fields.
 * The head unit sends `[timestamp, data]`; a bare object carrying a
 * `timestamp` key is accepted too.
 */
export function splitSignalBody(body: unknown): [number | null, Fields] {
    if (Array.isArray(body) && body.length >= 2) {
        return [toNumber(body[0]), isFields(body[1]) ? body[1] : {}];
    }
    if (isFields(body)) {
        return [toNumber(body.timestamp), body];
    }
    return [null, {}];
}

export function parseGazeSample(body: unknown, localTimestamp: number): GazeSample {
    const [deviceTimestamp, data] = splitSignalBody(body);
    const left = isFields(data.eyeleft) ? data.eyeleft : {};
    const right = isFields(data.eyeright) ? data.eyeright : {};
    return {
        kind: 'gaze',
        deviceTimestamp,
        localTimestamp,
        gaze2d: vec2(data.gaze2d),
        gaze3d: vec3(data.gaze3d),
        leftGazeOrigin: vec3(left.gazeorigin),
        leftGazeDirection: vec3(left.gazedirection),
        rightGazeOrigin: vec3(right.gazeorigin),
        rightGazeDirection: vec3(right.gazedirection),
        pupilDiameterLeft: toNumber(left.pupildiameter),
        pupilDiameterRight: toNumber(right.pupildiameter),
    };
}

export function parseImuSample(body: unknown, localTimestamp: number): ImuSample {
    const [deviceTimestamp, data] = splitSignalBody(body);
    return {
        kind: 'imu',
        deviceTimestamp,
        localTimestamp,
        accelerometer: vec3(data.accelerometer),
        gyroscope: vec3(data.gyroscope),
        magnetometer: vec3(data.magnetometer),
    };
}

/** Event and sync-port bodies carry free-form data, kept as sent. */
export function parseDeviceEvent(kind: DeviceEventKind, body: unknown, localTimestamp: number): DeviceEvent {
    if (Array.isArray(body) && body.length >= 2) {
        return { kind, deviceTimestamp: toNumber(body[0]), localTimestamp, data: body[1] };
    }
    return { kind, deviceTimestamp: isFields(body) ? toNumber(body.timestamp) : null, localTimestamp, data: body };
}

// //////////////// //
// PROPERTY READERS //
// //////////////// //

export function readString(path: string, value: unknown) {
    if (typeof value !== 'string') {
        throw new ConnectionError(`${path}: expected a string, got ${JSON.stringify(value)}`);
    }
    return value;
}

export function readNumber(path: string, value: unknown) {
    const number = toNumber(value);
    if (number === null) {
        throw new ConnectionError(`${path}: expected a number, got ${JSON.stringify(value)}`);
    }
    return number;
}

export function readBoolean(path: string, value: unknown) {
    if (typeof value !== 'boolean') {
        throw new ConnectionError(`${path}: expected a boolean, got ${JSON.stringify(value)}`);
    }
    return value;
}

export function readNumberList(value: unknown): number[] {
    if (!Array.isArray(value)) {
        return [];
    }
    return value.map(toNumber).filter((entry): entry is number => entry !== null);
}
