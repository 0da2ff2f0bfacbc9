/** Device vectors; a component is null when the device did not report it. */
export type Vec2 = [number | null, number | null];
export type Vec3 = [number | null, number | null, number | null];

export type SampleKind = 'gaze' | 'imu';

export interface GazeSample {
    kind: 'gaze';
    deviceTimestamp: number | null;
    localTimestamp: number; // seconds since epoch, taken on receipt
    gaze2d: Vec2; // normalized to the scene camera, 0..1
    gaze3d: Vec3;
    leftGazeOrigin: Vec3;
    leftGazeDirection: Vec3;
    rightGazeOrigin: Vec3;
    rightGazeDirection: Vec3;
    pupilDiameterLeft: number | null;
    pupilDiameterRight: number | null;
}

export interface ImuSample {
    kind: 'imu';
    deviceTimestamp: number | null;
    localTimestamp: number;
    accelerometer: Vec3;
    gyroscope: Vec3;
    magnetometer: Vec3;
}

export type TaggedSample = GazeSample | ImuSample;

/** Scene events and sync-port edges; shown live, never recorded. */
export type DeviceEventKind = 'event' | 'sync';

export interface DeviceEvent {
    kind: DeviceEventKind;
    deviceTimestamp: number | null;
    localTimestamp: number;
    data: unknown;
}

export interface DecimationConfig {
    readonly gaze: number;
    readonly imu: number;
}

/** The operations a session needs from a device. */
export interface DeviceClient {
    startStream(decimation: DecimationConfig): Promise<AsyncIterable<TaggedSample>>;
    stopStream(): Promise<void>;
}

export interface DeviceStatus {
    serial: string;
    firmware: string;
    battery: number; // percent
    charging: boolean;
    gazeFrequency: number | null;
}

export interface CalibrationResult {
    success: boolean;
    message: string;
}

/** A request sent over the G3 WebSocket API. */
export interface G3Request {
    path: string;
    id: number;
    method: 'GET' | 'POST';
    body: unknown;
}

export type G3Message =
    | { type: 'response'; id: number; body: unknown }
    | { type: 'error'; id: number; error: number | string; message: string }
    | { type: 'signal'; signal: number; body: unknown };
