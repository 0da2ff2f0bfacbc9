import { GazeSample, ImuSample } from '../lib/g3-interfaces';

export function gazeSample(deviceTimestamp: number, overrides: Partial<GazeSample> = {}): GazeSample {
    return {
        kind: 'gaze',
        deviceTimestamp,
        localTimestamp: 1700000000 + deviceTimestamp,
        gaze2d: [0.25, 0.75],
        gaze3d: [12.5, -3.25, 600],
        leftGazeOrigin: [31.5, 8.25, -22],
        leftGazeDirection: [-0.1, 0.05, 0.99],
        rightGazeOrigin: [-30.75, 8, -21.5],
        rightGazeDirection: [0.1, 0.05, 0.99],
        pupilDiameterLeft: 3.12,
        pupilDiameterRight: 3.05,
        ...overrides,
    };
}

export function imuSample(deviceTimestamp: number, overrides: Partial<ImuSample> = {}): ImuSample {
    return {
        kind: 'imu',
        deviceTimestamp,
        localTimestamp: 1700000000 + deviceTimestamp,
        accelerometer: [0.12, -9.79, 0.31],
        gyroscope: [1.5, -0.25, 0.75],
        magnetometer: [22.5, -4.5, 40.25],
        ...overrides,
    };
}
