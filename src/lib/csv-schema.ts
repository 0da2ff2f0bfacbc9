import { GazeSample, ImuSample, TaggedSample } from './g3-interfaces';

export const GAZE_COLUMNS = [
    'device_timestamp',
    'local_timestamp',
    'gaze2d_x',
    'gaze2d_y',
    'gaze3d_x',
    'gaze3d_y',
    'gaze3d_z',
    'left_gaze_origin_x',
    'left_gaze_origin_y',
    'left_gaze_origin_z',
    'left_gaze_direction_x',
    'left_gaze_direction_y',
    'left_gaze_direction_z',
    'right_gaze_origin_x',
    'right_gaze_origin_y',
    'right_gaze_origin_z',
    'right_gaze_direction_x',
    'right_gaze_direction_y',
    'right_gaze_direction_z',
    'pupil_diameter_left',
    'pupil_diameter_right',
] as const;

export const IMU_COLUMNS = [
    'device_timestamp',
    'local_timestamp',
    'accel_x',
    'accel_y',
    'accel_z',
    'gyro_x',
    'gyro_y',
    'gyro_z',
    'mag_x',
    'mag_y',
    'mag_z',
] as const;

export type Cell = number | null;

export function gazeRow(sample: GazeSample): Cell[] {
    return [
        sample.deviceTimestamp,
        sample.localTimestamp,
        ...sample.gaze2d,
        ...sample.gaze3d,
        ...sample.leftGazeOrigin,
        ...sample.leftGazeDirection,
        ...sample.rightGazeOrigin,
        ...sample.rightGazeDirection,
        sample.pupilDiameterLeft,
        sample.pupilDiameterRight,
    ];
}

export function imuRow(sample: ImuSample): Cell[] {
    return [
        sample.deviceTimestamp,
        sample.localTimestamp,
        ...sample.accelerometer,
        ...sample.gyroscope,
        ...sample.magnetometer,
    ];
}

export function sampleRow(sample: TaggedSample) {
    return sample.kind === 'gaze' ? gazeRow(sample) : imuRow(sample);
}

/** Numbers keep their shortest round-trip form; missing values are empty cells. */
export function formatLine(cells: readonly (Cell | string)[]) {
    return cells.map(cell => cell === null ? '' : String(cell)).join(',') + '\n';
}
