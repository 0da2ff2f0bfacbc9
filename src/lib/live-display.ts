import { SchedulerLike, Subject, Subscription, asyncScheduler } from 'rxjs';
import { auditTime, groupBy, mergeMap } from 'rxjs/operators';

import { errorMessage } from './errors';
import { DeviceEvent, DeviceEventKind, GazeSample, ImuSample, TaggedSample } from './g3-interfaces';
import { DisplaySink } from './sample-router';

export const DISPLAY_EVENT = 'new_data';

export interface GazeFrame {
    type: 'gaze';
    gaze2dX: number | null;
    gaze2dY: number | null;
    pupilLeft: number | null;
    pupilRight: number | null;
    ts: number;
}

export interface ImuFrame {
    type: 'imu';
    accelX: number | null;
    accelY: number | null;
    accelZ: number | null;
    gyroX: number | null;
    gyroY: number | null;
    gyroZ: number | null;
    ts: number;
}

export interface EventFrame {
    type: DeviceEventKind;
    data: string;
    ts: number;
}

export type DisplayFrame = GazeFrame | ImuFrame | EventFrame;

/** Where frames go; a Socket.IO server's volatile emitter in production. */
export interface DisplayTransport {
    emit(event: string, frame: DisplayFrame): unknown;
}

export function gazeFrame(sample: GazeSample): GazeFrame {
    return {
        type: 'gaze',
        gaze2dX: sample.gaze2d[0],
        gaze2dY: sample.gaze2d[1],
        pupilLeft: sample.pupilDiameterLeft,
        pupilRight: sample.pupilDiameterRight,
        ts: sample.localTimestamp,
    };
}

export function imuFrame(sample: ImuSample): ImuFrame {
    const [accelX, accelY, accelZ] = sample.accelerometer;
    const [gyroX, gyroY, gyroZ] = sample.gyroscope;
    return { type: 'imu', accelX, accelY, accelZ, gyroX, gyroY, gyroZ, ts: sample.localTimestamp };
}

export function eventFrame(event: DeviceEvent): EventFrame {
    const data = typeof event.data === 'string' ? event.data : JSON.stringify(event.data) ?? '';
    return { type: event.kind, data, ts: event.localTimestamp };
}

export function toFrame(sample: TaggedSample): DisplayFrame {
    return sample.kind === 'gaze' ? gazeFrame(sample) : imuFrame(sample);
}

/**
 * Pushes samples to the charts without ever holding up the pipeline.
 *
 * Samples are coalesced per kind over `intervalMs`; when the window closes
 * only the newest one is sent, so a slow client sees the latest state rather
 * than a backlog. Device events are rare and go out as they arrive.
 */
export class LiveDisplaySink implements DisplaySink {
    private readonly samples = new Subject<TaggedSample>();
    private readonly subscription: Subscription;

    constructor(private readonly transport: DisplayTransport, intervalMs = 40, scheduler: SchedulerLike = asyncScheduler) {
        this.subscription = this.samples
            .pipe(
                groupBy(sample => sample.kind),
                mergeMap(group => group.pipe(auditTime(intervalMs, scheduler))),
            )
            .subscribe(sample => this.send(toFrame(sample)));
    }

    push(sample: TaggedSample) {
        this.samples.next(sample);
    }

    pushEvent(event: DeviceEvent) {
        if (!this.subscription.closed) {
            this.send(eventFrame(event));
        }
    }

    dispose() {
        this.subscription.unsubscribe();
        this.samples.complete();
    }

    private send(frame: DisplayFrame) {
        try {
            this.transport.emit(DISPLAY_EVENT, frame);
        } catch (err) {
            console.warn(`[display] frame dropped: ${errorMessage(err)}`);
        }
    }
}
