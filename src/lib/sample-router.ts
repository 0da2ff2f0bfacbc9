import { ConfigError } from './errors';
import { DecimationConfig, SampleKind, TaggedSample } from './g3-interfaces';

export interface DisplaySink {
    push(sample: TaggedSample): void;
}

export interface RecorderSink {
    write(sample: TaggedSample): boolean;
}

export interface RouteCounts {
    received: number;
    forwarded: number;
}

export function validateDecimation(decimation: DecimationConfig): DecimationConfig {
    for (const kind of ['gaze', 'imu'] as const) {
        const rate = decimation[kind];
        if (!Number.isInteger(rate) || rate < 1) {
            throw new ConfigError(`${kind} decimation must be a positive integer, got ${rate}`);
        }
    }
    return { gaze: decimation.gaze, imu: decimation.imu };
}

/**
 * Keeps every n-th sample of each stream kind and hands it to the display
 * and the recorder, so both always see the same subset. Counters are
 * independent per kind; with a rate of 4 the 4th, 8th, 12th... samples pass.
 * A trailing partial window is never flushed.
 */
export class SampleRouter {
    readonly decimation: DecimationConfig;
    private readonly counts: Record<SampleKind, RouteCounts> = {
        gaze: { received: 0, forwarded: 0 },
        imu: { received: 0, forwarded: 0 },
    };

    constructor(decimation: DecimationConfig, private readonly display: DisplaySink, private readonly recorder: RecorderSink) {
        this.decimation = validateDecimation(decimation);
    }

    /** @returns whether the sample was forwarded */
    route(sample: TaggedSample) {
        const counts = this.counts[sample.kind];
        counts.received++;
        if (counts.received % this.decimation[sample.kind] !== 0) {
            return false;
        }
        counts.forwarded++;
        this.display.push(sample);
        this.recorder.write(sample);
        return true;
    }

    countsFor(kind: SampleKind): RouteCounts {
        return { ...this.counts[kind] };
    }
}
