import { StreamFault, errorMessage } from './errors';
import { DecimationConfig, DeviceClient, DeviceStatus, TaggedSample } from './g3-interfaces';
import { DisplaySink, SampleRouter, validateDecimation } from './sample-router';
import { RecordingSummary, Session, SessionRecorder, createSession } from './session-recorder';

export interface SessionOptions {
    hostname: string;
    decimation: DecimationConfig;
    directory: string;
    device?: DeviceStatus | null;
    startedAt?: Date;
}

export interface SessionResult {
    session: Session;
    summary: RecordingSummary | null;
    fault: StreamFault | null;
}

/**
 * Handle for one running recording: owns the device stream, the router and
 * the recorder of a single session.
 *
 * One loop drains the device stream and routes each sample completely before
 * it takes the next. `done` settles once the recorder is closed, whether the
 * session was stopped or the stream broke; it never rejects.
 */
export class AcquisitionSession {
    readonly done: Promise<SessionResult>;
    private stopRequested = false;
    private stopping: Promise<SessionResult> | null = null;

    private constructor(
        readonly session: Session,
        readonly router: SampleRouter,
        private readonly client: DeviceClient,
        private readonly recorder: SessionRecorder,
        stream: AsyncIterable<TaggedSample>,
    ) {
        this.done = this.consume(stream);
    }

    /**
     * Opens the session's files, then starts the device stream. A
     * RecordingIOError aborts before the device is asked for anything.
     */
    static async start(client: DeviceClient, display: DisplaySink, options: SessionOptions) {
        const decimation = validateDecimation(options.decimation);
        const session = createSession({ ...options, decimation });
        const recorder = new SessionRecorder();
        recorder.open(session);

        let stream: AsyncIterable<TaggedSample>;
        try {
            stream = await client.startStream(decimation);
        } catch (err) {
            recorder.close(`stream did not start: ${errorMessage(err)}`);
            throw err;
        }
        const router = new SampleRouter(decimation, display, recorder);
        console.log(`[session] started ${session.startedAt.toISOString()} on ${session.hostname}`);
        return new AcquisitionSession(session, router, client, recorder, stream);
    }

    get isRunning() {
        return !this.stopRequested;
    }

    /**
     * Ends the session. Idempotent and safe while a sample is in flight: no
     * sample is routed once this has been called, and the recorder is closed
     * exactly once.
     */
    stop(): Promise<SessionResult> {
        if (!this.stopping) {
            this.stopRequested = true;
            this.stopping = this.client.stopStream().then(
                () => this.done,
                err => {
                    console.error(`[session] stopping the device stream failed: ${errorMessage(err)}`);
                    return this.done;
                },
            );
        }
        return this.stopping;
    }

    private async consume(stream: AsyncIterable<TaggedSample>): Promise<SessionResult> {
        let fault: StreamFault | null = null;
        try {
            for await (const sample of stream) {
                if (this.stopRequested) {
                    break;
                }
                this.router.route(sample);
            }
        } catch (err) {
            fault = err instanceof StreamFault ? err : new StreamFault(errorMessage(err), err);
            console.error(`[session] stream fault: ${fault.message}`);
        }

        if (fault) {
            this.stopRequested = true;
            try {
                await this.client.stopStream();
            } catch (err) {
                console.error(`[session] releasing the device stream failed: ${errorMessage(err)}`);
            }
        }
        const summary = this.recorder.close(fault?.message);
        return { session: this.session, summary, fault };
    }
}
