import { Observable, Subscription } from 'rxjs';

import { G3Error, StreamFault, errorMessage } from './errors';
import { DecimationConfig, TaggedSample } from './g3-interfaces';

interface Waiter {
    resolve(result: IteratorResult<TaggedSample>): void;
    reject(err: unknown): void;
}

/**
 * Pull-based view of the device's pushed samples.
 *
 * The stream subscribes lazily on first iteration and can be iterated only
 * once. At most `capacity` samples wait between socket and consumer; when
 * the consumer falls behind the oldest waiting sample is dropped. `end()`
 * finishes the sequence at once, discarding anything still buffered; a
 * source failure is raised as a StreamFault after the buffer drains.
 */
export class SampleStream implements AsyncIterable<TaggedSample> {
    private buffer: TaggedSample[] = [];
    private waiter: Waiter | null = null;
    private subscription: Subscription | null = null;
    private iterated = false;
    private finished = false;
    private fault: StreamFault | null = null;
    private droppedCount = 0;

    constructor(
        private readonly source: Observable<TaggedSample>,
        readonly decimation: DecimationConfig,
        private readonly capacity = 2000,
    ) {}

    get dropped() {
        return this.droppedCount;
    }

    get ended() {
        return this.finished;
    }

    [Symbol.asyncIterator](): AsyncIterator<TaggedSample> {
        if (this.iterated) {
            throw new G3Error('A sample stream can only be iterated once');
        }
        this.iterated = true;
        if (!this.finished) {
            this.subscription = this.source.subscribe({
                next: sample => this.offer(sample),
                error: err => this.fail(err),
                complete: () => this.fail(new StreamFault('Device stopped sending samples')),
            });
        }
        return {
            next: () => this.take(),
            return: async () => {
                this.end();
                return { done: true, value: undefined };
            },
        };
    }

    /** Ends the sequence; pending and later reads report done. Idempotent. */
    end() {
        if (this.finished) {
            return;
        }
        this.finished = true;
        this.buffer = [];
        this.subscription?.unsubscribe();
        this.subscription = null;
        this.settle();
    }

    /** Ends the sequence with a StreamFault once the buffer has drained. */
    fail(err: unknown) {
        if (this.finished) {
            return;
        }
        this.fault = err instanceof StreamFault ? err : new StreamFault(`Sample stream failed: ${errorMessage(err)}`, err);
        this.finished = true;
        this.subscription?.unsubscribe();
        this.subscription = null;
        this.settle();
    }

    private offer(sample: TaggedSample) {
        if (this.finished) {
            return;
        }
        if (this.waiter) {
            const waiter = this.waiter;
            this.waiter = null;
            waiter.resolve({ done: false, value: sample });
            return;
        }
        if (this.buffer.length >= this.capacity) {
            this.buffer.shift();
            this.droppedCount++;
            if (this.droppedCount === 1 || this.droppedCount % 100 === 0) {
                console.warn(`[g3] consumer behind, ${this.droppedCount} buffered samples dropped`);
            }
        }
        this.buffer.push(sample);
    }

    private take(): Promise<IteratorResult<TaggedSample>> {
        const next = this.buffer.shift();
        if (next !== undefined) {
            return Promise.resolve({ done: false, value: next });
        }
        if (this.finished) {
            return this.fault ? Promise.reject(this.fault) : Promise.resolve({ done: true, value: undefined });
        }
        return new Promise((resolve, reject) => {
            this.waiter = { resolve, reject };
        });
    }

    private settle() {
        if (!this.waiter) {
            return;
        }
        const waiter = this.waiter;
        this.waiter = null;
        if (this.fault) {
            waiter.reject(this.fault);
        } else {
            waiter.resolve({ done: true, value: undefined });
        }
    }
}
