import type { ProgressSink, ProgressSnapshot } from './types.js';

export const DEFAULT_LOG_CAPACITY = 50;

/**
 * Shared status record read by the monitor while the pipeline writes to it.
 *
 * Both operations are synchronous, so on Node's single thread each one runs
 * to completion before any observer callback can touch the record. Callers
 * only ever see copies.
 */
export class ProgressRecord implements ProgressSink {
    private agent = 'Idle';
    private task = 'Waiting...';
    private readonly lines: string[] = [];
    private readonly capacity: number;

    constructor(capacity: number = DEFAULT_LOG_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Progress log capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    update(agent: string, task: string, logLine?: string): void {
        this.agent = agent;
        this.task = task;
        if (logLine) {
            this.lines.push(logLine);
            // oldest first out
            if (this.lines.length > this.capacity) {
                this.lines.splice(0, this.lines.length - this.capacity);
            }
        }
    }

    /** Current status plus the last `limit` log lines (all retained lines by default). */
    snapshot(limit: number = this.capacity): ProgressSnapshot {
        const tail = limit <= 0 ? [] : this.lines.slice(-limit);
        return {
            agent: this.agent,
            task: this.task,
            logs: tail,
        };
    }
}
