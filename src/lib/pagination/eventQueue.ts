/**
 * FIFO mailbox that runs one task at a time.
 * A task starts only after the previous one has settled, including any
 * promise it returned, so async handlers never interleave.
 */
export class EventQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    get size(): number {
        return this.pending;
    }

    /** Resolves or rejects with the task's own outcome; a failing task does not stop the queue. */
    enqueue<R>(task: () => R | Promise<R>): Promise<R> {
        this.pending++;
        const run = this.tail.then(task);
        this.tail = run.then(
            () => { this.pending--; },
            () => { this.pending--; }
        );
        return run;
    }

    /** Resolves once every task enqueued so far has settled. */
    async drain(): Promise<void> {
        let tail: Promise<void>;
        do {
            tail = this.tail;
            await tail;
        } while (tail !== this.tail);
    }
}
