type QueuedTask = () => void;

/**
 * FIFO pool for blocking scheduler calls. One instance per process, shared by every
 * spawner, so concurrent sessions queue their sbatch calls instead of racing.
 */
export class SubmissionQueue {
    private readonly waiting: QueuedTask[] = [];
    private running = 0;

    constructor(public readonly concurrency: number = 1) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
        }
    }

    get active(): number { return this.running; }
    get pending(): number { return this.waiting.length; }

    run<T>(task: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            const start = () => {
                this.running++;
                void Promise.resolve()
                    .then(task)
                    .then(resolve, reject)
                    .finally(() => {
                        this.running--;
                        this.waiting.shift()?.();
                    });
            };
            if (this.running < this.concurrency) start();
            else this.waiting.push(start);
        });
    }
}
