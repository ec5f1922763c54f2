/**
 * Semaphore-based job queue. With the default of one slot, jobs run end to
 * end one after another in submission order.
 */
import { logError } from "../utils/logger.js";

export class JobQueue {
    private active = 0;
    private readonly waiting: Array<() => void> = [];

    constructor(private readonly maxConcurrent = 1) {}

    private acquire(): Promise<void> {
        if (this.active < this.maxConcurrent) {
            this.active++;
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => {
            this.waiting.push(resolve);
        });
    }

    private release(): void {
        const next = this.waiting.shift();
        if (next) {
            next(); // the next job takes over the slot
        } else {
            this.active--;
        }
    }

    /**
     * Resolves when the task has run. Task errors are logged, never rethrown.
     */
    async enqueue(label: string, task: () => Promise<void>): Promise<void> {
        await this.acquire();
        try {
            await task();
        } catch (err) {
            logError(`[JobQueue] Unexpected error in ${label}`, err);
        } finally {
            this.release();
        }
    }

    get stats(): { activeJobs: number; waitingJobs: number } {
        return { activeJobs: this.active, waitingJobs: this.waiting.length };
    }
}
