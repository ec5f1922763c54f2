import { describe, it, expect } from "vitest";
import { JobQueue } from "./jobQueue.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

describe("JobQueue", () => {
    it("runs one task at a time in submission order", async () => {
        const queue = new JobQueue();
        const events: string[] = [];
        const gate = deferred();

        const first = queue.enqueue("first", async () => {
            events.push("first:start");
            await gate.promise;
            events.push("first:end");
        });
        const second = queue.enqueue("second", async () => {
            events.push("second:start");
        });

        await Promise.resolve();
        expect(events).toEqual(["first:start"]);
        expect(queue.stats).toEqual({ activeJobs: 1, waitingJobs: 1 });

        gate.resolve();
        await Promise.all([first, second]);
        expect(events).toEqual(["first:start", "first:end", "second:start"]);
        expect(queue.stats).toEqual({ activeJobs: 0, waitingJobs: 0 });
    });

    it("keeps going after a task throws", async () => {
        const queue = new JobQueue();
        let ran = false;

        await expect(
            queue.enqueue("broken", async () => {
                throw new Error("boom");
            })
        ).resolves.toBeUndefined();
        await queue.enqueue("next", async () => {
            ran = true;
        });

        expect(ran).toBe(true);
    });

    it("allows more than one slot", async () => {
        const queue = new JobQueue(2);
        const gate = deferred();
        const started: string[] = [];

        const a = queue.enqueue("a", async () => {
            started.push("a");
            await gate.promise;
        });
        const b = queue.enqueue("b", async () => {
            started.push("b");
            await gate.promise;
        });

        await Promise.resolve();
        await Promise.resolve();
        expect(started).toEqual(["a", "b"]);
        gate.resolve();
        await Promise.all([a, b]);
    });
});
