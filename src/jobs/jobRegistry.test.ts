import { describe, it, expect } from "vitest";
import { JobCancelledError, NotFoundError } from "../errors.js";
import { JobRegistry } from "./jobRegistry.js";
import type { AnalysisRequest } from "../models/AnalysisJob.js";
import type { Report } from "../models/Report.js";

const request: AnalysisRequest = {
    repos: ["https://github.com/acme/one", "https://github.com/acme/two"],
    language: "python",
    threshold: 0.75,
    branch: "main",
    aggressive: false,
};

function registry(maxRetainedJobs?: number): JobRegistry {
    let tick = 0;
    let id = 0;
    return new JobRegistry({
        now: () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)),
        newId: () => `job-${++id}`,
        maxRetainedJobs,
    });
}

const emptyReport: Report = {
    summary: { totalRepos: 2, suspiciousPairs: 0, totalFilePairsCompared: 0 },
    repositoryMatrix: { repos: [], similarities: [] },
    suspiciousPairs: [],
    commitFlags: [],
    parameters: { ...request, repositories: request.repos },
    generatedAt: "2024-01-01T00:00:00.000Z",
};

describe("JobRegistry", () => {
    it("creates queued jobs with frozen snapshots", () => {
        const handle = registry().create(request);

        expect(handle.snapshot).toMatchObject({ id: "job-1", status: "queued", progress: 0, cancelRequested: false });
        expect(Object.isFrozen(handle.snapshot)).toBe(true);
        expect(Object.isFrozen(handle.snapshot.repos)).toBe(true);
    });

    it("moves forward through the stages with entry progress", () => {
        const handle = registry().create(request);

        expect(handle.advance("cloning").progress).toBe(5);
        expect(handle.reportProgress(3).progress).toBe(5);
        expect(handle.reportProgress(19.6).progress).toBe(20);
        expect(handle.advance("preprocessing").progress).toBe(25);
        expect(() => handle.advance("cloning")).toThrow("Invalid job transition preprocessing -> cloning");
    });

    it("never reports 100 before completion", () => {
        const handle = registry().create(request);
        handle.advance("reasoning");

        expect(handle.reportProgress(150).progress).toBe(99);
        expect(handle.complete(emptyReport)).toMatchObject({ status: "completed", progress: 100 });
    });

    it("leaves earlier snapshots untouched", () => {
        const handle = registry().create(request);
        const before = handle.snapshot;
        handle.advance("cloning");

        expect(before.status).toBe("queued");
        expect(handle.snapshot.status).toBe("cloning");
        expect(handle.snapshot.updatedAt).not.toBe(before.updatedAt);
    });

    it("records the failing stage and rejects further writes", () => {
        const handle = registry().create(request);
        handle.advance("cloning");
        handle.advance("preprocessing");

        const failed = handle.fail(new Error("disk full"));
        expect(failed).toMatchObject({ status: "failed", failedStage: "preprocessing", error: "disk full", progress: 25 });
        expect(failed.result).toBeUndefined();
        expect(() => handle.advance("embedding")).toThrow("already failed");
    });

    it("handles cancellation requests idempotently", () => {
        const jobs = registry();
        const handle = jobs.create(request);

        const first = jobs.requestCancellation(handle.id);
        expect(first.cancelRequested).toBe(true);
        expect(jobs.requestCancellation(handle.id)).toBe(first);
        expect(() => handle.throwIfCancelled()).toThrow(JobCancelledError);
    });

    it("ignores cancellation of finished jobs", () => {
        const jobs = registry();
        const handle = jobs.create(request);
        handle.advance("reasoning");
        const completed = handle.complete(emptyReport);

        expect(jobs.requestCancellation(handle.id)).toBe(completed);
        expect(completed.cancelRequested).toBe(false);
    });

    it("lists newest first and reports unknown ids", () => {
        const jobs = registry();
        jobs.create(request);
        jobs.create(request);

        expect(jobs.list().map((job) => job.id)).toEqual(["job-2", "job-1"]);
        expect(jobs.get("missing")).toBeUndefined();
        expect(() => jobs.require("missing")).toThrow(NotFoundError);
    });

    it("drops the oldest finished jobs beyond the retention limit", () => {
        const jobs = registry(2);
        const [first, running, second, third, queued] = Array.from({ length: 5 }, () => jobs.create(request));
        if (!first || !running || !second || !third || !queued) throw new Error("jobs not created");

        running.advance("scoring");
        first.advance("reasoning");
        first.complete(emptyReport);
        second.fail(new Error("clone failed"));
        expect(jobs.list().map((job) => job.id)).toEqual(["job-5", "job-4", "job-3", "job-2", "job-1"]);

        third.fail(new Error("clone failed"));

        expect(jobs.get("job-1")).toBeUndefined();
        expect(jobs.list().map((job) => job.id)).toEqual(["job-5", "job-4", "job-3", "job-2"]);
        expect(running.advance("reasoning").status).toBe("reasoning");
        expect(queued.snapshot.status).toBe("queued");
    });
});
