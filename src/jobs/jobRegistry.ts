/**
 * 분석 작업 상태 저장소
 *
 * Jobs are stored as frozen snapshots and replaced wholesale on every write,
 * so a poller sees either the state before or after a transition, never a mix.
 * Only the JobHandle returned by `create` can write its job.
 *
 * Finished jobs are kept up to `maxRetainedJobs`; beyond that the oldest
 * finished ones are dropped. Queued and running jobs are never dropped.
 */
import { v4 as uuidv4 } from "uuid";
import { JobCancelledError, NotFoundError, errorMessage } from "../errors.js";
import { clamp } from "../utils/math.js";
import { deepFreeze } from "../utils/freeze.js";
import { logDebug, logInfo } from "../utils/logger.js";
import {
    JOB_STATUSES,
    type AnalysisJob,
    type AnalysisJobSummary,
    type AnalysisRequest,
    type JobStage,
    type JobStatus,
} from "../models/AnalysisJob.js";
import type { Report } from "../models/Report.js";

export type JobSnapshot = Readonly<AnalysisJob>;

/** Progress value on entering each status. */
export const STAGE_PROGRESS: Readonly<Record<Exclude<JobStatus, "failed">, number>> = Object.freeze({
    queued: 0,
    cloning: 5,
    preprocessing: 25,
    embedding: 40,
    scoring: 65,
    reasoning: 85,
    completed: 100,
});

export function isTerminal(status: JobStatus): boolean {
    return status === "completed" || status === "failed";
}

function statusIndex(status: JobStatus): number {
    return JOB_STATUSES.indexOf(status);
}

function isStage(status: JobStatus): status is JobStage {
    return !isTerminal(status);
}

type JobUpdate = (current: JobSnapshot) => Partial<AnalysisJob>;

export class JobHandle {
    constructor(
        readonly id: string,
        private readonly read: () => JobSnapshot,
        private readonly write: (update: JobUpdate) => JobSnapshot
    ) {}

    get snapshot(): JobSnapshot {
        return this.read();
    }

    get cancellationRequested(): boolean {
        return this.read().cancelRequested;
    }

    /**
     * Moves to a later stage. Progress jumps to the stage's entry value.
     */
    advance(status: JobStage): JobSnapshot {
        return this.write((current) => {
            if (statusIndex(status) <= statusIndex(current.status)) {
                throw new Error(`Invalid job transition ${current.status} -> ${status}`);
            }
            return { status, progress: Math.max(current.progress, STAGE_PROGRESS[status]) };
        });
    }

    /**
     * Intermediate progress inside the current stage. Never moves backwards
     * and never reaches 100 before completion.
     */
    reportProgress(progress: number): JobSnapshot {
        return this.write((current) => ({
            progress: Math.max(current.progress, clamp(Math.round(progress), 0, 99)),
        }));
    }

    throwIfCancelled(): void {
        if (this.cancellationRequested) {
            throw new JobCancelledError();
        }
    }

    complete(result: Report): JobSnapshot {
        return this.write(() => ({ status: "completed", progress: STAGE_PROGRESS.completed, result }));
    }

    /**
     * Records the error and the stage that was running. Progress stays where it was.
     */
    fail(error: unknown): JobSnapshot {
        return this.write((current) => ({
            status: "failed",
            error: errorMessage(error),
            failedStage: isStage(current.status) ? current.status : undefined,
        }));
    }
}

export const DEFAULT_MAX_RETAINED_JOBS = 100;

export interface JobRegistryOptions {
    now?: () => Date;
    newId?: () => string;
    maxRetainedJobs?: number;
}

export class JobRegistry {
    private readonly jobs = new Map<string, JobSnapshot>();
    private readonly now: () => Date;
    private readonly newId: () => string;
    private readonly maxRetainedJobs: number;

    constructor(options: JobRegistryOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.newId = options.newId ?? (() => uuidv4());
        this.maxRetainedJobs = options.maxRetainedJobs ?? DEFAULT_MAX_RETAINED_JOBS;
    }

    create(request: AnalysisRequest): JobHandle {
        const id = this.newId();
        const timestamp = this.now().toISOString();

        const job: AnalysisJob = {
            id,
            status: "queued",
            progress: STAGE_PROGRESS.queued,
            repos: [...request.repos],
            threshold: request.threshold,
            language: request.language,
            branch: request.branch,
            aggressive: request.aggressive,
            createdAt: timestamp,
            updatedAt: timestamp,
            cancelRequested: false,
        };
        this.jobs.set(id, deepFreeze(job));
        logInfo(`🆕 Job ${id} queued (${request.repos.length} repositories)`);

        return new JobHandle(
            id,
            () => this.require(id),
            (update) => this.write(id, update)
        );
    }

    get(id: string): JobSnapshot | undefined {
        return this.jobs.get(id);
    }

    require(id: string): JobSnapshot {
        const job = this.jobs.get(id);
        if (!job) {
            throw new NotFoundError(`Job not found: ${id}`);
        }
        return job;
    }

    /**
     * Newest first.
     */
    list(): AnalysisJobSummary[] {
        return [...this.jobs.values()]
            .map(({ id, status, repos, progress, createdAt }) => ({ id, status, repos: [...repos], progress, createdAt }))
            .reverse();
    }

    /**
     * Idempotent. A job that already finished is returned unchanged.
     */
    requestCancellation(id: string): JobSnapshot {
        const job = this.require(id);
        if (job.cancelRequested || isTerminal(job.status)) {
            return job;
        }
        logInfo(`🛑 Cancellation requested for job ${id}`);
        return this.write(id, () => ({ cancelRequested: true }));
    }

    private write(id: string, update: JobUpdate): JobSnapshot {
        const current = this.require(id);
        if (isTerminal(current.status)) {
            throw new Error(`Job ${id} is already ${current.status}`);
        }

        const next: AnalysisJob = {
            ...current,
            ...update(current),
            repos: [...current.repos],
            updatedAt: this.now().toISOString(),
        };
        const snapshot = deepFreeze(next);
        this.jobs.set(id, snapshot);
        if (isTerminal(snapshot.status)) {
            this.evictFinished();
        }
        return snapshot;
    }

    /**
     * Map order is creation order, so the first finished entries are the oldest.
     */
    private evictFinished(): void {
        const finished = [...this.jobs.values()].filter((job) => isTerminal(job.status));
        const excess = finished.length - this.maxRetainedJobs;
        for (const job of finished.slice(0, Math.max(0, excess))) {
            this.jobs.delete(job.id);
            logDebug(`🧹 Job ${job.id} evicted (${job.status})`);
        }
    }
}
