/**
 * Submission, polling and cancellation on top of the registry and the queue.
 * The HTTP routes and the CLI go through this class only.
 */
import { NotFoundError } from "../errors.js";
import { runAnalysis, type AnalysisDependencies } from "../pipeline/runAnalysis.js";
import { validateSubmission, type SubmissionInput } from "./validateSubmission.js";
import { JobRegistry, type JobSnapshot } from "./jobRegistry.js";
import { JobQueue } from "./jobQueue.js";
import type { AnalysisJobSummary } from "../models/AnalysisJob.js";
import type { Report } from "../models/Report.js";

export class AnalysisService {
    constructor(
        readonly deps: AnalysisDependencies,
        private readonly registry: JobRegistry = new JobRegistry({
            maxRetainedJobs: deps.config.maxRetainedJobs,
        }),
        private readonly queue: JobQueue = new JobQueue()
    ) {}

    /**
     * Validates and queues a job. `done` resolves with the final snapshot.
     */
    submit(input: SubmissionInput): { job: JobSnapshot; done: Promise<JobSnapshot> } {
        const request = validateSubmission(input, this.deps.config);
        const handle = this.registry.create(request);

        const done = this.queue
            .enqueue(`job ${handle.id}`, async () => {
                await runAnalysis(handle, this.deps);
            })
            .then(() => handle.snapshot);

        return { job: handle.snapshot, done };
    }

    getJob(id: string): JobSnapshot {
        return this.registry.require(id);
    }

    listJobs(): AnalysisJobSummary[] {
        return this.registry.list();
    }

    /**
     * Report of a completed job; NotFoundError otherwise.
     */
    getReport(id: string): Report {
        const job = this.registry.require(id);
        if (job.status !== "completed" || !job.result) {
            throw new NotFoundError(`Report not available for job ${id} (status: ${job.status})`);
        }
        return job.result;
    }

    cancel(id: string): JobSnapshot {
        return this.registry.requestCancellation(id);
    }
}
