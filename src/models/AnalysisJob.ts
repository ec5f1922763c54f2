import type { Report } from "./Report.js";
import type { SupportedLanguage } from "../nlp/preprocess/languages.js";

export const JOB_STATUSES = [
    "queued",
    "cloning",
    "preprocessing",
    "embedding",
    "scoring",
    "reasoning",
    "completed",
    "failed",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

/** Statuses the runner walks through, in order. */
export type JobStage = Exclude<JobStatus, "completed" | "failed">;

export interface AnalysisRequest {
    repos: string[];
    language: SupportedLanguage;
    threshold: number;
    branch: string;
    aggressive: boolean;
}

/**
 * 분석 작업 상태. Readers always receive a frozen snapshot.
 */
export interface AnalysisJob {
    id: string;
    status: JobStatus;
    /** Integer in [0,100], never decreases */
    progress: number;
    repos: string[];
    threshold: number;
    language: SupportedLanguage;
    branch: string;
    aggressive: boolean;
    createdAt: string;
    updatedAt: string;
    cancelRequested: boolean;
    /** Stage that was running when the job failed */
    failedStage?: JobStage;
    /** Present only on completed jobs */
    result?: Report;
    /** Present only on failed jobs */
    error?: string;
}

export interface AnalysisJobSummary {
    id: string;
    status: JobStatus;
    repos: string[];
    progress: number;
    createdAt: string;
}
