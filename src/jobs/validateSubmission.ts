/**
 * 분석 요청 검증
 *
 * Shared by the HTTP route and the CLI. A rejected submission never creates a job.
 */
import { ValidationError } from "../errors.js";
import { logWarn } from "../utils/logger.js";
import { SUPPORTED_LANGUAGES, isSupportedLanguage } from "../nlp/preprocess/languages.js";
import type { AnalysisConfig } from "../config/analysisConfig.js";
import type { AnalysisRequest } from "../models/AnalysisJob.js";

export interface SubmissionInput {
    repos: string[];
    language: string;
    threshold?: number;
    branch?: string;
    aggressive?: boolean;
}

const RECOMMENDED_MIN_THRESHOLD = 0.5;

const REMOTE_LOCATIONS: readonly RegExp[] = [
    /^(?:https?|ssh|git):\/\/[^\s/]+\/\S+$/i,
    /^[\w.-]+@[\w.-]+:[^\s-]\S*$/, // scp-style ssh, e.g. git@github.com:owner/repo
    /^[A-Za-z0-9][\w.-]*\/[A-Za-z0-9][\w.-]*$/, // GitHub "owner/repo"
];

/**
 * Only remote locations are accepted: never a git option, a local path or file:// URL.
 */
export function repositoryLocationIssue(repo: string): string | null {
    if (repo.startsWith("-")) {
        return `Repository must not start with "-": ${repo}`;
    }
    if (!REMOTE_LOCATIONS.some((pattern) => pattern.test(repo))) {
        return `Unsupported repository location: ${repo} (use an https, ssh or git URL, or owner/repo)`;
    }
    return null;
}

/**
 * Trailing slashes and a ".git" suffix do not make a different repository.
 */
export function canonicalRepo(repo: string): string {
    return repo.trim().replace(/\/+$/, "").replace(/\.git$/, "").toLowerCase();
}

export function validateSubmission(
    input: SubmissionInput,
    config: Pick<AnalysisConfig, "maxRepos" | "defaultThreshold" | "defaultBranch" | "defaultAggressive">
): AnalysisRequest {
    const issues: string[] = [];
    const repos = input.repos.map((repo) => repo.trim()).filter((repo) => repo.length > 0);

    if (repos.length < 2) {
        issues.push(`At least 2 repositories are required, got ${repos.length}`);
    }
    if (repos.length > config.maxRepos) {
        issues.push(`At most ${config.maxRepos} repositories are allowed, got ${repos.length}`);
    }

    const seen = new Set<string>();
    for (const repo of repos) {
        const locationIssue = repositoryLocationIssue(repo);
        if (locationIssue) {
            issues.push(locationIssue);
        }
        const key = canonicalRepo(repo);
        if (seen.has(key)) {
            issues.push(`Duplicate repository: ${repo}`);
        }
        seen.add(key);
    }

    const threshold = input.threshold ?? config.defaultThreshold;
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
        issues.push(`Threshold must be within [0, 1], got ${threshold}`);
    }

    const language = input.language.trim().toLowerCase();
    if (!isSupportedLanguage(language)) {
        issues.push(`Unsupported language "${input.language}" (supported: ${SUPPORTED_LANGUAGES.join(", ")})`);
    }

    if (issues.length > 0 || !isSupportedLanguage(language)) {
        throw new ValidationError(issues);
    }

    if (threshold < RECOMMENDED_MIN_THRESHOLD) {
        logWarn(`Threshold ${threshold} is below the recommended range 0.5 to 1.0; expect many flagged pairs`);
    }

    return {
        repos,
        language,
        threshold,
        branch: input.branch?.trim() || config.defaultBranch,
        aggressive: input.aggressive ?? config.defaultAggressive,
    };
}
