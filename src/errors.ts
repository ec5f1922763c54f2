/**
 * Error taxonomy for the analyzer.
 * `statusCode` is what the HTTP layer answers with; `code` is stable for clients.
 */
export class AnalysisError extends Error {
    readonly statusCode: number;
    readonly code: string;

    constructor(message: string, statusCode = 500, code = 'ANALYSIS_ERROR', options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.code = code;
    }
}

/** Rejected submission. No job is created. */
export class ValidationError extends AnalysisError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(issues.join('; '), 400, 'VALIDATION_ERROR');
        this.issues = issues;
    }
}

export class ConfigurationError extends AnalysisError {
    constructor(message: string) {
        super(message, 500, 'CONFIGURATION_ERROR');
    }
}

export class NotFoundError extends AnalysisError {
    constructor(message: string) {
        super(message, 404, 'NOT_FOUND');
    }
}

export class RepositoryMaterializationError extends AnalysisError {
    readonly repo: string;

    constructor(repo: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to materialize repository ${repo}: ${reason}`, 502, 'REPOSITORY_UNAVAILABLE', { cause });
        this.repo = repo;
    }
}

export class EmbeddingError extends AnalysisError {
    constructor(message: string, cause?: unknown) {
        super(message, 502, 'EMBEDDING_FAILED', { cause });
    }
}

export class JobCancelledError extends AnalysisError {
    constructor() {
        super('Analysis cancelled', 409, 'JOB_CANCELLED');
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
