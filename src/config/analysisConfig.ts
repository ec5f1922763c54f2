/**
 * 분석 설정
 *
 * Built once from the environment at startup, validated, then shared
 * read-only by the server, the CLI and the pipeline.
 */
import { ConfigurationError } from "../errors.js";
import { clamp } from "../utils/math.js";
import {
    DEFAULT_BANDS,
    DEFAULT_WEIGHTS,
    validateBands,
    validateWeights,
    type CombineOptions,
} from "../similarity/combine.js";
import { isEmbeddingProviderName, type EmbeddingProviderName } from "../nlp/embedding/types.js";
import { isRepositorySourceName, type RepositorySourceName } from "../data_sources/types.js";
import { isExplanationMode, type ExplanationMode } from "../report/explanation.js";
import { DEFAULT_MAX_COMMITS, DEFAULT_MAX_COMMIT_FLAGS } from "../commits/commitAnalyzer.js";
import type { TruncationMode } from "../nlp/preprocess/normalize.js";

export interface AnalysisConfig {
    maxRepos: number;
    maxCommits: number;
    maxFileChars: number;
    maxFilesPerRepo: number;
    maxFileSizeKb: number;
    minTokens: number;
    truncation: TruncationMode;
    defaultThreshold: number;
    defaultAggressive: boolean;
    defaultBranch: string;
    combine: CombineOptions;
    ignoreAutomatedCommits: boolean;
    maxCommitFlags: number;
    materializeConcurrency: number;
    /** Finished jobs kept for polling; the oldest are dropped first */
    maxRetainedJobs: number;
    embeddingProvider: EmbeddingProviderName;
    embeddingInputBudget: number;
    embeddingBatchSize: number;
    repositorySource: RepositorySourceName;
    explanationMode: ExplanationMode;
}

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = Object.freeze({
    maxRepos: 10,
    maxCommits: DEFAULT_MAX_COMMITS,
    maxFileChars: 10_000,
    maxFilesPerRepo: 200,
    maxFileSizeKb: 200,
    minTokens: 5,
    truncation: "character",
    defaultThreshold: 0.75,
    defaultAggressive: false,
    defaultBranch: "main",
    combine: { weights: DEFAULT_WEIGHTS, bands: DEFAULT_BANDS },
    ignoreAutomatedCommits: true,
    maxCommitFlags: DEFAULT_MAX_COMMIT_FLAGS,
    materializeConcurrency: 2,
    maxRetainedJobs: 100,
    embeddingProvider: "hashing",
    embeddingInputBudget: 1000,
    embeddingBatchSize: 32,
    repositorySource: "git",
    explanationMode: "template",
});

export function parseInteger(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === "") return fallback;
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export function parseNumber(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === "") return fallback;
    const parsed = Number.parseFloat(value);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value.trim() === "") return fallback;

    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "y", "on"].includes(normalized)) return true;
    if (["0", "false", "no", "n", "off"].includes(normalized)) return false;
    return fallback;
}

function parseChoice<T extends string>(
    key: string,
    value: string | undefined,
    fallback: T,
    isChoice: (candidate: string) => candidate is T
): T {
    if (value === undefined || value.trim() === "") return fallback;
    const normalized = value.trim().toLowerCase();
    if (!isChoice(normalized)) {
        throw new ConfigurationError(`Unsupported ${key}: "${value}"`);
    }
    return normalized;
}

function isTruncationMode(value: string): value is TruncationMode {
    return value === "character" || value === "token-boundary";
}

export function validateAnalysisConfig(config: AnalysisConfig): AnalysisConfig {
    if (config.maxRepos < 2) {
        throw new ConfigurationError(`maxRepos must be at least 2, got ${config.maxRepos}`);
    }
    const positive: Array<[string, number]> = [
        ["maxCommits", config.maxCommits],
        ["maxFileChars", config.maxFileChars],
        ["maxFilesPerRepo", config.maxFilesPerRepo],
        ["maxFileSizeKb", config.maxFileSizeKb],
        ["embeddingInputBudget", config.embeddingInputBudget],
        ["embeddingBatchSize", config.embeddingBatchSize],
        ["materializeConcurrency", config.materializeConcurrency],
        ["maxRetainedJobs", config.maxRetainedJobs],
    ];
    for (const [name, value] of positive) {
        if (!Number.isInteger(value) || value < 1) {
            throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
        }
    }
    if (!Number.isInteger(config.minTokens) || config.minTokens < 0) {
        throw new ConfigurationError(`minTokens must be a non-negative integer, got ${config.minTokens}`);
    }
    if (!Number.isInteger(config.maxCommitFlags) || config.maxCommitFlags < 0) {
        throw new ConfigurationError(`maxCommitFlags must be a non-negative integer, got ${config.maxCommitFlags}`);
    }
    if (!(config.defaultThreshold >= 0 && config.defaultThreshold <= 1)) {
        throw new ConfigurationError(`Default threshold must be within [0, 1], got ${config.defaultThreshold}`);
    }
    validateWeights(config.combine.weights);
    validateBands(config.combine.bands);
    return config;
}

/**
 * Reads ANALYSIS_*, EMBEDDING_*, REPOSITORY_SOURCE and EXPLANATION_MODE.
 * Unset variables keep their defaults.
 */
export function loadAnalysisConfig(source: NodeJS.ProcessEnv = process.env): AnalysisConfig {
    const defaults = DEFAULT_ANALYSIS_CONFIG;

    const config: AnalysisConfig = {
        maxRepos: parseInteger(source.ANALYSIS_MAX_REPOS, defaults.maxRepos),
        maxCommits: parseInteger(source.ANALYSIS_MAX_COMMITS, defaults.maxCommits),
        maxFileChars: parseInteger(source.ANALYSIS_MAX_FILE_CHARS, defaults.maxFileChars),
        maxFilesPerRepo: parseInteger(source.ANALYSIS_MAX_FILES_PER_REPO, defaults.maxFilesPerRepo),
        maxFileSizeKb: parseInteger(source.ANALYSIS_MAX_FILE_SIZE_KB, defaults.maxFileSizeKb),
        minTokens: parseInteger(source.ANALYSIS_MIN_TOKENS, defaults.minTokens),
        truncation: parseChoice("ANALYSIS_TRUNCATION", source.ANALYSIS_TRUNCATION, defaults.truncation, isTruncationMode),
        defaultThreshold: parseNumber(source.ANALYSIS_DEFAULT_THRESHOLD, defaults.defaultThreshold),
        defaultAggressive: parseBoolean(source.ANALYSIS_AGGRESSIVE, defaults.defaultAggressive),
        defaultBranch: source.ANALYSIS_DEFAULT_BRANCH?.trim() || defaults.defaultBranch,
        combine: {
            weights: {
                token: parseNumber(source.ANALYSIS_TOKEN_WEIGHT, defaults.combine.weights.token),
                semantic: parseNumber(source.ANALYSIS_SEMANTIC_WEIGHT, defaults.combine.weights.semantic),
            },
            bands: {
                critical: parseNumber(source.ANALYSIS_BAND_CRITICAL, defaults.combine.bands.critical),
                high: parseNumber(source.ANALYSIS_BAND_HIGH, defaults.combine.bands.high),
                medium: parseNumber(source.ANALYSIS_BAND_MEDIUM, defaults.combine.bands.medium),
            },
        },
        ignoreAutomatedCommits: parseBoolean(
            source.ANALYSIS_IGNORE_AUTOMATED_COMMITS,
            defaults.ignoreAutomatedCommits
        ),
        maxCommitFlags: parseInteger(source.ANALYSIS_MAX_COMMIT_FLAGS, defaults.maxCommitFlags),
        materializeConcurrency: clamp(
            parseInteger(source.ANALYSIS_MATERIALIZE_CONCURRENCY, defaults.materializeConcurrency),
            1,
            8
        ),
        maxRetainedJobs: parseInteger(source.ANALYSIS_MAX_RETAINED_JOBS, defaults.maxRetainedJobs),
        embeddingProvider: parseChoice(
            "EMBEDDING_PROVIDER",
            source.EMBEDDING_PROVIDER,
            defaults.embeddingProvider,
            isEmbeddingProviderName
        ),
        embeddingInputBudget: parseInteger(source.EMBEDDING_INPUT_BUDGET, defaults.embeddingInputBudget),
        embeddingBatchSize: parseInteger(source.EMBEDDING_BATCH_SIZE, defaults.embeddingBatchSize),
        repositorySource: parseChoice(
            "REPOSITORY_SOURCE",
            source.REPOSITORY_SOURCE,
            defaults.repositorySource,
            isRepositorySourceName
        ),
        explanationMode: parseChoice(
            "EXPLANATION_MODE",
            source.EXPLANATION_MODE,
            defaults.explanationMode,
            isExplanationMode
        ),
    };

    return validateAnalysisConfig(config);
}
