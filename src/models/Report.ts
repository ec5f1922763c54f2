import type { CommitFlag } from "./Commit.js";
import type { RepoPairResult, SimilarityMatrix } from "./RepoPairResult.js";
import type { SupportedLanguage } from "../nlp/preprocess/languages.js";

export interface ReportSummary {
    totalRepos: number;
    suspiciousPairs: number;
    totalFilePairsCompared: number;
}

export interface ReportParameters {
    repositories: string[];
    language: SupportedLanguage;
    branch: string;
    threshold: number;
    aggressive: boolean;
}

/**
 * 분석 결과 보고서. The only contract for rendering and export.
 */
export interface Report {
    summary: ReportSummary;
    repositoryMatrix: SimilarityMatrix;
    /** Flagged pairs, descending by repoSimilarity */
    suspiciousPairs: RepoPairResult[];
    commitFlags: CommitFlag[];
    parameters: ReportParameters;
    generatedAt: string;
}
