import type { FilePairScore } from "./FilePairScore.js";

/**
 * 두 레포지토리 비교 결과입니다.
 */
export interface RepoPairResult {
    repoA: string;
    repoB: string;
    /** Median of best-match scores from both directions, [0,1] */
    repoSimilarity: number;
    /** Distinct best-match pairs, descending by combinedScore */
    filePairs: FilePairScore[];
    /** Number of A x B pairs that were scored */
    comparedPairs: number;
    comparableFilesA: number;
    comparableFilesB: number;
    /** repoSimilarity >= threshold, never true when either side had no comparable file */
    flagged: boolean;
    /** Free-text explanation; empty when no generator is configured */
    explanation: string;
}

/**
 * N x N 유사도 행렬. Symmetric, diagonal fixed at 1.0.
 */
export interface SimilarityMatrix {
    repos: string[];
    similarities: number[][];
}
