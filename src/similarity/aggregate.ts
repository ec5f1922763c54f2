/**
 * 레포지토리 단위 집계
 *
 * Every file is matched with its best counterpart in the other repository,
 * from both sides; the repository score is the median of those best-match
 * scores. Ties between equally good candidates go to the smaller path.
 */
import { fileKey } from "../models/SourceFile.js";
import { median, roundScore } from "../utils/math.js";
import { combine, type CombineOptions } from "./combine.js";
import { tokenSet, jaccardSimilarity } from "./tokenSimilarity.js";
import type { EmbeddingCache } from "../nlp/embedding/embeddingCache.js";
import type { FilePairScore } from "../models/FilePairScore.js";
import type { RepoPairResult, SimilarityMatrix } from "../models/RepoPairResult.js";
import type { FileRef, SourceFile } from "../models/SourceFile.js";

export interface FilePairScorer {
    scoreFiles(fileA: SourceFile, fileB: SourceFile): FilePairScore;
}

/**
 * Scorer backed by a frozen embedding cache. Token sets are memoized per file.
 */
export function createFilePairScorer(cache: EmbeddingCache, options: CombineOptions): FilePairScorer {
    const tokenSets = new Map<string, Set<string>>();

    const tokensOf = (file: SourceFile): Set<string> => {
        const key = fileKey(file);
        let tokens = tokenSets.get(key);
        if (!tokens) {
            tokens = tokenSet(file.normalizedText);
            tokenSets.set(key, tokens);
        }
        return tokens;
    };

    return {
        scoreFiles(fileA, fileB) {
            const tokenScore = roundScore(jaccardSimilarity(tokensOf(fileA), tokensOf(fileB)));
            const semanticScore = cache.similarity(fileKey(fileA), fileKey(fileB));
            const { combinedScore, band } = combine(tokenScore, semanticScore, options);

            return {
                fileA: { repoId: fileA.repoId, path: fileA.path },
                fileB: { repoId: fileB.repoId, path: fileB.path },
                tokenScore,
                semanticScore,
                combinedScore,
                band,
            };
        },
    };
}

function compareRefs(a: FileRef, b: FileRef): number {
    if (a.repoId !== b.repoId) return a.repoId < b.repoId ? -1 : 1;
    if (a.path !== b.path) return a.path < b.path ? -1 : 1;
    return 0;
}

/**
 * Descending by combinedScore, then by fileA / fileB path.
 */
export function compareFilePairs(a: FilePairScore, b: FilePairScore): number {
    if (a.combinedScore !== b.combinedScore) return b.combinedScore - a.combinedScore;
    return compareRefs(a.fileA, b.fileA) || compareRefs(a.fileB, b.fileB);
}

function bestMatchesFrom(pairs: readonly FilePairScore[], side: "A" | "B"): Map<string, FilePairScore> {
    const best = new Map<string, FilePairScore>();

    for (const pair of pairs) {
        const own = side === "A" ? pair.fileA : pair.fileB;
        const key = fileKey(own);
        const current = best.get(key);
        if (!current) {
            best.set(key, pair);
            continue;
        }

        const candidateOther = side === "A" ? pair.fileB : pair.fileA;
        const currentOther = side === "A" ? current.fileB : current.fileA;
        if (
            pair.combinedScore > current.combinedScore ||
            (pair.combinedScore === current.combinedScore && compareRefs(candidateOther, currentOther) < 0)
        ) {
            best.set(key, pair);
        }
    }

    return best;
}

/**
 * Distinct best-match pairs of both directions, sorted with compareFilePairs.
 */
export function selectBestMatches(pairs: readonly FilePairScore[]): FilePairScore[] {
    const distinct = new Map<string, FilePairScore>();
    for (const side of ["A", "B"] as const) {
        for (const pair of bestMatchesFrom(pairs, side).values()) {
            distinct.set(`${fileKey(pair.fileA)}|${fileKey(pair.fileB)}`, pair);
        }
    }
    return [...distinct.values()].sort(compareFilePairs);
}

/**
 * Repository similarity of a file-pair set: median of the best-match score of
 * every file on either side. 0 for an empty set. Swapping A and B in every
 * pair yields the same value.
 */
export function aggregate(filePairs: readonly FilePairScore[]): number {
    if (filePairs.length === 0) return 0;

    const bestScores = [
        ...bestMatchesFrom(filePairs, "A").values(),
        ...bestMatchesFrom(filePairs, "B").values(),
    ].map((pair) => pair.combinedScore);

    return roundScore(median(bestScores));
}

/**
 * Scores every comparable A x B file pair and aggregates them.
 * Either side without comparable files yields 0 and is never flagged.
 */
export function compareRepositories(
    repoA: string,
    filesA: readonly SourceFile[],
    repoB: string,
    filesB: readonly SourceFile[],
    scorer: FilePairScorer,
    threshold: number
): RepoPairResult {
    const base = {
        repoA,
        repoB,
        comparableFilesA: filesA.length,
        comparableFilesB: filesB.length,
        explanation: "",
    };

    if (filesA.length === 0 || filesB.length === 0) {
        return { ...base, repoSimilarity: 0, filePairs: [], comparedPairs: 0, flagged: false };
    }

    const pairs: FilePairScore[] = [];
    for (const fileA of filesA) {
        for (const fileB of filesB) {
            pairs.push(scorer.scoreFiles(fileA, fileB));
        }
    }

    const repoSimilarity = aggregate(pairs);

    return {
        ...base,
        repoSimilarity,
        filePairs: selectBestMatches(pairs),
        comparedPairs: pairs.length,
        flagged: repoSimilarity >= threshold,
    };
}

/**
 * Mirrors pair results into a symmetric N x N matrix, diagonal 1.0.
 * Pairs without a result stay 0.
 */
export function buildSimilarityMatrix(repos: readonly string[], results: readonly RepoPairResult[]): SimilarityMatrix {
    const index = new Map(repos.map((repo, i) => [repo, i] as const));
    const similarities: number[][] = repos.map((_, i) => repos.map((__, j) => (i === j ? 1 : 0)));

    for (const result of results) {
        const i = index.get(result.repoA);
        const j = index.get(result.repoB);
        if (i === undefined || j === undefined) {
            throw new Error(`Unknown repository in pair ${result.repoA} / ${result.repoB}`);
        }
        if (i === j) continue;
        const rowI = similarities[i];
        const rowJ = similarities[j];
        if (rowI && rowJ) {
            rowI[j] = result.repoSimilarity;
            rowJ[i] = result.repoSimilarity;
        }
    }

    return { repos: [...repos], similarities };
}

export function matrixValue(matrix: SimilarityMatrix, repoA: string, repoB: string): number {
    const i = matrix.repos.indexOf(repoA);
    const j = matrix.repos.indexOf(repoB);
    if (i === -1 || j === -1) {
        throw new Error(`Unknown repository ${i === -1 ? repoA : repoB}`);
    }
    return matrix.similarities[i]?.[j] ?? 0;
}
