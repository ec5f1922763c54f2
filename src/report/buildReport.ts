/**
 * 분석 결과를 최종 보고서로 조립합니다.
 */
import { buildSimilarityMatrix } from "../similarity/aggregate.js";
import { deepFreeze } from "../utils/freeze.js";
import { explainPair, type ExplanationGenerator } from "./explanation.js";
import type { CommitFlag } from "../models/Commit.js";
import type { RepoPairResult } from "../models/RepoPairResult.js";
import type { Report, ReportParameters } from "../models/Report.js";

export interface BuildReportInput {
    results: readonly RepoPairResult[];
    commitFlags: readonly CommitFlag[];
    parameters: ReportParameters;
    generatedAt?: Date;
}

/**
 * Flagged pairs, descending by repoSimilarity, then by repository names.
 */
export function selectSuspiciousPairs(results: readonly RepoPairResult[]): RepoPairResult[] {
    return results
        .filter((result) => result.flagged)
        .sort((a, b) => {
            if (a.repoSimilarity !== b.repoSimilarity) return b.repoSimilarity - a.repoSimilarity;
            if (a.repoA !== b.repoA) return a.repoA < b.repoA ? -1 : 1;
            if (a.repoB !== b.repoB) return a.repoB < b.repoB ? -1 : 1;
            return 0;
        });
}

/**
 * Builds the frozen report. Only suspicious pairs are explained.
 */
export async function buildReport(input: BuildReportInput, generator: ExplanationGenerator | null): Promise<Report> {
    const { results, commitFlags, parameters } = input;
    const context = { threshold: parameters.threshold, language: parameters.language };

    const suspiciousPairs: RepoPairResult[] = [];
    for (const pair of selectSuspiciousPairs(results)) {
        const explanation = await explainPair(generator, pair, context);
        suspiciousPairs.push({ ...pair, explanation });
    }

    const report: Report = {
        summary: {
            totalRepos: parameters.repositories.length,
            suspiciousPairs: suspiciousPairs.length,
            totalFilePairsCompared: results.reduce((sum, result) => sum + result.comparedPairs, 0),
        },
        repositoryMatrix: buildSimilarityMatrix(parameters.repositories, results),
        suspiciousPairs,
        commitFlags: [...commitFlags],
        parameters: { ...parameters, repositories: [...parameters.repositories] },
        generatedAt: (input.generatedAt ?? new Date()).toISOString(),
    };

    return deepFreeze(report);
}
