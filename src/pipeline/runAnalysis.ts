/**
 * 분석 파이프라인
 *
 * cloning → preprocessing → embedding → scoring → reasoning → completed
 *
 * Stages run one after another; cancellation is checked whenever a stage is
 * entered. Any error ends the job as failed with the stage that was running.
 */
import { setImmediate as yieldToEventLoop } from "timers/promises";
import { logError, logInfo } from "../utils/logger.js";
import { mapInBatches } from "../utils/batches.js";
import { getLanguageRules } from "../nlp/preprocess/languages.js";
import { prepareSourceFile } from "../nlp/preprocess/normalize.js";
import { EmbeddingCache, type EmbeddingEntry } from "../nlp/embedding/embeddingCache.js";
import { compareRepositories, createFilePairScorer } from "../similarity/aggregate.js";
import {
    analyzeCommits,
    commitEmbeddingEntries,
    createCommitTextScorer,
    prepareCommits,
} from "../commits/commitAnalyzer.js";
import { buildReport } from "../report/buildReport.js";
import { fileKey, type SourceFile } from "../models/SourceFile.js";
import { STAGE_PROGRESS, type JobHandle, type JobSnapshot } from "../jobs/jobRegistry.js";
import type { AnalysisConfig } from "../config/analysisConfig.js";
import type { CommitRecord } from "../models/Commit.js";
import type { JobStage } from "../models/AnalysisJob.js";
import type { RepoPairResult } from "../models/RepoPairResult.js";
import type { EmbeddingProvider } from "../nlp/embedding/types.js";
import type { ExplanationGenerator } from "../report/explanation.js";
import type { RepositorySource } from "../data_sources/types.js";

export interface AnalysisDependencies {
    source: RepositorySource;
    embeddingProvider: EmbeddingProvider;
    explanationGenerator: ExplanationGenerator | null;
    config: AnalysisConfig;
}

const STAGE_LABELS: Record<JobStage, string> = {
    queued: "⏳ Queued",
    cloning: "📥 Cloning repositories",
    preprocessing: "🧹 Preprocessing sources",
    embedding: "🧠 Generating embeddings",
    scoring: "📊 Scoring file and commit pairs",
    reasoning: "📝 Building report",
};

function enterStage(handle: JobHandle, stage: JobStage): void {
    handle.throwIfCancelled();
    handle.advance(stage);
    logInfo(`\n${STAGE_LABELS[stage]} (job ${handle.id})...`);
}

/**
 * Progress between the entry value of `stage` and the entry value of the next stage.
 */
function stageProgress(stage: Exclude<JobStage, "queued">, fraction: number): number {
    const next: Record<Exclude<JobStage, "queued">, number> = {
        cloning: STAGE_PROGRESS.preprocessing,
        preprocessing: STAGE_PROGRESS.embedding,
        embedding: STAGE_PROGRESS.scoring,
        scoring: STAGE_PROGRESS.reasoning,
        reasoning: STAGE_PROGRESS.completed,
    };
    const start = STAGE_PROGRESS[stage];
    return start + (next[stage] - start) * fraction;
}

export async function runAnalysis(handle: JobHandle, deps: AnalysisDependencies): Promise<JobSnapshot> {
    const { source, embeddingProvider, explanationGenerator, config } = deps;
    const job = handle.snapshot;
    const rules = getLanguageRules(job.language);

    try {
        // 1️⃣ 레포지토리 수집
        enterStage(handle, "cloning");
        const repositories = await mapInBatches(
            job.repos,
            config.materializeConcurrency,
            (repo) =>
                source.materialize(repo, {
                    branch: job.branch,
                    rules,
                    maxCommits: config.maxCommits,
                    maxFilesPerRepo: config.maxFilesPerRepo,
                    maxFileSizeKb: config.maxFileSizeKb,
                }),
            (done, total) => handle.reportProgress(stageProgress("cloning", done / total))
        );

        // 2️⃣ 전처리
        enterStage(handle, "preprocessing");
        const filesByRepo = new Map<string, SourceFile[]>();
        const commitsByRepo = new Map<string, CommitRecord[]>();

        for (const repository of repositories) {
            const comparable: SourceFile[] = [];
            for (const raw of repository.files) {
                const prepared = prepareSourceFile(repository.repoId, raw, rules, {
                    aggressive: job.aggressive,
                    maxFileChars: config.maxFileChars,
                    minTokens: config.minTokens,
                    truncation: config.truncation,
                });
                if (prepared.comparable) comparable.push(prepared.file);
            }
            comparable.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
            filesByRepo.set(repository.repoId, comparable);
            commitsByRepo.set(repository.repoId, repository.commits);
            logInfo(`   → ${repository.repoId}: ${comparable.length}/${repository.files.length} comparable files`);
        }

        const commits = prepareCommits(commitsByRepo, rules, {
            maxCommits: config.maxCommits,
            maxFileChars: config.maxFileChars,
            truncation: config.truncation,
            aggressive: job.aggressive,
            ignoreAutomatedCommits: config.ignoreAutomatedCommits,
        });

        // 3️⃣ 임베딩 (populate once, then freeze)
        enterStage(handle, "embedding");
        const entries: EmbeddingEntry[] = [...filesByRepo.values()]
            .flat()
            .map((file) => ({ key: fileKey(file), text: file.normalizedText }));
        entries.push(...commitEmbeddingEntries(commits));

        const cache = new EmbeddingCache();
        await cache.populate(entries, embeddingProvider, {
            batchSize: config.embeddingBatchSize,
            onBatch: (done, total) => handle.reportProgress(stageProgress("embedding", done / total)),
        });
        cache.freeze();

        // 4️⃣ 유사도 계산
        enterStage(handle, "scoring");
        const scorer = createFilePairScorer(cache, config.combine);
        const results: RepoPairResult[] = [];
        const repoIds = repositories.map((repository) => repository.repoId);
        const totalPairs = (repoIds.length * (repoIds.length - 1)) / 2;

        for (let i = 0; i < repoIds.length; i++) {
            for (let j = i + 1; j < repoIds.length; j++) {
                const repoA = repoIds[i] ?? "";
                const repoB = repoIds[j] ?? "";
                const result = compareRepositories(
                    repoA,
                    filesByRepo.get(repoA) ?? [],
                    repoB,
                    filesByRepo.get(repoB) ?? [],
                    scorer,
                    job.threshold
                );
                results.push(result);
                handle.reportProgress(stageProgress("scoring", results.length / totalPairs));
                // let pollers in between repository pairs
                await yieldToEventLoop();
            }
        }

        const commitFlags = analyzeCommits(commits, createCommitTextScorer(cache, config.combine), {
            threshold: job.threshold,
            maxCommitFlags: config.maxCommitFlags,
        });
        logInfo(`   → ${results.filter((r) => r.flagged).length} suspicious pairs, ${commitFlags.length} commit flags`);

        // 5️⃣ 보고서
        enterStage(handle, "reasoning");
        const report = await buildReport(
            {
                results,
                commitFlags,
                parameters: {
                    repositories: [...job.repos],
                    language: job.language,
                    branch: job.branch,
                    threshold: job.threshold,
                    aggressive: job.aggressive,
                },
            },
            explanationGenerator
        );

        handle.throwIfCancelled();
        const completed = handle.complete(report);
        logInfo(`✅ Job ${handle.id} completed`);
        return completed;
    } catch (error) {
        logError(`Job ${handle.id} failed`, error);
        return handle.fail(error);
    }
}
