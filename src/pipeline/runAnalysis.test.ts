import { describe, it, expect } from "vitest";
import { AnalysisService } from "../jobs/analysisService.js";
import { JobRegistry } from "../jobs/jobRegistry.js";
import { HashingEmbeddingProvider } from "../nlp/embedding/hashingEmbedding.js";
import { TemplateExplanationGenerator } from "../report/explanation.js";
import { InMemorySource, commit, pythonModule, testConfig, type FakeRepository } from "../testing/fixtures.js";
import { runAnalysis, type AnalysisDependencies } from "./runAnalysis.js";
import type { RepositorySource } from "../data_sources/types.js";

const shared = pythonModule("billing");

const repositories: Record<string, FakeRepository> = {
    "https://github.com/acme/original": {
        files: [
            { path: "billing.py", content: shared },
            { path: "tiny.py", content: "x = 1" },
        ],
        commits: [commit("https://github.com/acme/original", "a1", "Add billing", ["total = price * quantity"])],
    },
    "https://github.com/acme/copy": {
        files: [{ path: "src/invoice.py", content: shared }],
        commits: [commit("https://github.com/acme/copy", "b1", "Add billing", ["total = price * quantity"])],
    },
    "https://github.com/acme/other": {
        files: [{ path: "main.py", content: pythonModule("weather") }],
    },
};

function deps(source: RepositorySource = new InMemorySource(repositories)): AnalysisDependencies {
    return {
        source,
        embeddingProvider: new HashingEmbeddingProvider(1000),
        explanationGenerator: new TemplateExplanationGenerator(),
        config: testConfig(),
    };
}

describe("AnalysisService", () => {
    it("runs a job to a completed report", async () => {
        const service = new AnalysisService(deps());
        const { job, done } = service.submit({
            repos: Object.keys(repositories),
            language: "python",
        });
        expect(job.status).toBe("queued");

        const finished = await done;
        expect(finished.status).toBe("completed");
        expect(finished.progress).toBe(100);

        const report = service.getReport(job.id);
        expect(report.summary).toEqual({ totalRepos: 3, suspiciousPairs: 1, totalFilePairsCompared: 3 });
        expect(report.suspiciousPairs[0]).toMatchObject({
            repoA: "https://github.com/acme/original",
            repoB: "https://github.com/acme/copy",
            repoSimilarity: 1,
            flagged: true,
        });
        expect(report.suspiciousPairs[0]?.explanation).toContain("1. billing.py <-> src/invoice.py (100%, CRITICAL)");
        expect(report.commitFlags).toHaveLength(1);
        expect(report.commitFlags[0]?.reason).toBe("diff-and-message");
        expect(report.repositoryMatrix.similarities[0]?.[1]).toBe(1);
    });

    it("builds a full matrix for ten repositories", async () => {
        const ten: Record<string, FakeRepository> = {};
        for (let i = 0; i < 10; i++) {
            ten[`https://github.com/acme/r${i}`] = { files: [{ path: "app.py", content: pythonModule(`name${i}`) }] };
        }
        const service = new AnalysisService(deps(new InMemorySource(ten)));

        const { job, done } = service.submit({ repos: Object.keys(ten), language: "python" });
        await done;

        const matrix = service.getReport(job.id).repositoryMatrix;
        expect(matrix.similarities).toHaveLength(10);
        matrix.similarities.forEach((row, i) => {
            expect(row).toHaveLength(10);
            expect(row[i]).toBe(1);
            row.forEach((value, j) => expect(value).toBe(matrix.similarities[j]?.[i]));
        });
    });

    it("fails at cloning and names the missing repository", async () => {
        const service = new AnalysisService(deps());
        const { job, done } = service.submit({
            repos: ["https://github.com/acme/original", "https://github.com/acme/gone"],
            language: "python",
        });

        const failed = await done;
        expect(failed.status).toBe("failed");
        expect(failed.failedStage).toBe("cloning");
        expect(failed.error).toContain("https://github.com/acme/gone");
        expect(failed.result).toBeUndefined();
        expect(() => service.getReport(job.id)).toThrow("Report not available");
    });

    it("rejects invalid submissions without creating a job", () => {
        const service = new AnalysisService(deps());
        expect(() => service.submit({ repos: ["https://github.com/acme/original"], language: "python" })).toThrow(
            "At least 2 repositories"
        );
        expect(service.listJobs()).toEqual([]);
    });
});

describe("runAnalysis", () => {
    it("stops at the next stage once cancellation is requested", async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        const registry = new JobRegistry();
        const handle = registry.create({
            repos: ["https://github.com/acme/original", "https://github.com/acme/copy"],
            language: "python",
            threshold: 0.75,
            branch: "main",
            aggressive: false,
        });

        const running = runAnalysis(handle, deps(new InMemorySource(repositories, gate)));
        registry.requestCancellation(handle.id);
        release();

        const finished = await running;
        expect(finished).toMatchObject({ status: "failed", error: "Analysis cancelled", failedStage: "cloning" });
        expect(finished.result).toBeUndefined();
    });

    it("cancels a queued job before it starts", async () => {
        const registry = new JobRegistry();
        const handle = registry.create({
            repos: ["https://github.com/acme/original", "https://github.com/acme/copy"],
            language: "python",
            threshold: 0.75,
            branch: "main",
            aggressive: false,
        });
        const source = new InMemorySource(repositories);
        registry.requestCancellation(handle.id);

        const finished = await runAnalysis(handle, deps(source));
        expect(finished).toMatchObject({ status: "failed", error: "Analysis cancelled", failedStage: "queued" });
        expect(source.requested).toEqual([]);
    });
});
