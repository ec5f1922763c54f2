import { describe, it, expect } from "vitest";
import { getLanguageRules } from "../nlp/preprocess/languages.js";
import { prepareSourceFile } from "../nlp/preprocess/normalize.js";
import { EmbeddingCache } from "../nlp/embedding/embeddingCache.js";
import { HashingEmbeddingProvider } from "../nlp/embedding/hashingEmbedding.js";
import { fileKey, type SourceFile } from "../models/SourceFile.js";
import { pythonModule } from "../testing/fixtures.js";
import { classifyBand, DEFAULT_BANDS, DEFAULT_WEIGHTS } from "./combine.js";
import {
    aggregate,
    buildSimilarityMatrix,
    compareRepositories,
    createFilePairScorer,
    matrixValue,
    selectBestMatches,
    type FilePairScorer,
} from "./aggregate.js";
import type { FilePairScore } from "../models/FilePairScore.js";
import type { RepoPairResult } from "../models/RepoPairResult.js";

const rules = getLanguageRules("python");

function pair(pathA: string, pathB: string, score: number): FilePairScore {
    return {
        fileA: { repoId: "A", path: pathA },
        fileB: { repoId: "B", path: pathB },
        tokenScore: score,
        semanticScore: score,
        combinedScore: score,
        band: classifyBand(score),
    };
}

function swap(p: FilePairScore): FilePairScore {
    return { ...p, fileA: p.fileB, fileB: p.fileA };
}

function prepareRepo(repoId: string, files: Record<string, string>): SourceFile[] {
    return Object.entries(files).map(
        ([path, content]) =>
            prepareSourceFile(repoId, { path, content }, rules, {
                maxFileChars: 10_000,
                minTokens: 5,
                truncation: "character",
            }).file
    );
}

async function scorerFor(repos: SourceFile[][]): Promise<FilePairScorer> {
    const cache = new EmbeddingCache();
    const entries = repos.flat().map((file) => ({ key: fileKey(file), text: file.normalizedText }));
    await cache.populate(entries, new HashingEmbeddingProvider(1000), { batchSize: 16 });
    cache.freeze();
    return createFilePairScorer(cache, { weights: DEFAULT_WEIGHTS, bands: DEFAULT_BANDS });
}

describe("aggregate", () => {
    it("is 0 for no pairs", () => {
        expect(aggregate([])).toBe(0);
    });

    it("takes the median of best matches from both sides", () => {
        const pairs = [pair("a1", "b1", 0.9), pair("a1", "b2", 0.2), pair("a2", "b1", 0.4), pair("a2", "b2", 0.6)];
        // best: a1 0.9, a2 0.6, b1 0.9, b2 0.6
        expect(aggregate(pairs)).toBe(0.75);
    });

    it("gives the same value when the repositories are swapped", () => {
        const pairs = [pair("a1", "b1", 0.8), pair("a1", "b2", 0.2)];
        // best: a1 0.8, b1 0.8, b2 0.2
        expect(aggregate(pairs)).toBe(0.8);
        expect(aggregate(pairs.map(swap))).toBe(0.8);
    });
});

describe("selectBestMatches", () => {
    it("breaks ties toward the smaller path and keeps distinct pairs", () => {
        const pairs = [pair("a1", "b2", 0.5), pair("a1", "b1", 0.5), pair("a2", "b1", 0.1), pair("a2", "b2", 0.9)];

        const best = selectBestMatches(pairs).map((p) => [p.fileA.path, p.fileB.path, p.combinedScore]);
        expect(best).toEqual([
            ["a2", "b2", 0.9],
            ["a1", "b1", 0.5],
        ]);
    });
});

describe("compareRepositories", () => {
    it("scores a renamed identical file as a critical match", async () => {
        const content = pythonModule("orders");
        const filesA = prepareRepo("A", { "src/utils.py": content });
        const filesB = prepareRepo("B", { "lib/helpers.py": content });
        const scorer = await scorerFor([filesA, filesB]);

        const result = compareRepositories("A", filesA, "B", filesB, scorer, 0.75);

        expect(result.repoSimilarity).toBe(1);
        expect(result.flagged).toBe(true);
        expect(result.comparedPairs).toBe(1);
        expect(result.filePairs).toHaveLength(1);
        expect(result.filePairs[0]).toMatchObject({
            fileA: { repoId: "A", path: "src/utils.py" },
            fileB: { repoId: "B", path: "lib/helpers.py" },
            tokenScore: 1,
            semanticScore: 1,
            combinedScore: 1,
            band: "critical",
        });
    });

    it("ranks a mostly copied repository above an unrelated one", async () => {
        const names = Array.from({ length: 10 }, (_, i) => `mod${i}`);
        const filesA = prepareRepo("A", Object.fromEntries(names.map((n) => [`${n}.py`, pythonModule(n)] as const)));
        const filesB = prepareRepo(
            "B",
            Object.fromEntries([
                ...names.slice(0, 9).map((n) => [`copy/${n}.py`, pythonModule(n)] as const),
                ["copy/own.py", pythonModule("unique")] as const,
            ])
        );
        const filesC = prepareRepo("C", Object.fromEntries(names.map((_, i) => [`c${i}.py`, pythonModule(`other${i}`)] as const)));
        const scorer = await scorerFor([filesA, filesB, filesC]);

        const ab = compareRepositories("A", filesA, "B", filesB, scorer, 0.75);
        const ac = compareRepositories("A", filesA, "C", filesC, scorer, 0.75);
        const bc = compareRepositories("B", filesB, "C", filesC, scorer, 0.75);

        expect(ab.repoSimilarity).toBe(1);
        expect(ab.flagged).toBe(true);
        expect(ab.comparedPairs).toBe(100);
        expect(ac.flagged).toBe(false);
        expect(bc.flagged).toBe(false);
        expect(ab.repoSimilarity).toBeGreaterThan(ac.repoSimilarity);
        expect(ab.repoSimilarity).toBeGreaterThan(bc.repoSimilarity);
    });

    it("is symmetric in its repository arguments", async () => {
        const filesA = prepareRepo("A", { "a.py": pythonModule("alpha"), "b.py": pythonModule("beta") });
        const filesB = prepareRepo("B", { "x.py": pythonModule("alpha"), "y.py": pythonModule("gamma") });
        const scorer = await scorerFor([filesA, filesB]);

        expect(compareRepositories("A", filesA, "B", filesB, scorer, 0.75).repoSimilarity).toBe(
            compareRepositories("B", filesB, "A", filesA, scorer, 0.75).repoSimilarity
        );
    });

    it("never flags a side without comparable files", async () => {
        const filesA = prepareRepo("A", { "a.py": pythonModule("alpha") });
        const scorer = await scorerFor([filesA]);

        const result = compareRepositories("A", filesA, "B", [], scorer, 0);
        expect(result).toMatchObject({ repoSimilarity: 0, filePairs: [], comparedPairs: 0, flagged: false });
    });
});

describe("buildSimilarityMatrix", () => {
    function result(repoA: string, repoB: string, repoSimilarity: number): RepoPairResult {
        return {
            repoA,
            repoB,
            repoSimilarity,
            filePairs: [],
            comparedPairs: 0,
            comparableFilesA: 0,
            comparableFilesB: 0,
            flagged: false,
            explanation: "",
        };
    }

    it("mirrors results around a diagonal of 1", () => {
        const matrix = buildSimilarityMatrix(["a", "b", "c"], [result("a", "b", 0.4), result("b", "c", 0.9)]);

        expect(matrix.similarities).toEqual([
            [1, 0.4, 0],
            [0.4, 1, 0.9],
            [0, 0.9, 1],
        ]);
        expect(matrixValue(matrix, "c", "b")).toBe(0.9);
    });

    it("rejects results for unknown repositories", () => {
        expect(() => buildSimilarityMatrix(["a", "b"], [result("a", "z", 0.1)])).toThrow("Unknown repository");
    });
});
