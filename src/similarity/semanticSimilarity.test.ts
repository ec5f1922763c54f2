import { describe, it, expect } from "vitest";
import { EmbeddingError } from "../errors.js";
import { CountingProvider } from "../testing/fixtures.js";
import {
    chunkText,
    cosineSimilarity,
    embedText,
    meanPool,
    semanticSimilarity,
    semanticSimilarityFromVectors,
} from "./semanticSimilarity.js";
import type { EmbeddingProvider } from "../nlp/embedding/types.js";

describe("chunkText", () => {
    it("splits into fixed-size blocks", () => {
        expect(chunkText("abcdef", 4)).toEqual(["abcd", "ef"]);
    });

    it("returns no blocks for empty text", () => {
        expect(chunkText("", 4)).toEqual([]);
    });
});

describe("meanPool", () => {
    it("averages vectors component-wise", () => {
        expect(meanPool([[1, 2], [3, 4]])).toEqual([2, 3]);
    });

    it("rejects mismatched dimensions", () => {
        expect(() => meanPool([[1, 2], [3]])).toThrow(EmbeddingError);
    });
});

describe("cosineSimilarity", () => {
    it("is 0 for orthogonal vectors and 1 for parallel ones", () => {
        expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
        expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    });

    it("is 0 for zero vectors", () => {
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it("throws on dimension mismatch", () => {
        expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(EmbeddingError);
    });
});

describe("semanticSimilarityFromVectors", () => {
    it("floors anti-correlation at 0", () => {
        expect(semanticSimilarityFromVectors([1, 0], [-1, 0])).toBe(0);
    });

    it("is 0 when a vector is missing", () => {
        expect(semanticSimilarityFromVectors(null, [1, 0])).toBe(0);
    });

    it("rounds float noise", () => {
        expect(semanticSimilarityFromVectors([0.1, 0.2, 0.3], [0.1, 0.2, 0.3])).toBe(1);
    });
});

describe("semanticSimilarity", () => {
    it("is 0 when one text is empty", async () => {
        expect(await semanticSimilarity("", "def f", new CountingProvider())).toBe(0);
    });

    it("mean-pools blocks of long texts", async () => {
        const provider = new CountingProvider(4);
        // blocks "abcd" and "ef" embed as [4,1] and [2,1]
        expect(await embedText("abcdef", provider)).toEqual([3, 1]);
        expect(provider.calls).toEqual([["abcd", "ef"]]);
    });

    it("wraps provider failures", async () => {
        const failing: EmbeddingProvider = {
            name: "broken",
            inputBudget: 100,
            embed: async () => {
                throw new Error("quota exceeded");
            },
        };

        await expect(semanticSimilarity("a", "b", failing)).rejects.toThrow(EmbeddingError);
    });

    it("rejects non-finite vectors", async () => {
        const provider: EmbeddingProvider = {
            name: "nan",
            inputBudget: 100,
            embed: async (texts) => texts.map(() => [Number.NaN, 1]),
        };

        await expect(embedText("a", provider)).rejects.toThrow("Non-finite embedding value");
    });
});
