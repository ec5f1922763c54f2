import { describe, it, expect } from "vitest";
import { featureHashVector, fnv1aHash32, HashingEmbeddingProvider } from "./hashingEmbedding.js";
import { cosineSimilarity } from "../../similarity/semanticSimilarity.js";

describe("fnv1aHash32", () => {
    it("matches the reference values", () => {
        expect(fnv1aHash32("")).toBe(0x811c9dc5);
        expect(fnv1aHash32("a")).toBe(0xe40c292c);
    });
});

describe("featureHashVector", () => {
    it("is unit length", () => {
        const vector = featureHashVector("def load ( path ) : return path", 64);
        const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));

        expect(vector).toHaveLength(64);
        expect(norm).toBeCloseTo(1, 10);
    });

    it("is all zeros for empty text", () => {
        expect(featureHashVector("", 8)).toEqual(new Array(8).fill(0));
    });

    it("ignores token order", () => {
        expect(featureHashVector("a b c", 32)).toEqual(featureHashVector("c a b", 32));
    });
});

describe("HashingEmbeddingProvider", () => {
    it("embeds deterministically and keeps related texts closer", async () => {
        const provider = new HashingEmbeddingProvider(1000, 256);
        const [base, near, far] = await provider.embed([
            "total = price * quantity return total",
            "total = price * quantity return total + tax",
            "class Widget : pass",
        ]);

        expect(await provider.embed(["total = price * quantity return total"])).toEqual([base]);
        expect(cosineSimilarity(base ?? [], near ?? [])).toBeGreaterThan(cosineSimilarity(base ?? [], far ?? []));
    });
});
