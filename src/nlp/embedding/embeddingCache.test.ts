import { describe, it, expect } from "vitest";
import { EmbeddingError } from "../../errors.js";
import { CountingProvider } from "../../testing/fixtures.js";
import { EmbeddingCache } from "./embeddingCache.js";
import type { EmbeddingProvider } from "./types.js";

describe("EmbeddingCache", () => {
    it("embeds each distinct block once", async () => {
        const provider = new CountingProvider();
        const cache = new EmbeddingCache();

        await cache.populate(
            [
                { key: "a", text: "same text" },
                { key: "b", text: "same text" },
                { key: "c", text: "other" },
            ],
            provider,
            { batchSize: 10 }
        );
        cache.freeze();

        expect(provider.calls).toEqual([["same text", "other"]]);
        expect(cache.get("a")).toEqual([9, 1]);
        expect(cache.similarity("a", "b")).toBe(1);
    });

    it("reports batch progress", async () => {
        const progress: Array<[number, number]> = [];
        const cache = new EmbeddingCache();

        await cache.populate(
            [
                { key: "a", text: "x" },
                { key: "b", text: "yy" },
                { key: "c", text: "zzz" },
            ],
            new CountingProvider(),
            { batchSize: 2, onBatch: (done, total) => progress.push([done, total]) }
        );

        expect(progress).toEqual([
            [1, 2],
            [2, 2],
        ]);
    });

    it("stores null for empty text and scores it 0", async () => {
        const cache = new EmbeddingCache();
        await cache.populate(
            [
                { key: "empty", text: "" },
                { key: "full", text: "content" },
            ],
            new CountingProvider(),
            { batchSize: 4 }
        );
        cache.freeze();

        expect(cache.get("empty")).toBeNull();
        expect(cache.similarity("empty", "full")).toBe(0);
    });

    it("refuses reads before freeze and writes after it", async () => {
        const cache = new EmbeddingCache();
        await cache.populate([{ key: "a", text: "x" }], new CountingProvider(), { batchSize: 4 });

        expect(() => cache.get("a")).toThrow("must be frozen");
        cache.freeze();
        await expect(cache.populate([], new CountingProvider(), { batchSize: 4 })).rejects.toThrow("frozen");
        expect(() => cache.get("missing")).toThrow("No embedding cached for missing");
    });

    it("rejects a provider that returns the wrong number of vectors", async () => {
        const provider: EmbeddingProvider = {
            name: "short",
            inputBudget: 100,
            embed: async () => [[1, 0]],
        };

        await expect(
            new EmbeddingCache().populate(
                [
                    { key: "a", text: "x" },
                    { key: "b", text: "y" },
                ],
                provider,
                { batchSize: 4 }
            )
        ).rejects.toThrow(EmbeddingError);
    });

    it("rejects inconsistent dimensions across batches", async () => {
        let call = 0;
        const provider: EmbeddingProvider = {
            name: "drifting",
            inputBudget: 100,
            embed: async (texts) => {
                call += 1;
                return texts.map(() => (call === 1 ? [1, 0] : [1, 0, 0]));
            },
        };

        await expect(
            new EmbeddingCache().populate(
                [
                    { key: "a", text: "x" },
                    { key: "b", text: "y" },
                ],
                provider,
                { batchSize: 1 }
            )
        ).rejects.toThrow("dimension mismatch");
    });
});
