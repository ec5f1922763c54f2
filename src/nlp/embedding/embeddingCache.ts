/**
 * Job-scoped embedding cache.
 *
 * Populate once (batched, deduplicated by block text), then freeze. Pairwise
 * scoring only reads from a frozen cache; writes after freeze and reads before
 * it throw.
 */
import { EmbeddingError } from "../../errors.js";
import { logInfo } from "../../utils/logger.js";
import {
    assertFiniteVector,
    chunkText,
    meanPool,
    semanticSimilarityFromVectors,
} from "../../similarity/semanticSimilarity.js";
import type { EmbeddingProvider } from "./types.js";

export interface EmbeddingEntry {
    key: string;
    text: string;
}

export interface PopulateOptions {
    batchSize: number;
    onBatch?: (completed: number, total: number) => void;
}

export class EmbeddingCache {
    private readonly vectors = new Map<string, readonly number[] | null>();
    private frozen = false;
    private dimension: number | null = null;

    get size(): number {
        return this.vectors.size;
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    async populate(
        entries: readonly EmbeddingEntry[],
        provider: EmbeddingProvider,
        options: PopulateOptions
    ): Promise<void> {
        if (this.frozen) {
            throw new Error("EmbeddingCache is frozen; populate must run before scoring");
        }

        const blocksByKey = new Map<string, string[]>();
        const uniqueBlocks: string[] = [];
        const blockIndex = new Map<string, number>();

        for (const entry of entries) {
            const blocks = chunkText(entry.text, provider.inputBudget);
            blocksByKey.set(entry.key, blocks);
            for (const block of blocks) {
                if (!blockIndex.has(block)) {
                    blockIndex.set(block, uniqueBlocks.length);
                    uniqueBlocks.push(block);
                }
            }
        }

        const blockVectors = await this.embedBlocks(uniqueBlocks, provider, options);

        for (const [key, blocks] of blocksByKey) {
            if (blocks.length === 0) {
                this.vectors.set(key, null);
                continue;
            }
            const vectors = blocks.map((block) => {
                const vector = blockVectors[blockIndex.get(block) ?? -1];
                if (!vector) {
                    throw new EmbeddingError(`Missing embedding for block of ${key}`);
                }
                return vector;
            });
            this.vectors.set(key, Object.freeze(meanPool(vectors)));
        }

        logInfo(`   → ${uniqueBlocks.length} unique blocks embedded for ${entries.length} texts (${provider.name})`);
    }

    freeze(): void {
        this.frozen = true;
    }

    /**
     * Pooled vector for a key; null when the text was empty.
     */
    get(key: string): readonly number[] | null {
        if (!this.frozen) {
            throw new Error("EmbeddingCache must be frozen before it is read");
        }
        const vector = this.vectors.get(key);
        if (vector === undefined) {
            throw new Error(`No embedding cached for ${key}`);
        }
        return vector;
    }

    similarity(keyA: string, keyB: string): number {
        return semanticSimilarityFromVectors(this.get(keyA), this.get(keyB));
    }

    private async embedBlocks(
        blocks: readonly string[],
        provider: EmbeddingProvider,
        options: PopulateOptions
    ): Promise<number[][]> {
        const batchSize = Math.max(1, options.batchSize);
        const results: number[][] = [];
        const totalBatches = Math.ceil(blocks.length / batchSize);

        for (let i = 0; i < blocks.length; i += batchSize) {
            const batch = blocks.slice(i, i + batchSize);

            let batchVectors: number[][];
            try {
                batchVectors = await provider.embed(batch);
            } catch (error) {
                if (error instanceof EmbeddingError) throw error;
                throw new EmbeddingError(`Embedding provider "${provider.name}" failed`, error);
            }

            if (batchVectors.length !== batch.length) {
                throw new EmbeddingError(
                    `Embedding provider "${provider.name}" returned ${batchVectors.length} vectors for ${batch.length} inputs`
                );
            }

            for (const vector of batchVectors) {
                assertFiniteVector(vector, provider.name);
                if (this.dimension === null) {
                    this.dimension = vector.length;
                } else if (vector.length !== this.dimension) {
                    throw new EmbeddingError(`Embedding dimension mismatch: ${vector.length} != ${this.dimension}`);
                }
                results.push(vector);
            }

            options.onBatch?.(i / batchSize + 1, totalBatches);
        }

        return results;
    }
}
