/**
 * 임베딩 기반 의미 유사도
 *
 * Long texts are split into fixed-size blocks, each block is embedded and the
 * block vectors are averaged (mean pooling), so every text ends up as one vector.
 */
import { EmbeddingError } from "../errors.js";
import { clamp, roundScore } from "../utils/math.js";
import type { EmbeddingProvider } from "../nlp/embedding/types.js";

/**
 * Splits text into blocks of `blockSize` characters. Empty text has no blocks.
 */
export function chunkText(text: string, blockSize: number): string[] {
    if (text.length === 0) return [];
    if (blockSize <= 0 || text.length <= blockSize) return [text];

    const chunks: string[] = [];
    for (let offset = 0; offset < text.length; offset += blockSize) {
        chunks.push(text.slice(offset, offset + blockSize));
    }
    return chunks;
}

/**
 * Arithmetic mean of equally sized vectors.
 */
export function meanPool(vectors: readonly (readonly number[])[]): number[] {
    const first = vectors[0];
    if (!first) {
        throw new EmbeddingError("Cannot average empty embeddings array");
    }

    const dimension = first.length;
    const averaged = new Array<number>(dimension).fill(0);

    for (const vector of vectors) {
        if (vector.length !== dimension) {
            throw new EmbeddingError(`Embedding dimension mismatch: ${vector.length} != ${dimension}`);
        }
        for (let i = 0; i < dimension; i++) {
            averaged[i] = (averaged[i] ?? 0) + (vector[i] ?? 0);
        }
    }

    return averaged.map((sum) => sum / vectors.length);
}

/**
 * Raw cosine similarity in [-1, 1]. 0 for empty or zero-norm vectors.
 */
export function cosineSimilarity(vectorA: readonly number[], vectorB: readonly number[]): number {
    if (vectorA.length === 0 || vectorB.length === 0) {
        return 0;
    }
    if (vectorA.length !== vectorB.length) {
        throw new EmbeddingError(`Embedding dimension mismatch: ${vectorA.length} != ${vectorB.length}`);
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;

    for (let index = 0; index < vectorA.length; index += 1) {
        const a = vectorA[index] ?? 0;
        const b = vectorB[index] ?? 0;
        dot += a * b;
        normA += a * a;
        normB += b * b;
    }

    if (normA === 0 || normB === 0) {
        return 0;
    }

    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Cosine clamped to [0,1]; anti-correlation carries no reuse signal.
 */
export function semanticSimilarityFromVectors(
    vectorA: readonly number[] | null,
    vectorB: readonly number[] | null
): number {
    if (!vectorA || !vectorB) return 0;
    return roundScore(clamp(cosineSimilarity(vectorA, vectorB), 0, 1));
}

export function assertFiniteVector(vector: readonly number[], label: string): void {
    if (vector.length === 0) {
        throw new EmbeddingError(`Empty embedding returned for ${label}`);
    }
    if (!vector.every((value) => Number.isFinite(value))) {
        throw new EmbeddingError(`Non-finite embedding value returned for ${label}`);
    }
}

/**
 * Embeds one text into a single mean-pooled vector; null for empty text.
 */
export async function embedText(text: string, provider: EmbeddingProvider): Promise<number[] | null> {
    const blocks = chunkText(text, provider.inputBudget);
    if (blocks.length === 0) return null;

    let vectors: number[][];
    try {
        vectors = await provider.embed(blocks);
    } catch (error) {
        if (error instanceof EmbeddingError) throw error;
        throw new EmbeddingError(`Embedding provider "${provider.name}" failed`, error);
    }

    if (vectors.length !== blocks.length) {
        throw new EmbeddingError(`Embedding provider "${provider.name}" returned ${vectors.length} vectors for ${blocks.length} inputs`);
    }
    vectors.forEach((vector, index) => assertFiniteVector(vector, `block ${index}`));

    return meanPool(vectors);
}

/**
 * One-off semantic similarity of two texts. Pairwise scoring inside a job
 * goes through EmbeddingCache instead, so nothing is embedded twice.
 */
export async function semanticSimilarity(
    textA: string,
    textB: string,
    provider: EmbeddingProvider
): Promise<number> {
    const [vectorA, vectorB] = await Promise.all([embedText(textA, provider), embedText(textB, provider)]);
    return semanticSimilarityFromVectors(vectorA, vectorB);
}
