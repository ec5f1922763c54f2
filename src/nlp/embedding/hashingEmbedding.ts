/**
 * Offline embedding: signed feature hashing of whitespace tokens into a fixed
 * vector, L2-normalized. No model, no network; deterministic across runs.
 */
import { tokenize } from "../preprocess/normalize.js";
import type { EmbeddingProvider } from "./types.js";

export const DEFAULT_HASHING_DIMENSION = 512;

export function fnv1aHash32(value: string): number {
    let hash = 0x811c9dc5;
    for (let index = 0; index < value.length; index += 1) {
        hash ^= value.charCodeAt(index);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}

export function featureHashVector(text: string, dimension: number): number[] {
    const vector = new Array<number>(dimension).fill(0);

    for (const token of tokenize(text)) {
        const hash = fnv1aHash32(token);
        const index = hash % dimension;
        const sign = hash >>> 31 === 0 ? 1 : -1;
        vector[index] = (vector[index] ?? 0) + sign;
    }

    const magnitude = Math.sqrt(vector.reduce((total, value) => total + value * value, 0));
    if (magnitude === 0) {
        return vector;
    }
    return vector.map((value) => value / magnitude);
}

export class HashingEmbeddingProvider implements EmbeddingProvider {
    readonly name = "hashing";

    constructor(
        readonly inputBudget: number,
        private readonly dimension: number = DEFAULT_HASHING_DIMENSION
    ) {}

    async embed(texts: readonly string[]): Promise<number[][]> {
        return texts.map((text) => featureHashVector(text, this.dimension));
    }
}
