/**
 * 임베딩 생성기 계약
 *
 * Any batch function text -> fixed-length vector satisfies it; the engine
 * does not care about the model or the dimension.
 */
export interface EmbeddingProvider {
    readonly name: string;
    /** Max characters per input; longer texts are split into blocks of this size */
    readonly inputBudget: number;
    embed(texts: readonly string[]): Promise<number[][]>;
}

export const EMBEDDING_PROVIDERS = ["hashing", "openai"] as const;
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

export function isEmbeddingProviderName(value: string): value is EmbeddingProviderName {
    return (EMBEDDING_PROVIDERS as readonly string[]).includes(value);
}
