/**
 * OpenAI 임베딩 (text-embedding-3-small, 1536 dimensions)
 */
import OpenAI from "openai";
import { EmbeddingError, errorMessage } from "../../errors.js";
import { logDebug } from "../../utils/logger.js";
import type { EmbeddingProvider } from "./types.js";

export const OPENAI_EMBEDDING_MODEL = "text-embedding-3-small";

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    readonly name = "openai";
    private readonly client: OpenAI;

    constructor(apiKey: string, readonly inputBudget: number) {
        this.client = new OpenAI({ apiKey });
    }

    async embed(texts: readonly string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        logDebug(`🔄 Generating ${texts.length} embeddings with OpenAI...`);
        try {
            const response = await this.client.embeddings.create({
                model: OPENAI_EMBEDDING_MODEL,
                input: [...texts],
                encoding_format: "float",
            });

            return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
        } catch (error) {
            throw new EmbeddingError(`OpenAI embedding failed: ${errorMessage(error)}`, error);
        }
    }
}
