/**
 * 임베딩 제공자 선택
 */
import { ConfigurationError } from "../../errors.js";
import { logInfo } from "../../utils/logger.js";
import { HashingEmbeddingProvider } from "./hashingEmbedding.js";
import { OpenAIEmbeddingProvider } from "./openaiEmbedding.js";
import type { EmbeddingProvider, EmbeddingProviderName } from "./types.js";

export interface EmbeddingProviderOptions {
    provider: EmbeddingProviderName;
    inputBudget: number;
    openaiApiKey?: string;
}

export function createEmbeddingProvider(options: EmbeddingProviderOptions): EmbeddingProvider {
    const { provider, inputBudget } = options;
    logInfo(`🧠 Embedding provider: ${provider}`);

    switch (provider) {
        case "openai":
            if (!options.openaiApiKey) {
                throw new ConfigurationError("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY");
            }
            return new OpenAIEmbeddingProvider(options.openaiApiKey, inputBudget);
        case "hashing":
            return new HashingEmbeddingProvider(inputBudget);
    }
}
