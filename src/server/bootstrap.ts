/**
 * Wires configuration, collaborators and the analysis service from the environment.
 */
import { env } from "../../shared/config/env.js";
import { loadAnalysisConfig, type AnalysisConfig } from "../config/analysisConfig.js";
import { createRepositorySource } from "../data_sources/index.js";
import { createEmbeddingProvider } from "../nlp/embedding/index.js";
import { createExplanationGenerator } from "../report/explanation.js";
import { AnalysisService } from "../jobs/analysisService.js";

export function createAnalysisService(config: AnalysisConfig = loadAnalysisConfig()): AnalysisService {
    return new AnalysisService({
        config,
        source: createRepositorySource(config.repositorySource, env.GITHUB_TOKEN() || undefined),
        embeddingProvider: createEmbeddingProvider({
            provider: config.embeddingProvider,
            inputBudget: config.embeddingInputBudget,
            openaiApiKey: env.OPENAI_API_KEY() || undefined,
        }),
        explanationGenerator: createExplanationGenerator(config.explanationMode, {
            openaiApiKey: env.OPENAI_API_KEY() || undefined,
            claudeApiKey: env.CLAUDE_API_KEY() || undefined,
        }),
    });
}
