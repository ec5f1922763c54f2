/**
 * In-process collaborators for tests: no git, no network, no model download.
 */
import { RepositoryMaterializationError } from "../errors.js";
import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from "../config/analysisConfig.js";
import type { CommitRecord } from "../models/Commit.js";
import type { RawSourceFile } from "../models/SourceFile.js";
import type { EmbeddingProvider } from "../nlp/embedding/types.js";
import type { MaterializeOptions, MaterializedRepository, RepositorySource } from "../data_sources/types.js";

export interface FakeRepository {
    files: RawSourceFile[];
    commits?: CommitRecord[];
}

export class InMemorySource implements RepositorySource {
    readonly name = "memory";
    readonly requested: string[] = [];

    constructor(
        private readonly repositories: Record<string, FakeRepository>,
        private readonly gate?: Promise<void>
    ) {}

    async materialize(repo: string, _options: MaterializeOptions): Promise<MaterializedRepository> {
        this.requested.push(repo);
        if (this.gate) await this.gate;

        const found = this.repositories[repo];
        if (!found) {
            throw new RepositoryMaterializationError(repo, new Error("repository not found"));
        }
        return { repoId: repo, files: found.files, commits: found.commits ?? [] };
    }
}

/**
 * Embeds each text as [length, 1] and records every call.
 */
export class CountingProvider implements EmbeddingProvider {
    readonly name = "counting";
    readonly calls: string[][] = [];

    constructor(readonly inputBudget = 1000) {}

    async embed(texts: readonly string[]): Promise<number[][]> {
        this.calls.push([...texts]);
        return texts.map((text) => [text.length, 1]);
    }
}

export function testConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
    return { ...DEFAULT_ANALYSIS_CONFIG, embeddingProvider: "hashing", explanationMode: "none", ...overrides };
}

/**
 * A small Python module whose identifiers all carry `name`, so modules built
 * from different names share only keywords and operators.
 */
export function pythonModule(name: string): string {
    return [
        `def ${name}_load(${name}_path):`,
        `    ${name}_rows = read_${name}(${name}_path)`,
        `    return [${name}_clean(${name}_row) for ${name}_row in ${name}_rows]`,
        "",
        `def ${name}_clean(${name}_value):`,
        `    return ${name}_value.strip().lower()`,
        "",
    ].join("\n");
}

export function commit(
    repoId: string,
    commitHash: string,
    message: string,
    addedLines: string[],
    timestamp = "2024-01-01T00:00:00Z"
): CommitRecord {
    return { repoId, commitHash, message, addedLines, removedLines: [], timestamp, author: "tester" };
}
