import type { CommitRecord } from "../models/Commit.js";
import type { RawSourceFile } from "../models/SourceFile.js";
import type { LanguageRules } from "../nlp/preprocess/languages.js";

export interface MaterializeOptions {
    branch: string;
    rules: LanguageRules;
    maxCommits: number;
    maxFilesPerRepo: number;
    maxFileSizeKb: number;
}

/**
 * 분석 대상 레포지토리 스냅샷. Files are sorted by path.
 */
export interface MaterializedRepository {
    repoId: string;
    files: RawSourceFile[];
    commits: CommitRecord[];
}

export interface RepositorySource {
    readonly name: string;
    /**
     * Fetches files of the job's language and the recent commit history.
     * Fails with RepositoryMaterializationError naming the repository.
     */
    materialize(repo: string, options: MaterializeOptions): Promise<MaterializedRepository>;
}

export const REPOSITORY_SOURCES = ["git", "github"] as const;
export type RepositorySourceName = (typeof REPOSITORY_SOURCES)[number];

export function isRepositorySourceName(value: string): value is RepositorySourceName {
    return (REPOSITORY_SOURCES as readonly string[]).includes(value);
}
