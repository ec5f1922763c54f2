/**
 * GitHub REST API(@octokit/rest)로 레포지토리 파일과 커밋을 가져옵니다.
 * Clone 없이 동작하지만 API rate limit의 영향을 받습니다.
 */
import { Octokit } from "@octokit/rest";
import { RepositoryMaterializationError, errorMessage } from "../../errors.js";
import { mapInBatches } from "../../utils/batches.js";
import { logInfo, logWarn } from "../../utils/logger.js";
import { parseUnifiedPatch } from "../git/extractDiff.js";
import { isCandidatePath } from "../paths.js";
import type { CommitRecord } from "../../models/Commit.js";
import type { RawSourceFile } from "../../models/SourceFile.js";
import type { MaterializeOptions, MaterializedRepository, RepositorySource } from "../types.js";

const REQUEST_CONCURRENCY = 5; // 동시 요청 수

export type GithubRepoRef = {
    owner: string;
    repo: string;
};

/**
 * Accepts https URLs (with or without .git), SSH URLs and "owner/repo".
 */
export function parseGithubRepo(input: string): GithubRepoRef | null {
    const trimmed = input.trim().replace(/\/+$/, "").replace(/\.git$/, "");
    const match =
        trimmed.match(/^https?:\/\/(?:www\.)?github\.com\/([^/\s]+)\/([^/\s]+)$/) ??
        trimmed.match(/^git@github\.com:([^/\s]+)\/([^/\s]+)$/) ??
        trimmed.match(/^([\w.-]+)\/([\w.-]+)$/);

    const [, owner, repo] = match ?? [];
    if (!owner || !repo) return null;
    return { owner, repo };
}

function decodeBase64(content: string): string {
    return Buffer.from(content, "base64").toString("utf-8");
}

function statusOf(error: unknown): number | undefined {
    if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
        return error.status;
    }
    return undefined;
}

export class GithubApiSource implements RepositorySource {
    readonly name = "github";
    private readonly octokit: Octokit;

    constructor(options: { token?: string; octokit?: Octokit } = {}) {
        this.octokit = options.octokit ?? new Octokit(options.token ? { auth: options.token } : {});
    }

    async materialize(repoUrl: string, options: MaterializeOptions): Promise<MaterializedRepository> {
        const ref = parseGithubRepo(repoUrl);
        if (!ref) {
            throw new RepositoryMaterializationError(repoUrl, new Error("Not a GitHub repository URL"));
        }

        try {
            const branch = await this.resolveBranch(ref, options.branch);
            logInfo(`📂 Fetching ${ref.owner}/${ref.repo}@${branch} via GitHub API...`);

            const files = await this.fetchFiles(ref, branch, options);
            const commits = await this.fetchCommits(repoUrl, ref, branch, options.maxCommits);
            logInfo(`   → ${repoUrl}: ${files.length} files, ${commits.length} commits`);

            return { repoId: repoUrl, files, commits };
        } catch (error) {
            if (error instanceof RepositoryMaterializationError) throw error;
            throw new RepositoryMaterializationError(repoUrl, error);
        }
    }

    /**
     * Requested branch, else the repository's default branch.
     */
    private async resolveBranch(ref: GithubRepoRef, branch: string): Promise<string> {
        try {
            await this.octokit.repos.getBranch({ ...ref, branch });
            return branch;
        } catch (error) {
            if (statusOf(error) !== 404) throw error;
            const response = await this.octokit.repos.get(ref);
            logWarn(`Branch "${branch}" not found, using "${response.data.default_branch}"`);
            return response.data.default_branch;
        }
    }

    private async fetchFiles(ref: GithubRepoRef, branch: string, options: MaterializeOptions): Promise<RawSourceFile[]> {
        const branchResponse = await this.octokit.repos.getBranch({ ...ref, branch });
        const commitResponse = await this.octokit.git.getCommit({ ...ref, commit_sha: branchResponse.data.commit.sha });
        const treeResponse = await this.octokit.git.getTree({
            ...ref,
            tree_sha: commitResponse.data.tree.sha,
            recursive: "1",
        });

        const maxBytes = options.maxFileSizeKb * 1024;
        const paths = treeResponse.data.tree
            .filter((item) => item.type === "blob" && typeof item.path === "string")
            .filter((item) => (item.size ?? 0) <= maxBytes)
            .map((item) => item.path ?? "")
            .filter((path) => isCandidatePath(path, options.rules))
            .sort()
            .slice(0, options.maxFilesPerRepo);

        const contents = await mapInBatches(paths, REQUEST_CONCURRENCY, async (path) => {
            const response = await this.octokit.repos.getContent({ ...ref, path, ref: branch });
            const data = response.data;
            if (Array.isArray(data) || data.type !== "file" || !("content" in data)) {
                return null;
            }
            return { path, content: decodeBase64(data.content) };
        });

        return contents.filter((file): file is RawSourceFile => file !== null);
    }

    /**
     * Commit history is optional: failures are logged and yield no commits.
     */
    private async fetchCommits(
        repoId: string,
        ref: GithubRepoRef,
        branch: string,
        maxCommits: number
    ): Promise<CommitRecord[]> {
        try {
            const list = await this.octokit.repos.listCommits({ ...ref, sha: branch, per_page: Math.min(100, maxCommits) });

            return await mapInBatches(list.data.slice(0, maxCommits), REQUEST_CONCURRENCY, async (item) => {
                const detail = await this.octokit.repos.getCommit({ ...ref, ref: item.sha });
                const addedLines: string[] = [];
                const removedLines: string[] = [];
                for (const file of detail.data.files ?? []) {
                    const changed = parseUnifiedPatch(file.patch ?? "");
                    addedLines.push(...changed.addedLines);
                    removedLines.push(...changed.removedLines);
                }

                return {
                    repoId,
                    commitHash: item.sha,
                    message: item.commit.message,
                    addedLines,
                    removedLines,
                    timestamp: item.commit.author?.date ?? "",
                    author: item.commit.author?.name ?? "",
                };
            });
        } catch (error) {
            logWarn(`Commit fetch failed for ${repoId}: ${errorMessage(error)}`);
            return [];
        }
    }
}
