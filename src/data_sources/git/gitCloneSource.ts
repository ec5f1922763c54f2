/**
 * git CLI로 레포지토리를 얕은 복제(shallow clone)하여 분석 대상을 만듭니다.
 */
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { RepositoryMaterializationError, errorMessage } from "../../errors.js";
import { logDebug, logInfo, logWarn } from "../../utils/logger.js";
import { runGit } from "./gitCommand.js";
import { parseLog, type LocalCommitLog } from "./parseLog.js";
import { extractDiff, type ChangedLines } from "./extractDiff.js";
import { readSourceFiles } from "./readSourceFiles.js";
import type { CommitRecord } from "../../models/Commit.js";
import type { MaterializeOptions, MaterializedRepository, RepositorySource } from "../types.js";

const FALLBACK_BRANCH = "master";
const GITHUB_SHORTHAND = /^[A-Za-z0-9][\w.-]*\/[A-Za-z0-9][\w.-]*$/;

/**
 * "owner/repo" clones from GitHub; anything else is passed to git as is.
 */
export function cloneUrlOf(repo: string): string {
    const trimmed = repo.trim();
    if (!GITHUB_SHORTHAND.test(trimmed)) return trimmed;
    return `https://github.com/${trimmed.replace(/\.git$/, "")}.git`;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Commits whose parents were cut off by the shallow clone. `git show` reports
 * their whole tree as added, so they carry no diff of their own.
 */
async function readShallowBoundary(cloneDir: string): Promise<Set<string>> {
    const shallowPath = path.resolve(cloneDir, (await runGit(["rev-parse", "--git-path", "shallow"], cloneDir)).trim());
    try {
        const content = await readFile(shallowPath, "utf-8");
        return new Set(content.split("\n").map((line) => line.trim()).filter((line) => line.length > 0));
    } catch (error) {
        if (isMissingFile(error)) return new Set();
        throw error;
    }
}

export class GitCloneSource implements RepositorySource {
    readonly name = "git";

    async materialize(repo: string, options: MaterializeOptions): Promise<MaterializedRepository> {
        const workDir = await mkdtemp(path.join(os.tmpdir(), "repo-similarity-"));
        const cloneDir = path.join(workDir, "repo");

        try {
            await this.clone(repo, cloneDir, options);

            const files = await readSourceFiles(cloneDir, options.rules, options);
            const commits = await this.readCommits(repo, cloneDir, options.maxCommits);
            logInfo(`   → ${repo}: ${files.length} files, ${commits.length} commits`);

            return { repoId: repo, files, commits };
        } catch (error) {
            if (error instanceof RepositoryMaterializationError) throw error;
            throw new RepositoryMaterializationError(repo, error);
        } finally {
            await rm(workDir, { recursive: true, force: true });
        }
    }

    private async clone(repo: string, cloneDir: string, options: MaterializeOptions): Promise<void> {
        // One commit past the window so the oldest windowed commit keeps its parent
        const depth = String(Math.max(1, options.maxCommits) + 1);
        const cloneArgs = (branch: string) => [
            "clone",
            "--quiet",
            "--depth",
            depth,
            "--single-branch",
            "--branch",
            branch,
            "--",
            cloneUrlOf(repo),
            cloneDir,
        ];

        logInfo(`📥 Cloning ${repo} (${options.branch})...`);
        try {
            await runGit(cloneArgs(options.branch));
        } catch (error) {
            if (options.branch === FALLBACK_BRANCH) {
                throw new RepositoryMaterializationError(repo, error);
            }
            logWarn(`Branch "${options.branch}" not cloned for ${repo}, retrying with "${FALLBACK_BRANCH}"`);
            await rm(cloneDir, { recursive: true, force: true });
            try {
                await runGit(cloneArgs(FALLBACK_BRANCH));
            } catch (retryError) {
                throw new RepositoryMaterializationError(repo, retryError);
            }
        }
    }

    /**
     * Commit history is optional: a failing log is logged and yields no commits.
     */
    private async readCommits(repo: string, cloneDir: string, limit: number): Promise<CommitRecord[]> {
        let log: LocalCommitLog[];
        let boundary: Set<string>;
        try {
            log = await parseLog(cloneDir, limit);
            boundary = await readShallowBoundary(cloneDir);
        } catch (error) {
            logWarn(`Commit history unavailable for ${repo}: ${errorMessage(error)}`);
            return [];
        }

        const commits: CommitRecord[] = [];
        for (const entry of log) {
            if (boundary.has(entry.sha)) {
                logDebug(`   ↳ ${repo}: skipped shallow boundary commit ${entry.sha}`);
                continue;
            }
            let changed: ChangedLines = { addedLines: [], removedLines: [] };
            try {
                changed = await extractDiff(cloneDir, entry.sha);
            } catch (error) {
                logWarn(`extractDiff 실패: ${entry.sha} (${errorMessage(error)})`);
            }
            commits.push({
                repoId: repo,
                commitHash: entry.sha,
                message: entry.message,
                addedLines: changed.addedLines,
                removedLines: changed.removedLines,
                timestamp: entry.date,
                author: entry.author,
            });
        }
        return commits;
    }
}
