import { runGit } from "./gitCommand.js";

export interface ChangedLines {
    addedLines: string[];
    removedLines: string[];
}

/**
 * Keeps the "+" and "-" lines of unified diff hunks, without their marker.
 * File headers ("diff --git", "---", "+++", "index") and context lines are
 * dropped. Works on a full `git show` patch and on GitHub's per-file patches,
 * which start directly at "@@".
 */
export function parseUnifiedPatch(patch: string): ChangedLines {
    const addedLines: string[] = [];
    const removedLines: string[] = [];
    let inHunk = false;

    for (const line of patch.split("\n")) {
        if (line.startsWith("diff --git")) {
            inHunk = false;
            continue;
        }
        if (line.startsWith("@@")) {
            inHunk = true;
            continue;
        }
        if (!inHunk) continue;

        if (line.startsWith("+")) {
            addedLines.push(line.slice(1));
        } else if (line.startsWith("-")) {
            removedLines.push(line.slice(1));
        }
    }

    return { addedLines, removedLines };
}

/**
 * 커밋의 변경 라인을 추출합니다.
 */
export async function extractDiff(repoDir: string, sha: string): Promise<ChangedLines> {
    const stdout = await runGit(["show", sha, "--format=", "--patch", "--no-color", "--no-ext-diff"], repoDir);
    return parseUnifiedPatch(stdout);
}
