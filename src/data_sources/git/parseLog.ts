import { runGit } from "./gitCommand.js";

export interface LocalCommitLog {
    sha: string;
    author: string;
    /** ISO 8601 */
    date: string;
    message: string;
}

const FIELD_SEPARATOR = "\x1f";
const RECORD_SEPARATOR = "\x1e";

// %H: SHA, %an: Author name, %aI: Author date (strict ISO), %B: raw body
const LOG_FORMAT = ["%H", "%an", "%aI", "%B"].join("%x1f") + "%x1e";

/**
 * `git log` 출력을 커밋 목록으로 파싱합니다.
 */
export function parseLogOutput(stdout: string): LocalCommitLog[] {
    return stdout
        .split(RECORD_SEPARATOR)
        .map((record) => record.replace(/^\n+/, ""))
        .filter((record) => record.trim().length > 0)
        .map((record) => {
            const [sha = "", author = "", date = "", ...rest] = record.split(FIELD_SEPARATOR);
            return {
                sha: sha.trim(),
                author,
                date,
                message: rest.join(FIELD_SEPARATOR).trim(),
            };
        })
        .filter((commit) => commit.sha.length > 0);
}

/**
 * 로컬 Git 저장소에서 최근 N개 커밋 로그를 가져온다.
 */
export async function parseLog(repoDir: string, limit: number): Promise<LocalCommitLog[]> {
    const stdout = await runGit(["log", "-n", String(limit), `--pretty=format:${LOG_FORMAT}`], repoDir);
    return parseLogOutput(stdout);
}
