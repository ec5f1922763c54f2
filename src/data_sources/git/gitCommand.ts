import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

/**
 * Runs `git` with arguments (no shell) and returns stdout.
 */
export async function runGit(args: string[], cwd?: string): Promise<string> {
    const { stdout } = await execFileAsync("git", args, {
        cwd,
        maxBuffer: 1024 * 1024 * 20, // 20MB 버퍼 (대규모 diff 대비)
        env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
    });
    return stdout;
}
