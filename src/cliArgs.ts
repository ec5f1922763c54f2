import { ValidationError } from "./errors.js";
import type { SubmissionInput } from "./jobs/validateSubmission.js";

export interface AnalyzeCommand {
    input: SubmissionInput;
    /** Path the report JSON is written to */
    out?: string;
}

/**
 * `analyze <repo> <repo> ... [--threshold=0.8] [--language=python] [--branch=main] [--aggressive] [--out=report.json]`
 */
export function parseAnalyzeArgs(args: readonly string[]): AnalyzeCommand {
    const repos: string[] = [];
    const options = new Map<string, string>();
    const issues: string[] = [];

    for (const arg of args) {
        if (!arg.startsWith("--")) {
            repos.push(arg);
            continue;
        }
        const [key = "", ...rest] = arg.slice(2).split("=");
        options.set(key, rest.length > 0 ? rest.join("=") : "true");
    }

    for (const key of options.keys()) {
        if (!["threshold", "language", "branch", "aggressive", "out"].includes(key)) {
            issues.push(`Unknown option --${key}`);
        }
    }

    let threshold: number | undefined;
    const rawThreshold = options.get("threshold");
    if (rawThreshold !== undefined) {
        threshold = Number(rawThreshold);
        if (rawThreshold.trim() === "" || Number.isNaN(threshold)) {
            issues.push(`--threshold must be a number, got "${rawThreshold}"`);
        }
    }

    if (issues.length > 0) {
        throw new ValidationError(issues);
    }

    const aggressive = options.get("aggressive");
    return {
        input: {
            repos,
            language: options.get("language") ?? "python",
            threshold,
            branch: options.get("branch"),
            aggressive: aggressive === undefined ? undefined : aggressive !== "false",
        },
        out: options.get("out"),
    };
}
