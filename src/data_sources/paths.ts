import { matchesLanguage, type LanguageRules } from "../nlp/preprocess/languages.js";

export const SKIP_DIRS: ReadonlySet<string> = new Set([
    "node_modules",
    "venv",
    ".venv",
    "dist",
    "build",
    "__pycache__",
    ".git",
]);

/**
 * Dependency, build output and hidden directories are never walked.
 */
export function shouldSkipDir(name: string): boolean {
    return SKIP_DIRS.has(name) || name.startsWith(".");
}

/**
 * True for a repository-relative path ("src/a.py") of the job's language
 * that lies outside skipped directories.
 */
export function isCandidatePath(relativePath: string, rules: LanguageRules): boolean {
    const segments = relativePath.split("/");
    const directories = segments.slice(0, -1);
    if (directories.some(shouldSkipDir)) return false;
    return matchesLanguage(relativePath, rules);
}
