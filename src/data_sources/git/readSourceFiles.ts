import { readdir, readFile, stat } from "fs/promises";
import path from "path";
import { isCandidatePath, shouldSkipDir } from "../paths.js";
import { logDebug } from "../../utils/logger.js";
import type { LanguageRules } from "../../nlp/preprocess/languages.js";
import type { RawSourceFile } from "../../models/SourceFile.js";

export interface ReadSourceFilesOptions {
    maxFilesPerRepo: number;
    maxFileSizeKb: number;
}

async function walk(rootDir: string, relativeDir: string, out: string[]): Promise<void> {
    const entries = await readdir(path.join(rootDir, relativeDir), { withFileTypes: true });

    for (const entry of entries) {
        const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
            if (!shouldSkipDir(entry.name)) {
                await walk(rootDir, relativePath, out);
            }
        } else if (entry.isFile()) {
            out.push(relativePath);
        }
    }
}

/**
 * Source files of the job's language under `rootDir`, sorted by path.
 * Oversized files are skipped; at most `maxFilesPerRepo` are read.
 */
export async function readSourceFiles(
    rootDir: string,
    rules: LanguageRules,
    options: ReadSourceFilesOptions
): Promise<RawSourceFile[]> {
    const allPaths: string[] = [];
    await walk(rootDir, "", allPaths);

    const candidates = allPaths.filter((p) => isCandidatePath(p, rules)).sort();
    const maxBytes = options.maxFileSizeKb * 1024;
    const files: RawSourceFile[] = [];
    let oversized = 0;

    for (const relativePath of candidates) {
        if (files.length >= options.maxFilesPerRepo) break;

        const absolutePath = path.join(rootDir, relativePath);
        const { size } = await stat(absolutePath);
        if (size > maxBytes) {
            oversized++;
            continue;
        }
        files.push({ path: relativePath, content: await readFile(absolutePath, "utf-8") });
    }

    logDebug(
        `   ↳ ${candidates.length} ${rules.name} files found, ${files.length} read, ${oversized} over ${options.maxFileSizeKb}KB`
    );
    return files;
}
