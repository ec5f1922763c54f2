import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { getLanguageRules } from "../../nlp/preprocess/languages.js";
import { readSourceFiles } from "./readSourceFiles.js";

const rules = getLanguageRules("python");
let root = "";

async function put(relativePath: string, content: string): Promise<void> {
    const target = path.join(root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content, "utf-8");
}

beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "read-source-files-"));
    await put("src/b.py", "b = 2");
    await put("src/a.py", "a = 1");
    await put("node_modules/pkg/c.py", "c = 3");
    await put(".hidden/d.py", "d = 4");
    await put("README.md", "# readme");
    await put("big.py", "x".repeat(2048));
});

afterEach(async () => {
    await rm(root, { recursive: true, force: true });
});

describe("readSourceFiles", () => {
    it("reads language files sorted by path and skips oversized ones", async () => {
        const files = await readSourceFiles(root, rules, { maxFilesPerRepo: 10, maxFileSizeKb: 1 });

        expect(files).toEqual([
            { path: "src/a.py", content: "a = 1" },
            { path: "src/b.py", content: "b = 2" },
        ]);
    });

    it("stops at the file cap", async () => {
        const files = await readSourceFiles(root, rules, { maxFilesPerRepo: 2, maxFileSizeKb: 10 });
        expect(files.map((file) => file.path)).toEqual(["big.py", "src/a.py"]);
    });
});
