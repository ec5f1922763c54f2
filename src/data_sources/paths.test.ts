import { describe, it, expect } from "vitest";
import { getLanguageRules } from "../nlp/preprocess/languages.js";
import { isCandidatePath, shouldSkipDir } from "./paths.js";

const python = getLanguageRules("python");

describe("isCandidatePath", () => {
    it("accepts source files of the language", () => {
        expect(isCandidatePath("src/app.py", python)).toBe(true);
        expect(isCandidatePath("setup.py", python)).toBe(true);
    });

    it("skips dependency, build and hidden directories", () => {
        expect(isCandidatePath("node_modules/pkg/a.py", python)).toBe(false);
        expect(isCandidatePath("venv/lib/a.py", python)).toBe(false);
        expect(isCandidatePath("src/__pycache__/a.py", python)).toBe(false);
        expect(isCandidatePath(".github/scripts/a.py", python)).toBe(false);
    });

    it("skips other languages", () => {
        expect(isCandidatePath("src/app.js", python)).toBe(false);
    });
});

describe("shouldSkipDir", () => {
    it("skips hidden names", () => {
        expect(shouldSkipDir(".cache")).toBe(true);
        expect(shouldSkipDir("src")).toBe(false);
    });
});
