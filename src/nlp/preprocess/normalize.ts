/**
 * 소스 코드 정규화
 *
 * Turns raw source text into comparison-ready text:
 * 1. strip comments (string literals are kept intact)
 * 2. strip import / include statements
 * 3. collapse whitespace
 * 4. (aggressive) replace identifiers with ID_0, ID_1, ... in first-seen order
 *
 * Pure functions, no I/O.
 */
import type { LanguageRules } from "./languages.js";
import type { RawSourceFile, SourceFile } from "../../models/SourceFile.js";

export type TruncationMode = "character" | "token-boundary";

export interface NormalizeOptions {
    /** Replace identifiers with positional placeholders */
    aggressive?: boolean;
}

export interface PrepareOptions extends NormalizeOptions {
    /** Character budget for the normalized text */
    maxFileChars: number;
    /** Files with fewer whitespace tokens are excluded from comparison */
    minTokens: number;
    truncation: TruncationMode;
}

export function stripComments(text: string, rules: LanguageRules): string {
    return text.replace(
        rules.commentPattern,
        (_match: string, block: string | undefined, literal: string | undefined) => {
            if (literal !== undefined) return literal;
            if (block !== undefined) return " ";
            return "";
        }
    );
}

export function stripImports(text: string, rules: LanguageRules): string {
    let result = text;
    for (const pattern of rules.importPatterns) {
        result = result.replace(pattern, "");
    }
    return result;
}

export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Keywords of the language stay as they are; every other identifier is
 * replaced by its first-seen position, so renamed copies normalize equally.
 */
export function anonymizeIdentifiers(text: string, rules: LanguageRules): string {
    const placeholders = new Map<string, string>();

    return text.replace(rules.identifierPattern, (identifier: string) => {
        if (rules.keywords.has(identifier)) return identifier;

        let placeholder = placeholders.get(identifier);
        if (placeholder === undefined) {
            placeholder = `ID_${placeholders.size}`;
            placeholders.set(identifier, placeholder);
        }
        return placeholder;
    });
}

export function normalize(rawText: string, rules: LanguageRules, options: NormalizeOptions = {}): string {
    let text = stripComments(rawText, rules);
    text = stripImports(text, rules);
    text = collapseWhitespace(text);

    if (options.aggressive) {
        text = anonymizeIdentifiers(text, rules);
    }

    return text;
}

export function tokenize(text: string): string[] {
    return text.split(/\s+/).filter((token) => token.length > 0);
}

export function countTokens(text: string): number {
    return tokenize(text).length;
}

/**
 * Cuts text to `maxChars`. "character" cuts at the exact offset;
 * "token-boundary" backs off to the last space before the offset
 * (falls back to the exact offset when the first token is longer than the budget).
 */
export function truncateText(
    text: string,
    maxChars: number,
    mode: TruncationMode = "character"
): { text: string; truncated: boolean } {
    if (text.length <= maxChars) {
        return { text, truncated: false };
    }

    let cut = text.slice(0, maxChars);
    if (mode === "token-boundary" && text[maxChars] !== " ") {
        const lastSpace = cut.lastIndexOf(" ");
        if (lastSpace > 0) {
            cut = cut.slice(0, lastSpace);
        }
    }

    return { text: cut.trimEnd(), truncated: true };
}

/**
 * Normalizes and truncates one file. `comparable` is false for files that
 * fall under the minimum token count; they are kept out of scoring, not errors.
 */
export function prepareSourceFile(
    repoId: string,
    raw: RawSourceFile,
    rules: LanguageRules,
    options: PrepareOptions
): { file: SourceFile; comparable: boolean } {
    const normalized = normalize(raw.content, rules, options);
    const { text, truncated } = truncateText(normalized, options.maxFileChars, options.truncation);
    const tokenCount = countTokens(text);

    return {
        file: {
            repoId,
            path: raw.path,
            rawText: raw.content,
            normalizedText: text,
            truncated,
            tokenCount,
        },
        comparable: tokenCount >= options.minTokens,
    };
}
