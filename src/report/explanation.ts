/**
 * 의심 레포지토리 쌍에 대한 설명을 생성합니다.
 *
 * - template: deterministic text built from the scores
 * - llm: OpenAI (GPT-4o), falling back to Claude
 * - none: no generator; explanations stay empty
 */
import OpenAI from "openai";
import Anthropic from "@anthropic-ai/sdk";
import { ConfigurationError, errorMessage } from "../errors.js";
import { formatPercent } from "../utils/math.js";
import { logInfo, logWarn } from "../utils/logger.js";
import type { RepoPairResult } from "../models/RepoPairResult.js";
import type { SupportedLanguage } from "../nlp/preprocess/languages.js";

export const EXPLANATION_MODES = ["none", "template", "llm"] as const;
export type ExplanationMode = (typeof EXPLANATION_MODES)[number];

export interface ExplanationContext {
    threshold: number;
    language: SupportedLanguage;
}

export interface ExplanationGenerator {
    readonly name: string;
    explain(pair: RepoPairResult, context: ExplanationContext): Promise<string>;
}

const MAX_LISTED_PAIRS = 10;

export function isExplanationMode(value: string): value is ExplanationMode {
    return (EXPLANATION_MODES as readonly string[]).includes(value);
}

export function verdictFor(repoSimilarity: number): string {
    if (repoSimilarity > 0.85) return "LIKELY PLAGIARISM - Recommend manual review";
    if (repoSimilarity > 0.75) return "SUSPICIOUS - Possible plagiarism or common libraries";
    return "LOW RISK - Similarity within acceptable range";
}

/**
 * Lists the strongest file pairs and closes with a verdict.
 */
export class TemplateExplanationGenerator implements ExplanationGenerator {
    readonly name = "template";

    async explain(pair: RepoPairResult): Promise<string> {
        const lines = [
            `Repository 1: ${pair.repoA}`,
            `Repository 2: ${pair.repoB}`,
            `Repository Similarity Score: ${formatPercent(pair.repoSimilarity)}`,
            "",
            `SUSPICIOUS FILE PAIRS (${pair.filePairs.length}):`,
        ];

        pair.filePairs.slice(0, MAX_LISTED_PAIRS).forEach((filePair, i) => {
            lines.push(
                `${i + 1}. ${filePair.fileA.path} <-> ${filePair.fileB.path} ` +
                    `(${formatPercent(filePair.combinedScore)}, ${filePair.band.toUpperCase()})`
            );
        });

        if (pair.filePairs.length > MAX_LISTED_PAIRS) {
            lines.push(`... and ${pair.filePairs.length - MAX_LISTED_PAIRS} more similar pairs`);
        }

        lines.push("", `VERDICT: ${verdictFor(pair.repoSimilarity)}`);
        return lines.join("\n");
    }
}

const SYSTEM_PROMPT = `
You review similarity reports between source code repositories.
Given repository-level and file-level similarity scores, write a short paragraph
(at most 5 sentences) describing where the overlap is concentrated and what a
reviewer should inspect first. Do not state a legal or academic verdict.
`;

function buildPrompt(pair: RepoPairResult, context: ExplanationContext): string {
    const files = pair.filePairs
        .slice(0, MAX_LISTED_PAIRS)
        .map(
            (p) =>
                `- ${p.fileA.path} <-> ${p.fileB.path}: combined ${p.combinedScore}, ` +
                `token ${p.tokenScore}, semantic ${p.semanticScore}, band ${p.band}`
        )
        .join("\n");

    return [
        `Language: ${context.language}`,
        `Threshold: ${context.threshold}`,
        `Repository A: ${pair.repoA} (${pair.comparableFilesA} comparable files)`,
        `Repository B: ${pair.repoB} (${pair.comparableFilesB} comparable files)`,
        `Repository similarity: ${pair.repoSimilarity}`,
        `Best-matching file pairs:\n${files}`,
    ].join("\n");
}

export interface LlmClients {
    openai: OpenAI | null;
    anthropic: Anthropic | null;
}

/**
 * OpenAI 실패 시 Claude로 자동 fallback합니다.
 * Throws when neither provider produced text.
 */
export class LlmExplanationGenerator implements ExplanationGenerator {
    readonly name = "llm";

    constructor(private readonly clients: LlmClients) {}

    async explain(pair: RepoPairResult, context: ExplanationContext): Promise<string> {
        const prompt = buildPrompt(pair, context);
        const { openai, anthropic } = this.clients;

        // 1차 시도: OpenAI
        if (openai) {
            try {
                const response = await openai.chat.completions.create({
                    model: "gpt-4o",
                    messages: [
                        { role: "system", content: SYSTEM_PROMPT },
                        { role: "user", content: prompt },
                    ],
                    temperature: 0.1,
                });
                const text = response.choices[0]?.message?.content;
                if (text) return text.trim();
                logWarn("OpenAI returned an empty explanation");
            } catch (error) {
                logWarn(`OpenAI failed: ${errorMessage(error)}`);
                logInfo("🔄 Falling back to Claude...");
            }
        }

        // 2차 시도: Claude
        if (anthropic) {
            const response = await anthropic.messages.create({
                model: "claude-sonnet-4-20250514",
                max_tokens: 512,
                system: SYSTEM_PROMPT,
                messages: [{ role: "user", content: prompt }],
            });
            const textBlock = response.content.find((block) => block.type === "text");
            if (textBlock && textBlock.type === "text" && textBlock.text) {
                return textBlock.text.trim();
            }
        }

        throw new Error("No LLM provider produced an explanation");
    }
}

/**
 * Generator for the configured mode; null for "none".
 */
export function createExplanationGenerator(
    mode: ExplanationMode,
    keys: { openaiApiKey?: string; claudeApiKey?: string } = {}
): ExplanationGenerator | null {
    switch (mode) {
        case "none":
            return null;
        case "template":
            return new TemplateExplanationGenerator();
        case "llm": {
            if (!keys.openaiApiKey && !keys.claudeApiKey) {
                throw new ConfigurationError("EXPLANATION_MODE=llm requires OPENAI_API_KEY or CLAUDE_API_KEY");
            }
            return new LlmExplanationGenerator({
                openai: keys.openaiApiKey ? new OpenAI({ apiKey: keys.openaiApiKey }) : null,
                anthropic: keys.claudeApiKey ? new Anthropic({ apiKey: keys.claudeApiKey }) : null,
            });
        }
    }
}

/**
 * Never fails: an absent generator yields "", a failing one is logged and yields "".
 */
export async function explainPair(
    generator: ExplanationGenerator | null,
    pair: RepoPairResult,
    context: ExplanationContext
): Promise<string> {
    if (!generator) return "";

    try {
        return await generator.explain(pair, context);
    } catch (error) {
        logWarn(`Explanation (${generator.name}) failed for ${pair.repoA} / ${pair.repoB}: ${errorMessage(error)}`);
        return "";
    }
}
