/**
 * 커밋 유사도 분석
 *
 * Compares commits across repositories on two independent signals: the
 * normalized diff (added + removed lines) and the commit message. Each signal
 * is scored with the same token + semantic combination used for files.
 */
import { logDebug, logInfo } from "../utils/logger.js";
import { normalize, truncateText, type TruncationMode } from "../nlp/preprocess/normalize.js";
import { combine, type CombineOptions } from "../similarity/combine.js";
import { jaccardSimilarity, tokenSet } from "../similarity/tokenSimilarity.js";
import type { EmbeddingCache, EmbeddingEntry } from "../nlp/embedding/embeddingCache.js";
import type { LanguageRules } from "../nlp/preprocess/languages.js";
import type { CommitFlag, CommitFlagReason, CommitRecord, CommitRef } from "../models/Commit.js";

export const DEFAULT_MAX_COMMITS = 50;
export const DEFAULT_MAX_COMMIT_FLAGS = 200;

export interface CommitText {
    key: string;
    text: string;
}

export interface PreparedCommit {
    ref: CommitRef;
    diff: CommitText;
    message: CommitText;
}

export interface PrepareCommitsOptions {
    maxCommits: number;
    maxFileChars: number;
    truncation: TruncationMode;
    aggressive: boolean;
    ignoreAutomatedCommits: boolean;
}

export interface AnalyzeCommitsOptions {
    threshold: number;
    maxCommitFlags: number;
}

export interface CommitTextScorer {
    scoreTexts(a: CommitText, b: CommitText): number;
}

const AUTOMATED_PATTERNS: readonly RegExp[] = [
    /^merge\b/,
    /^bump\s/,
    /\bdependabot\b/,
    /\[bot\]/,
    /\bbot\b/,
];

export function normalizeMessage(message: string): string {
    return message.replace(/\s+/g, " ").trim().toLowerCase();
}

/**
 * Merge commits, version bumps, dependabot and bot commits.
 */
export function isAutomatedCommit(message: string): boolean {
    const msg = normalizeMessage(message);
    if (msg.length === 0) return false;
    return AUTOMATED_PATTERNS.some((pattern) => pattern.test(msg));
}

function timestampOf(commit: CommitRecord): number {
    const parsed = Date.parse(commit.timestamp);
    return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/**
 * Most recent `maxCommits` commits, newest first. Equal timestamps are ordered by hash.
 */
export function selectCommitWindow(commits: readonly CommitRecord[], maxCommits: number): CommitRecord[] {
    return [...commits]
        .sort((a, b) => {
            const byTime = timestampOf(b) - timestampOf(a);
            if (byTime !== 0 && !Number.isNaN(byTime)) return byTime;
            if (a.commitHash === b.commitHash) return 0;
            return a.commitHash < b.commitHash ? -1 : 1;
        })
        .slice(0, Math.max(0, maxCommits));
}

/**
 * Normalized text of the changed lines only. Empty for a commit without changes.
 */
export function buildDiffText(
    commit: CommitRecord,
    rules: LanguageRules,
    options: { aggressive: boolean; maxFileChars: number; truncation: TruncationMode }
): string {
    const changed = [...commit.addedLines, ...commit.removedLines].join("\n");
    if (changed.trim().length === 0) return "";

    const normalized = normalize(changed, rules, { aggressive: options.aggressive });
    return truncateText(normalized, options.maxFileChars, options.truncation).text;
}

function commitKey(kind: "diff" | "msg", commit: CommitRecord): string {
    return `${kind}:${commit.repoId}\u0000${commit.commitHash}`;
}

/**
 * Windows, filters and normalizes the commits of every repository.
 * Output order follows the input repository order, newest commit first.
 */
export function prepareCommits(
    commitsByRepo: ReadonlyMap<string, readonly CommitRecord[]>,
    rules: LanguageRules,
    options: PrepareCommitsOptions
): PreparedCommit[] {
    const prepared: PreparedCommit[] = [];

    for (const [repoId, commits] of commitsByRepo) {
        const candidates = options.ignoreAutomatedCommits
            ? commits.filter((commit) => !isAutomatedCommit(commit.message))
            : commits;
        const skipped = commits.length - candidates.length;
        if (skipped > 0) {
            logDebug(`   ↳ ${repoId}: skipped ${skipped} automated commits`);
        }

        for (const commit of selectCommitWindow(candidates, options.maxCommits)) {
            prepared.push({
                ref: { repoId, commitHash: commit.commitHash, message: commit.message },
                diff: { key: commitKey("diff", commit), text: buildDiffText(commit, rules, options) },
                message: { key: commitKey("msg", commit), text: normalizeMessage(commit.message) },
            });
        }
    }

    return prepared;
}

/**
 * Texts the embedding cache must hold before `analyzeCommits` runs.
 */
export function commitEmbeddingEntries(commits: readonly PreparedCommit[]): EmbeddingEntry[] {
    return commits.flatMap((commit) => [commit.diff, commit.message]);
}

/**
 * Token + semantic score of two commit texts, read from a frozen cache.
 * An empty text on either side scores 0.
 */
export function createCommitTextScorer(cache: EmbeddingCache, options: CombineOptions): CommitTextScorer {
    const tokenSets = new Map<string, Set<string>>();

    const tokensOf = (entry: CommitText): Set<string> => {
        let tokens = tokenSets.get(entry.key);
        if (!tokens) {
            tokens = tokenSet(entry.text);
            tokenSets.set(entry.key, tokens);
        }
        return tokens;
    };

    return {
        scoreTexts(a, b) {
            if (a.text.length === 0 || b.text.length === 0) return 0;
            const tokenScore = jaccardSimilarity(tokensOf(a), tokensOf(b));
            const semanticScore = cache.similarity(a.key, b.key);
            return combine(tokenScore, semanticScore, options).combinedScore;
        },
    };
}

function flagReason(diffHit: boolean, messageHit: boolean): CommitFlagReason | null {
    if (diffHit && messageHit) return "diff-and-message";
    if (diffHit) return "diff";
    if (messageHit) return "message";
    return null;
}

function strongestSignal(flag: CommitFlag): number {
    return Math.max(flag.diffSimilarity, flag.messageSimilarity);
}

function compareFlags(a: CommitFlag, b: CommitFlag): number {
    const bySignal = strongestSignal(b) - strongestSignal(a);
    if (bySignal !== 0) return bySignal;
    const keyA = `${a.commitA.repoId}\u0000${a.commitA.commitHash}\u0000${a.commitB.repoId}\u0000${a.commitB.commitHash}`;
    const keyB = `${b.commitA.repoId}\u0000${b.commitA.commitHash}\u0000${b.commitB.repoId}\u0000${b.commitB.commitHash}`;
    if (keyA === keyB) return 0;
    return keyA < keyB ? -1 : 1;
}

/**
 * Scores every pair of commits from different repositories. A pair is
 * flagged when either signal reaches the threshold. Strongest first, capped
 * at `maxCommitFlags`.
 */
export function analyzeCommits(
    commits: readonly PreparedCommit[],
    scorer: CommitTextScorer,
    options: AnalyzeCommitsOptions
): CommitFlag[] {
    const flags: CommitFlag[] = [];

    for (let i = 0; i < commits.length; i++) {
        const a = commits[i];
        if (!a) continue;
        for (let j = i + 1; j < commits.length; j++) {
            const b = commits[j];
            if (!b || a.ref.repoId === b.ref.repoId) continue;

            const diffSimilarity = scorer.scoreTexts(a.diff, b.diff);
            const messageSimilarity = scorer.scoreTexts(a.message, b.message);
            const reason = flagReason(diffSimilarity >= options.threshold, messageSimilarity >= options.threshold);
            if (reason === null) continue;

            flags.push({
                commitA: a.ref,
                commitB: b.ref,
                messageSimilarity,
                diffSimilarity,
                reason,
            });
        }
    }

    flags.sort(compareFlags);
    if (flags.length > options.maxCommitFlags) {
        logInfo(`   → ${flags.length} commit flags, keeping the strongest ${options.maxCommitFlags}`);
    }
    return flags.slice(0, Math.max(0, options.maxCommitFlags));
}
