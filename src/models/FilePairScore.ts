import type { FileRef } from "./SourceFile.js";

export type Band = "low" | "medium" | "high" | "critical";

/**
 * 두 파일 사이의 유사도 점수. Created by the combiner, read-only afterwards.
 */
export interface FilePairScore {
    fileA: FileRef;
    fileB: FileRef;
    /** Jaccard index over whitespace tokens, [0,1] */
    tokenScore: number;
    /** Cosine of mean-pooled embeddings, floored at 0, [0,1] */
    semanticScore: number;
    /** Weighted sum of tokenScore and semanticScore, [0,1] */
    combinedScore: number;
    band: Band;
}
