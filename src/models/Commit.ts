/**
 * 레포지토리 커밋 스냅샷입니다. Taken once per job, never mutated.
 */
export interface CommitRecord {
    repoId: string;
    /** 커밋 SHA */
    commitHash: string;
    /** 커밋 메시지 전체 */
    message: string;
    /** Lines added by the commit, without the leading "+" */
    addedLines: string[];
    /** Lines removed by the commit, without the leading "-" */
    removedLines: string[];
    /** 커밋 날짜 (ISO 8601) */
    timestamp: string;
    author: string;
}

export interface CommitRef {
    repoId: string;
    commitHash: string;
    message: string;
}

export type CommitFlagReason = "diff" | "message" | "diff-and-message";

/**
 * 서로 다른 레포지토리의 두 커밋이 의심스럽게 유사할 때 생성됩니다.
 */
export interface CommitFlag {
    commitA: CommitRef;
    commitB: CommitRef;
    messageSimilarity: number;
    diffSimilarity: number;
    /** Which signal reached the threshold */
    reason: CommitFlagReason;
}
