/**
 * 레포지토리 안의 파일을 가리키는 참조입니다. Identity is `(repoId, path)`.
 */
export interface FileRef {
    repoId: string;
    path: string;
}

/**
 * Raw file as returned by a repository source, before preprocessing.
 */
export interface RawSourceFile {
    /** 레포지토리 루트 기준 상대 경로 */
    path: string;
    /** 파일 원본 내용 */
    content: string;
}

/**
 * 비교 준비가 끝난 소스 파일입니다. Immutable once normalized.
 */
export interface SourceFile extends FileRef {
    rawText: string;
    /** 주석/import 제거, 공백 정리, (선택) 식별자 익명화 후 텍스트 */
    normalizedText: string;
    /** normalizedText was cut at the character budget */
    truncated: boolean;
    /** Number of whitespace tokens in normalizedText */
    tokenCount: number;
}

export function fileKey(ref: FileRef): string {
    return `file:${ref.repoId}\u0000${ref.path}`;
}
