import { tokenize } from "../nlp/preprocess/normalize.js";

export function jaccardSimilarity<TValue>(setA: ReadonlySet<TValue>, setB: ReadonlySet<TValue>): number {
    if (setA.size === 0 || setB.size === 0) {
        return 0;
    }

    const [smaller, larger] = setA.size <= setB.size ? [setA, setB] : [setB, setA];
    let intersection = 0;
    for (const value of smaller) {
        if (larger.has(value)) {
            intersection += 1;
        }
    }

    const union = setA.size + setB.size - intersection;
    return intersection / union;
}

export function tokenSet(text: string): Set<string> {
    return new Set(tokenize(text));
}

/**
 * Jaccard index over the unique whitespace tokens of two normalized texts.
 * 0 when either text has no tokens.
 */
export function tokenSimilarity(textA: string, textB: string): number {
    return jaccardSimilarity(tokenSet(textA), tokenSet(textB));
}
