import { describe, it, expect } from "vitest";
import { jaccardSimilarity, tokenSimilarity } from "./tokenSimilarity.js";

describe("tokenSimilarity", () => {
    it("is 1 for identical texts", () => {
        expect(tokenSimilarity("a b c", "a b c")).toBe(1);
    });

    it("is 0 when either text is empty", () => {
        expect(tokenSimilarity("a b c", "")).toBe(0);
        expect(tokenSimilarity("", "")).toBe(0);
    });

    it("uses unique tokens", () => {
        expect(tokenSimilarity("a b c", "b c d")).toBe(0.5);
        expect(tokenSimilarity("a a a b", "a b")).toBe(1);
    });

    it("is symmetric", () => {
        expect(tokenSimilarity("x y z w", "y z")).toBe(tokenSimilarity("y z", "x y z w"));
    });
});

describe("jaccardSimilarity", () => {
    it("works on any value type", () => {
        expect(jaccardSimilarity(new Set([1, 2, 3]), new Set([3, 4]))).toBe(0.25);
    });
});
